/**
 * Base Entity Resolver
 *
 * Abstract base class for store-backed entity resolution.
 * Loads the active records of one kind and runs tiered name resolution over them.
 */

import { DEFAULT_MATCH_THRESHOLDS, type MatchThresholds } from '../../config/voice.js';
import type { InventoryRepository } from '../../repositories/InventoryRepository.js';
import type { EntityKind, EntityRecordByKind } from '../../types/inventory.js';
import type { Resolution } from '../../types/voice.js';
import {
  buildResolutionAttributes,
  buildResolutionResultAttributes,
  setSpanAttributes,
  withSpan,
} from '../../utils/tracing.js';
import { resolve } from './resolve.js';

export abstract class BaseResolver<K extends EntityKind> {
  constructor(
    protected readonly repository: InventoryRepository,
    protected readonly thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS
  ) {}

  /**
   * Get the entity kind this resolver handles
   */
  abstract getEntityKind(): K;

  /**
   * Resolve a spoken reference against the active records of this kind
   */
  async resolve(query: string): Promise<Resolution<EntityRecordByKind[K]>> {
    const kind = this.getEntityKind();

    return withSpan(`resolver.${kind}`, buildResolutionAttributes(kind), async (span) => {
      const pool = await this.repository.listActive(kind);
      const shortcut = this.matchIdentifier(query, pool);
      const resolution = shortcut ? { outcome: 'found' as const, record: shortcut } : resolve(query, pool, this.thresholds);

      setSpanAttributes(span, buildResolutionResultAttributes(pool.length, resolution.outcome));
      console.log(`[${this.constructor.name}] "${query}" → ${resolution.outcome} (${pool.length} candidates)`);
      return resolution;
    });
  }

  /**
   * Hook for kinds that carry a unique identifier an operator may dictate
   * instead of the name. Runs before name resolution.
   */
  protected matchIdentifier(
    _query: string,
    _pool: readonly EntityRecordByKind[K][]
  ): EntityRecordByKind[K] | null {
    return null;
  }
}
