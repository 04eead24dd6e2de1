import type { MatchThresholds } from '../../config/voice.js';
import type { InventoryRepository } from '../../repositories/InventoryRepository.js';
import type { EntityKind } from '../../types/inventory.js';
import type { ReferenceResolution } from '../../types/voice.js';
import { EquipmentResolver } from './EquipmentResolver.js';
import { LocationResolver } from './LocationResolver.js';
import { VendorResolver } from './VendorResolver.js';

/**
 * Entry point for resolving dictated references of any kind
 */
export class EntityResolver {
  private readonly vendors: VendorResolver;
  private readonly locations: LocationResolver;
  private readonly equipment: EquipmentResolver;

  constructor(repository: InventoryRepository, thresholds?: MatchThresholds) {
    this.vendors = new VendorResolver(repository, thresholds);
    this.locations = new LocationResolver(repository, thresholds);
    this.equipment = new EquipmentResolver(repository, thresholds);
  }

  async resolveReference(entity: EntityKind, query: string): Promise<ReferenceResolution> {
    switch (entity) {
      case 'vendor':
        return { entity, query, resolution: await this.vendors.resolve(query) };
      case 'location':
        return { entity, query, resolution: await this.locations.resolve(query) };
      case 'equipment':
        return { entity, query, resolution: await this.equipment.resolve(query) };
    }
  }
}
