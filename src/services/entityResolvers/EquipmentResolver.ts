import type { Equipment } from '../../types/inventory.js';
import { BaseResolver } from './BaseResolver.js';

/**
 * Resolves spoken equipment references.
 *
 * A dictated barcode or serial number identifies the equipment directly;
 * anything else goes through name resolution.
 */
export class EquipmentResolver extends BaseResolver<'equipment'> {
  getEntityKind(): 'equipment' {
    return 'equipment';
  }

  protected matchIdentifier(query: string, pool: readonly Equipment[]): Equipment | null {
    const code = query.replace(/\s+/g, '').toUpperCase();
    if (code.length === 0) {
      return null;
    }

    return (
      pool.find(
        (equipment) =>
          equipment.barcode?.toUpperCase() === code || equipment.serialNumber?.toUpperCase() === code
      ) ?? null
    );
  }
}
