import { v4 as uuidv4 } from 'uuid';
import type {
  EntityKind,
  EntityRecordByKind,
  Equipment,
  Location,
  MaintenanceEvent,
  MinimalRecord,
  RecordDraft,
  StoredRecord,
  Vendor,
} from '../types/inventory.js';
import type { InventoryRepository } from './InventoryRepository.js';

export interface InventorySeed {
  vendors?: Vendor[];
  locations?: Location[];
  equipment?: Equipment[];
  maintenance?: MaintenanceEvent[];
}

/**
 * Process-local inventory store
 *
 * Used by the CLI when no database is configured, and by tests.
 */
export class InMemoryInventoryRepository implements InventoryRepository {
  private readonly records: { [K in EntityKind]: EntityRecordByKind[K][] };
  private readonly maintenance: MaintenanceEvent[];

  constructor(seed: InventorySeed = {}) {
    this.records = {
      vendor: [...(seed.vendors ?? [])],
      location: [...(seed.locations ?? [])],
      equipment: [...(seed.equipment ?? [])],
    };
    this.maintenance = [...(seed.maintenance ?? [])];
  }

  async listActive<K extends EntityKind>(kind: K): Promise<EntityRecordByKind[K][]> {
    const records: EntityRecordByKind[K][] = this.records[kind];
    return records.filter((record) => record.isActive);
  }

  async create(record: MinimalRecord): Promise<string> {
    const name = record.name.trim();
    if (!name) {
      throw new Error(`Cannot create a ${record.kind} without a name`);
    }

    const id = uuidv4();
    const base = { id, name, isActive: true, needsCompletion: true };

    switch (record.kind) {
      case 'vendor':
        this.records.vendor.push({
          ...base,
          company: null,
          email: null,
          phone: null,
          address: null,
          city: null,
          specialization: null,
          isSupplier: false,
        });
        break;
      case 'location':
        this.records.location.push({ ...base, floor: null, department: null, building: null, notes: null });
        break;
      case 'equipment':
        this.records.equipment.push({
          ...base,
          category: 'other',
          brand: null,
          model: null,
          serialNumber: null,
          barcode: null,
          location: '',
          locationId: null,
          supplierId: null,
          warrantyMonths: null,
          warrantyVendorId: null,
          maintenanceFrequencyMonths: null,
          lastMaintenanceDate: null,
          notes: null,
        });
        break;
    }

    return id;
  }

  async insert(record: RecordDraft): Promise<string> {
    const id = uuidv4();

    switch (record.kind) {
      case 'vendor':
        this.records.vendor.push({ ...record.data, id });
        break;
      case 'location':
        this.records.location.push({ ...record.data, id });
        break;
      case 'equipment':
        this.records.equipment.push({ ...record.data, id });
        break;
      case 'maintenance':
        this.maintenance.push({ ...record.data, id });
        break;
    }

    return id;
  }

  async update(record: StoredRecord): Promise<void> {
    switch (record.kind) {
      case 'vendor':
        replaceById(this.records.vendor, record.data);
        break;
      case 'location':
        replaceById(this.records.location, record.data);
        break;
      case 'equipment':
        replaceById(this.records.equipment, record.data);
        break;
      case 'maintenance':
        replaceById(this.maintenance, record.data);
        break;
    }
  }

  /**
   * Look up any stored record by id (including inactive ones)
   */
  findById<K extends EntityKind>(kind: K, id: string): EntityRecordByKind[K] | null {
    const records: EntityRecordByKind[K][] = this.records[kind];
    return records.find((record) => record.id === id) ?? null;
  }

  listMaintenance(equipmentId?: string): MaintenanceEvent[] {
    return this.maintenance.filter((event) => !equipmentId || event.equipmentId === equipmentId);
  }
}

function replaceById<T extends { id: string }>(records: T[], next: T): void {
  const index = records.findIndex((record) => record.id === next.id);
  if (index === -1) {
    throw new Error(`Record ${next.id} not found`);
  }
  records[index] = next;
}
