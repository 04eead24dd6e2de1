/**
 * Inventory domain types
 *
 * Stored records the voice pipeline reads (for entity resolution) and writes
 * (on confirmation). The storage schema itself belongs to the repository
 * implementation; these are the shapes that cross the boundary.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const EQUIPMENT_CATEGORIES = [
  'electromedical',
  'medical-equipment',
  'furniture',
  'it',
  'facility',
  'other',
] as const;

export type EquipmentCategory = (typeof EQUIPMENT_CATEGORIES)[number];

export const INTERVENTION_TYPES = [
  'scheduled',
  'inspection',
  'repair',
  'replacement',
  'installation',
  'acceptance-test',
  'decommissioning',
  'extraordinary',
] as const;

export type InterventionType = (typeof INTERVENTION_TYPES)[number];

/**
 * Record kinds that can be referenced by name in a dictation and resolved
 * against the store.
 */
export const ENTITY_KINDS = ['vendor', 'location', 'equipment'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

// ============================================================================
// Records
// ============================================================================

export interface NamedRecord {
  id: string;
  name: string;
  isActive: boolean;
  /** Set on records created inline from a dictation with only a name */
  needsCompletion: boolean;
}

export interface Vendor extends NamedRecord {
  company: string | null;
  email: string | null;
  phone: string | null;
  address: string | null;
  city: string | null;
  specialization: string | null;
  isSupplier: boolean;
}

export interface Location extends NamedRecord {
  floor: string | null;
  department: string | null;
  building: string | null;
  notes: string | null;
}

export interface Equipment extends NamedRecord {
  category: EquipmentCategory;
  brand: string | null;
  model: string | null;
  serialNumber: string | null;
  barcode: string | null;
  /** Location as dictated; locationId is set when it resolved to a stored record */
  location: string;
  locationId: string | null;
  supplierId: string | null;
  warrantyMonths: number | null;
  warrantyVendorId: string | null;
  maintenanceFrequencyMonths: number | null;
  lastMaintenanceDate: string | null;
  notes: string | null;
}

export interface MaintenanceEvent {
  id: string;
  equipmentId: string;
  vendorId: string | null;
  type: InterventionType;
  description: string;
  /** Null when the operator reported their own work */
  performedBy: string | null;
  selfReported: boolean;
  /** ISO calendar date (YYYY-MM-DD) */
  date: string;
  durationMinutes: number | null;
  cost: number | null;
  isWarrantyWork: boolean;
}

export interface EntityRecordByKind {
  vendor: Vendor;
  location: Location;
  equipment: Equipment;
}

export type EntityRecord = EntityRecordByKind[EntityKind];

// ============================================================================
// Persistence payloads
// ============================================================================

export type RecordDraft =
  | { kind: 'equipment'; data: Omit<Equipment, 'id'> }
  | { kind: 'maintenance'; data: Omit<MaintenanceEvent, 'id'> }
  | { kind: 'vendor'; data: Omit<Vendor, 'id'> }
  | { kind: 'location'; data: Omit<Location, 'id'> };

export type StoredRecord =
  | { kind: 'equipment'; data: Equipment }
  | { kind: 'maintenance'; data: MaintenanceEvent }
  | { kind: 'vendor'; data: Vendor }
  | { kind: 'location'; data: Location };

/**
 * Name-only record created from a dictation when a reference did not match
 * anything. The store flags it as needing completion.
 */
export interface MinimalRecord {
  kind: EntityKind;
  name: string;
}
