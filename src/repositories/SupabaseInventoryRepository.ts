import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { supabaseService } from '../db/supabase.js';
import {
  EQUIPMENT_CATEGORIES,
  type EntityKind,
  type EntityRecordByKind,
  type Equipment,
  type Location,
  type MaintenanceEvent,
  type MinimalRecord,
  type RecordDraft,
  type StoredRecord,
  type Vendor,
} from '../types/inventory.js';
import type { InventoryRepository } from './InventoryRepository.js';

const TABLES = {
  vendor: 'vendors',
  location: 'locations',
  equipment: 'equipment',
  maintenance: 'maintenance_events',
} as const;

// ============================================================================
// Row schemas (snake_case columns → domain records)
// ============================================================================

const nullableText = z.string().nullable();

const VendorRow = z
  .object({
    id: z.string(),
    name: z.string(),
    is_active: z.boolean(),
    needs_completion: z.boolean(),
    company: nullableText,
    email: nullableText,
    phone: nullableText,
    address: nullableText,
    city: nullableText,
    specialization: nullableText,
    is_supplier: z.boolean(),
  })
  .transform(
    (row): Vendor => ({
      id: row.id,
      name: row.name,
      isActive: row.is_active,
      needsCompletion: row.needs_completion,
      company: row.company,
      email: row.email,
      phone: row.phone,
      address: row.address,
      city: row.city,
      specialization: row.specialization,
      isSupplier: row.is_supplier,
    })
  );

const LocationRow = z
  .object({
    id: z.string(),
    name: z.string(),
    is_active: z.boolean(),
    needs_completion: z.boolean(),
    floor: nullableText,
    department: nullableText,
    building: nullableText,
    notes: nullableText,
  })
  .transform(
    (row): Location => ({
      id: row.id,
      name: row.name,
      isActive: row.is_active,
      needsCompletion: row.needs_completion,
      floor: row.floor,
      department: row.department,
      building: row.building,
      notes: row.notes,
    })
  );

const EquipmentRow = z
  .object({
    id: z.string(),
    name: z.string(),
    is_active: z.boolean(),
    needs_completion: z.boolean(),
    category: z.enum(EQUIPMENT_CATEGORIES),
    brand: nullableText,
    model: nullableText,
    serial_number: nullableText,
    barcode: nullableText,
    location: z.string(),
    location_id: nullableText,
    supplier_id: nullableText,
    warranty_months: z.number().nullable(),
    warranty_vendor_id: nullableText,
    maintenance_frequency_months: z.number().nullable(),
    last_maintenance_date: nullableText,
    notes: nullableText,
  })
  .transform(
    (row): Equipment => ({
      id: row.id,
      name: row.name,
      isActive: row.is_active,
      needsCompletion: row.needs_completion,
      category: row.category,
      brand: row.brand,
      model: row.model,
      serialNumber: row.serial_number,
      barcode: row.barcode,
      location: row.location,
      locationId: row.location_id,
      supplierId: row.supplier_id,
      warrantyMonths: row.warranty_months,
      warrantyVendorId: row.warranty_vendor_id,
      maintenanceFrequencyMonths: row.maintenance_frequency_months,
      lastMaintenanceDate: row.last_maintenance_date,
      notes: row.notes,
    })
  );

const InsertedRow = z.object({ id: z.string() });

const ROW_PARSERS: { [K in EntityKind]: (row: unknown) => EntityRecordByKind[K] } = {
  vendor: (row) => VendorRow.parse(row),
  location: (row) => LocationRow.parse(row),
  equipment: (row) => EquipmentRow.parse(row),
};

// ============================================================================
// Domain records → rows
// ============================================================================

function vendorRow(vendor: Omit<Vendor, 'id'>) {
  return {
    name: vendor.name,
    is_active: vendor.isActive,
    needs_completion: vendor.needsCompletion,
    company: vendor.company,
    email: vendor.email,
    phone: vendor.phone,
    address: vendor.address,
    city: vendor.city,
    specialization: vendor.specialization,
    is_supplier: vendor.isSupplier,
  };
}

function locationRow(location: Omit<Location, 'id'>) {
  return {
    name: location.name,
    is_active: location.isActive,
    needs_completion: location.needsCompletion,
    floor: location.floor,
    department: location.department,
    building: location.building,
    notes: location.notes,
  };
}

function equipmentRow(equipment: Omit<Equipment, 'id'>) {
  return {
    name: equipment.name,
    is_active: equipment.isActive,
    needs_completion: equipment.needsCompletion,
    category: equipment.category,
    brand: equipment.brand,
    model: equipment.model,
    serial_number: equipment.serialNumber,
    barcode: equipment.barcode,
    location: equipment.location,
    location_id: equipment.locationId,
    supplier_id: equipment.supplierId,
    warranty_months: equipment.warrantyMonths,
    warranty_vendor_id: equipment.warrantyVendorId,
    maintenance_frequency_months: equipment.maintenanceFrequencyMonths,
    last_maintenance_date: equipment.lastMaintenanceDate,
    notes: equipment.notes,
  };
}

function maintenanceRow(event: Omit<MaintenanceEvent, 'id'>) {
  return {
    equipment_id: event.equipmentId,
    vendor_id: event.vendorId,
    type: event.type,
    description: event.description,
    performed_by: event.performedBy,
    self_reported: event.selfReported,
    date: event.date,
    duration_minutes: event.durationMinutes,
    cost: event.cost,
    is_warranty_work: event.isWarrantyWork,
  };
}

function toRow(record: RecordDraft) {
  switch (record.kind) {
    case 'vendor':
      return vendorRow(record.data);
    case 'location':
      return locationRow(record.data);
    case 'equipment':
      return equipmentRow(record.data);
    case 'maintenance':
      return maintenanceRow(record.data);
  }
}

function placeholderRow(record: MinimalRecord) {
  const base = { name: record.name.trim(), is_active: true, needs_completion: true };
  // Equipment rows need a category and a location; the operator completes them later
  return record.kind === 'equipment' ? { ...base, category: 'other', location: '' } : base;
}

/**
 * Inventory store backed by Supabase tables
 */
export class SupabaseInventoryRepository implements InventoryRepository {
  constructor(private readonly client: SupabaseClient = supabaseService.getClient()) {}

  async listActive<K extends EntityKind>(kind: K): Promise<EntityRecordByKind[K][]> {
    const { data, error } = await this.client.from(TABLES[kind]).select('*').eq('is_active', true);

    if (error) {
      throw new Error(`Failed to list ${kind} records: ${error.message}`);
    }

    const parse = ROW_PARSERS[kind];
    return z.array(z.unknown()).parse(data ?? []).map((row) => parse(row));
  }

  async create(record: MinimalRecord): Promise<string> {
    if (!record.name.trim()) {
      throw new Error(`Cannot create a ${record.kind} without a name`);
    }
    return this.insertRow(record.kind, placeholderRow(record));
  }

  async insert(record: RecordDraft): Promise<string> {
    return this.insertRow(record.kind, toRow(record));
  }

  async update(record: StoredRecord): Promise<void> {
    const { error } = await this.client
      .from(TABLES[record.kind])
      .update(toRow(record))
      .eq('id', record.data.id);

    if (error) {
      throw new Error(`Failed to update ${record.kind} ${record.data.id}: ${error.message}`);
    }
  }

  private async insertRow(kind: keyof typeof TABLES, row: Record<string, unknown>): Promise<string> {
    const { data, error } = await this.client.from(TABLES[kind]).insert(row).select('id').single();

    if (error) {
      throw new Error(`Failed to insert ${kind}: ${error.message}`);
    }

    return InsertedRow.parse(data).id;
  }
}
