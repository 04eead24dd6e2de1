/**
 * Conversion of a completed task into the record handed to storage
 */

import type { RecordDraft } from '../../types/inventory.js';
import type { SpeakerHint, TaskSnapshot } from '../../types/voice.js';

/** Ids of the records the task's reference fields resolved to, by field name */
export type ResolvedIds = Partial<Record<string, string>>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function requireValue<T>(value: T | undefined, field: string): T {
  if (value === undefined || (typeof value === 'string' && value.trim().length === 0)) {
    throw new Error(`Required field "${field}" is missing`);
  }
  return value;
}

function text(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Build the storage payload for a completed task
 *
 * @param task - Collected values
 * @param ids - Resolved reference ids
 * @param hint - Current speaker hint (marks self-reported maintenance)
 * @param today - Fallback date for events without one (YYYY-MM-DD)
 * @throws Error when a required value is missing
 */
export function buildRecordDraft(
  task: TaskSnapshot,
  ids: ResolvedIds,
  hint: SpeakerHint,
  today: string
): RecordDraft {
  switch (task.kind) {
    case 'equipment': {
      const fields = task.fields;
      return {
        kind: 'equipment',
        data: {
          name: requireValue(fields.name, 'name').trim(),
          isActive: true,
          needsCompletion: false,
          category: requireValue(fields.category, 'category'),
          brand: text(fields.brand),
          model: text(fields.model),
          serialNumber: text(fields.serialNumber),
          barcode: text(fields.barcode),
          location: requireValue(fields.location, 'location').trim(),
          locationId: ids.location ?? null,
          supplierId: ids.supplier ?? null,
          warrantyMonths: fields.warrantyMonths ?? null,
          warrantyVendorId: ids.warrantyVendor ?? null,
          maintenanceFrequencyMonths: fields.maintenanceFrequencyMonths ?? null,
          lastMaintenanceDate: null,
          notes: text(fields.notes),
        },
      };
    }
    case 'maintenance': {
      const fields = task.fields;
      const performedBy = text(fields.performedBy);
      return {
        kind: 'maintenance',
        data: {
          equipmentId: requireValue(ids.equipment, 'equipment'),
          vendorId: ids.vendor ?? null,
          type: requireValue(fields.type, 'type'),
          description: requireValue(fields.description, 'description').trim(),
          performedBy,
          selfReported: performedBy === null && hint === 'likely-performer',
          date: fields.date && ISO_DATE.test(fields.date) ? fields.date : today,
          durationMinutes: fields.durationMinutes ?? null,
          cost: fields.cost ?? null,
          isWarrantyWork: fields.isWarrantyWork ?? false,
        },
      };
    }
    case 'vendor': {
      const fields = task.fields;
      const name = text(fields.name) ?? text(fields.company);
      return {
        kind: 'vendor',
        data: {
          name: requireValue(name ?? undefined, 'name'),
          isActive: true,
          needsCompletion: false,
          company: text(fields.company),
          email: text(fields.email),
          phone: text(fields.phone),
          address: text(fields.address),
          city: text(fields.city),
          specialization: text(fields.specialization),
          isSupplier: fields.isSupplier ?? false,
        },
      };
    }
    case 'location': {
      const fields = task.fields;
      return {
        kind: 'location',
        data: {
          name: requireValue(fields.name, 'name').trim(),
          isActive: true,
          needsCompletion: false,
          floor: text(fields.floor),
          department: text(fields.department),
          building: text(fields.building),
          notes: text(fields.notes),
        },
      };
    }
  }
}
