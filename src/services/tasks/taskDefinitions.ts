/**
 * Per-domain task definitions
 *
 * Field labels (prompt and summary order), completion requirements and the
 * fields that name other stored records, for each kind of task the operator
 * can dictate.
 */

import type { EntityKind } from '../../types/inventory.js';
import type { SpeakerHint, TaskFieldsByKind, TaskKind } from '../../types/voice.js';

export interface FieldDefinition<T> {
  key: keyof T & string;
  label: string;
}

export interface Requirement<T> {
  /** Reported in the missing-fields list */
  key: string;
  label: string;
  satisfied(fields: Partial<T>, hint: SpeakerHint): boolean;
}

export interface ReferenceDefinition<T> {
  field: keyof T & string;
  entity: EntityKind;
  /**
   * 'link': the record points at the resolved entity.
   * 'duplicate-check': the task creates this entity; a match means it may already exist.
   */
  purpose: 'link' | 'duplicate-check';
  /** Saving is blocked until the reference resolves to one record */
  requiredToSave: boolean;
}

export interface TaskDefinition<T> {
  label: string;
  fields: FieldDefinition<T>[];
  requirements: Requirement<T>[];
  references: ReferenceDefinition<T>[];
}

export type TaskDefinitions = { [K in TaskKind]: TaskDefinition<TaskFieldsByKind[K]> };

/**
 * True when a field holds a usable value (blank strings do not count)
 */
export function hasValue<T>(fields: Partial<T>, key: keyof T): boolean {
  const value = fields[key];
  if (value === undefined || value === null) {
    return false;
  }
  return typeof value !== 'string' || value.trim().length > 0;
}

function required<T>(key: keyof T & string, label: string): Requirement<T> {
  return { key, label, satisfied: (fields) => hasValue(fields, key) };
}

function eitherOf<T>(key: string, label: string, options: Array<keyof T>): Requirement<T> {
  return { key, label, satisfied: (fields) => options.some((option) => hasValue(fields, option)) };
}

export const TASK_DEFINITIONS: TaskDefinitions = {
  equipment: {
    label: 'New equipment',
    fields: [
      { key: 'name', label: 'Name' },
      { key: 'category', label: 'Category' },
      { key: 'brand', label: 'Brand' },
      { key: 'model', label: 'Model' },
      { key: 'serialNumber', label: 'Serial number' },
      { key: 'barcode', label: 'Barcode' },
      { key: 'location', label: 'Location' },
      { key: 'supplier', label: 'Supplier' },
      { key: 'warrantyMonths', label: 'Warranty (months)' },
      { key: 'warrantyVendor', label: 'Warranty maintainer' },
      { key: 'maintenanceFrequencyMonths', label: 'Maintenance every (months)' },
      { key: 'notes', label: 'Notes' },
    ],
    requirements: [required('name', 'name'), required('category', 'category'), required('location', 'location')],
    references: [
      { field: 'location', entity: 'location', purpose: 'link', requiredToSave: false },
      { field: 'supplier', entity: 'vendor', purpose: 'link', requiredToSave: false },
      { field: 'warrantyVendor', entity: 'vendor', purpose: 'link', requiredToSave: false },
      { field: 'name', entity: 'equipment', purpose: 'duplicate-check', requiredToSave: false },
    ],
  },
  maintenance: {
    label: 'Maintenance event',
    fields: [
      { key: 'equipment', label: 'Equipment' },
      { key: 'type', label: 'Intervention type' },
      { key: 'description', label: 'Description' },
      { key: 'performedBy', label: 'Performed by' },
      { key: 'vendor', label: 'Company' },
      { key: 'date', label: 'Date' },
      { key: 'durationMinutes', label: 'Duration (minutes)' },
      { key: 'cost', label: 'Cost' },
      { key: 'isWarrantyWork', label: 'Under warranty' },
    ],
    requirements: [
      required('type', 'intervention type'),
      required('description', 'description'),
      {
        key: 'performedBy',
        label: 'who performed the work',
        // A first- or third-person report already tells us who did it
        satisfied: (fields, hint) => hint !== 'unknown' || hasValue(fields, 'performedBy'),
      },
    ],
    references: [
      { field: 'equipment', entity: 'equipment', purpose: 'link', requiredToSave: true },
      { field: 'vendor', entity: 'vendor', purpose: 'link', requiredToSave: false },
    ],
  },
  vendor: {
    label: 'New vendor',
    fields: [
      { key: 'name', label: 'Name' },
      { key: 'company', label: 'Company' },
      { key: 'email', label: 'Email' },
      { key: 'phone', label: 'Phone' },
      { key: 'address', label: 'Address' },
      { key: 'city', label: 'City' },
      { key: 'specialization', label: 'Specialization' },
      { key: 'isSupplier', label: 'Also a supplier' },
    ],
    requirements: [
      eitherOf('name', 'name or company', ['name', 'company']),
      eitherOf('contact', 'email or phone', ['email', 'phone']),
    ],
    references: [
      { field: 'name', entity: 'vendor', purpose: 'duplicate-check', requiredToSave: false },
      { field: 'company', entity: 'vendor', purpose: 'duplicate-check', requiredToSave: false },
    ],
  },
  location: {
    label: 'New location',
    fields: [
      { key: 'name', label: 'Name' },
      { key: 'floor', label: 'Floor' },
      { key: 'department', label: 'Department' },
      { key: 'building', label: 'Building' },
      { key: 'notes', label: 'Notes' },
    ],
    requirements: [required('name', 'name')],
    references: [{ field: 'name', entity: 'location', purpose: 'duplicate-check', requiredToSave: false }],
  },
};
