/**
 * Structured output schemas for the extraction model
 *
 * Every field is nullable: the model returns null for anything the operator
 * did not mention, and the merge step skips nulls.
 */

import { z } from 'zod';
import { EQUIPMENT_CATEGORIES, INTERVENTION_TYPES } from '../../types/inventory.js';
import type { TaskKind } from '../../types/voice.js';

const text = (description: string) => z.string().nullable().describe(description);
const count = (description: string) => z.number().nonnegative().nullable().describe(description);

export const EquipmentUpdateSchema = z.object({
  name: text('Short name of the device, e.g. "Infusion pump"'),
  category: z.enum(EQUIPMENT_CATEGORIES).nullable().describe('Equipment category'),
  brand: text('Manufacturer'),
  model: text('Model name or code'),
  serialNumber: text('Serial number, letters in upper case without spaces'),
  barcode: text('Inventory barcode or asset tag'),
  location: text('Room, ward or department where the device is kept'),
  supplier: text('Company that supplied the device'),
  warrantyMonths: count('Warranty length in months'),
  warrantyVendor: text('Company that maintains the device under warranty'),
  maintenanceFrequencyMonths: count('Months between scheduled maintenance'),
  notes: text('Anything else worth keeping'),
});

export const MaintenanceUpdateSchema = z.object({
  equipment: text('The serviced device as the operator named it (name, barcode or serial number)'),
  type: z.enum(INTERVENTION_TYPES).nullable().describe('Kind of intervention'),
  description: text('What was done'),
  performedBy: text('Person who did the work, only when named explicitly'),
  vendor: text('Company the technician works for'),
  date: text('Date of the intervention as YYYY-MM-DD; resolve "today" and "yesterday" against the current date'),
  durationMinutes: count('Duration in minutes'),
  cost: count('Cost in euro'),
  isWarrantyWork: z.boolean().nullable().describe('True when the work was covered by warranty'),
});

export const VendorUpdateSchema = z.object({
  name: text('Contact person or trading name'),
  company: text('Company name'),
  email: text('Email address, lower case'),
  phone: text('Phone number, digits only apart from a leading +'),
  address: text('Street address'),
  city: text('City'),
  specialization: text('What the vendor services or sells'),
  isSupplier: z.boolean().nullable().describe('True when the vendor also supplies equipment'),
});

export const LocationUpdateSchema = z.object({
  name: text('Room or area name'),
  floor: text('Floor'),
  department: text('Ward or department'),
  building: text('Building or pavilion'),
  notes: text('Anything else worth keeping'),
});

function responseSchema<T extends z.ZodTypeAny>(updates: T) {
  return z.object({
    updates: updates.describe('Values mentioned in the latest operator message; null for everything else'),
    reply: z
      .string()
      .describe('Short spoken confirmation of what was understood, followed by a question for one missing field'),
    confidence: z.number().min(0).max(1).describe('How sure you are about the extracted values, 0 to 1'),
    missingFields: z
      .array(z.string())
      .describe('Required fields that are still missing after this message'),
  });
}

export const EXTRACTION_RESPONSE_SCHEMAS = {
  equipment: responseSchema(EquipmentUpdateSchema),
  maintenance: responseSchema(MaintenanceUpdateSchema),
  vendor: responseSchema(VendorUpdateSchema),
  location: responseSchema(LocationUpdateSchema),
} satisfies Record<TaskKind, z.ZodTypeAny>;

export type ExtractionResponseByKind = {
  [K in TaskKind]: z.infer<(typeof EXTRACTION_RESPONSE_SCHEMAS)[K]>;
};
