/**
 * Voice pipeline types
 *
 * Shapes shared between the capture controller, the conversation context, the
 * task state machine and the extraction pipeline.
 */

import type {
  EntityKind,
  EntityRecordByKind,
  EquipmentCategory,
  InterventionType,
} from './inventory.js';

// ============================================================================
// Conversation
// ============================================================================

export type SpeakerHint = 'unknown' | 'likely-performer' | 'likely-operator';

export type ExchangeRole = 'operator' | 'assistant';

export interface ChatExchange {
  role: ExchangeRole;
  content: string;
  /** ISO timestamp */
  at: string;
}

// ============================================================================
// Tasks
// ============================================================================

export const TASK_KINDS = ['equipment', 'maintenance', 'vendor', 'location'] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export interface EquipmentFields {
  name: string;
  category: EquipmentCategory;
  brand: string;
  model: string;
  serialNumber: string;
  barcode: string;
  location: string;
  supplier: string;
  warrantyMonths: number;
  warrantyVendor: string;
  maintenanceFrequencyMonths: number;
  notes: string;
}

export interface MaintenanceFields {
  /** Spoken reference to the serviced equipment */
  equipment: string;
  type: InterventionType;
  description: string;
  /** Person who did the work */
  performedBy: string;
  /** Company the work was done by */
  vendor: string;
  /** YYYY-MM-DD */
  date: string;
  durationMinutes: number;
  cost: number;
  isWarrantyWork: boolean;
}

export interface VendorFields {
  name: string;
  company: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  specialization: string;
  isSupplier: boolean;
}

export interface LocationFields {
  name: string;
  floor: string;
  department: string;
  building: string;
  notes: string;
}

export interface TaskFieldsByKind {
  equipment: EquipmentFields;
  maintenance: MaintenanceFields;
  vendor: VendorFields;
  location: LocationFields;
}

export type FieldValue = string | number | boolean;

/**
 * Partial update coming from the model. `null` and absent keys mean
 * "not mentioned" and never clear a collected value.
 */
export type FieldUpdate<T> = { [P in keyof T]?: T[P] | null };

export type TaskStatus = 'collecting' | 'confirming' | 'confirmed' | 'abandoned';

export interface TaskOf<K extends TaskKind> {
  kind: K;
  fields: Partial<TaskFieldsByKind[K]>;
}

export type TaskSnapshot = { [K in TaskKind]: TaskOf<K> }[TaskKind];

export interface UpdateOf<K extends TaskKind> {
  kind: K;
  fields: FieldUpdate<TaskFieldsByKind[K]>;
}

export type TaskUpdate = { [K in TaskKind]: UpdateOf<K> }[TaskKind];

// ============================================================================
// Entity resolution
// ============================================================================

export type Resolution<T> =
  | { outcome: 'found'; record: T }
  | { outcome: 'ambiguous'; candidates: T[]; query: string }
  | { outcome: 'not-found'; query: string }
  | { outcome: 'needs-confirmation'; candidate: T; similarity: number; query: string };

export type ReferenceResolution = {
  [K in EntityKind]: { entity: K; query: string; resolution: Resolution<EntityRecordByKind[K]> };
}[EntityKind];

// ============================================================================
// Capture
// ============================================================================

export type CaptureErrorCode =
  | 'no-match'
  | 'speech-timeout'
  | 'busy'
  | 'network'
  | 'audio'
  | 'client'
  | 'permission-denied'
  | 'unavailable';

export type CaptureState =
  | { status: 'idle' }
  | { status: 'listening' }
  | { status: 'partial'; text: string }
  | { status: 'result'; text: string; confidence: number }
  | {
      status: 'error';
      code: CaptureErrorCode;
      message: string;
      fatal: boolean;
      requiresRemediation: boolean;
    };

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionErrorKind =
  | 'network'
  | 'rate-limited'
  | 'malformed-response'
  | 'content-filtered'
  | 'invalid-input'
  | 'no-active-task'
  | 'persistence';

export interface ExtractedTaskData {
  task: TaskSnapshot;
  complete: boolean;
  missingRequired: string[];
  summary: string;
  references: Partial<Record<string, ReferenceResolution>>;
  reply: string;
  confidence: number;
  lowConfidence: boolean;
  warnings: string[];
}

export type ExtractionState =
  | { status: 'idle'; message?: string }
  | { status: 'processing'; transcript: string }
  | { status: 'extracted'; data: ExtractedTaskData }
  | {
      status: 'error';
      kind: ExtractionErrorKind;
      message: string;
      retryable: boolean;
      /** Transcript that failed, kept so the operator can retry */
      transcript: string | null;
    };
