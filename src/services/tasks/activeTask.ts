/**
 * Active task operations
 *
 * Pure functions over the per-domain task variant: monotonic merge of model
 * updates, the missing-required-fields list, and the collected summary.
 */

import type { EntityKind } from '../../types/inventory.js';
import type {
  FieldUpdate,
  SpeakerHint,
  TaskKind,
  TaskOf,
  TaskSnapshot,
  TaskUpdate,
} from '../../types/voice.js';
import { hasValue, TASK_DEFINITIONS, type ReferenceDefinition } from './taskDefinitions.js';

export function emptyTask(kind: TaskKind): TaskSnapshot {
  switch (kind) {
    case 'equipment':
      return { kind, fields: {} };
    case 'maintenance':
      return { kind, fields: {} };
    case 'vendor':
      return { kind, fields: {} };
    case 'location':
      return { kind, fields: {} };
  }
}

/**
 * Merge an update onto collected values.
 *
 * Absent, null and blank values are "not mentioned" and never clear what is
 * already there; any other value replaces the current one.
 */
export function mergeFields<T>(current: Partial<T>, update: FieldUpdate<T>): Partial<T> {
  const merged: Partial<T> = { ...current };

  for (const key in update) {
    const value: T[typeof key] | null | undefined = update[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value === 'string' && value.trim().length === 0) {
      continue;
    }
    merged[key] = value;
  }

  return merged;
}

/**
 * Apply a model update to a task of the same kind
 *
 * @throws Error when the update targets a different kind of task
 */
export function mergeTaskUpdate(task: TaskSnapshot, update: TaskUpdate): TaskSnapshot {
  if (task.kind === 'equipment' && update.kind === 'equipment') {
    return { kind: task.kind, fields: mergeFields(task.fields, update.fields) };
  }
  if (task.kind === 'maintenance' && update.kind === 'maintenance') {
    return { kind: task.kind, fields: mergeFields(task.fields, update.fields) };
  }
  if (task.kind === 'vendor' && update.kind === 'vendor') {
    return { kind: task.kind, fields: mergeFields(task.fields, update.fields) };
  }
  if (task.kind === 'location' && update.kind === 'location') {
    return { kind: task.kind, fields: mergeFields(task.fields, update.fields) };
  }
  throw new Error(`Cannot apply a ${update.kind} update to a ${task.kind} task`);
}

export function cloneTask(task: TaskSnapshot): TaskSnapshot {
  switch (task.kind) {
    case 'equipment':
      return { kind: task.kind, fields: { ...task.fields } };
    case 'maintenance':
      return { kind: task.kind, fields: { ...task.fields } };
    case 'vendor':
      return { kind: task.kind, fields: { ...task.fields } };
    case 'location':
      return { kind: task.kind, fields: { ...task.fields } };
  }
}

function missingFor<K extends TaskKind>(task: TaskOf<K>, hint: SpeakerHint): string[] {
  const { requirements } = TASK_DEFINITIONS[task.kind];
  return requirements
    .filter((requirement) => !requirement.satisfied(task.fields, hint))
    .map((requirement) => requirement.key);
}

/**
 * Keys of the requirements the task does not satisfy yet
 */
export function missingRequiredFields(task: TaskSnapshot, hint: SpeakerHint): string[] {
  return missingFor(task, hint);
}

export function isTaskComplete(task: TaskSnapshot, hint: SpeakerHint): boolean {
  return missingRequiredFields(task, hint).length === 0;
}

function requirementLabelsFor<K extends TaskKind>(task: TaskOf<K>, keys: string[]): string[] {
  const { requirements } = TASK_DEFINITIONS[task.kind];
  return keys.map((key) => requirements.find((requirement) => requirement.key === key)?.label ?? key);
}

/**
 * Human-readable names of missing requirements ("name or company")
 */
export function missingRequirementLabels(task: TaskSnapshot, hint: SpeakerHint): string[] {
  return requirementLabelsFor(task, missingRequiredFields(task, hint));
}

function formatValue(value: unknown): string {
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  return String(value);
}

function summaryLines<K extends TaskKind>(task: TaskOf<K>): string[] {
  const { fields } = TASK_DEFINITIONS[task.kind];
  return fields
    .filter((field) => hasValue(task.fields, field.key))
    .map((field) => `${field.label}: ${formatValue(task.fields[field.key])}`);
}

/**
 * One line per collected field, in definition order
 */
export function collectedSummary(task: TaskSnapshot): string {
  return summaryLines(task).join('\n');
}

export function taskLabel(kind: TaskKind): string {
  return TASK_DEFINITIONS[kind].label;
}

export interface TaskReference {
  field: string;
  entity: EntityKind;
  purpose: ReferenceDefinition<unknown>['purpose'];
  requiredToSave: boolean;
  /** Dictated text; null when the field is still empty */
  query: string | null;
}

function referencesFor<K extends TaskKind>(task: TaskOf<K>): TaskReference[] {
  const { references } = TASK_DEFINITIONS[task.kind];
  return references.map((reference) => {
    const value = task.fields[reference.field];
    return {
      field: reference.field,
      entity: reference.entity,
      purpose: reference.purpose,
      requiredToSave: reference.requiredToSave,
      query: typeof value === 'string' && value.trim().length > 0 ? value.trim() : null,
    };
  });
}

/**
 * Fields of the task that name other stored records
 */
export function taskReferences(task: TaskSnapshot): TaskReference[] {
  return referencesFor(task);
}
