import type {
  EntityKind,
  EntityRecordByKind,
  MinimalRecord,
  RecordDraft,
  StoredRecord,
} from '../types/inventory.js';

/**
 * Storage collaborator consumed by the voice pipeline.
 *
 * Reads are limited to the active records of one kind (the resolver's candidate
 * pool). Writes happen only after the operator confirms a task, or when a
 * missing reference is created inline.
 */
export interface InventoryRepository {
  listActive<K extends EntityKind>(kind: K): Promise<EntityRecordByKind[K][]>;
  /** Create a name-only record flagged `needsCompletion` and return its id */
  create(record: MinimalRecord): Promise<string>;
  insert(record: RecordDraft): Promise<string>;
  update(record: StoredRecord): Promise<void>;
}
