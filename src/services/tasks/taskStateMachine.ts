import type { SpeakerHint, TaskKind, TaskSnapshot, TaskStatus, TaskUpdate } from '../../types/voice.js';
import { PersistenceError } from '../../utils/errors.js';
import {
  cloneTask,
  collectedSummary,
  emptyTask,
  isTaskComplete,
  mergeTaskUpdate,
  missingRequiredFields,
} from './activeTask.js';

/**
 * Lifecycle of the one task being dictated.
 *
 * collecting → (complete) → confirmed, or → abandoned.
 * Confirmation runs the persistence handoff; if it fails the task goes back
 * to collecting with every value intact.
 */
export class TaskStateMachine {
  private task: TaskSnapshot;
  private currentStatus: TaskStatus = 'collecting';
  readonly startedAt: Date;

  constructor(initial: TaskKind | TaskUpdate, startedAt: Date = new Date()) {
    this.startedAt = startedAt;
    if (typeof initial === 'string') {
      this.task = emptyTask(initial);
    } else {
      this.task = mergeTaskUpdate(emptyTask(initial.kind), initial);
    }
  }

  get kind(): TaskKind {
    return this.task.kind;
  }

  get status(): TaskStatus {
    return this.currentStatus;
  }

  /**
   * Copy of the collected values
   */
  snapshot(): TaskSnapshot {
    return cloneTask(this.task);
  }

  /**
   * Merge a model update. Only allowed while collecting.
   */
  apply(update: TaskUpdate): void {
    this.assertCollecting('apply an update to');
    this.task = mergeTaskUpdate(this.task, update);
  }

  /**
   * Replace the collected values with the presentation layer's current ones
   * (which include manual edits)
   */
  replaceFields(snapshot: TaskSnapshot): void {
    this.assertCollecting('replace the fields of');
    if (snapshot.kind !== this.task.kind) {
      throw new Error(`Cannot replace a ${this.task.kind} task with ${snapshot.kind} values`);
    }
    this.task = cloneTask(snapshot);
  }

  missingRequired(hint: SpeakerHint): string[] {
    return missingRequiredFields(this.task, hint);
  }

  isComplete(hint: SpeakerHint): boolean {
    return isTaskComplete(this.task, hint);
  }

  summary(): string {
    return collectedSummary(this.task);
  }

  /**
   * Confirm the task and hand it to storage
   *
   * @param hint - Speaker hint used for the completeness check
   * @param persist - Storage handoff; receives a copy of the collected values
   * @returns Whatever persist returns
   * @throws Error if the task is not complete
   * @throws PersistenceError wrapping the storage failure (task is back to collecting)
   */
  async confirm<T>(hint: SpeakerHint, persist: (task: TaskSnapshot) => Promise<T>): Promise<T> {
    this.assertCollecting('confirm');
    const missing = this.missingRequired(hint);
    if (missing.length > 0) {
      throw new Error(`Task is not complete, missing: ${missing.join(', ')}`);
    }

    this.currentStatus = 'confirming';
    try {
      const result = await persist(this.snapshot());
      this.currentStatus = 'confirmed';
      return result;
    } catch (error) {
      this.currentStatus = 'collecting';
      throw error instanceof PersistenceError ? error : new PersistenceError(error);
    }
  }

  abandon(): void {
    if (this.currentStatus === 'confirmed') {
      return;
    }
    this.currentStatus = 'abandoned';
  }

  private assertCollecting(action: string): void {
    if (this.currentStatus !== 'collecting') {
      throw new Error(`Cannot ${action} a task that is ${this.currentStatus}`);
    }
  }
}
