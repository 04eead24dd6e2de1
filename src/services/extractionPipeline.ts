/**
 * Extraction Pipeline
 *
 * Turns finalized transcripts into updates of the active task. Each round:
 * sanitize → local command check → model extraction (with bounded retries) →
 * monotonic merge → reference resolution → publish + spoken reply.
 *
 * Rounds run one at a time on a single call chain; transcripts submitted while
 * a round is in flight queue behind it. Cancelling aborts the in-flight round,
 * drops queued work and resets the conversation context.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { resolveVoiceConfig, type ExtractionConfig, type MatchThresholds } from '../config/voice.js';
import type { InventoryRepository } from '../repositories/InventoryRepository.js';
import type { EntityKind, EntityRecordByKind } from '../types/inventory.js';
import type {
  ExtractedTaskData,
  ExtractionState,
  ReferenceResolution,
  Resolution,
  SpeakerHint,
  TaskKind,
  TaskSnapshot,
  TaskUpdate,
} from '../types/voice.js';
import { ExtractionError, PersistenceError, errorMessage } from '../utils/errors.js';
import { sanitizeInput } from '../utils/inputSanitizer.js';
import { toSpeechText } from '../utils/plainText.js';
import { StateChannel } from '../utils/stateChannel.js';
import { buildPersistenceAttributes, withSpan } from '../utils/tracing.js';
import { ConversationContext, type ContextSnapshot } from './conversationContext.js';
import { EntityResolver } from './entityResolvers/EntityResolver.js';
import { classifyExtractionError, type ExtractionClient, type ExtractionResult } from './extraction/extractionClient.js';
import { RateLimiter } from './extraction/rateLimiter.js';
import { detectIntent } from './intentDetector.js';
import { missingRequirementLabels, taskLabel, taskReferences } from './tasks/activeTask.js';
import { buildRecordDraft, type ResolvedIds } from './tasks/recordDrafts.js';
import type { TaskStateMachine } from './tasks/taskStateMachine.js';

/**
 * Returns the values currently shown to the operator (including manual edits),
 * or null when nothing is on screen
 */
export type FieldSnapshotProvider = () => TaskSnapshot | null;

export interface ExtractionPipelineOptions {
  repository: InventoryRepository;
  client: ExtractionClient;
  config?: ExtractionConfig;
  matching?: MatchThresholds;
  maxExchanges?: number;
  /** Plain-text handoff to speech output */
  speak?: (text: string) => void;
  clock?: () => Date;
}

const DEFAULTS = resolveVoiceConfig({});

/**
 * Session values captured when a save starts, so a cancel during the write
 * cannot change what is saved
 */
interface SaveContext {
  hint: SpeakerHint;
  today: string;
  references: Partial<Record<string, ReferenceResolution>>;
  resolvedIds: ResolvedIds;
}

export class ExtractionPipeline {
  readonly state = new StateChannel<ExtractionState>({ status: 'idle' });

  private readonly repository: InventoryRepository;
  private readonly client: ExtractionClient;
  private readonly config: ExtractionConfig;
  private readonly resolver: EntityResolver;
  private readonly limiter: RateLimiter;
  private readonly maxExchanges: number;
  private readonly speak: (text: string) => void;
  private readonly clock: () => Date;

  private context: ConversationContext | null = null;
  private references: Partial<Record<string, ReferenceResolution>> = {};
  private resolvedIds: ResolvedIds = {};
  private lastReply = { reply: '', confidence: 1 };
  private failedTranscript: string | null = null;
  private snapshotProvider: FieldSnapshotProvider | null = null;

  private chain: Promise<void> = Promise.resolve();
  private generation = 0;
  private inFlight: AbortController | null = null;
  private disposed = false;

  constructor(options: ExtractionPipelineOptions) {
    this.repository = options.repository;
    this.client = options.client;
    this.config = options.config ?? DEFAULTS.extraction;
    this.resolver = new EntityResolver(options.repository, options.matching ?? DEFAULTS.matching);
    this.limiter = new RateLimiter(this.config.rateLimitPerMinute);
    this.maxExchanges = options.maxExchanges ?? DEFAULTS.maxExchanges;
    this.speak = options.speak ?? (() => undefined);
    this.clock = options.clock ?? (() => new Date());
  }

  // ==========================================================================
  // Public operations
  // ==========================================================================

  /**
   * Start dictating a new record. Any previous task is abandoned and queued
   * work for it is dropped.
   *
   * @param initial - Task kind, or a seed update with values already known
   */
  startTask(initial: TaskKind | TaskUpdate): Promise<void> {
    this.assertUsable();
    this.interrupt();
    this.resetSession();

    const task = this.session.startTask(initial);
    console.log(`[ExtractionPipeline] Started task: ${task.kind}`);

    return this.enqueue(
      async (generation) => {
        const warnings = await this.refreshReferences(task, generation);
        if (this.isCurrent(generation)) {
          this.publishExtracted('', 1, warnings);
        }
      },
      () => undefined
    );
  }

  /**
   * Queue a finalized transcript. Failures are published on `state`; the
   * promise settles when the round is done.
   */
  submitTranscript(transcript: string): Promise<void> {
    this.assertUsable();
    return this.enqueue(
      (generation) => this.processTranscript(transcript, generation),
      () => undefined
    );
  }

  /**
   * Run the transcript of the last failed round again
   */
  retryLastTranscript(): Promise<void> {
    if (this.failedTranscript === null) {
      console.warn('[ExtractionPipeline] Nothing to retry');
      return Promise.resolve();
    }
    console.log('[ExtractionPipeline] Retrying last transcript');
    return this.submitTranscript(this.failedTranscript);
  }

  setFieldSnapshotProvider(provider: FieldSnapshotProvider | null): void {
    this.snapshotProvider = provider;
  }

  /**
   * Values collected so far, or null without an active task
   */
  getFieldSnapshot(): TaskSnapshot | null {
    return this.context?.activeTask?.snapshot() ?? null;
  }

  /**
   * Settle an ambiguous or unconfirmed reference on one of its candidates
   */
  chooseCandidate(field: string, id: string): Promise<void> {
    this.assertUsable();
    return this.enqueue(async () => {
      const task = this.requireTask();
      const reference = this.references[field];
      if (!reference) {
        throw new Error(`No reference to resolve for ${field}`);
      }

      const chosen = chooseById(reference, id);
      if (!chosen) {
        throw new Error(`${id} is not a candidate for ${field}`);
      }

      this.references[field] = chosen;
      if (this.isLinkField(task, field)) {
        this.resolvedIds[field] = id;
      }
      console.log(`[ExtractionPipeline] ${field} resolved by operator choice`);
      this.publishExtracted(this.lastReply.reply, this.lastReply.confidence);
    }, staleTask);
  }

  /**
   * Create the record an unmatched reference names, flagged as needing
   * completion, and link the task to it
   *
   * @returns Id of the created record
   */
  createMissingReference(field: string): Promise<string> {
    this.assertUsable();
    return this.enqueue(async (generation) => {
      const task = this.requireTask();
      const reference = taskReferences(task.snapshot()).find((candidate) => candidate.field === field);
      const query = reference?.query;
      if (!reference || !query) {
        throw new Error(`Nothing to create for ${field}`);
      }
      if (reference.purpose !== 'link') {
        throw new Error(`${field} does not link to another record`);
      }
      if (this.references[field]?.resolution.outcome === 'found') {
        throw new Error(`${field} already matches a stored ${reference.entity}`);
      }

      const { entity } = reference;
      let id: string;
      try {
        id = await withSpan('persistence.create', buildPersistenceAttributes(entity, 'create'), () =>
          this.repository.create({ kind: entity, name: query })
        );
      } catch (error) {
        const failure = new PersistenceError(error);
        if (this.isCurrent(generation)) {
          this.publishPersistenceError(failure);
        }
        throw failure;
      }

      console.log(`[ExtractionPipeline] Created ${entity} "${query}" (needs completion)`);
      const created = await findReference(this.repository, entity, query, id);
      if (!this.isCurrent(generation)) {
        // The record exists, but the task that asked for it is gone
        return id;
      }
      if (created) {
        this.references[field] = created;
      } else {
        delete this.references[field];
      }
      this.resolvedIds[field] = id;
      this.publishExtracted(this.lastReply.reply, this.lastReply.confidence);
      return id;
    }, staleTask);
  }

  /**
   * Confirm the active task and save it
   *
   * @returns Id of the saved record
   * @throws Error when the task is incomplete or a required reference is unresolved
   * @throws PersistenceError when storage fails (the task stays open with its values)
   */
  confirm(): Promise<string> {
    this.assertUsable();
    return this.enqueue(async (generation) => {
      const context = this.session;
      const task = this.requireTask();

      this.syncFromProvider(task);
      await this.refreshReferences(task, generation);
      if (!this.isCurrent(generation)) {
        return staleTask();
      }

      const blockers = this.saveBlockers(task.snapshot());
      if (blockers.length > 0) {
        throw new Error(blockers.join('; '));
      }

      const hint = context.speakerHint;
      const today = isoDate(this.clock());
      const references = this.references;
      const resolvedIds = { ...this.resolvedIds };

      try {
        const id = await task.confirm(hint, (snapshot) =>
          this.persist(snapshot, { hint, today, references, resolvedIds })
        );
        console.log(`[ExtractionPipeline] ✅ Saved ${task.kind} ${id}`);
        if (!this.isCurrent(generation)) {
          // Saved, but a newer task or a cancel owns the session now
          return id;
        }
        this.resetSession();
        this.state.publish({ status: 'idle', message: `${taskLabel(task.kind)} saved` });
        this.speak('Saved.');
        return id;
      } catch (error) {
        if (error instanceof PersistenceError && this.isCurrent(generation)) {
          this.publishPersistenceError(error);
        }
        throw error;
      }
    }, staleTask);
  }

  /**
   * Abandon the active task: aborts the in-flight round, drops queued work and
   * resets the conversation context
   */
  cancel(reason: string = 'Task cancelled'): void {
    this.interrupt();
    this.resetSession();
    console.log(`[ExtractionPipeline] ${reason}`);
    this.state.publish({ status: 'idle', message: reason });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.cancel('Pipeline disposed');
    this.disposed = true;
    this.snapshotProvider = null;
    this.limiter.reset();
  }

  // ==========================================================================
  // Extraction round
  // ==========================================================================

  private async processTranscript(raw: string, generation: number): Promise<void> {
    const context = this.context;
    const task = context?.activeTask;
    if (!context || !task || task.status !== 'collecting') {
      this.publishError(
        new ExtractionError('no-active-task', 'Start a task before dictating', { retryable: false }),
        raw.trim() || null
      );
      return;
    }

    const sanitized = sanitizeInput(raw, this.config.maxTranscriptChars);
    if (sanitized.status === 'rejected') {
      console.warn(`[ExtractionPipeline] Transcript rejected: ${sanitized.reason}`);
      this.publishError(new ExtractionError('invalid-input', `Transcript rejected: ${sanitized.reason}`), raw.trim() || null);
      return;
    }
    if (sanitized.status === 'suspicious') {
      console.warn(`[ExtractionPipeline] ⚠️ Suspicious transcript (${sanitized.reason}), truncated`);
    }
    const transcript = sanitized.text;

    this.syncFromProvider(task);

    const intent = detectIntent(transcript, this.config.maxCommandWords);
    if (intent === 'cancel') {
      this.cancel('Cancelled by operator');
      return;
    }
    if (intent === 'proceed') {
      this.completionCheck(context, task, transcript);
      return;
    }

    context.observeSpeaker(transcript);

    if (!this.limiter.tryAcquire()) {
      const seconds = Math.ceil(this.limiter.retryAfterMs() / 1000);
      console.warn('[ExtractionPipeline] Local rate limit reached');
      this.failedTranscript = transcript;
      this.publishError(new ExtractionError('rate-limited', `Too many requests, try again in ${seconds}s`), transcript);
      return;
    }

    const controller = new AbortController();
    this.inFlight = controller;
    this.state.publish({ status: 'processing', transcript });

    try {
      const result = await this.extractWithRetry(transcript, context.snapshot(), controller.signal);
      if (!this.isCurrent(generation)) {
        return;
      }

      task.apply(result.update);
      context.addExchange('operator', transcript);
      context.addExchange('assistant', result.reply);

      const warnings = await this.refreshReferences(task, generation);
      if (!this.isCurrent(generation)) {
        return;
      }

      this.failedTranscript = null;
      const data = this.publishExtracted(result.reply, result.confidence, warnings);
      console.log(
        `[ExtractionPipeline] Round done: ${task.kind}, missing [${data.missingRequired.join(', ')}], confidence ${result.confidence.toFixed(2)}`
      );
      this.speak(toSpeechText(result.reply));
    } catch (error) {
      if (!this.isCurrent(generation)) {
        console.log('[ExtractionPipeline] Round cancelled');
        return;
      }
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError('malformed-response', errorMessage(error), { cause: error });
      console.error(`[ExtractionPipeline] Extraction failed (${failure.kind}): ${failure.message}`);
      this.failedTranscript = transcript;
      this.publishError(failure, transcript);
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  private async extractWithRetry(
    transcript: string,
    context: ContextSnapshot,
    signal: AbortSignal
  ): Promise<ExtractionResult> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.extract({ transcript, context, signal, attempt });
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        const failure = classifyExtractionError(error);
        if (!failure.retryable || attempt >= attempts) {
          throw failure;
        }
        const delay = this.config.backoffMs * 2 ** (attempt - 1);
        console.warn(
          `[ExtractionPipeline] Attempt ${attempt}/${attempts} failed (${failure.kind}), retrying in ${delay}ms`
        );
        await sleep(delay, undefined, { signal });
      }
    }
  }

  /**
   * Answer a spoken "that's all" without a model round trip
   */
  private completionCheck(context: ConversationContext, task: TaskStateMachine, transcript: string): void {
    const snapshot = task.snapshot();
    const missing = [
      ...missingRequirementLabels(snapshot, context.speakerHint),
      ...this.saveBlockers(snapshot),
    ];
    const reply =
      missing.length === 0 ? 'Everything needed is here. Confirm to save.' : `Still missing: ${missing.join(', ')}.`;

    context.addExchange('operator', transcript);
    context.addExchange('assistant', reply);
    this.publishExtracted(reply, 1);
    this.speak(reply);
  }

  // ==========================================================================
  // References
  // ==========================================================================

  /**
   * Resolve reference fields whose dictated value changed since the last round.
   * Stops without writing once the round is no longer current.
   *
   * @returns Warnings for lookups that failed
   */
  private async refreshReferences(task: TaskStateMachine, generation: number): Promise<string[]> {
    const warnings: string[] = [];

    for (const reference of taskReferences(task.snapshot())) {
      const { field, query } = reference;
      if (!query) {
        delete this.references[field];
        delete this.resolvedIds[field];
        continue;
      }
      if (this.references[field]?.query === query) {
        continue;
      }

      try {
        const resolved = await this.resolver.resolveReference(reference.entity, query);
        if (!this.isCurrent(generation)) {
          return warnings;
        }
        this.references[field] = resolved;
        const { resolution } = resolved;
        if (reference.purpose === 'link' && resolution.outcome === 'found') {
          this.resolvedIds[field] = resolution.record.id;
        } else {
          delete this.resolvedIds[field];
        }
      } catch (error) {
        if (!this.isCurrent(generation)) {
          return warnings;
        }
        console.error(`[ExtractionPipeline] Failed to resolve ${field}:`, errorMessage(error));
        warnings.push(`Could not look up ${reference.entity} "${query}"`);
        delete this.references[field];
        delete this.resolvedIds[field];
      }
    }

    return warnings;
  }

  private referenceWarnings(task: TaskSnapshot): string[] {
    const warnings: string[] = [];

    for (const reference of taskReferences(task)) {
      const resolved = this.references[reference.field];
      if (!resolved || !reference.query) {
        continue;
      }
      const { resolution } = resolved;
      const { entity } = reference;

      if (reference.purpose === 'duplicate-check') {
        if (resolution.outcome === 'found') {
          warnings.push(`A ${entity} named "${resolution.record.name}" already exists`);
        } else if (resolution.outcome === 'needs-confirmation') {
          warnings.push(`A similar ${entity} already exists: "${resolution.candidate.name}"`);
        }
        continue;
      }

      switch (resolution.outcome) {
        case 'found':
          break;
        case 'ambiguous':
          warnings.push(`"${resolution.query}" matches ${resolution.candidates.length} ${entity} records, choose one`);
          break;
        case 'needs-confirmation':
          warnings.push(`Did you mean ${entity} "${resolution.candidate.name}" for "${resolution.query}"?`);
          break;
        case 'not-found':
          warnings.push(`No ${entity} matches "${resolution.query}"`);
          break;
      }
    }

    return warnings;
  }

  /**
   * References that must point at exactly one stored record before saving
   */
  private saveBlockers(task: TaskSnapshot): string[] {
    return taskReferences(task)
      .filter((reference) => reference.requiredToSave)
      .flatMap((reference) => {
        if (!reference.query) {
          return [`which ${reference.entity} this is about`];
        }
        if (!this.resolvedIds[reference.field]) {
          return [`"${reference.query}" does not match a single ${reference.entity}; choose one or create it`];
        }
        return [];
      });
  }

  private isLinkField(task: TaskStateMachine, field: string): boolean {
    return taskReferences(task.snapshot()).some(
      (reference) => reference.field === field && reference.purpose === 'link'
    );
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  private async persist(snapshot: TaskSnapshot, save: SaveContext): Promise<string> {
    const draft = buildRecordDraft(snapshot, save.resolvedIds, save.hint, save.today);
    const id = await withSpan('persistence.insert', buildPersistenceAttributes(draft.kind, 'insert'), () =>
      this.repository.insert(draft)
    );

    if (draft.kind === 'maintenance') {
      await this.recordLastMaintenance(draft.data.date, save.references['equipment']);
    }
    return id;
  }

  /**
   * Move the serviced equipment's last maintenance date forward
   */
  private async recordLastMaintenance(date: string, reference: ReferenceResolution | undefined): Promise<void> {
    if (reference?.entity !== 'equipment') {
      return;
    }
    const { resolution } = reference;
    if (resolution.outcome !== 'found') {
      return;
    }

    const { record } = resolution;
    if (record.lastMaintenanceDate && record.lastMaintenanceDate >= date) {
      return;
    }

    try {
      await withSpan('persistence.update', buildPersistenceAttributes('equipment', 'update'), () =>
        this.repository.update({ kind: 'equipment', data: { ...record, lastMaintenanceDate: date } })
      );
    } catch (error) {
      // The event itself is saved; only the denormalized date is stale
      console.error(`[ExtractionPipeline] Failed to update last maintenance of ${record.id}:`, errorMessage(error));
    }
  }

  // ==========================================================================
  // Session state
  // ==========================================================================

  private get session(): ConversationContext {
    this.context ??= new ConversationContext(this.maxExchanges, this.clock);
    return this.context;
  }

  private requireTask(): TaskStateMachine {
    const task = this.context?.activeTask;
    if (!task || task.status !== 'collecting') {
      throw new ExtractionError('no-active-task', 'No task is being dictated', { retryable: false });
    }
    return task;
  }

  private syncFromProvider(task: TaskStateMachine): void {
    if (!this.snapshotProvider || task.status !== 'collecting') {
      return;
    }
    const snapshot = this.snapshotProvider();
    if (!snapshot) {
      return;
    }
    if (snapshot.kind !== task.kind) {
      console.warn(`[ExtractionPipeline] Ignoring ${snapshot.kind} field snapshot for a ${task.kind} task`);
      return;
    }
    task.replaceFields(snapshot);
  }

  private resetSession(): void {
    this.context?.reset();
    this.references = {};
    this.resolvedIds = {};
    this.lastReply = { reply: '', confidence: 1 };
    this.failedTranscript = null;
  }

  /**
   * Abort the in-flight round and invalidate queued work
   */
  private interrupt(): void {
    this.generation++;
    this.inFlight?.abort();
    this.inFlight = null;
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && !this.disposed;
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new Error('ExtractionPipeline has been disposed');
    }
  }

  /**
   * Run an operation after everything queued before it. Operations queued
   * before a cancel are dropped and settle with `whenStale()`.
   */
  private enqueue<T>(operation: (generation: number) => Promise<T>, whenStale: () => T): Promise<T> {
    const generation = this.generation;
    const run = this.chain.then(() => (this.isCurrent(generation) ? operation(generation) : whenStale()));
    this.chain = run.then(
      () => undefined,
      (error: unknown) => {
        console.error('[ExtractionPipeline] Queued operation failed:', errorMessage(error));
      }
    );
    return run;
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  private publishExtracted(reply: string, confidence: number, extraWarnings: string[] = []): ExtractedTaskData {
    const context = this.session;
    const task = this.requireTask();
    const snapshot = task.snapshot();
    const missingRequired = task.missingRequired(context.speakerHint);
    const lowConfidence = confidence < this.config.lowConfidenceThreshold;

    const warnings = [...extraWarnings];
    if (lowConfidence) {
      warnings.push(`Low confidence (${confidence.toFixed(2)}), please check the values`);
    }
    warnings.push(...this.referenceWarnings(snapshot));

    const data: ExtractedTaskData = {
      task: snapshot,
      complete: missingRequired.length === 0,
      missingRequired,
      summary: task.summary(),
      references: { ...this.references },
      reply,
      confidence,
      lowConfidence,
      warnings,
    };

    this.lastReply = { reply, confidence };
    this.state.publish({ status: 'extracted', data });
    return data;
  }

  private publishError(error: ExtractionError, transcript: string | null): void {
    this.state.publish({
      status: 'error',
      kind: error.kind,
      message: error.message,
      retryable: error.retryable,
      transcript,
    });
  }

  private publishPersistenceError(error: PersistenceError): void {
    console.error(`[ExtractionPipeline] Save failed: ${error.message}`);
    this.publishError(new ExtractionError('persistence', error.message, { retryable: true, cause: error }), null);
  }
}

function staleTask(): never {
  throw new ExtractionError('no-active-task', 'The task was cancelled', { retryable: false });
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function candidatesOf<T>(resolution: Resolution<T>): T[] {
  switch (resolution.outcome) {
    case 'found':
      return [resolution.record];
    case 'ambiguous':
      return resolution.candidates;
    case 'needs-confirmation':
      return [resolution.candidate];
    case 'not-found':
      return [];
  }
}

function pick<T extends { id: string }>(resolution: Resolution<T>, id: string): Resolution<T> | null {
  const record = candidatesOf(resolution).find((candidate) => candidate.id === id);
  return record ? { outcome: 'found', record } : null;
}

/**
 * The reference settled on the candidate with the given id, or null if it is
 * not one of the candidates
 */
function chooseById(reference: ReferenceResolution, id: string): ReferenceResolution | null {
  switch (reference.entity) {
    case 'vendor': {
      const resolution = pick(reference.resolution, id);
      return resolution ? { entity: reference.entity, query: reference.query, resolution } : null;
    }
    case 'location': {
      const resolution = pick(reference.resolution, id);
      return resolution ? { entity: reference.entity, query: reference.query, resolution } : null;
    }
    case 'equipment': {
      const resolution = pick(reference.resolution, id);
      return resolution ? { entity: reference.entity, query: reference.query, resolution } : null;
    }
  }
}

async function findActive<K extends EntityKind>(
  repository: InventoryRepository,
  kind: K,
  id: string
): Promise<EntityRecordByKind[K] | undefined> {
  const records = await repository.listActive(kind);
  return records.find((record) => record.id === id);
}

async function findReference(
  repository: InventoryRepository,
  entity: EntityKind,
  query: string,
  id: string
): Promise<ReferenceResolution | null> {
  switch (entity) {
    case 'vendor': {
      const record = await findActive(repository, entity, id);
      return record ? { entity, query, resolution: { outcome: 'found', record } } : null;
    }
    case 'location': {
      const record = await findActive(repository, entity, id);
      return record ? { entity, query, resolution: { outcome: 'found', record } } : null;
    }
    case 'equipment': {
      const record = await findActive(repository, entity, id);
      return record ? { entity, query, resolution: { outcome: 'found', record } } : null;
    }
  }
}
