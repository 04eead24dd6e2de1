/**
 * Conversation Context
 *
 * Session state of one dictation: the active task, a bounded history of recent
 * exchanges and the speaker hint. Owned by the extraction pipeline, which
 * resets it on every task exit (save, cancel, navigating away).
 */

import type { ChatExchange, ExchangeRole, SpeakerHint, TaskKind, TaskSnapshot, TaskUpdate } from '../types/voice.js';
import { combineSpeakerHints, inferSpeaker } from './speakerInference.js';
import { TaskStateMachine } from './tasks/taskStateMachine.js';

const DEFAULT_MAX_EXCHANGES = 6;

/**
 * Read-only view of the context handed to the extraction request
 */
export interface ContextSnapshot {
  task: TaskSnapshot;
  missingRequired: string[];
  summary: string;
  exchanges: ChatExchange[];
  speakerHint: SpeakerHint;
  /** YYYY-MM-DD */
  today: string;
}

export class ConversationContext {
  private exchanges: ChatExchange[] = [];
  private hint: SpeakerHint = 'unknown';
  private task: TaskStateMachine | null = null;

  constructor(
    private readonly maxExchanges: number = DEFAULT_MAX_EXCHANGES,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get activeTask(): TaskStateMachine | null {
    return this.task;
  }

  get speakerHint(): SpeakerHint {
    return this.hint;
  }

  get history(): readonly ChatExchange[] {
    return this.exchanges;
  }

  /**
   * Start a new task, replacing any previous one (which is abandoned)
   */
  startTask(initial: TaskKind | TaskUpdate): TaskStateMachine {
    this.task?.abandon();
    this.task = new TaskStateMachine(initial, this.clock());
    return this.task;
  }

  addExchange(role: ExchangeRole, content: string): void {
    this.exchanges.push({ role, content, at: this.clock().toISOString() });
    if (this.exchanges.length > this.maxExchanges) {
      this.exchanges = this.exchanges.slice(-this.maxExchanges);
    }
  }

  /**
   * Update the speaker hint from an operator utterance
   */
  observeSpeaker(utterance: string): SpeakerHint {
    this.hint = combineSpeakerHints(this.hint, inferSpeaker(utterance));
    return this.hint;
  }

  /**
   * @throws Error when no task is active
   */
  snapshot(): ContextSnapshot {
    if (!this.task) {
      throw new Error('No active task');
    }
    return {
      task: this.task.snapshot(),
      missingRequired: this.task.missingRequired(this.hint),
      summary: this.task.summary(),
      exchanges: [...this.exchanges],
      speakerHint: this.hint,
      today: this.clock().toISOString().slice(0, 10),
    };
  }

  /**
   * Drop every piece of session state. The active task, if any, is abandoned.
   */
  reset(): void {
    this.task?.abandon();
    this.task = null;
    this.exchanges = [];
    this.hint = 'unknown';
  }
}
