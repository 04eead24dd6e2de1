/**
 * Voice Session
 *
 * Wires one capture controller to one extraction pipeline: every non-empty
 * capture Result becomes a submitted transcript. Owns the teardown of both.
 */

import type { CaptureState, TaskKind, TaskUpdate } from '../types/voice.js';
import { errorMessage } from '../utils/errors.js';
import type { CaptureController } from './capture/captureController.js';
import type { ExtractionPipeline } from './extractionPipeline.js';

export class VoiceSession {
  private readonly unsubscribe: () => void;
  private pending: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    readonly capture: CaptureController,
    readonly pipeline: ExtractionPipeline
  ) {
    this.unsubscribe = capture.state.subscribe((state) => this.onCaptureState(state));
  }

  startTask(initial: TaskKind | TaskUpdate): Promise<void> {
    return this.pipeline.startTask(initial);
  }

  startListening(): void {
    this.capture.startCapture();
  }

  /**
   * End listening; the captured utterance is handed to the pipeline
   */
  stopListening(): void {
    this.capture.stopCapture();
  }

  /**
   * Settles once every transcript handed over so far has been processed
   */
  idle(): Promise<void> {
    return this.pending;
  }

  confirm(): Promise<string> {
    return this.pipeline.confirm();
  }

  /**
   * Leave the task: drops the current capture and any extraction work
   */
  cancel(reason: string = 'Task cancelled'): void {
    this.capture.cancelCapture();
    this.pipeline.cancel(reason);
  }

  /**
   * Release the recognition engine and the pipeline. Safe to call twice.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.unsubscribe();
    this.capture.release();
    this.pipeline.dispose();
    console.log('[VoiceSession] Closed');
  }

  private onCaptureState(state: CaptureState): void {
    if (state.status === 'error') {
      console.warn(`[VoiceSession] Capture error (${state.code}): ${state.message}`);
      return;
    }
    if (state.status !== 'result') {
      return;
    }
    if (!state.text.trim()) {
      console.log('[VoiceSession] Nothing captured');
      return;
    }

    this.pending = this.pipeline.submitTranscript(state.text).catch((error) => {
      console.error('[VoiceSession] Failed to submit transcript:', errorMessage(error));
    });
  }
}
