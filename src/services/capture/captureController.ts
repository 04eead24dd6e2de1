/**
 * Capture Controller
 *
 * Runs one operator-controlled listening session at a time. The engine ends a
 * segment at every natural pause; the controller keeps the text and quietly
 * starts the next segment, so a long dictation with pauses comes out as one
 * utterance. Only `stopCapture()` ends the session.
 *
 * Recoverable engine errors (no-match, speech-timeout, busy) restart quietly,
 * up to a bounded number of times in a row. Anything else ends the session,
 * emitting whatever text was already captured before the error.
 */

import type { CaptureConfig } from '../../config/voice.js';
import type { CaptureErrorCode, CaptureState } from '../../types/voice.js';
import { errorMessage, isRecoverableCaptureError } from '../../utils/errors.js';
import { StateChannel } from '../../utils/stateChannel.js';
import { normalizeTranscript } from '../../utils/transcriptNormalization.js';
import type { RecognitionEngine, RecognitionListener } from './recognitionEngine.js';

interface CaptureSession {
  segments: string[];
  /** Interim text of the segment in progress */
  partial: string;
  confidence: number;
  listening: boolean;
  consecutiveErrors: number;
  restartTimer: NodeJS.Timeout | null;
  safetyTimer: NodeJS.Timeout | null;
}

const DEFAULT_CAPTURE_CONFIG: CaptureConfig = {
  maxQuietRestarts: 3,
  restartDelayMs: 50,
  maxSessionMs: 0,
};

export class CaptureController {
  readonly state = new StateChannel<CaptureState>({ status: 'idle' });
  private session: CaptureSession | null = null;
  private permissionDenied = false;

  constructor(
    private readonly engine: RecognitionEngine,
    private readonly config: CaptureConfig = DEFAULT_CAPTURE_CONFIG,
    private readonly normalize: (text: string) => string = normalizeTranscript
  ) {}

  get isCapturing(): boolean {
    return this.session !== null;
  }

  /**
   * Begin listening. No-op while a session is live.
   */
  startCapture(): void {
    if (this.session) {
      console.log('[CaptureController] Already capturing, start ignored');
      return;
    }

    if (this.permissionDenied) {
      this.publishError('permission-denied', 'Microphone permission denied', true);
      return;
    }

    if (!this.engine.isAvailable()) {
      this.publishError('unavailable', 'Speech recognition is not available', true);
      return;
    }

    const session: CaptureSession = {
      segments: [],
      partial: '',
      confidence: 0,
      listening: true,
      consecutiveErrors: 0,
      restartTimer: null,
      safetyTimer: null,
    };
    this.session = session;

    if (this.config.maxSessionMs > 0) {
      session.safetyTimer = setTimeout(() => {
        console.warn(`[CaptureController] Session reached ${this.config.maxSessionMs}ms, stopping`);
        this.stopCapture();
      }, this.config.maxSessionMs);
    }

    console.log('[CaptureController] 🎙️ Capture started');
    this.state.publish({ status: 'listening' });
    this.startSegment(session);
  }

  /**
   * End the session and emit the accumulated text as one Result.
   * No-op when nothing is being captured.
   */
  stopCapture(): void {
    const session = this.session;
    if (!session) {
      return;
    }

    const text = this.finalText(session);
    this.endSession(session);
    this.engine.stop();

    console.log(`[CaptureController] Capture stopped (${session.segments.length} segments, ${text.length} chars)`);
    this.state.publish({ status: 'result', text, confidence: text ? session.confidence : 0 });
    this.state.publish({ status: 'idle' });
  }

  /**
   * Discard the session without emitting a Result
   */
  cancelCapture(): void {
    const session = this.session;
    if (!session) {
      return;
    }

    this.endSession(session);
    this.engine.cancel();
    console.log('[CaptureController] Capture cancelled');
    this.state.publish({ status: 'idle' });
  }

  release(): void {
    this.cancelCapture();
    this.engine.release();
  }

  /**
   * Clear the permission-denied latch after the operator granted access
   */
  notifyPermissionGranted(): void {
    this.permissionDenied = false;
    if (this.state.value.status === 'error') {
      this.state.publish({ status: 'idle' });
    }
  }

  // ==========================================================================
  // Engine callbacks
  // ==========================================================================

  private startSegment(session: CaptureSession): void {
    session.partial = '';
    try {
      this.engine.start(this.listenerFor(session));
    } catch (error) {
      this.handleError(session, 'client', errorMessage(error));
    }
  }

  /**
   * Callbacks bound to one session; anything arriving after it ended is dropped
   */
  private listenerFor(session: CaptureSession): RecognitionListener {
    const isCurrent = () => this.session === session && session.listening;

    return {
      onReady: () => {
        if (isCurrent()) {
          console.log('[CaptureController] Engine ready');
        }
      },
      onPartial: (text) => {
        if (!isCurrent()) return;
        session.partial = text;
        this.state.publish({ status: 'partial', text: joinText([...session.segments, text]) });
      },
      onSegment: (text, confidence) => {
        if (!isCurrent()) return;
        if (text.trim()) {
          session.segments.push(text.trim());
          session.confidence = confidence;
        }
        session.partial = '';
        session.consecutiveErrors = 0;
        this.state.publish({ status: 'partial', text: joinText(session.segments) });
        this.startSegment(session);
      },
      onError: (code, message) => {
        if (!isCurrent()) return;
        this.handleError(session, code, message ?? describeError(code));
      },
    };
  }

  private handleError(session: CaptureSession, code: CaptureErrorCode, message: string): void {
    // Keep what the failed segment had already heard
    if (session.partial.trim()) {
      session.segments.push(session.partial.trim());
      session.partial = '';
    }

    if (!isRecoverableCaptureError(code)) {
      if (code === 'permission-denied') {
        this.permissionDenied = true;
      }
      console.error(`[CaptureController] Fatal recognition error: ${code} (${message})`);
      this.failSession(session, code, message);
      return;
    }

    session.consecutiveErrors++;
    if (session.consecutiveErrors > this.config.maxQuietRestarts) {
      console.error(`[CaptureController] ${session.consecutiveErrors} recoverable errors in a row, giving up`);
      this.failSession(session, code, `Recognition failed ${session.consecutiveErrors} times in a row: ${message}`);
      return;
    }

    console.log(
      `[CaptureController] Recoverable error ${code}, restarting (${session.consecutiveErrors}/${this.config.maxQuietRestarts})`
    );
    this.engine.cancel();
    if (session.restartTimer) {
      clearTimeout(session.restartTimer);
    }
    session.restartTimer = setTimeout(() => {
      session.restartTimer = null;
      if (this.session === session && session.listening) {
        this.startSegment(session);
      }
    }, this.config.restartDelayMs);
  }

  /**
   * End the session on a fatal error. Captured text is emitted first.
   */
  private failSession(session: CaptureSession, code: CaptureErrorCode, message: string): void {
    const text = this.finalText(session);
    this.endSession(session);
    this.engine.cancel();

    if (text) {
      this.state.publish({ status: 'result', text, confidence: session.confidence });
    }
    this.publishError(code, message, true);
  }

  private endSession(session: CaptureSession): void {
    session.listening = false;
    if (session.restartTimer) {
      clearTimeout(session.restartTimer);
      session.restartTimer = null;
    }
    if (session.safetyTimer) {
      clearTimeout(session.safetyTimer);
      session.safetyTimer = null;
    }
    if (this.session === session) {
      this.session = null;
    }
  }

  private finalText(session: CaptureSession): string {
    return this.normalize(joinText([...session.segments, session.partial]));
  }

  private publishError(code: CaptureErrorCode, message: string, fatal: boolean): void {
    this.state.publish({
      status: 'error',
      code,
      message,
      fatal,
      requiresRemediation: code === 'permission-denied',
    });
  }
}

function joinText(parts: string[]): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(' ');
}

function describeError(code: CaptureErrorCode): string {
  switch (code) {
    case 'no-match':
      return 'No speech recognised';
    case 'speech-timeout':
      return 'No speech heard';
    case 'busy':
      return 'Recognizer busy';
    case 'network':
      return 'Network error during recognition';
    case 'audio':
      return 'Audio recording error';
    case 'client':
      return 'Recognition client error';
    case 'permission-denied':
      return 'Microphone permission denied';
    case 'unavailable':
      return 'Speech recognition is not available';
  }
}
