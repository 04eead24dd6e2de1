/**
 * Speech recognition engine boundary
 *
 * An engine runs one recognition segment per `start` call and reports back
 * through the listener. It ends a segment on its own at a natural pause
 * (delivering `onSegment`) or on an error; continuing to listen is the
 * capture controller's decision.
 */

import type { CaptureErrorCode } from '../../types/voice.js';

export interface RecognitionListener {
  onReady(): void;
  /** Interim text of the current segment */
  onPartial(text: string): void;
  /** Final text of a segment that ended at a natural pause */
  onSegment(text: string, confidence: number): void;
  onError(code: CaptureErrorCode, message?: string): void;
}

export interface RecognitionEngine {
  isAvailable(): boolean;
  start(listener: RecognitionListener): void;
  /** End the current segment; pending audio may still be reported */
  stop(): void;
  /** Abort the current segment without reporting anything */
  cancel(): void;
  release(): void;
}
