/**
 * Error types raised by the voice pipeline
 */

import type { CaptureErrorCode, ExtractionErrorKind } from '../types/voice.js';

/**
 * Failure reported by the recognition engine, classified for the capture
 * controller's restart policy.
 */
export class CaptureError extends Error {
  readonly code: CaptureErrorCode;

  constructor(code: CaptureErrorCode, message: string) {
    super(message);
    this.name = 'CaptureError';
    this.code = code;
  }

  get recoverable(): boolean {
    return isRecoverableCaptureError(this.code);
  }
}

export function isRecoverableCaptureError(code: CaptureErrorCode): boolean {
  return code === 'no-match' || code === 'speech-timeout' || code === 'busy';
}

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly retryable: boolean;

  constructor(kind: ExtractionErrorKind, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ExtractionError';
    this.kind = kind;
    this.retryable = options?.retryable ?? (kind === 'network' || kind === 'rate-limited');
  }
}

/**
 * Wraps a storage collaborator failure. The original error is kept verbatim
 * as `cause` and its message is reused.
 */
export class PersistenceError extends Error {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
