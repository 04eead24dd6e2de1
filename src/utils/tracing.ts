/**
 * OpenTelemetry tracing utilities for the voice pipeline
 *
 * Provides helper functions for creating custom spans with proper attributes,
 * sanitizing sensitive metadata, and building standard attribute sets.
 */

import { SpanStatusCode, type Span } from '@opentelemetry/api';
import { getTracer } from '../config/tracing.js';

// ============================================================================
// Constants for standard attribute keys
// ============================================================================

export const TraceAttributes = {
  // Task context
  TASK_KIND: 'taskKind',
  EXCHANGE_COUNT: 'exchangeCount',
  SPEAKER_HINT: 'speakerHint',

  // Operation metadata
  OPERATION_TYPE: 'operationType',
  ENTITY_TYPE: 'entityType',
  ENTITY_COUNT: 'entityCount',
  RESOLUTION_OUTCOME: 'resolutionOutcome',

  // Input size (never the text itself)
  TRANSCRIPT_LENGTH: 'transcriptLength',
  ATTEMPT: 'attempt',

  // LLM/AI operations
  MODEL: 'model',
} as const;

type AttributeValue = string | number | boolean | undefined | null;

// ============================================================================
// Span wrapper for async operations
// ============================================================================

/**
 * Wrap an async function with OpenTelemetry span tracking
 *
 * @param name - Span name (e.g., "extraction.generate", "resolver.vendor")
 * @param attributes - Span attributes for context
 * @param fn - Async function to execute; receives the span for attributes known only at the end
 * @returns Result of fn or throws if fn throws
 *
 * @example
 * const pool = await withSpan('resolver.vendor', buildResolutionAttributes('vendor'), async (span) => {
 *   const records = await repository.listActive('vendor');
 *   setSpanAttributes(span, { [TraceAttributes.ENTITY_COUNT]: records.length });
 *   return records;
 * });
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, AttributeValue>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeMetadata(attributes);

  return tracer.startActiveSpan(name, { attributes: sanitized }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage,
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Add attributes to a running span, with the same filtering as `withSpan`
 */
export function setSpanAttributes(span: Span, attributes: Record<string, AttributeValue>): void {
  span.setAttributes(sanitizeMetadata(attributes));
}

// ============================================================================
// Metadata sanitization (PII filtering)
// ============================================================================

/**
 * Remove sensitive data from span attributes
 *
 * Transcripts, vendor contact details and credentials never go into spans;
 * record their length or count instead.
 */
export function sanitizeMetadata(
  metadata: Record<string, AttributeValue>
): Record<string, string | number | boolean> {
  const sanitized: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) {
      continue;
    }

    const lowered = key.toLowerCase();
    if (
      lowered.includes('secret') ||
      lowered.includes('token') ||
      lowered.includes('key') ||
      lowered.includes('email') ||
      lowered.includes('phone') ||
      lowered.includes('content') ||
      (lowered.includes('transcript') && !lowered.endsWith('length'))
    ) {
      continue;
    }

    sanitized[key] = value;
  }

  return sanitized;
}

// ============================================================================
// Standard attribute builders
// ============================================================================

export function buildExtractionAttributes(
  model: string,
  options: {
    taskKind: string;
    transcriptLength: number;
    exchangeCount: number;
    speakerHint: string;
    attempt?: number;
  }
) {
  return {
    [TraceAttributes.MODEL]: model,
    [TraceAttributes.OPERATION_TYPE]: 'extract',
    [TraceAttributes.TASK_KIND]: options.taskKind,
    [TraceAttributes.TRANSCRIPT_LENGTH]: options.transcriptLength,
    [TraceAttributes.EXCHANGE_COUNT]: options.exchangeCount,
    [TraceAttributes.SPEAKER_HINT]: options.speakerHint,
    [TraceAttributes.ATTEMPT]: options.attempt,
  };
}

export function buildResolutionAttributes(entityType: string) {
  return {
    [TraceAttributes.ENTITY_TYPE]: entityType,
    [TraceAttributes.OPERATION_TYPE]: 'resolve',
  };
}

/**
 * Attributes known once a lookup finished: pool size and outcome
 */
export function buildResolutionResultAttributes(candidateCount: number, outcome: string) {
  return {
    [TraceAttributes.ENTITY_COUNT]: candidateCount,
    [TraceAttributes.RESOLUTION_OUTCOME]: outcome,
  };
}

export function buildPersistenceAttributes(recordKind: string, operationType: 'create' | 'insert' | 'update') {
  return {
    [TraceAttributes.ENTITY_TYPE]: recordKind,
    [TraceAttributes.OPERATION_TYPE]: operationType,
  };
}
