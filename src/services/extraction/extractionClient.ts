/**
 * Extraction Client
 *
 * One model round trip: the transcript and the conversation state go in, a
 * partial update of the active task, a spoken reply and a confidence come out.
 * Retries and backoff belong to the pipeline, so the SDK's own retries are off.
 */

import { APICallError, JSONParseError, NoObjectGeneratedError, TypeValidationError, generateObject } from 'ai';
import { openai } from '@ai-sdk/openai';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from '../../agents/prompts/index.js';
import type { TaskUpdate } from '../../types/voice.js';
import { ExtractionError, errorMessage } from '../../utils/errors.js';
import { buildExtractionAttributes, withSpan } from '../../utils/tracing.js';
import type { ContextSnapshot } from '../conversationContext.js';
import { EXTRACTION_RESPONSE_SCHEMAS } from './schemas.js';

export interface ExtractionRequest {
  /** Sanitized transcript */
  transcript: string;
  context: ContextSnapshot;
  signal?: AbortSignal;
  /** 1 for the first try */
  attempt?: number;
}

export interface ExtractionResult {
  update: TaskUpdate;
  /** Reply to read back to the operator */
  reply: string;
  confidence: number;
  /** Required fields the model still considers missing */
  missingFields: string[];
}

export interface ExtractionClient {
  extract(request: ExtractionRequest): Promise<ExtractionResult>;
}

export class OpenAIExtractionClient implements ExtractionClient {
  constructor(private readonly model: string) {}

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const { transcript, context, signal, attempt = 1 } = request;

    return withSpan(
      'extraction.generate',
      buildExtractionAttributes(this.model, {
        taskKind: context.task.kind,
        transcriptLength: transcript.length,
        exchangeCount: context.exchanges.length,
        speakerHint: context.speakerHint,
        attempt,
      }),
      async () => {
        const options = {
          model: openai(this.model),
          system: EXTRACTION_SYSTEM_PROMPT,
          prompt: buildExtractionPrompt(transcript, context),
          maxRetries: 0,
          abortSignal: signal,
          experimental_telemetry: {
            isEnabled: true,
            functionId: 'voice-extraction',
            metadata: {
              taskKind: context.task.kind,
              attempt,
            },
          },
        };

        try {
          switch (context.task.kind) {
            case 'equipment': {
              const { object } = await generateObject({ ...options, schema: EXTRACTION_RESPONSE_SCHEMAS.equipment });
              return toResult({ kind: 'equipment', fields: object.updates }, object);
            }
            case 'maintenance': {
              const { object } = await generateObject({ ...options, schema: EXTRACTION_RESPONSE_SCHEMAS.maintenance });
              return toResult({ kind: 'maintenance', fields: object.updates }, object);
            }
            case 'vendor': {
              const { object } = await generateObject({ ...options, schema: EXTRACTION_RESPONSE_SCHEMAS.vendor });
              return toResult({ kind: 'vendor', fields: object.updates }, object);
            }
            case 'location': {
              const { object } = await generateObject({ ...options, schema: EXTRACTION_RESPONSE_SCHEMAS.location });
              return toResult({ kind: 'location', fields: object.updates }, object);
            }
          }
        } catch (error) {
          throw classifyExtractionError(error);
        }
      }
    );
  }
}

function toResult(
  update: TaskUpdate,
  object: { reply: string; confidence: number; missingFields: string[] }
): ExtractionResult {
  return {
    update,
    reply: object.reply,
    confidence: object.confidence,
    missingFields: object.missingFields,
  };
}

/**
 * Map a model call failure onto the pipeline's error kinds
 */
export function classifyExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    if (error.statusCode === 429) {
      return new ExtractionError('rate-limited', 'The model service is rate limiting requests', { cause: error });
    }
    return new ExtractionError('network', `Model request failed: ${error.message}`, {
      retryable: error.isRetryable,
      cause: error,
    });
  }

  if (NoObjectGeneratedError.isInstance(error)) {
    if (error.finishReason === 'content-filter') {
      return new ExtractionError('content-filtered', 'The model refused to process this message', { cause: error });
    }
    return new ExtractionError('malformed-response', `The model returned no usable data: ${error.message}`, {
      retryable: true,
      cause: error,
    });
  }

  if (TypeValidationError.isInstance(error) || JSONParseError.isInstance(error)) {
    return new ExtractionError('malformed-response', `The model returned invalid data: ${error.message}`, {
      retryable: true,
      cause: error,
    });
  }

  return new ExtractionError('network', `Model request failed: ${errorMessage(error)}`, { cause: error });
}
