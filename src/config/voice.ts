/**
 * Voice pipeline configuration
 *
 * Read from environment variables (loaded by dotenv at the entry point) and
 * validated with zod. Every threshold the pipeline uses is tunable here.
 *
 * Environment Variables:
 * - VOICE_EXTRACTION_MODEL: model id used for extraction (default: gpt-4o-mini)
 * - VOICE_MIN_SIMILARITY / VOICE_HIGH_CONFIDENCE_SIMILARITY / VOICE_CONFIDENCE_GAP
 * - VOICE_PARTIAL_MATCH_WEIGHT: weight of a word-window match inside a longer name
 * - VOICE_MAX_EXCHANGES: exchanges kept in conversation history
 * - VOICE_MAX_QUIET_RESTARTS: consecutive recoverable capture errors tolerated
 * - VOICE_RESTART_DELAY_MS: delay before a quiet restart after an error
 * - VOICE_MAX_SESSION_MS: optional hard cap on one capture session (0 = none)
 * - VOICE_LOW_CONFIDENCE_THRESHOLD: extraction confidence below this is flagged
 * - VOICE_EXTRACTION_MAX_RETRIES / VOICE_EXTRACTION_BACKOFF_MS
 * - VOICE_MAX_TRANSCRIPT_CHARS: longest transcript sent to the model
 * - VOICE_RATE_LIMIT_PER_MINUTE: model calls allowed per rolling minute
 * - VOICE_MAX_COMMAND_WORDS: longest utterance treated as a proceed/cancel command
 */

import { z } from 'zod';

const unit = z.coerce.number().min(0).max(1);

const VoiceConfigSchema = z
  .object({
    VOICE_EXTRACTION_MODEL: z.string().min(1).default('gpt-4o-mini'),
    VOICE_MIN_SIMILARITY: unit.default(0.6),
    VOICE_HIGH_CONFIDENCE_SIMILARITY: unit.default(0.8),
    VOICE_CONFIDENCE_GAP: unit.default(0.2),
    VOICE_PARTIAL_MATCH_WEIGHT: unit.default(0.9),
    VOICE_MAX_EXCHANGES: z.coerce.number().int().min(1).default(6),
    VOICE_MAX_QUIET_RESTARTS: z.coerce.number().int().min(0).default(3),
    VOICE_RESTART_DELAY_MS: z.coerce.number().int().min(0).default(50),
    VOICE_MAX_SESSION_MS: z.coerce.number().int().min(0).default(0),
    VOICE_LOW_CONFIDENCE_THRESHOLD: unit.default(0.7),
    VOICE_EXTRACTION_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    VOICE_EXTRACTION_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    VOICE_MAX_TRANSCRIPT_CHARS: z.coerce.number().int().min(1).default(4000),
    VOICE_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(10),
    VOICE_MAX_COMMAND_WORDS: z.coerce.number().int().min(1).default(4),
  })
  .refine((env) => env.VOICE_MIN_SIMILARITY <= env.VOICE_HIGH_CONFIDENCE_SIMILARITY, {
    message: 'VOICE_MIN_SIMILARITY must not exceed VOICE_HIGH_CONFIDENCE_SIMILARITY',
  });

export interface MatchThresholds {
  minSimilarity: number;
  highConfidenceSimilarity: number;
  confidenceGap: number;
  partialMatchWeight: number;
}

export interface CaptureConfig {
  maxQuietRestarts: number;
  restartDelayMs: number;
  maxSessionMs: number;
}

export interface ExtractionConfig {
  model: string;
  lowConfidenceThreshold: number;
  maxRetries: number;
  backoffMs: number;
  maxTranscriptChars: number;
  rateLimitPerMinute: number;
  maxCommandWords: number;
}

export interface VoiceConfig {
  matching: MatchThresholds;
  maxExchanges: number;
  capture: CaptureConfig;
  extraction: ExtractionConfig;
}

/**
 * Build the pipeline configuration from an environment map
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws Error listing every invalid variable
 */
export function resolveVoiceConfig(env: NodeJS.ProcessEnv = process.env): VoiceConfig {
  // Empty strings (e.g. copied from .env.example) mean "use the default"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = VoiceConfigSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid voice configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    matching: {
      minSimilarity: values.VOICE_MIN_SIMILARITY,
      highConfidenceSimilarity: values.VOICE_HIGH_CONFIDENCE_SIMILARITY,
      confidenceGap: values.VOICE_CONFIDENCE_GAP,
      partialMatchWeight: values.VOICE_PARTIAL_MATCH_WEIGHT,
    },
    maxExchanges: values.VOICE_MAX_EXCHANGES,
    capture: {
      maxQuietRestarts: values.VOICE_MAX_QUIET_RESTARTS,
      restartDelayMs: values.VOICE_RESTART_DELAY_MS,
      maxSessionMs: values.VOICE_MAX_SESSION_MS,
    },
    extraction: {
      model: values.VOICE_EXTRACTION_MODEL,
      lowConfidenceThreshold: values.VOICE_LOW_CONFIDENCE_THRESHOLD,
      maxRetries: values.VOICE_EXTRACTION_MAX_RETRIES,
      backoffMs: values.VOICE_EXTRACTION_BACKOFF_MS,
      maxTranscriptChars: values.VOICE_MAX_TRANSCRIPT_CHARS,
      rateLimitPerMinute: values.VOICE_RATE_LIMIT_PER_MINUTE,
      maxCommandWords: values.VOICE_MAX_COMMAND_WORDS,
    },
  };
}

export const DEFAULT_MATCH_THRESHOLDS: MatchThresholds = resolveVoiceConfig({}).matching;
