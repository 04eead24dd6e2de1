export * from './types/inventory.js';
export * from './types/voice.js';

export { resolveVoiceConfig, type VoiceConfig, type CaptureConfig, type ExtractionConfig, type MatchThresholds } from './config/voice.js';
export { initTracing } from './config/tracing.js';

export { CaptureError, ExtractionError, PersistenceError, isRecoverableCaptureError, errorMessage } from './utils/errors.js';
export { similarity, nameSimilarity, normalizeName } from './utils/similarity.js';
export { normalizeTranscript } from './utils/transcriptNormalization.js';
export { sanitizeInput, type SanitizedInput } from './utils/inputSanitizer.js';
export { toSpeechText } from './utils/plainText.js';
export { StateChannel } from './utils/stateChannel.js';

export type { InventoryRepository } from './repositories/InventoryRepository.js';
export { InMemoryInventoryRepository, type InventorySeed } from './repositories/InMemoryInventoryRepository.js';
export { SupabaseInventoryRepository } from './repositories/SupabaseInventoryRepository.js';

export { EntityResolver } from './services/entityResolvers/EntityResolver.js';
export { ConversationContext, type ContextSnapshot } from './services/conversationContext.js';
export { TaskStateMachine } from './services/tasks/taskStateMachine.js';
export { detectIntent, type UserIntent } from './services/intentDetector.js';
export { inferSpeaker, combineSpeakerHints } from './services/speakerInference.js';
export { CaptureController } from './services/capture/captureController.js';
export type { RecognitionEngine, RecognitionListener } from './services/capture/recognitionEngine.js';
export {
  OpenAIExtractionClient,
  classifyExtractionError,
  type ExtractionClient,
  type ExtractionRequest,
  type ExtractionResult,
} from './services/extraction/extractionClient.js';
export { ExtractionPipeline, type ExtractionPipelineOptions, type FieldSnapshotProvider } from './services/extractionPipeline.js';
export { VoiceSession } from './services/voiceSession.js';
