/**
 * Local detection of spoken task commands
 *
 * Recognises "that's all / save" and "cancel" utterances before anything is
 * sent to the model, so the pipeline can jump straight to the completion check
 * or abandon the task.
 */

import { containsPhrase, getVocabulary, normalizeUtterance } from '../utils/vocabulary.js';

export type UserIntent = 'continue' | 'proceed' | 'cancel';

/** Longest utterance treated as a command unless configured otherwise */
const DEFAULT_MAX_COMMAND_WORDS = 4;

/**
 * Classify an operator utterance.
 *
 * Only short utterances can be commands: "ok, the pump was repaired by Medika"
 * is dictation, not a save request. Cancel phrases win over proceed phrases.
 *
 * @param input - Finalized transcript
 * @param maxCommandWords - Longest utterance (in words) still treated as a command
 */
export function detectIntent(input: string, maxCommandWords: number = DEFAULT_MAX_COMMAND_WORDS): UserIntent {
  const normalized = normalizeUtterance(input);
  if (!normalized) {
    return 'continue';
  }
  if (normalized.split(' ').length > maxCommandWords) {
    return 'continue';
  }

  const vocabulary = getVocabulary();
  if (vocabulary.cancelPhrases.some((phrase) => containsPhrase(normalized, phrase))) {
    return 'cancel';
  }
  if (vocabulary.proceedPhrases.some((phrase) => containsPhrase(normalized, phrase))) {
    return 'proceed';
  }
  return 'continue';
}
