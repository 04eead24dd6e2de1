/**
 * Speaker inference
 *
 * Guesses whether the person dictating did the work themselves (first person:
 * "ho riparato", "I replaced") or is reporting someone else's work (third
 * person: "il tecnico ha sistemato", "they fixed"). Drives whether the
 * maintenance task must ask who performed the intervention.
 */

import type { SpeakerHint } from '../types/voice.js';
import { getVocabulary } from '../utils/vocabulary.js';

let compiled: { firstPerson: RegExp[]; thirdPerson: RegExp[] } | null = null;

function patterns() {
  if (!compiled) {
    const vocabulary = getVocabulary();
    compiled = {
      firstPerson: vocabulary.firstPersonPatterns.map((source) => new RegExp(source, 'iu')),
      thirdPerson: vocabulary.thirdPersonPatterns.map((source) => new RegExp(source, 'iu')),
    };
  }
  return compiled;
}

/**
 * Infer the speaker from one utterance by counting matching patterns
 */
export function inferSpeaker(input: string): SpeakerHint {
  const { firstPerson, thirdPerson } = patterns();
  const firstPersonScore = firstPerson.filter((pattern) => pattern.test(input)).length;
  const thirdPersonScore = thirdPerson.filter((pattern) => pattern.test(input)).length;

  if (firstPersonScore > thirdPersonScore) {
    return 'likely-performer';
  }
  if (thirdPersonScore > firstPersonScore) {
    return 'likely-operator';
  }
  return 'unknown';
}

/**
 * Combine the current hint with a newly inferred one.
 * An inconclusive new hint keeps the current one; otherwise the newest wins.
 */
export function combineSpeakerHints(current: SpeakerHint, next: SpeakerHint): SpeakerHint {
  return next === 'unknown' ? current : next;
}
