/**
 * Spoken vocabulary used by the local (non-model) text processors:
 * command phrases, speaker patterns, recognition corrections and the
 * phonetic spelling alphabet. Loaded once from data/vocabulary.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const VocabularySchema = z.object({
  proceedPhrases: z.array(z.string().min(1)),
  cancelPhrases: z.array(z.string().min(1)),
  firstPersonPatterns: z.array(z.string().min(1)),
  thirdPersonPatterns: z.array(z.string().min(1)),
  knownCorrections: z.record(z.string(), z.string()),
  phoneticAlphabet: z.record(z.string(), z.string().length(1)),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

// Resolves from both src/utils and dist/utils
const VOCABULARY_URL = new URL('../../data/vocabulary.json', import.meta.url);

let cached: Vocabulary | null = null;

export function getVocabulary(): Vocabulary {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(VOCABULARY_URL, 'utf8'));
    const parsed = VocabularySchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid vocabulary file ${VOCABULARY_URL.pathname}: ${parsed.error.message}`);
    }
    cached = parsed.data;
  }
  return cached;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercase, trim and strip punctuation that recognition engines append
 * ("Annulla." → "annulla"). Apostrophes are kept.
 */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[.,;:!?"]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * True when `phrase` occurs in `normalized` as whole words
 */
export function containsPhrase(normalized: string, phrase: string): boolean {
  return ` ${normalized} `.includes(` ${phrase} `);
}
