/**
 * Post-processing for recognised speech
 *
 * Speech engines mangle the acronyms and brand names this domain is full of.
 * Applied to every finalized transcript before it leaves the capture controller:
 * 1. Phonetic spelling ("A come Ancona, P come Padova" → "AP")
 * 2. Bare sequences of phonetic cities ("Ancona Padova Como" → "APC")
 * 3. Known mis-recognitions ("UBS" → "UPS", "Phillips" → "Philips")
 * 4. Whitespace cleanup
 */

import { escapeRegExp, getVocabulary } from './vocabulary.js';

interface SpellingMatch {
  start: number;
  end: number;
  letter: string;
}

/**
 * Convert "X come City" spelling runs into the letters they spell.
 * Only cities of the phonetic alphabet count, so ordinary uses of "come" are untouched.
 */
export function normalizeSpelling(input: string): string {
  const alphabet = getVocabulary().phoneticAlphabet;
  const cities = Object.keys(alphabet).map(escapeRegExp).join('|');
  const pattern = new RegExp(`(?:\\b([a-z])\\s+)?come\\s+(${cities})\\b`, 'gi');

  const matches: SpellingMatch[] = [];
  for (const match of input.matchAll(pattern)) {
    const start = match.index ?? 0;
    const city = match[2].toLowerCase();
    matches.push({ start, end: start + match[0].length, letter: alphabet[city] ?? match[2][0].toUpperCase() });
  }
  if (matches.length === 0) {
    return input;
  }

  // Consecutive spellings separated only by punctuation form one acronym
  let result = '';
  let cursor = 0;
  let run = '';
  for (const [index, match] of matches.entries()) {
    const previous = index > 0 ? matches[index - 1] : null;
    const continuesRun = previous !== null && /^[\s,;.]*$/.test(input.slice(previous.end, match.start));

    if (!continuesRun) {
      if (run) {
        result += run;
        run = '';
      }
      result += input.slice(cursor, match.start);
    }
    run += match.letter;
    cursor = match.end;
  }
  result += run + input.slice(cursor);

  return result;
}

/**
 * Convert runs of two or more phonetic city names into letters.
 * A single city is left alone: it is more likely a real place.
 */
export function normalizeCitySequence(input: string): string {
  const alphabet = getVocabulary().phoneticAlphabet;
  const words = input.split(/\s+/).filter((word) => word.length > 0);
  const output: string[] = [];
  let run: { words: string[]; letters: string } = { words: [], letters: '' };

  const flush = () => {
    if (run.words.length >= 2) {
      output.push(run.letters);
    } else {
      output.push(...run.words);
    }
    run = { words: [], letters: '' };
  };

  for (const word of words) {
    const letter = alphabet[word.toLowerCase().replace(/[,.]/g, '')];
    if (letter) {
      run.words.push(word);
      run.letters += letter;
    } else {
      flush();
      output.push(word);
    }
  }
  flush();

  return output.join(' ');
}

/**
 * Replace known mis-recognised terms (whole words, case-insensitive)
 */
export function correctKnownTerms(input: string): string {
  let result = input;
  for (const [wrong, correct] of Object.entries(getVocabulary().knownCorrections)) {
    const pattern = new RegExp(`\\b${escapeRegExp(wrong)}\\b`, 'gi');
    result = result.replace(pattern, correct);
  }
  return result;
}

/**
 * Apply every normalization step to a finalized transcript
 */
export function normalizeTranscript(input: string): string {
  if (input.trim().length === 0) {
    return '';
  }

  const spelled = normalizeSpelling(input);
  const sequenced = normalizeCitySequence(spelled);
  const corrected = correctKnownTerms(sequenced);
  const result = corrected.replace(/\s+/g, ' ').trim();

  if (result !== input) {
    console.log(`[TranscriptNormalization] "${input}" → "${result}"`);
  }
  return result;
}
