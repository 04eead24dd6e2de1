/**
 * Sanitizes transcripts before they are embedded in a model prompt
 */

export type SanitizedInput =
  | { status: 'clean'; text: string }
  | { status: 'suspicious'; text: string; reason: string }
  | { status: 'rejected'; reason: string };

const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const ZERO_WIDTH_CHARACTERS = /[\u200B-\u200D\u2060\uFEFF]/g;

/** Suspicious transcripts are cut to this length */
const SUSPICIOUS_MAX_LENGTH = 100;

const SUSPICIOUS_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\b(ignore|ignora)\b.{0,40}\b(instructions?|istruzioni|system|sistema|prompt)\b/i, reason: 'instruction override' },
  { pattern: /\$\{/, reason: 'template expression' },
  { pattern: /\.\.\/\.\.\//, reason: 'path traversal' },
  { pattern: /<\/?(system|assistant|script)\b/i, reason: 'markup injection' },
];

/**
 * Clean a transcript.
 *
 * Control and zero-width characters are removed and whitespace collapsed.
 * Blank or over-long input is rejected. Input that looks like an attempt to
 * steer the model is kept but truncated, and flagged.
 */
export function sanitizeInput(input: string, maxLength: number): SanitizedInput {
  const text = input
    .replace(CONTROL_CHARACTERS, ' ')
    .replace(ZERO_WIDTH_CHARACTERS, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (!text) {
    return { status: 'rejected', reason: 'empty input' };
  }
  if (text.length > maxLength) {
    return { status: 'rejected', reason: `input longer than ${maxLength} characters` };
  }

  const suspicious = SUSPICIOUS_PATTERNS.find(({ pattern }) => pattern.test(text));
  if (suspicious) {
    return { status: 'suspicious', text: text.slice(0, SUSPICIOUS_MAX_LENGTH), reason: suspicious.reason };
  }

  return { status: 'clean', text };
}
