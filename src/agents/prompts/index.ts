/**
 * Barrel export for prompts.
 */

export { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './extraction.js';
