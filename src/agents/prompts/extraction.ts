/**
 * Extraction prompts
 *
 * The system prompt carries the stable rules; the user prompt carries one
 * round: today's date, the task state, recent exchanges and the new
 * transcript.
 */

import type { ContextSnapshot } from '../../services/conversationContext.js';
import { missingRequirementLabels, taskLabel } from '../../services/tasks/activeTask.js';
import { EQUIPMENT_CATEGORIES, INTERVENTION_TYPES } from '../../types/inventory.js';
import type { ChatExchange, SpeakerHint, TaskKind } from '../../types/voice.js';

export const EXTRACTION_SYSTEM_PROMPT = `You are the data entry assistant of a hospital equipment inventory. Technicians and clinical staff dictate by voice while they work, and you fill in one record at a time.

## Your job

From the operator's latest message, extract the values for the record being filled in and write a short reply.

## Rules

- Extract only what the operator said. Use null for every field that was not mentioned in the latest message.
- Never repeat values from the already collected fields unless the operator corrects them.
- Speech recognition makes mistakes. Fix obvious ones in names, brands and acronyms (for example "UBS" is usually "UPS").
- Keep names as spoken; do not invent companies, rooms or people.
- Dates are YYYY-MM-DD. Resolve relative dates ("today", "yesterday", "ieri") against the current date you are given.
- Numbers are plain numbers: durations in minutes, costs in euro, warranty and maintenance intervals in months.
- Categories and intervention types must be one of the allowed values.

## Reply

- Reply in the language the operator speaks.
- One or two short sentences that will be read aloud: no markdown, no lists.
- Confirm what you understood, then ask for ONE missing required field, if any.
- When nothing is missing, ask the operator to confirm the record.

## Confidence

Report how sure you are about the extracted values. Use a low value when the transcript is garbled or the values are guesses.`;

const ENUMERATIONS: Partial<Record<TaskKind, string>> = {
  equipment: `Allowed categories: ${EQUIPMENT_CATEGORIES.join(', ')}`,
  maintenance: `Allowed intervention types: ${INTERVENTION_TYPES.join(', ')}`,
};

function speakerNote(hint: SpeakerHint): string {
  switch (hint) {
    case 'likely-performer':
      return 'The operator did the work themselves. Leave performedBy null unless they name someone else.';
    case 'likely-operator':
      return 'The operator is reporting work done by someone else. Ask who did it if they have not said.';
    case 'unknown':
      return 'It is not yet clear who did the work.';
  }
}

function formatHistory(exchanges: ChatExchange[]): string {
  if (exchanges.length === 0) {
    return '(none)';
  }
  return exchanges
    .map((exchange) => `${exchange.role === 'operator' ? 'Operator' : 'Assistant'}: ${exchange.content}`)
    .join('\n');
}

/**
 * Build the per-round prompt
 *
 * @param transcript - Sanitized operator message
 * @param context - Conversation state before this message
 */
export function buildExtractionPrompt(transcript: string, context: ContextSnapshot): string {
  const { task } = context;
  const missing = missingRequirementLabels(task, context.speakerHint);

  const sections = [
    `Current date: ${context.today}`,
    `Record being filled in: ${taskLabel(task.kind)}`,
    `Already collected:\n${context.summary || '(nothing yet)'}`,
    `Missing required fields: ${missing.length > 0 ? missing.join(', ') : 'none'}`,
  ];

  const enumeration = ENUMERATIONS[task.kind];
  if (enumeration) {
    sections.push(enumeration);
  }
  if (task.kind === 'maintenance') {
    sections.push(`Speaker: ${speakerNote(context.speakerHint)}`);
  }

  sections.push(`Recent conversation:\n${formatHistory(context.exchanges)}`);
  sections.push(`Operator's latest message:\n"""\n${transcript}\n"""`);

  return sections.join('\n\n');
}
