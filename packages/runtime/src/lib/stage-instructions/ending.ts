/**
 * Ending Instructions
 *
 * `ending` is used once, for the closing utterance. `ended` covers trailing
 * messages after the conversation is over.
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getEndingInstruction(context: StageInstructionContext): StageInstruction {
  const name = context.capturedFields.name;

  return {
    instruction: `The conversation is over. Thank ${name ?? 'them'} for their time and say goodbye in one or two sentences.
Don't ask any more questions and don't try to keep them talking.`,
    examples: [
      `"Thanks so much for your time${name ? `, ${name}` : ''}. Have a great day!"`,
      `"Really appreciate the chat. Take care!"`
    ],
    targetFields: []
  };
}

export function getEndedInstruction(_context: StageInstructionContext): StageInstruction {
  return {
    instruction: `The conversation has already ended. Reply with a brief, friendly acknowledgement. Don't ask anything.`,
    targetFields: []
  };
}
