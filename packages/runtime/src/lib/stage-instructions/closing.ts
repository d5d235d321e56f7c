/**
 * Closing Instructions
 *
 * Summarise and propose a concrete next step (a demo, a call, a trial).
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getClosingInstruction(context: StageInstructionContext): StageInstruction {
  const summary = context.profileSummary || 'what you discussed';

  return {
    instruction: `Summarise the conversation in one or two sentences (${summary}).
Propose one concrete next step, such as a demo or a follow-up call, and ask if it works for them.`,
    examples: [
      `"So you're after a simpler way to track leads before Q3. How about a 30-minute demo next week?"`,
      `"Shall I send over a proposal and book a quick call to go through it?"`
    ],
    targetFields: []
  };
}
