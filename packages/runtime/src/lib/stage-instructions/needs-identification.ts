/**
 * Needs Identification Instructions
 *
 * Open questions about their work and challenges. Never ask for a need and a
 * pain point in the same breath; follow what they just said.
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getNeedsIdentificationInstruction(context: StageInstructionContext): StageInstruction {
  const { missingFields, capturedFields } = context;

  const needsNeed = missingFields.includes('need');
  const needsPain = missingFields.includes('pain_point');

  if (needsNeed && needsPain) {
    return {
      instruction: `Ask an open question about their current challenges and what they're hoping to improve.
Listen more than you talk.`,
      examples: [
        `"What's the biggest challenge your team is dealing with right now?"`,
        `"What made you start looking for a solution?"`
      ],
      targetFields: ['need', 'pain_point']
    };
  }

  if (needsPain) {
    return {
      instruction: `They need: ${capturedFields.need ?? 'something specific'}. Ask what is making that hard today.`,
      examples: [
        `"What's getting in the way of that today?"`,
        `"How are you handling that at the moment, and where does it hurt?"`
      ],
      targetFields: ['pain_point']
    };
  }

  if (needsNeed) {
    return {
      instruction: `Their pain point: ${capturedFields.pain_point ?? 'described'}. Ask what an ideal solution would look like for them.`,
      examples: [
        `"If you could fix that tomorrow, what would the ideal setup look like?"`
      ],
      targetFields: ['need']
    };
  }

  return {
    instruction: `Reflect their need back to them in one sentence to show you understood.`,
    targetFields: []
  };
}
