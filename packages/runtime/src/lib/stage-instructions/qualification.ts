/**
 * Qualification Instructions
 *
 * Budget and timing, asked subtly. Budget questions are phrased so the
 * prospect's answer is recognisable as a budget.
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getQualificationInstruction(context: StageInstructionContext): StageInstruction {
  const { missingFields, capturedFields } = context;

  const needsBudget = missingFields.includes('budget');
  const needsTimeline = missingFields.includes('timeline');

  if (needsBudget && needsTimeline) {
    return {
      instruction: `Ask, without pressure, what budget they have in mind for this and when they'd like a solution in place.
Tie it to their need${capturedFields.need ? ` (${capturedFields.need})` : ''}.`,
      examples: [
        `"Do you have a budget in mind for this, and when would you ideally want it running?"`,
        `"To point you at the right option, roughly what budget and timeline are you working with?"`
      ],
      targetFields: ['budget', 'timeline']
    };
  }

  if (needsBudget) {
    return {
      instruction: `Timeline is ${capturedFields.timeline ?? 'known'}. Ask gently about the budget they've set aside.`,
      examples: [
        `"And is there a budget range you're working within?"`
      ],
      targetFields: ['budget']
    };
  }

  if (needsTimeline) {
    return {
      instruction: `Budget is ${capturedFields.budget ?? 'known'}. Ask when they'd like to have a solution in place.`,
      examples: [
        `"When would you ideally like this up and running?"`
      ],
      targetFields: ['timeline']
    };
  }

  return {
    instruction: `You have budget and timing. Confirm them briefly.`,
    targetFields: []
  };
}
