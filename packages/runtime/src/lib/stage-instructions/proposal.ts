/**
 * Proposal Instructions
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getProposalInstruction(context: StageInstructionContext): StageInstruction {
  const { missingFields, capturedFields } = context;

  if (missingFields.includes('product_interest')) {
    const need = capturedFields.need ? `their need (${capturedFields.need})` : 'what they told you';
    const pain = capturedFields.pain_point ? ` and their pain point (${capturedFields.pain_point})` : '';
    return {
      instruction: `Present two or three benefits that answer ${need}${pain}.
Then ask which option sounds most interesting to them.`,
      examples: [
        `"Based on what you said, our Growth plan would take that off your plate. Does that sound like a fit, or would you rather start smaller?"`
      ],
      targetFields: ['product_interest']
    };
  }

  return {
    instruction: `They're interested in ${capturedFields.product_interest ?? 'an option'}. Reinforce why it fits their need.`,
    targetFields: []
  };
}
