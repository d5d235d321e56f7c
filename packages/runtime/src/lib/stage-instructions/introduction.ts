/**
 * Introduction Instructions
 *
 * Introduce yourself, then learn the prospect's name and company:
 * - Neither known: ask for both in one friendly question
 * - One known: use it and ask for the other
 */

import type { StageInstructionContext, StageInstruction } from './index.js';

export function getIntroductionInstruction(context: StageInstructionContext): StageInstruction {
  const { missingFields, capturedFields } = context;

  const needsName = missingFields.includes('name');
  const needsCompany = missingFields.includes('company');
  const name = capturedFields.name;

  if (needsName && needsCompany) {
    return {
      instruction: `Introduce yourself warmly and ask who you're speaking with and which company they're with.
One question, not a form.`,
      examples: [
        `"Hi, I'm LeadFlow! Who do I have the pleasure of speaking with, and where are you calling from?"`,
        `"Great to meet you. What's your name, and which company are you with?"`
      ],
      targetFields: ['name', 'company']
    };
  }

  if (needsCompany) {
    return {
      instruction: `You know their name (${name ?? 'given'}). Ask which company or organisation they're with.`,
      examples: [
        `"Nice to meet you, ${name ?? 'there'}! Which company are you with?"`,
        `"Thanks ${name ?? ''}. And where do you work?"`
      ],
      targetFields: ['company']
    };
  }

  if (needsName) {
    return {
      instruction: `You know their company (${capturedFields.company ?? 'given'}). Ask for their name.`,
      examples: [
        `"Great, and who am I speaking with at ${capturedFields.company ?? 'your company'}?"`
      ],
      targetFields: ['name']
    };
  }

  return {
    instruction: `You know who they are. Thank them and ask an open question about what brought them here.`,
    targetFields: []
  };
}
