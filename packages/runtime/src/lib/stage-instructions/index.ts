/**
 * Stage Instructions
 *
 * Instruction generators for each prompt template. They turn the orchestrator's
 * decision for a turn into the context handed to the text generator:
 * - Ask for the fields the current stage still needs
 * - Mention what was already captured so nothing is asked twice
 * - Adjust the tone after a transition or a forced move-on
 */

import type { FieldKey, FieldMap, PromptContext, PromptTemplateId, PromptTone, Stage } from '../../types/index.js';
import { getIntroductionInstruction } from './introduction.js';
import { getNeedsIdentificationInstruction } from './needs-identification.js';
import { getQualificationInstruction } from './qualification.js';
import { getProposalInstruction } from './proposal.js';
import { getClosingInstruction } from './closing.js';
import { getEndedInstruction, getEndingInstruction } from './ending.js';

/**
 * Context passed to stage instruction generators
 */
export interface StageInstructionContext {
  templateId: PromptTemplateId;
  stage: Stage;
  /** Required fields of the stage that are still empty */
  missingFields: FieldKey[];
  capturedFields: FieldMap;
  tone: PromptTone;
  profileSummary: string;
}

/**
 * Result from stage instruction generator
 */
export interface StageInstruction {
  /** The instruction to inject into the LLM prompt */
  instruction: string;
  /** Optional: Specific examples to include */
  examples?: string[];
  /** Fields this instruction is asking for */
  targetFields: FieldKey[];
}

export function getStageInstruction(context: StageInstructionContext): StageInstruction {
  switch (context.templateId) {
    case 'introduction':
      return getIntroductionInstruction(context);
    case 'needs_identification':
      return getNeedsIdentificationInstruction(context);
    case 'qualification':
      return getQualificationInstruction(context);
    case 'proposal':
      return getProposalInstruction(context);
    case 'closing':
      return getClosingInstruction(context);
    case 'ending':
      return getEndingInstruction(context);
    case 'ended':
      return getEndedInstruction(context);
  }
}

const TONE_GUIDANCE: Record<PromptTone, string> = {
  natural: '',
  transition: 'You just got what you needed for the previous topic. Acknowledge it in a few words, then move to the new goal.',
  move_on: "The previous topic wasn't going anywhere. Don't push it. Say something like \"let's move on\" and continue with the new goal.",
  farewell: '',
};

/**
 * Render a prompt context into the system prompt text for the generator
 */
export function renderPrompt(context: PromptContext): string {
  const sections = [`CURRENT GOAL (${context.stage}): ${context.goal}`];

  const toneGuidance = TONE_GUIDANCE[context.tone];
  if (toneGuidance) {
    sections.push(toneGuidance);
  }

  sections.push(context.instruction);

  if (context.profileSummary) {
    sections.push(`WHAT YOU KNOW ABOUT THE PROSPECT: ${context.profileSummary}`);
  }

  if (context.examples.length > 0) {
    sections.push(`EXAMPLES (adapt, don't copy):\n${context.examples.map(example => `- ${example}`).join('\n')}`);
  }

  return sections.join('\n\n');
}

export { getIntroductionInstruction } from './introduction.js';
export { getNeedsIdentificationInstruction } from './needs-identification.js';
export { getQualificationInstruction } from './qualification.js';
export { getProposalInstruction } from './proposal.js';
export { getClosingInstruction } from './closing.js';
export { getEndingInstruction, getEndedInstruction } from './ending.js';
