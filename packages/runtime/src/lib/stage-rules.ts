import { STAGES, type ActiveStage, type FieldKey, type PromptTemplateId, type Stage } from '../types/index.js';

export interface StageRule {
  requiredFields: readonly FieldKey[];
  templateId: PromptTemplateId;
  minTurnsBeforeEligible: number;
  goal: string;
}

export const STAGE_RULES: Readonly<Record<ActiveStage, StageRule>> = {
  introduction: {
    requiredFields: ['name', 'company'],
    templateId: 'introduction',
    minTurnsBeforeEligible: 1,
    goal: 'Introduce yourself and learn who the prospect is and where they work',
  },
  needs_identification: {
    requiredFields: ['need', 'pain_point'],
    templateId: 'needs_identification',
    minTurnsBeforeEligible: 1,
    goal: 'Understand what the prospect needs and what is getting in their way',
  },
  qualification: {
    requiredFields: ['budget', 'timeline'],
    templateId: 'qualification',
    minTurnsBeforeEligible: 1,
    goal: 'Find out, without pressure, what budget and timing they have in mind',
  },
  proposal: {
    requiredFields: ['product_interest'],
    templateId: 'proposal',
    minTurnsBeforeEligible: 1,
    goal: 'Present the benefits that match their need and find the option they like',
  },
  closing: {
    requiredFields: [],
    templateId: 'closing',
    minTurnsBeforeEligible: 2,
    goal: 'Summarise what was discussed and agree on a concrete next step',
  },
};

export function isActiveStage(stage: Stage): stage is ActiveStage {
  return stage !== 'ended';
}

export function getStageRule(stage: ActiveStage): StageRule {
  return STAGE_RULES[stage];
}

/**
 * Position in the stage order; `ended` sorts after every active stage
 */
export function stageIndex(stage: Stage): number {
  return isActiveStage(stage) ? STAGES.indexOf(stage) : STAGES.length;
}

/**
 * The stage after `stage`, or null when there is no further active stage
 */
export function nextStage(stage: Stage): ActiveStage | null {
  if (!isActiveStage(stage)) {
    return null;
  }
  return STAGES[STAGES.indexOf(stage) + 1] ?? null;
}
