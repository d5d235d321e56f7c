import { z } from 'zod';

// Conversation stages, in order. `ended` is the terminal pseudo-stage.
export const STAGES = [
  'introduction',
  'needs_identification',
  'qualification',
  'proposal',
  'closing',
] as const;

export const StageSchema = z.enum([
  'introduction',
  'needs_identification',
  'qualification',
  'proposal',
  'closing',
  'ended',
]);
export type Stage = z.infer<typeof StageSchema>;
export type ActiveStage = (typeof STAGES)[number];

// Lead attributes the extractor can fill
export const FIELD_KEYS = [
  'name',
  'company',
  'role',
  'need',
  'pain_point',
  'budget',
  'timeline',
  'product_interest',
] as const;

export const FieldKeySchema = z.enum(FIELD_KEYS);
export type FieldKey = z.infer<typeof FieldKeySchema>;

export const FieldMapSchema = z.object({
  name: z.string().optional(),
  company: z.string().optional(),
  role: z.string().optional(),
  need: z.string().optional(),
  pain_point: z.string().optional(),
  budget: z.string().optional(),
  timeline: z.string().optional(),
  product_interest: z.string().optional(),
}).strict();

export type FieldMap = z.infer<typeof FieldMapSchema>;

export const ContactDetailsSchema = z.object({
  email: z.string().optional(),
  phone: z.string().optional(),
}).strict();

export type ContactDetails = z.infer<typeof ContactDetailsSchema>;

export const LeadProfileSchema = z.object({
  fields: FieldMapSchema,
  contact: ContactDetailsSchema,
  summary: z.string(),
});

export type LeadProfile = z.infer<typeof LeadProfileSchema>;

export const TurnRoleSchema = z.enum(['user', 'assistant']);
export type TurnRole = z.infer<typeof TurnRoleSchema>;

export const TurnRecordSchema = z.object({
  role: TurnRoleSchema,
  text: z.string(),
  timestamp: z.string().datetime(),
});

export type TurnRecord = z.infer<typeof TurnRecordSchema>;

// Persisted orchestrator snapshot
export const OrchestratorStateSchema = z.object({
  version: z.literal(1),
  stage: StageSchema,
  profile: LeadProfileSchema,
  recentTurns: z.array(TurnRecordSchema),
  consecutiveNoProgressCount: z.number().int().min(0),
  similarityWindow: z.array(z.string()).max(2),
  stageUserTurns: z.number().int().min(0),
  totalUserTurns: z.number().int().min(0),
  ended: z.boolean(),
}).superRefine((state, ctx) => {
  if (state.ended !== (state.stage === 'ended')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `ended flag (${state.ended}) disagrees with stage "${state.stage}"`,
      path: ['ended'],
    });
  }
});

export type OrchestratorState = z.infer<typeof OrchestratorStateSchema>;

export type PromptTemplateId = ActiveStage | 'ending' | 'ended';

// How the reply should sound after this turn's decision
export type PromptTone = 'natural' | 'transition' | 'move_on' | 'farewell';

export interface PromptContext {
  templateId: PromptTemplateId;
  stage: Stage;
  goal: string;
  tone: PromptTone;
  instruction: string;
  examples: string[];
  targetFields: FieldKey[];
  missingFields: FieldKey[];
  capturedFields: FieldMap;
  profileSummary: string;
}

export type EndReason = 'closing_complete' | 'farewell' | 'turn_ceiling';

export type { ConversationRecord, LeadRecord, MessageRecord } from './records.js';
