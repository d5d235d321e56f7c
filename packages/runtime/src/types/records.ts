import { z } from 'zod';
import { LeadProfileSchema, StageSchema, TurnRoleSchema } from './index.js';

// Message item as persisted by a conversation store
export const MessageRecordSchema = z.object({
  id: z.string(), // ULID
  role: TurnRoleSchema,
  content: z.string(),
  timestamp: z.string(),
});

export type MessageRecord = z.infer<typeof MessageRecordSchema>;

export const ConversationRecordSchema = z.object({
  id: z.string(), // ULID
  leadId: z.string().optional(),
  messages: z.array(MessageRecordSchema),
  // Validated separately on resume so corruption surfaces as InvalidSnapshotError
  state: z.unknown(),
  summary: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  endedAt: z.string().optional(),
});

export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;

export const LeadRecordSchema = z.object({
  id: z.string(),
  profile: LeadProfileSchema,
  stage: StageSchema,
  conversationIds: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type LeadRecord = z.infer<typeof LeadRecordSchema>;
