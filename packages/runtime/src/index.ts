// Types and schemas
export * from './types/index.js';
export { ConversationRecordSchema, LeadRecordSchema, MessageRecordSchema } from './types/records.js';

// Engine
export * from './lib/lead-profile.js';
export * from './lib/info-extractor.js';
export * from './lib/stage-rules.js';
export * from './lib/stuck-detector.js';
export * from './lib/text-similarity.js';
export * from './lib/farewell-detector.js';
export * from './lib/stage-orchestrator.js';
export { getStageInstruction, renderPrompt, type StageInstruction, type StageInstructionContext } from './lib/stage-instructions/index.js';

// Session
export * from './lib/conversation-session.js';
export * from './lib/conversation-store.js';
export * from './lib/greeting-service.js';

// Language models
export * from './lib/language-model.js';
export * from './lib/bedrock-language-model.js';
export * from './lib/local-language-model.js';
export * from './lib/fallback-language-model.js';
export * from './lib/language-model-factory.js';

// Ambient
export * from './lib/config.js';
export * from './lib/errors.js';
export * from './lib/timeout.js';
