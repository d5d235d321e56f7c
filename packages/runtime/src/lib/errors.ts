/**
 * Error taxonomy for the conversation engine.
 *
 * Caller errors are returned to the session as structured results, collaborator
 * errors are absorbed with a fallback, and snapshot corruption is thrown.
 */

export type CallerErrorCode = 'EMPTY_UTTERANCE' | 'SESSION_CLOSED' | 'TURN_IN_PROGRESS';

export type LeadFlowErrorCode =
  | CallerErrorCode
  | 'GENERATION_FAILED'
  | 'EXTRACTION_FAILED'
  | 'EXTRACTION_TIMEOUT'
  | 'INVALID_SNAPSHOT'
  | 'CONVERSATION_NOT_FOUND'
  | 'INVALID_CONFIG';

export class LeadFlowError extends Error {
  readonly code: LeadFlowErrorCode;

  constructor(code: LeadFlowErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CallerError extends LeadFlowError {
  declare readonly code: CallerErrorCode;

  constructor(code: CallerErrorCode, message: string) {
    super(code, message);
  }
}

export class GenerationError extends LeadFlowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class ExtractionError extends LeadFlowError {
  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(options?.timedOut ? 'EXTRACTION_TIMEOUT' : 'EXTRACTION_FAILED', message, options);
  }
}

export class InvalidSnapshotError extends LeadFlowError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_SNAPSHOT', `Orchestrator snapshot is invalid: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConversationNotFoundError extends LeadFlowError {
  constructor(conversationId: string) {
    super('CONVERSATION_NOT_FOUND', `Conversation not found: ${conversationId}`);
  }
}

export class ConfigError extends LeadFlowError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/**
 * Plain shape returned to callers in failed results
 */
export interface ErrorInfo {
  code: LeadFlowErrorCode;
  message: string;
}

export function toErrorInfo(error: LeadFlowError): ErrorInfo {
  return { code: error.code, message: error.message };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
