import {
  OrchestratorStateSchema,
  type ActiveStage,
  type EndReason,
  type LeadProfile,
  type OrchestratorState,
  type PromptContext,
  type PromptTemplateId,
  type PromptTone,
  type Stage,
  type TurnRecord,
  type TurnRole,
} from '../types/index.js';
import type { OrchestratorConfig } from './config.js';
import { CallerError, InvalidSnapshotError, describeError, toErrorInfo, type ErrorInfo } from './errors.js';
import { FarewellDetector } from './farewell-detector.js';
import { InfoExtractor, type ExtractionResult } from './info-extractor.js';
import type { StructuredExtractor } from './language-model.js';
import {
  createEmptyProfile,
  mergeContactDetails,
  mergeFieldUpdate,
  missingFields,
  snapshotProfile,
  type FieldUpdate,
} from './lead-profile.js';
import { STAGE_RULES, isActiveStage, nextStage } from './stage-rules.js';
import { getStageInstruction } from './stage-instructions/index.js';
import { StuckDetector } from './stuck-detector.js';

export interface StageOrchestratorDeps {
  config: OrchestratorConfig;
  /** Model fallback for the extractor; omitted means patterns only */
  structuredExtractor?: StructuredExtractor;
  /** Replaces the default extractor entirely */
  extractor?: InfoExtractor;
  /** Profile of a returning lead */
  initialProfile?: LeadProfile;
  now?: () => Date;
}

export type AdvanceResult =
  | { advanced: true; from: ActiveStage; to: ActiveStage }
  | { advanced: false; reason: 'already_ended' | 'terminal_stage' | 'session_closed' };

export interface AdvanceDecision {
  advance: boolean;
  /** True when the stage stalled rather than completing */
  forced: boolean;
}

export interface EndingSequenceResult {
  /** False when the conversation had already ended */
  started: boolean;
  promptContext: PromptContext;
}

export interface OrchestratorFailure {
  success: false;
  error: ErrorInfo;
}

export interface ProcessMessageSuccess {
  success: true;
  profile: Readonly<LeadProfile>;
  stage: Stage;
  advanced: boolean;
  forced: boolean;
  ending: boolean;
  endReason: EndReason | null;
  promptContext: PromptContext;
  /** Fields that changed on this turn */
  extracted: FieldUpdate;
}

export type ProcessMessageResult = ProcessMessageSuccess | OrchestratorFailure;

const TEMPLATE_GOALS: Record<'ending' | 'ended', string> = {
  ending: 'Close the conversation gracefully',
  ended: 'Acknowledge politely; the conversation is already over',
};

/**
 * Stage Orchestrator
 *
 * Owns the stage, the lead profile and the recent turn window of one
 * conversation. Every user turn goes through processMessage(), which always
 * runs the same sequence: record the turn, extract and merge fields, update
 * stall tracking, check for an ending, check for advancement, then build the
 * prompt context for the text generator.
 *
 * Not safe for concurrent use: a second processMessage() while one is in
 * flight is rejected with TURN_IN_PROGRESS.
 */
export class StageOrchestrator {
  private config: OrchestratorConfig;
  private extractor: InfoExtractor;
  private farewellDetector: FarewellDetector;
  private stuckDetector: StuckDetector;
  private now: () => Date;

  private stage: Stage = 'introduction';
  private profile: LeadProfile;
  private recentTurns: TurnRecord[] = [];
  private stageUserTurns = 0;
  private totalUserTurns = 0;

  private closed = false;
  private turnInFlight = false;

  constructor(deps: StageOrchestratorDeps) {
    this.config = deps.config;
    this.extractor = deps.extractor ?? new InfoExtractor({
      structuredExtractor: deps.structuredExtractor,
      timeoutMs: deps.config.extractionTimeoutMs,
    });
    this.farewellDetector = new FarewellDetector(deps.config.farewellPhrases);
    this.stuckDetector = new StuckDetector(deps.config.stall, this.stage);
    this.now = deps.now ?? (() => new Date());
    this.profile = deps.initialProfile ? structuredClone(deps.initialProfile) : createEmptyProfile();
  }

  /**
   * Rebuild an orchestrator from a persisted snapshot. Throws
   * InvalidSnapshotError for anything that does not validate.
   */
  static restoreState(state: unknown, deps: StageOrchestratorDeps): StageOrchestrator {
    const parsed = OrchestratorStateSchema.safeParse(state);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'state'}: ${issue.message}`);
      console.error(`❌ Refusing to restore orchestrator: ${issues.join('; ')}`);
      throw new InvalidSnapshotError(issues);
    }

    const orchestrator = new StageOrchestrator(deps);
    orchestrator.applyState(parsed.data);
    return orchestrator;
  }

  get currentStage(): Stage {
    return this.stage;
  }

  get isEnded(): boolean {
    return this.stage === 'ended';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getProfile(): Readonly<LeadProfile> {
    return snapshotProfile(this.profile);
  }

  /**
   * Process one user turn
   */
  async processMessage(utterance: string): Promise<ProcessMessageResult> {
    if (this.closed) {
      return this.fail(new CallerError('SESSION_CLOSED', 'Orchestrator has been closed'));
    }
    if (this.turnInFlight) {
      return this.fail(new CallerError('TURN_IN_PROGRESS', 'Another message is still being processed'));
    }

    const text = typeof utterance === 'string' ? utterance.trim() : '';
    if (!text) {
      return this.fail(new CallerError('EMPTY_UTTERANCE', 'Utterance must be a non-empty string'));
    }

    this.turnInFlight = true;
    try {
      return await this.runTurn(text);
    } finally {
      this.turnInFlight = false;
    }
  }

  private async runTurn(text: string): Promise<ProcessMessageResult> {
    const lastAssistantTurn = this.lastTurnText('assistant');

    // 1. Record the turn
    const turn = this.appendTurn('user', text);

    if (this.stage === 'ended') {
      return this.success({
        ending: false,
        endReason: null,
        promptContext: this.buildPromptContext('ended', 'natural'),
        extracted: {},
      });
    }

    this.totalUserTurns++;
    this.stageUserTurns++;

    // 2. Extract and merge
    const extraction = await this.runExtraction(text, lastAssistantTurn);
    if (this.closed) {
      // Closed while extracting; the late result is discarded
      return this.fail(new CallerError('SESSION_CLOSED', 'Orchestrator was closed during the turn'));
    }
    const merged = mergeFieldUpdate(this.profile, extraction.fields);
    this.profile = mergeContactDetails(merged.profile, extraction.contact);

    // 3. Stall tracking
    this.stuckDetector.observe(turn, this.stage, merged.changed);

    // 4. Ending
    const endReason = this.shouldEndConversation(text);
    if (endReason) {
      console.log(`👋 Ending conversation (${endReason}) from stage ${this.stage}`);
      const { promptContext } = this.startEndingSequence();
      return this.success({ ending: true, endReason, promptContext, extracted: merged.changed });
    }

    // 5. Advancement
    const decision = this.shouldAdvanceStage();
    let advanced = false;
    let forced = false;
    if (decision.advance) {
      const result = this.advanceStage();
      advanced = result.advanced;
      forced = advanced && decision.forced;
    }

    // 6. Prompt for the (possibly new) stage
    const tone: PromptTone = !advanced ? 'natural' : forced ? 'move_on' : 'transition';
    return this.success({
      advanced,
      forced,
      ending: false,
      endReason: null,
      promptContext: this.buildPromptContext(this.templateFor(this.stage), tone),
      extracted: merged.changed,
    });
  }

  private async runExtraction(text: string, lastAssistantTurn: string | undefined): Promise<ExtractionResult> {
    try {
      return await this.extractor.extract(text, snapshotProfile(this.profile), { lastAssistantTurn });
    } catch (error) {
      // The extractor is not expected to throw; keep the turn going if it does
      console.error(`❌ Extraction failed unexpectedly: ${describeError(error)}`);
      return { fields: {}, contact: {}, sources: {}, modelStatus: 'failed' };
    }
  }

  /**
   * Move to the next stage. Never throws; a refused move is reported in the result.
   */
  advanceStage(): AdvanceResult {
    if (this.closed) {
      return { advanced: false, reason: 'session_closed' };
    }
    if (!isActiveStage(this.stage)) {
      return { advanced: false, reason: 'already_ended' };
    }

    const from = this.stage;
    const to = nextStage(from);
    if (!to) {
      // closing only exits through the ending sequence
      return { advanced: false, reason: 'terminal_stage' };
    }

    this.stage = to;
    this.stageUserTurns = 0;
    this.stuckDetector.reset(to);
    console.log(`➡️ Stage advanced: ${from} → ${to}`);
    return { advanced: true, from, to };
  }

  shouldAdvanceStage(): AdvanceDecision {
    if (!isActiveStage(this.stage) || this.stage === 'closing') {
      return { advance: false, forced: false };
    }

    const rule = STAGE_RULES[this.stage];
    const complete = missingFields(this.profile.fields, rule.requiredFields).length === 0;
    if (complete && this.stageUserTurns >= rule.minTurnsBeforeEligible) {
      return { advance: true, forced: false };
    }

    if (this.stuckDetector.isStalled()) {
      return { advance: true, forced: true };
    }

    return { advance: false, forced: false };
  }

  /**
   * Why the conversation should end after this utterance, or null
   */
  shouldEndConversation(utterance: string): EndReason | null {
    if (!isActiveStage(this.stage)) {
      return null;
    }

    if (this.stage === 'closing' && this.stageUserTurns >= STAGE_RULES.closing.minTurnsBeforeEligible) {
      return 'closing_complete';
    }

    const farewell = this.farewellDetector.detect(utterance);
    if (farewell) {
      console.log(`👋 Farewell detected: "${farewell}"`);
      return 'farewell';
    }

    if (this.totalUserTurns >= this.config.maxConversationTurns) {
      return 'turn_ceiling';
    }

    return null;
  }

  /**
   * Move to `ended`. Only the first call returns the `ending` template.
   */
  startEndingSequence(): EndingSequenceResult {
    if (this.stage === 'ended') {
      return { started: false, promptContext: this.buildPromptContext('ended', 'natural') };
    }

    this.stage = 'ended';
    this.stuckDetector.reset('ended');
    return { started: true, promptContext: this.buildPromptContext('ending', 'farewell') };
  }

  /**
   * Record what the assistant said. History only; no extraction or stage logic.
   */
  recordAssistantTurn(text: string): { success: true } | OrchestratorFailure {
    if (this.closed) {
      return this.fail(new CallerError('SESSION_CLOSED', 'Orchestrator has been closed'));
    }
    this.appendTurn('assistant', text);
    return { success: true };
  }

  /**
   * Deep-copied snapshot for persistence
   */
  getState(): OrchestratorState {
    const stall = this.stuckDetector.toSnapshot();
    return structuredClone({
      version: 1 as const,
      stage: this.stage,
      profile: this.profile,
      recentTurns: this.recentTurns,
      consecutiveNoProgressCount: stall.consecutiveNoProgressCount,
      similarityWindow: stall.similarityWindow,
      stageUserTurns: this.stageUserTurns,
      totalUserTurns: this.totalUserTurns,
      ended: this.stage === 'ended',
    });
  }

  getRecentTurns(): TurnRecord[] {
    return structuredClone(this.recentTurns);
  }

  /**
   * Tear down. Every later call reports SESSION_CLOSED.
   */
  close(): void {
    this.closed = true;
  }

  private applyState(state: OrchestratorState): void {
    const copy = structuredClone(state);
    this.stage = copy.stage;
    this.profile = copy.profile;
    this.recentTurns = copy.recentTurns.slice(-this.config.recentTurnWindow);
    this.stageUserTurns = copy.stageUserTurns;
    this.totalUserTurns = copy.totalUserTurns;
    this.stuckDetector = StuckDetector.fromSnapshot(this.config.stall, {
      stage: copy.stage,
      consecutiveNoProgressCount: copy.consecutiveNoProgressCount,
      similarityWindow: copy.similarityWindow,
    });
  }

  private appendTurn(role: TurnRole, text: string): TurnRecord {
    const turn: TurnRecord = { role, text, timestamp: this.now().toISOString() };
    this.recentTurns = [...this.recentTurns, turn].slice(-this.config.recentTurnWindow);
    return turn;
  }

  private lastTurnText(role: TurnRole): string | undefined {
    for (let i = this.recentTurns.length - 1; i >= 0; i--) {
      if (this.recentTurns[i].role === role) {
        return this.recentTurns[i].text;
      }
    }
    return undefined;
  }

  private templateFor(stage: Stage): PromptTemplateId {
    return isActiveStage(stage) ? STAGE_RULES[stage].templateId : 'ended';
  }

  private buildPromptContext(templateId: PromptTemplateId, tone: PromptTone): PromptContext {
    const stage = this.stage;
    const required = isActiveStage(stage) ? STAGE_RULES[stage].requiredFields : [];
    const missing = missingFields(this.profile.fields, required);
    const capturedFields = { ...this.profile.fields };

    const { instruction, examples, targetFields } = getStageInstruction({
      templateId,
      stage,
      missingFields: missing,
      capturedFields,
      tone,
      profileSummary: this.profile.summary,
    });

    const goal = templateId === 'ending' || templateId === 'ended'
      ? TEMPLATE_GOALS[templateId]
      : STAGE_RULES[templateId].goal;

    return {
      templateId,
      stage,
      goal,
      tone,
      instruction,
      examples: examples ?? [],
      targetFields,
      missingFields: missing,
      capturedFields,
      profileSummary: this.profile.summary,
    };
  }

  private success(
    outcome: Pick<ProcessMessageSuccess, 'ending' | 'endReason' | 'promptContext' | 'extracted'> &
      Partial<Pick<ProcessMessageSuccess, 'advanced' | 'forced'>>
  ): ProcessMessageSuccess {
    return {
      success: true,
      profile: snapshotProfile(this.profile),
      stage: this.stage,
      advanced: outcome.advanced ?? false,
      forced: outcome.forced ?? false,
      ending: outcome.ending,
      endReason: outcome.endReason,
      promptContext: outcome.promptContext,
      extracted: outcome.extracted,
    };
  }

  private fail(error: CallerError): OrchestratorFailure {
    console.warn(`⚠️ ${error.code}: ${error.message}`);
    return { success: false, error: toErrorInfo(error) };
  }
}
