import { ulid } from 'ulid';
import type {
  ConversationRecord,
  EndReason,
  LeadProfile,
  LeadRecord,
  MessageRecord,
  PromptContext,
  PromptTemplateId,
  Stage,
  TurnRole,
} from '../types/index.js';
import type { OrchestratorConfig } from './config.js';
import type { ConversationStore } from './conversation-store.js';
import { ConversationNotFoundError, describeError } from './errors.js';
import { GreetingService, type GreetingConfig } from './greeting-service.js';
import type { StructuredExtractor, TextGenerator } from './language-model.js';
import type { FieldUpdate } from './lead-profile.js';
import { StageOrchestrator, type OrchestratorFailure } from './stage-orchestrator.js';
import { renderPrompt } from './stage-instructions/index.js';

export interface ConversationSessionDeps {
  config: OrchestratorConfig;
  store: ConversationStore;
  generator: TextGenerator;
  structuredExtractor?: StructuredExtractor;
  greetingConfig?: GreetingConfig;
  now?: () => Date;
  random?: () => number;
}

export interface StartSessionOptions {
  /** Continue with an existing lead's profile */
  leadId?: string;
}

export interface SessionReply {
  success: true;
  reply: string;
  /** The generator failed and a canned reply was used */
  degraded: boolean;
  stage: Stage;
  advanced: boolean;
  forced: boolean;
  ending: boolean;
  endReason: EndReason | null;
  profile: Readonly<LeadProfile>;
  extracted: FieldUpdate;
  promptContext: PromptContext;
}

export type HandleMessageResult = SessionReply | OrchestratorFailure;

// Used when the text generator is unavailable
export const FALLBACK_REPLIES: Record<PromptTemplateId, string> = {
  introduction: "Thanks for reaching out! Could you tell me your name and which company you're with?",
  needs_identification: "Got it. What's the main challenge you're hoping to solve right now?",
  qualification: 'That helps. Do you have a rough budget and timeline in mind for this?',
  proposal: 'Based on what you shared, I think we have a good fit for you. Which option sounds most interesting?',
  closing: 'Would it make sense to set up a short call to go over the next steps?',
  ending: 'Thanks so much for your time. Have a great day!',
  ended: 'Thanks again. Take care!',
};

export const SUMMARY_FALLBACK = 'Automatic summary unavailable.';

export function buildSummaryPrompt(messages: readonly MessageRecord[]): string {
  const transcript = messages.map(message => `${message.role}: ${message.content}`).join('\n');

  return `Write a structured summary of the following conversation between a sales assistant and a prospect.

Include:
1. Key points
2. Lead information (name, company, role if mentioned)
3. Specific needs
4. Pain points
5. Budget or timeline, if mentioned
6. Objections or concerns
7. Agreed next step

Use short, clearly labelled sections.

Conversation:
${transcript}

Summary:`;
}

/**
 * Binds one StageOrchestrator to one persisted conversation.
 *
 * Messages are handled strictly one at a time; concurrent handleMessage()
 * calls queue behind each other.
 */
export class ConversationSession {
  private queue: Promise<unknown> = Promise.resolve();
  private now: () => Date;

  private constructor(
    private deps: ConversationSessionDeps,
    private orchestrator: StageOrchestrator,
    private record: ConversationRecord,
    private lead: LeadRecord | undefined
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Start a new conversation and record the greeting
   */
  static async start(deps: ConversationSessionDeps, options: StartSessionOptions = {}): Promise<ConversationSession> {
    const now = (deps.now ?? (() => new Date()))().toISOString();

    let lead: LeadRecord | undefined;
    if (options.leadId) {
      lead = await deps.store.getLead(options.leadId);
      if (!lead) {
        console.warn(`⚠️ Lead ${options.leadId} not found, starting with an empty profile`);
      }
    }

    const orchestrator = new StageOrchestrator({
      config: deps.config,
      structuredExtractor: deps.structuredExtractor,
      initialProfile: lead?.profile,
      now: deps.now,
    });

    const record: ConversationRecord = {
      id: ulid(),
      leadId: lead?.id,
      messages: [],
      state: orchestrator.getState(),
      createdAt: now,
      updatedAt: now,
    };

    const session = new ConversationSession(deps, orchestrator, record, lead);
    const greeting = GreetingService.generateGreeting(lead?.profile, deps.greetingConfig, deps.random);
    orchestrator.recordAssistantTurn(greeting);
    session.appendMessage('assistant', greeting);

    await session.persist();
    console.log(`🆕 Conversation ${record.id} started${lead ? ` for lead ${lead.id}` : ''}`);
    return session;
  }

  /**
   * Reload a persisted conversation and restore its orchestrator
   */
  static async resume(deps: ConversationSessionDeps, conversationId: string): Promise<ConversationSession> {
    const record = await deps.store.getConversation(conversationId);
    if (!record) {
      throw new ConversationNotFoundError(conversationId);
    }

    // Throws InvalidSnapshotError for corrupt state
    const orchestrator = StageOrchestrator.restoreState(record.state, {
      config: deps.config,
      structuredExtractor: deps.structuredExtractor,
      now: deps.now,
    });

    if (record.endedAt) {
      // Torn-down conversations stay closed across restarts
      orchestrator.close();
    }

    const lead = record.leadId ? await deps.store.getLead(record.leadId) : undefined;
    console.log(`🔄 Conversation ${record.id} resumed at stage ${orchestrator.currentStage}${record.endedAt ? ' (closed)' : ''}`);
    return new ConversationSession(deps, orchestrator, record, lead);
  }

  get id(): string {
    return this.record.id;
  }

  get stage(): Stage {
    return this.orchestrator.currentStage;
  }

  get leadId(): string | undefined {
    return this.lead?.id;
  }

  get isClosed(): boolean {
    return this.orchestrator.isClosed;
  }

  getProfile(): Readonly<LeadProfile> {
    return this.orchestrator.getProfile();
  }

  getRecord(): ConversationRecord {
    return structuredClone(this.record);
  }

  /**
   * Handle one user message. Calls are serialised per session.
   */
  handleMessage(text: string): Promise<HandleMessageResult> {
    return this.enqueue(() => this.processTurn(text));
  }

  /**
   * Tear the session down: summarise, stamp endedAt, persist and close
   */
  end(): Promise<void> {
    return this.enqueue(async () => {
      if (this.orchestrator.isClosed) {
        return;
      }
      if (!this.record.endedAt) {
        await this.finish();
      }
      this.orchestrator.close();
      await this.persist();
      console.log(`🏁 Conversation ${this.record.id} closed`);
    });
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    // Keep the chain alive after a failure; the caller still sees it through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async processTurn(text: string): Promise<HandleMessageResult> {
    const result = await this.orchestrator.processMessage(text);
    if (!result.success) {
      return result;
    }

    this.appendMessage('user', text.trim());

    let reply: string;
    let degraded = false;
    try {
      reply = await this.deps.generator.generate(renderPrompt(result.promptContext), this.orchestrator.getRecentTurns());
    } catch (error) {
      console.warn(`⚠️ Text generation failed, using canned reply: ${describeError(error)}`);
      reply = FALLBACK_REPLIES[result.promptContext.templateId];
      degraded = true;
    }

    this.orchestrator.recordAssistantTurn(reply);
    this.appendMessage('assistant', reply);

    if (result.ending) {
      await this.finish();
    }

    await this.persist();

    return {
      success: true,
      reply,
      degraded,
      stage: result.stage,
      advanced: result.advanced,
      forced: result.forced,
      ending: result.ending,
      endReason: result.endReason,
      profile: result.profile,
      extracted: result.extracted,
      promptContext: result.promptContext,
    };
  }

  /**
   * Generate the conversation summary and stamp endedAt
   */
  private async finish(): Promise<void> {
    try {
      this.record.summary = await this.deps.generator.generate(buildSummaryPrompt(this.record.messages), []);
      console.log(`📝 Summary generated for conversation ${this.record.id}`);
    } catch (error) {
      console.error(`❌ Failed to generate summary: ${describeError(error)}`);
      const known = this.orchestrator.getProfile().summary;
      this.record.summary = known ? `${SUMMARY_FALLBACK} Captured: ${known}` : SUMMARY_FALLBACK;
    }
    this.record.endedAt = this.now().toISOString();
  }

  private appendMessage(role: TurnRole, content: string): void {
    this.record.messages.push({
      id: ulid(),
      role,
      content,
      timestamp: this.now().toISOString(),
    });
  }

  /**
   * Save the conversation and upsert its lead once anything is known about it
   */
  private async persist(): Promise<void> {
    const timestamp = this.now().toISOString();
    const profile = this.orchestrator.getProfile();
    const knowsSomething = profile.summary !== '' || profile.contact.email !== undefined || profile.contact.phone !== undefined;

    if (this.lead || knowsSomething) {
      const lead: LeadRecord = this.lead ?? {
        id: ulid(),
        profile,
        stage: this.orchestrator.currentStage,
        conversationIds: [],
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      this.lead = {
        ...lead,
        profile: structuredClone(profile),
        stage: this.orchestrator.currentStage,
        conversationIds: lead.conversationIds.includes(this.record.id)
          ? lead.conversationIds
          : [...lead.conversationIds, this.record.id],
        updatedAt: timestamp,
      };
      this.record.leadId = this.lead.id;
      await this.deps.store.saveLead(this.lead);
    }

    this.record.state = this.orchestrator.getState();
    this.record.updatedAt = timestamp;
    await this.deps.store.saveConversation(this.record);
  }
}
