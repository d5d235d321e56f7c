import type { TurnRecord } from '../types/index.js';
import { createTestConfig } from './config.js';
import {
  ConversationSession,
  FALLBACK_REPLIES,
  SUMMARY_FALLBACK,
  type ConversationSessionDeps,
  type HandleMessageResult,
} from './conversation-session.js';
import { MemoryConversationStore } from './conversation-store.js';
import { ConversationNotFoundError, GenerationError, InvalidSnapshotError } from './errors.js';
import { DEFAULT_GREETING_CONFIG } from './greeting-service.js';
import type { TextGenerator } from './language-model.js';
import { createProfile } from './lead-profile.js';

const FIXED_NOW = new Date('2026-01-01T10:00:00.000Z');

class FakeGenerator implements TextGenerator {
  prompts: string[] = [];
  histories: TurnRecord[][] = [];
  fail = false;

  constructor(private replies: string[] = []) {}

  async generate(prompt: string, history: readonly TurnRecord[]): Promise<string> {
    this.prompts.push(prompt);
    this.histories.push([...history]);
    if (this.fail) {
      throw new GenerationError('model offline');
    }
    return this.replies.shift() ?? 'Tell me more.';
  }
}

function expectReply(result: HandleMessageResult) {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}`);
  }
  return result;
}

describe('ConversationSession', () => {
  let store: MemoryConversationStore;
  let generator: FakeGenerator;
  let deps: ConversationSessionDeps;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new MemoryConversationStore();
    generator = new FakeGenerator();
    deps = {
      config: createTestConfig().orchestrator,
      store,
      generator,
      now: () => FIXED_NOW,
      random: () => 0,
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('start', () => {
    it('should greet and persist the new conversation', async () => {
      const session = await ConversationSession.start(deps);

      const record = await store.getConversation(session.id);
      expect(record?.messages.map(message => message.content)).toEqual([DEFAULT_GREETING_CONFIG.variations[0]]);
      expect(record?.messages[0].role).toBe('assistant');
      expect(record?.createdAt).toBe('2026-01-01T10:00:00.000Z');
      expect(session.stage).toBe('introduction');
      expect(session.leadId).toBeUndefined();
      expect(await store.listLeads()).toEqual([]);
    });

    it('should greet a returning lead by name and keep their profile', async () => {
      await store.saveLead({
        id: 'lead-1',
        profile: createProfile({ fields: { name: 'Jane', company: 'Acme' } }),
        stage: 'qualification',
        conversationIds: ['older-conversation'],
        createdAt: '2025-12-01T10:00:00.000Z',
        updatedAt: '2025-12-01T10:00:00.000Z',
      });

      const session = await ConversationSession.start(deps, { leadId: 'lead-1' });

      expect(session.getRecord().messages[0].content).toBe(
        'Welcome back, Jane! Last time we talked about Acme. What would you like to pick up on?'
      );
      expect(session.getProfile().fields).toEqual({ name: 'Jane', company: 'Acme' });
      expect(session.leadId).toBe('lead-1');

      const lead = await store.getLead('lead-1');
      expect(lead?.conversationIds).toEqual(['older-conversation', session.id]);
    });

    it('should fall back to a fresh profile for an unknown lead', async () => {
      const session = await ConversationSession.start(deps, { leadId: 'missing' });

      expect(session.getProfile().fields).toEqual({});
      expect(session.getRecord().messages[0].content).toBe(DEFAULT_GREETING_CONFIG.variations[0]);
    });
  });

  describe('handleMessage', () => {
    it('should run the turn, prompt the generator and create the lead', async () => {
      generator = new FakeGenerator(['Nice to meet you, Jane! What brings you here?']);
      const session = await ConversationSession.start({ ...deps, generator });

      const result = expectReply(await session.handleMessage("Hi, I'm Jane from Acme"));

      expect(result.reply).toBe('Nice to meet you, Jane! What brings you here?');
      expect(result.degraded).toBe(false);
      expect(result.stage).toBe('needs_identification');
      expect(result.advanced).toBe(true);
      expect(generator.prompts[0].startsWith('CURRENT GOAL (needs_identification):')).toBe(true);
      expect(generator.histories[0].map(turn => turn.role)).toEqual(['assistant', 'user']);

      const record = session.getRecord();
      expect(record.messages.map(message => message.role)).toEqual(['assistant', 'user', 'assistant']);
      expect(record.leadId).toBeDefined();

      const leads = await store.listLeads();
      expect(leads).toHaveLength(1);
      expect(leads[0].id).toBe(session.leadId);
      expect(leads[0].profile.summary).toBe('Jane at Acme');
      expect(leads[0].stage).toBe('needs_identification');
      expect(leads[0].conversationIds).toEqual([session.id]);
    });

    it('should use a canned reply when generation fails', async () => {
      generator.fail = true;
      const session = await ConversationSession.start(deps);

      const result = expectReply(await session.handleMessage("Hi, I'm Jane from Acme"));

      expect(result.degraded).toBe(true);
      expect(result.reply).toBe(FALLBACK_REPLIES.needs_identification);
      expect(session.getRecord().messages[2].content).toBe(FALLBACK_REPLIES.needs_identification);
    });

    it('should process concurrent messages one after the other', async () => {
      const session = await ConversationSession.start(deps);

      const [first, second] = await Promise.all([
        session.handleMessage("Hi, I'm Jane from Acme"),
        session.handleMessage('We need a better CRM because our biggest problem is lost follow-ups'),
      ]);

      expect(expectReply(first).stage).toBe('needs_identification');
      expect(expectReply(second).stage).toBe('qualification');
      expect(session.getRecord().messages.map(message => message.role)).toEqual([
        'assistant',
        'user',
        'assistant',
        'user',
        'assistant',
      ]);
    });

    it('should pass caller errors through without recording anything', async () => {
      const session = await ConversationSession.start(deps);

      const result = await session.handleMessage('  ');

      expect(result.success).toBe(false);
      expect(result.success === false && result.error.code).toBe('EMPTY_UTTERANCE');
      expect(session.getRecord().messages).toHaveLength(1);
    });

    it('should summarise and stamp endedAt when the conversation ends', async () => {
      generator = new FakeGenerator(['Thanks for stopping by!', 'Lead left early.']);
      const session = await ConversationSession.start({ ...deps, generator });

      const result = expectReply(await session.handleMessage('Bye'));

      expect(result.ending).toBe(true);
      expect(result.endReason).toBe('farewell');
      expect(result.reply).toBe('Thanks for stopping by!');
      expect(generator.prompts[1].startsWith('Write a structured summary')).toBe(true);

      const record = await store.getConversation(session.id);
      expect(record?.summary).toBe('Lead left early.');
      expect(record?.endedAt).toBe('2026-01-01T10:00:00.000Z');
    });

    it('should store a fallback summary when summarising fails', async () => {
      generator.fail = true;
      const session = await ConversationSession.start(deps);

      const result = expectReply(await session.handleMessage('Bye'));

      expect(result.reply).toBe(FALLBACK_REPLIES.ending);
      expect(session.getRecord().summary).toBe(SUMMARY_FALLBACK);
    });

    it('should include the captured profile in a fallback summary', async () => {
      const session = await ConversationSession.start(deps);
      await session.handleMessage("Hi, I'm Jane from Acme");
      generator.fail = true;

      await session.handleMessage('Goodbye');

      expect(session.getRecord().summary).toBe(`${SUMMARY_FALLBACK} Captured: Jane at Acme`);
    });
  });

  describe('end', () => {
    it('should close the session so later messages are refused', async () => {
      generator = new FakeGenerator(['Hello!', 'Short chat.']);
      const session = await ConversationSession.start({ ...deps, generator });
      await session.handleMessage('hello');

      await session.end();
      const result = await session.handleMessage('are you still there?');

      expect(session.isClosed).toBe(true);
      expect(result.success === false && result.error.code).toBe('SESSION_CLOSED');
      const record = await store.getConversation(session.id);
      expect(record?.summary).toBe('Short chat.');
      expect(record?.endedAt).toBe('2026-01-01T10:00:00.000Z');
    });

    it('should be safe to call twice', async () => {
      const session = await ConversationSession.start(deps);

      await session.end();
      await session.end();

      expect(generator.prompts).toHaveLength(1);
    });
  });

  describe('resume', () => {
    it('should continue where the stored conversation left off', async () => {
      const session = await ConversationSession.start(deps);
      await session.handleMessage("Hi, I'm Jane from Acme");

      const resumed = await ConversationSession.resume(deps, session.id);

      expect(resumed.stage).toBe('needs_identification');
      expect(resumed.getProfile().fields).toEqual({ name: 'Jane', company: 'Acme' });
      expect(resumed.leadId).toBe(session.leadId);

      const result = expectReply(
        await resumed.handleMessage('We need a better CRM because our biggest problem is lost follow-ups')
      );
      expect(result.stage).toBe('qualification');
    });

    it('should keep an ended conversation closed', async () => {
      generator = new FakeGenerator(['Hello Jane!', 'Jane from Acme said hi.']);
      const session = await ConversationSession.start({ ...deps, generator });
      await session.handleMessage("Hi, I'm Jane from Acme");
      await session.end();

      const resumed = await ConversationSession.resume(deps, session.id);
      const result = await resumed.handleMessage('We need a CRM because we are struggling with spreadsheets');
      await resumed.end();

      expect(resumed.isClosed).toBe(true);
      expect(result.success === false && result.error.code).toBe('SESSION_CLOSED');
      const record = await store.getConversation(session.id);
      expect(record?.messages).toHaveLength(3);
      expect(record?.summary).toBe('Jane from Acme said hi.');
      expect(resumed.stage).toBe('needs_identification');
    });

    it('should reject an unknown conversation id', async () => {
      await expect(ConversationSession.resume(deps, 'nope')).rejects.toThrow(ConversationNotFoundError);
    });

    it('should reject a conversation with a corrupt state', async () => {
      const session = await ConversationSession.start(deps);
      await store.saveConversation({ ...session.getRecord(), state: { stage: 'negotiation' } });

      await expect(ConversationSession.resume(deps, session.id)).rejects.toThrow(InvalidSnapshotError);
    });
  });
});
