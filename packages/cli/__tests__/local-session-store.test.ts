import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProfile, type ConversationRecord, type LeadRecord } from '@leadflow/runtime';
import { LocalSessionStore } from '../src/lib/local-session-store.js';

function conversation(id: string, updatedAt: string, leadId?: string): ConversationRecord {
  return {
    id,
    leadId,
    messages: [{ id: `${id}-m1`, role: 'assistant', content: 'Hello!', timestamp: updatedAt }],
    state: { stage: 'introduction' },
    createdAt: updatedAt,
    updatedAt,
  };
}

describe('LocalSessionStore', () => {
  let dir: string;
  let store: LocalSessionStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leadflow-store-'));
    store = new LocalSessionStore(dir);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create its directories', () => {
    expect(fs.existsSync(path.join(dir, 'conversations'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'leads'))).toBe(true);
    expect(store.directory).toBe(dir);
  });

  it('should round-trip a conversation through disk', async () => {
    const record = conversation('c1', '2026-01-01T10:00:00.000Z');

    await store.saveConversation(record);

    expect(await store.getConversation('c1')).toEqual(record);
    expect(await new LocalSessionStore(dir).getConversation('c1')).toEqual(record);
  });

  it('should return undefined for a missing conversation', async () => {
    expect(await store.getConversation('nope')).toBeUndefined();
  });

  it('should list conversations newest first, optionally by lead', async () => {
    await store.saveConversation(conversation('old', '2026-01-01T10:00:00.000Z', 'lead-1'));
    await store.saveConversation(conversation('new', '2026-01-02T10:00:00.000Z', 'lead-1'));
    await store.saveConversation(conversation('other', '2026-01-03T10:00:00.000Z', 'lead-2'));

    expect((await store.listConversations()).map(c => c.id)).toEqual(['other', 'new', 'old']);
    expect((await store.listConversations('lead-1')).map(c => c.id)).toEqual(['new', 'old']);
  });

  it('should skip files that are not valid records', async () => {
    await store.saveConversation(conversation('good', '2026-01-01T10:00:00.000Z'));
    fs.writeFileSync(path.join(dir, 'conversations', 'broken.json'), '{not json', 'utf-8');
    fs.writeFileSync(path.join(dir, 'conversations', 'wrong.json'), JSON.stringify({ id: 'wrong' }), 'utf-8');

    expect((await store.listConversations()).map(c => c.id)).toEqual(['good']);
    expect(await store.getConversation('broken')).toBeUndefined();
    expect(console.error).toHaveBeenCalled();
  });

  it('should save and list leads', async () => {
    const lead: LeadRecord = {
      id: 'lead-1',
      profile: createProfile({ fields: { name: 'Jane', company: 'Acme' }, contact: { email: 'jane@example.com' } }),
      stage: 'proposal',
      conversationIds: ['c1'],
      createdAt: '2026-01-01T10:00:00.000Z',
      updatedAt: '2026-01-01T10:00:00.000Z',
    };

    await store.saveLead(lead);

    expect(await store.getLead('lead-1')).toEqual(lead);
    expect(await store.listLeads()).toEqual([lead]);
  });

  it('should delete a conversation file', async () => {
    await store.saveConversation(conversation('c1', '2026-01-01T10:00:00.000Z'));

    store.clearConversation('c1');
    store.clearConversation('c1');

    expect(await store.getConversation('c1')).toBeUndefined();
  });
});
