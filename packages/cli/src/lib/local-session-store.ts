import * as fs from 'fs';
import * as path from 'path';
import {
  ConversationRecordSchema,
  LeadRecordSchema,
  describeError,
  type ConversationRecord,
  type ConversationStore,
  type LeadRecord,
} from '@leadflow/runtime';
import type { z } from 'zod';

/**
 * JSON-file conversation store for local development.
 *
 * Layout: <dir>/conversations/<id>.json and <dir>/leads/<id>.json
 */
export class LocalSessionStore implements ConversationStore {
  private conversationDir: string;
  private leadDir: string;

  constructor(private sessionDir: string = '.local-sessions') {
    this.conversationDir = path.join(sessionDir, 'conversations');
    this.leadDir = path.join(sessionDir, 'leads');
    for (const dir of [this.conversationDir, this.leadDir]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
  }

  get directory(): string {
    return this.sessionDir;
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | undefined> {
    return this.readRecord(path.join(this.conversationDir, `${conversationId}.json`), ConversationRecordSchema);
  }

  async saveConversation(conversation: ConversationRecord): Promise<void> {
    this.writeRecord(path.join(this.conversationDir, `${conversation.id}.json`), conversation);
  }

  async listConversations(leadId?: string): Promise<ConversationRecord[]> {
    return this.readAll(this.conversationDir, ConversationRecordSchema)
      .filter(conversation => leadId === undefined || conversation.leadId === leadId)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async getLead(leadId: string): Promise<LeadRecord | undefined> {
    return this.readRecord(path.join(this.leadDir, `${leadId}.json`), LeadRecordSchema);
  }

  async saveLead(lead: LeadRecord): Promise<void> {
    this.writeRecord(path.join(this.leadDir, `${lead.id}.json`), lead);
  }

  async listLeads(): Promise<LeadRecord[]> {
    return this.readAll(this.leadDir, LeadRecordSchema)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  clearConversation(conversationId: string): void {
    const conversationPath = path.join(this.conversationDir, `${conversationId}.json`);
    if (fs.existsSync(conversationPath)) {
      fs.unlinkSync(conversationPath);
    }
  }

  private readAll<T>(dir: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const records: T[] = [];
    for (const file of fs.readdirSync(dir)) {
      if (!file.endsWith('.json')) {
        continue;
      }
      const record = this.readRecord(path.join(dir, file), schema);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private readRecord<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (!fs.existsSync(filePath)) {
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      console.error(`Failed to load ${filePath}: ${describeError(error)}`);
      return undefined;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      console.error(`Skipping malformed record ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return undefined;
    }
    return parsed.data;
  }

  private writeRecord(filePath: string, record: unknown): void {
    fs.writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');
  }
}
