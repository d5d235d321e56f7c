import type { ConversationRecord, LeadRecord } from '../types/index.js';

/**
 * Persistence for conversations and leads. The engine never touches this;
 * ConversationSession calls it after each turn.
 */
export interface ConversationStore {
  getConversation(conversationId: string): Promise<ConversationRecord | undefined>;
  saveConversation(conversation: ConversationRecord): Promise<void>;
  listConversations(leadId?: string): Promise<ConversationRecord[]>;
  getLead(leadId: string): Promise<LeadRecord | undefined>;
  saveLead(lead: LeadRecord): Promise<void>;
  listLeads(): Promise<LeadRecord[]>;
}

/**
 * Simple in-memory store for development/testing
 * No persistence; records are cloned in and out
 */
export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, ConversationRecord>();
  private leads = new Map<string, LeadRecord>();

  async getConversation(conversationId: string): Promise<ConversationRecord | undefined> {
    const conversation = this.conversations.get(conversationId);
    return conversation ? structuredClone(conversation) : undefined;
  }

  async saveConversation(conversation: ConversationRecord): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async listConversations(leadId?: string): Promise<ConversationRecord[]> {
    return [...this.conversations.values()]
      .filter(conversation => leadId === undefined || conversation.leadId === leadId)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .map(conversation => structuredClone(conversation));
  }

  async getLead(leadId: string): Promise<LeadRecord | undefined> {
    const lead = this.leads.get(leadId);
    return lead ? structuredClone(lead) : undefined;
  }

  async saveLead(lead: LeadRecord): Promise<void> {
    this.leads.set(lead.id, structuredClone(lead));
  }

  async listLeads(): Promise<LeadRecord[]> {
    return [...this.leads.values()]
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .map(lead => structuredClone(lead));
  }

  clear(): void {
    this.conversations.clear();
    this.leads.clear();
  }
}
