import type { LeadProfile } from '../types/index.js';

export interface GreetingConfig {
  /** Greetings for a new prospect */
  variations: string[];
  /** Greetings for a returning lead; may use {{name}} and {{company}} */
  returning?: string[];
}

export const DEFAULT_GREETING_CONFIG: GreetingConfig = {
  variations: [
    "Hi! I'm LeadFlow, a virtual assistant. I'd love to learn a bit about you and what you're looking for. Could we start with your name?",
    "Hello, I'm LeadFlow! Before anything else, who am I speaking with, and which company are you with?",
    "Hi there, I'm LeadFlow. I'm here to understand what you need and see how we can help. What's your name?",
  ],
  returning: [
    'Welcome back, {{name}}! Last time we talked about {{company}}. What would you like to pick up on?',
    "Good to see you again, {{name}}. How are things going at {{company}}?",
  ],
};

/**
 * Service for generating randomized greetings
 */
export class GreetingService {
  /**
   * Pick a greeting. Returning leads with a known name get a personal one.
   */
  static generateGreeting(
    profile?: Readonly<LeadProfile>,
    greetingConfig: GreetingConfig = DEFAULT_GREETING_CONFIG,
    random: () => number = Math.random
  ): string {
    const name = profile?.fields.name;
    const pool = name && greetingConfig.returning && greetingConfig.returning.length > 0
      ? greetingConfig.returning
      : greetingConfig.variations;

    if (pool.length === 0) {
      return "Hello! How can I help you today?";
    }

    const greeting = pool[Math.floor(random() * pool.length) % pool.length];

    return greeting
      .replace(/\{\{name\}\}/g, name ?? 'there')
      .replace(/\{\{company\}\}/g, profile?.fields.company ?? 'your team');
  }
}
