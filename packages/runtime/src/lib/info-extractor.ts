import { FIELD_KEYS, type ContactDetails, type FieldKey, type LeadProfile } from '../types/index.js';
import { ExtractionError, describeError } from './errors.js';
import type { StructuredExtractor } from './language-model.js';
import { hasField, normalizeFieldValue, type FieldUpdate } from './lead-profile.js';
import { withTimeout } from './timeout.js';

export type ExtractionSource = 'pattern' | 'model';
export type ModelPassStatus = 'skipped' | 'ok' | 'failed' | 'timeout';

export interface ExtractionContext {
  /** What we said right before this utterance; some rules only fire in reply to a question */
  lastAssistantTurn?: string;
}

export interface DeterministicExtraction {
  fields: FieldUpdate;
  contact: ContactDetails;
}

export interface ExtractionResult extends DeterministicExtraction {
  sources: Partial<Record<FieldKey, ExtractionSource>>;
  modelStatus: ModelPassStatus;
}

export interface InfoExtractorOptions {
  structuredExtractor?: StructuredExtractor;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 8000;

const ROLE_TITLES =
  'co-?founder|founder|owner|ceo|cto|cfo|coo|cmo|cio|president|vice president|vp|head|director|manager|lead|engineer|developer|consultant|partner|analyst|administrator|coordinator|specialist';

const ROLE_PHRASE = `((?:[a-z-]+\\s+)?(?:${ROLE_TITLES})(?:\\s+of\\s+[a-z]+)?)\\b`;

export class InfoExtractor {
  private structuredExtractor?: StructuredExtractor;
  private timeoutMs: number;

  // Email regex patterns
  private emailPatterns = [
    /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/,
    /\b[A-Za-z0-9._%+-]+\s*@\s*[A-Za-z0-9.-]+\s*\.\s*[A-Za-z]{2,}\b/ // With spaces
  ];

  // Phone regex patterns
  private phonePatterns = [
    /\(\d{3}\)\s*\d{3}[-.]?\d{4}/, // (954) 682-3329
    /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/, // 123-456-7890, 123.456.7890, 1234567890
    /\+?1?[-.\s]?\(?(\d{3})\)?[-.\s]?(\d{3})[-.\s]?(\d{4})\b/ // Various formats with +1
  ];

  private nameIntroPattern = /\b(?:my name is|my name's|name is|i'm|i am|im|call me|this is)\s+/gi;
  private capitalizedNamePattern = /^([A-Z][\p{L}'’-]*(?:\s+[A-Z][\p{L}'’-]*)?)/u;

  private companyIntroPattern =
    /\b(?:from|work(?:ing)? (?:at|for)|employed (?:at|by)|(?:my|our) company(?: is|,)?|company called|represent(?:ing)?)\s+/gi;
  // "calling from New York" names a place, not an employer
  private placeLeadInPattern = /\b(?:calling|writing|coming|texting|messaging|reaching out|based|located|living|visiting)\s+$/i;
  private yearPattern = /^(?:19|20)\d{2}$/;
  private companyNamePattern =
    /^([A-Z0-9][\p{L}\p{N}&'’-]*(?:\.[\p{L}\p{N}]+)*(?:[ \t]+[A-Z0-9&][\p{L}\p{N}&'’-]*(?:\.[\p{L}\p{N}]+)*)*)/u;

  private rolePatterns = [
    new RegExp(`\\b(?:i'm|i am|im|i work as|working as|my (?:role|title|position) is)\\s+(?:the\\s+|a\\s+|an\\s+|our\\s+)?${ROLE_PHRASE}`, 'i'),
    new RegExp(`\\b(?:the|our)\\s+${ROLE_PHRASE}\\s+(?:at|of|for)\\b`, 'i')
  ];

  private needPatterns = [
    /\b(?:we|i)\s+(?:really\s+)?(?:need|want|require)\s+(?:to\s+)?([^.!?]{3,80})/i,
    /\b(?:looking for|searching for|in the market for)\s+([^.!?]{3,80})/i
  ];

  private painPointPatterns = [
    /\b(?:struggl(?:e|ing) with|(?:our|my|the) (?:biggest |main |real )?(?:problem|issue|challenge|pain point|headache) (?:is|are)|problems? with|issues? with|frustrated (?:with|by)|tired of|wast(?:e|ing) (?:a lot of |too much )?time (?:on|with))\s+([^.!?]{3,80})/i
  ];

  private productInterestPatterns = [
    /\b(?:interested in|go with|going with|sign up for|signing up for|opt for|start with|try out)\s+(?:the\s+|your\s+|a\s+|an\s+)?([^.!?,]{2,60})/i
  ];

  private currencyPattern =
    /(?:[$€£]\s?\d[\d,]*(?:\.\d+)?\s?(?:k|m|million|thousand)?\b|\b\d[\d,]*(?:\.\d+)?\s?(?:k|m|million|thousand)?\s?(?:usd|eur|gbp|dollars|euros|pounds|bucks)\b|\b\d[\d,]*(?:\.\d+)?\s?(?:k|million|thousand)\b)/gi;
  // The cue has to sit right before the amount, or the amount right before "budget"/"to spend"
  private budgetCueBeforePattern =
    /\b(?:budget|spend|spending|invest|investment|afford|price range|allocated?|set aside)\b(?:\s+(?:is|of|was|will be|would be|around|about|roughly|approximately|up to|maybe|probably|between|somewhere|like|max|maximum)\b)*[\s:,-]*$/i;
  private budgetCueAfterPattern = /^\s*(?:budget|to spend|to invest|allocated|set aside|per (?:month|year))\b/i;
  private budgetQuestionPattern = /\b(?:budget|spend|invest|investment|afford|price|pricing|cost)\b/i;

  private timelinePatterns = [
    /\b(?:within|in|over)\s+(?:the\s+)?(?:next\s+)?(?:\d+|a|an|one|two|three|four|five|six|twelve|a few|a couple of)\s+(?:days?|weeks?|months?|quarters?|years?)\b/i,
    /\b(?:by the end of(?: the)?|end of(?: the)?|this|next)\s+(?:week|month|quarter|year)\b/i,
    /\b(?:by|before|in|around|until)\s+(?:early\s+|mid\s+|late\s+)?(?:january|february|march|april|may|june|july|august|september|october|november|december)(?:\s+\d{4})?\b/i,
    /\bq[1-4](?:\s+(?:of\s+)?\d{4})?\b/i,
    /\b(?:asap|as soon as possible|immediately|right away|urgently)\b/i
  ];

  // Words that follow an intro phrase but are not names
  private nameFilters = {
    prefixes: ['mr', 'mrs', 'ms', 'dr', 'prof'],
    excludeWords: [
      'the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by', 'from',
      'a', 'an', 'our', 'we', 'i', 'it', 'is', 'am', 'are', 'was', 'here', 'just', 'not',
      'interested', 'looking', 'calling', 'writing', 'fine', 'good', 'great', 'sorry', 'sure',
      'happy', 'glad', 'ok', 'okay', 'busy', 'hello', 'hi', 'hey', 'thanks', 'still', 'also',
      'ready', 'new', 'available', 'free', 'open', 'excited', 'curious', 'back', 'done', 'able', 'currently',
      'really', 'very', 'so', 'actually', 'definitely', 'totally', 'trying', 'thinking', 'wondering', 'unsure',
      'ceo', 'cto', 'cfo', 'coo', 'cmo', 'cio', 'vp', 'founder', 'owner', 'director', 'manager', 'head'
    ]
  };

  // Captured phrases that are conversational, not needs
  private phraseStoplist = ['go', 'leave', 'think about it', 'think', 'run', 'check', 'know', 'be sure'];

  constructor(options: InfoExtractorOptions = {}) {
    this.structuredExtractor = options.structuredExtractor;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Extract a partial profile update from one utterance: patterns first, then
   * the model for whatever is still missing. Never throws.
   */
  async extract(
    utterance: string,
    currentProfile: Readonly<LeadProfile>,
    context: ExtractionContext = {}
  ): Promise<ExtractionResult> {
    const deterministic = this.extractDeterministic(utterance, context);
    const fields: FieldUpdate = {};
    const sources: ExtractionResult['sources'] = {};

    for (const key of FIELD_KEYS) {
      const value = deterministic.fields[key];
      if (value !== undefined && value !== currentProfile.fields[key]) {
        fields[key] = value;
        sources[key] = 'pattern';
      }
    }

    const missing = FIELD_KEYS.filter(key => !hasField(currentProfile.fields, key) && deterministic.fields[key] === undefined);

    if (!this.structuredExtractor || missing.length === 0) {
      return { fields, contact: deterministic.contact, sources, modelStatus: 'skipped' };
    }

    let modelStatus: ModelPassStatus = 'ok';
    try {
      const modelFields = await withTimeout(
        this.structuredExtractor.extract(utterance, missing),
        this.timeoutMs,
        () => new ExtractionError(`Model extraction exceeded ${this.timeoutMs}ms`, { timedOut: true })
      );

      for (const key of missing) {
        const value = normalizeFieldValue(modelFields[key]);
        // Deterministic values win; only requested keys are accepted
        if (value !== undefined && fields[key] === undefined) {
          fields[key] = value;
          sources[key] = 'model';
        }
      }
    } catch (error) {
      modelStatus = error instanceof ExtractionError && error.code === 'EXTRACTION_TIMEOUT' ? 'timeout' : 'failed';
      console.warn(`⚠️ Model extraction ${modelStatus}, keeping pattern results only: ${describeError(error)}`);
    }

    const fromModel = FIELD_KEYS.filter(key => sources[key] === 'model');
    if (fromModel.length > 0) {
      console.log(`🧠 Model extraction filled: ${fromModel.join(', ')}`);
    }

    return { fields, contact: deterministic.contact, sources, modelStatus };
  }

  /**
   * Pattern/keyword pass. Pure and synchronous; unmatched fields are omitted.
   */
  extractDeterministic(utterance: string, context: ExtractionContext = {}): DeterministicExtraction {
    const fields: FieldUpdate = {};
    const contact: ContactDetails = {};
    const message = utterance.trim();
    if (!message) {
      return { fields, contact };
    }

    const email = this.extractEmail(message);
    if (email) {
      contact.email = email;
    }

    const phone = this.extractPhone(message);
    if (phone) {
      contact.phone = phone;
    }

    const candidates: Record<FieldKey, string | undefined> = {
      name: this.extractName(message),
      company: this.extractCompany(message),
      role: this.firstCapture(message, this.rolePatterns),
      need: this.extractPhrase(message, this.needPatterns),
      pain_point: this.extractPhrase(message, this.painPointPatterns),
      budget: this.extractBudget(message, context),
      timeline: this.firstMatch(message, this.timelinePatterns),
      product_interest: this.extractPhrase(message, this.productInterestPatterns),
    };

    for (const key of FIELD_KEYS) {
      const value = normalizeFieldValue(candidates[key]);
      if (value !== undefined) {
        fields[key] = value;
      }
    }

    if (Object.keys(fields).length > 0) {
      console.log(`🎯 Pattern extraction: ${Object.keys(fields).join(', ')}`);
    }

    return { fields, contact };
  }

  /**
   * Extract a name following an introduction phrase ("I'm Jane", "my name is Jane Doe")
   */
  private extractName(message: string): string | undefined {
    for (const intro of message.matchAll(this.nameIntroPattern)) {
      const rest = message.slice((intro.index ?? 0) + intro[0].length);
      const match = rest.match(this.capitalizedNamePattern);
      if (!match) {
        continue;
      }

      const kept: string[] = [];
      for (const word of match[1].split(/\s+/)) {
        const lower = word.toLowerCase().replace(/[.'’]/g, '');
        if (this.nameFilters.excludeWords.includes(lower) || this.nameFilters.prefixes.includes(lower)) {
          break;
        }
        kept.push(word);
      }

      if (kept.length > 0) {
        return kept.join(' ');
      }
    }
    return undefined;
  }

  private extractCompany(message: string): string | undefined {
    for (const intro of message.matchAll(this.companyIntroPattern)) {
      const start = intro.index ?? 0;
      if (this.placeLeadInPattern.test(message.slice(0, start))) {
        continue;
      }
      const match = message.slice(start + intro[0].length).match(this.companyNamePattern);
      if (!match) {
        continue;
      }
      const candidate = match[1];
      const firstToken = candidate.split(/\s+/)[0];
      if (
        !/\p{L}/u.test(candidate)
        || this.yearPattern.test(firstToken)
        || this.nameFilters.excludeWords.includes(candidate.toLowerCase())
      ) {
        continue;
      }
      return candidate;
    }
    return undefined;
  }

  /**
   * A currency-like token only counts as a budget when a budget cue sits next
   * to it or the message answers a question about budget
   */
  private extractBudget(message: string, context: ExtractionContext): string | undefined {
    const answersBudgetQuestion = context.lastAssistantTurn !== undefined
      && this.budgetQuestionPattern.test(context.lastAssistantTurn);

    for (const token of message.matchAll(this.currencyPattern)) {
      const start = token.index ?? 0;
      const before = message.slice(0, start);
      const after = message.slice(start + token[0].length);
      if (answersBudgetQuestion || this.budgetCueBeforePattern.test(before) || this.budgetCueAfterPattern.test(after)) {
        return token[0].trim();
      }
    }
    return undefined;
  }

  private extractPhrase(message: string, patterns: RegExp[]): string | undefined {
    for (const pattern of patterns) {
      const match = pattern.exec(message);
      if (!match || this.isNegated(message, match.index)) {
        continue;
      }
      const phrase = this.cleanPhrase(match[1]);
      if (phrase) {
        return phrase;
      }
    }
    return undefined;
  }

  private firstCapture(message: string, patterns: RegExp[]): string | undefined {
    for (const pattern of patterns) {
      const match = pattern.exec(message);
      if (match && !this.isNegated(message, match.index)) {
        return match[1].trim();
      }
    }
    return undefined;
  }

  private firstMatch(message: string, patterns: RegExp[]): string | undefined {
    for (const pattern of patterns) {
      const match = pattern.exec(message);
      if (match) {
        return match[0].trim();
      }
    }
    return undefined;
  }

  private isNegated(message: string, index: number): boolean {
    const before = message.slice(Math.max(0, index - 12), index);
    return /\b(?:no|not|never|don'?t|doesn'?t|without)\s+$/i.test(before);
  }

  /**
   * Cut a captured phrase at the first clause break and drop filler
   */
  private cleanPhrase(raw: string): string | undefined {
    const phrase = raw
      .split(/\s+(?:but|because|since|so that)\s+|\s+and\s+(?=(?:we|i|our|my|it)\b)|[,;:]/i)[0]
      .replace(/\s+/g, ' ')
      .trim();

    if (phrase.length < 2 || this.phraseStoplist.includes(phrase.toLowerCase())) {
      return undefined;
    }
    return phrase;
  }

  /**
   * Extract email addresses from message
   */
  private extractEmail(message: string): string | undefined {
    for (const pattern of this.emailPatterns) {
      const match = message.match(pattern);
      if (match) {
        const email = match[0].replace(/\s/g, '').toLowerCase();
        if (this.validateEmail(email)) {
          return email;
        }
      }
    }
    return undefined;
  }

  /**
   * Extract phone numbers from message
   */
  private extractPhone(message: string): string | undefined {
    for (const pattern of this.phonePatterns) {
      const match = message.match(pattern);
      if (match) {
        const cleanPhone = this.cleanPhoneNumber(match[0]);
        if (this.validatePhone(cleanPhone)) {
          return this.formatPhoneNumber(cleanPhone);
        }
      }
    }
    return undefined;
  }

  private validateEmail(email: string): boolean {
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    return emailRegex.test(email) &&
           email.length <= 254 &&
           !email.includes('..') &&
           !email.startsWith('.') &&
           !email.endsWith('.');
  }

  /**
   * Clean phone number to digits only
   */
  private cleanPhoneNumber(phone: string): string {
    const cleaned = phone.replace(/\D/g, '');

    // Remove leading 1 if it's 11 digits (US format)
    if (cleaned.length === 11 && cleaned.startsWith('1')) {
      return cleaned.substring(1);
    }

    return cleaned;
  }

  private validatePhone(phone: string): boolean {
    // Must be exactly 10 digits for US numbers
    if (phone.length !== 10) return false;

    // Area code can't start with 0 or 1
    if (phone[0] === '0' || phone[0] === '1') return false;

    // Exchange code (digits 4-6) can't start with 0 or 1
    if (phone[3] === '0' || phone[3] === '1') return false;

    return true;
  }

  private formatPhoneNumber(phone: string): string {
    return `(${phone.substring(0, 3)}) ${phone.substring(3, 6)}-${phone.substring(6)}`;
  }
}
