import { normalizeText } from './text-similarity.js';

/**
 * Keyword check for explicit termination intent
 */
export class FarewellDetector {
  private patterns: Array<{ phrase: string; regex: RegExp }>;

  constructor(phrases: readonly string[]) {
    this.patterns = phrases
      .map(phrase => normalizeText(phrase))
      .filter(phrase => phrase.length > 0)
      .map(phrase => ({
        phrase,
        regex: new RegExp(`\\b${this.escapeRegex(phrase).replace(/ /g, '\\s+')}\\b`, 'i'),
      }));
  }

  /**
   * Return the matched phrase, or null
   */
  detect(utterance: string): string | null {
    const text = normalizeText(utterance);
    for (const { phrase, regex } of this.patterns) {
      if (regex.test(text)) {
        return phrase;
      }
    }
    return null;
  }

  private escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
}
