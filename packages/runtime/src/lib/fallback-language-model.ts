import type { FieldKey, TurnRecord } from '../types/index.js';
import { describeError } from './errors.js';
import type { LanguageModel } from './language-model.js';
import type { FieldUpdate } from './lead-profile.js';

/**
 * Tries the primary backend and falls back to the secondary on any failure.
 * Decided per call, so a recovered primary is used again on the next one.
 */
export class FallbackLanguageModel implements LanguageModel {
  readonly name: string;

  constructor(private primary: LanguageModel, private secondary: LanguageModel) {
    this.name = `${primary.name}+${secondary.name}`;
  }

  async generate(prompt: string, history: readonly TurnRecord[]): Promise<string> {
    try {
      return await this.primary.generate(prompt, history);
    } catch (error) {
      console.warn(`⚠️ ${this.primary.name} generation failed, falling back to ${this.secondary.name}: ${describeError(error)}`);
      return this.secondary.generate(prompt, history);
    }
  }

  async extract(utterance: string, missingFields: readonly FieldKey[]): Promise<FieldUpdate> {
    try {
      return await this.primary.extract(utterance, missingFields);
    } catch (error) {
      console.warn(`⚠️ ${this.primary.name} extraction failed, falling back to ${this.secondary.name}: ${describeError(error)}`);
      return this.secondary.extract(utterance, missingFields);
    }
  }
}
