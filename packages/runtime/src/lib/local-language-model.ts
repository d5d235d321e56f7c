import OpenAI from 'openai';
import type { FieldKey, TurnRecord } from '../types/index.js';
import { ExtractionError, GenerationError, describeError } from './errors.js';
import { SYSTEM_PERSONA, buildExtractionPrompt, parseExtractionOutput, type LanguageModel } from './language-model.js';
import type { FieldUpdate } from './lead-profile.js';

export interface LocalLanguageModelOptions {
  /** Base URL of an OpenAI-compatible server, e.g. http://localhost:11434/v1 */
  baseUrl: string;
  model: string;
  apiKey: string;
  temperature: number;
  maxTokens?: number;
}

/**
 * Local backend: any OpenAI-compatible inference server (Ollama, vLLM, LM Studio)
 */
export class LocalLanguageModel implements LanguageModel {
  readonly name = 'local';
  private client: OpenAI;

  constructor(private options: LocalLanguageModelOptions) {
    this.client = new OpenAI({
      baseURL: options.baseUrl,
      apiKey: options.apiKey,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, history: readonly TurnRecord[]): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: `${SYSTEM_PERSONA}\n\n${prompt}` },
      ...history.map((turn): OpenAI.Chat.ChatCompletionMessageParam =>
        turn.role === 'user'
          ? { role: 'user', content: turn.text }
          : { role: 'assistant', content: turn.text }),
    ];

    let text: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens ?? 512,
      });
      text = completion.choices[0]?.message?.content;
    } catch (error) {
      throw new GenerationError(`Local model generation failed: ${describeError(error)}`, { cause: error });
    }

    if (!text || !text.trim()) {
      throw new GenerationError('Local model returned an empty reply');
    }
    return text.trim();
  }

  async extract(utterance: string, missingFields: readonly FieldKey[]): Promise<FieldUpdate> {
    let raw: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: 'You extract structured facts from sales conversations and reply with JSON only.' },
          { role: 'user', content: buildExtractionPrompt(utterance, missingFields) },
        ],
        temperature: 0,
      });
      raw = completion.choices[0]?.message?.content;
    } catch (error) {
      throw new ExtractionError(`Local model extraction failed: ${describeError(error)}`, { cause: error });
    }

    return parseExtractionOutput(raw ?? '', missingFields);
  }
}
