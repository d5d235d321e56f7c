import { ChatBedrockConverse } from '@langchain/aws';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { FieldKey, TurnRecord } from '../types/index.js';
import { ExtractionError, GenerationError, describeError } from './errors.js';
import {
  buildExtractionPrompt,
  messageText,
  parseExtractionOutput,
  toChatMessages,
  type LanguageModel,
} from './language-model.js';
import type { FieldUpdate } from './lead-profile.js';

/**
 * The part of a LangChain chat model this backend calls
 */
export interface ChatInvoker {
  invoke(messages: BaseMessage[]): Promise<{ content: MessageContent }>;
}

export interface BedrockLanguageModelOptions {
  modelId: string;
  region: string;
  temperature: number;
  maxTokens?: number;
}

/**
 * Cloud backend: Amazon Bedrock through LangChain's Converse chat model
 */
export class BedrockLanguageModel implements LanguageModel {
  readonly name = 'bedrock';
  private model: ChatInvoker;

  constructor(options: BedrockLanguageModelOptions, model?: ChatInvoker) {
    this.model = model ?? new ChatBedrockConverse({
      model: options.modelId,
      region: options.region,
      temperature: options.temperature,
      maxTokens: options.maxTokens ?? 512,
    });
  }

  async generate(prompt: string, history: readonly TurnRecord[]): Promise<string> {
    try {
      const response = await this.model.invoke(toChatMessages(prompt, history));
      const text = messageText(response.content).trim();
      if (!text) {
        throw new GenerationError('Bedrock returned an empty reply');
      }
      return text;
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(`Bedrock generation failed: ${describeError(error)}`, { cause: error });
    }
  }

  async extract(utterance: string, missingFields: readonly FieldKey[]): Promise<FieldUpdate> {
    let raw: string;
    try {
      const response = await this.model.invoke([
        new SystemMessage('You extract structured facts from sales conversations and reply with JSON only.'),
        new HumanMessage(buildExtractionPrompt(utterance, missingFields)),
      ]);
      raw = messageText(response.content);
    } catch (error) {
      throw new ExtractionError(`Bedrock extraction failed: ${describeError(error)}`, { cause: error });
    }
    return parseExtractionOutput(raw, missingFields);
  }
}
