import { AIMessage, HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from '@langchain/core/messages';
import { z } from 'zod';
import { FIELD_KEYS, type FieldKey, type TurnRecord } from '../types/index.js';
import { ExtractionError } from './errors.js';
import { normalizeFieldValue, type FieldUpdate } from './lead-profile.js';

/**
 * Free-text generation capability. Implementations throw GenerationError.
 */
export interface TextGenerator {
  generate(prompt: string, history: readonly TurnRecord[]): Promise<string>;
}

/**
 * Field extraction capability. Implementations throw ExtractionError.
 */
export interface StructuredExtractor {
  extract(utterance: string, missingFields: readonly FieldKey[]): Promise<FieldUpdate>;
}

export interface LanguageModel extends TextGenerator, StructuredExtractor {
  readonly name: string;
}

export const FIELD_DESCRIPTIONS: Record<FieldKey, string> = {
  name: "the prospect's name",
  company: 'the company or organisation the prospect works for',
  role: "the prospect's job title or role",
  need: 'what the prospect needs or is looking for',
  pain_point: 'the main problem or frustration the prospect describes',
  budget: 'the budget or amount they can spend, as stated',
  timeline: 'when they want a solution in place',
  product_interest: 'the product, plan or option they are interested in',
};

export const SYSTEM_PERSONA = `You are LeadFlow, a friendly sales assistant. You learn about prospects through natural conversation.
Keep replies short (1-3 sentences), ask one thing at a time and never sound like a form.`;

export function buildExtractionPrompt(utterance: string, missingFields: readonly FieldKey[]): string {
  const fieldLines = missingFields.map(field => `- ${field}: ${FIELD_DESCRIPTIONS[field]}`).join('\n');

  return `Extract the following fields from the prospect's message if, and only if, the message states them.
${fieldLines}

Reply with ONLY a JSON object whose keys are the field names above. Omit fields that are not mentioned.
Do not guess. No explanations.

Message: """${utterance}"""`;
}

const ExtractionOutputSchema = z.record(z.string(), z.unknown());
const ExtractedValueSchema = z.union([z.string(), z.number(), z.null()]);

const PLACEHOLDER_VALUES = new Set(['null', 'none', 'unknown', 'n/a', 'na', 'not mentioned', '']);

/**
 * Parse a model's JSON reply into a field update restricted to the requested keys
 */
export function parseExtractionOutput(raw: string, missingFields: readonly FieldKey[]): FieldUpdate {
  const cleaned = raw.replace(/```(?:json)?/gi, '').trim();
  const objectMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!objectMatch) {
    throw new ExtractionError(`Model reply contained no JSON object: "${cleaned.slice(0, 80)}"`);
  }

  let json: unknown;
  try {
    json = JSON.parse(objectMatch[0]);
  } catch (error) {
    throw new ExtractionError('Model reply was not valid JSON', { cause: error });
  }

  const parsed = ExtractionOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExtractionError(`Model reply had an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  const update: FieldUpdate = {};
  for (const key of FIELD_KEYS) {
    if (!missingFields.includes(key)) {
      continue;
    }
    // Keys that were not requested are never inspected
    const rawValue = ExtractedValueSchema.safeParse(parsed.data[key]);
    if (!rawValue.success) {
      continue;
    }
    const value = normalizeFieldValue(typeof rawValue.data === 'number' ? String(rawValue.data) : rawValue.data);
    if (value && !PLACEHOLDER_VALUES.has(value.toLowerCase())) {
      update[key] = value;
    }
  }
  return update;
}

/**
 * Flatten LangChain message content (string or content parts) to text
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map(part => (part.type === 'text' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export function toChatMessages(prompt: string, history: readonly TurnRecord[]): BaseMessage[] {
  const messages: BaseMessage[] = [new SystemMessage(`${SYSTEM_PERSONA}\n\n${prompt}`)];
  for (const turn of history) {
    messages.push(turn.role === 'user' ? new HumanMessage(turn.text) : new AIMessage(turn.text));
  }
  return messages;
}
