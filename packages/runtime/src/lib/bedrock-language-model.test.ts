import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { BedrockLanguageModel, type ChatInvoker } from './bedrock-language-model.js';
import { ExtractionError, GenerationError } from './errors.js';

class FakeChatModel implements ChatInvoker {
  calls: BaseMessage[][] = [];

  constructor(private respond: () => Promise<MessageContent>) {}

  async invoke(messages: BaseMessage[]): Promise<{ content: MessageContent }> {
    this.calls.push(messages);
    return { content: await this.respond() };
  }
}

const OPTIONS = { modelId: 'test-model', region: 'us-east-1', temperature: 0.7 };

describe('BedrockLanguageModel', () => {
  describe('generate', () => {
    it('should return the trimmed reply', async () => {
      const chat = new FakeChatModel(async () => '  Hello Jane!  ');
      const model = new BedrockLanguageModel(OPTIONS, chat);

      const reply = await model.generate('Greet them', [
        { role: 'user', text: 'Hi', timestamp: '2026-01-01T10:00:00.000Z' },
      ]);

      expect(reply).toBe('Hello Jane!');
      expect(chat.calls[0]).toHaveLength(2);
    });

    it('should treat an empty reply as a failure', async () => {
      const model = new BedrockLanguageModel(OPTIONS, new FakeChatModel(async () => '   '));

      await expect(model.generate('Greet them', [])).rejects.toThrow('Bedrock returned an empty reply');
    });

    it('should wrap backend errors', async () => {
      const model = new BedrockLanguageModel(OPTIONS, new FakeChatModel(async () => {
        throw new Error('throttled');
      }));

      const error = await model.generate('Greet them', []).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(GenerationError);
      expect(error).toMatchObject({ code: 'GENERATION_FAILED', message: 'Bedrock generation failed: throttled' });
    });
  });

  describe('extract', () => {
    it('should parse the JSON reply', async () => {
      const chat = new FakeChatModel(async () => '{"budget": "$5k", "timeline": "Q3"}');
      const model = new BedrockLanguageModel(OPTIONS, chat);

      expect(await model.extract('around 5k', ['budget'])).toEqual({ budget: '$5k' });
      expect(chat.calls[0]).toHaveLength(2);
    });

    it('should wrap backend errors', async () => {
      const model = new BedrockLanguageModel(OPTIONS, new FakeChatModel(async () => {
        throw new Error('throttled');
      }));

      await expect(model.extract('around 5k', ['budget'])).rejects.toThrow(ExtractionError);
    });
  });
});
