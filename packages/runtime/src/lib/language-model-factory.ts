import { BedrockLanguageModel } from './bedrock-language-model.js';
import type { RuntimeConfig } from './config.js';
import { FallbackLanguageModel } from './fallback-language-model.js';
import type { LanguageModel } from './language-model.js';
import { LocalLanguageModel } from './local-language-model.js';

export function createBedrockModel(config: RuntimeConfig): BedrockLanguageModel {
  return new BedrockLanguageModel({
    modelId: config.bedrockModelId,
    region: config.awsRegion,
    temperature: config.temperature,
  });
}

export function createLocalModel(config: RuntimeConfig): LocalLanguageModel {
  return new LocalLanguageModel({
    baseUrl: config.localModelUrl,
    model: config.localModelName,
    apiKey: config.localModelApiKey,
    temperature: config.temperature,
  });
}

/**
 * Pick the language model backend for the configured mode
 */
export function createLanguageModel(config: RuntimeConfig): LanguageModel {
  switch (config.mode) {
    case 'cloud':
      console.log(`☁️ Using Bedrock model ${config.bedrockModelId} (${config.awsRegion})`);
      return createBedrockModel(config);
    case 'local':
      console.log(`💻 Using local model ${config.localModelName} at ${config.localModelUrl}`);
      return createLocalModel(config);
    case 'auto':
      console.log(`🔀 Using local model ${config.localModelName} with Bedrock fallback`);
      return new FallbackLanguageModel(createLocalModel(config), createBedrockModel(config));
  }
}
