import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LlmModeSchema = z.enum(['cloud', 'local', 'auto']);
export type LlmMode = z.infer<typeof LlmModeSchema>;

export const DEFAULT_FAREWELL_PHRASES = [
  'bye',
  'goodbye',
  'good bye',
  'see you',
  'talk later',
  'not interested',
  'no more questions',
  'stop calling',
  "that's all",
  'i have to go',
  'gotta go',
  'take me off your list',
];

const StallConfigSchema = z.object({
  noProgressTurns: z.number().int().min(1),
  similarityThreshold: z.number().min(0).max(1),
  stageTurnCeiling: z.number().int().min(1),
});

const OrchestratorConfigSchema = z.object({
  recentTurnWindow: z.number().int().min(2),
  maxConversationTurns: z.number().int().min(1),
  extractionTimeoutMs: z.number().int().min(1),
  farewellPhrases: z.array(z.string().min(1)),
  stall: StallConfigSchema,
});

export const RuntimeConfigSchema = z.object({
  mode: LlmModeSchema,
  bedrockModelId: z.string().min(1),
  awsRegion: z.string().min(1),
  localModelUrl: z.string().url(),
  localModelName: z.string().min(1),
  localModelApiKey: z.string().min(1),
  temperature: z.number().min(0).max(2),
  orchestrator: OrchestratorConfigSchema,
});

export type StallConfig = z.infer<typeof StallConfigSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  recentTurnWindow: 6,
  maxConversationTurns: 30,
  extractionTimeoutMs: 8000,
  farewellPhrases: DEFAULT_FAREWELL_PHRASES,
  stall: {
    noProgressTurns: 3,
    similarityThreshold: 0.85,
    stageTurnCeiling: 6,
  },
};

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  // NaN is left for validation to reject
  return Number(value);
}

function listFromEnv(value: string | undefined, fallback: string[]): string[] {
  if (!value || value.trim() === '') {
    return fallback;
  }
  return value.split(',').map(item => item.trim().toLowerCase()).filter(Boolean);
}

/**
 * Load runtime configuration from environment variables
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const defaults = DEFAULT_ORCHESTRATOR_CONFIG;

  const config = {
    mode: (env.LLM_MODE || 'auto').toLowerCase(),
    bedrockModelId: env.BEDROCK_MODEL_ID || 'anthropic.claude-3-haiku-20240307-v1:0',
    awsRegion: env.AWS_REGION || 'us-east-1',
    localModelUrl: env.LOCAL_MODEL_URL || 'http://localhost:11434/v1',
    localModelName: env.LOCAL_MODEL_NAME || 'mistral',
    // Local OpenAI-compatible servers ignore the key, the SDK still wants one
    localModelApiKey: env.LOCAL_MODEL_API_KEY || 'local',
    temperature: numberFromEnv(env.LLM_TEMPERATURE, 0.7),
    orchestrator: {
      recentTurnWindow: numberFromEnv(env.RECENT_TURN_WINDOW, defaults.recentTurnWindow),
      maxConversationTurns: numberFromEnv(env.MAX_CONVERSATION_TURNS, defaults.maxConversationTurns),
      extractionTimeoutMs: numberFromEnv(env.EXTRACTION_TIMEOUT_MS, defaults.extractionTimeoutMs),
      farewellPhrases: listFromEnv(env.FAREWELL_PHRASES, defaults.farewellPhrases),
      stall: {
        noProgressTurns: numberFromEnv(env.STALL_NO_PROGRESS_TURNS, defaults.stall.noProgressTurns),
        similarityThreshold: numberFromEnv(env.STALL_SIMILARITY_THRESHOLD, defaults.stall.similarityThreshold),
        stageTurnCeiling: numberFromEnv(env.STAGE_TURN_CEILING, defaults.stall.stageTurnCeiling),
      },
    },
  };

  return validateRuntimeConfig(config);
}

/**
 * Validate runtime configuration
 */
export function validateRuntimeConfig(config: unknown): RuntimeConfig {
  const parsed = RuntimeConfigSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigError(`Invalid runtime configuration - ${problems.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Create a test configuration for local development
 */
export function createTestConfig(
  overrides: Partial<Omit<RuntimeConfig, 'orchestrator'>> & { orchestrator?: Partial<OrchestratorConfig> } = {}
): RuntimeConfig {
  const { orchestrator, ...rest } = overrides;
  return {
    mode: 'local',
    bedrockModelId: 'anthropic.claude-3-haiku-20240307-v1:0',
    awsRegion: 'us-east-1',
    localModelUrl: 'http://localhost:11434/v1',
    localModelName: 'mistral',
    localModelApiKey: 'test-key',
    temperature: 0.7,
    ...rest,
    orchestrator: {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      ...orchestrator,
      stall: {
        ...DEFAULT_ORCHESTRATOR_CONFIG.stall,
        ...orchestrator?.stall,
      },
    },
  };
}
