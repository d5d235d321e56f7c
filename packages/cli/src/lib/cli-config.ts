import {
  ConfigError,
  LlmModeSchema,
  loadRuntimeConfig,
  validateRuntimeConfig,
  type RuntimeConfig,
} from '@leadflow/runtime';

export interface ModelOptions {
  mode?: string;
  model?: string;
}

/**
 * Runtime config from the environment, with command-line overrides applied
 */
export function createCliConfig(options: ModelOptions, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const base = loadRuntimeConfig(env);

  let mode = base.mode;
  if (options.mode) {
    const parsed = LlmModeSchema.safeParse(options.mode.toLowerCase());
    if (!parsed.success) {
      throw new ConfigError(`Unknown mode "${options.mode}" (expected cloud, local or auto)`);
    }
    mode = parsed.data;
  }

  return validateRuntimeConfig({
    ...base,
    mode,
    bedrockModelId: options.model || base.bedrockModelId,
  });
}
