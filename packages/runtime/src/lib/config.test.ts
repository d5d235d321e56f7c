import { DEFAULT_ORCHESTRATOR_CONFIG, createTestConfig, loadRuntimeConfig, validateRuntimeConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadRuntimeConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadRuntimeConfig({});

    expect(config.mode).toBe('auto');
    expect(config.localModelUrl).toBe('http://localhost:11434/v1');
    expect(config.temperature).toBe(0.7);
    expect(config.orchestrator).toEqual(DEFAULT_ORCHESTRATOR_CONFIG);
  });

  it('should read overrides from the environment', () => {
    const config = loadRuntimeConfig({
      LLM_MODE: 'LOCAL',
      LOCAL_MODEL_NAME: 'llama3',
      MAX_CONVERSATION_TURNS: '12',
      STALL_SIMILARITY_THRESHOLD: '0.9',
      FAREWELL_PHRASES: 'Ciao, Later ,',
    });

    expect(config.mode).toBe('local');
    expect(config.localModelName).toBe('llama3');
    expect(config.orchestrator.maxConversationTurns).toBe(12);
    expect(config.orchestrator.stall.similarityThreshold).toBe(0.9);
    expect(config.orchestrator.farewellPhrases).toEqual(['ciao', 'later']);
  });

  it('should reject an unknown mode', () => {
    expect(() => loadRuntimeConfig({ LLM_MODE: 'remote' })).toThrow(ConfigError);
  });

  it('should reject a non-numeric threshold', () => {
    expect(() => loadRuntimeConfig({ STALL_SIMILARITY_THRESHOLD: 'high' })).toThrow(
      /orchestrator\.stall\.similarityThreshold/
    );
  });
});

describe('validateRuntimeConfig', () => {
  it('should accept the test configuration', () => {
    const config = createTestConfig();
    expect(validateRuntimeConfig(config)).toEqual(config);
  });

  it('should reject a window smaller than one exchange', () => {
    const config = createTestConfig({ orchestrator: { recentTurnWindow: 1 } });
    expect(() => validateRuntimeConfig(config)).toThrow(ConfigError);
  });
});

describe('createTestConfig', () => {
  it('should merge orchestrator overrides over the defaults', () => {
    const config = createTestConfig({ mode: 'cloud', orchestrator: { maxConversationTurns: 5 } });

    expect(config.mode).toBe('cloud');
    expect(config.localModelApiKey).toBe('test-key');
    expect(config.orchestrator.maxConversationTurns).toBe(5);
    expect(config.orchestrator.stall).toEqual(DEFAULT_ORCHESTRATOR_CONFIG.stall);
  });
});
