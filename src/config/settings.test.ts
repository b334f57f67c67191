import { describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { loadSettings } from './settings.js';

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      useLlm: false,
      llmProvider: 'openai',
      llmModel: 'gpt-4o-mini',
      llmMaxConcurrentCalls: 4,
      llmTimeoutMs: 60000,
      llmMaxRetries: 3,
      confidenceThreshold: 0.6,
      openaiApiKey: undefined,
      anthropicApiKey: undefined,
    });
  });

  it('reads every key', () => {
    const settings = loadSettings({
      USE_LLM: 'TRUE',
      LLM_PROVIDER: 'anthropic',
      LLM_MODEL: 'claude-test',
      LLM_MAX_CONCURRENT_CALLS: '2',
      LLM_TIMEOUT_MS: '5000',
      LLM_MAX_RETRIES: '0',
      CONFIDENCE_THRESHOLD: '0.75',
      ANTHROPIC_API_KEY: 'test-secret',
    });

    expect(settings).toMatchObject({
      useLlm: true,
      llmProvider: 'anthropic',
      llmModel: 'claude-test',
      llmMaxConcurrentCalls: 2,
      llmTimeoutMs: 5000,
      llmMaxRetries: 0,
      confidenceThreshold: 0.75,
      anthropicApiKey: 'test-secret',
    });
  });

  it('picks a default model per provider', () => {
    expect(loadSettings({ LLM_PROVIDER: 'anthropic' }).llmModel).toBe('claude-3-5-haiku-latest');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadSettings({}))).toBe(true);
  });

  it.each([
    ['USE_LLM', 'maybe'],
    ['LLM_PROVIDER', 'gemini'],
    ['LLM_MAX_CONCURRENT_CALLS', '0'],
    ['LLM_MAX_CONCURRENT_CALLS', '2.5'],
    ['LLM_TIMEOUT_MS', 'soon'],
    ['LLM_MAX_RETRIES', '-1'],
    ['CONFIDENCE_THRESHOLD', '1.5'],
  ])('rejects %s=%s', (key, value) => {
    try {
      loadSettings({ [key]: value });
      expect.fail('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ key });
    }
  });
});
