import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProblemProvider, DEFAULT_TIMEOUT_MS, loadConfig } from './config';
import { MissingCredentialError } from './errors';

describe('loadConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults to the groq chat-completions endpoint', () => {
    expect(loadConfig({ GROQ_API_KEY: 'test-secret' })).toEqual({
      provider: 'groq',
      apiKey: 'test-secret',
      endpoint: 'https://api.groq.com/openai/v1/chat/completions',
      model: 'openai/gpt-oss-120b',
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it('applies endpoint, model and timeout overrides', () => {
    const config = loadConfig({
      GROQ_API_KEY: 'test-secret',
      GROQ_API_URL: 'https://llm.internal.test/v1/chat/completions',
      GROQ_MODEL: 'llama-test',
      REQUEST_TIMEOUT_MS: '1500',
    });

    expect(config).toMatchObject({
      endpoint: 'https://llm.internal.test/v1/chat/completions',
      model: 'llama-test',
      timeoutMs: 1500,
    });
  });

  it('falls back to the default timeout for a bad value', () => {
    expect(loadConfig({ GROQ_API_KEY: 'test-secret', REQUEST_TIMEOUT_MS: 'soon' })).toHaveProperty(
      'timeoutMs',
      DEFAULT_TIMEOUT_MS,
    );
  });

  it('throws MissingCredentialError naming the variable when the key is absent', () => {
    expect(() => loadConfig({})).toThrow(MissingCredentialError);
    expect(() => loadConfig({})).toThrow('GROQ_API_KEY not found in environment');
  });

  it.each(['', '   ', 'undefined'])('treats %j as a missing key', value => {
    expect(() => loadConfig({ GROQ_API_KEY: value })).toThrow(MissingCredentialError);
  });

  it('selects gemini and requires its own key', () => {
    expect(() => loadConfig({ PROBLEM_PROVIDER: 'gemini', GROQ_API_KEY: 'test-secret' })).toThrow(
      'GEMINI_API_KEY not found in environment',
    );
    expect(loadConfig({ PROBLEM_PROVIDER: 'Gemini', GEMINI_API_KEY: 'test-secret' })).toEqual({
      provider: 'gemini',
      apiKey: 'test-secret',
      model: 'gemini-2.5-flash',
    });
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ PROBLEM_PROVIDER: 'carrier-pigeon' })).toThrow(
      'Unknown PROBLEM_PROVIDER "carrier-pigeon". Use "groq" or "gemini".',
    );
  });

  it('never logs the key itself', () => {
    loadConfig({ GROQ_API_KEY: 'test-secret' });

    expect(console.log).toHaveBeenCalledWith('[Config] GROQ_API_KEY loaded successfully. (Length: 11)');
  });
});

describe('createProblemProvider', () => {
  it('builds the provider named by the config', () => {
    expect(
      createProblemProvider({
        provider: 'groq',
        apiKey: 'test-secret',
        endpoint: 'https://llm.internal.test/v1/chat/completions',
        model: 'm',
        timeoutMs: 1000,
      }).name,
    ).toBe('chat-completions');
    expect(createProblemProvider({ provider: 'gemini', apiKey: 'test-secret', model: 'm' }).name).toBe('gemini');
  });
});
