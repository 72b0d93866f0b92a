import { ApiError, type GenerateContentParameters } from '@google/genai';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Topic } from '../types';
import { MalformedResponseError, TransportError } from './errors';
import { createGeminiProblemProvider } from './geminiService';

const CONTENT = JSON.stringify({
  question: 'Which gas do plants absorb for photosynthesis?',
  options: ['Oxygen', 'Carbon dioxide', 'Nitrogen', 'Helium'],
  correctAnswer: 1,
  explanation: 'Plants fix carbon dioxide into sugars.',
});

const fakeClient = (generate: (params: GenerateContentParameters) => Promise<{ text?: string }>) => {
  const generateContent = vi.fn(generate);
  return { client: { models: { generateContent } }, generateContent };
};

describe('createGeminiProblemProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requests schema-constrained JSON for the topic and difficulty', async () => {
    const { client, generateContent } = fakeClient(async () => ({ text: CONTENT }));
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    await provider.fetch(Topic.Environmental, 8);

    expect(generateContent).toHaveBeenCalledTimes(1);
    const [params] = generateContent.mock.calls[0];
    expect(params.model).toBe('gemini-test');
    expect(params.config?.responseMimeType).toBe('application/json');
    expect(params.config?.systemInstruction).toContain('science question about Environmental.');
    expect(params.config?.systemInstruction).toContain('Difficulty level: 8/10.');
  });

  it('returns the parsed question', async () => {
    const { client } = fakeClient(async () => ({ text: CONTENT }));
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    const result = await provider.fetch(Topic.Biology, 2);

    expect(result).toEqual({
      ok: true,
      question: {
        question: 'Which gas do plants absorb for photosynthesis?',
        options: ['Oxygen', 'Carbon dioxide', 'Nitrogen', 'Helium'],
        correctAnswer: 1,
        explanation: 'Plants fix carbon dioxide into sugars.',
        topic: Topic.Biology,
        difficulty: 2,
      },
    });
  });

  it('treats an empty response as malformed', async () => {
    const { client } = fakeClient(async () => ({ text: undefined }));
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    const result = await provider.fetch(Topic.Biology, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MalformedResponseError);
    expect(result.error.message).toBe('Malformed response: empty response from AI');
  });

  it('maps an SDK ApiError to a TransportError with its status', async () => {
    const { client } = fakeClient(async () => {
      throw new ApiError({ message: 'quota exceeded', status: 429 });
    });
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    const result = await provider.fetch(Topic.Biology, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error).toHaveProperty('status', 429);
    expect(result.error.message).toBe('API Error 429: quota exceeded');
  });

  it('shows the readable message from a JSON error body and keeps the raw body', async () => {
    const raw = '{"error":{"code":400,"message":"API key not valid. Please pass a valid API key.","status":"INVALID_ARGUMENT"}}';
    const { client } = fakeClient(async () => {
      throw new ApiError({ message: raw, status: 400 });
    });
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    const result = await provider.fetch(Topic.Biology, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('API Error 400: API key not valid. Please pass a valid API key.');
    expect(result.error).toHaveProperty('body', raw);
  });

  it('maps any other failure to a TransportError without status', async () => {
    const { client } = fakeClient(async () => {
      throw new Error('fetch failed');
    });
    const provider = createGeminiProblemProvider({ apiKey: 'test-secret', model: 'gemini-test', client });

    const result = await provider.fetch(Topic.Biology, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Network error: fetch failed');
  });
});
