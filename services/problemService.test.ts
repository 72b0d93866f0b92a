import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Topic } from '../types';
import { MalformedResponseError, TransportError, ValidationError } from './errors';
import { buildChatRequest, createChatProblemProvider, DEFAULT_CHAT_ENDPOINT } from './problemService';

const CONTENT = JSON.stringify({
  question: '  What is the powerhouse of the cell?  ',
  options: [' Nucleus', 'Ribosome ', 'Mitochondrion', 'Golgi apparatus'],
  correctAnswer: 2,
  explanation: ' Mitochondria produce most of the cell’s ATP. ',
});

const envelope = (content: string): string =>
  JSON.stringify({ id: 'chatcmpl-1', choices: [{ index: 0, message: { role: 'assistant', content } }] });

// In-process stand-in for the HTTP transport: records requests, answers with a canned response.
const stubHttp = (status: number, body: string) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    return { data: body, status, statusText: '', headers: {}, config };
  };
  return { http: axios.create({ adapter }), requests };
};

const providerFor = (status: number, body: string) => {
  const stub = stubHttp(status, body);
  const provider = createChatProblemProvider({
    apiKey: 'test-secret',
    endpoint: DEFAULT_CHAT_ENDPOINT,
    model: 'test-model',
    timeoutMs: 5000,
    http: stub.http,
  });
  return { provider, requests: stub.requests };
};

describe('createChatProblemProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the chat request with a bearer credential', async () => {
    const { provider, requests } = providerFor(200, envelope(CONTENT));

    await provider.fetch(Topic.Biology, 3);

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.method).toBe('post');
    expect(request.url).toBe(DEFAULT_CHAT_ENDPOINT);
    expect(request.timeout).toBe(5000);
    expect(request.headers.get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(request.data))).toEqual(buildChatRequest(Topic.Biology, 3, 'test-model'));
  });

  it('returns a trimmed question tagged with the requested topic and difficulty', async () => {
    const { provider } = providerFor(200, envelope(CONTENT));

    const result = await provider.fetch(Topic.Biology, 3);

    expect(result).toEqual({
      ok: true,
      question: {
        question: 'What is the powerhouse of the cell?',
        options: ['Nucleus', 'Ribosome', 'Mitochondrion', 'Golgi apparatus'],
        correctAnswer: 2,
        explanation: 'Mitochondria produce most of the cell’s ATP.',
        topic: Topic.Biology,
        difficulty: 3,
      },
    });
  });

  it('maps HTTP 500 to a TransportError carrying status and body', async () => {
    const { provider } = providerFor(500, 'upstream exploded');

    const result = await provider.fetch(Topic.Physics, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error).toHaveProperty('status', 500);
    expect(result.error).toHaveProperty('body', 'upstream exploded');
    expect(result.error.message).toBe('API Error 500: upstream exploded');
  });

  it('maps a 401 to a TransportError', async () => {
    const { provider } = providerFor(401, '{"error":{"message":"Invalid API Key"}}');

    const result = await provider.fetch(Topic.Physics, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('API Error 401: {"error":{"message":"Invalid API Key"}}');
  });

  it('maps a connection failure to a TransportError without status', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    };
    const provider = createChatProblemProvider({
      apiKey: 'test-secret',
      endpoint: DEFAULT_CHAT_ENDPOINT,
      model: 'test-model',
      timeoutMs: 5000,
      http: axios.create({ adapter }),
    });

    const result = await provider.fetch(Topic.Physics, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toHaveProperty('status', null);
    expect(result.error.message).toBe('Network error: connect ECONNREFUSED');
  });

  it('rejects an envelope without choices as malformed', async () => {
    const { provider } = providerFor(200, JSON.stringify({ choices: [] }));

    const result = await provider.fetch(Topic.Chemistry, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MalformedResponseError);
    expect(result.error).toHaveProperty('detail', 'response has no choices');
  });

  it('rejects a choice without message content as malformed', async () => {
    const { provider } = providerFor(200, JSON.stringify({ choices: [{ message: { role: 'assistant' } }] }));

    const result = await provider.fetch(Topic.Chemistry, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toHaveProperty('detail', 'response has no message content');
  });

  it('rejects a non-JSON body as malformed', async () => {
    const { provider } = providerFor(200, '<html>gateway</html>');

    const result = await provider.fetch(Topic.Chemistry, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toHaveProperty('detail', 'response body is not JSON');
  });

  it('surfaces a three-option payload as a ValidationError', async () => {
    const content = JSON.stringify({ question: 'Q?', options: ['A', 'B', 'C'], correctAnswer: 0, explanation: 'E.' });
    const { provider } = providerFor(200, envelope(content));

    const result = await provider.fetch(Topic.Chemistry, 5);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe('expected 4 options, got 3');
  });

  it('makes exactly one attempt on failure', async () => {
    const { provider, requests } = providerFor(503, 'busy');

    await provider.fetch(Topic.Chemistry, 5);

    expect(requests).toHaveLength(1);
  });
});
