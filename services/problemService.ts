import axios, { isAxiosError, type AxiosInstance } from 'axios';
import type { Topic } from '../types';
import { MalformedResponseError, TransportError } from './errors';
import { buildSystemPrompt, isRecord, parseProblemContent, USER_PROMPT } from './problemFormat';
import { isFetchError, type FetchResult, type ProblemProvider } from './problemProvider';

export const DEFAULT_CHAT_ENDPOINT = 'https://api.groq.com/openai/v1/chat/completions';
export const DEFAULT_CHAT_MODEL = 'openai/gpt-oss-120b';

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  response_format: { type: 'json_object' };
}

export interface ChatProviderOptions {
  apiKey: string;
  endpoint: string;
  model: string;
  timeoutMs: number;
  /** Swappable for tests; defaults to a fresh axios instance. */
  http?: AxiosInstance;
}

export const buildChatRequest = (topic: Topic, difficulty: number, model: string): ChatCompletionRequest => ({
  model,
  messages: [
    { role: 'system', content: buildSystemPrompt(topic, difficulty) },
    { role: 'user', content: USER_PROMPT },
  ],
  temperature: 0.7,
  max_tokens: 800,
  response_format: { type: 'json_object' },
});

const extractMessageContent = (envelope: unknown): string => {
  const choices = isRecord(envelope) ? envelope.choices : undefined;
  if (!Array.isArray(choices) || choices.length === 0) {
    throw new MalformedResponseError('response has no choices');
  }
  const choice: unknown = choices[0];
  const message = isRecord(choice) ? choice.message : undefined;
  const content = isRecord(message) ? message.content : undefined;
  if (typeof content !== 'string') {
    throw new MalformedResponseError('response has no message content');
  }
  return content;
};

const bodyText = (data: unknown): string => {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
};

/**
 * Question provider for OpenAI-compatible chat-completions endpoints (Groq by default).
 */
export const createChatProblemProvider = (options: ChatProviderOptions): ProblemProvider => {
  const http = options.http ?? axios.create();

  const fetchProblem = async (topic: Topic, difficulty: number): Promise<FetchResult> => {
    try {
      const response = await http.post<unknown>(options.endpoint, buildChatRequest(topic, difficulty, options.model), {
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: options.timeoutMs,
        // Status and body parsing are handled below so every failure maps onto a FetchError
        responseType: 'text',
        validateStatus: () => true,
      });

      const text = bodyText(response.data);
      if (response.status < 200 || response.status >= 300) {
        throw new TransportError(response.status, text);
      }

      let envelope: unknown;
      try {
        envelope = JSON.parse(text);
      } catch (parseError) {
        console.error('[Problem Service] Envelope is not JSON:', parseError);
        throw new MalformedResponseError('response body is not JSON');
      }

      return { ok: true, question: parseProblemContent(extractMessageContent(envelope), topic, difficulty) };
    } catch (error) {
      if (isFetchError(error)) {
        console.error(`[Problem Service] ${error.name}:`, error.message);
        return { ok: false, error };
      }
      console.error('[Problem Service] Request failed:', error);
      if (isAxiosError(error)) {
        return { ok: false, error: new TransportError(error.response?.status ?? null, error.message) };
      }
      return { ok: false, error: new TransportError(null, error instanceof Error ? error.message : String(error)) };
    }
  };

  return { name: 'chat-completions', fetch: fetchProblem };
};
