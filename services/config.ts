import { MissingCredentialError } from './errors';
import { createGeminiProblemProvider, DEFAULT_GEMINI_MODEL } from './geminiService';
import type { ProblemProvider } from './problemProvider';
import { createChatProblemProvider, DEFAULT_CHAT_ENDPOINT, DEFAULT_CHAT_MODEL } from './problemService';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type AppConfig =
  | { provider: 'groq'; apiKey: string; endpoint: string; model: string; timeoutMs: number }
  | { provider: 'gemini'; apiKey: string; model: string };

export type EnvSource = Record<string, string | undefined>;

// Each access is spelled out so Vite's `define` can substitute it at build time.
export const readEnv = (): EnvSource => ({
  PROBLEM_PROVIDER: process.env.PROBLEM_PROVIDER,
  GROQ_API_KEY: process.env.GROQ_API_KEY,
  GROQ_API_URL: process.env.GROQ_API_URL,
  GROQ_MODEL: process.env.GROQ_MODEL,
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  REQUEST_TIMEOUT_MS: process.env.REQUEST_TIMEOUT_MS,
});

// Vite stringifies absent variables, so "undefined" and "" both mean unset.
const valueOf = (env: EnvSource, key: string): string | undefined => {
  const value = env[key]?.trim();
  if (!value || value === 'undefined') return undefined;
  return value;
};

const requireCredential = (env: EnvSource, key: string): string => {
  const apiKey = valueOf(env, key);
  if (!apiKey) {
    console.error(`[Config] CRITICAL ERROR: ${key} is missing.`);
    throw new MissingCredentialError(key);
  }
  console.log(`[Config] ${key} loaded successfully. (Length: ${apiKey.length})`);
  return apiKey;
};

const parseTimeout = (raw: string | undefined): number => {
  if (raw === undefined) return DEFAULT_TIMEOUT_MS;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[Config] Ignoring REQUEST_TIMEOUT_MS="${raw}", using ${DEFAULT_TIMEOUT_MS}`);
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
};

/**
 * Resolves startup configuration. Throws MissingCredentialError when the
 * chosen provider has no key; callers treat that as fatal.
 */
export const loadConfig = (env: EnvSource): AppConfig => {
  const provider = valueOf(env, 'PROBLEM_PROVIDER')?.toLowerCase() ?? 'groq';

  switch (provider) {
    case 'groq':
      return {
        provider: 'groq',
        apiKey: requireCredential(env, 'GROQ_API_KEY'),
        endpoint: valueOf(env, 'GROQ_API_URL') ?? DEFAULT_CHAT_ENDPOINT,
        model: valueOf(env, 'GROQ_MODEL') ?? DEFAULT_CHAT_MODEL,
        timeoutMs: parseTimeout(valueOf(env, 'REQUEST_TIMEOUT_MS')),
      };
    case 'gemini':
      return {
        provider: 'gemini',
        apiKey: requireCredential(env, 'GEMINI_API_KEY'),
        model: valueOf(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
      };
    default:
      throw new Error(`Unknown PROBLEM_PROVIDER "${provider}". Use "groq" or "gemini".`);
  }
};

export const createProblemProvider = (config: AppConfig): ProblemProvider => {
  switch (config.provider) {
    case 'groq':
      return createChatProblemProvider(config);
    case 'gemini':
      return createGeminiProblemProvider(config);
  }
};
