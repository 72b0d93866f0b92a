import { ApiError, GoogleGenAI, Type, type GenerateContentParameters } from "@google/genai";
import type { Topic } from '../types';
import { MalformedResponseError, TransportError } from './errors';
import { buildSystemPrompt, OPTION_COUNT, parseProblemContent, USER_PROMPT } from './problemFormat';
import { isFetchError, type FetchResult, type ProblemProvider } from './problemProvider';

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

// The slice of GoogleGenAI this provider calls; tests hand in a fake.
export interface GenerateContentClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
  };
}

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
  client?: GenerateContentClient;
}

export const buildGeminiRequest = (topic: Topic, difficulty: number, model: string): GenerateContentParameters => ({
  model,
  contents: USER_PROMPT,
  config: {
    systemInstruction: buildSystemPrompt(topic, difficulty),
    responseMimeType: "application/json",
    temperature: 0.7,
    maxOutputTokens: 800,
    responseSchema: {
      type: Type.OBJECT,
      properties: {
        question: {
          type: Type.STRING,
          description: "The question text.",
        },
        options: {
          type: Type.ARRAY,
          items: { type: Type.STRING },
          description: `A list of exactly ${OPTION_COUNT} distinct options.`,
        },
        correctAnswer: {
          type: Type.INTEGER,
          description: `The zero-based index (0-${OPTION_COUNT - 1}) of the correct option.`,
        },
        explanation: {
          type: Type.STRING,
          description: "An explanation that teaches the concept behind the answer.",
        },
      },
      required: ["question", "options", "correctAnswer", "explanation"],
    },
  },
});

// The SDK puts the whole JSON error body in ApiError.message; show only its "message" field.
const readableApiMessage = (raw: string): string => {
  const match = raw.match(/"message":\s*"([^"]+)"/);
  return match && match[1] ? match[1] : raw;
};

export const createGeminiProblemProvider = (options: GeminiProviderOptions): ProblemProvider => {
  const ai: GenerateContentClient = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });

  const fetchProblem = async (topic: Topic, difficulty: number): Promise<FetchResult> => {
    try {
      const response = await ai.models.generateContent(buildGeminiRequest(topic, difficulty, options.model));

      const text = response.text;
      if (!text) {
        throw new MalformedResponseError("empty response from AI");
      }

      return { ok: true, question: parseProblemContent(text, topic, difficulty) };
    } catch (error) {
      if (isFetchError(error)) {
        console.error(`[Gemini Service] ${error.name}:`, error.message);
        return { ok: false, error };
      }
      console.error("[Gemini Service] Detailed API Error:", error);
      if (error instanceof ApiError) {
        return { ok: false, error: new TransportError(error.status, error.message, readableApiMessage(error.message)) };
      }
      return { ok: false, error: new TransportError(null, error instanceof Error ? error.message : String(error)) };
    }
  };

  return { name: "gemini", fetch: fetchProblem };
};
