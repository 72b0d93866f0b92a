import { MAX_DIFFICULTY, type Question, type Topic } from '../types';
import { MalformedResponseError, ValidationError } from './errors';

export const OPTION_COUNT = 4;

export const buildSystemPrompt = (topic: Topic, difficulty: number): string => `
CRITICAL: Return ONLY valid JSON. No other text.

Generate one multiple-choice science question about ${topic}.
Difficulty level: ${difficulty}/${MAX_DIFFICULTY}.

Required JSON format:
{
  "question": "Your science question here?",
  "options": ["Option A text", "Option B text", "Option C text", "Option D text"],
  "correctAnswer": 0,
  "explanation": "Detailed explanation here..."
}

Rules:
1. correctAnswer must be 0, 1, 2, or 3
2. Provide 4 distinct options
3. Explanation should teach the concept
4. Make it challenging but fair for difficulty ${difficulty}
`.trim();

export const USER_PROMPT = 'Generate exactly one science question in JSON format.';

const cleanJSON = (text: string): string => {
  // Models sometimes wrap the object in ```json fences despite the instructions
  const clean = text.replace(/```json/g, '').replace(/```/g, '');
  return clean.trim();
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requireString = (payload: Record<string, unknown>, field: string): string => {
  const value = payload[field];
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`missing or non-string field "${field}"`);
  }
  return value;
};

const requireNonEmpty = (value: string, field: string): string => {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new ValidationError(`empty ${field}`);
  }
  return trimmed;
};

/**
 * Turns the model's message content into a Question.
 *
 * Throws MalformedResponseError when the content is not JSON or lacks a field,
 * and ValidationError when it parses but breaks a Question invariant.
 * The topic and difficulty come from the request, never from the payload.
 */
export const parseProblemContent = (content: string, topic: Topic, difficulty: number): Question => {
  let payload: unknown;
  try {
    payload = JSON.parse(cleanJSON(content));
  } catch (parseError) {
    console.error('[Problem Service] JSON Parse Error:', parseError, 'Raw Text:', content);
    throw new MalformedResponseError('content is not valid JSON');
  }

  if (!isRecord(payload)) {
    throw new MalformedResponseError('content is not a JSON object');
  }

  const question = requireString(payload, 'question');
  const explanation = requireString(payload, 'explanation');

  const options = payload.options;
  if (!Array.isArray(options)) {
    throw new MalformedResponseError('missing or non-array field "options"');
  }
  const optionTexts = options.map((option, index) => {
    if (typeof option !== 'string') {
      throw new MalformedResponseError(`option ${index} is not a string`);
    }
    return option;
  });

  const correctAnswer = payload.correctAnswer;
  if (typeof correctAnswer !== 'number' || !Number.isInteger(correctAnswer)) {
    throw new MalformedResponseError('missing or non-integer field "correctAnswer"');
  }

  if (optionTexts.length !== OPTION_COUNT) {
    throw new ValidationError(`expected ${OPTION_COUNT} options, got ${optionTexts.length}`);
  }
  if (correctAnswer < 0 || correctAnswer >= OPTION_COUNT) {
    throw new ValidationError(`invalid correctAnswer: ${correctAnswer}`);
  }

  return {
    question: requireNonEmpty(question, 'question'),
    options: optionTexts.map((option, index) => requireNonEmpty(option, `option ${index}`)),
    correctAnswer,
    explanation: requireNonEmpty(explanation, 'explanation'),
    topic,
    difficulty,
  };
};
