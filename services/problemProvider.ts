import type { Question, Topic } from '../types';
import { type FetchError, MalformedResponseError, TransportError, ValidationError } from './errors';

export type FetchResult =
  | { ok: true; question: Question }
  | { ok: false; error: FetchError };

export interface ProblemProvider {
  readonly name: string;
  /** One round trip to the question service. Resolves with a result and never rejects. */
  fetch(topic: Topic, difficulty: number): Promise<FetchResult>;
}

export const isFetchError = (error: unknown): error is FetchError =>
  error instanceof TransportError ||
  error instanceof MalformedResponseError ||
  error instanceof ValidationError;
