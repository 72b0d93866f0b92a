import { DEFAULT_DIFFICULTY, DEFAULT_TOPICS, NO_TOPICS_MESSAGE, UNKNOWN_ERROR_MESSAGE } from '../constants';
import {
  ALL_TOPICS,
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  type SessionPhase,
  type SessionSnapshot,
  type Statistics,
  type Topic,
} from '../types';
import { describeFetchError } from './errors';
import type { FetchResult, ProblemProvider } from './problemProvider';

export interface SessionStateOptions {
  /** Uniform source in [0, 1); swapped out in tests. */
  random?: () => number;
  topics?: Iterable<Topic>;
  difficulty?: number;
}

type SessionFields = Omit<SessionSnapshot, 'phase'>;

const ZERO_STATS: Statistics = { correct: 0, total: 0, streak: 0, bestStreak: 0 };

export const accuracy = (stats: Readonly<Statistics>): number =>
  stats.total > 0 ? stats.correct / stats.total : 0;

// An error only becomes the phase when there is no question to fall back on.
const derivePhase = (fields: SessionFields): SessionPhase => {
  if (fields.isLoading) return 'loading';
  if (!fields.currentProblem) return fields.errorMessage ? 'error' : 'idle';
  if (fields.showSolution) return 'revealed';
  return fields.selectedAnswer === null ? 'awaitingAnswer' : 'answerSelected';
};

const clampDifficulty = (value: number): number =>
  Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(value)));

const normalizeTopics = (topics: Iterable<Topic>): Topic[] => {
  const chosen = new Set(topics);
  return ALL_TOPICS.filter(topic => chosen.has(topic));
};

/**
 * Owns everything the practice screen shows. Mutations replace the snapshot
 * and notify subscribers, which lines up with React's useSyncExternalStore.
 *
 * Overlapping generate() calls settle by completion order: any result newer
 * than the last one applied is installed, and one that arrives after a newer
 * call has already been applied is dropped. The spinner stays up until the
 * latest call settles.
 */
export class SessionState {
  private snapshot: SessionSnapshot;
  private readonly listeners = new Set<() => void>();
  private readonly random: () => number;
  private latestTicket = 0;
  private lastAppliedTicket = 0;
  // True while the shown question is counted in `total` but not yet scored.
  private pendingScore = false;

  constructor(private readonly provider: ProblemProvider, options: SessionStateOptions = {}) {
    this.random = options.random ?? Math.random;
    const fields: SessionFields = {
      currentProblem: null,
      selectedAnswer: null,
      showSolution: false,
      isLoading: false,
      errorMessage: null,
      selectedTopics: normalizeTopics(options.topics ?? DEFAULT_TOPICS),
      difficulty: clampDifficulty(options.difficulty ?? DEFAULT_DIFFICULTY),
      stats: { ...ZERO_STATS },
    };
    this.snapshot = { ...fields, phase: derivePhase(fields) };
  }

  getSnapshot = (): SessionSnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  selectTopics(topics: Iterable<Topic>): void {
    this.update({ selectedTopics: normalizeTopics(topics) });
  }

  toggleTopic(topic: Topic): void {
    const current = this.snapshot.selectedTopics;
    this.selectTopics(current.includes(topic) ? current.filter(t => t !== topic) : [...current, topic]);
  }

  setDifficulty(value: number): void {
    if (!Number.isFinite(value)) return;
    this.update({ difficulty: clampDifficulty(value) });
  }

  async generate(): Promise<void> {
    const { selectedTopics, difficulty } = this.snapshot;
    if (selectedTopics.length === 0) {
      this.update({ errorMessage: NO_TOPICS_MESSAGE });
      return;
    }

    const ticket = ++this.latestTicket;
    this.update({ isLoading: true, selectedAnswer: null, showSolution: false, errorMessage: null });

    const index = Math.min(Math.floor(this.random() * selectedTopics.length), selectedTopics.length - 1);
    const topic = selectedTopics[index];

    let result: FetchResult;
    try {
      result = await this.provider.fetch(topic, difficulty);
    } catch (error) {
      if (!this.claim(ticket)) return;
      console.error('[Session] Provider rejected:', error);
      this.update({
        isLoading: ticket !== this.latestTicket,
        errorMessage: error instanceof Error ? error.message : UNKNOWN_ERROR_MESSAGE,
      });
      return;
    }

    if (!this.claim(ticket)) return;

    const isLoading = ticket !== this.latestTicket;
    if (result.ok) {
      const { stats } = this.snapshot;
      this.pendingScore = true;
      this.update({
        currentProblem: result.question,
        selectedAnswer: null,
        showSolution: false,
        isLoading,
        errorMessage: null,
        stats: { ...stats, total: stats.total + 1 },
      });
    } else {
      this.update({ isLoading, errorMessage: describeFetchError(result.error) });
    }
  }

  // Marks the call as applied unless a newer one already was.
  private claim(ticket: number): boolean {
    if (ticket < this.lastAppliedTicket) {
      console.warn(`[Session] Discarding result of overtaken request #${ticket}`);
      return false;
    }
    this.lastAppliedTicket = ticket;
    return true;
  }

  /** Throws RangeError for an index outside the current options. */
  selectAnswer(index: number): void {
    const { currentProblem, showSolution } = this.snapshot;
    if (!currentProblem || showSolution) return;
    if (!Number.isInteger(index) || index < 0 || index >= currentProblem.options.length) {
      throw new RangeError(`answer index ${index} is outside 0..${currentProblem.options.length - 1}`);
    }
    this.update({ selectedAnswer: index });
  }

  reveal(): void {
    const { currentProblem, selectedAnswer, showSolution, stats } = this.snapshot;
    if (!currentProblem || selectedAnswer === null || showSolution) return;

    if (!this.pendingScore) {
      this.update({ showSolution: true });
      return;
    }

    this.pendingScore = false;
    if (selectedAnswer === currentProblem.correctAnswer) {
      const streak = stats.streak + 1;
      this.update({
        showSolution: true,
        stats: { ...stats, correct: stats.correct + 1, streak, bestStreak: Math.max(stats.bestStreak, streak) },
      });
    } else {
      this.update({ showSolution: true, stats: { ...stats, streak: 0 } });
    }
  }

  resetStatistics(): void {
    // The question on screen was counted before the reset; scoring it now would push correct past total
    this.pendingScore = false;
    this.update({ stats: { ...ZERO_STATS } });
  }

  private update(patch: Partial<SessionFields>): void {
    const fields: SessionFields = { ...this.snapshot, ...patch };
    this.snapshot = { ...fields, phase: derivePhase(fields) };
    this.listeners.forEach(listener => listener());
  }
}
