export enum Topic {
  Biology = "Biology",
  Chemistry = "Chemistry",
  Physics = "Physics",
  EarthScience = "Earth Science",
  Astronomy = "Astronomy",
  Environmental = "Environmental",
}

export const ALL_TOPICS: readonly Topic[] = Object.values(Topic);

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

export interface Question {
  readonly question: string;
  readonly options: readonly string[];
  readonly correctAnswer: number; // zero-based index into options
  readonly explanation: string;
  readonly topic: Topic;
  readonly difficulty: number;
}

export interface Statistics {
  correct: number;
  total: number;
  streak: number;
  bestStreak: number;
}

export type SessionPhase =
  | 'idle'
  | 'loading'
  | 'error'
  | 'awaitingAnswer'
  | 'answerSelected'
  | 'revealed';

export interface SessionSnapshot {
  readonly currentProblem: Question | null;
  readonly selectedAnswer: number | null;
  readonly showSolution: boolean;
  readonly isLoading: boolean;
  readonly errorMessage: string | null;
  readonly selectedTopics: readonly Topic[];
  readonly difficulty: number;
  readonly stats: Readonly<Statistics>;
  readonly phase: SessionPhase;
}

export enum DifficultyBand {
  Easy = "Easy",
  Medium = "Medium",
  Hard = "Hard",
  Expert = "Expert",
}
