export type KnowledgeErrorCode = 'validation' | 'upstream';

/** Returned instead of a result; never thrown across the service boundary. */
export interface KnowledgeError {
  status: 'error';
  code: KnowledgeErrorCode;
  message: string;
}

export type KnowledgeSuccess<T> = T & { status: 'success' };

export type KnowledgeOutcome<T> = KnowledgeSuccess<T> | KnowledgeError;

export type KnowledgeOperation =
  | 'religion'
  | 'philosophy'
  | 'comparison'
  | 'daily-insight'
  | 'meditation'
  | 'interfaith'
  | 'practice';

export type PracticeLevel = 'beginner' | 'intermediate' | 'advanced';

export interface KnowledgeSource {
  name: string;
  reliability: 'high';
}

export interface ReligionInformation {
  religion: string;
  category: string;
  query?: string;
  content: string;
  sources: KnowledgeSource[];
}

export interface PhilosophicalPerspective {
  philosophy: string;
  topic?: string;
  content: string;
  sources: KnowledgeSource[];
}

export interface ReligionComparison {
  religion1: string;
  religion2: string;
  aspect: string;
  content: string;
  sources: KnowledgeSource[];
}

export interface DailyInsight {
  /** Local calendar date, `YYYY-MM-DD`. */
  date: string;
  tradition?: string;
  theme?: string;
  /** First quoted line of the insight, or an empty string. */
  quote: string;
  insight: string;
}

export interface MeditationGuide {
  tradition?: string;
  duration: number;
  focus: string;
  guide: string;
}

export interface InterfaithDialogue {
  topic: string;
  religions: string[];
  dialogue: string;
}

export interface PracticeGuide {
  practice: string;
  tradition?: string;
  level: PracticeLevel;
  guide: string;
}

export interface CatalogListing {
  religions: string[];
  philosophies: string[];
  categories: Record<string, string>;
}

/** Called once per cached lookup so callers can count hits and misses. */
export type CacheLookupObserver = (operation: KnowledgeOperation, hit: boolean) => void;
