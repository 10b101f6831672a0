export type Gender = 'masculine' | 'feminine' | 'neuter' | 'none';

export type CefrLevel = 'A1' | 'A2' | 'B1' | 'B2' | 'C1' | 'C2';

export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'night';

export interface ExampleSentence {
  german: string;
  english: string;
}

export interface WordRecord {
  id: number;
  german: string;
  english: string;
  gender: Gender;
  pronunciation: string;
  category: string;
  difficulty: CefrLevel;
  examples: readonly ExampleSentence[];
}

export interface ExposureRecord {
  timesShown: number;
  firstShown: string;
  lastShown: string | null;
  markedKnown: boolean;
  markedDifficult: boolean;
}

export interface ProgressState {
  dailyGoal: number;
  currentStreak: number;
  longestStreak: number;
  totalWordsLearned: number;
  totalStudyDays: number;
  achievements: string[];
  dailyProgress: Record<string, number>;
  lastActivityDate: string | null;
}

export type TimeRules = Record<TimeOfDay, string[]>;

export interface TimeOverlay {
  bucket: TimeOfDay;
  categories: string[];
}

export interface HistoryStats {
  uniqueWords: number;
  totalViews: number;
  averageViewsPerWord: number;
  estimatedStudyMinutes: number;
  /** Consecutive local days, ending today, on which some word was last shown. */
  recencyStreak: number;
}
