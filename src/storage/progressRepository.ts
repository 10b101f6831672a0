import { DEFAULT_DAILY_GOAL } from '../scheduler/constants';
import { achievementId, parseAchievementId } from '../progress/achievements';
import { ProgressState } from '../types';
import { asNonNegativeInt, asPositiveInt } from '../utils/counter';
import { logger } from '../utils/logger';
import { isDateKey } from '../utils/time';
import { readJsonFile, writeJsonAtomic } from './jsonFile';

interface PersistedProgress {
  daily_goal: number;
  current_streak: number;
  longest_streak: number;
  total_words_learned: number;
  total_study_days: number;
  achievements: string[];
  daily_progress: Record<string, number>;
  last_activity_date: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function defaultProgressState(dailyGoal = DEFAULT_DAILY_GOAL): ProgressState {
  return {
    dailyGoal,
    currentStreak: 0,
    longestStreak: 0,
    totalWordsLearned: 0,
    totalStudyDays: 0,
    achievements: [],
    dailyProgress: {},
    lastActivityDate: null,
  };
}

function normalizeAchievements(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const ids = new Set<string>();
  for (const entry of value) {
    const id = typeof entry === 'string' ? entry.trim() : '';
    if (id.length === 0) {
      continue;
    }
    // Ids this build cannot parse are kept as written.
    const achievement = parseAchievementId(id);
    ids.add(achievement ? achievementId(achievement) : id);
  }
  return [...ids];
}

function normalizeDailyProgress(value: unknown): Record<string, number> {
  const progress: Record<string, number> = {};
  if (!isRecord(value)) {
    return progress;
  }
  for (const [date, count] of Object.entries(value)) {
    const normalized = asNonNegativeInt(count, 0);
    if (isDateKey(date) && normalized > 0) {
      progress[date] = normalized;
    }
  }
  return progress;
}

export function normalizeProgressState(raw: unknown, fallbackDailyGoal = DEFAULT_DAILY_GOAL): ProgressState {
  if (!isRecord(raw)) {
    return defaultProgressState(fallbackDailyGoal);
  }
  const currentStreak = asNonNegativeInt(raw.current_streak, 0);
  return {
    dailyGoal: asPositiveInt(raw.daily_goal, fallbackDailyGoal),
    currentStreak,
    longestStreak: Math.max(currentStreak, asNonNegativeInt(raw.longest_streak, 0)),
    totalWordsLearned: asNonNegativeInt(raw.total_words_learned, 0),
    totalStudyDays: asNonNegativeInt(raw.total_study_days, 0),
    achievements: normalizeAchievements(raw.achievements),
    dailyProgress: normalizeDailyProgress(raw.daily_progress),
    lastActivityDate: isDateKey(raw.last_activity_date) ? raw.last_activity_date : null,
  };
}

export function loadProgress(filePath: string, fallbackDailyGoal = DEFAULT_DAILY_GOAL): ProgressState {
  const result = readJsonFile(filePath);
  if (result.status !== 'ok') {
    return defaultProgressState(fallbackDailyGoal);
  }
  if (!isRecord(result.value)) {
    logger.warn('Ignoring progress file with unexpected shape', { filePath });
    return defaultProgressState(fallbackDailyGoal);
  }
  return normalizeProgressState(result.value, fallbackDailyGoal);
}

export function saveProgress(filePath: string, state: ProgressState): boolean {
  const document: PersistedProgress = {
    daily_goal: state.dailyGoal,
    current_streak: state.currentStreak,
    longest_streak: state.longestStreak,
    total_words_learned: state.totalWordsLearned,
    total_study_days: state.totalStudyDays,
    achievements: [...state.achievements],
    daily_progress: { ...state.dailyProgress },
    last_activity_date: state.lastActivityDate,
  };
  return writeJsonAtomic(filePath, document);
}
