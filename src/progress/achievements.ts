import { isDateKey } from '../utils/time';

export const STREAK_THRESHOLDS = [7, 30, 100] as const;
export const WORD_THRESHOLDS = [100, 500, 1000] as const;

export type StreakThreshold = (typeof STREAK_THRESHOLDS)[number];
export type WordThreshold = (typeof WORD_THRESHOLDS)[number];

export type Achievement =
  | { kind: 'streak'; days: StreakThreshold }
  | { kind: 'words'; count: WordThreshold }
  | { kind: 'daily_goal'; date: string };

export interface AchievementMetrics {
  currentStreak: number;
  totalWordsLearned: number;
  dailyGoal: number;
  today: string;
  wordsToday: number;
}

const DAILY_GOAL_PREFIX = 'daily_goal_';

const STREAK_LABELS: Record<StreakThreshold, string> = {
  7: 'Week Warrior - 7 day streak!',
  30: 'Monthly Master - 30 day streak!',
  100: 'Century Streak - 100 days!',
};

const WORD_LABELS: Record<WordThreshold, string> = {
  100: 'First Hundred - 100 words learned',
  500: 'Half Thousand - 500 words learned',
  1000: 'Thousand Club - 1000 words learned',
};

export function achievementId(achievement: Achievement): string {
  switch (achievement.kind) {
    case 'streak':
      return `streak_${achievement.days}`;
    case 'words':
      return `words_${achievement.count}`;
    case 'daily_goal':
      return `${DAILY_GOAL_PREFIX}${achievement.date}`;
  }
}

function findThreshold<T extends number>(thresholds: readonly T[], raw: string): T | undefined {
  return thresholds.find((threshold) => String(threshold) === raw);
}

/**
 * Parses a persisted achievement id, including the ids written by the
 * first releases (`7_day_streak`, `100_words`).
 */
export function parseAchievementId(id: string): Achievement | null {
  if (id.startsWith(DAILY_GOAL_PREFIX)) {
    const date = id.slice(DAILY_GOAL_PREFIX.length);
    return isDateKey(date) ? { kind: 'daily_goal', date } : null;
  }
  const streak = /^streak_(\d+)$/.exec(id) ?? /^(\d+)_day_streak$/.exec(id);
  if (streak) {
    const days = findThreshold(STREAK_THRESHOLDS, streak[1]);
    return days === undefined ? null : { kind: 'streak', days };
  }
  const words = /^words_(\d+)$/.exec(id) ?? /^(\d+)_words$/.exec(id);
  if (words) {
    const count = findThreshold(WORD_THRESHOLDS, words[1]);
    return count === undefined ? null : { kind: 'words', count };
  }
  return null;
}

/** Achievements whose thresholds the metrics satisfy, in streak, words, daily goal order. */
export function qualifyingAchievements(metrics: AchievementMetrics): Achievement[] {
  const qualifying: Achievement[] = [];
  for (const days of STREAK_THRESHOLDS) {
    if (metrics.currentStreak >= days) {
      qualifying.push({ kind: 'streak', days });
    }
  }
  for (const count of WORD_THRESHOLDS) {
    if (metrics.totalWordsLearned >= count) {
      qualifying.push({ kind: 'words', count });
    }
  }
  if (metrics.wordsToday === metrics.dailyGoal) {
    qualifying.push({ kind: 'daily_goal', date: metrics.today });
  }
  return qualifying;
}

export function describeAchievement(id: string): string {
  const achievement = parseAchievementId(id);
  if (!achievement) {
    return id;
  }
  switch (achievement.kind) {
    case 'streak':
      return STREAK_LABELS[achievement.days];
    case 'words':
      return WORD_LABELS[achievement.count];
    case 'daily_goal':
      return 'Daily Goal Complete!';
  }
}
