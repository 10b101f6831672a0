import { DEFAULT_DAILY_GOAL, STREAK_MILESTONES } from '../scheduler/constants';
import { loadProgress, saveProgress } from '../storage/progressRepository';
import { ProgressState } from '../types';
import { isPositiveInteger } from '../utils/counter';
import { logger } from '../utils/logger';
import { Clock, previousDateKey, systemClock, toDateKey } from '../utils/time';
import { achievementId, describeAchievement, qualifyingAchievements } from './achievements';

export interface ProgressTrackerOptions {
  filePath: string;
  clock?: Clock;
  /** Goal used when the persisted document has none. */
  defaultDailyGoal?: number;
}

export interface ProgressSnapshot {
  readonly dailyGoal: number;
  readonly currentStreak: number;
  readonly longestStreak: number;
  readonly totalWordsLearned: number;
  readonly totalStudyDays: number;
  readonly achievements: readonly string[];
  readonly dailyProgress: Readonly<Record<string, number>>;
  readonly lastActivityDate: string | null;
}

export class ProgressTracker {
  private readonly state: ProgressState;

  private readonly filePath: string;

  private readonly clock: Clock;

  constructor({ filePath, clock = systemClock, defaultDailyGoal = DEFAULT_DAILY_GOAL }: ProgressTrackerOptions) {
    if (!isPositiveInteger(defaultDailyGoal)) {
      throw new RangeError(`defaultDailyGoal must be a positive integer, got ${defaultDailyGoal}`);
    }
    this.filePath = filePath;
    this.clock = clock;
    this.state = loadProgress(filePath, defaultDailyGoal);
  }

  private today(): string {
    return toDateKey(this.clock());
  }

  private advanceStreak(today: string): void {
    const { lastActivityDate } = this.state;
    if (lastActivityDate === today) {
      return;
    }
    if (lastActivityDate !== null && lastActivityDate === previousDateKey(today)) {
      this.state.currentStreak += 1;
    } else {
      this.state.currentStreak = 1;
    }
    this.state.totalStudyDays += 1;
  }

  /** Counts `count` studied words toward today and returns the achievement ids this call unlocked. */
  recordActivity(count = 1): string[] {
    if (!isPositiveInteger(count)) {
      throw new RangeError(`count must be a positive integer, got ${count}`);
    }
    const today = this.today();
    this.advanceStreak(today);
    this.state.longestStreak = Math.max(this.state.longestStreak, this.state.currentStreak);
    this.state.lastActivityDate = today;
    this.state.dailyProgress[today] = (this.state.dailyProgress[today] ?? 0) + count;
    this.state.totalWordsLearned += count;

    const unlocked = this.unlockAchievements(today);
    this.persist();
    return unlocked;
  }

  private unlockAchievements(today: string): string[] {
    const owned = new Set(this.state.achievements);
    const unlocked: string[] = [];
    const qualifying = qualifyingAchievements({
      currentStreak: this.state.currentStreak,
      totalWordsLearned: this.state.totalWordsLearned,
      dailyGoal: this.state.dailyGoal,
      today,
      wordsToday: this.state.dailyProgress[today] ?? 0,
    });
    for (const achievement of qualifying) {
      const id = achievementId(achievement);
      if (owned.has(id)) {
        continue;
      }
      owned.add(id);
      this.state.achievements.push(id);
      unlocked.push(id);
      logger.info('Achievement unlocked', { id, label: describeAchievement(id) });
    }
    return unlocked;
  }

  private persist(): void {
    if (!saveProgress(this.filePath, this.state)) {
      logger.warn('Progress kept in memory only', { filePath: this.filePath });
    }
  }

  getDailyProgress(): number {
    return this.state.dailyProgress[this.today()] ?? 0;
  }

  getDailyGoal(): number {
    return this.state.dailyGoal;
  }

  setDailyGoal(goal: number): void {
    if (!isPositiveInteger(goal)) {
      throw new RangeError(`Daily goal must be a positive integer, got ${goal}`);
    }
    this.state.dailyGoal = goal;
    this.persist();
  }

  getCurrentStreak(): number {
    return this.state.currentStreak;
  }

  getLongestStreak(): number {
    return this.state.longestStreak;
  }

  getTotalWords(): number {
    return this.state.totalWordsLearned;
  }

  getTotalStudyDays(): number {
    return this.state.totalStudyDays;
  }

  getAchievements(): string[] {
    return [...this.state.achievements];
  }

  /** Current streak when today's first word lands on a milestone day. */
  getStreakMilestone(): number | undefined {
    const streak = this.state.currentStreak;
    const isMilestone = STREAK_MILESTONES.some((milestone) => milestone === streak);
    return isMilestone && this.getDailyProgress() === 1 ? streak : undefined;
  }

  snapshot(): ProgressSnapshot {
    return Object.freeze({
      ...this.state,
      achievements: Object.freeze([...this.state.achievements]),
      dailyProgress: Object.freeze({ ...this.state.dailyProgress }),
    });
  }
}
