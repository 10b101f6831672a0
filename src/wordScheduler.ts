import { loadVocabularyDirectory, VocabularyCatalog } from './catalog/vocabularyCatalog';
import { SchedulerConfig } from './config/schedulerConfig';
import { parseAchievementId } from './progress/achievements';
import { ProgressSnapshot, ProgressTracker } from './progress/progressTracker';
import { RandomSource, resolveTimeOverlay, selectNext } from './scheduler/selection';
import { WeightOptions } from './scheduler/weight';
import { ExposureHistoryStore } from './storage/historyRepository';
import { HistoryStats, TimeOverlay, WordRecord } from './types';
import { logger } from './utils/logger';
import { Clock, systemClock } from './utils/time';

export interface WordSchedulerOptions {
  config: SchedulerConfig;
  clock?: Clock;
  random?: RandomSource;
  weights?: WeightOptions;
  /** Preloaded catalog; `config.vocabularyDir` is read when omitted. */
  catalog?: VocabularyCatalog;
}

export interface PresentationOutcome {
  word: WordRecord;
  achievements: string[];
  dailyGoalReached: boolean;
  streakMilestone: number | undefined;
}

export class WordScheduler {
  private readonly config: SchedulerConfig;

  private readonly clock: Clock;

  private readonly random: RandomSource;

  private readonly weights: WeightOptions;

  private readonly catalog: VocabularyCatalog;

  private readonly history: ExposureHistoryStore;

  private readonly progress: ProgressTracker;

  constructor({ config, clock = systemClock, random = Math.random, weights = {}, catalog }: WordSchedulerOptions) {
    this.config = config;
    this.clock = clock;
    this.random = random;
    this.weights = weights;
    this.catalog = catalog ?? loadVocabularyDirectory(config.vocabularyDir);
    this.history = new ExposureHistoryStore({ filePath: config.historyFile, clock });
    this.progress = new ProgressTracker({ filePath: config.progressFile, clock });
    if (config.dailyGoal !== undefined && config.dailyGoal !== this.progress.getDailyGoal()) {
      this.progress.setDailyGoal(config.dailyGoal);
    }
  }

  private defaultOverlay(): TimeOverlay | null {
    return this.config.timeBasedCategories ? resolveTimeOverlay(this.clock(), this.config.timeRules) : null;
  }

  /** Next word to show, or `undefined` when the catalog is empty. */
  selectNext(
    currentId?: number | null,
    enabledCategories: readonly string[] = this.config.enabledCategories,
    timeOverlay: TimeOverlay | null = this.defaultOverlay(),
  ): WordRecord | undefined {
    return selectNext(this.catalog, this.history, currentId, enabledCategories, timeOverlay, {
      random: this.random,
      weights: this.weights,
    });
  }

  recordExposure(id: number): void {
    this.history.recordExposure(id);
  }

  recordActivity(count = 1): string[] {
    return this.progress.recordActivity(count);
  }

  present(word: WordRecord): PresentationOutcome {
    this.recordExposure(word.id);
    const achievements = this.recordActivity();
    return {
      word,
      achievements,
      dailyGoalReached: achievements.some((id) => parseAchievementId(id)?.kind === 'daily_goal'),
      streakMilestone: this.progress.getStreakMilestone(),
    };
  }

  markKnown(id: number): void {
    this.history.markKnown(id);
  }

  markDifficult(id: number): void {
    this.history.markDifficult(id);
  }

  getDailyProgress(): number {
    return this.progress.getDailyProgress();
  }

  getDailyGoal(): number {
    return this.progress.getDailyGoal();
  }

  setDailyGoal(goal: number): void {
    this.progress.setDailyGoal(goal);
  }

  getCurrentStreak(): number {
    return this.progress.getCurrentStreak();
  }

  getLongestStreak(): number {
    return this.progress.getLongestStreak();
  }

  progressSnapshot(): ProgressSnapshot {
    return this.progress.snapshot();
  }

  historyStats(): HistoryStats {
    return this.history.getStats();
  }

  listCategories(): string[] {
    return this.catalog.listCategories();
  }

  /** Trims history and writes it durably. Returns false when the final write failed. */
  shutdown(): boolean {
    if (this.history.cleanupOldEntries(this.config.historyMaxEntries)) {
      return true;
    }
    const flushed = this.history.flush();
    if (!flushed) {
      logger.error('History could not be flushed on shutdown', { filePath: this.config.historyFile });
    }
    return flushed;
  }
}
