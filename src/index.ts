export { WordScheduler } from './wordScheduler';
export type { PresentationOutcome, WordSchedulerOptions } from './wordScheduler';
export { loadVocabularyDirectory, normalizeWordRecord, VocabularyCatalog } from './catalog/vocabularyCatalog';
export type { CatalogLoadReport } from './catalog/vocabularyCatalog';
export { ExposureHistoryStore } from './storage/historyRepository';
export type { HistoryStoreOptions, RecordExposureOptions } from './storage/historyRepository';
export { readJsonFile, writeJsonAtomic } from './storage/jsonFile';
export { ProgressTracker } from './progress/progressTracker';
export type { ProgressSnapshot, ProgressTrackerOptions } from './progress/progressTracker';
export { achievementId, describeAchievement, parseAchievementId } from './progress/achievements';
export type { Achievement } from './progress/achievements';
export { buildCandidatePool, pickWeighted, resolveTimeOverlay, selectNext } from './scheduler/selection';
export type { CatalogView, RandomSource, SelectionOptions } from './scheduler/selection';
export { computeWeights, computeWordWeight } from './scheduler/weight';
export type { ExposureHistoryView, WeightOptions } from './scheduler/weight';
export { NEVER_SHOWN_HOURS } from './scheduler/constants';
export {
  ConfigError,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_TIME_RULES,
  loadSchedulerConfig,
  schedulerConfigSchema,
} from './config/schedulerConfig';
export type { LoadSchedulerConfigOptions, SchedulerConfig } from './config/schedulerConfig';
export * from './types';
