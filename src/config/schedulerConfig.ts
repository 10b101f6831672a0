import { z } from 'zod';
import { ALL_CATEGORIES, HISTORY_MAX_ENTRIES } from '../scheduler/constants';
import { readJsonFile } from '../storage/jsonFile';
import { TimeRules } from '../types';
import { logger } from '../utils/logger';

export const DEFAULT_TIME_RULES: TimeRules = {
  morning: ['food', 'adjectives'],
  afternoon: ['verbs', 'travel'],
  evening: ['animals', 'body'],
  night: ['core_1000'],
};

const categoryListSchema = z.array(z.string().trim().min(1, 'Category names cannot be empty'));

export const schedulerConfigSchema = z.object({
  vocabularyDir: z.string().min(1),
  historyFile: z.string().min(1),
  progressFile: z.string().min(1),
  /** Seconds between word changes. The display layer owns the timer; the scheduler only validates it. */
  refreshIntervalSeconds: z
    .number()
    .int()
    .min(30, 'Refresh interval must be at least 30 seconds')
    .max(300, 'Refresh interval must be at most 300 seconds'),
  enabledCategories: categoryListSchema,
  timeBasedCategories: z.boolean(),
  timeRules: z.object({
    morning: categoryListSchema,
    afternoon: categoryListSchema,
    evening: categoryListSchema,
    night: categoryListSchema,
  }),
  /** Replaces the persisted goal at startup when set. */
  dailyGoal: z.number().int().positive('Daily goal must be a positive integer').optional(),
  historyMaxEntries: z.number().int().nonnegative(),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

type ConfigLayer = { [K in keyof SchedulerConfig]?: unknown };

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  vocabularyDir: 'data/vocabulary',
  historyFile: 'data/history.json',
  progressFile: 'data/gamification.json',
  refreshIntervalSeconds: 60,
  enabledCategories: [ALL_CATEGORIES],
  timeBasedCategories: false,
  timeRules: DEFAULT_TIME_RULES,
  historyMaxEntries: HISTORY_MAX_ENTRIES,
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scheduler configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface LoadSchedulerConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path to a desktop-format `config.json`. */
  file?: string;
  overrides?: Partial<SchedulerConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compact(layer: ConfigLayer): ConfigLayer {
  const defined: ConfigLayer = {};
  for (const [key, value] of Object.entries(layer)) {
    if (value !== undefined) {
      Object.assign(defined, { [key]: value });
    }
  }
  return defined;
}

function envText(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envText(env, name);
  return value === undefined ? undefined : Number(value);
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | string | undefined {
  const value = envText(env, name)?.toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') {
    return true;
  }
  if (value === 'false' || value === '0' || value === 'no') {
    return false;
  }
  return value;
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const value = envText(env, name);
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  return compact({
    vocabularyDir: envText(env, 'VOCAB_DIR'),
    historyFile: envText(env, 'HISTORY_FILE'),
    progressFile: envText(env, 'PROGRESS_FILE'),
    refreshIntervalSeconds: envNumber(env, 'REFRESH_INTERVAL_SECONDS'),
    enabledCategories: envList(env, 'ENABLED_CATEGORIES'),
    timeBasedCategories: envBoolean(env, 'TIME_BASED_CATEGORIES'),
    dailyGoal: envNumber(env, 'DAILY_GOAL'),
    historyMaxEntries: envNumber(env, 'HISTORY_MAX_ENTRIES'),
  });
}

function readFileLayer(filePath: string): ConfigLayer {
  const result = readJsonFile(filePath);
  if (result.status !== 'ok') {
    return {};
  }
  if (!isRecord(result.value)) {
    logger.warn('Ignoring config file with unexpected shape', { filePath });
    return {};
  }
  const behavior = isRecord(result.value.behavior) ? result.value.behavior : {};
  const learning = isRecord(result.value.learning) ? result.value.learning : {};
  const timeRules = isRecord(learning.time_rules) ? { ...DEFAULT_TIME_RULES, ...learning.time_rules } : undefined;

  return compact({
    refreshIntervalSeconds: behavior.refresh_interval_seconds,
    timeBasedCategories: behavior.time_based_categories,
    enabledCategories: learning.enabled_categories,
    timeRules,
  });
}

/** Merges defaults, the config file, the environment and explicit overrides, in that order. */
export function loadSchedulerConfig({ env = process.env, file, overrides = {} }: LoadSchedulerConfigOptions = {}): SchedulerConfig {
  const merged: ConfigLayer = {
    ...DEFAULT_SCHEDULER_CONFIG,
    ...(file ? readFileLayer(file) : {}),
    ...readEnvLayer(env),
    ...compact(overrides),
  };
  const parsed = schedulerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
