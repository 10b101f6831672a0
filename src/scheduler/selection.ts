import { TimeOverlay, TimeRules, WordRecord } from '../types';
import { timeOfDayForHour } from '../utils/time';
import { ALL_CATEGORIES } from './constants';
import { computeWordWeight, ExposureHistoryView, WeightOptions } from './weight';

export type RandomSource = () => number;

export interface CatalogView {
  getAll(): readonly WordRecord[];
}

export interface SelectionOptions {
  random?: RandomSource;
  weights?: WeightOptions;
}

function isAllCategories(categories: readonly string[]): boolean {
  if (categories.length === 0) {
    return true;
  }
  return new Set(categories).size === 1 && categories[0] === ALL_CATEGORIES;
}

function withinCategories(words: readonly WordRecord[], categories: readonly string[]): WordRecord[] {
  const allowed = new Set(categories);
  return words.filter((word) => allowed.has(word.category));
}

export function resolveTimeOverlay(date: Date, timeRules: TimeRules): TimeOverlay {
  const bucket = timeOfDayForHour(date.getHours());
  return { bucket, categories: [...timeRules[bucket]] };
}

/**
 * Candidate pool after the user's category filter and the optional
 * time-of-day overlay. Falls back to wider pools instead of returning an
 * empty one while the catalog has words.
 */
export function buildCandidatePool(
  words: readonly WordRecord[],
  enabledCategories: readonly string[],
  timeOverlay?: TimeOverlay | null,
): readonly WordRecord[] {
  let pool: readonly WordRecord[] = words;
  if (!isAllCategories(enabledCategories)) {
    const filtered = withinCategories(words, enabledCategories);
    if (filtered.length > 0) {
      pool = filtered;
    }
  }

  if (timeOverlay && timeOverlay.categories.length > 0) {
    const timed = withinCategories(pool, timeOverlay.categories);
    if (timed.length > 0) {
      return timed;
    }
    const bucketOnly = withinCategories(words, timeOverlay.categories);
    if (bucketOnly.length > 0) {
      return bucketOnly;
    }
  }
  return pool;
}

function drawIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Linear weighted sampling: draws `u` in `[0, total)` and returns the first
 * candidate whose cumulative weight exceeds it.
 */
export function pickWeighted<T>(
  candidates: readonly T[],
  weights: readonly number[],
  random: RandomSource = Math.random,
): T | undefined {
  if (candidates.length === 0 || candidates.length !== weights.length) {
    return undefined;
  }
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (!(total > 0)) {
    return undefined;
  }
  const draw = random() * total;
  let cumulative = 0;
  for (let index = 0; index < candidates.length; index += 1) {
    cumulative += weights[index];
    if (cumulative > draw) {
      return candidates[index];
    }
  }
  // Rounding can leave the draw at the very top of the range.
  return candidates[candidates.length - 1];
}

export function selectNext(
  catalog: CatalogView,
  history: ExposureHistoryView,
  currentId: number | null | undefined,
  enabledCategories: readonly string[],
  timeOverlay?: TimeOverlay | null,
  { random = Math.random, weights: weightOptions = {} }: SelectionOptions = {},
): WordRecord | undefined {
  const words = catalog.getAll();
  if (words.length === 0) {
    return undefined;
  }
  const pool = buildCandidatePool(words, enabledCategories, timeOverlay);

  const candidates: WordRecord[] = [];
  const weights: number[] = [];
  for (const word of pool) {
    const weight = computeWordWeight(word, history, currentId, weightOptions);
    if (weight > 0) {
      candidates.push(word);
      weights.push(weight);
    }
  }

  if (candidates.length === 0) {
    return pool[drawIndex(random, pool.length)];
  }
  return pickWeighted(candidates, weights, random);
}
