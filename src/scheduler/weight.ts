import { WordRecord } from '../types';
import {
  DEFAULT_MULTIPLIER,
  DIFFICULT_MULTIPLIER,
  KNOWN_MULTIPLIER,
  NEVER_SHOWN_HOURS,
  NEVER_SHOWN_MULTIPLIER,
} from './constants';

/** Read side of the exposure history used for weighting. */
export interface ExposureHistoryView {
  getHoursSinceShown(id: number): number | undefined;
  getTimesShown(id: number): number;
  isMarkedKnown(id: number): boolean;
  isMarkedDifficult(id: number): boolean;
}

export interface WeightOptions {
  neverShownHours?: number;
  neverShownMultiplier?: number;
  difficultMultiplier?: number;
  knownMultiplier?: number;
}

export function computeWordWeight(
  word: Pick<WordRecord, 'id'>,
  history: ExposureHistoryView,
  currentId?: number | null,
  options: WeightOptions = {},
): number {
  if (currentId !== undefined && currentId !== null && word.id === currentId) {
    return 0;
  }
  const hoursSince = history.getHoursSinceShown(word.id) ?? options.neverShownHours ?? NEVER_SHOWN_HOURS;
  const timesShown = history.getTimesShown(word.id);
  const base = (hoursSince + 1) ** 2 / (timesShown + 1);

  let multiplier = DEFAULT_MULTIPLIER;
  if (timesShown === 0) {
    multiplier = options.neverShownMultiplier ?? NEVER_SHOWN_MULTIPLIER;
  } else if (history.isMarkedDifficult(word.id)) {
    multiplier = options.difficultMultiplier ?? DIFFICULT_MULTIPLIER;
  } else if (history.isMarkedKnown(word.id)) {
    multiplier = options.knownMultiplier ?? KNOWN_MULTIPLIER;
  }
  return base * multiplier;
}

export function computeWeights(
  words: readonly WordRecord[],
  history: ExposureHistoryView,
  currentId?: number | null,
  options: WeightOptions = {},
): Map<number, number> {
  const weights = new Map<number, number>();
  for (const word of words) {
    weights.set(word.id, computeWordWeight(word, history, currentId, options));
  }
  return weights;
}
