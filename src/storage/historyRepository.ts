import { HISTORY_FLUSH_EVERY, SECONDS_PER_VIEW } from '../scheduler/constants';
import { ExposureRecord, HistoryStats } from '../types';
import { asNonNegativeInt, isPositiveInteger } from '../utils/counter';
import { logger } from '../utils/logger';
import { Clock, hoursBetween, isIsoDateTime, previousDateKey, systemClock, toCanonicalIso, toDateKey, toIso } from '../utils/time';
import { readJsonFile, writeJsonAtomic } from './jsonFile';

interface PersistedExposure {
  times_shown: number;
  last_shown: string | null;
  first_shown: string;
  marked_known: boolean;
  marked_difficult: boolean;
}

export interface HistoryStoreOptions {
  filePath: string;
  clock?: Clock;
  /** Pending exposures that trigger a durable write. */
  flushEvery?: number;
}

export interface RecordExposureOptions {
  flush?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseWordKey(key: string): number | null {
  if (!/^-?\d+$/.test(key)) {
    return null;
  }
  const id = Number(key);
  return Number.isSafeInteger(id) ? id : null;
}

function normalizeTimestamp(value: unknown): string | null {
  return isIsoDateTime(value) ? toCanonicalIso(value) : null;
}

export function normalizeExposureRecord(raw: unknown, fallbackIso: string): ExposureRecord | null {
  if (!isRecord(raw)) {
    return null;
  }
  const timesShown = asNonNegativeInt(raw.times_shown, 0);
  const firstCandidate = normalizeTimestamp(raw.first_shown);
  let lastShown = normalizeTimestamp(raw.last_shown);
  const firstShown = firstCandidate ?? lastShown ?? fallbackIso;
  if (lastShown === null && timesShown > 0) {
    lastShown = firstShown;
  }
  const markedDifficult = raw.marked_difficult === true;

  return {
    timesShown,
    firstShown,
    lastShown,
    markedKnown: raw.marked_known === true && !markedDifficult,
    markedDifficult,
  };
}

function toPersisted(record: ExposureRecord): PersistedExposure {
  return {
    times_shown: record.timesShown,
    last_shown: record.lastShown,
    first_shown: record.firstShown,
    marked_known: record.markedKnown,
    marked_difficult: record.markedDifficult,
  };
}

function lastShownOrMin(record: ExposureRecord): number {
  if (record.lastShown === null) {
    return Number.NEGATIVE_INFINITY;
  }
  const parsed = Date.parse(record.lastShown);
  return Number.isFinite(parsed) ? parsed : Number.NEGATIVE_INFINITY;
}

/**
 * Per-word exposure history backed by a JSON document.
 *
 * Flush policy: exposures are written on every `flushEvery`-th pending
 * mutation; marks and cleanup write immediately; `flush()` writes whatever
 * is pending and is the caller's durable point on shutdown.
 */
export class ExposureHistoryStore {
  private records = new Map<number, ExposureRecord>();

  private pendingMutations = 0;

  private readonly filePath: string;

  private readonly clock: Clock;

  private readonly flushEvery: number;

  constructor({ filePath, clock = systemClock, flushEvery = HISTORY_FLUSH_EVERY }: HistoryStoreOptions) {
    if (!isPositiveInteger(flushEvery)) {
      throw new RangeError(`flushEvery must be a positive integer, got ${flushEvery}`);
    }
    this.filePath = filePath;
    this.clock = clock;
    this.flushEvery = flushEvery;
    this.records = this.load();
  }

  private load(): Map<number, ExposureRecord> {
    const result = readJsonFile(this.filePath);
    const records = new Map<number, ExposureRecord>();
    if (result.status !== 'ok') {
      return records;
    }
    if (!isRecord(result.value)) {
      logger.warn('Ignoring history file with unexpected shape', { filePath: this.filePath });
      return records;
    }
    const fallbackIso = toIso(this.clock());
    let dropped = 0;
    for (const [key, raw] of Object.entries(result.value)) {
      const id = parseWordKey(key);
      const record = id === null ? null : normalizeExposureRecord(raw, fallbackIso);
      if (id === null || record === null) {
        dropped += 1;
        continue;
      }
      records.set(id, record);
    }
    if (dropped > 0) {
      logger.warn('Dropped malformed history entries', { filePath: this.filePath, dropped });
    }
    return records;
  }

  get size(): number {
    return this.records.size;
  }

  get pendingWrites(): number {
    return this.pendingMutations;
  }

  private ensureRecord(id: number): ExposureRecord {
    const existing = this.records.get(id);
    if (existing) {
      return existing;
    }
    const created: ExposureRecord = {
      timesShown: 0,
      firstShown: toIso(this.clock()),
      lastShown: null,
      markedKnown: false,
      markedDifficult: false,
    };
    this.records.set(id, created);
    return created;
  }

  recordExposure(id: number, { flush = false }: RecordExposureOptions = {}): void {
    const record = this.ensureRecord(id);
    const shownAt = toIso(this.clock());
    record.timesShown += 1;
    record.lastShown = shownAt;
    this.pendingMutations += 1;
    if (flush || this.pendingMutations >= this.flushEvery) {
      this.flush();
    }
  }

  getRecord(id: number): ExposureRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  getHoursSinceShown(id: number): number | undefined {
    const lastShown = this.records.get(id)?.lastShown;
    if (!lastShown) {
      return undefined;
    }
    return hoursBetween(lastShown, this.clock());
  }

  getTimesShown(id: number): number {
    return this.records.get(id)?.timesShown ?? 0;
  }

  markKnown(id: number): void {
    const record = this.ensureRecord(id);
    record.markedKnown = true;
    record.markedDifficult = false;
    this.flush();
  }

  markDifficult(id: number): void {
    const record = this.ensureRecord(id);
    record.markedDifficult = true;
    record.markedKnown = false;
    this.flush();
  }

  isMarkedKnown(id: number): boolean {
    return this.records.get(id)?.markedKnown ?? false;
  }

  isMarkedDifficult(id: number): boolean {
    return this.records.get(id)?.markedDifficult ?? false;
  }

  /**
   * Keeps the `maxEntries` most recently shown words; never-shown words are
   * discarded first. Returns true when entries were discarded and the
   * trimmed history was written.
   */
  cleanupOldEntries(maxEntries: number): boolean {
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${maxEntries}`);
    }
    if (this.records.size <= maxEntries) {
      return false;
    }
    const retained = [...this.records.entries()]
      .sort(([, a], [, b]) => {
        const aMs = lastShownOrMin(a);
        const bMs = lastShownOrMin(b);
        if (aMs === bMs) {
          return 0;
        }
        return aMs > bMs ? -1 : 1;
      })
      .slice(0, maxEntries);
    const discarded = this.records.size - retained.length;
    this.records = new Map(retained);
    logger.info('Trimmed exposure history', { retained: retained.length, discarded });
    return this.flush();
  }

  flush(): boolean {
    const document: Record<string, PersistedExposure> = {};
    for (const [id, record] of this.records) {
      document[String(id)] = toPersisted(record);
    }
    const written = writeJsonAtomic(this.filePath, document);
    if (written) {
      this.pendingMutations = 0;
    }
    return written;
  }

  getStats(): HistoryStats {
    let totalViews = 0;
    for (const record of this.records.values()) {
      totalViews += record.timesShown;
    }
    const uniqueWords = this.records.size;
    return {
      uniqueWords,
      totalViews,
      averageViewsPerWord: uniqueWords > 0 ? totalViews / uniqueWords : 0,
      estimatedStudyMinutes: Math.floor((totalViews * SECONDS_PER_VIEW) / 60),
      recencyStreak: this.computeRecencyStreak(),
    };
  }

  /** Local calendar dates on which at least one word was last shown. */
  getActiveDates(): Set<string> {
    const dates = new Set<string>();
    for (const record of this.records.values()) {
      if (record.lastShown !== null) {
        dates.add(toDateKey(new Date(record.lastShown)));
      }
    }
    return dates;
  }

  computeRecencyStreak(today: string = toDateKey(this.clock())): number {
    const dates = this.getActiveDates();
    let streak = 0;
    let cursor = today;
    while (dates.has(cursor)) {
      streak += 1;
      cursor = previousDateKey(cursor);
    }
    return streak;
  }
}
