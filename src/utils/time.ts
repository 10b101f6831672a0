import { TimeOfDay } from '../types';

const HOUR_MS = 60 * 60 * 1000;
const EPOCH_ISO = '1970-01-01T00:00:00.000Z';
const EPOCH_MS = Date.parse(EPOCH_ISO);
const MIN_DATE_MS = -8640000000000000;
const MAX_DATE_MS = 8640000000000000;
// Offsets are optional so that naive local timestamps written by older builds still load.
const ISO_DATE_TIME_RE = /^[+-]?\d{4,6}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:[Zz]|[+-]\d{2}:\d{2})?$/;
const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function isIsoDateTime(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_TIME_RE.test(value) && Number.isFinite(Date.parse(value));
}

function toSafeIso(ms: number): string {
  const safeMs = Number.isFinite(ms)
    ? Math.min(MAX_DATE_MS, Math.max(MIN_DATE_MS, ms))
    : EPOCH_MS;
  return new Date(safeMs).toISOString();
}

export function toIso(date: Date): string {
  return toSafeIso(date.getTime());
}

export function toCanonicalIso(iso: string): string {
  return toSafeIso(Date.parse(iso));
}

export function hoursBetween(fromIso: string, to: Date): number | undefined {
  if (!isIsoDateTime(fromIso)) {
    return undefined;
  }
  const from = Date.parse(fromIso);
  const toMs = to.getTime();
  if (!Number.isFinite(toMs)) {
    return undefined;
  }
  return Math.max(0, (toMs - from) / HOUR_MS);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local calendar date of `date` as `YYYY-MM-DD`. */
export function toDateKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function isDateKey(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const match = DATE_KEY_RE.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  return date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day;
}

export function shiftDateKey(dateKey: string, days: number): string {
  const match = DATE_KEY_RE.exec(dateKey);
  if (!match) {
    throw new RangeError(`Invalid calendar date: ${dateKey}`);
  }
  const shifted = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]) + days);
  return toDateKey(shifted);
}

export function previousDateKey(dateKey: string): string {
  return shiftDateKey(dateKey, -1);
}

export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) {
    return 'morning';
  }
  if (hour >= 12 && hour < 17) {
    return 'afternoon';
  }
  if (hour >= 17 && hour < 22) {
    return 'evening';
  }
  return 'night';
}
