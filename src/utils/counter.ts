const COUNTER_MAX = Number.MAX_SAFE_INTEGER;
const NUMERIC_TEXT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

export function parseFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!NUMERIC_TEXT_RE.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function asNonNegativeInt(value: unknown, fallback: number): number {
  const parsed = parseFiniteNumber(value);
  if (parsed === null) {
    return fallback;
  }
  return Math.min(COUNTER_MAX, Math.max(0, Math.floor(parsed)));
}

export function asPositiveInt(value: unknown, fallback: number): number {
  const normalized = asNonNegativeInt(value, fallback);
  return normalized > 0 ? normalized : fallback;
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}
