import { TimeRules, WordRecord } from '../types';
import { buildCandidatePool, pickWeighted, resolveTimeOverlay, selectNext } from './selection';
import { computeWeights, ExposureHistoryView } from './weight';

function word(id: number, category: string): WordRecord {
  return {
    id,
    german: `Wort ${id}`,
    english: `word ${id}`,
    gender: 'none',
    pronunciation: '',
    category,
    difficulty: 'A1',
    examples: [],
  };
}

function catalogOf(words: WordRecord[]) {
  return { getAll: () => words };
}

const EMPTY_HISTORY: ExposureHistoryView = {
  getHoursSinceShown: () => undefined,
  getTimesShown: () => 0,
  isMarkedKnown: () => false,
  isMarkedDifficult: () => false,
};

function shownHistory(hoursById: Record<number, number>): ExposureHistoryView {
  return {
    getHoursSinceShown: (id) => hoursById[id],
    getTimesShown: (id) => (hoursById[id] === undefined ? 0 : 1),
    isMarkedKnown: () => false,
    isMarkedDifficult: () => false,
  };
}

// Small deterministic generator so frequency checks are reproducible.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const WORDS = [
  word(1, 'food'),
  word(2, 'food'),
  word(3, 'verbs'),
  word(4, 'animals'),
  word(5, 'core_1000'),
];

const TIME_RULES: TimeRules = {
  morning: ['food', 'adjectives'],
  afternoon: ['verbs', 'travel'],
  evening: ['animals', 'body'],
  night: ['core_1000'],
};

describe('candidate pool', () => {
  it('uses the whole catalog for an empty filter or exactly all', () => {
    expect(buildCandidatePool(WORDS, [])).toHaveLength(5);
    expect(buildCandidatePool(WORDS, ['all'])).toHaveLength(5);
  });

  it('filters to the enabled categories', () => {
    expect(buildCandidatePool(WORDS, ['food', 'verbs']).map((w) => w.id)).toEqual([1, 2, 3]);
  });

  it('falls back to the whole catalog when the filter matches nothing', () => {
    expect(buildCandidatePool(WORDS, ['travel'])).toHaveLength(5);
  });

  it('intersects the user filter with the time bucket', () => {
    const pool = buildCandidatePool(WORDS, ['food', 'verbs'], { bucket: 'morning', categories: ['food', 'adjectives'] });

    expect(pool.map((w) => w.id)).toEqual([1, 2]);
  });

  it('uses the bucket categories alone when the intersection is empty', () => {
    const pool = buildCandidatePool(WORDS, ['verbs'], { bucket: 'evening', categories: ['animals', 'body'] });

    expect(pool.map((w) => w.id)).toEqual([4]);
  });

  it('applies the bucket directly when the user filter is all', () => {
    const pool = buildCandidatePool(WORDS, ['all'], { bucket: 'night', categories: ['core_1000'] });

    expect(pool.map((w) => w.id)).toEqual([5]);
  });

  it('ignores an overlay with no matching or configured categories', () => {
    expect(buildCandidatePool(WORDS, ['verbs'], { bucket: 'afternoon', categories: ['travel'] }).map((w) => w.id)).toEqual([3]);
    expect(buildCandidatePool(WORDS, ['verbs'], { bucket: 'afternoon', categories: [] }).map((w) => w.id)).toEqual([3]);
  });
});

describe('time overlay', () => {
  it('maps local hours to configured categories', () => {
    expect(resolveTimeOverlay(new Date(2026, 1, 23, 8), TIME_RULES)).toEqual({ bucket: 'morning', categories: ['food', 'adjectives'] });
    expect(resolveTimeOverlay(new Date(2026, 1, 23, 12), TIME_RULES).bucket).toBe('afternoon');
    expect(resolveTimeOverlay(new Date(2026, 1, 23, 21), TIME_RULES).bucket).toBe('evening');
    expect(resolveTimeOverlay(new Date(2026, 1, 23, 2), TIME_RULES).categories).toEqual(['core_1000']);
  });
});

describe('weighted pick', () => {
  it('returns the first candidate whose cumulative weight exceeds the draw', () => {
    expect(pickWeighted(['a', 'b', 'c'], [1, 2, 3], () => 0)).toBe('a');
    expect(pickWeighted(['a', 'b', 'c'], [1, 2, 3], () => 0.5)).toBe('c');
    expect(pickWeighted(['a', 'b', 'c'], [1, 2, 3], () => 0.4)).toBe('b');
    expect(pickWeighted(['a', 'b', 'c'], [1, 0, 3], () => 0.5)).toBe('c');
  });

  it('returns undefined without positive total weight', () => {
    expect(pickWeighted([], [], () => 0)).toBeUndefined();
    expect(pickWeighted(['a'], [0], () => 0)).toBeUndefined();
  });

  it('reproduces frequencies proportional to weight over 10,000 draws', () => {
    const weights = [1, 2, 3, 4];
    const counts = [0, 0, 0, 0];
    const random = seededRandom(20260223);
    for (let i = 0; i < 10000; i += 1) {
      const picked = pickWeighted([0, 1, 2, 3], weights, random);
      if (picked !== undefined) {
        counts[picked] += 1;
      }
    }

    counts.forEach((count, index) => {
      expect(Math.abs(count / 10000 - weights[index] / 10)).toBeLessThan(0.02);
    });
  });
});

describe('selectNext', () => {
  it('returns undefined only for an empty catalog', () => {
    expect(selectNext(catalogOf([]), EMPTY_HISTORY, null, ['all'])).toBeUndefined();
  });

  it('never reselects the current word while others are available', () => {
    const random = seededRandom(7);
    for (let i = 0; i < 200; i += 1) {
      expect(selectNext(catalogOf(WORDS), EMPTY_HISTORY, 3, ['all'], null, { random })?.id).not.toBe(3);
    }
  });

  it('falls back to a uniform pick when every weight is zero', () => {
    const only = word(9, 'food');

    expect(selectNext(catalogOf([only]), EMPTY_HISTORY, 9, ['all'])).toBe(only);
  });

  it('honors the category filter and time overlay', () => {
    const picked = selectNext(catalogOf(WORDS), EMPTY_HISTORY, null, ['verbs'], { bucket: 'evening', categories: ['animals'] });

    expect(picked?.id).toBe(4);
  });

  it('selects in proportion to history-derived weights', () => {
    const history = shownHistory({ 1: 0, 2: 1, 3: 3 });
    const words = [word(1, 'food'), word(2, 'food'), word(3, 'food')];
    const weights = computeWeights(words, history);
    const total = [...weights.values()].reduce((sum, value) => sum + value, 0);
    const counts = new Map<number, number>();
    const random = seededRandom(99);
    for (let i = 0; i < 10000; i += 1) {
      const picked = selectNext(catalogOf(words), history, null, ['all'], null, { random });
      if (picked) {
        counts.set(picked.id, (counts.get(picked.id) ?? 0) + 1);
      }
    }

    expect(weights.get(1)).toBe(0.5);
    expect(weights.get(3)).toBe(8);
    for (const [id, weight] of weights) {
      expect(Math.abs((counts.get(id) ?? 0) / 10000 - weight / total)).toBeLessThan(0.02);
    }
  });
});
