import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, DEFAULT_SCHEDULER_CONFIG, loadSchedulerConfig } from './schedulerConfig';

describe('scheduler config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(document: unknown): string {
    const filePath = path.join(dir, 'config.json');
    fs.writeFileSync(filePath, JSON.stringify(document), 'utf-8');
    return filePath;
  }

  function captureError(load: () => unknown): ConfigError {
    try {
      load();
    } catch (error) {
      if (error instanceof ConfigError) {
        return error;
      }
      throw error;
    }
    throw new Error('expected a ConfigError');
  }

  it('returns the defaults without any source', () => {
    expect(loadSchedulerConfig({ env: {} })).toEqual(DEFAULT_SCHEDULER_CONFIG);
  });

  it('reads the desktop config file sections', () => {
    const file = writeConfig({
      appearance: { theme: 'dark' },
      behavior: { refresh_interval_seconds: 90, time_based_categories: true },
      learning: { enabled_categories: ['food', 'verbs'], time_rules: { night: ['travel'] } },
    });

    const config = loadSchedulerConfig({ env: {}, file });

    expect(config.refreshIntervalSeconds).toBe(90);
    expect(config.timeBasedCategories).toBe(true);
    expect(config.enabledCategories).toEqual(['food', 'verbs']);
    expect(config.timeRules).toEqual({
      morning: ['food', 'adjectives'],
      afternoon: ['verbs', 'travel'],
      evening: ['animals', 'body'],
      night: ['travel'],
    });
  });

  it('layers the environment over the file and overrides over both', () => {
    const file = writeConfig({ behavior: { refresh_interval_seconds: 90 } });
    const env = {
      REFRESH_INTERVAL_SECONDS: '120',
      DAILY_GOAL: '35',
      ENABLED_CATEGORIES: ' food, ,animals ',
      TIME_BASED_CATEGORIES: 'yes',
      HISTORY_FILE: '/tmp/custom-history.json',
    };

    const config = loadSchedulerConfig({ env, file, overrides: { dailyGoal: 40 } });

    expect(config.refreshIntervalSeconds).toBe(120);
    expect(config.dailyGoal).toBe(40);
    expect(config.enabledCategories).toEqual(['food', 'animals']);
    expect(config.timeBasedCategories).toBe(true);
    expect(config.historyFile).toBe('/tmp/custom-history.json');
    expect(config.progressFile).toBe('data/gamification.json');
  });

  it('ignores a missing or malformed config file', () => {
    expect(loadSchedulerConfig({ env: {}, file: path.join(dir, 'absent.json') })).toEqual(DEFAULT_SCHEDULER_CONFIG);

    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '{"behavior": ', 'utf-8');
    expect(loadSchedulerConfig({ env: {}, file })).toEqual(DEFAULT_SCHEDULER_CONFIG);
  });

  it('lists every failing path', () => {
    const error = captureError(() =>
      loadSchedulerConfig({ env: { REFRESH_INTERVAL_SECONDS: '10', DAILY_GOAL: 'many' } }),
    );

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toBe('refreshIntervalSeconds: Refresh interval must be at least 30 seconds');
    expect(error.issues[1]).toMatch(/^dailyGoal: /);
    expect(error.name).toBe('ConfigError');
  });

  it('rejects an unknown boolean spelling', () => {
    const error = captureError(() => loadSchedulerConfig({ env: { TIME_BASED_CATEGORIES: 'sometimes' } }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^timeBasedCategories: /);
  });
});
