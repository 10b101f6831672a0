import { achievementId, describeAchievement, parseAchievementId, qualifyingAchievements } from './achievements';

describe('achievement ids', () => {
  it('round-trips every kind through its string id', () => {
    expect(achievementId({ kind: 'streak', days: 30 })).toBe('streak_30');
    expect(achievementId({ kind: 'words', count: 500 })).toBe('words_500');
    expect(achievementId({ kind: 'daily_goal', date: '2026-02-23' })).toBe('daily_goal_2026-02-23');
    expect(parseAchievementId('streak_30')).toEqual({ kind: 'streak', days: 30 });
  });

  it('migrates legacy ids', () => {
    expect(parseAchievementId('7_day_streak')).toEqual({ kind: 'streak', days: 7 });
    expect(parseAchievementId('100_words')).toEqual({ kind: 'words', count: 100 });
  });

  it('rejects unknown thresholds and malformed dates', () => {
    expect(parseAchievementId('streak_8')).toBeNull();
    expect(parseAchievementId('words_250')).toBeNull();
    expect(parseAchievementId('daily_goal_2026-02-30')).toBeNull();
    expect(parseAchievementId('gold_star')).toBeNull();
  });
});

describe('qualifying achievements', () => {
  it('lists every satisfied threshold in order', () => {
    const ids = qualifyingAchievements({
      currentStreak: 31,
      totalWordsLearned: 120,
      dailyGoal: 20,
      today: '2026-02-23',
      wordsToday: 20,
    }).map(achievementId);

    expect(ids).toEqual(['streak_7', 'streak_30', 'words_100', 'daily_goal_2026-02-23']);
  });

  it('awards the daily goal only on the exact count', () => {
    const base = { currentStreak: 1, totalWordsLearned: 21, dailyGoal: 20, today: '2026-02-23' };

    expect(qualifyingAchievements({ ...base, wordsToday: 19 })).toEqual([]);
    expect(qualifyingAchievements({ ...base, wordsToday: 21 })).toEqual([]);
  });
});

describe('achievement labels', () => {
  it('describes known ids and echoes unknown ones', () => {
    expect(describeAchievement('streak_7')).toBe('Week Warrior - 7 day streak!');
    expect(describeAchievement('100_words')).toBe('First Hundred - 100 words learned');
    expect(describeAchievement('words_1000')).toBe('Thousand Club - 1000 words learned');
    expect(describeAchievement('daily_goal_2026-02-23')).toBe('Daily Goal Complete!');
    expect(describeAchievement('mystery')).toBe('mystery');
  });
});
