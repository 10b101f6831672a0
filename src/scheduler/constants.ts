/**
 * Hours assumed for a word that has never been shown. It couples the
 * "never shown" case to the recency/frequency formula: with the 2x
 * never-shown multiplier a fresh word outweighs a word shown once until
 * that word has rested for about 2000 hours.
 */
export const NEVER_SHOWN_HOURS = 1000;

export const NEVER_SHOWN_MULTIPLIER = 2.0;
export const DIFFICULT_MULTIPLIER = 1.5;
export const KNOWN_MULTIPLIER = 0.3;
export const DEFAULT_MULTIPLIER = 1.0;

export const ALL_CATEGORIES = 'all';

export const HISTORY_FLUSH_EVERY = 5;
export const HISTORY_MAX_ENTRIES = 1000;
export const SECONDS_PER_VIEW = 5;

export const DEFAULT_DAILY_GOAL = 20;
export const STREAK_MILESTONES = [7, 14, 30, 50, 100, 365] as const;

export const GERMAN_MAX_LENGTH = 120;
export const ENGLISH_MAX_LENGTH = 180;
export const PRONUNCIATION_MAX_LENGTH = 120;
export const CATEGORY_MAX_LENGTH = 60;
export const EXAMPLE_MAX_LENGTH = 400;
export const DEFAULT_CATEGORY = 'general';
