import fs from 'fs';
import path from 'path';
import {
  CATEGORY_MAX_LENGTH,
  DEFAULT_CATEGORY,
  ENGLISH_MAX_LENGTH,
  EXAMPLE_MAX_LENGTH,
  GERMAN_MAX_LENGTH,
  PRONUNCIATION_MAX_LENGTH,
} from '../scheduler/constants';
import { readJsonFile } from '../storage/jsonFile';
import { CefrLevel, ExampleSentence, Gender, WordRecord } from '../types';
import { errorMessage, logger } from '../utils/logger';
import { normalizeBoundedText, normalizeTextOr } from '../utils/text';

const GENDERS: readonly Gender[] = ['masculine', 'feminine', 'neuter', 'none'];
const LEVELS: readonly CefrLevel[] = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'];

export interface CatalogLoadReport {
  accepted: number;
  rejected: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeId(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

function normalizeGender(value: unknown): Gender {
  const folded = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return GENDERS.find((gender) => gender === folded) ?? 'none';
}

function normalizeDifficulty(value: unknown): CefrLevel {
  const folded = typeof value === 'string' ? value.trim().toUpperCase() : '';
  return LEVELS.find((level) => level === folded) ?? 'A1';
}

function normalizeExamples(value: unknown): ExampleSentence[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const examples: ExampleSentence[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }
    const german = normalizeBoundedText(entry.german, EXAMPLE_MAX_LENGTH);
    const english = normalizeBoundedText(entry.english, EXAMPLE_MAX_LENGTH);
    if (german && english) {
      examples.push(Object.freeze({ german, english }));
    }
  }
  return examples;
}

export function normalizeWordRecord(raw: unknown): WordRecord | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = normalizeId(raw.id);
  const german = normalizeBoundedText(raw.german, GERMAN_MAX_LENGTH);
  const english = normalizeBoundedText(raw.english, ENGLISH_MAX_LENGTH);
  if (id === null || !german || !english) {
    return null;
  }

  return Object.freeze({
    id,
    german,
    english,
    gender: normalizeGender(raw.gender),
    pronunciation: normalizeBoundedText(raw.pronunciation, PRONUNCIATION_MAX_LENGTH),
    category: normalizeTextOr(raw.category, CATEGORY_MAX_LENGTH, DEFAULT_CATEGORY),
    difficulty: normalizeDifficulty(raw.difficulty),
    examples: Object.freeze(normalizeExamples(raw.examples)),
  });
}

function entriesOf(source: unknown): unknown[] | null {
  if (Array.isArray(source)) {
    return source;
  }
  if (isRecord(source) && Array.isArray(source.words)) {
    return source.words;
  }
  return null;
}

export class VocabularyCatalog {
  private readonly words: WordRecord[] = [];

  private readonly index = new Map<number, WordRecord>();

  get size(): number {
    return this.words.length;
  }

  /**
   * Appends every valid record of every source. Invalid records are logged
   * and skipped; ids repeated across sources are not de-duplicated.
   */
  load(sources: readonly unknown[], label = 'source'): CatalogLoadReport {
    const report: CatalogLoadReport = { accepted: 0, rejected: 0 };
    sources.forEach((source, sourceIndex) => {
      const entries = entriesOf(source);
      if (!entries) {
        logger.warn('Skipping vocabulary source without a word list', { source: `${label}[${sourceIndex}]` });
        return;
      }
      entries.forEach((entry, entryIndex) => {
        const word = normalizeWordRecord(entry);
        if (!word) {
          report.rejected += 1;
          logger.warn('Rejected invalid vocabulary record', {
            source: `${label}[${sourceIndex}]`,
            entry: entryIndex,
          });
          return;
        }
        this.words.push(word);
        if (!this.index.has(word.id)) {
          this.index.set(word.id, word);
        }
        report.accepted += 1;
      });
    });
    return report;
  }

  getByID(id: number): WordRecord | undefined {
    return this.index.get(id);
  }

  getAll(): readonly WordRecord[] {
    return this.words;
  }

  getByCategory(category: string): WordRecord[] {
    return this.words.filter((word) => word.category === category);
  }

  listCategories(): string[] {
    return [...new Set(this.words.map((word) => word.category))].sort();
  }
}

function listJsonFiles(directory: string): string[] {
  try {
    return fs
      .readdirSync(directory)
      .filter((name) => name.toLowerCase().endsWith('.json'))
      .sort();
  } catch (error) {
    logger.warn('Vocabulary directory not readable', { directory, error: errorMessage(error) });
    return [];
  }
}

export function loadVocabularyDirectory(directory: string): VocabularyCatalog {
  const catalog = new VocabularyCatalog();
  let rejected = 0;
  for (const name of listJsonFiles(directory)) {
    const result = readJsonFile(path.join(directory, name));
    if (result.status !== 'ok') {
      continue;
    }
    rejected += catalog.load([result.value], name).rejected;
  }
  logger.info('Loaded vocabulary', { directory, words: catalog.size, rejected });
  return catalog;
}
