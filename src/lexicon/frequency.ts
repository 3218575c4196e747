import * as fs from 'fs';
import { AnnotationError } from '../utils/annotationError';
import { logger } from '../utils/logger';

/**
 * Word frequency on the Zipf scale: log10 of occurrences per billion words.
 * 0 means the word has no frequency data.
 */
export interface FrequencyProvider {
  frequency(word: string, lang: string): number;
}

export type FrequencyFileFormat = 'zipf' | 'count';

const MAX_ZIPF = 8;

const roundZipf = (value: number): number => Math.round(value * 100) / 100;

const clampZipf = (value: number): number => Math.min(MAX_ZIPF, Math.max(0, value));

export class ZipfFrequencyTable implements FrequencyProvider {
  private readonly tables = new Map<string, Map<string, number>>();

  static fromZipf(lang: string, values: Iterable<[string, number]>): ZipfFrequencyTable {
    return new ZipfFrequencyTable().addLanguage(lang, values);
  }

  static fromCounts(lang: string, counts: Iterable<[string, number]>): ZipfFrequencyTable {
    return new ZipfFrequencyTable().addCounts(lang, counts);
  }

  addLanguage(lang: string, values: Iterable<[string, number]>): this {
    const table = this.tableFor(lang);
    for (const [word, value] of values) {
      if (!Number.isFinite(value) || value <= 0) continue;
      table.set(word.toLowerCase(), roundZipf(clampZipf(value)));
    }
    return this;
  }

  addCounts(lang: string, counts: Iterable<[string, number]>): this {
    const positive = [...counts].filter(([, count]) => Number.isFinite(count) && count > 0);
    const total = positive.reduce((sum, [, count]) => sum + count, 0);
    if (total === 0) {
      return this;
    }
    return this.addLanguage(
      lang,
      positive.map(([word, count]): [string, number] => [word, Math.log10((count / total) * 1e9)]),
    );
  }

  frequency(word: string, lang: string): number {
    return this.tables.get(lang.toLowerCase())?.get(word.toLowerCase()) ?? 0;
  }

  languages(): string[] {
    return [...this.tables.keys()];
  }

  size(lang: string): number {
    return this.tables.get(lang.toLowerCase())?.size ?? 0;
  }

  private tableFor(lang: string): Map<string, number> {
    const key = lang.toLowerCase();
    let table = this.tables.get(key);
    if (!table) {
      table = new Map();
      this.tables.set(key, table);
    }
    return table;
  }
}

/**
 * Parses `word<TAB>value` lines. Blank lines and `#` comments are ignored,
 * as are lines whose value is not a number.
 */
export const parseFrequencyList = (content: string): Array<[string, number]> => {
  const entries: Array<[string, number]> = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const [word, value] = line.split(/\t|\s+/);
    const parsed = Number(value);
    if (!word || value === undefined || Number.isNaN(parsed)) continue;

    entries.push([word, parsed]);
  }
  return entries;
};

export const loadFrequencyTable = (
  filePath: string,
  lang: string,
  format: FrequencyFileFormat = 'zipf',
): ZipfFrequencyTable => {
  if (!filePath || !fs.existsSync(filePath)) {
    throw new AnnotationError(
      'COLLABORATOR_UNAVAILABLE',
      `Frequency list not found at "${filePath}"`,
    );
  }

  const entries = parseFrequencyList(fs.readFileSync(filePath, 'utf8'));
  if (!entries.length) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Frequency list "${filePath}" has no entries`);
  }

  const table = format === 'count'
    ? ZipfFrequencyTable.fromCounts(lang, entries)
    : ZipfFrequencyTable.fromZipf(lang, entries);

  logger.info({ filePath, lang, format, words: table.size(lang) }, 'Loaded frequency list');
  return table;
};
