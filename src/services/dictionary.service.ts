import { extractLemma } from '../lexicon/exchange';
import type { LexicalStore } from '../lexicon/lexical-store';
import {
  resolverOptionsSchema,
  type DictionaryEntry,
  type LexicalRecord,
  type ResolverOptions,
} from '../types/annotation';
import { logger } from '../utils/logger';
import { LruCache } from '../utils/lru-cache';
import { parseOptions } from '../utils/validation';

export interface DictionaryResolver {
  /** Formatted gloss for `word`, or undefined when the dictionary has nothing usable. */
  lookup(word: string): string | undefined;
}

// "n. ", "vt. ", "adj. "
const POS_PREFIX = /^[a-z]{1,4}\.\s+/;

const GLOSS_SEPARATORS = /[,;，；]/;

const splitLines = (translation: string): string[] => translation.split(/\r?\n/);

/**
 * Collects gloss fragments across the lines of a translation, in order,
 * without blanks or repeats, stopping at `maxDefinitions`.
 */
export const collectGlosses = (translation: string, maxDefinitions: number): string[] => {
  const glosses: string[] = [];

  for (const line of splitLines(translation)) {
    const cleaned = line.trim().replace(POS_PREFIX, '');
    for (const fragment of cleaned.split(GLOSS_SEPARATORS)) {
      const gloss = fragment.trim();
      if (!gloss || glosses.includes(gloss)) continue;

      glosses.push(gloss);
      if (glosses.length >= maxDefinitions) {
        return glosses;
      }
    }
  }

  return glosses;
};

export const toDictionaryEntry = (
  record: Pick<LexicalRecord, 'translation' | 'phonetic'>,
  maxDefinitions: number,
): DictionaryEntry => {
  const translation = record.translation ?? '';
  const collected = collectGlosses(translation, maxDefinitions);
  const phonetic = record.phonetic?.trim();

  return {
    phonetic: phonetic || undefined,
    glosses: collected.length ? collected : [splitLines(translation)[0]],
  };
};

export const formatGloss = (translation: string, maxDefinitions = 2): string =>
  toDictionaryEntry({ translation }, maxDefinitions).glosses.join('; ');

export const renderEntry = (entry: DictionaryEntry, includePhonetic: boolean): string => {
  const gloss = entry.glosses.join('; ');
  return includePhonetic && entry.phonetic ? `/${entry.phonetic}/ ${gloss}` : gloss;
};

const hasTranslation = (record: LexicalRecord): boolean => Boolean(record.translation?.trim());

/**
 * Dictionary lookups against a lexical store. Words without a translation
 * of their own fall back to the lemma named in their exchange field.
 */
export class LexicalDictionaryResolver implements DictionaryResolver {
  readonly maxDefinitions: number;
  readonly includePhonetic: boolean;
  // null marks a cached miss
  private readonly cache: LruCache<string, string | null>;

  constructor(private readonly store: LexicalStore, options: ResolverOptions = {}) {
    const parsed = parseOptions(resolverOptionsSchema, options, 'resolver options');
    this.maxDefinitions = parsed.maxDefinitions;
    this.includePhonetic = parsed.includePhonetic;
    this.cache = new LruCache(parsed.cacheSize);
  }

  lookup(word: string): string | undefined {
    const key = word.toLowerCase();
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    let gloss: string | undefined;
    try {
      const entry = this.resolveEntry(key);
      gloss = entry ? renderEntry(entry, this.includePhonetic) : undefined;
    } catch (error) {
      // Store failures are not cached so the word can resolve on a later call
      logger.warn({ word, error }, 'Dictionary lookup failed');
      return undefined;
    }

    this.cache.set(key, gloss ?? null);
    return gloss;
  }

  resolveEntry(word: string): DictionaryEntry | undefined {
    const record = this.resolveRecord(word.toLowerCase());
    return record ? toDictionaryEntry(record, this.maxDefinitions) : undefined;
  }

  private resolveRecord(word: string): LexicalRecord | undefined {
    const record = this.store.getRecord(word);
    if (!record) {
      return undefined;
    }
    if (hasTranslation(record)) {
      return record;
    }

    const lemma = record.exchange ? extractLemma(record.exchange) : undefined;
    if (!lemma) {
      return undefined;
    }

    const lemmaRecord = this.store.getRecord(lemma.toLowerCase());
    return lemmaRecord && hasTranslation(lemmaRecord) ? lemmaRecord : undefined;
  }
}

/**
 * Fixed word-to-gloss table with a plural fallback.
 */
export class SimpleDictionaryResolver implements DictionaryResolver {
  private readonly glosses: Map<string, string>;

  constructor(glosses: Record<string, string>) {
    this.glosses = new Map(
      Object.entries(glosses).map(([word, gloss]): [string, string] => [word.toLowerCase(), gloss]),
    );
  }

  lookup(word: string): string | undefined {
    const base = word.toLowerCase();
    const direct = this.glosses.get(base);
    if (direct !== undefined) {
      return direct;
    }

    if (base.endsWith('s')) {
      return this.glosses.get(base.slice(0, -1));
    }
    return undefined;
  }
}
