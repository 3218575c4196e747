import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PARTS_OF_SPEECH, type PartOfSpeech } from '../types/annotation';
import { AnnotationError } from '../utils/annotationError';
import type { LexicalStore } from './lexical-store';
import { parseExchange } from './exchange';

export interface Lemmatizer {
  /** Returns the base form of `word` for `pos`, or `word` itself when none applies. */
  lemmatize(word: string, pos: PartOfSpeech): string;
}

export type ExceptionTable = Record<PartOfSpeech, Record<string, string>>;

const exceptionTableSchema = z.object({
  verb: z.record(z.string()),
  noun: z.record(z.string()),
  adjective: z.record(z.string()),
  adverb: z.record(z.string()),
});

export const DEFAULT_EXCEPTIONS_PATH = path.resolve(__dirname, '../../data/lemma-exceptions.json');

export const loadExceptionTable = (filePath: string = DEFAULT_EXCEPTIONS_PATH): ExceptionTable => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Lemma exception list not found at "${filePath}"`, {
      cause: error,
    });
  }

  const parsed = exceptionTableSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new AnnotationError('COLLABORATOR_UNAVAILABLE', `Lemma exception list "${filePath}" is malformed`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};

type DetachmentRule = { suffix: string; replacement: string; undouble?: boolean; when?: RegExp };

// Tried in order; the first candidate accepted by the vocabulary wins
const DETACHMENT_RULES: Record<PartOfSpeech, DetachmentRule[]> = {
  noun: [
    { suffix: 'ies', replacement: 'y' },
    { suffix: 'ches', replacement: 'ch' },
    { suffix: 'shes', replacement: 'sh' },
    { suffix: 'ses', replacement: 's' },
    { suffix: 'xes', replacement: 'x' },
    { suffix: 'zes', replacement: 'z' },
    { suffix: 'men', replacement: 'man' },
    { suffix: 's', replacement: '' },
  ],
  verb: [
    { suffix: 'ies', replacement: 'y' },
    { suffix: 'es', replacement: '', when: /(x|z|ch|sh|ss)es$/ },
    { suffix: 's', replacement: '' },
    { suffix: 'ied', replacement: 'y' },
    { suffix: 'ed', replacement: '', undouble: true },
    { suffix: 'ed', replacement: 'e' },
    { suffix: 'ing', replacement: '', undouble: true },
    { suffix: 'ing', replacement: 'e' },
  ],
  adjective: [
    { suffix: 'ier', replacement: 'y' },
    { suffix: 'iest', replacement: 'y' },
    { suffix: 'er', replacement: '', undouble: true },
    { suffix: 'est', replacement: '', undouble: true },
    { suffix: 'er', replacement: 'e' },
    { suffix: 'est', replacement: 'e' },
  ],
  adverb: [],
};

const MIN_LEMMA_LENGTH = 2;

const DOUBLED_CONSONANT = /([bcdfgkmnprtvz])\1$/;

const undouble = (stem: string): string | undefined =>
  DOUBLED_CONSONANT.test(stem) ? stem.slice(0, -1) : undefined;

export const detachmentCandidates = (word: string, pos: PartOfSpeech): string[] => {
  const candidates: string[] = [];
  const push = (candidate: string | undefined) => {
    if (candidate && candidate.length >= MIN_LEMMA_LENGTH && candidate !== word && !candidates.includes(candidate)) {
      candidates.push(candidate);
    }
  };

  for (const rule of DETACHMENT_RULES[pos]) {
    if (!word.endsWith(rule.suffix) || word.length <= rule.suffix.length) continue;
    if (rule.when && !rule.when.test(word)) continue;
    // "glass" is not the plural of "glas"
    if (rule.suffix === 's' && word.endsWith('ss')) continue;

    const stem = word.slice(0, -rule.suffix.length) + rule.replacement;
    if (rule.undouble) {
      push(undouble(stem));
    }
    push(stem);
  }
  return candidates;
};

export type Vocabulary = (word: string, pos: PartOfSpeech) => boolean;

export type RuleLemmatizerOptions = {
  exceptions?: ExceptionTable;
  /** Accepts or rejects candidate base forms. Without one the first candidate is used. */
  vocabulary?: Vocabulary;
};

/**
 * Exception lists for irregular forms, then suffix detachment checked
 * against an optional vocabulary.
 */
export class RuleLemmatizer implements Lemmatizer {
  private readonly exceptions = new Map<PartOfSpeech, Map<string, string>>();
  private readonly vocabulary?: Vocabulary;

  constructor(options: RuleLemmatizerOptions = {}) {
    const table = options.exceptions ?? loadExceptionTable();
    for (const pos of PARTS_OF_SPEECH) {
      this.exceptions.set(pos, new Map(Object.entries(table[pos])));
    }
    this.vocabulary = options.vocabulary;
  }

  lemmatize(word: string, pos: PartOfSpeech): string {
    const lower = word.toLowerCase().trim();
    if (!lower) return word;

    const irregular = this.exceptions.get(pos)?.get(lower);
    if (irregular) {
      return irregular;
    }

    // A surface form the vocabulary knows still goes through the candidates
    const vocabulary = this.vocabulary;
    const candidates = detachmentCandidates(lower, pos);
    if (!vocabulary) {
      return candidates[0] ?? lower;
    }
    return candidates.find((candidate) => vocabulary(candidate, pos)) ?? lower;
  }
}

// Transformation codes under "1:" that place the word in each category
const EXCHANGE_CODES: Record<PartOfSpeech, string> = {
  verb: 'pdi3',
  noun: 's',
  adjective: 'rt',
  adverb: 'rt',
};

/**
 * Lemmas taken from the exchange field of the dictionary records themselves.
 * Words whose record carries no lemma go to `fallback` when one is given.
 */
export class ExchangeLemmatizer implements Lemmatizer {
  constructor(
    private readonly store: LexicalStore,
    private readonly fallback?: Lemmatizer,
  ) {}

  lemmatize(word: string, pos: PartOfSpeech): string {
    const lower = word.toLowerCase();
    const exchange = this.store.getRecord(lower)?.exchange;
    const forms = exchange ? parseExchange(exchange) : undefined;
    const lemma = forms?.get('0');
    const kinds = forms?.get('1');
    if (!lemma || !kinds) {
      return this.fallback ? this.fallback.lemmatize(word, pos) : word;
    }

    const codes = EXCHANGE_CODES[pos];
    return [...kinds].some((kind) => codes.includes(kind)) ? lemma : word;
  }
}
