import type { FrequencyProvider } from '../lexicon/frequency';
import type { Lemmatizer } from '../lexicon/lemmatizer';
import {
  classifierOptionsSchema,
  PARTS_OF_SPEECH,
  type ClassifierOptions,
  type PartOfSpeech,
  type WordMatch,
} from '../types/annotation';
import { logger } from '../utils/logger';
import { parseOptions } from '../utils/validation';

export interface DifficultyClassifier {
  extractWords(text: string): WordMatch[];
  isDifficult(word: string): boolean;
}

const MIN_WORD_LENGTH = 3;

// Runs touching an apostrophe are contraction pieces ("hadn", "isn"), not words
const APOSTROPHES = "'‘’ʼ`";

const WORD_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}_${APOSTROPHES}])[A-Za-z]{${MIN_WORD_LENGTH},}(?![\\p{L}\\p{N}_${APOSTROPHES}])`,
  'gu',
);

export const extractWords = (text: string): WordMatch[] => {
  const matches: WordMatch[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0;
    matches.push(Object.freeze({ start, end: start + match[0].length, text: match[0] }));
  }
  return matches;
};

/**
 * Judges difficulty on the Zipf scale (~7 for "the", ~4 for "paradigm",
 * ~2 for "esoteric"). The highest frequency among the word and its lemmas
 * counts, so inflected forms of common words are not flagged.
 */
export class FrequencyDifficultyClassifier implements DifficultyClassifier {
  readonly lang: string;
  readonly threshold: number;

  constructor(
    private readonly frequencies: FrequencyProvider,
    private readonly lemmatizer: Lemmatizer,
    options: ClassifierOptions = {},
  ) {
    const { lang, threshold } = parseOptions(classifierOptionsSchema, options, 'classifier options');
    this.lang = lang;
    this.threshold = threshold;
  }

  extractWords(text: string): WordMatch[] {
    return extractWords(text);
  }

  isDifficult(word: string): boolean {
    if (word.length < MIN_WORD_LENGTH) {
      return false;
    }

    const frequency = this.maxFrequency(word.toLowerCase());
    return frequency > 0 && frequency < this.threshold;
  }

  maxFrequency(word: string): number {
    let max = this.safeFrequency(word);
    for (const pos of PARTS_OF_SPEECH) {
      const lemma = this.safeLemma(word, pos);
      if (lemma && lemma !== word) {
        max = Math.max(max, this.safeFrequency(lemma));
      }
    }
    return max;
  }

  private safeFrequency(word: string): number {
    try {
      const value = this.frequencies.frequency(word, this.lang);
      return Number.isFinite(value) ? value : 0;
    } catch (error) {
      logger.debug({ word, lang: this.lang, error }, 'Frequency lookup failed');
      return 0;
    }
  }

  private safeLemma(word: string, pos: PartOfSpeech): string | undefined {
    try {
      return this.lemmatizer.lemmatize(word, pos);
    } catch (error) {
      logger.debug({ word, pos, error }, 'Lemmatization failed');
      return undefined;
    }
  }
}
