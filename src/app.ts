import * as path from 'path';
import { z } from 'zod';
import { loadFrequencyTable, type FrequencyProvider } from './lexicon/frequency';
import { ExchangeLemmatizer, RuleLemmatizer, type Lemmatizer } from './lexicon/lemmatizer';
import { loadLexicalRecords, type LexicalStore } from './lexicon/lexical-store';
import { SqliteLexicalStore } from './lexicon/sqlite-store';
import { AnnotationEngine } from './services/annotation.service';
import { LexicalDictionaryResolver } from './services/dictionary.service';
import { FrequencyDifficultyClassifier } from './services/difficulty.service';
import { DEFAULT_EXCLUDED_TAGS } from './types/annotation';
import { env } from './utils/env';
import { logger } from './utils/logger';
import { parseOptions } from './utils/validation';

const annotatorConfigSchema = z.object({
  frequencyPath: z.string().default(env.frequencyPath),
  frequencyFormat: z.enum(['zipf', 'count']).default(env.frequencyFormat === 'count' ? 'count' : 'zipf'),
  dictionaryPath: z.string().default(env.dictionaryPath),
  lang: z.string().min(1).default(env.annotationLang),
  threshold: z.number().finite().nonnegative().default(env.annotationThreshold),
  style: z.enum(['inline', 'wordwise']).default(env.annotationStyle === 'wordwise' ? 'wordwise' : 'inline'),
  maxDefinitions: z.number().int().min(1).default(env.maxDefinitions),
  includePhonetic: z.boolean().default(env.includePhonetic),
  cacheSize: z.number().int().nonnegative().default(env.dictionaryCacheSize),
  excludedTags: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_TAGS]),
});

export type AnnotatorConfig = z.input<typeof annotatorConfigSchema> & {
  /** Used instead of loading `frequencyPath`. */
  frequencies?: FrequencyProvider;
  /** Used instead of opening `dictionaryPath`. */
  store?: LexicalStore;
  lemmatizer?: Lemmatizer;
};

export type Annotator = {
  engine: AnnotationEngine;
  classifier: FrequencyDifficultyClassifier;
  resolver: LexicalDictionaryResolver;
  close: () => void;
};

const openStore = (dictionaryPath: string): { store: LexicalStore; close: () => void } => {
  if (path.extname(dictionaryPath).toLowerCase() === '.json') {
    return { store: loadLexicalRecords(dictionaryPath), close: () => undefined };
  }
  const store = new SqliteLexicalStore({ databasePath: dictionaryPath });
  return { store, close: () => store.close() };
};

/**
 * Loads the linguistic data once and wires classifier, resolver and engine.
 * Missing data fails here rather than on the first word looked up.
 */
export const createAnnotationEngine = (config: AnnotatorConfig = {}): Annotator => {
  const options = parseOptions(annotatorConfigSchema, config, 'annotator configuration');

  const frequencies = config.frequencies
    ?? loadFrequencyTable(options.frequencyPath, options.lang, options.frequencyFormat);

  const opened = config.store ? { store: config.store, close: () => undefined } : openStore(options.dictionaryPath);

  const lemmatizer = config.lemmatizer ?? new ExchangeLemmatizer(
    opened.store,
    new RuleLemmatizer({ vocabulary: (word) => frequencies.frequency(word, options.lang) > 0 }),
  );

  const classifier = new FrequencyDifficultyClassifier(frequencies, lemmatizer, {
    lang: options.lang,
    threshold: options.threshold,
  });
  const resolver = new LexicalDictionaryResolver(opened.store, {
    maxDefinitions: options.maxDefinitions,
    includePhonetic: options.includePhonetic,
    cacheSize: options.cacheSize,
  });
  const engine = new AnnotationEngine(classifier, resolver, {
    style: options.style,
    excludedTags: options.excludedTags,
  });

  logger.info(
    {
      lang: options.lang,
      threshold: options.threshold,
      style: options.style,
      maxDefinitions: options.maxDefinitions,
    },
    'Annotation engine ready',
  );

  return { engine, classifier, resolver, close: opened.close };
};
