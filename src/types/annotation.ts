import { z } from 'zod';

export type AnnotationStyle = 'inline' | 'wordwise';

export type PartOfSpeech = 'verb' | 'noun' | 'adjective' | 'adverb';

export const PARTS_OF_SPEECH: readonly PartOfSpeech[] = ['verb', 'noun', 'adjective', 'adverb'];

export type WordMatch = Readonly<{
  start: number;
  end: number;
  text: string;
}>;

export type DictionaryEntry = {
  phonetic?: string;
  glosses: string[];
};

export const lexicalRecordSchema = z.object({
  word: z.string().min(1),
  translation: z.string().nullish(),
  exchange: z.string().nullish(),
  phonetic: z.string().nullish(),
});

export type LexicalRecord = z.infer<typeof lexicalRecordSchema>;

export const classifierOptionsSchema = z.object({
  lang: z.string().min(1).default('en'),
  threshold: z.number().finite().nonnegative().default(4.0),
});

export type ClassifierOptions = z.input<typeof classifierOptionsSchema>;

export const resolverOptionsSchema = z.object({
  maxDefinitions: z.number().int().min(1).default(2),
  includePhonetic: z.boolean().default(true),
  cacheSize: z.number().int().nonnegative().default(2048),
});

export type ResolverOptions = z.input<typeof resolverOptionsSchema>;

export const DEFAULT_EXCLUDED_TAGS: readonly string[] = ['script', 'style', 'pre', 'code', 'textarea'];

export const engineOptionsSchema = z.object({
  style: z.enum(['inline', 'wordwise']).default('inline'),
  excludedTags: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_TAGS]),
});

export type EngineOptions = z.input<typeof engineOptionsSchema>;
