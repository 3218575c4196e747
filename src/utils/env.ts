import dotenv from 'dotenv';

dotenv.config();

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? '',
  dictionaryPath: process.env.DICTIONARY_PATH ?? 'data/stardict.db',
  dictionaryCacheSize: numberFromEnv(process.env.DICTIONARY_CACHE_SIZE, 2048),
  frequencyPath: process.env.FREQUENCY_PATH ?? '',
  frequencyFormat: (process.env.FREQUENCY_FORMAT ?? 'zipf').toLowerCase(),
  annotationLang: (process.env.ANNOTATION_LANG ?? 'en').toLowerCase(),
  annotationThreshold: numberFromEnv(process.env.ANNOTATION_THRESHOLD, 4.0),
  annotationStyle: (process.env.ANNOTATION_STYLE ?? 'inline').toLowerCase(),
  maxDefinitions: numberFromEnv(process.env.MAX_DEFINITIONS, 2),
  includePhonetic: process.env.INCLUDE_PHONETIC !== 'false',
};
