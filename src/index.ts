export { createAnnotationEngine, type Annotator, type AnnotatorConfig } from './app';
export {
  AnnotationEngine,
  ANNOTATED_WORD_CLASS,
  ANNOTATION_CLASS,
  ANNOTATION_STYLESHEETS,
  type TextSegment,
} from './services/annotation.service';
export {
  LexicalDictionaryResolver,
  SimpleDictionaryResolver,
  collectGlosses,
  formatGloss,
  renderEntry,
  toDictionaryEntry,
  type DictionaryResolver,
} from './services/dictionary.service';
export {
  FrequencyDifficultyClassifier,
  extractWords,
  type DifficultyClassifier,
} from './services/difficulty.service';
export {
  MarkupFragmentSource,
  annotateDocument,
  type DocumentAnnotationResult,
  type FragmentHandle,
  type FragmentSource,
  type MarkupDocument,
  type MarkupFragmentSourceOptions,
} from './services/document.service';
export { extractLemma, parseExchange } from './lexicon/exchange';
export {
  ZipfFrequencyTable,
  loadFrequencyTable,
  parseFrequencyList,
  type FrequencyFileFormat,
  type FrequencyProvider,
} from './lexicon/frequency';
export {
  ExchangeLemmatizer,
  RuleLemmatizer,
  loadExceptionTable,
  type ExceptionTable,
  type Lemmatizer,
  type Vocabulary,
} from './lexicon/lemmatizer';
export { InMemoryLexicalStore, loadLexicalRecords, type LexicalStore } from './lexicon/lexical-store';
export { SqliteLexicalStore, type SqliteLexicalStoreConfig } from './lexicon/sqlite-store';
export { parseMarkup, serializeMarkup, type MarkupMimeType } from './utils/markup';
export { AnnotationError, type AnnotationErrorCode } from './utils/annotationError';
export type {
  AnnotationStyle,
  ClassifierOptions,
  DictionaryEntry,
  EngineOptions,
  LexicalRecord,
  PartOfSpeech,
  ResolverOptions,
  WordMatch,
} from './types/annotation';
