import { describe, expect, it, vi } from 'vitest';
import { extractLemma } from '../lexicon/exchange';
import { InMemoryLexicalStore, type LexicalStore } from '../lexicon/lexical-store';
import {
  collectGlosses,
  formatGloss,
  LexicalDictionaryResolver,
  SimpleDictionaryResolver,
} from '../services/dictionary.service';
import { AnnotationError } from '../utils/annotationError';

const createStore = () =>
  new InMemoryLexicalStore([
    { word: 'run', phonetic: 'rʌn', translation: 'v. 跑, 运转\nn. 奔跑' },
    { word: 'running', translation: '', exchange: 'p:ran/d:ran/i:running/3:runs/s:runs/0:run' },
    { word: 'paradigm', translation: 'n. 范式; 模式\nv. 做范例' },
    { word: 'broken', translation: null, exchange: 'garbage' },
    { word: 'orphan', exchange: '0:missingword' },
    { word: 'blank', phonetic: '  ', translation: 'a. 空白的' },
  ]);

describe('formatGloss', () => {
  it('strips the part-of-speech tag and stops at the definition limit', () => {
    expect(formatGloss('n. 范式; 模式\nv. 做范例', 2)).toBe('范式; 模式');
  });

  it('continues across lines until the limit is reached', () => {
    expect(formatGloss('vt. 利用, 开发\nn. 功绩', 3)).toBe('利用; 开发; 功绩');
  });

  it('splits on full-width separators', () => {
    expect(formatGloss('a. 辅助的，补充的；副的', 2)).toBe('辅助的; 补充的');
  });

  it('skips duplicates and blanks', () => {
    expect(formatGloss('n. 模式；样式\nn. 模式，，方式', 5)).toBe('模式; 样式; 方式');
  });

  it('defaults to two definitions', () => {
    expect(formatGloss('a, b, c')).toBe('a; b');
  });

  it('falls back to the raw first line when nothing can be collected', () => {
    expect(formatGloss('n. ;\nv. ,', 2)).toBe('n. ;');
  });

  it('never returns more fragments than the limit', () => {
    const glosses = collectGlosses('n. 一, 二, 三, 四\nv. 五', 3);
    expect(glosses).toEqual(['一', '二', '三']);
  });
});

describe('extractLemma', () => {
  it('finds the lemma code in an exchange field', () => {
    expect(extractLemma('p:ran/d:ran/i:running/3:runs/s:runs/0:run')).toBe('run');
  });

  it('takes the first of codes 0, 1 and 2 in field order', () => {
    expect(extractLemma('d:ran/2:runner/0:run')).toBe('runner');
  });

  it('returns undefined without a lemma code', () => {
    expect(extractLemma('p:ran/d:ran')).toBeUndefined();
    expect(extractLemma('garbage')).toBeUndefined();
  });
});

describe('LexicalDictionaryResolver', () => {
  it('formats a direct translation', () => {
    const resolver = new LexicalDictionaryResolver(createStore());
    expect(resolver.lookup('paradigm')).toBe('范式; 模式');
  });

  it('resolves inflected forms through their lemma', () => {
    const resolver = new LexicalDictionaryResolver(createStore());
    expect(resolver.lookup('running')).toBe('/rʌn/ 跑; 运转');
  });

  it('is case-insensitive', () => {
    const resolver = new LexicalDictionaryResolver(createStore());
    expect(resolver.lookup('RUN')).toBe('/rʌn/ 跑; 运转');
  });

  it('omits the phonetic notation when disabled or blank', () => {
    const resolver = new LexicalDictionaryResolver(createStore(), { includePhonetic: false, maxDefinitions: 3 });
    expect(resolver.lookup('run')).toBe('跑; 运转; 奔跑');

    const withPhonetic = new LexicalDictionaryResolver(createStore());
    expect(withPhonetic.lookup('blank')).toBe('空白的');
  });

  it('returns undefined for unknown words and unusable records', () => {
    const resolver = new LexicalDictionaryResolver(createStore());
    expect(resolver.lookup('unknown')).toBeUndefined();
    expect(resolver.lookup('broken')).toBeUndefined();
    expect(resolver.lookup('orphan')).toBeUndefined();
  });

  it('exposes the structured entry', () => {
    const resolver = new LexicalDictionaryResolver(createStore());
    expect(resolver.resolveEntry('running')).toEqual({ phonetic: 'rʌn', glosses: ['跑', '运转'] });
    expect(resolver.resolveEntry('nothing')).toBeUndefined();
  });

  it('caches hits and misses', () => {
    const store = createStore();
    const getRecord = vi.spyOn(store, 'getRecord');
    const resolver = new LexicalDictionaryResolver(store);

    resolver.lookup('paradigm');
    resolver.lookup('Paradigm');
    resolver.lookup('unknown');
    resolver.lookup('unknown');

    expect(getRecord).toHaveBeenCalledTimes(2);
  });

  it('reads the store every time when caching is disabled', () => {
    const store = createStore();
    const getRecord = vi.spyOn(store, 'getRecord');
    const resolver = new LexicalDictionaryResolver(store, { cacheSize: 0 });

    resolver.lookup('paradigm');
    resolver.lookup('paradigm');

    expect(getRecord).toHaveBeenCalledTimes(2);
  });

  it('treats store failures as not found without caching them', () => {
    const getRecord = vi.fn(() => {
      throw new Error('database is closed');
    });
    const store: LexicalStore = { getRecord };
    const resolver = new LexicalDictionaryResolver(store);

    expect(resolver.lookup('paradigm')).toBeUndefined();
    expect(resolver.lookup('paradigm')).toBeUndefined();
    expect(getRecord).toHaveBeenCalledTimes(2);
  });

  it('rejects a definition limit below one', () => {
    expect(() => new LexicalDictionaryResolver(createStore(), { maxDefinitions: 0 })).toThrow(AnnotationError);
  });
});

describe('SimpleDictionaryResolver', () => {
  const resolver = new SimpleDictionaryResolver({ multimodal: '多模态', exploit: '利用' });

  it('looks words up case-insensitively', () => {
    expect(resolver.lookup('Multimodal')).toBe('多模态');
  });

  it('falls back to the singular form', () => {
    expect(resolver.lookup('exploits')).toBe('利用');
  });

  it('returns undefined for unknown words', () => {
    expect(resolver.lookup('bus')).toBeUndefined();
    expect(resolver.lookup('paradigm')).toBeUndefined();
  });
});
