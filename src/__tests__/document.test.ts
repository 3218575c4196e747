import { describe, expect, it } from 'vitest';
import { ZipfFrequencyTable } from '../lexicon/frequency';
import { AnnotationEngine, ANNOTATION_STYLESHEETS } from '../services/annotation.service';
import { SimpleDictionaryResolver } from '../services/dictionary.service';
import { FrequencyDifficultyClassifier } from '../services/difficulty.service';
import {
  annotateDocument,
  MarkupFragmentSource,
  type FragmentHandle,
  type FragmentSource,
} from '../services/document.service';
import { AnnotationError } from '../utils/annotationError';
import { parseMarkup, serializeMarkup } from '../utils/markup';

const classifier = new FrequencyDifficultyClassifier(
  ZipfFrequencyTable.fromZipf('en', [
    ['the', 7.73],
    ['data', 5.6],
    ['paradigm', 3.9],
  ]),
  { lemmatize: (word) => word },
  { threshold: 4.5 },
);
const engine = new AnnotationEngine(classifier, new SimpleDictionaryResolver({ paradigm: '范式' }));

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('annotateDocument', () => {
  it('annotates every fragment and links the style sheet once', () => {
    const source = new MarkupFragmentSource(
      [
        { id: 'ch1', markup: '<html><head><title>One</title></head><body><p>A paradigm shift</p></body></html>' },
        { id: 'ch2', markup: '<html><body><p>The data.</p></body></html>' },
      ],
      { mimeType: 'text/xml' },
    );

    expect(annotateDocument(source, engine)).toEqual({ fragments: 2, style: 'inline' });
    expect(source.markup('ch1')).toBe(
      '<html><head><title>One</title><link href="style/annotation.css" rel="stylesheet" type="text/css"/></head>' +
        '<body><p>A <span class="annotated-word">paradigm<span class="annotation"> (范式)</span></span> shift</p></body></html>',
    );
    expect(source.markup('ch2')).toBe('<html><body><p>The data.</p></body></html>');
    expect(source.stylesheet).toBe(ANNOTATION_STYLESHEETS.inline);
  });

  it('hands fragments back in order before attaching the style sheet', () => {
    const calls: string[] = [];
    const handle = (id: string): FragmentHandle => ({
      id,
      read: () => {
        calls.push(`read:${id}`);
        return parseMarkup('<p>paradigm</p>', 'text/xml');
      },
      write: (fragment) => {
        calls.push(`write:${id}:${serializeMarkup(fragment)}`);
      },
    });
    const source: FragmentSource = {
      fragments: () => [handle('a'), handle('b')],
      addStylesheet: (css) => {
        calls.push(`css:${css === ANNOTATION_STYLESHEETS.inline}`);
      },
    };

    annotateDocument(source, engine);

    const annotated = '<p><span class="annotated-word">paradigm<span class="annotation"> (范式)</span></span></p>';
    expect(calls).toEqual([
      'read:a',
      `write:a:${annotated}`,
      'read:b',
      `write:b:${annotated}`,
      'css:true',
    ]);
  });
});

describe('MarkupFragmentSource', () => {
  it('refuses a second style sheet', () => {
    const source = new MarkupFragmentSource([{ id: 'ch1', markup: '<html><body/></html>' }], { mimeType: 'text/xml' });
    source.addStylesheet('p {}');

    const error = captureError(() => source.addStylesheet('p {}'));
    expect(error).toBeInstanceOf(AnnotationError);
    expect(error).toMatchObject({ code: 'STYLESHEET_ALREADY_ATTACHED' });
  });

  it('leaves documents without a head unchanged when linking the style sheet', () => {
    const source = new MarkupFragmentSource([{ id: 'ch1', markup: '<html><body><p>x</p></body></html>' }], {
      mimeType: 'text/xml',
      stylesheetHref: '../css/notes.css',
    });
    source.addStylesheet('p {}');
    expect(source.markup('ch1')).toBe('<html><body><p>x</p></body></html>');
  });

  it('uses the configured link target', () => {
    const source = new MarkupFragmentSource([{ id: 'ch1', markup: '<html><head></head></html>' }], {
      mimeType: 'text/xml',
      stylesheetHref: '../css/notes.css',
    });
    source.addStylesheet('p {}');
    expect(source.markup('ch1')).toBe(
      '<html><head><link href="../css/notes.css" rel="stylesheet" type="text/css"/></head></html>',
    );
  });
});

describe('parseMarkup', () => {
  it('rejects empty input', () => {
    const error = captureError(() => parseMarkup(''));
    expect(error).toMatchObject({ code: 'MALFORMED_MARKUP' });
  });
});
