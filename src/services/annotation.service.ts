import {
  engineOptionsSchema,
  type AnnotationStyle,
  type EngineOptions,
} from '../types/annotation';
import { logger, safeLogText } from '../utils/logger';
import { classTokens, collectTextNodes, isElement, tagName } from '../utils/markup';
import { parseOptions } from '../utils/validation';
import type { DictionaryResolver } from './dictionary.service';
import type { DifficultyClassifier } from './difficulty.service';

export const ANNOTATED_WORD_CLASS = 'annotated-word';
export const ANNOTATION_CLASS = 'annotation';

export type TextSegment =
  | { kind: 'text'; text: string }
  | { kind: 'annotated'; word: string; gloss: string };

type StyleMarkup = {
  wrapperTag: string;
  glossTag: string;
  glossText: (gloss: string) => string;
};

const STYLE_MARKUP: Record<AnnotationStyle, StyleMarkup> = {
  inline: { wrapperTag: 'span', glossTag: 'span', glossText: (gloss) => ` (${gloss})` },
  wordwise: { wrapperTag: 'ruby', glossTag: 'rt', glossText: (gloss) => gloss },
};

// Tag and class pairs the engine itself writes; text inside them is never annotated again
const ANNOTATION_MARKUP = new Set(
  Object.values(STYLE_MARKUP).flatMap(({ wrapperTag, glossTag }) => [
    `${wrapperTag}.${ANNOTATED_WORD_CLASS}`,
    `${glossTag}.${ANNOTATION_CLASS}`,
  ]),
);

export const ANNOTATION_STYLESHEETS: Record<AnnotationStyle, string> = {
  inline: `
.annotated-word { display: inline; }
.annotation {
    font-size: 0.75em;
    color: #7f8c8d;
    background-color: #f0f3f4;
    padding: 0 4px;
    margin: 0 2px;
    border-radius: 4px;
    font-family: sans-serif;
}
`,
  wordwise: `
ruby.annotated-word { ruby-position: under; ruby-align: center; }
rt.annotation {
    font-size: 0.55em;
    color: #7f8c8d;
    font-family: sans-serif;
    line-height: 1.2;
}
rt.annotation::before { content: "{"; margin-right: 1px; }
`,
};

/**
 * Rewrites the text leaves of a markup fragment so that every difficult
 * word the dictionary can gloss is wrapped together with its gloss.
 *
 * Text directly inside the engine's own wrappers (`span`, `ruby` or `rt`
 * carrying the `annotated-word` or `annotation` class) is left alone, so a
 * fragment can be processed more than once. Other elements using those
 * class names are annotated as usual.
 */
export class AnnotationEngine {
  readonly style: AnnotationStyle;
  private readonly excludedTags: ReadonlySet<string>;

  constructor(
    private readonly classifier: DifficultyClassifier,
    private readonly resolver: DictionaryResolver,
    options: EngineOptions = {},
  ) {
    const parsed = parseOptions(engineOptionsSchema, options, 'engine options');
    this.style = parsed.style;
    this.excludedTags = new Set(parsed.excludedTags.map((tag) => tag.toLowerCase()));
  }

  stylesheet(): string {
    return ANNOTATION_STYLESHEETS[this.style];
  }

  process<T extends Node>(fragment: T): T {
    // Collected up front: the splices below must not disturb the walk
    const textNodes = collectTextNodes(fragment);
    let annotatedLeaves = 0;
    let annotatedWords = 0;

    for (const textNode of textNodes) {
      if (!this.isEligible(textNode)) continue;

      const segments = this.annotateText(textNode.data);
      if (!segments) continue;

      this.replaceTextNode(textNode, segments);
      annotatedLeaves += 1;
      annotatedWords += segments.filter((segment) => segment.kind === 'annotated').length;
    }

    logger.debug({ textNodes: textNodes.length, annotatedLeaves, annotatedWords }, 'Annotated fragment');
    return fragment;
  }

  /**
   * Splits `text` into plain gaps and glossed words. Undefined when no word
   * in the text was both difficult and found in the dictionary.
   */
  annotateText(text: string): TextSegment[] | undefined {
    const segments: TextSegment[] = [];
    let lastIndex = 0;

    for (const match of this.classifier.extractWords(text)) {
      const gloss = this.glossFor(match.text);
      if (!gloss) continue;

      if (match.start > lastIndex) {
        segments.push({ kind: 'text', text: text.slice(lastIndex, match.start) });
      }
      segments.push({ kind: 'annotated', word: match.text, gloss });
      lastIndex = match.end;
    }

    if (!segments.length) {
      return undefined;
    }
    if (lastIndex < text.length) {
      segments.push({ kind: 'text', text: text.slice(lastIndex) });
    }
    return segments;
  }

  private glossFor(word: string): string | undefined {
    try {
      if (!this.classifier.isDifficult(word)) {
        return undefined;
      }
      return this.resolver.lookup(word) || undefined;
    } catch (error) {
      logger.warn({ word, error }, 'Skipping word after lookup failure');
      return undefined;
    }
  }

  private isEligible(textNode: Text): boolean {
    const parent = textNode.parentNode;
    if (!parent || !textNode.data.trim()) {
      return false;
    }
    if (!isElement(parent)) {
      return true;
    }
    const tag = tagName(parent);
    if (this.excludedTags.has(tag)) {
      return false;
    }
    return !classTokens(parent).some((token) => ANNOTATION_MARKUP.has(`${tag}.${token}`));
  }

  private replaceTextNode(textNode: Text, segments: TextSegment[]): void {
    const parent = textNode.parentNode;
    const doc = textNode.ownerDocument;
    if (!parent || !doc) return;

    const namespace = isElement(parent) ? parent.namespaceURI : null;
    const createElement = (tag: string): Element =>
      namespace ? doc.createElementNS(namespace, tag) : doc.createElement(tag);

    const markup = STYLE_MARKUP[this.style];
    const replacement: Node[] = segments.map((segment) => {
      if (segment.kind === 'text') {
        return doc.createTextNode(segment.text);
      }

      const wrapper = createElement(markup.wrapperTag);
      wrapper.setAttribute('class', ANNOTATED_WORD_CLASS);
      wrapper.appendChild(doc.createTextNode(segment.word));

      const annotation = createElement(markup.glossTag);
      annotation.setAttribute('class', ANNOTATION_CLASS);
      annotation.appendChild(doc.createTextNode(markup.glossText(segment.gloss)));
      wrapper.appendChild(annotation);

      return wrapper;
    });

    for (const node of replacement) {
      parent.insertBefore(node, textNode);
    }
    parent.removeChild(textNode);

    logger.trace({ text: safeLogText(textNode.data), nodes: replacement.length }, 'Replaced text node');
  }
}
