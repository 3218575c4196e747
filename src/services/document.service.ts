import type { AnnotationStyle } from '../types/annotation';
import { AnnotationError } from '../utils/annotationError';
import { logger } from '../utils/logger';
import { parseMarkup, serializeMarkup, type MarkupMimeType } from '../utils/markup';
import type { AnnotationEngine } from './annotation.service';

export interface FragmentHandle {
  readonly id: string;
  read(): Node;
  write(fragment: Node): void;
}

/**
 * Supplies the fragments of one document and takes them back once
 * annotated. The style sheet is attached once for the whole document.
 */
export interface FragmentSource {
  fragments(): Iterable<FragmentHandle>;
  addStylesheet(css: string): void;
}

export type DocumentAnnotationResult = {
  fragments: number;
  style: AnnotationStyle;
};

export const annotateDocument = (source: FragmentSource, engine: AnnotationEngine): DocumentAnnotationResult => {
  let processed = 0;
  for (const handle of source.fragments()) {
    handle.write(engine.process(handle.read()));
    processed += 1;
    logger.debug({ fragment: handle.id, processed }, 'Processed fragment');
  }

  source.addStylesheet(engine.stylesheet());
  logger.info({ fragments: processed, style: engine.style }, 'Annotated document');

  return { fragments: processed, style: engine.style };
};

export type MarkupDocument = {
  id: string;
  markup: string;
};

export type MarkupFragmentSourceOptions = {
  mimeType?: MarkupMimeType;
  /** Link target added to each document head when the style sheet is attached. */
  stylesheetHref?: string;
};

/**
 * In-memory fragment source over serialized markup documents.
 */
export class MarkupFragmentSource implements FragmentSource {
  private readonly documents = new Map<string, string>();
  private readonly mimeType: MarkupMimeType;
  private readonly stylesheetHref: string;
  private css?: string;

  constructor(documents: MarkupDocument[], options: MarkupFragmentSourceOptions = {}) {
    for (const { id, markup } of documents) {
      this.documents.set(id, markup);
    }
    this.mimeType = options.mimeType ?? 'application/xhtml+xml';
    this.stylesheetHref = options.stylesheetHref ?? 'style/annotation.css';
  }

  *fragments(): Generator<FragmentHandle> {
    for (const id of [...this.documents.keys()]) {
      yield {
        id,
        read: () => parseMarkup(this.documents.get(id) ?? '', this.mimeType),
        write: (fragment: Node) => {
          this.documents.set(id, serializeMarkup(fragment));
        },
      };
    }
  }

  addStylesheet(css: string): void {
    if (this.css !== undefined) {
      throw new AnnotationError('STYLESHEET_ALREADY_ATTACHED', 'A style sheet is already attached to this document');
    }
    this.css = css;

    for (const [id, markup] of this.documents) {
      const doc = parseMarkup(markup, this.mimeType);
      const head = doc.getElementsByTagName('head').item(0);
      if (!head) continue;

      const link = head.namespaceURI
        ? doc.createElementNS(head.namespaceURI, 'link')
        : doc.createElement('link');
      link.setAttribute('href', this.stylesheetHref);
      link.setAttribute('rel', 'stylesheet');
      link.setAttribute('type', 'text/css');
      head.appendChild(link);

      this.documents.set(id, serializeMarkup(doc));
    }
  }

  get stylesheet(): string | undefined {
    return this.css;
  }

  markup(id: string): string | undefined {
    return this.documents.get(id);
  }
}
