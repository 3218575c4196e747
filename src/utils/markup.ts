import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { AnnotationError } from './annotationError';

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;

export type MarkupMimeType = 'application/xhtml+xml' | 'text/html' | 'text/xml' | 'application/xml';

export const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

export const isText = (node: Node): node is Text => node.nodeType === TEXT_NODE;

export const parseMarkup = (markup: string, mimeType: MarkupMimeType = 'application/xhtml+xml'): Document => {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (message: string) => errors.push(message),
      fatalError: (message: string) => errors.push(message),
    },
  });

  const doc: Document | undefined = parser.parseFromString(markup, mimeType);
  if (errors.length > 0 || !doc || !doc.documentElement) {
    throw new AnnotationError(
      'MALFORMED_MARKUP',
      `Markup could not be parsed${errors.length ? `: ${errors[0]}` : ''}`,
    );
  }
  return doc;
};

export const serializeMarkup = (node: Node): string => new XMLSerializer().serializeToString(node);

/**
 * Text nodes under `root` in document order (depth-first, pre-order).
 */
export const collectTextNodes = (root: Node): Text[] => {
  const textNodes: Text[] = [];
  const stack: Node[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (isText(node)) {
      textNodes.push(node);
      continue;
    }

    const children = node.childNodes;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children.item(i);
      if (child) stack.push(child);
    }
  }

  return textNodes;
};

export const classTokens = (element: Element): string[] =>
  (element.getAttribute('class') ?? '').split(/\s+/).filter(Boolean);

export const tagName = (element: Element): string => (element.localName || element.nodeName).toLowerCase();
