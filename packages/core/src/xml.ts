// ============================================================================
// @treekey/core — XML Tree Provider
// ============================================================================
//
// Adapts `xml-js` output to the NodeView / DocumentView interfaces.
//
//   tagName    element name as written (prefix included)
//   textValue  first text or CDATA child, '' when there is none
//   attributes as written, values as text
//   children   element, text and CDATA children, document order
//
// A text or CDATA child is a node with an empty tag name, an empty text
// value and no attributes or children, so mixed content counts toward the
// parent's key. Comments, processing instructions, doctype and the XML
// declaration are dropped by the parser, as is whitespace-only text between
// elements.
// ============================================================================

import { type Element, xml2js } from 'xml-js';
import { XmlParseError } from './errors.js';
import type { AttributeView, DocumentView, NodeView } from './node_key.js';

const CHILD_TYPES = new Set(['element', 'text', 'cdata']);

const PARSE_OPTIONS = {
  compact: false,
  ignoreComment: true,
  ignoreInstruction: true,
  ignoreDoctype: true,
  ignoreDeclaration: true,
  captureSpacesBetweenElements: false,
} as const;

function isElementNode(value: unknown): value is Element {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorReason(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim().replace(/\s*\n\s*/g, '; ');
}

/**
 * A read-only view over one parsed element.
 */
export class XmlNodeView implements NodeView {
  private childViews: XmlNodeView[] | undefined;

  constructor(private readonly element: Element) {}

  get tagName(): string {
    return this.element.name ?? '';
  }

  get textValue(): string {
    for (const child of this.element.elements ?? []) {
      if (child.type === 'text') return String(child.text ?? '');
      if (child.type === 'cdata') return child.cdata ?? '';
    }
    return '';
  }

  get attributes(): AttributeView[] {
    return Object.entries(this.element.attributes ?? {}).map(([name, value]) => ({
      name,
      value: value === undefined ? '' : String(value),
    }));
  }

  /** Built once, so each child keeps one view identity. */
  get children(): XmlNodeView[] {
    if (!this.childViews) {
      this.childViews = (this.element.elements ?? [])
        .filter((child) => child.type !== undefined && CHILD_TYPES.has(child.type))
        .map((child) => new XmlNodeView(child));
    }
    return this.childViews;
  }
}

export class XmlDocumentView implements DocumentView {
  readonly root: XmlNodeView;

  constructor(root: Element) {
    this.root = new XmlNodeView(root);
  }
}

/**
 * Parse markup text into a document.
 *
 * @param source - Name used in error messages (e.g. a file path)
 * @throws XmlParseError when the text is malformed or has no element
 */
export function parseXmlDocument(text: string, source?: string): XmlDocumentView {
  let parsed: unknown;
  try {
    parsed = xml2js(text, PARSE_OPTIONS);
  } catch (e) {
    throw new XmlParseError(errorReason(e), source);
  }

  if (!isElementNode(parsed)) {
    throw new XmlParseError('parser returned no document', source);
  }

  const root = (parsed.elements ?? []).find((node) => node.type === 'element');
  if (!root) {
    throw new XmlParseError('no document element', source);
  }

  return new XmlDocumentView(root);
}
