// XML text <-> XmlElement tree
// fast-xml-parser does the low-level work in ordered mode so that sibling
// order, which PREMIS depends on, survives a round trip.

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { DocumentParseError } from '../errors.js';
import type { DocumentOptions } from './options.js';
import { DEFAULT_DOCUMENT_OPTIONS } from './options.js';
import type { XmlElement, XmlNode } from './tree.js';
import { isElement } from './tree.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  htmlEntities: true,
  trimValues: true,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isPlainObject(value)) {
    return attributes;
  }
  for (const [key, raw] of Object.entries(value)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name] = typeof raw === 'string' ? raw : String(raw);
  }
  return attributes;
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const items: unknown[] = value;
  const nodes: XmlNode[] = [];

  for (const item of items) {
    if (!isPlainObject(item)) continue;

    for (const [key, content] of Object.entries(item)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        const text = typeof content === 'string' ? content : String(content);
        if (text !== '') {
          nodes.push({ text });
        }
        continue;
      }

      nodes.push({
        name: key,
        attributes: toAttributes(item[ATTRIBUTES_KEY]),
        children: toNodes(content),
      });
    }
  }

  return nodes;
}

/**
 * Parse XML text and return its root element.
 *
 * The declaration, processing instructions and comments are dropped and
 * text content is trimmed.
 *
 * @throws DocumentParseError if the text is not well-formed or has no root element
 */
export function parseXml(text: string): XmlElement {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new DocumentParseError(`Malformed XML: ${validation.err.msg}`, {
      details: { line: validation.err.line, column: validation.err.col, code: validation.err.code },
    });
  }

  const parsed: unknown = parser.parse(text);
  const root = toNodes(parsed).find(isElement);
  if (!root) {
    throw new DocumentParseError('Document has no root element');
  }
  return root;
}

function toOrdered(element: XmlElement): Record<string, unknown> {
  const ordered: Record<string, unknown> = {
    [element.name]: element.children.map((child) =>
      isElement(child) ? toOrdered(child) : { [TEXT_KEY]: child.text }
    ),
  };

  const names = Object.keys(element.attributes);
  if (names.length > 0) {
    const attributes: Record<string, string> = {};
    for (const name of names) {
      attributes[`${ATTRIBUTE_PREFIX}${name}`] = element.attributes[name];
    }
    ordered[ATTRIBUTES_KEY] = attributes;
  }

  return ordered;
}

/**
 * Serialize a root element to XML text.
 *
 * Writes the declaration header when `xmlDeclaration` is set and
 * indents by `indent` per level.
 */
export function serializeXml(
  root: XmlElement,
  options: Pick<DocumentOptions, 'xmlDeclaration' | 'encoding' | 'indent'> = DEFAULT_DOCUMENT_OPTIONS
): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    format: options.indent !== '',
    indentBy: options.indent,
    suppressEmptyNode: true,
  });

  const body: string = builder.build([toOrdered(root)]).replace(/^\s+/, '');
  const separator = options.indent !== '' ? '\n' : '';
  const declaration = options.xmlDeclaration
    ? `<?xml version="1.0" encoding="${options.encoding}"?>${separator}`
    : '';

  return `${declaration}${body}${separator && !body.endsWith('\n') ? '\n' : ''}`;
}
