/**
 * @module @envstage/core/metadata/xml-document
 *
 * Typed, order-preserving tree over MSBuild documents. Parsing and
 * serialization go through fast-xml-parser in `preserveOrder` mode with
 * entity processing off, so untouched text and attribute values are
 * written back as they were read. Whitespace between elements is kept as
 * text nodes; helpers that insert elements add matching indentation.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { CorruptMetadataError } from '../errors.js';

export interface XmlElement {
  type: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  type: 'text';
  value: string;
}

export interface XmlComment {
  type: 'comment';
  value: string;
}

export interface XmlCData {
  type: 'cdata';
  value: string;
}

/** `<?xml ...?>` and other processing instructions. */
export interface XmlInstruction {
  type: 'instruction';
  name: string;
  attributes: Record<string, string>;
}

export type XmlNode = XmlElement | XmlText | XmlComment | XmlCData | XmlInstruction;

export interface XmlFormat {
  newline: string;
  indentUnit: string;
  /** The document ended with a line break. */
  finalNewline: boolean;
}

export interface XmlDocument {
  nodes: XmlNode[];
  root: XmlElement;
  format: XmlFormat;
}

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const COMMENT_KEY = '#comment';
const CDATA_KEY = '#cdata';

const sharedOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  commentPropName: COMMENT_KEY,
  cdataPropName: CDATA_KEY,
  processEntities: false,
} as const;

const parser = new XMLParser({
  ...sharedOptions,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: false,
  ignorePiTags: false,
});

/**
 * Attribute values are always written between double quotes. Entities are
 * kept raw, so only a literal `"` from a single-quoted value needs escaping.
 */
export function quoteAttributeValue(value: string): string {
  return value.replace(/"/g, '&quot;');
}

const builder = new XMLBuilder({
  ...sharedOptions,
  format: false,
  suppressEmptyNode: true,
  attributeValueProcessor: (_name: string, value: unknown) =>
    typeof value === 'string' ? quoteAttributeValue(value) : value,
});

type OrderedEntry = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEntries(value: unknown): OrderedEntry[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function readAttributes(entry: OrderedEntry): Record<string, string> {
  const raw = entry[ATTRIBUTES_KEY];
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name] = typeof value === 'string' ? value : String(value);
  }
  return attributes;
}

function joinText(value: unknown): string {
  return toEntries(value)
    .map((entry) => entry[TEXT_KEY])
    .filter((text) => text !== undefined)
    .map(String)
    .join('');
}

function fromOrdered(entries: OrderedEntry[]): XmlNode[] {
  const nodes: XmlNode[] = [];
  for (const entry of entries) {
    const name = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
    if (name === undefined) {
      continue;
    }
    const value = entry[name];
    if (name === TEXT_KEY) {
      nodes.push({ type: 'text', value: String(value) });
    } else if (name === COMMENT_KEY) {
      nodes.push({ type: 'comment', value: joinText(value) });
    } else if (name === CDATA_KEY) {
      nodes.push({ type: 'cdata', value: joinText(value) });
    } else if (name.startsWith('?')) {
      nodes.push({ type: 'instruction', name, attributes: readAttributes(entry) });
    } else {
      nodes.push({
        type: 'element',
        name,
        attributes: readAttributes(entry),
        children: fromOrdered(toEntries(value)),
      });
    }
  }
  return nodes;
}

function writeAttributes(attributes: Record<string, string>): Record<string, string> | undefined {
  const keys = Object.keys(attributes);
  if (keys.length === 0) {
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const key of keys) {
    result[`${ATTRIBUTE_PREFIX}${key}`] = attributes[key] ?? '';
  }
  return result;
}

function toOrdered(nodes: XmlNode[]): OrderedEntry[] {
  return nodes.map((node): OrderedEntry => {
    switch (node.type) {
      case 'text':
        return { [TEXT_KEY]: node.value };
      case 'comment':
        return { [COMMENT_KEY]: [{ [TEXT_KEY]: node.value }] };
      case 'cdata':
        return { [CDATA_KEY]: [{ [TEXT_KEY]: node.value }] };
      case 'instruction': {
        const attributes = writeAttributes(node.attributes);
        return attributes
          ? { [node.name]: [{ [TEXT_KEY]: '' }], [ATTRIBUTES_KEY]: attributes }
          : { [node.name]: [{ [TEXT_KEY]: '' }] };
      }
      case 'element': {
        const attributes = writeAttributes(node.attributes);
        const children = toOrdered(node.children);
        return attributes ? { [node.name]: children, [ATTRIBUTES_KEY]: attributes } : { [node.name]: children };
      }
    }
  });
}

function detectFormat(text: string, nodes: XmlNode[]): XmlFormat {
  const newline = text.includes('\r\n') ? '\r\n' : '\n';
  const root = nodes.find((node): node is XmlElement => node.type === 'element');
  const firstIndent = root?.children.find(
    (node): node is XmlText => node.type === 'text' && /\n[ \t]+$/.test(node.value)
  );
  const match = firstIndent ? /\n([ \t]+)$/.exec(firstIndent.value) : null;
  return { newline, indentUnit: match?.[1] ?? '  ', finalNewline: /\n$/.test(text) };
}

/**
 * The parser reads CRLF as LF; put the document's line breaks back.
 */
function restoreNewlines(nodes: XmlNode[], newline: string): void {
  for (const node of nodes) {
    if (node.type === 'element') {
      restoreNewlines(node.children, newline);
    } else if (node.type !== 'instruction') {
      node.value = node.value.replace(/\r?\n/g, newline);
    }
  }
}

/**
 * @throws CorruptMetadataError when the text is not well-formed or the
 * root element is not `expectedRoot`
 */
export function parseXmlDocument(text: string, filePath: string, expectedRoot = 'Project'): XmlDocument {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new CorruptMetadataError(filePath, validation.err.msg, validation.err.line);
  }

  const nodes = fromOrdered(toEntries(parser.parse(text)));
  const format = detectFormat(text, nodes);
  if (format.newline !== '\n') {
    restoreNewlines(nodes, format.newline);
  }
  const root = nodes.find((node): node is XmlElement => node.type === 'element');
  if (!root) {
    throw new CorruptMetadataError(filePath, 'document has no root element');
  }
  if (root.name !== expectedRoot) {
    throw new CorruptMetadataError(filePath, `expected <${expectedRoot}> root, found <${root.name}>`);
  }

  return { nodes, root, format };
}

/**
 * Top-level nodes go on their own lines; the parser does not keep the
 * whitespace between them.
 */
export function serializeXmlDocument(document: XmlDocument): string {
  const { format } = document;
  const body = document.nodes
    .filter((node) => node.type !== 'text' || node.value.trim() !== '')
    .map((node) => builder.build(toOrdered([node])))
    .join(format.newline);
  return format.finalNewline ? `${body}${format.newline}` : body;
}

/**
 * Fresh MSBuild document with an empty `Project` root.
 */
export function createProjectDocument(
  format: XmlFormat = { newline: '\r\n', indentUnit: '  ', finalNewline: true }
): XmlDocument {
  const root = createElement('Project', {
    ToolsVersion: 'Current',
    xmlns: 'http://schemas.microsoft.com/developer/msbuild/2003',
  });
  root.children.push({ type: 'text', value: format.newline });
  const nodes: XmlNode[] = [
    { type: 'instruction', name: '?xml', attributes: { version: '1.0', encoding: 'utf-8' } },
    root,
  ];
  return { nodes, root, format };
}

export function createElement(name: string, attributes: Record<string, string> = {}, text?: string): XmlElement {
  return {
    type: 'element',
    name,
    attributes,
    children: text === undefined ? [] : [{ type: 'text', value: escapeXmlText(text) }],
  };
}

export function childElements(parent: XmlElement, name?: string): XmlElement[] {
  return parent.children.filter(
    (node): node is XmlElement =>
      node.type === 'element' && (name === undefined || node.name.toLowerCase() === name.toLowerCase())
  );
}

export function getAttribute(element: XmlElement, name: string): string | undefined {
  const key = Object.keys(element.attributes).find((attr) => attr.toLowerCase() === name.toLowerCase());
  return key === undefined ? undefined : element.attributes[key];
}

/**
 * Raw (still escaped) text content of an element.
 */
export function rawText(element: XmlElement): string {
  return element.children
    .filter((node): node is XmlText | XmlCData => node.type === 'text' || node.type === 'cdata')
    .map((node) => node.value)
    .join('');
}

export function escapeXmlText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function unescapeXmlText(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Set an element's text to `value`. Returns false when it already held it.
 */
export function setElementText(element: XmlElement, value: string): boolean {
  const current = element.children.every((node) => node.type === 'text' || node.type === 'cdata')
    ? unescapeXmlText(rawText(element).trim())
    : undefined;
  if (current === value) {
    return false;
  }
  element.children = [{ type: 'text', value: escapeXmlText(value) }];
  return true;
}

function indentAt(format: XmlFormat, depth: number): string {
  return `${format.newline}${format.indentUnit.repeat(depth)}`;
}

/**
 * Append `child` as the last element of `parent`, which sits at `depth`
 * (the root is depth 0), keeping the surrounding indentation.
 */
export function appendElement(parent: XmlElement, child: XmlElement, depth: number, format: XmlFormat): void {
  const last = parent.children[parent.children.length - 1];
  const trailing = last && last.type === 'text' && last.value.trim() === '' ? last : undefined;
  if (trailing) {
    parent.children.pop();
  }

  parent.children.push({ type: 'text', value: indentAt(format, depth + 1) });
  if (child.children.some((node) => node.type === 'element')) {
    indentChildren(child, depth + 1, format);
  }
  parent.children.push(child);
  parent.children.push(trailing ?? { type: 'text', value: indentAt(format, depth) });
}

function indentChildren(element: XmlElement, depth: number, format: XmlFormat): void {
  const elements = element.children.filter((node) => node.type !== 'text');
  element.children = [];
  for (const node of elements) {
    if (node.type === 'element' && node.children.some((child) => child.type === 'element')) {
      indentChildren(node, depth + 1, format);
    }
    element.children.push({ type: 'text', value: indentAt(format, depth + 1) }, node);
  }
  element.children.push({ type: 'text', value: indentAt(format, depth) });
}

export interface EnsureChildResult {
  element: XmlElement;
  created: boolean;
}

/**
 * First child element named `name`, appending an empty one when missing.
 */
export function ensureChildElement(
  parent: XmlElement,
  name: string,
  depth: number,
  format: XmlFormat
): EnsureChildResult {
  const [existing] = childElements(parent, name);
  if (existing) {
    return { element: existing, created: false };
  }
  const element = createElement(name);
  appendElement(parent, element, depth, format);
  return { element, created: true };
}
