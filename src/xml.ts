import { XMLParser, XMLValidator } from 'fast-xml-parser';

/** Element tree node in document order. */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
  /** XPath-like location, e.g. `/score-partwise[1]/part[1]/measure[3]` */
  path: string;
}

/** Well-formedness failure reported by the XML validator. */
export interface XmlSyntaxIssue {
  code: string;
  message: string;
  line: number;
  column: number;
}

// Parser with preserveOrder to maintain element order
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  preserveOrder: true,
});

interface OrderedElement {
  [key: string]: unknown;
  ':@'?: Record<string, unknown>;
}

function isOrderedElement(value: unknown): value is OrderedElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check well-formedness. Returns undefined for a well-formed document.
 */
export function checkWellFormed(xmlString: string): XmlSyntaxIssue | undefined {
  const result = XMLValidator.validate(xmlString);
  if (result === true) return undefined;
  return {
    code: result.err.code,
    message: result.err.msg,
    line: result.err.line,
    column: result.err.col,
  };
}

/**
 * Parse a well-formed document into its root element.
 * Returns undefined when the document has no root element.
 */
export function parseXml(xmlString: string): XmlNode | undefined {
  const parsed = xmlParser.parse(xmlString) as OrderedElement[];
  const counts = new Map<string, number>();
  for (const el of parsed) {
    const node = toNode(el, '', counts);
    if (node) return node;
  }
  return undefined;
}

function elementName(element: OrderedElement): string | undefined {
  for (const key of Object.keys(element)) {
    if (key === ':@' || key === '#text' || key.startsWith('?') || key.startsWith('!')) continue;
    return key;
  }
  return undefined;
}

function toNode(element: OrderedElement, parentPath: string, siblingCounts: Map<string, number>): XmlNode | undefined {
  const name = elementName(element);
  if (name === undefined) return undefined;

  const index = (siblingCounts.get(name) ?? 0) + 1;
  siblingCounts.set(name, index);
  const path = `${parentPath}/${name}[${index}]`;

  const node: XmlNode = {
    name,
    attributes: getAttributes(element),
    children: [],
    text: '',
    path,
  };

  const content = element[name];
  if (Array.isArray(content)) {
    const childCounts = new Map<string, number>();
    for (const item of content) {
      if (!isOrderedElement(item)) continue;
      if (item['#text'] !== undefined) {
        node.text += String(item['#text']);
        continue;
      }
      const child = toNode(item, path, childCounts);
      if (child) node.children.push(child);
    }
  }

  return node;
}

function getAttributes(element: OrderedElement): Record<string, string> {
  const attrs: Record<string, string> = {};
  const rawAttrs = element[':@'];
  if (rawAttrs) {
    for (const [key, value] of Object.entries(rawAttrs)) {
      if (key.startsWith('@_')) {
        attrs[key.slice(2)] = String(value);
      }
    }
  }
  return attrs;
}

/** Return first child matching `name`, if present. */
export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node?.children.find((child) => child.name === name);
}

/** Return all children matching `name`. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  return node ? node.children.filter((child) => child.name === name) : [];
}

/** Follow a `/`-separated chain of first children, e.g. `system-layout/system-distance`. */
export function findPath(node: XmlNode | undefined, path: string): XmlNode | undefined {
  let current = node;
  for (const name of path.split('/')) {
    current = firstChild(current, name);
    if (!current) return undefined;
  }
  return current;
}

/** Return trimmed node text, or `undefined` when empty/missing. */
export function textOf(node: XmlNode | undefined): string | undefined {
  if (!node) return undefined;
  const text = node.text.trim();
  return text.length > 0 ? text : undefined;
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** Parse float values with `undefined` on failure. */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Parse base-10 integer values with `undefined` on failure. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  const parsed = parseOptionalFloat(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

/** MusicXML yes-no values, compared case-insensitively. */
export function isYes(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'yes';
}
