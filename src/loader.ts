import { readFileSync } from 'fs';
import { strFromU8, unzipSync } from 'fflate';
import { FormatError } from './errors';
import { checkWellFormed, parseXml, type XmlNode } from './xml';

/** Entries under this prefix hold container metadata, never the score. */
const METADATA_PREFIX = 'META-INF/';

/**
 * Pick the score payload out of a compressed (.mxl) container: the first
 * entry, in archive order, that ends in `.xml` outside META-INF/.
 * Returns undefined when the data cannot be opened as a container.
 */
export function extractFromContainer(data: Uint8Array): Uint8Array | undefined {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(data);
  } catch {
    return undefined;
  }

  for (const [name, content] of Object.entries(files)) {
    if (!name.startsWith(METADATA_PREFIX) && name.endsWith('.xml')) {
      return content;
    }
  }
  // An opened container without a score entry yields no content.
  return new Uint8Array();
}

/**
 * Decode document bytes. A UTF-16 byte order mark selects that encoding;
 * anything else is read as UTF-8.
 */
export function decodeText(content: Uint8Array): string {
  if (content[0] === 0xff && content[1] === 0xfe) {
    return new TextDecoder('utf-16le').decode(content);
  }
  if (content[0] === 0xfe && content[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(content);
  }
  return strFromU8(content);
}

/**
 * Read a MusicXML document from container or raw bytes.
 * @param data - File contents
 * @param source - Name used in error messages
 */
export function readDocument(data: Uint8Array, source: string): XmlNode {
  const content = extractFromContainer(data) ?? data;
  if (content.length === 0) {
    throw new FormatError(source, 'No MusicXML content found');
  }

  const xmlString = decodeText(content).replace(/^\uFEFF/, '');
  const issue = checkWellFormed(xmlString);
  if (issue) {
    throw new FormatError(
      source,
      `Malformed XML at line ${issue.line}, column ${issue.column}: ${issue.message}`
    );
  }

  const root = parseXml(xmlString);
  if (!root) {
    throw new FormatError(source, 'Document has no root element');
  }
  return root;
}

/**
 * Load a MusicXML document from disk.
 * Handles both compressed .mxl containers and bare .xml/.musicxml files.
 */
export function loadDocument(path: string): XmlNode {
  let data: Uint8Array;
  try {
    data = readFileSync(path);
  } catch (error) {
    throw new FormatError(path, 'Unable to read file', { cause: error });
  }
  return readDocument(data, path);
}
