import type { SchemaDiagnostic } from './validator';

/**
 * Where a malformed construct was found: the input source, the measure
 * number it belongs to and the element path inside the document.
 */
export interface ParseLocation {
  source: string;
  measure?: string;
  xmlPath?: string;
}

/**
 * Format a parse location for display
 */
export function formatLocation(location: ParseLocation): string {
  const parts: string[] = [location.source];

  if (location.measure !== undefined) {
    parts.push(`measure=${location.measure}`);
  }

  if (location.xmlPath !== undefined) {
    parts.push(location.xmlPath);
  }

  return parts.join(' ');
}

/**
 * The input is not a readable container or not well-formed XML.
 */
export class FormatError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message} (${path})`, options);
    this.name = 'FormatError';
  }
}

/**
 * The document is well-formed but violates the bundled schema.
 * `errors` holds the error-severity log entries only.
 */
export class ValidateError extends Error {
  constructor(
    public readonly path: string,
    public readonly errors: SchemaDiagnostic[]
  ) {
    const lines = errors.map((e) => `[${e.code}] ${e.message} at ${e.path}`);
    super(`${path} does not conform to the MusicXML schema:\n${lines.join('\n')}`);
    this.name = 'ValidateError';
  }
}

/**
 * A schema-valid document that the parser still cannot interpret, such as a
 * beam continued before it began or a duration read before divisions are known.
 */
export class MalformedInputError extends Error {
  constructor(
    message: string,
    public readonly location: ParseLocation
  ) {
    super(`${message} at ${formatLocation(location)}`);
    this.name = 'MalformedInputError';
  }
}
