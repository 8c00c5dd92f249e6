import { MalformedInputError } from './errors';
import type { Beam, Measure, Page, Sheet } from './sheet';
import type { XmlNode } from './xml';

/** Mutable state of one `parse` call. Never shared between calls. */
export interface ParseContext {
  source: string;
  sheet: Sheet;
  page: Page;
  /** Measure being handled, once the walk has reached one */
  measure?: Measure;
  /** Beams opened but not yet ended, by beam number. */
  beams: Map<number, Beam>;
}

/** Context while the children of one measure are handled. */
export interface MeasureContext extends ParseContext {
  measure: Measure;
}

/** Create a parser context for one parse invocation. */
export function createParseContext(source: string, sheet: Sheet): ParseContext {
  return {
    source,
    sheet,
    page: sheet.newPage(),
    beams: new Map<number, Beam>(),
  };
}

/** Build the error for a construct the parser cannot interpret. */
export function malformed(context: ParseContext, message: string, node?: XmlNode): MalformedInputError {
  return new MalformedInputError(message, {
    source: context.source,
    measure: context.measure?.number,
    xmlPath: node?.path,
  });
}
