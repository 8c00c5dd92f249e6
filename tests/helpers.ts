import { join } from 'path';
import { fileURLToPath } from 'url';
import { SheetParser } from '../src/parser';
import type { ParserOptions } from '../src/config';
import type { Sheet } from '../src/sheet';

export const fixturesPath = fileURLToPath(new URL('./fixtures/', import.meta.url));

export function fixture(name: string): string {
  return join(fixturesPath, name);
}

export function encode(xml: string): Uint8Array {
  return new TextEncoder().encode(xml);
}

// Wrap measures of a single part in a minimal score-partwise document
export function scoreXml(measures: string, head = ''): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<score-partwise version="4.0">
  ${head}
  <part-list>
    <score-part id="P1"><part-name>Music</part-name></score-part>
  </part-list>
  <part id="P1">
    ${measures}
  </part>
</score-partwise>`;
}

export function parseInline(xml: string, options?: ParserOptions): Sheet {
  return new SheetParser(options).parseData(encode(xml), 'inline.xml');
}

// Capture a thrown error so its fields can be asserted
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}
