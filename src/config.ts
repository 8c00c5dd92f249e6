import type { Margins } from './types';

/**
 * Page geometry used when the document's `<defaults>` leave a value out.
 * All values are in tenths of a staff space.
 */
export interface LayoutOptions {
  pageWidth: number;
  pageHeight: number;
  pageMargins: Margins;
  /** Height of one five-line staff */
  staffHeight: number;
  /** Width of a measure without a `width` attribute */
  measureWidth: number;
}

export interface ParserOptions {
  /** Validate against the bundled schema before walking (default: true) */
  validate?: boolean;
  /** Schema resource to compile instead of the bundled one */
  schemaPath?: string;
  /** Fallback page geometry */
  layout?: Partial<LayoutOptions>;
}

export const DEFAULT_LAYOUT: LayoutOptions = {
  pageWidth: 1190,
  pageHeight: 1683,
  pageMargins: { left: 70, right: 70, top: 88, bottom: 88 },
  staffHeight: 40,
  measureWidth: 200,
};

export interface ResolvedParserOptions {
  validate: boolean;
  schemaPath?: string;
  layout: LayoutOptions;
}

export function resolveOptions(options: ParserOptions = {}): ResolvedParserOptions {
  return {
    validate: options.validate ?? true,
    schemaPath: options.schemaPath,
    layout: { ...DEFAULT_LAYOUT, ...options.layout },
  };
}
