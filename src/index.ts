// Core types
export type {
  Point,
  Size,
  Margins,
  MarginType,
  PageMargins,
  PageLayout,
  SystemLayout,
  Scaling,
  ScoreDefaults,
  Step,
  Pitch,
  StemDirection,
  Stem,
  Accidental,
  ClefSign,
  Clef,
  NoteType,
  PitchedNote,
  Rest,
  Note,
  PlacedNote,
} from './types';

// Parser
export { SheetParser, parseSheet } from './parser';
export type { HandledTag } from './parser';
export { DEFAULT_LAYOUT, resolveOptions } from './config';
export type { ParserOptions, LayoutOptions } from './config';
export { DEFAULT_SCHEMA_PATH } from './resources';

// Sheet model
export { Sheet, Page, Measure, Beam } from './sheet';

// Layout
export { classifyPlacement } from './layout';
export type { Placement } from './layout';

// Loading
export { loadDocument, readDocument, extractFromContainer, decodeText } from './loader';
export { parseXml, checkWellFormed } from './xml';
export type { XmlNode, XmlSyntaxIssue } from './xml';

// Schema validation
export { compileSchema, compileDefinition, errorsOf } from './validator';
export type {
  CompiledSchema,
  ValidationReport,
  SchemaDiagnostic,
  SchemaDiagnosticCode,
  SchemaDiagnosticSeverity,
} from './validator';

// Errors
export { FormatError, ValidateError, MalformedInputError, formatLocation } from './errors';
export type { ParseLocation } from './errors';

// Rational arithmetic
export {
  ZERO,
  fraction,
  addFractions,
  subtractFractions,
  multiplyFractions,
  divideFractions,
  negateFraction,
  compareFractions,
  maxFraction,
  isNegative,
  fractionToNumber,
  fractionToString,
  parseFraction,
} from './fraction';
export type { Fraction } from './fraction';

// Value objects
export { staffStep } from './elements';
