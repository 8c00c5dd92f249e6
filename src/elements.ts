import type {
  Accidental,
  Clef,
  ClefSign,
  Margins,
  MarginType,
  NoteType,
  PageLayout,
  PageMargins,
  Pitch,
  Scaling,
  ScoreDefaults,
  Stem,
  StemDirection,
  Step,
  SystemLayout,
} from './types';
import {
  attribute,
  childrenOf,
  firstChild,
  isYes,
  parseOptionalFloat,
  parseOptionalInt,
  textOf,
  type XmlNode,
} from './xml';

const STEPS: readonly Step[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];
const STEM_DIRECTIONS: readonly StemDirection[] = ['up', 'down', 'double', 'none'];
const CLEF_SIGNS: readonly ClefSign[] = ['G', 'F', 'C', 'percussion', 'TAB', 'jianpu', 'none'];
const NOTE_TYPES: readonly NoteType[] = [
  'maximum', 'long', 'breve', 'whole', 'half', 'quarter', 'eighth',
  '16th', '32nd', '64th', '128th', '256th', '512th', '1024th',
];
const MARGIN_TYPES: readonly MarginType[] = ['odd', 'even', 'both'];

function oneOf<T extends string>(values: readonly T[], value: string | undefined): T | undefined {
  return values.find((v) => v === value);
}

export const ZERO_MARGINS: Margins = { left: 0, right: 0, top: 0, bottom: 0 };

function floatOf(node: XmlNode | undefined, name: string): number | undefined {
  return parseOptionalFloat(textOf(firstChild(node, name)));
}

/**
 * Read `left-margin`, `right-margin`, `top-margin` and `bottom-margin`
 * children. Missing sides are 0; a missing node gives zero margins.
 */
export function parseMargins(node: XmlNode | undefined): Margins {
  if (!node) return { ...ZERO_MARGINS };
  return {
    left: floatOf(node, 'left-margin') ?? 0,
    right: floatOf(node, 'right-margin') ?? 0,
    top: floatOf(node, 'top-margin') ?? 0,
    bottom: floatOf(node, 'bottom-margin') ?? 0,
  };
}

export function parsePageMargins(node: XmlNode): PageMargins {
  return {
    ...parseMargins(node),
    type: oneOf(MARGIN_TYPES, attribute(node, 'type')) ?? 'both',
  };
}

export function parsePageLayout(node: XmlNode): PageLayout {
  return {
    height: floatOf(node, 'page-height'),
    width: floatOf(node, 'page-width'),
    margins: childrenOf(node, 'page-margins').map(parsePageMargins),
  };
}

export function parseSystemLayout(node: XmlNode | undefined): SystemLayout {
  const margins = firstChild(node, 'system-margins');
  return {
    margins: margins ? parseMargins(margins) : undefined,
    systemDistance: floatOf(node, 'system-distance'),
    topSystemDistance: floatOf(node, 'top-system-distance'),
  };
}

function parseScaling(node: XmlNode | undefined): Scaling | undefined {
  const millimeters = floatOf(node, 'millimeters');
  const tenths = floatOf(node, 'tenths');
  if (millimeters === undefined || tenths === undefined) return undefined;
  return { millimeters, tenths };
}

/** Read `<defaults>` of a score root. */
export function parseDefaults(root: XmlNode): ScoreDefaults {
  const defaults = firstChild(root, 'defaults');
  const pageLayout = firstChild(defaults, 'page-layout');
  return {
    scaling: parseScaling(firstChild(defaults, 'scaling')),
    pageLayout: pageLayout ? parsePageLayout(pageLayout) : undefined,
    systemLayout: parseSystemLayout(firstChild(defaults, 'system-layout')),
  };
}

export function parsePitch(node: XmlNode): Pitch {
  const step = oneOf(STEPS, textOf(firstChild(node, 'step'))) ?? 'C';
  const pitch: Pitch = {
    step,
    octave: parseOptionalInt(textOf(firstChild(node, 'octave'))) ?? 4,
  };
  const alter = floatOf(node, 'alter');
  if (alter !== undefined) pitch.alter = alter;
  return pitch;
}

export function parseStem(node: XmlNode): Stem {
  const stem: Stem = {
    direction: oneOf(STEM_DIRECTIONS, textOf(node)) ?? 'none',
  };
  const y = parseOptionalFloat(attribute(node, 'default-y'));
  if (y !== undefined) stem.y = y;
  return stem;
}

export function parseAccidental(node: XmlNode): Accidental {
  const accidental: Accidental = { value: textOf(node) ?? 'natural' };
  if (isYes(attribute(node, 'cautionary'))) accidental.cautionary = true;
  if (isYes(attribute(node, 'editorial'))) accidental.editorial = true;
  if (isYes(attribute(node, 'parentheses'))) accidental.parentheses = true;
  return accidental;
}

export function parseClef(node: XmlNode): Clef {
  const clef: Clef = {
    sign: oneOf(CLEF_SIGNS, textOf(firstChild(node, 'sign'))) ?? 'G',
  };
  const line = parseOptionalInt(textOf(firstChild(node, 'line')));
  if (line !== undefined) clef.line = line;
  const octaveChange = parseOptionalInt(textOf(firstChild(node, 'clef-octave-change')));
  if (octaveChange !== undefined) clef.octaveChange = octaveChange;
  const staff = parseOptionalInt(attribute(node, 'number'));
  if (staff !== undefined) clef.staff = staff;
  return clef;
}

export function parseNoteType(node: XmlNode | undefined): NoteType | undefined {
  return oneOf(NOTE_TYPES, textOf(node));
}

// Reference pitch and its default line for each pitched clef sign.
const CLEF_ANCHORS: Partial<Record<ClefSign, { step: Step; octave: number; line: number }>> = {
  G: { step: 'G', octave: 4, line: 2 },
  F: { step: 'F', octave: 3, line: 4 },
  C: { step: 'C', octave: 4, line: 3 },
};

/**
 * Diatonic steps from the bottom staff line to the pitch under the clef:
 * 0 is the bottom line, 1 the first space, 8 the top line.
 */
export function staffStep(pitch: Pitch, clef: Clef): number | undefined {
  const anchor = CLEF_ANCHORS[clef.sign];
  if (!anchor) return undefined;
  const line = clef.line ?? anchor.line;
  const diatonic = (p: { step: Step; octave: number }): number => p.octave * 7 + STEPS.indexOf(p.step);
  const reference = diatonic(anchor) + (clef.octaveChange ?? 0) * 7;
  return diatonic(pitch) - reference + (line - 1) * 2;
}
