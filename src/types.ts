import type { Fraction } from './fraction';

// ============================================================
// Geometry
// ============================================================
export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Margins {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export type MarginType = 'odd' | 'even' | 'both';

export interface PageMargins extends Margins {
  type: MarginType;
}

/** `<page-layout>` from the document defaults. */
export interface PageLayout {
  height?: number;
  width?: number;
  margins: PageMargins[];
}

/** `<system-layout>` values; any part may be absent. */
export interface SystemLayout {
  margins?: Margins;
  systemDistance?: number;
  topSystemDistance?: number;
}

export interface Scaling {
  millimeters: number;
  tenths: number;
}

/** Layout values from `<defaults>`, in tenths. */
export interface ScoreDefaults {
  scaling?: Scaling;
  pageLayout?: PageLayout;
  systemLayout: SystemLayout;
}

// ============================================================
// Value objects
// ============================================================
export type Step = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

export interface Pitch {
  step: Step;
  alter?: number;
  octave: number;
}

export type StemDirection = 'up' | 'down' | 'double' | 'none';

export interface Stem {
  direction: StemDirection;
  /** Stem end relative to the top staff line, when given. */
  y?: number;
}

export interface Accidental {
  value: string;
  cautionary?: boolean;
  editorial?: boolean;
  parentheses?: boolean;
}

export type ClefSign = 'G' | 'F' | 'C' | 'percussion' | 'TAB' | 'jianpu' | 'none';

export interface Clef {
  sign: ClefSign;
  line?: number;
  octaveChange?: number;
  staff?: number;
}

export type NoteType =
  | 'maximum'
  | 'long'
  | 'breve'
  | 'whole'
  | 'half'
  | 'quarter'
  | 'eighth'
  | '16th'
  | '32nd'
  | '64th'
  | '128th'
  | '256th'
  | '512th'
  | '1024th';

// ============================================================
// Notes
// ============================================================
interface NoteBase {
  /** Screen hint from default-x/default-y, in tenths. */
  position?: Point;
  /** Fraction of a whole note. */
  duration: Fraction;
  /** Number of augmentation dots drawn. */
  dots: number;
  type?: NoteType;
}

export interface PitchedNote extends NoteBase {
  kind: 'pitched';
  pitch: Pitch;
  stem?: Stem;
  accidental?: Accidental;
}

export interface Rest extends NoteBase {
  kind: 'rest';
}

export type Note = PitchedNote | Rest;

/** A note as placed in its measure. */
export interface PlacedNote {
  readonly note: Note;
  /** Onset within the measure, as a fraction of a whole note. */
  readonly time: Fraction;
  readonly chord: boolean;
  readonly clef?: Clef;
  /** Diatonic steps above the bottom staff line, when pitch and clef allow. */
  readonly staffStep?: number;
  x: number;
  y: number;
}
