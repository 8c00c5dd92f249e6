import type { LayoutOptions } from '../config';
import { parseDefaults, staffStep } from '../elements';
import {
  addFractions,
  fractionToNumber,
  maxFraction,
  ZERO,
  type Fraction,
} from '../fraction';
import { generateId } from '../id';
import type {
  Clef,
  Margins,
  Note,
  PageMargins,
  PlacedNote,
  ScoreDefaults,
  Size,
  Stem,
} from '../types';
import { attribute, firstChild, parseOptionalFloat, textOf, type XmlNode } from '../xml';
import type { SchemaDiagnostic } from '../validator';

// ============================================================
// Beam
// ============================================================

/** Stems joined by one beam line, in document order. */
export class Beam {
  readonly stems: Stem[] = [];

  constructor(public readonly number: number) {}
}

// ============================================================
// Measure
// ============================================================

/**
 * One bar of the first part. Measures form a single prev/next chain across
 * the whole sheet. Divisions and clef carry over from the predecessor, as
 * they stood when the measure was linked, until the measure sets its own.
 */
export class Measure {
  readonly id = generateId();
  readonly number: string;
  readonly width: number;
  readonly height: number;

  x = 0;
  y = 0;
  /** Horizontal distance from the start of the system to this measure. */
  offset = 0;
  isNewSystem = false;

  prev?: Measure;
  next?: Measure;
  page?: Page;

  readonly notes: PlacedNote[] = [];
  readonly beams: Beam[] = [];

  private ownTimeDivisions?: number;
  private ownStaffSpacing?: number;
  private ownClef?: Clef;
  // Values in effect at the end of the predecessor when this measure was linked
  private inherited: { timeDivisions?: number; staffSpacing?: number; clef?: Clef } = {};

  private cursor: Fraction = ZERO;
  private extent: Fraction = ZERO;
  private lastOnset?: Fraction;
  private finished = false;
  private finalDuration?: Fraction;

  constructor(node: XmlNode, layout: LayoutOptions) {
    this.number = attribute(node, 'number') ?? '';
    this.width = parseOptionalFloat(attribute(node, 'width')) ?? layout.measureWidth;
    this.height = layout.staffHeight;
  }

  /** Divisions per quarter note in effect, if any measure so far set them. */
  get timeDivisions(): number | undefined {
    return this.ownTimeDivisions ?? this.inherited.timeDivisions;
  }

  set timeDivisions(value: number | undefined) {
    this.ownTimeDivisions = value;
  }

  get staffSpacing(): number | undefined {
    return this.ownStaffSpacing ?? this.inherited.staffSpacing;
  }

  set staffSpacing(value: number | undefined) {
    this.ownStaffSpacing = value;
  }

  get clef(): Clef | undefined {
    return this.ownClef ?? this.inherited.clef;
  }

  setClef(clef: Clef): void {
    this.ownClef = clef;
  }

  /** Current position of the time cursor. */
  get time(): Fraction {
    return this.cursor;
  }

  /** Furthest time reached; fixed once the measure is finished. */
  get duration(): Fraction {
    return this.finalDuration ?? this.extent;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Attach after `prev` and take over the divisions, staff spacing and clef in
   * effect there. Later changes to `prev` do not reach this measure.
   */
  linkAfter(prev: Measure): void {
    this.prev = prev;
    prev.next = this;
    this.inherited = {
      timeDivisions: prev.timeDivisions,
      staffSpacing: prev.staffSpacing,
      clef: prev.clef,
    };
  }

  /** Copy the predecessor's position; the first measure keeps its own. */
  followPrevLayout(): void {
    const prev = this.prev;
    if (!prev) return;
    this.x = prev.x;
    this.y = prev.y;
    this.isNewSystem = false;
    this.offset = prev.offset + prev.width;
  }

  /** Move the time cursor by a signed amount. */
  changeTime(delta: Fraction): void {
    this.assertOpen();
    this.cursor = addFractions(this.cursor, delta);
    this.extent = maxFraction(this.extent, this.cursor);
  }

  /**
   * Place a note at the cursor and advance it by the note's duration.
   * Chord members share the onset of the preceding note and leave the cursor.
   */
  addNote(note: Note, isChord: boolean): PlacedNote {
    this.assertOpen();
    const onset = isChord ? this.lastOnset : undefined;
    const chord = onset !== undefined;
    const time = onset ?? this.cursor;
    const clef = this.clef;

    const placed: PlacedNote = {
      note,
      time,
      chord,
      clef,
      staffStep: note.kind === 'pitched' && clef ? staffStep(note.pitch, clef) : undefined,
      x: 0,
      y: 0,
    };
    this.notes.push(placed);

    if (!chord) {
      this.lastOnset = this.cursor;
      this.changeTime(note.duration);
    }
    return placed;
  }

  addBeam(beam: Beam): void {
    this.assertOpen();
    this.beams.push(beam);
  }

  /** Fix the duration and compute note coordinates. */
  finish(): void {
    this.assertOpen();
    this.finished = true;
    this.finalDuration = this.extent;

    const left = this.x + this.offset;
    const total = fractionToNumber(this.extent);
    for (const placed of this.notes) {
      const hint = placed.note.position;
      if (hint) {
        placed.x = left + hint.x;
        placed.y = this.y + this.height + hint.y;
        continue;
      }
      placed.x = total > 0 ? left + (this.width * fractionToNumber(placed.time)) / total : left;
      placed.y =
        placed.staffStep !== undefined
          ? this.y + (placed.staffStep * this.height) / 8
          : this.y + this.height / 2;
    }
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error(`Measure ${this.number} is already finished`);
    }
  }
}

// ============================================================
// Page
// ============================================================

export class Page {
  readonly measures: Measure[] = [];

  constructor(
    public readonly sheet: Sheet,
    public readonly number: number,
    public readonly size: Size,
    public readonly margins: Margins
  ) {}

  /** Append a measure and link it after the sheet's last measure. */
  addMeasure(measure: Measure): void {
    this.sheet.link(measure);
    measure.page = this;
    this.measures.push(measure);
  }
}

// ============================================================
// Sheet
// ============================================================

export class Sheet {
  readonly pages: Page[] = [];
  readonly title?: string;
  readonly defaults: ScoreDefaults;
  readonly warnings: SchemaDiagnostic[];

  private last?: Measure;
  private finished = false;

  constructor(
    root: XmlNode,
    private readonly layout: LayoutOptions,
    warnings: SchemaDiagnostic[] = []
  ) {
    this.title =
      textOf(firstChild(firstChild(root, 'work'), 'work-title')) ?? textOf(firstChild(root, 'movement-title'));
    this.defaults = parseDefaults(root);
    this.warnings = warnings;
  }

  /** All measures in document order. */
  get measures(): Measure[] {
    return this.pages.flatMap((page) => page.measures);
  }

  get isFinished(): boolean {
    return this.finished;
  }

  newPage(): Page {
    this.assertOpen();
    const number = this.pages.length + 1;
    const pageLayout = this.defaults.pageLayout;
    const size: Size = {
      width: pageLayout?.width ?? this.layout.pageWidth,
      height: pageLayout?.height ?? this.layout.pageHeight,
    };
    const page = new Page(this, number, size, this.marginsForPage(number));
    this.pages.push(page);
    return page;
  }

  /** @internal Append to the measure chain; called by {@link Page.addMeasure}. */
  link(measure: Measure): void {
    this.assertOpen();
    if (this.last) {
      measure.linkAfter(this.last);
    }
    this.last = measure;
  }

  finish(): void {
    this.assertOpen();
    this.finished = true;
  }

  private marginsForPage(number: number): Margins {
    const candidates: PageMargins[] = this.defaults.pageLayout?.margins ?? [];
    const parity = number % 2 === 1 ? 'odd' : 'even';
    const chosen =
      candidates.find((m) => m.type === parity) ?? candidates.find((m) => m.type === 'both') ?? candidates[0];
    if (!chosen) return { ...this.layout.pageMargins };
    return { left: chosen.left, right: chosen.right, top: chosen.top, bottom: chosen.bottom };
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Sheet is already finished');
    }
  }
}
