import { describe, it, expect } from 'vitest';
import { Beam, Measure, Sheet } from '../src/sheet';
import { DEFAULT_LAYOUT } from '../src/config';
import { fraction, ZERO } from '../src/fraction';
import { parseXml, type XmlNode } from '../src/xml';
import type { Note } from '../src/types';

function xml(text: string): XmlNode {
  const root = parseXml(text);
  if (!root) throw new Error('test document has no root');
  return root;
}

function emptySheet(head = ''): Sheet {
  return new Sheet(xml(`<score-partwise>${head}</score-partwise>`), DEFAULT_LAYOUT);
}

function measure(attrs = 'number="1"'): Measure {
  return new Measure(xml(`<measure ${attrs}/>`), DEFAULT_LAYOUT);
}

function quarter(step: 'C' | 'E' | 'G', octave = 4): Note {
  return { kind: 'pitched', duration: fraction(1, 4), dots: 0, pitch: { step, octave } };
}

function rest(duration = fraction(1, 4)): Note {
  return { kind: 'rest', duration, dots: 0 };
}

describe('Sheet', () => {
  it('should read the work title before the movement title', () => {
    const sheet = emptySheet(
      '<work><work-title>Suite</work-title></work><movement-title>Prelude</movement-title>'
    );
    expect(sheet.title).toBe('Suite');
    expect(emptySheet('<movement-title>Prelude</movement-title>').title).toBe('Prelude');
    expect(emptySheet().title).toBeUndefined();
  });

  it('should size pages from the layout options without defaults', () => {
    const page = emptySheet().newPage();
    expect(page.number).toBe(1);
    expect(page.size).toEqual({ width: 1190, height: 1683 });
    expect(page.margins).toEqual({ left: 70, right: 70, top: 88, bottom: 88 });
  });

  it('should choose page margins by page parity', () => {
    const sheet = emptySheet(`
      <defaults>
        <page-layout>
          <page-height>1500</page-height>
          <page-width>1000</page-width>
          <page-margins type="odd">
            <left-margin>50</left-margin><right-margin>30</right-margin>
            <top-margin>100</top-margin><bottom-margin>80</bottom-margin>
          </page-margins>
          <page-margins type="even">
            <left-margin>30</left-margin><right-margin>50</right-margin>
            <top-margin>90</top-margin><bottom-margin>70</bottom-margin>
          </page-margins>
        </page-layout>
      </defaults>`);
    const first = sheet.newPage();
    const second = sheet.newPage();
    const third = sheet.newPage();
    expect(first.size).toEqual({ width: 1000, height: 1500 });
    expect(first.margins).toEqual({ left: 50, right: 30, top: 100, bottom: 80 });
    expect(second.margins).toEqual({ left: 30, right: 50, top: 90, bottom: 70 });
    expect(third.margins).toEqual(first.margins);
    expect(sheet.pages.map((p) => p.number)).toEqual([1, 2, 3]);
  });

  it('should fall back to margins of type both', () => {
    const sheet = emptySheet(`
      <defaults>
        <page-layout>
          <page-margins>
            <left-margin>10</left-margin><right-margin>10</right-margin>
            <top-margin>20</top-margin><bottom-margin>20</bottom-margin>
          </page-margins>
        </page-layout>
      </defaults>`);
    sheet.newPage();
    expect(sheet.newPage().margins).toEqual({ left: 10, right: 10, top: 20, bottom: 20 });
    expect(sheet.pages[0].size).toEqual({ width: 1190, height: 1683 });
  });

  it('should link measures across pages', () => {
    const sheet = emptySheet();
    const first = measure('number="1"');
    const second = measure('number="2"');
    sheet.newPage().addMeasure(first);
    sheet.newPage().addMeasure(second);

    expect(first.next).toBe(second);
    expect(second.prev).toBe(first);
    expect(first.page?.number).toBe(1);
    expect(second.page?.number).toBe(2);
    expect(sheet.measures).toEqual([first, second]);
  });

  it('should refuse changes once finished', () => {
    const sheet = emptySheet();
    sheet.finish();
    expect(sheet.isFinished).toBe(true);
    expect(() => sheet.newPage()).toThrow('Sheet is already finished');
    expect(() => sheet.finish()).toThrow('Sheet is already finished');
  });
});

describe('Measure', () => {
  it('should read number and width', () => {
    const m = measure('number="12" width="310.5"');
    expect(m.number).toBe('12');
    expect(m.width).toBe(310.5);
    expect(m.height).toBe(40);
    expect(m.id).toMatch(/^m[A-Za-z0-9_-]{10}$/);
  });

  it('should fall back to the default width', () => {
    expect(measure().width).toBe(200);
  });

  it('should inherit divisions and clef from earlier measures', () => {
    const sheet = emptySheet();
    const page = sheet.newPage();
    const first = measure('number="1"');
    const second = measure('number="2"');
    page.addMeasure(first);
    first.timeDivisions = 4;
    first.setClef({ sign: 'G', line: 2 });
    page.addMeasure(second);

    expect(second.timeDivisions).toBe(4);
    expect(second.clef).toEqual({ sign: 'G', line: 2 });

    second.timeDivisions = 2;
    second.setClef({ sign: 'F', line: 4 });
    expect(second.timeDivisions).toBe(2);
    expect(first.timeDivisions).toBe(4);
    expect(first.clef).toEqual({ sign: 'G', line: 2 });
  });

  it('should take settings as they stand when linked', () => {
    const page = emptySheet().newPage();
    const first = measure('number="1"');
    const second = measure('number="2"');
    page.addMeasure(first);
    first.timeDivisions = 4;
    page.addMeasure(second);
    first.timeDivisions = 8;

    expect(second.timeDivisions).toBe(4);
    expect(second.staffSpacing).toBeUndefined();
  });

  it('should carry settings to the end of a long chain', () => {
    const page = emptySheet().newPage();
    const measures = Array.from({ length: 2000 }, (_, i) => measure(`number="${i + 1}"`));
    page.addMeasure(measures[0]);
    measures[0].timeDivisions = 480;
    measures[0].staffSpacing = 65;
    measures[0].setClef({ sign: 'F', line: 4 });
    for (const m of measures.slice(1)) page.addMeasure(m);

    const last = measures[measures.length - 1];
    expect(last.prev).toBe(measures[measures.length - 2]);
    expect(last.timeDivisions).toBe(480);
    expect(last.staffSpacing).toBe(65);
    expect(last.clef).toEqual({ sign: 'F', line: 4 });
  });

  it('should advance the cursor by each note', () => {
    const m = measure();
    m.addNote(quarter('C'), false);
    m.addNote(rest(fraction(1, 8)), false);
    expect(m.time).toEqual({ num: 3, den: 8 });
    expect(m.notes.map((n) => n.time)).toEqual([ZERO, { num: 1, den: 4 }]);
  });

  it('should stack chord notes on the previous onset', () => {
    const m = measure();
    m.addNote(quarter('C'), false);
    const e = m.addNote(quarter('E'), true);
    const g = m.addNote(quarter('G'), true);
    expect(e.time).toBe(ZERO);
    expect(g.time).toBe(ZERO);
    expect([e.chord, g.chord]).toEqual([true, true]);
    expect(m.time).toEqual({ num: 1, den: 4 });
  });

  it('should treat a chord note without a predecessor as a plain note', () => {
    const m = measure();
    const placed = m.addNote(quarter('C'), true);
    expect(placed.chord).toBe(false);
    expect(m.time).toEqual({ num: 1, den: 4 });
  });

  it('should keep the furthest time as its duration', () => {
    const m = measure();
    m.changeTime(fraction(3, 4));
    m.changeTime(fraction(-1, 2));
    expect(m.time).toEqual({ num: 1, den: 4 });
    expect(m.duration).toEqual({ num: 3, den: 4 });
  });

  it('should record the clef and staff step of pitched notes', () => {
    const m = measure();
    m.setClef({ sign: 'G', line: 2 });
    const e = m.addNote(quarter('E'), false);
    const r = m.addNote(rest(), false);
    expect(e.clef).toEqual({ sign: 'G', line: 2 });
    expect(e.staffStep).toBe(0);
    expect(r.staffStep).toBeUndefined();
  });

  it('should copy the previous layout when continuing a system', () => {
    const sheet = emptySheet();
    const page = sheet.newPage();
    const first = measure('number="1" width="250"');
    const second = measure('number="2"');
    page.addMeasure(first);
    page.addMeasure(second);
    first.x = 70;
    first.y = 1555;
    first.isNewSystem = true;

    second.followPrevLayout();
    expect([second.x, second.y, second.offset, second.isNewSystem]).toEqual([70, 1555, 250, false]);
  });

  it('should leave the first measure in place when asked to follow', () => {
    const m = measure();
    m.x = 5;
    m.followPrevLayout();
    expect([m.x, m.y, m.offset]).toEqual([5, 0, 0]);
  });

  it('should spread notes over the measure width when finished', () => {
    const m = measure('number="1" width="300"');
    m.x = 70;
    m.y = 1000;
    m.setClef({ sign: 'G', line: 2 });
    m.addNote(quarter('E'), false);
    m.addNote(quarter('G'), false);
    m.addNote(rest(fraction(1, 2)), false);
    m.finish();

    expect(m.duration).toEqual({ num: 1, den: 1 });
    expect(m.notes.map((n) => [n.x, n.y])).toEqual([
      [70, 1000],
      [145, 1010],
      [220, 1020],
    ]);
  });

  it('should place notes from their position hints', () => {
    const m = measure();
    m.x = 100;
    m.y = 500;
    m.offset = 40;
    m.addNote({ ...quarter('C'), position: { x: 12, y: -25 } }, false);
    m.finish();
    expect([m.notes[0].x, m.notes[0].y]).toEqual([152, 515]);
  });

  it('should put notes at the left edge of an empty measure', () => {
    const m = measure();
    m.x = 30;
    m.addNote(rest(ZERO), false);
    m.finish();
    expect(m.duration).toBe(ZERO);
    expect([m.notes[0].x, m.notes[0].y]).toEqual([30, 20]);
  });

  it('should refuse changes once finished', () => {
    const m = measure('number="7"');
    m.finish();
    expect(m.isFinished).toBe(true);
    expect(() => m.addNote(rest(), false)).toThrow('Measure 7 is already finished');
    expect(() => m.changeTime(fraction(1, 4))).toThrow('Measure 7 is already finished');
    expect(() => m.addBeam(new Beam(1))).toThrow('Measure 7 is already finished');
    expect(() => m.finish()).toThrow('Measure 7 is already finished');
  });
});
