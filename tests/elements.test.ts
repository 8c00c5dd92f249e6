import { describe, it, expect } from 'vitest';
import {
  parseAccidental,
  parseClef,
  parseDefaults,
  parseMargins,
  parseNoteType,
  parsePitch,
  parseStem,
  staffStep,
} from '../src/elements';
import { parseXml, type XmlNode } from '../src/xml';

function xml(text: string): XmlNode {
  const root = parseXml(text);
  if (!root) throw new Error('test document has no root');
  return root;
}

describe('staffStep', () => {
  it('should count from the bottom line of a treble staff', () => {
    const clef = { sign: 'G' as const, line: 2 };
    expect(staffStep({ step: 'E', octave: 4 }, clef)).toBe(0);
    expect(staffStep({ step: 'G', octave: 4 }, clef)).toBe(2);
    expect(staffStep({ step: 'F', octave: 5 }, clef)).toBe(8);
    expect(staffStep({ step: 'C', octave: 4 }, clef)).toBe(-2);
  });

  it('should use the default line of the clef sign', () => {
    expect(staffStep({ step: 'A', octave: 3 }, { sign: 'F' })).toBe(8);
    expect(staffStep({ step: 'G', octave: 2 }, { sign: 'F' })).toBe(0);
    expect(staffStep({ step: 'F', octave: 3 }, { sign: 'C' })).toBe(0);
  });

  it('should follow a moved clef line', () => {
    // Tenor clef: C4 on the fourth line
    expect(staffStep({ step: 'C', octave: 4 }, { sign: 'C', line: 4 })).toBe(6);
  });

  it('should apply the octave change', () => {
    expect(staffStep({ step: 'E', octave: 3 }, { sign: 'G', line: 2, octaveChange: -1 })).toBe(0);
  });

  it('should have no staff step for unpitched clefs', () => {
    expect(staffStep({ step: 'C', octave: 4 }, { sign: 'percussion' })).toBeUndefined();
  });
});

describe('note value objects', () => {
  it('should parse a pitch', () => {
    expect(parsePitch(xml('<pitch><step>D</step><alter>-1</alter><octave>5</octave></pitch>'))).toEqual({
      step: 'D',
      alter: -1,
      octave: 5,
    });
    expect(parsePitch(xml('<pitch><step>B</step><octave>3</octave></pitch>'))).toEqual({ step: 'B', octave: 3 });
  });

  it('should parse a stem', () => {
    expect(parseStem(xml('<stem default-y="-55.5">down</stem>'))).toEqual({ direction: 'down', y: -55.5 });
    expect(parseStem(xml('<stem>up</stem>'))).toEqual({ direction: 'up' });
  });

  it('should parse an accidental with its flags', () => {
    expect(parseAccidental(xml('<accidental cautionary="yes">flat</accidental>'))).toEqual({
      value: 'flat',
      cautionary: true,
    });
  });

  it('should parse a clef', () => {
    expect(
      parseClef(xml('<clef number="2"><sign>F</sign><line>4</line><clef-octave-change>-1</clef-octave-change></clef>'))
    ).toEqual({ sign: 'F', line: 4, octaveChange: -1, staff: 2 });
  });

  it('should only accept known note types', () => {
    expect(parseNoteType(xml('<type>16th</type>'))).toBe('16th');
    expect(parseNoteType(xml('<type>tiny</type>'))).toBeUndefined();
    expect(parseNoteType(undefined)).toBeUndefined();
  });
});

describe('layout value objects', () => {
  it('should default missing margin sides to zero', () => {
    expect(parseMargins(xml('<system-margins><left-margin>15</left-margin></system-margins>'))).toEqual({
      left: 15,
      right: 0,
      top: 0,
      bottom: 0,
    });
    expect(parseMargins(undefined)).toEqual({ left: 0, right: 0, top: 0, bottom: 0 });
  });

  it('should read score defaults', () => {
    const root = xml(`<score-partwise>
      <defaults>
        <scaling><millimeters>7.2</millimeters><tenths>40</tenths></scaling>
        <system-layout>
          <system-distance>121</system-distance>
          <top-system-distance>70</top-system-distance>
        </system-layout>
      </defaults>
    </score-partwise>`);
    expect(parseDefaults(root)).toEqual({
      scaling: { millimeters: 7.2, tenths: 40 },
      pageLayout: undefined,
      systemLayout: { margins: undefined, systemDistance: 121, topSystemDistance: 70 },
    });
  });

  it('should read empty defaults when the score has none', () => {
    expect(parseDefaults(xml('<score-partwise/>'))).toEqual({
      scaling: undefined,
      pageLayout: undefined,
      systemLayout: { margins: undefined, systemDistance: undefined, topSystemDistance: undefined },
    });
  });
});
