import { resolveBeams } from './beams';
import { malformed, type MeasureContext } from './context';
import { parseAccidental, parseNoteType, parsePitch, parseStem } from './elements';
import {
  addFractions,
  divideFractions,
  fraction,
  isNegative,
  negateFraction,
  parseFraction,
  type Fraction,
} from './fraction';
import type { Note, Point } from './types';
import { attribute, childrenOf, firstChild, parseOptionalFloat, textOf, type XmlNode } from './xml';

const CURSOR_OVERFLOW = 'Time cursor cannot be held as an exact fraction';

/** Run time arithmetic for `node`; values beyond exact fraction range are malformed input. */
function exactly<T>(context: MeasureContext, node: XmlNode | undefined, message: string, step: () => T): T {
  try {
    return step();
  } catch (error) {
    if (error instanceof RangeError) {
      throw malformed(context, message, node);
    }
    throw error;
  }
}

/**
 * Duration of `<duration>` as a fraction of a whole note:
 * duration ÷ divisions ÷ 4.
 */
export function readDuration(context: MeasureContext, node: XmlNode): Fraction {
  const divisions = context.measure.timeDivisions;
  if (divisions === undefined) {
    throw malformed(context, 'Duration appears before <divisions> is set', node);
  }
  const durationNode = firstChild(node, 'duration');
  const text = textOf(durationNode);
  if (text === undefined) {
    throw malformed(context, `<${node.name}> has no <duration>`, node);
  }
  const tooPrecise = `'${text}' cannot be held as an exact duration`;
  const value = exactly(context, durationNode, tooPrecise, () => parseFraction(text));
  if (value === undefined) {
    throw malformed(context, `'${text}' is not a duration`, durationNode);
  }
  return exactly(context, durationNode, tooPrecise, () => divideFractions(value, fraction(divisions * 4)));
}

/** Screen hint from default-x/default-y; both must parse. */
export function readPosition(node: XmlNode): Point | undefined {
  const x = parseOptionalFloat(attribute(node, 'default-x'));
  const y = parseOptionalFloat(attribute(node, 'default-y'));
  if (x === undefined || y === undefined) return undefined;
  return { x, y };
}

/** Number of augmentation dots drawn after the notehead. */
export function readDots(node: XmlNode): number {
  return childrenOf(node, 'dot').length;
}

/**
 * Handle `<note>`: build a pitched note or rest, resolve its beams and add it
 * to the measure. Grace and cue notes are skipped.
 */
export function handleNote(context: MeasureContext, node: XmlNode): void {
  if (firstChild(node, 'grace') || firstChild(node, 'cue')) {
    return;
  }

  const { measure } = context;
  const isChord = firstChild(node, 'chord') !== undefined;
  const pitchNode = firstChild(node, 'pitch');
  const restNode = firstChild(node, 'rest');

  if (!pitchNode && !restNode) {
    // Unpitched notes are not drawn but still take up time.
    if (firstChild(node, 'unpitched') && !isChord) {
      const duration = readDuration(context, node);
      exactly(context, node, CURSOR_OVERFLOW, () => measure.changeTime(duration));
    }
    return;
  }

  const base = {
    position: readPosition(node),
    duration: readDuration(context, node),
    dots: readDots(node),
    type: parseNoteType(firstChild(node, 'type')),
  };

  let note: Note;
  if (pitchNode) {
    const stemNode = isChord ? undefined : firstChild(node, 'stem');
    const stem = stemNode ? parseStem(stemNode) : undefined;
    const accidentalNode = firstChild(node, 'accidental');
    note = {
      kind: 'pitched',
      ...base,
      pitch: parsePitch(pitchNode),
      stem,
      accidental: accidentalNode ? parseAccidental(accidentalNode) : undefined,
    };
    if (stem) {
      resolveBeams(context, node, stem);
    }
  } else {
    note = { kind: 'rest', ...base };
  }

  exactly(context, node, CURSOR_OVERFLOW, () => measure.addNote(note, isChord));
}

/** `<forward>` moves the time cursor ahead without adding a note. */
export function handleForward(context: MeasureContext, node: XmlNode): void {
  const duration = readDuration(context, node);
  exactly(context, node, CURSOR_OVERFLOW, () => context.measure.changeTime(duration));
}

/**
 * `<backup>` moves the time cursor back, usually to lay down another voice.
 * Backing up past the start of the measure is rejected.
 */
export function handleBackup(context: MeasureContext, node: XmlNode): void {
  const delta = negateFraction(readDuration(context, node));
  const target = exactly(context, node, CURSOR_OVERFLOW, () => addFractions(context.measure.time, delta));
  if (isNegative(target)) {
    throw malformed(context, '<backup> moves before the start of the measure', node);
  }
  context.measure.changeTime(delta);
}
