import { malformed, type MeasureContext, type ParseContext } from './context';
import { Beam } from './sheet';
import type { Stem } from './types';
import { attribute, childrenOf, parseOptionalInt, textOf, type XmlNode } from './xml';

/**
 * Apply every `<beam>` of a stemmed note. Each beam number follows
 * begin → continue* → end; hooks do not join stems and are skipped.
 */
export function resolveBeams(context: MeasureContext, note: XmlNode, stem: Stem): void {
  for (const beamNode of childrenOf(note, 'beam')) {
    const number = parseOptionalInt(attribute(beamNode, 'number')) ?? 1;
    const value = textOf(beamNode);

    switch (value) {
      case 'begin': {
        if (context.beams.has(number)) {
          throw malformed(context, `Beam ${number} begins while it is still open`, beamNode);
        }
        const beam = new Beam(number);
        beam.stems.push(stem);
        context.beams.set(number, beam);
        break;
      }
      case 'continue': {
        const beam = context.beams.get(number);
        if (!beam) {
          throw malformed(context, `Beam ${number} continues without a begin`, beamNode);
        }
        beam.stems.push(stem);
        break;
      }
      case 'end': {
        const beam = context.beams.get(number);
        if (!beam) {
          throw malformed(context, `Beam ${number} ends without a begin`, beamNode);
        }
        beam.stems.push(stem);
        context.measure.addBeam(beam);
        context.beams.delete(number);
        break;
      }
      default:
        // forward hook, backward hook
        break;
    }
  }
}

/** Fail when any beam is still open after the last measure. */
export function assertBeamsClosed(context: ParseContext): void {
  const open = [...context.beams.keys()];
  if (open.length > 0) {
    throw malformed(context, `Beam ${open.join(', ')} never ends`);
  }
}
