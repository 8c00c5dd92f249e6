import { malformed, type MeasureContext } from './context';
import { parseMargins } from './elements';
import type { Margins } from './types';
import { attribute, findPath, isYes, parseOptionalFloat, textOf, type XmlNode } from './xml';

/** Where a measure goes relative to its predecessor. Evaluated once per measure. */
export type Placement = 'NEW_PAGE' | 'NEW_SYSTEM' | 'CONTINUE';

/**
 * The first measure of the document always opens a page, whatever the
 * print element asks for.
 */
export function classifyPlacement(isFirst: boolean, print: XmlNode | undefined): Placement {
  if (isFirst || isYes(attribute(print, 'new-page'))) return 'NEW_PAGE';
  if (isYes(attribute(print, 'new-system'))) return 'NEW_SYSTEM';
  return 'CONTINUE';
}

function tenthsAt(node: XmlNode | undefined, path: string): number | undefined {
  return parseOptionalFloat(textOf(findPath(node, path)));
}

/** print, then document defaults, then zero margins */
function systemMargins(context: MeasureContext, print: XmlNode | undefined): Margins {
  const node = findPath(print, 'system-layout/system-margins');
  if (node) return parseMargins(node);
  return context.sheet.defaults.systemLayout.margins ?? parseMargins(undefined);
}

/**
 * Distances a placement class cannot do without. The print element wins over
 * the document defaults; with neither, the input is malformed.
 */
function requiredDistance(
  context: MeasureContext,
  print: XmlNode | undefined,
  name: 'top-system-distance' | 'system-distance'
): number {
  const fromPrint = tenthsAt(print, `system-layout/${name}`);
  if (fromPrint !== undefined) return fromPrint;

  const systemLayout = context.sheet.defaults.systemLayout;
  const fromDefaults = name === 'top-system-distance' ? systemLayout.topSystemDistance : systemLayout.systemDistance;
  if (fromDefaults !== undefined) return fromDefaults;

  throw malformed(context, `<print> needs system-layout/${name} to place the measure`, print);
}

/**
 * Position the current measure from its print element. Without a print element
 * this only runs for the first measure, which is placed from the page margins.
 */
export function handlePrint(context: MeasureContext, print: XmlNode | undefined): void {
  const { measure, page } = context;

  const staffSpacing = parseOptionalFloat(attribute(print, 'staff-spacing'));
  if (staffSpacing !== undefined) {
    measure.staffSpacing = staffSpacing;
  }

  const placement = classifyPlacement(measure.prev === undefined, print);
  const margins = systemMargins(context, print);

  switch (placement) {
    case 'NEW_PAGE': {
      measure.isNewSystem = true;
      measure.offset = 0;
      // A <page-layout> inside <print> is not applied; pages keep the document geometry.
      const topSystemDistance = print
        ? requiredDistance(context, print, 'top-system-distance')
        : context.sheet.defaults.systemLayout.topSystemDistance ?? 0;
      measure.y = page.size.height - page.margins.top - topSystemDistance - measure.height;
      measure.x = margins.left + page.margins.left;
      break;
    }
    case 'NEW_SYSTEM': {
      const prev = measure.prev;
      if (!prev) {
        throw malformed(context, 'A new system needs a preceding measure', print);
      }
      measure.isNewSystem = true;
      measure.offset = 0;
      const systemDistance = requiredDistance(context, print, 'system-distance');
      measure.y = prev.y - systemDistance - measure.height;
      measure.x = margins.left + page.margins.left;
      break;
    }
    case 'CONTINUE': {
      measure.followPrevLayout();
      const measureDistance = tenthsAt(print, 'measure-layout/measure-distance');
      if (measureDistance !== undefined) {
        measure.x += measureDistance;
      }
      break;
    }
  }
}
