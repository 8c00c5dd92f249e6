import { nanoid } from 'nanoid';

/**
 * Generates a unique ID for measures in the Sheet structure.
 *
 * The ID format is "m" + nanoid(10); the prefix keeps it usable as an
 * XML/SVG id when a renderer tags measure groups with it.
 *
 * Example: "mV1StGXR8_"
 */
export function generateId(): string {
  return 'm' + nanoid(10);
}
