import { fileURLToPath } from 'url';

/**
 * Absolute path of the bundled MusicXML schema. Resolved from this module's
 * location so it never depends on the process working directory; the same
 * relative path holds for `src/` and the bundled `dist/` output.
 */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL('../schema/musicxml.schema.json', import.meta.url));
