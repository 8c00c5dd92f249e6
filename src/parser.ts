import { assertBeamsClosed } from './beams';
import { resolveOptions, type ParserOptions, type ResolvedParserOptions } from './config';
import { createParseContext, malformed, type MeasureContext } from './context';
import { parseClef } from './elements';
import { ValidateError } from './errors';
import { handlePrint } from './layout';
import { loadDocument, readDocument } from './loader';
import { handleBackup, handleForward, handleNote } from './notes';
import { DEFAULT_SCHEMA_PATH } from './resources';
import { Measure, Sheet } from './sheet';
import { compileSchema, errorsOf, type CompiledSchema, type SchemaDiagnostic } from './validator';
import { attribute, childrenOf, firstChild, isYes, parseOptionalInt, textOf, type XmlNode } from './xml';

/**
 * Measure children the walker acts on. Everything else (direction, harmony,
 * figured-bass, bookmark, link, grouping, sound, ...) is ignored; `print` is
 * consumed by the layout step before dispatch.
 */
export type HandledTag = 'attributes' | 'note' | 'backup' | 'forward' | 'barline';

type Handler = (context: MeasureContext, node: XmlNode) => void;

function handleAttributes(context: MeasureContext, node: XmlNode): void {
  const divisionsNode = firstChild(node, 'divisions');
  if (divisionsNode) {
    const divisions = parseOptionalInt(textOf(divisionsNode));
    if (divisions === undefined || divisions <= 0) {
      throw malformed(context, `Divisions must be a positive integer, got '${divisionsNode.text}'`, divisionsNode);
    }
    context.measure.timeDivisions = divisions;
  }

  const clefNode = firstChild(node, 'clef');
  if (clefNode) {
    context.measure.setClef(parseClef(clefNode));
  }
  // Time and key signature changes are not tracked.
}

function handleBarline(): void {
  // Repeats and endings are not interpreted.
}

const HANDLERS: Record<HandledTag, Handler> = {
  attributes: handleAttributes,
  note: handleNote,
  backup: handleBackup,
  forward: handleForward,
  barline: handleBarline,
};

function isHandledTag(name: string): name is HandledTag {
  return Object.prototype.hasOwnProperty.call(HANDLERS, name);
}

/**
 * Parses MusicXML documents into positioned sheets. The schema is compiled
 * once per parser and shared by every `parse` call; each call owns its own
 * context, so one parser can serve many documents.
 */
export class SheetParser {
  private readonly options: ResolvedParserOptions;
  private readonly schema?: CompiledSchema;

  constructor(options: ParserOptions = {}) {
    this.options = resolveOptions(options);
    if (this.options.validate) {
      this.schema = compileSchema(this.options.schemaPath ?? DEFAULT_SCHEMA_PATH);
    }
  }

  /**
   * Parse a .xml, .musicxml or .mxl file.
   * @throws FormatError, ValidateError, MalformedInputError
   */
  parse(path: string): Sheet {
    const root = loadDocument(path);
    return this.walk(root, path, this.validate(root, path));
  }

  /** Parse document bytes; `source` names the input in errors. */
  parseData(data: Uint8Array, source = '<memory>'): Sheet {
    const root = readDocument(data, source);
    return this.walk(root, source, this.validate(root, source));
  }

  private validate(root: XmlNode, source: string): SchemaDiagnostic[] {
    if (!this.schema) return [];
    const report = this.schema.validate(root);
    if (!report.valid) {
      throw new ValidateError(source, errorsOf(report.log));
    }
    return report.log;
  }

  private walk(root: XmlNode, source: string, warnings: SchemaDiagnostic[]): Sheet {
    const sheet = new Sheet(root, this.options.layout, warnings);
    const context = createParseContext(source, sheet);

    // Only the first part is read.
    const part = firstChild(root, 'part');
    if (!part) {
      throw malformed(context, 'Document has no <part>', root);
    }

    for (const measureNode of childrenOf(part, 'measure')) {
      const measure = new Measure(measureNode, this.options.layout);
      const scoped: MeasureContext = Object.assign(context, { measure });
      const print = firstChild(measureNode, 'print');

      if (isYes(attribute(print, 'new-page')) && context.page.measures.length > 0) {
        context.page = sheet.newPage();
      }
      context.page.addMeasure(measure);

      if (!print && measure.prev) {
        measure.followPrevLayout();
      } else {
        handlePrint(scoped, print);
      }

      for (const child of measureNode.children) {
        if (isHandledTag(child.name)) {
          HANDLERS[child.name](scoped, child);
        }
      }

      measure.finish();
    }

    assertBeamsClosed(context);
    sheet.finish();
    return sheet;
  }
}

/** Parse one file with a parser built for the call. */
export function parseSheet(path: string, options?: ParserOptions): Sheet {
  return new SheetParser(options).parse(path);
}
