import { readFileSync } from 'fs';
import type { XmlNode } from '../xml';

// ============================================================
// Diagnostic Types
// ============================================================

export type SchemaDiagnosticCode =
  | 'UNEXPECTED_ROOT'
  | 'UNEXPECTED_ELEMENT'
  | 'MISSING_ELEMENT'
  | 'TOO_MANY_ELEMENTS'
  | 'CHOICE_VIOLATION'
  | 'INVALID_TEXT'
  | 'MISSING_ATTRIBUTE'
  | 'INVALID_ATTRIBUTE'
  | 'UNDECLARED_ATTRIBUTE';

export type SchemaDiagnosticSeverity = 'error' | 'warning';

export interface SchemaDiagnostic {
  code: SchemaDiagnosticCode;
  severity: SchemaDiagnosticSeverity;
  message: string;
  /** Element path, e.g. `/score-partwise[1]/part[1]/measure[2]` */
  path: string;
}

export interface ValidationReport {
  valid: boolean;
  log: SchemaDiagnostic[];
}

/** Schema compiled once and shared read-only by every validation. */
export interface CompiledSchema {
  readonly source: string;
  validate(root: XmlNode): ValidationReport;
}

/** Keep only entries that make a document invalid. */
export function errorsOf(log: SchemaDiagnostic[]): SchemaDiagnostic[] {
  return log.filter((entry) => entry.severity === 'error');
}

// ============================================================
// Definition Types (shape of the bundled JSON resource)
// ============================================================

type BaseType = 'string' | 'token' | 'decimal' | 'integer';

interface TypeDefinition {
  base: string;
  enum?: string[];
  min?: number;
  max?: number;
  minExclusive?: number;
}

interface AttributeDefinition {
  type: string;
  use?: 'required' | 'optional';
}

interface ChoiceDefinition {
  of: string[];
  occurs: string;
}

interface ElementDefinition {
  attributes?: Record<string, AttributeDefinition>;
  children?: Record<string, string>;
  choices?: ChoiceDefinition[];
  content?: 'closed' | 'open';
  text?: string;
}

interface SchemaDefinition {
  root: string[];
  types: Record<string, TypeDefinition>;
  elements: Record<string, ElementDefinition>;
}

// ============================================================
// Compiled Forms
// ============================================================

/** Returns a reason when the value does not match, otherwise undefined. */
type ValueChecker = (value: string) => string | undefined;

interface Occurrence {
  min: number;
  max: number;
}

interface CompiledAttribute {
  check: ValueChecker;
  required: boolean;
}

interface CompiledChoice {
  of: string[];
  occurs: Occurrence;
}

interface CompiledElement {
  attributes: Map<string, CompiledAttribute>;
  children: Map<string, Occurrence>;
  choices: CompiledChoice[];
  open: boolean;
  text?: ValueChecker;
}

const BASE_TYPES: readonly BaseType[] = ['string', 'token', 'decimal', 'integer'];
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// ============================================================
// Compilation
// ============================================================

/**
 * Read and compile a schema resource from an absolute path.
 * Throws when the resource is missing or not a valid definition.
 */
export function compileSchema(schemaPath: string): CompiledSchema {
  const raw: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  return compileDefinition(readDefinition(raw), schemaPath);
}

export function compileDefinition(definition: SchemaDefinition, source = '<inline>'): CompiledSchema {
  const checkers = new Map<string, ValueChecker>();
  const resolving = new Set<string>();

  const checkerFor = (typeName: string): ValueChecker => {
    const cached = checkers.get(typeName);
    if (cached) return cached;

    const base = BASE_TYPES.find((b) => b === typeName);
    if (base) {
      const checker = baseChecker(base);
      checkers.set(typeName, checker);
      return checker;
    }

    const type = definition.types[typeName];
    if (!type) {
      throw new Error(`Schema ${source}: unknown type '${typeName}'`);
    }
    if (resolving.has(typeName)) {
      throw new Error(`Schema ${source}: type '${typeName}' refers to itself`);
    }
    resolving.add(typeName);
    const checker = restrict(checkerFor(type.base), type);
    resolving.delete(typeName);
    checkers.set(typeName, checker);
    return checker;
  };

  const elements = new Map<string, CompiledElement>();
  for (const [name, element] of Object.entries(definition.elements)) {
    elements.set(name, compileElement(name, element, checkerFor, source));
  }

  const roots = new Set(definition.root);
  for (const root of roots) {
    if (!elements.has(root)) {
      throw new Error(`Schema ${source}: root element '${root}' is not defined`);
    }
  }

  return {
    source,
    validate(root: XmlNode): ValidationReport {
      const log: SchemaDiagnostic[] = [];
      if (!roots.has(root.name)) {
        log.push({
          code: 'UNEXPECTED_ROOT',
          severity: 'error',
          message: `Root element '${root.name}' is not one of: ${[...roots].join(', ')}`,
          path: root.path,
        });
      } else {
        validateNode(root, elements, log);
      }
      return { valid: errorsOf(log).length === 0, log };
    },
  };
}

function compileElement(
  name: string,
  element: ElementDefinition,
  checkerFor: (typeName: string) => ValueChecker,
  source: string
): CompiledElement {
  const attributes = new Map<string, CompiledAttribute>();
  for (const [attrName, attr] of Object.entries(element.attributes ?? {})) {
    attributes.set(attrName, { check: checkerFor(attr.type), required: attr.use === 'required' });
  }

  const children = new Map<string, Occurrence>();
  for (const [childName, occurs] of Object.entries(element.children ?? {})) {
    children.set(childName, parseOccurrence(occurs, `${source}: ${name}/${childName}`));
  }

  const choices = (element.choices ?? []).map((choice) => {
    for (const member of choice.of) {
      if (!children.has(member)) {
        throw new Error(`Schema ${source}: choice member '${member}' is not a child of '${name}'`);
      }
    }
    return { of: choice.of, occurs: parseOccurrence(choice.occurs, `${source}: ${name} choice`) };
  });

  return {
    attributes,
    children,
    choices,
    open: element.content === 'open',
    text: element.text !== undefined ? checkerFor(element.text) : undefined,
  };
}

function parseOccurrence(value: string, where: string): Occurrence {
  const match = /^(\d+)(?:\.\.(\d+|\*))?$/.exec(value);
  if (!match) {
    throw new Error(`Schema ${where}: invalid occurrence '${value}'`);
  }
  const min = Number.parseInt(match[1], 10);
  const upper = match[2];
  const max = upper === undefined ? min : upper === '*' ? Infinity : Number.parseInt(upper, 10);
  if (max < min) {
    throw new Error(`Schema ${where}: invalid occurrence '${value}'`);
  }
  return { min, max };
}

function baseChecker(base: BaseType): ValueChecker {
  switch (base) {
    case 'string':
    case 'token':
      return () => undefined;
    case 'decimal':
      return (value) => (DECIMAL_PATTERN.test(value.trim()) ? undefined : `'${value}' is not a decimal`);
    case 'integer':
      return (value) => (INTEGER_PATTERN.test(value.trim()) ? undefined : `'${value}' is not an integer`);
  }
}

function restrict(parent: ValueChecker, type: TypeDefinition): ValueChecker {
  return (value) => {
    const reason = parent(value);
    if (reason) return reason;

    const trimmed = value.trim();
    if (type.enum && !type.enum.includes(trimmed)) {
      return `'${value}' is not one of: ${type.enum.join(', ')}`;
    }
    const numeric = Number(trimmed);
    if (type.min !== undefined && numeric < type.min) {
      return `'${value}' is less than ${type.min}`;
    }
    if (type.max !== undefined && numeric > type.max) {
      return `'${value}' is greater than ${type.max}`;
    }
    if (type.minExclusive !== undefined && numeric <= type.minExclusive) {
      return `'${value}' must be greater than ${type.minExclusive}`;
    }
    return undefined;
  };
}

// ============================================================
// Validation
// ============================================================

function validateNode(node: XmlNode, elements: Map<string, CompiledElement>, log: SchemaDiagnostic[]): void {
  const element = elements.get(node.name);
  // Elements without a definition are accepted as they are.
  if (!element) return;

  validateAttributes(node, element, log);

  if (element.text) {
    const reason = element.text(node.text);
    if (reason) {
      log.push({
        code: 'INVALID_TEXT',
        severity: 'error',
        message: `Invalid content of <${node.name}>: ${reason}`,
        path: node.path,
      });
    }
  }

  const counts = new Map<string, number>();
  for (const child of node.children) {
    counts.set(child.name, (counts.get(child.name) ?? 0) + 1);
    if (!element.children.has(child.name) && !element.open) {
      log.push({
        code: 'UNEXPECTED_ELEMENT',
        severity: 'error',
        message: `Element <${child.name}> is not allowed in <${node.name}>`,
        path: child.path,
      });
      continue;
    }
    validateNode(child, elements, log);
  }

  for (const [childName, occurs] of element.children) {
    const count = counts.get(childName) ?? 0;
    if (count < occurs.min) {
      log.push({
        code: 'MISSING_ELEMENT',
        severity: 'error',
        message: `<${node.name}> requires at least ${occurs.min} <${childName}>, found ${count}`,
        path: node.path,
      });
    } else if (count > occurs.max) {
      log.push({
        code: 'TOO_MANY_ELEMENTS',
        severity: 'error',
        message: `<${node.name}> allows at most ${occurs.max} <${childName}>, found ${count}`,
        path: node.path,
      });
    }
  }

  for (const choice of element.choices) {
    const count = choice.of.reduce((sum, name) => sum + (counts.get(name) ?? 0), 0);
    if (count < choice.occurs.min || count > choice.occurs.max) {
      log.push({
        code: 'CHOICE_VIOLATION',
        severity: 'error',
        message: `<${node.name}> must contain ${formatOccurrence(choice.occurs)} of <${choice.of.join('|')}>, found ${count}`,
        path: node.path,
      });
    }
  }
}

function validateAttributes(node: XmlNode, element: CompiledElement, log: SchemaDiagnostic[]): void {
  for (const [name, value] of Object.entries(node.attributes)) {
    const attr = element.attributes.get(name);
    if (!attr) {
      // Namespaced attributes (xml:lang, xlink:href, xmlns) are outside this schema.
      if (name.includes(':') || name === 'xmlns') continue;
      log.push({
        code: 'UNDECLARED_ATTRIBUTE',
        severity: 'warning',
        message: `Attribute '${name}' is not declared on <${node.name}>`,
        path: node.path,
      });
      continue;
    }
    const reason = attr.check(value);
    if (reason) {
      log.push({
        code: 'INVALID_ATTRIBUTE',
        severity: 'error',
        message: `Invalid attribute '${name}' on <${node.name}>: ${reason}`,
        path: node.path,
      });
    }
  }

  for (const [name, attr] of element.attributes) {
    if (attr.required && node.attributes[name] === undefined) {
      log.push({
        code: 'MISSING_ATTRIBUTE',
        severity: 'error',
        message: `<${node.name}> requires attribute '${name}'`,
        path: node.path,
      });
    }
  }
}

function formatOccurrence(occurs: Occurrence): string {
  if (occurs.min === occurs.max) return `exactly ${occurs.min}`;
  if (occurs.max === Infinity) return `at least ${occurs.min}`;
  return `${occurs.min} to ${occurs.max}`;
}

// ============================================================
// Definition Reading
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function definitionError(message: string): Error {
  return new Error(`Invalid schema definition: ${message}`);
}

function optionalNumber(value: unknown, where: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw definitionError(`${where} must be a number`);
  return value;
}

function readRecord<T>(value: unknown, where: string, read: (item: unknown, key: string) => T): Record<string, T> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw definitionError(`${where} must be an object`);
  const out: Record<string, T> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = read(item, key);
  }
  return out;
}

function readType(value: unknown, name: string): TypeDefinition {
  if (!isRecord(value)) throw definitionError(`type '${name}' must be an object`);
  const base = value.base;
  const values = value.enum;
  if (typeof base !== 'string') {
    throw definitionError(`type '${name}' needs a string 'base'`);
  }
  if (values !== undefined && !isStringArray(values)) {
    throw definitionError(`type '${name}' enum must list strings`);
  }
  return {
    base,
    enum: values,
    min: optionalNumber(value.min, `type '${name}' min`),
    max: optionalNumber(value.max, `type '${name}' max`),
    minExclusive: optionalNumber(value.minExclusive, `type '${name}' minExclusive`),
  };
}

function readAttribute(value: unknown, where: string): AttributeDefinition {
  if (typeof value === 'string') return { type: value };
  if (!isRecord(value)) throw definitionError(`attribute ${where} must be a type name or an object`);
  const type = value.type;
  if (typeof type !== 'string') {
    throw definitionError(`attribute ${where} needs a string 'type'`);
  }
  const use = value.use;
  switch (use) {
    case undefined:
      return { type };
    case 'required':
    case 'optional':
      return { type, use };
    default:
      throw definitionError(`attribute ${where} has an invalid 'use'`);
  }
}

function readChoice(value: unknown, name: string): ChoiceDefinition {
  if (!isRecord(value)) throw definitionError(`element '${name}' has an invalid choice`);
  const of = value.of;
  const occurs = value.occurs;
  if (!isStringArray(of) || typeof occurs !== 'string') {
    throw definitionError(`element '${name}' has an invalid choice`);
  }
  return { of, occurs };
}

function readContent(value: unknown, name: string): ElementDefinition['content'] {
  switch (value) {
    case undefined:
    case 'closed':
    case 'open':
      return value;
    default:
      throw definitionError(`element '${name}' content must be 'closed' or 'open'`);
  }
}

function readElement(value: unknown, name: string): ElementDefinition {
  if (!isRecord(value)) throw definitionError(`element '${name}' must be an object`);

  const text = value.text;
  if (text !== undefined && typeof text !== 'string') {
    throw definitionError(`element '${name}' text must name a type`);
  }

  let choices: ChoiceDefinition[] | undefined;
  const rawChoices = value.choices;
  if (rawChoices !== undefined) {
    if (!Array.isArray(rawChoices)) throw definitionError(`element '${name}' choices must be a list`);
    choices = rawChoices.map((choice: unknown) => readChoice(choice, name));
  }

  return {
    attributes: readRecord(value.attributes, `element '${name}' attributes`, (item, key) =>
      readAttribute(item, `'${name}@${key}'`)
    ),
    children: readRecord(value.children, `element '${name}' children`, (item, key) => {
      if (typeof item !== 'string') throw definitionError(`child '${name}/${key}' needs an occurrence string`);
      return item;
    }),
    choices,
    content: readContent(value.content, name),
    text: typeof text === 'string' ? text : undefined,
  };
}

function readDefinition(raw: unknown): SchemaDefinition {
  if (!isRecord(raw)) throw definitionError('top level must be an object');
  const root = raw.root;
  if (!isStringArray(root) || root.length === 0) {
    throw definitionError("'root' must list at least one element name");
  }
  return {
    root,
    types: readRecord(raw.types, 'types', readType),
    elements: readRecord(raw.elements, 'elements', readElement),
  };
}
