import { FluentType, FluentUnitParts } from '../types';
import {
  AnyComment,
  CallArguments,
  Entry,
  Expression,
  Identifier,
  NumberLiteral,
  Pattern,
  PatternElement,
  Placeable,
  Resource,
  SelectExpression,
  TranslatableEntry,
  Variant,
  isTranslatableEntry
} from './fluent-ast';
import { locate, LineColumn } from './cursor';
import { describeDiagnostic, SourceSyntaxError } from './errors';
import { FluentParser } from './fluent-parser';
import { EOL, isIndentedBlockUnsafe, normalizeLineEndings } from './grammar';

const INDENT = '    ';

/** Indent every line but the first by four spaces. Empty lines stay empty. */
export function indentExceptFirstLine(content: string): string {
  return content
    .split(EOL)
    .map((line, i) => (i === 0 || line === '' ? line : INDENT + line))
    .join(EOL);
}

function isSelectPlaceable(element: PatternElement): boolean {
  return element.type === 'Placeable' && element.expression.type === 'SelectExpression';
}

function shouldStartOnNewLine(pattern: Pattern): boolean {
  const isMultiline = pattern.elements.some(
    element => isSelectPlaceable(element) || (element.type === 'TextElement' && element.value.includes(EOL))
  );
  if (!isMultiline) {
    return false;
  }

  // A block line may not begin with these, so such a value stays on the `=` line.
  const first = pattern.elements[0];
  if (first !== undefined && first.type === 'TextElement' && isIndentedBlockUnsafe(first.value[0])) {
    return false;
  }
  return true;
}

export function serializePattern(pattern: Pattern): string {
  const content = indentExceptFirstLine(pattern.elements.map(serializeElement).join(''));
  return shouldStartOnNewLine(pattern) ? `${EOL}${INDENT}${content}` : ` ${content}`;
}

function serializeElement(element: PatternElement): string {
  return element.type === 'TextElement' ? element.value : serializePlaceable(element);
}

function serializePlaceable(placeable: Placeable): string {
  const expression = placeable.expression;
  if (expression.type === 'Placeable') {
    return `{${serializePlaceable(expression)}}`;
  }
  if (expression.type === 'SelectExpression') {
    return `{ ${serializeSelectExpression(expression)}}`;
  }
  return `{ ${serializeExpression(expression)} }`;
}

export function serializeExpression(expression: Expression): string {
  switch (expression.type) {
    case 'StringLiteral':
      return `"${expression.value}"`;
    case 'NumberLiteral':
      return expression.value;
    case 'VariableReference':
      return `$${expression.id.name}`;
    case 'TermReference': {
      let out = `-${expression.id.name}`;
      if (expression.attribute !== null) {
        out += `.${expression.attribute.name}`;
      }
      if (expression.arguments !== null) {
        out += serializeCallArguments(expression.arguments);
      }
      return out;
    }
    case 'MessageReference':
      return expression.attribute === null
        ? expression.id.name
        : `${expression.id.name}.${expression.attribute.name}`;
    case 'FunctionReference':
      return `${expression.id.name}${serializeCallArguments(expression.arguments)}`;
    case 'SelectExpression':
      return serializeSelectExpression(expression);
    case 'Placeable':
      return serializePlaceable(expression);
  }
}

function serializeSelectExpression(expression: SelectExpression): string {
  const parts = [`${serializeExpression(expression.selector)} ->`];
  for (const variant of expression.variants) {
    parts.push(serializeVariant(variant));
  }
  parts.push(EOL);
  return parts.join('');
}

function serializeVariantKey(key: Identifier | NumberLiteral): string {
  return key.type === 'Identifier' ? key.name : key.value;
}

function serializeVariant(variant: Variant): string {
  const key = serializeVariantKey(variant.key);
  const value = indentExceptFirstLine(serializePattern(variant.value));
  return variant.default ? `${EOL}   *[${key}]${value}` : `${EOL}${INDENT}[${key}]${value}`;
}

function serializeCallArguments(args: CallArguments): string {
  const positional = args.positional.map(serializeExpression);
  const named = args.named.map(arg => `${arg.name.name}: ${serializeExpression(arg.value)}`);
  return `(${[...positional, ...named].join(', ')})`;
}

function serializeComment(content: string, prefix: string): string {
  const lines = content.split(EOL).map(line => (line.length > 0 ? `${prefix} ${line}` : prefix));
  return `${lines.join(EOL)}${EOL}`;
}

const COMMENT_PREFIX: Record<AnyComment['type'], string> = {
  Comment: '#',
  GroupComment: '##',
  ResourceComment: '###'
};

function serializeTranslatable(entry: TranslatableEntry): string {
  const parts: string[] = [];
  if (entry.comment !== null) {
    parts.push(serializeComment(entry.comment.content, '#'));
  }

  const id = entry.type === 'Term' ? `-${entry.id.name}` : entry.id.name;
  parts.push(`${id} =`);
  if (entry.value !== null) {
    parts.push(serializePattern(entry.value));
  }
  for (const attribute of entry.attributes) {
    parts.push(`${EOL}${INDENT}.${attribute.id.name} =${indentExceptFirstLine(serializePattern(attribute.value))}`);
  }
  parts.push(EOL);
  return parts.join('');
}

/**
 * Canonical text of one entry. Standalone comments are followed by a blank
 * line, and preceded by one unless nothing has been written yet.
 */
export function serializeEntry(entry: Entry, hasEntries = false): string {
  switch (entry.type) {
    case 'Message':
    case 'Term':
      return serializeTranslatable(entry);
    case 'Comment':
    case 'GroupComment':
    case 'ResourceComment': {
      const comment = serializeComment(entry.content, COMMENT_PREFIX[entry.type]);
      return hasEntries ? `${EOL}${comment}${EOL}` : `${comment}${EOL}`;
    }
    case 'Junk':
      return entry.content;
  }
}

export function serializeResource(resource: Resource): string {
  let hasEntries = false;
  let out = '';
  for (const entry of resource.body) {
    if (entry.type === 'Junk') {
      continue;
    }
    out += serializeEntry(entry, hasEntries);
    hasEntries = true;
  }
  return out;
}

/**
 * Text of a pattern as stored in a unit: the canonical element text with
 * no indentation, where `.`, `*` or `[` opening a line is written as a
 * string literal placeable so that the text parses back to the same value.
 */
export function patternToSource(pattern: Pattern): string {
  let out = '';
  for (const element of pattern.elements) {
    if (element.type === 'Placeable') {
      out += serializePlaceable(element);
      continue;
    }

    out += element.value
      .split(EOL)
      .map((line, i) => {
        const atLineStart = i > 0 || out === '' || out.endsWith(EOL);
        return atLineStart && isIndentedBlockUnsafe(line[0]) ? `{ "${line[0]}" }${line.slice(1)}` : line;
      })
      .join(EOL);
  }
  return out;
}

export function composeSource(parts: FluentUnitParts): string {
  const lines: string[] = [];
  if (parts.value !== null) {
    lines.push(parts.value);
  }
  for (const attribute of parts.attributes) {
    lines.push(
      attribute.value.includes(EOL)
        ? `.${attribute.id} =${EOL}${attribute.value}`
        : `.${attribute.id} = ${attribute.value}`
    );
  }
  return lines.join(EOL);
}

export function entryToParts(entry: TranslatableEntry): FluentUnitParts {
  return {
    value: entry.value === null ? null : patternToSource(entry.value),
    attributes: entry.attributes.map(attribute => ({
      id: attribute.id.name,
      value: patternToSource(attribute.value)
    }))
  };
}

export function entryToSource(entry: TranslatableEntry): string {
  return composeSource(entryToParts(entry));
}

function toSourcePosition(fragment: string, index: number): LineColumn {
  const { line, column } = locate(fragment, index);
  if (line === 1) {
    return { line: 1, column: 1 };
  }
  return { line: line - 1, column: Math.max(1, column - INDENT.length) };
}

function entryStart(entry: Entry): number | undefined {
  return entry.span?.start;
}

/**
 * Parse a unit's source as the body of `id =`. Returns null for a source
 * with nothing but whitespace. Errors are reported against the source's
 * own lines and columns.
 */
export function parseUnitSource(
  id: string,
  fluentType: FluentType,
  source: string
): TranslatableEntry | null {
  const text = normalizeLineEndings(source);
  if (text.trim() === '') {
    return null;
  }

  const body = text
    .split(EOL)
    .map(line => (line.length > 0 ? INDENT + line : line))
    .join(EOL);
  const fragment = `${id} =${EOL}${body}`;

  const fail = (code: 'E0002', index: number): never => {
    const { line, column } = toSourcePosition(fragment, index);
    throw new SourceSyntaxError(id, code, describeDiagnostic(code), line, column);
  };

  const [first, ...rest] = new FluentParser().parseEntries(fragment);
  if (first === undefined) {
    return fail('E0002', 0);
  }

  if (first.entry.type === 'Junk') {
    const [annotation] = first.entry.annotations;
    const { line, column } = toSourcePosition(fragment, annotation.position);
    throw new SourceSyntaxError(id, annotation.code, annotation.message, line, column);
  }

  const entry = first.entry;
  if (!isTranslatableEntry(entry) || entry.type !== expectedEntryType(fluentType)) {
    return fail('E0002', 0);
  }

  if (rest.length > 0) {
    const leftoverStart = entryStart(rest[0].entry) ?? 0;
    const offset = fragment.slice(leftoverStart).search(/\S/);
    return fail('E0002', leftoverStart + Math.max(0, offset));
  }

  return entry;
}

function expectedEntryType(fluentType: FluentType): TranslatableEntry['type'] | null {
  if (fluentType === 'Message' || fluentType === 'Term') {
    return fluentType;
  }
  return null;
}
