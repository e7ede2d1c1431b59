import {
  Annotation,
  AnyComment,
  Attribute,
  CallArguments,
  Entry,
  Expression,
  Identifier,
  InlineExpression,
  Junk,
  Literal,
  Message,
  NamedArgument,
  NumberLiteral,
  Pattern,
  PatternElement,
  Placeable,
  Resource,
  StringLiteral,
  Term,
  TextElement,
  Variant
} from './fluent-ast';
import { resolveComments, RawEntry } from './comment-resolver';
import { Cursor, locate } from './cursor';
import {
  describeDiagnostic,
  FluentParseError,
  FluentProblem,
  GrammarError,
  MissingDefaultVariantError,
  MissingTermValueError
} from './errors';
import { EOL, isCallee, isDigit, normalizeLineEndings } from './grammar';

// Indentation collected while reading a pattern; folded into text by dedent().
interface Indent {
  type: 'Indent';
  value: string;
}

type PatternPiece = PatternElement | Indent;

const TRAILING_WHITESPACE = /[ \n\r]+$/;

export class FluentParser {
  /** Parse a whole resource, attaching comments to the entries they describe. */
  parseResource(source: string): Resource {
    return { type: 'Resource', body: resolveComments(this.parseEntries(source)) };
  }

  /**
   * Parse top-level entries without attaching comments. Each entry records
   * how many blank lines follow it, which decides comment attachment later.
   */
  parseEntries(source: string): RawEntry[] {
    const cursor = new Cursor(normalizeLineEndings(source));
    cursor.skipBlankBlock();

    const entries: RawEntry[] = [];
    while (!cursor.isAtEnd()) {
      const entry = this.getEntryOrJunk(cursor);
      const blank = cursor.skipBlankBlock();
      entries.push({ entry, blankLinesAfter: blank.length, atEnd: cursor.isAtEnd() });
    }
    return entries;
  }

  private getEntryOrJunk(cursor: Cursor): Entry {
    const start = cursor.index;
    try {
      const entry = this.getEntry(cursor);
      cursor.expectLineEnd();
      return entry;
    } catch (error) {
      if (!(error instanceof GrammarError)) {
        throw error;
      }

      cursor.skipToNextEntryStart(start);
      const nextEntryStart = cursor.index;
      const annotation: Annotation = {
        code: error.code,
        args: error.args,
        message: error.message,
        position: Math.min(error.position, nextEntryStart)
      };

      const junk: Junk = {
        type: 'Junk',
        content: cursor.text.slice(start, nextEntryStart),
        annotations: [annotation],
        span: { start, end: nextEntryStart }
      };
      return junk;
    }
  }

  private getEntry(cursor: Cursor): Entry {
    const start = cursor.index;
    const ch = cursor.currentChar();

    if (ch === '#') {
      const comment = this.getComment(cursor);
      comment.span = { start, end: cursor.index };
      return comment;
    }
    if (ch === '-') {
      const term = this.getTerm(cursor);
      term.span = { start, end: cursor.index };
      return term;
    }
    if (cursor.isIdentifierStart()) {
      const message = this.getMessage(cursor);
      message.span = { start, end: cursor.index };
      return message;
    }

    throw new GrammarError('E0002', [], start);
  }

  private getComment(cursor: Cursor): AnyComment {
    // 0 for `#`, 1 for `##`, 2 for `###`
    let level = -1;
    let content = '';

    for (;;) {
      let i = -1;
      while (cursor.currentChar() === '#' && i < (level === -1 ? 2 : level)) {
        cursor.next();
        i++;
      }
      if (level === -1) {
        level = i;
      }

      const ch = cursor.currentChar();
      if (ch !== EOL && ch !== undefined) {
        cursor.expectChar(' ');
        const lineStart = cursor.index;
        while (cursor.currentChar() !== EOL && cursor.currentChar() !== undefined) {
          cursor.next();
        }
        content += cursor.text.slice(lineStart, cursor.index);
      }

      if (!cursor.isNextLineComment(level)) {
        break;
      }
      content += EOL;
      cursor.next();
    }

    if (level === 0) {
      return { type: 'Comment', content };
    }
    if (level === 1) {
      return { type: 'GroupComment', content };
    }
    return { type: 'ResourceComment', content };
  }

  private getMessage(cursor: Cursor): Message {
    const id = this.getIdentifier(cursor);
    cursor.skipBlankInline();
    cursor.expectChar('=');

    const value = this.maybeGetPattern(cursor);
    const attributes = this.getAttributes(cursor);

    if (value === null && attributes.length === 0) {
      throw new GrammarError('E0005', [id.name], cursor.index);
    }

    return { type: 'Message', id, value, attributes, comment: null };
  }

  private getTerm(cursor: Cursor): Term {
    cursor.expectChar('-');
    const id = this.getIdentifier(cursor);
    cursor.skipBlankInline();
    const equalsAt = cursor.index;
    cursor.expectChar('=');

    const value = this.maybeGetPattern(cursor);
    if (value === null) {
      throw new MissingTermValueError(id.name, equalsAt);
    }

    const attributes = this.getAttributes(cursor);
    return { type: 'Term', id, value, attributes, comment: null };
  }

  private getAttribute(cursor: Cursor): Attribute {
    cursor.expectChar('.');
    const id = this.getIdentifier(cursor);
    cursor.skipBlankInline();
    cursor.expectChar('=');

    const value = this.maybeGetPattern(cursor);
    if (value === null) {
      throw new GrammarError('E0012', [], cursor.index);
    }
    return { type: 'Attribute', id, value };
  }

  // Attributes may start at any indentation, column 0 included.
  private getAttributes(cursor: Cursor): Attribute[] {
    const attributes: Attribute[] = [];
    cursor.peekBlank();
    while (cursor.isAttributeStart()) {
      cursor.skipToPeek();
      attributes.push(this.getAttribute(cursor));
      cursor.peekBlank();
    }
    return attributes;
  }

  private getIdentifier(cursor: Cursor): Identifier {
    let name = cursor.takeIdentifierStart();
    let ch: string | undefined;
    while ((ch = cursor.takeIdentifierChar()) !== undefined) {
      name += ch;
    }
    return { type: 'Identifier', name };
  }

  private getVariantKey(cursor: Cursor): Identifier | NumberLiteral {
    const ch = cursor.currentChar();
    if (ch === undefined) {
      throw new GrammarError('E0013', [], cursor.index);
    }
    if (isDigit(ch) || ch === '-') {
      return this.getNumber(cursor);
    }
    return this.getIdentifier(cursor);
  }

  private getVariant(cursor: Cursor, hasDefault: boolean): Variant {
    let isDefault = false;
    if (cursor.currentChar() === '*') {
      if (hasDefault) {
        throw new GrammarError('E0015', [], cursor.index);
      }
      cursor.next();
      isDefault = true;
    }

    cursor.expectChar('[');
    cursor.skipBlank();
    const key = this.getVariantKey(cursor);
    cursor.skipBlank();
    cursor.expectChar(']');

    const value = this.maybeGetPattern(cursor);
    if (value === null) {
      throw new GrammarError('E0012', [], cursor.index);
    }
    return { type: 'Variant', key, value, default: isDefault };
  }

  private getVariants(cursor: Cursor, placeableStart: number): Variant[] {
    const variants: Variant[] = [];
    let hasDefault = false;

    cursor.skipBlank();
    while (cursor.isVariantStart()) {
      const variant = this.getVariant(cursor, hasDefault);
      hasDefault = hasDefault || variant.default;
      variants.push(variant);
      cursor.expectLineEnd();
      cursor.skipBlank();
    }

    if (variants.length === 0) {
      throw new GrammarError('E0011', [], cursor.index);
    }
    if (!hasDefault) {
      throw new MissingDefaultVariantError(placeableStart);
    }
    return variants;
  }

  private getDigits(cursor: Cursor): string {
    let digits = '';
    let ch: string | undefined;
    while ((ch = cursor.takeDigit()) !== undefined) {
      digits += ch;
    }
    if (digits.length === 0) {
      throw new GrammarError('E0004', ['0-9'], cursor.index);
    }
    return digits;
  }

  private getNumber(cursor: Cursor): NumberLiteral {
    let value = '';
    if (cursor.currentChar() === '-') {
      cursor.next();
      value += `-${this.getDigits(cursor)}`;
    } else {
      value += this.getDigits(cursor);
    }

    if (cursor.currentChar() === '.') {
      cursor.next();
      value += `.${this.getDigits(cursor)}`;
    }
    return { type: 'NumberLiteral', value };
  }

  private maybeGetPattern(cursor: Cursor): Pattern | null {
    cursor.peekBlankInline();
    if (cursor.isValueStart()) {
      cursor.skipToPeek();
      return this.getPattern(cursor, false);
    }

    cursor.peekBlankBlock();
    if (cursor.isValueContinuation()) {
      cursor.skipToPeek();
      return this.getPattern(cursor, true);
    }

    cursor.resetPeek();
    return null;
  }

  private getPattern(cursor: Cursor, isBlock: boolean): Pattern {
    const pieces: PatternPiece[] = [];
    let commonIndent = Infinity;

    if (isBlock) {
      // Blank lines before a block value are dropped; only its first indent counts.
      const firstIndent = cursor.skipBlankInline();
      pieces.push({ type: 'Indent', value: firstIndent });
      commonIndent = firstIndent.length;
    }

    let ch: string | undefined;
    while ((ch = cursor.currentChar()) !== undefined) {
      if (ch === EOL) {
        const blankLines = cursor.peekBlankBlock();
        if (!cursor.isValueContinuation()) {
          cursor.resetPeek();
          break;
        }
        cursor.skipToPeek();
        const indent = cursor.skipBlankInline();
        commonIndent = Math.min(commonIndent, indent.length);
        pieces.push({ type: 'Indent', value: blankLines + indent });
        continue;
      }

      if (ch === '{') {
        pieces.push(this.getPlaceable(cursor));
        continue;
      }
      if (ch === '}') {
        throw new GrammarError('E0027', [], cursor.index);
      }
      pieces.push(this.getTextElement(cursor));
    }

    return { type: 'Pattern', elements: this.dedent(pieces, commonIndent) };
  }

  private getTextElement(cursor: Cursor): TextElement {
    const start = cursor.index;
    let ch = cursor.currentChar();
    while (ch !== undefined && ch !== '{' && ch !== '}' && ch !== EOL) {
      ch = cursor.next();
    }
    return { type: 'TextElement', value: cursor.text.slice(start, cursor.index) };
  }

  /** Strip the common indent, join adjacent text and trim the pattern's end. */
  private dedent(pieces: PatternPiece[], commonIndent: number): PatternElement[] {
    const trimmed: PatternElement[] = [];

    for (const piece of pieces) {
      if (piece.type === 'Placeable') {
        trimmed.push(piece);
        continue;
      }

      let value = piece.value;
      if (piece.type === 'Indent') {
        value = value.slice(0, value.length - commonIndent);
        if (value.length === 0) {
          continue;
        }
      }

      const previous = trimmed.length > 0 ? trimmed[trimmed.length - 1] : undefined;
      if (previous !== undefined && previous.type === 'TextElement') {
        trimmed[trimmed.length - 1] = { type: 'TextElement', value: previous.value + value };
        continue;
      }
      trimmed.push({ type: 'TextElement', value });
    }

    const last = trimmed.length > 0 ? trimmed[trimmed.length - 1] : undefined;
    if (last !== undefined && last.type === 'TextElement') {
      const value = last.value.replace(TRAILING_WHITESPACE, '');
      if (value.length === 0) {
        trimmed.pop();
      } else {
        trimmed[trimmed.length - 1] = { type: 'TextElement', value };
      }
    }

    return trimmed;
  }

  private getPlaceable(cursor: Cursor): Placeable {
    const start = cursor.index;
    cursor.expectChar('{');
    cursor.skipBlank();
    const expression = this.getExpression(cursor, start);
    cursor.expectChar('}');
    return { type: 'Placeable', expression, span: { start, end: cursor.index } };
  }

  private getExpression(cursor: Cursor, placeableStart: number): Expression {
    const selector = this.getInlineExpression(cursor);
    cursor.skipBlank();

    if (cursor.currentChar() === '-') {
      if (cursor.peek() !== '>') {
        cursor.resetPeek();
        return selector;
      }
      cursor.resetPeek();

      switch (selector.type) {
        case 'MessageReference':
          throw new GrammarError(selector.attribute === null ? 'E0016' : 'E0018', [], cursor.index);
        case 'TermReference':
          if (selector.attribute === null) {
            throw new GrammarError('E0017', [], cursor.index);
          }
          break;
        case 'Placeable':
          throw new GrammarError('E0029', [], cursor.index);
        default:
          break;
      }

      cursor.next();
      cursor.next();
      cursor.skipBlankInline();
      cursor.expectLineEnd();

      const variants = this.getVariants(cursor, placeableStart);
      return { type: 'SelectExpression', selector, variants };
    }

    if (selector.type === 'TermReference' && selector.attribute !== null) {
      throw new GrammarError('E0019', [], cursor.index);
    }
    return selector;
  }

  private getInlineExpression(cursor: Cursor): InlineExpression {
    const ch = cursor.currentChar();

    if (ch === '{') {
      return this.getPlaceable(cursor);
    }
    if (cursor.isNumberStart()) {
      return this.getNumber(cursor);
    }
    if (ch === '"') {
      return this.getString(cursor);
    }

    if (ch === '$') {
      cursor.next();
      return { type: 'VariableReference', id: this.getIdentifier(cursor) };
    }

    if (ch === '-') {
      cursor.next();
      const id = this.getIdentifier(cursor);
      let attribute: Identifier | null = null;
      if (cursor.currentChar() === '.') {
        cursor.next();
        attribute = this.getIdentifier(cursor);
      }

      let args: CallArguments | null = null;
      cursor.peekBlank();
      if (cursor.currentPeek() === '(') {
        cursor.skipToPeek();
        args = this.getCallArguments(cursor);
      } else {
        cursor.resetPeek();
      }
      return { type: 'TermReference', id, attribute, arguments: args };
    }

    if (cursor.isIdentifierStart()) {
      const id = this.getIdentifier(cursor);
      cursor.peekBlank();

      if (cursor.currentPeek() === '(') {
        if (!isCallee(id.name)) {
          throw new GrammarError('E0008', [], cursor.index);
        }
        cursor.skipToPeek();
        return { type: 'FunctionReference', id, arguments: this.getCallArguments(cursor) };
      }
      cursor.resetPeek();

      let attribute: Identifier | null = null;
      if (cursor.currentChar() === '.') {
        cursor.next();
        attribute = this.getIdentifier(cursor);
      }
      return { type: 'MessageReference', id, attribute };
    }

    throw new GrammarError('E0028', [], cursor.index);
  }

  private getCallArgument(cursor: Cursor): InlineExpression | NamedArgument {
    const expression = this.getInlineExpression(cursor);
    cursor.skipBlank();

    if (cursor.currentChar() !== ':') {
      return expression;
    }

    if (expression.type === 'MessageReference' && expression.attribute === null) {
      cursor.next();
      cursor.skipBlank();
      return { type: 'NamedArgument', name: expression.id, value: this.getLiteral(cursor) };
    }

    throw new GrammarError('E0009', [], cursor.index);
  }

  private getCallArguments(cursor: Cursor): CallArguments {
    const positional: InlineExpression[] = [];
    const named: NamedArgument[] = [];
    const argumentNames = new Set<string>();

    cursor.expectChar('(');
    cursor.skipBlank();

    while (cursor.currentChar() !== ')') {
      const argument = this.getCallArgument(cursor);
      if (argument.type === 'NamedArgument') {
        if (argumentNames.has(argument.name.name)) {
          throw new GrammarError('E0022', [], cursor.index);
        }
        named.push(argument);
        argumentNames.add(argument.name.name);
      } else if (argumentNames.size > 0) {
        throw new GrammarError('E0021', [], cursor.index);
      } else {
        positional.push(argument);
      }

      cursor.skipBlank();
      if (cursor.currentChar() !== ',') {
        break;
      }
      cursor.next();
      cursor.skipBlank();
    }

    cursor.expectChar(')');
    return { type: 'CallArguments', positional, named };
  }

  private getString(cursor: Cursor): StringLiteral {
    cursor.expectChar('"');
    let value = '';

    let ch: string | undefined;
    while ((ch = cursor.takeChar(c => c !== '"' && c !== EOL)) !== undefined) {
      value += ch === '\\' ? this.getEscapeSequence(cursor) : ch;
    }

    if (cursor.currentChar() === EOL) {
      throw new GrammarError('E0020', [], cursor.index);
    }

    cursor.expectChar('"');
    return { type: 'StringLiteral', value };
  }

  private getEscapeSequence(cursor: Cursor): string {
    const next = cursor.currentChar();
    switch (next) {
      case '\\':
      case '"':
        cursor.next();
        return `\\${next}`;
      case 'u':
        return this.getUnicodeEscapeSequence(cursor, next, 4);
      case 'U':
        return this.getUnicodeEscapeSequence(cursor, next, 6);
      default:
        throw new GrammarError('E0025', [next ?? ''], cursor.index);
    }
  }

  private getUnicodeEscapeSequence(cursor: Cursor, marker: 'u' | 'U', digits: number): string {
    cursor.expectChar(marker);
    let sequence = '';
    for (let i = 0; i < digits; i++) {
      const ch = cursor.takeHexDigit();
      if (ch === undefined) {
        throw new GrammarError('E0026', [`\\${marker}${sequence}${cursor.currentChar() ?? ''}`], cursor.index);
      }
      sequence += ch;
    }
    return `\\${marker}${sequence}`;
  }

  private getLiteral(cursor: Cursor): Literal {
    if (cursor.isNumberStart()) {
      return this.getNumber(cursor);
    }
    if (cursor.currentChar() === '"') {
      return this.getString(cursor);
    }
    throw new GrammarError('E0014', [], cursor.index);
  }
}

/** First non-blank line of a junk slice, or its raw first line when all of it is blank. */
function junkSnippet(junk: Junk): string {
  const lines = junk.content.split(EOL);
  const line = lines.find(l => l.trim().length > 0);
  return line === undefined ? lines[0] : line.trim();
}

export function collectProblems(source: string, resource: Resource): FluentProblem[] {
  const text = normalizeLineEndings(source);
  const problems: FluentProblem[] = [];

  for (const entry of resource.body) {
    if (entry.type !== 'Junk') {
      continue;
    }
    for (const annotation of entry.annotations) {
      const { line, column } = locate(text, annotation.position);
      problems.push({
        code: annotation.code,
        message: describeDiagnostic(annotation.code, annotation.args),
        line,
        column,
        snippet: junkSnippet(entry)
      });
    }
  }

  return problems;
}

export function parseResource(source: string): Resource {
  return new FluentParser().parseResource(source);
}

/** Like parseResource, but any unparseable entry fails the whole resource. */
export function parseFluent(source: string): Resource {
  const resource = parseResource(source);
  const problems = collectProblems(source, resource);
  if (problems.length > 0) {
    throw new FluentParseError(problems);
  }
  return resource;
}
