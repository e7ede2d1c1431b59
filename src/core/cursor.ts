import { GrammarError } from './errors';
import {
  EOL,
  isDigit,
  isEntryStartChar,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  isPatternContinuationChar
} from './grammar';

export interface LineColumn {
  line: number;
  column: number;
}

/** 1-based line and column of an offset into `text`. */
export function locate(text: string, index: number): LineColumn {
  const clamped = Math.max(0, Math.min(index, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === EOL) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

/**
 * Line-oriented cursor over LF-normalised text.
 *
 * `index` is the committed position; `peekOffset` lets the parser look
 * ahead across blank lines and indentation without consuming them, then
 * either commit (`skipToPeek`) or rewind (`resetPeek`).
 */
export class Cursor {
  index = 0;
  peekOffset = 0;

  constructor(readonly text: string) {}

  charAt(offset: number): string | undefined {
    return offset < this.text.length ? this.text[offset] : undefined;
  }

  currentChar(): string | undefined {
    return this.charAt(this.index);
  }

  currentPeek(): string | undefined {
    return this.charAt(this.index + this.peekOffset);
  }

  isAtEnd(): boolean {
    return this.index >= this.text.length;
  }

  remaining(): string {
    return this.text.slice(this.index);
  }

  next(): string | undefined {
    this.peekOffset = 0;
    this.index++;
    return this.currentChar();
  }

  peek(): string | undefined {
    this.peekOffset++;
    return this.currentPeek();
  }

  resetPeek(offset = 0): void {
    this.peekOffset = offset;
  }

  skipToPeek(): void {
    this.index += this.peekOffset;
    this.peekOffset = 0;
  }

  peekBlankInline(): string {
    const start = this.index + this.peekOffset;
    while (this.currentPeek() === ' ') {
      this.peekOffset++;
    }
    return this.text.slice(start, this.index + this.peekOffset);
  }

  skipBlankInline(): string {
    const blank = this.peekBlankInline();
    this.skipToPeek();
    return blank;
  }

  /**
   * Peek over whole blank lines. Returns one EOL per line passed and leaves
   * the peek at the start of the next non-blank line.
   */
  peekBlankBlock(): string {
    let blank = '';
    for (;;) {
      const lineStart = this.peekOffset;
      this.peekBlankInline();
      if (this.currentPeek() === EOL) {
        blank += EOL;
        this.peekOffset++;
        continue;
      }
      if (this.currentPeek() === undefined) {
        return blank;
      }
      this.resetPeek(lineStart);
      return blank;
    }
  }

  skipBlankBlock(): string {
    const blank = this.peekBlankBlock();
    this.skipToPeek();
    return blank;
  }

  peekBlank(): void {
    while (this.currentPeek() === ' ' || this.currentPeek() === EOL) {
      this.peekOffset++;
    }
  }

  skipBlank(): void {
    this.peekBlank();
    this.skipToPeek();
  }

  expectChar(ch: string): void {
    if (this.currentChar() === ch) {
      this.next();
      return;
    }
    throw new GrammarError('E0003', [ch], this.index);
  }

  expectLineEnd(): void {
    const ch = this.currentChar();
    if (ch === undefined) {
      return;
    }
    if (ch === EOL) {
      this.next();
      return;
    }
    throw new GrammarError('E0003', ['␤'], this.index);
  }

  takeChar(accept: (ch: string) => boolean): string | undefined {
    const ch = this.currentChar();
    if (ch === undefined || !accept(ch)) {
      return undefined;
    }
    this.next();
    return ch;
  }

  takeIdentifierStart(): string {
    const ch = this.currentChar();
    if (ch !== undefined && isIdentifierStart(ch)) {
      this.next();
      return ch;
    }
    throw new GrammarError('E0004', ['a-zA-Z'], this.index);
  }

  takeIdentifierChar(): string | undefined {
    return this.takeChar(isIdentifierChar);
  }

  takeDigit(): string | undefined {
    return this.takeChar(isDigit);
  }

  takeHexDigit(): string | undefined {
    return this.takeChar(isHexDigit);
  }

  isIdentifierStart(): boolean {
    return isIdentifierStart(this.currentChar());
  }

  isNumberStart(): boolean {
    const ch = this.currentChar() === '-' ? this.peek() : this.currentChar();
    this.resetPeek();
    return isDigit(ch);
  }

  isValueStart(): boolean {
    const ch = this.currentPeek();
    return ch !== EOL && ch !== undefined;
  }

  /** Called with the peek at the start of a line, before its indentation. */
  isValueContinuation(): boolean {
    const column1 = this.peekOffset;
    this.peekBlankInline();

    if (this.currentPeek() === '{') {
      this.resetPeek(column1);
      return true;
    }

    if (this.peekOffset - column1 === 0) {
      return false;
    }

    if (isPatternContinuationChar(this.currentPeek())) {
      this.resetPeek(column1);
      return true;
    }

    return false;
  }

  isAttributeStart(): boolean {
    return this.currentPeek() === '.';
  }

  isVariantStart(): boolean {
    const start = this.peekOffset;
    if (this.currentPeek() === '*') {
      this.peek();
    }
    const isStart = this.currentPeek() === '[';
    this.resetPeek(start);
    return isStart;
  }

  /**
   * Whether the line after the current EOL continues a comment of the same
   * marker level (0 for `#`, 1 for `##`, 2 for `###`).
   */
  isNextLineComment(level: number): boolean {
    if (this.currentChar() !== EOL) {
      return false;
    }

    let i = 0;
    while (i <= level || (level === -1 && i < 3)) {
      if (this.peek() !== '#') {
        if (i <= level && level !== -1) {
          this.resetPeek();
          return false;
        }
        break;
      }
      i++;
    }

    const ch = this.peek();
    this.resetPeek();
    return ch === ' ' || ch === EOL || ch === undefined;
  }

  /**
   * Recovery after a failed entry: move to the next line whose first
   * character can begin an entry, never resuming inside the broken one.
   */
  skipToNextEntryStart(junkStart: number): void {
    const lastNewline = this.text.lastIndexOf(EOL, this.index);
    if (junkStart < lastNewline) {
      this.index = lastNewline;
    }
    this.peekOffset = 0;

    while (this.currentChar() !== undefined) {
      if (this.currentChar() !== EOL) {
        this.next();
        continue;
      }
      const first = this.next();
      if (isEntryStartChar(first)) {
        break;
      }
    }
  }
}
