export const EOL = '\n';

// Characters which may not begin an indented continuation line.
export const INDENTED_BLOCK_UNSAFE_CHARS = ['.', '*', '['] as const;

export const IDENTIFIER_PATTERN = '[a-zA-Z][a-zA-Z0-9_-]*';

const IDENTIFIER_START = /^[a-zA-Z]$/;
const IDENTIFIER_CHAR = /^[a-zA-Z0-9_-]$/;
const DIGIT = /^[0-9]$/;
const HEX_DIGIT = /^[0-9a-fA-F]$/;
const CALLEE = /^[A-Z][A-Z0-9_-]*$/;

export function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && IDENTIFIER_START.test(ch);
}

export function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && IDENTIFIER_CHAR.test(ch);
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && DIGIT.test(ch);
}

export function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && HEX_DIGIT.test(ch);
}

export function isCallee(name: string): boolean {
  return CALLEE.test(name);
}

export function isIndentedBlockUnsafe(ch: string | undefined): boolean {
  return ch !== undefined && INDENTED_BLOCK_UNSAFE_CHARS.some(unsafe => unsafe === ch);
}

/**
 * Whether a character can open an indented continuation line of a pattern.
 * `}` is excluded as well: it closes the select expression a variant lives in.
 */
export function isPatternContinuationChar(ch: string | undefined): boolean {
  return ch !== undefined && ch !== EOL && ch !== '}' && !isIndentedBlockUnsafe(ch);
}

/** First character of a line that can begin a top-level entry. */
export function isEntryStartChar(ch: string | undefined): boolean {
  return isIdentifierStart(ch) || ch === '-' || ch === '#';
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, EOL);
}
