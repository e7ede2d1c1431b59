import { FluentType } from '../types';

export type DiagnosticCode =
  | 'E0001'
  | 'E0002'
  | 'E0003'
  | 'E0004'
  | 'E0005'
  | 'E0006'
  | 'E0008'
  | 'E0009'
  | 'E0010'
  | 'E0011'
  | 'E0012'
  | 'E0013'
  | 'E0014'
  | 'E0015'
  | 'E0016'
  | 'E0017'
  | 'E0018'
  | 'E0019'
  | 'E0020'
  | 'E0021'
  | 'E0022'
  | 'E0025'
  | 'E0026'
  | 'E0027'
  | 'E0028'
  | 'E0029';

const DIAGNOSTICS: Record<DiagnosticCode, (args: string[]) => string> = {
  E0001: () => 'Generic error',
  E0002: () => 'Expected an entry start',
  E0003: ([token]) => `Expected token: "${token}"`,
  E0004: ([range]) => `Expected a character from range: "${range}"`,
  E0005: ([id]) => `Expected message "${id}" to have a value or attributes`,
  E0006: ([id]) => `Expected term "-${id}" to have a value`,
  E0008: () => 'The callee has to be an upper-case identifier or a term',
  E0009: () => 'The argument name has to be a simple identifier',
  E0010: () => 'Expected one of the variants to be marked as default (*)',
  E0011: () => 'Expected at least one variant after "->"',
  E0012: () => 'Expected value',
  E0013: () => 'Expected variant key',
  E0014: () => 'Expected literal',
  E0015: () => 'Only one variant can be marked as default (*)',
  E0016: () => 'Message references cannot be used as selectors',
  E0017: () => 'Terms cannot be used as selectors',
  E0018: () => 'Attributes of messages cannot be used as selectors',
  E0019: () => 'Attributes of terms cannot be used as placeables',
  E0020: () => 'Unterminated string expression',
  E0021: () => 'Positional arguments must not follow named arguments',
  E0022: () => 'Named arguments must be unique',
  E0025: ([ch]) => `Unknown escape sequence: \\${ch}.`,
  E0026: ([sequence]) => `Invalid Unicode escape sequence: ${sequence}.`,
  E0027: () => 'Unbalanced closing brace in TextElement.',
  E0028: () => 'Expected an inline expression',
  E0029: () => 'Expected simple expression as selector'
};

export function describeDiagnostic(code: DiagnosticCode, args: string[] = []): string {
  return DIAGNOSTICS[code](args);
}

/**
 * Raised by the parser at the offset where the grammar was violated.
 * Caught per entry and turned into Junk annotations.
 */
export class GrammarError extends Error {
  constructor(
    public readonly code: DiagnosticCode,
    public readonly args: string[],
    public readonly position: number
  ) {
    super(describeDiagnostic(code, args));
    this.name = 'GrammarError';
  }
}

export class MissingDefaultVariantError extends GrammarError {
  constructor(position: number) {
    super('E0010', [], position);
    this.name = 'MissingDefaultVariantError';
  }
}

export class MissingTermValueError extends GrammarError {
  constructor(termName: string, position: number) {
    super('E0006', [termName], position);
    this.name = 'MissingTermValueError';
  }
}

export interface FluentProblem {
  code: DiagnosticCode;
  message: string;
  line: number;
  column: number;
  snippet: string;
}

export class FluentParseError extends Error {
  constructor(public readonly problems: FluentProblem[]) {
    super(FluentParseError.formatMessage(problems));
    this.name = 'FluentParseError';
  }

  private static formatMessage(problems: FluentProblem[]): string {
    const snippet = problems[0]?.snippet ?? '';
    const details = problems.map(p => `${p.code}: ${p.message} [line ${p.line}, column ${p.column}]`);
    return [`Parsing error for fluent source: ${snippet}…`, ...details].join('\n');
  }
}

/** A unit's `source` text no longer parses as a Fluent value with attributes. */
export class SourceSyntaxError extends Error {
  constructor(
    public readonly unitId: string,
    public readonly code: DiagnosticCode,
    public readonly detail: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`Error in source of FluentUnit "${unitId}":\n${detail} [line ${line}, column ${column}]`);
    this.name = 'SourceSyntaxError';
  }
}

export class InvalidIdError extends Error {
  constructor(
    public readonly id: string,
    public readonly fluentType: FluentType,
    reason: string
  ) {
    super(`Invalid id "${id}" for Fluent ${fluentType}: ${reason}`);
    this.name = 'InvalidIdError';
  }
}

export class UnsupportedFormatError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly format: string | null
  ) {
    super(
      format
        ? `Unsupported file format "${format}" for ${filePath}`
        : `Could not determine the file format of ${filePath}`
    );
    this.name = 'UnsupportedFormatError';
  }
}
