export type FluentType = 'Message' | 'Term' | 'ResourceComment' | 'GroupComment' | 'DetachedComment';

export type StoreFormat = 'fluent' | 'po' | 'pot' | 'xliff' | 'tmx' | 'tbx';

export type CompressionFormat = 'gzip' | 'bzip2';

export interface FtlkitConfig {
  localesPath: string;
  sourceLocale: string;
  targetLocales: string[];
  filePattern: string;
  preferOrder?: 'mirror-source' | 'alphabetical';
  concurrency: number;
  reportPath: string;
}

/** Contract shared by every monolingual unit the toolkit hands out. */
export interface TranslationUnit {
  source: string;
  target: string;
  getId(): string;
  setId(id: string): void;
  getNotes(): string;
  isTranslatable(): boolean;
  isHeader(): boolean;
  readonly placeholders: string[];
}

export interface TranslationStore<U extends TranslationUnit = TranslationUnit> {
  units: U[];
  fileName?: string;
  addUnit(unit: U): void;
  findUnit(id: string): U | undefined;
  getIds(): string[];
  serialize(): string;
  toBuffer(): Buffer;
}

export interface FluentAttributeText {
  id: string;
  value: string;
}

export interface FluentUnitParts {
  value: string | null;
  attributes: FluentAttributeText[];
}

export interface LocaleFile {
  locale: string;
  /** Path relative to the locale directory, e.g. `browser/menu.ftl`. */
  relativePath: string;
  path: string;
  lastModified?: Date;
}

export type IssueType =
  | 'missing'
  | 'extra'
  | 'duplicate'
  | 'placeholderMismatch'
  | 'attributeMismatch'
  | 'syntaxError'
  | 'empty';

export interface ValidationIssue {
  type: IssueType;
  locale: string;
  file: string;
  id: string;
  message: string;
  severity: 'error' | 'warning';
  sourceValue?: string;
  targetValue?: string;
  suggestion?: string;
}

export interface LocaleReport {
  locale: string;
  issues: ValidationIssue[];
  stats: {
    totalIds: number;
    missingIds: number;
    extraIds: number;
    duplicates: number;
    placeholderMismatches: number;
    attributeMismatches: number;
    syntaxErrors: number;
    emptyUnits: number;
  };
}

export interface Fix {
  type: 'addMissing' | 'removeExtra' | 'removeDuplicate';
  locale: string;
  file: string;
  id: string;
  oldValue?: string;
  newValue?: string;
  description: string;
}

export interface Patch {
  path: string;
  diff: string;
  format: 'unified';
}

export interface FtlkitReport {
  summary: {
    sourceLocale: string;
    targetLocales: string[];
    filesScanned: number;
    issues: Record<IssueType, number>;
    autoFixed: boolean;
    notes: string[];
  };
  perLocale: Record<string, LocaleSummary>;
  proposedFixes: Fix[];
  patches: Patch[];
}

export interface LocaleSummary {
  missingIds: string[];
  extraIds: string[];
  duplicates: string[];
  placeholderMismatches: Array<{ id: string; source: string; target: string }>;
  attributeMismatches: Array<{ id: string; message: string }>;
  syntaxErrors: Array<{ id: string; message: string }>;
  emptyUnits: string[];
}
