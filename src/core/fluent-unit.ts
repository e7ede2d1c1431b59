import { FluentType, FluentUnitParts, TranslationUnit } from '../types';
import { Comment, Entry, TranslatableEntry } from './fluent-ast';
import { composeSource, entryToParts, parseUnitSource } from './fluent-serializer';
import { inferFluentType, isCommentType, validateId } from './id-validator';
import { collectReferences } from './references';

export interface FluentUnitOptions {
  source?: string | null;
  id?: string | null;
  comment?: string | null;
  type?: FluentType | null;
}

/**
 * One Fluent Message or Term, or a standalone comment.
 *
 * `source` is the stored truth: the value followed by one `.attr = value`
 * block per attribute. Parsed state is derived from it on demand.
 */
export class FluentUnit implements TranslationUnit {
  readonly fluentType: FluentType;
  comment: string;
  source: string;
  private id: string;
  private parsed: { source: string; id: string; entry: TranslatableEntry | null } | null = null;

  constructor(options: FluentUnitOptions = {}) {
    const id = options.id ?? '';
    this.fluentType = options.type ?? inferFluentType(id);
    validateId(id, this.fluentType);

    this.id = id;
    this.source = options.source ?? '';
    this.comment = options.comment ?? '';
  }

  /** Build a unit from a parsed entry; comment entries become header units. */
  static fromEntry(entry: Exclude<Entry, { type: 'Junk' }>): FluentUnit {
    switch (entry.type) {
      case 'Message':
      case 'Term': {
        const unit = new FluentUnit({
          id: entry.type === 'Term' ? `-${entry.id.name}` : entry.id.name,
          type: entry.type,
          source: composeSource(entryToParts(entry)),
          comment: entry.comment?.content ?? ''
        });
        return unit;
      }
      case 'Comment':
        return new FluentUnit({ type: 'DetachedComment', comment: entry.content });
      case 'GroupComment':
      case 'ResourceComment':
        return new FluentUnit({ type: entry.type, comment: entry.content });
    }
  }

  get target(): string {
    return this.source;
  }

  set target(value: string) {
    this.source = value;
  }

  getId(): string {
    return this.id;
  }

  /** Leaves the current id in place when `id` is rejected. */
  setId(id: string): void {
    validateId(id, this.fluentType);
    this.id = id;
  }

  getNotes(): string {
    return this.comment;
  }

  isTranslatable(): boolean {
    return !isCommentType(this.fluentType);
  }

  isHeader(): boolean {
    return isCommentType(this.fluentType);
  }

  /** Whether the unit has nothing to write; such units are left out of the file. */
  isEmpty(): boolean {
    return this.isTranslatable() && this.source.trim() === '';
  }

  /**
   * References used by the value and attributes, first occurrence first.
   * Throws SourceSyntaxError when the current source does not parse.
   */
  get placeholders(): string[] {
    const entry = this.parse();
    return entry === null ? [] : collectReferences(entry);
  }

  getParts(): FluentUnitParts {
    const entry = this.parse();
    return entry === null ? { value: null, attributes: [] } : entryToParts(entry);
  }

  setParts(parts: FluentUnitParts): void {
    this.source = composeSource(parts);
  }

  /** The entry this unit writes, or null when it writes nothing. */
  toEntry(): Entry | null {
    const content = this.comment;
    switch (this.fluentType) {
      case 'DetachedComment':
        return { type: 'Comment', content };
      case 'GroupComment':
        return { type: 'GroupComment', content };
      case 'ResourceComment':
        return { type: 'ResourceComment', content };
      default:
        break;
    }

    const entry = this.parse();
    if (entry === null) {
      return null;
    }
    const comment: Comment | null = content === '' ? null : { type: 'Comment', content };
    return { ...entry, comment };
  }

  private parse(): TranslatableEntry | null {
    if (this.isHeader()) {
      return null;
    }
    if (this.parsed !== null && this.parsed.source === this.source && this.parsed.id === this.id) {
      return this.parsed.entry;
    }

    const entry = parseUnitSource(this.id, this.fluentType, this.source);
    this.parsed = { source: this.source, id: this.id, entry };
    return entry;
  }
}
