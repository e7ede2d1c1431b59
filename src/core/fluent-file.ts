import { TranslationStore } from '../types';
import { Entry } from './fluent-ast';
import { parseFluent } from './fluent-parser';
import { serializeResource } from './fluent-serializer';
import { FluentUnit } from './fluent-unit';

const BOM = '\uFEFF';

function decode(input: string | Buffer): string {
  const text = typeof input === 'string' ? input : input.toString('utf-8');
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

/** An ordered list of Fluent units read from, and written back to, one `.ftl` resource. */
export class FluentFile implements TranslationStore<FluentUnit> {
  static readonly extensions = ['ftl'];

  units: FluentUnit[] = [];
  fileName?: string;

  constructor(input?: string | Buffer, fileName?: string) {
    this.fileName = fileName;
    if (input !== undefined) {
      this.units = FluentFile.readUnits(decode(input));
    }
  }

  /** Throws FluentParseError listing every entry that failed to parse. */
  static parse(input: string | Buffer, fileName?: string): FluentFile {
    return new FluentFile(input, fileName);
  }

  private static readUnits(text: string): FluentUnit[] {
    const resource = parseFluent(text);
    const units: FluentUnit[] = [];
    for (const entry of resource.body) {
      if (entry.type !== 'Junk') {
        units.push(FluentUnit.fromEntry(entry));
      }
    }
    return units;
  }

  addUnit(unit: FluentUnit): void {
    this.units.push(unit);
  }

  /** First Message or Term with this id. */
  findUnit(id: string): FluentUnit | undefined {
    return this.units.find(unit => unit.isTranslatable() && unit.getId() === id);
  }

  removeUnit(unit: FluentUnit): boolean {
    const index = this.units.indexOf(unit);
    if (index === -1) {
      return false;
    }
    this.units.splice(index, 1);
    return true;
  }

  getIds(): string[] {
    return this.units.filter(unit => unit.isTranslatable()).map(unit => unit.getId());
  }

  /**
   * Canonical Fluent text of every unit. A unit whose source fails to parse
   * aborts the whole call with a SourceSyntaxError.
   */
  serialize(): string {
    const body: Entry[] = [];
    for (const unit of this.units) {
      const entry = unit.toEntry();
      if (entry !== null) {
        body.push(entry);
      }
    }
    return serializeResource({ type: 'Resource', body });
  }

  toBuffer(): Buffer {
    return Buffer.from(this.serialize(), 'utf-8');
  }
}
