import { describe, it, expect } from 'vitest';
import { FluentParseError } from '../src/core/errors';
import { FluentFile } from '../src/core/fluent-file';
import { LocaleStore } from '../src/core/store-factory';
import { Validator } from '../src/core/validator';

function localeStore(locale: string, text: string, relativePath = 'main.ftl'): LocaleStore {
  const base = { locale, relativePath, path: `${locale}/${relativePath}` };
  try {
    return { ...base, store: FluentFile.parse(text) };
  } catch (error) {
    if (error instanceof FluentParseError) {
      return { ...base, store: null, error };
    }
    throw error;
  }
}

const SOURCE = 'hello = Hello { $name }\n    .title = Greeting\nbye = Bye\n-brand = Ftl\n';

describe('Validator', () => {
  it('reports every kind of mismatch between source and target', () => {
    const target = 'hello = Bonjour\n    .title = Salut\n    .extra = X\nbye = Au revoir\nbye = Salut\nstale = Old\n';
    const reports = new Validator([localeStore('en', SOURCE)], [localeStore('fr', target)]).validate();
    const report = reports.get('fr');

    expect(report?.issues.map(issue => [issue.type, issue.id, issue.severity])).toEqual([
      ['missing', '-brand', 'error'],
      ['extra', 'stale', 'warning'],
      ['duplicate', 'bye', 'error'],
      ['placeholderMismatch', 'hello', 'error'],
      ['attributeMismatch', 'hello', 'error']
    ]);
    expect(report?.issues[3].message).toBe('Placeholder mismatch: expected [$name], found []');
    expect(report?.issues[4].message).toBe('Attribute mismatch: expected [title], found [title, extra]');
    expect(report?.issues[2]).toMatchObject({
      message: '"bye" is defined more than once',
      targetValue: 'Salut',
      suggestion: 'Remove all but the first definition'
    });
    expect(report?.stats).toEqual({
      totalIds: 3,
      missingIds: 1,
      extraIds: 1,
      duplicates: 1,
      placeholderMismatches: 1,
      attributeMismatches: 1,
      syntaxErrors: 0,
      emptyUnits: 0
    });
  });

  it('compares placeholders as sets', () => {
    const source = localeStore('en', 'm = { $a } and { $b }\n');
    const target = localeStore('fr', 'm = { $b } et { $a } et { $a }\n');
    expect(new Validator([source], [target]).validate().get('fr')?.issues).toEqual([]);
  });

  it('reports every id of a missing target file', () => {
    const reports = new Validator(
      [localeStore('en', SOURCE)],
      [localeStore('fr', 'x = y\n', 'other.ftl')]
    ).validate();

    expect(reports.get('fr')?.issues.map(issue => [issue.type, issue.file, issue.id])).toEqual([
      ['missing', 'main.ftl', 'hello'],
      ['missing', 'main.ftl', 'bye'],
      ['missing', 'main.ftl', '-brand'],
      ['extra', 'other.ftl', 'x']
    ]);
  });

  it('reports an unparseable target file once', () => {
    const reports = new Validator([localeStore('en', SOURCE)], [localeStore('fr', '= oops\n')]).validate();
    expect(reports.get('fr')?.issues).toEqual([
      {
        type: 'syntaxError',
        locale: 'fr',
        file: 'main.ftl',
        id: '',
        message: 'E0002: Expected an entry start [line 1, column 1]',
        severity: 'error'
      }
    ]);
  });

  it('reports units whose source no longer parses', () => {
    const source = localeStore('en', 'a = A\nb = B\n');
    const target = localeStore('fr', 'a = A\nb = B\n');
    const unit = target.store?.findUnit('b');
    if (unit) {
      unit.source = '{';
    }

    const issues = new Validator([source], [target]).validate().get('fr')?.issues ?? [];
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      type: 'syntaxError',
      id: 'b',
      message: 'Error in source of FluentUnit "b":\nExpected an inline expression [line 1, column 2]'
    });
  });

  it('warns about empty units', () => {
    const source = localeStore('en', 'a = A\n');
    const target = localeStore('fr', 'a = A\n');
    const unit = target.store?.findUnit('a');
    if (unit) {
      unit.source = '   ';
    }

    const report = new Validator([source], [target]).validate().get('fr');
    expect(report?.issues).toEqual([
      {
        type: 'empty',
        locale: 'fr',
        file: 'main.ftl',
        id: 'a',
        message: '"a" has no value and will not be written',
        severity: 'warning'
      }
    ]);
    expect(report?.stats.emptyUnits).toBe(1);
  });
});
