import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { FluentFile } from '../src/core/fluent-file';
import { Fixer } from '../src/core/fixer';
import { ReportGenerator } from '../src/core/report-generator';
import { Validator } from '../src/core/validator';
import { Fix, LocaleReport } from '../src/types';
import { DiffGenerator } from '../src/utils/diff-generator';

function reportFor(sourceText: string, targetText: string): LocaleReport {
  const locale = (text: string, name: string) => ({
    locale: name,
    relativePath: 'main.ftl',
    path: `${name}/main.ftl`,
    store: FluentFile.parse(text)
  });
  const report = new Validator([locale(sourceText, 'en')], [locale(targetText, 'fr')]).validate().get('fr');
  if (!report) {
    throw new Error('Expected a report for fr');
  }
  return report;
}

describe('ReportGenerator', () => {
  it('summarises issues and fixes', () => {
    const source = FluentFile.parse('a = A\nb = B\n');
    const target = FluentFile.parse('a = A\nc = C\n');
    const report = reportFor('a = A\nb = B\n', 'a = A\nc = C\n');
    const { appliedFixes } = new Fixer({}, source).autoFix(target, report.issues);

    const result = ReportGenerator.generateReport(
      { sourceLocale: 'en', preferOrder: 'alphabetical' },
      2,
      new Map([['fr', report]]),
      new Map([['fr', appliedFixes]]),
      []
    );

    expect(result.summary).toEqual({
      sourceLocale: 'en',
      targetLocales: ['fr'],
      filesScanned: 2,
      issues: {
        missing: 1,
        extra: 1,
        duplicate: 0,
        placeholderMismatch: 0,
        attributeMismatch: 0,
        syntaxError: 0,
        empty: 0
      },
      autoFixed: true,
      notes: ['Alphabetical order', '2 fixes applied']
    });
    expect(result.perLocale.fr.missingIds).toEqual(['main.ftl:b']);
    expect(result.perLocale.fr.extraIds).toEqual(['main.ftl:c']);
    expect(result.proposedFixes.map(applied => applied.type)).toEqual(['addMissing', 'removeExtra']);
  });

  it('lists placeholder mismatches with both values', () => {
    const report = reportFor('m = Hi { $name }\n', 'm = Salut\n');
    const result = ReportGenerator.generateReport({ sourceLocale: 'en' }, 2, new Map([['fr', report]]), new Map<string, Fix[]>(), []);

    expect(result.perLocale.fr.placeholderMismatches).toEqual([
      { id: 'main.ftl:m', source: 'Hi { $name }', target: 'Salut' }
    ]);
    expect(result.summary.autoFixed).toBe(false);
    expect(result.summary.notes).toEqual([]);
  });

  it('writes issues as CSV', () => {
    const report = reportFor('a = A\nb = B\n', 'a = A\nc = C\n');
    expect(ReportGenerator.generateCsv(new Map([['fr', report]]))).toBe(
      'locale,file,id,type,severity,message\n' +
        'fr,main.ftl,b,missing,error,"""b"" is missing"\n' +
        'fr,main.ftl,c,extra,warning,"""c"" is not in the source locale"\n'
    );
  });
});

describe('DiffGenerator', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('produces a unified diff of the change', () => {
    const patch = DiffGenerator.generatePatch('fr/main.ftl', 'a = 1\nb = 2\n', 'a = 1\nb = 3\n');
    expect(patch.path).toBe('fr/main.ftl');
    expect(patch.format).toBe('unified');
    expect(patch.diff).toContain('\n-b = 2\n+b = 3\n');
  });

  it('only patches files whose output changed', () => {
    const same = FluentFile.parse('a = 1\n');
    const changed = FluentFile.parse('a = 1\nb = 2\n');
    const patches = DiffGenerator.generatePatches(
      new Map([
        ['same.ftl', same],
        ['changed.ftl', FluentFile.parse('a = 1\n')]
      ]),
      new Map([
        ['same.ftl', same],
        ['changed.ftl', changed]
      ])
    );

    expect(patches.map(patch => patch.path)).toEqual(['changed.ftl']);
    expect(patches[0].diff).toContain('\n+b = 2\n');
  });

  it('displays the diff text unchanged without colour support', () => {
    const patch = DiffGenerator.generatePatch('main.ftl', 'a = 1\n', 'a = 2\n');
    expect(DiffGenerator.formatPatchForDisplay(patch)).toBe(patch.diff);
  });
});
