import { stringify as csvStringify } from 'csv-stringify/sync';
import { Fix, FtlkitConfig, FtlkitReport, IssueType, LocaleReport, LocaleSummary, Patch, ValidationIssue } from '../types';

export class ReportGenerator {
  static generateReport(
    config: Pick<FtlkitConfig, 'sourceLocale' | 'preferOrder'>,
    filesScanned: number,
    localeReports: Map<string, LocaleReport>,
    appliedFixes: Map<string, Fix[]>,
    patches: Patch[]
  ): FtlkitReport {
    const perLocale: Record<string, LocaleSummary> = {};
    for (const [locale, report] of localeReports) {
      perLocale[locale] = this.generateLocaleSummary(report);
    }

    const proposedFixes: Fix[] = [];
    for (const fixes of appliedFixes.values()) {
      proposedFixes.push(...fixes);
    }

    return {
      summary: this.generateSummary(config, filesScanned, localeReports, proposedFixes),
      perLocale,
      proposedFixes,
      patches
    };
  }

  private static generateSummary(
    config: Pick<FtlkitConfig, 'sourceLocale' | 'preferOrder'>,
    filesScanned: number,
    localeReports: Map<string, LocaleReport>,
    fixes: Fix[]
  ): FtlkitReport['summary'] {
    const issues: Record<IssueType, number> = {
      missing: 0,
      extra: 0,
      duplicate: 0,
      placeholderMismatch: 0,
      attributeMismatch: 0,
      syntaxError: 0,
      empty: 0
    };

    for (const report of localeReports.values()) {
      for (const issue of report.issues) {
        issues[issue.type]++;
      }
    }

    const notes: string[] = [];
    if (config.preferOrder === 'mirror-source') {
      notes.push('Mirror source order');
    } else if (config.preferOrder === 'alphabetical') {
      notes.push('Alphabetical order');
    }
    if (fixes.length > 0) {
      notes.push(`${fixes.length} fixes applied`);
    }

    return {
      sourceLocale: config.sourceLocale,
      targetLocales: Array.from(localeReports.keys()),
      filesScanned,
      issues,
      autoFixed: fixes.length > 0,
      notes
    };
  }

  private static generateLocaleSummary(report: LocaleReport): LocaleSummary {
    const result: LocaleSummary = {
      missingIds: [],
      extraIds: [],
      duplicates: [],
      placeholderMismatches: [],
      attributeMismatches: [],
      syntaxErrors: [],
      emptyUnits: []
    };

    for (const issue of report.issues) {
      const id = issue.id === '' ? issue.file : `${issue.file}:${issue.id}`;
      switch (issue.type) {
        case 'missing':
          result.missingIds.push(id);
          break;
        case 'extra':
          result.extraIds.push(id);
          break;
        case 'duplicate':
          result.duplicates.push(id);
          break;
        case 'placeholderMismatch':
          result.placeholderMismatches.push({
            id,
            source: issue.sourceValue ?? '',
            target: issue.targetValue ?? ''
          });
          break;
        case 'attributeMismatch':
          result.attributeMismatches.push({ id, message: issue.message });
          break;
        case 'syntaxError':
          result.syntaxErrors.push({ id, message: issue.message });
          break;
        case 'empty':
          result.emptyUnits.push(id);
          break;
      }
    }

    return result;
  }

  /** One row per issue, with a header line. */
  static generateCsv(localeReports: Map<string, LocaleReport>): string {
    const issues: ValidationIssue[] = [];
    for (const report of localeReports.values()) {
      issues.push(...report.issues);
    }

    return csvStringify(
      issues.map(issue => ({
        locale: issue.locale,
        file: issue.file,
        id: issue.id,
        type: issue.type,
        severity: issue.severity,
        message: issue.message
      })),
      {
        header: true,
        columns: ['locale', 'file', 'id', 'type', 'severity', 'message']
      }
    );
  }
}
