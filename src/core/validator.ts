import { LocaleReport, ValidationIssue } from '../types';
import { SourceSyntaxError } from './errors';
import { FluentFile } from './fluent-file';
import { FluentUnit } from './fluent-unit';
import { LocaleStore } from './store-factory';

function sameMembers(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every(item => right.has(item));
}

export class Validator {
  private sourceFiles: LocaleStore[];
  private targetFiles: LocaleStore[];

  constructor(sourceFiles: LocaleStore[], targetFiles: LocaleStore[]) {
    this.sourceFiles = sourceFiles;
    this.targetFiles = targetFiles;
  }

  /** One report per target locale, keyed by locale. */
  validate(): Map<string, LocaleReport> {
    const reports = new Map<string, LocaleReport>();
    const locales = [...new Set(this.targetFiles.map(file => file.locale))];

    for (const locale of locales) {
      const issues = this.validateLocale(locale);
      reports.set(locale, { locale, issues, stats: this.calculateStats(issues) });
    }

    return reports;
  }

  private validateLocale(locale: string): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const targets = this.targetFiles.filter(file => file.locale === locale);

    for (const sourceFile of this.sourceFiles) {
      const targetFile = targets.find(file => file.relativePath === sourceFile.relativePath);
      const source = sourceFile.store;
      if (source === null) {
        continue;
      }

      if (targetFile === undefined) {
        issues.push(...this.checkMissingIds(locale, sourceFile.relativePath, source, new FluentFile()));
        continue;
      }
      if (targetFile.store === null) {
        issues.push(this.fileSyntaxIssue(targetFile));
        continue;
      }

      issues.push(...this.validateFile(locale, sourceFile.relativePath, source, targetFile.store));
    }

    // Target files with no source counterpart: every id in them is extra.
    for (const targetFile of targets) {
      if (this.sourceFiles.some(file => file.relativePath === targetFile.relativePath)) {
        continue;
      }
      if (targetFile.store === null) {
        issues.push(this.fileSyntaxIssue(targetFile));
        continue;
      }
      issues.push(...this.checkExtraIds(locale, targetFile.relativePath, new FluentFile(), targetFile.store));
    }

    return issues;
  }

  validateFile(locale: string, file: string, source: FluentFile, target: FluentFile): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    issues.push(...this.checkMissingIds(locale, file, source, target));
    issues.push(...this.checkExtraIds(locale, file, source, target));
    issues.push(...this.checkDuplicates(locale, file, target));
    issues.push(...this.checkEmptyUnits(locale, file, target));
    issues.push(...this.checkUnitContents(locale, file, source, target));

    return issues;
  }

  private checkMissingIds(locale: string, file: string, source: FluentFile, target: FluentFile): ValidationIssue[] {
    const targetIds = new Set(target.getIds());

    return [...new Set(source.getIds())]
      .filter(id => !targetIds.has(id))
      .map(id => ({
        type: 'missing' as const,
        locale,
        file,
        id,
        message: `"${id}" is missing`,
        severity: 'error' as const,
        sourceValue: source.findUnit(id)?.source
      }));
  }

  private checkExtraIds(locale: string, file: string, source: FluentFile, target: FluentFile): ValidationIssue[] {
    const sourceIds = new Set(source.getIds());

    return [...new Set(target.getIds())]
      .filter(id => !sourceIds.has(id))
      .map(id => ({
        type: 'extra' as const,
        locale,
        file,
        id,
        message: `"${id}" is not in the source locale`,
        severity: 'warning' as const,
        targetValue: target.findUnit(id)?.source
      }));
  }

  private checkDuplicates(locale: string, file: string, target: FluentFile): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const seen = new Set<string>();

    for (const unit of target.units) {
      if (!unit.isTranslatable()) {
        continue;
      }
      const id = unit.getId();
      if (seen.has(id)) {
        issues.push({
          type: 'duplicate',
          locale,
          file,
          id,
          message: `"${id}" is defined more than once`,
          severity: 'error',
          targetValue: unit.source,
          suggestion: 'Remove all but the first definition'
        });
      }
      seen.add(id);
    }

    return issues;
  }

  private checkEmptyUnits(locale: string, file: string, target: FluentFile): ValidationIssue[] {
    return target.units
      .filter(unit => unit.isEmpty())
      .map(unit => ({
        type: 'empty' as const,
        locale,
        file,
        id: unit.getId(),
        message: `"${unit.getId()}" has no value and will not be written`,
        severity: 'warning' as const
      }));
  }

  /** Compare placeholders and attribute ids of units present on both sides. */
  private checkUnitContents(locale: string, file: string, source: FluentFile, target: FluentFile): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const id of new Set(target.getIds())) {
      const sourceUnit = source.findUnit(id);
      const targetUnit = target.findUnit(id);
      if (sourceUnit === undefined || targetUnit === undefined || targetUnit.isEmpty()) {
        continue;
      }

      const targetShape = this.shapeOf(targetUnit);
      if (targetShape instanceof SourceSyntaxError) {
        issues.push({
          type: 'syntaxError',
          locale,
          file,
          id,
          message: targetShape.message,
          severity: 'error',
          targetValue: targetUnit.source
        });
        continue;
      }

      const sourceShape = this.shapeOf(sourceUnit);
      if (sourceShape instanceof SourceSyntaxError) {
        continue;
      }

      if (!sameMembers(sourceShape.placeholders, targetShape.placeholders)) {
        issues.push({
          type: 'placeholderMismatch',
          locale,
          file,
          id,
          message: `Placeholder mismatch: expected [${sourceShape.placeholders.join(', ')}], found [${targetShape.placeholders.join(', ')}]`,
          severity: 'error',
          sourceValue: sourceUnit.source,
          targetValue: targetUnit.source
        });
      }

      if (!sameMembers(sourceShape.attributes, targetShape.attributes)) {
        issues.push({
          type: 'attributeMismatch',
          locale,
          file,
          id,
          message: `Attribute mismatch: expected [${sourceShape.attributes.join(', ')}], found [${targetShape.attributes.join(', ')}]`,
          severity: 'error',
          sourceValue: sourceUnit.source,
          targetValue: targetUnit.source
        });
      }
    }

    return issues;
  }

  private shapeOf(unit: FluentUnit): { placeholders: string[]; attributes: string[] } | SourceSyntaxError {
    try {
      return {
        placeholders: unit.placeholders,
        attributes: unit.getParts().attributes.map(attribute => attribute.id)
      };
    } catch (error) {
      if (error instanceof SourceSyntaxError) {
        return error;
      }
      throw error;
    }
  }

  private fileSyntaxIssue(file: LocaleStore): ValidationIssue {
    const [problem] = file.error?.problems ?? [];
    return {
      type: 'syntaxError',
      locale: file.locale,
      file: file.relativePath,
      id: '',
      message: problem
        ? `${problem.code}: ${problem.message} [line ${problem.line}, column ${problem.column}]`
        : 'File could not be parsed',
      severity: 'error'
    };
  }

  private calculateStats(issues: ValidationIssue[]): LocaleReport['stats'] {
    const sourceIds = new Set<string>();
    for (const file of this.sourceFiles) {
      for (const id of file.store?.getIds() ?? []) {
        sourceIds.add(`${file.relativePath}\u0000${id}`);
      }
    }

    const stats: LocaleReport['stats'] = {
      totalIds: sourceIds.size,
      missingIds: 0,
      extraIds: 0,
      duplicates: 0,
      placeholderMismatches: 0,
      attributeMismatches: 0,
      syntaxErrors: 0,
      emptyUnits: 0
    };

    for (const issue of issues) {
      switch (issue.type) {
        case 'missing':
          stats.missingIds++;
          break;
        case 'extra':
          stats.extraIds++;
          break;
        case 'duplicate':
          stats.duplicates++;
          break;
        case 'placeholderMismatch':
          stats.placeholderMismatches++;
          break;
        case 'attributeMismatch':
          stats.attributeMismatches++;
          break;
        case 'syntaxError':
          stats.syntaxErrors++;
          break;
        case 'empty':
          stats.emptyUnits++;
          break;
      }
    }

    return stats;
  }
}
