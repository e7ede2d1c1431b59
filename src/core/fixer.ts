import * as lodash from 'lodash';
import { Fix, FtlkitConfig, ValidationIssue } from '../types';
import { FluentFile } from './fluent-file';
import { FluentUnit } from './fluent-unit';

export class Fixer {
  private config: Pick<FtlkitConfig, 'preferOrder'>;
  private sourceFile: FluentFile;

  constructor(config: Pick<FtlkitConfig, 'preferOrder'>, sourceFile: FluentFile) {
    this.config = config;
    this.sourceFile = sourceFile;
  }

  /** Apply fixes for `issues` to a copy of `targetFile`; the input is left untouched. */
  autoFix(targetFile: FluentFile, issues: ValidationIssue[]): { fixedFile: FluentFile; appliedFixes: Fix[] } {
    const fixedFile = lodash.cloneDeep(targetFile);
    const appliedFixes: Fix[] = [];
    const handled = new Set<string>();

    for (const issue of issues) {
      const key = `${issue.type}\u0000${issue.id}`;
      if (handled.has(key)) {
        continue;
      }
      handled.add(key);

      const fix = this.generateFix(issue, fixedFile);
      if (fix && this.applyFix(fix, fixedFile)) {
        appliedFixes.push(fix);
      }
    }

    if (this.config.preferOrder === 'mirror-source') {
      this.reorderToMatchSource(fixedFile);
    } else if (this.config.preferOrder === 'alphabetical') {
      this.reorderAlphabetically(fixedFile);
    }

    return { fixedFile, appliedFixes };
  }

  private generateFix(issue: ValidationIssue, targetFile: FluentFile): Fix | null {
    switch (issue.type) {
      case 'missing': {
        const sourceUnit = this.sourceFile.findUnit(issue.id);
        if (sourceUnit === undefined) {
          return null;
        }
        return {
          type: 'addMissing',
          locale: issue.locale,
          file: issue.file,
          id: issue.id,
          newValue: sourceUnit.source,
          description: `Add missing "${issue.id}" copied from the source locale`
        };
      }

      case 'extra':
        return {
          type: 'removeExtra',
          locale: issue.locale,
          file: issue.file,
          id: issue.id,
          oldValue: targetFile.findUnit(issue.id)?.source,
          description: `Remove "${issue.id}", which is not in the source locale`
        };

      case 'duplicate':
        return {
          type: 'removeDuplicate',
          locale: issue.locale,
          file: issue.file,
          id: issue.id,
          oldValue: issue.targetValue,
          description: `Keep only the first definition of "${issue.id}"`
        };

      default:
        return null;
    }
  }

  private applyFix(fix: Fix, targetFile: FluentFile): boolean {
    switch (fix.type) {
      case 'addMissing': {
        const sourceUnit = this.sourceFile.findUnit(fix.id);
        if (sourceUnit === undefined || targetFile.findUnit(fix.id) !== undefined) {
          return false;
        }
        targetFile.addUnit(lodash.cloneDeep(sourceUnit));
        return true;
      }

      case 'removeExtra': {
        const before = targetFile.units.length;
        targetFile.units = targetFile.units.filter(unit => !unit.isTranslatable() || unit.getId() !== fix.id);
        return targetFile.units.length < before;
      }

      case 'removeDuplicate': {
        const first = targetFile.findUnit(fix.id);
        const before = targetFile.units.length;
        targetFile.units = targetFile.units.filter(
          unit => unit === first || !unit.isTranslatable() || unit.getId() !== fix.id
        );
        return targetFile.units.length < before;
      }
    }
  }

  private reorderToMatchSource(targetFile: FluentFile): void {
    const sourceIds = this.sourceFile.getIds();
    const rank = (unit: FluentUnit): number => {
      const index = sourceIds.indexOf(unit.getId());
      return index === -1 ? sourceIds.length : index;
    };
    this.reorderTranslatable(targetFile, (a, b) => rank(a) - rank(b));
  }

  private reorderAlphabetically(targetFile: FluentFile): void {
    this.reorderTranslatable(targetFile, (a, b) => (a.getId() < b.getId() ? -1 : a.getId() > b.getId() ? 1 : 0));
  }

  // Comment units keep their positions; messages and terms are sorted into the remaining slots.
  private reorderTranslatable(targetFile: FluentFile, compare: (a: FluentUnit, b: FluentUnit) => number): void {
    const sorted = targetFile.units.filter(unit => unit.isTranslatable()).sort(compare);
    let next = 0;
    targetFile.units = targetFile.units.map(unit => (unit.isTranslatable() ? sorted[next++] : unit));
  }
}
