import chalk from 'chalk';
import { createTwoFilesPatch } from 'diff';
import { FluentFile } from '../core/fluent-file';
import { Patch } from '../types';

export class DiffGenerator {
  static generatePatch(filePath: string, originalContent: string, modifiedContent: string): Patch {
    const diff = createTwoFilesPatch(filePath, filePath, originalContent, modifiedContent, 'original', 'modified', {
      context: 3
    });

    return {
      path: filePath,
      diff,
      format: 'unified'
    };
  }

  /** Patches for every file whose fixed serialization differs from the original. */
  static generatePatches(originalFiles: Map<string, FluentFile>, modifiedFiles: Map<string, FluentFile>): Patch[] {
    const patches: Patch[] = [];

    for (const [filePath, modifiedFile] of modifiedFiles) {
      const originalFile = originalFiles.get(filePath);
      if (!originalFile) continue;

      const original = originalFile.serialize();
      const modified = modifiedFile.serialize();
      if (original !== modified) {
        patches.push(this.generatePatch(filePath, original, modified));
      }
    }

    return patches;
  }

  static formatPatchForDisplay(patch: Patch): string {
    return patch.diff
      .split('\n')
      .map(line => {
        if (line.startsWith('+++') || line.startsWith('---')) return chalk.cyan(line);
        if (line.startsWith('@@')) return chalk.magenta(line);
        if (line.startsWith('+')) return chalk.green(line);
        if (line.startsWith('-')) return chalk.red(line);
        return line;
      })
      .join('\n');
  }
}
