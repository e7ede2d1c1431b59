#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import pLimit from 'p-limit';
import { Fix, FtlkitConfig, LocaleReport } from './types';
import { FluentFile } from './core/fluent-file';
import { FluentUnit } from './core/fluent-unit';
import { Fixer } from './core/fixer';
import { ReportGenerator } from './core/report-generator';
import { LocaleStore, StoreDirectory, StoreFactory } from './core/store-factory';
import { Validator } from './core/validator';
import { DiffGenerator } from './utils/diff-generator';
import { ConfigOverrides, loadConfig } from './utils/config-loader';

interface FormatOptions {
  check?: boolean;
  write?: boolean;
  concurrency: string;
}

interface CheckOptions extends ConfigOverrides {
  csv?: string;
}

const program = new Command();

program
  .name('ftlkit')
  .description('Parse, format and check Fluent (.ftl) localization files')
  .version('0.1.0');

program
  .command('parse <file>')
  .description('Print the units of a Fluent file (or directory) as JSON')
  .action(async (file: string) => {
    try {
      const opened = await StoreFactory.openStore(path.resolve(file));
      const stores = opened instanceof StoreDirectory ? await opened.openAll() : [opened];
      const output = stores.map(store => ({
        fileName: store.fileName,
        units: store.units.map(describeUnit)
      }));
      console.log(JSON.stringify(output.length === 1 ? output[0] : output, null, 2));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('format <files...>')
  .description('Re-serialize Fluent files in canonical form')
  .option('--check', 'Print a diff and exit with 1 when a file is not canonical')
  .option('--write', 'Rewrite files in place')
  .option('-j, --concurrency <n>', 'Files processed at once', '4')
  .action(async (files: string[], options: FormatOptions) => {
    try {
      const changed = await formatFiles(files, options);
      if (options.check && changed > 0) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('check')
  .description('Check target locales against the source locale')
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --path <path>', 'Locales directory')
  .option('-s, --source <locale>', 'Source locale')
  .option('-t, --targets <locales...>', 'Target locales')
  .option('--pattern <pattern>', 'File pattern inside each locale directory')
  .option('-o, --output <path>', 'JSON report path')
  .option('--csv <path>', 'Also write issues as CSV')
  .action(async (options: CheckOptions) => {
    try {
      const config = await loadConfig(options);
      const hasErrors = await runCheck(config, { fix: false, csv: options.csv });
      if (hasErrors) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('fix')
  .description('Add missing entries, remove extra and duplicate ones, and write the files')
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --path <path>', 'Locales directory')
  .option('-s, --source <locale>', 'Source locale')
  .option('-t, --targets <locales...>', 'Target locales')
  .option('--order <order>', 'Reorder entries: mirror-source or alphabetical')
  .action(async (options: CheckOptions) => {
    try {
      const config = await loadConfig(options);
      await runCheck(config, { fix: true });
    } catch (error) {
      fail(error);
    }
  });

program.parse();

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

function describeUnit(unit: FluentUnit): Record<string, unknown> {
  return {
    id: unit.getId(),
    type: unit.fluentType,
    source: unit.source,
    comment: unit.getNotes(),
    placeholders: unit.placeholders
  };
}

async function expandPaths(files: string[]): Promise<string[]> {
  const expanded: string[] = [];
  for (const file of files) {
    const opened = await fs.stat(file);
    if (opened.isDirectory()) {
      const directory = await StoreFactory.openStore(file);
      if (directory instanceof StoreDirectory) {
        expanded.push(...directory.fileNames.map(name => path.join(file, name)));
      }
    } else {
      expanded.push(file);
    }
  }
  return expanded;
}

async function formatFiles(files: string[], options: FormatOptions): Promise<number> {
  const paths = await expandPaths(files);
  const results = await StoreFactory.formatFiles(paths, Number(options.concurrency) || 1);

  if (!options.check && !options.write) {
    results.forEach(result => process.stdout.write(result.formatted));
    return 0;
  }

  let changed = 0;
  for (const { path: filePath, original, formatted, store } of results) {
    if (formatted === original) {
      continue;
    }

    changed++;
    if (options.check) {
      console.log(DiffGenerator.formatPatchForDisplay(DiffGenerator.generatePatch(filePath, original, formatted)));
    }
    if (options.write) {
      await StoreFactory.writeStore(store, filePath);
      console.log(chalk.green(`  ✓ ${filePath}`));
    }
  }

  if (options.check) {
    console.log(changed === 0 ? chalk.green('All files are canonical') : chalk.yellow(`${changed} file(s) would change`));
  }
  return changed;
}

async function loadLocaleStores(config: FtlkitConfig): Promise<{
  all: LocaleStore[];
  sourceFiles: LocaleStore[];
  targetFiles: LocaleStore[];
}> {
  const factory = new StoreFactory(config);
  const files = await factory.discoverLocaleFiles(path.resolve(config.localesPath));
  if (files.length === 0) {
    throw new Error(`No Fluent files found in ${config.localesPath}`);
  }

  const all = await factory.loadLocaleFiles(files);
  const sourceFiles = all.filter(file => file.locale === config.sourceLocale);
  if (sourceFiles.length === 0) {
    const available = [...new Set(all.map(file => file.locale))].join(', ');
    throw new Error(`Source locale '${config.sourceLocale}' not found. Available locales: ${available}`);
  }

  const broken = sourceFiles.find(file => file.error !== undefined);
  if (broken?.error) {
    throw broken.error;
  }

  const targetFiles = all.filter(file => config.targetLocales.includes(file.locale));
  return { all, sourceFiles, targetFiles };
}

async function runCheck(config: FtlkitConfig, options: { fix: boolean; csv?: string }): Promise<boolean> {
  const spinner = ora('Scanning locale files...').start();

  try {
    const { all, sourceFiles, targetFiles } = await loadLocaleStores(config);
    spinner.succeed(`Found ${all.length} Fluent files`);

    const reports = new Validator(sourceFiles, targetFiles).validate();
    displayValidationResults(reports);

    const originals = new Map<string, FluentFile>();
    const fixed = new Map<string, FluentFile>();
    const appliedFixes = new Map<string, Fix[]>();

    if (options.fix) {
      spinner.start('Applying fixes...');
      for (const locale of config.targetLocales) {
        const issues = reports.get(locale)?.issues ?? [];
        for (const sourceFile of sourceFiles) {
          if (sourceFile.store === null) continue;

          const targetFile = targetFiles.find(
            file => file.locale === locale && file.relativePath === sourceFile.relativePath
          );
          if (targetFile && targetFile.store === null) continue;

          const targetPath = targetFile?.path ?? path.join(path.resolve(config.localesPath), locale, sourceFile.relativePath);
          const targetStore = targetFile?.store ?? new FluentFile(undefined, targetPath);
          const fileIssues = targetFile
            ? issues.filter(issue => issue.file === sourceFile.relativePath)
            : sourceFile.store.getIds().map(id => ({
                type: 'missing' as const,
                locale,
                file: sourceFile.relativePath,
                id,
                message: `"${id}" is missing`,
                severity: 'error' as const
              }));

          const { fixedFile, appliedFixes: fixes } = new Fixer(config, sourceFile.store).autoFix(targetStore, fileIssues);
          originals.set(targetPath, targetStore);
          fixed.set(targetPath, fixedFile);
          appliedFixes.set(locale, [...(appliedFixes.get(locale) ?? []), ...fixes]);
        }
      }
      const total = Array.from(appliedFixes.values()).flat().length;
      spinner.succeed(`Applied ${total} fixes`);
    }

    spinner.start('Generating report...');
    const patches = DiffGenerator.generatePatches(originals, fixed);
    const report = ReportGenerator.generateReport(config, all.length, reports, appliedFixes, patches);
    await fs.writeFile(config.reportPath, JSON.stringify(report, null, 2));
    if (options.csv) {
      await fs.writeFile(options.csv, ReportGenerator.generateCsv(reports));
    }
    spinner.succeed(`Report saved to ${config.reportPath}`);

    if (options.fix && patches.length > 0) {
      spinner.start('Writing updated files...');
      const limit = pLimit(config.concurrency);
      await Promise.all(
        patches.map(patch =>
          limit(async () => {
            const file = fixed.get(patch.path);
            if (file) {
              await StoreFactory.writeStore(file, patch.path);
            }
          })
        )
      );
      spinner.succeed(`Updated ${patches.length} files`);
    }

    return Array.from(reports.values()).some(r => r.issues.some(issue => issue.severity === 'error'));
  } catch (error) {
    spinner.fail('Operation failed');
    throw error;
  }
}

function displayValidationResults(reports: Map<string, LocaleReport>): void {
  console.log('\n' + chalk.bold('Validation Results:'));

  for (const [locale, report] of reports) {
    const { stats } = report;
    console.log(`\n${chalk.cyan(locale)}:`);

    if (report.issues.length === 0) {
      console.log(chalk.green('  ✓ No issues found'));
      continue;
    }

    const lines: Array<[number, string, 'error' | 'warning']> = [
      [stats.missingIds, 'Missing ids', 'error'],
      [stats.extraIds, 'Extra ids', 'warning'],
      [stats.duplicates, 'Duplicate ids', 'error'],
      [stats.placeholderMismatches, 'Placeholder mismatches', 'error'],
      [stats.attributeMismatches, 'Attribute mismatches', 'error'],
      [stats.syntaxErrors, 'Syntax errors', 'error'],
      [stats.emptyUnits, 'Empty entries', 'warning']
    ];
    for (const [count, label, severity] of lines) {
      if (count === 0) continue;
      console.log(severity === 'error' ? chalk.red(`  ✗ ${label}: ${count}`) : chalk.yellow(`  ⚠ ${label}: ${count}`));
    }
  }
}
