import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { FtlkitConfig } from '../types';

export const ConfigSchema = z.object({
  localesPath: z.string().min(1),
  sourceLocale: z.string().min(1),
  targetLocales: z.array(z.string().min(1)),
  filePattern: z.string().default('**/*.ftl'),
  preferOrder: z.enum(['mirror-source', 'alphabetical']).optional(),
  concurrency: z.number().int().positive().default(4),
  reportPath: z.string().default('ftlkit-report.json')
});

export const DEFAULT_CONFIG_FILES = ['ftlkit.config.json', 'ftlkit.config.yaml', 'ftlkit.config.yml'];

export interface ConfigOverrides {
  config?: string;
  path?: string;
  source?: string;
  targets?: string[];
  pattern?: string;
  order?: string;
  concurrency?: string | number;
  output?: string;
}

export function parseConfigText(content: string, fileName: string): unknown {
  const ext = path.extname(fileName).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? YAML.parse(content) : JSON.parse(content);
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const content = await fs.readFile(configPath, 'utf-8');
  const parsed: unknown = parseConfigText(content, configPath);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file ${configPath} must contain an object`);
  }
  return { ...parsed };
}

async function findDefaultConfig(cwd: string): Promise<string | null> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.resolve(cwd, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        continue;
      }
      throw error;
    }
  }
  return null;
}

/**
 * Read the config file (an explicit `--config`, or the first default file
 * found in `cwd`), apply command-line overrides and validate the result.
 */
export async function loadConfig(options: ConfigOverrides = {}, cwd = process.cwd()): Promise<FtlkitConfig> {
  let config: Record<string, unknown> = {};

  const configPath = options.config ? path.resolve(cwd, options.config) : await findDefaultConfig(cwd);
  if (configPath) {
    try {
      config = await readConfigFile(configPath);
    } catch (error) {
      throw new Error(`Failed to load config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (options.path) config.localesPath = options.path;
  if (options.source) config.sourceLocale = options.source;
  if (options.targets) config.targetLocales = options.targets;
  if (options.pattern) config.filePattern = options.pattern;
  if (options.order) config.preferOrder = options.order;
  if (options.concurrency !== undefined) config.concurrency = Number(options.concurrency);
  if (options.output) config.reportPath = options.output;

  return ConfigSchema.parse(config);
}
