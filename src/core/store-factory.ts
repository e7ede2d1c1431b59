import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import * as zlib from 'zlib';
import glob from 'fast-glob';
import pLimit from 'p-limit';
import { CompressionFormat, FtlkitConfig, LocaleFile, StoreFormat } from '../types';
import { FluentParseError, UnsupportedFormatError } from './errors';
import { FluentFile } from './fluent-file';
import { parseResource } from './fluent-parser';

const gunzip = promisify(zlib.gunzip);
const gzip = promisify(zlib.gzip);

const GZIP_MAGIC = [0x1f, 0x8b];
const BZIP2_MAGIC = 'BZh';

const EXTENSION_FORMATS: Record<string, StoreFormat> = {
  ftl: 'fluent',
  po: 'po',
  pot: 'pot',
  xliff: 'xliff',
  xlf: 'xliff',
  tmx: 'tmx',
  tbx: 'tbx'
};

const COMPRESSION_SUFFIXES: Record<string, CompressionFormat> = {
  gz: 'gzip',
  bz2: 'bzip2'
};

const IGNORED = ['**/node_modules/**', '**/build/**', '**/dist/**', '**/.*/**'];

export interface FormattedFile {
  path: string;
  original: string;
  formatted: string;
  store: FluentFile;
}

export interface FormatDetection {
  format: StoreFormat | null;
  compression: CompressionFormat | null;
}

export interface LocaleStore extends LocaleFile {
  store: FluentFile | null;
  /** Set when the file could not be parsed; `store` is then null. */
  error?: FluentParseError;
}

/** A directory of Fluent files, opened lazily. */
export class StoreDirectory {
  constructor(
    readonly dirPath: string,
    readonly fileNames: string[]
  ) {}

  async open(fileName: string): Promise<FluentFile> {
    const store = await StoreFactory.openStore(path.join(this.dirPath, fileName));
    if (store instanceof StoreDirectory) {
      throw new UnsupportedFormatError(path.join(this.dirPath, fileName), 'directory');
    }
    return store;
  }

  async openAll(concurrency = 4): Promise<FluentFile[]> {
    const limit = pLimit(concurrency);
    return Promise.all(this.fileNames.map(fileName => limit(() => this.open(fileName))));
  }
}

export class StoreFactory {
  private config: Pick<FtlkitConfig, 'sourceLocale' | 'targetLocales' | 'filePattern' | 'concurrency'>;

  constructor(config: Pick<FtlkitConfig, 'sourceLocale' | 'targetLocales' | 'filePattern' | 'concurrency'>) {
    this.config = config;
  }

  /**
   * Format and compression named by a file's extensions, e.g.
   * `menu.ftl.gz` → fluent/gzip, `file.dtd.po` → po.
   */
  static detectFormat(fileName: string): FormatDetection {
    const parts = path.basename(fileName).toLowerCase().split('.');
    let compression: CompressionFormat | null = null;

    const last = parts.length > 1 ? parts[parts.length - 1] : '';
    if (Object.hasOwn(COMPRESSION_SUFFIXES, last)) {
      compression = COMPRESSION_SUFFIXES[last];
      parts.pop();
    }

    const extension = parts.length > 1 ? parts[parts.length - 1] : '';
    const format = Object.hasOwn(EXTENSION_FORMATS, extension) ? EXTENSION_FORMATS[extension] : null;
    return { format, compression };
  }

  /** Guess the format of nameless content. */
  static sniffFormat(content: string): StoreFormat | null {
    const text = content.trimStart();
    if (text.startsWith('<')) {
      if (/<xliff[\s>]/.test(text)) return 'xliff';
      if (/<tmx[\s>]/.test(text)) return 'tmx';
      if (/<martif[\s>]/.test(text)) return 'tbx';
      return null;
    }
    if (/^msgid\s+"/m.test(text)) {
      return 'po';
    }

    const { body } = parseResource(text);
    if (body.length > 0 && body.every(entry => entry.type !== 'Junk')) {
      return 'fluent';
    }
    return null;
  }

  /**
   * Open a path or raw bytes as a store. Directories yield a StoreDirectory
   * of the Fluent files below them; gzip input is decompressed first.
   */
  static async openStore(target: string | Buffer, fileName?: string): Promise<FluentFile | StoreDirectory> {
    let data: Buffer;
    let name = fileName;

    if (typeof target === 'string') {
      const stats = await fs.stat(target);
      if (stats.isDirectory()) {
        const files = await glob('**/*.ftl', { cwd: target, ignore: IGNORED });
        return new StoreDirectory(target, files.sort());
      }
      data = await fs.readFile(target);
      name = name ?? target;
    } else {
      data = target;
    }

    return FluentFile.parse(await this.decode(data, name), name);
  }

  /** Decompress and check the format of raw store bytes, returning the Fluent text. */
  static async decode(input: Buffer, fileName?: string): Promise<string> {
    let data = input;
    const detected: FormatDetection = fileName ? this.detectFormat(fileName) : { format: null, compression: null };
    const label = fileName ?? '<buffer>';

    if (detected.compression === 'bzip2' || data.subarray(0, 3).toString('latin1') === BZIP2_MAGIC) {
      throw new UnsupportedFormatError(label, 'bzip2');
    }
    if (detected.compression === 'gzip' || (data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1])) {
      data = await gunzip(data);
    }

    const text = data.toString('utf-8');
    const format = detected.format ?? this.sniffFormat(text);
    if (format !== 'fluent') {
      throw new UnsupportedFormatError(label, format);
    }
    return text;
  }

  /** Read one file the way openStore does and re-serialize it. */
  static async formatFile(filePath: string): Promise<FormattedFile> {
    const original = await this.decode(await fs.readFile(filePath), filePath);
    const store = FluentFile.parse(original, filePath);
    return { path: filePath, original, formatted: store.serialize(), store };
  }

  /** Format several files concurrently; results keep the order of `filePaths`. */
  static async formatFiles(filePaths: string[], concurrency = 4): Promise<FormattedFile[]> {
    const limit = pLimit(Math.max(1, concurrency));
    return Promise.all(filePaths.map(filePath => limit(() => this.formatFile(filePath))));
  }

  /** Serialize and write; a `.gz` path is written gzip-compressed. */
  static async writeStore(file: FluentFile, filePath: string): Promise<void> {
    const { compression } = this.detectFormat(filePath);
    if (compression === 'bzip2') {
      throw new UnsupportedFormatError(filePath, 'bzip2');
    }

    const data = file.toBuffer();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, compression === 'gzip' ? await gzip(data) : data);
  }

  /**
   * Fluent projects keep one directory per locale: `<locale>/<path>.ftl`.
   * Only the configured source and target locales are returned.
   */
  async discoverLocaleFiles(basePath: string): Promise<LocaleFile[]> {
    const locales = new Set([this.config.sourceLocale, ...this.config.targetLocales]);
    const files = await glob(`*/${this.config.filePattern}`, { cwd: basePath, ignore: IGNORED });

    const found: LocaleFile[] = [];
    for (const relative of files.sort()) {
      const [locale, ...rest] = relative.split('/');
      if (!locales.has(locale) || rest.length === 0) {
        continue;
      }

      const filePath = path.join(basePath, relative);
      const stats = await fs.stat(filePath);
      found.push({
        locale,
        relativePath: rest.join('/'),
        path: filePath,
        lastModified: stats.mtime
      });
    }
    return found;
  }

  /**
   * Parse discovered files with bounded concurrency. A file with syntax
   * errors is kept with its error instead of failing the whole load.
   */
  async loadLocaleFiles(files: LocaleFile[]): Promise<LocaleStore[]> {
    const limit = pLimit(this.config.concurrency);

    return Promise.all(
      files.map(file =>
        limit(async (): Promise<LocaleStore> => {
          const content = await fs.readFile(file.path);
          try {
            return { ...file, store: FluentFile.parse(content, file.path) };
          } catch (error) {
            if (error instanceof FluentParseError) {
              return { ...file, store: null, error };
            }
            throw error;
          }
        })
      )
    );
  }
}
