import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { gzipSync } from 'zlib';
import { FluentParseError, UnsupportedFormatError } from '../src/core/errors';
import { FluentFile } from '../src/core/fluent-file';
import { StoreDirectory, StoreFactory } from '../src/core/store-factory';

let tmpDir: string;

async function writeFile(relative: string, content: string | Buffer): Promise<string> {
  const filePath = path.join(tmpDir, relative);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ftlkit-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('StoreFactory.detectFormat', () => {
  it('reads format and compression from the file name', () => {
    expect(StoreFactory.detectFormat('menu.ftl.gz')).toEqual({ format: 'fluent', compression: 'gzip' });
    expect(StoreFactory.detectFormat('strings.xlf')).toEqual({ format: 'xliff', compression: null });
    expect(StoreFactory.detectFormat('archive.po.bz2')).toEqual({ format: 'po', compression: 'bzip2' });
    expect(StoreFactory.detectFormat('README')).toEqual({ format: null, compression: null });
    expect(StoreFactory.detectFormat('odd.constructor')).toEqual({ format: null, compression: null });
  });
});

describe('StoreFactory.sniffFormat', () => {
  it('recognises Fluent, PO and XML formats', () => {
    expect(StoreFactory.sniffFormat('key = value\n')).toBe('fluent');
    expect(StoreFactory.sniffFormat('msgid ""\nmsgstr ""\n')).toBe('po');
    expect(StoreFactory.sniffFormat('<?xml version="1.0"?>\n<xliff version="1.2">')).toBe('xliff');
  });

  it('returns null for text that is not Fluent', () => {
    expect(StoreFactory.sniffFormat('just some words')).toBeNull();
    expect(StoreFactory.sniffFormat('')).toBeNull();
  });
});

describe('StoreFactory.openStore', () => {
  it('opens a Fluent file by path', async () => {
    const filePath = await writeFile('main.ftl', 'key = Value\n');
    const store = await StoreFactory.openStore(filePath);
    expect(store).toBeInstanceOf(FluentFile);
    if (store instanceof FluentFile) {
      expect(store.getIds()).toEqual(['key']);
      expect(store.fileName).toBe(filePath);
    }
  });

  it('decompresses gzip buffers', async () => {
    const store = await StoreFactory.openStore(gzipSync(Buffer.from('key = Value\n')));
    expect(store instanceof FluentFile && store.getIds()).toEqual(['key']);
  });

  it('rejects bzip2 content', async () => {
    await expect(StoreFactory.openStore(Buffer.from('BZh91AY'))).rejects.toThrow(UnsupportedFormatError);
  });

  it('rejects other translation formats', async () => {
    const filePath = await writeFile('messages.po', 'msgid ""\nmsgstr ""\n');
    await expect(StoreFactory.openStore(filePath)).rejects.toThrow(`Unsupported file format "po" for ${filePath}`);
  });

  it('lists the Fluent files of a directory', async () => {
    await writeFile('a.ftl', 'a = A\n');
    await writeFile('sub/b.ftl', 'b = B\n');
    await writeFile('notes.txt', 'ignored');

    const store = await StoreFactory.openStore(tmpDir);
    expect(store).toBeInstanceOf(StoreDirectory);
    if (store instanceof StoreDirectory) {
      expect(store.fileNames).toEqual(['a.ftl', 'sub/b.ftl']);
      const files = await store.openAll();
      expect(files.map(file => file.getIds())).toEqual([['a'], ['b']]);
    }
  });
});

describe('StoreFactory.writeStore', () => {
  it('writes gzip output for .gz paths', async () => {
    const filePath = path.join(tmpDir, 'out', 'main.ftl.gz');
    await StoreFactory.writeStore(FluentFile.parse('key = Value\n'), filePath);

    const reopened = await StoreFactory.openStore(filePath);
    expect(reopened instanceof FluentFile && reopened.serialize()).toBe('key = Value\n');
  });

  it('refuses bzip2 output', async () => {
    await expect(StoreFactory.writeStore(new FluentFile(), path.join(tmpDir, 'x.ftl.bz2'))).rejects.toThrow(
      UnsupportedFormatError
    );
  });
});

describe('StoreFactory.formatFile', () => {
  it('reads gzip files before formatting them', async () => {
    const filePath = await writeFile('menu.ftl.gz', gzipSync(Buffer.from('key   =   Value\n')));
    const result = await StoreFactory.formatFile(filePath);

    expect(result.original).toBe('key   =   Value\n');
    expect(result.formatted).toBe('key = Value\n');

    await StoreFactory.writeStore(result.store, filePath);
    expect((await StoreFactory.formatFile(filePath)).original).toBe('key = Value\n');
  });

  it('returns results in the order the files were given', async () => {
    const big = Array.from({ length: 2000 }, (_, i) => `key${i} = Value ${i}`).join('\n');
    const paths = [await writeFile('big.ftl', `${big}\n`), await writeFile('small.ftl', 'a = 1\n')];

    const results = await StoreFactory.formatFiles(paths, 2);
    expect(results.map(result => result.path)).toEqual(paths);
  });
});

describe('locale discovery', () => {
  const config = { sourceLocale: 'en', targetLocales: ['fr'], filePattern: '**/*.ftl', concurrency: 2 };

  it('finds files of the configured locales only', async () => {
    await writeFile('en/main.ftl', 'a = A\n');
    await writeFile('en/nested/menu.ftl', 'm = M\n');
    await writeFile('fr/main.ftl', 'a = Á\n');
    await writeFile('de/main.ftl', 'a = Ä\n');

    const files = await new StoreFactory(config).discoverLocaleFiles(tmpDir);
    expect(files.map(file => [file.locale, file.relativePath])).toEqual([
      ['en', 'main.ftl'],
      ['en', 'nested/menu.ftl'],
      ['fr', 'main.ftl']
    ]);
  });

  it('keeps unparseable files with their error', async () => {
    await writeFile('en/main.ftl', 'a = A\n');
    await writeFile('fr/main.ftl', '= broken\n');

    const factory = new StoreFactory(config);
    const stores = await factory.loadLocaleFiles(await factory.discoverLocaleFiles(tmpDir));

    expect(stores[0].store?.getIds()).toEqual(['a']);
    expect(stores[1].store).toBeNull();
    expect(stores[1].error).toBeInstanceOf(FluentParseError);
  });
});
