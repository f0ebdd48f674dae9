import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ensureGitIgnore,
  quoteEnvValue,
  readEnvFile,
  renderEnvFile,
  writeFileAtomic,
} from '../env-file.js';
import { ConfigCorruptError } from '../../core/errors.js';

describe('quoteEnvValue', () => {
  it('leaves plain values bare', () => {
    expect(quoteEnvValue('abc123')).toBe('abc123');
    expect(quoteEnvValue('http://api:9000/v1')).toBe('http://api:9000/v1');
    expect(quoteEnvValue('')).toBe('');
  });

  it('single-quotes values with spaces, hashes or equals signs', () => {
    expect(quoteEnvValue('two words')).toBe("'two words'");
    expect(quoteEnvValue('a#b')).toBe("'a#b'");
    expect(quoteEnvValue('k=v')).toBe("'k=v'");
  });

  it('double-quotes values holding a single quote', () => {
    expect(quoteEnvValue("it's")).toBe('"it\'s"');
  });

  it('keeps multi-line values on one line', () => {
    expect(quoteEnvValue('first\nsecond')).toBe('"first\\nsecond"');
    expect(quoteEnvValue('a\r\nb')).toBe('"a\\r\\nb"');
  });
});

describe('env files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stackctl-envfile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    expect(await readEnvFile({ filePath: join(dir, '.env') })).toBeNull();
  });

  it('reads back what it renders', async () => {
    const values = {
      NAME: 'two words',
      HASH: 'a#b',
      QUOTE: "it's",
      PLAIN: 'x',
      MULTI: 'line one\nline two',
      MIXED: "it's\non two lines",
    };
    const filePath = join(dir, '.env');
    await writeFile(
      filePath,
      renderEnvFile({ values, sections: [{ title: 'Main', keys: ['PLAIN'] }], header: 'test' })
    );
    expect(await readEnvFile({ filePath })).toEqual(values);
  });

  it('accepts comments, blank lines and export prefixes', async () => {
    const filePath = join(dir, '.env');
    await writeFile(filePath, '# comment\n\nexport A=1\n  B = 2\n');
    expect(await readEnvFile({ filePath })).toEqual({ A: '1', B: '2' });
  });

  it('reports the first line that is not an assignment', async () => {
    const filePath = join(dir, '.env');
    await writeFile(filePath, 'A=1\n\n<<<<<<< HEAD\n');
    await expect(readEnvFile({ filePath })).rejects.toThrow(ConfigCorruptError);
    await expect(readEnvFile({ filePath })).rejects.toMatchObject({ lineNumber: 3 });
  });

  it('writes atomically with owner-only permissions and no leftovers', async () => {
    const filePath = join(dir, 'secret.txt');
    await writeFile(filePath, 'old');
    await writeFileAtomic({ filePath, content: 'new' });

    expect(await readFile(filePath, 'utf-8')).toBe('new');
    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    expect(await readdir(dir)).toEqual(['secret.txt']);
  });

  it('appends only missing .gitignore entries', async () => {
    await writeFile(join(dir, '.gitignore'), 'node_modules/\n.env');

    expect(await ensureGitIgnore({ projectDir: dir, entries: ['.env', 'admin_credentials.txt'] })).toEqual([
      'admin_credentials.txt',
    ]);
    expect(await readFile(join(dir, '.gitignore'), 'utf-8')).toBe(
      'node_modules/\n.env\nadmin_credentials.txt\n'
    );
    expect(await ensureGitIgnore({ projectDir: dir, entries: ['.env'] })).toEqual([]);
  });
});
