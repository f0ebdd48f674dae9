import { readFile, writeFile, rename, rm, appendFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { parse as dotenvParse } from 'dotenv';
import { ConfigCorruptError, ConfigWriteError } from '../core/errors.js';
import { isMissingFile } from './config.js';

const ASSIGNMENT_LINE = /^\s*(export\s+)?[A-Za-z_][A-Za-z0-9_.-]*\s*=/;

export interface EnvSection {
  title: string;
  keys: string[];
}

/**
 * Read and parse an env file. Returns null when it does not exist. Any line
 * that is not blank, a comment or an assignment makes the whole file corrupt.
 */
export const readEnvFile = async ({
  filePath,
}: {
  filePath: string;
}): Promise<Record<string, string> | null> => {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return;
    if (!ASSIGNMENT_LINE.test(line)) {
      throw new ConfigCorruptError(filePath, index + 1, line);
    }
  });

  return dotenvParse(content);
};

const escapeLineBreaks = (value: string): string =>
  value.replace(/\n/g, '\\n').replace(/\r/g, '\\r');

/**
 * Serialize a value so it round-trips through dotenv.parse() and stays on one
 * line. Single quotes are literal in dotenv, so they are preferred; line
 * breaks and single quotes need double quotes, which dotenv expands back.
 */
export const quoteEnvValue = (value: string): string => {
  if (value.length === 0) return '';
  const needsQuoting = /[\s#"'\\=]/.test(value);
  if (!needsQuoting) return value;
  if (/[\r\n]/.test(value) || value.includes("'")) return `"${escapeLineBreaks(value)}"`;
  return `'${value}'`;
};

/**
 * Render values in labelled sections; keys not claimed by any section go
 * under a trailing "Other" section in sorted order.
 */
export const renderEnvFile = ({
  values,
  sections,
  header,
}: {
  values: Record<string, string>;
  sections: EnvSection[];
  header: string;
}): string => {
  const lines = [`# ${header}`, '# Do not commit this file.', ''];
  const written = new Set<string>();

  const pushSection = (title: string, keys: string[]): void => {
    const present = keys.filter((key) => key in values);
    if (present.length === 0) return;
    lines.push('#############################');
    lines.push(`# ${title}`);
    lines.push('#############################');
    present.forEach((key) => {
      lines.push(`${key}=${quoteEnvValue(values[key])}`);
      written.add(key);
    });
    lines.push('');
  };

  sections.forEach((section) => pushSection(section.title, section.keys));
  pushSection(
    'Other',
    Object.keys(values)
      .filter((key) => !written.has(key))
      .sort()
  );

  return lines.join('\n');
};

/**
 * Write through a temp file in the same directory, then rename over the
 * target, so readers see either the old file or the complete new one.
 */
export const writeFileAtomic = async ({
  filePath,
  content,
  mode = 0o600,
}: {
  filePath: string;
  content: string;
  mode?: number;
}): Promise<void> => {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  );

  try {
    await writeFile(tempPath, content, { encoding: 'utf-8', mode, flag: 'wx' });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new ConfigWriteError(filePath, error);
  }
};

/**
 * Append entries to the project's .gitignore that are not listed yet.
 * Returns the entries added.
 */
export const ensureGitIgnore = async ({
  projectDir,
  entries,
}: {
  projectDir: string;
  entries: string[];
}): Promise<string[]> => {
  const gitignorePath = join(projectDir, '.gitignore');
  let existing = '';
  try {
    existing = await readFile(gitignorePath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  const listed = new Set(existing.split(/\r?\n/).map((line) => line.trim()));
  const missing = entries.filter((entry) => !listed.has(entry));
  if (missing.length === 0) return [];

  const prefix = existing === '' || existing.endsWith('\n') ? '' : '\n';
  await appendFile(gitignorePath, `${prefix}${missing.join('\n')}\n`);
  return missing;
};
