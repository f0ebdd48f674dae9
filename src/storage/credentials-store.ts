import { readFile, rename } from 'fs/promises';
import { parse as dotenvParse } from 'dotenv';
import { isMissingFile } from './config.js';
import { quoteEnvValue, writeFileAtomic } from './env-file.js';
import type { CredentialRef } from '../types/index.js';

export const ADMIN_KEY_VARIABLE = 'ADMIN_API_KEY';

export interface WrittenArtifact {
  artifactPath: string;
  backupPath: string | null;
}

const renderArtifact = ({
  ref,
  plainKey,
  issuedAt,
}: {
  ref: CredentialRef;
  plainKey: string;
  issuedAt: Date;
}): string =>
  [
    `# Administrator credential issued ${issuedAt.toISOString()}. Keep this file private.`,
    `ADMIN_USER_EMAIL=${quoteEnvValue(ref.principalEmail)}`,
    `ADMIN_USER_ID=${quoteEnvValue(ref.principalId)}`,
    `ADMIN_KEY_NAME=${quoteEnvValue(ref.label)}`,
    ...(ref.prefix === null ? [] : [`ADMIN_KEY_PREFIX=${quoteEnvValue(ref.prefix)}`]),
    `${ADMIN_KEY_VARIABLE}=${quoteEnvValue(plainKey)}`,
    '',
  ].join('\n');

/**
 * Persist the administrator key (mode 0600). An artifact already at the path
 * is renamed to `<path>.bak-<timestamp>` first; it is never overwritten.
 */
export const writeAdminArtifact = async ({
  artifactPath,
  ref,
  plainKey,
  now = () => new Date(),
}: {
  artifactPath: string;
  ref: CredentialRef;
  plainKey: string;
  now?: () => Date;
}): Promise<WrittenArtifact> => {
  const issuedAt = now();
  const backupPath = `${artifactPath}.bak-${issuedAt.getTime()}`;

  let movedAside = true;
  try {
    await rename(artifactPath, backupPath);
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    movedAside = false;
  }

  await writeFileAtomic({
    filePath: artifactPath,
    content: renderArtifact({ ref, plainKey, issuedAt }),
    mode: 0o600,
  });

  return { artifactPath, backupPath: movedAside ? backupPath : null };
};

/** The administrator key stored in the artifact, or null when there is none. */
export const readAdminKey = async ({
  artifactPath,
}: {
  artifactPath: string;
}): Promise<string | null> => {
  let content: string;
  try {
    content = await readFile(artifactPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  const key = dotenvParse(content)[ADMIN_KEY_VARIABLE];
  return key === undefined || key === '' ? null : key;
};
