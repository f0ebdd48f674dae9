import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parse as dotenvParse } from 'dotenv';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readAdminKey, writeAdminArtifact } from '../credentials-store.js';
import type { CredentialRef } from '../../types/index.js';

const ref: CredentialRef = {
  kind: 'administrator',
  principalId: 'user_1',
  principalEmail: 'admin@example.com',
  label: 'Admin Bootstrap Key',
  prefix: 'sk-test-',
};

describe('admin credential artifact', () => {
  let dir: string;
  let artifactPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stackctl-creds-'));
    artifactPath = join(dir, 'admin_credentials.txt');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the key with owner-only permissions and reads it back', async () => {
    const result = await writeAdminArtifact({ artifactPath, ref, plainKey: 'test-secret' });

    expect(result).toEqual({ artifactPath, backupPath: null });
    expect((await stat(artifactPath)).mode & 0o777).toBe(0o600);
    expect(await readAdminKey({ artifactPath })).toBe('test-secret');

    const content = await readFile(artifactPath, 'utf-8');
    expect(content).toContain('ADMIN_USER_ID=user_1\n');
    expect(content).toContain("ADMIN_KEY_NAME='Admin Bootstrap Key'\n");
  });

  it('moves an existing artifact aside instead of overwriting it', async () => {
    await writeFile(artifactPath, 'ADMIN_API_KEY=old-secret\n');

    const result = await writeAdminArtifact({
      artifactPath,
      ref,
      plainKey: 'new-secret',
      now: () => new Date(1700000000000),
    });

    const backupPath = `${artifactPath}.bak-1700000000000`;
    expect(result.backupPath).toBe(backupPath);
    expect(await readFile(backupPath, 'utf-8')).toBe('ADMIN_API_KEY=old-secret\n');
    expect(await readAdminKey({ artifactPath })).toBe('new-secret');
  });

  it('quotes values so they read back intact', async () => {
    await writeAdminArtifact({
      artifactPath,
      ref: { ...ref, label: "Ops key #1 'primary'" },
      plainKey: 'test secret',
    });

    const content = await readFile(artifactPath, 'utf-8');
    expect(content).toContain('ADMIN_KEY_NAME="Ops key #1 \'primary\'"\n');
    expect(dotenvParse(content).ADMIN_KEY_NAME).toBe("Ops key #1 'primary'");
    expect(await readAdminKey({ artifactPath })).toBe('test secret');
  });

  it('returns null when there is no artifact', async () => {
    expect(await readAdminKey({ artifactPath })).toBeNull();
  });
});
