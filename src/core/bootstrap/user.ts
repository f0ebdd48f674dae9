import { z } from 'zod';
import { DuplicateEmailError } from '../errors.js';
import { OneTimeSecret } from '../one-time-secret.js';
import type { ApiClient } from './api-client.js';
import type { IssuedCredential } from '../../types/index.js';

export const DEFAULT_USER_KEY_NAME = 'Default Initial Key';
export const STAGE_CREATE_USER = 'create-user';

const userSchema = z.object({
  id: z.string(),
  email: z.string(),
  full_name: z.string().nullable().optional(),
  is_admin: z.boolean().optional(),
});

const issuedKeySchema = z.object({
  plain_key: z.string().min(1),
  details: z.object({
    prefix: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
  }),
});

export const defaultUserIdentity = (now: Date): { email: string; fullName: string } => {
  const seconds = Math.floor(now.getTime() / 1000);
  return {
    email: `test_user_${seconds}@example.com`,
    fullName: `Regular User ${seconds}`,
  };
};

/**
 * Create a non-admin user and issue its first key, authenticated with the
 * administrator key. The user's key is returned once and never stored.
 */
export const createRegularUser = async ({
  client,
  email,
  fullName,
  keyName = DEFAULT_USER_KEY_NAME,
  now = () => new Date(),
}: {
  client: ApiClient;
  email?: string;
  fullName?: string;
  keyName?: string;
  now?: () => Date;
}): Promise<IssuedCredential> => {
  const defaults = defaultUserIdentity(now());
  const userEmail = email ?? defaults.email;

  const user = await client.request({
    stage: STAGE_CREATE_USER,
    method: 'POST',
    path: '/v1/users',
    schema: userSchema,
    body: { full_name: fullName ?? defaults.fullName, email: userEmail, is_admin: false },
    onStatus: { 409: () => new DuplicateEmailError(userEmail) },
  });

  const key = await client.request({
    stage: STAGE_CREATE_USER,
    method: 'POST',
    path: `/v1/admin/users/${encodeURIComponent(user.id)}/keys`,
    schema: issuedKeySchema,
    body: { key_name: keyName },
  });

  return {
    ref: {
      kind: 'user',
      principalId: user.id,
      principalEmail: user.email,
      label: key.details.name ?? keyName,
      prefix: key.details.prefix ?? null,
    },
    secret: new OneTimeSecret(key.plain_key),
  };
};
