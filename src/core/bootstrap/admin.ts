import { z } from 'zod';
import { AlreadyBootstrappedError, ValidationError } from '../errors.js';
import { OneTimeSecret } from '../one-time-secret.js';
import type { ApiClient } from './api-client.js';
import type { IssuedCredential } from '../../types/index.js';

export const DEFAULT_ADMIN = {
  email: 'admin@example.com',
  fullName: 'Default Admin',
  keyName: 'Admin Bootstrap Key',
} as const;

const bootstrapResponseSchema = z.object({
  user: z.object({
    id: z.string(),
    email: z.string(),
    full_name: z.string().nullable().optional(),
    is_admin: z.boolean(),
  }),
  api_key: z.object({
    plain_key: z.string().min(1),
    prefix: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
  }),
});

export const STAGE_BOOTSTRAP_ADMIN = 'bootstrap-admin';

/**
 * Pick the database URL the API should bootstrap against: an explicit value,
 * then the process environment, then the host-reachable and in-network URLs
 * from the env profile.
 */
export const resolveDatabaseUrl = ({
  explicit,
  env,
  profile,
}: {
  explicit?: string;
  env: NodeJS.ProcessEnv;
  profile: Record<string, string>;
}): string => {
  const url = explicit ?? env.DATABASE_URL ?? profile.SPECIAL_DB_URL ?? profile.DATABASE_URL;
  if (url === undefined || url === '') {
    throw new ValidationError(
      'No database URL: pass --bootstrap-db-url, set DATABASE_URL, or run init first.',
      STAGE_BOOTSTRAP_ADMIN
    );
  }
  return url;
};

/**
 * Create the first administrator and its key. Fails with
 * AlreadyBootstrappedError when one exists; nothing is reissued.
 */
export const bootstrapAdministrator = async ({
  client,
  databaseUrl,
  email = DEFAULT_ADMIN.email,
  fullName = DEFAULT_ADMIN.fullName,
  keyName = DEFAULT_ADMIN.keyName,
}: {
  client: ApiClient;
  databaseUrl: string;
  email?: string;
  fullName?: string;
  keyName?: string;
}): Promise<IssuedCredential> => {
  const response = await client.request({
    stage: STAGE_BOOTSTRAP_ADMIN,
    method: 'POST',
    path: '/v1/admin/bootstrap',
    schema: bootstrapResponseSchema,
    body: { database_url: databaseUrl, email, full_name: fullName, key_name: keyName },
    onStatus: { 409: (body) => new AlreadyBootstrappedError(body || undefined) },
  });

  return {
    ref: {
      kind: 'administrator',
      principalId: response.user.id,
      principalEmail: response.user.email,
      label: response.api_key.name ?? keyName,
      prefix: response.api_key.prefix ?? null,
    },
    secret: new OneTimeSecret(response.api_key.plain_key),
  };
};
