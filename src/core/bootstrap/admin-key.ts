import { UnauthorizedError } from '../errors.js';
import { ADMIN_KEY_VARIABLE, readAdminKey } from '../../storage/credentials-store.js';

export type AdminKeySource = 'flag' | 'environment' | 'artifact';

/**
 * Administrator key for the later stages: --exec-api-key, then ADMIN_API_KEY,
 * then the credential artifact written by the bootstrap stage.
 */
export const resolveAdminKey = async ({
  explicit,
  env,
  artifactPath,
  stage,
}: {
  explicit?: string;
  env: NodeJS.ProcessEnv;
  artifactPath: string;
  stage: string;
}): Promise<{ key: string; source: AdminKeySource }> => {
  if (explicit) return { key: explicit, source: 'flag' };

  const fromEnv = env[ADMIN_KEY_VARIABLE];
  if (fromEnv) return { key: fromEnv, source: 'environment' };

  const fromArtifact = await readAdminKey({ artifactPath });
  if (fromArtifact !== null) return { key: fromArtifact, source: 'artifact' };

  throw new UnauthorizedError(
    stage,
    `no administrator key found (pass --exec-api-key, set ${ADMIN_KEY_VARIABLE}, or run --bootstrap-admin first)`
  );
};
