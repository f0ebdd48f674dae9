import { mkdir, rename } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { findHostPort } from './manifest.js';
import { ConfigCorruptError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import {
  readEnvFile,
  renderEnvFile,
  writeFileAtomic,
  type EnvSection,
} from '../storage/env-file.js';
import type { EnvironmentProfile, StackDescriptor } from '../types/index.js';

export const DB_SERVICE_NAME = 'db';
export const DB_CONTAINER_PORT = '3306';

/** Secrets generated once and never replaced; value is the byte length. */
export const GENERATED_SECRETS: Record<string, number> = {
  SECRET_KEY: 32,
  SIGNED_URL_SECRET: 32,
  API_KEY: 16,
  MYSQL_ROOT_PASSWORD: 32,
  MYSQL_PASSWORD: 32,
};

export const GENERATED_TOOL_IDS = [
  'TOOL_CODE_INTERPRETER',
  'TOOL_WEB_SEARCH',
  'TOOL_COMPUTER',
  'TOOL_VECTOR_STORE_SEARCH',
];

/** Defaults the operator may edit; only filled when missing. */
export const DEFAULT_VALUES: Record<string, string> = {
  ASSISTANTS_BASE_URL: 'http://api:9000',
  SANDBOX_SERVER_URL: 'http://sandbox:8000',
  DOWNLOAD_BASE_URL: 'http://api:9000/v1/files/download',
  QDRANT_URL: 'http://qdrant:6333',
  MYSQL_HOST: DB_SERVICE_NAME,
  MYSQL_PORT: DB_CONTAINER_PORT,
  MYSQL_DATABASE: 'cosmic_catalyst',
  MYSQL_USER: 'api_user',
  BASE_URL_HEALTH: 'http://api:9000/v1/health',
  SHELL_SERVER_URL: 'ws://sandbox:8000/ws/computer',
  CODE_EXECUTION_URL: 'ws://sandbox:8000/ws/execute',
  DISABLE_FIREJAIL: 'true',
  SMBCLIENT_SERVER: 'samba_server',
  SMBCLIENT_SHARE: 'cosmic_share',
  SMBCLIENT_USERNAME: 'samba_user',
  SMBCLIENT_PASSWORD: 'default',
  SMBCLIENT_PORT: '445',
  LOG_LEVEL: 'INFO',
  PYTHONUNBUFFERED: '1',
};

/** Keys whose value is taken from the db service environment when declared there. */
const MANIFEST_SOURCED_KEYS = [
  'MYSQL_ROOT_PASSWORD',
  'MYSQL_DATABASE',
  'MYSQL_USER',
  'MYSQL_PASSWORD',
];

export const PROFILE_SECTIONS: EnvSection[] = [
  {
    title: 'Base URLs',
    keys: ['ASSISTANTS_BASE_URL', 'SANDBOX_SERVER_URL', 'DOWNLOAD_BASE_URL', 'QDRANT_URL'],
  },
  {
    title: 'Database Configuration',
    keys: [
      'DATABASE_URL',
      'SPECIAL_DB_URL',
      'MYSQL_ROOT_PASSWORD',
      'MYSQL_DATABASE',
      'MYSQL_USER',
      'MYSQL_PASSWORD',
      'MYSQL_HOST',
      'MYSQL_PORT',
    ],
  },
  { title: 'API Keys & Secrets', keys: ['API_KEY', 'SIGNED_URL_SECRET', 'SECRET_KEY'] },
  {
    title: 'Platform Settings',
    keys: ['BASE_URL_HEALTH', 'SHELL_SERVER_URL', 'CODE_EXECUTION_URL', 'DISABLE_FIREJAIL'],
  },
  {
    title: 'Shared Storage',
    keys: [
      'SHARED_PATH',
      'SMBCLIENT_SERVER',
      'SMBCLIENT_SHARE',
      'SMBCLIENT_USERNAME',
      'SMBCLIENT_PASSWORD',
      'SMBCLIENT_PORT',
    ],
  },
  { title: 'Tool Identifiers', keys: GENERATED_TOOL_IDS },
  { title: 'Other Settings', keys: ['LOG_LEVEL', 'PYTHONUNBUFFERED'] },
];

export type RandomSource = (size: number) => Buffer;

export const defaultSharedPath = ({
  platform,
  homeDir,
}: {
  platform: NodeJS.Platform;
  homeDir: string;
}): string => {
  if (platform === 'win32') return join(homeDir, 'entities_share');
  if (platform === 'darwin') {
    return join(homeDir, 'Library', 'Application Support', 'entities_share');
  }
  return join(homeDir, '.local', 'share', 'entities_share');
};

export const buildDatabaseUrl = ({
  user,
  password,
  host,
  port,
  database,
}: {
  user: string;
  password: string;
  host: string;
  port: string;
  database: string;
}): string =>
  `mysql+pymysql://${user}:${encodeURIComponent(password)}@${host}:${port}/${database}`;

const computeDerived = ({
  values,
  descriptor,
  sharedPath,
}: {
  values: Record<string, string>;
  descriptor: StackDescriptor | null;
  sharedPath: string;
}): Record<string, string> => {
  const derived: Record<string, string> = { SHARED_PATH: sharedPath };
  const database = {
    user: values.MYSQL_USER,
    password: values.MYSQL_PASSWORD,
    host: values.MYSQL_HOST,
    port: values.MYSQL_PORT,
    database: values.MYSQL_DATABASE,
  };

  if (Object.values(database).some((part) => part === undefined)) {
    return derived;
  }

  derived.DATABASE_URL = buildDatabaseUrl(database);

  const hostPort = descriptor
    ? findHostPort({ descriptor, serviceName: database.host, containerPort: database.port })
    : null;
  if (hostPort) {
    derived.SPECIAL_DB_URL = buildDatabaseUrl({ ...database, host: 'localhost', port: hostPort });
  }

  return derived;
};

/**
 * Make sure the env profile exists and is complete. Missing secrets are
 * generated, missing defaults filled in and derived settings recomputed;
 * every value already on disk that is not derived is kept verbatim. The file
 * is only rewritten when something changed.
 */
export const ensureEnvironment = async ({
  profilePath,
  descriptor,
  regenerateCorrupt = false,
  env = process.env,
  platform = process.platform,
  homeDir = homedir(),
  random = randomBytes,
  now = () => new Date(),
  logger = silentLogger,
}: {
  profilePath: string;
  descriptor: StackDescriptor | null;
  regenerateCorrupt?: boolean;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
}): Promise<EnvironmentProfile> => {
  let existing: Record<string, string> | null;
  try {
    existing = await readEnvFile({ filePath: profilePath });
  } catch (error) {
    if (!(error instanceof ConfigCorruptError) || !regenerateCorrupt) throw error;
    const asidePath = `${profilePath}.corrupt-${now().getTime()}`;
    await rename(profilePath, asidePath);
    logger.warn(`Moved unreadable profile to ${asidePath}; generating a new one.`);
    existing = null;
  }

  if (existing === null) {
    logger.warn(`${profilePath} is missing. Generating it.`);
  }

  const values: Record<string, string> = { ...(existing ?? {}) };
  const generatedKeys: string[] = [];
  const dbEnvironment = descriptor?.services.get(DB_SERVICE_NAME)?.environment ?? {};

  MANIFEST_SOURCED_KEYS.forEach((key) => {
    const declared = dbEnvironment[key];
    // Interpolated values refer back to this profile and carry no value of their own.
    if (values[key] === undefined && declared !== undefined && !declared.includes('${')) {
      values[key] = declared;
      logger.debug(`${key}: taken from the ${DB_SERVICE_NAME} service environment`);
    }
  });

  Object.entries(GENERATED_SECRETS).forEach(([key, size]) => {
    if (values[key] === undefined) {
      values[key] = random(size).toString('hex');
      generatedKeys.push(key);
    }
  });

  GENERATED_TOOL_IDS.forEach((key) => {
    if (values[key] === undefined) {
      values[key] = `tool_${random(10).toString('hex')}`;
      generatedKeys.push(key);
    }
  });

  Object.entries(DEFAULT_VALUES).forEach(([key, value]) => {
    if (values[key] === undefined) {
      values[key] = value;
    }
  });

  const sharedPath =
    env.SHARED_PATH ?? values.SHARED_PATH ?? defaultSharedPath({ platform, homeDir });
  Object.assign(values, computeDerived({ values, descriptor, sharedPath }));

  try {
    await mkdir(sharedPath, { recursive: true });
  } catch (error) {
    logger.warn(
      `Could not create shared directory ${sharedPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const changedKeys = Object.keys(values).filter((key) => existing?.[key] !== values[key]);
  if (changedKeys.length === 0) {
    logger.debug(`${profilePath} is complete; not rewriting it.`);
    return { profilePath, values, generatedKeys, written: false };
  }

  await writeFileAtomic({
    filePath: profilePath,
    content: renderEnvFile({
      values,
      sections: PROFILE_SECTIONS,
      header: 'Generated by stackctl. Secrets are created once and kept across runs.',
    }),
  });
  logger.debug(`Wrote ${profilePath} (${changedKeys.join(', ')})`);

  return { profilePath, values, generatedKeys, written: true };
};
