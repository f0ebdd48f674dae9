import { readFile, writeFile, access } from 'fs/promises';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

export const CONFIG_FILE_NAME = 'stackctl.json';

const configSchema = z
  .object({
    projectName: z
      .string()
      .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be a valid compose project name'),
    composeFile: z.string().min(1),
    envFile: z.string().min(1),
    credentialsFile: z.string().min(1),
    composeCommand: z.array(z.string().min(1)).min(1),
    apiBaseUrl: z.string().url(),
    requestTimeoutMs: z.number().int().positive(),
    inferenceService: z.string().min(1),
    gpuInferenceService: z.string().min(1),
    inferenceProfile: z.string().min(1),
    pullPolicy: z.enum(['always', 'missing', 'never']),
    recreateDependencies: z.boolean(),
  })
  .strict();

export type StackConfig = z.infer<typeof configSchema>;

export type PullPolicy = StackConfig['pullPolicy'];

export const DEFAULT_CONFIG: StackConfig = {
  projectName: 'entities',
  composeFile: 'docker-compose.yml',
  envFile: '.env',
  credentialsFile: 'admin_credentials.txt',
  composeCommand: ['docker', 'compose'],
  apiBaseUrl: 'http://localhost:9000',
  requestTimeoutMs: 15000,
  inferenceService: 'ollama',
  gpuInferenceService: 'ollama-gpu',
  inferenceProfile: 'inference',
  pullPolicy: 'missing',
  recreateDependencies: false,
};

/**
 * Resolved config plus the directory its relative paths are anchored to.
 */
export interface ResolvedConfig extends StackConfig {
  projectDir: string;
  composePath: string;
  envPath: string;
  credentialsPath: string;
}

export const getConfigPath = ({ cwd }: { cwd: string }): string =>
  join(cwd, CONFIG_FILE_NAME);

/**
 * Check whether a config file exists in the project directory
 */
export const isInitialized = async ({ cwd }: { cwd: string }): Promise<boolean> => {
  try {
    await access(getConfigPath({ cwd }));
    return true;
  } catch {
    return false;
  }
};

/**
 * Load the config file, merged over the defaults. A missing file yields the
 * defaults; an unreadable or invalid one is a validation error.
 */
export const loadConfig = async ({
  cwd,
  env = process.env,
}: {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ResolvedConfig> => {
  const configPath = getConfigPath({ cwd });
  let userConfig: unknown = {};

  try {
    const content = await readFile(configPath, 'utf-8');
    userConfig = JSON.parse(content);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new ValidationError(
        `Cannot read ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
        'config'
      );
    }
  }

  const parsed = configSchema.partial().safeParse(userConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${CONFIG_FILE_NAME}: ${issues}`, 'config');
  }

  const merged: StackConfig = { ...DEFAULT_CONFIG, ...parsed.data };
  const baseUrlOverride = env.STACKCTL_API_BASE_URL;
  if (baseUrlOverride) {
    merged.apiBaseUrl = baseUrlOverride;
  }

  return resolveConfig({ config: merged, cwd });
};

export const resolveConfig = ({
  config,
  cwd,
}: {
  config: StackConfig;
  cwd: string;
}): ResolvedConfig => {
  const projectDir = resolve(cwd);
  return {
    ...config,
    projectDir,
    composePath: resolve(projectDir, config.composeFile),
    envPath: resolve(projectDir, config.envFile),
    credentialsPath: resolve(projectDir, config.credentialsFile),
  };
};

/**
 * Save the config file
 */
export const saveConfig = async ({
  config,
  cwd,
}: {
  config: StackConfig;
  cwd: string;
}): Promise<void> => {
  await writeFile(getConfigPath({ cwd }), JSON.stringify(config, null, 2) + '\n');
};

export const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
