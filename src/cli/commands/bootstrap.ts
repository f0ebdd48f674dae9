import chalk from 'chalk';
import ora from 'ora';
import {
  STAGE_CREATE_USER,
  STAGE_SETUP_ASSISTANT,
  bootstrapAdministrator,
  createApiClient,
  createRegularUser,
  provisionDefaultAssistant,
  resolveAdminKey,
  resolveDatabaseUrl,
  type FetchLike,
} from '../../core/bootstrap/index.js';
import { EXIT_CODES, ValidationError, type ExitCode } from '../../core/errors.js';
import { readEnvFile, writeAdminArtifact } from '../../storage/index.js';
import type { CommandContext } from '../context.js';
import type { IssuedCredential } from '../../types/index.js';

export interface BootstrapOptions {
  bootstrapAdmin?: boolean;
  bootstrapDbUrl?: string;
  adminEmail?: string;
  adminName?: string;
  createUser?: boolean;
  userName?: string;
  userEmail?: string;
  setupAssistant?: boolean;
  execApiKey?: string;
  execUserId?: string;
  baseUrl?: string;
}

export const wantsBootstrap = (options: BootstrapOptions): boolean =>
  Boolean(options.bootstrapAdmin || options.createUser || options.setupAssistant);

/**
 * Print a freshly issued key inside a banner. The secret is consumed here;
 * callers get the plaintext back only to hand it to the next stage.
 */
const showIssuedCredential = ({
  title,
  credential,
}: {
  title: string;
  credential: IssuedCredential;
}): string => {
  const plainKey = credential.secret.reveal();
  const rule = chalk.yellow('═'.repeat(60));
  console.log();
  console.log(rule);
  console.log(chalk.bold.yellow(`  ${title}`));
  console.log(rule);
  console.log(`  Principal: ${credential.ref.principalEmail} ${chalk.dim(`(${credential.ref.principalId})`)}`);
  console.log(`  Key name:  ${credential.ref.label}`);
  console.log(`  API key:   ${chalk.bold(plainKey)}`);
  console.log(rule);
  console.log(chalk.yellow('  This key is shown once. Store it now.'));
  console.log(rule);
  console.log();
  return plainKey;
};

const MISSING_ASSISTANT_USER = '--setup-assistant needs a user: pass --exec-user-id or combine it with --create-user.';

/** Reject stage combinations that could only fail after a credential was issued. */
export const validateBootstrapOptions = (options: BootstrapOptions): void => {
  if (options.setupAssistant && !options.execUserId && !options.createUser) {
    throw new ValidationError(MISSING_ASSISTANT_USER, STAGE_SETUP_ASSISTANT);
  }
};

/**
 * Run the requested bootstrap stages in order: administrator, user, assistant.
 * Each stage receives what it needs through arguments; keys issued in this
 * run are handed forward without being reread from disk.
 */
export const bootstrapCommand = async ({
  options,
  context,
  fetchImpl,
}: {
  options: BootstrapOptions;
  context: CommandContext;
  fetchImpl?: FetchLike;
}): Promise<ExitCode> => {
  const { config, logger, env } = context;
  validateBootstrapOptions(options);
  const baseUrl = options.baseUrl ?? config.apiBaseUrl;
  const clientFor = (apiKey?: string) =>
    createApiClient({ baseUrl, timeoutMs: config.requestTimeoutMs, apiKey, fetchImpl });

  let adminKey: string | undefined = options.execApiKey;
  let userId: string | undefined = options.execUserId;

  if (options.bootstrapAdmin) {
    const profile = (await readEnvFile({ filePath: config.envPath })) ?? {};
    const databaseUrl = resolveDatabaseUrl({ explicit: options.bootstrapDbUrl, env, profile });
    const spinner = ora(`Bootstrapping administrator at ${baseUrl}`).start();
    let credential: IssuedCredential;
    try {
      credential = await bootstrapAdministrator({
        client: clientFor(),
        databaseUrl,
        email: options.adminEmail,
        fullName: options.adminName,
      });
      spinner.succeed('Administrator created');
    } catch (error) {
      spinner.fail();
      throw error;
    }

    const { ref } = credential;
    adminKey = showIssuedCredential({ title: 'ADMINISTRATOR API KEY', credential });
    const { backupPath } = await writeAdminArtifact({
      artifactPath: config.credentialsPath,
      ref,
      plainKey: adminKey,
    });
    if (backupPath !== null) {
      logger.warn(`Previous credential file moved to ${backupPath}`);
    }
    logger.success(`Administrator key saved to ${config.credentialsPath} (mode 600)`);
  }

  if (options.createUser) {
    const { key } = await resolveAdminKey({
      explicit: adminKey,
      env,
      artifactPath: config.credentialsPath,
      stage: STAGE_CREATE_USER,
    });
    adminKey = key;
    const spinner = ora('Creating user').start();
    let credential: IssuedCredential;
    try {
      credential = await createRegularUser({
        client: clientFor(key),
        email: options.userEmail,
        fullName: options.userName,
      });
      spinner.succeed(`User ${credential.ref.principalEmail} created`);
    } catch (error) {
      spinner.fail();
      throw error;
    }
    userId = credential.ref.principalId;
    showIssuedCredential({ title: 'USER API KEY', credential });
  }

  if (options.setupAssistant) {
    if (!userId) {
      throw new ValidationError(MISSING_ASSISTANT_USER, STAGE_SETUP_ASSISTANT);
    }
    const { key } = await resolveAdminKey({
      explicit: adminKey,
      env,
      artifactPath: config.credentialsPath,
      stage: STAGE_SETUP_ASSISTANT,
    });
    const spinner = ora(`Provisioning default assistant for ${userId}`).start();
    try {
      const assistant = await provisionDefaultAssistant({
        client: clientFor(key),
        userId,
        logger,
      });
      spinner.succeed(
        `Assistant ${assistant.assistantName} ${chalk.dim(`(${assistant.assistantId})`)} ` +
          `${assistant.reused ? 'reused' : 'created'} with ${assistant.toolIds.length} tool(s)`
      );
    } catch (error) {
      spinner.fail();
      throw error;
    }
  }

  return EXIT_CODES.success;
};
