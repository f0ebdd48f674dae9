export const EXIT_CODES = {
  success: 0,
  transitionFailed: 1,
  validation: 2,
  aborted: 3,
  bootstrapFailed: 4,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base class for every failure the orchestrator reports. `stage` names the
 * step that failed and `exitCode` is what the CLI exits with.
 */
export class StackctlError extends Error {
  readonly stage: string;
  readonly exitCode: ExitCode;

  constructor(
    message: string,
    { stage, exitCode, cause }: { stage: string; exitCode: ExitCode; cause?: unknown }
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.stage = stage;
    this.exitCode = exitCode;
  }
}

export class ValidationError extends StackctlError {
  constructor(message: string, stage = 'validate') {
    super(message, { stage, exitCode: EXIT_CODES.validation });
  }
}

export class ManifestError extends StackctlError {
  constructor(message: string, { cause }: { cause?: unknown } = {}) {
    super(message, { stage: 'manifest', exitCode: EXIT_CODES.validation, cause });
  }
}

export class ConfigWriteError extends StackctlError {
  readonly profilePath: string;

  constructor(profilePath: string, cause: unknown) {
    super(`Cannot write '${profilePath}': ${describeError(cause)}`, {
      stage: 'scaffold',
      exitCode: EXIT_CODES.validation,
      cause,
    });
    this.profilePath = profilePath;
  }
}

export class ConfigCorruptError extends StackctlError {
  readonly profilePath: string;
  readonly lineNumber: number;

  constructor(profilePath: string, lineNumber: number, line: string) {
    super(
      `'${profilePath}' cannot be parsed (line ${lineNumber}: ${JSON.stringify(line)}). ` +
        'It was left untouched; rerun with --regenerate-env to move it aside and generate a new one.',
      { stage: 'scaffold', exitCode: EXIT_CODES.validation }
    );
    this.profilePath = profilePath;
    this.lineNumber = lineNumber;
  }
}

export class RuntimeTransitionError extends StackctlError {
  readonly operation: string;
  readonly services: string[];
  readonly runtimeExitCode: number | null;
  readonly stderr: string;

  constructor({
    operation,
    services,
    runtimeExitCode,
    stderr,
    cause,
  }: {
    operation: string;
    services: string[];
    runtimeExitCode: number | null;
    stderr: string;
    cause?: unknown;
  }) {
    const target = services.length > 0 ? services.join(', ') : 'all services';
    const reason =
      runtimeExitCode === null
        ? describeError(cause)
        : `exited with code ${runtimeExitCode}`;
    super(`Runtime '${operation}' failed for ${target}: ${reason}`, {
      stage: operation,
      exitCode: EXIT_CODES.transitionFailed,
      cause,
    });
    this.operation = operation;
    this.services = services;
    this.runtimeExitCode = runtimeExitCode;
    this.stderr = stderr;
  }
}

export class ConfirmationDeclinedError extends StackctlError {
  constructor(action: string, reason = 'declined by operator') {
    super(`${action} aborted: ${reason}.`, {
      stage: 'confirm',
      exitCode: EXIT_CODES.aborted,
    });
  }
}

export class BootstrapError extends StackctlError {
  constructor(message: string, stage: string, cause?: unknown) {
    super(message, { stage, exitCode: EXIT_CODES.bootstrapFailed, cause });
  }
}

export class AlreadyBootstrappedError extends BootstrapError {
  constructor(detail?: string) {
    super(
      'An administrator already exists; no credential was issued. ' +
        'Reissuing a lost administrator key is a separate, explicit operation.' +
        (detail ? ` (${detail})` : ''),
      'bootstrap-admin'
    );
  }
}

export class DuplicateEmailError extends BootstrapError {
  readonly email: string;

  constructor(email: string) {
    super(`A user with email '${email}' is already registered.`, 'create-user');
    this.email = email;
  }
}

export class UnauthorizedError extends BootstrapError {
  constructor(stage: string, reason: string) {
    super(`Administrator credential rejected: ${reason}`, stage);
  }
}

export class UserNotFoundError extends BootstrapError {
  readonly userId: string;

  constructor(userId: string) {
    super(`User '${userId}' does not exist.`, 'setup-assistant');
    this.userId = userId;
  }
}

export class NetworkTimeoutError extends BootstrapError {
  constructor(stage: string, url: string, timeoutMs: number) {
    super(
      `No response from ${url} within ${timeoutMs}ms. The request was not retried; rerun the stage once the API is reachable.`,
      stage
    );
  }
}

export class BackendUnreachableError extends BootstrapError {
  constructor(stage: string, url: string, cause: unknown) {
    super(`Cannot reach ${url}: ${describeError(cause)}`, stage, cause);
  }
}

export class ApiRequestError extends BootstrapError {
  readonly status: number;
  readonly body: string;

  constructor(stage: string, { method, url, status, body }: {
    method: string;
    url: string;
    status: number;
    body: string;
  }) {
    super(`${method} ${url} returned ${status}${body ? `: ${body}` : ''}`, stage);
    this.status = status;
    this.body = body;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};
