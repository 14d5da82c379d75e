/**
 * Base class for every failure that stops a provisioning run.
 *
 * All categories currently share exit code 1; `code` tells them apart for
 * callers that inspect the error rather than the process status.
 */
export class DevstrapError extends Error {
  readonly exitCode: number = 1;

  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = 'DevstrapError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** A condition the run requires before it may touch the machine. */
export class PreconditionError extends DevstrapError {
  constructor(message: string, code = 'PRECONDITION') {
    super(message, code);
    this.name = 'PreconditionError';
  }
}

/** Thrown when the process runs with an effective uid of 0. */
export class RootUserError extends PreconditionError {
  constructor() {
    super(
      "This program must not be run as root. Run it as a regular user with 'devstrap'.",
      'ROOT_USER',
    );
    this.name = 'RootUserError';
  }
}

/** Thrown when the platform identifier is neither Darwin nor Linux. */
export class UnsupportedPlatformError extends PreconditionError {
  constructor(public readonly identifier: string) {
    super(`Unsupported OS: ${identifier}`, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

/** Thrown after the interactive toolchain installer has been started. */
export class ToolchainMissingError extends PreconditionError {
  constructor(public readonly toolchain: string) {
    super(
      `${toolchain} are not installed. Please follow the prompts to install ${toolchain}, then rerun this program.`,
      'TOOLCHAIN_MISSING',
    );
    this.name = 'ToolchainMissingError';
  }
}

/** Thrown when a directory stays unwritable after the permission repair. */
export class PermissionRepairError extends DevstrapError {
  constructor(
    public readonly directory: string,
    user: string,
    cause?: unknown,
  ) {
    super(
      `Cannot fix permissions for ${directory}. Try running 'sudo chown -R ${user} ${directory}' and rerun the program.`,
      'PERMISSION_REPAIR',
      { cause },
    );
    this.name = 'PermissionRepairError';
  }
}

/** Thrown when a configuration document cannot be written. */
export class ConfigWriteError extends DevstrapError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      `Failed to write to ${filePath}. Check permissions and try again.`,
      'CONFIG_WRITE',
      { cause },
    );
    this.name = 'ConfigWriteError';
  }
}

/** Thrown when an installer, download or package-manager command exits non-zero. */
export class ExternalCommandError extends DevstrapError {
  constructor(
    public readonly command: string,
    public readonly commandExitCode: number,
    detail?: string,
  ) {
    super(
      `Command failed (exit ${commandExitCode}): ${command}${detail ? `: ${detail}` : ''}`,
      'EXTERNAL_COMMAND',
    );
    this.name = 'ExternalCommandError';
  }
}

/** Thrown when the devstrap configuration cannot be read or is invalid. */
export class ConfigError extends DevstrapError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** Wraps a non-devstrap value thrown from inside a step. */
export class StepFailedError extends DevstrapError {
  constructor(
    public readonly stepId: string,
    cause: unknown,
  ) {
    super(
      `Step "${stepId}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'STEP_FAILED',
      { cause },
    );
    this.name = 'StepFailedError';
  }
}

/** Thrown for command-line arguments devstrap does not understand. */
export class UsageError extends DevstrapError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}
