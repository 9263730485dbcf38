/**
 * Custom error types for the installer module.
 */

export const InstallerErrorCode = {
  /** Neither the interpreter nor its windowless variant exists */
  EXECUTABLE_NOT_FOUND: 'executable_not_found',
  /** The script to launch does not exist */
  TARGET_SCRIPT_MISSING: 'target_script_missing',
  /** The host scheduler rejected the registration */
  REGISTRATION_FAILED: 'registration_failed',
  /** The host scheduler could not start the task */
  START_FAILED: 'start_failed',
} as const;

export type InstallerErrorCode = (typeof InstallerErrorCode)[keyof typeof InstallerErrorCode];

/**
 * Remediation shown when registration fails.
 */
export const ELEVATION_HINT = 'Retry from an elevated (Administrator) shell.';

/**
 * Base class for installer failures.
 */
export class InstallerError extends Error {
  constructor(
    message: string,
    public readonly code: InstallerErrorCode
  ) {
    super(message);
    this.name = 'InstallerError';
  }
}

/**
 * Error returned when no interpreter executable can be located.
 */
export class ExecutableNotFoundError extends InstallerError {
  readonly searched: string[];

  constructor(searched: string[]) {
    super(
      `Executable not found. Searched for: ${searched.join(', ')}`,
      InstallerErrorCode.EXECUTABLE_NOT_FOUND
    );
    this.name = 'ExecutableNotFoundError';
    this.searched = searched;
    Object.setPrototypeOf(this, ExecutableNotFoundError.prototype);
  }
}

/**
 * Error returned when the script the task should run does not exist.
 */
export class TargetScriptMissingError extends InstallerError {
  readonly scriptPath: string;

  constructor(scriptPath: string) {
    super(`Target script not found: ${scriptPath}`, InstallerErrorCode.TARGET_SCRIPT_MISSING);
    this.name = 'TargetScriptMissingError';
    this.scriptPath = scriptPath;
    Object.setPrototypeOf(this, TargetScriptMissingError.prototype);
  }
}

/**
 * Error returned when the host scheduler rejects a registration.
 */
export class RegistrationFailedError extends InstallerError {
  readonly taskName: string;
  readonly hostMessage: string;
  readonly hint = ELEVATION_HINT;

  constructor(taskName: string, hostMessage: string) {
    super(
      `Failed to register task "${taskName}": ${hostMessage}`,
      InstallerErrorCode.REGISTRATION_FAILED
    );
    this.name = 'RegistrationFailedError';
    this.taskName = taskName;
    this.hostMessage = hostMessage;
    Object.setPrototypeOf(this, RegistrationFailedError.prototype);
  }
}

/**
 * Error returned when an immediate start request fails.
 */
export class StartFailedError extends InstallerError {
  readonly taskName: string;
  readonly hostMessage: string;

  constructor(taskName: string, hostMessage: string) {
    super(`Failed to start task "${taskName}": ${hostMessage}`, InstallerErrorCode.START_FAILED);
    this.name = 'StartFailedError';
    this.taskName = taskName;
    this.hostMessage = hostMessage;
    Object.setPrototypeOf(this, StartFailedError.prototype);
  }
}

export type InstallError =
  | ExecutableNotFoundError
  | TargetScriptMissingError
  | RegistrationFailedError;

export type StartError = StartFailedError;
