/**
 * Error Types for qlaunch
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all qlaunch errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'INVALID_NAME'
  | 'INVALID_BINARY'
  | 'SETTINGS_INVALID'
  | 'IO_ERROR'
  | 'EXECUTION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID: 1,
  INVALID_NAME: 1,
  INVALID_BINARY: 1,
  SETTINGS_INVALID: 1,
  IO_ERROR: 2,
  EXECUTION_FAILED: 1,
};

/**
 * Exit code recorded when the launched process ended without one (killed by a signal).
 */
export const NO_EXIT_CODE = -1;

/**
 * Base error class for all qlaunch errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class QlaunchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'QlaunchError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, QlaunchError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * No configuration is stored under the given name.
 */
export class NotFoundError extends QlaunchError {
  constructor(
    public readonly configName: string,
    message: string = `Configuration '${configName}' does not exist`,
    suggestion: string = 'Create it first with `qlaunch save <name> <qemu-bin> [args...]`.'
  ) {
    super(message, 'CONFIG_NOT_FOUND', suggestion);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * A configuration file could not be decoded, or a record could not be encoded.
 */
export class SerializationError extends QlaunchError {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, 'CONFIG_INVALID', path ? `Inspect or remove ${path}.` : undefined);
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * The QEMU binary argument looks like an option, which happens when `save`
 * options are written after the configuration name.
 */
export class InvalidBinaryError extends QlaunchError {
  constructor(public readonly qemuBin: string) {
    super(
      `Invalid QEMU binary '${qemuBin}': a binary cannot start with '-'`,
      'INVALID_BINARY',
      'Put save options before the name, e.g. `qlaunch save -d "my vm" vm qemu-system-x86_64 -m 512`.'
    );
    this.name = 'InvalidBinaryError';
    Object.setPrototypeOf(this, InvalidBinaryError.prototype);
  }
}

/**
 * A configuration name that cannot be used as a file stem inside the configuration directory.
 */
export class InvalidNameError extends QlaunchError {
  constructor(
    public readonly configName: string,
    reason: string
  ) {
    super(
      `Invalid configuration name '${configName}': ${reason}`,
      'INVALID_NAME',
      'Use a plain name without path separators, e.g. `ubuntu-22`.'
    );
    this.name = 'InvalidNameError';
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

/**
 * The settings file exists but cannot be used.
 */
export class SettingsError extends QlaunchError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly validationErrors: Array<{
      path: string;
      message: string;
    }> = []
  ) {
    super(message, 'SETTINGS_INVALID', `Fix or remove ${path}.`);
    this.name = 'SettingsError';
    Object.setPrototypeOf(this, SettingsError.prototype);
  }

  override format(): string {
    let output = super.format();
    for (const error of this.validationErrors) {
      output += `\n  - ${error.path}: ${error.message}`;
    }
    return output;
  }
}

/**
 * Filesystem or process-spawn failure.
 */
export class IoError extends QlaunchError {
  constructor(
    message: string,
    public readonly target: string,
    public override readonly cause?: Error,
    suggestion?: string
  ) {
    super(cause ? `${message}: ${cause.message}` : message, 'IO_ERROR', suggestion);
    this.name = 'IoError';
    Object.setPrototypeOf(this, IoError.prototype);
  }
}

/**
 * Rename wrote the new configuration but could not remove the old one.
 *
 * Both names now hold the same record; the new one is usable.
 */
export class RenameIncompleteError extends IoError {
  constructor(
    public readonly oldName: string,
    public readonly newName: string,
    oldPath: string,
    cause?: Error
  ) {
    super(
      `Configuration '${oldName}' was copied to '${newName}' but the old file could not be deleted`,
      oldPath,
      cause,
      `Remove it with \`qlaunch rm ${oldName}\`.`
    );
    this.name = 'RenameIncompleteError';
    Object.setPrototypeOf(this, RenameIncompleteError.prototype);
  }
}

/**
 * The launched binary exited unsuccessfully.
 */
export class ExecutionFailedError extends QlaunchError {
  constructor(
    public readonly processExitCode: number,
    public readonly signal?: string
  ) {
    super(
      signal
        ? `QEMU was terminated by signal ${signal}`
        : `QEMU execution failed with exit code: ${processExitCode}`,
      'EXECUTION_FAILED'
    );
    this.name = 'ExecutionFailedError';
    Object.setPrototypeOf(this, ExecutionFailedError.prototype);
  }

  /**
   * Propagate the child's exit code when it fits in a process exit status.
   */
  override get exitCode(): number {
    if (this.processExitCode >= 1 && this.processExitCode <= 255) {
      return this.processExitCode;
    }
    return EXIT_CODES.EXECUTION_FAILED;
  }
}

/**
 * Check if an error is a QlaunchError.
 */
export function isQlaunchError(error: unknown): error is QlaunchError {
  return error instanceof QlaunchError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isQlaunchError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
