/**
 * Error types raised while preparing or running a bootstrap
 */

import { COMMAND_NOT_FOUND_EXIT_CODE } from '../shared/constants/conda';

/**
 * An external command could not be started
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number = COMMAND_NOT_FOUND_EXIT_CODE,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandError';
  }
}

/**
 * No usable conda executable was found
 */
export class CondaNotFoundError extends Error {
  readonly exitCode = COMMAND_NOT_FOUND_EXIT_CODE;

  constructor(message: string) {
    super(message);
    this.name = 'CondaNotFoundError';
  }
}

/**
 * conda printed something other than the JSON document asked for
 */
export class CondaOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CondaOutputError';
  }
}

export class InvalidEnvironmentNameError extends Error {
  constructor(readonly envName: string) {
    super(
      envName.length === 0
        ? 'Environment name must not be empty'
        : `Invalid environment name '${envName}': spaces, '/', '\\', ':' and '#' are not allowed`
    );
    this.name = 'InvalidEnvironmentNameError';
  }
}

/**
 * Exit status to report for an error, defaulting to 1
 */
export function exitCodeOf(error: unknown): number {
  if (error instanceof CommandError || error instanceof CondaNotFoundError) {
    return error.exitCode;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
