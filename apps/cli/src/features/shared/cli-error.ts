import type { RequestError } from '@spamcheck/spam-status';

import { type ExitCode, ExitCodes } from './exit-codes.js';

/**
 * A command failure carrying the exit code it should end the process with.
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CliError';
  }

  static invalidArgs(message: string): CliError {
    return new CliError(message, ExitCodes.INVALID_ARGS);
  }

  static general(message: string, cause?: unknown): CliError {
    return new CliError(message, ExitCodes.GENERAL_ERROR, { cause });
  }

  /**
   * Bad input maps to INVALID_ARGS; a timeout or cancellation is a general failure.
   */
  static fromRequestError(error: RequestError): CliError {
    return new CliError(error.message, error.isInvalidRequest ? ExitCodes.INVALID_ARGS : ExitCodes.GENERAL_ERROR, {
      cause: error,
    });
  }
}
