import * as p from '@clack/prompts';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse } from './cli-response.js';
import { type ExitCode, exitCodeToErrorCode, ExitCodes } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * Formats command output as human-readable text or a JSON envelope.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Write a success envelope (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Write a line of text (text mode only).
   */
  line(text = ''): void {
    if (this.format === 'text') {
      console.log(text);
    }
  }

  /**
   * Output an error and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the envelope
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      p.log.error(`${pc.red('Error')}: ${error.message}`);
      if (errorCode === 'INVALID_ARGS') {
        p.note('Check your command arguments and try again.\nRun with --help for usage information.', 'Tip');
      }
    }

    process.exit(exitCode);
  }
}
