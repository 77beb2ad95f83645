import { getErrorMessage } from '@spamcheck/core';
import { getLogger } from '@spamcheck/logger';
import { SERVICE_VERSION } from '@spamcheck/spam-status';
import { Command } from 'commander';

import { registerChainsCommand } from './features/chains/chains.js';
import { registerCheckCommand } from './features/check/check.js';
import { registerHealthCommand } from './features/health/health.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');

export function createProgram(): Command {
  const program = new Command();
  program.name('spamcheck').description('Contract spam checks across metadata providers').version(SERVICE_VERSION);
  program.exitOverride((error) => {
    // commander's own usage errors exit with INVALID_ARGS
    process.exit(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
  });

  registerCheckCommand(program);
  registerHealthCommand(program);
  registerChainsCommand(program);

  return program;
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${getErrorMessage(reason)}`);
  process.exit(ExitCodes.GENERAL_ERROR);
});

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error(`CLI failed: ${getErrorMessage(error)}`);
    process.exit(ExitCodes.GENERAL_ERROR);
  });
