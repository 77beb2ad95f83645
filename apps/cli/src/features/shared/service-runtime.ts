import { getErrorMessage } from '@spamcheck/core';
import { getLogger } from '@spamcheck/logger';
import { createSpamCheckService, loadAppConfig, type LoadedAppConfig, type SpamCheckService } from '@spamcheck/spam-status';
import { err, type Result } from 'neverthrow';

import { CliError } from './cli-error.js';

const logger = getLogger('ServiceRuntime');

export function loadCliConfig(configPath: string | undefined): Result<LoadedAppConfig, CliError> {
  return loadAppConfig({ configPath }).mapErr((error) => CliError.general(error.message, error));
}

/**
 * Build the service for one command and tear it down afterwards, whatever the outcome.
 */
export async function withSpamCheckService<T>(
  configPath: string | undefined,
  run: (service: SpamCheckService) => Promise<Result<T, CliError>>
): Promise<Result<T, CliError>> {
  const config = loadCliConfig(configPath);
  if (config.isErr()) {
    return err(config.error);
  }

  const service = createSpamCheckService(config.value);
  if (service.isErr()) {
    return err(CliError.general(service.error.message, service.error));
  }

  try {
    return await run(service.value);
  } finally {
    await service.value.destroy().catch((error: unknown) => {
      logger.warn(`Failed to release service resources: ${getErrorMessage(error)}`);
    });
  }
}
