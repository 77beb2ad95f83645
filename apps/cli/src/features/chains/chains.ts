import { createChainRegistry } from '@spamcheck/spam-status';
import type { Command } from 'commander';
import pc from 'picocolors';

import { CliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ChainsCommandOptionsSchema } from '../shared/schemas.js';
import { loadCliConfig } from '../shared/service-runtime.js';

import { ChainsHandler, type ChainsResult } from './chains-handler.js';
import { formatChainLine } from './chains-utils.js';

export function registerChainsCommand(program: Command): void {
  program
    .command('chains')
    .description('List configured chains and the providers queried for each')
    .option('--config <path>', 'Configuration file (default: config/spamcheck.json)')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      executeChainsCommand(rawOptions);
    });
}

function executeChainsCommand(rawOptions: unknown): void {
  const parsed = ChainsCommandOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    return new OutputManager('text').error(
      'chains',
      new Error(parsed.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
  }
  const options = parsed.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const registry = loadCliConfig(options.config).andThen((config) =>
    createChainRegistry(config).mapErr((error) => CliError.general(error.message, error))
  );
  if (registry.isErr()) {
    return output.error('chains', registry.error, registry.error.exitCode);
  }

  const result = new ChainsHandler(registry.value).execute();
  if (output.isTextMode()) {
    displayTextOutput(output, result);
  }
  output.json('chains', result);
  process.exit(ExitCodes.SUCCESS);
}

function displayTextOutput(output: OutputManager, result: ChainsResult): void {
  for (const chain of result.chains) {
    const line = formatChainLine(chain);
    output.line(chain.enabled ? line : pc.dim(line));
  }
  output.line();
  output.line(`${result.summary.enabledChains} of ${result.summary.totalChains} chains enabled`);
}
