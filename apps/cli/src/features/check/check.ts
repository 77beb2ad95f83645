import type { Command } from 'commander';
import pc from 'picocolors';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { CheckAddressesSchema, CheckCommandOptionsSchema } from '../shared/schemas.js';
import { withSpamCheckService } from '../shared/service-runtime.js';

import { CheckHandler, type CheckResult } from './check-handler.js';
import { buildCheckJson, formatDiagnostics, formatResultLine, formatSummary } from './check-utils.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check whether contracts on one chain are spam')
    .argument('<addresses...>', 'Contract addresses (0x followed by 40 hex digits)')
    .requiredOption('--chain <chain>', 'Chain id, name or alias (e.g. 1, ethereum, matic)')
    .option('--config <path>', 'Configuration file (default: config/spamcheck.json)')
    .option('--json', 'Output results in JSON format')
    .action(async (addresses: unknown, rawOptions: unknown) => {
      await executeCheckCommand(addresses, rawOptions);
    });
}

async function executeCheckCommand(rawAddresses: unknown, rawOptions: unknown): Promise<void> {
  const parsedOptions = CheckCommandOptionsSchema.safeParse(rawOptions);
  if (!parsedOptions.success) {
    return new OutputManager('text').error(
      'check',
      new Error(parsedOptions.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
  }
  const options = parsedOptions.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const parsedAddresses = CheckAddressesSchema.safeParse(rawAddresses);
  if (!parsedAddresses.success) {
    return output.error(
      'check',
      new Error(parsedAddresses.error.issues[0]?.message ?? 'Invalid addresses'),
      ExitCodes.INVALID_ARGS
    );
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  const result = await withSpamCheckService(options.config, (service) =>
    new CheckHandler(service).execute({ addresses: parsedAddresses.data, chain: options.chain }, controller.signal)
  ).finally(() => process.off('SIGINT', onInterrupt));

  if (result.isErr()) {
    return output.error('check', result.error, result.error.exitCode);
  }

  if (output.isTextMode()) {
    displayTextOutput(output, result.value);
  }
  output.json('check', buildCheckJson(result.value));
  process.exit(ExitCodes.SUCCESS);
}

function displayTextOutput(output: OutputManager, result: CheckResult): void {
  output.line(pc.bold(`${result.chainName} (chain ${result.chainId})`));
  output.line();
  for (const [address, status] of Object.entries(result.results)) {
    const line = formatResultLine(address, status);
    if (status.contractSpamStatus === true) {
      output.line(pc.red(line));
    } else if (status.contractSpamStatus === false) {
      output.line(pc.green(line));
    } else {
      output.line(pc.yellow(line));
    }
    for (const diagnostic of formatDiagnostics(status)) {
      output.line(pc.dim(diagnostic));
    }
  }
  output.line();
  output.line(formatSummary(result.summary));
}
