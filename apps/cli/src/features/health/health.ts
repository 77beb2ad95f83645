import type { ServiceHealth } from '@spamcheck/spam-status';
import type { Command } from 'commander';
import { ok } from 'neverthrow';
import pc from 'picocolors';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { HealthCommandOptionsSchema } from '../shared/schemas.js';
import { withSpamCheckService } from '../shared/service-runtime.js';

import { formatDependencyLine, formatHealthHeader, healthExitCode } from './health-utils.js';

export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Probe every enabled provider and the classifier')
    .option('--config <path>', 'Configuration file (default: config/spamcheck.json)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeHealthCommand(rawOptions);
    });
}

async function executeHealthCommand(rawOptions: unknown): Promise<void> {
  const parsed = HealthCommandOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    return new OutputManager('text').error(
      'health',
      new Error(parsed.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
  }
  const options = parsed.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withSpamCheckService(options.config, async (service) => ok(await service.health.snapshot()));
  if (result.isErr()) {
    return output.error('health', result.error, result.error.exitCode);
  }

  const health = result.value;
  if (output.isTextMode()) {
    displayTextOutput(output, health);
  }
  output.json('health', health);
  process.exit(healthExitCode(health));
}

function displayTextOutput(output: OutputManager, health: ServiceHealth): void {
  const header = formatHealthHeader(health);
  output.line(health.status === 'up' ? pc.green(header) : pc.yellow(header));

  const entries = Object.entries(health.dependencies);
  if (entries.length === 0) {
    output.line(pc.dim('  no dependencies enabled'));
    return;
  }
  for (const [name, dependency] of entries) {
    if (!dependency) continue;
    const line = `  ${formatDependencyLine(name, dependency)}`;
    output.line(dependency.status === 'up' ? line : pc.red(line));
  }
}
