import type { DependencyHealth, ServiceHealth } from '@spamcheck/spam-status';

import { type ExitCode, ExitCodes } from '../shared/exit-codes.js';

/**
 * `moralis: up (12ms)` or `pinax: down (5000ms) - timeout: timeout`
 */
export function formatDependencyLine(name: string, dependency: DependencyHealth): string {
  const base = `${name}: ${dependency.status} (${dependency.latencyMs}ms)`;
  return dependency.status === 'down' ? `${base} - ${dependency.errorKind}: ${dependency.reason}` : base;
}

export function healthExitCode(health: ServiceHealth): ExitCode {
  return health.status === 'up' ? ExitCodes.SUCCESS : ExitCodes.DEGRADED;
}

export function formatHealthHeader(health: ServiceHealth): string {
  return `spamcheck ${health.version} (${health.environment}) - ${health.status} at ${health.timestamp}`;
}
