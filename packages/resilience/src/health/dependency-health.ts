import { getErrorMessage } from '@spamcheck/core';

import { runWithDeadline } from '../abort/deadline.js';

export type DependencyStatus =
  | { status: 'up' }
  | { errorKind: string; reason: string; status: 'down' };

export type OverallHealth = 'degraded' | 'up';

export interface TimedDependencyStatus {
  latencyMs: number;
  result: DependencyStatus;
}

export const up = (): DependencyStatus => ({ status: 'up' });

export const down = (errorKind: string, reason: string): DependencyStatus => ({ errorKind, reason, status: 'down' });

/**
 * Up only when every checked dependency is up; an empty set is trivially up.
 */
export function aggregateHealthStatus(statuses: readonly DependencyStatus[]): OverallHealth {
  return statuses.every((status) => status.status === 'up') ? 'up' : 'degraded';
}

/**
 * Run one health check under its own timeout. A check that does not answer
 * in time is reported down with reason `timeout`; a check that throws is down
 * with kind `unavailable`.
 */
export async function checkWithTimeout(
  check: (signal: AbortSignal) => Promise<DependencyStatus>,
  timeoutMs: number,
  now: () => number = () => Date.now()
): Promise<TimedDependencyStatus> {
  const startedAt = now();
  let result: DependencyStatus;

  try {
    const outcome = await runWithDeadline(check, { timeoutMs });
    result = outcome.status === 'completed' ? outcome.value : down('timeout', 'timeout');
  } catch (error) {
    result = down('unavailable', getErrorMessage(error));
  }

  return { latencyMs: now() - startedAt, result };
}
