import type { ServiceHealth } from '@spamcheck/spam-status';
import { describe, expect, it } from 'vitest';

import { ExitCodes } from '../../shared/exit-codes.js';
import { formatDependencyLine, formatHealthHeader, healthExitCode } from '../health-utils.js';

function health(status: ServiceHealth['status']): ServiceHealth {
  return {
    dependencies: {},
    environment: 'production',
    status,
    timestamp: '2025-01-01T00:00:00.000Z',
    version: '0.1.0',
  };
}

describe('health-utils', () => {
  it('formats a dependency that is up', () => {
    expect(formatDependencyLine('moralis', { latencyMs: 12, status: 'up' })).toBe('moralis: up (12ms)');
  });

  it('formats a dependency that is down with its reason', () => {
    expect(
      formatDependencyLine('pinax', { errorKind: 'timeout', latencyMs: 5000, reason: 'timeout', status: 'down' })
    ).toBe('pinax: down (5000ms) - timeout: timeout');
  });

  it('exits 0 when up and 3 when degraded', () => {
    expect(healthExitCode(health('up'))).toBe(ExitCodes.SUCCESS);
    expect(healthExitCode(health('degraded'))).toBe(3);
  });

  it('formats the header', () => {
    expect(formatHealthHeader(health('degraded'))).toBe(
      'spamcheck 0.1.0 (production) - degraded at 2025-01-01T00:00:00.000Z'
    );
  });
});
