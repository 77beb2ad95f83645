/**
 * Rolling per-provider call statistics.
 *
 * Pure functions: each update returns a new snapshot. Latency and error rate
 * are exponentially weighted so recent calls dominate.
 */

export interface ProviderCallStats {
  averageLatencyMs: number;
  calls: number;
  consecutiveFailures: number;
  errorRate: number;
  failures: number;
  lastErrorKind?: string | undefined;
  lastUpdated: number;
}

export interface CallOutcome {
  errorKind?: string | undefined;
  latencyMs: number;
  success: boolean;
}

export function createInitialCallStats(): ProviderCallStats {
  return {
    averageLatencyMs: 0,
    calls: 0,
    consecutiveFailures: 0,
    errorRate: 0,
    failures: 0,
    lastUpdated: 0,
  };
}

export function recordCallOutcome(current: ProviderCallStats, outcome: CallOutcome, now: number): ProviderCallStats {
  const averageLatencyMs =
    current.calls === 0 ? outcome.latencyMs : current.averageLatencyMs * 0.8 + outcome.latencyMs * 0.2;

  return {
    averageLatencyMs,
    calls: current.calls + 1,
    consecutiveFailures: outcome.success ? 0 : current.consecutiveFailures + 1,
    errorRate: current.errorRate * 0.9 + (outcome.success ? 0 : 1) * 0.1,
    failures: current.failures + (outcome.success ? 0 : 1),
    lastErrorKind: outcome.success ? current.lastErrorKind : outcome.errorKind,
    lastUpdated: now,
  };
}
