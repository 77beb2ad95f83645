import type { ChainRegistry, ContractMetadataProvider } from '@spamcheck/contract-providers';
import type { ContractProviderName } from '@spamcheck/core';
import { getLogger, type Logger } from '@spamcheck/logger';
import {
  aggregateHealthStatus,
  checkWithTimeout,
  type DependencyStatus,
  type OverallHealth,
  type TimedDependencyStatus,
} from '@spamcheck/resilience';

import type { Environment } from '../config/app-config.schema.js';
import type { ContractClassifier } from '../contract-status/contract-status-service.js';

export type DependencyName = ContractProviderName | 'classifier';

export type DependencyHealth = DependencyStatus & { latencyMs: number };

export interface ServiceHealth {
  dependencies: Partial<Record<DependencyName, DependencyHealth>>;
  environment: Environment;
  status: OverallHealth;
  /** ISO-8601 */
  timestamp: string;
  version: string;
}

export interface HealthAggregatorDependencies {
  chainRegistry: ChainRegistry;
  classifier?: ContractClassifier | undefined;
  now?: (() => number) | undefined;
  providers: ReadonlyMap<ContractProviderName, ContractMetadataProvider>;
}

export interface HealthAggregatorOptions {
  environment: Environment;
  timeoutMs: number;
  version: string;
}

interface NamedCheck {
  check: (signal: AbortSignal) => Promise<DependencyStatus>;
  name: DependencyName;
}

/**
 * Builds a fresh health snapshot on every call. Nothing is cached between probes.
 */
export class HealthAggregator {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: HealthAggregatorDependencies,
    private readonly options: HealthAggregatorOptions
  ) {
    this.logger = getLogger('HealthAggregator');
    this.now = deps.now ?? (() => Date.now());
  }

  async snapshot(): Promise<ServiceHealth> {
    const checks = this.collectChecks();

    const results = await Promise.all(
      checks.map(async ({ check, name }): Promise<[DependencyName, TimedDependencyStatus]> => [
        name,
        await checkWithTimeout(check, this.options.timeoutMs, this.now),
      ])
    );

    const dependencies: Partial<Record<DependencyName, DependencyHealth>> = {};
    for (const [name, { latencyMs, result }] of results) {
      dependencies[name] = { ...result, latencyMs };
      if (result.status === 'down') {
        this.logger.warn({ dependency: name, errorKind: result.errorKind }, `Dependency ${name} is down: ${result.reason}`);
      }
    }

    const status = aggregateHealthStatus(results.map(([, timed]) => timed.result));
    this.logger.debug({ dependencies: checks.length, status }, 'Health snapshot complete');

    return {
      dependencies,
      environment: this.options.environment,
      status,
      timestamp: new Date(this.now()).toISOString(),
      version: this.options.version,
    };
  }

  /**
   * Providers used by at least one enabled chain, then the classifier.
   */
  private collectChecks(): NamedCheck[] {
    const checks: NamedCheck[] = [];

    for (const name of this.deps.chainRegistry.providersInUse()) {
      const provider = this.deps.providers.get(name);
      if (!provider) continue;
      checks.push({ check: (signal) => provider.healthCheck({ signal }), name });
    }

    const classifier = this.deps.classifier;
    if (classifier) {
      checks.push({ check: (signal) => classifier.healthCheck(signal), name: 'classifier' });
    }

    return checks;
  }
}
