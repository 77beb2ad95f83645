import { ChainRegistry, createContractProviders, type ContractMetadataProvider } from '@spamcheck/contract-providers';
import { type ConfigError, CONTRACT_PROVIDER_NAMES, type ContractProviderName, getErrorMessage } from '@spamcheck/core';
import { EventBus } from '@spamcheck/events';
import type { HttpEffects } from '@spamcheck/http';
import { getLogger } from '@spamcheck/logger';
import { PredictionCache, SpamClassifier } from '@spamcheck/spam-predictor';
import { err, ok, type Result } from 'neverthrow';

import type { AppConfig } from './config/app-config.schema.js';
import type { LoadedAppConfig } from './config/load-config.js';
import { ContractStatusService } from './contract-status/contract-status-service.js';
import type { PipelineEvent } from './events.js';
import { HealthAggregator } from './health/health-aggregator.js';
import { PipelineMetricsCollector } from './metrics/pipeline-metrics.js';

export const SERVICE_VERSION = '0.1.0';

const logger = getLogger('SpamCheckService');

export interface SpamCheckServiceOptions {
  eventBus?: EventBus<PipelineEvent> | undefined;
  httpEffects?: Partial<HttpEffects> | undefined;
  now?: (() => number) | undefined;
  version?: string | undefined;
}

/**
 * Everything a transport needs, wired from one validated configuration.
 */
export interface SpamCheckService {
  chainRegistry: ChainRegistry;
  classifier: SpamClassifier | undefined;
  contractStatus: ContractStatusService;
  eventBus: EventBus<PipelineEvent>;
  health: HealthAggregator;
  metrics: PipelineMetricsCollector;
  providers: ReadonlyMap<ContractProviderName, ContractMetadataProvider>;
  destroy(): Promise<void>;
}

/**
 * Chain registry limited to the providers enabled in configuration.
 */
export function createChainRegistry(config: AppConfig): Result<ChainRegistry, ConfigError> {
  return ChainRegistry.fromConfig(config.chains, {
    enabled: CONTRACT_PROVIDER_NAMES.filter((name) => config.providers[name].enabled),
    priority: config.providers.priority,
  });
}

export function createSpamCheckService(
  config: LoadedAppConfig,
  options: SpamCheckServiceOptions = {}
): Result<SpamCheckService, ConfigError> {
  const eventBus =
    options.eventBus ??
    new EventBus<PipelineEvent>({
      onError: (error) => logger.warn(`Metrics listener failed: ${getErrorMessage(error)}`),
    });

  const chainRegistry = createChainRegistry(config);
  if (chainRegistry.isErr()) {
    return err(chainRegistry.error);
  }

  let classifier: SpamClassifier | undefined;
  if (config.classifier.enabled) {
    const cache = config.cache.enabled
      ? new PredictionCache({
          eventBus,
          maxEntries: config.cache.maxEntries,
          now: options.now,
          ttlMs: config.cache.ttlMs,
        })
      : undefined;

    const created = SpamClassifier.fromFiles(config.classifier, config.baseDir, {
      cache,
      eventBus,
      httpEffects: options.httpEffects,
      now: options.now,
    });
    if (created.isErr()) {
      return err(created.error);
    }
    classifier = created.value;

    if (cache && config.cache.cleanupIntervalMs > 0) {
      cache.startAutoCleanup(config.cache.cleanupIntervalMs);
    }
  } else {
    logger.warn('Spam classification is disabled; every result will be undetermined');
  }

  const providers = createContractProviders(config.providers, { eventBus, httpEffects: options.httpEffects });

  const metrics = new PipelineMetricsCollector(options.now);
  metrics.attach(eventBus);

  const contractStatus = new ContractStatusService(
    { chainRegistry: chainRegistry.value, classifier, eventBus, now: options.now, providers },
    config.pipeline
  );
  const health = new HealthAggregator(
    { chainRegistry: chainRegistry.value, classifier, now: options.now, providers },
    {
      environment: config.environment,
      timeoutMs: config.pipeline.healthCheckTimeoutMs,
      version: options.version ?? SERVICE_VERSION,
    }
  );

  logger.info(
    {
      chains: chainRegistry.value.list().filter((chain) => chain.enabled).length,
      classifier: classifier?.modelSpec ?? 'disabled',
      providers: [...providers.keys()],
    },
    'Spam check service initialized'
  );

  return ok({
    chainRegistry: chainRegistry.value,
    classifier,
    contractStatus,
    eventBus,
    health,
    metrics,
    providers,
    async destroy() {
      metrics.detach();
      await Promise.all([...[...providers.values()].map((provider) => provider.destroy()), classifier?.destroy()]);
      await eventBus.drain();
    },
  });
}
