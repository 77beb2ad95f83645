import path from 'node:path';

import type { ConfigError, ContractMetadata } from '@spamcheck/core';
import type { EventSink } from '@spamcheck/events';
import type { HttpEffects } from '@spamcheck/http';
import { getLogger, type Logger } from '@spamcheck/logger';
import { type CacheStats, down, type DependencyStatus } from '@spamcheck/resilience';
import { err, ok, type Result } from 'neverthrow';

import { PredictionCache } from './cache/prediction-cache.js';
import type { ClassifierConfig } from './config.schema.js';
import { ClassifierError } from './errors.js';
import type { SpamPredictorEvent } from './events.js';
import { extractClassificationFeatures, fingerprintFeatures } from './fingerprint.js';
import { OpenAiCompletionClient, VERDICT_STOP_SEQUENCES } from './openai/completion-client.js';
import { ModelRegistry } from './registry/model-registry.js';
import { type PromptVersion, PromptRegistry } from './registry/prompt-registry.js';
import { parseVerdict } from './response-parser.js';

export const SPAM_MESSAGE = 'AI analysis classified as spam';
export const LEGITIMATE_MESSAGE = 'AI analysis classified as legitimate';

export interface ClassificationResult {
  cached: boolean;
  isSpam: boolean;
  message: string;
  modelId: string;
  promptVersion: string;
}

export interface ClassifyOptions {
  signal?: AbortSignal | undefined;
}

export interface SpamClassifierDependencies {
  cache?: PredictionCache | undefined;
  completionClient?: OpenAiCompletionClient | undefined;
  eventBus?: EventSink<SpamPredictorEvent> | undefined;
  httpEffects?: Partial<HttpEffects> | undefined;
  modelRegistry: ModelRegistry;
  now?: (() => number) | undefined;
  promptRegistry: PromptRegistry;
}

/**
 * Classifies contracts as spam through a chat-completions model, caching
 * definitive verdicts. Ambiguous model output is an error, never a default.
 */
export class SpamClassifier {
  private readonly logger: Logger;
  private readonly client: OpenAiCompletionClient;
  private readonly cache: PredictionCache | undefined;
  private readonly eventBus: EventSink<SpamPredictorEvent> | undefined;
  private readonly now: () => number;
  private readonly modelRegistry: ModelRegistry;
  private readonly promptRegistry: PromptRegistry;

  private constructor(
    private readonly config: ClassifierConfig,
    private readonly modelId: string,
    private readonly prompt: PromptVersion,
    deps: SpamClassifierDependencies
  ) {
    this.logger = getLogger('SpamClassifier');
    this.cache = deps.cache;
    this.eventBus = deps.eventBus;
    this.now = deps.now ?? (() => Date.now());
    this.modelRegistry = deps.modelRegistry;
    this.promptRegistry = deps.promptRegistry;
    this.client =
      deps.completionClient ??
      new OpenAiCompletionClient(
        {
          apiKey: config.apiKey,
          baseUrl: config.baseUrl,
          healthCheckTimeoutMs: config.healthCheckTimeoutMs,
          healthModel: config.healthModel,
          organization: config.organization,
          retries: config.retries,
          timeoutMs: config.timeoutSeconds * 1000,
        },
        deps.httpEffects
      );
  }

  /**
   * Resolve the configured model and current prompt up front so a bad
   * registry fails at startup rather than on the first request.
   */
  static create(config: ClassifierConfig, deps: SpamClassifierDependencies): Result<SpamClassifier, ConfigError> {
    return deps.modelRegistry.resolve(config.modelType, config.modelVersion).map((modelId) => {
      const prompt = deps.promptRegistry.current();
      const classifier = new SpamClassifier(config, modelId, prompt, deps);
      classifier.logger.info(
        `Spam classifier ready - Model: ${config.modelType}:${config.modelVersion} (${modelId}), Prompt: ${prompt.version}`
      );
      return classifier;
    });
  }

  /**
   * Load both registries from disk, relative to `baseDir`.
   */
  static fromFiles(
    config: ClassifierConfig,
    baseDir: string,
    deps: Omit<SpamClassifierDependencies, 'modelRegistry' | 'promptRegistry'> = {}
  ): Result<SpamClassifier, ConfigError> {
    const modelRegistry = ModelRegistry.fromFile(path.resolve(baseDir, config.modelRegistryPath));
    if (modelRegistry.isErr()) return err(modelRegistry.error);

    const promptRegistry = PromptRegistry.fromFile(path.resolve(baseDir, config.promptRegistryPath));
    if (promptRegistry.isErr()) return err(promptRegistry.error);

    return SpamClassifier.create(config, {
      ...deps,
      modelRegistry: modelRegistry.value,
      promptRegistry: promptRegistry.value,
    });
  }

  get modelSpec(): string {
    return `${this.config.modelType}:${this.config.modelVersion}`;
  }

  async classify(
    chainId: number,
    metadata: ContractMetadata,
    options: ClassifyOptions = {}
  ): Promise<Result<ClassificationResult, ClassifierError>> {
    const startedAt = this.now();
    const features = extractClassificationFeatures(chainId, metadata);
    const cacheKey = PredictionCache.key(fingerprintFeatures(features), this.modelId, this.prompt.version);

    const cached = this.cache?.get(cacheKey);
    if (cached) {
      this.logger.debug({ address: features.address, chainId }, 'Prediction cache hit');
      this.emitCompleted(startedAt, true, cached.verdict);
      return ok(this.result(cached.verdict, `${cached.message} (cached)`, true));
    }

    const completion = await this.client.complete(
      {
        maxTokens: this.config.maxTokens,
        messages: [
          { content: this.prompt.systemMessage, role: 'system' },
          { content: JSON.stringify(features, null, 2), role: 'user' },
        ],
        model: this.modelId,
        stop: VERDICT_STOP_SEQUENCES,
        temperature: this.config.temperature,
      },
      options.signal
    );

    if (completion.isErr()) {
      this.logger.warn({ address: features.address, chainId, kind: completion.error.kind }, completion.error.message);
      this.emitFailed(startedAt, completion.error);
      return err(completion.error);
    }

    const verdict = parseVerdict(completion.value);
    if (verdict === undefined) {
      const error = new ClassifierError(`model gave an ambiguous answer: '${completion.value}'`, 'parse_failure');
      this.logger.warn({ address: features.address, chainId, rawResponse: completion.value }, 'Model gave ambiguous response');
      this.emitFailed(startedAt, error);
      return err(error);
    }

    const message = verdict ? SPAM_MESSAGE : LEGITIMATE_MESSAGE;
    this.cache?.put(cacheKey, verdict, message);
    this.logger.info(
      { address: features.address, chainId, classification: verdict ? 'spam' : 'legitimate' },
      'Contract classified'
    );
    this.emitCompleted(startedAt, false, verdict);
    return ok(this.result(verdict, message, false));
  }

  /**
   * API reachability, plus the model and current prompt still resolving.
   */
  async healthCheck(signal?: AbortSignal): Promise<DependencyStatus> {
    const model = this.modelRegistry.resolve(this.config.modelType, this.config.modelVersion);
    if (model.isErr()) {
      return down('unavailable', model.error.message);
    }
    const prompt = this.promptRegistry.get(this.prompt.version);
    if (prompt.isErr()) {
      return down('unavailable', prompt.error.message);
    }

    return this.client.healthCheck(signal);
  }

  getCacheStats(): CacheStats | undefined {
    return this.cache?.getStats();
  }

  async destroy(): Promise<void> {
    this.cache?.stopAutoCleanup();
    await this.client.close();
  }

  private result(isSpam: boolean, message: string, cached: boolean): ClassificationResult {
    return { cached, isSpam, message, modelId: this.modelId, promptVersion: this.prompt.version };
  }

  private emitCompleted(startedAt: number, cached: boolean, isSpam: boolean): void {
    this.eventBus?.emit({
      cached,
      durationMs: this.now() - startedAt,
      outcome: isSpam ? 'spam' : 'legitimate',
      type: 'classifier.completed',
    });
  }

  private emitFailed(startedAt: number, error: ClassifierError): void {
    this.eventBus?.emit({
      cached: false,
      durationMs: this.now() - startedAt,
      errorKind: error.kind,
      outcome: 'error',
      type: 'classifier.completed',
    });
  }
}
