import type {
  ChainConfig,
  ChainRegistry,
  ChainRejectionReason,
  ContractMetadataProvider,
  ResolvedChain,
} from '@spamcheck/contract-providers';
import {
  type ContractMetadata,
  type ContractProviderName,
  type ContractStatusRequest,
  type ContractStatusResponse,
  type ContractStatusResult,
  normalizeAddressBatch,
  type ProviderFailure,
} from '@spamcheck/core';
import type { EventSink } from '@spamcheck/events';
import { getLogger, type Logger } from '@spamcheck/logger';
import { type DependencyStatus, PermitAbortedError, runWithDeadline, Semaphore } from '@spamcheck/resilience';
import { type ClassificationResult, ClassifierError, type ClassifyOptions } from '@spamcheck/spam-predictor';
import { err, ok, type Result } from 'neverthrow';

import type { PipelineConfig } from '../config/app-config.schema.js';
import { RequestError, type RequestErrorCode } from '../errors.js';
import type { PipelineEvent, RequestOutcome } from '../events.js';

import {
  CLASSIFICATION_DISABLED_MESSAGE,
  mergeProviderOutcomes,
  type ProviderOutcome,
} from './merge-outcomes.js';

/**
 * What the orchestrator needs from a classifier.
 */
export interface ContractClassifier {
  classify(
    chainId: number,
    metadata: ContractMetadata,
    options?: ClassifyOptions
  ): Promise<Result<ClassificationResult, ClassifierError>>;
  healthCheck(signal?: AbortSignal): Promise<DependencyStatus>;
}

export interface ContractStatusServiceDependencies {
  chainRegistry: ChainRegistry;
  /** Absent when classification is disabled */
  classifier?: ContractClassifier | undefined;
  eventBus?: EventSink<PipelineEvent> | undefined;
  now?: (() => number) | undefined;
  providers: ReadonlyMap<ContractProviderName, ContractMetadataProvider>;
}

export interface HandleOptions {
  signal?: AbortSignal | undefined;
}

interface ValidatedRequest {
  addresses: string[];
  resolved: ResolvedChain;
}

const CHAIN_REJECTION_CODES: Record<ChainRejectionReason, RequestErrorCode> = {
  chain_disabled: 'CHAIN_DISABLED',
  no_enabled_providers: 'NO_ENABLED_PROVIDERS',
  unknown_chain: 'UNSUPPORTED_CHAIN',
};

/**
 * Answers "is this contract spam?" for a batch of addresses on one chain.
 *
 * Every provider enabled for the chain is asked about every address at once,
 * bounded by a per-request semaphore shared with the classifier calls. The
 * whole request runs under one deadline; when it fires or the caller aborts,
 * in-flight calls are cancelled and partial results are dropped.
 */
export class ContractStatusService {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: ContractStatusServiceDependencies,
    private readonly options: PipelineConfig
  ) {
    this.logger = getLogger('ContractStatusService');
    this.now = deps.now ?? (() => Date.now());
  }

  get classificationEnabled(): boolean {
    return this.deps.classifier !== undefined;
  }

  async handle(
    request: ContractStatusRequest,
    options: HandleOptions = {}
  ): Promise<Result<ContractStatusResponse, RequestError>> {
    const startedAt = this.now();

    const validated = this.validate(request);
    if (validated.isErr()) {
      this.logger.warn({ chainId: request.chainId, code: validated.error.code }, validated.error.message);
      this.emitRequestCompleted(request.chainId, request.addresses.length, startedAt, 'rejected');
      return err(validated.error);
    }

    const { addresses, resolved } = validated.value;
    this.logger.debug(
      { addresses: addresses.length, chainId: resolved.chain.chainId, providers: resolved.providers },
      'Processing contract status request'
    );

    const outcome = await runWithDeadline((signal) => this.processAll(resolved, addresses, signal), {
      signal: options.signal,
      timeoutMs: this.options.requestTimeoutMs,
    });

    switch (outcome.status) {
      case 'completed':
        this.emitRequestCompleted(resolved.chain.chainId, addresses.length, startedAt, 'completed');
        return ok(outcome.value);
      case 'timed_out':
        this.logger.warn(
          { chainId: resolved.chain.chainId },
          `Request timed out after ${this.options.requestTimeoutMs}ms`
        );
        this.emitRequestCompleted(resolved.chain.chainId, addresses.length, startedAt, 'timed_out');
        return err(
          new RequestError('REQUEST_TIMEOUT', `request timed out after ${this.options.requestTimeoutMs}ms`, {
            chainId: resolved.chain.chainId,
          })
        );
      case 'cancelled':
        this.logger.info({ chainId: resolved.chain.chainId }, 'Request cancelled by caller');
        this.emitRequestCompleted(resolved.chain.chainId, addresses.length, startedAt, 'cancelled');
        return err(new RequestError('REQUEST_CANCELLED', 'request cancelled', { chainId: resolved.chain.chainId }));
    }
  }

  /**
   * All request-level checks, before any network call.
   */
  validate(request: ContractStatusRequest): Result<ValidatedRequest, RequestError> {
    const context = { chainId: request.chainId };
    const count = request.addresses.length;

    if (count === 0) {
      return err(new RequestError('EMPTY_REQUEST', 'at least one contract address is required', context));
    }

    const max = this.options.maxAddressesPerRequest;
    if (count > max) {
      return err(
        new RequestError('TOO_MANY_ADDRESSES', `too many addresses: ${count} (maximum is ${max} per request)`, context)
      );
    }

    const normalized = normalizeAddressBatch(request.addresses);
    if (normalized.isErr()) {
      return err(new RequestError('INVALID_ADDRESS', normalized.error.message, context));
    }

    return this.deps.chainRegistry
      .validateForRequest(request.chainId)
      .map((resolved) => ({ addresses: normalized.value, resolved }))
      .mapErr((error) => new RequestError(CHAIN_REJECTION_CODES[error.reason], error.message, context));
  }

  private async processAll(
    resolved: ResolvedChain,
    addresses: readonly string[],
    signal: AbortSignal
  ): Promise<ContractStatusResponse> {
    const semaphore = new Semaphore(this.options.fanOutWidth);
    const entries = await Promise.all(
      addresses.map(
        async (address): Promise<[string, ContractStatusResult]> => [
          address,
          await this.processAddress(resolved, address, semaphore, signal),
        ]
      )
    );
    return Object.fromEntries(entries);
  }

  private async processAddress(
    resolved: ResolvedChain,
    address: string,
    semaphore: Semaphore,
    signal: AbortSignal
  ): Promise<ContractStatusResult> {
    const { chain } = resolved;
    const outcomes = await Promise.all(
      resolved.providers.map((provider) => this.queryProvider(provider, chain, address, semaphore, signal))
    );

    const merged = mergeProviderOutcomes(outcomes);
    if (merged.status === 'missing') {
      return undetermined(chain.chainId, merged.message, merged.diagnostics);
    }

    const classifier = this.deps.classifier;
    if (!classifier) {
      return undetermined(chain.chainId, CLASSIFICATION_DISABLED_MESSAGE, merged.diagnostics);
    }

    const classification = await semaphore.run(
      () => classifier.classify(chain.chainId, merged.metadata, { signal }),
      signal
    );

    if (classification.isErr()) {
      const error = classification.error;
      if (error instanceof ClassifierError && error.kind === 'unauthorized') {
        this.logger.error({ address, chainId: chain.chainId }, `Classifier rejected our credentials: ${error.message}`);
      }
      return undetermined(
        chain.chainId,
        `classification unavailable: ${classification.error.message}`,
        merged.diagnostics
      );
    }

    return {
      cached: classification.value.cached,
      chainId: chain.chainId,
      contractSpamStatus: classification.value.isSpam,
      diagnostics: merged.diagnostics,
      message: classification.value.message,
      source: merged.metadata.source,
    };
  }

  private async queryProvider(
    name: ContractProviderName,
    chain: ChainConfig,
    address: string,
    semaphore: Semaphore,
    signal: AbortSignal
  ): Promise<ProviderOutcome> {
    const provider = this.deps.providers.get(name);
    if (!provider) {
      const failure: ProviderFailure = {
        kind: 'unavailable',
        message: `${name}: provider is not configured`,
        provider: name,
      };
      return { provider: name, result: err(failure) };
    }

    const startedAt = this.now();
    const result = await semaphore.run(() => provider.fetchMetadata(chain, address, { signal }), signal);
    const durationMs = this.now() - startedAt;

    if (result.isOk()) {
      this.deps.eventBus?.emit({
        chainId: chain.chainId,
        durationMs,
        provider: name,
        success: true,
        type: 'provider.call.completed',
      });
      return { provider: name, result: ok(result.value) };
    }

    const failure: ProviderFailure =
      result.error instanceof PermitAbortedError
        ? { kind: 'timeout', message: `${name}: ${result.error.message}`, provider: name }
        : { kind: result.error.kind, message: result.error.message, provider: name };

    this.deps.eventBus?.emit({
      chainId: chain.chainId,
      durationMs,
      errorKind: failure.kind,
      provider: name,
      success: false,
      type: 'provider.call.completed',
    });
    if (failure.kind !== 'not_found') {
      this.logger.debug({ chainId: chain.chainId, kind: failure.kind, provider: name }, failure.message);
    }

    return { provider: name, result: err(failure) };
  }

  private emitRequestCompleted(chainId: number, addressCount: number, startedAt: number, outcome: RequestOutcome): void {
    this.deps.eventBus?.emit({
      addressCount,
      chainId,
      durationMs: this.now() - startedAt,
      outcome,
      type: 'request.completed',
    });
  }
}

function undetermined(chainId: number, message: string, diagnostics: ProviderFailure[]): ContractStatusResult {
  return { chainId, contractSpamStatus: null, diagnostics, message };
}
