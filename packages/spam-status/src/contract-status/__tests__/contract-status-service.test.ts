import { BUILT_IN_CHAINS, type ChainConfig, ChainRegistry } from '@spamcheck/contract-providers';
import { EventBus } from '@spamcheck/events';
import { ClassifierError } from '@spamcheck/spam-predictor';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import {
  ADDRESS_A,
  ADDRESS_B,
  classification,
  createFakeClassifier,
  failed,
  FakeProvider,
  type FakeClassifier,
  found,
  hangUntilAborted,
  type InFlightTracker,
  type Responder,
  sleep,
} from '../../__tests__/test-utils.js';
import { type PipelineConfig, PipelineConfigSchema } from '../../config/app-config.schema.js';
import type { PipelineEvent } from '../../events.js';
import { ContractStatusService } from '../contract-status-service.js';

interface SetupOptions {
  chains?: readonly ChainConfig[];
  classifier?: FakeClassifier | undefined;
  disableClassifier?: boolean;
  eventBus?: EventBus<PipelineEvent>;
  moralis?: Responder;
  pinax?: Responder;
  pipeline?: Partial<PipelineConfig>;
  tracker?: InFlightTracker;
}

function setup(options: SetupOptions = {}) {
  const moralis = new FakeProvider('moralis', options.moralis ?? (() => found('moralis')), options.tracker);
  const pinax = new FakeProvider('pinax', options.pinax ?? (() => found('pinax')), options.tracker);
  const classifier = options.classifier ?? createFakeClassifier();
  const chainRegistry = ChainRegistry.fromConfig(options.chains ?? BUILT_IN_CHAINS)._unsafeUnwrap();

  const service = new ContractStatusService(
    {
      chainRegistry,
      classifier: options.disableClassifier ? undefined : classifier,
      eventBus: options.eventBus,
      now: () => 0,
      providers: new Map([
        ['moralis', moralis],
        ['pinax', pinax],
      ]),
    },
    PipelineConfigSchema.parse(options.pipeline ?? {})
  );

  return { classifier, moralis, pinax, service };
}

function addressFor(index: number): string {
  return `0x${String(index).padStart(40, '0')}`;
}

describe('ContractStatusService', () => {
  describe('request validation', () => {
    it('rejects an empty address list', async () => {
      const { moralis, service } = setup();

      const error = (await service.handle({ addresses: [], chainId: 1 }))._unsafeUnwrapErr();

      expect(error.code).toBe('EMPTY_REQUEST');
      expect(error.message).toBe('at least one contract address is required');
      expect(error.isInvalidRequest).toBe(true);
      expect(moralis.calls).toEqual([]);
    });

    it('counts addresses before deduplication when enforcing the maximum', async () => {
      const { service } = setup({ pipeline: { maxAddressesPerRequest: 2 } });

      const error = (await service.handle({ addresses: [ADDRESS_A, ADDRESS_A, ADDRESS_B], chainId: 1 }))._unsafeUnwrapErr();

      expect(error.code).toBe('TOO_MANY_ADDRESSES');
      expect(error.message).toBe('too many addresses: 3 (maximum is 2 per request)');
    });

    it('lists every malformed address', async () => {
      const { moralis, service } = setup();

      const error = (await service.handle({ addresses: ['0x123', ADDRESS_A, 'nope'], chainId: 1 }))._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_ADDRESS');
      expect(error.message).toBe('Invalid contract address(es): 0x123, nope');
      expect(moralis.calls).toEqual([]);
    });

    it('rejects unknown chains without calling any provider', async () => {
      const { moralis, pinax, service } = setup();

      const error = (await service.handle({ addresses: [ADDRESS_A], chainId: 999 }))._unsafeUnwrapErr();

      expect(error.code).toBe('UNSUPPORTED_CHAIN');
      expect(error.message).toBe(
        'unsupported chain ID: 999. Supported chain IDs are: 1 (Ethereum), 137 (Polygon), 8453 (Base), 43114 (Avalanche), 42161 (Arbitrum)'
      );
      expect(moralis.calls).toEqual([]);
      expect(pinax.calls).toEqual([]);
    });

    it('rejects disabled chains', async () => {
      const { service } = setup({
        chains: [
          ...BUILT_IN_CHAINS,
          { aliases: [], chainId: 10, enabled: false, name: 'Optimism', providers: {}, status: 'planned' },
        ],
      });

      const error = (await service.handle({ addresses: [ADDRESS_A], chainId: 10 }))._unsafeUnwrapErr();

      expect(error.code).toBe('CHAIN_DISABLED');
      expect(error.message).toBe('Chain Optimism (ID: 10) is not yet implemented and is planned for future implementation');
    });

    it('rejects chains with no enabled provider', async () => {
      const { service } = setup({
        chains: [{ aliases: [], chainId: 100, enabled: true, name: 'Gnosis', providers: {}, status: 'partial' }],
      });

      const error = (await service.handle({ addresses: [ADDRESS_A], chainId: 100 }))._unsafeUnwrapErr();

      expect(error.code).toBe('NO_ENABLED_PROVIDERS');
      expect(error.message).toBe('Chain Gnosis (ID: 100) has no enabled metadata providers');
    });
  });

  describe('aggregation', () => {
    it('classifies using metadata from the highest-priority provider', async () => {
      const { classifier, service } = setup();

      const response = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap();

      expect(response).toEqual({
        [ADDRESS_A]: {
          cached: false,
          chainId: 1,
          contractSpamStatus: true,
          diagnostics: [],
          message: 'AI analysis classified as spam',
          source: 'moralis',
        },
      });
      expect(classifier.classify).toHaveBeenCalledTimes(1);
      expect(classifier.classify).toHaveBeenCalledWith(
        1,
        expect.objectContaining({ source: 'moralis' }),
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });

    it('keeps priority order even when a lower-priority provider answers first', async () => {
      const { service } = setup({
        moralis: async () => {
          await sleep(20);
          return found('moralis');
        },
      });

      const response = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap();

      expect(response[ADDRESS_A]?.source).toBe('moralis');
    });

    it('falls back to the next provider and records the failure', async () => {
      const { classifier, service } = setup({ moralis: () => failed('moralis', 'timeout') });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(result?.source).toBe('pinax');
      expect(result?.contractSpamStatus).toBe(true);
      expect(result?.diagnostics).toEqual([{ kind: 'timeout', message: 'moralis: timeout', provider: 'moralis' }]);
      expect(classifier.classify).toHaveBeenCalledWith(1, expect.objectContaining({ source: 'pinax' }), expect.anything());
    });

    it('reports no data when every provider says not found', async () => {
      const { classifier, service } = setup({
        moralis: () => failed('moralis', 'not_found'),
        pinax: () => failed('pinax', 'not_found'),
      });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(result?.contractSpamStatus).toBeNull();
      expect(result?.message).toBe('no data found for the contract on any provider');
      expect(classifier.classify).not.toHaveBeenCalled();
    });

    it('reports a retrieval failure when any provider errored', async () => {
      const { service } = setup({
        moralis: () => failed('moralis', 'not_found'),
        pinax: () => failed('pinax', 'unavailable'),
      });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(result).toEqual({
        chainId: 1,
        contractSpamStatus: null,
        diagnostics: [
          { kind: 'not_found', message: 'moralis: not_found', provider: 'moralis' },
          { kind: 'unavailable', message: 'pinax: unavailable', provider: 'pinax' },
        ],
        message: 'unable to retrieve contract data from external services (moralis: not_found; pinax: unavailable)',
      });
    });

    it('leaves the verdict undetermined when the classifier fails', async () => {
      const classifier = createFakeClassifier(
        err(new ClassifierError("model gave an ambiguous answer: 'maybe'", 'parse_failure'))
      );
      const { service } = setup({ classifier });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(result).toEqual({
        chainId: 1,
        contractSpamStatus: null,
        diagnostics: [],
        message: "classification unavailable: model gave an ambiguous answer: 'maybe'",
      });
    });

    it('leaves the verdict undetermined when classification is disabled', async () => {
      const { classifier, service } = setup({ disableClassifier: true });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(service.classificationEnabled).toBe(false);
      expect(result?.contractSpamStatus).toBeNull();
      expect(result?.message).toBe('spam classification is disabled');
      expect(classifier.classify).not.toHaveBeenCalled();
    });

    it('passes cached verdicts through', async () => {
      const classifier = createFakeClassifier(
        ok(classification({ cached: true, isSpam: false, message: 'AI analysis classified as legitimate (cached)' }))
      );
      const { service } = setup({ classifier });

      const result = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap()[ADDRESS_A];

      expect(result?.cached).toBe(true);
      expect(result?.contractSpamStatus).toBe(false);
      expect(result?.message).toBe('AI analysis classified as legitimate (cached)');
    });

    it('deduplicates addresses case-insensitively and keys results by the normalized form', async () => {
      const { moralis, service } = setup();

      const response = (
        await service.handle({ addresses: ['0x00000000000000000000000000000000000000AA', ADDRESS_A], chainId: 1 })
      )._unsafeUnwrap();

      expect(Object.keys(response)).toEqual([ADDRESS_A]);
      expect(moralis.calls).toEqual([ADDRESS_A]);
    });

    it('returns one result per unique address', async () => {
      const { service } = setup();

      const response = (await service.handle({ addresses: [ADDRESS_A, ADDRESS_B], chainId: 137 }))._unsafeUnwrap();

      expect(Object.keys(response).sort()).toEqual([ADDRESS_A, ADDRESS_B]);
      expect(response[ADDRESS_B]?.chainId).toBe(137);
    });

    it('never runs more outbound calls at once than the fan-out width', async () => {
      const tracker: InFlightTracker = { current: 0, max: 0 };
      const slow =
        (source: 'moralis' | 'pinax'): Responder =>
        async (address) => {
          await sleep(5);
          return found(source, { address });
        };
      const { moralis, pinax, service } = setup({
        moralis: slow('moralis'),
        pinax: slow('pinax'),
        pipeline: { fanOutWidth: 2 },
        tracker,
      });

      const addresses = [1, 2, 3, 4].map(addressFor);
      const response = (await service.handle({ addresses, chainId: 1 }))._unsafeUnwrap();

      expect(Object.keys(response)).toHaveLength(4);
      expect(moralis.calls).toHaveLength(4);
      expect(pinax.calls).toHaveLength(4);
      expect(tracker.max).toBe(2);
    });
  });

  describe('cancellation', () => {
    it('fails the whole request when the deadline passes and aborts in-flight calls', async () => {
      const { moralis, service } = setup({
        moralis: (_address, signal) => hangUntilAborted('moralis', signal),
        pinax: (_address, signal) => hangUntilAborted('pinax', signal),
        pipeline: { requestTimeoutMs: 30 },
      });

      const error = (await service.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrapErr();

      expect(error.code).toBe('REQUEST_TIMEOUT');
      expect(error.message).toBe('request timed out after 30ms');
      expect(error.isInvalidRequest).toBe(false);
      expect(moralis.signals[0]?.aborted).toBe(true);
    });

    it('fails the whole request when the caller aborts', async () => {
      const { pinax, service } = setup({
        moralis: (_address, signal) => hangUntilAborted('moralis', signal),
        pinax: (_address, signal) => hangUntilAborted('pinax', signal),
      });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 5);

      const error = (
        await service.handle({ addresses: [ADDRESS_A], chainId: 1 }, { signal: controller.signal })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('REQUEST_CANCELLED');
      expect(error.message).toBe('request cancelled');
      expect(pinax.signals[0]?.aborted).toBe(true);
    });

    it('does not start any call for an already-aborted request', async () => {
      const { moralis, service } = setup();
      const controller = new AbortController();
      controller.abort();

      const error = (
        await service.handle({ addresses: [ADDRESS_A], chainId: 1 }, { signal: controller.signal })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('REQUEST_CANCELLED');
      expect(moralis.calls).toEqual([]);
    });
  });

  describe('events', () => {
    it('emits one event per provider call and one per request', async () => {
      const eventBus = new EventBus<PipelineEvent>({ onError: vi.fn() });
      const events: PipelineEvent[] = [];
      eventBus.subscribe((event) => events.push(event));
      const { service } = setup({ eventBus, moralis: () => failed('moralis', 'rate_limited') });

      await service.handle({ addresses: [ADDRESS_A], chainId: 1 });
      await eventBus.drain();

      const calls = events.filter((event) => event.type === 'provider.call.completed');
      expect(calls).toHaveLength(2);
      expect(calls).toEqual(
        expect.arrayContaining([
          {
            chainId: 1,
            durationMs: 0,
            errorKind: 'rate_limited',
            provider: 'moralis',
            success: false,
            type: 'provider.call.completed',
          },
          { chainId: 1, durationMs: 0, provider: 'pinax', success: true, type: 'provider.call.completed' },
        ])
      );
      expect(events.at(-1)).toEqual({
        addressCount: 1,
        chainId: 1,
        durationMs: 0,
        outcome: 'completed',
        type: 'request.completed',
      });
    });

    it('records rejected requests', async () => {
      const eventBus = new EventBus<PipelineEvent>({ onError: vi.fn() });
      const events: PipelineEvent[] = [];
      eventBus.subscribe((event) => events.push(event));
      const { service } = setup({ eventBus });

      await service.handle({ addresses: [], chainId: 1 });
      await eventBus.drain();

      expect(events).toEqual([
        { addressCount: 0, chainId: 1, durationMs: 0, outcome: 'rejected', type: 'request.completed' },
      ]);
    });
  });
});
