import { fileURLToPath } from 'node:url';

import { BUILT_IN_CHAINS } from '@spamcheck/contract-providers';
import type { FetchLike, FetchResponseLike, HttpEffects } from '@spamcheck/http';
import { describe, expect, it, vi } from 'vitest';

import { createSpamCheckService } from '../bootstrap.js';
import { type AppConfigInput, AppConfigSchema } from '../config/app-config.schema.js';
import type { LoadedAppConfig } from '../config/load-config.js';

import { ADDRESS_A } from './test-utils.js';

const REPO_ROOT = fileURLToPath(new URL('../../../../', import.meta.url));

function loadedConfig(input: AppConfigInput, baseDir = REPO_ROOT): LoadedAppConfig {
  const parsed = AppConfigSchema.parse(input);
  return { ...parsed, baseDir, chains: [...BUILT_IN_CHAINS] };
}

const CREDENTIALS: AppConfigInput = {
  classifier: { apiKey: 'test-secret' },
  providers: {
    moralis: { apiKey: 'test-secret' },
    pinax: { apiAuth: 'test-secret', apiUser: 'test-user' },
  },
};

function jsonResponse(status: number, body: unknown): FetchResponseLike {
  return {
    headers: new Headers(),
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

/**
 * Moralis knows the contract, Pinax does not, and the model says "false".
 */
const routedFetch: FetchLike = (url) => {
  if (url.startsWith('https://deep-index.moralis.io/api/v2/nft/')) {
    return Promise.resolve(
      jsonResponse(200, {
        result: [{ contract_type: 'ERC721', name: 'Cool Cats', symbol: 'COOL', token_address: ADDRESS_A }],
      })
    );
  }
  if (url.startsWith('https://api.pinax.network/sql')) {
    return Promise.resolve(jsonResponse(200, { data: [] }));
  }
  if (url === 'https://api.openai.com/v1/chat/completions') {
    return Promise.resolve(
      jsonResponse(200, { choices: [{ finish_reason: 'stop', index: 0, message: { content: 'false', role: 'assistant' } }] })
    );
  }
  return Promise.resolve(jsonResponse(200, {}));
};

function httpEffects(fetch: FetchLike): Partial<HttpEffects> {
  return {
    delay: vi.fn<HttpEffects['delay']>().mockResolvedValue(undefined),
    fetch,
    random: () => 0.5,
  };
}

describe('createSpamCheckService', () => {
  it('wires providers, classifier and cache into one pipeline', async () => {
    const fetch = vi.fn<FetchLike>(routedFetch);
    const service = createSpamCheckService(loadedConfig(CREDENTIALS), { httpEffects: httpEffects(fetch) })._unsafeUnwrap();

    const first = (await service.contractStatus.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap();
    const second = (await service.contractStatus.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap();
    await service.eventBus.drain();

    expect(first[ADDRESS_A]).toEqual({
      cached: false,
      chainId: 1,
      contractSpamStatus: false,
      diagnostics: [{ kind: 'not_found', message: 'pinax: no collection metadata found for contract', provider: 'pinax' }],
      message: 'AI analysis classified as legitimate',
      source: 'moralis',
    });
    expect(second[ADDRESS_A]?.cached).toBe(true);
    expect(second[ADDRESS_A]?.message).toBe('AI analysis classified as legitimate (cached)');

    const completions = fetch.mock.calls.filter(([url]) => url.endsWith('/chat/completions'));
    expect(completions).toHaveLength(1);

    const summary = service.metrics.getSummary();
    expect(summary.counters['requests.completed']).toBe(2);
    expect(summary.counters['cache.hit']).toBe(1);
    expect(summary.counters['cache.miss']).toBe(1);
    expect(summary.cacheHitRate).toBe(0.5);

    await service.destroy();
  });

  it('reports every dependency in the health snapshot', async () => {
    const service = createSpamCheckService(loadedConfig({ ...CREDENTIALS, environment: 'test' }), {
      httpEffects: httpEffects(routedFetch),
      version: '9.9.9',
    })._unsafeUnwrap();

    const health = await service.health.snapshot();

    expect(health.status).toBe('up');
    expect(Object.keys(health.dependencies).sort()).toEqual(['classifier', 'moralis', 'pinax']);
    expect(health.environment).toBe('test');
    expect(health.version).toBe('9.9.9');

    await service.destroy();
  });

  it('runs without a classifier when classification is disabled', async () => {
    const service = createSpamCheckService(loadedConfig({ classifier: { enabled: false } }), {
      httpEffects: httpEffects(routedFetch),
    })._unsafeUnwrap();

    expect(service.classifier).toBeUndefined();
    expect(service.contractStatus.classificationEnabled).toBe(false);

    const response = (await service.contractStatus.handle({ addresses: [ADDRESS_A], chainId: 1 }))._unsafeUnwrap();
    expect(response[ADDRESS_A]?.message).toBe('spam classification is disabled');

    await service.destroy();
  });

  it('leaves disabled providers out of the pipeline', async () => {
    const service = createSpamCheckService(
      loadedConfig({ classifier: { enabled: false }, providers: { pinax: { enabled: false } } }),
      { httpEffects: httpEffects(routedFetch) }
    )._unsafeUnwrap();

    expect([...service.providers.keys()]).toEqual(['moralis']);
    expect(service.chainRegistry.providersInUse()).toEqual(['moralis']);

    await service.destroy();
  });

  it('fails when the model registry cannot be read', () => {
    const error = createSpamCheckService(loadedConfig(CREDENTIALS, '/nonexistent-spamcheck'))._unsafeUnwrapErr();

    expect(error.message.startsWith('Failed to read /nonexistent-spamcheck/config/model-registry.json: ')).toBe(true);
  });
});
