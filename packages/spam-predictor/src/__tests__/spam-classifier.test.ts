import { EventBus } from '@spamcheck/events';
import type { FetchLike, HttpEffects } from '@spamcheck/http';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { PredictionCache } from '../cache/prediction-cache.js';
import { ClassifierConfigSchema } from '../config.schema.js';
import type { SpamPredictorEvent } from '../events.js';
import { extractClassificationFeatures } from '../fingerprint.js';
import { ModelRegistry } from '../registry/model-registry.js';
import { PromptRegistry } from '../registry/prompt-registry.js';
import { SpamClassifier } from '../spam-classifier.js';

import { completion, createMetadata, jsonResponse } from './test-utils.js';

const modelRegistry = ModelRegistry.fromJson({
  models: { spam_classification: { latest: 'ft:gpt-4o-mini:test::abc', v1: 'ft:gpt-4o-mini:test::old' } },
})._unsafeUnwrap();

const promptRegistry = PromptRegistry.fromJson({
  currentVersion: '1.0.0',
  versions: [{ date: '2025-01-01', description: 'test', systemMessage: 'Classify the contract.', version: '1.0.0' }],
})._unsafeUnwrap();

const StopSequencesSchema = z.object({ stop: z.array(z.string()).optional() });

function createClassifier(
  fetch: FetchLike,
  options: { cache?: PredictionCache; eventBus?: EventBus<SpamPredictorEvent>; modelVersion?: string } = {}
) {
  const config = ClassifierConfigSchema.parse({ apiKey: 'test-secret', modelVersion: options.modelVersion });
  const httpEffects: Partial<HttpEffects> = {
    delay: vi.fn<HttpEffects['delay']>().mockResolvedValue(undefined),
    fetch,
    random: () => 0.5,
  };
  return SpamClassifier.create(config, {
    cache: options.cache,
    eventBus: options.eventBus,
    httpEffects,
    modelRegistry,
    now: () => 0,
    promptRegistry,
  })._unsafeUnwrap();
}

function createCache() {
  return new PredictionCache({ maxEntries: 100, ttlMs: 60_000 });
}

describe('SpamClassifier', () => {
  it('sends the prompt and features to the model and returns the verdict', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion('true')));
    const classifier = createClassifier(fetch);
    const metadata = createMetadata();

    const result = (await classifier.classify(1, metadata))._unsafeUnwrap();

    expect(result).toEqual({
      cached: false,
      isSpam: true,
      message: 'AI analysis classified as spam',
      modelId: 'ft:gpt-4o-mini:test::abc',
      promptVersion: '1.0.0',
    });

    const body: unknown = JSON.parse(fetch.mock.calls[0]?.[1].body ?? '');
    expect(body).toMatchObject({
      max_tokens: 10,
      messages: [
        { content: 'Classify the contract.', role: 'system' },
        { content: JSON.stringify(extractClassificationFeatures(1, metadata), null, 2), role: 'user' },
      ],
      model: 'ft:gpt-4o-mini:test::abc',
      temperature: 0,
    });
  });

  it('gets a verdict when the API cuts the answer at the requested stop sequences', async () => {
    const fetch = vi.fn<FetchLike>().mockImplementation((_url, init) => {
      const request = StopSequencesSchema.parse(JSON.parse(init.body ?? ''));
      const answer = 'true\nThe contract mimics a known collection.';
      const cut = Math.min(...(request.stop ?? []).map((stop) => answer.indexOf(stop)).filter((index) => index >= 0));
      return Promise.resolve(jsonResponse(200, completion(Number.isFinite(cut) ? answer.slice(0, cut) : answer)));
    });
    const classifier = createClassifier(fetch);

    const result = (await classifier.classify(1, createMetadata()))._unsafeUnwrap();

    expect(result.isSpam).toBe(true);
    expect(result.message).toBe('AI analysis classified as spam');
  });

  it('answers repeat lookups from the cache without calling the model', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion('false')));
    const classifier = createClassifier(fetch, { cache: createCache() });

    await classifier.classify(1, createMetadata({ source: 'moralis' }));
    const second = (await classifier.classify(1, createMetadata({ source: 'pinax' })))._unsafeUnwrap();

    expect(second.cached).toBe(true);
    expect(second.isSpam).toBe(false);
    expect(second.message).toBe('AI analysis classified as legitimate (cached)');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('never serves a verdict produced by a different model', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion('true')));
    const cache = createCache();

    await createClassifier(fetch, { cache }).classify(1, createMetadata());
    const result = (await createClassifier(fetch, { cache, modelVersion: 'v1' }).classify(1, createMetadata()))._unsafeUnwrap();

    expect(result.cached).toBe(false);
    expect(result.modelId).toBe('ft:gpt-4o-mini:test::old');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('fails on ambiguous answers and does not cache them', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion('maybe')));
    const cache = createCache();
    const classifier = createClassifier(fetch, { cache });

    const error = (await classifier.classify(1, createMetadata()))._unsafeUnwrapErr();
    await classifier.classify(1, createMetadata());

    expect(error.kind).toBe('parse_failure');
    expect(error.message).toBe("model gave an ambiguous answer: 'maybe'");
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(cache.getStats().size).toBe(0);
  });

  it('propagates completion failures with their kind', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(401, 'bad key'));
    const classifier = createClassifier(fetch);

    const error = (await classifier.classify(1, createMetadata()))._unsafeUnwrapErr();

    expect(error.kind).toBe('unauthorized');
    expect(error.severity).toBe('error');
  });

  it('emits a completion event per classification', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(200, completion('true')))
      .mockResolvedValueOnce(jsonResponse(200, completion('unclear')));
    const bus = new EventBus<SpamPredictorEvent>({ onError: vi.fn() });
    const events: SpamPredictorEvent[] = [];
    bus.on('classifier.completed', (event) => events.push(event));
    const classifier = createClassifier(fetch, { eventBus: bus });

    await classifier.classify(1, createMetadata());
    await classifier.classify(137, createMetadata());
    await bus.drain();

    expect(events).toEqual([
      { cached: false, durationMs: 0, outcome: 'spam', type: 'classifier.completed' },
      { cached: false, durationMs: 0, errorKind: 'parse_failure', outcome: 'error', type: 'classifier.completed' },
    ]);
  });

  it('refuses to start when the configured model is missing', () => {
    const config = ClassifierConfigSchema.parse({ apiKey: 'test-secret', modelVersion: 'v9' });

    const error = SpamClassifier.create(config, { modelRegistry, promptRegistry })._unsafeUnwrapErr();

    expect(error.message).toBe("Version 'v9' not found for model type 'spam_classification'");
  });

  it('reports health from the completion API', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, completion('ok')));
    const classifier = createClassifier(fetch);

    expect(await classifier.healthCheck()).toEqual({ status: 'up' });
    expect(classifier.getCacheStats()).toBeUndefined();
  });
});

describe('ClassifierConfigSchema', () => {
  it('requires an API key when enabled', () => {
    const result = ClassifierConfigSchema.safeParse({});

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'OpenAI API key is required when the classifier is enabled (set OPENAI_API_KEY)'
    );
  });

  it('accepts a missing key when disabled', () => {
    expect(ClassifierConfigSchema.safeParse({ enabled: false }).success).toBe(true);
  });

  it.each([{ timeoutSeconds: 0 }, { timeoutSeconds: 301 }, { maxTokens: 4097 }, { temperature: 2.5 }])(
    'rejects out-of-range settings %j',
    (overrides) => {
      expect(ClassifierConfigSchema.safeParse({ apiKey: 'test-secret', ...overrides }).success).toBe(false);
    }
  );
});
