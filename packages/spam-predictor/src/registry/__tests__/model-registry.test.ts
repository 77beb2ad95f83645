import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { ModelRegistry } from '../model-registry.js';

const SHIPPED_REGISTRY = fileURLToPath(new URL('../../../../../config/model-registry.json', import.meta.url));

describe('ModelRegistry', () => {
  const registry = ModelRegistry.fromJson({
    models: {
      sentiment: { latest: 'gpt-4o-mini' },
      spam_classification: { latest: 'ft:gpt-4o-mini:test::abc', v1: 'ft:gpt-4o-mini:test::old' },
    },
  })._unsafeUnwrap();

  it('resolves a model id by type and version', () => {
    expect(registry.resolve('spam_classification', 'v1')._unsafeUnwrap()).toBe('ft:gpt-4o-mini:test::old');
    expect(registry.modelTypes()).toEqual(['sentiment', 'spam_classification']);
    expect(registry.versions('spam_classification')).toEqual(['latest', 'v1']);
  });

  it('names the missing piece on lookup failure', () => {
    expect(registry.resolve('nope', 'latest')._unsafeUnwrapErr().message).toBe("Model type 'nope' not found");
    expect(registry.resolve('sentiment', 'v9')._unsafeUnwrapErr().message).toBe(
      "Version 'v9' not found for model type 'sentiment'"
    );
  });

  it('rejects model types without versions', () => {
    const error = ModelRegistry.fromJson({ models: { spam_classification: {} } })._unsafeUnwrapErr();

    expect(error.message).toBe("Model type 'spam_classification' has no versions configured");
  });

  it('rejects empty model ids', () => {
    const error = ModelRegistry.fromJson({ models: { spam_classification: { latest: ' ' } } })._unsafeUnwrapErr();

    expect(error.message).toBe('Empty model ID for spam_classification:latest');
  });

  it('rejects files of the wrong shape', () => {
    const error = ModelRegistry.fromJson({ model_registry: {} })._unsafeUnwrapErr();

    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.issues).toEqual(['models: Required']);
  });

  it('loads the shipped registry', () => {
    const shipped = ModelRegistry.fromFile(SHIPPED_REGISTRY)._unsafeUnwrap();

    expect(shipped.resolve('spam_classification', 'latest').isOk()).toBe(true);
  });

  it('reports unreadable files', () => {
    const error = ModelRegistry.fromFile('/nonexistent/model-registry.json')._unsafeUnwrapErr();

    expect(error.message).toMatch(/^Failed to read \/nonexistent\/model-registry\.json: /);
  });
});
