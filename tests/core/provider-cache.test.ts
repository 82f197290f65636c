import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CancelledError, ProviderCache } from '../../src/core/providers/provider-cache.js';
import type { Providers } from '../../src/core/providers/types.js';
import { FakeRegistry } from '../test-helpers.js';

describe('ProviderCache', () => {
  it('queries each version list once, even for concurrent callers', async () => {
    const registry = new FakeRegistry().publish('core', '1.0.0').publish('core', '2.0.0');
    registry.latency = 5;
    const cache = new ProviderCache(registry.providers);

    const results = await Promise.all([
      cache.availableVersions('core'),
      cache.availableVersions('core'),
      cache.availableVersions('core')
    ]);
    await cache.availableVersions('core');

    assert.equal(registry.versionQueries.get('core'), 1);
    for (const result of results) {
      assert.deepEqual(result, { success: true, data: ['2.0.0', '1.0.0'] });
    }
  });

  it('keeps valid versions only, newest first, without duplicates', async () => {
    const providers: Providers = {
      versions: {
        availableVersions: async () => ({ success: true, data: ['1.0.0', 'v2.0.0', 'junk', '1.10.0', '1.0.0'] }),
        resolveRevision: async () => ({ success: true, data: 'r1' }),
        checkout: async () => ({ success: true, data: '/tmp' })
      },
      manifests: new FakeRegistry()
    };
    const cache = new ProviderCache(providers);

    assert.deepEqual(await cache.availableVersions('core'), { success: true, data: ['2.0.0', '1.10.0', '1.0.0'] });
    assert.deepEqual(cache.peekVersions('core'), ['2.0.0', '1.10.0', '1.0.0']);
  });

  it('memoizes manifests per binding', async () => {
    const registry = new FakeRegistry().publish('core', '1.0.0');
    const cache = new ProviderCache(registry.providers);

    await Promise.all([
      cache.manifest('core', { kind: 'version', version: '1.0.0' }),
      cache.manifest('core', { kind: 'version', version: '1.0.0' })
    ]);

    assert.equal(registry.manifestQueries.get('core@version:1.0.0'), 1);
  });

  it('turns a throwing provider into a provider error', async () => {
    const registry = new FakeRegistry();
    const providers: Providers = {
      versions: {
        availableVersions: async () => {
          throw new Error('connection reset');
        },
        resolveRevision: async () => ({ success: true, data: 'r1' }),
        checkout: async () => ({ success: true, data: '/tmp' })
      },
      manifests: registry
    };
    const cache = new ProviderCache(providers);

    assert.deepEqual(await cache.availableVersions('core'), {
      success: false,
      error: { kind: 'provider-error', identity: 'core', message: 'connection reset' }
    });
  });

  it('rejects pending queries once the signal fires', async () => {
    const registry = new FakeRegistry().publish('core', '1.0.0');
    registry.latency = 50;
    const controller = new AbortController();
    const cache = new ProviderCache(registry.providers, controller.signal);

    const pending = cache.availableVersions('core');
    controller.abort();

    await assert.rejects(pending, CancelledError);
    assert.throws(() => cache.throwIfCancelled(), CancelledError);
  });

  it('forgets everything on clear', async () => {
    const registry = new FakeRegistry().publish('core', '1.0.0');
    const cache = new ProviderCache(registry.providers);

    await cache.availableVersions('core');
    cache.clear();
    assert.equal(cache.peekVersions('core'), undefined);
    await cache.availableVersions('core');

    assert.equal(registry.versionQueries.get('core'), 2);
  });
});
