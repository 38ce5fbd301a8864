/**
 * Integration: the composition root wires every service over pre-registered fakes.
 */

import 'reflect-metadata';
import { describe, it, expect, afterEach } from 'vitest';
import { DI } from '../../src/di/tokens.js';
import { initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import type { CacheService } from '../../src/application/services/cache-service.js';
import type { CacheRootResolver } from '../../src/application/services/cache-root-resolver.js';
import { setupTest, resolve, teardownTest } from '../di/test-container.js';
import { InMemoryCacheFileSystem, InMemoryEnvironmentStore, MutableReferenceSource } from '../fakes/index.js';
import { expectOk } from '../helpers/result-helpers.js';

describe('DI container', () => {
  afterEach(() => {
    teardownTest();
  });

  it('builds a working cache service from the registered ports', async () => {
    await setupTest({
      fs: new InMemoryCacheFileSystem().seed({ '/cache/fx/v001/a.bgeo': 'abc', '/cache/fx/v002/a.bgeo': 'de' }),
      environment: new InMemoryEnvironmentStore({ CACHEPATH: '/cache' }),
      references: new MutableReferenceSource([{ identifier: 'fx', version: '2' }]),
    });

    const cache = resolve<CacheService>(DI.Services.Cache);
    expectOk(await cache.refresh(), 'refresh');

    expect(cache.rows().map((r) => [r.id, r.inUse])).toEqual([
      ['fx', false],
      ['fx/v001', false],
      ['fx/v002', true],
    ]);
  });

  it('resolves services as singletons', async () => {
    await setupTest({ fs: new InMemoryCacheFileSystem() });

    expect(resolve<CacheService>(DI.Services.Cache)).toBe(resolve<CacheService>(DI.Services.Cache));
    expect(resolve<CacheRootResolver>(DI.Services.CacheRootResolver).variableName).toBe('CACHEPATH');
  });

  it('initializes once until reset', async () => {
    await setupTest({ fs: new InMemoryCacheFileSystem() });
    expect(isInitialized()).toBe(true);

    await initializeContainer({ runtimeMode: { kind: 'test' } });
    expect(isInitialized()).toBe(true);

    resetContainer();
    expect(isInitialized()).toBe(false);
  });
});
