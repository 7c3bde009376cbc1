import { err } from 'neverthrow';
import { describe, it, expect } from 'vitest';

import { makeStoreHealthChecker } from '@/modules/health/index.js';
import { createStoreUnavailableError, makeInMemoryHybridStore } from '@/modules/hybrid-store/index.js';

import { makeDemandRecord } from '../../fixtures/builders.js';
import { loadTestCatalog, overrideStore } from '../../fixtures/fakes.js';

describe('makeStoreHealthChecker', () => {
  it('reports row counts per table', async () => {
    const store = makeInMemoryHybridStore({ catalog: loadTestCatalog(), dimensions: 3 });
    await store.upsert(makeDemandRecord());

    const result = await makeStoreHealthChecker(store, { name: 'store' })();

    expect(result).toMatchObject({
      name: 'store',
      status: 'healthy',
      critical: true,
      details: { opex_data_hybrid: 0, bpafg_demand: 1, priority_template: 0 },
    });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('reports an unavailable store as unhealthy', async () => {
    const store = overrideStore(makeInMemoryHybridStore({ catalog: loadTestCatalog(), dimensions: 3 }), {
      health: async () => err(createStoreUnavailableError('health')),
    });

    const result = await makeStoreHealthChecker(store, { name: 'store', timeoutMs: 100 })();

    expect(result).toMatchObject({
      name: 'store',
      status: 'unhealthy',
      message: "Store unavailable during 'health' after one reconnect attempt",
      critical: true,
    });
    expect(result.details).toBeUndefined();
  });
});
