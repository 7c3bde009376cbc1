/**
 * Hybrid store health checker
 *
 * Counts the rows of every table within a short deadline. The counts are
 * reported as details so an empty store is visible from the readiness check.
 */

import { createDeadline } from '../../../../common/deadline.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { HybridStore } from '../../../hybrid-store/index.js';

/** Default timeout for the store health check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface StoreHealthCheckerOptions {
  /** Name to identify the store in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a health checker for the hybrid store.
 *
 * @example
 * ```typescript
 * const checker = makeStoreHealthChecker(store, { name: 'store' });
 * await checker();
 * // { name: 'store', status: 'healthy', latencyMs: 4, critical: true,
 * //   details: { opex_data_hybrid: 120, bpafg_demand: 48, priority_template: 12 } }
 * ```
 */
export const makeStoreHealthChecker = (
  store: HybridStore,
  options: StoreHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const result = await store.health({ deadline: createDeadline(timeoutMs) });
    const latencyMs = Date.now() - startTime;

    if (result.isErr()) {
      return {
        name,
        status: 'unhealthy',
        message: result.error.message,
        latencyMs,
        critical: true,
      };
    }

    return {
      name,
      status: 'healthy',
      latencyMs,
      critical: true,
      details: { ...result.value.tables },
    };
  };
};
