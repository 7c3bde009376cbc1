import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

type ReadinessStatus = ReadinessResponse['status'];

const fromSettled = (
  result: PromiseSettledResult<HealthCheckResult>,
  index: number
): HealthCheckResult =>
  result.status === 'fulfilled'
    ? result.value
    : {
        name: `check-${String(index + 1)}`,
        status: 'unhealthy',
        message: result.reason instanceof Error ? result.reason.message : 'Check failed',
        critical: true,
      };

/**
 * unhealthy: a critical check failed (503)
 * degraded: only non-critical checks failed (200)
 */
const overallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'unhealthy');
  if (failed.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return failed.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs every checker concurrently and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(fromSettled);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
