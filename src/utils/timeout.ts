/**
 * Timeout utilities for async operations.
 */

/**
 * Resolves after `ms`, or early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Default bounds for every external call the supervisor makes.
 */
export const TIMEOUTS = {
  /** Single /health attempt while polling for readiness */
  HEALTH_PROBE: 2_000,
  /** Interval between readiness attempts */
  HEALTH_POLL_INTERVAL: 500,
  /** /health and /props when building a status report */
  STATUS: 5_000,
  /** Total wait for a freshly started server to become healthy */
  READY: 60_000,
  /** Chat completion request */
  GENERATION: 300_000,
  /** SIGTERM grace period before SIGKILL */
  GRACEFUL_STOP: 5_000,
  /** Wait after SIGKILL before giving up */
  FORCED_STOP: 2_000,
  /** Process table commands (ps, lsof, powershell) */
  PROCESS_QUERY: 10_000,
  /** Poll interval for process liveness checks */
  PROCESS_POLL_INTERVAL: 250,
} as const;
