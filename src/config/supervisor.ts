// ============================================================
// Supervisor & Network Defaults
// ============================================================

export const SUPERVISOR_DEFAULTS = {
  tickIntervalMs: 5_000,
  healthCheckIntervalMs: 5_000,
  /** Delay between detecting a crash and the first restart attempt */
  restartDelayMs: 0,
  maxRestartsPerHour: 10,
  restartWindowMs: 60 * 60 * 1000,
  /** Consecutive failed ticks before the loop is considered degraded */
  failureThreshold: 5,
  staleTickMs: 60_000,
  backoffBaseMs: 30_000,
  backoffMaxMs: 15 * 60 * 1000,
} as const;

export const NETWORK_DEFAULTS = {
  timeoutMs: 10_000,
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
} as const;
