/**
 * Reconnect backoff shared by the control and stream state machines.
 */

import type { ReconnectConfig } from './config/schema.js';

/**
 * Delay before reconnect attempt `attempt` (0-based): exponential growth
 * from `initialDelayMs` plus random jitter, capped at `maxDelayMs`.
 */
export function backoffDelay(
  config: ReconnectConfig,
  attempt: number,
  random: () => number = Math.random
): number {
  const { initialDelayMs, maxDelayMs, jitterMs } = config;
  return Math.min(initialDelayMs * Math.pow(2, attempt) + random() * jitterMs, maxDelayMs);
}

/**
 * Whether another attempt is allowed. `maxAttempts` 0 means unlimited.
 */
export function canRetry(config: ReconnectConfig, attempts: number): boolean {
  if (!config.enabled) return false;
  return config.maxAttempts === 0 || attempts < config.maxAttempts;
}
