/**
 * Reconnect backoff tests.
 */

import { describe, it, expect } from 'vitest';
import { backoffDelay, canRetry } from '../src/core/backoff.js';
import type { ReconnectConfig } from '../src/core/config/schema.js';

const config: ReconnectConfig = {
  enabled: true,
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  jitterMs: 50,
};

describe('backoffDelay', () => {
  it('doubles with every attempt', () => {
    const noJitter = (): number => 0;
    expect(backoffDelay(config, 0, noJitter)).toBe(100);
    expect(backoffDelay(config, 1, noJitter)).toBe(200);
    expect(backoffDelay(config, 2, noJitter)).toBe(400);
  });

  it('adds jitter scaled by jitterMs', () => {
    expect(backoffDelay(config, 0, () => 0.5)).toBe(125);
  });

  it('never exceeds maxDelayMs', () => {
    expect(backoffDelay(config, 5, () => 0.99)).toBe(1000);
  });
});

describe('canRetry', () => {
  it('allows attempts up to maxAttempts', () => {
    expect(canRetry(config, 2)).toBe(true);
    expect(canRetry(config, 3)).toBe(false);
  });

  it('treats maxAttempts 0 as unlimited', () => {
    expect(canRetry({ ...config, maxAttempts: 0 }, 1000)).toBe(true);
  });

  it('refuses when reconnection is disabled', () => {
    expect(canRetry({ ...config, enabled: false }, 0)).toBe(false);
  });
});
