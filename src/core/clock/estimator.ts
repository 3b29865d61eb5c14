/**
 * Clock Offset Estimator
 *
 * Estimates the offset between the local and the device clock by round-trip
 * probing, so device capture timestamps can be expressed on the local clock.
 *
 * Features:
 * - Exponentially weighted offset with a deviation-based uncertainty
 * - Round-trip outlier rejection (confidence drops, last offset kept)
 * - Burst resynchronisation on start and on large drift
 * - Lock-free reads: the offset snapshot is replaced, never mutated
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type { ClockConfig } from '../config/schema.js';
import { silentLogger } from '../logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One round trip: local send/receive times around the device's reading.
 * All values are Unix milliseconds.
 */
export interface ClockProbeResult {
  sentAtMs: number;
  deviceTimeMs: number;
  receivedAtMs: number;
}

export interface ClockProbe {
  probe(timeoutMs: number): Promise<ClockProbeResult>;
  close(): void;
}

export type OffsetConfidence = 'none' | 'low' | 'high';

/**
 * Local clock minus device clock.
 */
export interface ClockOffset {
  readonly estimateNs: bigint;
  readonly estimateMs: number;
  readonly uncertaintyMs: number;
  /** Date.now() of the last accepted sample, null before the first */
  readonly lastUpdated: number | null;
  readonly confidence: OffsetConfidence;
  /** Accepted samples so far */
  readonly samples: number;
}

export interface ClockOffsetEstimatorEvents {
  update: (offset: ClockOffset) => void;
  probeFailed: (error: Error) => void;
}

type EstimatorEventKey = keyof ClockOffsetEstimatorEvents;

export interface ClockOffsetEstimatorOptions {
  probe: ClockProbe;
  config: ClockConfig;
  logger?: Logger;
}

// ============================================================================
// Helpers
// ============================================================================

function msToNs(ms: number): bigint {
  return BigInt(Math.round(ms * 1_000_000));
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[middle] ?? 0;
  }
  return ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
}

/**
 * Offset reported before the first accepted sample.
 */
export const UNKNOWN_OFFSET: ClockOffset = Object.freeze({
  estimateNs: 0n,
  estimateMs: 0,
  uncertaintyMs: Number.POSITIVE_INFINITY,
  lastUpdated: null,
  confidence: 'none',
  samples: 0,
});

// ============================================================================
// Estimator
// ============================================================================

export class ClockOffsetEstimator extends EventEmitter {
  private readonly probe: ClockProbe;
  private readonly config: ClockConfig;
  private readonly logger: Logger;

  private current: ClockOffset = UNKNOWN_OFFSET;
  private deviationMs = 0;
  private meanRttMs: number | null = null;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private resyncing: Promise<void> | null = null;

  constructor(options: ClockOffsetEstimatorOptions) {
    super();
    this.probe = options.probe;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'clock' });
  }

  override on<K extends EstimatorEventKey>(event: K, listener: ClockOffsetEstimatorEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends EstimatorEventKey>(event: K, listener: ClockOffsetEstimatorEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends EstimatorEventKey>(
    event: K,
    ...args: Parameters<ClockOffsetEstimatorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Current offset snapshot.
   */
  estimate(): ClockOffset {
    return this.current;
  }

  /**
   * Device Unix ns to local Unix ns, using the current offset.
   */
  translate(deviceNs: bigint): bigint {
    return deviceNs + this.current.estimateNs;
  }

  /**
   * Local Unix ns back to device Unix ns.
   */
  reverse(localNs: bigint): bigint {
    return localNs - this.current.estimateNs;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Resynchronise once, then probe every `intervalMs`.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    void this.resync().finally(() => {
      this.scheduleNext();
    });
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.probe.close();
  }

  isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.probeOnce().finally(() => {
        this.scheduleNext();
      });
    }, this.config.intervalMs);
  }

  // --------------------------------------------------------------------------
  // Probing
  // --------------------------------------------------------------------------

  /**
   * Issue one probe and fold it into the estimate.
   *
   * @returns whether the sample was accepted
   */
  async probeOnce(): Promise<boolean> {
    const result = await this.safeProbe();
    if (!result) return false;

    const rtt = result.receivedAtMs - result.sentAtMs;
    if (this.isOutlier(rtt)) {
      this.lowerConfidence(`Round trip of ${rtt.toFixed(1)}ms rejected`);
      this.trackRtt(rtt);
      return false;
    }
    this.trackRtt(rtt);

    const sample = this.sampleOffset(result);

    if (this.current.samples === 0) {
      this.deviationMs = 0;
      this.publish(sample, rtt, 1);
      return true;
    }

    if (Math.abs(sample - this.current.estimateMs) > this.config.driftThresholdMs && !this.resyncing) {
      this.logger.warn(
        { estimateMs: this.current.estimateMs, sampleMs: sample },
        'Clock drift beyond threshold, resynchronising'
      );
      void this.resync();
      return false;
    }

    const alpha = this.config.smoothing;
    const estimate = this.current.estimateMs + alpha * (sample - this.current.estimateMs);
    this.deviationMs = (1 - alpha) * this.deviationMs + alpha * Math.abs(sample - estimate);
    this.publish(estimate, rtt, this.current.samples + 1);
    return true;
  }

  /**
   * Replace the estimate with the median of a probe burst.
   * Concurrent calls share one burst.
   */
  resync(): Promise<void> {
    if (!this.resyncing) {
      this.resyncing = this.runBurst().finally(() => {
        this.resyncing = null;
      });
    }
    return this.resyncing;
  }

  private async runBurst(): Promise<void> {
    const offsets: number[] = [];
    const rtts: number[] = [];

    for (let i = 0; i < this.config.burstSize; i++) {
      const result = await this.safeProbe();
      if (!result) continue;

      const rtt = result.receivedAtMs - result.sentAtMs;
      if (rtt < 0 || rtt > this.config.maxRoundTripMs) continue;

      rtts.push(rtt);
      offsets.push(this.sampleOffset(result));
    }

    if (offsets.length === 0) {
      this.lowerConfidence('Resynchronisation produced no usable round trips');
      return;
    }

    const estimate = median(offsets);
    this.deviationMs = median(offsets.map((offset) => Math.abs(offset - estimate)));
    this.meanRttMs = median(rtts);
    this.publish(estimate, this.meanRttMs, this.current.samples + offsets.length);
    this.logger.debug({ estimateMs: estimate, samples: offsets.length }, 'Clock resynchronised');
  }

  private async safeProbe(): Promise<ClockProbeResult | null> {
    try {
      return await this.probe.probe(this.config.probeTimeoutMs);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.lowerConfidence(`Probe failed: ${err.message}`);
      this.emit('probeFailed', err);
      return null;
    }
  }

  private sampleOffset(result: ClockProbeResult): number {
    const rtt = result.receivedAtMs - result.sentAtMs;
    const oneWay = Math.max(0, (rtt - this.config.processingTimeMs) / 2);
    return result.receivedAtMs - (result.deviceTimeMs + oneWay);
  }

  private isOutlier(rtt: number): boolean {
    if (rtt < 0 || rtt > this.config.maxRoundTripMs) return true;
    return this.meanRttMs !== null && rtt - this.meanRttMs > this.config.rttVarianceThresholdMs;
  }

  private trackRtt(rtt: number): void {
    if (rtt < 0) return;
    const alpha = this.config.smoothing;
    this.meanRttMs = this.meanRttMs === null ? rtt : this.meanRttMs + alpha * (rtt - this.meanRttMs);
  }

  // --------------------------------------------------------------------------
  // Snapshot Management
  // --------------------------------------------------------------------------

  private publish(estimateMs: number, rttMs: number, samples: number): void {
    this.current = Object.freeze({
      estimateNs: msToNs(estimateMs),
      estimateMs,
      uncertaintyMs: this.deviationMs + rttMs / 2,
      lastUpdated: Date.now(),
      confidence: 'high',
      samples,
    });
    this.emit('update', this.current);
  }

  private lowerConfidence(reason: string): void {
    this.logger.debug({ reason }, 'Clock offset confidence lowered');
    if (this.current.confidence === 'high') {
      this.current = Object.freeze({
        ...this.current,
        confidence: 'low',
        uncertaintyMs: this.current.uncertaintyMs * 2,
      });
      this.emit('update', this.current);
    }
  }
}
