/**
 * Stream Session.
 *
 * One sensor's live stream, with its own connect/reconnect lifecycle.
 *
 * State machine:
 *   idle → connecting → streaming → error → connecting (backoff) …
 *   any → closed (terminal)
 *
 * Samples are stamped with both clocks when produced, pushed to listeners
 * and kept in a bounded buffer for pull-style consumers. Each reconnect
 * starts a new epoch; local timestamps never step backwards within one.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { backoffDelay, canRetry } from '../core/backoff.js';
import type { StreamsConfig } from '../core/config/schema.js';
import { toError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import type { Sample } from '../core/models/samples.js';
import { trackForKind, type SensorKind } from '../core/models/sensors.js';
import { SampleBuffer } from './buffer.js';
import { createSampleDecoder, type SampleDecoder } from './decoders/index.js';
import type { MediaUnit, TransportLease, TransportPool } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export type StreamState = 'idle' | 'connecting' | 'streaming' | 'error' | 'closed';

export interface StreamSessionEvents {
  stateChanged: (state: StreamState, previous: StreamState) => void;
  sample: (sample: Sample) => void;
  /** A new connection generation has begun */
  reconnected: (epoch: number) => void;
}

type StreamEventKey = keyof StreamSessionEvents;

/**
 * Device-to-local clock translation.
 */
export interface SampleClock {
  translate(deviceNs: bigint): bigint;
}

const IDENTITY_CLOCK: SampleClock = {
  translate: (deviceNs) => deviceNs,
};

export interface StreamSessionOptions {
  kind: SensorKind;
  url: string;
  pool: TransportPool;
  config: StreamsConfig;
  clock?: SampleClock;
  decoder?: SampleDecoder;
  logger?: Logger;
}

// ============================================================================
// Session
// ============================================================================

export class StreamSession extends EventEmitter {
  readonly kind: SensorKind;
  readonly url: string;

  private readonly pool: TransportPool;
  private readonly config: StreamsConfig;
  private readonly clock: SampleClock;
  private readonly decoder: SampleDecoder;
  private readonly logger: Logger;
  private readonly buffer: SampleBuffer<Sample>;

  private state: StreamState = 'idle';
  private lease: TransportLease | null = null;
  private detachers: (() => void)[] = [];

  private epoch = 0;
  private hasStreamed = false;
  private lastSample: Sample | null = null;
  private lastTimestampNs: bigint | null = null;
  private consecutiveDecodeErrors = 0;
  private received = 0;

  // Reconnection
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(options: StreamSessionOptions) {
    super();
    this.kind = options.kind;
    this.url = options.url;
    this.pool = options.pool;
    this.config = options.config;
    this.clock = options.clock ?? IDENTITY_CLOCK;
    this.decoder = options.decoder ?? createSampleDecoder(options.kind);
    this.logger = (options.logger ?? silentLogger()).child({ module: 'stream', sensor: options.kind });
    this.buffer = new SampleBuffer(options.config.bufferCapacity, options.config.dropPolicy);
  }

  override on<K extends StreamEventKey>(event: K, listener: StreamSessionEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends StreamEventKey>(event: K, listener: StreamSessionEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends StreamEventKey>(event: K, ...args: Parameters<StreamSessionEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Begin connecting in the background. Observe progress via `stateChanged`.
   */
  open(): void {
    if (this.state !== 'idle') return;
    void this.connect();
  }

  /**
   * Withdrawing desire closes the session; re-desiring an idle one opens it.
   */
  setDesired(desired: boolean): void {
    if (desired) {
      this.open();
    } else {
      this.close();
    }
  }

  /**
   * Release the transport and end iteration. Safe to call repeatedly.
   */
  close(): void {
    if (this.state === 'closed') return;

    this.clearReconnectTimer();
    this.detach();
    this.setState('closed');
    this.buffer.close();
    this.logger.debug('Stream session closed');
  }

  getState(): StreamState {
    return this.state;
  }

  getEpoch(): number {
    return this.epoch;
  }

  droppedCount(): number {
    return this.buffer.dropped();
  }

  receivedCount(): number {
    return this.received;
  }

  // --------------------------------------------------------------------------
  // Consumption
  // --------------------------------------------------------------------------

  /**
   * Most recent unconsumed sample, waiting up to `timeoutMs` if there is
   * none. Older buffered samples are discarded.
   *
   * @returns null on timeout or after close
   */
  next(timeoutMs?: number): Promise<Sample | null> {
    return this.buffer.nextNewest(timeoutMs);
  }

  /**
   * Most recently produced sample, consumed or not.
   */
  latest(): Sample | null {
    return this.lastSample;
  }

  /**
   * @returns a function that removes the listener
   */
  onSample(listener: (sample: Sample) => void): () => void {
    this.on('sample', listener);
    return () => {
      this.off('sample', listener);
    };
  }

  /**
   * Buffered samples in order; ends when the session closes.
   */
  async *samples(): AsyncGenerator<Sample, void, undefined> {
    for (;;) {
      const sample = await this.buffer.next();
      if (sample === null) return;
      yield sample;
    }
  }

  // --------------------------------------------------------------------------
  // Connection Handling
  // --------------------------------------------------------------------------

  private async connect(): Promise<void> {
    this.setState('connecting');

    const lease = this.pool.acquire(this.url);
    this.lease = lease;

    try {
      await lease.transport.start();
    } catch (error) {
      if (this.lease !== lease) return;
      this.handleFailure(`Transport failed to start: ${toError(error).message}`);
      return;
    }

    // Closed or superseded while connecting
    if (this.lease !== lease || this.state !== 'connecting') return;

    const track = trackForKind(this.kind);
    this.detachers = [
      lease.transport.subscribe(track, (unit) => {
        this.handleUnit(unit);
      }),
      lease.transport.onClose((reason) => {
        if (this.lease === lease) {
          this.handleFailure(reason);
        }
      }),
    ];

    this.reconnectAttempts = 0;
    this.consecutiveDecodeErrors = 0;
    this.lastTimestampNs = null;

    if (this.hasStreamed) {
      this.epoch++;
      this.logger.info({ epoch: this.epoch }, 'Stream reconnected');
      this.emit('reconnected', this.epoch);
    }
    this.hasStreamed = true;
    this.setState('streaming');
  }

  private handleFailure(reason: string): void {
    if (this.state === 'closed') return;

    this.logger.warn({ reason }, 'Stream failed');
    this.detach();
    this.setState('error');
    this.scheduleReconnect();
  }

  private detach(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
    if (this.lease) {
      const lease = this.lease;
      this.lease = null;
      lease.release();
    }
  }

  private setState(state: StreamState): void {
    if (state === this.state) return;
    const previous = this.state;
    this.state = state;
    this.emit('stateChanged', state, previous);
  }

  // --------------------------------------------------------------------------
  // Sample Production
  // --------------------------------------------------------------------------

  private handleUnit(unit: MediaUnit): void {
    if (this.state !== 'streaming') return;

    let timestampNs = this.clock.translate(unit.deviceTimestampNs);
    if (this.lastTimestampNs !== null && timestampNs < this.lastTimestampNs) {
      timestampNs = this.lastTimestampNs;
    }

    let sample: Sample | null;
    try {
      sample = this.decoder.decode(unit, {
        deviceTimestampNs: unit.deviceTimestampNs,
        timestampNs,
        epoch: this.epoch,
      });
    } catch (error) {
      this.consecutiveDecodeErrors++;
      this.logger.debug(
        { error: toError(error).message, consecutive: this.consecutiveDecodeErrors },
        'Skipping undecodable unit'
      );
      if (this.consecutiveDecodeErrors > this.config.maxConsecutiveDecodeErrors) {
        this.handleFailure(`${String(this.consecutiveDecodeErrors)} consecutive decode errors`);
      }
      return;
    }

    this.consecutiveDecodeErrors = 0;
    if (!sample) return;

    this.lastTimestampNs = timestampNs;
    this.lastSample = sample;
    this.received++;
    this.buffer.push(sample);
    this.emit('sample', sample);
  }

  // --------------------------------------------------------------------------
  // Reconnection
  // --------------------------------------------------------------------------

  private scheduleReconnect(): void {
    if (!canRetry(this.config.reconnect, this.reconnectAttempts)) {
      this.logger.error({ attempts: this.reconnectAttempts }, 'Giving up on stream');
      return;
    }

    const delay = backoffDelay(this.config.reconnect, this.reconnectAttempts);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempts++;
      void this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
