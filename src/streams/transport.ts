/**
 * Media transports and their shared pool.
 *
 * A transport is one connection to a sensor URL delivering timestamped
 * media units per track. Sessions never open transports themselves; they
 * lease them from the pool, so two sessions reading the same URL (scene
 * video and its multiplexed audio) share one connection.
 */

import type { Logger } from 'pino';
import { silentLogger } from '../core/logger.js';
import type { TrackKind } from '../core/models/sensors.js';

// ============================================================================
// Transport Contract
// ============================================================================

export interface TrackInfo {
  readonly track: TrackKind;
  /** Encoding name, upper-cased */
  readonly codec: string;
  readonly clockRate: number;
  readonly channels: number;
  readonly fmtp: Readonly<Record<string, string>>;
}

export interface MediaUnit {
  readonly info: TrackInfo;
  /** Capture time on the device clock (Unix ns) */
  readonly deviceTimestampNs: bigint;
  readonly data: Uint8Array;
  readonly keyframe: boolean;
}

export interface MediaTransport {
  readonly url: string;
  /**
   * Connect and begin playback. Concurrent and repeated calls share one attempt.
   */
  start(): Promise<void>;
  tracks(): readonly TrackInfo[];
  /**
   * @returns a function that removes the listener
   */
  subscribe(track: TrackKind, listener: (unit: MediaUnit) => void): () => void;
  /**
   * Called once if the connection ends without `close()`.
   */
  onClose(listener: (reason: string) => void): () => void;
  /** Idempotent */
  close(): void;
}

export type TransportFactory = (url: string) => MediaTransport;

// ============================================================================
// Pool
// ============================================================================

export interface TransportLease {
  readonly transport: MediaTransport;
  /** Idempotent */
  release(): void;
}

interface PoolEntry {
  readonly transport: MediaTransport;
  refs: number;
  dead: boolean;
}

/**
 * Reference-counted transports keyed by URL.
 */
export class TransportPool {
  private readonly factory: TransportFactory;
  private readonly logger: Logger;
  private readonly entries = new Map<string, PoolEntry>();

  constructor(factory: TransportFactory, logger?: Logger) {
    this.factory = factory;
    this.logger = (logger ?? silentLogger()).child({ module: 'transport-pool' });
  }

  acquire(url: string): TransportLease {
    let entry = this.entries.get(url);
    if (!entry) {
      const transport = this.factory(url);
      const created: PoolEntry = { transport, refs: 0, dead: false };
      transport.onClose(() => {
        // A dead transport is never handed out again
        created.dead = true;
        if (this.entries.get(url) === created) {
          this.entries.delete(url);
        }
      });
      this.entries.set(url, created);
      this.logger.debug({ url }, 'Transport created');
      entry = created;
    }

    const leased = entry;
    leased.refs++;
    let released = false;

    return {
      transport: leased.transport,
      release: () => {
        if (released) return;
        released = true;
        this.releaseEntry(url, leased);
      },
    };
  }

  /**
   * Leases currently held for `url`.
   */
  refCount(url: string): number {
    return this.entries.get(url)?.refs ?? 0;
  }

  size(): number {
    return this.entries.size;
  }

  closeAll(): void {
    for (const entry of this.entries.values()) {
      entry.transport.close();
    }
    this.entries.clear();
  }

  private releaseEntry(url: string, entry: PoolEntry): void {
    entry.refs--;
    if (entry.refs > 0) return;

    if (this.entries.get(url) === entry) {
      this.entries.delete(url);
    }
    entry.transport.close();
    this.logger.debug({ url, dead: entry.dead }, 'Transport released');
  }
}
