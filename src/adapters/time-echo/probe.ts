/**
 * Time echo probe.
 *
 * The device runs a small TCP service for clock comparison. The client
 * writes its own Unix time in milliseconds as an 8-byte big-endian unsigned
 * integer; the device answers with 16 bytes: the echoed value followed by
 * its own Unix time in milliseconds, both big-endian.
 *
 * One connection is kept open and reused. A failed probe drops it, and the
 * next probe reconnects.
 */

import { Socket } from 'node:net';
import { performance } from 'node:perf_hooks';
import type { ClockProbe, ClockProbeResult } from '../../core/clock/estimator.js';
import { ConnectionError, ProtocolError, TimeoutError } from '../../core/errors.js';

// ============================================================================
// Constants
// ============================================================================

const REQUEST_BYTES = 8;
const RESPONSE_BYTES = 16;

/**
 * Local Unix time with sub-millisecond resolution.
 */
export function preciseNowMs(): number {
  return performance.timeOrigin + performance.now();
}

// ============================================================================
// Wire Helpers
// ============================================================================

export function encodeEchoRequest(clientTimeMs: number): Buffer {
  const buffer = Buffer.alloc(REQUEST_BYTES);
  buffer.writeBigUInt64BE(BigInt(Math.floor(clientTimeMs)));
  return buffer;
}

export function decodeEchoResponse(data: Buffer): { echoedMs: number; deviceTimeMs: number } {
  if (data.length < RESPONSE_BYTES) {
    throw new ProtocolError(`Time echo response has ${String(data.length)} bytes, expected 16`);
  }
  return {
    echoedMs: Number(data.readBigUInt64BE(0)),
    deviceTimeMs: Number(data.readBigUInt64BE(8)),
  };
}

// ============================================================================
// Probe
// ============================================================================

interface PendingProbe {
  echo: number;
  sentAtMs: number;
  resolve: (result: ClockProbeResult) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

export class TimeEchoProbe implements ClockProbe {
  private readonly host: string;
  private readonly port: number;

  private socket: Socket | null = null;
  private connecting: Promise<Socket> | null = null;
  private buffer = Buffer.alloc(0);
  private pending: PendingProbe | null = null;
  private closed = false;

  constructor(host: string, port: number) {
    this.host = host;
    this.port = port;
  }

  async probe(timeoutMs: number): Promise<ClockProbeResult> {
    if (this.closed) {
      throw new ConnectionError('Time echo probe is closed');
    }
    if (this.pending) {
      throw new ProtocolError('A time echo probe is already in flight');
    }

    const socket = await this.ensureConnected(timeoutMs);
    if (this.closed) {
      throw new ConnectionError('Time echo probe closed');
    }

    return new Promise<ClockProbeResult>((resolve, reject) => {
      const sentAtMs = preciseNowMs();
      const echo = Math.floor(sentAtMs);

      const timeout = setTimeout(() => {
        this.pending = null;
        this.dropConnection();
        reject(new TimeoutError(`Time echo timed out after ${String(timeoutMs)}ms`, timeoutMs));
      }, timeoutMs);

      this.pending = { echo, sentAtMs, resolve, reject, timeout };
      socket.write(encodeEchoRequest(echo));
    });
  }

  close(): void {
    this.closed = true;
    this.failPending(new ConnectionError('Time echo probe closed'));
    this.dropConnection();
  }

  // --------------------------------------------------------------------------
  // Connection Handling
  // --------------------------------------------------------------------------

  private ensureConnected(timeoutMs: number): Promise<Socket> {
    if (this.socket) {
      return Promise.resolve(this.socket);
    }
    if (!this.connecting) {
      this.connecting = this.openSocket(timeoutMs).finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private openSocket(timeoutMs: number): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      socket.setNoDelay(true);

      const connectTimeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(`Time echo connection timeout to ${this.host}:${String(this.port)}`));
      }, timeoutMs);

      socket.once('connect', () => {
        clearTimeout(connectTimeout);
        if (this.closed) {
          socket.destroy();
          reject(new ConnectionError('Time echo probe closed'));
          return;
        }
        this.socket = socket;
        this.buffer = Buffer.alloc(0);
        resolve(socket);
      });

      socket.on('data', (data: Buffer) => {
        this.handleData(data);
      });

      socket.on('error', (error) => {
        clearTimeout(connectTimeout);
        if (this.socket !== socket) {
          reject(new ConnectionError(`Time echo connection failed: ${error.message}`, { cause: error }));
        }
      });

      socket.on('close', () => {
        if (this.socket === socket) {
          this.socket = null;
          this.failPending(new ConnectionError('Time echo connection closed'));
        }
      });

      socket.connect(this.port, this.host);
    });
  }

  private dropConnection(): void {
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.destroy();
    }
    this.buffer = Buffer.alloc(0);
  }

  // --------------------------------------------------------------------------
  // Data Handling
  // --------------------------------------------------------------------------

  private handleData(data: Buffer): void {
    const receivedAtMs = preciseNowMs();
    this.buffer = Buffer.concat([this.buffer, data]);

    while (this.buffer.length >= RESPONSE_BYTES) {
      const response = decodeEchoResponse(this.buffer.subarray(0, RESPONSE_BYTES));
      this.buffer = this.buffer.subarray(RESPONSE_BYTES);

      const pending = this.pending;
      if (!pending || pending.echo !== response.echoedMs) {
        // Late answer to a probe that already timed out
        continue;
      }

      this.pending = null;
      clearTimeout(pending.timeout);
      pending.resolve({
        sentAtMs: pending.sentAtMs,
        deviceTimeMs: response.deviceTimeMs,
        receivedAtMs,
      });
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timeout);
    pending.reject(error);
  }
}
