/**
 * Blocking call channel.
 *
 * The calling thread posts a request over a MessagePort and parks on
 * Atomics.wait over a one-slot SharedArrayBuffer. The worker posts its reply
 * first and then flips the slot, so the reply is always queued on the port
 * by the time the caller wakes and reads it with receiveMessageOnPort.
 *
 * Replies to calls that already timed out are discarded by id.
 */

import { receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { ClosedError, TimeoutError, deserialiseError, serialiseError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import {
  parseReply,
  type CallName,
  type CallReply,
  type CallRequest,
  type CallResult,
  type WorkerCalls,
} from './protocol.js';

const SIGNAL_SLOT = 0;
const IDLE = 0;
const REPLIED = 1;

/**
 * Shared signal slot for one channel.
 */
export function createSignal(): SharedArrayBuffer {
  return new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
}

// ============================================================================
// Caller Side
// ============================================================================

export class BlockingChannel {
  private readonly port: MessagePort;
  private readonly signal: Int32Array;
  private readonly logger: Logger;
  private nextId = 1;
  private closed = false;

  constructor(port: MessagePort, signal: SharedArrayBuffer, logger?: Logger) {
    this.port = port;
    this.signal = new Int32Array(signal);
    this.logger = (logger ?? silentLogger()).child({ module: 'channel' });
  }

  /**
   * Post a call and block the current thread until its reply arrives.
   *
   * @throws TimeoutError when no reply arrives within `timeoutMs`
   * @throws the worker-side error, rebuilt as the same class
   */
  call<M extends CallName>(method: M, args: Parameters<WorkerCalls[M]>, timeoutMs: number): CallResult<M> {
    if (this.closed) {
      throw new ClosedError('Channel is closed');
    }

    const id = this.nextId++;
    const request = { id, method, args };
    this.port.postMessage(request);

    const reply = this.waitForReply(id, method, timeoutMs);
    if (!reply.ok) {
      throw deserialiseError(reply.error);
    }
    // The worker answers each method with that method's result type
    return reply.value as CallResult<M>;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.port.close();
  }

  private waitForReply(id: number, method: CallName, timeoutMs: number): CallReply {
    const deadline = performance.now() + timeoutMs;

    for (;;) {
      Atomics.store(this.signal, SIGNAL_SLOT, IDLE);

      for (let received = receiveMessageOnPort(this.port); received; received = receiveMessageOnPort(this.port)) {
        const reply = parseReply(received.message);
        if (reply?.id === id) {
          return reply;
        }
        this.logger.debug({ id: reply?.id }, 'Discarding stale reply');
      }

      const remaining = deadline - performance.now();
      if (remaining <= 0) {
        throw new TimeoutError(`${method} did not complete within ${String(timeoutMs)}ms`, timeoutMs);
      }
      Atomics.wait(this.signal, SIGNAL_SLOT, IDLE, remaining);
    }
  }
}

// ============================================================================
// Worker Side
// ============================================================================

export class ChannelResponder {
  private readonly port: MessagePort;
  private readonly signal: Int32Array;

  constructor(port: MessagePort, signal: SharedArrayBuffer) {
    this.port = port;
    this.signal = new Int32Array(signal);
  }

  resolve(request: CallRequest, value: unknown): void {
    this.send({ id: request.id, ok: true, value });
  }

  reject(request: CallRequest, error: unknown): void {
    this.send({ id: request.id, ok: false, error: serialiseError(error) });
  }

  private send(reply: CallReply): void {
    this.port.postMessage(reply);
    Atomics.store(this.signal, SIGNAL_SLOT, REPLIED);
    Atomics.notify(this.signal, SIGNAL_SLOT);
  }
}
