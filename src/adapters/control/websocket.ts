/**
 * Status push channel.
 *
 * The device pushes one status component per WebSocket message whenever
 * something changes. The socket only parses; ordering and snapshot assembly
 * belong to the control session.
 */

import { EventEmitter } from 'node:events';
import { WebSocket, type RawData } from 'ws';
import type { Logger } from 'pino';
import { ConnectionError, ProtocolError, TimeoutError, toError } from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import { parseComponent, type StatusComponent } from '../../core/models/status.js';

// ============================================================================
// Events
// ============================================================================

export interface StatusSocketEvents {
  component: (component: StatusComponent) => void;
  closed: (reason: string) => void;
  invalidMessage: (error: ProtocolError) => void;
}

type StatusSocketEventKey = keyof StatusSocketEvents;

// ============================================================================
// Socket
// ============================================================================

export class StatusSocket extends EventEmitter {
  private readonly url: string;
  private readonly logger: Logger;
  private socket: WebSocket | null = null;
  private opened = false;
  private closing = false;

  constructor(url: string, logger?: Logger) {
    super();
    this.url = url;
    this.logger = (logger ?? silentLogger()).child({ module: 'status-socket' });
  }

  override on<K extends StatusSocketEventKey>(event: K, listener: StatusSocketEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends StatusSocketEventKey>(event: K, listener: StatusSocketEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends StatusSocketEventKey>(event: K, ...args: Parameters<StatusSocketEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Open the socket.
   *
   * @throws ConnectionError if the handshake fails, TimeoutError if it stalls
   */
  open(timeoutMs: number): Promise<void> {
    if (this.socket) {
      return Promise.reject(new ConnectionError('Status socket already opened'));
    }

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url, { handshakeTimeout: timeoutMs });
      this.socket = socket;

      const timer = setTimeout(() => {
        socket.terminate();
        reject(new TimeoutError(`Status socket did not open within ${String(timeoutMs)}ms`, timeoutMs));
      }, timeoutMs);

      socket.on('open', () => {
        clearTimeout(timer);
        this.opened = true;
        this.logger.debug({ url: this.url }, 'Status socket open');
        resolve();
      });

      socket.on('message', (data: RawData) => {
        this.handleMessage(data);
      });

      socket.on('error', (error: Error) => {
        if (!this.opened) {
          clearTimeout(timer);
          reject(new ConnectionError(`Status socket failed: ${error.message}`, { cause: error }));
          return;
        }
        this.logger.warn({ error: error.message }, 'Status socket error');
      });

      socket.on('close', (code: number, reason: Buffer) => {
        clearTimeout(timer);
        const wasOpen = this.opened;
        this.opened = false;
        if (!wasOpen) {
          reject(new ConnectionError(`Status socket closed during handshake (${String(code)})`));
          return;
        }
        if (!this.closing) {
          const text = reason.toString() || `code ${String(code)}`;
          this.emit('closed', text);
        }
      });
    });
  }

  isOpen(): boolean {
    return this.opened;
  }

  /**
   * Close without emitting `closed`.
   */
  close(): void {
    this.closing = true;
    if (this.socket) {
      this.socket.removeAllListeners('message');
      this.socket.terminate();
      this.socket = null;
    }
    this.opened = false;
  }

  private handleMessage(data: RawData): void {
    let bytes: Buffer;
    if (Array.isArray(data)) {
      bytes = Buffer.concat(data);
    } else if (data instanceof ArrayBuffer) {
      bytes = Buffer.from(data);
    } else {
      bytes = data;
    }
    const text = bytes.toString('utf8');

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      this.emit('invalidMessage', new ProtocolError('Status push is not JSON', { cause: error }));
      return;
    }

    const entries: unknown[] = Array.isArray(payload) ? payload : [payload];
    for (const entry of entries) {
      try {
        const component = parseComponent(entry);
        if (component) {
          this.emit('component', component);
        }
      } catch (error) {
        const err = toError(error);
        this.emit(
          'invalidMessage',
          err instanceof ProtocolError ? err : new ProtocolError(err.message, { cause: err })
        );
      }
    }
  }
}
