/**
 * RTSP client over a single TCP connection.
 *
 * Requests are sent one at a time and matched to responses by CSeq. Media
 * arrives interleaved on the same socket and is re-emitted per channel.
 */

import { Socket } from 'node:net';
import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { ConnectionError, ProtocolError, RejectedError, TimeoutError, toError } from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import {
  RtspStreamReader,
  parseSessionHeader,
  serialiseRequest,
  type InterleavedFrame,
  type RtspIncoming,
  type RtspMethod,
  type RtspResponse,
} from './protocol.js';
import { parseSdp, type SessionDescription } from './sdp.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_RTSP_PORT = 554;
const USER_AGENT = 'gazecast';

// ============================================================================
// Types
// ============================================================================

export interface RtspClientEvents {
  interleaved: (frame: InterleavedFrame) => void;
  closed: (reason: string) => void;
}

type RtspClientEventKey = keyof RtspClientEvents;

export interface RtspClientOptions {
  url: string;
  timeoutMs: number;
  logger?: Logger;
}

export interface DescribeResult {
  /** Base for relative control URLs */
  baseUrl: string;
  sdp: SessionDescription;
}

interface PendingRequest {
  resolve: (response: RtspResponse) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

// ============================================================================
// Client
// ============================================================================

export class RtspClient extends EventEmitter {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  private socket: Socket | null = null;
  private readonly reader = new RtspStreamReader();
  private cseq = 0;
  private readonly pending = new Map<number, PendingRequest>();
  private session: string | null = null;
  private sessionTimeoutSec: number | null = null;
  private destroyed = false;

  constructor(options: RtspClientOptions) {
    super();
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'rtsp' });
  }

  override on<K extends RtspClientEventKey>(event: K, listener: RtspClientEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends RtspClientEventKey>(event: K, listener: RtspClientEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends RtspClientEventKey>(event: K, ...args: Parameters<RtspClientEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  // --------------------------------------------------------------------------
  // Connection
  // --------------------------------------------------------------------------

  /**
   * @throws ConnectionError if the TCP connection fails or times out
   */
  connect(): Promise<void> {
    const target = new URL(this.url);
    const host = target.hostname.replace(/^\[|\]$/g, '');
    const port = target.port === '' ? DEFAULT_RTSP_PORT : Number(target.port);

    return new Promise((resolve, reject) => {
      const socket = new Socket();
      socket.setNoDelay(true);
      let connected = false;

      const connectTimeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(`RTSP connection timeout to ${host}:${String(port)}`));
      }, this.timeoutMs);

      socket.on('connect', () => {
        clearTimeout(connectTimeout);
        connected = true;
        this.socket = socket;
        resolve();
      });

      socket.on('data', (data: Buffer) => {
        this.handleData(data);
      });

      socket.on('error', (error) => {
        clearTimeout(connectTimeout);
        if (!connected) {
          reject(new ConnectionError(`RTSP connection failed: ${error.message}`, { cause: error }));
          return;
        }
        this.logger.debug({ error: error.message }, 'RTSP socket error');
      });

      socket.on('close', () => {
        clearTimeout(connectTimeout);
        if (connected) {
          this.handleClose('RTSP connection closed');
        }
      });

      socket.connect(port, host);
    });
  }

  /**
   * Drop the connection without notifying `closed` listeners.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.rejectPending(new ConnectionError('RTSP client destroyed'));
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }

  /**
   * Keep-alive period the server asked for, if any.
   */
  getSessionTimeoutSec(): number | null {
    return this.sessionTimeoutSec;
  }

  // --------------------------------------------------------------------------
  // Requests
  // --------------------------------------------------------------------------

  async describe(): Promise<DescribeResult> {
    const response = await this.request('DESCRIBE', this.url, { Accept: 'application/sdp' });
    const baseUrl = response.headers['content-base'] ?? response.headers['content-location'] ?? this.url;
    return { baseUrl, sdp: parseSdp(response.body.toString('utf8')) };
  }

  async setup(controlUrl: string, rtpChannel: number): Promise<void> {
    const response = await this.request('SETUP', controlUrl, {
      Transport: `RTP/AVP/TCP;unicast;interleaved=${String(rtpChannel)}-${String(rtpChannel + 1)}`,
    });

    const session = response.headers['session'];
    if (!session) {
      throw new ProtocolError('SETUP response carries no Session header');
    }
    const parsed = parseSessionHeader(session);
    this.session = parsed.id;
    this.sessionTimeoutSec = parsed.timeoutSec;
  }

  async play(url: string): Promise<void> {
    await this.request('PLAY', url, { Range: 'npt=0.000-' });
  }

  async keepAlive(url: string): Promise<void> {
    await this.request('GET_PARAMETER', url);
  }

  /**
   * Ask the server to end the session. Does not wait for the answer.
   */
  teardown(url: string): void {
    if (!this.socket || this.session === null) return;
    this.write('TEARDOWN', url, {});
  }

  /**
   * @throws RejectedError on a non-2xx status, TimeoutError when unanswered
   */
  request(method: RtspMethod, url: string, headers: Record<string, string> = {}): Promise<RtspResponse> {
    if (!this.socket || this.destroyed) {
      return Promise.reject(new ConnectionError('RTSP client is not connected'));
    }

    return new Promise((resolve, reject) => {
      const cseq = this.write(method, url, headers);

      const timeout = setTimeout(() => {
        this.pending.delete(cseq);
        reject(new TimeoutError(`RTSP ${method} timed out after ${String(this.timeoutMs)}ms`, this.timeoutMs));
      }, this.timeoutMs);

      this.pending.set(cseq, {
        timeout,
        reject,
        resolve: (response) => {
          if (response.statusCode >= 200 && response.statusCode < 300) {
            resolve(response);
          } else {
            reject(
              new RejectedError(
                `RTSP ${method} failed: ${String(response.statusCode)} ${response.statusText}`,
                response.statusCode
              )
            );
          }
        },
      });
    });
  }

  private write(method: RtspMethod, url: string, headers: Record<string, string>): number {
    const cseq = ++this.cseq;
    const allHeaders = this.session === null ? headers : { ...headers, Session: this.session };
    this.logger.trace({ method, url, cseq }, 'RTSP request');
    this.socket?.write(serialiseRequest({ method, url, cseq, headers: allHeaders }, USER_AGENT));
    return cseq;
  }

  // --------------------------------------------------------------------------
  // Incoming Data
  // --------------------------------------------------------------------------

  private handleData(data: Buffer): void {
    let items: RtspIncoming[];
    try {
      items = this.reader.push(data);
    } catch (error) {
      const err = toError(error);
      this.logger.warn({ error: err.message }, 'Unparseable RTSP data, dropping connection');
      this.socket?.destroy();
      return;
    }

    for (const item of items) {
      switch (item.type) {
        case 'interleaved':
          this.emit('interleaved', item.frame);
          break;
        case 'response': {
          const cseq = Number(item.response.headers['cseq'] ?? '-1');
          const pending = this.pending.get(cseq);
          if (!pending) {
            this.logger.debug({ cseq }, 'Unmatched RTSP response');
            break;
          }
          this.pending.delete(cseq);
          clearTimeout(pending.timeout);
          pending.resolve(item.response);
          break;
        }
        case 'request':
          this.logger.debug({ method: item.method }, 'Ignoring server RTSP request');
          break;
      }
    }
  }

  private handleClose(reason: string): void {
    this.socket = null;
    this.rejectPending(new ConnectionError(reason));
    if (!this.destroyed) {
      this.destroyed = true;
      this.emit('closed', reason);
    }
  }

  private rejectPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pending.clear();
  }
}
