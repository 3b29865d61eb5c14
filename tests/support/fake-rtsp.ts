/**
 * In-process RTSP server speaking just enough of the protocol for the
 * client: DESCRIBE, SETUP, PLAY, GET_PARAMETER and TEARDOWN, with media sent
 * interleaved on the control connection.
 */

import { EventEmitter } from 'node:events';
import { createServer, type Server, type Socket } from 'node:net';
import { RtspStreamReader } from '../../src/adapters/rtsp/protocol.js';
import { interleave } from './rtp.js';

export interface FakeRtspOptions {
  sdp: string;
  /** Advertised in the Session header */
  sessionTimeoutSec?: number;
  /** Status code answered to DESCRIBE */
  describeStatus?: number;
}

export interface RecordedRtspRequest {
  method: string;
  headers: Record<string, string>;
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  404: 'Not Found',
  454: 'Session Not Found',
};

export class FakeRtspServer extends EventEmitter {
  readonly requests: RecordedRtspRequest[] = [];

  private readonly options: FakeRtspOptions;
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private readonly playingSockets = new Set<Socket>();
  private listeningPort = 0;

  private constructor(options: FakeRtspOptions) {
    super();
    this.options = options;
    this.server = createServer((socket) => {
      this.handleConnection(socket);
    });
  }

  static async start(options: FakeRtspOptions): Promise<FakeRtspServer> {
    const server = new FakeRtspServer(options);
    await new Promise<void>((resolve) => {
      server.server.listen(0, '127.0.0.1', resolve);
    });
    const address = server.server.address();
    server.listeningPort = typeof address === 'object' && address ? address.port : 0;
    return server;
  }

  get port(): number {
    return this.listeningPort;
  }

  url(query = 'camera=gaze'): string {
    return `rtsp://127.0.0.1:${String(this.listeningPort)}/?${query}`;
  }

  methods(): string[] {
    return this.requests.map((request) => request.method);
  }

  playingCount(): number {
    return this.playingSockets.size;
  }

  connectionCount(): number {
    return this.sockets.size;
  }

  /**
   * Resolves once `count` connections are playing.
   */
  waitForPlaying(count = 1): Promise<void> {
    if (this.playingSockets.size >= count) return Promise.resolve();
    return new Promise((resolve) => {
      const onPlaying = (): void => {
        if (this.playingSockets.size >= count) {
          this.off('playing', onPlaying);
          resolve();
        }
      };
      this.on('playing', onPlaying);
    });
  }

  waitForMethod(method: string): Promise<void> {
    if (this.methods().includes(method)) return Promise.resolve();
    return new Promise((resolve) => {
      const onRequest = (received: string): void => {
        if (received === method) {
          this.off('request', onRequest);
          resolve();
        }
      };
      this.on('request', onRequest);
    });
  }

  /**
   * Send a payload on an interleaved channel to every playing connection.
   */
  send(channel: number, payload: Buffer): void {
    const framed = interleave(channel, payload);
    for (const socket of this.playingSockets) {
      socket.write(framed);
    }
  }

  dropConnections(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
  }

  async stop(): Promise<void> {
    this.dropConnections();
    await new Promise<void>((resolve) => {
      this.server.close(() => {
        resolve();
      });
    });
  }

  // --------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    const reader = new RtspStreamReader();

    socket.on('data', (data: Buffer) => {
      for (const item of reader.push(data)) {
        if (item.type === 'request') {
          this.handleRequest(socket, item.method, item.headers);
        }
      }
    });
    socket.on('error', () => {
      socket.destroy();
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
      this.playingSockets.delete(socket);
    });
  }

  private handleRequest(socket: Socket, method: string, headers: Record<string, string>): void {
    this.requests.push({ method, headers });
    const cseq = headers['cseq'] ?? '0';
    const timeout = this.options.sessionTimeoutSec ?? 60;

    switch (method) {
      case 'DESCRIBE': {
        const status = this.options.describeStatus ?? 200;
        if (status !== 200) {
          this.reply(socket, status, cseq, {});
          break;
        }
        this.reply(socket, 200, cseq, { 'Content-Type': 'application/sdp' }, this.options.sdp);
        break;
      }
      case 'SETUP':
        this.reply(socket, 200, cseq, {
          Transport: headers['transport'] ?? '',
          Session: `fake-session;timeout=${String(timeout)}`,
        });
        break;
      case 'PLAY':
        this.reply(socket, 200, cseq, { Session: 'fake-session' });
        this.playingSockets.add(socket);
        this.emit('playing');
        break;
      case 'TEARDOWN':
        this.playingSockets.delete(socket);
        this.reply(socket, 200, cseq, {});
        break;
      default:
        this.reply(socket, 200, cseq, {});
    }
    this.emit('request', method);
  }

  private reply(socket: Socket, status: number, cseq: string, headers: Record<string, string>, body = ''): void {
    const lines = [`RTSP/1.0 ${String(status)} ${STATUS_TEXT[status] ?? 'Error'}`, `CSeq: ${cseq}`];
    for (const [name, value] of Object.entries(headers)) {
      lines.push(`${name}: ${value}`);
    }
    lines.push(`Content-Length: ${String(Buffer.byteLength(body))}`);
    socket.write(`${lines.join('\r\n')}\r\n\r\n${body}`);
  }
}

// ============================================================================
// Session Descriptions
// ============================================================================

export const GAZE_SDP = [
  'v=0',
  'o=- 0 0 IN IP4 127.0.0.1',
  's=gaze',
  't=0 0',
  'm=application 0 RTP/AVP 99',
  'a=rtpmap:99 x-gaze/1000000',
  'a=control:trackID=0',
  '',
].join('\r\n');

export const SCENE_AUDIO_SDP = [
  'v=0',
  'o=- 0 0 IN IP4 127.0.0.1',
  's=world',
  't=0 0',
  'a=control:*',
  'm=video 0 RTP/AVP 96',
  'a=rtpmap:96 H264/90000',
  'a=fmtp:96 packetization-mode=1;sprop-parameter-sets=Z0IAKeKQ,aM48gA==',
  'a=control:trackID=0',
  'm=audio 0 RTP/AVP 97',
  'a=rtpmap:97 L16/8000/1',
  'a=control:trackID=1',
  '',
].join('\r\n');
