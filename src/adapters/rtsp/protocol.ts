/**
 * RTSP/1.0 message framing.
 *
 * Over TCP the control connection also carries the media: RTP and RTCP
 * packets are interleaved between RTSP messages as
 *   '$' | channel (1 byte) | length (2 bytes, big-endian) | packet
 */

import { ProtocolError } from '../../core/errors.js';

// ============================================================================
// Constants
// ============================================================================

export const RTSP_VERSION = 'RTSP/1.0';
export const CRLF = '\r\n';
const HEADER_END = Buffer.from('\r\n\r\n');
const INTERLEAVED_MARKER = 0x24;

export type RtspMethod = 'OPTIONS' | 'DESCRIBE' | 'SETUP' | 'PLAY' | 'GET_PARAMETER' | 'TEARDOWN';

// ============================================================================
// Types
// ============================================================================

export interface RtspRequest {
  method: RtspMethod;
  url: string;
  cseq: number;
  headers?: Record<string, string>;
}

export interface RtspResponse {
  statusCode: number;
  statusText: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: Buffer;
}

export interface InterleavedFrame {
  channel: number;
  payload: Buffer;
}

export type RtspIncoming =
  | { type: 'response'; response: RtspResponse }
  | { type: 'request'; method: string; headers: Record<string, string> }
  | { type: 'interleaved'; frame: InterleavedFrame };

// ============================================================================
// Serialisation
// ============================================================================

export function serialiseRequest(request: RtspRequest, userAgent: string): string {
  const lines = [
    `${request.method} ${request.url} ${RTSP_VERSION}`,
    `CSeq: ${String(request.cseq)}`,
    `User-Agent: ${userAgent}`,
  ];
  for (const [name, value] of Object.entries(request.headers ?? {})) {
    lines.push(`${name}: ${value}`);
  }
  return lines.join(CRLF) + CRLF + CRLF;
}

function parseHeaders(lines: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }
  return headers;
}

/**
 * Session id from a Session header such as "12345678;timeout=60".
 */
export function parseSessionHeader(value: string): { id: string; timeoutSec: number | null } {
  const [id = '', ...params] = value.split(';').map((part) => part.trim());
  let timeoutSec: number | null = null;
  for (const param of params) {
    const match = /^timeout=(\d+)$/i.exec(param);
    if (match?.[1]) {
      timeoutSec = Number(match[1]);
    }
  }
  return { id, timeoutSec };
}

// ============================================================================
// Incoming Stream Reader
// ============================================================================

/**
 * Splits the TCP byte stream into RTSP messages and interleaved frames.
 */
export class RtspStreamReader {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Append received bytes and return every complete item.
   *
   * @throws ProtocolError on an unparseable message head
   */
  push(data: Buffer): RtspIncoming[] {
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);
    const items: RtspIncoming[] = [];

    for (;;) {
      const item = this.next();
      if (!item) break;
      items.push(item);
    }
    return items;
  }

  private next(): RtspIncoming | null {
    if (this.buffer.length === 0) return null;

    if (this.buffer[0] === INTERLEAVED_MARKER) {
      if (this.buffer.length < 4) return null;
      const channel = this.buffer.readUInt8(1);
      const length = this.buffer.readUInt16BE(2);
      if (this.buffer.length < 4 + length) return null;

      const payload = this.buffer.subarray(4, 4 + length);
      this.buffer = this.buffer.subarray(4 + length);
      return { type: 'interleaved', frame: { channel, payload } };
    }

    const headerEnd = this.buffer.indexOf(HEADER_END);
    if (headerEnd === -1) return null;

    const head = this.buffer.subarray(0, headerEnd).toString('utf8');
    const [startLine = '', ...headerLines] = head.split(CRLF);
    const headers = parseHeaders(headerLines);
    const contentLength = Number(headers['content-length'] ?? '0');
    if (!Number.isFinite(contentLength) || contentLength < 0) {
      throw new ProtocolError(`Invalid Content-Length: ${headers['content-length'] ?? ''}`);
    }

    const bodyStart = headerEnd + HEADER_END.length;
    if (this.buffer.length < bodyStart + contentLength) return null;

    const body = Buffer.from(this.buffer.subarray(bodyStart, bodyStart + contentLength));
    this.buffer = this.buffer.subarray(bodyStart + contentLength);

    if (startLine.startsWith(RTSP_VERSION)) {
      const match = /^RTSP\/1\.0\s+(\d{3})\s*(.*)$/.exec(startLine);
      if (!match) {
        throw new ProtocolError(`Malformed RTSP status line: ${startLine}`);
      }
      return {
        type: 'response',
        response: {
          statusCode: Number(match[1]),
          statusText: match[2] ?? '',
          headers,
          body,
        },
      };
    }

    const method = startLine.split(' ')[0] ?? '';
    if (method === '') {
      throw new ProtocolError(`Malformed RTSP message: ${startLine}`);
    }
    return { type: 'request', method, headers };
  }
}

/**
 * Resolve a media control attribute against the presentation base URL.
 */
export function resolveControlUrl(base: string, control: string | null): string {
  if (control === null || control === '*' || control === '') {
    return base;
  }
  if (/^rtsps?:\/\//i.test(control)) {
    return control;
  }
  return base.endsWith('/') ? base + control : `${base}/${control}`;
}
