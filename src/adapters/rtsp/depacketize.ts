/**
 * RTP depacketizers: turn packets of one track into media units.
 *
 * - H.264 (RFC 6184): single NAL units, STAP-A and FU-A; one Annex-B access
 *   unit per marker bit, with the SDP parameter sets prepended to keyframes
 *   that do not carry their own
 * - MPEG-4 AAC (RFC 3640, mode AAC-hbr): one unit per access unit
 * - L16: one unit per packet, still big-endian
 * - anything else: the packet payload as is
 */

import type { RtpPacket } from './rtp.js';
import type { SdpMedia } from './sdp.js';

// ============================================================================
// Types
// ============================================================================

export interface DepacketizedUnit {
  readonly rtpTimestamp: number;
  readonly data: Uint8Array;
  readonly keyframe: boolean;
}

export interface Depacketizer {
  push(packet: RtpPacket): DepacketizedUnit[];
  /** Drop partial state, e.g. after a reconnect */
  reset(): void;
}

// ============================================================================
// H.264
// ============================================================================

const START_CODE = Buffer.from([0, 0, 0, 1]);

const NAL_IDR = 5;
const NAL_SPS = 7;
const NAL_PPS = 8;
const NAL_STAP_A = 24;
const NAL_FU_A = 28;

function nalType(nal: Uint8Array): number {
  return (nal[0] ?? 0) & 0x1f;
}

export function parseSpropParameterSets(value: string | undefined): Buffer[] {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '')
    .map((part) => Buffer.from(part, 'base64'))
    .filter((nal) => nal.length > 0);
}

export class H264Depacketizer implements Depacketizer {
  private readonly parameterSets: Buffer[];
  private nals: Buffer[] = [];
  private timestamp: number | null = null;
  private fragments: Buffer[] | null = null;
  private expectedSequence: number | null = null;

  constructor(fmtp: Readonly<Record<string, string>> = {}) {
    this.parameterSets = parseSpropParameterSets(fmtp['sprop-parameter-sets']);
  }

  push(packet: RtpPacket): DepacketizedUnit[] {
    const units: DepacketizedUnit[] = [];

    if (this.expectedSequence !== null && packet.sequence !== this.expectedSequence) {
      // Packet loss: a fragment in progress can no longer be completed
      this.fragments = null;
    }
    this.expectedSequence = (packet.sequence + 1) & 0xffff;

    if (this.timestamp !== null && packet.timestamp !== this.timestamp && this.nals.length > 0) {
      // Marker bit missed, close the previous access unit
      const unit = this.flush();
      if (unit) units.push(unit);
    }
    this.timestamp = packet.timestamp;

    this.handlePayload(packet.payload);

    if (packet.marker) {
      const unit = this.flush();
      if (unit) units.push(unit);
    }
    return units;
  }

  reset(): void {
    this.nals = [];
    this.timestamp = null;
    this.fragments = null;
    this.expectedSequence = null;
  }

  private handlePayload(payload: Buffer): void {
    if (payload.length === 0) return;
    const type = nalType(payload);

    if (type >= 1 && type <= 23) {
      this.nals.push(payload);
      return;
    }

    if (type === NAL_STAP_A) {
      let offset = 1;
      while (offset + 2 <= payload.length) {
        const size = payload.readUInt16BE(offset);
        offset += 2;
        if (size === 0 || offset + size > payload.length) break;
        this.nals.push(payload.subarray(offset, offset + size));
        offset += size;
      }
      return;
    }

    if (type === NAL_FU_A && payload.length >= 2) {
      const indicator = payload.readUInt8(0);
      const header = payload.readUInt8(1);
      const start = (header & 0x80) !== 0;
      const end = (header & 0x40) !== 0;

      if (start) {
        const reconstructed = Buffer.from([(indicator & 0xe0) | (header & 0x1f)]);
        this.fragments = [reconstructed, payload.subarray(2)];
      } else if (this.fragments) {
        this.fragments.push(payload.subarray(2));
      }

      if (end && this.fragments) {
        this.nals.push(Buffer.concat(this.fragments));
        this.fragments = null;
      }
    }
  }

  private flush(): DepacketizedUnit | null {
    const nals = this.nals;
    const timestamp = this.timestamp;
    this.nals = [];
    if (nals.length === 0 || timestamp === null) return null;

    const keyframe = nals.some((nal) => nalType(nal) === NAL_IDR);
    const hasParameterSets = nals.some((nal) => nalType(nal) === NAL_SPS || nalType(nal) === NAL_PPS);
    const ordered = keyframe && !hasParameterSets ? [...this.parameterSets, ...nals] : nals;

    const parts: Buffer[] = [];
    for (const nal of ordered) {
      parts.push(START_CODE, nal);
    }

    return { rtpTimestamp: timestamp, data: Buffer.concat(parts), keyframe };
  }
}

// ============================================================================
// MPEG-4 AAC
// ============================================================================

/** Samples per channel in one AAC access unit */
export const AAC_FRAME_SAMPLES = 1024;

class BitReader {
  private readonly data: Buffer;
  private position = 0;

  constructor(data: Buffer) {
    this.data = data;
  }

  read(bits: number): number {
    let value = 0;
    for (let i = 0; i < bits; i++) {
      const byte = this.data[this.position >> 3] ?? 0;
      const bit = (byte >> (7 - (this.position & 7))) & 1;
      value = value * 2 + bit;
      this.position++;
    }
    return value;
  }
}

export class AacDepacketizer implements Depacketizer {
  private readonly sizeLength: number;
  private readonly indexLength: number;
  private readonly indexDeltaLength: number;

  constructor(fmtp: Readonly<Record<string, string>> = {}) {
    this.sizeLength = Number(fmtp['sizelength'] ?? '13');
    this.indexLength = Number(fmtp['indexlength'] ?? '3');
    this.indexDeltaLength = Number(fmtp['indexdeltalength'] ?? '3');
  }

  push(packet: RtpPacket): DepacketizedUnit[] {
    const payload = packet.payload;
    if (payload.length < 2) return [];

    const headersBits = payload.readUInt16BE(0);
    const headersBytes = Math.ceil(headersBits / 8);
    if (2 + headersBytes > payload.length) return [];

    const reader = new BitReader(payload.subarray(2, 2 + headersBytes));
    const sizes: number[] = [];
    let consumed = 0;
    while (consumed + this.sizeLength <= headersBits) {
      sizes.push(reader.read(this.sizeLength));
      const indexBits = sizes.length === 1 ? this.indexLength : this.indexDeltaLength;
      reader.read(indexBits);
      consumed += this.sizeLength + indexBits;
    }

    const units: DepacketizedUnit[] = [];
    let offset = 2 + headersBytes;
    sizes.forEach((size, index) => {
      if (offset + size > payload.length) return;
      units.push({
        rtpTimestamp: (packet.timestamp + index * AAC_FRAME_SAMPLES) >>> 0,
        data: payload.subarray(offset, offset + size),
        keyframe: true,
      });
      offset += size;
    });
    return units;
  }

  reset(): void {
    // Stateless
  }
}

// ============================================================================
// Packet-per-unit Payloads
// ============================================================================

export class PassthroughDepacketizer implements Depacketizer {
  push(packet: RtpPacket): DepacketizedUnit[] {
    if (packet.payload.length === 0) return [];
    return [{ rtpTimestamp: packet.timestamp, data: packet.payload, keyframe: true }];
  }

  reset(): void {
    // Stateless
  }
}

export function createDepacketizer(media: SdpMedia): Depacketizer {
  switch (media.codec) {
    case 'H264':
      return new H264Depacketizer(media.fmtp);
    case 'MPEG4-GENERIC':
      return new AacDepacketizer(media.fmtp);
    default:
      // L16 and the opaque data formats carry one unit per packet
      return new PassthroughDepacketizer();
  }
}
