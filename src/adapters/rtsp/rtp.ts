/**
 * RTP and RTCP packet parsing, and the RTP-to-wall-clock mapping that
 * sender reports provide.
 */

import { ProtocolError } from '../../core/errors.js';

// ============================================================================
// RTP
// ============================================================================

export interface RtpPacket {
  readonly marker: boolean;
  readonly payloadType: number;
  readonly sequence: number;
  /** 32-bit media clock timestamp */
  readonly timestamp: number;
  readonly ssrc: number;
  readonly payload: Buffer;
}

const RTP_HEADER_BYTES = 12;

/**
 * @throws ProtocolError on a truncated or non-version-2 packet
 */
export function parseRtpPacket(data: Buffer): RtpPacket {
  if (data.length < RTP_HEADER_BYTES) {
    throw new ProtocolError(`RTP packet too short (${String(data.length)} bytes)`);
  }

  const first = data.readUInt8(0);
  const version = first >> 6;
  if (version !== 2) {
    throw new ProtocolError(`Unsupported RTP version ${String(version)}`);
  }
  const hasPadding = (first & 0x20) !== 0;
  const hasExtension = (first & 0x10) !== 0;
  const csrcCount = first & 0x0f;

  const second = data.readUInt8(1);
  let offset = RTP_HEADER_BYTES + csrcCount * 4;

  if (hasExtension) {
    if (data.length < offset + 4) {
      throw new ProtocolError('RTP header extension truncated');
    }
    offset += 4 + data.readUInt16BE(offset + 2) * 4;
  }

  let end = data.length;
  if (hasPadding) {
    end -= data.readUInt8(data.length - 1);
  }
  if (end < offset) {
    throw new ProtocolError('RTP payload bounds invalid');
  }

  return {
    marker: (second & 0x80) !== 0,
    payloadType: second & 0x7f,
    sequence: data.readUInt16BE(2),
    timestamp: data.readUInt32BE(4),
    ssrc: data.readUInt32BE(8),
    payload: data.subarray(offset, end),
  };
}

// ============================================================================
// RTCP
// ============================================================================

export interface SenderReport {
  readonly ssrc: number;
  readonly ntpSeconds: number;
  readonly ntpFraction: number;
  readonly rtpTimestamp: number;
}

const RTCP_SENDER_REPORT = 200;

/**
 * Sender reports contained in a (possibly compound) RTCP packet.
 * Other report types are skipped.
 */
export function parseSenderReports(data: Buffer): SenderReport[] {
  const reports: SenderReport[] = [];
  let offset = 0;

  while (offset + 4 <= data.length) {
    const packetType = data.readUInt8(offset + 1);
    const length = (data.readUInt16BE(offset + 2) + 1) * 4;
    if (offset + length > data.length) break;

    if (packetType === RTCP_SENDER_REPORT && length >= 24) {
      reports.push({
        ssrc: data.readUInt32BE(offset + 4),
        ntpSeconds: data.readUInt32BE(offset + 8),
        ntpFraction: data.readUInt32BE(offset + 12),
        rtpTimestamp: data.readUInt32BE(offset + 16),
      });
    }
    offset += length;
  }

  return reports;
}

// ============================================================================
// Clock Mapping
// ============================================================================

/** Seconds between the NTP epoch (1900) and the Unix epoch (1970) */
export const NTP_UNIX_OFFSET_SECONDS = 2_208_988_800;

const NS_PER_SECOND = 1_000_000_000n;

export function ntpToUnixNs(seconds: number, fraction: number): bigint {
  const wholeNs = BigInt(seconds - NTP_UNIX_OFFSET_SECONDS) * NS_PER_SECOND;
  const fractionNs = (BigInt(fraction) * NS_PER_SECOND) >> 32n;
  return wholeNs + fractionNs;
}

/**
 * Signed distance from `from` to `to` on the 32-bit RTP clock.
 */
export function rtpDelta(from: number, to: number): number {
  return (to - from) | 0;
}

/**
 * Maps a track's RTP timestamps onto the sender's Unix clock.
 */
export class RtpClock {
  private readonly clockRate: number;
  private reference: { rtp: number; unixNs: bigint } | null = null;

  constructor(clockRate: number) {
    this.clockRate = clockRate;
  }

  update(report: SenderReport): void {
    this.reference = {
      rtp: report.rtpTimestamp,
      unixNs: ntpToUnixNs(report.ntpSeconds, report.ntpFraction),
    };
  }

  isSynchronised(): boolean {
    return this.reference !== null;
  }

  /**
   * @returns device Unix ns, or null before the first sender report
   */
  toUnixNs(rtpTimestamp: number): bigint | null {
    if (!this.reference) return null;
    const ticks = rtpDelta(this.reference.rtp, rtpTimestamp);
    return this.reference.unixNs + (BigInt(ticks) * NS_PER_SECOND) / BigInt(this.clockRate);
  }
}
