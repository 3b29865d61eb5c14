/**
 * RTSP media transport.
 *
 * DESCRIBE → SETUP (one interleaved channel pair per media section) → PLAY,
 * then GET_PARAMETER keep-alives until closed. Each track gets its own
 * depacketizer and RTCP-derived clock; units that arrive before the track's
 * first sender report cannot be placed in time and are skipped.
 */

import type { Logger } from 'pino';
import { ClosedError, toError } from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import type { TrackKind } from '../../core/models/sensors.js';
import type { MediaTransport, MediaUnit, TrackInfo } from '../../streams/transport.js';
import { RtspClient } from './client.js';
import { createDepacketizer, type Depacketizer } from './depacketize.js';
import { resolveControlUrl, type InterleavedFrame } from './protocol.js';
import { RtpClock, parseRtpPacket, parseSenderReports, type RtpPacket } from './rtp.js';

// ============================================================================
// Types
// ============================================================================

export interface RtspTransportOptions {
  connectTimeoutMs: number;
  keepAliveIntervalMs: number;
  logger?: Logger;
}

interface TrackState {
  readonly info: TrackInfo;
  readonly rtpChannel: number;
  readonly depacketizer: Depacketizer;
  readonly clock: RtpClock;
  unsynchronisedUnits: number;
}

// ============================================================================
// Transport
// ============================================================================

export class RtspTransport implements MediaTransport {
  readonly url: string;

  private readonly options: RtspTransportOptions;
  private readonly logger: Logger;

  private client: RtspClient | null = null;
  private starting: Promise<void> | null = null;
  private trackStates: TrackState[] = [];
  private readonly channelToTrack = new Map<number, TrackState>();
  private readonly listeners = new Map<TrackKind, Set<(unit: MediaUnit) => void>>();
  private readonly closeListeners = new Set<(reason: string) => void>();
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private playUrl: string | null = null;
  private closed = false;

  constructor(url: string, options: RtspTransportOptions) {
    this.url = url;
    this.options = options;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'rtsp-transport', url });
  }

  start(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClosedError('Transport is closed'));
    }
    this.starting ??= this.negotiate();
    return this.starting;
  }

  tracks(): readonly TrackInfo[] {
    return this.trackStates.map((state) => state.info);
  }

  subscribe(track: TrackKind, listener: (unit: MediaUnit) => void): () => void {
    const set = this.listeners.get(track) ?? new Set<(unit: MediaUnit) => void>();
    this.listeners.set(track, set);
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  onClose(listener: (reason: string) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stopKeepAlive();

    if (this.client) {
      if (this.playUrl) {
        this.client.teardown(this.playUrl);
      }
      this.client.destroy();
      this.client = null;
    }
    this.listeners.clear();
    this.closeListeners.clear();
    this.logger.debug('Transport closed');
  }

  // --------------------------------------------------------------------------
  // Negotiation
  // --------------------------------------------------------------------------

  private async negotiate(): Promise<void> {
    const client = new RtspClient({
      url: this.url,
      timeoutMs: this.options.connectTimeoutMs,
      logger: this.logger,
    });
    this.client = client;

    client.on('interleaved', (frame) => {
      this.handleFrame(frame);
    });
    client.on('closed', (reason) => {
      this.handleLoss(reason);
    });

    try {
      await client.connect();
      const { baseUrl, sdp } = await client.describe();

      const states: TrackState[] = [];
      for (const [index, media] of sdp.media.entries()) {
        const rtpChannel = index * 2;
        await client.setup(resolveControlUrl(baseUrl, media.control), rtpChannel);

        const state: TrackState = {
          info: Object.freeze({
            track: media.track,
            codec: media.codec,
            clockRate: media.clockRate,
            channels: media.channels,
            fmtp: media.fmtp,
          }),
          rtpChannel,
          depacketizer: createDepacketizer(media),
          clock: new RtpClock(media.clockRate),
          unsynchronisedUnits: 0,
        };
        states.push(state);
        this.channelToTrack.set(rtpChannel, state);
        this.channelToTrack.set(rtpChannel + 1, state);
      }
      this.trackStates = states;

      this.playUrl = resolveControlUrl(baseUrl, sdp.control);
      await client.play(this.playUrl);
    } catch (error) {
      const err = toError(error);
      this.logger.debug({ error: err.message }, 'RTSP negotiation failed');
      this.handleLoss(`Negotiation failed: ${err.message}`);
      this.close();
      throw err;
    }

    this.startKeepAlive(client);
    this.logger.debug(
      { tracks: this.trackStates.map((state) => `${state.info.track}:${state.info.codec}`) },
      'Playing'
    );
  }

  private startKeepAlive(client: RtspClient): void {
    const sessionTimeout = client.getSessionTimeoutSec();
    const interval =
      sessionTimeout === null
        ? this.options.keepAliveIntervalMs
        : Math.min(this.options.keepAliveIntervalMs, (sessionTimeout * 1000) / 2);

    this.keepAliveTimer = setInterval(() => {
      const url = this.playUrl;
      if (!url) return;
      client.keepAlive(url).catch((error: unknown) => {
        this.logger.debug({ error: toError(error).message }, 'Keep-alive failed');
      });
    }, interval);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  // --------------------------------------------------------------------------
  // Media
  // --------------------------------------------------------------------------

  private handleFrame(frame: InterleavedFrame): void {
    const state = this.channelToTrack.get(frame.channel);
    if (!state) return;

    if (frame.channel !== state.rtpChannel) {
      for (const report of parseSenderReports(frame.payload)) {
        state.clock.update(report);
      }
      return;
    }

    let packet: RtpPacket;
    try {
      packet = parseRtpPacket(frame.payload);
    } catch (error) {
      this.logger.debug({ error: toError(error).message }, 'Dropping malformed RTP packet');
      return;
    }

    for (const unit of state.depacketizer.push(packet)) {
      const deviceTimestampNs = state.clock.toUnixNs(unit.rtpTimestamp);
      if (deviceTimestampNs === null) {
        state.unsynchronisedUnits++;
        if (state.unsynchronisedUnits === 1) {
          this.logger.debug({ track: state.info.track }, 'Skipping units until the first sender report');
        }
        continue;
      }
      this.deliver(state.info, {
        info: state.info,
        deviceTimestampNs,
        data: unit.data,
        keyframe: unit.keyframe,
      });
    }
  }

  private deliver(info: TrackInfo, unit: MediaUnit): void {
    const listeners = this.listeners.get(info.track);
    if (!listeners) return;
    for (const listener of listeners) {
      listener(unit);
    }
  }

  private handleLoss(reason: string): void {
    if (this.closed) return;
    this.logger.debug({ reason }, 'Transport lost');
    const listeners = [...this.closeListeners];
    this.close();
    for (const listener of listeners) {
      listener(reason);
    }
  }
}

/**
 * Transport factory for the pool.
 */
export function rtspTransportFactory(options: RtspTransportOptions): (url: string) => MediaTransport {
  return (url) => new RtspTransport(url, options);
}
