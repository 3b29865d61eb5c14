/**
 * Minimal SDP parsing: the parts of a session description needed to set up
 * and depacketize each media section.
 */

import { ProtocolError } from '../../core/errors.js';
import type { TrackKind } from '../../core/models/sensors.js';

export interface SdpMedia {
  /** Media type from the m= line: video, audio, application … */
  readonly media: string;
  readonly track: TrackKind;
  readonly payloadType: number;
  /** Encoding name, upper-cased, e.g. H264, MPEG4-GENERIC, L16 */
  readonly codec: string;
  readonly clockRate: number;
  readonly channels: number;
  readonly control: string | null;
  readonly fmtp: Readonly<Record<string, string>>;
}

export interface SessionDescription {
  readonly control: string | null;
  readonly media: readonly SdpMedia[];
}

interface MediaBuilder {
  media: string;
  payloadType: number;
  codec: string | null;
  clockRate: number | null;
  channels: number;
  control: string | null;
  fmtp: Record<string, string>;
}

function trackFor(media: string): TrackKind {
  if (media === 'video') return 'video';
  if (media === 'audio') return 'audio';
  return 'data';
}

function parseFmtp(value: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const part of value.split(';')) {
    const trimmed = part.trim();
    if (trimmed === '') continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) {
      params[trimmed.toLowerCase()] = '';
    } else {
      params[trimmed.slice(0, eq).trim().toLowerCase()] = trimmed.slice(eq + 1).trim();
    }
  }
  return params;
}

function finish(builder: MediaBuilder): SdpMedia {
  const track = trackFor(builder.media);
  return Object.freeze({
    media: builder.media,
    track,
    payloadType: builder.payloadType,
    codec: builder.codec ?? 'UNKNOWN',
    clockRate: builder.clockRate ?? (track === 'video' ? 90000 : 8000),
    channels: builder.channels,
    control: builder.control,
    fmtp: Object.freeze(builder.fmtp),
  });
}

/**
 * @throws ProtocolError if the description has no media sections
 */
export function parseSdp(text: string): SessionDescription {
  const media: SdpMedia[] = [];
  let sessionControl: string | null = null;
  let current: MediaBuilder | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length < 2 || line[1] !== '=') continue;

    const type = line[0];
    const value = line.slice(2);

    if (type === 'm') {
      if (current) media.push(finish(current));
      const [kind = '', , , format = ''] = value.split(/\s+/);
      current = {
        media: kind.toLowerCase(),
        payloadType: Number(format),
        codec: null,
        clockRate: null,
        channels: 1,
        control: null,
        fmtp: {},
      };
      continue;
    }

    if (type !== 'a') continue;

    const colon = value.indexOf(':');
    const attribute = colon === -1 ? value : value.slice(0, colon);
    const attributeValue = colon === -1 ? '' : value.slice(colon + 1);

    if (!current) {
      if (attribute === 'control') sessionControl = attributeValue;
      continue;
    }

    switch (attribute) {
      case 'control':
        current.control = attributeValue;
        break;
      case 'rtpmap': {
        const match = /^(\d+)\s+([^/]+)\/(\d+)(?:\/(\d+))?/.exec(attributeValue);
        if (match && Number(match[1]) === current.payloadType) {
          current.codec = (match[2] ?? '').toUpperCase();
          current.clockRate = Number(match[3]);
          current.channels = match[4] ? Number(match[4]) : 1;
        }
        break;
      }
      case 'fmtp': {
        const space = attributeValue.indexOf(' ');
        if (space !== -1 && Number(attributeValue.slice(0, space)) === current.payloadType) {
          current.fmtp = parseFmtp(attributeValue.slice(space + 1));
        }
        break;
      }
    }
  }

  if (current) media.push(finish(current));

  if (media.length === 0) {
    throw new ProtocolError('Session description has no media sections');
  }

  return Object.freeze({ control: sessionControl, media: Object.freeze(media) });
}
