/**
 * Audio decoding.
 *
 * The default decoder passes AAC access units through and converts L16
 * (network byte order) to little-endian signed 16-bit PCM. Applications
 * wanting decoded AAC plug in their own decoder.
 */

import { ProtocolError } from '../../core/errors.js';
import type { AudioChunk, AudioSample } from '../../core/models/samples.js';
import type { MediaUnit } from '../transport.js';
import { AAC_FRAME_SAMPLES } from '../../adapters/rtsp/depacketize.js';
import type { SampleDecoder, SampleStamp } from './types.js';

export interface AudioDecoder {
  decode(unit: MediaUnit): AudioChunk | null;
}

/**
 * Big-endian 16-bit samples to little-endian, in a new buffer.
 */
export function l16ToPcmS16le(data: Uint8Array): Uint8Array {
  const out = new Uint8Array(data.byteLength - (data.byteLength % 2));
  for (let i = 0; i + 1 < data.byteLength; i += 2) {
    out[i] = data[i + 1] ?? 0;
    out[i + 1] = data[i] ?? 0;
  }
  return out;
}

export class DefaultAudioDecoder implements AudioDecoder {
  decode(unit: MediaUnit): AudioChunk {
    const { codec, clockRate, channels } = unit.info;

    switch (codec) {
      case 'MPEG4-GENERIC':
        return Object.freeze({
          format: 'aac',
          sampleRate: clockRate,
          channels,
          sampleCount: AAC_FRAME_SAMPLES,
          data: unit.data,
        });
      case 'L16': {
        const data = l16ToPcmS16le(unit.data);
        return Object.freeze({
          format: 'pcm_s16le',
          sampleRate: clockRate,
          channels,
          sampleCount: data.byteLength / 2 / Math.max(1, channels),
          data,
        });
      }
      default:
        throw new ProtocolError(`Unsupported audio codec ${codec}`);
    }
  }
}

export class AudioSampleDecoder implements SampleDecoder {
  readonly kind = 'audio';
  private readonly decoder: AudioDecoder;

  constructor(decoder: AudioDecoder = new DefaultAudioDecoder()) {
    this.decoder = decoder;
  }

  decode(unit: MediaUnit, stamp: SampleStamp): AudioSample | null {
    const audio = this.decoder.decode(unit);
    if (!audio) return null;
    return Object.freeze({ kind: 'audio', ...stamp, audio });
  }
}
