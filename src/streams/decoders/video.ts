/**
 * Video decoding.
 *
 * Pixel decoding is pluggable. The default decoder hands on the encoded
 * access unit, so applications can feed it to the codec library of their
 * choice.
 */

import type { Sample, VideoFrame } from '../../core/models/samples.js';
import type { VideoSensorKind } from '../../core/models/sensors.js';
import type { MediaUnit } from '../transport.js';
import type { SampleDecoder, SampleStamp } from './types.js';

export interface VideoDecoder {
  /**
   * @returns the frame, or null while the decoder is still buffering
   */
  decode(unit: MediaUnit): VideoFrame | null;
}

export class PassthroughVideoDecoder implements VideoDecoder {
  decode(unit: MediaUnit): VideoFrame {
    return Object.freeze({
      codec: unit.info.codec,
      format: unit.info.codec.toLowerCase(),
      width: 0,
      height: 0,
      keyframe: unit.keyframe,
      data: unit.data,
    });
  }
}

export class VideoSampleDecoder implements SampleDecoder {
  readonly kind: VideoSensorKind;
  private readonly decoder: VideoDecoder;

  constructor(kind: VideoSensorKind, decoder: VideoDecoder = new PassthroughVideoDecoder()) {
    this.kind = kind;
    this.decoder = decoder;
  }

  decode(unit: MediaUnit, stamp: SampleStamp): Sample | null {
    const frame = this.decoder.decode(unit);
    if (!frame) return null;

    switch (this.kind) {
      case 'scene':
        return Object.freeze({ kind: 'scene', ...stamp, frame });
      case 'eye_left':
        return Object.freeze({ kind: 'eye_left', ...stamp, frame });
      case 'eye_right':
        return Object.freeze({ kind: 'eye_right', ...stamp, frame });
    }
  }
}
