/**
 * Decoder selection per sensor kind.
 */

import { isVideoSensorKind, type SensorKind } from '../../core/models/sensors.js';
import { AudioSampleDecoder, type AudioDecoder } from './audio.js';
import { EyeEventDecoder } from './eye-events.js';
import { GazeDecoder } from './gaze.js';
import { ImuDecoder } from './imu.js';
import type { SampleDecoder } from './types.js';
import { VideoSampleDecoder, type VideoDecoder } from './video.js';

export interface DecoderOverrides {
  video?: () => VideoDecoder;
  audio?: () => AudioDecoder;
}

export function createSampleDecoder(kind: SensorKind, overrides: DecoderOverrides = {}): SampleDecoder {
  if (isVideoSensorKind(kind)) {
    return new VideoSampleDecoder(kind, overrides.video?.());
  }
  switch (kind) {
    case 'gaze':
      return new GazeDecoder();
    case 'imu':
      return new ImuDecoder();
    case 'eye_events':
      return new EyeEventDecoder();
    case 'audio':
      return new AudioSampleDecoder(overrides.audio?.());
  }
}

export type { SampleDecoder, SampleStamp } from './types.js';
export type { VideoDecoder } from './video.js';
export type { AudioDecoder } from './audio.js';
