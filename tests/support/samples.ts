/**
 * Sample builders.
 */

import type { AudioSample, GazeSample, VideoSample } from '../../src/core/models/samples.js';

export function gazeAt(timestampNs: bigint, epoch = 0, x = 0.5, y = 0.5): GazeSample {
  return {
    kind: 'gaze',
    deviceTimestampNs: timestampNs,
    timestampNs,
    epoch,
    gaze: { format: 'point', x, y, worn: true },
  };
}

export function sceneAt(timestampNs: bigint, epoch = 0): VideoSample<'scene'> {
  return {
    kind: 'scene',
    deviceTimestampNs: timestampNs,
    timestampNs,
    epoch,
    frame: { codec: 'H264', format: 'h264', width: 0, height: 0, keyframe: true, data: new Uint8Array([0, 0, 0, 1]) },
  };
}

export function audioAt(timestampNs: bigint, epoch = 0): AudioSample {
  return {
    kind: 'audio',
    deviceTimestampNs: timestampNs,
    timestampNs,
    epoch,
    audio: { format: 'pcm_s16le', sampleRate: 8000, channels: 1, sampleCount: 2, data: new Uint8Array(4) },
  };
}
