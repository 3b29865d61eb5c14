/**
 * Eye event payload decoding.
 *
 * Big-endian records led by an int32 event type:
 *
 *   0 saccade, 1 fixation (60 bytes): start ns i64, end ns i64, start gaze
 *     xy, end gaze xy, mean gaze xy, amplitude px, amplitude deg, mean
 *     velocity, max velocity (f32)
 *   2 saccade onset, 3 fixation onset (12 bytes): start ns i64
 *   4 blink (20 bytes): start ns i64, end ns i64
 */

import { ProtocolError } from '../../core/errors.js';
import type { EyeEvent, EyeEventSample } from '../../core/models/samples.js';
import type { MediaUnit } from '../transport.js';
import type { SampleDecoder, SampleStamp } from './types.js';

export const EYE_EVENT_TYPES = {
  saccade: 0,
  fixation: 1,
  saccade_onset: 2,
  fixation_onset: 3,
  blink: 4,
} as const;

const EXPECTED_BYTES: Readonly<Record<number, number>> = {
  0: 60,
  1: 60,
  2: 12,
  3: 12,
  4: 20,
};

export function decodeEyeEvent(data: Uint8Array): EyeEvent {
  if (data.byteLength < 4) {
    throw new ProtocolError(`Eye event payload too short (${String(data.byteLength)} bytes)`);
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const type = view.getInt32(0);
  const expected = EXPECTED_BYTES[type];

  if (expected === undefined) {
    throw new ProtocolError(`Unknown eye event type ${String(type)}`);
  }
  if (data.byteLength !== expected) {
    throw new ProtocolError(
      `Eye event type ${String(type)} has ${String(data.byteLength)} bytes, expected ${String(expected)}`
    );
  }

  const startNs = view.getBigInt64(4);

  switch (type) {
    case EYE_EVENT_TYPES.saccade_onset:
      return { type: 'saccade_onset', startNs };
    case EYE_EVENT_TYPES.fixation_onset:
      return { type: 'fixation_onset', startNs };
    case EYE_EVENT_TYPES.blink:
      return { type: 'blink', startNs, endNs: view.getBigInt64(12) };
    default: {
      const f = (index: number): number => view.getFloat32(20 + index * 4);
      return {
        type: type === EYE_EVENT_TYPES.fixation ? 'fixation' : 'saccade',
        startNs,
        endNs: view.getBigInt64(12),
        startGaze: { x: f(0), y: f(1) },
        endGaze: { x: f(2), y: f(3) },
        meanGaze: { x: f(4), y: f(5) },
        amplitudePixels: f(6),
        amplitudeAngleDeg: f(7),
        meanVelocity: f(8),
        maxVelocity: f(9),
      };
    }
  }
}

export class EyeEventDecoder implements SampleDecoder {
  readonly kind = 'eye_events';

  decode(unit: MediaUnit, stamp: SampleStamp): EyeEventSample {
    return Object.freeze({
      kind: 'eye_events',
      ...stamp,
      event: decodeEyeEvent(unit.data),
    });
  }
}
