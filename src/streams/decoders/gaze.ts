/**
 * Gaze payload decoding.
 *
 * Payloads are big-endian and identified by their length:
 *
 *   9 bytes   x f32, y f32, worn u8
 *   17 bytes  left x, left y, right x, right y (f32), worn u8
 *   65 bytes  x, y, worn, then per eye (left, right): pupil diameter,
 *             eyeball centre xyz, optical axis xyz (f32)
 *   89 bytes  the 65-byte layout, then per eye: eyelid angle top,
 *             eyelid angle bottom, eyelid aperture (f32)
 *
 * The worn byte is 255 while the glasses are on the wearer's head.
 */

import { ProtocolError } from '../../core/errors.js';
import type { EyeState, Eyelid, GazePoint, GazeSample } from '../../core/models/samples.js';
import type { MediaUnit } from '../transport.js';
import type { SampleDecoder, SampleStamp } from './types.js';

export const GAZE_POINT_BYTES = 9;
export const GAZE_DUAL_MONOCULAR_BYTES = 17;
export const GAZE_EYE_STATE_BYTES = 65;
export const GAZE_EYE_STATE_EYELID_BYTES = 89;

const WORN = 255;

function readEyeState(view: DataView, offset: number): EyeState {
  return {
    pupilDiameterMm: view.getFloat32(offset),
    eyeballCenter: {
      x: view.getFloat32(offset + 4),
      y: view.getFloat32(offset + 8),
      z: view.getFloat32(offset + 12),
    },
    opticalAxis: {
      x: view.getFloat32(offset + 16),
      y: view.getFloat32(offset + 20),
      z: view.getFloat32(offset + 24),
    },
  };
}

function readEyelid(view: DataView, offset: number): Eyelid {
  return {
    angleTop: view.getFloat32(offset),
    angleBottom: view.getFloat32(offset + 4),
    aperture: view.getFloat32(offset + 8),
  };
}

export function decodeGazePoint(data: Uint8Array): GazePoint {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  switch (data.byteLength) {
    case GAZE_POINT_BYTES:
      return {
        format: 'point',
        x: view.getFloat32(0),
        y: view.getFloat32(4),
        worn: view.getUint8(8) === WORN,
      };

    case GAZE_DUAL_MONOCULAR_BYTES: {
      const left = { x: view.getFloat32(0), y: view.getFloat32(4) };
      const right = { x: view.getFloat32(8), y: view.getFloat32(12) };
      return {
        format: 'dual_monocular',
        x: (left.x + right.x) / 2,
        y: (left.y + right.y) / 2,
        worn: view.getUint8(16) === WORN,
        left,
        right,
      };
    }

    case GAZE_EYE_STATE_BYTES:
      return {
        format: 'eye_state',
        x: view.getFloat32(0),
        y: view.getFloat32(4),
        worn: view.getUint8(8) === WORN,
        left: readEyeState(view, 9),
        right: readEyeState(view, 37),
      };

    case GAZE_EYE_STATE_EYELID_BYTES:
      return {
        format: 'eye_state_eyelid',
        x: view.getFloat32(0),
        y: view.getFloat32(4),
        worn: view.getUint8(8) === WORN,
        left: { ...readEyeState(view, 9), eyelid: readEyelid(view, 65) },
        right: { ...readEyeState(view, 37), eyelid: readEyelid(view, 77) },
      };

    default:
      throw new ProtocolError(`Unexpected gaze payload of ${String(data.byteLength)} bytes`);
  }
}

export class GazeDecoder implements SampleDecoder {
  readonly kind = 'gaze';

  decode(unit: MediaUnit, stamp: SampleStamp): GazeSample {
    return Object.freeze({
      kind: 'gaze',
      ...stamp,
      gaze: decodeGazePoint(unit.data),
    });
  }
}
