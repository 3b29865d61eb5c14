/**
 * Camera calibration blob.
 *
 * Layout (little-endian, packed):
 *   version            uint8
 *   serial             6 ASCII bytes
 *   scene camera       matrix 3x3 f64, distortion 8 f64, extrinsics 4x4 f64
 *   right eye camera   same layout
 *   left eye camera    same layout
 *   crc                uint32
 */

import { ProtocolError } from '../errors.js';

export interface CameraCalibration {
  /** Row-major 3x3 intrinsic matrix */
  readonly cameraMatrix: readonly number[];
  readonly distortion: readonly number[];
  /** Row-major 4x4 extrinsic transform */
  readonly extrinsics: readonly number[];
}

export interface Calibration {
  readonly version: number;
  readonly serial: string;
  readonly scene: CameraCalibration;
  readonly rightEye: CameraCalibration;
  readonly leftEye: CameraCalibration;
  readonly crc: number;
}

const CAMERA_DOUBLES = 9 + 8 + 16;
const HEADER_BYTES = 1 + 6;

export const CALIBRATION_BYTES = HEADER_BYTES + CAMERA_DOUBLES * 8 * 3 + 4;

function readDoubles(view: DataView, offset: number, count: number): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(view.getFloat64(offset + i * 8, true));
  }
  return values;
}

function readCamera(view: DataView, offset: number): CameraCalibration {
  return Object.freeze({
    cameraMatrix: Object.freeze(readDoubles(view, offset, 9)),
    distortion: Object.freeze(readDoubles(view, offset + 9 * 8, 8)),
    extrinsics: Object.freeze(readDoubles(view, offset + 17 * 8, 16)),
  });
}

/**
 * Parse the binary calibration blob.
 *
 * @throws ProtocolError if the blob has the wrong size
 */
export function parseCalibration(data: Uint8Array): Calibration {
  if (data.byteLength !== CALIBRATION_BYTES) {
    throw new ProtocolError(
      `Calibration blob has ${String(data.byteLength)} bytes, expected ${String(CALIBRATION_BYTES)}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const cameraBytes = CAMERA_DOUBLES * 8;
  const serial = new TextDecoder('ascii').decode(data.subarray(1, HEADER_BYTES)).replace(/\0+$/, '');

  return Object.freeze({
    version: view.getUint8(0),
    serial,
    scene: readCamera(view, HEADER_BYTES),
    rightEye: readCamera(view, HEADER_BYTES + cameraBytes),
    leftEye: readCamera(view, HEADER_BYTES + cameraBytes * 2),
    crc: view.getUint32(HEADER_BYTES + cameraBytes * 3, true),
  });
}
