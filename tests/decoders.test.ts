/**
 * Payload decoder tests.
 */

import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import { describe, it, expect } from 'vitest';
import { ProtocolError } from '../src/core/errors.js';
import { parseCalibration } from '../src/core/models/calibration.js';
import { DefaultAudioDecoder, l16ToPcmS16le } from '../src/streams/decoders/audio.js';
import { decodeEyeEvent } from '../src/streams/decoders/eye-events.js';
import { decodeGazePoint } from '../src/streams/decoders/gaze.js';
import { decodeImuReading } from '../src/streams/decoders/imu.js';
import { createSampleDecoder } from '../src/streams/decoders/index.js';
import { buildCalibrationBlob } from './support/fake-device.js';
import { AUDIO_TRACK, GAZE_TRACK, SCENE_TRACK, mediaUnit } from './support/fake-transport.js';
import { gazePointPayload } from './support/rtp.js';

const STAMP = { deviceTimestampNs: 5n, timestampNs: 7n, epoch: 2 };

function floats(values: number[], trailer: number[] = []): Uint8Array {
  const data = Buffer.alloc(values.length * 4 + trailer.length);
  values.forEach((value, index) => data.writeFloatBE(value, index * 4));
  trailer.forEach((value, index) => data.writeUInt8(value, values.length * 4 + index));
  return data;
}

function eyeStateBlock(base: number): number[] {
  // pupil, eyeball centre xyz, optical axis xyz
  return [base, base + 1, base + 2, base + 3, 0, 0, 1];
}

describe('decodeGazePoint', () => {
  it('decodes a 9-byte point', () => {
    expect(decodeGazePoint(gazePointPayload(0.5, 0.25, true))).toEqual({ format: 'point', x: 0.5, y: 0.25, worn: true });
    expect(decodeGazePoint(gazePointPayload(0.5, 0.25, false)).worn).toBe(false);
  });

  it('averages dual monocular gaze', () => {
    const gaze = decodeGazePoint(floats([0.25, 0.5, 0.75, 0.5], [255]));

    expect(gaze).toEqual({
      format: 'dual_monocular',
      x: 0.5,
      y: 0.5,
      worn: true,
      left: { x: 0.25, y: 0.5 },
      right: { x: 0.75, y: 0.5 },
    });
  });

  it('decodes eye state per eye', () => {
    const data = Buffer.concat([
      Buffer.from(gazePointPayload(0.5, 0.5, true)),
      Buffer.from(floats([...eyeStateBlock(2), ...eyeStateBlock(4)])),
    ]);
    const gaze = decodeGazePoint(data);

    if (gaze.format !== 'eye_state') throw new Error(`unexpected format ${gaze.format}`);
    expect(gaze.left).toEqual({
      pupilDiameterMm: 2,
      eyeballCenter: { x: 3, y: 4, z: 5 },
      opticalAxis: { x: 0, y: 0, z: 1 },
    });
    expect(gaze.right.pupilDiameterMm).toBe(4);
  });

  it('decodes eyelids after the eye state', () => {
    const data = Buffer.concat([
      Buffer.from(gazePointPayload(0.5, 0.5, true)),
      Buffer.from(floats([...eyeStateBlock(2), ...eyeStateBlock(4), 10, 20, 1.5, 30, 40, 2.5])),
    ]);
    const gaze = decodeGazePoint(data);

    if (gaze.format !== 'eye_state_eyelid') throw new Error(`unexpected format ${gaze.format}`);
    expect(gaze.left.eyelid).toEqual({ angleTop: 10, angleBottom: 20, aperture: 1.5 });
    expect(gaze.right.eyelid).toEqual({ angleTop: 30, angleBottom: 40, aperture: 2.5 });
  });

  it('rejects an unknown payload length', () => {
    expect(() => decodeGazePoint(new Uint8Array(10))).toThrow(/Unexpected gaze payload of 10 bytes/);
  });
});

describe('decodeEyeEvent', () => {
  function header(type: number, size: number, startNs: bigint, endNs?: bigint): Buffer {
    const data = Buffer.alloc(size);
    data.writeInt32BE(type, 0);
    data.writeBigInt64BE(startNs, 4);
    if (endNs !== undefined) data.writeBigInt64BE(endNs, 12);
    return data;
  }

  it('decodes a fixation', () => {
    const data = header(1, 60, 100n, 200n);
    [0.1, 0.2, 0.3, 0.4, 0.25, 0.5, 12, 1.5, 30, 60].forEach((value, index) => {
      data.writeFloatBE(value, 20 + index * 4);
    });
    const event = decodeEyeEvent(data);

    if (event.type !== 'fixation') throw new Error(`unexpected type ${event.type}`);
    expect(event.startNs).toBe(100n);
    expect(event.endNs).toBe(200n);
    expect(event.meanGaze).toEqual({ x: 0.25, y: 0.5 });
    expect(event.amplitudePixels).toBe(12);
    expect(event.maxVelocity).toBe(60);
  });

  it('decodes onsets and blinks', () => {
    expect(decodeEyeEvent(header(2, 12, 7n))).toEqual({ type: 'saccade_onset', startNs: 7n });
    expect(decodeEyeEvent(header(3, 12, 8n))).toEqual({ type: 'fixation_onset', startNs: 8n });
    expect(decodeEyeEvent(header(4, 20, 10n, 20n))).toEqual({ type: 'blink', startNs: 10n, endNs: 20n });
  });

  it('rejects unknown types and wrong sizes', () => {
    expect(() => decodeEyeEvent(header(9, 12, 0n))).toThrow(/Unknown eye event type 9/);
    expect(() => decodeEyeEvent(header(4, 12, 0n))).toThrow(ProtocolError);
    expect(() => decodeEyeEvent(new Uint8Array(2))).toThrow(ProtocolError);
  });
});

describe('decodeImuReading', () => {
  const root = protobuf.loadSync(fileURLToPath(new URL('../proto/imu.proto', import.meta.url)));
  const ImuPacket = root.lookupType('gazecast.imu.ImuPacket');

  it('decodes an ImuPacket', () => {
    const message = ImuPacket.fromObject({
      accel: { x: 0.5, y: -1, z: 2.25 },
      gyro: { x: 10, y: 20, z: 30 },
      rotation: { w: 0.5, x: 0.5, y: 0.5, z: 0.5 },
    });
    const reading = decodeImuReading(ImuPacket.encode(message).finish());

    expect(reading).toEqual({
      accel: { x: 0.5, y: -1, z: 2.25 },
      gyro: { x: 10, y: 20, z: 30 },
      rotation: { w: 0.5, x: 0.5, y: 0.5, z: 0.5 },
    });
  });

  it('fills in absent fields', () => {
    const message = ImuPacket.fromObject({ accel: { x: 0.5 } });
    const reading = decodeImuReading(ImuPacket.encode(message).finish());

    expect(reading.accel).toEqual({ x: 0.5, y: 0, z: 0 });
    expect(reading.gyro).toEqual({ x: 0, y: 0, z: 0 });
    expect(reading.rotation).toEqual({ w: 1, x: 0, y: 0, z: 0 });
  });

  it('rejects bytes that are not an ImuPacket', () => {
    expect(() => decodeImuReading(new Uint8Array([0xff, 0xff, 0xff]))).toThrow(ProtocolError);
  });
});

describe('audio decoding', () => {
  it('swaps L16 to little-endian', () => {
    expect([...l16ToPcmS16le(new Uint8Array([1, 2, 3, 4, 5]))]).toEqual([2, 1, 4, 3]);
  });

  it('produces PCM chunks from L16 units', () => {
    const chunk = new DefaultAudioDecoder().decode(mediaUnit(AUDIO_TRACK, 0n, new Uint8Array([1, 2, 3, 4])));

    expect(chunk.format).toBe('pcm_s16le');
    expect(chunk.sampleRate).toBe(8000);
    expect(chunk.sampleCount).toBe(2);
    expect([...chunk.data]).toEqual([2, 1, 4, 3]);
  });

  it('passes AAC access units through', () => {
    const aac = { ...AUDIO_TRACK, codec: 'MPEG4-GENERIC', clockRate: 48000 };
    const chunk = new DefaultAudioDecoder().decode(mediaUnit(aac, 0n, new Uint8Array([9, 9])));

    expect(chunk.format).toBe('aac');
    expect(chunk.sampleCount).toBe(1024);
    expect(chunk.sampleRate).toBe(48000);
  });

  it('rejects other codecs', () => {
    const pcmu = { ...AUDIO_TRACK, codec: 'PCMU' };
    expect(() => new DefaultAudioDecoder().decode(mediaUnit(pcmu, 0n, new Uint8Array(2)))).toThrow(ProtocolError);
  });
});

describe('createSampleDecoder', () => {
  it('stamps gaze samples', () => {
    const sample = createSampleDecoder('gaze').decode(mediaUnit(GAZE_TRACK, 5n, gazePointPayload(0.5, 0.25, true)), STAMP);

    expect(sample).toEqual({
      kind: 'gaze',
      deviceTimestampNs: 5n,
      timestampNs: 7n,
      epoch: 2,
      gaze: { format: 'point', x: 0.5, y: 0.25, worn: true },
    });
  });

  it('hands encoded video through by default', () => {
    const data = new Uint8Array([0, 0, 0, 1, 0x65]);
    const sample = createSampleDecoder('scene').decode(mediaUnit(SCENE_TRACK, 5n, data, true), STAMP);

    if (sample?.kind !== 'scene') throw new Error('expected a scene sample');
    expect(sample.frame).toEqual({ codec: 'H264', format: 'h264', width: 0, height: 0, keyframe: true, data });
  });

  it('uses a video decoder override', () => {
    const decoder = createSampleDecoder('eye_left', { video: () => ({ decode: () => null }) });
    expect(decoder.decode(mediaUnit(SCENE_TRACK, 5n, new Uint8Array(1)), STAMP)).toBeNull();
  });
});

describe('parseCalibration', () => {
  it('reads the header, cameras and crc', () => {
    const calibration = parseCalibration(buildCalibrationBlob());

    expect(calibration.version).toBe(1);
    expect(calibration.serial).toBe('abc123');
    expect(calibration.scene.cameraMatrix[0]).toBe(1000.5);
    expect(calibration.scene.cameraMatrix).toHaveLength(9);
    expect(calibration.leftEye.extrinsics).toHaveLength(16);
    expect(calibration.crc).toBe(0xdeadbeef);
  });

  it('rejects a blob of the wrong size', () => {
    expect(() => parseCalibration(new Uint8Array(10))).toThrow(ProtocolError);
  });
});
