/**
 * IMU payload decoding.
 *
 * Each packet is one protobuf `ImuPacket`. The schema is loaded from
 * proto/imu.proto at first use.
 */

import { fileURLToPath } from 'node:url';
import protobuf, { type Type } from 'protobufjs';
import { z } from 'zod';
import { ProtocolError } from '../../core/errors.js';
import type { ImuReading, ImuSample } from '../../core/models/samples.js';
import type { MediaUnit } from '../transport.js';
import type { SampleDecoder, SampleStamp } from './types.js';

const PROTO_PATH = fileURLToPath(new URL('../../../proto/imu.proto', import.meta.url));

const Vector3Schema = z
  .object({ x: z.number().default(0), y: z.number().default(0), z: z.number().default(0) })
  .nullable()
  .transform((value) => value ?? { x: 0, y: 0, z: 0 });

const QuaternionSchema = z
  .object({
    w: z.number().default(0),
    x: z.number().default(0),
    y: z.number().default(0),
    z: z.number().default(0),
  })
  .nullable()
  .transform((value) => value ?? { w: 1, x: 0, y: 0, z: 0 });

const ImuObjectSchema = z.object({
  accel: Vector3Schema,
  gyro: Vector3Schema,
  rotation: QuaternionSchema,
});

let packetType: Type | null = null;

function imuPacketType(): Type {
  packetType ??= protobuf.loadSync(PROTO_PATH).lookupType('gazecast.imu.ImuPacket');
  return packetType;
}

/**
 * @throws ProtocolError if the payload is not a valid ImuPacket
 */
export function decodeImuReading(data: Uint8Array): ImuReading {
  const type = imuPacketType();

  let object: unknown;
  try {
    const message = type.decode(data);
    object = type.toObject(message, { defaults: true, longs: String });
  } catch (error) {
    throw new ProtocolError('Malformed IMU packet', { cause: error });
  }

  const parsed = ImuObjectSchema.safeParse(object);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed IMU packet: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export class ImuDecoder implements SampleDecoder {
  readonly kind = 'imu';

  decode(unit: MediaUnit, stamp: SampleStamp): ImuSample {
    return Object.freeze({
      kind: 'imu',
      ...stamp,
      imu: decodeImuReading(unit.data),
    });
  }
}
