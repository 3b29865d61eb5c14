/**
 * Decoder contract: one media unit in, one sample out.
 */

import type { Sample } from '../../core/models/samples.js';
import type { SensorKind } from '../../core/models/sensors.js';
import type { MediaUnit } from '../transport.js';

/**
 * Timestamps and generation stamped on every sample a session produces.
 */
export interface SampleStamp {
  readonly deviceTimestampNs: bigint;
  readonly timestampNs: bigint;
  readonly epoch: number;
}

export interface SampleDecoder {
  readonly kind: SensorKind;
  /**
   * @returns the sample, or null when the unit carries nothing to deliver
   * @throws ProtocolError when the unit cannot be decoded
   */
  decode(unit: MediaUnit, stamp: SampleStamp): Sample | null;
}
