/**
 * Sensor sample types.
 *
 * Every sample carries two timestamps in Unix nanoseconds: the capture time
 * on the device clock and the same instant on the local clock, corrected
 * when the sample was produced. `epoch` counts stream connections; a change
 * marks a reconnect boundary across which timestamps may step backwards.
 */

import type { SensorKind, VideoSensorKind } from './sensors.js';

// ============================================================================
// Common Fields
// ============================================================================

interface SampleBase<K extends SensorKind> {
  readonly kind: K;
  /** Capture time on the device clock (Unix ns) */
  readonly deviceTimestampNs: bigint;
  /** Capture time translated to the local clock (Unix ns) */
  readonly timestampNs: bigint;
  /** Stream connection generation */
  readonly epoch: number;
}

// ============================================================================
// Gaze
// ============================================================================

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Quaternion {
  readonly w: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface EyeState {
  readonly pupilDiameterMm: number;
  readonly eyeballCenter: Vector3;
  readonly opticalAxis: Vector3;
}

export interface Eyelid {
  readonly angleTop: number;
  readonly angleBottom: number;
  readonly aperture: number;
}

export type GazePoint =
  | {
      readonly format: 'point';
      readonly x: number;
      readonly y: number;
      readonly worn: boolean;
    }
  | {
      readonly format: 'dual_monocular';
      readonly x: number;
      readonly y: number;
      readonly worn: boolean;
      readonly left: { readonly x: number; readonly y: number };
      readonly right: { readonly x: number; readonly y: number };
    }
  | {
      readonly format: 'eye_state';
      readonly x: number;
      readonly y: number;
      readonly worn: boolean;
      readonly left: EyeState;
      readonly right: EyeState;
    }
  | {
      readonly format: 'eye_state_eyelid';
      readonly x: number;
      readonly y: number;
      readonly worn: boolean;
      readonly left: EyeState & { readonly eyelid: Eyelid };
      readonly right: EyeState & { readonly eyelid: Eyelid };
    };

export interface GazeSample extends SampleBase<'gaze'> {
  readonly gaze: GazePoint;
}

// ============================================================================
// Video
// ============================================================================

export interface VideoFrame {
  /** Codec of the transport, e.g. "H264" */
  readonly codec: string;
  /** Layout of `data`: "h264" for encoded access units, or a pixel format */
  readonly format: string;
  /** Pixel dimensions, 0 while still encoded */
  readonly width: number;
  readonly height: number;
  readonly keyframe: boolean;
  readonly data: Uint8Array;
}

export interface VideoSample<K extends VideoSensorKind = VideoSensorKind> extends SampleBase<K> {
  readonly frame: VideoFrame;
}

// ============================================================================
// Audio
// ============================================================================

export interface AudioChunk {
  readonly format: 'pcm_s16le' | 'aac';
  readonly sampleRate: number;
  readonly channels: number;
  /** Samples per channel */
  readonly sampleCount: number;
  readonly data: Uint8Array;
}

export interface AudioSample extends SampleBase<'audio'> {
  readonly audio: AudioChunk;
}

// ============================================================================
// IMU
// ============================================================================

export interface ImuReading {
  /** Acceleration in g */
  readonly accel: Vector3;
  /** Angular velocity in deg/s */
  readonly gyro: Vector3;
  readonly rotation: Quaternion;
}

export interface ImuSample extends SampleBase<'imu'> {
  readonly imu: ImuReading;
}

// ============================================================================
// Eye Events
// ============================================================================

export interface Point2 {
  readonly x: number;
  readonly y: number;
}

export type EyeEvent =
  | {
      readonly type: 'fixation' | 'saccade';
      readonly startNs: bigint;
      readonly endNs: bigint;
      readonly startGaze: Point2;
      readonly endGaze: Point2;
      readonly meanGaze: Point2;
      readonly amplitudePixels: number;
      readonly amplitudeAngleDeg: number;
      readonly meanVelocity: number;
      readonly maxVelocity: number;
    }
  | {
      readonly type: 'fixation_onset' | 'saccade_onset';
      readonly startNs: bigint;
    }
  | {
      readonly type: 'blink';
      readonly startNs: bigint;
      readonly endNs: bigint;
    };

export interface EyeEventSample extends SampleBase<'eye_events'> {
  readonly event: EyeEvent;
}

// ============================================================================
// Union
// ============================================================================

export type Sample =
  | GazeSample
  | VideoSample<'scene'>
  | VideoSample<'eye_left'>
  | VideoSample<'eye_right'>
  | AudioSample
  | ImuSample
  | EyeEventSample;

export type SampleOf<K extends SensorKind> = Extract<Sample, { kind: K }>;

/**
 * Narrow a sample to one sensor kind.
 */
export function isSampleOf<K extends SensorKind>(sample: Sample, kind: K): sample is SampleOf<K> {
  return sample.kind === kind;
}

/**
 * Sample tagged with the device it came from.
 */
export interface TaggedSample<S extends Sample = Sample> {
  readonly deviceId: string;
  readonly sample: S;
}

/**
 * Unix nanoseconds to seconds, for display and arithmetic.
 */
export function nsToSeconds(ns: bigint): number {
  return Number(ns) / 1e9;
}
