/**
 * Sensor kinds and their descriptors.
 */

// ============================================================================
// Sensor Kinds
// ============================================================================

export const SENSOR_KINDS = [
  'gaze',
  'scene',
  'eye_left',
  'eye_right',
  'imu',
  'eye_events',
  'audio',
] as const;

export type SensorKind = (typeof SENSOR_KINDS)[number];

export type VideoSensorKind = 'scene' | 'eye_left' | 'eye_right';

/**
 * Which elementary stream of a transport a sensor kind reads.
 */
export type TrackKind = 'video' | 'audio' | 'data';

export function isSensorKind(value: string): value is SensorKind {
  return (SENSOR_KINDS as readonly string[]).includes(value);
}

export function isVideoSensorKind(kind: SensorKind): kind is VideoSensorKind {
  return kind === 'scene' || kind === 'eye_left' || kind === 'eye_right';
}

export function trackForKind(kind: SensorKind): TrackKind {
  if (isVideoSensorKind(kind)) return 'video';
  if (kind === 'audio') return 'audio';
  return 'data';
}

/**
 * Map a device-side sensor name to a sensor kind.
 * The scene camera is advertised as "world".
 */
export function sensorKindFromWire(name: string): SensorKind | null {
  if (name === 'world') return 'scene';
  return isSensorKind(name) ? name : null;
}

export function sensorKindToWire(kind: SensorKind): string {
  return kind === 'scene' ? 'world' : kind;
}

// ============================================================================
// Descriptor
// ============================================================================

export type SensorConnectionType = 'direct' | 'websocket';

export interface SensorDescriptor {
  readonly kind: SensorKind;
  /** Transport endpoint, e.g. rtsp://10.0.0.5:8086/?camera=gaze */
  readonly url: string | null;
  readonly connected: boolean;
  readonly connectionType: SensorConnectionType;
  /** Set when this sensor is only carried inside another sensor's transport */
  readonly multiplexedWith: 'scene' | null;
  readonly streamError: boolean;
}
