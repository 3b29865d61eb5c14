/**
 * Device status model.
 *
 * The device reports its state as a list of components ({ model, data }).
 * A DeviceStatus is an immutable, versioned snapshot assembled from those
 * components. Firmware may add fields or whole component models over time,
 * so unknown fields are stripped and unknown models are ignored.
 */

import { z } from 'zod';
import { ProtocolError, toError } from '../errors.js';
import {
  sensorKindFromWire,
  type SensorDescriptor,
  type SensorKind,
} from './sensors.js';

// ============================================================================
// Wire Schemas
// ============================================================================

const PhoneSchema = z.object({
  device_id: z.string(),
  device_name: z.string(),
  ip: z.string(),
  battery_level: z.number().default(0),
  battery_state: z.string().default('OK'),
  memory: z.number().default(0),
  memory_state: z.string().default('OK'),
  time_echo_port: z.number().int().nullable().optional(),
});

const HardwareSchema = z.object({
  version: z.string().default(''),
  glasses_serial: z.string().default(''),
  world_camera_serial: z.string().default(''),
  module_serial: z.string().default(''),
});

const SensorSchema = z.object({
  sensor: z.string(),
  conn_type: z.string().default('DIRECT'),
  connected: z.boolean().default(false),
  ip: z.string().nullable().optional(),
  port: z.number().int().nullable().optional(),
  protocol: z.string().default('rtsp'),
  params: z.string().nullable().optional(),
  stream_error: z.boolean().default(false),
});

const RecordingSchema = z.object({
  id: z.string(),
  action: z.string(),
  message: z.string().default(''),
  rec_duration_ns: z.number().default(0),
});

const NetworkDeviceSchema = z.object({
  ip: z.string(),
  device_id: z.string(),
  device_name: z.string(),
  connected: z.boolean().default(false),
});

const TemplateSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
});

const ComponentEnvelopeSchema = z.object({
  model: z.string(),
  data: z.unknown(),
});

// ============================================================================
// Snapshot Types
// ============================================================================

export type RecordingState = 'idle' | 'recording' | 'saving';

export type RecordingAction = 'START' | 'STOP' | 'SAVE' | 'DISCARD' | 'ERROR' | 'UNKNOWN';

export interface PhoneInfo {
  readonly deviceId: string;
  readonly deviceName: string;
  readonly ip: string;
  readonly batteryLevel: number;
  readonly batteryState: string;
  readonly memory: number;
  readonly memoryState: string;
  readonly timeEchoPort: number | null;
}

export interface HardwareInfo {
  readonly version: string;
  readonly glassesSerial: string;
  readonly worldCameraSerial: string;
  readonly moduleSerial: string;
}

export interface RecordingInfo {
  readonly id: string;
  readonly action: RecordingAction;
  readonly message: string;
  readonly durationNs: number;
}

export interface NetworkDeviceInfo {
  readonly ip: string;
  readonly deviceId: string;
  readonly deviceName: string;
  readonly connected: boolean;
}

export interface TemplateRef {
  readonly id: string;
  readonly name: string;
}

/**
 * Immutable device status snapshot.
 */
export interface DeviceStatus {
  /** Increments with every replacement, 0 before the first fetch */
  readonly version: number;
  /** Date.now() when the snapshot was built */
  readonly receivedAt: number;
  readonly recordingState: RecordingState;
  readonly recording: RecordingInfo | null;
  readonly phone: PhoneInfo | null;
  readonly hardware: HardwareInfo | null;
  readonly activeTemplate: TemplateRef | null;
  readonly sensors: readonly SensorDescriptor[];
  readonly networkDevices: readonly NetworkDeviceInfo[];
}

/**
 * A single parsed component, as delivered by a status push.
 */
export type StatusComponent =
  | { model: 'Phone'; phone: PhoneInfo }
  | { model: 'Hardware'; hardware: HardwareInfo }
  | { model: 'Sensor'; sensor: WireSensor }
  | { model: 'Recording'; recording: RecordingInfo }
  | { model: 'NetworkDevice'; networkDevice: NetworkDeviceInfo }
  | { model: 'Template'; template: TemplateRef };

/**
 * Sensor component before multiplexing is resolved against the full list.
 */
export interface WireSensor {
  readonly kind: SensorKind;
  readonly url: string | null;
  readonly connected: boolean;
  readonly connectionType: 'direct' | 'websocket';
  readonly streamError: boolean;
}

// ============================================================================
// Component Parsing
// ============================================================================

const RECORDING_ACTIONS: readonly RecordingAction[] = ['START', 'STOP', 'SAVE', 'DISCARD', 'ERROR'];

function parseRecordingAction(action: string): RecordingAction {
  const normalised = action.toUpperCase();
  return RECORDING_ACTIONS.find((candidate) => candidate === normalised) ?? 'UNKNOWN';
}

function buildSensorUrl(data: z.infer<typeof SensorSchema>): string | null {
  if (!data.ip || data.port === null || data.port === undefined) {
    return null;
  }
  const query = data.params ? `?${data.params}` : '';
  return `${data.protocol}://${data.ip}:${String(data.port)}/${query}`;
}

function parseData<T extends z.ZodTypeAny>(schema: T, model: string, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ProtocolError(`Malformed ${model} component: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Parse one { model, data } component.
 *
 * @returns the parsed component, or null for models this client does not know
 * @throws ProtocolError if a known model carries malformed data
 */
export function parseComponent(raw: unknown): StatusComponent | null {
  const envelope = ComponentEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ProtocolError('Status component is missing "model" or "data"');
  }

  const { model, data } = envelope.data;

  switch (model) {
    case 'Phone': {
      const phone = parseData(PhoneSchema, model, data);
      return {
        model,
        phone: {
          deviceId: phone.device_id,
          deviceName: phone.device_name,
          ip: phone.ip,
          batteryLevel: phone.battery_level,
          batteryState: phone.battery_state,
          memory: phone.memory,
          memoryState: phone.memory_state,
          timeEchoPort: phone.time_echo_port ?? null,
        },
      };
    }

    case 'Hardware': {
      const hardware = parseData(HardwareSchema, model, data);
      return {
        model,
        hardware: {
          version: hardware.version,
          glassesSerial: hardware.glasses_serial,
          worldCameraSerial: hardware.world_camera_serial,
          moduleSerial: hardware.module_serial,
        },
      };
    }

    case 'Sensor': {
      const sensor = parseData(SensorSchema, model, data);
      const kind = sensorKindFromWire(sensor.sensor);
      if (!kind) {
        return null;
      }
      return {
        model,
        sensor: {
          kind,
          url: buildSensorUrl(sensor),
          connected: sensor.connected,
          connectionType: sensor.conn_type.toUpperCase() === 'WEBSOCKET' ? 'websocket' : 'direct',
          streamError: sensor.stream_error,
        },
      };
    }

    case 'Recording': {
      const recording = parseData(RecordingSchema, model, data);
      return {
        model,
        recording: {
          id: recording.id,
          action: parseRecordingAction(recording.action),
          message: recording.message,
          durationNs: recording.rec_duration_ns,
        },
      };
    }

    case 'NetworkDevice': {
      const device = parseData(NetworkDeviceSchema, model, data);
      return {
        model,
        networkDevice: {
          ip: device.ip,
          deviceId: device.device_id,
          deviceName: device.device_name,
          connected: device.connected,
        },
      };
    }

    case 'Template': {
      const template = parseData(TemplateSchema, model, data);
      return { model, template: { id: template.id, name: template.name } };
    }

    default:
      return null;
  }
}

// ============================================================================
// Snapshot Assembly
// ============================================================================

/**
 * Derive the recording state from the last recording action.
 */
export function recordingStateFor(recording: RecordingInfo | null): RecordingState {
  switch (recording?.action) {
    case 'START':
      return 'recording';
    case 'STOP':
      return 'saving';
    default:
      return 'idle';
  }
}

function sensorKey(sensor: WireSensor): string {
  return `${sensor.kind}/${sensor.connectionType}`;
}

/**
 * Resolve multiplexing: audio without its own transport, or sharing the
 * scene transport's URL, is carried inside the scene stream.
 */
function resolveSensors(wireSensors: readonly WireSensor[]): SensorDescriptor[] {
  const scene = wireSensors.find((s) => s.kind === 'scene' && s.connectionType === 'direct');

  return wireSensors.map((sensor): SensorDescriptor => {
    let multiplexedWith: 'scene' | null = null;
    let url = sensor.url;

    if (sensor.kind === 'audio' && sensor.connectionType === 'direct' && scene) {
      if (url === null || url === scene.url) {
        multiplexedWith = 'scene';
        url = scene.url;
      }
    }

    return Object.freeze({
      kind: sensor.kind,
      url,
      connected: sensor.connected,
      connectionType: sensor.connectionType,
      multiplexedWith,
      streamError: sensor.streamError,
    });
  });
}

interface StatusParts {
  recording: RecordingInfo | null;
  phone: PhoneInfo | null;
  hardware: HardwareInfo | null;
  activeTemplate: TemplateRef | null;
  wireSensors: WireSensor[];
  networkDevices: NetworkDeviceInfo[];
}

function emptyParts(): StatusParts {
  return {
    recording: null,
    phone: null,
    hardware: null,
    activeTemplate: null,
    wireSensors: [],
    networkDevices: [],
  };
}

function mergeComponent(parts: StatusParts, component: StatusComponent): void {
  switch (component.model) {
    case 'Phone':
      parts.phone = Object.freeze({ ...component.phone });
      break;
    case 'Hardware':
      parts.hardware = Object.freeze({ ...component.hardware });
      break;
    case 'Recording':
      parts.recording = Object.freeze({ ...component.recording });
      break;
    case 'Template':
      parts.activeTemplate = Object.freeze({ ...component.template });
      break;
    case 'Sensor': {
      const key = sensorKey(component.sensor);
      const index = parts.wireSensors.findIndex((s) => sensorKey(s) === key);
      if (index === -1) {
        parts.wireSensors.push(component.sensor);
      } else {
        parts.wireSensors[index] = component.sensor;
      }
      break;
    }
    case 'NetworkDevice': {
      const index = parts.networkDevices.findIndex(
        (d) => d.deviceId === component.networkDevice.deviceId
      );
      const device = Object.freeze({ ...component.networkDevice });
      if (index === -1) {
        parts.networkDevices.push(device);
      } else {
        parts.networkDevices[index] = device;
      }
      break;
    }
  }
}

function freezeStatus(parts: StatusParts, version: number): DeviceStatus {
  return Object.freeze({
    version,
    receivedAt: Date.now(),
    recordingState: recordingStateFor(parts.recording),
    recording: parts.recording,
    phone: parts.phone,
    hardware: parts.hardware,
    activeTemplate: parts.activeTemplate,
    sensors: Object.freeze(resolveSensors(parts.wireSensors)),
    networkDevices: Object.freeze([...parts.networkDevices]),
  });
}

/**
 * Status before anything has been received.
 */
export function emptyStatus(): DeviceStatus {
  return freezeStatus(emptyParts(), 0);
}

/**
 * Build a full snapshot from a complete component list.
 */
export function statusFromComponents(
  components: readonly StatusComponent[],
  version: number
): DeviceStatus {
  const parts = emptyParts();
  for (const component of components) {
    mergeComponent(parts, component);
  }
  return freezeStatus(parts, version);
}

/**
 * Build the successor of a snapshot with one component replaced.
 * The previous snapshot is left untouched.
 */
export function applyComponent(previous: DeviceStatus, component: StatusComponent): DeviceStatus {
  const parts: StatusParts = {
    recording: previous.recording,
    phone: previous.phone,
    hardware: previous.hardware,
    activeTemplate: previous.activeTemplate,
    wireSensors: previous.sensors.map((s) => ({
      kind: s.kind,
      // Multiplexed audio inherits the scene URL; keep its own (absent) URL
      url: s.multiplexedWith ? null : s.url,
      connected: s.connected,
      connectionType: s.connectionType,
      streamError: s.streamError,
    })),
    networkDevices: [...previous.networkDevices],
  };

  mergeComponent(parts, component);
  return freezeStatus(parts, previous.version + 1);
}

/**
 * Parse the result array of a full status response.
 * Unknown component models are skipped, and so are malformed entries,
 * which are handed to `onInvalid`.
 */
export function parseStatusResult(
  raw: unknown,
  onInvalid: (error: ProtocolError) => void = () => undefined
): StatusComponent[] {
  if (!Array.isArray(raw)) {
    throw new ProtocolError('Status result is not a list of components');
  }

  const components: StatusComponent[] = [];
  for (const entry of raw) {
    let component: StatusComponent | null;
    try {
      component = parseComponent(entry);
    } catch (error) {
      const err = toError(error);
      onInvalid(err instanceof ProtocolError ? err : new ProtocolError(err.message, { cause: err }));
      continue;
    }
    if (component) {
      components.push(component);
    }
  }
  return components;
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Directly-connected descriptor for a sensor kind, if the device lists one.
 */
export function directSensor(status: DeviceStatus, kind: SensorKind): SensorDescriptor | null {
  return status.sensors.find((s) => s.kind === kind && s.connectionType === 'direct') ?? null;
}

/**
 * Whether a sensor can be streamed right now.
 * Multiplexed audio also needs its carrier to be connected.
 */
export function isSensorAvailable(status: DeviceStatus, kind: SensorKind): boolean {
  const sensor = directSensor(status, kind);
  if (!sensor?.connected || sensor.url === null) {
    return false;
  }
  if (sensor.multiplexedWith) {
    return directSensor(status, sensor.multiplexedWith)?.connected ?? false;
  }
  return true;
}
