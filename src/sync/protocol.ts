/**
 * Messages exchanged between the blocking facade and its worker thread.
 */

import type { ClockOffset } from '../core/clock/estimator.js';
import type { SerialisedError } from '../core/errors.js';
import type { Calibration } from '../core/models/calibration.js';
import type { DeviceEndpoint } from '../core/models/endpoint.js';
import type { GazeSample, Sample, VideoSample } from '../core/models/samples.js';
import type { SensorKind } from '../core/models/sensors.js';
import type { DeviceStatus } from '../core/models/status.js';
import type { Template, TemplateData } from '../core/models/template.js';
import type { DeviceEvent } from '../adapters/control/http.js';
import type { MatchedPair, MatchedSceneAudioGaze } from '../orchestrator/matching.js';

// ============================================================================
// Calls
// ============================================================================

export type MatchedSceneGaze = MatchedPair<VideoSample<'scene'>, GazeSample>;

/**
 * Everything the worker answers, as seen by the caller once the reply is in.
 */
export interface WorkerCalls {
  connect(endpoint: DeviceEndpoint): void;
  discover(all: boolean, timeoutMs: number): DeviceEndpoint[];
  close(): void;

  status(): DeviceStatus;
  recordingStart(): string;
  recordingStopAndSave(): void;
  recordingCancel(): void;
  sendEvent(name: string, timestampNs: bigint | undefined): DeviceEvent;
  getTemplate(): Template;
  setTemplateData(data: TemplateData): TemplateData;
  getCalibration(): Calibration;
  estimateClockOffset(): ClockOffset;
  requestSensor(kind: SensorKind): void;
  releaseSensor(kind: SensorKind): void;

  receive(kind: SensorKind, timeoutMs: number): Sample | null;
  receiveMatchedSceneAndGaze(timeoutMs: number): MatchedSceneGaze | null;
  receiveMatchedSceneAudioAndGaze(timeoutMs: number): MatchedSceneAudioGaze | null;
}

export type CallName = keyof WorkerCalls;

export type CallResult<M extends CallName> = ReturnType<WorkerCalls[M]>;

export type CallRequest = {
  [M in CallName]: { id: number; method: M; args: Parameters<WorkerCalls[M]> };
}[CallName];

export type CallReply =
  | { id: number; ok: true; value: unknown }
  | { id: number; ok: false; error: SerialisedError };

// ============================================================================
// Guards
// ============================================================================

const CALL_NAMES: ReadonlySet<string> = new Set<CallName>([
  'connect',
  'discover',
  'close',
  'status',
  'recordingStart',
  'recordingStopAndSave',
  'recordingCancel',
  'sendEvent',
  'getTemplate',
  'setTemplateData',
  'getCalibration',
  'estimateClockOffset',
  'requestSensor',
  'releaseSensor',
  'receive',
  'receiveMatchedSceneAndGaze',
  'receiveMatchedSceneAudioAndGaze',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Envelope check of a structured-clone message posted by the facade.
 */
export function parseRequest(message: unknown): CallRequest | null {
  if (!isRecord(message)) return null;
  const { id, method, args } = message;
  if (typeof id !== 'number' || typeof method !== 'string' || !CALL_NAMES.has(method) || !Array.isArray(args)) {
    return null;
  }
  return message as CallRequest;
}

export function parseReply(message: unknown): CallReply | null {
  if (!isRecord(message) || typeof message['id'] !== 'number' || typeof message['ok'] !== 'boolean') {
    return null;
  }
  return message as CallReply;
}
