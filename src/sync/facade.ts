/**
 * Blocking device facade.
 *
 * For callers that cannot use promises: every method parks the calling
 * thread until the worker running the orchestrator replies, or the call's
 * timeout passes.
 *
 * @example
 * ```ts
 * const endpoint = SyncFacade.discoverOne(5000);
 * if (endpoint) {
 *   SyncFacade.withDevice(endpoint, (device) => {
 *     const gaze = device.receiveGaze(1000);
 *     console.log(gaze?.gaze.x, gaze?.gaze.y);
 *   });
 * }
 * ```
 */

import { MessageChannel, type Worker } from 'node:worker_threads';
import type { Logger } from 'pino';
import type { ClockOffset } from '../core/clock/estimator.js';
import { parseConfig, type Config, type ConfigInput } from '../core/config/schema.js';
import { toError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Calibration } from '../core/models/calibration.js';
import type { DeviceEndpoint } from '../core/models/endpoint.js';
import { isSampleOf, type SampleOf } from '../core/models/samples.js';
import type { SensorKind } from '../core/models/sensors.js';
import type { DeviceStatus } from '../core/models/status.js';
import type { Template, TemplateData } from '../core/models/template.js';
import type { DeviceEvent } from '../adapters/control/http.js';
import type { MatchedSceneAudioGaze } from '../orchestrator/matching.js';
import { BlockingChannel, createSignal } from './channel.js';
import type { CallName, CallResult, MatchedSceneGaze, WorkerCalls } from './protocol.js';
import { spawnWorker } from './spawn.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncFacadeOptions {
  config?: ConfigInput;
  logger?: Logger;
}

/** Time a receive may take beyond its own timeout before the call is abandoned */
const RECEIVE_GRACE_MS = 2000;

/** Default wait of the receive methods */
const DEFAULT_RECEIVE_TIMEOUT_MS = 5000;

/**
 * Compiled builds load worker.js; running from sources loads worker.ts.
 */
function workerEntry(): URL {
  return new URL(import.meta.url.endsWith('.ts') ? './worker.ts' : './worker.js', import.meta.url);
}

// ============================================================================
// Worker Handle
// ============================================================================

class FacadeWorker {
  private readonly worker: Worker;
  private readonly channel: BlockingChannel;

  constructor(config: Config, logger: Logger) {
    const { port1, port2 } = new MessageChannel();
    const signal = createSignal();

    this.worker = spawnWorker(workerEntry(), {
      workerData: { port: port2, signal, config },
      transferList: [port2],
    });
    this.worker.unref();
    this.channel = new BlockingChannel(port1, signal, logger);
  }

  call<M extends CallName>(method: M, args: Parameters<WorkerCalls[M]>, timeoutMs: number): CallResult<M> {
    return this.channel.call(method, args, timeoutMs);
  }

  terminate(): void {
    this.channel.close();
    void this.worker.terminate();
  }
}

// ============================================================================
// Facade
// ============================================================================

export class SyncFacade {
  readonly endpoint: DeviceEndpoint;

  private readonly config: Config;
  private readonly logger: Logger;
  private readonly worker: FacadeWorker;
  private closed = false;

  /**
   * Start the worker and connect to `endpoint`, blocking until the control
   * channel is live.
   *
   * @throws ConnectionError if the device cannot be reached
   * @throws TimeoutError if the worker does not answer in time
   */
  constructor(endpoint: DeviceEndpoint, options: SyncFacadeOptions = {}) {
    this.endpoint = endpoint;
    this.config = parseConfig(options.config ?? {});
    this.logger = (options.logger ?? createLogger(this.config.logging)).child({ module: 'facade' });
    this.worker = new FacadeWorker(this.config, this.logger);

    const timeoutMs = this.config.control.connectTimeoutMs + this.config.facade.callTimeoutMs;
    try {
      this.worker.call('connect', [endpoint], timeoutMs);
    } catch (error) {
      this.closed = true;
      this.worker.terminate();
      throw error;
    }
    this.logger.info({ host: endpoint.host }, 'Connected');
  }

  static connect(endpoint: DeviceEndpoint, options: SyncFacadeOptions = {}): SyncFacade {
    return new SyncFacade(endpoint, options);
  }

  /**
   * Run `fn` against a connected facade and close it on every exit path.
   */
  static withDevice<T>(endpoint: DeviceEndpoint, fn: (device: SyncFacade) => T, options: SyncFacadeOptions = {}): T {
    const device = new SyncFacade(endpoint, options);
    try {
      return fn(device);
    } finally {
      device.close();
    }
  }

  // --------------------------------------------------------------------------
  // Discovery
  // --------------------------------------------------------------------------

  /**
   * First device advertised within `timeoutMs`, or null.
   */
  static discoverOne(timeoutMs?: number, options: SyncFacadeOptions = {}): DeviceEndpoint | null {
    const found = SyncFacade.discover(false, timeoutMs, options);
    return found[0] ?? null;
  }

  static discoverAll(timeoutMs?: number, options: SyncFacadeOptions = {}): DeviceEndpoint[] {
    return SyncFacade.discover(true, timeoutMs, options);
  }

  private static discover(all: boolean, timeoutMs: number | undefined, options: SyncFacadeOptions): DeviceEndpoint[] {
    const config = parseConfig(options.config ?? {});
    const logger = options.logger ?? createLogger(config.logging);
    const window = timeoutMs ?? config.discovery.timeoutMs;

    const worker = new FacadeWorker(config, logger);
    try {
      return worker.call('discover', [all, window], window + config.facade.callTimeoutMs);
    } finally {
      worker.terminate();
    }
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Stop streaming, disconnect and end the worker. Safe to call repeatedly.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    try {
      this.worker.call('close', [], this.config.facade.closeGraceMs);
    } catch (error) {
      this.logger.warn({ error: toError(error).message }, 'Worker did not close cleanly');
    } finally {
      this.worker.terminate();
    }
    this.logger.info('Closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  // --------------------------------------------------------------------------
  // Device State and Commands
  // --------------------------------------------------------------------------

  status(): DeviceStatus {
    return this.invoke('status', []);
  }

  /**
   * @returns the id of the new recording
   */
  recordingStart(): string {
    return this.invoke('recordingStart', []);
  }

  /**
   * Stop the recording and wait until the device reports it saved.
   */
  recordingStopAndSave(): void {
    const { control } = this.config;
    this.invoke('recordingStopAndSave', [], control.commandTimeoutMs + control.stopAndSaveTimeoutMs);
  }

  recordingCancel(): void {
    this.invoke('recordingCancel', []);
  }

  /**
   * Annotate the current recording. Without a timestamp the device stamps
   * the event on arrival.
   */
  sendEvent(name: string, timestampNs?: bigint): DeviceEvent {
    return this.invoke('sendEvent', [name, timestampNs]);
  }

  getTemplate(): Template {
    return this.invoke('getTemplate', []);
  }

  setTemplateData(data: TemplateData): TemplateData {
    return this.invoke('setTemplateData', [data]);
  }

  getCalibration(): Calibration {
    return this.invoke('getCalibration', []);
  }

  estimateClockOffset(): ClockOffset {
    return this.invoke('estimateClockOffset', []);
  }

  requestSensor(kind: SensorKind): void {
    this.invoke('requestSensor', [kind]);
  }

  releaseSensor(kind: SensorKind): void {
    this.invoke('releaseSensor', [kind]);
  }

  // --------------------------------------------------------------------------
  // Samples
  // --------------------------------------------------------------------------

  /**
   * Newest sample of `kind`, streaming it on first use.
   *
   * @returns null if nothing arrives within `timeoutMs`
   */
  receive<K extends SensorKind>(kind: K, timeoutMs: number = DEFAULT_RECEIVE_TIMEOUT_MS): SampleOf<K> | null {
    const sample = this.invoke('receive', [kind, timeoutMs], timeoutMs + RECEIVE_GRACE_MS);
    return sample && isSampleOf(sample, kind) ? sample : null;
  }

  receiveGaze(timeoutMs?: number): SampleOf<'gaze'> | null {
    return this.receive('gaze', timeoutMs);
  }

  receiveSceneVideo(timeoutMs?: number): SampleOf<'scene'> | null {
    return this.receive('scene', timeoutMs);
  }

  receiveEyeLeft(timeoutMs?: number): SampleOf<'eye_left'> | null {
    return this.receive('eye_left', timeoutMs);
  }

  receiveEyeRight(timeoutMs?: number): SampleOf<'eye_right'> | null {
    return this.receive('eye_right', timeoutMs);
  }

  receiveImu(timeoutMs?: number): SampleOf<'imu'> | null {
    return this.receive('imu', timeoutMs);
  }

  receiveEyeEvent(timeoutMs?: number): SampleOf<'eye_events'> | null {
    return this.receive('eye_events', timeoutMs);
  }

  receiveAudio(timeoutMs?: number): SampleOf<'audio'> | null {
    return this.receive('audio', timeoutMs);
  }

  /**
   * Newest scene frame with the gaze sample closest to it.
   */
  receiveMatchedSceneAndGaze(timeoutMs: number = DEFAULT_RECEIVE_TIMEOUT_MS): MatchedSceneGaze | null {
    return this.invoke('receiveMatchedSceneAndGaze', [timeoutMs], timeoutMs + RECEIVE_GRACE_MS);
  }

  /**
   * Newest scene frame with the closest gaze sample and the audio received
   * up to it.
   */
  receiveMatchedSceneAudioAndGaze(timeoutMs: number = DEFAULT_RECEIVE_TIMEOUT_MS): MatchedSceneAudioGaze | null {
    return this.invoke('receiveMatchedSceneAudioAndGaze', [timeoutMs], timeoutMs + RECEIVE_GRACE_MS);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private invoke<M extends CallName>(
    method: M,
    args: Parameters<WorkerCalls[M]>,
    timeoutMs: number = this.config.facade.callTimeoutMs
  ): CallResult<M> {
    return this.worker.call(method, args, timeoutMs);
  }
}
