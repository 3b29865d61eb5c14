/**
 * Session Orchestrator.
 *
 * Owns the control session, the clock estimator, the transport pool and one
 * stream session per sensor that is both desired and available. After every
 * status change or change of desire the active sessions are reconciled:
 *
 *   target = desired ∩ available
 *
 * where a multiplexed sensor is only available while its carrier is. Missing
 * sessions are opened, surplus ones closed, and sessions whose URL changed
 * are replaced. While the control channel is down no stream runs.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import {
  ClockOffsetEstimator,
  UNKNOWN_OFFSET,
  type ClockOffset,
  type ClockProbe,
} from '../core/clock/estimator.js';
import type { Config } from '../core/config/schema.js';
import { ClosedError, toError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import { describeEndpoint, type DeviceEndpoint } from '../core/models/endpoint.js';
import { isSampleOf, type Sample, type SampleOf, type TaggedSample } from '../core/models/samples.js';
import type { SensorKind } from '../core/models/sensors.js';
import { directSensor, isSensorAvailable, type DeviceStatus } from '../core/models/status.js';
import { ControlSession, type ControlState } from '../adapters/control/session.js';
import { rtspTransportFactory } from '../adapters/rtsp/transport.js';
import { TimeEchoProbe } from '../adapters/time-echo/probe.js';
import { SampleBuffer } from '../streams/buffer.js';
import { createSampleDecoder, type DecoderOverrides } from '../streams/decoders/index.js';
import { StreamSession, type SampleClock, type StreamState } from '../streams/session.js';
import { TransportPool, type TransportFactory } from '../streams/transport.js';

// ============================================================================
// Types
// ============================================================================

export type ConnectionEvent =
  | { state: 'connected'; reconnected: boolean }
  | { state: 'disconnected'; reason: string }
  | { state: 'failed'; attempts: number };

export interface StreamStateEvent {
  kind: SensorKind;
  state: StreamState;
  previous: StreamState;
  epoch: number;
}

export interface OrchestratorEvents {
  status: (status: DeviceStatus) => void;
  sample: (tagged: TaggedSample) => void;
  connection: (event: ConnectionEvent) => void;
  streamState: (event: StreamStateEvent) => void;
}

type OrchestratorEventKey = keyof OrchestratorEvents;

export type ClockProbeFactory = (host: string, port: number) => ClockProbe;

export interface SessionOrchestratorOptions {
  endpoint: DeviceEndpoint;
  config: Config;
  logger?: Logger;
  /** Defaults to RTSP over TCP */
  transportFactory?: TransportFactory;
  /** Defaults to the device's TCP time echo service */
  clockProbeFactory?: ClockProbeFactory;
  decoders?: DecoderOverrides;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SessionOrchestrator extends EventEmitter {
  readonly endpoint: DeviceEndpoint;
  readonly control: ControlSession;

  private readonly config: Config;
  private readonly logger: Logger;
  private readonly pool: TransportPool;
  private readonly clockProbeFactory: ClockProbeFactory;
  private readonly decoders: DecoderOverrides;

  private readonly desired = new Set<SensorKind>();
  private readonly sessions = new Map<SensorKind, StreamSession>();
  private readonly iteratorBuffers = new Set<SampleBuffer<TaggedSample> | SampleBuffer<DeviceStatus>>();

  private estimator: ClockOffsetEstimator | null = null;
  private timeEchoPort: number | null = null;
  private readonly sampleClock: SampleClock = {
    translate: (deviceNs) => this.estimator?.translate(deviceNs) ?? deviceNs,
  };

  private closed = false;

  constructor(options: SessionOrchestratorOptions) {
    super();
    this.endpoint = options.endpoint;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger()).child({
      module: 'orchestrator',
      deviceId: options.endpoint.identity.deviceId,
    });
    this.decoders = options.decoders ?? {};
    this.clockProbeFactory = options.clockProbeFactory ?? ((host, port) => new TimeEchoProbe(host, port));

    const transportFactory =
      options.transportFactory ??
      rtspTransportFactory({
        connectTimeoutMs: this.config.streams.connectTimeoutMs,
        keepAliveIntervalMs: this.config.streams.keepAliveIntervalMs,
        logger: this.logger,
      });
    this.pool = new TransportPool(transportFactory, this.logger);

    this.control = new ControlSession({ config: this.config.control, logger: this.logger });
    this.control.on('status', (status) => {
      this.handleStatus(status);
    });
    this.control.on('connected', ({ reconnected }) => {
      this.emit('connection', { state: 'connected', reconnected });
      this.reconcile();
    });
    this.control.on('disconnected', (reason) => {
      this.emit('connection', { state: 'disconnected', reason });
      this.reconcile();
    });
    this.control.on('reconnectExhausted', (attempts) => {
      this.emit('connection', { state: 'failed', attempts });
    });
  }

  override on<K extends OrchestratorEventKey>(event: K, listener: OrchestratorEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends OrchestratorEventKey>(event: K, listener: OrchestratorEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends OrchestratorEventKey>(event: K, ...args: Parameters<OrchestratorEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Connect the control channel and start streaming whatever is desired.
   *
   * @throws ConnectionError if the device is unreachable
   */
  async start(): Promise<void> {
    if (this.closed) {
      throw new ClosedError('Orchestrator is closed');
    }
    this.logger.info({ device: describeEndpoint(this.endpoint) }, 'Starting');
    await this.control.connect(this.endpoint);
    this.reconcile();
  }

  /**
   * Stop every session, the clock and the control channel. Safe to call repeatedly.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
    this.pool.closeAll();

    this.estimator?.stop();
    this.estimator = null;

    this.control.close();

    for (const buffer of this.iteratorBuffers) {
      buffer.close();
    }
    this.iteratorBuffers.clear();
    this.logger.info('Closed');
  }

  isClosed(): boolean {
    return this.closed;
  }

  connectionState(): ControlState {
    return this.control.getState();
  }

  // --------------------------------------------------------------------------
  // Sensor Desire
  // --------------------------------------------------------------------------

  requestSensor(kind: SensorKind): void {
    if (this.closed || this.desired.has(kind)) return;
    this.desired.add(kind);
    this.reconcile();
  }

  releaseSensor(kind: SensorKind): void {
    if (this.closed || !this.desired.has(kind)) return;
    this.desired.delete(kind);
    this.reconcile();
  }

  desiredSensors(): SensorKind[] {
    return [...this.desired];
  }

  activeSensors(): SensorKind[] {
    return [...this.sessions.keys()];
  }

  session(kind: SensorKind): StreamSession | null {
    return this.sessions.get(kind) ?? null;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  status(): DeviceStatus {
    return this.control.status();
  }

  estimateClockOffset(): ClockOffset {
    return this.estimator?.estimate() ?? UNKNOWN_OFFSET;
  }

  /**
   * Samples from every stream (or one kind) from the first pull on, until close.
   */
  samples(): AsyncGenerator<TaggedSample, void, undefined>;
  samples<K extends SensorKind>(kind: K): AsyncGenerator<TaggedSample<SampleOf<K>>, void, undefined>;
  async *samples(kind?: SensorKind): AsyncGenerator<TaggedSample, void, undefined> {
    const buffer = new SampleBuffer<TaggedSample>(
      this.config.streams.bufferCapacity,
      this.config.streams.dropPolicy
    );
    const listener = (tagged: TaggedSample): void => {
      if (kind === undefined || isSampleOf(tagged.sample, kind)) {
        buffer.push(tagged);
      }
    };

    if (this.closed) return;
    this.on('sample', listener);
    this.iteratorBuffers.add(buffer);

    try {
      for (;;) {
        const tagged = await buffer.next();
        if (tagged === null) return;
        yield tagged;
      }
    } finally {
      this.off('sample', listener);
      this.iteratorBuffers.delete(buffer);
      buffer.close();
    }
  }

  /**
   * Status snapshots from the first pull on, until close.
   */
  async *statusUpdates(): AsyncGenerator<DeviceStatus, void, undefined> {
    const buffer = new SampleBuffer<DeviceStatus>(this.config.streams.bufferCapacity, 'drop-oldest');
    const listener = (status: DeviceStatus): void => {
      buffer.push(status);
    };

    if (this.closed) return;
    this.on('status', listener);
    this.iteratorBuffers.add(buffer);

    try {
      for (;;) {
        const status = await buffer.next();
        if (status === null) return;
        yield status;
      }
    } finally {
      this.off('status', listener);
      this.iteratorBuffers.delete(buffer);
      buffer.close();
    }
  }

  // --------------------------------------------------------------------------
  // Status Handling
  // --------------------------------------------------------------------------

  private handleStatus(status: DeviceStatus): void {
    this.emit('status', status);
    this.updateClock(status);
    this.reconcile();
  }

  private updateClock(status: DeviceStatus): void {
    if (!this.config.clock.enabled) return;

    const port = status.phone?.timeEchoPort ?? null;
    if (port === null || port === this.timeEchoPort) return;

    this.estimator?.stop();
    this.timeEchoPort = port;

    const estimator = new ClockOffsetEstimator({
      probe: this.clockProbeFactory(this.endpoint.host, port),
      config: this.config.clock,
      logger: this.logger,
    });
    estimator.on('probeFailed', (error) => {
      this.logger.debug({ error: error.message }, 'Clock probe failed');
    });
    this.estimator = estimator;
    estimator.start();
    this.logger.debug({ port }, 'Clock estimation started');
  }

  // --------------------------------------------------------------------------
  // Reconciliation
  // --------------------------------------------------------------------------

  private targetSessions(): Map<SensorKind, string> {
    const target = new Map<SensorKind, string>();
    if (!this.control.isLive()) return target;

    const status = this.control.status();
    for (const kind of this.desired) {
      if (!isSensorAvailable(status, kind)) continue;
      const url = directSensor(status, kind)?.url;
      if (url) target.set(kind, url);
    }
    return target;
  }

  private reconcile(): void {
    if (this.closed) return;

    const target = this.targetSessions();

    for (const [kind, session] of this.sessions) {
      const url = target.get(kind);
      if (url === undefined || url !== session.url) {
        this.logger.debug({ sensor: kind, url: session.url }, 'Closing stream session');
        this.sessions.delete(kind);
        session.close();
      }
    }

    for (const [kind, url] of target) {
      if (this.sessions.has(kind)) continue;
      this.sessions.set(kind, this.createSession(kind, url));
    }
  }

  private createSession(kind: SensorKind, url: string): StreamSession {
    this.logger.debug({ sensor: kind, url }, 'Opening stream session');

    const session = new StreamSession({
      kind,
      url,
      pool: this.pool,
      config: this.config.streams,
      clock: this.sampleClock,
      decoder: createSampleDecoder(kind, this.decoders),
      logger: this.logger,
    });

    const deviceId = this.endpoint.identity.deviceId;
    session.on('sample', (sample: Sample) => {
      this.emit('sample', Object.freeze({ deviceId, sample }));
    });
    session.on('stateChanged', (state, previous) => {
      this.emit('streamState', { kind, state, previous, epoch: session.getEpoch() });
    });

    try {
      session.open();
    } catch (error) {
      this.logger.error({ sensor: kind, error: toError(error).message }, 'Could not open stream session');
    }
    return session;
  }
}
