/**
 * Control Session.
 *
 * Keeps a live, push-updated model of one device and issues commands to it.
 *
 * State machine:
 *   disconnected → connecting → live → disconnected → connecting (backoff) …
 *   any → closed (terminal)
 *
 * The status WebSocket is the liveness signal: when it drops the session
 * reports `disconnected`, fails outstanding commands and reconnects with
 * exponential backoff. Each successful (re)connect fetches a full snapshot
 * before the session goes live.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { backoffDelay, canRetry } from '../../core/backoff.js';
import type { ControlConfig } from '../../core/config/schema.js';
import {
  ClosedError,
  ConnectionError,
  DeviceClientError,
  NotConnectedError,
  TimeoutError,
  toError,
} from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import { parseCalibration, type Calibration } from '../../core/models/calibration.js';
import { describeEndpoint, type DeviceEndpoint } from '../../core/models/endpoint.js';
import {
  applyComponent,
  emptyStatus,
  statusFromComponents,
  type DeviceStatus,
  type StatusComponent,
} from '../../core/models/status.js';
import type { Template, TemplateData } from '../../core/models/template.js';
import { DeviceHttpClient, statusSocketUrl, type DeviceEvent, type RequestOptions } from './http.js';
import { StatusSocket } from './websocket.js';

// ============================================================================
// Types
// ============================================================================

export type ControlState = 'disconnected' | 'connecting' | 'live' | 'closed';

export interface ConnectedInfo {
  reconnected: boolean;
}

export interface ControlSessionEvents {
  stateChanged: (state: ControlState, previous: ControlState) => void;
  connected: (info: ConnectedInfo) => void;
  disconnected: (reason: string) => void;
  status: (status: DeviceStatus) => void;
  /** Reconnection stopped after the configured number of attempts */
  reconnectExhausted: (attempts: number) => void;
}

type ControlEventKey = keyof ControlSessionEvents;

/**
 * A unit of work run against the device in submission order.
 */
export interface ControlCommand<T> {
  readonly name: string;
  run(client: DeviceHttpClient, options: RequestOptions): Promise<T>;
}

export interface ControlSessionOptions {
  config: ControlConfig;
  logger?: Logger;
}

interface PendingCommand {
  readonly name: string;
  readonly controller: AbortController;
  settled: boolean;
  reject: (error: Error) => void;
}

// ============================================================================
// Session
// ============================================================================

export class ControlSession extends EventEmitter {
  private readonly config: ControlConfig;
  private readonly logger: Logger;

  private endpoint: DeviceEndpoint | null = null;
  private state: ControlState = 'disconnected';
  private current: DeviceStatus = emptyStatus();

  private http: DeviceHttpClient | null = null;
  private socket: StatusSocket | null = null;

  // Commands run one at a time in submission order
  private commandChain: Promise<void> = Promise.resolve();
  private readonly pending = new Set<PendingCommand>();

  // Reconnection
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private hasBeenLive = false;

  constructor(options: ControlSessionOptions) {
    super();
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'control' });
  }

  override on<K extends ControlEventKey>(event: K, listener: ControlSessionEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends ControlEventKey>(event: K, listener: ControlSessionEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends ControlEventKey>(event: K, ...args: Parameters<ControlSessionEvents[K]>): boolean {
    return super.emit(event, ...args);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Connect and fetch the first full snapshot.
   *
   * @throws ConnectionError if the device cannot be reached within `connectTimeoutMs`
   * @throws ClosedError if the session was closed
   */
  async connect(endpoint: DeviceEndpoint): Promise<void> {
    if (this.state === 'closed') {
      throw new ClosedError('Control session is closed');
    }
    if (this.state === 'live' || this.state === 'connecting') {
      return;
    }

    this.endpoint = endpoint;
    this.clearReconnectTimer();
    await this.establish();
  }

  /**
   * Stop reconnecting, fail outstanding commands and drop the connection.
   * Safe to call repeatedly.
   */
  close(): void {
    if (this.state === 'closed') return;

    this.clearReconnectTimer();
    this.failPending(() => new ClosedError('Control session closed'));
    this.teardownTransport();
    this.setState('closed');
    this.logger.debug('Control session closed');
  }

  getState(): ControlState {
    return this.state;
  }

  isLive(): boolean {
    return this.state === 'live';
  }

  getEndpoint(): DeviceEndpoint | null {
    return this.endpoint;
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  /**
   * Latest snapshot. Never performs I/O.
   */
  status(): DeviceStatus {
    return this.current;
  }

  /**
   * @returns a function that removes the listener
   */
  onStatusChanged(listener: (status: DeviceStatus) => void): () => void {
    this.on('status', listener);
    return () => {
      this.off('status', listener);
    };
  }

  /**
   * Resolve with the first snapshot, current one included, matching `predicate`.
   *
   * @throws TimeoutError if none matches within `timeoutMs`
   * @throws ClosedError if the session closes first
   */
  waitForStatus(predicate: (status: DeviceStatus) => boolean, timeoutMs: number): Promise<DeviceStatus> {
    if (predicate(this.current)) {
      return Promise.resolve(this.current);
    }
    if (this.state === 'closed') {
      return Promise.reject(new ClosedError('Control session is closed'));
    }

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.off('status', onStatus);
        this.off('stateChanged', onState);
      };

      const onStatus = (status: DeviceStatus): void => {
        if (predicate(status)) {
          cleanup();
          resolve(status);
        }
      };

      const onState = (state: ControlState): void => {
        if (state === 'closed') {
          cleanup();
          reject(new ClosedError('Control session closed while waiting for status'));
        }
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`No matching status within ${String(timeoutMs)}ms`, timeoutMs));
      }, timeoutMs);

      this.on('status', onStatus);
      this.on('stateChanged', onState);
    });
  }

  // --------------------------------------------------------------------------
  // Commands
  // --------------------------------------------------------------------------

  /**
   * Run a command after every previously submitted one has finished.
   *
   * @throws NotConnectedError when not live, ClosedError after close
   */
  sendCommand<T>(command: ControlCommand<T>): Promise<T> {
    if (this.state === 'closed') {
      return Promise.reject(new ClosedError('Control session is closed'));
    }
    if (this.state !== 'live') {
      return Promise.reject(new NotConnectedError());
    }

    return new Promise<T>((resolve, reject) => {
      const pending: PendingCommand = {
        name: command.name,
        controller: new AbortController(),
        settled: false,
        reject,
      };
      this.pending.add(pending);

      const settle = (action: () => void): void => {
        if (pending.settled) return;
        pending.settled = true;
        this.pending.delete(pending);
        action();
      };

      this.commandChain = this.commandChain.then(async () => {
        if (pending.settled) return;

        const client = this.http;
        if (this.state !== 'live' || !client) {
          settle(() => {
            reject(new NotConnectedError());
          });
          return;
        }

        this.logger.debug({ command: command.name }, 'Sending command');
        try {
          const result = await command.run(client, {
            timeoutMs: this.config.commandTimeoutMs,
            signal: pending.controller.signal,
          });
          settle(() => {
            resolve(result);
          });
        } catch (error) {
          const err = toError(error);
          this.logger.debug({ command: command.name, error: err.message }, 'Command failed');
          settle(() => {
            reject(err);
          });
        }
      });
    });
  }

  /**
   * @returns the new recording's id
   */
  recordingStart(): Promise<string> {
    return this.sendCommand({
      name: 'recording.start',
      run: (client, options) => client.startRecording(options),
    });
  }

  /**
   * Stop the recording and resolve once the device reports it idle again.
   */
  async recordingStopAndSave(): Promise<void> {
    await this.sendCommand({
      name: 'recording.stopAndSave',
      run: (client, options) => client.stopAndSaveRecording(options),
    });
    await this.waitForStatus((status) => status.recordingState === 'idle', this.config.stopAndSaveTimeoutMs);
  }

  recordingCancel(): Promise<void> {
    return this.sendCommand({
      name: 'recording.cancel',
      run: (client, options) => client.cancelRecording(options),
    });
  }

  /**
   * @param timestampNs - device-clock Unix ns; the device stamps arrival time when omitted
   */
  sendEvent(name: string, timestampNs?: bigint): Promise<DeviceEvent> {
    return this.sendCommand({
      name: 'event',
      run: (client, options) => client.sendEvent(name, timestampNs, options),
    });
  }

  getTemplate(): Promise<Template> {
    return this.sendCommand({
      name: 'template.get',
      run: async (client, options) => {
        const definition = await client.getTemplateDefinition(options);
        const data = await client.getTemplateData(options);
        return Object.freeze({ definition, data });
      },
    });
  }

  setTemplateData(data: TemplateData): Promise<TemplateData> {
    return this.sendCommand({
      name: 'template.setData',
      run: (client, options) => client.postTemplateData(data, options),
    });
  }

  getCalibration(): Promise<Calibration> {
    return this.sendCommand({
      name: 'calibration.get',
      run: async (client, options) => parseCalibration(await client.getCalibration(options)),
    });
  }

  // --------------------------------------------------------------------------
  // Connection Handling
  // --------------------------------------------------------------------------

  private async establish(): Promise<void> {
    const endpoint = this.endpoint;
    if (!endpoint) {
      throw new NotConnectedError('No endpoint to connect to');
    }

    this.setState('connecting');

    const http = new DeviceHttpClient(endpoint, this.logger);
    const socket = new StatusSocket(statusSocketUrl(endpoint), this.logger);
    const early: StatusComponent[] = [];
    let ready = false;
    let lostWhileConnecting: string | null = null;

    socket.on('component', (component) => {
      if (ready) {
        this.applyPush(component);
      } else {
        early.push(component);
      }
    });
    socket.on('invalidMessage', (error) => {
      this.logger.warn({ error: error.message }, 'Ignoring malformed status push');
    });
    socket.on('closed', (reason) => {
      if (this.socket === socket) {
        this.handleTransportLoss(reason);
      } else if (!ready) {
        lostWhileConnecting = reason;
      }
    });

    const deadline = Date.now() + this.config.connectTimeoutMs;

    try {
      await socket.open(this.config.connectTimeoutMs);
      const components = await http.getStatus({ timeoutMs: Math.max(1, deadline - Date.now()) });

      if (this.state !== 'connecting') {
        // Closed while connecting
        socket.close();
        throw new ClosedError('Control session closed while connecting');
      }
      if (lostWhileConnecting !== null) {
        throw new ConnectionError(`Status socket closed: ${lostWhileConnecting}`);
      }

      this.http = http;
      this.socket = socket;
      ready = true;

      this.replaceStatus(statusFromComponents(components, this.current.version + 1));
      for (const component of early) {
        this.applyPush(component);
      }
    } catch (error) {
      socket.close();
      if (this.state === 'connecting') {
        this.setState('disconnected');
      }
      if (error instanceof ClosedError) throw error;
      const err = toError(error);
      throw new ConnectionError(
        `Could not connect to ${describeEndpoint(endpoint)}: ${err.message}`,
        { cause: err }
      );
    }

    const reconnected = this.hasBeenLive;
    this.hasBeenLive = true;
    this.reconnectAttempts = 0;
    this.setState('live');
    this.logger.info({ device: describeEndpoint(endpoint), reconnected }, 'Control channel live');
    this.emit('connected', { reconnected });
  }

  private handleTransportLoss(reason: string): void {
    this.logger.warn({ reason }, 'Control channel lost');
    this.teardownTransport();
    this.failPending(() => new NotConnectedError('Control channel lost'));
    this.setState('disconnected');
    this.emit('disconnected', reason);
    this.scheduleReconnect();
  }

  private teardownTransport(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    this.http = null;
  }

  private failPending(makeError: () => DeviceClientError): void {
    for (const pending of this.pending) {
      pending.settled = true;
      pending.controller.abort();
      pending.reject(makeError());
    }
    this.pending.clear();
  }

  // --------------------------------------------------------------------------
  // Status Handling
  // --------------------------------------------------------------------------

  private applyPush(component: StatusComponent): void {
    this.replaceStatus(applyComponent(this.current, component));
  }

  private replaceStatus(status: DeviceStatus): void {
    this.current = status;
    this.emit('status', status);
  }

  private setState(state: ControlState): void {
    if (state === this.state) return;
    const previous = this.state;
    this.state = state;
    this.emit('stateChanged', state, previous);
  }

  // --------------------------------------------------------------------------
  // Reconnection
  // --------------------------------------------------------------------------

  private scheduleReconnect(): void {
    if (this.state === 'closed') return;

    if (!canRetry(this.config.reconnect, this.reconnectAttempts)) {
      this.logger.error({ attempts: this.reconnectAttempts }, 'Giving up on control channel');
      this.emit('reconnectExhausted', this.reconnectAttempts);
      return;
    }

    const delay = backoffDelay(this.config.reconnect, this.reconnectAttempts);
    this.logger.debug({ delay, attempt: this.reconnectAttempts + 1 }, 'Scheduling reconnect');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempts++;
      void this.establish().catch((error: unknown) => {
        this.logger.debug({ error: toError(error).message }, 'Reconnect attempt failed');
        this.scheduleReconnect();
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
