/**
 * In-process device control API: the REST endpoints and the status
 * WebSocket, served by express and ws on an ephemeral port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { CALIBRATION_BYTES } from '../../src/core/models/calibration.js';
import { endpointFromHost, type DeviceEndpoint } from '../../src/core/models/endpoint.js';

// ============================================================================
// Types
// ============================================================================

export interface WireComponent {
  model: string;
  data: Record<string, unknown>;
}

export interface RecordedHttpRequest {
  method: string;
  path: string;
  body: string;
}

export interface FakeDeviceOptions {
  components?: WireComponent[];
  /** Delay before SAVE follows STOP */
  saveDelayMs?: number;
  /** Digits the device stamps unstamped events with */
  eventTimestamp?: string;
}

interface Failure {
  status: number;
  message: string;
}

/** Timestamp the device assigns to events sent without one */
export const DEVICE_EVENT_TIMESTAMP = '1700000000000000000';

// ============================================================================
// Component Builders
// ============================================================================

export function phoneComponent(overrides: Record<string, unknown> = {}): WireComponent {
  return {
    model: 'Phone',
    data: {
      device_id: 'device-1',
      device_name: 'Test Phone',
      ip: '127.0.0.1',
      battery_level: 80,
      battery_state: 'OK',
      memory: 1000,
      memory_state: 'OK',
      ...overrides,
    },
  };
}

export function sensorComponent(
  sensor: string,
  port: number | null,
  params: string | null,
  overrides: Record<string, unknown> = {}
): WireComponent {
  return {
    model: 'Sensor',
    data: {
      sensor,
      conn_type: 'DIRECT',
      connected: port !== null,
      ip: port === null ? null : '127.0.0.1',
      port,
      protocol: 'rtsp',
      params,
      ...overrides,
    },
  };
}

export function recordingComponent(id: string, action: string): WireComponent {
  return { model: 'Recording', data: { id, action, message: '', rec_duration_ns: 0 } };
}

/**
 * Calibration blob with recognisable values in the first scene matrix
 * entry and the crc.
 */
export function buildCalibrationBlob(): Buffer {
  const blob = Buffer.alloc(CALIBRATION_BYTES);
  blob.writeUInt8(1, 0);
  blob.write('abc123', 1, 'ascii');
  blob.writeDoubleLE(1000.5, 7);
  blob.writeUInt32LE(0xdeadbeef, CALIBRATION_BYTES - 4);
  return blob;
}

function componentKey(component: WireComponent): string {
  const data = component.data;
  const id = data['sensor'] ?? data['device_id'] ?? '';
  const conn = data['conn_type'] ?? '';
  return `${component.model}:${String(id)}:${String(conn)}`;
}

function ok(res: Response, result: unknown): void {
  res.status(200).json({ message: 'Success', result });
}

function fail(res: Response, status: number, message: string): void {
  res.status(status).json({ message, result: null });
}

// ============================================================================
// Fake Device
// ============================================================================

export class FakeDevice {
  readonly requests: RecordedHttpRequest[] = [];
  /** Raw bodies of POST /api/event */
  readonly eventBodies: string[] = [];

  private readonly server: Server;
  private readonly wss: WebSocketServer;
  private readonly components = new Map<string, WireComponent>();
  private readonly failures = new Map<string, Failure>();
  private readonly delays = new Map<string, number>();
  private readonly stalls = new Set<string>();
  private readonly eventTimestamp: string;
  private readonly saveDelayMs: number;
  private readonly timers = new Set<NodeJS.Timeout>();
  private templateData: Record<string, string[]> = { participant: ['P01'] };
  private recordingCount = 0;
  private activeRecording: string | null = null;
  private listeningPort = 0;

  private constructor(options: FakeDeviceOptions) {
    this.saveDelayMs = options.saveDelayMs ?? 20;
    this.eventTimestamp = options.eventTimestamp ?? DEVICE_EVENT_TIMESTAMP;
    for (const component of options.components ?? [phoneComponent()]) {
      this.components.set(componentKey(component), component);
    }

    const app = express();
    app.use((req: Request, _res: Response, next: NextFunction) => {
      this.requests.push({ method: req.method, path: req.path, body: '' });
      next();
    });
    app.use((req: Request, res: Response, next: NextFunction) => {
      const failure = this.failures.get(req.path);
      if (failure) {
        this.failures.delete(req.path);
        fail(res, failure.status, failure.message);
        return;
      }
      if (this.stalls.delete(req.path)) {
        res.status(200).type('application/json');
        res.write('{"message":"Success",');
        return;
      }
      const delay = this.delays.get(req.path);
      if (delay === undefined) {
        next();
        return;
      }
      this.delays.delete(req.path);
      this.later(delay, next);
    });

    app.get('/api/status', (_req, res) => {
      ok(res, [...this.components.values()]);
    });

    app.post(/^\/api\/recording:(start|stop_and_save|cancel)$/, (req, res) => {
      this.handleRecording(req.params['0'] ?? '', res);
    });

    app.post('/api/event', express.text({ type: '*/*' }), (req: Request, res: Response) => {
      const body = typeof req.body === 'string' ? req.body : '';
      this.eventBodies.push(body);
      const last = this.requests[this.requests.length - 1];
      if (last) last.body = body;

      const name = /"name":"([^"]*)"/.exec(body)?.[1] ?? '';
      const stamp = /"timestamp":(\d+)/.exec(body)?.[1] ?? this.eventTimestamp;
      // Written by hand so the stamp keeps every digit
      const result = `{"name":${JSON.stringify(name)},"recording_id":${JSON.stringify(this.activeRecording)},"timestamp":${stamp}}`;
      res.status(200).type('application/json').send(`{"message":"Success","result":${result}}`);
    });

    app.get('/api/template_def', (_req, res) => {
      ok(res, {
        id: 'tpl-1',
        name: 'Session',
        description: null,
        items: [
          { id: 'participant', title: 'Participant', widget_type: 'TEXT', input_type: 'any', required: true },
          { id: 'notes', title: 'Notes', widget_type: 'PARAGRAPH', input_type: 'any', required: false },
        ],
      });
    });

    app.get('/api/template_data', (_req, res) => {
      ok(res, this.templateData);
    });

    app.post('/api/template_data', express.json(), (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        fail(res, 400, 'Template data must be an object');
        return;
      }
      const data: Record<string, string[]> = {};
      for (const [key, value] of Object.entries(body)) {
        data[key] = Array.isArray(value) ? value.map(String) : [String(value)];
      }
      this.templateData = { ...this.templateData, ...data };
      ok(res, this.templateData);
    });

    app.get('/calibration.bin', (_req, res) => {
      res.status(200).type('application/octet-stream').send(buildCalibrationBlob());
    });

    this.server = createServer(app);
    this.wss = new WebSocketServer({ server: this.server, path: '/api/status' });
  }

  static async start(options: FakeDeviceOptions = {}): Promise<FakeDevice> {
    const device = new FakeDevice(options);
    await new Promise<void>((resolve) => {
      device.server.listen(0, '127.0.0.1', resolve);
    });
    const address = device.server.address();
    device.listeningPort = typeof address === 'object' && address ? address.port : 0;
    return device;
  }

  get port(): number {
    return this.listeningPort;
  }

  endpoint(): DeviceEndpoint {
    return endpointFromHost('127.0.0.1', this.listeningPort, { deviceId: 'device-1', deviceName: 'Test Phone' });
  }

  paths(): string[] {
    return this.requests.map((request) => `${request.method} ${request.path}`);
  }

  socketCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Store a component and push it to every status socket.
   */
  update(component: WireComponent): void {
    this.components.set(componentKey(component), component);
    this.broadcast(component);
  }

  /**
   * Push raw text on every status socket without storing anything.
   */
  pushRaw(text: string): void {
    for (const client of this.wss.clients) {
      client.send(text);
    }
  }

  failNext(path: string, status: number, message: string): void {
    this.failures.set(path, { status, message });
  }

  delayNext(path: string, ms: number): void {
    this.delays.set(path, ms);
  }

  /**
   * Answer the next request to `path` with headers and half a body, then
   * go quiet until the device stops.
   */
  stallNext(path: string): void {
    this.stalls.add(path);
  }

  dropSockets(): void {
    for (const client of this.wss.clients) {
      client.terminate();
    }
  }

  async stop(): Promise<void> {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.dropSockets();
    this.wss.close();
    this.server.closeAllConnections();
    await new Promise<void>((resolve) => {
      this.server.close(() => {
        resolve();
      });
    });
  }

  // --------------------------------------------------------------------------

  private handleRecording(action: string, res: Response): void {
    switch (action) {
      case 'start': {
        if (this.activeRecording !== null) {
          fail(res, 400, 'Already recording');
          return;
        }
        this.recordingCount++;
        const id = `rec-${String(this.recordingCount)}`;
        this.activeRecording = id;
        ok(res, { id });
        this.update(recordingComponent(id, 'START'));
        return;
      }
      case 'stop_and_save': {
        const id = this.activeRecording;
        if (id === null) {
          fail(res, 400, 'Not recording');
          return;
        }
        this.activeRecording = null;
        ok(res, null);
        this.update(recordingComponent(id, 'STOP'));
        this.later(this.saveDelayMs, () => {
          this.update(recordingComponent(id, 'SAVE'));
        });
        return;
      }
      default: {
        const id = this.activeRecording;
        if (id === null) {
          fail(res, 400, 'Not recording');
          return;
        }
        this.activeRecording = null;
        ok(res, null);
        this.update(recordingComponent(id, 'DISCARD'));
      }
    }
  }

  private broadcast(component: WireComponent): void {
    const text = JSON.stringify(component);
    for (const client of this.wss.clients) {
      send(client, text);
    }
  }

  private later(ms: number, fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    this.timers.add(timer);
  }
}

function send(client: WebSocket, text: string): void {
  if (client.readyState === client.OPEN) {
    client.send(text);
  }
}
