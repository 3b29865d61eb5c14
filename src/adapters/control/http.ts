/**
 * REST client for the device control API.
 *
 * Every reply is a JSON envelope `{ message, result }`. Non-2xx replies carry
 * a human-readable `message` and surface as RejectedError.
 */

import fetch, { type Response } from 'node-fetch';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  ClosedError,
  ConnectionError,
  DeviceClientError,
  ProtocolError,
  RejectedError,
  TimeoutError,
  toError,
} from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import type { DeviceEndpoint } from '../../core/models/endpoint.js';
import { parseStatusResult, type StatusComponent } from '../../core/models/status.js';
import {
  TemplateDataSchema,
  TemplateDefinitionSchema,
  type TemplateData,
  type TemplateDefinition,
} from '../../core/models/template.js';

// ============================================================================
// Reply Schemas
// ============================================================================

const EnvelopeSchema = z.object({
  message: z.string().default(''),
  result: z.unknown(),
});

const ErrorEnvelopeSchema = z.object({
  message: z.string(),
});

const RecordingStartedSchema = z.object({
  id: z.string(),
});

const EventResultSchema = z.object({
  name: z.string(),
  recording_id: z.string().nullable().optional(),
  timestamp: z.number(),
});

// Digits of the reply stamp, read before JSON.parse rounds them to a double
const EVENT_TIMESTAMP = /"timestamp"\s*:\s*(\d+)\s*[,}]/;

// ============================================================================
// Types
// ============================================================================

export interface RequestOptions {
  timeoutMs: number;
  /** Aborts the request early, e.g. when the session closes */
  signal?: AbortSignal;
}

/**
 * An event as acknowledged by the device.
 */
export interface DeviceEvent {
  readonly name: string;
  readonly recordingId: string | null;
  readonly timestampNs: bigint;
}

// ============================================================================
// Helpers
// ============================================================================

function hostForUrl(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

export function controlBaseUrl(endpoint: DeviceEndpoint): string {
  return `http://${hostForUrl(endpoint.host)}:${String(endpoint.controlPort)}`;
}

export function statusSocketUrl(endpoint: DeviceEndpoint): string {
  return `ws://${hostForUrl(endpoint.host)}:${String(endpoint.controlPort)}/api/status`;
}

function parseEnvelope(text: string, what: string): unknown {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`${what} returned invalid JSON`, { cause: error });
  }
  return parseResult(EnvelopeSchema, payload, what).result;
}

function parseResult<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed ${what} reply: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

// ============================================================================
// Client
// ============================================================================

export class DeviceHttpClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(endpoint: DeviceEndpoint, logger?: Logger) {
    this.baseUrl = controlBaseUrl(endpoint);
    this.logger = (logger ?? silentLogger()).child({ module: 'http' });
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  async getStatus(options: RequestOptions): Promise<StatusComponent[]> {
    const result = await this.requestJson('GET', '/api/status', options);
    return parseStatusResult(result, (error) => {
      this.logger.warn({ error: error.message }, 'Skipping malformed status component');
    });
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  /**
   * @returns the new recording's id
   */
  async startRecording(options: RequestOptions): Promise<string> {
    const result = await this.requestJson('POST', '/api/recording:start', options);
    return parseResult(RecordingStartedSchema, result, 'recording start').id;
  }

  async stopAndSaveRecording(options: RequestOptions): Promise<void> {
    await this.requestJson('POST', '/api/recording:stop_and_save', options);
  }

  async cancelRecording(options: RequestOptions): Promise<void> {
    await this.requestJson('POST', '/api/recording:cancel', options);
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  /**
   * Annotate the recording with a named event. Without a timestamp the
   * device stamps the event on arrival.
   */
  async sendEvent(name: string, timestampNs: bigint | undefined, options: RequestOptions): Promise<DeviceEvent> {
    // Nanosecond timestamps exceed the double range JSON.stringify would use
    const body =
      timestampNs === undefined
        ? JSON.stringify({ name })
        : `{"name":${JSON.stringify(name)},"timestamp":${timestampNs.toString()}}`;

    const text = await this.requestText('POST', '/api/event', options, body);
    const event = parseResult(EventResultSchema, parseEnvelope(text, 'POST /api/event'), 'event');
    const digits = EVENT_TIMESTAMP.exec(text)?.[1];
    return Object.freeze({
      name: event.name,
      recordingId: event.recording_id ?? null,
      timestampNs: timestampNs ?? (digits === undefined ? BigInt(Math.round(event.timestamp)) : BigInt(digits)),
    });
  }

  // --------------------------------------------------------------------------
  // Templates
  // --------------------------------------------------------------------------

  async getTemplateDefinition(options: RequestOptions): Promise<TemplateDefinition> {
    const result = await this.requestJson('GET', '/api/template_def', options);
    return parseResult(TemplateDefinitionSchema, result, 'template definition');
  }

  async getTemplateData(options: RequestOptions): Promise<TemplateData> {
    const result = await this.requestJson('GET', '/api/template_data', options);
    return parseResult(TemplateDataSchema, result, 'template data');
  }

  async postTemplateData(data: TemplateData, options: RequestOptions): Promise<TemplateData> {
    const result = await this.requestJson('POST', '/api/template_data', options, JSON.stringify(data));
    return parseResult(TemplateDataSchema, result, 'template data');
  }

  // --------------------------------------------------------------------------
  // Calibration
  // --------------------------------------------------------------------------

  async getCalibration(options: RequestOptions): Promise<Uint8Array> {
    return this.send('GET', '/calibration.bin', options, async (response) => {
      if (!response.ok) {
        throw await this.rejection(response);
      }
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  private async requestJson(
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions,
    body?: string
  ): Promise<unknown> {
    const text = await this.requestText(method, path, options, body);
    return parseEnvelope(text, `${method} ${path}`);
  }

  private requestText(method: 'GET' | 'POST', path: string, options: RequestOptions, body?: string): Promise<string> {
    return this.send(
      method,
      path,
      options,
      async (response) => {
        if (!response.ok) {
          throw await this.rejection(response);
        }
        return response.text();
      },
      body
    );
  }

  /**
   * Issue a request and consume its reply with `read`. The timeout and the
   * caller's signal cover the body as well as the headers.
   */
  private async send<T>(
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>,
    body?: string
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;

    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);

    const onAbort = (): void => {
      controller.abort();
    };
    options.signal?.addEventListener('abort', onAbort);

    this.logger.debug({ method, path }, 'Request');

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });
      return await read(response);
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(`${method} ${path} timed out after ${String(options.timeoutMs)}ms`, options.timeoutMs);
      }
      if (options.signal?.aborted) {
        throw new ClosedError(`${method} ${path} aborted`);
      }
      if (error instanceof DeviceClientError) {
        throw error;
      }
      const err = toError(error);
      throw new ConnectionError(`${method} ${path} failed: ${err.message}`, { cause: err });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async rejection(response: Response): Promise<RejectedError> {
    let message = response.statusText || `HTTP ${String(response.status)}`;
    try {
      const parsed = ErrorEnvelopeSchema.safeParse(await response.json());
      if (parsed.success) {
        message = parsed.data.message;
      }
    } catch (error) {
      this.logger.debug({ status: response.status, error: toError(error).message }, 'Error reply without JSON body');
    }
    return new RejectedError(message, response.status);
  }
}
