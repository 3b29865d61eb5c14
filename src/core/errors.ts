/**
 * Error taxonomy shared by every component.
 *
 * Transport failures never reach callers as exceptions; they are absorbed by
 * the reconnect state machines and surfaced as events. The classes below are
 * what callers do see: command failures, timeouts, and use after close.
 */

// ============================================================================
// Base Class
// ============================================================================

export type ErrorCode =
  | 'NOT_FOUND'
  | 'CONNECTION'
  | 'NOT_CONNECTED'
  | 'TIMEOUT'
  | 'REJECTED'
  | 'PROTOCOL'
  | 'CLOSED'
  | 'DISCOVERY'
  | 'CONFIG';

export class DeviceClientError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceClientError';
    this.code = code;
    Error.captureStackTrace?.(this, new.target);
  }
}

// ============================================================================
// Concrete Errors
// ============================================================================

/** Discovery ended without a matching device. */
export class NotFoundError extends DeviceClientError {
  constructor(message = 'No device found') {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** Transport unreachable or reset. */
export class ConnectionError extends DeviceClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
    this.name = 'ConnectionError';
  }
}

/** A command was issued while the control channel was not live. */
export class NotConnectedError extends DeviceClientError {
  constructor(message = 'Control channel is not connected') {
    super('NOT_CONNECTED', message);
    this.name = 'NotConnectedError';
  }
}

export class TimeoutError extends DeviceClientError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The device refused a command, e.g. start while already recording. */
export class RejectedError extends DeviceClientError {
  readonly status: number;

  constructor(message: string, status: number) {
    super('REJECTED', message);
    this.name = 'RejectedError';
    this.status = status;
  }
}

/** Malformed or unexpected message on any channel. */
export class ProtocolError extends DeviceClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROTOCOL', message, options);
    this.name = 'ProtocolError';
  }
}

/** Operation attempted after an explicit close. */
export class ClosedError extends DeviceClientError {
  constructor(message = 'Session is closed') {
    super('CLOSED', message);
    this.name = 'ClosedError';
  }
}

/** Discovery could not start, e.g. the multicast socket failed to bind. */
export class DiscoveryError extends DeviceClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DISCOVERY', message, options);
    this.name = 'DiscoveryError';
  }
}

export class ConfigError extends DeviceClientError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG', message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Serialisation
// ============================================================================

/**
 * Plain-object form used to move errors across the worker boundary.
 */
export interface SerialisedError {
  name: string;
  message: string;
  code?: ErrorCode;
  status?: number;
  timeoutMs?: number;
  issues?: string[];
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function serialiseError(value: unknown): SerialisedError {
  const error = toError(value);
  const serialised: SerialisedError = { name: error.name, message: error.message };

  if (error instanceof DeviceClientError) {
    serialised.code = error.code;
  }
  if (error instanceof RejectedError) {
    serialised.status = error.status;
  }
  if (error instanceof TimeoutError) {
    serialised.timeoutMs = error.timeoutMs;
  }
  if (error instanceof ConfigError) {
    serialised.issues = error.issues;
  }

  return serialised;
}

/**
 * Rebuild a typed error from its serialised form.
 * Unknown codes come back as plain `Error`s carrying the original name.
 */
export function deserialiseError(serialised: SerialisedError): Error {
  const { message } = serialised;

  switch (serialised.code) {
    case 'NOT_FOUND':
      return new NotFoundError(message);
    case 'CONNECTION':
      return new ConnectionError(message);
    case 'NOT_CONNECTED':
      return new NotConnectedError(message);
    case 'TIMEOUT':
      return new TimeoutError(message, serialised.timeoutMs ?? 0);
    case 'REJECTED':
      return new RejectedError(message, serialised.status ?? 0);
    case 'PROTOCOL':
      return new ProtocolError(message);
    case 'CLOSED':
      return new ClosedError(message);
    case 'DISCOVERY':
      return new DiscoveryError(message);
    case 'CONFIG':
      return new ConfigError(message, serialised.issues ?? []);
    default: {
      const error = new Error(message);
      error.name = serialised.name;
      return error;
    }
  }
}
