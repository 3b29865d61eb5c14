/**
 * Device discovery.
 *
 * Devices advertise an HTTP service named "<prefix>:<device name>:<device id>".
 * Scans are time-bounded and lazy: nothing touches the network until the
 * first endpoint is requested, and every scan starts a fresh browser.
 */

import { isIPv4 } from 'node:net';
import type { Logger } from 'pino';
import type { DiscoveryConfig } from '../../core/config/schema.js';
import { DiscoveryError, NotFoundError, toError } from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import type { DeviceEndpoint } from '../../core/models/endpoint.js';
import {
  BonjourAdvertisementSource,
  type AdvertisementRecord,
  type AdvertisementSourceFactory,
} from './source.js';

// ============================================================================
// Advertisement Parsing
// ============================================================================

export interface ParsedServiceName {
  prefix: string;
  deviceName: string;
  deviceId: string;
}

/**
 * Split "<prefix>:<device name>:<device id>". The device name may itself
 * contain colons; prefix and id may not.
 */
export function parseServiceName(name: string): ParsedServiceName | null {
  const parts = name.split(':');
  if (parts.length < 3) {
    return null;
  }
  const prefix = parts[0] ?? '';
  const deviceId = parts[parts.length - 1] ?? '';
  const deviceName = parts.slice(1, -1).join(':');
  if (prefix === '' || deviceName === '') {
    return null;
  }
  return { prefix, deviceName, deviceId };
}

function pickHost(record: AdvertisementRecord): string {
  return record.addresses.find((address) => isIPv4(address)) ?? record.addresses[0] ?? record.host;
}

/**
 * Interpret an advertisement as a device endpoint.
 *
 * @returns null for services that are not devices
 */
export function endpointFromRecord(
  record: AdvertisementRecord,
  namePrefixes: readonly string[] = []
): DeviceEndpoint | null {
  const parsed = parseServiceName(record.name);
  if (!parsed) return null;
  if (namePrefixes.length > 0 && !namePrefixes.includes(parsed.prefix)) return null;

  return Object.freeze({
    host: pickHost(record),
    controlPort: record.port,
    identity: Object.freeze({
      deviceId: parsed.deviceId === '' ? record.name : parsed.deviceId,
      deviceName: parsed.deviceName,
      serviceName: record.name,
    }),
    advertisedCapabilities: Object.freeze({ ...record.txt }),
  });
}

// ============================================================================
// Discovery
// ============================================================================

export interface DiscoveryOptions {
  config: DiscoveryConfig;
  sourceFactory?: AdvertisementSourceFactory;
  logger?: Logger;
}

export class Discovery {
  private readonly config: DiscoveryConfig;
  private readonly sourceFactory: AdvertisementSourceFactory;
  private readonly logger: Logger;

  constructor(options: DiscoveryOptions) {
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'discovery' });
    this.sourceFactory =
      options.sourceFactory ??
      (() => new BonjourAdvertisementSource(this.config.serviceType, this.logger));
  }

  /**
   * Endpoints seen within `timeoutMs`, each identity at most once.
   *
   * @throws DiscoveryError if browsing cannot start
   */
  async *scan(timeoutMs: number = this.config.timeoutMs): AsyncGenerator<DeviceEndpoint, void, undefined> {
    const source = this.sourceFactory();
    const queue: DeviceEndpoint[] = [];
    const seen = new Set<string>();
    let failure: Error | null = null;
    let expired = false;
    let wake: (() => void) | null = null;

    const notify = (): void => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };

    const onRecord = (record: AdvertisementRecord): void => {
      const endpoint = endpointFromRecord(record, this.config.namePrefixes);
      if (!endpoint || seen.has(endpoint.identity.deviceId)) return;
      seen.add(endpoint.identity.deviceId);
      this.logger.debug({ deviceId: endpoint.identity.deviceId, host: endpoint.host }, 'Device found');
      queue.push(endpoint);
      notify();
    };

    const onError = (error: Error): void => {
      failure = new DiscoveryError(`Discovery failed: ${error.message}`, { cause: error });
      notify();
    };

    const timer = setTimeout(() => {
      expired = true;
      notify();
    }, timeoutMs);

    try {
      try {
        source.start(onRecord, onError);
      } catch (error) {
        const err = toError(error);
        throw new DiscoveryError(`Discovery could not start: ${err.message}`, { cause: err });
      }

      for (;;) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (failure) throw failure;
        if (expired) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      clearTimeout(timer);
      source.stop();
    }
  }

  /**
   * First endpoint found, or null when none appears within `timeoutMs`.
   */
  async discoverOne(timeoutMs: number = this.config.timeoutMs): Promise<DeviceEndpoint | null> {
    for await (const endpoint of this.scan(timeoutMs)) {
      return endpoint;
    }
    this.logger.info({ timeoutMs }, 'No device found');
    return null;
  }

  /**
   * Every endpoint found within `timeoutMs`.
   */
  async discoverAll(timeoutMs: number = this.config.timeoutMs): Promise<DeviceEndpoint[]> {
    const endpoints: DeviceEndpoint[] = [];
    for await (const endpoint of this.scan(timeoutMs)) {
      endpoints.push(endpoint);
    }
    return endpoints;
  }

  /**
   * @throws NotFoundError when no device appears within `timeoutMs`
   */
  async expectOne(timeoutMs: number = this.config.timeoutMs): Promise<DeviceEndpoint> {
    const endpoint = await this.discoverOne(timeoutMs);
    if (!endpoint) {
      throw new NotFoundError(`No device found within ${String(timeoutMs)}ms`);
    }
    return endpoint;
  }
}
