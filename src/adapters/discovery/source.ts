/**
 * Advertisement sources for discovery.
 *
 * A source reports raw service advertisements; interpreting them as devices
 * is left to Discovery, so tests can feed records without a network.
 */

import { Bonjour, type Service } from 'bonjour-service';
import type { Logger } from 'pino';
import { silentLogger } from '../../core/logger.js';
import { toError } from '../../core/errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One resolved service advertisement.
 */
export interface AdvertisementRecord {
  readonly name: string;
  readonly host: string;
  readonly addresses: readonly string[];
  readonly port: number;
  readonly txt: Readonly<Record<string, string>>;
}

export interface AdvertisementSource {
  /**
   * Begin browsing. Bind failures may be reported synchronously by throwing,
   * or later through `onError`.
   */
  start(onRecord: (record: AdvertisementRecord) => void, onError: (error: Error) => void): void;
  stop(): void;
}

export type AdvertisementSourceFactory = () => AdvertisementSource;

// ============================================================================
// Bonjour Source
// ============================================================================

function normaliseTxt(txt: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof txt !== 'object' || txt === null) {
    return result;
  }
  for (const [key, value] of Object.entries(txt)) {
    if (Buffer.isBuffer(value)) {
      result[key] = value.toString('utf8');
    } else if (value !== undefined && value !== null) {
      result[key] = String(value);
    }
  }
  return result;
}

export function recordFromService(service: Service): AdvertisementRecord {
  return {
    name: service.name,
    host: service.host,
    addresses: service.addresses ?? [],
    port: service.port,
    txt: normaliseTxt(service.txt),
  };
}

/**
 * mDNS/DNS-SD browser over bonjour-service.
 */
export class BonjourAdvertisementSource implements AdvertisementSource {
  private readonly serviceType: string;
  private readonly logger: Logger;
  private bonjour: Bonjour | null = null;

  constructor(serviceType: string, logger?: Logger) {
    this.serviceType = serviceType;
    this.logger = (logger ?? silentLogger()).child({ module: 'mdns' });
  }

  start(onRecord: (record: AdvertisementRecord) => void, onError: (error: Error) => void): void {
    if (this.bonjour) return;

    const bonjour = new Bonjour({}, (error: unknown) => {
      onError(toError(error));
    });
    this.bonjour = bonjour;

    const browser = bonjour.find({ type: this.serviceType });
    browser.on('up', (service: Service) => {
      this.logger.debug({ name: service.name, host: service.host }, 'Service advertised');
      onRecord(recordFromService(service));
    });
  }

  stop(): void {
    if (!this.bonjour) return;
    this.bonjour.destroy();
    this.bonjour = null;
  }
}
