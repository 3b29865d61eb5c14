/**
 * Composition helpers.
 *
 * Wire configuration, logging, discovery and the orchestrator together for
 * programmatic use.
 */

import type { Logger } from 'pino';
import { loadConfig } from './core/config/loader.js';
import { parseConfig, type Config, type ConfigInput } from './core/config/schema.js';
import { createLogger } from './core/logger.js';
import type { DeviceEndpoint } from './core/models/endpoint.js';
import { Discovery } from './adapters/discovery/discovery.js';
import { SessionOrchestrator, type SessionOrchestratorOptions } from './orchestrator/orchestrator.js';

// ============================================================================
// Context
// ============================================================================

export interface ClientContext {
  config: Config;
  logger: Logger;
}

export interface ContextOptions {
  /** YAML configuration file; falls back to CONFIG_PATH, then to defaults */
  configPath?: string;
  /** Inline configuration, used when no file is given */
  config?: ConfigInput;
  logger?: Logger;
}

/**
 * Load configuration and build the logger every component shares.
 *
 * @throws ConfigError if the configuration is missing or invalid
 */
export async function createContext(options: ContextOptions = {}): Promise<ClientContext> {
  const configPath = options.configPath ?? process.env['CONFIG_PATH'];
  const config = configPath ? await loadConfig(configPath) : parseConfig(options.config ?? {});
  const logger = options.logger ?? createLogger(config.logging);

  if (configPath) {
    logger.debug({ path: configPath }, 'Configuration loaded');
  }
  return { config, logger };
}

// ============================================================================
// Devices
// ============================================================================

export function createDiscovery(context: ClientContext): Discovery {
  return new Discovery({ config: context.config.discovery, logger: context.logger });
}

export type OrchestratorPlumbing = Pick<SessionOrchestratorOptions, 'transportFactory' | 'clockProbeFactory' | 'decoders'>;

/**
 * Connect to a known device.
 *
 * @throws ConnectionError if the control channel cannot be established
 */
export async function connectDevice(
  endpoint: DeviceEndpoint,
  context: ClientContext,
  plumbing: OrchestratorPlumbing = {}
): Promise<SessionOrchestrator> {
  const orchestrator = new SessionOrchestrator({
    ...plumbing,
    endpoint,
    config: context.config,
    logger: context.logger,
  });

  try {
    await orchestrator.start();
  } catch (error) {
    orchestrator.close();
    throw error;
  }
  return orchestrator;
}

/**
 * Discover the first advertised device and connect to it.
 *
 * @throws NotFoundError if no device appears within the discovery timeout
 */
export async function connectFirstDevice(context: ClientContext): Promise<SessionOrchestrator> {
  const endpoint = await createDiscovery(context).expectOne();
  context.logger.info({ deviceId: endpoint.identity.deviceId, host: endpoint.host }, 'Device discovered');
  return connectDevice(endpoint, context);
}
