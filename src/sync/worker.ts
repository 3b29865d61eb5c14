/**
 * Facade worker thread entry point.
 */

import { MessagePort, workerData } from 'node:worker_threads';
import { parseConfig, type Config } from '../core/config/schema.js';
import { ConfigError, toError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { ChannelResponder } from './channel.js';
import { FacadeWorkerHost } from './host.js';
import { parseRequest } from './protocol.js';

// ============================================================================
// Worker Data
// ============================================================================

export interface FacadeWorkerData {
  port: MessagePort;
  signal: SharedArrayBuffer;
  config: Config;
}

function parseWorkerData(data: unknown): FacadeWorkerData {
  if (typeof data !== 'object' || data === null) {
    throw new ConfigError('Facade worker started without worker data');
  }
  const port: unknown = Reflect.get(data, 'port');
  const signal: unknown = Reflect.get(data, 'signal');
  if (!(port instanceof MessagePort) || !(signal instanceof SharedArrayBuffer)) {
    throw new ConfigError('Facade worker data is missing its port or signal');
  }
  return { port, signal, config: parseConfig(Reflect.get(data, 'config')) };
}

// ============================================================================
// Entry Point
// ============================================================================

function main(): void {
  const { port, signal, config } = parseWorkerData(workerData);
  const logger = createLogger(config.logging);
  const host = new FacadeWorkerHost({ config, logger });
  const responder = new ChannelResponder(port, signal);

  port.on('message', (message: unknown) => {
    const request = parseRequest(message);
    if (!request) {
      logger.warn('Ignoring malformed facade call');
      return;
    }

    void host
      .handle(request)
      .then((value) => {
        responder.resolve(request, value);
        if (request.method === 'close') {
          port.close();
        }
      })
      .catch((error: unknown) => {
        logger.debug({ method: request.method, error: toError(error).message }, 'Facade call failed');
        responder.reject(request, error);
      });
  });
}

main();
