/**
 * Worker startup that also runs from TypeScript sources.
 */

import { Worker, type WorkerOptions } from 'node:worker_threads';

/**
 * Start a worker on `entry`. A `.ts` entry is imported after tsx registers
 * its loader inside the worker; a `.js` entry starts as is.
 */
export function spawnWorker(entry: URL, options: WorkerOptions = {}): Worker {
  if (!entry.pathname.endsWith('.ts')) {
    return new Worker(entry, options);
  }
  const bootstrap =
    `import('tsx/esm/api').then(({ register }) => {` +
    ` register(); return import(${JSON.stringify(entry.href)}); })`;
  return new Worker(bootstrap, { ...options, eval: true });
}
