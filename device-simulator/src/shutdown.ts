import { SERVICE } from './config.js';

/**
 * SIGINT/SIGTERM abort the returned controller; the device then closes its
 * session and exits 0. A second signal exits immediately.
 */
export function registerShutdown(controller: AbortController = new AbortController()): AbortController {
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.warn(`[${SERVICE}] received ${signal} again, exiting now`);
      process.exit(130);
    }
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return controller;
}
