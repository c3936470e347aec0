import { getLogger, toError } from '@kernel/logger';

/**
* Centralized Shutdown Manager
*
* All shutdown work (closing the HTTP server, the pg pool, the Knex
* instance) is registered here so SIGTERM/SIGINT run it exactly once.
*/

const logger = getLogger({ service: 'shutdown' });

/** Shutdown handler function type */
export type ShutdownHandler = () => Promise<void> | void;

const handlers: Set<ShutdownHandler> = new Set();

let isShuttingDown = false;

const HANDLER_TIMEOUT_MS = 30000;

// ============================================================================
// Handler Management
// ============================================================================

/**
* Register a shutdown handler to be called during graceful shutdown
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(handler: ShutdownHandler): () => void {
  handlers.add(handler);
  return () => handlers.delete(handler);
}

/**
* Unregister all shutdown handlers
*/
export function clearShutdownHandlers(): void {
  handlers.clear();
}

// ============================================================================
// Shutdown Execution
// ============================================================================

async function runWithTimeout(handler: ShutdownHandler, name: string): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      Promise.resolve().then(handler),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Handler ${name} timed out`)), HANDLER_TIMEOUT_MS);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
* Run every registered handler, isolating failures from one another
* @returns Number of handlers that failed
*/
export async function runShutdownHandlers(): Promise<number> {
  const results = await Promise.allSettled(
    Array.from(handlers).map(async (handler, index) => {
      const name = handler.name || `handler-${index}`;
      try {
        await runWithTimeout(handler, name);
        logger.info(`Shutdown handler ${name} completed`);
      } catch (error) {
        logger.error(`Shutdown handler ${name} failed`, toError(error));
        throw error;
      }
    })
  );
  return results.filter(r => r.status === 'rejected').length;
}

/**
* Execute graceful shutdown and exit the process
*/
export async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown`);
  const failures = await runShutdownHandlers();
  if (failures > 0) {
    logger.error(`${failures} shutdown handlers failed`);
  }
  process.exit(failures > 0 ? 1 : exitCode);
}

let isRegistered = false;

/**
* Setup global SIGTERM/SIGINT handlers. Safe to call multiple times.
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      gracefulShutdown(signal).catch((error: unknown) => {
        logger.fatal(`${signal} shutdown error`, toError(error));
        process.exit(1);
      });
    });
  }
}
