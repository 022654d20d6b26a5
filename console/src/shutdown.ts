/**
 * Graceful shutdown on SIGINT/SIGTERM: run the cleanup once, then exit.
 * A second signal, or a cleanup that hangs, forces the exit.
 */

import { logger } from '@autodj/logger';

const FORCE_SHUTDOWN_TIMEOUT = 10_000;

/** Where process events are subscribed; `process` unless a test swaps it. */
export interface ShutdownTarget {
  on(event: string, listener: (value: unknown) => void): unknown;
}

export interface ShutdownOptions {
  timeoutMs?: number;
  exit?: (code: number) => void;
  target?: ShutdownTarget;
}

export function installShutdownHandlers(
  cleanup: () => Promise<void>,
  options: ShutdownOptions = {},
): (signal: string) => Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const target: ShutdownTarget = options.target ?? process;
  const timeoutMs = options.timeoutMs ?? FORCE_SHUTDOWN_TIMEOUT;
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, forcing exit');
      exit(1);
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    const force = setTimeout(() => {
      logger.error({ timeoutMs }, 'Force shutdown timeout reached, terminating process');
      exit(1);
    }, timeoutMs);
    force.unref();

    try {
      await cleanup();
      clearTimeout(force);
      logger.info('Graceful shutdown completed');
      exit(0);
    } catch (error) {
      clearTimeout(force);
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during graceful shutdown');
      exit(1);
    }
  };

  target.on('SIGINT', () => void shutdown('SIGINT'));
  target.on('SIGTERM', () => void shutdown('SIGTERM'));
  target.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection');
  });
  target.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught Exception');
    void shutdown('uncaughtException');
  });

  return shutdown;
}
