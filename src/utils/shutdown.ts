/**
 * Graceful shutdown for long-running commands (serve, mcp)
 */

import { createLogger } from './logger';

const logger = createLogger('shutdown');

/**
 * Run shutdownFn once on SIGTERM/SIGINT, then exit. A hung shutdown is cut
 * off after 15 seconds.
 */
export function setupShutdownHandlers(shutdownFn: () => Promise<void>): void {
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Starting graceful shutdown');

    const forceTimer = setTimeout(() => {
      logger.error('Shutdown timeout (15s) - forcing exit');
      process.exit(1);
    }, 15_000);
    forceTimer.unref();

    try {
      await shutdownFn();
      clearTimeout(forceTimer);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      clearTimeout(forceTimer);
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
