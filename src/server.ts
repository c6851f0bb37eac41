import { createApp } from './app';
import { ArchiveConfig, AuthConfig, ServerConfig } from './config';
import { loadArchive } from './loader';
import { RecordStore } from './store';
import { logger } from './utils/logger';

import type { Server } from 'node:http';

/**
 * Validate required environment variables at startup.
 * Fails fast if critical configuration is missing.
 */
function validateEnv(): void {
  const writeToken = process.env[AuthConfig.tokenEnvVar];
  if (!writeToken) {
    throw new Error(`${AuthConfig.tokenEnvVar} environment variable is required`);
  }
  if (!writeToken.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`${AuthConfig.tokenEnvVar} must start with "${AuthConfig.tokenPrefix}"`);
  }
}

/**
 * Load ARCHIVE_PATH in the background; the server answers meanwhile with
 * an empty store.
 */
async function preload(store: RecordStore, archivePath: string): Promise<void> {
  try {
    const result = await loadArchive(archivePath, store);
    logger.info('Preloaded archive', { count: result.count, status: result.status });
  } catch (error) {
    logger.error('Failed to preload archive', error, { archivePath });
  }
}

function listen(server: Server): void {
  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      logger.info('Server closed');
      // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
      process.exit(0);
    });

    // Force exit after the shutdown timeout (unref to not block process exit)
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
      process.exit(1);
    }, ServerConfig.shutdownTimeoutMs).unref();
  };

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
}

function main(): void {
  validateEnv();

  const store = new RecordStore();
  const app = createApp(store);
  const server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      host: ServerConfig.host,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
    });
  });
  listen(server);

  if (ArchiveConfig.preloadPath) {
    void preload(store, ArchiveConfig.preloadPath);
  }
}

try {
  main();
} catch (error) {
  logger.error('Failed to initialize server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
