// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'test') {
  dotenv.config({ path: '.env.test' });
} else {
  dotenv.config();
}

import { createServer } from 'http';
import type { Socket } from 'net';
import * as client from 'prom-client';
import { createApp } from './app';
import { CompositionRoot } from './app/composition-root';
import { loadAppConfig, type AppConfig } from './config/app.config';
import { logger } from './utils/logger';

const SHUTDOWN_GRACE_MS = 10_000;

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
});

function loadConfigOrExit(): AppConfig {
  try {
    return loadAppConfig(process.env);
  } catch (error) {
    logger.error('server:config-invalid', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

function startServer(): void {
  const config = loadConfigOrExit();

  if (config.environment !== 'test') {
    client.collectDefaultMetrics();
  }

  const root = new CompositionRoot(config);
  const httpServer = createServer(createApp(root));

  // Track open sockets so we can force-close on shutdown to avoid hangs
  const sockets = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  httpServer.listen(config.port, () => {
    logger.info('server:listening', {
      port: config.port,
      environment: config.environment,
      safetyLevel: config.safetyLevel,
    });
  });

  const graceful = async (signal: string) => {
    logger.info('server:shutdown', { signal });
    const force = setTimeout(() => {
      logger.warn('server:shutdown-forced', { openSockets: sockets.size });
      sockets.forEach((s) => s.destroy());
    }, SHUTDOWN_GRACE_MS);
    force.unref();

    await new Promise<void>((resolve) => {
      httpServer.close((error) => {
        if (error) logger.error('server:close-failed', { error: error.message });
        resolve();
      });
    });
    try {
      await root.shutdown();
    } catch (error) {
      logger.error('server:pool-stop-failed', { error: error instanceof Error ? error.message : String(error) });
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void graceful('SIGTERM');
  });
  process.on('SIGINT', () => {
    void graceful('SIGINT');
  });
}

startServer();
