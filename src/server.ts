// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';

dotenv.config();

import { createServer } from 'http';
import type { Socket } from 'net';
import { createApp } from './app';
import { createCompositionRoot } from './app/composition-root';
import { loadAppConfig } from './config/app.config';
import { ConfigurationError } from './utils/errors';
import { logger } from './utils/logger';

async function startServer(): Promise<void> {
  const config = loadAppConfig();
  const root = createCompositionRoot(config);
  await root.db.connect();

  const httpServer = createServer(createApp(root));
  // Track open sockets so we can force-close on shutdown to avoid hangs
  const sockets = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  httpServer.listen(config.port, () => {
    logger.info('server.started', { port: config.port, nodeEnv: config.nodeEnv });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('server.shutdown', { signal });
    httpServer.close(() => {
      root.db
        .disconnect()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('server.shutdown.db_failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
    for (const socket of sockets) {
      socket.destroy();
    }
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error('server.config_invalid', { error: error.message });
  } else {
    logger.error('server.start_failed', { error: error instanceof Error ? error.message : String(error) });
  }
  process.exit(1);
});
