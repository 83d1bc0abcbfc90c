import { createServer, Server } from 'http';
import { WebSocketServer } from 'ws';
import { createContainer, Container } from './container';
import { createApp } from './api/app';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';
import { toError } from './domain/common/Errors';

const FORCE_EXIT_MS = 10_000;

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

async function startServer(): Promise<{ server: Server; container: Container }> {
  // Create and initialize dependency container
  const container = await createContainer();
  const { config, logger, eventBus, soundRepo, configRepo, scheduler } = container;
  logger.info(config.toString());

  await container.initialize();

  const app = createApp({
    soundRepo,
    configRepo,
    scheduler,
    logger: logger.child({ component: 'http' }),
    rootPath: config.webRootPath,
    maxSoundBytes: config.maxSoundBytes
  });

  // Start HTTP server
  const server = createServer(app);
  await listen(server, config.port, config.host);
  logger.info(`Web interface listening on http://${config.host}:${config.port}${config.webRootPath || '/'}`);

  // Start WebSocket server with event bus bridge
  const wss = new WebSocketServer({ server });
  const wsBridge = new WebSocketBridge(wss, eventBus, logger.child({ component: 'websocket' }));

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;

    const forceExitTimeout = setTimeout(() => {
      logger.error(`Shutdown did not finish within ${FORCE_EXIT_MS}ms, forcing exit`);
      process.exit(1);
    }, FORCE_EXIT_MS);

    try {
      await container.shutdown(signal);

      wsBridge.close();
      wss.clients.forEach(client => {
        client.close();
      });
      wss.close();

      server.close(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Shutdown failed:', toError(err));
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { server, container };
}

// Start server
startServer().catch((err: unknown) => {
  console.error('Fatal: failed to start Audio Ambush:', toError(err).message);
  process.exit(1);
});
