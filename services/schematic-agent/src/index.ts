/**
 * Schematic Agent - GUI Server Entry Point
 *
 * Serves the browser GUI and the run API, streaming progress over socket.io.
 */

import 'dotenv/config';
import { config } from './config.js';
import { log } from './utils/logger.js';
import { createApp } from './app.js';

async function startServer(): Promise<void> {
  const { httpServer, io, manager } = createApp();

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  log.info('Schematic Agent started', {
    port: config.port,
    nodeEnv: config.nodeEnv,
    version: config.version,
    kicadCli: config.kicad.cliPath ?? 'auto',
    llmConfigured: Boolean(config.llm.apiKey),
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    manager.close();
    void io.close();

    httpServer.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 30 seconds
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  log.error('Failed to start server', error instanceof Error ? error : undefined);
  process.exit(1);
});
