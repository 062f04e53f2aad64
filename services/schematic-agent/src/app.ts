/**
 * Schematic Agent - HTTP Application
 *
 * Express app with the REST routes, the `/pipeline` socket.io namespace and
 * the static GUI page.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { Server as SocketIOServer } from 'socket.io';
import { createServer, Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import path from 'path';
import { fileURLToPath } from 'url';

import { config } from './config.js';
import { log } from './utils/logger.js';
import { handleError } from './utils/errors.js';
import { ApiRouteOptions, createApiRoutes } from './api/routes.js';
import { PipelineWebSocketManager, PipelineWebSocketOptions } from './api/pipeline-ws.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const PUBLIC_DIR = path.join(__dirname, '../public');

export interface AppOptions {
  routes?: ApiRouteOptions;
  websocket?: PipelineWebSocketOptions;
}

export interface SchematicAgentApp {
  app: Express;
  httpServer: HttpServer;
  io: SocketIOServer;
  manager: PipelineWebSocketManager;
}

export function createApp(options: AppOptions = {}): SchematicAgentApp {
  const app: Express = express();
  const httpServer = createServer(app);

  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
  });
  const manager = new PipelineWebSocketManager(io, options.websocket);

  // Middleware
  app.use(helmet({
    contentSecurityPolicy: false, // inline script on the GUI page
  }));
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '5mb' }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header ? header : randomUUID();

    res.setHeader('X-Request-ID', requestId);

    res.on('finish', () => {
      log.info(`${req.method} ${req.path}`, {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: config.serviceName,
      version: config.version,
      timestamp: new Date().toISOString(),
      ...manager.getStats(),
    });
  });

  app.use('/api/v1', createApiRoutes(manager, options.routes));

  // GUI page
  app.use(express.static(PUBLIC_DIR));

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const error = handleError(err);
    const requestId = String(res.getHeader('X-Request-ID') ?? '');

    if (error.statusCode >= 500) {
      log.error('Request failed', err, { requestId, method: req.method, path: req.path, code: error.code });
    } else {
      log.warn('Request rejected', { requestId, method: req.method, path: req.path, code: error.code, message: error.message });
    }

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(config.nodeEnv === 'development' && {
          context: error.context,
        }),
      },
      metadata: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    });
  });

  return { app, httpServer, io, manager };
}
