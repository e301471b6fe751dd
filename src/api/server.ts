import express, { type Application } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { logger } from '../utils/logger.js';
import {
  createPublicRateLimiter,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware.js';
import {
  createAgentsRouter,
  createUsersRouter,
  createVerifyRouter,
  type ApiDependencies,
} from './routes/index.js';

/**
 * Create and configure Express application
 */
export function createApp(deps: ApiDependencies): Application {
  const expressApp = express();

  // Trust proxy for X-Forwarded-For headers (needed for rate limiting behind nginx)
  expressApp.set('trust proxy', 1);

  // Request ID middleware
  expressApp.use(requestIdMiddleware);

  // Request logging via pino-http
  const httpLogger = pinoHttp({
    logger: deps.logger,
    // Don't log health checks to reduce noise
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },
    // Custom serializers for cleaner logs
    serializers: {
      req: (req: IncomingMessage) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },
  });

  expressApp.use(httpLogger);

  // CORS headers
  expressApp.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-ID');
    res.setHeader('Access-Control-Max-Age', '86400'); // 24 hours

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  // JSON body parsing
  expressApp.use(express.json({ limit: '10kb' }));

  expressApp.get('/health', (_req, res) => {
    res.json({ status: 'ok', workers: deps.workers?.() ?? [] });
  });

  expressApp.use(createPublicRateLimiter());
  expressApp.use('/', createVerifyRouter(deps));
  expressApp.use('/', createUsersRouter(deps));
  expressApp.use('/', createAgentsRouter(deps));

  // 404 handler
  expressApp.use(notFoundHandler);

  // Error handler
  expressApp.use(errorHandler);

  return expressApp;
}

/**
 * Start listening
 */
export function startServer(
  app: Application,
  options: { port: number; host: string }
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      logger.info({ port: options.port, host: options.host }, 'API server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Stop the server, forcing connections closed after 10 seconds
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    const forceClose = setTimeout(() => {
      logger.warn('Forcing server close after timeout');
      server.closeAllConnections();
      resolve();
    }, 10_000);
    forceClose.unref();

    server.close(() => {
      clearTimeout(forceClose);
      logger.info('API server stopped');
      resolve();
    });
  });
}
