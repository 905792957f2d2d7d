/**
 * API module exports
 *
 * Provides the HTTP API for listing activities and managing sign-ups.
 */

import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';
import type { Server } from 'node:http';
import type { ActivityRegistry } from '@mergington/activities-core';
import { DebugLogger } from '@mergington/activities-core/debug-logger';
import { createActivitiesRouter } from './activities-handler.js';
import { errorHandler, notFoundHandler } from './error-handler.js';
import type { HealthResponse } from './types.js';

// Re-export types
export * from './types.js';
export { createActivitiesRouter } from './activities-handler.js';
export { errorHandler, notFoundHandler, requireQueryParam } from './error-handler.js';

const logger = new DebugLogger('api');

/**
 * Bundled front end
 */
export const DEFAULT_STATIC_DIR = fileURLToPath(new URL('../../static', import.meta.url));

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '127.0.0.1';

/**
 * Options for building the Express app
 */
export interface AppOptions {
  /** Registry the handlers read and mutate */
  registry: ActivityRegistry;
  /** Directory served under /static (default: bundled front end) */
  staticDir?: string;
}

/**
 * API server options
 */
export interface ApiServerOptions extends AppOptions {
  /** Port to listen on; 0 picks a free port (default: 8000) */
  port?: number;
  /** Interface to bind (default: 127.0.0.1) */
  host?: string;
}

/**
 * API server instance
 */
export interface ApiServer {
  /** Express app instance */
  app: Express;
  /** HTTP server instance */
  server: Server | null;
  /** Start the server */
  start(): Promise<void>;
  /** Stop the server */
  stop(): Promise<void>;
  /** Get the port the server is listening on */
  port: number;
}

/**
 * Build the Express app with every route and the error handlers mounted
 */
export function createApp(options: AppOptions): Express {
  const { registry, staticDir = DEFAULT_STATIC_DIR } = options;

  const app = express();

  app.get('/', (_req, res) => {
    res.redirect(307, '/static/index.html');
  });

  app.use('/static', express.static(staticDir));
  app.use('/activities', createActivitiesRouter(registry));

  app.get('/health', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      timestamp: Date.now(),
      activities: registry.size,
    };
    res.json(response);
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Create and configure the API server
 */
export function createApiServer(options: ApiServerOptions): ApiServer {
  const { port = DEFAULT_PORT, host = DEFAULT_HOST } = options;

  const app = createApp(options);

  let server: Server | null = null;
  let actualPort = port;
  let starting: Promise<void> | null = null;

  const listen = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      let settled = false;
      const listening = app.listen(port, host, () => {
        if (settled) return;
        settled = true;
        const addr = listening.address();
        if (addr && typeof addr === 'object') {
          actualPort = addr.port;
          server = listening;
          logger.info(`API server listening on http://${host}:${actualPort}`);
          if (host === '0.0.0.0') {
            logger.warn('API server exposed to all interfaces');
          }
          resolve();
        } else {
          reject(new Error(`Failed to bind to port ${port}`));
        }
      });
      listening.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (err.code === 'EADDRINUSE') {
          reject(
            new Error(
              `Port ${port} is already in use. Use a different port: ACTIVITIES_API_PORT=<port> activities start`
            )
          );
          return;
        }
        reject(err);
      });
    });

  return {
    app,
    get server() {
      return server;
    },
    get port() {
      return actualPort;
    },
    async start(): Promise<void> {
      if (server) {
        return;
      }
      if (!starting) {
        starting = listen().finally(() => {
          starting = null;
        });
      }
      return starting;
    },
    async stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!server) {
          resolve();
          return;
        }
        // Force-close keep-alive connections so close() resolves immediately
        server.closeAllConnections();
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            server = null;
            logger.info('API server stopped');
            resolve();
          }
        });
      });
    },
  };
}
