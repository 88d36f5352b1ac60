/**
 * @fileoverview Optional HTTP control server for a running session.
 *
 * Serves the session status and a stop endpoint under /api. The server only reads the
 * session snapshot and forwards stop requests to the lifecycle's cancellation flag, so
 * it never touches the printer or the camera itself.
 *
 * Key exports:
 * - createControlApp(): Express application, used directly by tests
 * - ControlServer: listen/close lifecycle around that application
 */

import * as http from 'http';
import express from 'express';
import { AppError, ErrorCode } from '../../utils/error.utils';
import { logInfo } from '../../utils/logging';
import { withTimeout } from '../../utils/ShutdownTimeout';
import { createAPIRoutes } from './api-routes';
import { createErrorMiddleware, createRequestLogger } from './middleware';
import type { RouteDependencies } from './routes/session-routes';

const SERVER_LOG_NAMESPACE = 'ControlServer';

/** Upper bound for closing open connections on shutdown */
const STOP_TIMEOUT_MS = 5000;

export function createControlApp(deps: RouteDependencies): express.Application {
  const app = express();

  app.use(createRequestLogger());
  app.use(express.json());
  app.use('/api', createAPIRoutes(deps));

  // Error handling (must be last)
  app.use(createErrorMiddleware());

  return app;
}

export class ControlServer {
  private readonly app: express.Application;
  private httpServer: http.Server | null = null;
  private port = 0;

  constructor(deps: RouteDependencies) {
    this.app = createControlApp(deps);
  }

  /**
   * Start listening on all interfaces
   *
   * @throws AppError NETWORK when the port cannot be bound
   */
  public async start(port: number): Promise<void> {
    if (this.httpServer) {
      return;
    }

    const server = http.createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          reject(new AppError(`Port ${port} is already in use`, ErrorCode.NETWORK, { port }));
        } else if (err.code === 'EACCES') {
          reject(new AppError(`Access denied to port ${port}. Try a port number above 1024.`, ErrorCode.NETWORK, {
            port
          }));
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      server.listen(port, '0.0.0.0', () => {
        server.removeListener('error', onError);
        resolve();
      });
    });

    this.httpServer = server;
    this.port = port;
    logInfo(SERVER_LOG_NAMESPACE, `Control server listening on port ${port}`);
  }

  /**
   * Stop the server; open connections are closed after STOP_TIMEOUT_MS at the latest
   */
  public async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });

    try {
      await withTimeout(closed, { timeoutMs: STOP_TIMEOUT_MS, operation: 'close control server' });
    } catch (error) {
      server.closeAllConnections();
      throw error;
    }
    logInfo(SERVER_LOG_NAMESPACE, `Control server on port ${this.port} stopped`);
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
