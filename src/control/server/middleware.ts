/**
 * @fileoverview Express middleware for the control server: request logging, JSON 404s
 * for unknown API paths and the final error handler.
 */

import type { NextFunction, Request, Response } from 'express';
import type { StandardAPIResponse } from '../types/control-api.types';
import { createErrorResult } from '../../utils/error.utils';
import { logError, logVerbose } from '../../utils/logging';

const SERVER_LOG_NAMESPACE = 'ControlServer';

/**
 * Request logging middleware
 */
export function createRequestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logVerbose(SERVER_LOG_NAMESPACE, `${req.method} ${req.originalUrl} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}

/**
 * JSON 404 for API paths no route handled
 */
export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    const response: StandardAPIResponse = {
      success: false,
      error: `Unknown endpoint: ${req.method} ${req.originalUrl}`
    };
    res.status(404).json(response);
  };
}

/**
 * Error handling middleware
 */
export function createErrorMiddleware() {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logError(SERVER_LOG_NAMESPACE, 'Request failed:', err);

    const response: StandardAPIResponse = createErrorResult(err);
    res.status(500).json(response);
  };
}
