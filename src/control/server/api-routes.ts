/**
 * @fileoverview Express router composition for the control server HTTP API.
 */

import { Router } from 'express';
import { registerSessionRoutes, type RouteDependencies } from './routes/session-routes';
import { createNotFoundHandler } from './middleware';

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  registerSessionRoutes(router, deps);

  // Must come after every API route
  router.use(createNotFoundHandler());

  return router;
}
