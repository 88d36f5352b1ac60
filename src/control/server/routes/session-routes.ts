/**
 * @fileoverview Session status and stop routes.
 */

import type { Request, Response, Router } from 'express';
import type { LifecycleSnapshot } from '../../../types/lifecycle';
import type { SessionStatusResponse, StandardAPIResponse } from '../../types/control-api.types';

/**
 * What the routes need from the running session
 */
export interface SessionControl {
  getSnapshot(): LifecycleSnapshot;
  /** @returns false once the session has finished */
  requestCancel(): boolean;
}

export interface RouteDependencies {
  readonly session: SessionControl;
  /** Printer host name or address, for display */
  readonly printerHost: string;
}

export function registerSessionRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/status', (_req: Request, res: Response) => {
    const snapshot = deps.session.getSnapshot();
    const response: SessionStatusResponse = {
      success: true,
      phase: snapshot.phase,
      finishReason: snapshot.finishReason,
      frameCount: snapshot.frameCount,
      lastLayer: snapshot.lastLayer,
      printer: {
        host: deps.printerHost,
        status: snapshot.lastStatus
      },
      startedAt: snapshot.startedAt ? snapshot.startedAt.toISOString() : null,
      cancelRequested: snapshot.cancelRequested
    };
    res.json(response);
  });

  router.post('/stop', (_req: Request, res: Response) => {
    if (!deps.session.requestCancel()) {
      const response: StandardAPIResponse = {
        success: false,
        error: 'Session has already finished'
      };
      res.status(409).json(response);
      return;
    }

    const response: StandardAPIResponse = {
      success: true,
      message: 'Stop requested; the video is created after the current step'
    };
    res.status(202).json(response);
  });
}
