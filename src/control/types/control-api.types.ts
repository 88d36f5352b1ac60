/**
 * @fileoverview Response types of the control server HTTP API.
 *
 * Key exports:
 * - StandardAPIResponse: envelope shared by every endpoint
 * - SessionStatusResponse: body of GET /api/status
 */

import type { FinishReason, LifecyclePhaseKind } from '../../types/lifecycle';
import type { MachineStatus } from '../../types/printer';

/**
 * Standard API response
 */
export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
}

/**
 * Session status as served to remote clients
 */
export interface SessionStatusResponse extends StandardAPIResponse {
  readonly phase: LifecyclePhaseKind;
  readonly finishReason: FinishReason | null;
  readonly frameCount: number;
  readonly lastLayer: number | null;
  readonly printer: {
    readonly host: string;
    readonly status: MachineStatus | null;
  };
  /** ISO timestamp of the print start, null while waiting */
  readonly startedAt: string | null;
  readonly cancelRequested: boolean;
}
