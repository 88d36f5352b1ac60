/**
 * @fileoverview Detects which RepRapFirmware HTTP API a host speaks and creates the
 * matching backend. RRF2 (rr_* API) is probed first, then RRF3 (DSF /machine API).
 */

import type { BaseDuetBackend, DuetBackendOptions } from '../printer-backends/BaseDuetBackend';
import { RRF2Backend } from '../printer-backends/RRF2Backend';
import { RRF3Backend } from '../printer-backends/RRF3Backend';
import { ErrorCode, printerError } from '../utils/error.utils';
import { logInfo, logVerbose } from '../utils/logging';

const DETECTION_LOG_NAMESPACE = 'PrinterDetection';

type BackendFactory = (host: string, options: DuetBackendOptions) => BaseDuetBackend;

const CANDIDATES: ReadonlyArray<{ name: string; create: BackendFactory }> = [
  { name: 'RepRapFirmware 2', create: (host, options) => new RRF2Backend(host, options) },
  { name: 'RepRapFirmware 3', create: (host, options) => new RRF3Backend(host, options) }
];

/**
 * Connect to the printer and return the backend for its firmware generation
 *
 * @throws AppError PRINTER_UNREACHABLE when neither API answers
 */
export async function detectPrinter(host: string, options: DuetBackendOptions = {}): Promise<BaseDuetBackend> {
  logInfo(DETECTION_LOG_NAMESPACE, `Attempting to connect to printer at ${host}`);

  for (const candidate of CANDIDATES) {
    logVerbose(DETECTION_LOG_NAMESPACE, `Probing for ${candidate.name}`);
    const backend = candidate.create(host, options);
    if (await backend.probe()) {
      logInfo(DETECTION_LOG_NAMESPACE, `Connected to a Duet V${backend.generation} printer at ${backend.getBaseUrl()}`);
      return backend;
    }
  }

  throw printerError(
    `Device at ${host} either did not respond or is not a Duet V2 or V3 printer`,
    ErrorCode.PRINTER_UNREACHABLE,
    { host }
  );
}
