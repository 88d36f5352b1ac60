/**
 * @fileoverview Abstract base class for Duet printer backends.
 *
 * Provides the HTTP plumbing shared by the RepRapFirmware 2 (rr_* API) and
 * RepRapFirmware 3 (DSF /machine API) backends:
 * - Request timeout handling with AbortController
 * - Mapping of transport, HTTP and payload failures onto printer error codes
 * - Zod validation of JSON responses
 * - The M400 synchronization primitive built on sendCommand()
 *
 * Subclasses implement status, layer, coordinate and command calls for their API and a
 * probe() used by printer detection.
 */

import { ZodError, ZodSchema } from 'zod';
import type { Coordinates, FirmwareGeneration, MachineStatus, PrinterStatusPort } from '../types/printer';
import { GCODE } from '../types/printer';
import { AppError, ErrorCode, printerError } from '../utils/error.utils';
import { validate, formatValidationErrors } from '../utils/validation.utils';
import { logVerbose } from '../utils/logging';

const BACKEND_LOG_NAMESPACE = 'DuetBackend';

/**
 * Options shared by all Duet backends
 */
export interface DuetBackendOptions {
  /** Per-request timeout in milliseconds */
  readonly timeoutMs?: number;
}

/**
 * Abstract base class for all Duet backends
 */
export abstract class BaseDuetBackend implements PrinterStatusPort {
  public abstract readonly generation: FirmwareGeneration;

  protected readonly baseUrl: string;
  private readonly timeout: number;

  constructor(host: string, options: DuetBackendOptions = {}) {
    const withScheme = /^https?:\/\//i.test(host) ? host : `http://${host}`;
    this.baseUrl = withScheme.replace(/\/$/, '');
    this.timeout = options.timeoutMs ?? 10000;
  }

  public abstract getStatus(): Promise<MachineStatus>;
  public abstract getLayer(): Promise<number>;
  public abstract getCoordinates(): Promise<Coordinates>;
  public abstract sendCommand(code: string): Promise<void>;

  /**
   * Check whether the host answers this backend's API
   */
  public abstract probe(): Promise<boolean>;

  public async waitForMotion(): Promise<void> {
    await this.sendCommand(GCODE.WAIT_FOR_MOTION);
  }

  public getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Perform a request and return the raw response.
   * Transport failures and timeouts become PRINTER_UNREACHABLE; HTTP errors become
   * PRINTER_COMMAND_FAILED.
   */
  protected async request(pathAndQuery: string, options: RequestInit = {}): Promise<Response> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    logVerbose(BACKEND_LOG_NAMESPACE, `${options.method ?? 'GET'} ${url}`);

    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, options);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw printerError(
        `Printer at ${this.baseUrl} did not respond: ${cause?.message ?? String(error)}`,
        ErrorCode.PRINTER_UNREACHABLE,
        { url },
        cause
      );
    }

    if (!response.ok) {
      throw printerError(
        `HTTP ${response.status}: ${response.statusText}`,
        ErrorCode.PRINTER_COMMAND_FAILED,
        { url, status: response.status }
      );
    }

    return response;
  }

  /**
   * Perform a request and validate its JSON body
   */
  protected async requestJson<T>(
    pathAndQuery: string,
    schema: ZodSchema<T>,
    options: RequestInit = {}
  ): Promise<T> {
    const response = await this.request(pathAndQuery, options);

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      throw printerError(
        `Printer returned malformed JSON for ${pathAndQuery}`,
        ErrorCode.PRINTER_RESPONSE_INVALID,
        { path: pathAndQuery },
        error instanceof Error ? error : undefined
      );
    }

    return this.parseBody(pathAndQuery, schema, body);
  }

  /**
   * Validate an already decoded body
   */
  protected parseBody<T>(pathAndQuery: string, schema: ZodSchema<T>, body: unknown): T {
    const result = validate(schema, body, ErrorCode.PRINTER_RESPONSE_INVALID);
    if (!result.success) {
      const original = result.error.originalError;
      const details = original instanceof ZodError ? formatValidationErrors(original) : result.error.message;
      throw new AppError(
        `Unexpected response for ${pathAndQuery}: ${details}`,
        ErrorCode.PRINTER_RESPONSE_INVALID,
        { path: pathAndQuery, issues: result.issues }
      );
    }
    return result.data;
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
