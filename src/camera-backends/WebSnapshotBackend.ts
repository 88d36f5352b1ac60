/**
 * @fileoverview Network still capture: fetches a snapshot URL (e.g. an mjpg-streamer
 * ?action=snapshot endpoint) and writes the body to the frame slot.
 */

import * as fs from 'fs';
import { BaseCameraBackend, type CameraBackendOptions } from './BaseCameraBackend';
import { AppError, ErrorCode, networkError, timeoutError } from '../utils/error.utils';

export interface WebSnapshotBackendOptions extends CameraBackendOptions {
  readonly snapshotUrl: string;
  /** Request timeout in milliseconds */
  readonly timeoutMs?: number;
}

export class WebSnapshotBackend extends BaseCameraBackend {
  public readonly camera = 'web';

  private readonly snapshotUrl: string;
  private readonly timeout: number;

  constructor(options: WebSnapshotBackendOptions) {
    super(options);
    this.snapshotUrl = options.snapshotUrl;
    this.timeout = options.timeoutMs ?? 10000;
  }

  protected async produce(file: string): Promise<void> {
    const response = await this.fetchWithTimeout(this.snapshotUrl);

    if (!response.ok) {
      throw new AppError(
        `Snapshot request failed with HTTP ${response.status}: ${response.statusText}`,
        ErrorCode.CAPTURE_FAILED,
        { url: this.snapshotUrl, status: response.status }
      );
    }

    const image = Buffer.from(await response.arrayBuffer());
    await fs.promises.writeFile(file, image);
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, { signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw timeoutError(`snapshot request to ${url}`, this.timeout);
      }
      throw networkError(`Snapshot request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, {
        url
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
