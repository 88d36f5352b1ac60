/**
 * @fileoverview Time helpers: interruptible delays for the control loop, duration
 * formatting for log output, and the timestamp token used in video file names.
 */

/**
 * Wait for the given time. Resolves early, without error, when the signal aborts.
 *
 * @returns true if the full delay elapsed, false if it was interrupted
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format seconds as human-readable duration
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  }

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }

  return `${minutes}m`;
}

/**
 * Local-time token for output file names, e.g. 20240315-143005
 */
export function formatTimestampToken(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');

  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

  return `${day}-${time}`;
}
