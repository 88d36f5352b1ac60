/**
 * @fileoverview Single-instance guard based on pid lock files
 *
 * A lock file in the OS temp directory holds the pid of the run that owns it. The
 * instances policy decides the lock's scope:
 * - single: one run per host machine
 * - oneip: one run per printer address
 * - many: no lock
 *
 * A lock whose pid no longer exists is stale and is taken over.
 *
 * @example
 * const release = new InstanceLock().acquire('oneip', '192.168.1.50');
 * try { ... } finally { release(); }
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { hostSlug, type InstancePolicy } from '../types/config';
import { AppError, ErrorCode } from './error.utils';
import { logVerbose, logWarning } from './logging';

const LOCK_LOG_NAMESPACE = 'InstanceLock';

export type ReleaseLock = () => void;

export interface InstanceLockOptions {
  /** Directory for lock files (default: OS temp directory) */
  directory?: string;
  /** Pid written into the lock (default: this process) */
  pid?: number;
  /** Whether a pid belongs to a running process */
  isAlive?: (pid: number) => boolean;
}

/**
 * Signal 0 checks for existence without delivering anything.
 * EPERM means the process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class InstanceLock {
  private readonly directory: string;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(options: InstanceLockOptions = {}) {
    this.directory = options.directory ?? os.tmpdir();
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  /**
   * Lock file for a policy, or null when no lock is taken
   */
  public lockPath(policy: InstancePolicy, host: string): string | null {
    switch (policy) {
      case 'single':
        return path.join(this.directory, 'printlapse.lock');
      case 'oneip':
        return path.join(this.directory, `printlapse-${hostSlug(host)}.lock`);
      case 'many':
        return null;
    }
  }

  /**
   * Take the lock for the policy
   *
   * @returns Function that removes the lock again
   * @throws AppError DUPLICATE_INSTANCE when a running process holds the lock
   */
  public acquire(policy: InstancePolicy, host: string): ReleaseLock {
    const lockFile = this.lockPath(policy, host);
    if (!lockFile) {
      return () => undefined;
    }

    if (!this.tryCreate(lockFile)) {
      const holder = this.readHolder(lockFile);
      if (holder !== null && this.isAlive(holder)) {
        throw new AppError(
          policy === 'single'
            ? `Another time-lapse run is active on this machine (pid ${holder})`
            : `Another time-lapse run is active for ${host} (pid ${holder})`,
          ErrorCode.DUPLICATE_INSTANCE,
          { lockFile, holder }
        );
      }

      logWarning(LOCK_LOG_NAMESPACE, `Replacing stale lock ${lockFile}`);
      fs.rmSync(lockFile, { force: true });
      if (!this.tryCreate(lockFile)) {
        throw new AppError(`Lock ${lockFile} was taken while replacing it`, ErrorCode.DUPLICATE_INSTANCE, {
          lockFile
        });
      }
    }

    logVerbose(LOCK_LOG_NAMESPACE, `Acquired ${lockFile}`);
    return () => this.release(lockFile);
  }

  private tryCreate(lockFile: string): boolean {
    try {
      fs.writeFileSync(lockFile, String(this.pid), { flag: 'wx' });
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }

  private readHolder(lockFile: string): number | null {
    try {
      const pid = Number.parseInt(fs.readFileSync(lockFile, 'utf8').trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (error) {
      logVerbose(LOCK_LOG_NAMESPACE, `Could not read ${lockFile}:`, error);
      return null;
    }
  }

  private release(lockFile: string): void {
    // Only remove the lock if it is still ours
    if (this.readHolder(lockFile) === this.pid) {
      fs.rmSync(lockFile, { force: true });
      logVerbose(LOCK_LOG_NAMESPACE, `Released ${lockFile}`);
    }
  }
}
