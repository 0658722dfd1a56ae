/**
 * Per-project run lock.
 *
 * One engine drives a project at a time. The lock file records the holder's
 * pid and boot id so a lock left behind by a crash or reboot is reclaimed
 * instead of wedging the project forever.
 */

import { existsSync, readFileSync } from 'node:fs';
import { unlink } from 'node:fs/promises';
import { hostname } from 'node:os';
import type { LockInfo } from '../types/lock.js';
import { atomicWriteJson, atomicReadJson, AtomicFsError, isNotFound } from './fs.js';

/**
 * Another live process holds the lock.
 */
export class LockHeldError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder: LockInfo
  ) {
    super(message);
    this.name = 'LockHeldError';
  }
}

/**
 * The lock file exists but cannot be interpreted.
 */
export class LockCorruptError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string
  ) {
    super(message);
    this.name = 'LockCorruptError';
  }
}

const LINUX_BOOT_ID = '/proc/sys/kernel/random/boot_id';

let cachedBootId: string | null = null;

/**
 * Identifier of the current boot session.
 *
 * Linux exposes one directly; elsewhere the host name plus the approximate
 * boot time stands in.
 */
export function getBootId(): string {
  if (cachedBootId !== null) return cachedBootId;

  if (process.platform === 'linux' && existsSync(LINUX_BOOT_ID)) {
    cachedBootId = readFileSync(LINUX_BOOT_ID, 'utf-8').trim();
    return cachedBootId;
  }

  const bootSeconds = Math.floor((Date.now() - process.uptime() * 1000) / 1000);
  cachedBootId = `${hostname()}-${bootSeconds}`;
  return cachedBootId;
}

/**
 * Whether a process with the pid exists (EPERM counts as existing).
 */
export function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

/**
 * A lock is stale when it predates the current boot or its process is gone.
 */
export function isLockStale(lock: LockInfo): boolean {
  if (lock.boot_id !== getBootId()) return true;
  return !isPidRunning(lock.pid);
}

function parseLock(lockPath: string, value: unknown): LockInfo {
  const remediation = `Delete the lock file at ${lockPath} and retry.`;
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new LockCorruptError(`Lock file is not a JSON object. ${remediation}`, lockPath);
  }
  const pid = 'pid' in value ? value.pid : undefined;
  const startedAt = 'started_at' in value ? value.started_at : undefined;
  const bootId = 'boot_id' in value ? value.boot_id : undefined;

  if (typeof pid !== 'number' || !Number.isInteger(pid) || pid <= 0) {
    throw new LockCorruptError(`Lock file has invalid pid ${JSON.stringify(pid)}. ${remediation}`, lockPath);
  }
  if (typeof startedAt !== 'string' || startedAt === '') {
    throw new LockCorruptError(`Lock file has invalid started_at. ${remediation}`, lockPath);
  }
  if (typeof bootId !== 'string' || bootId === '') {
    throw new LockCorruptError(`Lock file has invalid boot_id. ${remediation}`, lockPath);
  }
  return { pid, started_at: startedAt, boot_id: bootId };
}

async function readLock(lockPath: string): Promise<LockInfo | null> {
  try {
    return parseLock(lockPath, await atomicReadJson(lockPath));
  } catch (error) {
    if (isNotFound(error)) return null;
    if (error instanceof AtomicFsError && error.cause instanceof SyntaxError) {
      throw new LockCorruptError(
        `Lock file contains invalid JSON. Delete the lock file at ${lockPath} and retry.`,
        lockPath
      );
    }
    throw error;
  }
}

/**
 * Acquires the lock, reclaiming a stale one with a warning.
 *
 * @throws {LockHeldError} If a live process holds the lock
 * @throws {LockCorruptError} If the existing lock file is malformed
 */
export async function acquireLock(lockPath: string): Promise<LockInfo> {
  const existing = await readLock(lockPath);
  if (existing) {
    if (!isLockStale(existing)) {
      throw new LockHeldError(
        `Project is locked by PID ${existing.pid} (started_at: ${existing.started_at})`,
        lockPath,
        existing
      );
    }
    console.warn(
      `[ENGINE] Reclaiming stale lock from PID ${existing.pid} (started_at: ${existing.started_at}, boot_id: ${existing.boot_id})`
    );
  }

  const lockInfo: LockInfo = {
    pid: process.pid,
    started_at: new Date().toISOString(),
    boot_id: getBootId(),
  };
  await atomicWriteJson(lockPath, lockInfo);
  return lockInfo;
}

/**
 * Deletes the lock if this process owns it. A missing lock is not an error.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  const lock = await readLock(lockPath);
  if (lock && lock.pid === process.pid && lock.boot_id === getBootId()) {
    try {
      await unlink(lockPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }
}

/**
 * Runs `fn` while holding the lock; the lock is released however `fn` ends.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  await acquireLock(lockPath);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}
