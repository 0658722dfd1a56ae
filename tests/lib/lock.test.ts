import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  acquireLock,
  getBootId,
  isLockStale,
  LockCorruptError,
  LockHeldError,
  releaseLock,
  withLock,
} from '@/lib/lock.js';
import { atomicReadJson } from '@/lib/fs.js';
import { makeTempDir, removeDir, silenceConsole } from '../helpers/mocks.js';

// Far above any real pid_max
const DEAD_PID = 2 ** 30;

describe('project lock', () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(async () => {
    testDir = await makeTempDir('lock');
    lockPath = join(testDir, 'project.lock');
    silenceConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(testDir);
  });

  it('should write pid, started_at and boot_id', async () => {
    const info = await acquireLock(lockPath);

    expect(info.pid).toBe(process.pid);
    expect(info.boot_id).toBe(getBootId());
    expect(await atomicReadJson(lockPath)).toEqual(info);
  });

  it('should refuse a lock held by a live process', async () => {
    await acquireLock(lockPath);

    await expect(acquireLock(lockPath)).rejects.toThrow(LockHeldError);
  });

  it('should reclaim a lock whose process is gone', async () => {
    writeFileSync(
      lockPath,
      JSON.stringify({ pid: DEAD_PID, started_at: '2026-01-01T00:00:00.000Z', boot_id: getBootId() })
    );

    const info = await acquireLock(lockPath);

    expect(info.pid).toBe(process.pid);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Reclaiming stale lock from PID ${DEAD_PID}`));
  });

  it('should treat a lock from another boot as stale', () => {
    expect(isLockStale({ pid: process.pid, started_at: '2026-01-01T00:00:00.000Z', boot_id: 'another-boot' })).toBe(true);
    expect(isLockStale({ pid: process.pid, started_at: '2026-01-01T00:00:00.000Z', boot_id: getBootId() })).toBe(false);
  });

  it('should fail closed on a corrupt lock file', async () => {
    writeFileSync(lockPath, '{', 'utf-8');

    await expect(acquireLock(lockPath)).rejects.toThrow(LockCorruptError);
    expect(existsSync(lockPath)).toBe(true);
  });

  it('should reject a lock with an invalid pid', async () => {
    writeFileSync(lockPath, JSON.stringify({ pid: -1, started_at: 'x', boot_id: 'y' }));

    await expect(acquireLock(lockPath)).rejects.toThrow(/invalid pid/);
  });

  it('should release only its own lock', async () => {
    writeFileSync(lockPath, JSON.stringify({ pid: DEAD_PID, started_at: 'x', boot_id: getBootId() }));

    await releaseLock(lockPath);

    expect(existsSync(lockPath)).toBe(true);
  });

  it('should not fail when releasing a missing lock', async () => {
    await expect(releaseLock(lockPath)).resolves.toBeUndefined();
  });

  it('should release the lock after the callback throws', async () => {
    await expect(
      withLock(lockPath, async () => {
        expect(existsSync(lockPath)).toBe(true);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(existsSync(lockPath)).toBe(false);
  });

  it('should return the callback result', async () => {
    expect(await withLock(lockPath, async () => 42)).toBe(42);
    expect(existsSync(lockPath)).toBe(false);
  });
});
