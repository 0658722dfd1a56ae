/**
 * Atomic file system utilities for crash-safe writes.
 *
 * Every write goes through write-tmp, fsync, rename so a reader never sees a
 * partially written PROJECT.json or artifact, even after a crash.
 */

import { open, rename, unlink, readFile, readdir, mkdir } from 'node:fs/promises';
import { join, dirname } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * True when the error (or its cause) is a missing-file error.
 */
export function isNotFound(error: unknown): boolean {
  const target = error instanceof AtomicFsError ? error.cause : error;
  return (
    target instanceof Error &&
    'code' in target &&
    (target as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/**
 * Atomically writes bytes or text to a file, creating parent directories.
 *
 * @throws {AtomicFsError} If the write operation fails
 */
export async function atomicWriteFile(filePath: string, content: string | Uint8Array): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    await mkdir(dirname(filePath), { recursive: true });
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content);
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    // POSIX rename is atomic
    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch((closeError: unknown) => {
        console.warn(`Failed to close ${tmpPath}: ${closeError instanceof Error ? closeError.message : String(closeError)}`);
      });
    }
    await unlink(tmpPath).catch((unlinkError: unknown) => {
      if (!isNotFound(unlinkError)) {
        console.warn(`Failed to remove ${tmpPath}: ${unlinkError instanceof Error ? unlinkError.message : String(unlinkError)}`);
      }
    });

    throw new AtomicFsError(
      `Failed to atomically write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Atomically writes JSON data (2-space indent, trailing newline).
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/PROJECT.json', project);
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Reads and parses a JSON file.
 *
 * The value is returned as `unknown`; callers validate its shape.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Removes stale .tmp files left behind by interrupted writes.
 *
 * A missing directory is not an error.
 *
 * @returns Deleted file paths
 * @throws {AtomicFsError} If the directory cannot be scanned
 */
export async function cleanupTmpFiles(dir: string, suffix = '.tmp'): Promise<string[]> {
  const deleted: string[] = [];

  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return deleted;
    throw new AtomicFsError(
      `Failed to cleanup tmp files in ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      dir,
      error instanceof Error ? error : undefined
    );
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith(suffix)) {
      const filePath = join(dir, entry.name);
      try {
        await unlink(filePath);
        deleted.push(filePath);
      } catch (error) {
        // Keep going; one undeletable file should not block the rest
        console.warn(`Failed to delete tmp file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  return deleted;
}
