/**
 * Content-addressed artifact store.
 *
 * Every file a task produces is tracked by the sha256 of its bytes. Writing
 * the same bytes again is a no-op; writing different bytes over a tracked
 * file needs `overwrite`, otherwise it is an ArtifactConflictError.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { join, posix, relative, resolve, isAbsolute } from 'node:path';
import micromatch from 'micromatch';
import type { ArtifactRecord } from '../types/project.js';
import { atomicWriteFile } from './fs.js';

/**
 * Different content already tracked at the path and overwrite was not allowed.
 */
export class ArtifactConflictError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly existingHash: string,
    public readonly incomingHash: string,
    public readonly existingTaskId: string
  ) {
    super(message);
    this.name = 'ArtifactConflictError';
  }
}

export type ArtifactPathProblem = 'empty' | 'absolute' | 'traversal' | 'forbidden';

/**
 * The path is not an acceptable workspace-relative artifact path.
 */
export class ArtifactPathError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly problem: ArtifactPathProblem
  ) {
    super(message);
    this.name = 'ArtifactPathError';
  }
}

/**
 * sha256 hex digest of the content bytes (strings hash as UTF-8).
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Normalizes a workspace-relative path to POSIX form and rejects absolute
 * paths, `..` segments and paths matching a forbidden glob.
 *
 * @throws {ArtifactPathError}
 *
 * @example
 * ```typescript
 * normalizeArtifactPath('./src//app.py', []); // 'src/app.py'
 * normalizeArtifactPath('../etc/passwd', []); // throws (traversal)
 * ```
 */
export function normalizeArtifactPath(path: string, forbiddenGlobs: readonly string[]): string {
  const slashed = path.trim().replace(/\\/g, '/');
  if (slashed === '') {
    throw new ArtifactPathError('Artifact path is empty', path, 'empty');
  }
  if (slashed.startsWith('/') || /^[A-Za-z]:\//.test(slashed)) {
    throw new ArtifactPathError(`Artifact path '${path}' must be workspace-relative`, path, 'absolute');
  }
  if (slashed.split('/').includes('..')) {
    throw new ArtifactPathError(`Artifact path '${path}' contains '..'`, path, 'traversal');
  }

  const normalized = posix.normalize(slashed).replace(/^(\.\/)+/, '').replace(/\/+$/, '');
  if (normalized === '' || normalized === '.') {
    throw new ArtifactPathError(`Artifact path '${path}' does not name a file`, path, 'empty');
  }
  if (forbiddenGlobs.length > 0 && micromatch.isMatch(normalized, [...forbiddenGlobs], { dot: true })) {
    throw new ArtifactPathError(`Artifact path '${normalized}' matches a forbidden pattern`, path, 'forbidden');
  }
  return normalized;
}

export interface PutOptions {
  /** Replace tracked content that differs */
  overwrite: boolean;
  summary: string;
  task_id: string;
}

export interface PutResult {
  record: ArtifactRecord;
  /** False when identical content was already tracked */
  changed: boolean;
}

/**
 * Tracks and writes artifacts under one workspace directory.
 */
export class ArtifactStore {
  private readonly records: Map<string, ArtifactRecord>;
  private readonly pathLocks = new Map<string, Promise<void>>();

  constructor(
    readonly workspaceDir: string,
    private readonly forbiddenGlobs: readonly string[],
    initial: Record<string, ArtifactRecord> = {}
  ) {
    this.records = new Map(Object.entries(initial).map(([path, record]) => [path, { ...record }]));
  }

  /**
   * Normalizes a path against this store's rules.
   *
   * @throws {ArtifactPathError}
   */
  normalize(path: string): string {
    return normalizeArtifactPath(path, this.forbiddenGlobs);
  }

  /**
   * The conflict `put` would raise for this content, without writing.
   */
  findConflict(path: string, content: string | Uint8Array, overwrite: boolean): ArtifactConflictError | null {
    const normalized = this.normalize(path);
    return this.conflictFor(normalized, hashContent(content), overwrite);
  }

  /**
   * Writes content at a path unless that would silently replace different
   * tracked content.
   *
   * @throws {ArtifactPathError} If the path is rejected
   * @throws {ArtifactConflictError} If different content is tracked and overwrite is false
   */
  async put(path: string, content: string | Uint8Array, options: PutOptions): Promise<PutResult> {
    const normalized = this.normalize(path);
    const hash = hashContent(content);

    return this.withPathLock(normalized, async () => {
      const conflict = this.conflictFor(normalized, hash, options.overwrite);
      if (conflict) throw conflict;

      const existing = this.records.get(normalized);
      if (existing && existing.hash === hash) {
        return { record: { ...existing }, changed: false };
      }

      await atomicWriteFile(this.absolutePath(normalized), content);
      const record: ArtifactRecord = {
        path: normalized,
        hash,
        summary: options.summary,
        last_modified: new Date().toISOString(),
        size_bytes: typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.byteLength,
        task_id: options.task_id,
      };
      this.records.set(normalized, record);
      console.log(`[ARTIFACTS] ${options.task_id} wrote ${normalized} (${hash.slice(0, 12)})`);
      return { record: { ...record }, changed: true };
    });
  }

  /**
   * Tracked record for the path, or null.
   */
  getState(path: string): ArtifactRecord | null {
    const record = this.records.get(this.normalize(path));
    return record ? { ...record } : null;
  }

  /**
   * Point-in-time copy of every record. Never waits for a writer.
   */
  snapshot(): Record<string, ArtifactRecord> {
    const copy: Record<string, ArtifactRecord> = {};
    for (const [path, record] of this.records) {
      copy[path] = { ...record };
    }
    return copy;
  }

  /**
   * Reads a tracked artifact's current bytes as text.
   */
  async read(path: string): Promise<string> {
    return readFile(this.absolutePath(this.normalize(path)), 'utf-8');
  }

  private conflictFor(path: string, hash: string, overwrite: boolean): ArtifactConflictError | null {
    const existing = this.records.get(path);
    if (!existing || existing.hash === hash || overwrite) return null;
    return new ArtifactConflictError(
      `Artifact ${path} already holds different content (written by ${existing.task_id}) and overwrite is false`,
      path,
      existing.hash,
      hash,
      existing.task_id
    );
  }

  private absolutePath(normalized: string): string {
    const root = resolve(this.workspaceDir);
    const target = resolve(join(root, normalized));
    const rel = relative(root, target);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new ArtifactPathError(`Artifact path '${normalized}' escapes the workspace`, normalized, 'traversal');
    }
    return target;
  }

  /**
   * Serializes work on one path. Only the hash compare and the file write run
   * under the lock.
   */
  private async withPathLock<T>(path: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.pathLocks.get(path) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.pathLocks.set(path, tail);
    try {
      return await run;
    } finally {
      if (this.pathLocks.get(path) === tail) {
        this.pathLocks.delete(path);
      }
    }
  }
}
