import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ArtifactConflictError,
  ArtifactPathError,
  ArtifactStore,
  hashContent,
  normalizeArtifactPath,
} from '@/lib/artifacts.js';
import { DEFAULT_CONFIG } from '@/lib/config.js';
import { makeTempDir, removeDir, silenceConsole } from '../helpers/mocks.js';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

function problemOf(path: string): string | null {
  try {
    normalizeArtifactPath(path, DEFAULT_CONFIG.artifact_forbidden_globs);
    return null;
  } catch (error) {
    return error instanceof ArtifactPathError ? error.problem : 'other';
  }
}

describe('hashContent', () => {
  it('should hash strings as UTF-8 bytes', () => {
    expect(hashContent('hello')).toBe(HELLO_SHA256);
    expect(hashContent(Buffer.from('hello', 'utf-8'))).toBe(HELLO_SHA256);
  });
});

describe('normalizeArtifactPath', () => {
  it('should normalize to a POSIX relative path', () => {
    expect(normalizeArtifactPath('./src//app.py', [])).toBe('src/app.py');
    expect(normalizeArtifactPath('src\\models\\user.py', [])).toBe('src/models/user.py');
  });

  it('should reject unsafe paths', () => {
    expect(problemOf('')).toBe('empty');
    expect(problemOf('./')).toBe('empty');
    expect(problemOf('/etc/passwd')).toBe('absolute');
    expect(problemOf('C:\\temp\\x')).toBe('absolute');
    expect(problemOf('../outside.txt')).toBe('traversal');
    expect(problemOf('src/../../x')).toBe('traversal');
  });

  it('should reject forbidden globs', () => {
    expect(problemOf('.git/config')).toBe('forbidden');
    expect(problemOf('config/.env')).toBe('forbidden');
    expect(problemOf('.env.local')).toBe('forbidden');
    expect(problemOf('docs/env.md')).toBeNull();
  });
});

describe('ArtifactStore', () => {
  let workspace: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    workspace = await makeTempDir('artifacts');
    store = new ArtifactStore(workspace, DEFAULT_CONFIG.artifact_forbidden_globs);
    silenceConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(workspace);
  });

  it('should write new content and track its hash', async () => {
    const result = await store.put('docs/hello.txt', 'hello', { overwrite: false, summary: 'greeting', task_id: 'T001' });

    expect(result.changed).toBe(true);
    expect(result.record).toMatchObject({
      path: 'docs/hello.txt',
      hash: HELLO_SHA256,
      summary: 'greeting',
      size_bytes: 5,
      task_id: 'T001',
    });
    expect(await readFile(join(workspace, 'docs', 'hello.txt'), 'utf-8')).toBe('hello');
    expect(store.getState('./docs/hello.txt')?.hash).toBe(HELLO_SHA256);
  });

  it('should count multi-byte characters in size_bytes', async () => {
    const result = await store.put('a.txt', 'héllo', { overwrite: false, summary: '', task_id: 'T001' });

    expect(result.record.size_bytes).toBe(6);
  });

  it('should treat identical content as a no-op', async () => {
    const first = await store.put('a.txt', 'hello', { overwrite: false, summary: 'one', task_id: 'T001' });

    const second = await store.put('a.txt', 'hello', { overwrite: false, summary: 'two', task_id: 'T002' });

    expect(second.changed).toBe(false);
    expect(second.record).toEqual(first.record);
  });

  it('should refuse different content without overwrite', async () => {
    await store.put('a.txt', 'hello', { overwrite: false, summary: '', task_id: 'T001' });

    const error = await store
      .put('a.txt', 'goodbye', { overwrite: false, summary: '', task_id: 'T002' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArtifactConflictError);
    expect(error instanceof ArtifactConflictError && error.existingTaskId).toBe('T001');
    expect(error instanceof ArtifactConflictError && error.existingHash).toBe(HELLO_SHA256);
    expect(await readFile(join(workspace, 'a.txt'), 'utf-8')).toBe('hello');
  });

  it('should replace content with overwrite', async () => {
    await store.put('a.txt', 'hello', { overwrite: false, summary: '', task_id: 'T001' });

    const result = await store.put('a.txt', 'goodbye', { overwrite: true, summary: '', task_id: 'T002' });

    expect(result.changed).toBe(true);
    expect(result.record.task_id).toBe('T002');
    expect(await store.read('a.txt')).toBe('goodbye');
  });

  it('should let only the first of two concurrent writers win', async () => {
    const results = await Promise.allSettled([
      store.put('race.txt', 'first', { overwrite: false, summary: '', task_id: 'T001' }),
      store.put('race.txt', 'second', { overwrite: false, summary: '', task_id: 'T002' }),
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    expect(await store.read('race.txt')).toBe('first');
  });

  it('should report a conflict without writing', async () => {
    await store.put('a.txt', 'hello', { overwrite: false, summary: '', task_id: 'T001' });

    expect(store.findConflict('a.txt', 'hello', false)).toBeNull();
    expect(store.findConflict('a.txt', 'other', true)).toBeNull();
    expect(store.findConflict('a.txt', 'other', false)).toBeInstanceOf(ArtifactConflictError);
    expect(store.findConflict('new.txt', 'other', false)).toBeNull();
  });

  it('should reject a forbidden path before writing', async () => {
    await expect(store.put('.git/HEAD', 'ref', { overwrite: true, summary: '', task_id: 'T001' })).rejects.toThrow(
      ArtifactPathError
    );
  });

  it('should start from persisted records and snapshot copies', () => {
    const record = {
      path: 'a.txt',
      hash: HELLO_SHA256,
      summary: '',
      last_modified: '2026-01-01T00:00:00.000Z',
      size_bytes: 5,
      task_id: 'T001',
    };
    const restored = new ArtifactStore(workspace, [], { 'a.txt': record });

    const snapshot = restored.snapshot();
    snapshot['a.txt'].summary = 'changed';

    expect(restored.getState('a.txt')).toEqual(record);
    expect(restored.getState('missing.txt')).toBeNull();
    expect(restored.findConflict('a.txt', 'other', false)?.existingTaskId).toBe('T001');
  });
});
