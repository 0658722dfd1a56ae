/**
 * Project state persistence.
 *
 * Each project owns `<state_dir>/<project_id>/` holding PROJECT.json and the
 * run lock. PROJECT.json is rewritten atomically at every task or artifact
 * mutation and validated against the schema whenever it is read back.
 */

import { randomBytes } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProjectEngineSettings } from '../types/config.js';
import type { Project } from '../types/project.js';
import { PROJECT_LOCK_FILE, PROJECT_STATE_FILE } from './branding.js';
import { atomicReadJson, atomicWriteJson, cleanupTmpFiles, isNotFound } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';

export class ProjectNotFoundError extends Error {
  constructor(
    public readonly projectId: string,
    public readonly statePath: string
  ) {
    super(`Project ${projectId} not found (no ${statePath})`);
    this.name = 'ProjectNotFoundError';
  }
}

/**
 * PROJECT.json exists but is unreadable or does not match the schema.
 */
export class StateCorruptError extends Error {
  constructor(
    message: string,
    public readonly statePath: string,
    public readonly errors: string[]
  ) {
    super(message);
    this.name = 'StateCorruptError';
  }
}

/**
 * Project id: goal slug plus a timestamp and random suffix.
 *
 * @example
 * ```typescript
 * newProjectId('Build a Flask todo API', new Date('2026-01-02T03:04:05Z'));
 * // 'build-a-flask-todo-api-20260102030405-1a2b3c'
 * ```
 */
export function newProjectId(goal: string, now: Date = new Date()): string {
  const slug =
    goal
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, 32)
      .replace(/-+$/, '') || 'project';
  const stamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `${slug}-${stamp}-${randomBytes(3).toString('hex')}`;
}

/**
 * Fresh project in `planned` status with empty collections.
 */
export function createProject(id: string, goal: string, settings: ProjectEngineSettings, now: Date = new Date()): Project {
  const at = now.toISOString();
  return {
    id,
    goal,
    status: 'planned',
    pending: [],
    in_progress: [],
    completed: [],
    failed: [],
    artifacts_state: {},
    metrics: { iterations: 0, cost_usd: 0, tokens: 0, error_count: 0 },
    engine_config: { ...settings },
    escalations: {},
    next_task_seq: 1,
    failure: null,
    created_at: at,
    updated_at: at,
  };
}

/**
 * Reads and writes projects under one state directory.
 */
export class ProjectStore {
  constructor(readonly stateDir: string) {}

  projectDir(projectId: string): string {
    return join(this.stateDir, projectId);
  }

  statePath(projectId: string): string {
    return join(this.projectDir(projectId), PROJECT_STATE_FILE);
  }

  lockPath(projectId: string): string {
    return join(this.projectDir(projectId), PROJECT_LOCK_FILE);
  }

  /**
   * Atomically writes PROJECT.json.
   *
   * @throws {AtomicFsError}
   */
  async save(project: Project): Promise<void> {
    await atomicWriteJson(this.statePath(project.id), project);
  }

  /**
   * Loads and validates PROJECT.json.
   *
   * @throws {ProjectNotFoundError} If the project has no state file
   * @throws {StateCorruptError} If the file is not valid JSON or fails the schema
   */
  async load(projectId: string): Promise<Project> {
    const path = this.statePath(projectId);
    let raw: unknown;
    try {
      raw = await atomicReadJson(path);
    } catch (error) {
      if (isNotFound(error)) throw new ProjectNotFoundError(projectId, path);
      const message = error instanceof Error ? error.message : String(error);
      throw new StateCorruptError(`Cannot read ${path}: ${message}`, path, [message]);
    }

    const result = validateWithSchema<Project>(raw, await loadSchema('project_state'));
    if (!result.valid) {
      throw new StateCorruptError(
        `${path} does not match the project state schema: ${result.errors.slice(0, 5).join('; ')}`,
        path,
        result.errors
      );
    }
    if (result.data.id !== projectId) {
      throw new StateCorruptError(`${path} holds project ${result.data.id}, expected ${projectId}`, path, []);
    }
    return result.data;
  }

  /**
   * Ids of every project with a state file, sorted.
   */
  async list(): Promise<string[]> {
    let entries;
    try {
      entries = await readdir(this.stateDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    const ids: string[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const files = await readdir(join(this.stateDir, entry.name));
      if (files.includes(PROJECT_STATE_FILE)) ids.push(entry.name);
    }
    return ids.sort();
  }

  /**
   * Removes tmp files an interrupted write left in the project directory.
   */
  async cleanup(projectId: string): Promise<string[]> {
    return cleanupTmpFiles(this.projectDir(projectId));
  }
}
