/**
 * Project state type definitions.
 *
 * A project is the persisted record of one goal's run: every task (in one of
 * four collections), the artifacts it produced, and the accounting. The whole
 * value is written to PROJECT.json at every task or artifact mutation.
 */

import type { ProjectStopCode } from '../constants/failure_codes.js';
import type { ProjectEngineSettings } from './config.js';
import type { Task } from './task.js';

export const PROJECT_STATUSES = ['planned', 'running', 'completed_successfully', 'failed'] as const;

export type ProjectStatus = typeof PROJECT_STATUSES[number];

/**
 * Tracked file produced by a task.
 */
export interface ArtifactRecord {
  /** Workspace-relative POSIX path */
  path: string;
  /** sha256 hex of the content bytes */
  hash: string;
  summary: string;
  last_modified: string;
  size_bytes: number;
  /** Task that last wrote it */
  task_id: string;
}

export interface ProjectMetrics {
  iterations: number;
  cost_usd: number;
  tokens: number;
  error_count: number;
}

/**
 * Why a project ended in `failed`.
 */
export interface ProjectFailure {
  code: ProjectStopCode;
  reason: string;
  at: string;
}

export interface Project {
  id: string;
  goal: string;
  status: ProjectStatus;
  /** Pending tasks in insertion order */
  pending: Task[];
  in_progress: Task[];
  completed: Task[];
  failed: Task[];
  artifacts_state: Record<string, ArtifactRecord>;
  metrics: ProjectMetrics;
  engine_config: ProjectEngineSettings;
  /** Original task id → corrective task id */
  escalations: Record<string, string>;
  /** Next numeric suffix for task ids */
  next_task_seq: number;
  failure: ProjectFailure | null;
  created_at: string;
  updated_at: string;
}
