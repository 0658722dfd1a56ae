/**
 * Task type definitions.
 *
 * A task is the smallest orchestrated unit of work. Its kind is a closed
 * tagged union; every switch over `kind.type` ends in `assertNever` so a new
 * kind is a compile error everywhere it is not yet handled.
 */

import type { FailureCode } from '../constants/failure_codes.js';
import type { ExecutionResult } from './executor.js';
import type { SecurityVerdict } from './security.js';

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;

/**
 * Lifecycle status of a task.
 */
export type TaskStatus = typeof TASK_STATUSES[number];

/**
 * Generate a file's content through the code generator.
 */
export interface CreateFileKind {
  type: 'create_file';
  /** Workspace-relative target path */
  path: string;
  /** What the content should be */
  content_guideline: string;
  /** Whether an existing artifact with different content may be replaced */
  overwrite: boolean;
}

/**
 * Run a shell command in the sandbox.
 */
export interface RunCommandKind {
  type: 'run_command';
  /** Full command line */
  command: string;
  /** Declared type (e.g. 'dependency_install'); drives network policy */
  task_type: string;
}

export type TaskKind = CreateFileKind | RunCommandKind;

export type TaskKindType = TaskKind['type'];

/**
 * Cost accounting reported by the Model Provider.
 */
export interface ModelUsage {
  cost_usd: number;
  tokens: number;
}

/**
 * Artifact written by a successful CreateFile attempt.
 */
export interface AttemptArtifact {
  path: string;
  hash: string;
  changed: boolean;
}

/**
 * One execution attempt of a task.
 */
export interface AttemptRecord {
  /** 1-based attempt number */
  attempt: number;
  started_at: string;
  finished_at: string;
  outcome: 'succeeded' | 'failed';
  /** Why the attempt failed (null on success) */
  failure_code: FailureCode | null;
  /** Human-readable summary */
  detail: string;
  security_verdict?: SecurityVerdict;
  execution_result?: ExecutionResult;
  artifact?: AttemptArtifact;
  usage?: ModelUsage;
}

/**
 * Acceptance-criteria verdict for one attempt.
 */
export interface ValidationVerdict {
  attempt: number;
  passed: boolean;
  rationale: string;
  at: string;
}

/**
 * Where a task came from.
 */
export type TaskOrigin =
  | { source: 'plan' }
  | { source: 'escalation'; escalated_from: string };

/**
 * An orchestrated task.
 */
export interface Task {
  id: string;
  description: string;
  kind: TaskKind;
  /** Ids of tasks that must be completed first */
  dependencies: string[];
  status: TaskStatus;
  acceptance_criteria: string;
  /** Failed attempts so far */
  retries: number;
  /** Failed attempts allowed before the task is failed */
  max_retries: number;
  execution_history: AttemptRecord[];
  validation_history: ValidationVerdict[];
  origin: TaskOrigin;
  created_at: string;
  updated_at: string;
}

/**
 * A task as proposed by the Planner, before the engine assigns an id.
 *
 * `ref` is a planner-local handle; `dependencies` name other specs by ref
 * within the same plan.
 */
export interface TaskSpec {
  ref: string;
  description: string;
  kind: TaskKind;
  dependencies: string[];
  acceptance_criteria: string;
}

/**
 * Exhaustiveness check for tagged unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Artifact path a task writes, or null when it may write anywhere.
 */
export function taskWriteClaim(kind: TaskKind): string | null {
  switch (kind.type) {
    case 'create_file':
      return kind.path;
    case 'run_command':
      return null;
    default:
      return assertNever(kind);
  }
}
