/**
 * Planner and acceptance validator capabilities.
 */

import type { ModelUsage, Task, TaskSpec } from './task.js';

/**
 * Context handed to the planner when escalating a failed task.
 */
export interface CorrectionContext {
  goal: string;
  failed_task: Task;
  /** Last failure detail from the task's execution history */
  last_failure: string;
  completed_task_ids: string[];
}

/**
 * Plan output: specs plus what the planning call cost.
 */
export interface PlanResult {
  specs: TaskSpec[];
  usage: ModelUsage;
}

export interface CorrectionResult {
  spec: TaskSpec | null;
  usage: ModelUsage;
}

/**
 * Produces new and corrective tasks.
 */
export interface Planner {
  plan(goal: string, history: Task[]): Promise<PlanResult>;
  correct(context: CorrectionContext): Promise<CorrectionResult>;
}

/**
 * What a task produced, handed to the acceptance validator.
 */
export type TaskOutput =
  | { type: 'file'; path: string; content: string }
  | { type: 'command'; command: string; exit_code: number; stdout: string; stderr: string };

export interface AcceptanceOutcome {
  passed: boolean;
  rationale: string;
  usage: ModelUsage;
}

/**
 * Judges a task's output against its acceptance criteria.
 */
export interface AcceptanceValidator {
  validate(task: Task, output: TaskOutput): Promise<AcceptanceOutcome>;
}

/**
 * Produces file content for CreateFile tasks.
 */
export interface ContentGenerator {
  generate(task: Task, goal: string): Promise<{ content: string; summary: string; usage: ModelUsage }>;
}
