/**
 * Single source of truth for failure codes.
 *
 * TASK_FAILURE_CODES label a failed attempt; the task is retried or escalated.
 * PROJECT_STOP_CODES label a project that ended in `failed`.
 */

export const TASK_FAILURE_CODES = [
  'SECURITY_DENIED',
  'COMMAND_FAILED',
  'COMMAND_TIMED_OUT',
  'ARTIFACT_CONFLICT',
  'ARTIFACT_WRITE_FAILED',
  'GENERATION_FAILED',
  'VALIDATION_FAILED',
  'VALIDATION_ERROR',
  'INTERRUPTED',
] as const;

export const PROJECT_STOP_CODES = [
  'DEPENDENCY_DEADLOCK',
  'ITERATION_BUDGET_EXHAUSTED',
  'ESCALATION_LIMIT',
  'INFRASTRUCTURE_ERROR',
  'MODEL_FATAL',
  'PLANNING_FAILED',
  'INTERNAL_ERROR',
  'INTERRUPTED',
] as const;

export type FailureCode = typeof TASK_FAILURE_CODES[number];

export type ProjectStopCode = typeof PROJECT_STOP_CODES[number];

const TASK_FAILURE_CODES_SET: ReadonlySet<string> = new Set(TASK_FAILURE_CODES);
const PROJECT_STOP_CODES_SET: ReadonlySet<string> = new Set(PROJECT_STOP_CODES);

export function isFailureCode(code: string): code is FailureCode {
  return TASK_FAILURE_CODES_SET.has(code);
}

export function isProjectStopCode(code: string): code is ProjectStopCode {
  return PROJECT_STOP_CODES_SET.has(code);
}

/**
 * Failure codes whose attempt does not count against the retry budget.
 */
export const NON_CONSUMING_FAILURES: ReadonlySet<FailureCode> = new Set<FailureCode>(['INTERRUPTED']);
