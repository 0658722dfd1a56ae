/**
 * Per-task state machine.
 *
 * pending -> in_progress -> completed
 *                        -> pending (retry, budget left)
 *                        -> failed (budget spent; the engine escalates)
 *
 * Every function here performs exactly one queue transition and returns the
 * task as it now stands. The engine persists after each call.
 */

import type { FailureCode } from '../constants/failure_codes.js';
import { NON_CONSUMING_FAILURES } from '../constants/failure_codes.js';
import type { PutResult } from '../lib/artifacts.js';
import type { TaskQueue } from '../lib/task_queue.js';
import type { ExecutionResult } from '../types/executor.js';
import type { SecurityVerdict } from '../types/security.js';
import type { AttemptRecord, ModelUsage, Task, ValidationVerdict } from '../types/task.js';

/**
 * Acceptance verdict as produced during an attempt.
 */
export interface AttemptValidation {
  passed: boolean;
  rationale: string;
}

interface AttemptDetails {
  detail: string;
  usage: ModelUsage;
  validation: AttemptValidation | null;
  security_verdict?: SecurityVerdict;
  execution_result?: ExecutionResult;
}

/**
 * What one dispatch of a task produced.
 */
export type AttemptOutcome =
  | ({ ok: true; artifact: PutResult | null } & AttemptDetails)
  | ({ ok: false; code: FailureCode } & AttemptDetails);

export type Settlement =
  | { type: 'completed'; task: Task }
  | { type: 'retry'; task: Task }
  | { type: 'exhausted'; task: Task };

/**
 * Attempt record for the task's next attempt number.
 */
export function buildAttempt(task: Task, outcome: AttemptOutcome, startedAt: Date, finishedAt: Date): AttemptRecord {
  const record: AttemptRecord = {
    attempt: task.execution_history.length + 1,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    outcome: outcome.ok ? 'succeeded' : 'failed',
    failure_code: outcome.ok ? null : outcome.code,
    detail: outcome.detail,
    usage: { ...outcome.usage },
  };
  if (outcome.security_verdict) record.security_verdict = outcome.security_verdict;
  if (outcome.execution_result) record.execution_result = outcome.execution_result;
  if (outcome.ok && outcome.artifact) {
    record.artifact = {
      path: outcome.artifact.record.path,
      hash: outcome.artifact.record.hash,
      changed: outcome.artifact.changed,
    };
  }
  return record;
}

function toVerdict(attempt: number, validation: AttemptValidation | null, at: Date): ValidationVerdict | undefined {
  if (!validation) return undefined;
  return { attempt, passed: validation.passed, rationale: validation.rationale, at: at.toISOString() };
}

/**
 * pending -> in_progress.
 */
export function beginAttempt(queue: TaskQueue, taskId: string): Task {
  return queue.mark(taskId, 'in_progress');
}

/**
 * Records the attempt and moves the task out of in_progress.
 *
 * A failure consumes one retry (unless its code is non-consuming). The task
 * is requeued while `retries < max_retries`, otherwise failed.
 */
export function settleAttempt(
  queue: TaskQueue,
  task: Task,
  outcome: AttemptOutcome,
  startedAt: Date,
  finishedAt: Date
): Settlement {
  const attempt = buildAttempt(task, outcome, startedAt, finishedAt);
  const verdict = toVerdict(attempt.attempt, outcome.validation, finishedAt);
  const record = (current: Task, retries: number): Task => ({
    ...current,
    retries,
    execution_history: [...current.execution_history, attempt],
    validation_history: verdict ? [...current.validation_history, verdict] : current.validation_history,
  });

  if (outcome.ok) {
    return { type: 'completed', task: queue.mark(task.id, 'completed', (current) => record(current, current.retries)) };
  }

  const consumes = !NON_CONSUMING_FAILURES.has(outcome.code);
  const retries = consumes ? task.retries + 1 : task.retries;
  if (retries < task.max_retries) {
    return { type: 'retry', task: queue.requeueForRetry(task.id, attempt, verdict) };
  }
  return { type: 'exhausted', task: queue.mark(task.id, 'failed', (current) => record(current, retries)) };
}

/**
 * Returns every in-progress task to pending with a non-consuming INTERRUPTED
 * attempt. Used on resume and when an attempt is cut short by a project-level
 * failure.
 */
export function interruptInProgress(queue: TaskQueue, detail: string, now: Date = new Date()): Task[] {
  return queue.snapshot().in_progress.map((task) => interruptTask(queue, task, detail, now));
}

/**
 * Returns one in-progress task to pending with an INTERRUPTED attempt.
 */
export function interruptTask(queue: TaskQueue, task: Task, detail: string, now: Date = new Date()): Task {
  const outcome: AttemptOutcome = { ok: false, code: 'INTERRUPTED', detail, usage: { cost_usd: 0, tokens: 0 }, validation: null };
  return queue.requeueForRetry(task.id, buildAttempt(task, outcome, now, now));
}
