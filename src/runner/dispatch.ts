/**
 * Dispatch of one task attempt by kind, and batch selection.
 *
 * `runAttempt` turns every task-level failure into a failed AttemptOutcome,
 * including a workspace write the filesystem refuses. Only project-level
 * failures escape as exceptions: FatalModelError and an InfrastructureError
 * that survived its retries.
 */

import { ArtifactConflictError, ArtifactPathError } from '../lib/artifacts.js';
import type { ArtifactStore } from '../lib/artifacts.js';
import { AtomicFsError } from '../lib/fs.js';
import { withRetry } from '../lib/retry.js';
import type { RetryOptions } from '../lib/retry.js';
import { isInfrastructureError } from '../lib/sandbox.js';
import type { SecurityValidator } from '../lib/security.js';
import type { FailureCode } from '../constants/failure_codes.js';
import type { CommandExecutor } from '../types/executor.js';
import { isFatalModelError, ZERO_USAGE } from '../types/model.js';
import type { AcceptanceValidator, ContentGenerator, TaskOutput } from '../types/planner.js';
import type { CreateFileKind, ModelUsage, RunCommandKind, Task } from '../types/task.js';
import { assertNever, taskWriteClaim } from '../types/task.js';
import type { AttemptOutcome, AttemptValidation } from './task_machine.js';

/**
 * Collaborators an attempt needs.
 */
export interface DispatchContext {
  goal: string;
  generator: ContentGenerator;
  validator: AcceptanceValidator;
  security: SecurityValidator;
  executor: CommandExecutor;
  artifacts: ArtifactStore;
  /** Backoff for container start failures */
  infraRetry: RetryOptions;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function addUsage(a: ModelUsage, b: ModelUsage): ModelUsage {
  return { cost_usd: a.cost_usd + b.cost_usd, tokens: a.tokens + b.tokens };
}

function failed(
  code: FailureCode,
  detail: string,
  usage: ModelUsage,
  extra: Partial<Pick<AttemptOutcome, 'validation' | 'security_verdict' | 'execution_result'>> = {}
): AttemptOutcome {
  return { ok: false, code, detail, usage, validation: null, ...extra };
}

type Judgement =
  | { ok: true; validation: AttemptValidation; usage: ModelUsage }
  | { ok: false; detail: string };

/**
 * Runs the acceptance validator. A fatal model error propagates; any other
 * error is reported as a failed judgement.
 */
async function judge(ctx: DispatchContext, task: Task, output: TaskOutput): Promise<Judgement> {
  try {
    const outcome = await ctx.validator.validate(task, output);
    return { ok: true, validation: { passed: outcome.passed, rationale: outcome.rationale }, usage: outcome.usage };
  } catch (error) {
    if (isFatalModelError(error)) throw error;
    return { ok: false, detail: `validator error: ${errorMessage(error)}` };
  }
}

async function runCreateFile(ctx: DispatchContext, task: Task, kind: CreateFileKind): Promise<AttemptOutcome> {
  let generated: Awaited<ReturnType<ContentGenerator['generate']>>;
  try {
    generated = await ctx.generator.generate(task, ctx.goal);
  } catch (error) {
    if (isFatalModelError(error)) throw error;
    return failed('GENERATION_FAILED', `generation failed: ${errorMessage(error)}`, ZERO_USAGE);
  }
  let usage = generated.usage;

  let path: string;
  try {
    path = ctx.artifacts.normalize(kind.path);
  } catch (error) {
    if (error instanceof ArtifactPathError) {
      return failed('GENERATION_FAILED', `rejected artifact path: ${error.message}`, usage);
    }
    throw error;
  }

  const conflict = ctx.artifacts.findConflict(path, generated.content, kind.overwrite);
  if (conflict) {
    return failed('ARTIFACT_CONFLICT', conflict.message, usage);
  }

  const judgement = await judge(ctx, task, { type: 'file', path, content: generated.content });
  if (!judgement.ok) {
    return failed('VALIDATION_ERROR', judgement.detail, usage);
  }
  usage = addUsage(usage, judgement.usage);
  if (!judgement.validation.passed) {
    return failed('VALIDATION_FAILED', `acceptance criteria not met: ${judgement.validation.rationale}`, usage, {
      validation: judgement.validation,
    });
  }

  try {
    const artifact = await ctx.artifacts.put(path, generated.content, {
      overwrite: kind.overwrite,
      summary: generated.summary,
      task_id: task.id,
    });
    return {
      ok: true,
      artifact,
      detail: artifact.changed ? `wrote ${path}` : `${path} already up to date`,
      usage,
      validation: judgement.validation,
    };
  } catch (error) {
    if (error instanceof ArtifactConflictError) {
      return failed('ARTIFACT_CONFLICT', error.message, usage, { validation: judgement.validation });
    }
    if (error instanceof AtomicFsError) {
      return failed('ARTIFACT_WRITE_FAILED', `could not write ${path}: ${error.message}`, usage, {
        validation: judgement.validation,
      });
    }
    throw error;
  }
}

async function runCommand(ctx: DispatchContext, task: Task, kind: RunCommandKind): Promise<AttemptOutcome> {
  const { verdict, usage } = await ctx.security.evaluate(kind.command, task);
  if (verdict.decision === 'deny') {
    return failed('SECURITY_DENIED', `security denied at ${verdict.stage}: ${verdict.rationale}`, usage, {
      security_verdict: verdict,
    });
  }

  const result = await withRetry(
    () =>
      ctx.executor.execute({
        command: verdict.sanitized_command,
        task_type: kind.task_type,
        workspace_dir: ctx.artifacts.workspaceDir,
        task_id: task.id,
      }),
    { ...ctx.infraRetry, label: `sandbox ${task.id}`, isRetryable: isInfrastructureError }
  );

  if (result.timed_out) {
    return failed('COMMAND_TIMED_OUT', `command timed out after ${result.duration_ms}ms`, usage, {
      security_verdict: verdict,
      execution_result: result,
    });
  }
  if (result.exit_code !== 0) {
    return failed('COMMAND_FAILED', `command exited with code ${result.exit_code}`, usage, {
      security_verdict: verdict,
      execution_result: result,
    });
  }

  const judgement = await judge(ctx, task, {
    type: 'command',
    command: verdict.sanitized_command,
    exit_code: result.exit_code,
    stdout: result.stdout,
    stderr: result.stderr,
  });
  if (!judgement.ok) {
    return failed('VALIDATION_ERROR', judgement.detail, usage, { security_verdict: verdict, execution_result: result });
  }
  const total = addUsage(usage, judgement.usage);
  if (!judgement.validation.passed) {
    return failed('VALIDATION_FAILED', `acceptance criteria not met: ${judgement.validation.rationale}`, total, {
      validation: judgement.validation,
      security_verdict: verdict,
      execution_result: result,
    });
  }
  return {
    ok: true,
    artifact: null,
    detail: 'command succeeded',
    usage: total,
    validation: judgement.validation,
    security_verdict: verdict,
    execution_result: result,
  };
}

/**
 * Runs one attempt of an in-progress task.
 *
 * @throws {FatalModelError} When a model call fails fatally
 * @throws {InfrastructureError} When the sandbox cannot start after retries
 */
export function runAttempt(ctx: DispatchContext, task: Task): Promise<AttemptOutcome> {
  switch (task.kind.type) {
    case 'create_file':
      return runCreateFile(ctx, task, task.kind);
    case 'run_command':
      return runCommand(ctx, task, task.kind);
    default:
      return assertNever(task.kind);
  }
}

/**
 * Ready tasks that may run together, in FIFO order.
 *
 * A CreateFile task claims its normalized path; a RunCommand task claims the
 * whole workspace. Admission stops at the first task whose claim overlaps the
 * batch, so ordering is never skipped over.
 */
export function selectBatch(ready: Task[], maxParallel: number, normalize: (path: string) => string): Task[] {
  const batch: Task[] = [];
  const claimed = new Set<string>();

  for (const task of ready) {
    if (batch.length >= Math.max(1, maxParallel)) break;
    const claim = taskWriteClaim(task.kind);
    if (claim === null) {
      if (batch.length === 0) batch.push(task);
      break;
    }
    const key = claimKey(claim, normalize);
    if (claimed.has(key)) break;
    claimed.add(key);
    batch.push(task);
  }
  return batch;
}

function claimKey(path: string, normalize: (path: string) => string): string {
  try {
    return normalize(path);
  } catch (error) {
    // Rejected paths fail at dispatch; the raw path is claim enough
    if (error instanceof ArtifactPathError) return path;
    throw error;
  }
}
