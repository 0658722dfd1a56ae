/**
 * Orchestration engine.
 *
 * Drives one project from goal to a terminal status: plans it, then loops
 * over ready tasks (one batch per iteration), settles each attempt through
 * the task state machine, escalates exhausted tasks to the planner, and
 * writes PROJECT.json after every transition so a run can be resumed.
 *
 * A project-level failure never discards work. The project is marked failed
 * with a stop code and everything recorded so far stays on disk.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProjectStopCode } from '../constants/failure_codes.js';
import { ArtifactStore } from '../lib/artifacts.js';
import { projectSettings } from '../lib/config.js';
import { withLock } from '../lib/lock.js';
import { createProject, newProjectId } from '../lib/project_store.js';
import type { ProjectStore } from '../lib/project_store.js';
import { retryOptionsFrom } from '../lib/retry.js';
import { isInfrastructureError } from '../lib/sandbox.js';
import { SecurityValidator } from '../lib/security.js';
import { TaskQueue } from '../lib/task_queue.js';
import type { DependencyDeadlock } from '../lib/task_queue.js';
import type { EngineConfig } from '../types/config.js';
import type { CommandExecutor } from '../types/executor.js';
import { isFatalModelError, ZERO_USAGE } from '../types/model.js';
import type { AcceptanceValidator, ContentGenerator, CorrectionResult, Planner, PlanResult } from '../types/planner.js';
import type { Project } from '../types/project.js';
import type { SecurityAnalyzer, SecurityStats } from '../types/security.js';
import type { ModelUsage, Task } from '../types/task.js';
import { addUsage, runAttempt, selectBatch } from './dispatch.js';
import type { DispatchContext } from './dispatch.js';
import { materializeSpecs, PlanValidationError } from './planner.js';
import { beginAttempt, interruptInProgress, interruptTask, settleAttempt } from './task_machine.js';
import type { AttemptOutcome } from './task_machine.js';

/**
 * Resume was asked for a project that already finished successfully.
 */
export class ProjectCompletedError extends Error {
  constructor(public readonly projectId: string) {
    super(`Project ${projectId} already completed successfully; nothing to resume`);
    this.name = 'ProjectCompletedError';
  }
}

/**
 * Resume was asked for a project whose escalation bound was reached and
 * whose failed tasks were never corrected.
 */
export class ProjectNotResumableError extends Error {
  constructor(
    public readonly projectId: string,
    public readonly unresolved: string[]
  ) {
    super(
      `Project ${projectId} stopped with ESCALATION_LIMIT; failed task(s) ${unresolved.join(', ')} have no completed correction`
    );
    this.name = 'ProjectNotResumableError';
  }
}

/**
 * Everything the engine is built from. The config is frozen and shared by
 * every collaborator; nothing is read from a global.
 */
export interface EngineDeps {
  config: EngineConfig;
  store: ProjectStore;
  planner: Planner;
  generator: ContentGenerator;
  validator: AcceptanceValidator;
  /** Semantic security stage; null means every command that reaches it is uncertain */
  analyzer: SecurityAnalyzer | null;
  executor: CommandExecutor;
  /** Backoff sleep, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface ActiveRun {
  project: Project;
  queue: TaskQueue;
  artifacts: ArtifactStore;
}

interface Stop {
  code: ProjectStopCode;
  reason: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line description of why nothing can run.
 */
export function describeDeadlock(deadlock: DependencyDeadlock | null): string {
  if (!deadlock) return 'No task is ready';
  const parts = [`No task is ready; blocked: ${deadlock.blocked.join(', ')}`];
  if (deadlock.cycle) parts.push(`cycle: ${deadlock.cycle.join(' -> ')}`);
  for (const entry of deadlock.unsatisfiable) {
    parts.push(`${entry.task_id} depends on ${entry.reason} task ${entry.dependency}`);
  }
  return parts.join('; ');
}

export class Engine {
  private readonly security: SecurityValidator;
  private readonly now: () => Date;
  private active: ActiveRun | null = null;
  private stopRequested = false;

  constructor(private readonly deps: EngineDeps) {
    this.security = new SecurityValidator(deps.config, deps.analyzer);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Creates a project for the goal, plans it, and runs it to a terminal status.
   *
   * @returns The final project state
   */
  async run(goal: string): Promise<Project> {
    const trimmed = goal.trim();
    if (trimmed === '') {
      throw new Error('Goal must not be empty');
    }

    const now = this.now();
    const project = createProject(newProjectId(trimmed, now), trimmed, projectSettings(this.deps.config), now);
    await this.deps.store.save(project);
    console.log(`[ENGINE] Created project ${project.id}`);

    return withLock(this.deps.store.lockPath(project.id), async () => {
      const active = await this.activate(project);
      if (await this.planInitial(active)) {
        await this.drive(active);
      }
      return structuredClone(active.project);
    });
  }

  /**
   * Re-drives a persisted project. Tasks left in progress by a previous run
   * go back to pending with a non-consuming INTERRUPTED attempt; a recorded
   * failure is cleared. A project with no tasks is planned again.
   * ESCALATION_LIMIT is final while any failed task lacks a completed
   * correction.
   *
   * @throws {ProjectNotFoundError}
   * @throws {StateCorruptError}
   * @throws {ProjectCompletedError}
   * @throws {ProjectNotResumableError} After ESCALATION_LIMIT with uncorrected failures
   * @throws {LockHeldError} If another engine is driving the project
   */
  async resume(projectId: string): Promise<Project> {
    const existing = await this.deps.store.load(projectId);
    if (existing.status === 'completed_successfully') {
      throw new ProjectCompletedError(projectId);
    }
    if (existing.failure?.code === 'ESCALATION_LIMIT') {
      const unresolved = TaskQueue.fromState(existing).unresolvedFailures();
      if (unresolved.length > 0) {
        throw new ProjectNotResumableError(projectId, unresolved);
      }
    }

    return withLock(this.deps.store.lockPath(projectId), async () => {
      const removed = await this.deps.store.cleanup(projectId);
      if (removed.length > 0) {
        console.warn(`[ENGINE] Removed ${removed.length} leftover tmp file(s) for ${projectId}`);
      }
      const project = await this.deps.store.load(projectId);
      if (project.failure) {
        console.log(`[ENGINE] Resuming ${projectId} after ${project.failure.code}: ${project.failure.reason}`);
      }
      project.failure = null;

      const active = await this.activate(project);
      for (const task of interruptInProgress(active.queue, 'engine stopped while the attempt was running', this.now())) {
        console.warn(`[ENGINE] Task ${task.id} was in progress; returned to pending`);
      }

      const counts = active.queue.counts();
      const total = counts.pending + counts.in_progress + counts.completed + counts.failed;
      if (total === 0) {
        if (await this.planInitial(active)) {
          await this.drive(active);
        }
      } else {
        active.project.status = 'running';
        await this.checkpoint(active);
        await this.drive(active);
      }
      return structuredClone(active.project);
    });
  }

  /**
   * Read-only deep copy of the project being (or last) driven.
   */
  snapshot(): Project | null {
    if (!this.active) return null;
    const { project, queue, artifacts } = this.active;
    return structuredClone({ ...project, ...queue.snapshot(), artifacts_state: artifacts.snapshot() });
  }

  securityStats(): SecurityStats {
    return this.security.stats();
  }

  /**
   * Stops at the next loop boundary. The project is failed with INTERRUPTED
   * and stays resumable.
   */
  requestStop(): void {
    this.stopRequested = true;
  }

  private async activate(project: Project): Promise<ActiveRun> {
    this.stopRequested = false;
    const workspaceDir = join(this.deps.config.workspace_root, project.id);
    await mkdir(workspaceDir, { recursive: true });
    const active: ActiveRun = {
      project,
      queue: TaskQueue.fromState(project),
      artifacts: new ArtifactStore(workspaceDir, this.deps.config.artifact_forbidden_globs, project.artifacts_state),
    };
    this.active = active;
    return active;
  }

  private async checkpoint(active: ActiveRun): Promise<void> {
    active.project = {
      ...active.project,
      ...active.queue.snapshot(),
      artifacts_state: active.artifacts.snapshot(),
      updated_at: this.now().toISOString(),
    };
    await this.deps.store.save(active.project);
  }

  private async failProject(active: ActiveRun, code: ProjectStopCode, reason: string): Promise<void> {
    active.project.status = 'failed';
    active.project.failure = { code, reason, at: this.now().toISOString() };
    await this.checkpoint(active);
    console.error(`[ENGINE] Project ${active.project.id} failed (${code}): ${reason}`);
  }

  private addCost(active: ActiveRun, usage: ModelUsage): void {
    const metrics = active.project.metrics;
    metrics.cost_usd += usage.cost_usd;
    metrics.tokens += usage.tokens;
  }

  /**
   * @returns Whether the project has tasks to run
   */
  private async planInitial(active: ActiveRun): Promise<boolean> {
    const { project } = active;
    console.log(`[PLANNER] Planning ${project.id}: ${project.goal}`);

    let plan: PlanResult;
    try {
      plan = await this.deps.planner.plan(project.goal, active.queue.allTasks());
    } catch (error) {
      await this.failProject(active, isFatalModelError(error) ? 'MODEL_FATAL' : 'PLANNING_FAILED', `Planning failed: ${errorMessage(error)}`);
      return false;
    }
    this.addCost(active, plan.usage);

    if (plan.specs.length === 0) {
      await this.failProject(active, 'PLANNING_FAILED', 'Planner returned no tasks');
      return false;
    }

    let tasks: Task[];
    try {
      const materialized = materializeSpecs(plan.specs, {
        firstSeq: project.next_task_seq,
        maxRetries: project.engine_config.max_iterations_per_task,
        origin: { source: 'plan' },
        now: this.now(),
      });
      tasks = materialized.tasks;
      active.project.next_task_seq = materialized.nextSeq;
    } catch (error) {
      if (error instanceof PlanValidationError) {
        await this.failProject(active, 'PLANNING_FAILED', error.message);
        return false;
      }
      throw error;
    }

    for (const task of tasks) {
      active.queue.enqueue(task);
    }
    active.project.status = 'running';
    await this.checkpoint(active);
    console.log(`[ENGINE] Planned ${tasks.length} task(s) for ${project.id}`);
    return true;
  }

  /**
   * Runs the loop. An error nothing below expected fails the project with
   * INTERNAL_ERROR before it propagates.
   */
  private async drive(active: ActiveRun): Promise<void> {
    try {
      await this.loop(active);
    } catch (error) {
      await this.failProject(active, 'INTERNAL_ERROR', `Unexpected error: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async loop(active: ActiveRun): Promise<void> {
    const budget = active.project.engine_config.max_project_iterations;
    let iterations = 0;

    while (true) {
      if (this.stopRequested) {
        await this.failProject(active, 'INTERRUPTED', 'Stop requested; resume to continue');
        return;
      }

      const counts = active.queue.counts();
      if (counts.pending === 0 && counts.in_progress === 0) {
        active.project.status = 'completed_successfully';
        await this.checkpoint(active);
        console.log(
          `[ENGINE] Project ${active.project.id} completed: ${counts.completed} task(s) completed, ${counts.failed} failed and corrected`
        );
        return;
      }

      if (iterations >= budget) {
        await this.failProject(
          active,
          'ITERATION_BUDGET_EXHAUSTED',
          `Used ${iterations} of ${budget} iteration(s) with ${counts.pending} task(s) still pending`
        );
        return;
      }

      const ready = active.queue.readyTasks();
      if (ready.length === 0) {
        await this.failProject(active, 'DEPENDENCY_DEADLOCK', describeDeadlock(active.queue.detectDeadlock()));
        return;
      }

      iterations++;
      active.project.metrics.iterations++;

      const batch = selectBatch(ready, this.deps.config.max_parallel_tasks, (path) => active.artifacts.normalize(path));
      const started = batch.map((task) => beginAttempt(active.queue, task.id));
      await this.checkpoint(active);

      const stop = await this.runBatch(active, started);
      if (stop) {
        await this.failProject(active, stop.code, stop.reason);
        return;
      }
    }
  }

  private dispatchContext(active: ActiveRun): DispatchContext {
    return {
      goal: active.project.goal,
      generator: this.deps.generator,
      validator: this.deps.validator,
      security: this.security,
      executor: this.deps.executor,
      artifacts: active.artifacts,
      infraRetry: { ...retryOptionsFrom(this.deps.config.infra_retry, 'sandbox'), sleep: this.deps.sleep },
    };
  }

  /**
   * Runs the batch concurrently, then settles results one at a time in
   * batch order.
   *
   * @returns The first project-level stop, or null to keep looping
   */
  private async runBatch(active: ActiveRun, tasks: Task[]): Promise<Stop | null> {
    const startedAt = this.now();
    const ctx = this.dispatchContext(active);
    const results = await Promise.allSettled(tasks.map((task) => runAttempt(ctx, task)));
    const finishedAt = this.now();

    let stop: Stop | null = null;
    let unexpected: unknown = null;

    for (const [index, result] of results.entries()) {
      const task = tasks[index];
      if (!task) continue;

      if (result.status === 'rejected') {
        interruptTask(active.queue, task, `attempt aborted: ${errorMessage(result.reason)}`, finishedAt);
        await this.checkpoint(active);
        if (isFatalModelError(result.reason)) {
          stop ??= { code: 'MODEL_FATAL', reason: `Task ${task.id}: ${result.reason.message}` };
        } else if (isInfrastructureError(result.reason)) {
          stop ??= { code: 'INFRASTRUCTURE_ERROR', reason: `Task ${task.id}: ${result.reason.message}` };
        } else {
          unexpected ??= result.reason;
        }
        continue;
      }

      const outcome = result.value;
      this.account(active, outcome);
      const settlement = settleAttempt(active.queue, task, outcome, startedAt, finishedAt);
      await this.checkpoint(active);

      switch (settlement.type) {
        case 'completed':
          console.log(`[ENGINE] ${task.id} completed: ${outcome.detail}`);
          break;
        case 'retry':
          console.warn(
            `[ENGINE] ${task.id} attempt failed (${outcome.ok ? 'ok' : outcome.code}): ${outcome.detail}; retries ${settlement.task.retries}/${settlement.task.max_retries}`
          );
          break;
        case 'exhausted': {
          const escalation = await this.escalate(active, settlement.task, outcome.detail);
          await this.checkpoint(active);
          stop ??= escalation;
          break;
        }
      }
    }

    if (unexpected !== null) {
      throw unexpected;
    }
    return stop;
  }

  private account(active: ActiveRun, outcome: AttemptOutcome): void {
    this.addCost(active, outcome.usage);
    if (!outcome.ok) {
      active.project.metrics.error_count++;
    }
  }

  /**
   * Replaces an exhausted task with one corrective task from the planner.
   *
   * @returns A stop when escalation is not possible
   */
  private async escalate(active: ActiveRun, task: Task, lastFailure: string): Promise<Stop | null> {
    if (task.origin.source === 'escalation') {
      return {
        code: 'ESCALATION_LIMIT',
        reason: `Corrective task ${task.id} (for ${task.origin.escalated_from}) failed after ${task.retries} attempt(s): ${lastFailure}`,
      };
    }

    console.warn(`[ENGINE] ${task.id} failed after ${task.retries} attempt(s); escalating to planner: ${lastFailure}`);
    let correction: CorrectionResult;
    try {
      correction = await this.deps.planner.correct({
        goal: active.project.goal,
        failed_task: task,
        last_failure: lastFailure,
        completed_task_ids: active.queue
          .allTasks()
          .filter((candidate) => candidate.status === 'completed')
          .map((candidate) => candidate.id),
      });
    } catch (error) {
      if (isFatalModelError(error)) {
        return { code: 'MODEL_FATAL', reason: `Correcting ${task.id}: ${error.message}` };
      }
      console.warn(`[ENGINE] Planner could not correct ${task.id}: ${errorMessage(error)}`);
      correction = { spec: null, usage: ZERO_USAGE };
    }
    this.addCost(active, correction.usage);

    if (!correction.spec) {
      return { code: 'ESCALATION_LIMIT', reason: `Planner proposed no corrective task for ${task.id}` };
    }

    const { tasks, nextSeq } = materializeSpecs([{ ...correction.spec, dependencies: [] }], {
      firstSeq: active.project.next_task_seq,
      maxRetries: active.project.engine_config.max_iterations_per_task,
      origin: { source: 'escalation', escalated_from: task.id },
      now: this.now(),
    });
    for (const corrective of tasks) {
      active.queue.enqueue(corrective);
      active.queue.recordEscalation(task.id, corrective.id);
      console.log(`[ENGINE] ${corrective.id} enqueued to correct ${task.id}: ${corrective.description}`);
    }
    active.project.next_task_seq = nextSeq;
    return null;
  }
}

/**
 * Routes SIGINT and SIGTERM to `engine.requestStop()`.
 *
 * @returns A function that removes the handlers
 */
export function installSignalHandlers(engine: Pick<Engine, 'requestStop'>): () => void {
  const sigintHandler = () => {
    console.log('\n[ENGINE] SIGINT received, will stop at the next loop boundary');
    engine.requestStop();
  };
  const sigtermHandler = () => {
    console.log('\n[ENGINE] SIGTERM received, will stop at the next loop boundary');
    engine.requestStop();
  };

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}
