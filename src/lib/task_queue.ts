/**
 * Task queue and dependency graph.
 *
 * Tasks live in exactly one of four collections (pending, in_progress,
 * completed, failed) and are never deleted. A pending task is ready when
 * every dependency is satisfied: completed, or failed but replaced by a
 * corrective task that completed. Ready tasks come out in insertion order.
 */

import { NON_CONSUMING_FAILURES } from '../constants/failure_codes.js';
import type { AttemptRecord, Task, TaskStatus, ValidationVerdict } from '../types/task.js';

export class DuplicateTaskError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} is already in the queue`);
    this.name = 'DuplicateTaskError';
  }
}

export class UnknownTaskError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} is not in the queue`);
    this.name = 'UnknownTaskError';
  }
}

/**
 * A status change the task state machine does not allow. The queue is left
 * unchanged.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
    public readonly reason: string
  ) {
    super(`Task ${taskId}: cannot move ${from} -> ${to}: ${reason}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Why pending work can never become ready.
 */
export interface DependencyDeadlock {
  /** Every pending task id */
  blocked: string[];
  /** A dependency cycle among pending tasks, first id repeated at the end */
  cycle: string[] | null;
  /** Dependencies that will never be satisfied */
  unsatisfiable: Array<{ task_id: string; dependency: string; reason: 'failed' | 'unknown' }>;
}

/**
 * Persisted form of the queue.
 */
export interface QueueState {
  pending: Task[];
  in_progress: Task[];
  completed: Task[];
  failed: Task[];
  /** Failed task id → corrective task id */
  escalations: Record<string, string>;
}

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const MERMAID_CLASSES: Record<TaskStatus, string> = {
  pending: 'fill:#f4f4f4,stroke:#999999',
  in_progress: 'fill:#fff4c2,stroke:#d4a000',
  completed: 'fill:#d6f5d6,stroke:#2e8b57',
  failed: 'fill:#f8d0d0,stroke:#c0392b',
};

function mermaidLabel(task: Task): string {
  const text = task.description.length > 40 ? `${task.description.slice(0, 37)}...` : task.description;
  return `${task.id}: ${text}`.replace(/"/g, '#quot;');
}

export class TaskQueue {
  private pending: Task[] = [];
  private inProgress: Task[] = [];
  private completed: Task[] = [];
  private failed: Task[] = [];
  private readonly escalations = new Map<string, string>();

  /**
   * Rebuilds a queue from persisted collections.
   *
   * @throws {DuplicateTaskError} If an id appears twice
   */
  static fromState(state: QueueState): TaskQueue {
    const queue = new TaskQueue();
    const seen = new Set<string>();
    const load = (tasks: Task[]): Task[] =>
      tasks.map((task) => {
        if (seen.has(task.id)) throw new DuplicateTaskError(task.id);
        seen.add(task.id);
        return structuredClone(task);
      });
    queue.pending = load(state.pending);
    queue.inProgress = load(state.in_progress);
    queue.completed = load(state.completed);
    queue.failed = load(state.failed);
    for (const [original, corrective] of Object.entries(state.escalations)) {
      queue.escalations.set(original, corrective);
    }
    return queue;
  }

  /**
   * Appends a pending task. Cycles are not checked here; they surface as a
   * deadlock.
   *
   * @throws {DuplicateTaskError}
   */
  enqueue(task: Task): void {
    if (this.find(task.id)) throw new DuplicateTaskError(task.id);
    this.pending.push(structuredClone({ ...task, status: 'pending' }));
  }

  /**
   * Records that `correctiveId` replaces the failed task `originalId` for
   * dependency purposes.
   */
  recordEscalation(originalId: string, correctiveId: string): void {
    this.escalations.set(originalId, correctiveId);
  }

  correctiveFor(originalId: string): string | null {
    return this.escalations.get(originalId) ?? null;
  }

  /**
   * Failed tasks whose corrective task has not completed, by id.
   */
  unresolvedFailures(): string[] {
    return this.failed
      .map((task) => task.id)
      .filter((id) => !this.isSatisfied(id))
      .sort();
  }

  get(id: string): Task | null {
    const found = this.find(id);
    return found ? structuredClone(found.task) : null;
  }

  /**
   * Oldest pending task whose dependencies are all satisfied.
   */
  nextReady(): Task | null {
    const task = this.pending.find((candidate) => this.isReady(candidate));
    return task ? structuredClone(task) : null;
  }

  /**
   * Every ready task, oldest first.
   */
  readyTasks(): Task[] {
    return this.pending.filter((task) => this.isReady(task)).map((task) => structuredClone(task));
  }

  /**
   * Moves a task to `status`, optionally rewriting it on the way.
   *
   * `update` may change history and counters but not the id, kind or
   * dependencies.
   *
   * @throws {UnknownTaskError}
   * @throws {InvalidTransitionError}
   */
  mark(id: string, status: TaskStatus, update?: (task: Task) => Task): Task {
    const found = this.find(id);
    if (!found) throw new UnknownTaskError(id);
    const { task, from } = found;

    if (!ALLOWED[from].includes(status)) {
      throw new InvalidTransitionError(id, from, status, `${from} tasks may only move to ${ALLOWED[from].join(' or ') || 'nothing (terminal)'}`);
    }
    if (from === 'pending' && status === 'in_progress') {
      const unmet = task.dependencies.filter((dep) => !this.isSatisfied(dep));
      if (unmet.length > 0) {
        throw new InvalidTransitionError(id, from, status, `unmet dependencies: ${unmet.join(', ')}`);
      }
    }

    const base = structuredClone(task);
    const next = update ? update(base) : base;
    if (next.id !== task.id || JSON.stringify(next.dependencies) !== JSON.stringify(task.dependencies)) {
      throw new InvalidTransitionError(id, from, status, 'a transition may not change id or dependencies');
    }

    const moved: Task = { ...next, status, updated_at: new Date().toISOString() };
    this.remove(id, from);
    this.collection(status).push(moved);
    return structuredClone(moved);
  }

  /**
   * Returns an in-progress task to the tail of pending after a failed
   * attempt, appending the attempt and counting it against the budget
   * (unless its failure code does not consume a retry). A validation verdict
   * for the attempt, when there was one, joins `validation_history`.
   *
   * @throws {InvalidTransitionError} If the task is not in progress or the budget would be exceeded
   */
  requeueForRetry(id: string, attempt: AttemptRecord, validation?: ValidationVerdict): Task {
    const found = this.find(id);
    if (!found) throw new UnknownTaskError(id);
    const { task, from } = found;
    if (from !== 'in_progress') {
      throw new InvalidTransitionError(id, from, 'pending', 'only in-progress tasks can be retried');
    }

    const consumes = attempt.failure_code === null || !NON_CONSUMING_FAILURES.has(attempt.failure_code);
    const retries = consumes ? task.retries + 1 : task.retries;
    if (retries > task.max_retries) {
      throw new InvalidTransitionError(id, from, 'pending', `retries would exceed max_retries (${task.max_retries})`);
    }

    const requeued: Task = {
      ...structuredClone(task),
      status: 'pending',
      retries,
      execution_history: [...structuredClone(task.execution_history), structuredClone(attempt)],
      validation_history: validation
        ? [...structuredClone(task.validation_history), structuredClone(validation)]
        : structuredClone(task.validation_history),
      updated_at: new Date().toISOString(),
    };
    this.remove(id, from);
    this.pending.push(requeued);
    return structuredClone(requeued);
  }

  /**
   * Describes why nothing can run, or null when work can still proceed
   * (something is ready or in progress) or nothing is pending.
   */
  detectDeadlock(): DependencyDeadlock | null {
    if (this.pending.length === 0 || this.inProgress.length > 0) return null;
    if (this.pending.some((task) => this.isReady(task))) return null;

    const unsatisfiable: DependencyDeadlock['unsatisfiable'] = [];
    for (const task of this.pending) {
      for (const dep of task.dependencies) {
        const found = this.find(dep);
        if (!found) {
          unsatisfiable.push({ task_id: task.id, dependency: dep, reason: 'unknown' });
        } else if (found.from === 'failed' && !this.hasLiveCorrective(dep)) {
          unsatisfiable.push({ task_id: task.id, dependency: dep, reason: 'failed' });
        }
      }
    }

    return {
      blocked: this.pending.map((task) => task.id),
      cycle: this.findPendingCycle(),
      unsatisfiable,
    };
  }

  /**
   * Deep copy of every collection.
   */
  snapshot(): QueueState {
    return {
      pending: structuredClone(this.pending),
      in_progress: structuredClone(this.inProgress),
      completed: structuredClone(this.completed),
      failed: structuredClone(this.failed),
      escalations: Object.fromEntries(this.escalations),
    };
  }

  /**
   * Number of tasks per collection.
   */
  counts(): Record<TaskStatus, number> {
    return {
      pending: this.pending.length,
      in_progress: this.inProgress.length,
      completed: this.completed.length,
      failed: this.failed.length,
    };
  }

  /**
   * All tasks, any status, ordered by id.
   */
  allTasks(): Task[] {
    return [...this.pending, ...this.inProgress, ...this.completed, ...this.failed]
      .map((task) => structuredClone(task))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  /**
   * Mermaid flowchart: edges run from a dependency to its dependent, dotted
   * edges from a failed task to its corrective task; nodes are styled by
   * status.
   */
  toMermaid(): string {
    const lines = ['graph TD'];
    const tasks = this.allTasks();
    for (const task of tasks) {
      lines.push(`  ${task.id}["${mermaidLabel(task)}"]:::${task.status}`);
    }
    for (const task of tasks) {
      for (const dep of task.dependencies) {
        lines.push(`  ${dep} --> ${task.id}`);
      }
    }
    for (const [original, corrective] of this.escalations) {
      lines.push(`  ${original} -.->|corrected by| ${corrective}`);
    }
    for (const [status, style] of Object.entries(MERMAID_CLASSES)) {
      lines.push(`  classDef ${status} ${style}`);
    }
    return lines.join('\n');
  }

  private isSatisfied(dep: string): boolean {
    if (this.completed.some((task) => task.id === dep)) return true;
    const corrective = this.escalations.get(dep);
    return corrective !== undefined && this.completed.some((task) => task.id === corrective);
  }

  private isReady(task: Task): boolean {
    return task.dependencies.every((dep) => this.isSatisfied(dep));
  }

  private hasLiveCorrective(failedId: string): boolean {
    const corrective = this.escalations.get(failedId);
    if (corrective === undefined) return false;
    const found = this.find(corrective);
    return found !== null && found.from !== 'failed';
  }

  private findPendingCycle(): string[] | null {
    const byId = new Map(this.pending.map((task) => [task.id, task]));
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
      state.set(id, 'visiting');
      stack.push(id);
      const task = byId.get(id);
      for (const dep of task ? task.dependencies : []) {
        if (!byId.has(dep)) continue;
        const seen = state.get(dep);
        if (seen === 'visiting') {
          return [...stack.slice(stack.indexOf(dep)), dep];
        }
        if (seen === undefined) {
          const cycle = visit(dep);
          if (cycle) return cycle;
        }
      }
      stack.pop();
      state.set(id, 'done');
      return null;
    };

    for (const task of this.pending) {
      if (state.get(task.id) === undefined) {
        const cycle = visit(task.id);
        if (cycle) return cycle;
      }
    }
    return null;
  }

  private collection(status: TaskStatus): Task[] {
    switch (status) {
      case 'pending':
        return this.pending;
      case 'in_progress':
        return this.inProgress;
      case 'completed':
        return this.completed;
      case 'failed':
        return this.failed;
    }
  }

  private find(id: string): { task: Task; from: TaskStatus } | null {
    for (const from of ['pending', 'in_progress', 'completed', 'failed'] as const) {
      const task = this.collection(from).find((candidate) => candidate.id === id);
      if (task) return { task, from };
    }
    return null;
  }

  private remove(id: string, from: TaskStatus): void {
    const list = this.collection(from);
    const index = list.findIndex((task) => task.id === id);
    if (index !== -1) list.splice(index, 1);
  }
}
