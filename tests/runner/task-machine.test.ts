import { describe, it, expect } from 'vitest';
import { TaskQueue } from '@/lib/task_queue.js';
import { beginAttempt, buildAttempt, interruptInProgress, settleAttempt } from '@/runner/task_machine.js';
import type { AttemptOutcome } from '@/runner/task_machine.js';
import { createTask, NO_USAGE } from '../helpers/mocks.js';

const STARTED = new Date('2026-01-01T00:00:00.000Z');
const FINISHED = new Date('2026-01-01T00:00:02.000Z');

const failure: AttemptOutcome = {
  ok: false,
  code: 'VALIDATION_FAILED',
  detail: 'acceptance criteria not met: no route',
  usage: { cost_usd: 0.5, tokens: 20 },
  validation: { passed: false, rationale: 'no route' },
};

function queueWith(overrides: Parameters<typeof createTask>[0] = {}): TaskQueue {
  const queue = new TaskQueue();
  queue.enqueue(createTask(overrides));
  return queue;
}

describe('buildAttempt', () => {
  it('should number attempts after the existing history', () => {
    const task = createTask();
    const first = buildAttempt(task, failure, STARTED, FINISHED);

    const second = buildAttempt({ ...task, execution_history: [first] }, failure, STARTED, FINISHED);

    expect(first).toEqual({
      attempt: 1,
      started_at: '2026-01-01T00:00:00.000Z',
      finished_at: '2026-01-01T00:00:02.000Z',
      outcome: 'failed',
      failure_code: 'VALIDATION_FAILED',
      detail: 'acceptance criteria not met: no route',
      usage: { cost_usd: 0.5, tokens: 20 },
    });
    expect(second.attempt).toBe(2);
  });

  it('should record the artifact of a successful attempt', () => {
    const outcome: AttemptOutcome = {
      ok: true,
      artifact: {
        record: {
          path: 'README.md',
          hash: 'b'.repeat(64),
          summary: '',
          last_modified: '2026-01-01T00:00:01.000Z',
          size_bytes: 3,
          task_id: 'T001',
        },
        changed: true,
      },
      detail: 'wrote README.md',
      usage: NO_USAGE,
      validation: { passed: true, rationale: 'ok' },
    };

    const attempt = buildAttempt(createTask(), outcome, STARTED, FINISHED);

    expect(attempt.outcome).toBe('succeeded');
    expect(attempt.failure_code).toBeNull();
    expect(attempt.artifact).toEqual({ path: 'README.md', hash: 'b'.repeat(64), changed: true });
  });
});

describe('settleAttempt', () => {
  it('should complete a successful task with its verdict', () => {
    const queue = queueWith();
    const task = beginAttempt(queue, 'T001');

    const settlement = settleAttempt(
      queue,
      task,
      { ok: true, artifact: null, detail: 'command succeeded', usage: NO_USAGE, validation: { passed: true, rationale: 'ok' } },
      STARTED,
      FINISHED
    );

    expect(settlement.type).toBe('completed');
    expect(settlement.task.status).toBe('completed');
    expect(settlement.task.retries).toBe(0);
    expect(settlement.task.execution_history).toHaveLength(1);
    expect(settlement.task.validation_history).toEqual([
      { attempt: 1, passed: true, rationale: 'ok', at: '2026-01-01T00:00:02.000Z' },
    ]);
  });

  it('should requeue a failed task while budget remains', () => {
    const queue = queueWith({ max_retries: 2 });
    const task = beginAttempt(queue, 'T001');

    const settlement = settleAttempt(queue, task, failure, STARTED, FINISHED);

    expect(settlement.type).toBe('retry');
    expect(settlement.task).toMatchObject({ status: 'pending', retries: 1 });
    expect(settlement.task.validation_history).toHaveLength(1);
  });

  it('should fail the task on the attempt that spends the budget', () => {
    const queue = queueWith({ max_retries: 2, retries: 1 });
    const task = beginAttempt(queue, 'T001');

    const settlement = settleAttempt(queue, task, failure, STARTED, FINISHED);

    expect(settlement.type).toBe('exhausted');
    expect(settlement.task).toMatchObject({ status: 'failed', retries: 2 });
    expect(queue.counts().failed).toBe(1);
  });

  it('should not spend budget on an interrupted attempt', () => {
    const queue = queueWith({ max_retries: 1 });
    const task = beginAttempt(queue, 'T001');

    const settlement = settleAttempt(
      queue,
      task,
      { ok: false, code: 'INTERRUPTED', detail: 'stopped', usage: NO_USAGE, validation: null },
      STARTED,
      FINISHED
    );

    expect(settlement.type).toBe('retry');
    expect(settlement.task.retries).toBe(0);
    expect(settlement.task.validation_history).toEqual([]);
  });
});

describe('interruptInProgress', () => {
  it('should return every in-progress task to pending', () => {
    const queue = new TaskQueue();
    queue.enqueue(createTask({ id: 'T001' }));
    queue.enqueue(createTask({ id: 'T002', retries: 2 }));
    queue.enqueue(createTask({ id: 'T003' }));
    beginAttempt(queue, 'T001');
    beginAttempt(queue, 'T002');

    const interrupted = interruptInProgress(queue, 'engine stopped', FINISHED);

    expect(interrupted.map((task) => [task.id, task.retries])).toEqual([
      ['T001', 0],
      ['T002', 2],
    ]);
    expect(interrupted[0].execution_history[0]).toMatchObject({
      attempt: 1,
      failure_code: 'INTERRUPTED',
      detail: 'engine stopped',
      usage: { cost_usd: 0, tokens: 0 },
    });
    expect(queue.counts()).toEqual({ pending: 3, in_progress: 0, completed: 0, failed: 0 });
  });
});
