/**
 * Test helpers and fakes.
 *
 * Every collaborator the engine consumes has an in-process fake here so
 * tests never reach a model, a container runtime or the network.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { vi } from 'vitest';
import { resolveConfig } from '@/lib/config.js';
import type { BoundedRunOptions, BoundedRunResult, CommandRunner } from '@/lib/process.js';
import type { EngineConfig } from '@/types/config.js';
import type { CommandExecutor, ExecutionRequest, ExecutionResult } from '@/types/executor.js';
import type { ModelCompletion, ModelProvider, ModelRequest } from '@/types/model.js';
import type {
  AcceptanceOutcome,
  AcceptanceValidator,
  ContentGenerator,
  CorrectionContext,
  CorrectionResult,
  Planner,
  PlanResult,
  TaskOutput,
} from '@/types/planner.js';
import type { AnalyzerResult, SecurityAnalyzer, SemanticAssessment } from '@/types/security.js';
import type { ModelUsage, Task, TaskKind, TaskSpec } from '@/types/task.js';

/**
 * Unique temp directory.
 */
export async function makeTempDir(prefix = 'test'): Promise<string> {
  return mkdtemp(join(tmpdir(), `taskforge-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Silences engine logging for the current test.
 */
export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

/**
 * Frozen config rooted in `root`, with fast backoff.
 */
export function createTestConfig(root: string, overrides: Record<string, unknown> = {}): EngineConfig {
  return resolveConfig({
    workspace_root: join(root, 'workspaces'),
    state_dir: join(root, 'state'),
    infra_retry: { max_attempts: 3, base_delay_ms: 1000, max_delay_ms: 10_000 },
    ...overrides,
  });
}

export function createTask(overrides: Partial<Task> = {}): Task {
  const at = '2026-01-01T00:00:00.000Z';
  return {
    id: 'T001',
    description: 'test task',
    kind: { type: 'create_file', path: 'README.md', content_guideline: 'a readme', overwrite: false },
    dependencies: [],
    status: 'pending',
    acceptance_criteria: 'file exists',
    retries: 0,
    max_retries: 3,
    execution_history: [],
    validation_history: [],
    origin: { source: 'plan' },
    created_at: at,
    updated_at: at,
    ...overrides,
  };
}

export function fileKind(path: string, overwrite = false): TaskKind {
  return { type: 'create_file', path, content_guideline: `contents of ${path}`, overwrite };
}

export function commandKind(command: string, taskType = 'command'): TaskKind {
  return { type: 'run_command', command, task_type: taskType };
}

export function createSpec(ref: string, kind: TaskKind, dependencies: string[] = []): TaskSpec {
  return { ref, description: `task ${ref}`, kind, dependencies, acceptance_criteria: `${ref} done` };
}

export const NO_USAGE: ModelUsage = { cost_usd: 0, tokens: 0 };

type Scripted = string | Error;

/**
 * Model Provider that replays scripted responses in order and records every
 * request. An Error entry is thrown instead of returned.
 */
export class ScriptedModelProvider implements ModelProvider {
  readonly requests: ModelRequest[] = [];

  constructor(
    private readonly script: Scripted[],
    private readonly usage: ModelUsage = { cost_usd: 0.01, tokens: 100 }
  ) {}

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) throw new Error(`No scripted response left for ${request.role}`);
    if (next instanceof Error) throw next;
    return { text: next, usage: { ...this.usage } };
  }
}

/**
 * Planner returning a fixed plan and scripted corrections.
 */
export class FakePlanner implements Planner {
  readonly planCalls: Array<{ goal: string; history: Task[] }> = [];
  readonly correctCalls: CorrectionContext[] = [];

  constructor(
    private readonly plan_: TaskSpec[] | Error,
    private readonly corrections: Array<TaskSpec | null | Error> = [],
    private readonly usage: ModelUsage = NO_USAGE
  ) {}

  async plan(goal: string, history: Task[]): Promise<PlanResult> {
    this.planCalls.push({ goal, history });
    if (this.plan_ instanceof Error) throw this.plan_;
    return { specs: structuredClone(this.plan_), usage: { ...this.usage } };
  }

  async correct(context: CorrectionContext): Promise<CorrectionResult> {
    this.correctCalls.push(context);
    const next = this.corrections.shift();
    if (next instanceof Error) throw next;
    return { spec: next ?? null, usage: { ...this.usage } };
  }
}

/**
 * Generator whose content is `content of <path> by <task id>\n` unless a
 * function says otherwise.
 */
export class FakeGenerator implements ContentGenerator {
  readonly calls: Task[] = [];

  constructor(
    private readonly contentFor: (task: Task) => string | Error = (task) =>
      `content of ${task.kind.type === 'create_file' ? task.kind.path : task.id} by ${task.id}\n`,
    private readonly usage: ModelUsage = NO_USAGE
  ) {}

  async generate(task: Task): Promise<{ content: string; summary: string; usage: ModelUsage }> {
    this.calls.push(task);
    const content = this.contentFor(task);
    if (content instanceof Error) throw content;
    return { content, summary: task.description, usage: { ...this.usage } };
  }
}

/**
 * Validator passing everything unless a function says otherwise.
 */
export class FakeValidator implements AcceptanceValidator {
  readonly calls: Array<{ task: Task; output: TaskOutput }> = [];

  constructor(
    private readonly judge: (task: Task, output: TaskOutput) => boolean | Error = () => true,
    private readonly usage: ModelUsage = NO_USAGE
  ) {}

  async validate(task: Task, output: TaskOutput): Promise<AcceptanceOutcome> {
    this.calls.push({ task, output });
    const passed = this.judge(task, output);
    if (passed instanceof Error) throw passed;
    return { passed, rationale: passed ? 'looks right' : 'does not meet the criteria', usage: { ...this.usage } };
  }
}

export class FakeAnalyzer implements SecurityAnalyzer {
  readonly calls: string[] = [];

  constructor(
    private readonly assessment: SemanticAssessment | Error = { decision: 'allow', rationale: 'benign' },
    private readonly usage: ModelUsage = NO_USAGE
  ) {}

  async assess(command: string): Promise<AnalyzerResult> {
    this.calls.push(command);
    if (this.assessment instanceof Error) throw this.assessment;
    return { ...this.assessment, usage: { ...this.usage } };
  }
}

export function executionResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    exit_code: 0,
    stdout: 'ok\n',
    stderr: '',
    stdout_truncated: false,
    stderr_truncated: false,
    duration_ms: 5,
    timed_out: false,
    network_enabled: false,
    container_name: 'taskforge-test',
    ...overrides,
  };
}

/**
 * Executor answering every request through a function.
 */
export class FakeExecutor implements CommandExecutor {
  readonly requests: ExecutionRequest[] = [];

  constructor(private readonly respond: (request: ExecutionRequest) => ExecutionResult | Error = () => executionResult()) {}

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    this.requests.push(request);
    const result = this.respond(request);
    if (result instanceof Error) throw result;
    return result;
  }
}

export function runResult(overrides: Partial<BoundedRunResult> = {}): BoundedRunResult {
  return {
    exit_code: 0,
    stdout: '',
    stderr: '',
    stdout_truncated: false,
    stderr_truncated: false,
    duration_ms: 1,
    timed_out: false,
    spawn_error: null,
    ...overrides,
  };
}

export interface RecordedRun {
  command: string;
  args: readonly string[];
  options: BoundedRunOptions;
}

/**
 * CommandRunner that records calls and answers with scripted results
 * (the last one repeats).
 */
export function createFakeRunner(results: BoundedRunResult[]): { runner: CommandRunner; calls: RecordedRun[] } {
  const calls: RecordedRun[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const result = results.length > 1 ? results.shift() : results[0];
    return result ?? runResult();
  };
  return { runner, calls };
}
