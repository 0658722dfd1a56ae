/**
 * Model-backed Planner and plan materialization.
 *
 * The planner returns specs with planner-local refs. The engine turns them
 * into tasks with its own ids (T001, T002, ...) and rewrites dependencies
 * accordingly.
 */

import { extractJson } from '../lib/json-extract.js';
import { loadSchema, validateWithSchema } from '../lib/schema.js';
import type { ModelProvider } from '../types/model.js';
import type { CorrectionContext, CorrectionResult, Planner, PlanResult } from '../types/planner.js';
import type { Task, TaskKind, TaskOrigin, TaskSpec } from '../types/task.js';
import { buildCorrectionPrompt, buildPlanPrompt } from './prompts.js';

/**
 * Planner output that cannot be turned into tasks.
 */
export class PlanValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[]
  ) {
    super(message);
    this.name = 'PlanValidationError';
  }
}

/**
 * Planner JSON as described by schemas/task_spec.schema.json.
 */
interface PlannerOutput {
  tasks: Array<{
    id: string;
    description: string;
    kind:
      | { type: 'create_file'; path: string; content_guideline: string; overwrite?: boolean }
      | { type: 'run_command'; command: string; task_type: string };
    dependencies?: string[];
    acceptance_criteria: string;
  }>;
}

function toKind(kind: PlannerOutput['tasks'][number]['kind']): TaskKind {
  switch (kind.type) {
    case 'create_file':
      return { type: 'create_file', path: kind.path, content_guideline: kind.content_guideline, overwrite: kind.overwrite ?? false };
    case 'run_command':
      return { type: 'run_command', command: kind.command, task_type: kind.task_type };
  }
}

/**
 * Parses planner text into specs.
 *
 * @throws {PlanValidationError} If no JSON is found, the schema rejects it,
 *   refs repeat, or a dependency names no ref in the same output
 */
export async function parsePlannerOutput(text: string): Promise<TaskSpec[]> {
  const extracted = extractJson(text);
  if (!extracted.success) {
    throw new PlanValidationError(`Planner output is not JSON: ${extracted.error}`, [extracted.error]);
  }

  const result = validateWithSchema<PlannerOutput>(extracted.data, await loadSchema('task_spec'));
  if (!result.valid) {
    throw new PlanValidationError(`Planner output failed schema validation: ${result.errors.join('; ')}`, result.errors);
  }

  const specs: TaskSpec[] = result.data.tasks.map((raw) => ({
    ref: raw.id,
    description: raw.description,
    kind: toKind(raw.kind),
    dependencies: raw.dependencies ?? [],
    acceptance_criteria: raw.acceptance_criteria,
  }));
  checkPlanRefs(specs);
  return specs;
}

/**
 * Rejects repeated refs and dependencies on refs outside the plan.
 *
 * @throws {PlanValidationError}
 */
export function checkPlanRefs(specs: TaskSpec[]): void {
  const errors: string[] = [];
  const refs = new Set<string>();
  for (const spec of specs) {
    if (refs.has(spec.ref)) errors.push(`duplicate task id '${spec.ref}'`);
    refs.add(spec.ref);
  }
  for (const spec of specs) {
    for (const dep of spec.dependencies) {
      if (!refs.has(dep)) errors.push(`task '${spec.ref}' depends on unknown id '${dep}'`);
    }
  }
  if (errors.length > 0) {
    throw new PlanValidationError(`Invalid plan: ${errors.join('; ')}`, errors);
  }
}

/**
 * Engine id for a sequence number.
 */
export function formatTaskId(seq: number): string {
  return `T${String(seq).padStart(3, '0')}`;
}

export interface MaterializeOptions {
  firstSeq: number;
  maxRetries: number;
  origin: TaskOrigin;
  now?: Date;
}

/**
 * Turns specs into pending tasks with engine ids.
 *
 * @returns The tasks and the next unused sequence number
 * @throws {PlanValidationError} If the specs reference unknown refs
 */
export function materializeSpecs(specs: TaskSpec[], options: MaterializeOptions): { tasks: Task[]; nextSeq: number } {
  checkPlanRefs(specs);
  const at = (options.now ?? new Date()).toISOString();
  const ids = new Map<string, string>();
  specs.forEach((spec, index) => ids.set(spec.ref, formatTaskId(options.firstSeq + index)));

  const tasks = specs.map((spec): Task => ({
    id: ids.get(spec.ref) ?? spec.ref,
    description: spec.description,
    kind: structuredClone(spec.kind),
    dependencies: [...new Set(spec.dependencies.map((dep) => ids.get(dep) ?? dep))],
    status: 'pending',
    acceptance_criteria: spec.acceptance_criteria,
    retries: 0,
    max_retries: options.maxRetries,
    execution_history: [],
    validation_history: [],
    origin: options.origin,
    created_at: at,
    updated_at: at,
  }));
  return { tasks, nextSeq: options.firstSeq + specs.length };
}

/**
 * Planner that asks the `planner` model role.
 */
export class ModelPlanner implements Planner {
  constructor(private readonly provider: ModelProvider) {}

  async plan(goal: string, history: Task[]): Promise<PlanResult> {
    const completion = await this.provider.complete({
      role: 'planner',
      prompt: buildPlanPrompt(goal, history),
    });
    const specs = await parsePlannerOutput(completion.text);
    console.log(`[PLANNER] Plan has ${specs.length} task(s)`);
    return { specs, usage: completion.usage };
  }

  async correct(context: CorrectionContext): Promise<CorrectionResult> {
    const completion = await this.provider.complete({
      role: 'planner',
      prompt: buildCorrectionPrompt(context),
      context: { failed_task_id: context.failed_task.id },
    });
    const specs = await parsePlannerOutput(completion.text);
    if (specs.length > 1) {
      throw new PlanValidationError(`Expected at most one corrective task, got ${specs.length}`, []);
    }
    const spec = specs[0];
    if (!spec) {
      console.warn(`[PLANNER] No corrective task proposed for ${context.failed_task.id}`);
      return { spec: null, usage: completion.usage };
    }
    return { spec: { ...spec, dependencies: [] }, usage: completion.usage };
  }
}
