/**
 * `status`: print a persisted project, or list projects when no id is given.
 */

import { ProjectStore } from '../lib/project_store.js';
import type { EngineConfig } from '../types/config.js';
import type { Project } from '../types/project.js';
import type { Task } from '../types/task.js';

export interface StatusOptions {
  json?: boolean;
}

function taskLine(task: Task): string {
  const last = task.execution_history[task.execution_history.length - 1];
  const lastFailure = last && last.failure_code ? ` last: ${last.failure_code}` : '';
  const origin = task.origin.source === 'escalation' ? ` (corrects ${task.origin.escalated_from})` : '';
  return `  ${task.id} [${task.status}] ${task.description}${origin} retries ${task.retries}/${task.max_retries}${lastFailure}`;
}

/**
 * Human-readable status report.
 */
export function formatStatus(project: Project): string {
  const { metrics } = project;
  const tasks = [...project.pending, ...project.in_progress, ...project.completed, ...project.failed].sort((a, b) =>
    a.id.localeCompare(b.id)
  );
  const lines = [
    `Project ${project.id} (${project.status})`,
    `  goal: ${project.goal}`,
    `  tasks: pending ${project.pending.length}, in_progress ${project.in_progress.length}, completed ${project.completed.length}, failed ${project.failed.length}`,
    `  iterations: ${metrics.iterations}, errors: ${metrics.error_count}, cost: $${metrics.cost_usd.toFixed(4)}, tokens: ${metrics.tokens}`,
  ];
  if (project.failure) {
    lines.push(`  failure: ${project.failure.code}: ${project.failure.reason}`);
  }
  lines.push('', 'Tasks:', ...tasks.map(taskLine));
  const artifacts = Object.values(project.artifacts_state).sort((a, b) => a.path.localeCompare(b.path));
  if (artifacts.length > 0) {
    lines.push('', 'Artifacts:', ...artifacts.map((a) => `  ${a.path} ${a.hash.slice(0, 12)} ${a.size_bytes}B (${a.task_id})`));
  }
  return lines.join('\n');
}

export async function statusCommand(
  projectId: string | undefined,
  config: EngineConfig,
  options: StatusOptions = {}
): Promise<Project | string[]> {
  const store = new ProjectStore(config.state_dir);

  if (projectId === undefined) {
    const ids = await store.list();
    if (options.json) {
      console.log(JSON.stringify(ids, null, 2));
    } else if (ids.length === 0) {
      console.log(`No projects in ${config.state_dir}`);
    } else {
      for (const id of ids) console.log(id);
    }
    return ids;
  }

  const project = await store.load(projectId);
  console.log(options.json ? JSON.stringify(project, null, 2) : formatStatus(project));
  return project;
}
