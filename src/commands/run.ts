/**
 * `run` and `resume`: drive a project to a terminal status.
 */

import { createEngine, installSignalHandlers } from '../runner/index.js';
import type { Engine, EngineDeps } from '../runner/index.js';
import type { EngineConfig } from '../types/config.js';
import type { Project } from '../types/project.js';

export type EngineOverrides = Partial<Omit<EngineDeps, 'config'>>;

/**
 * Process exit code for a finished project: 0 on success, 130 when stopped
 * by a signal, 1 for any other failure.
 */
export function exitCodeFor(project: Project): number {
  if (project.status === 'completed_successfully') return 0;
  if (project.failure?.code === 'INTERRUPTED') return 130;
  return 1;
}

function printSummary(project: Project): void {
  const { metrics } = project;
  console.log('\n--- Run Complete ---');
  console.log(`Project: ${project.id}`);
  console.log(`Status: ${project.status}`);
  if (project.failure) {
    console.log(`Failure: ${project.failure.code}: ${project.failure.reason}`);
  }
  console.log(
    `Tasks: ${project.completed.length} completed, ${project.failed.length} failed, ${project.pending.length} pending`
  );
  console.log(`Iterations: ${metrics.iterations}, errors: ${metrics.error_count}`);
  console.log(`Cost: $${metrics.cost_usd.toFixed(4)} (${metrics.tokens} tokens)`);
}

async function drive(engine: Engine, action: (engine: Engine) => Promise<Project>): Promise<Project> {
  const cleanupSignalHandlers = installSignalHandlers(engine);
  try {
    const project = await action(engine);
    printSummary(project);
    return project;
  } finally {
    cleanupSignalHandlers();
  }
}

export async function runCommand(goal: string, config: EngineConfig, overrides: EngineOverrides = {}): Promise<Project> {
  return drive(createEngine(config, overrides), (engine) => engine.run(goal));
}

export async function resumeCommand(projectId: string, config: EngineConfig, overrides: EngineOverrides = {}): Promise<Project> {
  return drive(createEngine(config, overrides), (engine) => engine.resume(projectId));
}
