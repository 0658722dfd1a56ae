import { ProjectStore } from '../lib/project_store.js';
import { TaskQueue } from '../lib/task_queue.js';
import type { EngineConfig } from '../types/config.js';

/**
 * Prints a project's task graph as a Mermaid flowchart.
 */
export async function graphCommand(projectId: string, config: EngineConfig): Promise<string> {
  const project = await new ProjectStore(config.state_dir).load(projectId);
  const mermaid = TaskQueue.fromState(project).toMermaid();
  console.log(mermaid);
  return mermaid;
}
