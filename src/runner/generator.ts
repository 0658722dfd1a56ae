import type { ModelProvider } from '../types/model.js';
import type { ContentGenerator } from '../types/planner.js';
import type { ModelUsage, Task } from '../types/task.js';
import { assertNever } from '../types/task.js';
import { buildGenerationPrompt } from './prompts.js';

/**
 * Returns the body when the whole text is a single markdown fence; otherwise
 * the text unchanged.
 */
export function stripWholeFence(text: string): string {
  const match = /^\s*```[^\n]*\n([\s\S]*?)\n?```\s*$/.exec(text);
  if (!match) return text;
  const body = match[1] ?? '';
  return body.endsWith('\n') ? body : `${body}\n`;
}

/**
 * Content generator backed by the `code_generator` model role.
 */
export class ModelContentGenerator implements ContentGenerator {
  constructor(private readonly provider: ModelProvider) {}

  async generate(task: Task, goal: string): Promise<{ content: string; summary: string; usage: ModelUsage }> {
    switch (task.kind.type) {
      case 'create_file': {
        const completion = await this.provider.complete({
          role: 'code_generator',
          prompt: buildGenerationPrompt(task, goal, task.kind.path, task.kind.content_guideline),
          context: { task_id: task.id, path: task.kind.path },
        });
        return {
          content: stripWholeFence(completion.text),
          summary: task.description,
          usage: completion.usage,
        };
      }
      case 'run_command':
        throw new Error(`Task ${task.id} is a run_command task; nothing to generate`);
      default:
        return assertNever(task.kind);
    }
  }
}
