/**
 * Prompt builders for the model-backed planner, generator, validator and
 * security analyzer. Every prompt that expects structured output names the
 * exact JSON shape it wants back.
 */

import type { CorrectionContext, TaskOutput } from '../types/planner.js';
import type { Task } from '../types/task.js';

const TASK_SPEC_SHAPE = `{
  "tasks": [
    {
      "id": "short-unique-ref",
      "description": "what this task achieves",
      "kind": { "type": "create_file", "path": "relative/path.ext", "content_guideline": "what the file must contain", "overwrite": false },
      "dependencies": ["ref-of-an-earlier-task"],
      "acceptance_criteria": "how to tell the task succeeded"
    },
    {
      "id": "install",
      "description": "install dependencies",
      "kind": { "type": "run_command", "command": "pip install -r requirements.txt", "task_type": "dependency_install" },
      "dependencies": ["requirements"],
      "acceptance_criteria": "command exits 0"
    }
  ]
}`;

function describeTask(task: Task): string {
  switch (task.kind.type) {
    case 'create_file':
      return `${task.id} [create_file ${task.kind.path}] ${task.description}`;
    case 'run_command':
      return `${task.id} [run_command ${task.kind.task_type}: ${task.kind.command}] ${task.description}`;
  }
}

export function buildPlanPrompt(goal: string, history: Task[]): string {
  const lines = [
    'You are the planner of an autonomous software-generation engine.',
    'Break the goal below into a dependency graph of small tasks.',
    'Each task either creates one file (create_file) or runs one shell command (run_command).',
    'Commands run in an isolated container with the project directory as the working directory.',
    'Use "dependency_install" or "git_clone" as task_type only for commands that need the network.',
    '',
    `Goal: ${goal}`,
  ];
  if (history.length > 0) {
    lines.push('', 'Tasks already known:', ...history.map((task) => `- ${describeTask(task)} (${task.status})`));
  }
  lines.push('', 'Respond with JSON only, exactly in this shape:', TASK_SPEC_SHAPE);
  return lines.join('\n');
}

export function buildCorrectionPrompt(context: CorrectionContext): string {
  const task = context.failed_task;
  return [
    'You are the planner of an autonomous software-generation engine.',
    'A task failed repeatedly. Propose exactly ONE corrective task that achieves its intent another way.',
    'The corrective task must not depend on any other task.',
    '',
    `Goal: ${context.goal}`,
    `Failed task: ${describeTask(task)}`,
    `Acceptance criteria: ${task.acceptance_criteria}`,
    `Attempts: ${task.execution_history.length}`,
    `Last failure: ${context.last_failure}`,
    `Completed tasks: ${context.completed_task_ids.join(', ') || '(none)'}`,
    '',
    'Respond with JSON only, in the same shape as a plan with zero or one task:',
    TASK_SPEC_SHAPE,
  ].join('\n');
}

export function buildGenerationPrompt(task: Task, goal: string, path: string, guideline: string): string {
  return [
    'You write the complete content of one file for a software project.',
    `Project goal: ${goal}`,
    `Task: ${task.description}`,
    `File: ${path}`,
    `Content guideline: ${guideline}`,
    `Acceptance criteria: ${task.acceptance_criteria}`,
    '',
    'Respond with the file content only. No explanation, no surrounding markdown fence.',
  ].join('\n');
}

export function buildValidationPrompt(task: Task, output: TaskOutput): string {
  const lines = [
    'You judge whether a task output meets its acceptance criteria.',
    `Task: ${task.description}`,
    `Acceptance criteria: ${task.acceptance_criteria}`,
    '',
  ];
  switch (output.type) {
    case 'file':
      lines.push(`File ${output.path}:`, '```', output.content, '```');
      break;
    case 'command':
      lines.push(
        `Command: ${output.command}`,
        `Exit code: ${output.exit_code}`,
        'stdout:',
        '```',
        output.stdout,
        '```',
        'stderr:',
        '```',
        output.stderr,
        '```'
      );
      break;
  }
  lines.push('', 'Respond with JSON only: {"passed": true|false, "rationale": "one sentence"}');
  return lines.join('\n');
}

export function buildSecurityPrompt(command: string, task: Task): string {
  return [
    'You review shell commands before they run in a sandboxed container.',
    'Judge whether the command is consistent with the task and free of destructive or exfiltrating intent.',
    `Task: ${task.description}`,
    `Command: ${command}`,
    '',
    'Respond with JSON only: {"decision": "allow"|"deny"|"uncertain", "rationale": "one sentence"}',
  ].join('\n');
}
