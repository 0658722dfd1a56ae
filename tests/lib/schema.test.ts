import { describe, it, expect } from 'vitest';
import { loadSchema, schemaPath, validateWithSchema } from '@/lib/schema.js';
import { createProject } from '@/lib/project_store.js';
import { DEFAULT_CONFIG, projectSettings } from '@/lib/config.js';
import type { Project } from '@/types/project.js';
import { createTask } from '../helpers/mocks.js';

function sampleProject(): Project {
  return createProject('demo-20260101000000-abcdef', 'Build a demo', projectSettings(DEFAULT_CONFIG), new Date('2026-01-01T00:00:00Z'));
}

describe('schemaPath', () => {
  it('should point at the top-level schemas directory', () => {
    expect(schemaPath('task_spec')).toMatch(/[\\/]schemas[\\/]task_spec\.schema\.json$/);
  });
});

describe('project_state schema', () => {
  it('should accept a fresh project', async () => {
    const result = validateWithSchema<Project>(sampleProject(), await loadSchema('project_state'));

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('should accept tasks with attempts and artifacts', async () => {
    const project = sampleProject();
    project.completed.push(
      createTask({
        status: 'completed',
        execution_history: [
          {
            attempt: 1,
            started_at: '2026-01-01T00:00:00.000Z',
            finished_at: '2026-01-01T00:00:01.000Z',
            outcome: 'succeeded',
            failure_code: null,
            detail: 'wrote README.md',
            artifact: { path: 'README.md', hash: 'a'.repeat(64), changed: true },
            usage: { cost_usd: 0.5, tokens: 10 },
          },
        ],
        validation_history: [{ attempt: 1, passed: true, rationale: 'ok', at: '2026-01-01T00:00:01.000Z' }],
      })
    );
    project.artifacts_state['README.md'] = {
      path: 'README.md',
      hash: 'a'.repeat(64),
      summary: 'readme',
      last_modified: '2026-01-01T00:00:01.000Z',
      size_bytes: 12,
      task_id: 'T001',
    };

    const result = validateWithSchema<Project>(project, await loadSchema('project_state'));

    expect(result.errors).toEqual([]);
  });

  it('should reject an artifact hash that is not sha256 hex', async () => {
    const project = sampleProject();
    project.artifacts_state['a.txt'] = {
      path: 'a.txt',
      hash: 'not-a-hash',
      summary: '',
      last_modified: '2026-01-01T00:00:00.000Z',
      size_bytes: 0,
      task_id: 'T001',
    };

    const result = validateWithSchema<Project>(project, await loadSchema('project_state'));

    expect(result.valid).toBe(false);
    expect(result.errors.some((error) => error.startsWith('/artifacts_state/a.txt/hash'))).toBe(true);
  });

  it('should reject an unknown project status', async () => {
    const result = validateWithSchema<Project>({ ...sampleProject(), status: 'paused' }, await loadSchema('project_state'));

    expect(result.valid).toBe(false);
    expect(result.data).toBeNull();
  });
});

describe('task_spec schema', () => {
  it('should accept a plan with both kinds', async () => {
    const plan = {
      tasks: [
        {
          id: 'reqs',
          description: 'requirements file',
          kind: { type: 'create_file', path: 'requirements.txt', content_guideline: 'flask' },
          acceptance_criteria: 'lists flask',
        },
        {
          id: 'install',
          description: 'install',
          kind: { type: 'run_command', command: 'pip install -r requirements.txt', task_type: 'dependency_install' },
          dependencies: ['reqs'],
          acceptance_criteria: 'exit 0',
        },
      ],
    };

    expect(validateWithSchema(plan, await loadSchema('task_spec')).valid).toBe(true);
  });

  it('should reject unknown keys and unknown kinds', async () => {
    const schema = await loadSchema('task_spec');
    const base = { id: 'a', description: 'd', acceptance_criteria: 'c' };

    expect(
      validateWithSchema({ tasks: [{ ...base, kind: { type: 'delete_file', path: 'x' } }] }, schema).valid
    ).toBe(false);
    expect(
      validateWithSchema(
        { tasks: [{ ...base, kind: { type: 'run_command', command: 'ls', task_type: 'command' }, priority: 1 }] },
        schema
      ).valid
    ).toBe(false);
  });
});
