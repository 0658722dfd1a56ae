/**
 * Acceptance validation through the `validator` model role.
 */

import { extractJson } from '../lib/json-extract.js';
import type { ModelProvider } from '../types/model.js';
import type { AcceptanceOutcome, AcceptanceValidator, TaskOutput } from '../types/planner.js';
import type { Task } from '../types/task.js';
import { buildValidationPrompt } from './prompts.js';

/**
 * The validator answered, but not with a usable verdict.
 */
export class ValidatorOutputError extends Error {
  constructor(
    message: string,
    public readonly rawText: string
  ) {
    super(message);
    this.name = 'ValidatorOutputError';
  }
}

/**
 * Reads `{"passed": boolean, "rationale": string}` out of model text.
 *
 * @throws {ValidatorOutputError}
 */
export function parseValidatorOutput(text: string): { passed: boolean; rationale: string } {
  const extracted = extractJson(text);
  if (!extracted.success) {
    throw new ValidatorOutputError(`Validator output is not JSON: ${extracted.error}`, text);
  }
  const value = extracted.data;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidatorOutputError('Validator output is not a JSON object', text);
  }
  const passed = 'passed' in value ? value.passed : undefined;
  const rationale = 'rationale' in value ? value.rationale : undefined;
  if (typeof passed !== 'boolean') {
    throw new ValidatorOutputError('Validator output is missing boolean "passed"', text);
  }
  return { passed, rationale: typeof rationale === 'string' && rationale !== '' ? rationale : '(no rationale given)' };
}

export class ModelAcceptanceValidator implements AcceptanceValidator {
  constructor(private readonly provider: ModelProvider) {}

  async validate(task: Task, output: TaskOutput): Promise<AcceptanceOutcome> {
    const completion = await this.provider.complete({
      role: 'validator',
      prompt: buildValidationPrompt(task, output),
      context: { task_id: task.id },
    });
    const verdict = parseValidatorOutput(completion.text);
    return { ...verdict, usage: completion.usage };
  }
}
