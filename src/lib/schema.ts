/**
 * JSON Schema validation using Ajv.
 *
 * Schemas live in the top-level `schemas/` directory and are located relative
 * to this module, so the same lookup works from `src/` and from `dist/`.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Schema files shipped with the engine.
 */
export type SchemaName = 'project_state' | 'task_spec';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[] };

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

const loadedSchemas = new Map<SchemaName, object>();
const compiledSchemas = new Map<string, ValidateFunction>();

/**
 * Path of a named schema file.
 */
export function schemaPath(name: SchemaName): string {
  return `${SCHEMA_DIR}${name}.schema.json`;
}

/**
 * Loads and parses a named schema. Parsed schemas are cached per process.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(name: SchemaName): Promise<object> {
  const cached = loadedSchemas.get(name);
  if (cached) return cached;

  const path = schemaPath(name);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Schema at ${path} is not a JSON object`);
  }
  loadedSchemas.set(name, parsed);
  return parsed;
}

function compile(schema: object): ValidateFunction {
  const key = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  const cached = compiledSchemas.get(key);
  if (cached) return cached;

  // Ajv's default export is typed as a module namespace under NodeNext
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const validate = new Ajv({ strict: true, allErrors: true }).compile(schema);
  compiledSchemas.set(key, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 *
 * @example
 * ```typescript
 * const result = validateWithSchema<PlannerOutput>(parsed, await loadSchema('task_spec'));
 * if (!result.valid) console.error(result.errors.join('; '));
 * ```
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile(schema);
  if (validate(data)) {
    // Ajv has just checked the shape T describes
    return { valid: true, data: data as T, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    return `${path ? `${path}: ` : ''}${error.message ?? 'Validation error'}`;
  });
  return { valid: false, data: null, errors };
}
