/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to find, load, default, validate and freeze the engine
 * configuration. The returned value is immutable for the whole run.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { CONFIG_FILE_NAME } from './branding.js';
import type { EngineConfig, ModelRole, ProjectEngineSettings } from '../types/config.js';

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const MODEL_ROLES: readonly ModelRole[] = ['planner', 'code_generator', 'validator', 'security_analyzer'];

/**
 * Defaults applied to any key the config file leaves out.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  version: '1',
  workspace_root: 'taskforge/workspaces',
  state_dir: 'taskforge/state',
  max_project_iterations: 100,
  max_iterations_per_task: 4,
  max_parallel_tasks: 1,
  security_level: 'strict',
  model_mapping: {
    planner: 'opus',
    code_generator: 'sonnet',
    validator: 'sonnet',
    security_analyzer: 'haiku',
  },
  command_whitelist: ['ls', 'cat', 'python', 'pip', 'mkdir', 'touch', 'echo', 'git', 'sh'],
  pattern_blacklist: [
    'sudo',
    'rm\\s+-[a-z]*[rf][a-z]*\\s+/',
    'rm -rf',
    'mkfs',
    'chmod .*777',
    '> ?/dev/',
    'dd\\s+.*of=/dev/',
    '/etc/(passwd|shadow|sudoers)',
    'curl.*\\|\\s*(bash|sh|python)',
    ':\\(\\)\\s*\\{\\s*:\\|:&\\s*\\};:',
  ],
  docker_image: 'python:3.11-slim',
  timeout_seconds: 300,
  network_enabled_tasks: ['dependency_install', 'git_clone'],
  max_output_bytes: 1024 * 1024,
  artifact_forbidden_globs: ['.git/**', '**/.env', '**/.env.*'],
  infra_retry: {
    max_attempts: 3,
    base_delay_ms: 1000,
    max_delay_ms: 10_000,
  },
  sandbox: {
    docker_command: 'docker',
    memory_mb: 512,
    cpus: 1,
    pids_limit: 256,
    user: '1000:1000',
  },
  model_cli: {
    command: 'claude',
    args: ['-p', '--output-format', 'json', '--model', '{{model}}'],
    timeout_seconds: 600,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Merges a raw config object over the defaults. Nested sections are merged
 * one level deep so a file may override a single model or limit.
 */
export function applyDefaults(raw: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...raw };
  for (const section of ['model_mapping', 'infra_retry', 'sandbox', 'model_cli'] as const) {
    const override = raw[section];
    if (override === undefined) continue;
    merged[section] = isRecord(override) ? { ...DEFAULT_CONFIG[section], ...override } : override;
  }
  return merged;
}

/**
 * Validates that an object conforms to the EngineConfig interface.
 *
 * Structural problems return false; problems that deserve a specific message
 * (an uncompilable blacklist pattern) throw ConfigError.
 */
export function validateConfig(config: unknown): config is EngineConfig {
  if (!isRecord(config)) return false;
  const c = config;

  if (typeof c.version !== 'string') return false;
  if (typeof c.workspace_root !== 'string' || c.workspace_root === '') return false;
  if (typeof c.state_dir !== 'string' || c.state_dir === '') return false;
  if (!isPositiveInteger(c.max_project_iterations)) return false;
  if (!isPositiveInteger(c.max_iterations_per_task)) return false;
  if (!isPositiveInteger(c.max_parallel_tasks)) return false;
  if (c.security_level !== 'strict' && c.security_level !== 'permissive') return false;

  if (!isRecord(c.model_mapping)) return false;
  const mapping = c.model_mapping;
  for (const role of MODEL_ROLES) {
    if (typeof mapping[role] !== 'string' || mapping[role] === '') return false;
  }

  if (!isStringArray(c.command_whitelist)) return false;
  if (!isStringArray(c.pattern_blacklist)) return false;
  for (const pattern of c.pattern_blacklist) {
    try {
      new RegExp(pattern, 'i');
    } catch (error) {
      throw new ConfigError(
        `pattern_blacklist entry '${pattern}' is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  if (typeof c.docker_image !== 'string' || c.docker_image === '') return false;
  if (!isPositiveNumber(c.timeout_seconds)) return false;
  if (!isStringArray(c.network_enabled_tasks)) return false;
  if (!isPositiveInteger(c.max_output_bytes)) return false;
  if (!isStringArray(c.artifact_forbidden_globs)) return false;

  if (!isRecord(c.infra_retry)) return false;
  const retry = c.infra_retry;
  if (!isPositiveInteger(retry.max_attempts)) return false;
  if (typeof retry.base_delay_ms !== 'number' || retry.base_delay_ms < 0) return false;
  if (typeof retry.max_delay_ms !== 'number' || retry.max_delay_ms < 0) return false;

  if (!isRecord(c.sandbox)) return false;
  const sandbox = c.sandbox;
  if (typeof sandbox.docker_command !== 'string' || sandbox.docker_command === '') return false;
  if (!isPositiveInteger(sandbox.memory_mb)) return false;
  if (!isPositiveNumber(sandbox.cpus)) return false;
  if (!isPositiveInteger(sandbox.pids_limit)) return false;
  if (typeof sandbox.user !== 'string') return false;

  if (!isRecord(c.model_cli)) return false;
  const cli = c.model_cli;
  if (typeof cli.command !== 'string' || cli.command === '') return false;
  if (!isStringArray(cli.args)) return false;
  if (!isPositiveNumber(cli.timeout_seconds)) return false;

  return true;
}

/**
 * Recursively freezes a value so the configuration cannot drift mid-run.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Builds a frozen configuration from a raw object (file content or test input).
 *
 * @throws {ConfigError} If the merged value is invalid
 */
export function resolveConfig(raw: unknown, configPath?: string): EngineConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration file: expected a JSON object', configPath);
  }

  const merged = applyDefaults(raw);
  if (!validateConfig(merged)) {
    throw new ConfigError(
      'Invalid configuration file: structure does not match expected schema',
      configPath
    );
  }

  // Structured clone detaches nested arrays from DEFAULT_CONFIG before freezing
  const config = deepFreeze(structuredClone(merged));
  if (config.security_level === 'permissive') {
    console.warn(
      '[SECURITY] security_level=permissive: commands the security analyzer cannot judge will be ALLOWED. This weakens fail-closed execution.'
    );
  }
  return config;
}

/**
 * Searches for a configuration file by walking upward from the current directory.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    const exists = await access(configPath).then(
      () => true,
      () => false
    );
    if (exists) return configPath;

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Loads, defaults, validates and freezes the configuration.
 *
 * Relative `workspace_root` and `state_dir` resolve against the directory
 * holding the config file.
 *
 * @param configPath - Explicit path; when omitted the file is searched upward
 * @throws {ConfigError} If the config file cannot be found, read, or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const config = await loadConfig('/path/to/taskforge.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<EngineConfig> {
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (!found) {
      throw new ConfigError(
        `Configuration file not found. Expected ${CONFIG_FILE_NAME} in current directory or parent directories.`
      );
    }
    resolvedPath = found;
  }

  let rawConfig: unknown;
  try {
    rawConfig = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(
        `Failed to read configuration file: ${error.message}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  if (isRecord(rawConfig)) {
    const baseDir = dirname(resolvedPath);
    for (const key of ['workspace_root', 'state_dir'] as const) {
      const value = rawConfig[key] ?? DEFAULT_CONFIG[key];
      if (typeof value === 'string' && value !== '') {
        rawConfig[key] = resolve(baseDir, value);
      }
    }
  }

  return resolveConfig(rawConfig, resolvedPath);
}

/**
 * Limits recorded on each project.
 */
export function projectSettings(config: EngineConfig): ProjectEngineSettings {
  return {
    max_project_iterations: config.max_project_iterations,
    max_iterations_per_task: config.max_iterations_per_task,
    timeout_seconds: config.timeout_seconds,
  };
}
