/**
 * taskforge library utilities.
 *
 * This module exports the public building blocks of the engine. The engine
 * itself lives in runner/.
 */

export {
  atomicWriteFile,
  atomicWriteJson,
  atomicReadJson,
  cleanupTmpFiles,
  isNotFound,
  AtomicFsError,
} from './fs.js';

export {
  loadConfig,
  resolveConfig,
  findConfigFile,
  validateConfig,
  applyDefaults,
  projectSettings,
  ConfigError,
  DEFAULT_CONFIG,
} from './config.js';

export { CONFIG_FILE_NAME, PROJECT_STATE_FILE, PROJECT_LOCK_FILE } from './branding.js';

export {
  getBootId,
  isPidRunning,
  isLockStale,
  acquireLock,
  releaseLock,
  withLock,
  LockHeldError,
  LockCorruptError,
} from './lock.js';

export { extractJson } from './json-extract.js';
export type { JsonExtractResult, ExtractMethod } from './json-extract.js';

export { loadSchema, validateWithSchema, schemaPath } from './schema.js';
export type { SchemaName, ValidationResult } from './schema.js';

export { withRetry, backoffDelay, retryOptionsFrom, RetryingModelProvider } from './retry.js';
export type { RetryOptions } from './retry.js';

export { runBounded } from './process.js';
export type { BoundedRunOptions, BoundedRunResult, CommandRunner } from './process.js';

export {
  SecurityValidator,
  sanitizeCommand,
  splitShellWords,
  leadingToken,
  structuralWarnings,
} from './security.js';
export type { StaticCheck, LeadingTokenResult } from './security.js';

export {
  DockerSandbox,
  InfrastructureError,
  isInfrastructureError,
  isNetworkEnabled,
  buildDockerArgs,
  containerNameFor,
} from './sandbox.js';
export type { SandboxSettings } from './sandbox.js';

export {
  ArtifactStore,
  ArtifactConflictError,
  ArtifactPathError,
  hashContent,
  normalizeArtifactPath,
} from './artifacts.js';
export type { PutOptions, PutResult } from './artifacts.js';

export {
  TaskQueue,
  DuplicateTaskError,
  UnknownTaskError,
  InvalidTransitionError,
} from './task_queue.js';
export type { DependencyDeadlock, QueueState } from './task_queue.js';

export {
  ProjectStore,
  ProjectNotFoundError,
  StateCorruptError,
  createProject,
  newProjectId,
} from './project_store.js';

export { CliModelProvider, parseModelOutput, matchTransientPattern } from './model_cli.js';
