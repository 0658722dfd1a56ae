/**
 * taskforge type definitions.
 *
 * This module exports all public types for the taskforge project.
 */

export type {
  EngineConfig,
  SecurityLevel,
  ModelRole,
  ModelMapping,
  InfraRetryConfig,
  SandboxConfig,
  ModelCliConfig,
  ProjectEngineSettings,
} from './config.js';

export type {
  TaskStatus,
  CreateFileKind,
  RunCommandKind,
  TaskKind,
  TaskKindType,
  ModelUsage,
  AttemptArtifact,
  AttemptRecord,
  ValidationVerdict,
  TaskOrigin,
  Task,
  TaskSpec,
} from './task.js';
export { TASK_STATUSES, assertNever, taskWriteClaim } from './task.js';

export type { ProjectStatus, ArtifactRecord, ProjectMetrics, ProjectFailure, Project } from './project.js';
export { PROJECT_STATUSES } from './project.js';

export type {
  SemanticDecision,
  SecurityStage,
  SecurityVerdict,
  SemanticAssessment,
  SecurityAnalyzer,
  SecurityStats,
} from './security.js';

export type { ExecutionResult, ExecutionRequest, CommandExecutor } from './executor.js';
export { TIMEOUT_EXIT_CODE } from './executor.js';

export type { ModelRequest, ModelCompletion, ModelProvider } from './model.js';
export { TransientModelError, FatalModelError, isTransientModelError, isFatalModelError, ZERO_USAGE } from './model.js';

export type {
  CorrectionContext,
  PlanResult,
  CorrectionResult,
  Planner,
  TaskOutput,
  AcceptanceOutcome,
  AcceptanceValidator,
  ContentGenerator,
} from './planner.js';

export type { LockInfo } from './lock.js';

export type { FailureCode, ProjectStopCode } from '../constants/failure_codes.js';
export {
  TASK_FAILURE_CODES,
  PROJECT_STOP_CODES,
  isFailureCode,
  isProjectStopCode,
  NON_CONSUMING_FAILURES,
} from '../constants/failure_codes.js';
