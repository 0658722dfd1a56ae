/**
 * Sandboxed executor type definitions.
 */

/**
 * Outcome of one sandboxed command.
 */
export interface ExecutionResult {
  /** Process exit code (124 when timed out) */
  exit_code: number;
  stdout: string;
  stderr: string;
  stdout_truncated: boolean;
  stderr_truncated: boolean;
  duration_ms: number;
  timed_out: boolean;
  /** Whether the container had network access */
  network_enabled: boolean;
  /** Name given to the container */
  container_name: string;
}

/**
 * A command that already passed the security pipeline.
 */
export interface ExecutionRequest {
  command: string;
  /** Declared task type; decides network access */
  task_type: string;
  /** Host directory mounted as the container's only writable path */
  workspace_dir: string;
  /** Correlates the container with the task */
  task_id: string;
}

/**
 * Executor contract used by the engine.
 */
export interface CommandExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionResult>;
}

/** Exit code reported for a command killed on timeout */
export const TIMEOUT_EXIT_CODE = 124;
