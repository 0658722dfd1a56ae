/**
 * TypeScript interfaces for taskforge.config.json.
 *
 * The configuration is loaded once per run, deep-frozen, and injected into the
 * engine and every service it builds. Nothing reads it from a global.
 */

/**
 * How the security pipeline treats an `uncertain` semantic assessment.
 *
 * - 'strict': uncertain is denied (fail-closed)
 * - 'permissive': uncertain is allowed, logged loudly on every use
 */
export type SecurityLevel = 'strict' | 'permissive';

/**
 * Roles a Model Provider is asked to play.
 */
export type ModelRole = 'planner' | 'code_generator' | 'validator' | 'security_analyzer';

/**
 * Model identifier per role.
 */
export type ModelMapping = Readonly<Record<ModelRole, string>>;

/**
 * Bounded exponential backoff for infrastructure failures
 * (model-provider transients, container start failures).
 */
export interface InfraRetryConfig {
  /** Total attempts, including the first call */
  readonly max_attempts: number;
  /** Delay before the second attempt */
  readonly base_delay_ms: number;
  /** Cap on a single delay */
  readonly max_delay_ms: number;
}

/**
 * Container settings for the sandboxed executor.
 */
export interface SandboxConfig {
  /** Container runtime CLI (argv[0]) */
  readonly docker_command: string;
  /** Memory limit in megabytes */
  readonly memory_mb: number;
  /** CPU quota (fractional cores) */
  readonly cpus: number;
  /** Maximum processes inside the container */
  readonly pids_limit: number;
  /** uid:gid the command runs as */
  readonly user: string;
}

/**
 * Settings for the CLI-backed Model Provider.
 *
 * The prompt is written to the child's stdin; argv never carries it.
 */
export interface ModelCliConfig {
  /** Command to invoke */
  readonly command: string;
  /** Arguments; `{{model}}` is replaced by the role's model */
  readonly args: readonly string[];
  /** Per-call timeout */
  readonly timeout_seconds: number;
}

/**
 * Complete engine configuration.
 */
export interface EngineConfig {
  /** Config format version */
  readonly version: string;
  /** Directory holding one workspace per project */
  readonly workspace_root: string;
  /** Directory holding persisted project state */
  readonly state_dir: string;
  /** Loop iterations allowed per project run */
  readonly max_project_iterations: number;
  /** Attempts allowed per task before it is failed and escalated */
  readonly max_iterations_per_task: number;
  /** Ready tasks dispatched together (1 = sequential) */
  readonly max_parallel_tasks: number;
  /** Handling of uncertain semantic verdicts */
  readonly security_level: SecurityLevel;
  /** Model per role */
  readonly model_mapping: ModelMapping;
  /** Programs a command may start with */
  readonly command_whitelist: readonly string[];
  /** Regular expressions that always deny a command */
  readonly pattern_blacklist: readonly string[];
  /** Image for sandboxed commands */
  readonly docker_image: string;
  /** Wall-clock limit for one sandboxed command */
  readonly timeout_seconds: number;
  /** Task types whose commands get network access */
  readonly network_enabled_tasks: readonly string[];
  /** Per-stream capture limit for command output */
  readonly max_output_bytes: number;
  /** Workspace-relative globs an artifact may never be written to */
  readonly artifact_forbidden_globs: readonly string[];
  /** Backoff for infrastructure failures */
  readonly infra_retry: InfraRetryConfig;
  /** Container settings */
  readonly sandbox: SandboxConfig;
  /** CLI-backed Model Provider settings */
  readonly model_cli: ModelCliConfig;
}

/**
 * Subset of the configuration recorded on each project.
 */
export interface ProjectEngineSettings {
  max_project_iterations: number;
  max_iterations_per_task: number;
  timeout_seconds: number;
}
