/**
 * Docker-backed sandboxed executor.
 *
 * Each command runs in a fresh `docker run --rm` container with the project
 * workspace as the only writable mount. Network access is granted per task
 * type. A container that cannot be started is an infrastructure problem and
 * throws; a command that runs and fails is an ordinary result.
 */

import { randomBytes } from 'node:crypto';
import { resolve } from 'node:path';
import type { EngineConfig } from '../types/config.js';
import type { CommandExecutor, ExecutionRequest, ExecutionResult } from '../types/executor.js';
import { runBounded } from './process.js';
import type { CommandRunner } from './process.js';

/** Exit status docker uses when the container itself could not be run */
export const DOCKER_START_FAILURE_EXIT = 125;

/** What docker writes to stderr when it, not the command, failed */
const DOCKER_ERROR_OUTPUT = /^docker: |Error response from daemon|Unable to find image/m;

/**
 * `docker run` passes the command's own exit status through, so 125 alone
 * does not mean the container failed to start. Docker's own error output
 * decides.
 */
export function isContainerStartFailure(exitCode: number, stderr: string): boolean {
  return exitCode === DOCKER_START_FAILURE_EXIT && DOCKER_ERROR_OUTPUT.test(stderr);
}

/**
 * The execution environment is broken (runtime missing, daemon down, image
 * unavailable). Not the task's fault; retried with backoff by the caller.
 */
export class InfrastructureError extends Error {
  constructor(
    message: string,
    public readonly component: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InfrastructureError';
  }
}

export function isInfrastructureError(error: unknown): error is InfrastructureError {
  return error instanceof InfrastructureError;
}

export type SandboxSettings = Pick<
  EngineConfig,
  'docker_image' | 'timeout_seconds' | 'network_enabled_tasks' | 'max_output_bytes' | 'sandbox'
>;

/**
 * Whether commands of this task type may reach the network.
 */
export function isNetworkEnabled(taskType: string, networkEnabledTasks: readonly string[]): boolean {
  return networkEnabledTasks.includes(taskType);
}

/**
 * Unique, docker-safe container name for a task.
 */
export function containerNameFor(taskId: string): string {
  const safeId = taskId.toLowerCase().replace(/[^a-z0-9_.-]/g, '-');
  return `taskforge-${safeId}-${randomBytes(4).toString('hex')}`;
}

/**
 * argv for `docker run`.
 */
export function buildDockerArgs(
  settings: SandboxSettings,
  request: ExecutionRequest,
  containerName: string,
  networkEnabled: boolean
): string[] {
  const limits = settings.sandbox;
  const args = [
    'run',
    '--rm',
    '--name',
    containerName,
    '--network',
    networkEnabled ? 'bridge' : 'none',
    '--read-only',
    '--tmpfs',
    '/tmp:rw,noexec,nosuid,size=64m',
    '--cap-drop',
    'ALL',
    '--security-opt',
    'no-new-privileges',
    '--memory',
    `${limits.memory_mb}m`,
    '--cpus',
    String(limits.cpus),
    '--pids-limit',
    String(limits.pids_limit),
  ];
  if (limits.user) {
    args.push('--user', limits.user);
  }
  args.push(
    '--volume',
    `${resolve(request.workspace_dir)}:/workspace:rw`,
    '--workdir',
    '/workspace',
    settings.docker_image,
    'sh',
    '-c',
    request.command
  );
  return args;
}

/**
 * Executes already-allowed commands in throwaway containers.
 *
 * @example
 * ```typescript
 * const sandbox = new DockerSandbox(config);
 * const result = await sandbox.execute({
 *   command: 'pip install -r requirements.txt',
 *   task_type: 'dependency_install',
 *   workspace_dir: '/srv/taskforge/workspaces/p1',
 *   task_id: 'T003',
 * });
 * ```
 */
export class DockerSandbox implements CommandExecutor {
  constructor(
    private readonly settings: SandboxSettings,
    private readonly runner: CommandRunner = runBounded
  ) {}

  /**
   * @throws {InfrastructureError} If the container could not be started
   */
  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const networkEnabled = isNetworkEnabled(request.task_type, this.settings.network_enabled_tasks);
    const name = containerNameFor(request.task_id);
    const docker = this.settings.sandbox.docker_command;
    const args = buildDockerArgs(this.settings, request, name, networkEnabled);

    console.log(
      `[SANDBOX] ${request.task_id}: starting ${name} (network=${networkEnabled ? 'bridge' : 'none'}, timeout=${this.settings.timeout_seconds}s)`
    );

    const result = await this.runner(docker, args, {
      timeoutMs: this.settings.timeout_seconds * 1000,
      maxOutputBytes: this.settings.max_output_bytes,
      onTimeout: () => this.killContainer(name),
    });

    if (result.spawn_error !== null) {
      throw new InfrastructureError(`Could not run '${docker}': ${result.spawn_error}`, 'sandbox');
    }
    if (!result.timed_out && isContainerStartFailure(result.exit_code, result.stderr)) {
      throw new InfrastructureError(
        `Container for task ${request.task_id} failed to start: ${result.stderr.trim() || 'no error output'}`,
        'sandbox'
      );
    }

    if (result.timed_out) {
      console.warn(`[SANDBOX] ${request.task_id}: killed ${name} after ${this.settings.timeout_seconds}s`);
    }

    return {
      exit_code: result.exit_code,
      stdout: result.stdout,
      stderr: result.stderr,
      stdout_truncated: result.stdout_truncated,
      stderr_truncated: result.stderr_truncated,
      duration_ms: result.duration_ms,
      timed_out: result.timed_out,
      network_enabled: networkEnabled,
      container_name: name,
    };
  }

  /**
   * Whether the container runtime answers at all.
   */
  async checkAvailable(): Promise<boolean> {
    const result = await this.runner(this.settings.sandbox.docker_command, ['version'], {
      timeoutMs: 5_000,
      maxOutputBytes: 64 * 1024,
    });
    return result.spawn_error === null && !result.timed_out && result.exit_code === 0;
  }

  private async killContainer(name: string): Promise<void> {
    const result = await this.runner(this.settings.sandbox.docker_command, ['kill', name], {
      timeoutMs: 10_000,
      maxOutputBytes: 64 * 1024,
    });
    if (result.exit_code !== 0) {
      console.warn(`[SANDBOX] docker kill ${name} exited ${result.exit_code}: ${result.stderr.trim()}`);
    }
  }
}
