/**
 * Bounded child-process execution.
 *
 * Runs a program with an argv array (never through a shell), enforces a
 * wall-clock timeout and caps how much of each output stream is kept.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { TIMEOUT_EXIT_CODE } from '../types/executor.js';

export interface BoundedRunOptions {
  /** 0 disables the timeout */
  timeoutMs: number;
  /** Per-stream byte cap */
  maxOutputBytes: number;
  /** Written to stdin, which is then closed */
  input?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * Called once when the timeout fires, before the child is killed.
   * The sandbox uses it to kill the container itself.
   */
  onTimeout?: () => Promise<void>;
}

export interface BoundedRunResult {
  exit_code: number;
  stdout: string;
  stderr: string;
  stdout_truncated: boolean;
  stderr_truncated: boolean;
  duration_ms: number;
  timed_out: boolean;
  /** Set when the program could not be started at all */
  spawn_error: string | null;
}

/**
 * Process runner seam; tests substitute a fake.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: BoundedRunOptions
) => Promise<BoundedRunResult>;

/**
 * Accumulates a stream up to a byte limit.
 */
class BoundedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    const bytes = Buffer.concat(this.chunks);
    return (this.truncated ? trimPartialUtf8(bytes) : bytes).toString('utf-8');
  }
}

/**
 * Drops a multi-byte UTF-8 sequence cut off at the end of `bytes`.
 */
export function trimPartialUtf8(bytes: Buffer): Buffer {
  for (let i = bytes.length - 1; i >= Math.max(0, bytes.length - 4); i--) {
    const byte = bytes[i];
    if (byte === undefined || (byte & 0xc0) === 0x80) continue;
    const expected = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return bytes.length - i < expected ? bytes.subarray(0, i) : bytes;
  }
  return bytes;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) return 1;
  const number = constants.signals[signal];
  return typeof number === 'number' ? 128 + number : 1;
}

/**
 * Runs `command` with `args` and resolves once it has exited.
 *
 * Never rejects: a program that cannot be started resolves with
 * `spawn_error` set, and a timeout resolves with `timed_out: true` and exit
 * code 124.
 *
 * @example
 * ```typescript
 * const result = await runBounded('docker', ['run', '--rm', 'alpine', 'true'], {
 *   timeoutMs: 300_000,
 *   maxOutputBytes: 1024 * 1024,
 * });
 * ```
 */
export function runBounded(command: string, args: readonly string[], options: BoundedRunOptions): Promise<BoundedRunResult> {
  const startTime = Date.now();
  const stdout = new BoundedBuffer(options.maxOutputBytes);
  const stderr = new BoundedBuffer(options.maxOutputBytes);

  return new Promise<BoundedRunResult>((resolve) => {
    let settled = false;
    let timedOut = false;
    let timeoutId: NodeJS.Timeout | null = null;

    const finish = (exitCode: number, spawnError: string | null): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve({
        exit_code: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
        stdout: stdout.text(),
        stderr: stderr.text(),
        stdout_truncated: stdout.truncated,
        stderr_truncated: stderr.truncated,
        duration_ms: Date.now() - startTime,
        timed_out: timedOut,
        spawn_error: spawnError,
      });
    };

    const child = spawn(command, [...args], {
      shell: false,
      stdio: ['pipe', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env,
    });

    child.stdout.on('data', (data: Buffer) => stdout.push(data));
    child.stderr.on('data', (data: Buffer) => stderr.push(data));

    // A child that exits without reading stdin raises EPIPE here
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') {
        stderr.push(Buffer.from(`\n[stdin error: ${error.message}]`));
      }
    });
    child.stdin.end(options.input ?? '');

    child.on('error', (error: Error) => {
      finish(127, error.message);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      finish(code ?? signalExitCode(signal), null);
    });

    if (options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        const hook = options.onTimeout ?? (() => Promise.resolve());
        const killChild = (): void => {
          child.kill('SIGKILL');
        };
        hook().then(killChild, (error: unknown) => {
          console.warn(`[SANDBOX] Timeout hook failed: ${error instanceof Error ? error.message : String(error)}`);
          killChild();
        });
      }, options.timeoutMs);
    }
  });
}
