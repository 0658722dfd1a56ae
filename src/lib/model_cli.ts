/**
 * Model Provider backed by a command-line model client.
 *
 * Each call spawns the configured command with the role's model substituted
 * into its arguments and writes the prompt to stdin. The client is expected
 * to print either plain text or a JSON envelope carrying a `result` string.
 */

import type { ModelCliConfig, ModelMapping } from '../types/config.js';
import type { ModelCompletion, ModelProvider, ModelRequest } from '../types/model.js';
import { FatalModelError, TransientModelError } from '../types/model.js';
import type { ModelUsage } from '../types/task.js';
import { tryParse } from './json-extract.js';
import { runBounded } from './process.js';
import type { CommandRunner } from './process.js';

const MAX_OUTPUT_BYTES = 8 * 1024 * 1024;

/**
 * Output fragments that mean the connection, not the request, failed.
 */
const TRANSIENT_PATTERNS = [
  'Connection stalled',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'socket hang up',
  'rate limit',
  'overloaded',
  '429',
  '503',
] as const;

/**
 * The transient pattern found in the output, or null.
 *
 * @example
 * ```typescript
 * matchTransientPattern('request failed: socket hang up'); // 'socket hang up'
 * ```
 */
export function matchTransientPattern(output: string): string | null {
  const lower = output.toLowerCase();
  return TRANSIENT_PATTERNS.find((pattern) => lower.includes(pattern.toLowerCase())) ?? null;
}

/**
 * Arguments with `{{model}}` replaced.
 */
export function buildModelArgs(args: readonly string[], model: string): string[] {
  return args.map((arg) => arg.replace(/\{\{model\}\}/g, model));
}

/**
 * Prompt text sent on stdin; context, when present, follows as a JSON block.
 */
export function renderPrompt(request: ModelRequest): string {
  if (!request.context || Object.keys(request.context).length === 0) {
    return request.prompt;
  }
  return `${request.prompt}\n\nContext:\n\`\`\`json\n${JSON.stringify(request.context, null, 2)}\n\`\`\`\n`;
}

function readNumber(source: unknown, key: string): number {
  if (typeof source !== 'object' || source === null || !(key in source)) return 0;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Extracts the model text and usage from the client's stdout.
 *
 * A JSON object with a string `result` is an envelope; usage is read from
 * `total_cost_usd` and `usage.input_tokens` + `usage.output_tokens` when
 * present. Anything else is taken as the text itself.
 */
export function parseModelOutput(stdout: string): ModelCompletion {
  const trimmed = stdout.trim();
  const attempt = tryParse(trimmed);
  const parsed: unknown = attempt.ok ? attempt.value : null;

  if (typeof parsed === 'object' && parsed !== null && 'result' in parsed && typeof parsed.result === 'string') {
    const usageSource: unknown = 'usage' in parsed ? parsed.usage : null;
    const usage: ModelUsage = {
      cost_usd: readNumber(parsed, 'total_cost_usd'),
      tokens: readNumber(usageSource, 'input_tokens') + readNumber(usageSource, 'output_tokens'),
    };
    return { text: parsed.result, usage };
  }
  return { text: trimmed, usage: { cost_usd: 0, tokens: 0 } };
}

/**
 * Calls a model CLI once per request.
 *
 * Timeouts and connection-level failures raise TransientModelError; a
 * missing binary or any other non-zero exit raises FatalModelError.
 */
export class CliModelProvider implements ModelProvider {
  constructor(
    private readonly cli: ModelCliConfig,
    private readonly models: ModelMapping,
    private readonly runner: CommandRunner = runBounded
  ) {}

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const model = this.models[request.role];
    const args = buildModelArgs(this.cli.args, model);
    const result = await this.runner(this.cli.command, args, {
      timeoutMs: this.cli.timeout_seconds * 1000,
      maxOutputBytes: MAX_OUTPUT_BYTES,
      input: renderPrompt(request),
    });

    if (result.spawn_error !== null) {
      throw new FatalModelError(`Model CLI '${this.cli.command}' could not be started: ${result.spawn_error}`, request.role);
    }
    if (result.timed_out) {
      throw new TransientModelError(
        `Model CLI timed out after ${this.cli.timeout_seconds}s (role=${request.role}, model=${model})`,
        request.role
      );
    }
    if (result.exit_code !== 0) {
      const output = `${result.stderr}\n${result.stdout}`.trim();
      const pattern = matchTransientPattern(output);
      const summary = output.length > 500 ? `${output.slice(0, 500)}...` : output;
      if (pattern !== null) {
        throw new TransientModelError(
          `Model CLI exited ${result.exit_code} (${pattern}): ${summary}`,
          request.role
        );
      }
      throw new FatalModelError(`Model CLI exited ${result.exit_code}: ${summary}`, request.role);
    }

    return parseModelOutput(result.stdout);
  }
}
