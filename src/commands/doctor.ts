/**
 * `doctor`: check that the configured collaborators are reachable.
 */

import { runBounded } from '../lib/process.js';
import type { CommandRunner } from '../lib/process.js';
import { DockerSandbox } from '../lib/sandbox.js';
import type { EngineConfig } from '../types/config.js';

export interface DoctorResult {
  ok: boolean;
  issues: string[];
}

export async function doctorCommand(config: EngineConfig, runner: CommandRunner = runBounded): Promise<DoctorResult> {
  const issues: string[] = [];

  const docker = config.sandbox.docker_command;
  if (await new DockerSandbox(config, runner).checkAvailable()) {
    console.log(`[OK] Container runtime (${docker}) is available`);
  } else {
    console.log(`[FAIL] Container runtime (${docker}) is not available`);
    issues.push(`'${docker} version' failed; commands cannot run`);
  }

  const cli = config.model_cli.command;
  const version = await runner(cli, ['--version'], { timeoutMs: 10_000, maxOutputBytes: 64 * 1024 });
  if (version.spawn_error === null && !version.timed_out && version.exit_code === 0) {
    console.log(`[OK] Model CLI (${cli}) is available: ${version.stdout.trim()}`);
  } else {
    console.log(`[FAIL] Model CLI (${cli}) is not available`);
    issues.push(`Model CLI '${cli}' is not installed or not in PATH`);
  }

  if (config.security_level === 'permissive') {
    console.log('[WARN] security_level is permissive: uncertain commands will run');
  }

  console.log('\n--- Summary ---');
  if (issues.length === 0) {
    console.log('All checks passed.');
  } else {
    console.log(`Found ${issues.length} issue(s):\n`);
    for (const issue of issues) console.log(`  - ${issue}`);
  }
  return { ok: issues.length === 0, issues };
}
