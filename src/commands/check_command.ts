/**
 * `check-command`: run a command line through the static security stages
 * (sanitization, whitelist, blacklist) without executing it or calling a model.
 */

import { isNetworkEnabled } from '../lib/sandbox.js';
import { SecurityValidator } from '../lib/security.js';
import type { StaticCheck } from '../lib/security.js';
import type { EngineConfig } from '../types/config.js';

export interface CheckCommandOptions {
  taskType?: string;
  json?: boolean;
}

export interface CheckCommandResult {
  check: StaticCheck;
  network_enabled: boolean;
}

export function checkCommand(command: string, config: EngineConfig, options: CheckCommandOptions = {}): CheckCommandResult {
  const check = new SecurityValidator(config, null).checkStatic(command);
  const taskType = options.taskType ?? 'command';
  const result: CheckCommandResult = { check, network_enabled: isNetworkEnabled(taskType, config.network_enabled_tasks) };

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  if (check.passed) {
    console.log(`[PASS] ${check.sanitized}`);
    console.log('  static stages passed; the semantic stage decides at run time');
    for (const warning of check.warnings) console.log(`  warning: ${warning}`);
  } else {
    console.log(`[DENY] ${check.verdict.sanitized_command || '(empty)'}`);
    console.log(`  stage: ${check.verdict.stage}`);
    console.log(`  rationale: ${check.verdict.rationale}`);
  }
  console.log(`  network (${taskType}): ${result.network_enabled ? 'bridge' : 'none'}`);
  return result;
}
