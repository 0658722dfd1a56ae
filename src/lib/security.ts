/**
 * Command security pipeline for RunCommand tasks.
 *
 * Stages run in order after sanitization and stop at the first DENY:
 *
 * 1. whitelist: the leading shell word must be a configured program name
 * 2. blacklist: no configured pattern may match the full command
 * 3. semantic: the security analyzer judges intent given the task
 *
 * The pipeline is fail-closed. An `uncertain` semantic result, or an analyzer
 * that throws, is DENY unless `security_level` is `permissive`, in which case
 * it is allowed and flagged on the verdict and in the log every time. A fatal
 * model error from the analyzer is not a verdict and propagates.
 */

import type { EngineConfig } from '../types/config.js';
import { isFatalModelError, ZERO_USAGE } from '../types/model.js';
import type {
  AnalyzerResult,
  SecurityAnalyzer,
  SecurityStage,
  SecurityStats,
  SecurityVerdict,
} from '../types/security.js';
import type { ModelUsage, Task } from '../types/task.js';

type SecuritySettings = Pick<EngineConfig, 'command_whitelist' | 'pattern_blacklist' | 'security_level'>;

const PROGRAM_NAME = /^[A-Za-z0-9_.-]+$/;

/**
 * Removes control characters and collapses whitespace.
 */
export function sanitizeCommand(command: string): string {
  return command
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Splits a command line into words using POSIX shell quoting rules
 * (single quotes, double quotes, backslash escapes).
 *
 * @returns Words, or null when a quote is left open
 */
export function splitShellWords(command: string): string[] | null {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < command.length; i++) {
    const char = command[i];

    if (quote === "'") {
      if (char === "'") quote = null;
      else current += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
        current += command[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      inWord = true;
    } else if (char === '\\' && i + 1 < command.length) {
      current += command[++i];
      inWord = true;
    } else if (/\s/.test(char)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += char;
      inWord = true;
    }
  }

  if (quote !== null) return null;
  if (inWord) words.push(current);
  return words;
}

export type LeadingTokenResult =
  | { ok: true; token: string }
  | { ok: false; reason: string };

/**
 * Extracts and checks the program a command starts with.
 */
export function leadingToken(command: string): LeadingTokenResult {
  const words = splitShellWords(command);
  if (words === null) {
    return { ok: false, reason: 'command could not be parsed (unbalanced quotes)' };
  }
  const token = words[0];
  if (token === undefined || token === '') {
    return { ok: false, reason: 'command has no program name' };
  }
  if (token.includes('..') || token.includes('/')) {
    return { ok: false, reason: `program '${token}' is given with a path; only bare names are allowed` };
  }
  if (!PROGRAM_NAME.test(token)) {
    return { ok: false, reason: `program '${token}' contains characters outside [A-Za-z0-9_.-]` };
  }
  return { ok: true, token };
}

/**
 * Observations about command shape that do not decide the verdict.
 */
export function structuralWarnings(command: string): string[] {
  const warnings: string[] = [];
  if (command.includes('|') && /\b(rm|dd|mkfs)\b/.test(command)) {
    warnings.push('pipe combined with a destructive tool');
  }
  if (command.includes('>>') && command.includes('/etc/')) {
    warnings.push('append redirection into /etc');
  }
  if (command.includes(';') || command.includes('&&') || command.includes('||')) {
    warnings.push('multiple commands chained on one line');
  }
  if (/\/\*/.test(command)) {
    warnings.push('wildcard on an absolute path');
  }
  return warnings;
}

/**
 * Result of the stages that need no model call.
 */
export type StaticCheck =
  | { passed: true; sanitized: string; warnings: string[] }
  | { passed: false; verdict: SecurityVerdict };

function emptyStats(): SecurityStats {
  return {
    validations: 0,
    denied: 0,
    denied_by_stage: { sanitize: 0, whitelist: 0, blacklist: 0, semantic: 0 },
    permissive_overrides: 0,
  };
}

/**
 * Verdict plus the analyzer's model usage (zero when the semantic stage was
 * not reached).
 */
export interface SecurityEvaluation {
  verdict: SecurityVerdict;
  usage: ModelUsage;
}

/**
 * Runs commands through the security stages and keeps counters.
 *
 * @example
 * ```typescript
 * const validator = new SecurityValidator(config, analyzer);
 * const verdict = await validator.validate('pip install -r requirements.txt', task);
 * if (verdict.decision === 'deny') console.warn(verdict.rationale);
 * ```
 */
export class SecurityValidator {
  private readonly whitelist: ReadonlySet<string>;
  private readonly blacklist: ReadonlyArray<{ source: string; regex: RegExp }>;
  private readonly counters: SecurityStats = emptyStats();

  constructor(
    private readonly settings: SecuritySettings,
    private readonly analyzer: SecurityAnalyzer | null
  ) {
    this.whitelist = new Set(settings.command_whitelist);
    this.blacklist = settings.pattern_blacklist.map((source) => ({ source, regex: new RegExp(source, 'i') }));
  }

  /**
   * Sanitization, whitelist and blacklist. Pure; does not touch the counters.
   */
  checkStatic(command: string): StaticCheck {
    const sanitized = sanitizeCommand(command);
    const deny = (
      stage: SecurityStage,
      rationale: string,
      fields: { whitelist_match: boolean; blacklist_match: string | null }
    ): StaticCheck => ({
      passed: false,
      verdict: {
        command,
        sanitized_command: sanitized,
        ...fields,
        semantic: null,
        decision: 'deny',
        stage,
        rationale,
        warnings: sanitized ? structuralWarnings(sanitized) : [],
        permissive_override: false,
      },
    });

    if (sanitized === '') {
      return deny('sanitize', 'empty command after sanitization', { whitelist_match: false, blacklist_match: null });
    }

    const token = leadingToken(sanitized);
    if (!token.ok) {
      return deny('whitelist', `not whitelisted: ${token.reason}`, { whitelist_match: false, blacklist_match: null });
    }
    if (!this.whitelist.has(token.token)) {
      return deny('whitelist', `not whitelisted: '${token.token}' is not in command_whitelist`, {
        whitelist_match: false,
        blacklist_match: null,
      });
    }

    const hit = this.blacklist.find(({ regex }) => regex.test(sanitized));
    if (hit) {
      return deny('blacklist', `blacklisted: matches pattern '${hit.source}'`, {
        whitelist_match: true,
        blacklist_match: hit.source,
      });
    }

    return { passed: true, sanitized, warnings: structuralWarnings(sanitized) };
  }

  /**
   * Full pipeline, including the semantic stage.
   *
   * @throws {FatalModelError} When the analyzer fails fatally
   */
  async validate(command: string, task: Task): Promise<SecurityVerdict> {
    return (await this.evaluate(command, task)).verdict;
  }

  /**
   * `validate`, also reporting what the semantic stage cost.
   *
   * @throws {FatalModelError} When the analyzer fails fatally
   */
  async evaluate(command: string, task: Task): Promise<SecurityEvaluation> {
    const check = this.checkStatic(command);
    this.counters.validations++;
    if (!check.passed) {
      return { verdict: this.record(check.verdict), usage: ZERO_USAGE };
    }

    const assessment = await this.assess(check.sanitized, task);
    return { verdict: this.decide(command, check.sanitized, check.warnings, assessment, task), usage: assessment.usage };
  }

  private decide(
    command: string,
    sanitized: string,
    warnings: string[],
    assessment: AnalyzerResult,
    task: Task
  ): SecurityVerdict {
    const base = {
      command,
      sanitized_command: sanitized,
      whitelist_match: true,
      blacklist_match: null,
      semantic: assessment.decision,
      stage: 'semantic' as const,
      warnings,
    };

    switch (assessment.decision) {
      case 'allow':
        return this.record({ ...base, decision: 'allow', rationale: assessment.rationale, permissive_override: false });
      case 'deny':
        return this.record({ ...base, decision: 'deny', rationale: assessment.rationale, permissive_override: false });
      case 'uncertain':
        if (this.settings.security_level === 'permissive') {
          this.counters.permissive_overrides++;
          console.warn(
            `[SECURITY] PERMISSIVE OVERRIDE: allowing uncertain command for task ${task.id}: ${sanitized} (${assessment.rationale})`
          );
          return this.record({
            ...base,
            decision: 'allow',
            rationale: `uncertain, allowed by permissive security_level: ${assessment.rationale}`,
            permissive_override: true,
          });
        }
        return this.record({
          ...base,
          decision: 'deny',
          rationale: `uncertain, denied under strict security_level: ${assessment.rationale}`,
          permissive_override: false,
        });
    }
  }

  /**
   * Copy of the running counters.
   */
  stats(): SecurityStats {
    return { ...this.counters, denied_by_stage: { ...this.counters.denied_by_stage } };
  }

  private async assess(command: string, task: Task): Promise<AnalyzerResult> {
    if (!this.analyzer) {
      return { decision: 'uncertain', rationale: 'no security analyzer configured', usage: ZERO_USAGE };
    }
    try {
      return await this.analyzer.assess(command, task);
    } catch (error) {
      if (isFatalModelError(error)) throw error;
      console.warn(
        `[SECURITY] Analyzer failed for task ${task.id}; treating as uncertain: ${error instanceof Error ? error.message : String(error)}`
      );
      return {
        decision: 'uncertain',
        rationale: `security analyzer error: ${error instanceof Error ? error.message : String(error)}`,
        usage: ZERO_USAGE,
      };
    }
  }

  private record(verdict: SecurityVerdict): SecurityVerdict {
    if (verdict.decision === 'deny') {
      this.counters.denied++;
      this.counters.denied_by_stage[verdict.stage]++;
      console.warn(`[SECURITY] DENY at ${verdict.stage}: ${verdict.sanitized_command} (${verdict.rationale})`);
    }
    return verdict;
  }
}
