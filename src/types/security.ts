/**
 * Security pipeline type definitions.
 */

import type { ModelUsage, Task } from './task.js';

/**
 * Outcome of the semantic risk stage.
 */
export type SemanticDecision = 'allow' | 'deny' | 'uncertain';

/**
 * Stage of the pipeline that produced the final decision.
 */
export type SecurityStage = 'sanitize' | 'whitelist' | 'blacklist' | 'semantic';

/**
 * Verdict for one command, consumed before any execution.
 */
export interface SecurityVerdict {
  /** Command as submitted */
  command: string;
  /** Command after control-character removal and whitespace collapse */
  sanitized_command: string;
  /** Whether the leading token is whitelisted */
  whitelist_match: boolean;
  /** First blacklist pattern that matched, if any */
  blacklist_match: string | null;
  /** Semantic stage result (null when the stage was not reached) */
  semantic: SemanticDecision | null;
  /** Final decision */
  decision: 'allow' | 'deny';
  /** Stage that decided */
  stage: SecurityStage;
  /** Why */
  rationale: string;
  /** Structural observations that did not decide the outcome */
  warnings: string[];
  /** True when permissive mode turned an uncertain verdict into allow */
  permissive_override: boolean;
}

/**
 * Result from the semantic analysis capability.
 */
export interface SemanticAssessment {
  decision: SemanticDecision;
  rationale: string;
}

/**
 * Assessment plus what the analyzer's model call cost.
 */
export interface AnalyzerResult extends SemanticAssessment {
  usage: ModelUsage;
}

/**
 * External capability judging a command's intent and risk.
 */
export interface SecurityAnalyzer {
  assess(command: string, task: Task): Promise<AnalyzerResult>;
}

/**
 * Running counters kept by the validator.
 */
export interface SecurityStats {
  validations: number;
  denied: number;
  denied_by_stage: Record<SecurityStage, number>;
  permissive_overrides: number;
}
