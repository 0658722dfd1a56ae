import { extractJson } from '../lib/json-extract.js';
import type { ModelProvider } from '../types/model.js';
import type { AnalyzerResult, SecurityAnalyzer, SemanticAssessment, SemanticDecision } from '../types/security.js';
import type { Task } from '../types/task.js';
import { buildSecurityPrompt } from './prompts.js';

const DECISIONS: readonly SemanticDecision[] = ['allow', 'deny', 'uncertain'];

function isDecision(value: unknown): value is SemanticDecision {
  return typeof value === 'string' && DECISIONS.some((decision) => decision === value);
}

/**
 * Reads the analyzer's verdict. Anything unreadable is `uncertain`, which the
 * security pipeline denies unless running permissive.
 */
export function parseSecurityOutput(text: string): SemanticAssessment {
  const extracted = extractJson(text);
  if (!extracted.success) {
    return { decision: 'uncertain', rationale: `unreadable analyzer output: ${extracted.error}` };
  }
  const value = extracted.data;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { decision: 'uncertain', rationale: 'analyzer output is not a JSON object' };
  }
  const decision = 'decision' in value ? value.decision : undefined;
  const rationale = 'rationale' in value ? value.rationale : undefined;
  const normalized = typeof decision === 'string' ? decision.toLowerCase() : decision;
  if (!isDecision(normalized)) {
    return { decision: 'uncertain', rationale: `analyzer returned unknown decision ${JSON.stringify(decision)}` };
  }
  return { decision: normalized, rationale: typeof rationale === 'string' && rationale !== '' ? rationale : normalized };
}

/**
 * Semantic risk stage backed by the `security_analyzer` model role.
 * Provider errors propagate; the validator turns non-fatal ones into `uncertain`.
 */
export class ModelSecurityAnalyzer implements SecurityAnalyzer {
  constructor(private readonly provider: ModelProvider) {}

  async assess(command: string, task: Task): Promise<AnalyzerResult> {
    const completion = await this.provider.complete({
      role: 'security_analyzer',
      prompt: buildSecurityPrompt(command, task),
      context: { task_id: task.id, task_type: task.kind.type === 'run_command' ? task.kind.task_type : null },
    });
    return { ...parseSecurityOutput(completion.text), usage: completion.usage };
  }
}
