/**
 * Runner module exports and default wiring.
 */

import { CliModelProvider } from '../lib/model_cli.js';
import { ProjectStore } from '../lib/project_store.js';
import { retryOptionsFrom, RetryingModelProvider } from '../lib/retry.js';
import { DockerSandbox } from '../lib/sandbox.js';
import type { EngineConfig } from '../types/config.js';
import type { ModelProvider } from '../types/model.js';
import { Engine } from './engine.js';
import type { EngineDeps } from './engine.js';
import { ModelContentGenerator } from './generator.js';
import { ModelPlanner } from './planner.js';
import { ModelSecurityAnalyzer } from './security_analyzer.js';
import { ModelAcceptanceValidator } from './validator.js';

export { Engine, ProjectCompletedError, ProjectNotResumableError, installSignalHandlers, describeDeadlock } from './engine.js';
export type { EngineDeps } from './engine.js';
export { ModelPlanner, PlanValidationError, parsePlannerOutput, materializeSpecs, formatTaskId } from './planner.js';
export { ModelContentGenerator, stripWholeFence } from './generator.js';
export { ModelAcceptanceValidator, ValidatorOutputError, parseValidatorOutput } from './validator.js';
export { ModelSecurityAnalyzer, parseSecurityOutput } from './security_analyzer.js';
export { runAttempt, selectBatch } from './dispatch.js';
export { settleAttempt, beginAttempt, interruptInProgress } from './task_machine.js';
export type { AttemptOutcome, Settlement } from './task_machine.js';

/**
 * Builds an engine on the default collaborators: the configured model CLI
 * (with transient errors retried) for every model role, and Docker for
 * commands. Any collaborator can be replaced through `overrides`.
 */
export function createEngine(config: EngineConfig, overrides: Partial<Omit<EngineDeps, 'config'>> = {}): Engine {
  const provider: ModelProvider = new RetryingModelProvider(
    new CliModelProvider(config.model_cli, config.model_mapping),
    retryOptionsFrom(config.infra_retry, 'model')
  );

  return new Engine({
    config,
    store: overrides.store ?? new ProjectStore(config.state_dir),
    planner: overrides.planner ?? new ModelPlanner(provider),
    generator: overrides.generator ?? new ModelContentGenerator(provider),
    validator: overrides.validator ?? new ModelAcceptanceValidator(provider),
    analyzer: overrides.analyzer === undefined ? new ModelSecurityAnalyzer(provider) : overrides.analyzer,
    executor: overrides.executor ?? new DockerSandbox(config),
    sleep: overrides.sleep,
    now: overrides.now,
  });
}
