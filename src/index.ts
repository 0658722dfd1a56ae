#!/usr/bin/env node

import { Command } from "commander";
import { CLI_NAME } from "./lib/branding.js";
import { ConfigError, loadConfig } from "./lib/config.js";
import { LockCorruptError, LockHeldError } from "./lib/lock.js";
import { ProjectNotFoundError, StateCorruptError } from "./lib/project_store.js";
import { ProjectCompletedError, ProjectNotResumableError } from "./runner/engine.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

/**
 * Errors a user can act on get one line; anything else gets the stack.
 */
function reportError(context: string, error: unknown): never {
  if (
    error instanceof ConfigError ||
    error instanceof ProjectNotFoundError ||
    error instanceof StateCorruptError ||
    error instanceof LockHeldError ||
    error instanceof LockCorruptError ||
    error instanceof ProjectCompletedError ||
    error instanceof ProjectNotResumableError
  ) {
    console.error(`${context}: ${error.message}`);
  } else {
    console.error(`${context}:`, error);
  }
  process.exit(1);
}

program
  .name(CLI_NAME)
  .description("Goal-driven task orchestration with sandboxed, policy-gated command execution")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    const opts: { config?: string } = thisCommand.opts();
    globalConfigPath = opts.config;
  });

program
  .command("init")
  .description(`Write a default configuration in the current directory`)
  .option("-f, --force", "Overwrite an existing configuration file")
  .action(async (options: { force?: boolean }) => {
    try {
      const { initCommand } = await import("./commands/init.js");
      await initCommand({ force: options.force });
    } catch (error) {
      reportError("Failed to initialize", error);
    }
  });

program
  .command("run")
  .description("Plan a goal and run it to completion")
  .argument("<goal>", "What to build")
  .action(async (goal: string) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { runCommand, exitCodeFor } = await import("./commands/run.js");
      const project = await runCommand(goal, config);
      process.exitCode = exitCodeFor(project);
    } catch (error) {
      reportError("Run failed", error);
    }
  });

program
  .command("resume")
  .description("Continue a persisted project from where it stopped")
  .argument("<projectId>", "Project id")
  .action(async (projectId: string) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { resumeCommand, exitCodeFor } = await import("./commands/run.js");
      const project = await resumeCommand(projectId, config);
      process.exitCode = exitCodeFor(project);
    } catch (error) {
      reportError("Resume failed", error);
    }
  });

program
  .command("status")
  .description("Show a project's state, or list projects")
  .argument("[projectId]", "Project id")
  .option("--json", "Output in JSON format")
  .action(async (projectId: string | undefined, options: { json?: boolean }) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { statusCommand } = await import("./commands/status.js");
      await statusCommand(projectId, config, { json: options.json });
    } catch (error) {
      reportError("Status failed", error);
    }
  });

program
  .command("graph")
  .description("Print a project's task graph as Mermaid")
  .argument("<projectId>", "Project id")
  .action(async (projectId: string) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { graphCommand } = await import("./commands/graph.js");
      await graphCommand(projectId, config);
    } catch (error) {
      reportError("Graph failed", error);
    }
  });

program
  .command("check-command")
  .description("Run a command through the static security stages without executing it")
  .argument("<command>", "Command line to check")
  .option("--task-type <type>", "Task type, for the network decision")
  .option("--json", "Output in JSON format")
  .action(async (command: string, options: { taskType?: string; json?: boolean }) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { checkCommand } = await import("./commands/check_command.js");
      const result = checkCommand(command, config, options);
      if (!result.check.passed) process.exitCode = 1;
    } catch (error) {
      reportError("Check failed", error);
    }
  });

program
  .command("doctor")
  .description("Check the container runtime and model CLI")
  .action(async () => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { doctorCommand } = await import("./commands/doctor.js");
      const result = await doctorCommand(config);
      if (!result.ok) process.exitCode = 1;
    } catch (error) {
      reportError("Doctor failed", error);
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
