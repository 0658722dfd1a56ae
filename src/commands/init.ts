/**
 * Initialize a taskforge directory.
 *
 * Writes a default taskforge.config.json and creates the workspace and state
 * directories it names.
 */

import { access, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { CLI_NAME, CONFIG_FILE_NAME } from '../lib/branding.js';
import { DEFAULT_CONFIG } from '../lib/config.js';
import { atomicWriteJson } from '../lib/fs.js';

export interface InitOptions {
  /** Overwrite an existing config file */
  force?: boolean;
  /** Directory to initialize (default: cwd) */
  dir?: string;
}

export interface InitResult {
  configPath: string;
  written: boolean;
  reason?: string;
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

export async function initCommand(options: InitOptions = {}): Promise<InitResult> {
  const root = resolve(options.dir ?? process.cwd());
  const configPath = join(root, CONFIG_FILE_NAME);

  if ((await exists(configPath)) && !options.force) {
    const reason = `File already exists: ${configPath} (use --force to overwrite)`;
    console.log(`[SKIP] ${reason}`);
    return { configPath, written: false, reason };
  }

  await atomicWriteJson(configPath, DEFAULT_CONFIG);
  await mkdir(join(root, DEFAULT_CONFIG.workspace_root), { recursive: true });
  await mkdir(join(root, DEFAULT_CONFIG.state_dir), { recursive: true });

  console.log(`[OK] Wrote ${configPath}`);
  console.log(`\nNext: ${CLI_NAME} run "<goal>"`);
  return { configPath, written: true };
}
