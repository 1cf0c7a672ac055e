/**
 * Helpers shared by every command: option resolution and startup error
 * reporting.
 */

import type { Command } from 'commander';
import { loadConfig } from '@toolgate/runtime-host';
import type { ToolgateConfig } from '@toolgate/runtime-host';
import { globalOptions } from '../options.js';
import { renderIssues } from '../render.js';
import { StartupError, buildRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';

/** Build the gateway for a command, or print the startup issues and exit 1. */
export async function runtimeFor(command: Command): Promise<Runtime> {
  try {
    return await buildRuntime(globalOptions(command.optsWithGlobals()));
  } catch (err: unknown) {
    if (err instanceof StartupError) {
      process.stderr.write(renderIssues(err.message, err.issues));
      process.exit(1);
    }
    throw err;
  }
}

/** Load configuration only, for commands that never dispatch. */
export function configFor(command: Command): ToolgateConfig {
  const globals = globalOptions(command.optsWithGlobals());
  const loaded = loadConfig({
    configPath: globals.config,
    home: globals.home,
    mode: globals.mode,
    logLevel: globals.logLevel,
  });
  if (!loaded.ok) {
    process.stderr.write(renderIssues('Invalid configuration', loaded.errors));
    process.exit(1);
  }
  return loaded.value;
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}
