/**
 * Toolgate Runtime Host: Home Directory Resolution
 *
 * Precedence (highest to lowest):
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. TOOLGATE_HOME environment variable
 *   3. Default: ~/.toolgate
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     config.json          optional configuration file
 *     tools-manifest.json  default lazy-mode manifest location
 *     logs/
 *       decisions.jsonl
 *
 * The directory is not created here; writers create what they need.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV = 'TOOLGATE_HOME';
export const DEFAULT_HOME_DIRNAME = '.toolgate';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  /** Environment to read TOOLGATE_HOME from. Defaults to process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

/** Resolve the toolgate home directory to an absolute path. */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  if (opts.home !== undefined && opts.home !== '') {
    return resolve(opts.home);
  }
  const fromEnv = env[HOME_ENV];
  if (fromEnv !== undefined && fromEnv !== '') {
    return resolve(fromEnv);
  }
  return join(homedir(), DEFAULT_HOME_DIRNAME);
}
