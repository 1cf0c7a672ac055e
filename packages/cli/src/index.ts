/**
 * @toolgate/cli
 *
 * The `toolgate` command-line interface, plus the runtime assembly it is
 * built on for embedding a configured gateway elsewhere.
 */

export { program } from './commands/index.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { StartupError, buildRuntime } from './runtime.js';
export type { GlobalOptions } from './options.js';
export { GlobalOptionsSchema, globalOptions } from './options.js';
export type { PermissionRow } from './permission-matrix.js';
export { permissionMatrix } from './permission-matrix.js';
