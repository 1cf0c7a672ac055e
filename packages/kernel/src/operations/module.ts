/**
 * Toolgate Kernel: Operation Modules and Catalogs
 *
 * A module groups the operations for one resource family and is the unit of
 * lazy loading: the first dispatch of any operation in a deferred module
 * imports the whole module once.
 */

import type { OperationHandler } from './define.js';

export interface OperationModule<S> {
  /** Catalog key; must match the key the module is registered under. */
  readonly module_id: string;
  readonly operations: ReadonlyArray<OperationHandler<S>>;
}

/** Imports a module. Typically wraps a dynamic `import()`. */
export type ModuleLoader<S> = () => Promise<OperationModule<S>>;

/**
 * The handler source: every module the gateway may serve, keyed by
 * module id. Nothing is imported until a loader is called.
 */
export type HandlerCatalog<S> = ReadonlyMap<string, ModuleLoader<S>>;
