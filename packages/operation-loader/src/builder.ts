/**
 * Toolgate Operation Loader: Registry Builders
 *
 * Explicit construction of an OperationRegistry from a handler catalog.
 * Nothing here runs at import time; the host calls one builder once at
 * startup and passes the result to the gateway.
 *
 * - buildEagerRegistry(): imports every module and registers live handlers
 * - buildLazyRegistry(): registers from a validated manifest; modules are
 *   imported on first dispatch
 */

import type { Logger } from 'pino';
import { pino } from 'pino';
import { errorMessage } from '@toolgate/kernel';
import type {
  HandlerCatalog,
  OperationCategory,
  OperationHandler,
  OperationManifest,
  PermissionGate,
} from '@toolgate/kernel';
import { OperationRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

/**
 * Restricts which operations are registered at all.
 *
 * When `operations` is non-empty it wins and `categories` is ignored.
 * Empty or absent lists impose no restriction.
 */
export interface RegistryFilter {
  readonly categories?: ReadonlyArray<OperationCategory> | undefined;
  readonly operations?: ReadonlyArray<string> | undefined;
}

/** True if the filter admits an operation. */
export function admits(
  filter: RegistryFilter | undefined,
  name: string,
  category: OperationCategory,
): boolean {
  if (filter === undefined) {
    return true;
  }
  const { operations, categories } = filter;
  if (operations !== undefined && operations.length > 0) {
    return operations.includes(name);
  }
  if (categories !== undefined && categories.length > 0) {
    return categories.includes(category);
  }
  return true;
}

// ---------------------------------------------------------------------------
// Eager
// ---------------------------------------------------------------------------

export interface EagerBuildOptions {
  readonly filter?: RegistryFilter | undefined;
  readonly logger?: Logger | undefined;
}

export interface ModuleLoadFailure {
  readonly module_id: string;
  readonly message: string;
}

export interface EagerBuildResult<S> {
  readonly registry: OperationRegistry<S>;
  /** Modules that failed to import. Their operations are absent. */
  readonly failures: ReadonlyArray<ModuleLoadFailure>;
}

/**
 * Import every catalog module and register each of its operations.
 *
 * A module that fails to import is logged and reported; the others still
 * register. A duplicate operation name across modules throws.
 */
export async function buildEagerRegistry<S>(
  catalog: HandlerCatalog<S>,
  gate: PermissionGate,
  options: EagerBuildOptions = {},
): Promise<EagerBuildResult<S>> {
  const logger = options.logger ?? pino({ level: 'silent' });
  const registry = new OperationRegistry<S>(gate, { logger });
  const failures: ModuleLoadFailure[] = [];

  for (const [moduleId, load] of catalog) {
    let operations: ReadonlyArray<OperationHandler<S>>;
    try {
      const module = await load();
      if (module.module_id !== moduleId) {
        throw new Error(`catalog key '${moduleId}' loaded module '${module.module_id}'`);
      }
      operations = module.operations;
    } catch (err: unknown) {
      failures.push({ module_id: moduleId, message: errorMessage(err) });
      logger.error({ module: moduleId, err: errorMessage(err) }, 'module failed to import');
      continue;
    }

    for (const handler of operations) {
      if (admits(options.filter, handler.name, handler.category)) {
        registry.register(moduleId, handler);
      }
    }
  }

  logger.info({ mode: 'eager', operations: registry.size, failures: failures.length }, 'registry built');
  return { registry, failures };
}

// ---------------------------------------------------------------------------
// Lazy
// ---------------------------------------------------------------------------

export interface LazyBuildOptions {
  /** Evaluate the permission gate for every entry at startup. */
  readonly precheck?: boolean | undefined;
  readonly filter?: RegistryFilter | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Register every manifest entry as a deferred operation.
 *
 * No handler code is imported.
 *
 * @param manifest - A manifest already accepted by ManifestValidator
 * @throws {Error} If an entry names a module the catalog does not contain
 */
export function buildLazyRegistry<S>(
  manifest: OperationManifest,
  catalog: HandlerCatalog<S>,
  gate: PermissionGate,
  options: LazyBuildOptions = {},
): OperationRegistry<S> {
  const logger = options.logger ?? pino({ level: 'silent' });
  const registry = new OperationRegistry<S>(gate, { logger });
  const precheck = options.precheck ?? false;

  for (const entry of manifest.operations) {
    const load = catalog.get(entry.module_id);
    if (load === undefined) {
      throw new Error(
        `Manifest operation ${entry.name} names unknown module '${entry.module_id}'`,
      );
    }
    if (admits(options.filter, entry.name, entry.category)) {
      registry.registerDeferred(entry, load, { precheck });
    }
  }

  logger.info({ mode: 'lazy', operations: registry.size, precheck }, 'registry built');
  return registry;
}
