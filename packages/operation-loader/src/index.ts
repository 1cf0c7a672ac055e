/**
 * @toolgate/operation-loader
 *
 * Operation registry (eager and lazy), registry builders, and manifest
 * generation and validation.
 */

export type { ResolveResult, RegistryOptions, DeferredOptions } from './registry.js';
export { OperationRegistry } from './registry.js';

export type {
  RegistryFilter,
  EagerBuildOptions,
  EagerBuildResult,
  LazyBuildOptions,
  ModuleLoadFailure,
} from './builder.js';
export { admits, buildEagerRegistry, buildLazyRegistry } from './builder.js';

export type { GenerateOptions } from './manifest.js';
export { generateManifest } from './manifest.js';

export { ManifestValidator } from './validator.js';
