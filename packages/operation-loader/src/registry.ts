/**
 * Toolgate Operation Loader: Operation Registry
 *
 * The OperationRegistry is the authoritative record of every operation the
 * gateway knows about and whether each one may be invoked.
 *
 * Registry invariants:
 * - Operation names are unique; a duplicate registration throws
 * - Descriptors are deep-frozen copies; callers cannot alter a registered
 *   schema through the objects they passed in or got back
 * - The permission gate is consulted at most once per entry; the resulting
 *   status is fixed for the life of the registry
 * - A denied entry is visible through lookup()/snapshot() but resolve()
 *   never yields its handler
 * - A deferred module is imported at most once (single-flight); a failed
 *   import is cached and denies every operation it should have provided
 * - An unresolved deferred entry is loaded first and gated second, so a
 *   broken module reports LOAD_ERROR even where the gate would deny it.
 *   With precheck the gate runs at build time and a denied entry is never
 *   loaded.
 *
 * Two population paths:
 * - register(): eager, the handler is already in memory
 * - registerDeferred(): lazy, only the manifest entry is known until the
 *   first resolve() that needs to execute
 */

import type { Logger } from 'pino';
import { pino } from 'pino';
import {
  GatewayErrorCode,
  LoadError,
  PermissionDeniedError,
  RegistrationStatus,
  UnknownOperationError,
  deepFreeze,
  errorMessage,
} from '@toolgate/kernel';
import type {
  EntryDenial,
  GatewayError,
  ManifestEntry,
  ModuleLoader,
  OperationDescriptor,
  OperationHandler,
  OperationModule,
  PermissionGate,
  RegistryEntry,
} from '@toolgate/kernel';

interface RegistryRecord<S> {
  readonly descriptor: OperationDescriptor;
  status: RegistrationStatus;
  denial?: EntryDenial | undefined;
  handler?: OperationHandler<S> | undefined;
  readonly load?: ModuleLoader<S> | undefined;
  /** Cached so later dispatches fail fast with the original reason. */
  loadError?: LoadError | undefined;
}

/** The outcome of resolving an operation for execution. */
export type ResolveResult<S> =
  | { readonly ok: true; readonly entry: RegistryEntry; readonly handler: OperationHandler<S> }
  | { readonly ok: false; readonly entry?: RegistryEntry | undefined; readonly error: GatewayError };

export interface RegistryOptions {
  readonly logger?: Logger | undefined;
}

export interface DeferredOptions {
  /** Evaluate the permission gate now rather than on first dispatch. */
  readonly precheck: boolean;
}

/**
 * Registry of operations and their registration status.
 *
 * `S` is the services type the registered handlers expect.
 */
export class OperationRegistry<S> {
  private readonly records: Map<string, RegistryRecord<S>> = new Map();
  /** module_id → in-flight or settled import. Never evicted. */
  private readonly moduleLoads: Map<string, Promise<OperationModule<S>>> = new Map();
  /** name → in-flight materialization, shared by concurrent resolvers. */
  private readonly pending: Map<string, Promise<ResolveResult<S>>> = new Map();
  private readonly logger: Logger;

  /**
   * @param gate - Permission gate consulted once per entry
   * @param options - Optional pino logger (silent when omitted)
   */
  constructor(
    private readonly gate: PermissionGate,
    options: RegistryOptions = {},
  ) {
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ component: 'registry' });
  }

  /**
   * Register an operation whose handler is already in memory.
   *
   * The permission gate is consulted immediately and the status fixed.
   *
   * @param moduleId - Catalog key of the module the handler came from
   * @throws {Error} If an operation with the same name is already registered
   */
  register(moduleId: string, handler: OperationHandler<S>): RegistryEntry {
    const record: RegistryRecord<S> = {
      descriptor: deepFreeze<OperationDescriptor>({
        name: handler.name,
        description: handler.description,
        category: handler.category,
        action: handler.action,
        mutating: handler.mutating,
        input_schema: structuredClone(handler.input_schema),
        output_schema: structuredClone(handler.output_schema),
        handler_ref: { kind: 'resident', module_id: moduleId },
      }),
      status: RegistrationStatus.Unresolved,
      handler,
    };
    this.insert(record);
    this.evaluate(record);
    return toEntry(record);
  }

  /**
   * Register an operation from its manifest entry without importing it.
   *
   * @param entry - Validated manifest entry
   * @param load - Imports the module named by `entry.module_id`
   * @param opts - `precheck: true` evaluates the gate now
   * @throws {Error} If an operation with the same name is already registered
   */
  registerDeferred(entry: ManifestEntry, load: ModuleLoader<S>, opts: DeferredOptions): RegistryEntry {
    const record: RegistryRecord<S> = {
      descriptor: deepFreeze<OperationDescriptor>({
        name: entry.name,
        description: entry.description,
        category: entry.category,
        action: entry.action,
        mutating: entry.mutating,
        input_schema: structuredClone(entry.input_schema),
        output_schema: structuredClone(entry.output_schema),
        handler_ref: { kind: 'deferred', module_id: entry.module_id },
      }),
      status: RegistrationStatus.Unresolved,
      load,
    };
    this.insert(record);
    if (opts.precheck) {
      this.evaluate(record);
    }
    return toEntry(record);
  }

  /** Enumeration lookup. Never loads anything or consults the gate. */
  lookup(name: string): RegistryEntry | undefined {
    const record = this.records.get(name);
    return record === undefined ? undefined : toEntry(record);
  }

  /** All entries in registration order. */
  snapshot(): ReadonlyArray<RegistryEntry> {
    return Array.from(this.records.values()).map(toEntry);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Resolve an operation for execution.
   *
   * Imports the handler if it is not resident, then evaluates the gate if
   * the entry is still unresolved. Concurrent calls for the same name share
   * one in-flight resolution; concurrent calls for different operations of
   * the same module share one import. Never rejects.
   */
  async resolve(name: string): Promise<ResolveResult<S>> {
    const record = this.records.get(name);
    if (record === undefined) {
      return { ok: false, error: new UnknownOperationError(name) };
    }
    if (record.status === RegistrationStatus.Denied) {
      return { ok: false, entry: toEntry(record), error: denialError(record) };
    }
    if (record.handler !== undefined) {
      return this.admit(record, record.handler);
    }

    const inflight = this.pending.get(name);
    if (inflight !== undefined) {
      return inflight;
    }
    const materializing = this.materialize(record).finally(() => {
      this.pending.delete(name);
    });
    this.pending.set(name, materializing);
    return materializing;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private insert(record: RegistryRecord<S>): void {
    const { name } = record.descriptor;
    if (this.records.has(name)) {
      throw new Error(
        `Operation already registered: ${name}. Duplicate operation names are not permitted.`,
      );
    }
    this.records.set(name, record);
  }

  /** Consult the gate and fix the status. Called at most once per record. */
  private evaluate(record: RegistryRecord<S>): void {
    const { name, category, action } = record.descriptor;
    if (this.gate.allowed(category, action)) {
      record.status = RegistrationStatus.Callable;
      return;
    }
    record.status = RegistrationStatus.Denied;
    record.denial = {
      code: GatewayErrorCode.PermissionDenied,
      message: new PermissionDeniedError(name, category, action).message,
    };
    this.logger.info({ operation: name, category, action }, 'operation denied by permission gate');
  }

  private async materialize(record: RegistryRecord<S>): Promise<ResolveResult<S>> {
    const { descriptor } = record;
    const moduleId = descriptor.handler_ref.module_id;
    try {
      if (record.load === undefined) {
        throw new Error(`no loader registered for module '${moduleId}'`);
      }
      const module = await this.loadModule(moduleId, record.load);
      const handler = module.operations.find((op) => op.name === descriptor.name);
      if (handler === undefined) {
        throw new Error(`module '${moduleId}' does not provide this operation`);
      }
      if (handler.category !== descriptor.category || handler.action !== descriptor.action) {
        throw new Error(
          `manifest is stale: manifest declares ${descriptor.action} on ${descriptor.category}, ` +
            `handler declares ${handler.action} on ${handler.category}`,
        );
      }
      record.handler = handler;
      this.logger.debug({ operation: descriptor.name, module: moduleId }, 'deferred handler loaded');
      return this.admit(record, handler);
    } catch (err: unknown) {
      const error = new LoadError(descriptor.name, errorMessage(err));
      record.status = RegistrationStatus.Denied;
      record.denial = { code: GatewayErrorCode.LoadError, message: error.message };
      record.loadError = error;
      this.logger.error({ operation: descriptor.name, module: moduleId, err: errorMessage(err) }, 'deferred handler failed to load');
      return { ok: false, entry: toEntry(record), error };
    }
  }

  /** Gate a resident handler, evaluating once if the entry is unresolved. */
  private admit(record: RegistryRecord<S>, handler: OperationHandler<S>): ResolveResult<S> {
    if (record.status === RegistrationStatus.Unresolved) {
      this.evaluate(record);
    }
    if (record.status === RegistrationStatus.Denied) {
      return { ok: false, entry: toEntry(record), error: denialError(record) };
    }
    return { ok: true, entry: toEntry(record), handler };
  }

  private loadModule(moduleId: string, load: ModuleLoader<S>): Promise<OperationModule<S>> {
    const existing = this.moduleLoads.get(moduleId);
    if (existing !== undefined) {
      return existing;
    }
    const loading = Promise.resolve()
      .then(load)
      .then((module) => {
        if (module.module_id !== moduleId) {
          throw new Error(`catalog key '${moduleId}' loaded module '${module.module_id}'`);
        }
        return module;
      });
    this.moduleLoads.set(moduleId, loading);
    return loading;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toEntry<S>(record: RegistryRecord<S>): RegistryEntry {
  return {
    descriptor: record.descriptor,
    status: record.status,
    resident: record.handler !== undefined,
    ...(record.denial !== undefined ? { denial: record.denial } : {}),
  };
}

function denialError<S>(record: RegistryRecord<S>): GatewayError {
  const { name, category, action } = record.descriptor;
  return record.loadError ?? new PermissionDeniedError(name, category, action);
}
