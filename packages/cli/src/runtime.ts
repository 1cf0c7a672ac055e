/**
 * Toolgate CLI: Runtime Assembly
 *
 * buildRuntime() wires one gateway for one command invocation:
 *
 *   1. loadConfig (file, environment, CLI options)
 *   2. createLogger at the configured level
 *   3. PermissionGate over the config and process environment
 *   4. registry: eager import of the catalog, or lazy from the manifest
 *   5. OperationGateway with a FileLogSink under <home>/logs
 *
 * Every startup problem is raised as a StartupError carrying the issues,
 * which commands print before exiting with code 1.
 */

import type { DestinationStream, Logger } from 'pino';
import { ConfirmationProtocol, PermissionGate, errorMessage } from '@toolgate/kernel';
import type { HandlerCatalog, ValidationIssue } from '@toolgate/kernel';
import { OperationGateway } from '@toolgate/gateway';
import {
  ManifestValidator,
  buildEagerRegistry,
  buildLazyRegistry,
} from '@toolgate/operation-loader';
import type { OperationRegistry, RegistryFilter } from '@toolgate/operation-loader';
import { NETWORK_CATALOG, createMemoryServices } from '@toolgate/module-network';
import type { NetworkServices } from '@toolgate/module-network';
import {
  FileLogSink,
  FileStateIO,
  createLogger,
  loadConfig,
  readJsonFile,
} from '@toolgate/runtime-host';
import type { StateIO, ToolgateConfig } from '@toolgate/runtime-host';
import type { GlobalOptions } from './options.js';

export class StartupError extends Error {
  constructor(
    message: string,
    readonly issues: ReadonlyArray<ValidationIssue>,
  ) {
    super(message);
    this.name = 'StartupError';
  }
}

export interface Runtime {
  readonly config: ToolgateConfig;
  readonly logger: Logger;
  readonly gate: PermissionGate;
  readonly registry: OperationRegistry<NetworkServices>;
  readonly gateway: OperationGateway<NetworkServices>;
  readonly stateIO: StateIO;
}

export interface RuntimeOptions {
  /** Defaults to process.env. Also the permission override source. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  readonly catalog?: HandlerCatalog<NetworkServices> | undefined;
  readonly services?: NetworkServices | undefined;
  readonly stateIO?: StateIO | undefined;
  readonly logDestination?: DestinationStream | undefined;
}

export async function buildRuntime(globals: GlobalOptions, options: RuntimeOptions = {}): Promise<Runtime> {
  const env = options.env ?? process.env;
  const loaded = loadConfig({
    configPath: globals.config,
    home: globals.home,
    mode: globals.mode,
    logLevel: globals.logLevel,
    env,
  });
  if (!loaded.ok) {
    throw new StartupError('Invalid configuration', loaded.errors);
  }
  const config = loaded.value;

  const logger = createLogger({ level: config.logging.level, destination: options.logDestination });
  const gate = new PermissionGate(config.permissions, env);
  const catalog = options.catalog ?? NETWORK_CATALOG;
  const filter: RegistryFilter = {
    categories: config.registration.enabledCategories,
    operations: config.registration.enabledOperations,
  };

  const registry =
    config.registration.mode === 'lazy'
      ? lazyRegistry(config, catalog, gate, filter, logger)
      : (await buildEagerRegistry(catalog, gate, { filter, logger })).registry;

  if (config.confirmation.autoConfirm) {
    logger.warn('auto-confirm is on: mutating operations execute without a preview step');
  }

  const stateIO = options.stateIO ?? new FileStateIO(config.home);
  const gateway = new OperationGateway<NetworkServices>({
    registry,
    services: options.services ?? createMemoryServices(),
    confirmation: new ConfirmationProtocol(config.confirmation.autoConfirm),
    logger,
    logSink: new FileLogSink(stateIO),
    maxPayloadChars: config.logging.maxPayloadChars,
  });

  return { config, logger, gate, registry, gateway, stateIO };
}

function lazyRegistry(
  config: ToolgateConfig,
  catalog: HandlerCatalog<NetworkServices>,
  gate: PermissionGate,
  filter: RegistryFilter,
  logger: Logger,
): OperationRegistry<NetworkServices> {
  const path = config.registration.manifestPath;
  const raw = readJsonFile(path);
  if (!raw.ok) {
    throw new StartupError(`Cannot read manifest (run 'toolgate manifest' to generate it)`, raw.errors);
  }
  const manifest = new ManifestValidator().validate(raw.value);
  if (!manifest.ok) {
    throw new StartupError(`Invalid manifest: ${path}`, manifest.errors);
  }
  try {
    return buildLazyRegistry(manifest.value, catalog, gate, {
      precheck: config.registration.precheck,
      filter,
      logger,
    });
  } catch (err: unknown) {
    throw new StartupError(`Invalid manifest: ${path}`, [{ message: errorMessage(err), context: path }]);
  }
}
