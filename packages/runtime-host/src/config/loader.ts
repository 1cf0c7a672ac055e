/**
 * Toolgate Runtime Host: Configuration Loader
 *
 * Resolves, reads, validates and normalizes configuration into the typed
 * ToolgateConfig the CLI builds its runtime from.
 *
 * Config file precedence:
 *   1. Explicit path (--config)
 *   2. TOOLGATE_CONFIG
 *   3. <home>/config.json, if it exists
 *   4. none: built-in defaults
 * An explicitly named file (1 or 2) that does not exist is an error.
 *
 * Value precedence, per setting: CLI option > environment > file > default.
 *
 * Relative manifest paths in the file resolve against the file's directory
 * (or the home directory when no file is used). Paths from the environment
 * or the CLI resolve against the working directory.
 *
 * Permission override variables (TOOLGATE_PERMISSIONS_*) are not read here:
 * the permission gate consults them directly at evaluation time.
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { isTruthy, parseCategory } from '@toolgate/kernel';
import type {
  ActionPermissions,
  OperationCategory,
  PermissionConfig,
  ValidationIssue,
  ValidationResult,
} from '@toolgate/kernel';
import { resolveHome } from '../home.js';
import { readJsonFile } from '../json-file.js';
import { isLogLevel } from '../logging/logger.js';
import type { LogLevel } from '../logging/logger.js';
import { ConfigFileSchema, REGISTRATION_MODES } from './schema.js';
import type { ConfigFile, RegistrationMode } from './schema.js';

export const CONFIG_FILENAME = 'config.json';

export const ENV = {
  config: 'TOOLGATE_CONFIG',
  mode: 'TOOLGATE_REGISTRATION_MODE',
  manifest: 'TOOLGATE_MANIFEST',
  autoConfirm: 'TOOLGATE_AUTO_CONFIRM',
  logLevel: 'TOOLGATE_LOG_LEVEL',
  enabledCategories: 'TOOLGATE_ENABLED_CATEGORIES',
  enabledOperations: 'TOOLGATE_ENABLED_OPERATIONS',
} as const;

/** Fully resolved runtime configuration. */
export interface ToolgateConfig {
  readonly home: string;
  /** The config file that was read, if any. */
  readonly source: string | undefined;
  readonly registration: {
    readonly mode: RegistrationMode;
    /** Absolute path. */
    readonly manifestPath: string;
    readonly precheck: boolean;
    readonly enabledCategories: ReadonlyArray<OperationCategory>;
    readonly enabledOperations: ReadonlyArray<string>;
  };
  readonly permissions: PermissionConfig;
  readonly confirmation: { readonly autoConfirm: boolean };
  readonly logging: { readonly level: LogLevel; readonly maxPayloadChars: number };
}

export interface LoadConfigOptions {
  readonly configPath?: string | undefined;
  readonly home?: string | undefined;
  readonly mode?: string | undefined;
  readonly logLevel?: string | undefined;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

export function loadConfig(options: LoadConfigOptions = {}): ValidationResult<ToolgateConfig> {
  const env = options.env ?? process.env;
  const home = resolveHome({ home: options.home, env });

  const source = locateConfigFile(options.configPath, env, home);
  let raw: unknown = {};
  if (source !== undefined) {
    const read = readJsonFile(source);
    if (!read.ok) {
      return read;
    }
    raw = read.value;
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => ({
        message: issue.message,
        context: issue.path.length > 0 ? issue.path.map(String).join('.') : (source ?? 'config'),
      })),
    };
  }

  return normalize(parsed.data, { env, home, source, options });
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function locateConfigFile(
  explicit: string | undefined,
  env: Readonly<Record<string, string | undefined>>,
  home: string,
): string | undefined {
  if (explicit !== undefined && explicit !== '') {
    return resolve(explicit);
  }
  const fromEnv = env[ENV.config];
  if (fromEnv !== undefined && fromEnv !== '') {
    return resolve(fromEnv);
  }
  const inHome = join(home, CONFIG_FILENAME);
  return existsSync(inHome) ? inHome : undefined;
}

interface NormalizeContext {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly home: string;
  readonly source: string | undefined;
  readonly options: LoadConfigOptions;
}

function normalize(file: ConfigFile, ctx: NormalizeContext): ValidationResult<ToolgateConfig> {
  const { env, options } = ctx;
  const errors: ValidationIssue[] = [];

  const permissions = normalizePermissions(file.permissions, errors);

  const modeText = options.mode ?? nonEmpty(env[ENV.mode]) ?? file.registration.mode;
  const mode = REGISTRATION_MODES.find((m) => m === modeText.trim().toLowerCase());
  if (mode === undefined) {
    errors.push({
      message: `Unknown registration mode '${modeText}'. Expected one of: ${REGISTRATION_MODES.join(', ')}`,
      context: 'registration.mode',
    });
  }

  const levelText = options.logLevel ?? nonEmpty(env[ENV.logLevel]) ?? file.logging.level;
  const level = isLogLevel(levelText) ? levelText : undefined;
  if (level === undefined) {
    errors.push({ message: `Unknown log level '${levelText}'`, context: 'logging.level' });
  }

  const manifestFromEnv = nonEmpty(env[ENV.manifest]);
  const manifestPath =
    manifestFromEnv !== undefined
      ? resolve(manifestFromEnv)
      : resolve(ctx.source !== undefined ? dirname(ctx.source) : ctx.home, file.registration.manifest);

  const categoryNames = splitList(env[ENV.enabledCategories]) ?? file.registration.enabled_categories;
  const enabledCategories: OperationCategory[] = [];
  for (const name of categoryNames) {
    const category = parseCategory(name);
    if (category === undefined) {
      errors.push({ message: `Unknown category '${name}'`, context: 'registration.enabled_categories' });
    } else {
      enabledCategories.push(category);
    }
  }
  const enabledOperations = splitList(env[ENV.enabledOperations]) ?? file.registration.enabled_operations;

  const autoConfirmEnv = env[ENV.autoConfirm];
  const autoConfirm = autoConfirmEnv !== undefined ? isTruthy(autoConfirmEnv) : file.confirmation.auto_confirm;

  if (errors.length > 0 || mode === undefined || level === undefined) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: {
      home: ctx.home,
      source: ctx.source,
      registration: {
        mode,
        manifestPath,
        precheck: file.registration.precheck,
        enabledCategories,
        enabledOperations,
      },
      permissions,
      confirmation: { autoConfirm },
      logging: { level, maxPayloadChars: file.logging.max_payload_chars },
    },
  };
}

function normalizePermissions(
  raw: Readonly<Record<string, ActionPermissions>>,
  errors: ValidationIssue[],
): PermissionConfig {
  const categories: Partial<Record<OperationCategory, ActionPermissions>> = {};
  let defaults: ActionPermissions | undefined;

  for (const [key, actions] of Object.entries(raw)) {
    if (key.trim().toLowerCase() === 'default') {
      defaults = actions;
      continue;
    }
    const category = parseCategory(key);
    if (category === undefined) {
      errors.push({ message: `Unknown permission category '${key}'`, context: `permissions.${key}` });
      continue;
    }
    if (categories[category] !== undefined) {
      errors.push({
        message: `Category '${category}' is configured more than once`,
        context: `permissions.${key}`,
      });
      continue;
    }
    categories[category] = actions;
  }

  return defaults !== undefined ? { categories, default: defaults } : { categories };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/** Comma-separated list, trimmed, blanks dropped. Undefined when unset. */
function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
