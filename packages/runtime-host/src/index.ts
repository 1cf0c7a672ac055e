/**
 * @toolgate/runtime-host
 *
 * Side-effectful host pieces: configuration loading, home directory
 * resolution, the operational logger, and decision log persistence.
 *
 * The kernel defines interfaces; this package implements them with Node.js
 * built-ins. No kernel code imports from this package.
 */

// Configuration
export type { ToolgateConfig, LoadConfigOptions } from './config/loader.js';
export { loadConfig, CONFIG_FILENAME, ENV } from './config/loader.js';
export type { ConfigFile, RegistrationMode } from './config/schema.js';
export {
  ConfigFileSchema,
  REGISTRATION_MODES,
  DEFAULT_MANIFEST_FILENAME,
} from './config/schema.js';

// Home directory
export type { ResolveHomeOptions } from './home.js';
export { resolveHome, HOME_ENV, DEFAULT_HOME_DIRNAME } from './home.js';

// JSON files
export { readJsonFile, writeJsonFile } from './json-file.js';

// Operational logging
export type { LoggerOptions, LogLevel } from './logging/logger.js';
export { createLogger, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export { REDACT_PATHS, REDACT_CENSOR } from './logging/redaction.js';

// Decision log
export { FileLogSink, DECISION_LOG_FILE } from './logging/file-log-sink.js';
export type {
  DecisionEvent,
  DecisionFilter,
  DecisionReadResult,
  DecisionReadStats,
} from './logging/decision-reader.js';
export { readDecisionLog } from './logging/decision-reader.js';
export type { UlidOptions } from './logging/ulid.js';
export { ulid, monotonicUlid } from './logging/ulid.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
