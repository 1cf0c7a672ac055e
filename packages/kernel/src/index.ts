/**
 * @toolgate/kernel
 *
 * Gateway kernel: operation and wire types, the permission gate, the
 * confirmation protocol, operation definitions, the error taxonomy, and
 * the decision logger.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API, and never reads
 * process.env; the runtime host injects configuration and overrides.
 * node:crypto is used for input hashing (pure computation, not I/O).
 */

// Types
export * from './types/index.js';

// Errors
export {
  GatewayError,
  GatewayErrorCode,
  UnknownOperationError,
  PermissionDeniedError,
  ArgumentValidationError,
  LoadError,
  HandlerError,
  OperationFailure,
  errorMessage,
} from './errors.js';

// Permission gate
export type {
  ActionPermissions,
  PermissionConfig,
  OverrideSource,
  PermissionDecision,
} from './permissions/gate.js';
export {
  PermissionGate,
  PermissionSource,
  DEFAULT_OVERRIDE_PREFIX,
  isTruthy,
  overrideKey,
} from './permissions/gate.js';
export { CATEGORY_DEFAULTS, GLOBAL_DEFAULTS } from './permissions/defaults.js';

// Confirmation protocol
export type { ProtocolOutcome } from './confirmation/protocol.js';
export {
  ConfirmationProtocol,
  DEFAULT_CONFIRMATION_MESSAGE,
  toConfirmationRequired,
} from './confirmation/protocol.js';
export {
  togglePreview,
  updatePreview,
  createPreview,
  deletePreview,
} from './confirmation/previews.js';

// Operations
export type {
  OperationContext,
  OperationSpec,
  BoundInvocation,
  OperationHandler,
} from './operations/define.js';
export { defineOperation, CONFIRM_PROPERTY_SCHEMA } from './operations/define.js';
export type { OperationModule, ModuleLoader, HandlerCatalog } from './operations/module.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export { DecisionLogger, computeInputHash } from './logging/decision-log.js';

// JSON helpers
export { isJsonObject, canonicalJson, deepFreeze } from './json.js';
