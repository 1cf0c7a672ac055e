export type { JsonSchema, HandlerRef, OperationDescriptor } from './operation.js';
export {
  OperationAction,
  OperationCategory,
  CATEGORY_ALIASES,
  isMutatingAction,
  parseAction,
  parseCategory,
} from './operation.js';

export type { EntryDenial, RegistryEntry } from './registry.js';
export { RegistrationStatus } from './registry.js';

export type { ManifestEntry, OperationManifest } from './manifest.js';
export { MANIFEST_VERSION } from './manifest.js';

export type { ChangePreview, ConfirmationRequired } from './confirmation.js';

export type { Job, JobError } from './job.js';
export { JobStatus } from './job.js';

export type {
  ToolSummary,
  DiscoveryResponse,
  DispatchRequest,
  DispatchSuccess,
  DispatchFailure,
  DispatchResponse,
  BatchSubmitRequest,
  BatchSubmitResponse,
  BatchStatusRequest,
  BatchJobStatus,
  BatchStatusResponse,
} from './dispatch.js';

export type { DecisionLog } from './decision.js';
export { DispatchDecision } from './decision.js';

export type { ValidationIssue, ValidationResult } from './validation.js';
