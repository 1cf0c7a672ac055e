/**
 * @toolgate/gateway
 *
 * Discovery, Dispatch, Batch Submit and Batch Status over an operation
 * registry, plus the job manager behind batch execution.
 */

export type { GatewayOptions, InvocationOutcome } from './gateway.js';
export { OperationGateway } from './gateway.js';

export type { JobOutcome, JobRunner, JobManagerOptions, JobSubmission } from './job-manager.js';
export { JobManager, IllegalTransitionError } from './job-manager.js';

export type { JobStore } from './job-store.js';
export { MemoryJobStore } from './job-store.js';

export { DEFAULT_MAX_PAYLOAD_CHARS, truncatePayload } from './diagnostics.js';
