/**
 * Toolgate Kernel: Wire Types
 *
 * The request/response shapes of the Discovery, Dispatch, Batch Submit, and
 * Batch Status entry points. These are the only shapes the gateway exposes.
 */

import type { GatewayErrorCode } from '../errors.js';
import type { ConfirmationRequired } from './confirmation.js';
import type { JobStatus } from './job.js';
import type { JsonSchema, OperationAction, OperationCategory } from './operation.js';
import type { RegistrationStatus } from './registry.js';
import type { ValidationIssue } from './validation.js';

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface ToolSummary {
  readonly name: string;
  readonly description: string;
  readonly category: OperationCategory;
  readonly action: OperationAction;
  readonly mutating: boolean;
  readonly status: RegistrationStatus;
  readonly schema: {
    readonly input: JsonSchema;
    readonly output?: JsonSchema;
  };
}

export interface DiscoveryResponse {
  readonly tools: ReadonlyArray<ToolSummary>;
  readonly count: number;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export interface DispatchRequest {
  readonly tool: string;
  readonly arguments?: Readonly<Record<string, unknown>>;
}

export interface DispatchSuccess {
  readonly success: true;
  readonly data: unknown;
}

export interface DispatchFailure {
  readonly success: false;
  readonly error: string;
  readonly code: GatewayErrorCode;
  readonly details?: ReadonlyArray<ValidationIssue>;
}

export type DispatchResponse = DispatchSuccess | DispatchFailure | ConfirmationRequired;

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export interface BatchSubmitRequest {
  readonly operations: ReadonlyArray<DispatchRequest>;
}

export interface BatchSubmitResponse {
  readonly jobs: ReadonlyArray<{
    readonly index: number;
    readonly tool: string;
    readonly jobId: string;
  }>;
}

export interface BatchStatusRequest {
  readonly jobIds: ReadonlyArray<string>;
}

export interface BatchJobStatus {
  readonly jobId: string;
  readonly status: JobStatus | 'unknown';
  readonly result?: unknown;
  readonly error?: string;
  readonly code?: GatewayErrorCode;
}

export interface BatchStatusResponse {
  readonly jobs: ReadonlyArray<BatchJobStatus>;
}
