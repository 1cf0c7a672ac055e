/**
 * Toolgate Kernel: Job Types
 *
 * A job is one tracked, asynchronously executing invocation. Jobs live only
 * in process memory and are never persisted.
 */

import type { GatewayErrorCode } from '../errors.js';
import type { ValidationIssue } from './validation.js';

/**
 * Job lifecycle state.
 *
 * Transitions: Pending → Running → Done | Error. Terminal states never
 * change; a status never regresses.
 */
export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Done = 'done',
  Error = 'error',
}

/** The structured error recorded on a failed job. */
export interface JobError {
  readonly code: GatewayErrorCode;
  readonly message: string;
  readonly details?: ReadonlyArray<ValidationIssue> | undefined;
}

/** A point-in-time copy of a job record. */
export interface Job {
  readonly id: string;
  readonly operation: string;
  /** Snapshot taken at submission; frozen. */
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly status: JobStatus;
  /** Present iff status is Done. */
  readonly result?: unknown;
  /** Present iff status is Error. */
  readonly error?: JobError | undefined;
  readonly created_at: string;
  readonly started_at?: string | undefined;
  readonly completed_at?: string | undefined;
}
