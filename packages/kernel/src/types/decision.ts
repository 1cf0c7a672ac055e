/**
 * Toolgate Kernel: Decision Log Types
 *
 * One DecisionLog entry is produced for every invocation attempt that
 * reaches the gateway, whatever its outcome. Entries carry an input hash
 * rather than the arguments themselves so the log never holds credentials
 * a caller passed in.
 */

import type { OperationAction, OperationCategory } from './operation.js';

export enum DispatchDecision {
  /** The handler ran and returned. */
  Executed = 'executed',
  /** A mutating operation returned its preview; the handler did not run. */
  Previewed = 'previewed',
  Denied = 'denied',
  Unknown = 'unknown',
  Invalid = 'invalid',
  LoadFailed = 'load_failed',
  /** The handler ran and threw. */
  Failed = 'failed',
}

export interface DecisionLog {
  readonly operation: string;
  /** Absent when the operation name is unknown. */
  readonly category?: OperationCategory | undefined;
  readonly action?: OperationAction | undefined;
  readonly decision: DispatchDecision;
  /** Whether the call took the confirmed path (explicitly or by auto-confirm). */
  readonly confirmed: boolean;
  /** Set when the invocation ran as a batch job. */
  readonly job_id?: string | undefined;
  /** SHA-256 over canonical JSON of operation name and arguments. */
  readonly input_hash: string;
  readonly duration_ms: number;
  readonly error?: string | undefined;
  /** ISO 8601. */
  readonly timestamp: string;
}
