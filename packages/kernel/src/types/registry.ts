/**
 * Toolgate Kernel: Registry Entry Types
 */

import type { GatewayErrorCode } from '../errors.js';
import type { OperationDescriptor } from './operation.js';

/**
 * Whether a registered operation may be invoked.
 *
 * State transitions:
 * - Unresolved → Callable | Denied (permission evaluated: startup pre-check
 *   or first dispatch, exactly once)
 * - Callable → Denied (deferred handler failed to load; permanent)
 *
 * Denied entries remain visible to Discovery.
 */
export enum RegistrationStatus {
  Callable = 'callable',
  Denied = 'denied',
  Unresolved = 'unresolved',
}

/** Why a denied entry is denied. */
export interface EntryDenial {
  readonly code: GatewayErrorCode.PermissionDenied | GatewayErrorCode.LoadError;
  readonly message: string;
}

/**
 * A read-only view of one registry slot, as returned by lookup() and
 * snapshot(). Views are copies; mutating the registry does not change a
 * view already handed out.
 */
export interface RegistryEntry {
  readonly descriptor: OperationDescriptor;
  readonly status: RegistrationStatus;
  /** True once the executable handler is held in memory. */
  readonly resident: boolean;
  readonly denial?: EntryDenial | undefined;
}
