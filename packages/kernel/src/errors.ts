/**
 * Toolgate Kernel: Error Taxonomy
 *
 * Every failure that can reach a caller is a GatewayError with a stable
 * machine-readable code. The dispatch surface converts these into
 * `{ success: false, error, code }` responses; none of them ever crosses
 * the wire as a thrown exception.
 *
 * ConfirmationRequired is deliberately absent: an unconfirmed mutating call
 * is a normal response carrying a preview, not an error.
 */

import type { OperationAction, OperationCategory } from './types/operation.js';
import type { ValidationIssue } from './types/validation.js';

export enum GatewayErrorCode {
  UnknownOperation = 'UNKNOWN_OPERATION',
  PermissionDenied = 'PERMISSION_DENIED',
  ValidationError = 'VALIDATION_ERROR',
  LoadError = 'LOAD_ERROR',
  HandlerError = 'HANDLER_ERROR',
}

export class GatewayError extends Error {
  constructor(
    readonly code: GatewayErrorCode,
    message: string,
    readonly details?: ReadonlyArray<ValidationIssue>,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class UnknownOperationError extends GatewayError {
  constructor(readonly operation: string) {
    super(GatewayErrorCode.UnknownOperation, `Unknown operation: ${operation}`);
    this.name = 'UnknownOperationError';
  }
}

export class PermissionDeniedError extends GatewayError {
  constructor(
    readonly operation: string,
    readonly category: OperationCategory,
    readonly action: OperationAction,
  ) {
    super(
      GatewayErrorCode.PermissionDenied,
      `Permission denied: ${operation} requires ${action} on ${category}`,
    );
    this.name = 'PermissionDeniedError';
  }
}

export class ArgumentValidationError extends GatewayError {
  constructor(operation: string, issues: ReadonlyArray<ValidationIssue>) {
    super(
      GatewayErrorCode.ValidationError,
      `Invalid arguments for ${operation}: ${formatIssues(issues)}`,
      issues,
    );
    this.name = 'ArgumentValidationError';
  }
}

export class LoadError extends GatewayError {
  constructor(readonly operation: string, reason: string) {
    super(GatewayErrorCode.LoadError, `Failed to load ${operation}: ${reason}`);
    this.name = 'LoadError';
  }
}

export class HandlerError extends GatewayError {
  constructor(readonly operation: string, cause: unknown) {
    super(GatewayErrorCode.HandlerError, `${operation} failed: ${errorMessage(cause)}`);
    this.name = 'HandlerError';
  }
}

/**
 * Thrown by operation handlers to report a domain failure (resource not
 * found, conflicting state). The gateway wraps it into a HandlerError.
 */
export class OperationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OperationFailure';
  }
}

/** Extract a human-readable message from any thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

function formatIssues(issues: ReadonlyArray<ValidationIssue>): string {
  return issues
    .map((i) => (i.context !== undefined && i.context !== '' ? `${i.context}: ${i.message}` : i.message))
    .join('; ');
}
