/**
 * Toolgate Kernel: Validation Result Types
 *
 * Shared result shape for everything that validates untrusted input at a
 * boundary: operation arguments, manifests, and configuration files.
 * Validators return results; they do not throw.
 */

/** A single validation failure. */
export interface ValidationIssue {
  readonly message: string;
  /**
   * Where the failure occurred: a dotted argument path for operation
   * arguments, or a file/key description for manifests and config.
   */
  readonly context?: string | undefined;
}

/**
 * Success carries the validated value; failure carries every issue found.
 */
export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationIssue> };
