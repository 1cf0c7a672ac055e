/**
 * Toolgate Kernel: Confirmation Types
 *
 * Shapes produced by the preview path of a mutating operation. Previews are
 * ephemeral: recomputed on every unconfirmed call, never stored.
 */

/**
 * What a mutating operation would do if confirmed.
 *
 * Returned by an operation's preview function. Building one must not
 * change controller state.
 */
export interface ChangePreview {
  /** The kind of change: `toggle`, `update`, `create`, or `delete`. */
  readonly action: string;
  /** Singular resource noun (e.g. `firewall_policy`). */
  readonly resource_type: string;
  readonly resource_id?: string | undefined;
  readonly resource_name?: string | undefined;
  readonly current: Readonly<Record<string, unknown>>;
  readonly proposed: Readonly<Record<string, unknown>>;
  readonly warnings?: ReadonlyArray<string> | undefined;
  /** Overrides the default confirmation prompt. */
  readonly message?: string | undefined;
}

/** The wire response for an unconfirmed call to a mutating operation. */
export interface ConfirmationRequired {
  readonly success: false;
  readonly requires_confirmation: true;
  readonly action: string;
  readonly resource_type: string;
  readonly resource_id?: string;
  readonly resource_name?: string;
  readonly preview: {
    readonly current: Readonly<Record<string, unknown>>;
    readonly proposed: Readonly<Record<string, unknown>>;
  };
  readonly warnings?: ReadonlyArray<string>;
  readonly message: string;
}
