/**
 * Toolgate Kernel: Confirmation Protocol
 *
 * Two-phase execution for mutating operations:
 *
 *   confirm=false → run the operation's preview; return ConfirmationRequired.
 *                   The handler is never invoked.
 *   confirm=true  → run the handler; no preview step.
 *
 * Non-mutating operations always execute directly.
 *
 * Auto-confirm forces every call down the confirmed path, whatever the
 * caller passed. It exists for unattended automation and removes the
 * preview step entirely: with it on, a single call applies a change.
 *
 * Trust boundary: the protocol guarantees the handler is not called on the
 * preview path. It cannot guarantee a preview function is itself free of
 * side effects; that is a contract every operation author must keep.
 */

import type { OperationContext, BoundInvocation } from '../operations/define.js';
import type { ChangePreview, ConfirmationRequired } from '../types/confirmation.js';
import type { OperationDescriptor } from '../types/operation.js';

export const DEFAULT_CONFIRMATION_MESSAGE = 'Review the changes above. Set confirm=true to execute.';

export type ProtocolOutcome =
  | { readonly kind: 'executed'; readonly data: unknown }
  | { readonly kind: 'preview'; readonly response: ConfirmationRequired };

export class ConfirmationProtocol {
  constructor(readonly autoConfirm: boolean = false) {}

  /**
   * Whether a call would take the confirmed (executing) path.
   */
  isConfirmed(descriptor: Pick<OperationDescriptor, 'mutating'>, confirm: boolean): boolean {
    return !descriptor.mutating || confirm || this.autoConfirm;
  }

  /**
   * Route one bound invocation through the protocol.
   *
   * Errors thrown by execute() or preview() propagate to the caller, which
   * is responsible for wrapping them.
   *
   * @throws {Error} If the preview path is required but the invocation has
   *   no preview (defineOperation() rejects such operations up front)
   */
  async run<S>(
    descriptor: Pick<OperationDescriptor, 'name' | 'mutating'>,
    confirm: boolean,
    invocation: BoundInvocation<S>,
    services: S,
    context: OperationContext,
  ): Promise<ProtocolOutcome> {
    if (this.isConfirmed(descriptor, confirm)) {
      return { kind: 'executed', data: await invocation.execute(services, context) };
    }
    if (invocation.preview === undefined) {
      throw new Error(`Operation ${descriptor.name} is mutating but has no preview`);
    }
    const preview = await invocation.preview(services, context);
    return { kind: 'preview', response: toConfirmationRequired(preview) };
  }
}

/**
 * Build the wire response for an unconfirmed call from a preview.
 * Optional fields are omitted, not set to undefined.
 */
export function toConfirmationRequired(preview: ChangePreview): ConfirmationRequired {
  return {
    success: false,
    requires_confirmation: true,
    action: preview.action,
    resource_type: preview.resource_type,
    ...(preview.resource_id !== undefined ? { resource_id: preview.resource_id } : {}),
    ...(preview.resource_name !== undefined ? { resource_name: preview.resource_name } : {}),
    preview: { current: preview.current, proposed: preview.proposed },
    ...(preview.warnings !== undefined && preview.warnings.length > 0
      ? { warnings: preview.warnings }
      : {}),
    message: preview.message ?? DEFAULT_CONFIRMATION_MESSAGE,
  };
}
