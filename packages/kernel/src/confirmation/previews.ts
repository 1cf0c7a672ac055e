/**
 * Toolgate Kernel: Preview Builders
 *
 * Helpers operation authors use to build consistent ChangePreview values
 * for the common change shapes.
 */

import type { ChangePreview } from '../types/confirmation.js';

function label(id: string, name: string | undefined): string {
  return name !== undefined && name !== '' ? `'${name}'` : id;
}

/**
 * Preview flipping an `enabled` flag.
 *
 * current: `{ enabled, ...extra }`; proposed: `{ enabled: !enabled }`.
 */
export function togglePreview(opts: {
  readonly resource_type: string;
  readonly resource_id: string;
  readonly resource_name?: string | undefined;
  readonly enabled: boolean;
  readonly extra?: Readonly<Record<string, unknown>> | undefined;
}): ChangePreview {
  const next = opts.enabled ? 'disable' : 'enable';
  return {
    action: 'toggle',
    resource_type: opts.resource_type,
    resource_id: opts.resource_id,
    resource_name: opts.resource_name,
    current: { enabled: opts.enabled, ...opts.extra },
    proposed: { enabled: !opts.enabled },
    message: `Will ${next} ${opts.resource_type} ${label(opts.resource_id, opts.resource_name)}. Set confirm=true to execute.`,
  };
}

/**
 * Preview a partial update. `current` is narrowed to the fields being
 * changed; fields absent on the resource appear as null.
 */
export function updatePreview(opts: {
  readonly resource_type: string;
  readonly resource_id: string;
  readonly resource_name?: string | undefined;
  readonly current: Readonly<Record<string, unknown>>;
  readonly updates: Readonly<Record<string, unknown>>;
}): ChangePreview {
  const fields = Object.keys(opts.updates);
  const current: Record<string, unknown> = {};
  for (const field of fields) {
    current[field] = opts.current[field] ?? null;
  }
  return {
    action: 'update',
    resource_type: opts.resource_type,
    resource_id: opts.resource_id,
    resource_name: opts.resource_name,
    current,
    proposed: opts.updates,
    message: `Will update ${fields.join(', ')} on ${opts.resource_type} ${label(opts.resource_id, opts.resource_name)}. Set confirm=true to execute.`,
  };
}

/**
 * Preview creating a resource: nothing exists yet, so `current` is empty
 * and `proposed` is the creation payload.
 */
export function createPreview(opts: {
  readonly resource_type: string;
  readonly resource_name?: string | undefined;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly warnings?: ReadonlyArray<string> | undefined;
}): ChangePreview {
  const target = opts.resource_name !== undefined && opts.resource_name !== ''
    ? `${opts.resource_type} '${opts.resource_name}'`
    : `new ${opts.resource_type}`;
  return {
    action: 'create',
    resource_type: opts.resource_type,
    resource_name: opts.resource_name,
    current: {},
    proposed: opts.payload,
    warnings: opts.warnings,
    message: `Will create ${target}. Set confirm=true to execute.`,
  };
}

/** Preview removing a resource. */
export function deletePreview(opts: {
  readonly resource_type: string;
  readonly resource_id: string;
  readonly resource_name?: string | undefined;
  readonly current: Readonly<Record<string, unknown>>;
}): ChangePreview {
  return {
    action: 'delete',
    resource_type: opts.resource_type,
    resource_id: opts.resource_id,
    resource_name: opts.resource_name,
    current: opts.current,
    proposed: { deleted: true },
    message: `Will delete ${opts.resource_type} ${label(opts.resource_id, opts.resource_name)}. Set confirm=true to execute.`,
  };
}
