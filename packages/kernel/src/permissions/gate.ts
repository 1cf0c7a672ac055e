/**
 * Toolgate Kernel: Permission Gate
 *
 * Decides whether a (category, action) pair may execute. The gate is a pure
 * function of the configuration and override map it was constructed with:
 * it performs no I/O, holds no mutable state, and never consults the
 * registry. The runtime host reads the environment and config file and
 * injects both.
 *
 * Precedence, first defined value wins:
 *   1. Override map: `<PREFIX>_<CATEGORY>_<ACTION>` (e.g. the environment)
 *   2. Configured value: `permissions.<category>.<action>`
 *   3. Built-in category default (CATEGORY_DEFAULTS)
 *   4. Global default: configured `permissions.default.<action>`, else
 *      GLOBAL_DEFAULTS
 *
 * `delete` is evaluated with the `update` rule of the same category at every
 * layer, including the override key. There is no independent delete rule.
 */

import { OperationAction } from '../types/operation.js';
import type { OperationCategory } from '../types/operation.js';
import { CATEGORY_DEFAULTS, GLOBAL_DEFAULTS } from './defaults.js';

/** Per-action switches for one category. Unset actions fall through. */
export interface ActionPermissions {
  readonly read?: boolean | undefined;
  readonly create?: boolean | undefined;
  readonly update?: boolean | undefined;
}

/** Operator-supplied permissions, already parsed and validated. */
export interface PermissionConfig {
  readonly categories?: Readonly<Partial<Record<OperationCategory, ActionPermissions>>> | undefined;
  readonly default?: ActionPermissions | undefined;
}

/**
 * String-valued override source. `process.env` satisfies this shape.
 */
export type OverrideSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_OVERRIDE_PREFIX = 'TOOLGATE_PERMISSIONS';

/** Which precedence layer produced a decision. */
export enum PermissionSource {
  Override = 'override',
  Config = 'config',
  CategoryDefault = 'category_default',
  GlobalDefault = 'global_default',
}

export interface PermissionDecision {
  readonly allowed: boolean;
  readonly source: PermissionSource;
  /** The action actually looked up (`update` for a `delete` request). */
  readonly evaluated_action: Exclude<OperationAction, OperationAction.Delete>;
  /** The override key that was consulted. */
  readonly override_key: string;
}

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

/**
 * Case-insensitive truthy parsing for string overrides.
 * `true`, `1`, `yes`, `on` are allowed; everything else is denied.
 */
export function isTruthy(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

/** Build the override key for a category/action pair. */
export function overrideKey(
  prefix: string,
  category: OperationCategory,
  action: OperationAction,
): string {
  return `${prefix}_${category.toUpperCase()}_${action.toUpperCase()}`;
}

export class PermissionGate {
  constructor(
    private readonly config: PermissionConfig = {},
    private readonly overrides: OverrideSource = {},
    private readonly prefix: string = DEFAULT_OVERRIDE_PREFIX,
  ) {}

  allowed(category: OperationCategory, action: OperationAction): boolean {
    return this.explain(category, action).allowed;
  }

  /**
   * Resolve a decision and report the layer that produced it.
   */
  explain(category: OperationCategory, action: OperationAction): PermissionDecision {
    const evaluated = action === OperationAction.Delete ? OperationAction.Update : action;
    const key = overrideKey(this.prefix, category, evaluated);
    const decide = (allowed: boolean, source: PermissionSource): PermissionDecision => ({
      allowed,
      source,
      evaluated_action: evaluated,
      override_key: key,
    });

    const override = this.overrides[key];
    if (override !== undefined) {
      return decide(isTruthy(override), PermissionSource.Override);
    }

    const configured = this.config.categories?.[category]?.[evaluated];
    if (configured !== undefined) {
      return decide(configured, PermissionSource.Config);
    }

    const builtIn = CATEGORY_DEFAULTS[category]?.[evaluated];
    if (builtIn !== undefined) {
      return decide(builtIn, PermissionSource.CategoryDefault);
    }

    return decide(
      this.config.default?.[evaluated] ?? GLOBAL_DEFAULTS[evaluated],
      PermissionSource.GlobalDefault,
    );
  }
}
