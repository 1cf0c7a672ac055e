import { OperationAction, OperationCategory } from '@toolgate/kernel';
import type { PermissionGate, PermissionSource } from '@toolgate/kernel';

export interface PermissionRow {
  readonly category: OperationCategory;
  readonly action: OperationAction;
  readonly allowed: boolean;
  readonly source: PermissionSource;
  readonly override_key: string;
}

/** Every category × action decision, in enum order. */
export function permissionMatrix(gate: PermissionGate): PermissionRow[] {
  const rows: PermissionRow[] = [];
  for (const category of Object.values(OperationCategory)) {
    for (const action of Object.values(OperationAction)) {
      const decision = gate.explain(category, action);
      rows.push({
        category,
        action,
        allowed: decision.allowed,
        source: decision.source,
        override_key: decision.override_key,
      });
    }
  }
  return rows;
}
