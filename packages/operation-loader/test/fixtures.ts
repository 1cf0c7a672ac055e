/**
 * Shared fixtures for operation-loader tests: a two-module catalog whose
 * loaders count how many times they run.
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  createPreview,
  defineOperation,
  togglePreview,
} from '@toolgate/kernel';
import type { ModuleLoader, OperationModule } from '@toolgate/kernel';

export interface FakeServices {
  readonly rules: Map<string, boolean>;
}

export const statRead = defineOperation({
  name: 'stat.read',
  description: 'Read controller statistics',
  category: OperationCategory.Stats,
  action: OperationAction.Read,
  input: z.object({}),
  async execute(_args: unknown, _services: FakeServices) {
    return { uptime: 42 };
  },
});

export const netCreate = defineOperation({
  name: 'net.create',
  description: 'Create a network',
  category: OperationCategory.Networks,
  action: OperationAction.Create,
  input: z.object({ name: z.string() }),
  async execute(args: { name: string }, _services: FakeServices) {
    return { created: args.name };
  },
  async preview(args: { name: string }) {
    return createPreview({ resource_type: 'network', resource_name: args.name, payload: args });
  },
});

export const toggleRule = defineOperation({
  name: 'toggleRule',
  description: 'Toggle a firewall rule',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Update,
  input: z.object({ id: z.string() }),
  async execute(args: { id: string }, services: FakeServices) {
    const enabled = !(services.rules.get(args.id) ?? false);
    services.rules.set(args.id, enabled);
    return { enabled };
  },
  async preview(args: { id: string }, services: FakeServices) {
    return togglePreview({
      resource_type: 'firewall_policy',
      resource_id: args.id,
      enabled: services.rules.get(args.id) ?? false,
    });
  },
});

export const CORE_MODULE: OperationModule<FakeServices> = {
  module_id: 'core',
  operations: [statRead, netCreate],
};

export const RULES_MODULE: OperationModule<FakeServices> = {
  module_id: 'rules',
  operations: [toggleRule],
};

export interface CountingCatalog {
  readonly catalog: Map<string, ModuleLoader<FakeServices>>;
  /** module_id → number of times its loader ran */
  readonly loads: Map<string, number>;
}

/**
 * Build a catalog whose loaders resolve on a later tick and count their
 * invocations.
 */
export function countingCatalog(
  modules: ReadonlyArray<OperationModule<FakeServices>> = [CORE_MODULE, RULES_MODULE],
): CountingCatalog {
  const loads = new Map<string, number>();
  const catalog = new Map<string, ModuleLoader<FakeServices>>();
  for (const module of modules) {
    catalog.set(module.module_id, async () => {
      loads.set(module.module_id, (loads.get(module.module_id) ?? 0) + 1);
      await new Promise((resolve) => setTimeout(resolve, 1));
      return module;
    });
  }
  return { catalog, loads };
}
