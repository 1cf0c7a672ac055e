/**
 * Shared fixtures for gateway tests.
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  OperationFailure,
  PermissionGate,
  createPreview,
  defineOperation,
  togglePreview,
} from '@toolgate/kernel';
import type { DecisionLog, LogSink, ModuleLoader, OperationModule } from '@toolgate/kernel';
import { OperationRegistry } from '@toolgate/operation-loader';

export interface FakeServices {
  readonly rules: Map<string, boolean>;
  readonly networks: string[];
}

export function fakeServices(): FakeServices {
  return { rules: new Map([['x', true]]), networks: [] };
}

const statRead = defineOperation({
  name: 'stat.read',
  description: 'Read controller statistics',
  category: OperationCategory.Stats,
  action: OperationAction.Read,
  input: z.object({ site: z.string().default('default') }),
  async execute(args: { site: string }, _services: FakeServices) {
    return { site: args.site, uptime: 42 };
  },
});

const netCreate = defineOperation({
  name: 'net.create',
  description: 'Create a network',
  category: OperationCategory.Networks,
  action: OperationAction.Create,
  input: z.object({ name: z.string() }),
  async execute(args: { name: string }, services: FakeServices) {
    services.networks.push(args.name);
    return { created: args.name };
  },
  async preview(args: { name: string }) {
    return createPreview({ resource_type: 'network', resource_name: args.name, payload: args });
  },
});

const toggleRule = defineOperation({
  name: 'toggleRule',
  description: 'Toggle a firewall rule',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Update,
  input: z.object({ id: z.string() }),
  async execute(args: { id: string }, services: FakeServices) {
    const current = services.rules.get(args.id);
    if (current === undefined) {
      throw new OperationFailure(`Rule not found: ${args.id}`);
    }
    services.rules.set(args.id, !current);
    return { enabled: !current };
  },
  async preview(args: { id: string }, services: FakeServices) {
    const current = services.rules.get(args.id);
    if (current === undefined) {
      throw new OperationFailure(`Rule not found: ${args.id}`);
    }
    return togglePreview({ resource_type: 'firewall_policy', resource_id: args.id, enabled: current });
  },
});

const explode = defineOperation({
  name: 'explode',
  description: 'Always fails',
  category: OperationCategory.System,
  action: OperationAction.Read,
  input: z.object({}),
  async execute(_args: unknown, _services: FakeServices): Promise<never> {
    throw new OperationFailure('controller unreachable');
  },
});

export const FIXTURE_MODULE: OperationModule<FakeServices> = {
  module_id: 'fixture',
  operations: [statRead, netCreate, toggleRule, explode],
};

/** Eager registry over the fixture module with the given gate. */
export function fixtureRegistry(gate: PermissionGate = new PermissionGate()): OperationRegistry<FakeServices> {
  const registry = new OperationRegistry<FakeServices>(gate);
  for (const op of FIXTURE_MODULE.operations) {
    registry.register(FIXTURE_MODULE.module_id, op);
  }
  return registry;
}

/** A loader that counts invocations and resolves on a later tick. */
export function countingLoader(): { readonly load: ModuleLoader<FakeServices>; readonly count: () => number } {
  let loads = 0;
  return {
    load: async () => {
      loads++;
      await new Promise((resolve) => setTimeout(resolve, 1));
      return FIXTURE_MODULE;
    },
    count: () => loads,
  };
}

export class MemoryLogSink implements LogSink {
  readonly entries: DecisionLog[] = [];

  append(entry: DecisionLog): void {
    this.entries.push(entry);
  }
}
