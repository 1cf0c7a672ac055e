/**
 * Toolgate Network Module: Firewall Policy Operations
 *
 *   list_firewall_policies   firewall_policies/read
 *   get_firewall_policy      firewall_policies/read
 *   toggle_firewall_policy   firewall_policies/update
 *   update_firewall_policy   firewall_policies/update
 *   create_firewall_policy   firewall_policies/create
 *   delete_firewall_policy   firewall_policies/delete
 *
 * Predefined policies are listed and readable but every change to one is
 * refused.
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  OperationFailure,
  createPreview,
  defineOperation,
  deletePreview,
  togglePreview,
  updatePreview,
} from '@toolgate/kernel';
import type { OperationModule } from '@toolgate/kernel';
import { FIREWALL_ACTIONS, FIREWALL_RULESETS, PROTOCOLS } from '../controller.js';
import type { FirewallPolicy } from '../controller.js';
import type { NetworkServices } from '../services.js';

const RESOURCE = 'firewall_policy';

const PolicyIdInput = z.object({
  policy_id: z.string().min(1).describe('Firewall policy id'),
});
type PolicyIdArgs = z.infer<typeof PolicyIdInput>;

async function requirePolicy(services: NetworkServices, id: string): Promise<FirewallPolicy> {
  const policy = await services.controller.getFirewallPolicy(id);
  if (policy === undefined) {
    throw new OperationFailure(`Firewall policy with ID '${id}' not found`);
  }
  return policy;
}

/** Like requirePolicy, but refuses predefined policies. */
async function requireEditablePolicy(services: NetworkServices, id: string): Promise<FirewallPolicy> {
  const policy = await requirePolicy(services, id);
  if (policy.predefined) {
    throw new OperationFailure(`Firewall policy '${policy.name}' is predefined and cannot be changed`);
  }
  return policy;
}

function summarize(policy: FirewallPolicy) {
  return {
    id: policy.id,
    name: policy.name,
    enabled: policy.enabled,
    action: policy.action,
    rule_index: policy.rule_index,
    ruleset: policy.ruleset,
    description: policy.description,
  };
}

function blockingWarnings(action: FirewallPolicy['action'], ruleset: FirewallPolicy['ruleset']): string[] {
  return action === 'accept'
    ? []
    : [`Matching traffic on ${ruleset} will be ${action === 'drop' ? 'dropped' : 'rejected'}`];
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

const ListPoliciesInput = z.object({
  include_predefined: z.boolean().default(false).describe('Include system policies'),
});

const listFirewallPolicies = defineOperation({
  name: 'list_firewall_policies',
  description: 'List firewall policies configured on the controller.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Read,
  input: ListPoliciesInput,
  async execute(args: z.infer<typeof ListPoliciesInput>, services: NetworkServices) {
    const policies = (await services.controller.listFirewallPolicies()).filter(
      (p) => args.include_predefined || !p.predefined,
    );
    return {
      site: services.controller.site,
      count: policies.length,
      policies: policies.map(summarize),
    };
  },
});

const getFirewallPolicy = defineOperation({
  name: 'get_firewall_policy',
  description: 'Get the full configuration of one firewall policy.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Read,
  input: PolicyIdInput,
  async execute(args: PolicyIdArgs, services: NetworkServices) {
    return { policy_id: args.policy_id, details: await requirePolicy(services, args.policy_id) };
  },
});

// ---------------------------------------------------------------------------
// Toggle / update
// ---------------------------------------------------------------------------

const toggleFirewallPolicy = defineOperation({
  name: 'toggle_firewall_policy',
  description: 'Enable or disable a firewall policy.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Update,
  input: PolicyIdInput,
  async execute(args: PolicyIdArgs, services: NetworkServices) {
    const policy = await requireEditablePolicy(services, args.policy_id);
    const updated = await services.controller.updateFirewallPolicy(policy.id, { enabled: !policy.enabled });
    if (updated === undefined) {
      throw new OperationFailure(`Firewall policy with ID '${policy.id}' not found`);
    }
    return {
      policy_id: updated.id,
      enabled: updated.enabled,
      message: `Firewall policy '${updated.name}' (${updated.id}) toggled to ${updated.enabled ? 'enabled' : 'disabled'}.`,
    };
  },
  async preview(args: PolicyIdArgs, services: NetworkServices) {
    const policy = await requireEditablePolicy(services, args.policy_id);
    return togglePreview({
      resource_type: RESOURCE,
      resource_id: policy.id,
      resource_name: policy.name,
      enabled: policy.enabled,
      extra: { action: policy.action, ruleset: policy.ruleset },
    });
  },
});

const UpdatePolicyInput = PolicyIdInput.extend({
  updates: z
    .strictObject({
      name: z.string().trim().min(1).optional(),
      enabled: z.boolean().optional(),
      action: z.enum(FIREWALL_ACTIONS).optional(),
      rule_index: z.number().int().min(1).optional(),
      description: z.string().optional(),
    })
    .refine((u) => Object.values(u).some((v) => v !== undefined), 'at least one field must be updated'),
});
type UpdatePolicyArgs = z.infer<typeof UpdatePolicyInput>;

/** Drop keys the caller left undefined. */
function definedUpdates(updates: UpdatePolicyArgs['updates']): Record<string, unknown> {
  return Object.fromEntries(Object.entries(updates).filter(([, v]) => v !== undefined));
}

const updateFirewallPolicy = defineOperation({
  name: 'update_firewall_policy',
  description: 'Change fields of an existing firewall policy.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Update,
  input: UpdatePolicyInput,
  async execute(args: UpdatePolicyArgs, services: NetworkServices) {
    await requireEditablePolicy(services, args.policy_id);
    const updated = await services.controller.updateFirewallPolicy(args.policy_id, args.updates);
    if (updated === undefined) {
      throw new OperationFailure(`Firewall policy with ID '${args.policy_id}' not found`);
    }
    return { policy_id: updated.id, details: updated };
  },
  async preview(args: UpdatePolicyArgs, services: NetworkServices) {
    const policy = await requireEditablePolicy(services, args.policy_id);
    const preview = updatePreview({
      resource_type: RESOURCE,
      resource_id: policy.id,
      resource_name: policy.name,
      current: { ...policy },
      updates: definedUpdates(args.updates),
    });
    const action = args.updates.action;
    const warnings = action !== undefined && action !== policy.action ? blockingWarnings(action, policy.ruleset) : [];
    return warnings.length > 0 ? { ...preview, warnings } : preview;
  },
});

// ---------------------------------------------------------------------------
// Create / delete
// ---------------------------------------------------------------------------

const CreatePolicyInput = z.object({
  name: z.string().trim().min(1),
  action: z.enum(FIREWALL_ACTIONS),
  ruleset: z.enum(FIREWALL_RULESETS),
  protocol: z.enum(PROTOCOLS).default('all'),
  rule_index: z.number().int().min(1).optional().describe('Defaults to the end of the ruleset'),
  enabled: z.boolean().default(true),
  description: z.string().default(''),
});
type CreatePolicyArgs = z.infer<typeof CreatePolicyInput>;

const createFirewallPolicy = defineOperation({
  name: 'create_firewall_policy',
  description: 'Create a firewall policy.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Create,
  input: CreatePolicyInput,
  async execute(args: CreatePolicyArgs, services: NetworkServices) {
    await assertNameFree(services, args.name);
    const policy = await services.controller.createFirewallPolicy(args);
    return { policy_id: policy.id, details: policy };
  },
  async preview(args: CreatePolicyArgs, services: NetworkServices) {
    await assertNameFree(services, args.name);
    const warnings = blockingWarnings(args.action, args.ruleset);
    if (!args.enabled) {
      warnings.push('Policy will be created disabled');
    }
    return createPreview({ resource_type: RESOURCE, resource_name: args.name, payload: args, warnings });
  },
});

async function assertNameFree(services: NetworkServices, name: string): Promise<void> {
  const policies = await services.controller.listFirewallPolicies();
  if (policies.some((p) => p.name.toLowerCase() === name.toLowerCase())) {
    throw new OperationFailure(`Firewall policy '${name}' already exists`);
  }
}

const deleteFirewallPolicy = defineOperation({
  name: 'delete_firewall_policy',
  description: 'Delete a firewall policy.',
  category: OperationCategory.FirewallPolicies,
  action: OperationAction.Delete,
  input: PolicyIdInput,
  async execute(args: PolicyIdArgs, services: NetworkServices) {
    const policy = await requireEditablePolicy(services, args.policy_id);
    if (!(await services.controller.deleteFirewallPolicy(policy.id))) {
      throw new OperationFailure(`Firewall policy with ID '${policy.id}' not found`);
    }
    return { policy_id: policy.id, deleted: true, message: `Firewall policy '${policy.name}' deleted.` };
  },
  async preview(args: PolicyIdArgs, services: NetworkServices) {
    const policy = await requireEditablePolicy(services, args.policy_id);
    return deletePreview({
      resource_type: RESOURCE,
      resource_id: policy.id,
      resource_name: policy.name,
      current: summarize(policy),
    });
  },
});

export const FIREWALL_MODULE: OperationModule<NetworkServices> = {
  module_id: 'firewall',
  operations: [
    listFirewallPolicies,
    getFirewallPolicy,
    toggleFirewallPolicy,
    updateFirewallPolicy,
    createFirewallPolicy,
    deleteFirewallPolicy,
  ],
};
