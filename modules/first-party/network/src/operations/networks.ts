/**
 * Toolgate Network Module: Network (LAN/VLAN) Operations
 *
 * Creating a network is closed by the built-in category defaults until an
 * operator grants `networks.create`.
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  OperationFailure,
  createPreview,
  defineOperation,
} from '@toolgate/kernel';
import type { OperationModule } from '@toolgate/kernel';
import { NETWORK_PURPOSES } from '../controller.js';
import type { NetworkServices } from '../services.js';

/** IPv4 gateway address with prefix length, e.g. 192.168.30.1/24. */
const CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function isCidr(value: string): boolean {
  const match = CIDR.exec(value);
  if (match === null) return false;
  const [, a, b, c, d, prefix] = match.map(Number);
  return [a, b, c, d].every((octet) => octet !== undefined && octet <= 255) && prefix !== undefined && prefix <= 32;
}

const listNetworks = defineOperation({
  name: 'list_networks',
  description: 'List LAN and VLAN networks.',
  category: OperationCategory.Networks,
  action: OperationAction.Read,
  input: z.object({}),
  async execute(_args: unknown, services: NetworkServices) {
    const networks = await services.controller.listNetworks();
    return { site: services.controller.site, count: networks.length, networks };
  },
});

const CreateNetworkInput = z.object({
  name: z.string().trim().min(1).max(64),
  purpose: z.enum(NETWORK_PURPOSES).default('corporate'),
  vlan: z.number().int().min(2).max(4094).optional().describe('VLAN id; omit for the untagged LAN'),
  subnet: z.string().refine(isCidr, 'must be an IPv4 address with prefix, e.g. 192.168.30.1/24').optional(),
  dhcp_enabled: z.boolean().default(true),
});
type CreateNetworkArgs = z.infer<typeof CreateNetworkInput>;

/** Name and VLAN id must both be unused. */
async function assertNoConflict(services: NetworkServices, args: CreateNetworkArgs): Promise<void> {
  const networks = await services.controller.listNetworks();
  const sameName = networks.find((n) => n.name.toLowerCase() === args.name.toLowerCase());
  if (sameName !== undefined) {
    throw new OperationFailure(`Network '${sameName.name}' already exists`);
  }
  const sameVlan = args.vlan !== undefined ? networks.find((n) => n.vlan === args.vlan) : undefined;
  if (sameVlan !== undefined) {
    throw new OperationFailure(`VLAN ${String(args.vlan)} is already used by network '${sameVlan.name}'`);
  }
}

const createNetwork = defineOperation({
  name: 'create_network',
  description: 'Create a LAN or VLAN network.',
  category: OperationCategory.Networks,
  action: OperationAction.Create,
  input: CreateNetworkInput,
  async execute(args: CreateNetworkArgs, services: NetworkServices) {
    await assertNoConflict(services, args);
    const network = await services.controller.createNetwork(args);
    return { network_id: network.id, details: network };
  },
  async preview(args: CreateNetworkArgs, services: NetworkServices) {
    await assertNoConflict(services, args);
    const warnings: string[] = [];
    if (args.subnet === undefined && args.purpose !== 'vlan-only') {
      warnings.push('No subnet given; the controller will not route this network');
    }
    if (args.purpose === 'guest') {
      warnings.push('Guest networks are isolated from all other networks');
    }
    return createPreview({ resource_type: 'network', resource_name: args.name, payload: args, warnings });
  },
});

export const NETWORKS_MODULE: OperationModule<NetworkServices> = {
  module_id: 'networks',
  operations: [listNetworks, createNetwork],
};
