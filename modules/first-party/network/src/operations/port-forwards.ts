/**
 * Toolgate Network Module: Port Forward Operations
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  OperationFailure,
  defineOperation,
  togglePreview,
} from '@toolgate/kernel';
import type { OperationModule } from '@toolgate/kernel';
import type { PortForward } from '../controller.js';
import type { NetworkServices } from '../services.js';

const PortForwardIdInput = z.object({
  port_forward_id: z.string().min(1).describe('Port forward rule id'),
});
type PortForwardIdArgs = z.infer<typeof PortForwardIdInput>;

async function requirePortForward(services: NetworkServices, id: string): Promise<PortForward> {
  const rule = await services.controller.getPortForward(id);
  if (rule === undefined) {
    throw new OperationFailure(`Port forwarding rule '${id}' not found`);
  }
  return rule;
}

const listPortForwards = defineOperation({
  name: 'list_port_forwards',
  description: 'List port forwarding rules.',
  category: OperationCategory.PortForwards,
  action: OperationAction.Read,
  input: z.object({}),
  async execute(_args: unknown, services: NetworkServices) {
    const rules = await services.controller.listPortForwards();
    return {
      site: services.controller.site,
      count: rules.length,
      port_forwards: rules.map((r) => ({
        id: r.id,
        name: r.name,
        enabled: r.enabled,
        external_port: r.dst_port,
        internal_port: r.fwd_port,
        internal_ip: r.fwd_ip,
        protocol: r.protocol,
      })),
    };
  },
});

const getPortForward = defineOperation({
  name: 'get_port_forward',
  description: 'Get one port forwarding rule by id.',
  category: OperationCategory.PortForwards,
  action: OperationAction.Read,
  input: PortForwardIdInput,
  async execute(args: PortForwardIdArgs, services: NetworkServices) {
    return { port_forward_id: args.port_forward_id, details: await requirePortForward(services, args.port_forward_id) };
  },
});

const togglePortForward = defineOperation({
  name: 'toggle_port_forward',
  description: 'Enable or disable a port forwarding rule.',
  category: OperationCategory.PortForwards,
  action: OperationAction.Update,
  input: PortForwardIdInput,
  async execute(args: PortForwardIdArgs, services: NetworkServices) {
    const rule = await requirePortForward(services, args.port_forward_id);
    const updated = await services.controller.setPortForwardEnabled(rule.id, !rule.enabled);
    if (updated === undefined) {
      throw new OperationFailure(`Port forwarding rule '${rule.id}' not found`);
    }
    return {
      port_forward_id: updated.id,
      enabled: updated.enabled,
      message: `Port forward '${updated.name}' toggled to ${updated.enabled ? 'enabled' : 'disabled'}.`,
    };
  },
  async preview(args: PortForwardIdArgs, services: NetworkServices) {
    const rule = await requirePortForward(services, args.port_forward_id);
    return togglePreview({
      resource_type: 'port_forward',
      resource_id: rule.id,
      resource_name: rule.name,
      enabled: rule.enabled,
      extra: { external_port: rule.dst_port, forward_to: `${rule.fwd_ip}:${rule.fwd_port}` },
    });
  },
});

export const PORT_FORWARDS_MODULE: OperationModule<NetworkServices> = {
  module_id: 'port_forwards',
  operations: [listPortForwards, getPortForward, togglePortForward],
};
