/**
 * Toolgate Network Module: Operation Tests
 *
 * Every operation is driven through the gateway over an eager registry of
 * the full catalog and a fresh demo-site controller.
 *
 *   NW-U1:  discovery lists every operation; category defaults deny writes
 *   NW-U2:  list_devices filters by type and status
 *   NW-U3:  get_device on an unknown MAC is a handler error
 *   NW-U4:  rename_device previews, then renames once granted
 *   NW-U5:  toggle_firewall_policy previews and toggles; predefined refused
 *   NW-U6:  create_firewall_policy warns, creates, then refuses the same name
 *   NW-U7:  delete_firewall_policy follows the update permission
 *   NW-U8:  update_firewall_policy validates and previews changed fields
 *   NW-U9:  create_network: default deny, conflicts, validation, creation
 *   NW-U10: get_system_stats reports counts and publishes an output schema
 *   NW-U11: port forwards list and toggle
 */

import { describe, it, expect } from 'vitest';
import { GatewayErrorCode, PermissionGate, RegistrationStatus } from '@toolgate/kernel';
import type { PermissionConfig } from '@toolgate/kernel';
import { OperationGateway } from '@toolgate/gateway';
import { buildEagerRegistry } from '@toolgate/operation-loader';
import { NETWORK_CATALOG } from '../src/catalog.js';
import { demoSite } from '../src/demo-site.js';
import { createMemoryServices } from '../src/services.js';
import type { NetworkServices } from '../src/services.js';

const OFFICE_AP = '74:ac:b9:00:00:03';

async function makeGateway(permissions: PermissionConfig = {}): Promise<{
  gateway: OperationGateway<NetworkServices>;
  services: NetworkServices;
}> {
  let n = 0;
  const services = createMemoryServices(demoSite(), { nextId: () => `new-${++n}` });
  const { registry, failures } = await buildEagerRegistry(NETWORK_CATALOG, new PermissionGate(permissions));
  expect(failures).toEqual([]);
  return { gateway: new OperationGateway<NetworkServices>({ registry, services }), services };
}

describe('network operations', () => {
  it('NW-U1: discovery lists every operation, writes to closed categories denied', async () => {
    const { gateway } = await makeGateway();
    const { tools, count } = gateway.discover();

    expect(count).toBe(15);
    expect(tools.map((t) => t.name)).toEqual([
      'create_firewall_policy',
      'create_network',
      'delete_firewall_policy',
      'get_device',
      'get_firewall_policy',
      'get_port_forward',
      'get_system_stats',
      'list_devices',
      'list_firewall_policies',
      'list_networks',
      'list_port_forwards',
      'rename_device',
      'toggle_firewall_policy',
      'toggle_port_forward',
      'update_firewall_policy',
    ]);
    const denied = tools.filter((t) => t.status === RegistrationStatus.Denied).map((t) => t.name);
    expect(denied).toEqual(['create_network', 'rename_device']);
  });

  it('NW-U2: list_devices filters by type and status', async () => {
    const { gateway } = await makeGateway();

    const aps = await gateway.dispatch({ tool: 'list_devices', arguments: { device_type: 'ap' } });
    expect(aps).toMatchObject({ success: true, data: { count: 2, filter_type: 'ap', filter_status: 'all' } });

    const online = await gateway.dispatch({
      tool: 'list_devices',
      arguments: { device_type: 'ap', status: 'online' },
    });
    expect(online).toEqual({
      success: true,
      data: {
        site: 'default',
        filter_type: 'ap',
        filter_status: 'online',
        count: 1,
        devices: [
          {
            mac: OFFICE_AP,
            name: 'Office AP',
            model: 'U6-Pro',
            type: 'uap',
            ip: '192.168.1.3',
            status: 'online',
            firmware: '6.6.77',
            adopted: true,
            clients: 14,
          },
        ],
      },
    });
  });

  it('NW-U3: get_device on an unknown MAC is a handler error', async () => {
    const { gateway } = await makeGateway();
    expect(await gateway.dispatch({ tool: 'get_device', arguments: { mac: '00:00:00:00:00:00' } })).toEqual({
      success: false,
      error: 'get_device failed: Device not found with MAC address: 00:00:00:00:00:00',
      code: GatewayErrorCode.HandlerError,
    });
  });

  it('NW-U4: rename_device is closed by default, previews and renames once granted', async () => {
    const closed = await makeGateway();
    expect(
      await closed.gateway.dispatch({ tool: 'rename_device', arguments: { mac: OFFICE_AP, name: 'Lab AP' } }),
    ).toEqual({
      success: false,
      error: 'Permission denied: rename_device requires update on devices',
      code: GatewayErrorCode.PermissionDenied,
    });

    const { gateway, services } = await makeGateway({ categories: { devices: { update: true } } });
    const preview = await gateway.dispatch({ tool: 'rename_device', arguments: { mac: OFFICE_AP, name: 'Lab AP' } });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'update',
      resource_type: 'device',
      resource_id: OFFICE_AP,
      resource_name: 'Office AP',
      preview: { current: { name: 'Office AP' }, proposed: { name: 'Lab AP' } },
      message: "Will update name on device 'Office AP'. Set confirm=true to execute.",
    });
    expect((await services.controller.getDevice(OFFICE_AP))?.name).toBe('Office AP');

    const done = await gateway.dispatch({
      tool: 'rename_device',
      arguments: { mac: OFFICE_AP, name: 'Lab AP', confirm: true },
    });
    expect(done).toEqual({
      success: true,
      data: { mac: OFFICE_AP, name: 'Lab AP', message: `Device ${OFFICE_AP} renamed to 'Lab AP'.` },
    });
    expect((await services.controller.getDevice(OFFICE_AP))?.name).toBe('Lab AP');
  });

  it('NW-U5: toggle_firewall_policy previews then toggles; predefined policies are refused', async () => {
    const { gateway, services } = await makeGateway();

    const preview = await gateway.dispatch({ tool: 'toggle_firewall_policy', arguments: { policy_id: 'fw-block-iot' } });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'toggle',
      resource_type: 'firewall_policy',
      resource_id: 'fw-block-iot',
      resource_name: 'Block IoT to LAN',
      preview: {
        current: { enabled: true, action: 'drop', ruleset: 'LAN_IN' },
        proposed: { enabled: false },
      },
      message: "Will disable firewall_policy 'Block IoT to LAN'. Set confirm=true to execute.",
    });

    const done = await gateway.dispatch({
      tool: 'toggle_firewall_policy',
      arguments: { policy_id: 'fw-block-iot', confirm: true },
    });
    expect(done).toEqual({
      success: true,
      data: {
        policy_id: 'fw-block-iot',
        enabled: false,
        message: "Firewall policy 'Block IoT to LAN' (fw-block-iot) toggled to disabled.",
      },
    });
    expect((await services.controller.getFirewallPolicy('fw-block-iot'))?.enabled).toBe(false);

    expect(
      await gateway.dispatch({
        tool: 'toggle_firewall_policy',
        arguments: { policy_id: 'fw-established', confirm: true },
      }),
    ).toEqual({
      success: false,
      error: "toggle_firewall_policy failed: Firewall policy 'Allow Established/Related' is predefined and cannot be changed",
      code: GatewayErrorCode.HandlerError,
    });
  });

  it('NW-U6: create_firewall_policy warns, creates, then refuses a duplicate name', async () => {
    const { gateway } = await makeGateway();
    const args = { name: 'Block guest SSH', action: 'reject', ruleset: 'GUEST_IN', protocol: 'tcp', enabled: false };

    const preview = await gateway.dispatch({ tool: 'create_firewall_policy', arguments: args });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'create',
      resource_type: 'firewall_policy',
      resource_name: 'Block guest SSH',
      preview: { current: {}, proposed: { ...args, description: '' } },
      warnings: ['Matching traffic on GUEST_IN will be rejected', 'Policy will be created disabled'],
      message: "Will create firewall_policy 'Block guest SSH'. Set confirm=true to execute.",
    });

    const done = await gateway.dispatch({ tool: 'create_firewall_policy', arguments: { ...args, confirm: true } });
    expect(done).toEqual({
      success: true,
      data: {
        policy_id: 'new-1',
        details: { ...args, description: '', id: 'new-1', rule_index: 2001, predefined: false },
      },
    });

    expect(await gateway.dispatch({ tool: 'create_firewall_policy', arguments: args })).toEqual({
      success: false,
      error: "create_firewall_policy failed: Firewall policy 'Block guest SSH' already exists",
      code: GatewayErrorCode.HandlerError,
    });
  });

  it('NW-U7: delete_firewall_policy follows the update permission', async () => {
    const closed = await makeGateway({ categories: { firewall_policies: { update: false } } });
    expect(
      await closed.gateway.dispatch({ tool: 'delete_firewall_policy', arguments: { policy_id: 'fw-guest-dns' } }),
    ).toEqual({
      success: false,
      error: 'Permission denied: delete_firewall_policy requires delete on firewall_policies',
      code: GatewayErrorCode.PermissionDenied,
    });

    const { gateway } = await makeGateway();
    const preview = await gateway.dispatch({ tool: 'delete_firewall_policy', arguments: { policy_id: 'fw-guest-dns' } });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'delete',
      resource_type: 'firewall_policy',
      resource_id: 'fw-guest-dns',
      resource_name: 'Guest DNS only',
      preview: {
        current: {
          id: 'fw-guest-dns',
          name: 'Guest DNS only',
          enabled: false,
          action: 'accept',
          rule_index: 2000,
          ruleset: 'GUEST_IN',
          description: '',
        },
        proposed: { deleted: true },
      },
      message: "Will delete firewall_policy 'Guest DNS only'. Set confirm=true to execute.",
    });

    expect(
      await gateway.dispatch({ tool: 'delete_firewall_policy', arguments: { policy_id: 'fw-guest-dns', confirm: true } }),
    ).toEqual({
      success: true,
      data: { policy_id: 'fw-guest-dns', deleted: true, message: "Firewall policy 'Guest DNS only' deleted." },
    });
    expect(await gateway.dispatch({ tool: 'list_firewall_policies' })).toMatchObject({
      success: true,
      data: { count: 1 },
    });
  });

  it('NW-U8: update_firewall_policy validates and previews changed fields only', async () => {
    const { gateway } = await makeGateway();

    expect(
      await gateway.dispatch({ tool: 'update_firewall_policy', arguments: { policy_id: 'fw-guest-dns', updates: {} } }),
    ).toEqual({
      success: false,
      error: 'Invalid arguments for update_firewall_policy: updates: at least one field must be updated',
      code: GatewayErrorCode.ValidationError,
      details: [{ message: 'at least one field must be updated', context: 'updates' }],
    });

    const preview = await gateway.dispatch({
      tool: 'update_firewall_policy',
      arguments: { policy_id: 'fw-guest-dns', updates: { action: 'drop' } },
    });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'update',
      resource_type: 'firewall_policy',
      resource_id: 'fw-guest-dns',
      resource_name: 'Guest DNS only',
      preview: { current: { action: 'accept' }, proposed: { action: 'drop' } },
      warnings: ['Matching traffic on GUEST_IN will be dropped'],
      message: "Will update action on firewall_policy 'Guest DNS only'. Set confirm=true to execute.",
    });
  });

  it('NW-U9: create_network is closed by default and checks conflicts once granted', async () => {
    const closed = await makeGateway();
    expect(
      await closed.gateway.dispatch({ tool: 'create_network', arguments: { name: 'Cameras', confirm: true } }),
    ).toMatchObject({ success: false, code: GatewayErrorCode.PermissionDenied });

    const { gateway } = await makeGateway({ categories: { networks: { create: true } } });

    expect(
      await gateway.dispatch({ tool: 'create_network', arguments: { name: 'Cameras', vlan: 20, confirm: true } }),
    ).toEqual({
      success: false,
      error: "create_network failed: VLAN 20 is already used by network 'IoT'",
      code: GatewayErrorCode.HandlerError,
    });

    const invalid = await gateway.dispatch({
      tool: 'create_network',
      arguments: { name: 'Cameras', subnet: '192.168.300.1/24' },
    });
    expect(invalid).toMatchObject({ success: false, code: GatewayErrorCode.ValidationError });
    if ('details' in invalid) {
      expect(invalid.details?.map((d) => d.context)).toEqual(['subnet']);
    }

    const guest = await gateway.dispatch({ tool: 'create_network', arguments: { name: 'Visitors', purpose: 'guest' } });
    expect(guest).toMatchObject({
      requires_confirmation: true,
      warnings: [
        'No subnet given; the controller will not route this network',
        'Guest networks are isolated from all other networks',
      ],
    });

    expect(
      await gateway.dispatch({
        tool: 'create_network',
        arguments: { name: 'Cameras', vlan: 30, subnet: '192.168.30.1/24', confirm: true },
      }),
    ).toEqual({
      success: true,
      data: {
        network_id: 'new-1',
        details: {
          id: 'new-1',
          name: 'Cameras',
          purpose: 'corporate',
          vlan: 30,
          subnet: '192.168.30.1/24',
          dhcp_enabled: true,
          enabled: true,
        },
      },
    });
  });

  it('NW-U10: get_system_stats reports device counts and publishes its output schema', async () => {
    const { gateway } = await makeGateway();

    expect(await gateway.dispatch({ tool: 'get_system_stats' })).toEqual({
      success: true,
      data: {
        site: 'default',
        hostname: 'demo-gateway',
        version: '9.0.114',
        uptime_seconds: 864000,
        cpu_percent: 12.5,
        mem_percent: 41,
        clients: 23,
        devices: { total: 4, online: 3 },
      },
    });
    const stats = gateway.discover().tools.find((t) => t.name === 'get_system_stats');
    expect(stats?.schema.output).toMatchObject({ type: 'object' });
  });

  it('NW-U11: port forwards list and toggle', async () => {
    const { gateway } = await makeGateway();

    expect(await gateway.dispatch({ tool: 'list_port_forwards' })).toMatchObject({
      success: true,
      data: {
        count: 2,
        port_forwards: [
          { id: 'pf-web', external_port: '443', internal_port: '8443', internal_ip: '192.168.1.50' },
          { id: 'pf-game', enabled: false },
        ],
      },
    });

    expect(
      await gateway.dispatch({ tool: 'toggle_port_forward', arguments: { port_forward_id: 'pf-game', confirm: true } }),
    ).toEqual({
      success: true,
      data: { port_forward_id: 'pf-game', enabled: true, message: "Port forward 'Game Server' toggled to enabled." },
    });
  });
});
