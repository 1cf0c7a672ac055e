/**
 * A small demo site for the in-memory controller: one gateway, a switch,
 * two access points, a handful of policies and two networks.
 */

import { DeviceState } from './controller.js';
import type { ControllerSeed } from './controller.js';

export function demoSite(): ControllerSeed {
  return {
    site: 'default',
    system: {
      version: '9.0.114',
      hostname: 'demo-gateway',
      uptime: 864000,
      cpu_percent: 12.5,
      mem_percent: 41.0,
      num_clients: 23,
    },
    devices: [
      {
        mac: '74:ac:b9:00:00:01',
        name: 'Gateway',
        model: 'UDM-Pro',
        type: 'udm',
        ip: '192.168.1.1',
        state: DeviceState.Online,
        version: '4.0.21',
        adopted: true,
        uptime: 864000,
        num_sta: 23,
      },
      {
        mac: '74:ac:b9:00:00:02',
        name: 'Core Switch',
        model: 'USW-24-PoE',
        type: 'usw',
        ip: '192.168.1.2',
        state: DeviceState.Online,
        version: '7.1.26',
        adopted: true,
        uptime: 863000,
        num_sta: 9,
      },
      {
        mac: '74:ac:b9:00:00:03',
        name: 'Office AP',
        model: 'U6-Pro',
        type: 'uap',
        ip: '192.168.1.3',
        state: DeviceState.Online,
        version: '6.6.77',
        adopted: true,
        uptime: 420000,
        num_sta: 14,
      },
      {
        mac: '74:ac:b9:00:00:04',
        name: 'Garage AP',
        model: 'U6-Lite',
        type: 'uap',
        ip: '192.168.1.4',
        state: DeviceState.Offline,
        version: '6.6.77',
        adopted: true,
        uptime: 0,
        num_sta: 0,
      },
    ],
    firewallPolicies: [
      {
        id: 'fw-established',
        name: 'Allow Established/Related',
        enabled: true,
        action: 'accept',
        ruleset: 'WAN_IN',
        rule_index: 2000,
        protocol: 'all',
        description: 'Allow established and related sessions',
        predefined: true,
      },
      {
        id: 'fw-block-iot',
        name: 'Block IoT to LAN',
        enabled: true,
        action: 'drop',
        ruleset: 'LAN_IN',
        rule_index: 2000,
        protocol: 'all',
        description: 'Keep IoT devices off the main LAN',
        predefined: false,
      },
      {
        id: 'fw-guest-dns',
        name: 'Guest DNS only',
        enabled: false,
        action: 'accept',
        ruleset: 'GUEST_IN',
        rule_index: 2000,
        protocol: 'udp',
        description: '',
        predefined: false,
      },
    ],
    portForwards: [
      {
        id: 'pf-web',
        name: 'Web Server',
        enabled: true,
        dst_port: '443',
        fwd_port: '8443',
        fwd_ip: '192.168.1.50',
        protocol: 'tcp',
      },
      {
        id: 'pf-game',
        name: 'Game Server',
        enabled: false,
        dst_port: '27015',
        fwd_port: '27015',
        fwd_ip: '192.168.1.60',
        protocol: 'tcp_udp',
      },
    ],
    networks: [
      {
        id: 'net-default',
        name: 'Default',
        purpose: 'corporate',
        subnet: '192.168.1.1/24',
        dhcp_enabled: true,
        enabled: true,
      },
      {
        id: 'net-iot',
        name: 'IoT',
        purpose: 'corporate',
        vlan: 20,
        subnet: '192.168.20.1/24',
        dhcp_enabled: true,
        enabled: true,
      },
    ],
  };
}
