/**
 * @toolgate/module-network
 *
 * First-party network controller operations: devices, firewall policies,
 * port forwards, networks and system statistics. Ships with an in-memory
 * controller seeded with a demo site.
 */

export { NETWORK_CATALOG } from './catalog.js';

export type { NetworkServices } from './services.js';
export { createMemoryServices } from './services.js';

export type {
  ControllerClient,
  ControllerSeed,
  Device,
  FirewallAction,
  FirewallPolicy,
  FirewallPolicyPatch,
  FirewallRuleset,
  MemoryControllerOptions,
  Network,
  NetworkPurpose,
  NewFirewallPolicy,
  NewNetwork,
  PortForward,
  Protocol,
  SystemInfo,
} from './controller.js';
export {
  DeviceState,
  FIREWALL_ACTIONS,
  FIREWALL_RULESETS,
  FIRST_RULE_INDEX,
  MemoryControllerClient,
  NETWORK_PURPOSES,
  PROTOCOLS,
} from './controller.js';

export { demoSite } from './demo-site.js';
