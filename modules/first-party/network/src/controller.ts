/**
 * Toolgate Network Module: Controller Client
 *
 * The seam between operations and a network controller. Operations only
 * ever talk to a ControllerClient; the shipped implementation keeps site
 * state in memory so the gateway runs end to end without a controller.
 *
 * Every method returns copies. Mutating a returned record never changes
 * controller state.
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Controller device state codes. */
export enum DeviceState {
  Offline = 0,
  Online = 1,
  PendingAdoption = 2,
  Adopting = 4,
  Provisioning = 5,
  Upgrading = 6,
  HeartbeatMissed = 11,
}

export interface Device {
  /** Lower-case, colon separated. */
  readonly mac: string;
  readonly name: string;
  readonly model: string;
  /** Model family prefix, e.g. `uap`, `usw`, `udm`. */
  readonly type: string;
  readonly ip: string;
  readonly state: DeviceState;
  readonly version: string;
  readonly adopted: boolean;
  readonly uptime: number;
  readonly num_sta: number;
}

export const FIREWALL_ACTIONS = ['accept', 'drop', 'reject'] as const;
export type FirewallAction = (typeof FIREWALL_ACTIONS)[number];

export const FIREWALL_RULESETS = ['WAN_IN', 'WAN_OUT', 'WAN_LOCAL', 'LAN_IN', 'LAN_OUT', 'GUEST_IN'] as const;
export type FirewallRuleset = (typeof FIREWALL_RULESETS)[number];

export const PROTOCOLS = ['all', 'tcp', 'udp', 'tcp_udp', 'icmp'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

export interface FirewallPolicy {
  readonly id: string;
  readonly name: string;
  readonly enabled: boolean;
  readonly action: FirewallAction;
  readonly ruleset: FirewallRuleset;
  readonly rule_index: number;
  readonly protocol: Protocol;
  readonly description: string;
  /** System policies ship with the controller and cannot be changed. */
  readonly predefined: boolean;
}

export type NewFirewallPolicy = Omit<FirewallPolicy, 'id' | 'predefined' | 'rule_index'> & {
  readonly rule_index?: number | undefined;
};

export type FirewallPolicyPatch = Partial<Pick<FirewallPolicy, 'name' | 'enabled' | 'action' | 'rule_index' | 'description'>>;

export interface PortForward {
  readonly id: string;
  readonly name: string;
  readonly enabled: boolean;
  /** External port or range. */
  readonly dst_port: string;
  /** Internal port or range. */
  readonly fwd_port: string;
  readonly fwd_ip: string;
  readonly protocol: Exclude<Protocol, 'all' | 'icmp'>;
}

export const NETWORK_PURPOSES = ['corporate', 'guest', 'vlan-only'] as const;
export type NetworkPurpose = (typeof NETWORK_PURPOSES)[number];

export interface Network {
  readonly id: string;
  readonly name: string;
  readonly purpose: NetworkPurpose;
  readonly vlan?: number | undefined;
  /** Gateway address with prefix, e.g. `192.168.10.1/24`. */
  readonly subnet?: string | undefined;
  readonly dhcp_enabled: boolean;
  readonly enabled: boolean;
}

export type NewNetwork = Omit<Network, 'id' | 'enabled'>;

export interface SystemInfo {
  readonly version: string;
  readonly hostname: string;
  /** Seconds. */
  readonly uptime: number;
  readonly cpu_percent: number;
  readonly mem_percent: number;
  readonly num_clients: number;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ControllerClient {
  /** The site every call addresses. */
  readonly site: string;

  listDevices(): Promise<Device[]>;
  /** MAC comparison is case-insensitive. */
  getDevice(mac: string): Promise<Device | undefined>;
  renameDevice(mac: string, name: string): Promise<Device | undefined>;

  listFirewallPolicies(): Promise<FirewallPolicy[]>;
  getFirewallPolicy(id: string): Promise<FirewallPolicy | undefined>;
  createFirewallPolicy(input: NewFirewallPolicy): Promise<FirewallPolicy>;
  updateFirewallPolicy(id: string, patch: FirewallPolicyPatch): Promise<FirewallPolicy | undefined>;
  deleteFirewallPolicy(id: string): Promise<boolean>;

  listPortForwards(): Promise<PortForward[]>;
  getPortForward(id: string): Promise<PortForward | undefined>;
  setPortForwardEnabled(id: string, enabled: boolean): Promise<PortForward | undefined>;

  listNetworks(): Promise<Network[]>;
  createNetwork(input: NewNetwork): Promise<Network>;

  getSystemInfo(): Promise<SystemInfo>;
}

/** Initial state for a MemoryControllerClient. */
export interface ControllerSeed {
  readonly site: string;
  readonly system: SystemInfo;
  readonly devices: ReadonlyArray<Device>;
  readonly firewallPolicies: ReadonlyArray<FirewallPolicy>;
  readonly portForwards: ReadonlyArray<PortForward>;
  readonly networks: ReadonlyArray<Network>;
}

export interface MemoryControllerOptions {
  /** Id source for created records. Defaults to 24 random hex characters. */
  readonly nextId?: (() => string) | undefined;
}

/** First index handed out in a ruleset with no policies. */
export const FIRST_RULE_INDEX = 2000;

/**
 * In-memory controller. Records are kept in insertion order, which is the
 * order list calls return them in.
 */
export class MemoryControllerClient implements ControllerClient {
  readonly site: string;
  private readonly system: SystemInfo;
  private readonly devices = new Map<string, Device>();
  private readonly policies = new Map<string, FirewallPolicy>();
  private readonly forwards = new Map<string, PortForward>();
  private readonly networks = new Map<string, Network>();
  private readonly nextId: () => string;

  constructor(seed: ControllerSeed, options: MemoryControllerOptions = {}) {
    this.site = seed.site;
    this.system = { ...seed.system };
    for (const device of seed.devices) this.devices.set(device.mac.toLowerCase(), { ...device });
    for (const policy of seed.firewallPolicies) this.policies.set(policy.id, { ...policy });
    for (const forward of seed.portForwards) this.forwards.set(forward.id, { ...forward });
    for (const network of seed.networks) this.networks.set(network.id, { ...network });
    this.nextId = options.nextId ?? (() => randomBytes(12).toString('hex'));
  }

  async listDevices(): Promise<Device[]> {
    return [...this.devices.values()].map((d) => ({ ...d }));
  }

  async getDevice(mac: string): Promise<Device | undefined> {
    return copy(this.devices.get(mac.toLowerCase()));
  }

  async renameDevice(mac: string, name: string): Promise<Device | undefined> {
    const key = mac.toLowerCase();
    const device = this.devices.get(key);
    if (device === undefined) return undefined;
    const renamed = { ...device, name };
    this.devices.set(key, renamed);
    return { ...renamed };
  }

  async listFirewallPolicies(): Promise<FirewallPolicy[]> {
    return [...this.policies.values()].map((p) => ({ ...p }));
  }

  async getFirewallPolicy(id: string): Promise<FirewallPolicy | undefined> {
    return copy(this.policies.get(id));
  }

  async createFirewallPolicy(input: NewFirewallPolicy): Promise<FirewallPolicy> {
    const policy: FirewallPolicy = {
      ...input,
      id: this.nextId(),
      rule_index: input.rule_index ?? this.nextRuleIndex(input.ruleset),
      predefined: false,
    };
    this.policies.set(policy.id, policy);
    return { ...policy };
  }

  async updateFirewallPolicy(id: string, patch: FirewallPolicyPatch): Promise<FirewallPolicy | undefined> {
    const policy = this.policies.get(id);
    if (policy === undefined) return undefined;
    const updated: FirewallPolicy = {
      ...policy,
      name: patch.name ?? policy.name,
      enabled: patch.enabled ?? policy.enabled,
      action: patch.action ?? policy.action,
      rule_index: patch.rule_index ?? policy.rule_index,
      description: patch.description ?? policy.description,
    };
    this.policies.set(id, updated);
    return { ...updated };
  }

  async deleteFirewallPolicy(id: string): Promise<boolean> {
    return this.policies.delete(id);
  }

  async listPortForwards(): Promise<PortForward[]> {
    return [...this.forwards.values()].map((f) => ({ ...f }));
  }

  async getPortForward(id: string): Promise<PortForward | undefined> {
    return copy(this.forwards.get(id));
  }

  async setPortForwardEnabled(id: string, enabled: boolean): Promise<PortForward | undefined> {
    const forward = this.forwards.get(id);
    if (forward === undefined) return undefined;
    const updated = { ...forward, enabled };
    this.forwards.set(id, updated);
    return { ...updated };
  }

  async listNetworks(): Promise<Network[]> {
    return [...this.networks.values()].map((n) => ({ ...n }));
  }

  async createNetwork(input: NewNetwork): Promise<Network> {
    const network: Network = { ...input, id: this.nextId(), enabled: true };
    this.networks.set(network.id, network);
    return { ...network };
  }

  async getSystemInfo(): Promise<SystemInfo> {
    return { ...this.system };
  }

  private nextRuleIndex(ruleset: FirewallRuleset): number {
    let highest = FIRST_RULE_INDEX - 1;
    for (const policy of this.policies.values()) {
      if (policy.ruleset === ruleset && policy.rule_index > highest) {
        highest = policy.rule_index;
      }
    }
    return highest + 1;
  }
}

function copy<T extends object>(record: T | undefined): T | undefined {
  return record === undefined ? undefined : { ...record };
}
