/**
 * Toolgate Kernel: Operation Types
 *
 * Defines the closed category/action vocabulary and the immutable
 * OperationDescriptor every registry entry wraps.
 *
 * Categories and actions are enumerations, not free strings. Configuration
 * keys, manifest entries, and handler definitions are all parsed against
 * these enums at load time, so an unknown category is a startup error
 * rather than a silently-denied dispatch.
 */

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/**
 * The four actions an operation may perform on its category.
 *
 * Every action other than Read is mutating and is routed through the
 * confirmation protocol.
 */
export enum OperationAction {
  Read = 'read',
  Create = 'create',
  Update = 'update',
  Delete = 'delete',
}

/** True for every action that changes controller state. */
export function isMutatingAction(action: OperationAction): boolean {
  return action !== OperationAction.Read;
}

/**
 * Parse a free-form action identifier (case-insensitive).
 *
 * @returns the matching action, or undefined if the text names no action
 */
export function parseAction(raw: string): OperationAction | undefined {
  const key = raw.trim().toLowerCase();
  return Object.values(OperationAction).find((a) => a === key);
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

/**
 * The resource categories permissions are granted on.
 *
 * Values are the canonical configuration keys (snake_case, plural).
 */
export enum OperationCategory {
  Devices = 'devices',
  Clients = 'clients',
  Guests = 'guests',
  Networks = 'networks',
  Wlans = 'wlans',
  FirewallPolicies = 'firewall_policies',
  PortForwards = 'port_forwards',
  TrafficRoutes = 'traffic_routes',
  QosRules = 'qos_rules',
  VpnClients = 'vpn_clients',
  VpnServers = 'vpn_servers',
  Routes = 'routes',
  UserGroups = 'usergroups',
  Vouchers = 'vouchers',
  Events = 'events',
  Snmp = 'snmp',
  Stats = 'stats',
  System = 'system',
}

/**
 * Shorthand names accepted wherever a category is parsed from text
 * (configuration keys, CLI flags). Canonical values always parse as-is.
 */
export const CATEGORY_ALIASES: ReadonlyMap<string, OperationCategory> = new Map([
  ['firewall', OperationCategory.FirewallPolicies],
  ['qos', OperationCategory.QosRules],
  ['vpn_client', OperationCategory.VpnClients],
  ['vpn_server', OperationCategory.VpnServers],
  ['network', OperationCategory.Networks],
  ['wlan', OperationCategory.Wlans],
  ['device', OperationCategory.Devices],
  ['client', OperationCategory.Clients],
  ['guest', OperationCategory.Guests],
  ['traffic_route', OperationCategory.TrafficRoutes],
  ['port_forward', OperationCategory.PortForwards],
  ['event', OperationCategory.Events],
  ['voucher', OperationCategory.Vouchers],
  ['usergroup', OperationCategory.UserGroups],
  ['route', OperationCategory.Routes],
  ['stat', OperationCategory.Stats],
]);

/**
 * Parse a category identifier or one of its aliases (case-insensitive).
 *
 * @returns the canonical category, or undefined if the text is unknown
 */
export function parseCategory(raw: string): OperationCategory | undefined {
  const key = raw.trim().toLowerCase();
  const canonical = Object.values(OperationCategory).find((c) => c === key);
  return canonical ?? CATEGORY_ALIASES.get(key);
}

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

/** A JSON Schema document, as published to callers through Discovery. */
export type JsonSchema = Readonly<Record<string, unknown>>;

/**
 * Where the executable handler for an operation lives.
 *
 * - `resident`: the handler was imported at startup and is held in memory.
 * - `deferred`: only the manifest entry is known; the handler is imported
 *   from `module_id` on first dispatch.
 */
export interface HandlerRef {
  readonly kind: 'resident' | 'deferred';
  readonly module_id: string;
}

/**
 * The immutable description of one operation.
 *
 * Built from the live handler in eager mode, or from a manifest entry in
 * lazy mode. Never mutated after construction; lazy loading changes the
 * registry entry that wraps it, not the descriptor.
 */
export interface OperationDescriptor {
  /** Globally unique operation name (e.g. `toggle_firewall_policy`). */
  readonly name: string;
  readonly description: string;
  readonly category: OperationCategory;
  readonly action: OperationAction;
  /** Derived: `action !== read`. */
  readonly mutating: boolean;
  /** Published input schema. Mutating operations include `confirm`. */
  readonly input_schema: JsonSchema;
  readonly output_schema?: JsonSchema | undefined;
  readonly handler_ref: HandlerRef;
}
