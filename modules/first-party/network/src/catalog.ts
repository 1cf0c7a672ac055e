/**
 * Toolgate Network Module: Handler Catalog
 *
 * Maps each module id to a dynamic import of its operations. Building the
 * catalog imports nothing; a registry decides when each loader runs.
 */

import type { HandlerCatalog, ModuleLoader } from '@toolgate/kernel';
import type { NetworkServices } from './services.js';

export const NETWORK_CATALOG: HandlerCatalog<NetworkServices> = new Map<string, ModuleLoader<NetworkServices>>([
  ['devices', async () => (await import('./operations/devices.js')).DEVICES_MODULE],
  ['firewall', async () => (await import('./operations/firewall.js')).FIREWALL_MODULE],
  ['port_forwards', async () => (await import('./operations/port-forwards.js')).PORT_FORWARDS_MODULE],
  ['networks', async () => (await import('./operations/networks.js')).NETWORKS_MODULE],
  ['stats', async () => (await import('./operations/stats.js')).STATS_MODULE],
]);
