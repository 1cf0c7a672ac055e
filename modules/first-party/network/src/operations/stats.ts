/**
 * Toolgate Network Module: Statistics
 */

import { z } from 'zod';
import { OperationAction, OperationCategory, defineOperation } from '@toolgate/kernel';
import type { OperationModule } from '@toolgate/kernel';
import { DeviceState } from '../controller.js';
import type { NetworkServices } from '../services.js';

const SystemStatsOutput = z.object({
  site: z.string(),
  hostname: z.string(),
  version: z.string(),
  uptime_seconds: z.number(),
  cpu_percent: z.number(),
  mem_percent: z.number(),
  clients: z.number().int(),
  devices: z.object({ total: z.number().int(), online: z.number().int() }),
});

const getSystemStats = defineOperation({
  name: 'get_system_stats',
  description: 'Controller health: version, uptime, load, client and device counts.',
  category: OperationCategory.Stats,
  action: OperationAction.Read,
  input: z.object({}),
  output: SystemStatsOutput,
  async execute(_args: unknown, services: NetworkServices): Promise<z.infer<typeof SystemStatsOutput>> {
    const [info, devices] = await Promise.all([
      services.controller.getSystemInfo(),
      services.controller.listDevices(),
    ]);
    return {
      site: services.controller.site,
      hostname: info.hostname,
      version: info.version,
      uptime_seconds: info.uptime,
      cpu_percent: info.cpu_percent,
      mem_percent: info.mem_percent,
      clients: info.num_clients,
      devices: {
        total: devices.length,
        online: devices.filter((d) => d.state === DeviceState.Online).length,
      },
    };
  },
});

export const STATS_MODULE: OperationModule<NetworkServices> = {
  module_id: 'stats',
  operations: [getSystemStats],
};
