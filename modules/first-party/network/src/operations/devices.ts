/**
 * Toolgate Network Module: Device Operations
 *
 *   list_devices   devices/read
 *   get_device     devices/read
 *   rename_device  devices/update
 */

import { z } from 'zod';
import {
  OperationAction,
  OperationCategory,
  OperationFailure,
  defineOperation,
  updatePreview,
} from '@toolgate/kernel';
import type { OperationModule } from '@toolgate/kernel';
import { DeviceState } from '../controller.js';
import type { Device } from '../controller.js';
import type { NetworkServices } from '../services.js';

export const DEVICE_TYPES = ['all', 'ap', 'switch', 'gateway', 'pdu'] as const;
export const DEVICE_STATUS_FILTERS = ['all', 'online', 'offline', 'pending', 'adopting', 'provisioning', 'upgrading'] as const;

const TYPE_PREFIXES: Readonly<Record<Exclude<(typeof DEVICE_TYPES)[number], 'all'>, ReadonlyArray<string>>> = {
  ap: ['uap', 'u6', 'u7'],
  switch: ['usw', 'usk'],
  gateway: ['ugw', 'udm', 'uxg'],
  pdu: ['usp'],
};

const STATUS_FILTER_STATES: Readonly<Record<Exclude<(typeof DEVICE_STATUS_FILTERS)[number], 'all'>, DeviceState>> = {
  online: DeviceState.Online,
  offline: DeviceState.Offline,
  pending: DeviceState.PendingAdoption,
  adopting: DeviceState.Adopting,
  provisioning: DeviceState.Provisioning,
  upgrading: DeviceState.Upgrading,
};

const STATE_LABELS: Readonly<Record<DeviceState, string>> = {
  [DeviceState.Offline]: 'offline',
  [DeviceState.Online]: 'online',
  [DeviceState.PendingAdoption]: 'pending_adoption',
  [DeviceState.Adopting]: 'adopting',
  [DeviceState.Provisioning]: 'provisioning',
  [DeviceState.Upgrading]: 'upgrading',
  [DeviceState.HeartbeatMissed]: 'heartbeat_missed',
};

export interface DeviceSummary {
  readonly mac: string;
  readonly name: string;
  readonly model: string;
  readonly type: string;
  readonly ip: string;
  readonly status: string;
  readonly firmware: string;
  readonly adopted: boolean;
  readonly clients: number;
}

export function summarizeDevice(device: Device): DeviceSummary {
  return {
    mac: device.mac,
    name: device.name,
    model: device.model,
    type: device.type,
    ip: device.ip,
    status: STATE_LABELS[device.state],
    firmware: device.version,
    adopted: device.adopted,
    clients: device.num_sta,
  };
}

const MacInput = z.object({
  mac: z.string().min(1).describe('Device MAC address'),
});

async function requireDevice(services: NetworkServices, mac: string): Promise<Device> {
  const device = await services.controller.getDevice(mac);
  if (device === undefined) {
    throw new OperationFailure(`Device not found with MAC address: ${mac}`);
  }
  return device;
}

// ---------------------------------------------------------------------------
// list_devices
// ---------------------------------------------------------------------------

const ListDevicesInput = z.object({
  device_type: z.enum(DEVICE_TYPES).default('all'),
  status: z.enum(DEVICE_STATUS_FILTERS).default('all'),
});
type ListDevicesArgs = z.infer<typeof ListDevicesInput>;

const listDevices = defineOperation({
  name: 'list_devices',
  description: 'List devices adopted by the controller, optionally filtered by type and status.',
  category: OperationCategory.Devices,
  action: OperationAction.Read,
  input: ListDevicesInput,
  async execute(args: ListDevicesArgs, services: NetworkServices) {
    let devices = await services.controller.listDevices();
    if (args.device_type !== 'all') {
      const prefixes = TYPE_PREFIXES[args.device_type];
      devices = devices.filter((d) => prefixes.some((prefix) => d.type.startsWith(prefix)));
    }
    if (args.status !== 'all') {
      const state = STATUS_FILTER_STATES[args.status];
      devices = devices.filter((d) => d.state === state);
    }
    return {
      site: services.controller.site,
      filter_type: args.device_type,
      filter_status: args.status,
      count: devices.length,
      devices: devices.map(summarizeDevice),
    };
  },
});

// ---------------------------------------------------------------------------
// get_device
// ---------------------------------------------------------------------------

const getDevice = defineOperation({
  name: 'get_device',
  description: 'Get the full record of one device by MAC address.',
  category: OperationCategory.Devices,
  action: OperationAction.Read,
  input: MacInput,
  async execute(args: z.infer<typeof MacInput>, services: NetworkServices) {
    const device = await requireDevice(services, args.mac);
    return { site: services.controller.site, device: { ...device, status: STATE_LABELS[device.state] } };
  },
});

// ---------------------------------------------------------------------------
// rename_device
// ---------------------------------------------------------------------------

const RenameDeviceInput = MacInput.extend({
  name: z.string().trim().min(1).max(128).describe('New display name'),
});
type RenameDeviceArgs = z.infer<typeof RenameDeviceInput>;

const renameDevice = defineOperation({
  name: 'rename_device',
  description: 'Rename a device by MAC address.',
  category: OperationCategory.Devices,
  action: OperationAction.Update,
  input: RenameDeviceInput,
  async execute(args: RenameDeviceArgs, services: NetworkServices) {
    const renamed = await services.controller.renameDevice(args.mac, args.name);
    if (renamed === undefined) {
      throw new OperationFailure(`Device not found with MAC address: ${args.mac}`);
    }
    return {
      mac: renamed.mac,
      name: renamed.name,
      message: `Device ${renamed.mac} renamed to '${renamed.name}'.`,
    };
  },
  async preview(args: RenameDeviceArgs, services: NetworkServices) {
    const device = await requireDevice(services, args.mac);
    return updatePreview({
      resource_type: 'device',
      resource_id: device.mac,
      resource_name: device.name,
      current: { name: device.name, model: device.model, type: device.type },
      updates: { name: args.name },
    });
  },
});

export const DEVICES_MODULE: OperationModule<NetworkServices> = {
  module_id: 'devices',
  operations: [listDevices, getDevice, renameDevice],
};
