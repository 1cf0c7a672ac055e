/**
 * Toolgate Kernel: Built-in Permission Defaults
 *
 * The category defaults ship with the gateway and sit below anything an
 * operator configures. Categories that reconfigure the network itself
 * (networks, wlans, devices, clients) are closed for writes until an
 * operator opens them.
 */

import { OperationAction, OperationCategory } from '../types/operation.js';
import type { ActionPermissions } from './gate.js';

export const CATEGORY_DEFAULTS: Readonly<Partial<Record<OperationCategory, ActionPermissions>>> = {
  [OperationCategory.Networks]: { create: false, update: false },
  [OperationCategory.Wlans]: { create: false, update: false },
  [OperationCategory.Devices]: { create: false, update: false },
  [OperationCategory.Clients]: { create: false, update: false },
  [OperationCategory.VpnServers]: { create: false, update: true },
};

/** Final fallback when neither configuration nor category defaults decide. */
export const GLOBAL_DEFAULTS: Readonly<Record<OperationAction, boolean>> = {
  [OperationAction.Read]: true,
  [OperationAction.Create]: true,
  [OperationAction.Update]: true,
  [OperationAction.Delete]: true,
};
