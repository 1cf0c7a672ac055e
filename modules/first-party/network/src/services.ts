/**
 * Toolgate Network Module: Services
 *
 * The object the gateway injects into every network operation.
 */

import { MemoryControllerClient } from './controller.js';
import type { ControllerClient, ControllerSeed, MemoryControllerOptions } from './controller.js';
import { demoSite } from './demo-site.js';

export interface NetworkServices {
  readonly controller: ControllerClient;
}

/** Services over an in-memory controller, seeded with the demo site by default. */
export function createMemoryServices(
  seed: ControllerSeed = demoSite(),
  options: MemoryControllerOptions = {},
): NetworkServices {
  return { controller: new MemoryControllerClient(seed, options) };
}
