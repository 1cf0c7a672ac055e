/**
 * Global CLI options, validated once per command from commander's merged
 * option values.
 */

import { z } from 'zod';

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  home: z.string().optional(),
  mode: z.string().optional(),
  logLevel: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** Accepts commander's `optsWithGlobals()`; command-specific keys are stripped. */
export function globalOptions(raw: unknown): GlobalOptions {
  return GlobalOptionsSchema.parse(raw);
}
