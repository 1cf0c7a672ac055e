/**
 * Toolgate Kernel: Operation Manifest Types
 *
 * A manifest is the pre-built, static description of every operation,
 * used to populate the registry in lazy mode without importing any
 * handler code. It is generated from the live catalog (see
 * generateManifest in @toolgate/operation-loader) and validated on load.
 */

import type { JsonSchema, OperationAction, OperationCategory } from './operation.js';

/** The manifest format version this kernel reads and writes. */
export const MANIFEST_VERSION = 1;

export interface ManifestEntry {
  readonly name: string;
  readonly description: string;
  readonly category: OperationCategory;
  readonly action: OperationAction;
  readonly mutating: boolean;
  /** Catalog key of the module that provides the handler. */
  readonly module_id: string;
  readonly input_schema: JsonSchema;
  readonly output_schema?: JsonSchema | undefined;
}

export interface OperationManifest {
  readonly version: typeof MANIFEST_VERSION;
  /** ISO 8601 generation time. Informational only. */
  readonly generated_at: string;
  readonly count: number;
  readonly operations: ReadonlyArray<ManifestEntry>;
}
