/**
 * Toolgate Operation Loader: Manifest Generation
 *
 * Builds the lazy-mode manifest by importing every catalog module once and
 * recording each operation's descriptor. The output is deterministic apart
 * from generated_at: entries are sorted by name.
 */

import { MANIFEST_VERSION } from '@toolgate/kernel';
import type { HandlerCatalog, ManifestEntry, OperationManifest } from '@toolgate/kernel';

export interface GenerateOptions {
  /** Clock used for generated_at. Defaults to the system clock. */
  readonly clock?: (() => Date) | undefined;
}

/**
 * Generate a manifest from a handler catalog.
 *
 * @throws {Error} If a module fails to import, reports a different
 *   module_id than its catalog key, or repeats an operation name
 */
export async function generateManifest<S>(
  catalog: HandlerCatalog<S>,
  options: GenerateOptions = {},
): Promise<OperationManifest> {
  const clock = options.clock ?? (() => new Date());
  const entries = new Map<string, ManifestEntry>();

  for (const [moduleId, load] of catalog) {
    const module = await load();
    if (module.module_id !== moduleId) {
      throw new Error(`catalog key '${moduleId}' loaded module '${module.module_id}'`);
    }
    for (const op of module.operations) {
      if (entries.has(op.name)) {
        throw new Error(`Duplicate operation name in catalog: ${op.name}`);
      }
      entries.set(op.name, {
        name: op.name,
        description: op.description,
        category: op.category,
        action: op.action,
        mutating: op.mutating,
        module_id: moduleId,
        input_schema: op.input_schema,
        ...(op.output_schema !== undefined ? { output_schema: op.output_schema } : {}),
      });
    }
  }

  const operations = Array.from(entries.values()).sort((a, b) => a.name.localeCompare(b.name));
  return {
    version: MANIFEST_VERSION,
    generated_at: clock().toISOString(),
    count: operations.length,
    operations,
  };
}
