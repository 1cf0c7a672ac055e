/**
 * Toolgate Operation Loader: Manifest Validator
 *
 * Validates a manifest read from disk before any entry reaches the
 * registry. Categories and actions are checked against the kernel enums,
 * so a manifest written for a different vocabulary is rejected at startup
 * rather than producing entries the gate cannot evaluate.
 *
 * Checks, in order:
 * 1. Structure (zod): version, generated_at, count, operations[]
 * 2. Each entry's mutating flag agrees with its action
 * 3. Operation names are unique
 * 4. count equals operations.length
 */

import { z } from 'zod';
import {
  MANIFEST_VERSION,
  OperationAction,
  OperationCategory,
  isMutatingAction,
} from '@toolgate/kernel';
import type { OperationManifest, ValidationIssue, ValidationResult } from '@toolgate/kernel';

const JsonSchemaObject = z.record(z.string(), z.unknown());

const ManifestEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  category: z.enum(OperationCategory),
  action: z.enum(OperationAction),
  mutating: z.boolean(),
  module_id: z.string().min(1),
  input_schema: JsonSchemaObject,
  output_schema: JsonSchemaObject.optional(),
});

const ManifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  generated_at: z.string(),
  count: z.number().int().nonnegative(),
  operations: z.array(ManifestEntrySchema),
});

export class ManifestValidator {
  /**
   * Validate an unknown value (typically parsed JSON) as a manifest.
   *
   * @returns the typed manifest, or every issue found
   */
  validate(raw: unknown): ValidationResult<OperationManifest> {
    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        errors: parsed.error.issues.map((issue) => {
          const context = issue.path.map(String).join('.');
          return context === '' ? { message: issue.message } : { message: issue.message, context };
        }),
      };
    }

    const manifest = parsed.data;
    const errors: ValidationIssue[] = [];
    const seen = new Set<string>();

    manifest.operations.forEach((entry, index) => {
      const context = `operations.${index}`;
      if (entry.mutating !== isMutatingAction(entry.action)) {
        errors.push({
          message: `${entry.name}: mutating=${String(entry.mutating)} contradicts action '${entry.action}'`,
          context,
        });
      }
      if (seen.has(entry.name)) {
        errors.push({ message: `Duplicate operation name: ${entry.name}`, context });
      }
      seen.add(entry.name);
    });

    if (manifest.count !== manifest.operations.length) {
      errors.push({
        message: `count is ${manifest.count} but manifest lists ${manifest.operations.length} operations`,
        context: 'count',
      });
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: manifest };
  }
}
