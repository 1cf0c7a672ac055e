/**
 * Toolgate Gateway: Request Schemas
 *
 * Wire requests arrive as parsed JSON of unknown shape. These schemas are
 * the single place their structure is checked.
 */

import { z } from 'zod';
import type { ValidationIssue } from '@toolgate/kernel';

export const DispatchRequestSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

export const BatchSubmitRequestSchema = z.object({
  operations: z.array(DispatchRequestSchema),
});

export const BatchStatusRequestSchema = z.object({
  jobIds: z.array(z.string()),
});

export type ParsedDispatchRequest = z.infer<typeof DispatchRequestSchema>;

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => {
    const context = issue.path.map(String).join('.');
    return context === '' ? { message: issue.message } : { message: issue.message, context };
  });
}

/** Best-effort operation name from a request that failed validation. */
export function requestedTool(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'tool' in raw && typeof raw.tool === 'string') {
    return raw.tool;
  }
  return '(malformed request)';
}
