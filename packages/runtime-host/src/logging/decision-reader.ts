/**
 * Toolgate Runtime Host: Decision Log Reader
 *
 * Parses the raw text of `decisions.jsonl` into typed events with
 * dedupe-on-read.
 *
 * Guarantees:
 *   DR-U1: every valid line is parsed; malformed lines are counted in parseErrors
 *   DR-U2: events are deduplicated by event_id, first seen wins
 *   DR-U3: content not ending with '\n' has its last line dropped and flagged
 *   DR-U4: output is sorted by (timestamp asc, event_id asc)
 *   DR-U5: filters apply after dedupe; `limit` keeps the most recent events
 *
 * No I/O here. Callers obtain the raw content via StateIO.readLogRaw().
 */

import { z } from 'zod';
import { DispatchDecision, OperationAction, OperationCategory } from '@toolgate/kernel';

const DecisionEventSchema = z.object({
  event_id: z.string().min(1),
  timestamp: z.string(),
  operation: z.string(),
  category: z.enum(OperationCategory).optional(),
  action: z.enum(OperationAction).optional(),
  decision: z.enum(DispatchDecision),
  confirmed: z.boolean(),
  job_id: z.string().optional(),
  input_hash: z.string(),
  duration_ms: z.number(),
  error: z.string().optional(),
});

/** One decision log line as read back from disk. */
export type DecisionEvent = z.infer<typeof DecisionEventSchema>;

export interface DecisionReadStats {
  /** Non-empty lines considered. */
  totalLines: number;
  /** Distinct events after dedupe, before filtering. */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
}

export interface DecisionReadResult {
  readonly events: ReadonlyArray<DecisionEvent>;
  readonly stats: DecisionReadStats;
}

export interface DecisionFilter {
  readonly operation?: string | undefined;
  readonly decision?: DispatchDecision | undefined;
  /** Keep only the last `limit` matching events. */
  readonly limit?: number | undefined;
}

export function readDecisionLog(rawContent: string, filter: DecisionFilter = {}): DecisionReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, DecisionEvent>();

  for (const line of lines) {
    const event = parseLine(line);
    if (event === undefined) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.set(event.event_id, event);
    }
  }

  const sorted = Array.from(seen.values()).sort(
    (a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id),
  );
  const matching = sorted.filter(
    (e) =>
      (filter.operation === undefined || e.operation === filter.operation) &&
      (filter.decision === undefined || e.decision === filter.decision),
  );
  const events =
    filter.limit !== undefined && matching.length > filter.limit
      ? matching.slice(matching.length - filter.limit)
      : matching;

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: seen.size,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

function parseLine(line: string): DecisionEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = DecisionEventSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
