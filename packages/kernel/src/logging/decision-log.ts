/**
 * Toolgate Kernel: Decision Logger
 *
 * Records one DecisionLog entry for every invocation attempt, whatever the
 * outcome: executed, previewed, denied, unknown, invalid, failed to load,
 * or failed in the handler. The gateway calls record() from a finally
 * block so that no path through dispatch goes unlogged.
 *
 * The sink is optional. Without one (tests, embedded use), record() keeps
 * nothing.
 */

import { createHash } from 'node:crypto';
import { canonicalJson } from '../json.js';
import type { DecisionLog } from '../types/decision.js';
import type { LogSink } from './log-sink.js';

export class DecisionLogger {
  constructor(private readonly sink?: LogSink) {}

  record(entry: DecisionLog): void {
    this.sink?.append(entry);
  }
}

/**
 * SHA-256 over the canonical JSON of an invocation.
 *
 * Key order in `args` does not affect the hash.
 */
export function computeInputHash(operation: string, args: unknown): string {
  const canonical = canonicalJson({ operation, arguments: args });
  return createHash('sha256').update(canonical).digest('hex');
}
