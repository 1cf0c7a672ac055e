/**
 * Toolgate Kernel: Log Sink Interface
 *
 * The injection point for decision log persistence. The kernel owns this
 * contract; concrete sinks live in the runtime host, so the kernel itself
 * never writes to disk.
 */

import type { DecisionLog } from '../types/decision.js';

/**
 * Receives one entry per invocation attempt.
 *
 * append() is synchronous: the entry must be durable before the gateway
 * returns its response. Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: DecisionLog): void;
}
