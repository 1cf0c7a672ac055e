/**
 * Toolgate Runtime Host: File-backed Decision Log Sink
 *
 * Implements the kernel's LogSink by appending one JSONL line per decision
 * to `decisions.jsonl` through the injected StateIO. This is the only place
 * decision log entries are written to disk.
 *
 * Each line carries a ULID `event_id` so readers can dedupe lines when log
 * files are merged. Keys with undefined values are omitted.
 */

import type { DecisionLog, LogSink } from '@toolgate/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const DECISION_LOG_FILE = 'decisions.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: DecisionLog): void {
    this.stateIO.appendLine(DECISION_LOG_FILE, JSON.stringify({ event_id: this.nextId(), ...entry }));
  }
}
