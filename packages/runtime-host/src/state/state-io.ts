/**
 * Toolgate Runtime Host: StateIO
 *
 * An injectable I/O abstraction for the append-only logs the gateway keeps
 * under its home directory.
 *
 * Two implementations are provided:
 *   - FileStateIO: durable file I/O under `<home>/logs/`
 *   - MemoryStateIO: in-memory I/O for tests and embedded use
 *
 * Callers pass bare log filenames (e.g. `decisions.jsonl`); the
 * implementation decides where they live.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Append one line to a log file, creating the file and its directory on
   * demand. A newline is written after `line`.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text of a log file, or an empty string if it does not
   * exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Appends to `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous: an appended line is on disk before appendLine() returns.
 * A missing file reads as empty; every other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  get logsDir(): string {
    return join(this.homeDir, 'logs');
  }

  appendLine(logfilename: string, line: string): void {
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(join(this.logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.logsDir, logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/** In-memory StateIO. Instances are fully isolated from each other. */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    // Same shape FileStateIO produces: 'a\nb\n'
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** True if `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
