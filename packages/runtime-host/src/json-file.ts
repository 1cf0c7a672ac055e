/**
 * Toolgate Runtime Host: JSON file helpers
 *
 * Thin synchronous wrappers used for configuration and manifest files.
 * Parsed content is returned as `unknown`; callers validate it.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage } from '@toolgate/kernel';
import type { ValidationResult } from '@toolgate/kernel';
import { isNodeError } from './state/state-io.js';

/**
 * Read and parse a JSON file.
 *
 * A missing file, unreadable file, or invalid JSON is reported as a
 * validation failure whose context is the path.
 */
export function readJsonFile(path: string): ValidationResult<unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    const message = isNodeError(err, 'ENOENT') ? 'file not found' : errorMessage(err);
    return { ok: false, errors: [{ message, context: path }] };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (err: unknown) {
    return { ok: false, errors: [{ message: `invalid JSON: ${errorMessage(err)}`, context: path }] };
  }
}

/** Write `value` as pretty-printed JSON, creating parent directories. */
export function writeJsonFile(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}
