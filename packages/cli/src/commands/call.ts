/**
 * toolgate call: Dispatch one operation
 *
 * Mutating operations return a preview unless --confirm is given (or
 * auto-confirm is on). Exits 1 on an error response; a preview is not an
 * error.
 */

import { Command } from 'commander';
import { errorMessage, isJsonObject } from '@toolgate/kernel';
import type { ValidationResult } from '@toolgate/kernel';
import { renderIssues, renderResponse } from '../render.js';
import { printJson, runtimeFor } from './shared.js';

/** Parse the --args value: a JSON object. */
export function parseArguments(text: string): ValidationResult<Record<string, unknown>> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err: unknown) {
    return { ok: false, errors: [{ message: `invalid JSON: ${errorMessage(err)}`, context: '--args' }] };
  }
  if (!isJsonObject(value)) {
    return { ok: false, errors: [{ message: 'must be a JSON object', context: '--args' }] };
  }
  return { ok: true, value };
}

export const callCommand = new Command('call')
  .description('Dispatch one operation')
  .argument('<tool>', 'Operation name (see `toolgate tools`)')
  .option('--args <json>', 'Arguments as a JSON object', '{}')
  .option('--confirm', 'Apply the change instead of previewing it', false)
  .option('--json', 'Output the raw response as JSON')
  .action(async (tool: string, options: { args: string; confirm: boolean; json?: boolean }, command: Command) => {
    const args = parseArguments(options.args);
    if (!args.ok) {
      process.stderr.write(renderIssues('Invalid arguments', args.errors));
      process.exitCode = 1;
      return;
    }

    const { gateway } = await runtimeFor(command);
    const response = await gateway.dispatch({
      tool,
      arguments: options.confirm ? { ...args.value, confirm: true } : args.value,
    });

    if (options.json === true) {
      printJson(response);
    } else {
      process.stdout.write(renderResponse(response));
    }
    if ('code' in response) {
      process.exitCode = 1;
    }
  });
