/**
 * toolgate tools: Discovery
 *
 * Lists every registered operation, denied ones included, with the
 * registration status the permission gate gave it.
 */

import { Command } from 'commander';
import { renderTools } from '../render.js';
import { printJson, runtimeFor } from './shared.js';

export const toolsCommand = new Command('tools')
  .description('List every operation, with category, action and status')
  .option('--json', 'Output the discovery response as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    const { gateway } = await runtimeFor(command);
    const discovery = gateway.discover();
    if (options.json === true) {
      printJson(discovery);
      return;
    }
    process.stdout.write(renderTools(discovery));
  });
