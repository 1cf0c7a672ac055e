/**
 * toolgate manifest: Generate the operation manifest
 *
 * Imports every operation module once and writes the manifest lazy
 * registration reads at startup. Defaults to the configured manifest path.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { generateManifest } from '@toolgate/operation-loader';
import { NETWORK_CATALOG } from '@toolgate/module-network';
import { writeJsonFile } from '@toolgate/runtime-host';
import { t } from '../theme.js';
import { configFor } from './shared.js';

export const manifestCommand = new Command('manifest')
  .description('Generate the operation manifest used by lazy registration')
  .option('--out <path>', 'Write here instead of the configured manifest path')
  .action(async (options: { out?: string }, command: Command) => {
    const config = configFor(command);
    const path = options.out !== undefined ? resolve(options.out) : config.registration.manifestPath;
    const manifest = await generateManifest(NETWORK_CATALOG);
    writeJsonFile(path, manifest);
    process.stdout.write(`${t.green('wrote')} ${manifest.count} operations to ${path}\n`);
  });
