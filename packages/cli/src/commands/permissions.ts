/**
 * toolgate permissions: Show the effective permission matrix
 *
 * One decision per category and action, with the source that decided it
 * (environment override, configured category, configured default, category
 * default, or global default).
 */

import { Command } from 'commander';
import { PermissionGate } from '@toolgate/kernel';
import { permissionMatrix } from '../permission-matrix.js';
import { renderPermissions } from '../render.js';
import { configFor, printJson } from './shared.js';

export const permissionsCommand = new Command('permissions')
  .description('Show the effective permission for every category and action')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    const config = configFor(command);
    const rows = permissionMatrix(new PermissionGate(config.permissions, process.env));
    if (options.json === true) {
      printJson(rows);
      return;
    }
    process.stdout.write(renderPermissions(rows));
  });
