/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/toolgate.ts and by tests.
 */

import { Command } from 'commander'
import { batchCommand } from './batch.js'
import { callCommand } from './call.js'
import { logCommand } from './log.js'
import { manifestCommand } from './manifest.js'
import { permissionsCommand } from './permissions.js'
import { toolsCommand } from './tools.js'

export const program = new Command('toolgate')

program
  .description(
    'toolgate: permission-gated network operations with confirm-before-change.\n' +
    'Mutating operations return a preview until called again with --confirm.',
  )
  .version('0.1.0')
  .option('--config <path>', 'Config file (default: $TOOLGATE_CONFIG, then <home>/config.json)')
  .option('--home <dir>', 'State directory (default: $TOOLGATE_HOME, then ~/.toolgate)')
  .option('--mode <mode>', 'Registration mode: eager or lazy')
  .option('--log-level <level>', 'Operational log level')

program.addCommand(toolsCommand)
program.addCommand(callCommand)
program.addCommand(batchCommand)
program.addCommand(permissionsCommand)
program.addCommand(manifestCommand)
program.addCommand(logCommand)
