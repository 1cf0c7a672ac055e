/**
 * toolgate log: Query the decision log
 *
 * Reads <home>/logs/decisions.jsonl. Every dispatch and batch job is
 * logged whatever its outcome, so this is the audit trail of what was
 * previewed, executed, denied or failed.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { DispatchDecision } from '@toolgate/kernel';
import { DECISION_LOG_FILE, FileStateIO, readDecisionLog } from '@toolgate/runtime-host';
import { renderDecisions, renderIssues } from '../render.js';
import { configFor, printJson } from './shared.js';

const LogOptionsSchema = z.object({
  operation: z.string().optional(),
  decision: z.enum(DispatchDecision).optional(),
  limit: z.coerce.number().int().positive().default(100),
  json: z.boolean().optional(),
});

export const logCommand = new Command('log')
  .description('Query the decision log')
  .option('--operation <name>', 'Only entries for this operation')
  .option('--decision <decision>', `Only entries with this decision (${Object.values(DispatchDecision).join('|')})`)
  .option('--limit <n>', 'Show at most the latest n entries', '100')
  .option('--json', 'Output as JSON')
  .action((raw: unknown, command: Command) => {
    const parsed = LogOptionsSchema.safeParse(raw);
    if (!parsed.success) {
      process.stderr.write(
        renderIssues(
          'Invalid options',
          parsed.error.issues.map((issue) => ({ message: issue.message, context: `--${issue.path.map(String).join('.')}` })),
        ),
      );
      process.exitCode = 1;
      return;
    }
    const options = parsed.data;

    const config = configFor(command);
    const content = new FileStateIO(config.home).readLogRaw(DECISION_LOG_FILE);
    const result = readDecisionLog(content, {
      operation: options.operation,
      decision: options.decision,
      limit: options.limit,
    });

    if (options.json === true) {
      printJson(result);
      return;
    }
    process.stdout.write(renderDecisions(result));
  });
