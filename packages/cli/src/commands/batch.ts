/**
 * toolgate batch: Submit operations as background jobs
 *
 * Reads `{"operations": [{"tool": ..., "arguments": {...}}, ...]}` from a
 * file (or stdin with `-`), submits every entry, waits for the jobs to
 * settle, and prints their final status.
 */

import { text } from 'node:stream/consumers';
import { Command } from 'commander';
import { JobStatus, errorMessage } from '@toolgate/kernel';
import type { ValidationResult } from '@toolgate/kernel';
import { readJsonFile } from '@toolgate/runtime-host';
import { renderBatchStatus, renderIssues, renderResponse } from '../render.js';
import { printJson, runtimeFor } from './shared.js';

export async function readBatchInput(file: string): Promise<ValidationResult<unknown>> {
  if (file !== '-') {
    return readJsonFile(file);
  }
  const raw = await text(process.stdin);
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (err: unknown) {
    return { ok: false, errors: [{ message: `invalid JSON: ${errorMessage(err)}`, context: 'stdin' }] };
  }
}

export const batchCommand = new Command('batch')
  .description('Run a batch of operations as background jobs and report their status')
  .argument('<file>', "Batch request JSON file, or '-' for stdin")
  .option('--json', 'Output the batch status response as JSON')
  .action(async (file: string, options: { json?: boolean }, command: Command) => {
    const input = await readBatchInput(file);
    if (!input.ok) {
      process.stderr.write(renderIssues('Cannot read batch request', input.errors));
      process.exitCode = 1;
      return;
    }

    const { gateway } = await runtimeFor(command);
    const submitted = gateway.submitBatch(input.value);
    if ('code' in submitted) {
      process.stderr.write(renderResponse(submitted));
      process.exitCode = 1;
      return;
    }

    await gateway.jobs.settled();
    const status = gateway.batchStatus({ jobIds: submitted.jobs.map((job) => job.jobId) });
    if ('code' in status) {
      process.stderr.write(renderResponse(status));
      process.exitCode = 1;
      return;
    }

    if (options.json === true) {
      printJson(status);
    } else {
      process.stdout.write(renderBatchStatus(status));
    }
    if (status.jobs.some((job) => job.status === JobStatus.Error)) {
      process.exitCode = 1;
    }
  });
