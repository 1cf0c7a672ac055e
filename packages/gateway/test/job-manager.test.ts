/**
 * Toolgate Gateway: Job Manager Tests
 *
 *   JM-U1: a submitted job is pending until a later microtask
 *   JM-U2: statuses only move forward and timestamps are stamped
 *   JM-U3: arguments are deep-copied and frozen at submission
 *   JM-U4: a rejecting runner ends the job as HANDLER_ERROR
 *   JM-U5: submitBatch and statusBatch preserve length and order
 *   JM-U6: a repeated job id is refused
 *   JM-U7: settled() waits for jobs submitted while others run
 */

import { describe, it, expect } from 'vitest';
import { GatewayErrorCode, JobStatus } from '@toolgate/kernel';
import { JobManager } from '../src/job-manager.js';
import type { JobRunner } from '../src/job-manager.js';

const echoRunner: JobRunner = async (operation, args) => ({ ok: true, result: { operation, args } });

function sequentialIds(): () => string {
  let n = 0;
  return () => `job-${++n}`;
}

describe('JobManager', () => {
  it('JM-U1: a submitted job is pending until a later microtask', async () => {
    const jobs = new JobManager(echoRunner, { idGenerator: sequentialIds() });
    const id = jobs.submit('stat.read', { site: 'a' });

    expect(id).toBe('job-1');
    expect(jobs.status(id)?.status).toBe(JobStatus.Pending);

    await jobs.settled();
    expect(jobs.status(id)?.status).toBe(JobStatus.Done);
    expect(jobs.status(id)?.result).toEqual({ operation: 'stat.read', args: { site: 'a' } });
  });

  it('JM-U2: statuses only move forward and timestamps are stamped', async () => {
    const seen: JobStatus[] = [];
    let jobs: JobManager | undefined;
    const runner: JobRunner = async (_op, _args, { job_id }) => {
      const current = jobs?.status(job_id)?.status;
      if (current !== undefined) seen.push(current);
      return { ok: true, result: null };
    };
    const clock = (): Date => new Date('2026-03-01T12:00:00.000Z');
    jobs = new JobManager(runner, { clock, idGenerator: sequentialIds() });

    const id = jobs.submit('stat.read');
    seen.push(JobStatus.Pending);
    await jobs.settled();
    const job = jobs.status(id);
    if (job !== undefined) seen.push(job.status);

    expect(seen).toEqual([JobStatus.Pending, JobStatus.Running, JobStatus.Done]);
    expect(job?.created_at).toBe('2026-03-01T12:00:00.000Z');
    expect(job?.started_at).toBe('2026-03-01T12:00:00.000Z');
    expect(job?.completed_at).toBe('2026-03-01T12:00:00.000Z');
    expect(job?.error).toBeUndefined();
  });

  it('JM-U3: arguments are deep-copied and frozen at submission', async () => {
    const jobs = new JobManager(echoRunner);
    const args = { filter: { tags: ['a'] } };
    const id = jobs.submit('list', args);
    args.filter.tags.push('b');

    const job = jobs.status(id);
    expect(job?.arguments).toEqual({ filter: { tags: ['a'] } });
    expect(Object.isFrozen(job?.arguments)).toBe(true);
    expect(Object.isFrozen(job?.arguments['filter'])).toBe(true);
    expect(Object.isFrozen(job)).toBe(true);
    await jobs.settled();
  });

  it('JM-U4: a rejecting runner ends the job as HANDLER_ERROR', async () => {
    const jobs = new JobManager(() => Promise.reject(new Error('socket closed')));
    const id = jobs.submit('stat.read');
    await jobs.settled();

    const job = jobs.status(id);
    expect(job?.status).toBe(JobStatus.Error);
    expect(job?.error).toEqual({
      code: GatewayErrorCode.HandlerError,
      message: 'stat.read failed: socket closed',
    });
    expect(job && 'result' in job).toBe(false);
  });

  it('JM-U5: submitBatch and statusBatch preserve length and order', async () => {
    const jobs = new JobManager(echoRunner, { idGenerator: sequentialIds() });
    const ids = jobs.submitBatch([{ operation: 'a' }, { operation: 'b' }, { operation: 'c' }]);
    expect(ids).toEqual(['job-1', 'job-2', 'job-3']);

    await jobs.settled();
    const batch = jobs.statusBatch(['job-3', 'missing', 'job-1']);
    expect(batch.map((b) => [b.id, b.job?.operation])).toEqual([
      ['job-3', 'c'],
      ['missing', undefined],
      ['job-1', 'a'],
    ]);
  });

  it('JM-U6: a repeated job id is refused', async () => {
    const jobs = new JobManager(echoRunner, { idGenerator: () => 'same' });
    jobs.submit('a');
    expect(() => jobs.submit('b')).toThrow('Job id collision: same');
    await jobs.settled();
    expect(jobs.size).toBe(1);
  });

  it('JM-U7: settled() waits for jobs submitted while others run', async () => {
    let jobs: JobManager | undefined;
    let followUp: string | undefined;
    const runner: JobRunner = async (operation) => {
      if (operation === 'first') {
        followUp = jobs?.submit('second');
      }
      return { ok: true, result: operation };
    };
    jobs = new JobManager(runner);
    jobs.submit('first');
    await jobs.settled();

    expect(followUp).toBeDefined();
    expect(jobs.status(followUp ?? '')?.status).toBe(JobStatus.Done);
  });
});
