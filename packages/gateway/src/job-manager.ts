/**
 * Toolgate Gateway: Job Manager
 *
 * Tracks asynchronously executing invocations submitted through Batch
 * Submit.
 *
 * Job invariants:
 * - submit() never blocks on execution; a job starts on a later microtask,
 *   so it is observably Pending immediately after submission
 * - Arguments are deep-copied and frozen at submission
 * - Status moves Pending → Running → Done | Error and never regresses;
 *   every change goes through the TRANSITIONS table
 * - Each job record is written only by its own executing task
 * - A failure inside one job (including an internal bookkeeping error) is
 *   logged and confined to that job
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { pino } from 'pino';
import { GatewayErrorCode, HandlerError, JobStatus, deepFreeze, errorMessage } from '@toolgate/kernel';
import type { Job, JobError } from '@toolgate/kernel';
import { MemoryJobStore } from './job-store.js';
import type { JobStore } from './job-store.js';

/** The terminal outcome of running one job. */
export type JobOutcome =
  | { readonly ok: true; readonly result: unknown }
  | { readonly ok: false; readonly error: JobError };

/** Executes one job's invocation. Expected to resolve, not reject. */
export type JobRunner = (
  operation: string,
  args: Readonly<Record<string, unknown>>,
  context: { readonly job_id: string },
) => Promise<JobOutcome>;

export interface JobManagerOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly idGenerator?: (() => string) | undefined;
  readonly store?: JobStore | undefined;
}

export interface JobSubmission {
  readonly operation: string;
  readonly args?: Readonly<Record<string, unknown>> | undefined;
}

const TRANSITIONS: ReadonlyMap<JobStatus, ReadonlySet<JobStatus>> = new Map([
  [JobStatus.Pending, new Set([JobStatus.Running])],
  [JobStatus.Running, new Set([JobStatus.Done, JobStatus.Error])],
  [JobStatus.Done, new Set<JobStatus>()],
  [JobStatus.Error, new Set<JobStatus>()],
]);

type JobPatch = Partial<Pick<Job, 'result' | 'error' | 'started_at' | 'completed_at'>>;

export class IllegalTransitionError extends Error {
  constructor(readonly jobId: string, readonly from: JobStatus | undefined, readonly to: JobStatus) {
    super(`Illegal job transition for ${jobId}: ${from ?? 'missing'} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class JobManager {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly store: JobStore;
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    private readonly runner: JobRunner,
    options: JobManagerOptions = {},
  ) {
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ component: 'jobs' });
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.store = options.store ?? new MemoryJobStore();
  }

  /**
   * Record a job and schedule it. Returns the job id immediately.
   *
   * @throws {Error} If the id generator repeats an id, or the arguments
   *   cannot be structured-cloned
   */
  submit(operation: string, args: Readonly<Record<string, unknown>> = {}): string {
    const id = this.idGenerator();
    if (this.store.get(id) !== undefined) {
      throw new Error(`Job id collision: ${id}`);
    }
    this.store.put(
      Object.freeze({
        id,
        operation,
        arguments: deepFreeze(structuredClone(args)),
        status: JobStatus.Pending,
        created_at: this.clock().toISOString(),
      }),
    );
    this.logger.debug({ job_id: id, operation }, 'job submitted');

    const run: Promise<void> = Promise.resolve()
      .then(() => this.execute(id))
      .catch((err: unknown) => {
        this.logger.error({ job_id: id, operation, err: errorMessage(err) }, 'job bookkeeping failed');
      })
      .finally(() => {
        this.inflight.delete(run);
      });
    this.inflight.add(run);
    return id;
  }

  /** Submit several jobs. Ids are returned in submission order. */
  submitBatch(submissions: ReadonlyArray<JobSubmission>): string[] {
    return submissions.map((s) => this.submit(s.operation, s.args));
  }

  status(id: string): Job | undefined {
    return this.store.get(id);
  }

  /** Look up several jobs; same length and order as `ids`. */
  statusBatch(ids: ReadonlyArray<string>): Array<{ readonly id: string; readonly job: Job | undefined }> {
    return ids.map((id) => ({ id, job: this.store.get(id) }));
  }

  /** Resolves once every job submitted so far has finished. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  get size(): number {
    return this.store.size;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private async execute(id: string): Promise<void> {
    const job = this.transition(id, JobStatus.Running, { started_at: this.clock().toISOString() });

    let outcome: JobOutcome;
    try {
      outcome = await this.runner(job.operation, job.arguments, { job_id: id });
    } catch (err: unknown) {
      const wrapped = new HandlerError(job.operation, err);
      outcome = { ok: false, error: { code: GatewayErrorCode.HandlerError, message: wrapped.message } };
    }

    const completed_at = this.clock().toISOString();
    if (outcome.ok) {
      this.transition(id, JobStatus.Done, { result: outcome.result, completed_at });
    } else {
      this.transition(id, JobStatus.Error, { error: outcome.error, completed_at });
    }
    this.logger.debug({ job_id: id, operation: job.operation, status: outcome.ok ? 'done' : 'error' }, 'job finished');
  }

  private transition(id: string, next: JobStatus, patch: JobPatch): Job {
    const current = this.store.get(id);
    if (current === undefined || !(TRANSITIONS.get(current.status)?.has(next) ?? false)) {
      throw new IllegalTransitionError(id, current?.status, next);
    }
    const updated: Job = Object.freeze({ ...current, ...patch, status: next });
    this.store.put(updated);
    return updated;
  }
}
