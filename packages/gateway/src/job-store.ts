/**
 * Toolgate Gateway: Job Store
 *
 * Storage seam for job records. Records are immutable snapshots: every
 * state change replaces the stored Job with a new frozen object, so a Job
 * handed to a caller never changes underneath it.
 *
 * MemoryJobStore is the only shipped implementation. Jobs are not
 * persisted across restarts.
 */

import type { Job } from '@toolgate/kernel';

export interface JobStore {
  get(id: string): Job | undefined;
  /** Insert or replace the record for `job.id`. */
  put(job: Job): void;
  readonly size: number;
}

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  put(job: Job): void {
    this.jobs.set(job.id, job);
  }

  get size(): number {
    return this.jobs.size;
  }
}
