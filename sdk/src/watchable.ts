import type { JobUpdate } from '@hyp3-client/shared';
import type { Job } from './job';

/**
 * The per-job API calls that Job and Batch build refresh/update on.
 */
export interface JobLookup {
  getJobById(jobId: string): Promise<Job>;
  updateJob(jobId: string, fields: JobUpdate): Promise<Job>;
}

/**
 * Implemented by Job and Batch so the client can refresh, watch and update either.
 * Both methods return new values; the receiver is never modified.
 */
export interface Watchable<T> {
  complete(): boolean;
  refresh(lookup: JobLookup): Promise<T>;
  update(lookup: JobLookup, fields: JobUpdate): Promise<T>;
  /** completed / total, for progress reporting */
  progress(): { completed: number; total: number };
  toString(): string;
}
