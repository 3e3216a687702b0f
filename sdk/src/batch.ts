import type { JobStatus, JobUpdate } from '@hyp3-client/shared';
import { Job, type JobDownloadOptions } from './job';
import { componentLogger } from './logger';
import type { JobLookup, Watchable } from './watchable';

export interface FilterOptions {
  succeeded?: boolean;
  running?: boolean;
  failed?: boolean;
  includeExpired?: boolean;
}

/**
 * An ordered collection of jobs.
 */
export class Batch implements Watchable<Batch>, Iterable<Job> {
  private items: Job[];

  constructor(jobs: Iterable<Job> = []) {
    this.items = [...jobs];
    if (this.items.length === 0) {
      componentLogger('batch').warn('Jobs list is empty; creating an empty Batch');
    }
  }

  get length(): number {
    return this.items.length;
  }

  /** Copy of the jobs, in order */
  get jobs(): Job[] {
    return [...this.items];
  }

  /** Job at `index`; negative indexes count from the end */
  at(index: number): Job | undefined {
    return this.items.at(index);
  }

  set(index: number, job: Job): void {
    this.items[this.resolveIndex(index)] = job;
  }

  delete(index: number): Job {
    const [removed] = this.items.splice(this.resolveIndex(index), 1);
    return removed;
  }

  includes(job: Job): boolean {
    return this.items.some(item => item.equals(job));
  }

  [Symbol.iterator](): Iterator<Job> {
    return this.items[Symbol.iterator]();
  }

  *reversed(): IterableIterator<Job> {
    for (let i = this.items.length - 1; i >= 0; i--) {
      yield this.items[i];
    }
  }

  /** New batch with `other` appended */
  concat(other: Job | Batch): Batch {
    return new Batch([...this.items, ...Batch.jobsOf(other)]);
  }

  /** Append `other` to this batch */
  extend(other: Job | Batch): this {
    this.items.push(...Batch.jobsOf(other));
    return this;
  }

  // true for an empty batch: nothing left to wait for
  complete(): boolean {
    return this.items.every(job => job.complete());
  }

  succeeded(): boolean {
    return this.items.every(job => job.succeeded());
  }

  /**
   * Jobs that are succeeded, running or failed (any combination), in their original order.
   * With `includeExpired: false`, succeeded jobs whose products have expired are left out.
   */
  filterJobs(options: FilterOptions = {}): Batch {
    const { succeeded = true, running = true, failed = false, includeExpired = true } = options;

    const filtered = this.items.filter(job => {
      if (job.succeeded()) {
        return succeeded && (includeExpired || !job.expired());
      }
      if (job.running()) return running;
      return failed;
    });
    return new Batch(filtered);
  }

  /**
   * Download the files of every job in the batch. A job that cannot be downloaded
   * is logged and skipped; the other jobs are still downloaded.
   */
  async downloadFiles(location: string = '.', options: JobDownloadOptions = {}): Promise<string[]> {
    const log = componentLogger('batch');
    const paths: string[] = [];

    for (const job of this.items) {
      try {
        paths.push(...(await job.downloadFiles(location, options)));
      } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        log.warn({ job_id: job.job_id, err: error }, `Failed to download files for ${job.toString()}: ${reason}`);
      }
    }
    return paths;
  }

  anyExpired(): boolean {
    return this.items.some(job => job.succeeded() && job.expiration_time !== undefined && job.expired());
  }

  countStatuses(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { PENDING: 0, RUNNING: 0, SUCCEEDED: 0, FAILED: 0 };
    for (const job of this.items) {
      counts[job.status_code] += 1;
    }
    return counts;
  }

  async refresh(lookup: JobLookup): Promise<Batch> {
    const refreshed: Job[] = [];
    for (const job of this.items) {
      refreshed.push(await job.refresh(lookup));
    }
    return new Batch(refreshed);
  }

  // stops at the first failure so no update is silently lost
  async update(lookup: JobLookup, fields: JobUpdate): Promise<Batch> {
    const updated: Job[] = [];
    for (const job of this.items) {
      updated.push(await job.update(lookup, fields));
    }
    return new Batch(updated);
  }

  progress(): { completed: number; total: number } {
    const counts = this.countStatuses();
    return { completed: counts.SUCCEEDED + counts.FAILED, total: this.items.length };
  }

  toString(): string {
    const counts = this.countStatuses();
    return (
      `${this.items.length} HyP3 Jobs: ` +
      `${counts.SUCCEEDED} succeeded, ` +
      `${counts.FAILED} failed, ` +
      `${counts.RUNNING} running, ` +
      `${counts.PENDING} pending.`
    );
  }

  private resolveIndex(index: number): number {
    const resolved = index < 0 ? this.items.length + index : index;
    if (!Number.isInteger(resolved) || resolved < 0 || resolved >= this.items.length) {
      throw new RangeError(`Batch index out of range: ${index}`);
    }
    return resolved;
  }

  private static jobsOf(other: Job | Batch): Job[] {
    if (other instanceof Batch) return other.jobs;
    if (other instanceof Job) return [other];
    throw new TypeError(`unsupported operand type: expected a Job or Batch, got ${typeof other}`);
  }
}
