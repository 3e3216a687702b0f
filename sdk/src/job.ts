import { isDeepStrictEqual } from 'util';
import { z } from 'zod';
import {
  isoSeconds,
  type JobFile,
  type JobParameters,
  type JobRecord,
  type JobStatus,
  type JobType,
  type JobUpdate,
  type PreparedJob,
} from '@hyp3-client/shared';
import { downloadFile, type DownloadOptions } from './download';
import { MalformedResponseError, PreconditionError } from './errors';
import { LocalArtifactStore } from './storage';
import type { JobLookup, Watchable } from './watchable';

const jobFileSchema = z.object({
  url: z.string(),
  filename: z.string(),
  size: z.number(),
});

const timestampSchema = z.string().datetime({ offset: true, local: true });

// timestamps without an offset are UTC
function parseTimestamp(value: string): Date {
  if (/[+-]\d{2}$/.test(value)) return new Date(`${value}:00`);
  return new Date(/(Z|[+-]\d{2}:?\d{2})$/i.test(value) ? value : `${value}Z`);
}

const jobRecordSchema = z.object({
  job_id: z.string().min(1),
  job_type: z.string().min(1),
  request_time: timestampSchema,
  status_code: z.enum(['PENDING', 'RUNNING', 'SUCCEEDED', 'FAILED']),
  user_id: z.string(),
  name: z.string().nullish(),
  job_parameters: z.record(z.unknown()).nullish(),
  files: z.array(jobFileSchema).nullish(),
  browse_images: z.array(z.string()).nullish(),
  thumbnail_images: z.array(z.string()).nullish(),
  expiration_time: timestampSchema.nullish(),
});

export interface JobInit {
  job_id: string;
  job_type: JobType;
  request_time: Date;
  status_code: JobStatus;
  user_id: string;
  name?: string;
  job_parameters?: JobParameters;
  files?: readonly JobFile[];
  browse_images?: readonly string[];
  thumbnail_images?: readonly string[];
  expiration_time?: Date;
}

export interface JobDownloadOptions extends DownloadOptions {
  /** Create the destination directory (and parents) when missing. Default true. */
  create?: boolean;
}

/**
 * Snapshot of one HyP3 job as last seen from the API.
 *
 * Jobs never change after construction: refreshing or updating a job returns a new Job.
 */
export class Job implements Watchable<Job> {
  readonly job_id: string;
  readonly job_type: JobType;
  readonly request_time: Date;
  readonly status_code: JobStatus;
  readonly user_id: string;
  readonly name?: string;
  readonly job_parameters?: Readonly<JobParameters>;
  readonly files?: readonly JobFile[];
  readonly browse_images?: readonly string[];
  readonly thumbnail_images?: readonly string[];
  readonly expiration_time?: Date;

  constructor(init: JobInit) {
    this.job_id = init.job_id;
    this.job_type = init.job_type;
    this.request_time = new Date(init.request_time.getTime());
    this.status_code = init.status_code;
    this.user_id = init.user_id;
    this.name = init.name;
    this.job_parameters = init.job_parameters ? { ...init.job_parameters } : undefined;
    this.files = init.files?.map(file => ({ ...file }));
    this.browse_images = init.browse_images ? [...init.browse_images] : undefined;
    this.thumbnail_images = init.thumbnail_images ? [...init.thumbnail_images] : undefined;
    this.expiration_time = init.expiration_time ? new Date(init.expiration_time.getTime()) : undefined;
  }

  /**
   * Build a Job from a job record returned by the API.
   * @throws MalformedResponseError when a required field is missing or has the wrong shape
   */
  static fromDict(record: unknown): Job {
    const result = jobRecordSchema.safeParse(record);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new MalformedResponseError(`Invalid job record: ${issues.join('; ')}`);
    }

    const data = result.data;
    return new Job({
      job_id: data.job_id,
      job_type: data.job_type,
      request_time: parseTimestamp(data.request_time),
      status_code: data.status_code,
      user_id: data.user_id,
      name: data.name ?? undefined,
      job_parameters: data.job_parameters ?? undefined,
      files: data.files ?? undefined,
      browse_images: data.browse_images ?? undefined,
      thumbnail_images: data.thumbnail_images ?? undefined,
      expiration_time: data.expiration_time ? parseTimestamp(data.expiration_time) : undefined,
    });
  }

  /**
   * Serialize the job. With `forResubmit` only the fields needed to submit it again as a new
   * job are kept, so no server-assigned identity or state leaks into the new submission.
   */
  toDict(): JobRecord;
  toDict(forResubmit: false): JobRecord;
  toDict(forResubmit: true): PreparedJob;
  toDict(forResubmit: boolean): JobRecord | PreparedJob;
  toDict(forResubmit: boolean = false): JobRecord | PreparedJob {
    if (forResubmit) {
      const prepared: PreparedJob = { job_type: this.job_type };
      if (this.job_parameters !== undefined) prepared.job_parameters = { ...this.job_parameters };
      if (this.name !== undefined) prepared.name = this.name;
      return prepared;
    }

    const record: JobRecord = {
      job_id: this.job_id,
      job_type: this.job_type,
      request_time: isoSeconds(this.request_time),
      status_code: this.status_code,
      user_id: this.user_id,
    };
    if (this.name !== undefined) record.name = this.name;
    if (this.job_parameters !== undefined) record.job_parameters = { ...this.job_parameters };
    if (this.files !== undefined) record.files = this.files.map(file => ({ ...file }));
    if (this.browse_images !== undefined) record.browse_images = [...this.browse_images];
    if (this.thumbnail_images !== undefined) record.thumbnail_images = [...this.thumbnail_images];
    if (this.expiration_time !== undefined) record.expiration_time = isoSeconds(this.expiration_time);
    return record;
  }

  /** Copy of this job with some fields replaced */
  with(changes: Partial<JobInit>): Job {
    return new Job({ ...this.toInit(), ...changes });
  }

  equals(other: Job): boolean {
    return isDeepStrictEqual(this.toDict(), other.toDict());
  }

  succeeded(): boolean {
    return this.status_code === 'SUCCEEDED';
  }

  failed(): boolean {
    return this.status_code === 'FAILED';
  }

  complete(): boolean {
    return this.succeeded() || this.failed();
  }

  // PENDING and RUNNING both count as running
  running(): boolean {
    return !this.complete();
  }

  /**
   * Whether the job's products have been removed by the server.
   * @throws PreconditionError for jobs that have not succeeded or carry no expiration time
   */
  expired(): boolean {
    if (!this.succeeded() || this.expiration_time === undefined) {
      throw new PreconditionError(
        `${this.toString()} is ${this.status_code}: jobs without an expiration time cannot be checked for expiry`
      );
    }
    return Date.now() >= this.expiration_time.getTime();
  }

  /**
   * Download the job's product files into `location`.
   * @returns the written paths, in the same order as `files`
   */
  async downloadFiles(location: string = '.', options: JobDownloadOptions = {}): Promise<string[]> {
    const { create = true, ...downloadOptions } = options;

    if (!this.succeeded()) {
      throw new PreconditionError(`Only succeeded jobs can be downloaded; ${this.toString()} is ${this.status_code}.`);
    }
    if (this.expired()) {
      throw new PreconditionError(`Expired jobs cannot be downloaded; ${this.toString()} has expired.`);
    }

    const store = new LocalArtifactStore(location);
    await store.prepare(create);

    const paths: string[] = [];
    for (const file of this.files ?? []) {
      paths.push(await downloadFile(file.url, store.pathFor(file.filename), downloadOptions));
    }
    return paths;
  }

  refresh(lookup: JobLookup): Promise<Job> {
    return lookup.getJobById(this.job_id);
  }

  update(lookup: JobLookup, fields: JobUpdate): Promise<Job> {
    return lookup.updateJob(this.job_id, fields);
  }

  progress(): { completed: number; total: number } {
    return { completed: this.complete() ? 1 : 0, total: 1 };
  }

  toString(): string {
    return `HyP3 ${this.job_type} job ${this.job_id}`;
  }

  private toInit(): JobInit {
    return {
      job_id: this.job_id,
      job_type: this.job_type,
      request_time: this.request_time,
      status_code: this.status_code,
      user_id: this.user_id,
      name: this.name,
      job_parameters: this.job_parameters ? { ...this.job_parameters } : undefined,
      files: this.files,
      browse_images: this.browse_images,
      thumbnail_images: this.thumbnail_images,
      expiration_time: this.expiration_time,
    };
  }
}
