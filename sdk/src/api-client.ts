import { z } from 'zod';
import {
  isoSeconds,
  type JobSearchParams,
  type JobUpdate,
  type PreparedJob,
  type SubmitJobsRequest,
  type UserInfo,
} from '@hyp3-client/shared';
import { Batch } from './batch';
import { loadConfig, type ClientConfig } from './config';
import {
  ClientError,
  JobNotFoundError,
  MalformedResponseError,
  ValidationError,
  WatchTimeoutError,
  raiseForHyP3Status,
} from './errors';
import { Job } from './job';
import { componentLogger } from './logger';
import {
  prepareAutoriftJob,
  prepareInsarIsceBurstJob,
  prepareInsarJob,
  prepareRtcJob,
  validateJobName,
  type AutoriftOptions,
  type InsarIsceBurstOptions,
  type InsarOptions,
  type RtcOptions,
} from './prepare';
import { sleep } from './retry';
import { createSession, type Session } from './session';
import type { JobLookup, Watchable } from './watchable';

const jobListSchema = z.object({
  jobs: z.array(z.unknown()),
  next: z.string().nullish(),
});

const userInfoSchema = z
  .object({
    user_id: z.string(),
    quota: z
      .object({
        max_jobs_per_month: z.number().nullish(),
        remaining: z.number().nullable(),
      })
      .passthrough(),
    job_names: z.array(z.string()).optional(),
  })
  .passthrough();

export interface HyP3ClientOptions {
  /** Defaults to HYP3_API_URL, then the production API */
  apiUrl?: string;
  /** Authenticated transport; when omitted one is built from `token` */
  session?: Session;
  /** Bearer token; defaults to HYP3_API_TOKEN */
  token?: string;
}

export interface WatchOptions {
  /** Seconds to wait before giving up */
  timeout?: number;
  /** Seconds between refreshes */
  interval?: number;
}

export interface SubmitOptions {
  /** Ask the API to validate the jobs without running them */
  validateOnly?: boolean;
}

interface RequestOptions {
  params?: Record<string, string>;
  body?: unknown;
}

/**
 * Client for the HyP3 API.
 *
 * Note: all jobs submitted to HyP3 are publicly visible.
 */
export class HyP3Client implements JobLookup {
  readonly url: string;
  private session: Session;
  private config: ClientConfig;

  constructor(options: HyP3ClientOptions = {}) {
    this.config = loadConfig();
    this.url = options.apiUrl ?? this.config.apiUrl;
    this.session = options.session ?? createSession({ token: options.token ?? this.config.token });
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const log = componentLogger('api');
    const url = new URL(path, this.url);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, value);
    }

    const init: RequestInit = { method };
    if (options.body !== undefined) {
      init.headers = { 'Content-Type': 'application/json' };
      init.body = JSON.stringify(options.body);
    }

    log.debug({ method, url: url.toString(), body: options.body }, '[API REQUEST]');
    const response = await this.session.fetch(url.toString(), init);
    log.debug({ method, url: url.toString(), status: response.status }, '[API RESPONSE]');

    await raiseForHyP3Status(response);

    const text = await response.text();
    try {
      return text ? JSON.parse(text) : null;
    } catch {
      throw new MalformedResponseError(`${method} ${url.pathname} returned a body that is not JSON: ${text.substring(0, 200)}`);
    }
  }

  private async requestJob(method: string, jobId: string, body?: unknown): Promise<Job> {
    let data: unknown;
    try {
      data = await this.request(method, `/jobs/${encodeURIComponent(jobId)}`, { body });
    } catch (error: unknown) {
      if (error instanceof ClientError && error.status === 404) {
        throw new JobNotFoundError(jobId, error.message);
      }
      throw error;
    }
    return Job.fromDict(data);
  }

  private parseJobList(data: unknown): { jobs: Job[]; next?: string } {
    const result = jobListSchema.safeParse(data);
    if (!result.success) {
      throw new MalformedResponseError(`Invalid job list response: ${result.error.message}`);
    }
    return {
      jobs: result.data.jobs.map(record => Job.fromDict(record)),
      next: result.data.next ?? undefined,
    };
  }

  /**
   * Search for jobs. Every page of results is fetched.
   */
  async findJobs(search: JobSearchParams = {}): Promise<Batch> {
    const params: Record<string, string> = {};
    for (const [key, value] of Object.entries(search)) {
      if (value === undefined || value === null) continue;
      params[key] = value instanceof Date ? isoSeconds(value) : String(value);
    }

    let page = this.parseJobList(await this.request('GET', '/jobs', { params }));
    const jobs = [...page.jobs];

    while (page.next) {
      page = this.parseJobList(await this.request('GET', page.next));
      jobs.push(...page.jobs);
    }

    return new Batch(jobs);
  }

  /**
   * @throws JobNotFoundError when the API has no job with this id
   */
  async getJobById(jobId: string): Promise<Job> {
    return this.requestJob('GET', jobId);
  }

  async updateJob(jobId: string, fields: JobUpdate): Promise<Job> {
    validateJobName(fields.name);
    return this.requestJob('PATCH', jobId, fields);
  }

  /** Fresh copy of a job or of every job in a batch */
  async refresh<T extends Watchable<T>>(target: T): Promise<T> {
    return target.refresh(this);
  }

  /**
   * Refresh `target` every `interval` seconds until all of its jobs are complete.
   * @throws WatchTimeoutError when `timeout` seconds pass first
   */
  async watch<T extends Watchable<T>>(target: T, options: WatchOptions = {}): Promise<T> {
    const timeout = options.timeout ?? this.config.watchTimeout;
    const interval = options.interval ?? this.config.watchInterval;
    if (!(interval > 0)) {
      throw new ValidationError(`interval must be a positive number of seconds: ${interval}`);
    }
    if (!(timeout >= 0)) {
      throw new ValidationError(`timeout must be a non-negative number of seconds: ${timeout}`);
    }

    const log = componentLogger('watch');
    const iterationsUntilTimeout = Math.ceil(timeout / interval);
    let current = target;

    for (let ii = 0; ii < iterationsUntilTimeout; ii++) {
      current = await this.refresh(current);

      const { completed, total } = current.progress();
      log.info(
        { completed, total, timeout_in: timeout - ii * interval },
        `${completed}/${total} complete, timeout in ${timeout - ii * interval}s`
      );

      if (current.complete()) {
        return current;
      }
      await sleep(interval * 1000);
    }

    throw new WatchTimeoutError(current.toString());
  }

  /**
   * Update a job, or every job in a batch, in order. The first failure is thrown
   * and the remaining jobs are left untouched.
   */
  async updateJobs<T extends Watchable<T>>(target: T, fields: JobUpdate): Promise<T> {
    validateJobName(fields.name);
    return target.update(this, fields);
  }

  /**
   * Submit one or more prepared jobs.
   */
  async submitPreparedJobs(prepared: PreparedJob | PreparedJob[], options: SubmitOptions = {}): Promise<Batch> {
    const jobs = (Array.isArray(prepared) ? prepared : [prepared]).map(job => {
      validateJobName(job.name);
      // keep only what a new submission may carry
      const payload: PreparedJob = { job_type: job.job_type };
      if (job.job_parameters !== undefined) payload.job_parameters = job.job_parameters;
      if (job.name !== undefined) payload.name = job.name;
      return payload;
    });

    const request: SubmitJobsRequest = { jobs };
    if (options.validateOnly !== undefined) {
      request.validate_only = options.validateOnly;
    }

    const { jobs: submitted } = this.parseJobList(await this.request('POST', '/jobs', { body: request }));
    componentLogger('api').info({ count: submitted.length }, `Submitted ${submitted.length} job(s)`);
    return new Batch(submitted);
  }

  async submitRtcJob(granule: string, options: RtcOptions = {}): Promise<Batch> {
    return this.submitPreparedJobs(prepareRtcJob(granule, options));
  }

  async submitInsarJob(granule1: string, granule2: string, options: InsarOptions = {}): Promise<Batch> {
    return this.submitPreparedJobs(prepareInsarJob(granule1, granule2, options));
  }

  async submitInsarIsceBurstJob(
    granule1: string,
    granule2: string,
    options: InsarIsceBurstOptions = {}
  ): Promise<Batch> {
    return this.submitPreparedJobs(prepareInsarIsceBurstJob(granule1, granule2, options));
  }

  async submitAutoriftJob(granule1: string, granule2: string, options: AutoriftOptions = {}): Promise<Batch> {
    return this.submitPreparedJobs(prepareAutoriftJob(granule1, granule2, options));
  }

  async myInfo(): Promise<UserInfo> {
    const result = userInfoSchema.safeParse(await this.request('GET', '/user'));
    if (!result.success) {
      throw new MalformedResponseError(`Invalid user response: ${result.error.message}`);
    }
    return result.data;
  }

  /** Jobs left in this month's quota, or null for users without a quota */
  async checkQuota(): Promise<number | null> {
    const info = await this.myInfo();
    return info.quota.remaining;
  }
}
