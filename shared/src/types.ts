export type JobStatus =
  | 'PENDING'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED';

// The API accepts more job types than the SDK has helpers for
export type KnownJobType = 'RTC_GAMMA' | 'INSAR_GAMMA' | 'INSAR_ISCE_BURST' | 'AUTORIFT';
export type JobType = KnownJobType | (string & {});

export type JobParameters = Record<string, unknown>;

export interface JobFile {
  url: string;
  filename: string;
  size: number;
}

/**
 * A job as the API returns it. Datetimes are ISO-8601 strings.
 */
export interface JobRecord {
  job_id: string;
  job_type: JobType;
  request_time: string;
  status_code: JobStatus;
  user_id: string;
  name?: string;
  job_parameters?: JobParameters;
  files?: JobFile[];
  browse_images?: string[];
  thumbnail_images?: string[];
  expiration_time?: string;
}

/**
 * A job that has not been submitted yet: no id, no status.
 */
export interface PreparedJob {
  job_type: JobType;
  job_parameters?: JobParameters;
  name?: string;
}

export interface SubmitJobsRequest {
  jobs: PreparedJob[];
  validate_only?: boolean;
}

export interface JobSearchParams {
  start?: Date;
  end?: Date;
  status_code?: JobStatus;
  name?: string;
  job_type?: JobType;
  user_id?: string;
}

export interface JobUpdate {
  name?: string;
}

export interface UserQuota {
  max_jobs_per_month?: number | null;
  remaining: number | null;
}

export interface UserInfo {
  user_id: string;
  quota: UserQuota;
  job_names?: string[];
  [key: string]: unknown;
}
