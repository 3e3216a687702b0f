export * from '@hyp3-client/shared';
export { HyP3Client } from './api-client';
export type { HyP3ClientOptions, SubmitOptions, WatchOptions } from './api-client';
export { Batch } from './batch';
export type { FilterOptions } from './batch';
export { PROD_API, TEST_API, loadConfig } from './config';
export type { ClientConfig } from './config';
export { RETRY_STATUSES, downloadFile } from './download';
export type { DownloadOptions } from './download';
export * from './errors';
export { extractZippedProduct } from './extract';
export type { ExtractOptions } from './extract';
export { Job } from './job';
export type { JobDownloadOptions, JobInit } from './job';
export { logger } from './logger';
export {
  MAX_NAME_LENGTH,
  prepareAutoriftJob,
  prepareInsarIsceBurstJob,
  prepareInsarJob,
  prepareRtcJob,
  validateJobName,
} from './prepare';
export type { AutoriftOptions, InsarIsceBurstOptions, InsarOptions, RtcOptions } from './prepare';
export { TokenSession, createSession } from './session';
export type { FetchFn, Session, SessionOptions } from './session';
export { SDK_NAME, SDK_VERSION, USER_AGENT } from './version';
export type { JobLookup, Watchable } from './watchable';
