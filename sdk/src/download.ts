import { basename, dirname } from 'path';
import { Readable } from 'stream';
import { DownloadError, HyP3Error, ValidationError } from './errors';
import { componentLogger } from './logger';
import type { FetchFn } from './session';
import { loadConfig } from './config';
import { retryWithBackoff } from './retry';
import { LocalArtifactStore } from './storage';

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface DownloadOptions {
  /** Additional attempts after the first one */
  retries?: number;
  /** Seconds; the n-th retry waits `backoffFactor * 2^(n-1)` */
  backoffFactor?: number;
  fetch?: FetchFn;
}

class RetryableDownloadError extends DownloadError {}

/**
 * Download `url` to `filepath`, retrying transient server errors.
 */
export async function downloadFile(
  url: string,
  filepath: string,
  options: DownloadOptions = {}
): Promise<string> {
  const config = loadConfig();
  const { retries = config.downloadRetries, backoffFactor = config.downloadBackoffFactor } = options;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ValidationError(`retries must be a non-negative integer: ${retries}`);
  }
  if (!(backoffFactor >= 0)) {
    throw new ValidationError(`backoffFactor must be a non-negative number of seconds: ${backoffFactor}`);
  }
  const fetchImpl: FetchFn = options.fetch ?? ((u, init) => fetch(u, init));
  const store = new LocalArtifactStore(dirname(filepath));
  const log = componentLogger('download');

  const attempt = async (): Promise<Response> => {
    let response: Response;
    try {
      response = await fetchImpl(url);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RetryableDownloadError(url, reason);
    }

    if (response.ok) return response;

    // release the connection before retrying
    await response.body?.cancel();
    const reason = response.statusText ? `${response.status} ${response.statusText}` : `${response.status}`;
    if (RETRY_STATUSES.has(response.status)) {
      log.debug({ url, status: response.status }, 'retryable download failure');
      throw new RetryableDownloadError(url, reason, response.status);
    }
    throw new DownloadError(url, reason, response.status);
  };

  let response: Response;
  try {
    response = await retryWithBackoff(
      attempt,
      retries + 1,
      backoffFactor * 1000,
      error => error instanceof RetryableDownloadError
    );
  } catch (error: unknown) {
    if (error instanceof RetryableDownloadError) {
      throw new DownloadError(error.url, `${error.reason} (after ${retries} retries)`, error.status);
    }
    throw error;
  }

  const body = response.body;
  if (!body) {
    throw new DownloadError(url, 'response has no body', response.status);
  }

  log.info({ url, file: basename(filepath) }, 'downloading');
  // saveFile attaches to the stream synchronously; nothing may be awaited between wrapping and writing
  try {
    await store.ensureDir();
  } catch (error: unknown) {
    await body.cancel();
    throw error;
  }
  try {
    return await store.saveFile(filepath, Readable.fromWeb(body));
  } catch (error: unknown) {
    if (error instanceof HyP3Error) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new DownloadError(url, `transfer interrupted: ${reason}`, response.status);
  }
}
