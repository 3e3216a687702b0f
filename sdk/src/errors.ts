/**
 * Base error for everything the SDK throws on purpose
 */
export class HyP3Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Arguments rejected before any request is made */
export class ValidationError extends HyP3Error {}

export class AuthenticationError extends HyP3Error {}

/**
 * The API answered with a non-2xx status.
 */
export class ApiError extends HyP3Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.status = status;
  }
}

/** 4xx: the request itself is wrong */
export class ClientError extends ApiError {}

export class JobNotFoundError extends ClientError {
  readonly jobId: string;

  constructor(jobId: string, detail: string) {
    super(`Job ${jobId} not found: ${detail}`, 404);
    this.jobId = jobId;
  }
}

/** 5xx: try again later */
export class ServerError extends ApiError {}

export class MalformedResponseError extends HyP3Error {}

export class WatchTimeoutError extends HyP3Error {
  readonly target: string;

  constructor(target: string) {
    super(`Timeout occurred while waiting for ${target}`);
    this.target = target;
  }
}

/** Called on a job that is not in a state the operation allows */
export class PreconditionError extends HyP3Error {}

export class DirectoryNotFoundError extends HyP3Error {
  readonly path: string;

  constructor(path: string) {
    super(`Directory does not exist: ${path}`);
    this.path = path;
  }
}

export class DownloadError extends HyP3Error {
  readonly url: string;
  readonly reason: string;
  readonly status?: number;

  constructor(url: string, reason: string, status?: number) {
    super(`Failed to download ${url}: ${reason}`);
    this.url = url;
    this.reason = reason;
    this.status = status;
  }
}

function extractDetail(body: string): string | null {
  if (!body) return null;
  try {
    const data: unknown = JSON.parse(body);
    if (data && typeof data === 'object' && 'detail' in data && typeof data.detail === 'string') {
      return data.detail;
    }
  } catch {
    // not JSON, use the raw text
  }
  return body;
}

/**
 * Throw the matching ApiError for a failed API response; no-op for 2xx.
 */
export async function raiseForHyP3Status(response: Response): Promise<void> {
  if (response.ok) return;

  const text = await response.text();
  const detail = extractDetail(text) ?? (response.statusText || 'no details provided');

  if (response.status >= 400 && response.status < 500) {
    throw new ClientError(`HTTP ${response.status}: ${detail}`, response.status);
  }
  throw new ServerError(`HTTP ${response.status}: ${detail}`, response.status);
}
