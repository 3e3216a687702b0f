import { AuthenticationError } from './errors';
import { USER_AGENT } from './version';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Something that can make authenticated requests to the API.
 */
export interface Session {
  fetch(url: string, init?: RequestInit): Promise<Response>;
}

/**
 * Adds the bearer token and User-Agent to every request.
 */
export class TokenSession implements Session {
  private token: string;
  private fetchImpl: FetchFn;

  constructor(token: string, fetchImpl: FetchFn = (url, init) => fetch(url, init)) {
    this.token = token;
    this.fetchImpl = fetchImpl;
  }

  async fetch(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${this.token}`);
    if (!headers.has('User-Agent')) {
      headers.set('User-Agent', USER_AGENT);
    }
    return this.fetchImpl(url, { ...init, headers });
  }
}

export interface SessionOptions {
  token?: string;
  fetch?: FetchFn;
}

export function createSession(options: SessionOptions): Session {
  if (!options.token) {
    throw new AuthenticationError(
      'No API token provided. Pass `token` or set HYP3_API_TOKEN in the environment or .env file.'
    );
  }
  return new TokenSession(options.token, options.fetch);
}
