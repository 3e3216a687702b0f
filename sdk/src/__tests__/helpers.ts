import { randomUUID } from 'crypto';
import type { JobRecord } from '@hyp3-client/shared';
import { Job } from '../job';
import type { Session } from '../session';

export const API_URL = 'https://api.example.test';

export const SUCCEEDED_RECORD: JobRecord = {
  browse_images: ['https://files.example.test/rtc_browse.png'],
  expiration_time: '2020-10-08T00:00:00+00:00',
  files: [{ filename: 'rtc_product.zip', size: 5949932, url: 'https://files.example.test/rtc_product.zip' }],
  job_id: 'd1c05104-b455-4f35-a95a-84155d63f855',
  job_parameters: { granules: ['granule-a'] },
  job_type: 'RTC_GAMMA',
  name: 'test_success',
  request_time: '2020-09-22T23:55:10+00:00',
  status_code: 'SUCCEEDED',
  thumbnail_images: ['https://files.example.test/rtc_thumb.png'],
  user_id: 'test_user',
};

export const FAILED_RECORD: JobRecord = {
  job_id: '281b2087-9e7d-4d17-a9b3-aebeb2ad23c6',
  job_parameters: { granules: ['granule-b', 'granule-c'] },
  job_type: 'INSAR_GAMMA',
  name: 'test_failure',
  request_time: '2020-09-22T23:55:10+00:00',
  status_code: 'FAILED',
  user_id: 'test_user',
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysFromNow(days: number): Date {
  return new Date(Date.now() + days * DAY_MS);
}

/** A job record with a fresh id */
export function makeRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    job_type: 'JOB_TYPE',
    job_id: randomUUID(),
    request_time: '2021-03-01T12:00:00+00:00',
    status_code: 'RUNNING',
    user_id: 'user',
    name: 'name',
    job_parameters: { param1: 'value1' },
    ...overrides,
  };
}

export function makeJob(overrides: Partial<JobRecord> = {}): Job {
  return Job.fromDict(makeRecord(overrides));
}

/** A succeeded job that expires in a week, with one file per url */
export function makeSucceededJob(urls: string[]): Job {
  return makeJob({
    status_code: 'SUCCEEDED',
    expiration_time: daysFromNow(7).toISOString(),
    files: urls.map(url => ({ url, size: 0, filename: url.substring(url.lastIndexOf('/') + 1) })),
  });
}

export interface Reply {
  status?: number;
  json?: unknown;
  text?: string;
}

export interface RecordedCall {
  method: string;
  url: string;
  headers: Headers;
  body?: unknown;
}

/**
 * In-process stand-in for the API. Replies are queued per method and path and
 * handed out in order; the last reply for a route keeps being returned.
 */
export class FakeSession implements Session {
  readonly calls: RecordedCall[] = [];
  private routes = new Map<string, Reply[]>();

  reply(method: string, path: string, ...replies: Reply[]): this {
    const key = `${method} ${path}`;
    this.routes.set(key, [...(this.routes.get(key) ?? []), ...replies]);
    return this;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter(call => call.method === method && new URL(call.url).pathname === path);
  }

  async fetch(url: string, init: RequestInit = {}): Promise<Response> {
    const method = init.method ?? 'GET';
    const body = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    this.calls.push({ method, url, headers: new Headers(init.headers), body });

    const key = `${method} ${new URL(url).pathname}`;
    const queue = this.routes.get(key);
    if (!queue || queue.length === 0) {
      return new Response(JSON.stringify({ detail: `no route for ${key}` }), { status: 404 });
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    return toResponse(reply ?? {});
  }
}

function toResponse(reply: Reply): Response {
  const status = reply.status ?? 200;
  if (reply.json !== undefined) {
    return new Response(JSON.stringify(reply.json), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  }
  return new Response(reply.text ?? '', { status });
}
