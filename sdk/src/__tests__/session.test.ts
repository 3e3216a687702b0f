import { describe, expect, it, vi } from 'vitest';

import { AuthenticationError } from '../errors';
import { TokenSession, createSession } from '../session';
import { USER_AGENT } from '../version';

describe('TokenSession', () => {
  it('adds the bearer token and user agent', async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}'));
    const session = new TokenSession('test-secret', fetch);

    await session.fetch('https://api.example.test/jobs', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
    });

    const [url, init] = fetch.mock.calls[0];
    const headers = new Headers(init?.headers);
    expect(url).toBe('https://api.example.test/jobs');
    expect(init?.method).toBe('POST');
    expect(headers.get('Authorization')).toBe('Bearer test-secret');
    expect(headers.get('User-Agent')).toBe(USER_AGENT);
    expect(headers.get('Content-Type')).toBe('application/json');
  });

  it('keeps a user agent the caller set', async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}'));

    await new TokenSession('test-secret', fetch).fetch('https://api.example.test/user', {
      headers: { 'User-Agent': 'my-script/1.0' },
    });

    expect(new Headers(fetch.mock.calls[0][1]?.headers).get('User-Agent')).toBe('my-script/1.0');
  });
});

describe('createSession', () => {
  it('requires a token', () => {
    expect(() => createSession({})).toThrow(AuthenticationError);
    expect(() => createSession({ token: '' })).toThrow(AuthenticationError);
  });

  it('builds a token session', () => {
    expect(createSession({ token: 'test-secret' })).toBeInstanceOf(TokenSession);
  });
});
