import { Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { TransportError } from '../src/errors/app-error.js';
import {
  type FetchLike,
  type HopRequest,
  isRedirectStatus,
  RedirectFollower,
  resolveRedirectTarget,
} from '../src/services/fetcher/redirects.js';
import type {
  UpstreamHeaders,
  UpstreamResponse,
} from '../src/services/fetcher/response.js';

function upstream(
  statusCode: number,
  headers: UpstreamHeaders = {},
  text = ''
): UpstreamResponse {
  return { statusCode, headers, body: Readable.from([Buffer.from(text)]) };
}

const HOP: HopRequest = { headers: { 'User-Agent': 'test-agent' } };

function sequence(responses: readonly UpstreamResponse[]): {
  fetchFn: FetchLike;
  calls: string[];
} {
  const calls: string[] = [];
  const fetchFn: FetchLike = async (url) => {
    calls.push(url.href);
    const next = responses[calls.length - 1];
    if (!next) throw new Error('unexpected request');
    return next;
  };
  return { fetchFn, calls };
}

const redirect = (location: string, status = 302): UpstreamResponse =>
  upstream(status, { location });

describe('isRedirectStatus', () => {
  it('recognises redirect statuses only', () => {
    expect([301, 302, 303, 307, 308].every(isRedirectStatus)).toBe(true);
    expect(isRedirectStatus(200)).toBe(false);
    expect(isRedirectStatus(304)).toBe(false);
  });
});

describe('resolveRedirectTarget', () => {
  it('resolves relative locations against the current hop', () => {
    const base = new URL('https://example.com/a/b');
    expect(resolveRedirectTarget(base, '../c?d=1').href).toBe(
      'https://example.com/c?d=1'
    );
  });

  it('rejects non-http schemes', () => {
    const base = new URL('https://example.com/');
    expect(() => resolveRedirectTarget(base, 'file:///etc/hosts')).toThrow(
      TransportError
    );
  });

  it('rejects credentials in the target', () => {
    const base = new URL('https://example.com/');
    expect(() =>
      resolveRedirectTarget(base, 'https://user:pw@example.com/')
    ).toThrow('Rejected redirect target');
  });
});

describe('RedirectFollower', () => {
  it('follows validated redirect targets', async () => {
    const { fetchFn, calls } = sequence([
      redirect('/next'),
      upstream(200, {}, 'ok'),
    ]);

    const result = await new RedirectFollower(fetchFn, 5).fetchWithRedirects(
      new URL('https://example.com/start'),
      HOP
    );

    expect(result.url.href).toBe('https://example.com/next');
    expect(calls).toEqual([
      'https://example.com/start',
      'https://example.com/next',
    ]);
  });

  it('sends the same headers on every hop', async () => {
    const seen: HopRequest[] = [];
    const responses = [redirect('/next'), upstream(200)];
    const fetchFn: FetchLike = async (_url, request) => {
      seen.push(request);
      const next = responses[seen.length - 1];
      if (!next) throw new Error('unexpected request');
      return next;
    };

    await new RedirectFollower(fetchFn, 5).fetchWithRedirects(
      new URL('https://example.com/'),
      HOP
    );

    expect(seen).toEqual([HOP, HOP]);
  });

  it('follows redirects while fewer requests than the limit redirected', async () => {
    const { fetchFn, calls } = sequence([
      redirect('/1'),
      redirect('/2'),
      upstream(200, {}, 'done'),
    ]);

    const result = await new RedirectFollower(fetchFn, 3).fetchWithRedirects(
      new URL('https://example.com/'),
      HOP
    );

    expect(result.url.pathname).toBe('/2');
    expect(calls).toHaveLength(3);
  });

  it('fails on the redirect response that reaches the limit', async () => {
    const { fetchFn, calls } = sequence([
      redirect('/1'),
      redirect('/2'),
      upstream(200),
    ]);

    await expect(
      new RedirectFollower(fetchFn, 2).fetchWithRedirects(
        new URL('https://example.com/'),
        HOP
      )
    ).rejects.toThrow('stopped after 2 redirects');
    expect(calls).toEqual(['https://example.com/', 'https://example.com/1']);
  });
});
