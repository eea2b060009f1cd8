import { describe, expect, test } from 'vitest';

import {
  buildBrowserHeaders,
  pickUserAgent,
  USER_AGENT_POOL,
} from '../../../src/services/fetcher/headers.js';

describe('headers', () => {
  describe('pickUserAgent', () => {
    test('picks by the random value', () => {
      const pool = ['agent-a', 'agent-b'];
      expect(pickUserAgent(pool, () => 0)).toBe('agent-a');
      expect(pickUserAgent(pool, () => 0.99)).toBe('agent-b');
    });

    test('clamps a random value of 1', () => {
      expect(pickUserAgent(['agent-a', 'agent-b'], () => 1)).toBe('agent-b');
    });

    test('defaults to the browser pool', () => {
      expect(USER_AGENT_POOL).toContain(pickUserAgent());
    });

    test('throws on an empty pool', () => {
      expect(() => pickUserAgent([])).toThrow(RangeError);
    });
  });

  describe('buildBrowserHeaders', () => {
    test('sends a navigation-style header set', () => {
      const headers = buildBrowserHeaders({
        userAgent: 'agent-a',
        defaultAcceptLanguage: 'en-US,en;q=0.9',
      });

      expect(headers).toEqual({
        'User-Agent': 'agent-a',
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Cache-Control': 'no-cache',
        Pragma: 'no-cache',
        'Sec-Ch-Ua-Mobile': '?0',
        'Sec-Fetch-Dest': 'document',
        'Sec-Fetch-Mode': 'navigate',
        'Sec-Fetch-Site': 'none',
        'Sec-Fetch-User': '?1',
        'Upgrade-Insecure-Requests': '1',
      });
    });

    test('forwards the inbound Accept-Language', () => {
      const headers = buildBrowserHeaders({
        userAgent: 'agent-a',
        acceptLanguage: 'de-DE,de;q=0.8',
        defaultAcceptLanguage: 'en-US,en;q=0.9',
      });
      expect(headers['Accept-Language']).toBe('de-DE,de;q=0.8');
    });

    test('falls back when Accept-Language is blank', () => {
      const headers = buildBrowserHeaders({
        userAgent: 'agent-a',
        acceptLanguage: '   ',
        defaultAcceptLanguage: 'en-US,en;q=0.9',
      });
      expect(headers['Accept-Language']).toBe('en-US,en;q=0.9');
    });
  });
});
