import type { LookupAddress } from 'node:dns';

import { describe, expect, test, vi } from 'vitest';

import {
  BLOCKED_ADDRESS_CODE,
  handleLookupResult,
} from '../../../src/services/fetcher/dns-selection.js';
import { isForbiddenIp } from '../../../src/utils/ip-blocklist.js';

const PUBLIC: LookupAddress = { address: '93.184.215.14', family: 4 };
const PRIVATE: LookupAddress = { address: '10.0.0.5', family: 4 };

describe('handleLookupResult', () => {
  test('returns the first address for single lookups', () => {
    const callback = vi.fn();
    handleLookupResult([PUBLIC], 'a.test', false, isForbiddenIp, callback);

    expect(callback).toHaveBeenCalledWith(null, '93.184.215.14', 4);
  });

  test('returns every address for all lookups', () => {
    const second: LookupAddress = { address: '2001:db8::1', family: 6 };
    const callback = vi.fn();
    handleLookupResult([PUBLIC, second], 'a.test', true, isForbiddenIp, callback);

    expect(callback).toHaveBeenCalledWith(null, [PUBLIC, second]);
  });

  test('rejects when any candidate is forbidden', () => {
    const callback = vi.fn();
    handleLookupResult([PUBLIC, PRIVATE], 'a.test', true, isForbiddenIp, callback);

    const [error] = callback.mock.calls[0] ?? [];
    expect(error).toMatchObject({
      code: BLOCKED_ADDRESS_CODE,
      message: 'refusing to connect to private network address',
    });
  });

  test('rejects empty results', () => {
    const callback = vi.fn();
    handleLookupResult([], 'a.test', false, isForbiddenIp, callback);

    const [error] = callback.mock.calls[0] ?? [];
    expect(error).toMatchObject({ code: 'ENODATA' });
  });

  test('rejects unknown address families', () => {
    const callback = vi.fn();
    handleLookupResult(
      [{ address: '93.184.215.14', family: 5 }],
      'a.test',
      false,
      isForbiddenIp,
      callback
    );

    const [error] = callback.mock.calls[0] ?? [];
    expect(error).toMatchObject({ code: 'EINVAL' });
  });
});
