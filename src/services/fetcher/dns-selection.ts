import type { LookupAddress } from 'node:dns';

import { createErrorWithCode } from '../../utils/error-utils.js';
import type { IpPolicy } from '../../utils/ip-blocklist.js';

export const BLOCKED_ADDRESS_CODE = 'EBLOCKED';
export const BLOCKED_ADDRESS_MESSAGE =
  'refusing to connect to private network address';

export type LookupCallback = (
  err: NodeJS.ErrnoException | null,
  address: string | LookupAddress[],
  family?: number
) => void;

export function createBlockedAddressError(): NodeJS.ErrnoException {
  return createErrorWithCode(BLOCKED_ADDRESS_MESSAGE, BLOCKED_ADDRESS_CODE);
}

function findBlockedIpError(
  list: readonly LookupAddress[],
  isForbidden: IpPolicy
): NodeJS.ErrnoException | null {
  return list.some((addr) => isForbidden(addr.address))
    ? createBlockedAddressError()
    : null;
}

function findInvalidFamilyError(
  list: readonly LookupAddress[],
  hostname: string
): NodeJS.ErrnoException | null {
  for (const addr of list) {
    if (addr.family === 4 || addr.family === 6) continue;
    return createErrorWithCode(
      `Invalid address family returned for ${hostname}`,
      'EINVAL'
    );
  }

  return null;
}

function createNoDnsResultsError(hostname: string): NodeJS.ErrnoException {
  return createErrorWithCode(
    `No DNS results returned for ${hostname}`,
    'ENODATA'
  );
}

/**
 * Validates every resolved candidate before handing an address back to the
 * socket. One forbidden candidate rejects the whole lookup.
 */
export function handleLookupResult(
  list: readonly LookupAddress[],
  hostname: string,
  useAll: boolean,
  isForbidden: IpPolicy,
  callback: LookupCallback
): void {
  const invalidFamilyError = findInvalidFamilyError(list, hostname);
  if (invalidFamilyError) {
    callback(invalidFamilyError, [...list]);
    return;
  }

  const blockedError = findBlockedIpError(list, isForbidden);
  if (blockedError) {
    callback(blockedError, [...list]);
    return;
  }

  const first = list.at(0);
  if (!first) {
    callback(createNoDnsResultsError(hostname), []);
    return;
  }

  if (useAll) {
    callback(null, [...list]);
    return;
  }

  callback(null, first.address, first.family);
}
