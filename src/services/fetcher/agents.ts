import dns, { type LookupAddress, type LookupOptions } from 'node:dns';
import { isIP } from 'node:net';

import { Agent, buildConnector } from 'undici';

import { isForbiddenIp, type IpPolicy } from '../../utils/ip-blocklist.js';
import { logDebug } from '../logger.js';
import {
  createBlockedAddressError,
  handleLookupResult,
  type LookupCallback,
} from './dns-selection.js';

export type HostResolver = (hostname: string) => Promise<LookupAddress[]>;

export interface SafeAgentOptions {
  connectTimeoutMs: number;
  isForbidden?: IpPolicy;
  resolve?: HostResolver;
}

export const resolveAllAddresses: HostResolver = (hostname) =>
  dns.promises.lookup(hostname, { all: true });

function stripBrackets(hostname: string): string {
  return hostname.replace(/^\[|\]$/g, '');
}

function createGuardedLookup(resolve: HostResolver, isForbidden: IpPolicy) {
  return (
    hostname: string,
    options: LookupOptions,
    callback: LookupCallback
  ): void => {
    resolve(hostname).then(
      (addresses) => {
        handleLookupResult(
          addresses,
          hostname,
          Boolean(options.all),
          isForbidden,
          callback
        );
      },
      (error: unknown) => {
        callback(
          error instanceof Error ? error : new Error(String(error)),
          []
        );
      }
    );
  };
}

/**
 * Connector that validates the destination at dial time. Names go through
 * the guarded lookup; IP literals never reach a lookup, so they are checked
 * here before the socket is opened.
 */
function createGuardedConnector(
  options: Required<SafeAgentOptions>
): buildConnector.connector {
  const connect = buildConnector({
    timeout: options.connectTimeoutMs,
    lookup: createGuardedLookup(options.resolve, options.isForbidden),
  });

  return (connectOptions, callback) => {
    const host = stripBrackets(connectOptions.hostname);
    if (isIP(host) && options.isForbidden(host)) {
      logDebug('Refused dial to forbidden address literal', { host });
      callback(createBlockedAddressError(), null);
      return;
    }
    connect(connectOptions, callback);
  };
}

export function createSafeAgent(options: SafeAgentOptions): Agent {
  return new Agent({
    keepAliveTimeout: 30_000,
    connect: createGuardedConnector({
      connectTimeoutMs: options.connectTimeoutMs,
      isForbidden: options.isForbidden ?? isForbiddenIp,
      resolve: options.resolve ?? resolveAllAddresses,
    }),
  });
}
