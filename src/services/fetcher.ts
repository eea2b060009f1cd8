import { type Agent, request as undiciRequest } from 'undici';

import type { IpPolicy } from '../utils/ip-blocklist.js';
import { createSafeAgent, type HostResolver } from './fetcher/agents.js';
import { mapTransportError } from './fetcher/errors.js';
import { RedirectFollower } from './fetcher/redirects.js';
import { headerValue, type UpstreamResponse } from './fetcher/response.js';
import { logDebug } from './logger.js';

export interface SafeTransportOptions {
  /** Overall deadline for one request, redirects included. */
  timeoutMs: number;
  /** Deadline for establishing a single connection. */
  connectTimeoutMs: number;
  maxRedirects: number;
  isForbidden?: IpPolicy;
  resolve?: HostResolver;
}

export interface TransportRequest {
  headers: Record<string, string>;
  signal?: AbortSignal | undefined;
}

export interface TransportResponse {
  response: UpstreamResponse;
  /** URL of the last hop. */
  url: URL;
  /** Composed caller + deadline signal; body reads should honour it too. */
  signal: AbortSignal;
}

function buildRequestSignal(
  timeoutMs: number,
  external?: AbortSignal
): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return external ? AbortSignal.any([external, timeoutSignal]) : timeoutSignal;
}

/**
 * HTTP client for untrusted URLs. Every connection, including each redirect
 * hop, is dialed through an agent that rejects forbidden addresses after DNS
 * resolution and before the socket connects.
 */
export class SafeTransport {
  private readonly agent: Agent;
  private readonly redirectFollower: RedirectFollower;

  constructor(private readonly options: SafeTransportOptions) {
    this.agent = createSafeAgent({
      connectTimeoutMs: options.connectTimeoutMs,
      ...(options.isForbidden ? { isForbidden: options.isForbidden } : {}),
      ...(options.resolve ? { resolve: options.resolve } : {}),
    });
    this.redirectFollower = new RedirectFollower(
      // `request`, unlike `fetch`, sends the navigation headers as given and
      // does not refuse the fetch standard's blocked ports.
      (url, hop) =>
        undiciRequest(url, {
          method: 'GET',
          headers: hop.headers,
          signal: hop.signal,
          dispatcher: this.agent,
        }),
      options.maxRedirects
    );
  }

  async request(
    url: URL,
    request: TransportRequest
  ): Promise<TransportResponse> {
    const signal = buildRequestSignal(this.options.timeoutMs, request.signal);
    logDebug('HTTP Request', { method: 'GET', url: url.href });

    try {
      const result = await this.redirectFollower.fetchWithRedirects(url, {
        headers: request.headers,
        signal,
      });
      logDebug('HTTP Response', {
        url: result.url.href,
        status: result.response.statusCode,
        contentType: headerValue(result.response.headers, 'content-type'),
      });
      return { ...result, signal };
    } catch (error) {
      throw this.mapError(error, url, request.signal, signal);
    }
  }

  /**
   * `callerSignal` is the caller's own signal; `requestSignal` is the composed
   * one handed out with the response, which also fires on the deadline.
   */
  mapError(
    error: unknown,
    url: URL,
    callerSignal?: AbortSignal,
    requestSignal?: AbortSignal
  ): Error {
    return mapTransportError(
      error,
      url.href,
      this.options.timeoutMs,
      callerSignal,
      requestSignal
    );
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
