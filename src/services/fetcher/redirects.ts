import { TransportError, UrlValidationError } from '../../errors/app-error.js';
import { normalizeTargetUrl } from '../../utils/url-normalizer.js';
import { logDebug } from '../logger.js';
import { discardBody, headerValue, type UpstreamResponse } from './response.js';

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

export interface HopRequest {
  headers: Record<string, string>;
  signal?: AbortSignal | undefined;
}

/** Sends one GET without following redirects. */
export type FetchLike = (
  url: URL,
  request: HopRequest
) => Promise<UpstreamResponse>;

/**
 * Resolves a `Location` header against the hop that returned it and runs
 * the result through the same normalizer as user input.
 */
export function resolveRedirectTarget(baseUrl: URL, location: string): URL {
  if (!URL.canParse(location, baseUrl)) {
    throw new TransportError(
      'Invalid redirect target',
      baseUrl.href,
      'invalid-redirect'
    );
  }

  const resolved = new URL(location, baseUrl);
  try {
    return normalizeTargetUrl(resolved.href);
  } catch (error) {
    if (error instanceof UrlValidationError) {
      throw new TransportError(
        `Rejected redirect target: ${error.message}`,
        resolved.href,
        'invalid-redirect',
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Follows redirects by hand so each hop is re-normalized and dialed through
 * the guarded agent again. `maxRedirects` bounds the number of requests that
 * may answer with a redirect: the response that reaches it fails.
 */
export class RedirectFollower {
  constructor(
    private readonly fetchFn: FetchLike,
    private readonly maxRedirects: number
  ) {}

  async fetchWithRedirects(
    url: URL,
    request: HopRequest
  ): Promise<{ response: UpstreamResponse; url: URL }> {
    let currentUrl = url;
    const redirectLimit = Math.max(0, this.maxRedirects);

    for (let redirectCount = 0; ; redirectCount += 1) {
      const response = await this.fetchFn(currentUrl, request);

      if (!isRedirectStatus(response.statusCode)) {
        return { response, url: currentUrl };
      }

      discardBody(response.body);

      if (redirectCount + 1 >= redirectLimit) {
        throw new TransportError(
          `stopped after ${redirectLimit} redirects`,
          currentUrl.href,
          'too-many-redirects'
        );
      }

      const location = headerValue(response.headers, 'location');
      if (!location) {
        throw new TransportError(
          'Redirect response missing Location header',
          currentUrl.href,
          'invalid-redirect'
        );
      }

      const nextUrl = resolveRedirectTarget(currentUrl, location);
      logDebug('Following redirect', {
        from: currentUrl.href,
        to: nextUrl.href,
        status: response.statusCode,
        hop: redirectCount + 1,
      });
      currentUrl = nextUrl;
    }
  }
}
