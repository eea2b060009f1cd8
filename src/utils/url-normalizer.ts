import { config } from '../config/index.js';
import { UrlValidationError } from '../errors/app-error.js';

/** Query keys that belong to this service, never to the target site. */
export const CONTROL_PARAMS: ReadonlySet<string> = new Set(['url', 'format']);

const COLLAPSED_SCHEME = /^(https?):\/(?!\/)/i;

function assertUrlNotEmpty(trimmedUrl: string, raw: string): void {
  if (!trimmedUrl) {
    throw new UrlValidationError('url parameter is empty', raw);
  }
}

function assertUrlLength(trimmedUrl: string): void {
  if (trimmedUrl.length > config.constants.maxUrlLength) {
    throw new UrlValidationError(
      `URL exceeds maximum length of ${config.constants.maxUrlLength} characters`,
      trimmedUrl
    );
  }
}

// Some proxies squash "://" to ":/" when the target travels in a path.
function repairCollapsedScheme(value: string): string {
  return value.replace(COLLAPSED_SCHEME, '$1://');
}

function ensureScheme(value: string): string {
  return value.includes('://') ? value : `https://${value}`;
}

function parseUrl(candidate: string): URL {
  if (!URL.canParse(candidate)) {
    throw new UrlValidationError('invalid URL', candidate);
  }
  return new URL(candidate);
}

function assertProtocolAllowed(url: URL): void {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new UrlValidationError('unsupported URL scheme', url.href);
  }
}

function assertHostnamePresent(url: URL): void {
  if (!url.hostname) {
    throw new UrlValidationError('URL must have a valid hostname', url.href);
  }
}

function assertNoCredentials(url: URL): void {
  if (url.username || url.password) {
    throw new UrlValidationError(
      'URLs with embedded credentials are not allowed',
      url.href
    );
  }
}

/**
 * Turns raw user input into an absolute http(s) URL, or throws
 * {@link UrlValidationError}. Redirect targets go through here too, so the
 * scheme restriction holds for every hop.
 */
export function normalizeTargetUrl(raw: string): URL {
  const trimmedUrl = raw.trim();
  assertUrlNotEmpty(trimmedUrl, raw);
  assertUrlLength(trimmedUrl);

  const url = parseUrl(ensureScheme(repairCollapsedScheme(trimmedUrl)));
  assertProtocolAllowed(url);
  assertHostnamePresent(url);
  assertNoCredentials(url);
  return url;
}

interface SplitUrl {
  base: string;
  query: string;
  fragment: string;
}

function splitUrl(value: string): SplitUrl {
  const hashIndex = value.indexOf('#');
  const fragment = hashIndex >= 0 ? value.slice(hashIndex) : '';
  const withoutFragment = hashIndex >= 0 ? value.slice(0, hashIndex) : value;

  const queryIndex = withoutFragment.indexOf('?');
  if (queryIndex < 0) return { base: withoutFragment, query: '', fragment };
  return {
    base: withoutFragment.slice(0, queryIndex),
    query: withoutFragment.slice(queryIndex + 1),
    fragment,
  };
}

/**
 * Rebuilds the target URL when a rewrite layer has split the target's own
 * query string into ours: `?url=http://a.test?x=1&y=2` arrives as
 * `url=http://a.test?x=1` plus a stray `y=2`. Stray keys are appended back
 * onto the target. The raw `url` value is returned as is when there are
 * none, so feeding the result back in yields the same string.
 */
export function reconstructTargetUrl(query: URLSearchParams): string {
  const rawLink = query.get('url') ?? '';
  if (!rawLink) return '';

  const stray = [...query].filter(([key]) => !CONTROL_PARAMS.has(key));
  if (stray.length === 0) return rawLink;

  const { base, query: targetQuery, fragment } = splitUrl(rawLink);
  const merged = new URLSearchParams(targetQuery);
  for (const [key, value] of stray) {
    merged.append(key, value);
  }
  merged.sort();

  return `${base}?${merged.toString()}${fragment}`;
}
