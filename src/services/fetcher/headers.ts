/**
 * Real browser User-Agent strings. Sites commonly block default client
 * identifiers, so one of these is picked for every outbound request.
 */
export const USER_AGENT_POOL: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36 Edg/134.0.0.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:135.0) Gecko/20100101 Firefox/135.0',
  'Mozilla/5.0 (iPhone; CPU iPhone OS 18_3 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.3 Mobile/15E148 Safari/604.1',
];

const BROWSER_ACCEPT =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8';

const NAVIGATION_HEADERS = {
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
  'Sec-Ch-Ua-Mobile': '?0',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
} as const;

export function pickUserAgent(
  pool: readonly string[] = USER_AGENT_POOL,
  random: () => number = Math.random
): string {
  const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
  const userAgent = pool[index];
  if (userAgent === undefined) {
    throw new RangeError('User-Agent pool is empty');
  }
  return userAgent;
}

export interface BrowserHeaderOptions {
  userAgent: string;
  acceptLanguage?: string | undefined;
  defaultAcceptLanguage: string;
}

/** Fresh header set for one outbound navigation-style request. */
export function buildBrowserHeaders(
  options: BrowserHeaderOptions
): Record<string, string> {
  const acceptLanguage = options.acceptLanguage?.trim();
  return {
    'User-Agent': options.userAgent,
    Accept: BROWSER_ACCEPT,
    'Accept-Language': acceptLanguage || options.defaultAcceptLanguage,
    ...NAVIGATION_HEADERS,
  };
}
