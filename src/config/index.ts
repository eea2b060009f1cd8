import { MAX_REDIRECTS, SIZE_LIMITS, TIMEOUT } from './constants.js';
import { parseBoolean, parseInteger, parseLogLevel } from './env-parsers.js';

export interface FetcherConfig {
  timeoutMs: number;
  connectTimeoutMs: number;
  maxRedirects: number;
  maxBodyBytes: number;
  defaultAcceptLanguage: string;
}

const fetcher: FetcherConfig = {
  timeoutMs: parseInteger(
    process.env.FETCH_TIMEOUT_MS,
    TIMEOUT.DEFAULT_FETCH_TIMEOUT_MS,
    1000,
    120_000
  ),
  connectTimeoutMs: parseInteger(
    process.env.CONNECT_TIMEOUT_MS,
    TIMEOUT.DEFAULT_CONNECT_TIMEOUT_MS,
    1000,
    120_000
  ),
  maxRedirects: MAX_REDIRECTS,
  maxBodyBytes: SIZE_LIMITS.TWO_MB,
  defaultAcceptLanguage: 'en-US,en;q=0.9',
};

const host = process.env.HOST ?? '127.0.0.1';
const port = parseInteger(process.env.PORT, 3000, 1, 65535);

export const config = {
  server: {
    name: 'reader-gateway',
    host,
    port,
  },
  fetcher,
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(
      process.env.LOG_ENABLED,
      process.env.NODE_ENV !== 'test'
    ),
  },
  constants: {
    maxUrlLength: 2048,
  },
  security: {
    contentSecurityPolicy:
      "default-src 'self'; img-src * data:; style-src 'self' https://unpkg.com;",
    referrerPolicy: 'no-referrer',
  },
} as const;
