export const SIZE_LIMITS = {
  TWO_MB: 2 * 1024 * 1024,
} as const;

export const TIMEOUT = {
  DEFAULT_FETCH_TIMEOUT_MS: 10_000,
  DEFAULT_CONNECT_TIMEOUT_MS: 30_000,
} as const;

export const MAX_REDIRECTS = 5;
