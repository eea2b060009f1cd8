import { AppError, TransportError } from '../../errors/app-error.js';
import {
  findErrorCode,
  getErrorMessage,
  iterateErrorCauses,
} from '../../utils/error-utils.js';
import { BLOCKED_ADDRESS_CODE, BLOCKED_ADDRESS_MESSAGE } from './dns-selection.js';

const CONNECT_TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'ETIMEDOUT',
]);

function hasErrorNamed(error: unknown, name: string): boolean {
  for (const candidate of iterateErrorCauses(error)) {
    if (candidate instanceof Error && candidate.name === name) return true;
  }
  return false;
}

function createCanceledError(url: string, cause: unknown): TransportError {
  return new TransportError('Request was canceled', url, 'aborted', {
    cause,
  });
}

function createTimeoutError(
  url: string,
  timeoutMs: number,
  cause: unknown
): TransportError {
  return new TransportError(
    `Request timeout after ${timeoutMs}ms`,
    url,
    'timeout',
    { cause }
  );
}

function createNetworkError(url: string, cause: unknown): TransportError {
  const code = findErrorCode(cause);
  const detail = code ? ` (${code})` : '';
  const leaf = [...iterateErrorCauses(cause)].at(-1);
  return new TransportError(
    `Network error: Could not reach ${url}: ${getErrorMessage(leaf)}${detail}`,
    url,
    'network',
    { cause }
  );
}

/**
 * Classifies anything thrown while fetching into a {@link TransportError}.
 * `callerSignal` tells a client disconnect apart from our own deadline; a
 * fired `requestSignal` with a live caller signal means the deadline passed.
 */
export function mapTransportError(
  error: unknown,
  url: string,
  timeoutMs: number,
  callerSignal?: AbortSignal,
  requestSignal?: AbortSignal
): AppError {
  if (error instanceof AppError) return error;

  const code = findErrorCode(error);
  if (code === BLOCKED_ADDRESS_CODE) {
    return new TransportError(BLOCKED_ADDRESS_MESSAGE, url, 'blocked-address', {
      cause: error,
    });
  }

  if (callerSignal?.aborted) return createCanceledError(url, error);
  if (requestSignal?.aborted) return createTimeoutError(url, timeoutMs, error);

  if (hasErrorNamed(error, 'TimeoutError')) {
    return createTimeoutError(url, timeoutMs, error);
  }
  if (code && CONNECT_TIMEOUT_CODES.has(code)) {
    return createTimeoutError(url, timeoutMs, error);
  }
  if (hasErrorNamed(error, 'AbortError')) {
    return createCanceledError(url, error);
  }

  return createNetworkError(url, error);
}
