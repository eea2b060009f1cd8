export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function createErrorWithCode(
  message: string,
  code: string
): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Walks `error.cause` links, outermost first. undici wraps connector
 * failures in a generic `TypeError: fetch failed`.
 */
export function* iterateErrorCauses(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

export function findErrorCode(error: unknown): string | undefined {
  for (const candidate of iterateErrorCauses(error)) {
    if (isSystemError(candidate)) return candidate.code;
  }
  return undefined;
}
