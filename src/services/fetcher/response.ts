import type { Readable } from 'node:stream';

import { TransportError } from '../../errors/app-error.js';

export type UpstreamHeaders = Record<string, string | string[] | undefined>;

/**
 * The part of an undici `Dispatcher.ResponseData` the fetch pipeline reads.
 */
export interface UpstreamResponse {
  statusCode: number;
  headers: UpstreamHeaders;
  body: Readable;
}

export interface ResponseBody {
  text: string;
  size: number;
  truncated: boolean;
}

export function headerValue(
  headers: UpstreamHeaders,
  name: string
): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/** Drops the rest of a body we will not read; the connection is not reused. */
export function discardBody(body: Readable): void {
  if (!body.destroyed) body.destroy();
}

function toBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return new TextEncoder().encode(value);
  throw new TypeError('Unexpected chunk type in response body');
}

function concatChunks(chunks: readonly Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/**
 * Reads at most `maxBytes` of the body. A body is only reported as truncated
 * once a byte past the cap arrives; the rest of the stream is then destroyed,
 * whatever Content-Length claims, so an endless body cannot grow memory.
 */
export async function readResponseBody(
  response: UpstreamResponse,
  url: string,
  maxBytes: number,
  signal?: AbortSignal
): Promise<ResponseBody> {
  const { body } = response;
  const chunks: Uint8Array[] = [];
  let total = 0;
  let truncated = false;

  try {
    for await (const value of body) {
      if (signal?.aborted) {
        throw new TransportError(
          'Request was aborted during response read',
          url,
          'aborted'
        );
      }

      const chunk = toBytes(value);
      const remaining = maxBytes - total;
      if (chunk.byteLength > remaining) {
        chunks.push(chunk.subarray(0, remaining));
        total += remaining;
        truncated = true;
        break;
      }
      chunks.push(chunk);
      total += chunk.byteLength;
    }
  } finally {
    discardBody(body);
  }

  const text = new TextDecoder().decode(concatChunks(chunks, total));
  return { text, size: total, truncated };
}
