import { z } from 'zod';

/**
 * Control parameters read from the request query. Only the first occurrence
 * of each key counts; anything else in the query belongs to the target URL.
 */
export const extractQuerySchema = z.object({
  url: z.string().optional(),
  format: z.string().optional(),
});

export type ExtractQuery = z.infer<typeof extractQuerySchema>;

export function parseExtractQuery(params: URLSearchParams): ExtractQuery {
  return extractQuerySchema.parse({
    url: params.get('url') ?? undefined,
    format: params.get('format') ?? undefined,
  });
}
