import type { FetcherConfig } from '../config/index.js';
import { AppError, ExtractionError } from '../errors/app-error.js';
import { getErrorMessage } from '../utils/error-utils.js';
import type { ArticleExtractor, ReadableArticle } from './extractor.js';
import type { SafeTransport } from './fetcher.js';
import { buildBrowserHeaders, pickUserAgent } from './fetcher/headers.js';
import { isSuccessStatus, readResponseBody } from './fetcher/response.js';
import { logDebug, logWarn } from './logger.js';
import type { DocumentParser } from './parser.js';

export interface InboundRequestInfo {
  acceptLanguage?: string | undefined;
}

export interface FetchResult {
  document: Document;
  finalUrl: URL;
}

export interface ArticleFetcherDeps {
  transport: SafeTransport;
  parser: DocumentParser;
  extractor: ArticleExtractor;
  config: Pick<FetcherConfig, 'maxBodyBytes' | 'defaultAcceptLanguage'>;
  userAgents?: readonly string[];
  random?: () => number;
}

/**
 * Fetches one page through the safe transport and turns it into a readable
 * article. Errors from the transport come back as they are; anything the
 * parser or extractor throws becomes an {@link ExtractionError}.
 */
export class ArticleFetcher {
  constructor(private readonly deps: ArticleFetcherDeps) {}

  async fetch(
    target: URL,
    inbound: InboundRequestInfo,
    signal?: AbortSignal
  ): Promise<ReadableArticle> {
    const { document, finalUrl } = await this.fetchDocument(
      target,
      inbound,
      signal
    );
    return this.extract(document, finalUrl);
  }

  async fetchDocument(
    target: URL,
    inbound: InboundRequestInfo,
    signal?: AbortSignal
  ): Promise<FetchResult> {
    const { transport, config } = this.deps;
    const headers = buildBrowserHeaders({
      userAgent: pickUserAgent(this.deps.userAgents, this.deps.random),
      acceptLanguage: inbound.acceptLanguage,
      defaultAcceptLanguage: config.defaultAcceptLanguage,
    });

    const result = await transport.request(target, { headers, signal });
    if (!isSuccessStatus(result.response.statusCode)) {
      logWarn('Upstream returned non-success status', {
        url: result.url.href,
        status: result.response.statusCode,
      });
    }

    let text: string;
    try {
      const body = await readResponseBody(
        result.response,
        result.url.href,
        config.maxBodyBytes,
        result.signal
      );
      if (body.truncated) {
        logDebug('Response body truncated at size cap', {
          url: result.url.href,
          maxBytes: config.maxBodyBytes,
        });
      }
      text = body.text;
    } catch (error) {
      throw transport.mapError(error, result.url, signal, result.signal);
    }

    return { document: this.parse(text, result.url), finalUrl: result.url };
  }

  private parse(html: string, url: URL): Document {
    try {
      return this.deps.parser.parse(html, url);
    } catch (error) {
      throw new ExtractionError(
        `Failed to parse document: ${getErrorMessage(error)}`,
        url.href,
        { cause: error }
      );
    }
  }

  private extract(document: Document, url: URL): ReadableArticle {
    try {
      return this.deps.extractor.extract(document, url);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new ExtractionError(
        `Failed to extract article: ${getErrorMessage(error)}`,
        url.href,
        { cause: error }
      );
    }
  }
}
