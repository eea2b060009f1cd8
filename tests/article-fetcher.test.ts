import type { IncomingHttpHeaders } from 'node:http';

import { afterEach, describe, expect, it } from 'vitest';

import { ExtractionError } from '../src/errors/app-error.js';
import { ArticleFetcher } from '../src/services/article-fetcher.js';
import {
  type ArticleExtractor,
  readabilityExtractor,
  toSanitizedArticle,
} from '../src/services/extractor.js';
import { SafeTransport } from '../src/services/fetcher.js';
import { type DocumentParser, linkedomParser } from '../src/services/parser.js';
import {
  ARTICLE_HTML,
  allowLoopbackTestServer,
  type LocalServer,
  startLocalServer,
} from './helpers/local-server.js';

const FETCHER_CONFIG = {
  maxBodyBytes: 2 * 1024 * 1024,
  defaultAcceptLanguage: 'en-US,en;q=0.9',
};

let server: LocalServer | undefined;
let transport: SafeTransport | undefined;

afterEach(async () => {
  await transport?.close();
  await server?.close();
  transport = undefined;
  server = undefined;
});

function createTransport(): SafeTransport {
  transport = new SafeTransport({
    timeoutMs: 5_000,
    connectTimeoutMs: 5_000,
    maxRedirects: 5,
    isForbidden: allowLoopbackTestServer,
  });
  return transport;
}

function createFetcher(
  overrides: {
    parser?: DocumentParser;
    extractor?: ArticleExtractor;
    maxBodyBytes?: number;
  } = {}
): ArticleFetcher {
  return new ArticleFetcher({
    transport: createTransport(),
    parser: overrides.parser ?? linkedomParser,
    extractor: overrides.extractor ?? readabilityExtractor,
    config: {
      ...FETCHER_CONFIG,
      maxBodyBytes: overrides.maxBodyBytes ?? FETCHER_CONFIG.maxBodyBytes,
    },
    userAgents: ['test-agent/1.0'],
  });
}

async function serveArticle(
  status = 200,
  onRequest?: (headers: IncomingHttpHeaders) => void
): Promise<LocalServer> {
  server = await startLocalServer((req, res) => {
    onRequest?.(req.headers);
    res.writeHead(status, { 'content-type': 'text/html; charset=utf-8' });
    res.end(ARTICLE_HTML);
  });
  return server;
}

describe('ArticleFetcher', () => {
  it('extracts a sanitized article from the upstream page', async () => {
    const upstream = await serveArticle();
    const fetcher = createFetcher();

    const article = await fetcher.fetch(new URL(`${upstream.origin}/post`), {});
    const { title, content } = toSanitizedArticle(article);

    expect(title).toBe('Quiet Harbour Field Notes');
    expect(content).toContain('Normal text survives');
    expect(content).not.toContain('<script');
    expect(content).not.toContain('onerror');
    expect(content).not.toContain('javascript:');
  });

  it('sends browser headers and forwards Accept-Language', async () => {
    let seen: IncomingHttpHeaders = {};
    const upstream = await serveArticle(200, (headers) => {
      seen = headers;
    });
    const fetcher = createFetcher();

    await fetcher.fetch(new URL(`${upstream.origin}/`), {
      acceptLanguage: 'fr-CA,fr;q=0.8',
    });

    expect(seen['user-agent']).toBe('test-agent/1.0');
    expect(seen['accept-language']).toBe('fr-CA,fr;q=0.8');
    expect(seen['sec-fetch-mode']).toBe('navigate');
    expect(seen['upgrade-insecure-requests']).toBe('1');
  });

  it('uses the default Accept-Language when none is given', async () => {
    let seen: IncomingHttpHeaders = {};
    const upstream = await serveArticle(200, (headers) => {
      seen = headers;
    });
    const fetcher = createFetcher();

    await fetcher.fetch(new URL(`${upstream.origin}/`), {});

    expect(seen['accept-language']).toBe('en-US,en;q=0.9');
  });

  it('still parses pages served with an error status', async () => {
    const upstream = await serveArticle(404);
    const fetcher = createFetcher();

    const article = await fetcher.fetch(new URL(`${upstream.origin}/`), {});

    expect(article.title).toBe('Quiet Harbour Field Notes');
  });

  it('hands at most the body cap to the parser', async () => {
    const upstream = await serveArticle();
    const seenHtml: string[] = [];
    const parser: DocumentParser = {
      parse(html, url) {
        seenHtml.push(html);
        return linkedomParser.parse(html, url);
      },
    };
    const fetcher = createFetcher({ parser, maxBodyBytes: 64 });

    await fetcher.fetchDocument(new URL(`${upstream.origin}/`), {});

    expect(seenHtml).toEqual([ARTICLE_HTML.slice(0, 64)]);
  });

  it('reports the final URL after redirects', async () => {
    server = await startLocalServer((req, res) => {
      if (req.url === '/old') {
        res.writeHead(301, { location: '/new' });
        res.end();
        return;
      }
      res.end(ARTICLE_HTML);
    });
    const fetcher = createFetcher();

    const result = await fetcher.fetchDocument(
      new URL(`${server.origin}/old`),
      {}
    );

    expect(result.finalUrl.href).toBe(`${server.origin}/new`);
  });

  it('fails when there is no readable content', async () => {
    server = await startLocalServer((_req, res) => {
      res.end('<html><body></body></html>');
    });
    const fetcher = createFetcher();

    await expect(
      fetcher.fetch(new URL(`${server.origin}/`), {})
    ).rejects.toBeInstanceOf(ExtractionError);
  });

  it('wraps parser failures as extraction errors', async () => {
    const upstream = await serveArticle();
    const parser: DocumentParser = {
      parse() {
        throw new Error('parser exploded');
      },
    };
    const fetcher = createFetcher({ parser });

    await expect(
      fetcher.fetch(new URL(`${upstream.origin}/`), {})
    ).rejects.toThrow('Failed to parse document: parser exploded');
  });

  it('wraps unexpected extractor failures as extraction errors', async () => {
    const upstream = await serveArticle();
    const extractor: ArticleExtractor = {
      extract() {
        throw new Error('extractor exploded');
      },
    };
    const fetcher = createFetcher({ extractor });

    const failure = fetcher.fetch(new URL(`${upstream.origin}/`), {});

    await expect(failure).rejects.toBeInstanceOf(ExtractionError);
    await expect(failure).rejects.toThrow(
      'Failed to extract article: extractor exploded'
    );
  });
});
