import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { RenderError } from '../errors/app-error.js';
import { parseExtractQuery } from '../schemas/inputs.js';
import type { ArticleFetcher } from '../services/article-fetcher.js';
import {
  type SanitizedArticle,
  toSanitizedArticle,
} from '../services/extractor.js';
import { selectFormat } from '../services/format-negotiator.js';
import { logInfo } from '../services/logger.js';
import { renderArticle, resolveOutputFormat } from '../services/renderer.js';
import { getErrorMessage } from '../utils/error-utils.js';
import {
  normalizeTargetUrl,
  reconstructTargetUrl,
} from '../utils/url-normalizer.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function queryOf(req: Request): URLSearchParams {
  const queryIndex = req.originalUrl.indexOf('?');
  return new URLSearchParams(
    queryIndex >= 0 ? req.originalUrl.slice(queryIndex + 1) : ''
  );
}

// Aborts the outbound fetch when the client goes away before we answer.
function abortOnClientDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller;
}

/**
 * `GET /`: fetch the page named by `url`, extract the readable article and
 * answer in the negotiated format. The format is resolved before the URL so
 * a bad format never causes an outbound request.
 */
export function createExtractHandler(fetcher: ArticleFetcher): RequestHandler {
  return asyncHandler(async (req, res) => {
    const params = queryOf(req);
    const query = parseExtractQuery(params);
    const rawUrl = reconstructTargetUrl(params);

    const requested = selectFormat({
      format: query.format,
      accept: req.get('accept'),
      userAgent: req.get('user-agent'),
    });
    const format = resolveOutputFormat(requested);

    logInfo('request', { url: rawUrl, format });

    const target = normalizeTargetUrl(rawUrl);
    const controller = abortOnClientDisconnect(res);
    const article = await fetcher.fetch(
      target,
      { acceptLanguage: req.get('accept-language') },
      controller.signal
    );

    let sanitized: SanitizedArticle;
    try {
      sanitized = toSanitizedArticle(article);
    } catch (error) {
      throw new RenderError(
        `Failed to sanitize article: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    renderArticle(res, sanitized, format);
  });
}
