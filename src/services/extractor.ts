import { Readability } from '@mozilla/readability';

import { ExtractionError } from '../errors/app-error.js';
import { sanitizeArticleHtml, sanitizeText } from '../utils/sanitizer.js';

/**
 * Extractor output. `renderHtml` is the only way to reach the article body,
 * and it always returns sanitized markup.
 */
export interface ReadableArticle {
  title: string;
  renderHtml(): string;
}

export interface SanitizedArticle {
  title: string;
  content: string;
}

export interface ArticleExtractor {
  extract(document: Document, url: URL): ReadableArticle;
}

function documentTitle(document: Document): string {
  return sanitizeText(document.querySelector('title')?.textContent);
}

export const readabilityExtractor: ArticleExtractor = {
  extract(document, url) {
    const fallbackTitle = documentTitle(document);
    const parsed = new Readability(document).parse();
    if (!parsed) {
      throw new ExtractionError('No readable content found', url.href);
    }

    const title = sanitizeText(parsed.title) || fallbackTitle;
    const rawContent = parsed.content ?? '';
    return {
      title,
      renderHtml: () => sanitizeArticleHtml(rawContent),
    };
  },
};

/** Produces the value handed to the renderers. */
export function toSanitizedArticle(article: ReadableArticle): SanitizedArticle {
  return { title: article.title, content: article.renderHtml() };
}
