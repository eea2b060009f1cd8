import type { Response } from 'express';

import { InvalidFormatError, RenderError } from '../errors/app-error.js';
import { renderArticleDocument } from '../transformers/html.transformer.js';
import { htmlToMarkdown } from '../transformers/markdown.transformer.js';
import { getErrorMessage } from '../utils/error-utils.js';
import type { SanitizedArticle } from './extractor.js';

export const OUTPUT_FORMATS = ['html', 'markdown', 'json', 'text'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const FORMAT_ALIASES = {
  html: 'html',
  md: 'markdown',
  markdown: 'markdown',
  json: 'json',
  text: 'text',
  txt: 'text',
} as const satisfies Record<string, OutputFormat>;

type FormatAlias = keyof typeof FORMAT_ALIASES;

function isFormatAlias(value: string): value is FormatAlias {
  return Object.hasOwn(FORMAT_ALIASES, value);
}

export function resolveOutputFormat(value: string): OutputFormat {
  if (!isFormatAlias(value)) throw new InvalidFormatError(value);
  return FORMAT_ALIASES[value];
}

export interface Renderer {
  contentType: string;
  serialize(article: SanitizedArticle): string;
}

export const RENDERERS = {
  html: {
    contentType: 'text/html; charset=utf-8',
    serialize: renderArticleDocument,
  },
  markdown: {
    contentType: 'text/markdown; charset=utf-8',
    serialize: (article) => htmlToMarkdown(article.content),
  },
  // Content stays sanitized: consumers may re-render it as HTML.
  json: {
    contentType: 'application/json; charset=utf-8',
    serialize: (article) =>
      `${JSON.stringify({ title: article.title, content: article.content })}\n`,
  },
  text: {
    contentType: 'text/plain; charset=utf-8',
    serialize: (article) => article.content,
  },
} as const satisfies Record<OutputFormat, Renderer>;

export function serializeArticle(
  article: SanitizedArticle,
  format: OutputFormat
): { contentType: string; body: string } {
  const renderer: Renderer = RENDERERS[format];
  try {
    return {
      contentType: renderer.contentType,
      body: renderer.serialize(article),
    };
  } catch (error) {
    throw new RenderError(
      `Failed to render ${format}: ${getErrorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Serializes the article fully before touching the response, so a renderer
 * failure still leaves room for a JSON error body.
 */
export function renderArticle(
  res: Response,
  article: SanitizedArticle,
  format: OutputFormat
): void {
  const { contentType, body } = serializeArticle(article, format);
  res.status(200).set('Content-Type', contentType).send(body);
}
