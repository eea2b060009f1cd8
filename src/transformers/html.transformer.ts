import type { SanitizedArticle } from '../services/extractor.js';

const ARTICLE_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
	<meta charset="utf-8"/>
	<meta name="viewport" content="width=device-width, initial-scale=1.0">
	<title>{{title}}</title>
	<link id="theme" rel="stylesheet" href="https://unpkg.com/sakura.css/css/sakura.css">
</head>
<body>
	<h1>{{title}}</h1>
	{{content}}
</body>
</html>
`;

type TemplateSlot = 'title' | 'content';
type TemplatePart = { kind: 'text'; value: string } | { kind: TemplateSlot };

const SLOT_PATTERN = /\{\{(title|content)\}\}/g;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function isTemplateSlot(value: string | undefined): value is TemplateSlot {
  return value === 'title' || value === 'content';
}

function compileTemplate(source: string): readonly TemplatePart[] {
  const parts: TemplatePart[] = [];
  let lastIndex = 0;
  for (const match of source.matchAll(SLOT_PATTERN)) {
    const slot = match[1];
    if (!isTemplateSlot(slot)) continue;
    const index = match.index ?? 0;
    parts.push({ kind: 'text', value: source.slice(lastIndex, index) });
    parts.push({ kind: slot });
    lastIndex = index + match[0].length;
  }
  parts.push({ kind: 'text', value: source.slice(lastIndex) });
  return parts;
}

let compiledTemplate: readonly TemplatePart[] | null = null;

function getTemplate(): readonly TemplatePart[] {
  compiledTemplate ??= compileTemplate(ARTICLE_TEMPLATE);
  return compiledTemplate;
}

/**
 * Fills the reading template. The title is escaped; the content is inserted
 * as is and must already be sanitized.
 */
export function renderArticleDocument(article: SanitizedArticle): string {
  return getTemplate()
    .map((part) => {
      switch (part.kind) {
        case 'text':
          return part.value;
        case 'title':
          return escapeHtml(article.title);
        case 'content':
          return article.content;
      }
    })
    .join('');
}
