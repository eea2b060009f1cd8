import TurndownService from 'turndown';

const MULTIPLE_NEWLINES = /\n{3,}/g;

let turndownInstance: TurndownService | null = null;

function getTurndown(): TurndownService {
  if (turndownInstance) return turndownInstance;
  turndownInstance = createTurndownInstance();
  return turndownInstance;
}

function createTurndownInstance(): TurndownService {
  const instance = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    emDelimiter: '_',
    bulletListMarker: '-',
  });

  addNoiseRule(instance);
  addFencedCodeRule(instance);

  return instance;
}

function addNoiseRule(instance: TurndownService): void {
  instance.addRule('removeNoise', {
    filter: ['script', 'style', 'noscript', 'iframe'],
    replacement: () => '',
  });
}

function addFencedCodeRule(instance: TurndownService): void {
  instance.addRule('fencedCodeBlockWithLanguage', {
    filter: (node, options) => isFencedCodeBlock(node, options),
    replacement: (_content, node) => formatFencedCodeBlock(node),
  });
}

function isFencedCodeBlock(
  node: TurndownService.Node,
  options: TurndownService.Options
): boolean {
  if (options.codeBlockStyle !== 'fenced') return false;
  if (node.nodeName !== 'PRE') return false;
  const { firstChild } = node;
  if (!firstChild) return false;
  return firstChild.nodeName === 'CODE';
}

const ELEMENT_NODE = 1;

function isElementNode(node: ChildNode | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

function formatFencedCodeBlock(node: TurndownService.Node): string {
  const codeNode = node.firstChild;
  const code = codeNode?.textContent ?? '';
  const language =
    isElementNode(codeNode) ? resolveCodeLanguage(codeNode) : '';
  return `\n\n\`\`\`${language}\n${code.replace(/\n$/, '')}\n\`\`\`\n\n`;
}

function resolveCodeLanguage(codeNode: Element): string {
  const className = codeNode.getAttribute('class') ?? '';
  const languageMatch =
    /language-(\w+)/.exec(className) ?? /lang-(\w+)/.exec(className);
  return languageMatch?.[1] ?? '';
}

/** Converts sanitized article HTML to Markdown. */
export function htmlToMarkdown(html: string): string {
  if (!html) return '';
  return getTurndown()
    .turndown(html)
    .replace(MULTIPLE_NEWLINES, '\n\n')
    .trim();
}
