import { parseHTML } from 'linkedom';

import { logDebug } from './logger.js';

export interface DocumentParser {
  parse(html: string, url: URL): Document;
}

function applyBaseUri(document: Document, url: URL): void {
  try {
    Object.defineProperty(document, 'baseURI', {
      value: url.href,
      writable: true,
    });
  } catch (error) {
    logDebug('Could not set document baseURI', { error: String(error) });
  }
}

/** linkedom-backed parser; relative links resolve against the final URL. */
export const linkedomParser: DocumentParser = {
  parse(html, url) {
    const { document } = parseHTML(html);
    const dom = document as unknown as Document;
    applyBaseUri(dom, url);
    return dom;
  },
};
