import { JSDOM } from 'jsdom';

import { ParseError } from '../errors';

export function parseHtml(html: string, url: string): Document {
  return new JSDOM(html, { url }).window.document;
}

export function extractHrefs(html: string, url: string): string[] {
  const document = parseHtml(html, url);
  return Array.from(document.querySelectorAll('a[href]'))
    .map((a) => (a.getAttribute('href') ?? '').trim())
    .filter(Boolean);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Rendered-ish text of the body: one line per text node, scripts and styles
 * left out. Close enough to what a reader sees for pattern matching.
 */
export function visibleText(document: Document): string {
  const root = document.body ?? document.documentElement;
  if (!root) return '';

  const lines: string[] = [];
  const walker = document.createTreeWalker(root, 4 /* NodeFilter.SHOW_TEXT */);
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    if (node.parentElement?.closest('script, style, noscript, template')) continue;
    const line = collapseWhitespace(node.textContent ?? '');
    if (line) lines.push(line);
  }
  return lines.join('\n');
}

export type SitemapEntries = {
  /** `<url><loc>` entries: pages. */
  urls: string[];
  /** `<sitemap><loc>` entries: child sitemaps of an index. */
  sitemaps: string[];
};

function locsOf(document: Document, parentTag: string): string[] {
  const out: string[] = [];
  for (const parent of Array.from(document.getElementsByTagNameNS('*', parentTag))) {
    const loc = Array.from(parent.children).find((child) => child.localName === 'loc');
    const text = loc?.textContent?.trim();
    if (text) out.push(text);
  }
  return out;
}

export function parseSitemap(xml: string, url: string): SitemapEntries {
  let document: Document;
  try {
    document = new JSDOM(xml, { url, contentType: 'text/xml' }).window.document;
  } catch (e) {
    throw new ParseError(`Malformed sitemap XML at ${url}`, { url, cause: e });
  }

  const root = document.documentElement?.localName;
  if (root !== 'urlset' && root !== 'sitemapindex') {
    throw new ParseError(`Not a sitemap (root element <${root ?? 'none'}>) at ${url}`, { url });
  }

  return { urls: locsOf(document, 'url'), sitemaps: locsOf(document, 'sitemap') };
}
