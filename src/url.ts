import type { ListingIdentifier } from './types';

export type ListingFilter = {
  /** Host of the directory; listings on other hosts are ignored. */
  host: string;
  /** Path fragment every detail page contains, e.g. `/business/`. */
  detailPath: string;
};

export function hostKey(host: string): string {
  return host.toLowerCase().replace(/^www\./, '');
}

const FILE_EXTENSION = /\.(?:xml|gz|html?|php|aspx?|jsp|json|txt|pdf)$/i;

/**
 * Scheme + host + path, no query or fragment, duplicate slashes collapsed and
 * exactly one trailing slash unless the path names a file. Returns null for non-http(s) hrefs.
 */
export function canonicalizeUrl(href: string, base?: string): ListingIdentifier | null {
  const raw = href.trim();
  if (!raw) return null;

  let url: URL;
  try {
    url = base ? new URL(raw, base) : new URL(raw);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  let path = url.pathname.replace(/\/{2,}/g, '/').replace(/\/+$/, '');
  if (!FILE_EXTENSION.test(path)) path += '/';

  return `${url.protocol}//${url.host}${path}`;
}

function normalizeDetailPath(detailPath: string): string {
  const trimmed = detailPath.trim().toLowerCase().replace(/^\/+|\/+$/g, '');
  return `/${trimmed}/`;
}

export function isListingUrl(id: ListingIdentifier, filter: ListingFilter): boolean {
  let url: URL;
  try {
    url = new URL(id);
  } catch {
    return false;
  }
  if (hostKey(url.hostname) !== hostKey(filter.host)) return false;

  const path = url.pathname.toLowerCase();
  const fragment = normalizeDetailPath(filter.detailPath);
  const idx = path.indexOf(fragment);
  if (idx === -1) return false;

  // the fragment alone is the directory, not a listing
  return path.replace(/\/+$/, '').length > idx + fragment.length - 1;
}

/** Canonicalize hrefs found on `baseUrl` and keep listing links, first occurrence order. */
export function collectListingLinks(
  hrefs: Iterable<string>,
  baseUrl: string,
  filter: ListingFilter
): ListingIdentifier[] {
  const seen = new Set<ListingIdentifier>();
  for (const href of hrefs) {
    const id = canonicalizeUrl(href, baseUrl);
    if (!id || seen.has(id)) continue;
    if (!isListingUrl(id, filter)) continue;
    seen.add(id);
  }
  return Array.from(seen);
}
