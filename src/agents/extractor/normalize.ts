import { z } from 'zod';

import { collapseWhitespace } from '../../tools/html';
import { DESCRIPTION_MAX_LENGTH, NAME_MAX_LENGTH, NAME_MIN_LENGTH } from '../../types';
import { hostKey } from '../../url';

const SOCIAL_DOMAINS = [
  'facebook.com',
  'fb.com',
  'instagram.com',
  'linkedin.com',
  'twitter.com',
  'x.com',
  'youtube.com',
  'youtu.be',
  'tiktok.com',
  'pinterest.com',
];

const PLATFORM_DOMAINS = [
  'mailchi.mp',
  'list-manage.com',
  'wordpress.org',
  'wordpress.com',
  'gravatar.com',
  'w.org',
  'schema.org',
  'google.com',
  'goo.gl',
];

const EXCLUDED_LINK_FRAGMENTS = ['opentable.com/restref', 'subscribe'];

const EMAIL_NOISE_DOMAINS = [
  'example.com',
  'example.org',
  'sentry.io',
  'mozilla.org',
  'schema.org',
  'w3.org',
  'wixpress.com',
  'domain.com',
  'yourdomain.com',
];

const FILE_LIKE_EMAIL = /\.(png|jpe?g|gif|svg|webp|js|css|pdf)$/i;

// navigation text that address patterns drag along from the page footer
const ADDRESS_BOILERPLATE =
  /\s*\b(?:Post navigation|Previous Business|Next Business|Read More|Leave a Comment)\b.*$/i;

export function withinNameBounds(text: string): boolean {
  return text.length >= NAME_MIN_LENGTH && text.length <= NAME_MAX_LENGTH;
}

export function truncateText(text: string, max = DESCRIPTION_MAX_LENGTH): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 3).trimEnd()}...`;
}

/** `(NNN) NNN-NNNN` when exactly ten digits are present, otherwise the input trimmed. */
export function normalizePhone(raw: string): string {
  const digits = raw.replace(/\D/g, '');
  if (digits.length !== 10) return raw.trim();
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

export function cleanAddress(raw: string): string {
  return collapseWhitespace(raw)
    .replace(ADDRESS_BOILERPLATE, '')
    .replace(/[\s,;:-]+$/, '')
    .trim();
}

const EmailSchema = z.string().email();

/** The address, trimmed, if it is well-formed and not platform noise. */
export function acceptEmail(candidate: string): string | null {
  const email = candidate.trim();
  if (!EmailSchema.safeParse(email).success) return null;

  const lower = email.toLowerCase();
  if (FILE_LIKE_EMAIL.test(lower)) return null;
  const domain = lower.slice(lower.lastIndexOf('@') + 1);
  if (EMAIL_NOISE_DOMAINS.some((d) => domain === d || domain.endsWith(`.${d}`))) return null;

  return email;
}

/**
 * Cloudflare's email obfuscation: the first byte is a key XOR-ed into every
 * following byte.
 */
export function decodeCloudflareEmail(hex: string): string | null {
  if (!/^[0-9a-f]+$/i.test(hex) || hex.length < 4 || hex.length % 2 !== 0) return null;

  const key = Number.parseInt(hex.slice(0, 2), 16);
  let out = '';
  for (let i = 2; i < hex.length; i += 2) {
    out += String.fromCharCode(Number.parseInt(hex.slice(i, i + 2), 16) ^ key);
  }
  return out;
}

function matchesDomain(host: string, domain: string): boolean {
  const d = hostKey(domain);
  return host === d || host.endsWith(`.${d}`);
}

export function isExcludedWebsite(href: string, selfDomains: readonly string[]): boolean {
  let url: URL;
  try {
    url = new URL(href);
  } catch {
    return true;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return true;

  const host = hostKey(url.hostname);
  const denied = [...SOCIAL_DOMAINS, ...PLATFORM_DOMAINS, ...selfDomains];
  if (denied.some((d) => matchesDomain(host, d))) return true;

  const lower = href.toLowerCase();
  return EXCLUDED_LINK_FRAGMENTS.some((f) => lower.includes(f));
}

/** Unique non-empty values in order of first appearance. */
export function dedupeInOrder(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const v = collapseWhitespace(value);
    if (!v || seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}
