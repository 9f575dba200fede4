import { collapseWhitespace } from '../../tools/html';

import {
  acceptEmail,
  cleanAddress,
  decodeCloudflareEmail,
  dedupeInOrder,
  isExcludedWebsite,
  normalizePhone,
  truncateText,
  withinNameBounds,
} from './normalize';
import type { PageView } from './pageView';

export type RuleContext = {
  /** Path fragment of category/tag archive links, e.g. `/business-type/`. */
  categoryPath: string;
  /** Hosts that count as the directory itself, never as a listing's website. */
  selfDomains: readonly string[];
};

/** One way of finding one field. Returns null when it finds nothing usable. */
export type FieldRule = {
  id: string;
  apply(page: PageView, ctx: RuleContext): string | null;
};

export const RECORD_FIELDS = [
  'name',
  'category',
  'description',
  'phone',
  'email',
  'address',
  'website',
] as const;
export type RecordField = (typeof RECORD_FIELDS)[number];

const TEN_DIGIT_PHONE = /(?<!\d)\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?!\d)/;
const SEVEN_DIGIT_PHONE = /(?<!\d)\d{3}[-.]\d{4}(?!\d)/;
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const FULL_ADDRESS = /\d+\s+[A-Za-z.\s]+,\s*[A-Za-z\s]+,\s*[A-Z]{2}\s+\d{5}(?:-\d{4})?/g;
const STREET_ADDRESS =
  /\d+\s+[A-Za-z\s]+(?:Street|St|Avenue|Ave|Road|Rd|Drive|Dr|Lane|Ln|Boulevard|Blvd|Way|Circle|Ct|Court|Place|Pl)\b/g;

const CHROME = 'nav, header, footer';

function anchors(page: PageView): HTMLAnchorElement[] {
  return Array.from(page.document.querySelectorAll<HTMLAnchorElement>('a[href]'));
}

function textOf(el: Element): string {
  return collapseWhitespace(el.textContent ?? '');
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function firstSurviving(
  text: string,
  pattern: RegExp,
  accept: (match: string) => string | null
): string | null {
  for (const match of text.matchAll(pattern)) {
    const value = accept(match[0]);
    if (value) return value;
  }
  return null;
}

function nonEmpty(value: string | undefined): string | null {
  return value ? value : null;
}

function heading(selector: string): FieldRule {
  return {
    id: `heading:${selector}`,
    apply(page) {
      for (const el of Array.from(page.document.querySelectorAll(selector))) {
        const text = textOf(el);
        if (withinNameBounds(text)) return text;
      }
      return null;
    },
  };
}

function tagLinks(id: string, select: (page: PageView, ctx: RuleContext) => Element[]): FieldRule {
  return {
    id,
    apply(page, ctx) {
      const texts = select(page, ctx)
        .filter((a) => !a.closest(CHROME))
        .map(textOf)
        .filter((t) => t.length > 3);
      const tags = dedupeInOrder(texts);
      return tags.length ? tags.join(', ') : null;
    },
  };
}

const nameRules: FieldRule[] = [
  {
    id: 'ld-json.name',
    apply: (page) => {
      const name = page.business?.name;
      return name && withinNameBounds(collapseWhitespace(name)) ? collapseWhitespace(name) : null;
    },
  },
  heading('h1.entry-title'),
  heading('h1'),
  heading('.business-name'),
  heading('h2'),
];

const categoryRules: FieldRule[] = [
  tagLinks('category-links', (page, ctx) => {
    const fragment = ctx.categoryPath.toLowerCase();
    return anchors(page).filter((a) =>
      (a.getAttribute('href') ?? '').toLowerCase().includes(fragment)
    );
  }),
  tagLinks('tag-links', (page) => Array.from(page.document.querySelectorAll('a[rel~="tag"]'))),
];

const descriptionRules: FieldRule[] = [
  {
    id: 'content-paragraphs',
    apply(page) {
      for (const selector of ['.entry-content', '.content', 'article']) {
        const container = page.document.querySelector(selector);
        if (!container) continue;
        const parts = Array.from(container.querySelectorAll('p'))
          .slice(0, 3)
          .map(textOf)
          .filter((t) => t.length > 20);
        if (parts.length) return truncateText(parts.join(' '));
      }
      return null;
    },
  },
  {
    id: 'ld-json.description',
    apply: (page) => {
      const description = page.business?.description;
      return description ? truncateText(collapseWhitespace(description)) : null;
    },
  },
  {
    id: 'meta-description',
    apply(page) {
      const content = page.document
        .querySelector('meta[name="description"]')
        ?.getAttribute('content');
      const text = collapseWhitespace(content ?? '');
      return text ? truncateText(text) : null;
    },
  },
];

const phoneRules: FieldRule[] = [
  {
    id: 'ld-json.telephone',
    apply: (page) => {
      const phone = page.business?.telephone;
      return phone ? normalizePhone(phone) : null;
    },
  },
  {
    id: 'tel-link',
    apply(page) {
      const link = anchors(page).find((a) =>
        (a.getAttribute('href') ?? '').trim().toLowerCase().startsWith('tel:')
      );
      if (!link) return null;
      const text = textOf(link);
      const raw =
        text.replace(/\D/g, '').length >= 7
          ? text
          : safeDecode((link.getAttribute('href') ?? '').trim().slice(4));
      return nonEmpty(normalizePhone(raw));
    },
  },
  {
    id: 'text.ten-digit',
    apply: (page) => {
      const match = page.text.match(TEN_DIGIT_PHONE);
      return match ? normalizePhone(match[0]) : null;
    },
  },
  {
    id: 'text.seven-digit',
    apply: (page) => page.text.match(SEVEN_DIGIT_PHONE)?.[0] ?? null,
  },
];

const emailRules: FieldRule[] = [
  {
    id: 'mailto-link',
    apply(page) {
      for (const a of anchors(page)) {
        const href = (a.getAttribute('href') ?? '').trim();
        if (!href.toLowerCase().startsWith('mailto:')) continue;
        const email = acceptEmail(safeDecode(href.slice(7).split('?')[0]));
        if (email) return email;
      }
      return null;
    },
  },
  {
    id: 'cloudflare-protected',
    apply(page) {
      const encoded = [
        ...Array.from(page.document.querySelectorAll('[data-cfemail]')).map(
          (el) => el.getAttribute('data-cfemail') ?? ''
        ),
        ...anchors(page)
          .map((a) => a.getAttribute('href') ?? '')
          .filter((href) => href.includes('/cdn-cgi/l/email-protection#'))
          .map((href) => href.slice(href.indexOf('#') + 1)),
      ];
      for (const hex of encoded) {
        const decoded = decodeCloudflareEmail(hex);
        const email = decoded ? acceptEmail(decoded) : null;
        if (email) return email;
      }
      return null;
    },
  },
  {
    id: 'anchor-text',
    apply(page) {
      for (const a of anchors(page)) {
        const text = textOf(a);
        if (!text.includes('@')) continue;
        const email = firstSurviving(text, EMAIL_PATTERN, acceptEmail);
        if (email) return email;
      }
      return null;
    },
  },
  {
    id: 'text',
    apply: (page) => firstSurviving(page.text, EMAIL_PATTERN, acceptEmail),
  },
];

const addressRules: FieldRule[] = [
  {
    id: 'ld-json.address',
    apply(page) {
      const address = page.business?.address;
      if (!address) return null;
      if (typeof address === 'string') return nonEmpty(cleanAddress(address));

      const regionLine = [address.addressRegion, address.postalCode].filter(Boolean).join(' ');
      const cityLine = [address.addressLocality, regionLine].filter(Boolean).join(', ');
      return nonEmpty(cleanAddress([address.streetAddress, cityLine].filter(Boolean).join(', ')));
    },
  },
  {
    id: 'h3-street',
    apply(page) {
      for (const h3 of Array.from(page.document.querySelectorAll('h3'))) {
        if (!/^\d+\s+[A-Za-z]/.test(textOf(h3))) continue;
        const lines = Array.from(h3.childNodes)
          .map((node) => collapseWhitespace(node.textContent ?? ''))
          .filter(Boolean);
        const address = cleanAddress(lines.join(', '));
        if (address) return address;
      }
      return null;
    },
  },
  {
    id: 'text.full-address',
    apply: (page) => firstSurviving(page.text, FULL_ADDRESS, (m) => nonEmpty(cleanAddress(m))),
  },
  {
    id: 'text.street-address',
    apply: (page) => firstSurviving(page.text, STREET_ADDRESS, (m) => nonEmpty(cleanAddress(m))),
  },
];

const websiteRules: FieldRule[] = [
  {
    id: 'ld-json.url',
    apply: (page, ctx) => {
      const url = page.business?.url;
      return url && !isExcludedWebsite(url, ctx.selfDomains) ? url : null;
    },
  },
  {
    id: 'external-link',
    apply(page, ctx) {
      const link = anchors(page).find(
        (a) =>
          /^https?:\/\//i.test(a.href) &&
          !a.closest(CHROME) &&
          !isExcludedWebsite(a.href, ctx.selfDomains)
      );
      return link ? link.href : null;
    },
  },
];

/** Ranked rules per field; the first rule that returns a value wins. */
export const FIELD_RULES: Record<RecordField, readonly FieldRule[]> = {
  name: nameRules,
  category: categoryRules,
  description: descriptionRules,
  phone: phoneRules,
  email: emailRules,
  address: addressRules,
  website: websiteRules,
};

export type ResolvedField = { value: string; rule: string };

export function resolveField(
  rules: readonly FieldRule[],
  page: PageView,
  ctx: RuleContext
): ResolvedField | null {
  for (const rule of rules) {
    const value = rule.apply(page, ctx);
    if (value) return { value, rule: rule.id };
  }
  return null;
}

export function resolveFields(
  page: PageView,
  ctx: RuleContext
): { values: Record<RecordField, string>; sources: Partial<Record<RecordField, string>> } {
  const values: Record<RecordField, string> = {
    name: '',
    category: '',
    description: '',
    phone: '',
    email: '',
    address: '',
    website: '',
  };
  const sources: Partial<Record<RecordField, string>> = {};

  for (const field of RECORD_FIELDS) {
    const resolved = resolveField(FIELD_RULES[field], page, ctx);
    if (!resolved) continue;
    values[field] = resolved.value;
    sources[field] = resolved.rule;
  }

  return { values, sources };
}
