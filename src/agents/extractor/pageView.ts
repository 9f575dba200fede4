import { z } from 'zod';

import { parseHtml, visibleText } from '../../tools/html';

const BUSINESS_TYPES = new Set([
  'localbusiness',
  'professionalservice',
  'foodestablishment',
  'restaurant',
  'store',
  'healthandbeautybusiness',
  'homeandconstructionbusiness',
  'entertainmentbusiness',
  'childcare',
]);

const optionalText = z
  .unknown()
  .transform((v) => (typeof v === 'string' && v.trim() ? v.trim() : undefined));

const PostalAddressSchema = z.object({
  streetAddress: optionalText,
  addressLocality: optionalText,
  addressRegion: optionalText,
  postalCode: optionalText,
});

/** Lenient view of a schema.org LocalBusiness block; junk fields become undefined. */
export const LocalBusinessSchema = z.object({
  name: optionalText,
  description: optionalText,
  telephone: optionalText,
  email: optionalText,
  url: optionalText,
  address: z.unknown().transform((v) => {
    if (typeof v === 'string') return v.trim() ? v.trim() : undefined;
    const parsed = PostalAddressSchema.safeParse(v);
    return parsed.success ? parsed.data : undefined;
  }),
});

export type LocalBusiness = z.infer<typeof LocalBusinessSchema>;

export type PageView = {
  url: string;
  document: Document;
  text: string;
  business: LocalBusiness | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function collectLdObjects(input: unknown): Array<Record<string, unknown>> {
  const out: Array<Record<string, unknown>> = [];
  const stack: unknown[] = [input];

  while (stack.length) {
    const item = stack.pop();
    if (!item) continue;
    if (Array.isArray(item)) {
      stack.push(...[...item].reverse());
      continue;
    }
    if (isRecord(item)) {
      out.push(item);
      const graph = item['@graph'];
      if (graph) stack.push(graph);
    }
  }

  return out;
}

function isBusinessType(type: unknown): boolean {
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => typeof t === 'string' && BUSINESS_TYPES.has(t.toLowerCase()));
}

/** First LocalBusiness-like object across the page's ld+json blocks. */
export function findLocalBusiness(document: Document): LocalBusiness | null {
  const scripts = Array.from(document.querySelectorAll('script[type="application/ld+json"]'));
  for (const script of scripts) {
    const raw = script.textContent?.trim();
    if (!raw) continue;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      // a broken block does not hide the others
      continue;
    }

    const match = collectLdObjects(data).find((item) => isBusinessType(item['@type']));
    if (match) return LocalBusinessSchema.parse(match);
  }
  return null;
}

export function buildPageView(html: string, url: string): PageView {
  const document = parseHtml(html, url);
  return {
    url,
    document,
    text: visibleText(document),
    business: findLocalBusiness(document),
  };
}
