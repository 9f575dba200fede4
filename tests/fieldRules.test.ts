import { describe, it, expect } from 'vitest';

import { resolveFields, type RuleContext } from '../src/agents/extractor/fieldRules';
import { extractRecord } from '../src/agents/extractor/listingExtractor';
import { buildPageView } from '../src/agents/extractor/pageView';
import { ValidationError } from '../src/errors';

import { cfEncode } from './fakes';

const ctx: RuleContext = { categoryPath: '/business-type/', selfDomains: ['dir.test'] };
const view = (body: string, head = '') =>
  buildPageView(`<html><head>${head}</head><body>${body}</body></html>`, 'https://dir.test/business/x/');

const ldJson = (data: unknown) => `<script type="application/ld+json">${JSON.stringify(data)}</script>`;

describe('field rules', () => {
  it('prefers structured data and scoped category links', () => {
    const page = view(
      `<nav><a href="/business-type/nav-only/">Nav Category</a></nav>
       <h1 class="entry-title">Joe's Cafe Heading</h1>
       <div class="entry-content"><p>Short.</p><p>Family-run cafe serving breakfast all day.</p></div>
       <a href="/business-type/coffee-shops/">Coffee Shops</a>
       <a href="/business-type/breakfast/">Breakfast</a>
       <a href="/business-type/coffee-shops/">Coffee Shops</a>
       <a href="mailto:hello@joescafe.test">Email us</a>`,
      `<meta name="description" content="Meta blurb">` +
        ldJson({
          '@context': 'https://schema.org',
          '@graph': [
            { '@type': 'WebPage', name: 'Page' },
            {
              '@type': 'LocalBusiness',
              name: "Joe's Cafe",
              telephone: '513.555.1234',
              url: 'https://joescafe.test/',
              address: {
                '@type': 'PostalAddress',
                streetAddress: '12 Main St',
                addressLocality: 'Springfield',
                addressRegion: 'OH',
                postalCode: '45501',
              },
            },
          ],
        })
    );

    const { values, sources } = resolveFields(page, ctx);
    expect(values).toEqual({
      name: "Joe's Cafe",
      category: 'Coffee Shops, Breakfast',
      description: 'Family-run cafe serving breakfast all day.',
      phone: '(513) 555-1234',
      email: 'hello@joescafe.test',
      address: '12 Main St, Springfield, OH 45501',
      website: 'https://joescafe.test/',
    });
    expect(sources.name).toBe('ld-json.name');
    expect(sources.category).toBe('category-links');
  });

  it('falls back to markup and text patterns', () => {
    const page = view(
      `<h1>Maple Hardware</h1>
       <article><p>Tools, paint and garden supplies for the whole town.</p></article>
       <a rel="tag" href="/tag/hardware/">Hardware</a>
       <p>Call (937) 555-0199 today</p>
       <a href="/cdn-cgi/l/email-protection#${cfEncode('shop@maple.test')}">[email&#160;protected]</a>
       <h3>45 Oak Avenue<br>Dayton, OH 45402</h3>
       <a href="https://www.facebook.com/maple">Facebook</a>
       <a href="https://maple.test/">Website</a>`
    );

    const { values, sources } = resolveFields(page, ctx);
    expect(values).toEqual({
      name: 'Maple Hardware',
      category: 'Hardware',
      description: 'Tools, paint and garden supplies for the whole town.',
      phone: '(937) 555-0199',
      email: 'shop@maple.test',
      address: '45 Oak Avenue, Dayton, OH 45402',
      website: 'https://maple.test/',
    });
    expect(sources).toMatchObject({
      category: 'tag-links',
      phone: 'text.ten-digit',
      email: 'cloudflare-protected',
      address: 'h3-street',
      website: 'external-link',
    });
  });

  it('strips navigation text dragged into an address', () => {
    const page = view('<h2>Corner Books</h2><h3>77 Elm Street<br>Columbus, OH 43004<br>Post navigation</h3>');
    expect(resolveFields(page, ctx).values.address).toBe('77 Elm Street, Columbus, OH 43004');
  });

  it('normalizes a bare ten-digit number and keeps a seven-digit one raw', () => {
    expect(resolveFields(view('<h1>Ten Digits</h1><p>Call 5135551234 now</p>'), ctx).values.phone).toBe(
      '(513) 555-1234'
    );
    expect(resolveFields(view('<h1>Seven Digits</h1><p>Call 555-1234</p>'), ctx).values.phone).toBe('555-1234');
  });

  it('ignores a broken ld+json block', () => {
    const page = view('<h1>Fallback Name</h1>', '<script type="application/ld+json">{not json</script>');
    expect(page.business).toBeNull();
    expect(resolveFields(page, ctx).values.name).toBe('Fallback Name');
  });
});

describe('extractRecord', () => {
  it('requires a name', () => {
    const page = view('<p>No heading here at all</p>');
    expect(() => extractRecord(page, 'https://dir.test/business/x/', ctx)).toThrow(ValidationError);
  });

  it('rejects a one-character name', () => {
    const page = view('<h1>X</h1>');
    expect(() => extractRecord(page, 'https://dir.test/business/x/', ctx)).toThrow(ValidationError);
  });

  it('fills absent fields with empty strings', () => {
    const record = extractRecord(view('<h1>Lonely Name</h1>'), 'https://dir.test/business/x/', ctx);
    expect(record).toEqual({
      name: 'Lonely Name',
      category: '',
      description: '',
      address: '',
      phone: '',
      email: '',
      website: '',
      sourceUrl: 'https://dir.test/business/x/',
    });
  });
});
