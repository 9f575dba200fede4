import path from 'node:path';

import { describe, it, expect } from 'vitest';

import { loadConfig } from '../src/config';

const ENTRY = 'https://www.dir.test/directory/';

describe('loadConfig', () => {
  it('fills defaults around the entry URL', () => {
    const config = loadConfig({ HARVEST_ENTRY_URL: ENTRY });

    expect(config.entryUrl).toBe(ENTRY);
    expect(config.strategy).toBe('auto');
    expect(config.detailPath).toBe('/business/');
    expect(config.categoryPath).toBe('/business-type/');
    expect(config.output).toEqual({
      dir: path.resolve('harvest outputs'),
      basename: 'businesses',
      formats: ['csv', 'json'],
      byCategory: true,
    });
    expect(config.checkpoint.interval).toBe(10);
    expect(config.http.delayMs).toBe(1500);
    expect(config.discovery).toEqual({ maxPages: 50, maxIterations: 100, noChangeThreshold: 3 });
    expect(config.selfDomains).toEqual(['www.dir.test']);
  });

  it('lets CLI arguments override entry URL and strategy', () => {
    const config = loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_STRATEGY: 'sitemap' }, [
      'https://dir.test/listings/',
      'interactive',
    ]);
    expect(config.entryUrl).toBe('https://dir.test/listings/');
    expect(config.strategy).toBe('interactive');
  });

  it('parses lists, flags and numbers', () => {
    const config = loadConfig({
      HARVEST_ENTRY_URL: ENTRY,
      HARVEST_FORMATS: 'json, json',
      HARVEST_BY_CATEGORY: 'no',
      HARVEST_CHECKPOINT_INTERVAL: '25',
      HARVEST_SELF_DOMAINS: 'cdn.dir.test, , other.test',
      HARVEST_TRANSPORT: 'browser',
    });
    expect(config.output.formats).toEqual(['json']);
    expect(config.output.byCategory).toBe(false);
    expect(config.checkpoint.interval).toBe(25);
    expect(config.selfDomains).toEqual(['www.dir.test', 'cdn.dir.test', 'other.test']);
    expect(config.transport).toBe('browser');
  });

  it('requires an entry URL', () => {
    expect(() => loadConfig({})).toThrow(/Missing entry URL/);
  });

  it('requires a sitemap URL for the sitemap strategy', () => {
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_STRATEGY: 'sitemap' })).toThrow(
      'HARVEST_STRATEGY=sitemap requires HARVEST_SITEMAP_URL.'
    );
  });

  it('lists schema issues', () => {
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_STRATEGY: 'crawl-everything' })).toThrow(
      /^Invalid harvest configuration:\n- HARVEST_STRATEGY: /
    );
  });

  it('rejects bad flags and numbers', () => {
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_HEADLESS: 'maybe' })).toThrow(
      '- HARVEST_HEADLESS: Expected a boolean (true/false, yes/no, 1/0)'
    );
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_CHECKPOINT_INTERVAL: '0' })).toThrow(
      '- HARVEST_CHECKPOINT_INTERVAL: Must be at least 1'
    );
  });

  it('rejects numbers with trailing garbage', () => {
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_CHECKPOINT_INTERVAL: '10abc' })).toThrow(
      '- HARVEST_CHECKPOINT_INTERVAL: Expected a whole number'
    );
    expect(() => loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_DELAY_MS: '1.5' })).toThrow(
      '- HARVEST_DELAY_MS: Expected a whole number'
    );
  });

  it('accepts a zero delay', () => {
    expect(loadConfig({ HARVEST_ENTRY_URL: ENTRY, HARVEST_DELAY_MS: '0' }).http.delayMs).toBe(0);
  });

  it('reports every bad value at once', () => {
    expect(() =>
      loadConfig({
        HARVEST_ENTRY_URL: ENTRY,
        HARVEST_CHECKPOINT_INTERVAL: '10abc',
        HARVEST_HEADLESS: 'maybe',
        HARVEST_FORMATS: 'csv,xlsx',
      })
    ).toThrow(
      [
        'Invalid harvest configuration:',
        '- HARVEST_FORMATS.1: Expected csv or json',
        '- HARVEST_CHECKPOINT_INTERVAL: Expected a whole number',
        '- HARVEST_HEADLESS: Expected a boolean (true/false, yes/no, 1/0)',
      ].join('\n')
    );
  });
});
