import { describe, it, expect, vi } from 'vitest';

import { createLogger, formatOutcome, summarize } from '../src/ui';

import { record } from './fakes';

describe('summarize', () => {
  it('reports field coverage and category counts', () => {
    const summary = summarize([
      record("Joe's Cafe", 'joes', {
        category: 'Coffee Shops',
        phone: '(513) 555-1234',
        email: 'hello@joescafe.test',
        address: '12 Main St',
      }),
      record('Bean There', 'bean', { category: 'Coffee Shops', website: 'https://bean.test/' }),
      record('Maple Hardware', 'maple', { category: 'Hardware', phone: '555-0199' }),
      record('Quiet Place', 'quiet'),
    ]);

    expect(summary).toEqual({
      total: 4,
      withPhone: 2,
      withEmail: 1,
      withAddress: 1,
      withWebsite: 1,
      withAllContact: 1,
      categories: [
        { category: 'Coffee Shops', count: 2 },
        { category: 'Hardware', count: 1 },
      ],
    });
  });
});

describe('formatOutcome', () => {
  it('flags which contact fields were found', () => {
    expect(formatOutcome(record('Maple Hardware', 'maple', { phone: '555-0199' }))).toBe(
      'Maple Hardware (phone: yes, email: no, address: no)'
    );
  });
});

describe('createLogger', () => {
  it('silences info and warnings when quiet but never errors', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger('harvest', true);
    logger.info('hidden');
    logger.error('shown');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[harvest] shown');
    log.mockRestore();
    error.mockRestore();
  });
});
