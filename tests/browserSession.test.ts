import { beforeEach, describe, it, expect, vi } from 'vitest';

import { FetchError } from '../src/errors';
import { createPlaywrightSession } from '../src/tools/browserSession';

const launch = vi.hoisted(() => vi.fn());
vi.mock('playwright', () => ({ chromium: { launch } }));

const opts = { headless: true, userAgent: 'test-agent', timeoutMs: 1000, settleMs: 0 };

function fakePage(overrides: { goto?: () => Promise<unknown>; content?: () => Promise<string> } = {}) {
  return {
    route: vi.fn(async () => {}),
    setDefaultNavigationTimeout: vi.fn(),
    goto: vi.fn(overrides.goto ?? (async () => ({ status: () => 200 }))),
    content: vi.fn(overrides.content ?? (async () => '<html></html>')),
    url: () => 'https://dir.test/business/a/',
    waitForTimeout: vi.fn(async () => {}),
  };
}

function fakeBrowser(newContext: () => Promise<unknown>) {
  return { newContext: vi.fn(newContext), close: vi.fn(async () => {}) };
}

function browserWithPage(page: ReturnType<typeof fakePage>) {
  const context = { newPage: vi.fn(async () => page), close: vi.fn(async () => {}) };
  return fakeBrowser(async () => context);
}

describe('createPlaywrightSession', () => {
  beforeEach(() => {
    launch.mockReset();
  });

  it('closes the browser when the context cannot be created', async () => {
    const browser = fakeBrowser(async () => {
      throw new Error('context refused');
    });
    launch.mockResolvedValue(browser);

    await expect(createPlaywrightSession(opts)).rejects.toThrow('context refused');
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('reports a page that cannot be read as a FetchError', async () => {
    const page = fakePage({
      content: async () => {
        throw new Error('Execution context was destroyed');
      },
    });
    launch.mockResolvedValue(browserWithPage(page));

    const session = await createPlaywrightSession(opts);
    const read = session.fetchPage('https://dir.test/business/a/');

    await expect(read).rejects.toBeInstanceOf(FetchError);
    await expect(read).rejects.toThrow(
      'Could not read https://dir.test/business/a/: Execution context was destroyed'
    );
  });

  it('keeps the navigation error as it is', async () => {
    const page = fakePage({
      goto: async () => {
        throw new Error('net::ERR_CONNECTION_RESET');
      },
    });
    launch.mockResolvedValue(browserWithPage(page));

    const session = await createPlaywrightSession(opts);

    await expect(session.fetchPage('https://dir.test/business/a/')).rejects.toThrow(
      'Navigation failed for https://dir.test/business/a/: net::ERR_CONNECTION_RESET'
    );
  });

  it('returns the rendered page', async () => {
    launch.mockResolvedValue(browserWithPage(fakePage()));

    const session = await createPlaywrightSession(opts);

    expect(await session.fetchPage('https://dir.test/business/a/')).toEqual({
      url: 'https://dir.test/business/a/',
      status: 200,
      body: '<html></html>',
    });
  });
});
