/**
 * Shared fixtures for unit tests.
 */

import { vi } from 'vitest';
import type { Article } from '../src/types';

export interface FakePage {
  status?: number;
  body: string;
}

/**
 * Replace global fetch with a lookup table keyed by URL.
 * Unknown URLs answer 404; a page with status >= 400 answers that status.
 */
export function stubFetch(pages: Record<string, string | FakePage>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = input instanceof Request ? input.url : String(input);
    const page = pages[url];
    if (page === undefined) {
      return new Response('missing', { status: 404, statusText: 'Not Found' });
    }
    const { status = 200, body } = typeof page === 'string' ? { body: page } : page;
    return new Response(body, { status, statusText: status >= 400 ? 'Server Error' : 'OK' });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    source: 'Example Wire',
    group: 'Telecom',
    originalTitle: 'Operators expand 5G coverage',
    originalSummary: 'Operators announced new 5G sites across the country.',
    link: 'https://wire.example/5g-coverage',
    matchedKeywords: ['5G'],
    type: 'rss',
    ...overrides,
  };
}
