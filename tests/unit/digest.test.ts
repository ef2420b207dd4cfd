/**
 * Unit tests for digest rendering.
 */

import { describe, it, expect } from 'vitest';
import {
  digestSubject,
  escapeHtml,
  formatDigestDate,
  groupArticles,
  renderDigestHtml,
} from '../../src/digest';
import { formatPublished, type SummarizedArticle } from '../../src/types';
import { makeArticle } from '../helpers';

function summarized(overrides: Partial<SummarizedArticle> = {}): SummarizedArticle {
  return {
    ...makeArticle(),
    title: 'Operators expand coverage',
    summary: 'Operators added sites in rural areas.',
    ...overrides,
  };
}

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`5G & "Spectrum" <b>'now'</b>`)).toBe(
      '5G &amp; &quot;Spectrum&quot; &lt;b&gt;&#39;now&#39;&lt;/b&gt;'
    );
  });
});

describe('formatting helpers', () => {
  it('formats published dates as YYYY-MM-DD or unknown', () => {
    expect(formatPublished(new Date('2026-10-18T09:00:00Z'))).toBe('2026-10-18');
    expect(formatPublished(undefined)).toBe('unknown');
  });

  it('formats the digest date and subject', () => {
    expect(formatDigestDate(new Date(2026, 9, 19, 12))).toBe('Monday 19 October 2026');
    expect(digestSubject('News Digest', 'Monday 19 October 2026')).toBe(
      'News Digest – Monday 19 October 2026'
    );
  });
});

describe('groupArticles', () => {
  it('puts configured groups first, then the rest alphabetically', () => {
    const articles = [
      summarized({ group: 'Markets', link: 'https://a.example/1' }),
      summarized({ group: 'Regulation', link: 'https://a.example/2' }),
      summarized({ group: 'Cloud', link: 'https://a.example/3' }),
      summarized({ group: 'Regulation', link: 'https://a.example/4' }),
    ];

    const groups = groupArticles(articles, ['Regulation']);

    expect(groups.map(([group, items]) => [group, items.map((item) => item.link)])).toEqual([
      ['Regulation', ['https://a.example/2', 'https://a.example/4']],
      ['Cloud', ['https://a.example/3']],
      ['Markets', ['https://a.example/1']],
    ]);
  });
});

describe('renderDigestHtml', () => {
  it('renders escaped cards with badges, dates, tags and counts', () => {
    const html = renderDigestHtml(
      [
        summarized({
          title: 'Spectrum & 5G <update>',
          published: new Date('2026-10-19T07:00:00Z'),
          matchedKeywords: ['5G', 'Spectrum'],
        }),
        summarized({
          type: 'scraped',
          source: 'Regulator',
          group: 'Regulation',
          link: 'https://reg.example/n/1',
          title: 'Regulator decision',
        }),
      ],
      {
        title: 'Telecom Digest',
        dateLabel: 'Monday 19 October 2026',
        groupOrder: ['Regulation'],
        keywords: ['5G', 'Spectrum'],
      }
    );

    expect(html).toContain('Spectrum &amp; 5G &lt;update&gt;');
    expect(html).toContain('2026-10-19');
    expect(html).toContain('&nbsp;·&nbsp; unknown');
    expect(html.match(/>WEB</g)).toHaveLength(1);
    expect(html).toContain('Monday 19 October 2026 &nbsp;·&nbsp; 2 articles &nbsp;·&nbsp; 1 RSS · 1 Web');
    expect(html).toContain('Keywords monitored: 5G · Spectrum');
    expect(html.indexOf('>Regulation</h2>')).toBeLessThan(html.indexOf('>Telecom</h2>'));
  });

  it('renders a notice when there are no articles', () => {
    const html = renderDigestHtml([], { title: 'Telecom Digest', dateLabel: 'Tuesday 20 October 2026' });

    expect(html).toContain('No relevant articles were found today matching your keywords.');
    expect(html).toContain('0 articles');
  });
});
