/**
 * Unit tests for link discovery, content extraction and target scraping.
 */

import { describe, it, expect } from 'vitest';
import {
  discoverArticleLinks,
  extractArticleText,
  fetchAllScrapedArticles,
  scrapeTarget,
} from '../../src/scraper';
import { keywordRule } from '../../src/keywords';
import { stubFetch } from '../helpers';

const INDEX_URL = 'https://news.example/latest';

describe('discoverArticleLinks', () => {
  it('caps at 30 links, drops short link texts and keeps first-seen order', () => {
    const short = new Set([3, 8, 13, 18, 23]);
    const anchors = Array.from({ length: 40 }, (_, k) => {
      const i = k + 1;
      return short.has(i)
        ? `<a href="/short-${i}">More</a>`
        : `<a href="/story-${i}">Story number ${i} about 5G</a>`;
    }).join('\n');

    const links = discoverArticleLinks(`<html><body>${anchors}</body></html>`, INDEX_URL, 'a');

    expect(links).toHaveLength(30);
    expect(links.some((link) => link.url.includes('short'))).toBe(false);
    expect(links.slice(0, 3)).toEqual([
      { text: 'Story number 1 about 5G', url: 'https://news.example/story-1' },
      { text: 'Story number 2 about 5G', url: 'https://news.example/story-2' },
      { text: 'Story number 4 about 5G', url: 'https://news.example/story-4' },
    ]);
    expect(links[29].url).toBe('https://news.example/story-35');
  });

  it('resolves hrefs against the site root and keeps only same-host links', () => {
    const html = `<html><body>
      <a href="story-a">Relative story link</a>
      <a href="//news.example/story-b">Protocol relative story</a>
      <a href="https://news.example/story-c">Absolute story link</a>
      <a href="https://other.example/story-d">Other site story</a>
      <a href="#comments">Jump to comments</a>
      <a href="javascript:void(0)">Open the menu now</a>
      <a href="">Empty link target</a>
      <a href="mailto:desk@news.example">Email the desk</a>
    </body></html>`;

    const links = discoverArticleLinks(html, INDEX_URL, 'a');

    expect(links.map((link) => link.url)).toEqual([
      'https://news.example/story-a',
      'https://news.example/story-b',
      'https://news.example/story-c',
    ]);
  });

  it('unions comma-separated selectors in selector order without repeats', () => {
    const html = `<html><body>
      <div class="teaser"><a href="/t1">Teaser story one</a></div>
      <h2><a href="/h1">Headline story one</a></h2>
      <h2><a href="/t1">Teaser story one</a></h2>
    </body></html>`;

    const links = discoverArticleLinks(html, INDEX_URL, 'h2 a, .teaser a');

    expect(links.map((link) => link.url)).toEqual([
      'https://news.example/h1',
      'https://news.example/t1',
    ]);
  });

  it('collapses whitespace in link text and skips an icon link before its text link', () => {
    const html = `<html><body>
      <a href="/s1">»</a>
      <a href="/s1">
        Breaking:
          5G   auction
      </a>
    </body></html>`;

    expect(discoverArticleLinks(html, INDEX_URL, 'a')).toEqual([
      { text: 'Breaking: 5G auction', url: 'https://news.example/s1' },
    ]);
  });

  it('ignores an invalid selector and still uses the valid ones', () => {
    const html = '<html><body><a href="/ok">A valid story link</a></body></html>';

    const links = discoverArticleLinks(html, INDEX_URL, 'a[, a');

    expect(links.map((link) => link.url)).toEqual(['https://news.example/ok']);
  });
});

describe('extractArticleText', () => {
  const paragraph = 'Spectrum policy update. '.repeat(12);

  it('returns the first content container with more than 200 characters', () => {
    const html = `<html><body>
      <nav><a href="/">Home</a><a href="/news">News</a></nav>
      <article><h1>Title</h1><p>${paragraph}</p></article>
      <footer><p>Copyright</p></footer>
    </body></html>`;

    expect(extractArticleText(html)).toBe(`Title ${paragraph.trim()}`);
  });

  it('falls back to all paragraphs when no container is long enough', () => {
    const html = `<html><body>
      <article><p>Short intro.</p></article>
      <div><p>First para.</p><p>Second para.</p></div>
    </body></html>`;

    expect(extractArticleText(html)).toBe('Short intro. First para. Second para.');
  });

  it('removes boilerplate before reading paragraphs', () => {
    const html = `<html><body>
      <header><p>Site banner</p></header>
      <nav><p>Menu item</p></nav>
      <p>Body text.</p>
      <aside><p>Related</p></aside>
      <form><p>Subscribe</p></form>
      <footer><p>Copyright</p></footer>
      <script>var tracking = true;</script>
    </body></html>`;

    expect(extractArticleText(html)).toBe('Body text.');
  });

  it('separates adjacent block elements with a space', () => {
    const html = `<html><body><main><h2>Heading</h2><p>${'word '.repeat(50)}</p></main></body></html>`;

    expect(extractArticleText(html).startsWith('Heading word word')).toBe(true);
  });

  it('caps extracted text at 2000 characters', () => {
    const html = `<html><body><main>${'x'.repeat(2500)}</main></body></html>`;

    expect(extractArticleText(html)).toHaveLength(2000);
  });
});

describe('scrapeTarget', () => {
  const target = {
    name: 'Regulator',
    url: 'https://reg.example/news',
    selector: 'a.story',
    group: 'Regulation',
  };
  const keywords = [keywordRule('5G'), keywordRule('Spectrum')];
  const body = 'The regulator published the 5G spectrum results today. '.repeat(5);

  const index = `<html><body>
    <a class="story" href="/n/spectrum">Spectrum auction results announced</a>
    <a class="story" href="/n/weather">Weather outlook for the weekend</a>
    <a class="story" href="/n/broken">5G coverage map update</a>
    <a class="story" href="/n/gone">Annual report published</a>
    <a href="/n/unselected">Unselected 5G story link</a>
  </body></html>`;

  it('keeps matching articles and title-matched articles whose page failed', async () => {
    stubFetch({
      'https://reg.example/news': index,
      'https://reg.example/n/spectrum': `<html><body><article><p>${body}</p></article></body></html>`,
      'https://reg.example/n/weather': `<html><body><article><p>${'Sunny skies ahead. '.repeat(20)}</p></article></body></html>`,
      'https://reg.example/n/broken': { status: 500, body: 'error' },
    });

    const result = await scrapeTarget(target, keywords, { delayMs: 0 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([
      {
        source: 'Regulator',
        group: 'Regulation',
        originalTitle: 'Spectrum auction results announced',
        originalSummary: body.trim(),
        link: 'https://reg.example/n/spectrum',
        matchedKeywords: ['5G', 'Spectrum'],
        type: 'scraped',
      },
      {
        source: 'Regulator',
        group: 'Regulation',
        originalTitle: '5G coverage map update',
        originalSummary: '',
        link: 'https://reg.example/n/broken',
        matchedKeywords: ['5G'],
        type: 'scraped',
      },
    ]);
  });

  it('fails only this target when its index page is unreachable', async () => {
    stubFetch({});

    const result = await scrapeTarget(target, keywords, { delayMs: 0 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.source).toBe('Regulator');
    expect(result.error.message).toBe('Regulator: 404 Not Found');
  });
});

describe('fetchAllScrapedArticles', () => {
  it('isolates a failing target from its siblings', async () => {
    stubFetch({
      'https://ok.example/': '<html><body><a href="/a">Cloud pricing review opens</a></body></html>',
      'https://ok.example/a': '<html><body><p>The cloud review starts.</p></body></html>',
    });

    const batch = await fetchAllScrapedArticles(
      [
        { name: 'Down', url: 'https://down.example/', selector: 'a', group: 'Tech' },
        { name: 'Up', url: 'https://ok.example/', selector: 'a', group: 'Tech' },
      ],
      [keywordRule('Cloud')],
      { delayMs: 0 }
    );

    expect(batch.failures.map((failure) => failure.source)).toEqual(['Down']);
    expect(batch.articles).toHaveLength(1);
    expect(batch.articles[0]).toMatchObject({
      source: 'Up',
      link: 'https://ok.example/a',
      originalSummary: 'The cloud review starts.',
      matchedKeywords: ['Cloud'],
    });
  });
});
