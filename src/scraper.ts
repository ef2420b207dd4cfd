// Scraper module - fetches index pages, discovers article links, extracts body text
import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import { matchKeywords } from './keywords';
import { ExtractionError, SourceFetchError, err, errorMessage, ok, type Result } from './errors';
import { MAX_SUMMARY_CHARS, type Article, type KeywordRule, type ScrapeTarget } from './types';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const FETCH_TIMEOUT = 20000; // 20 seconds

export const MAX_LINKS_PER_TARGET = 30;
export const MIN_LINK_TEXT_LENGTH = 6;
export const MAX_ARTICLE_TEXT = 2000;
const MIN_CONTAINER_TEXT = 200;

const BOILERPLATE_SELECTOR = 'nav, header, footer, script, style, aside, form';

const CONTENT_SELECTORS = [
  'article',
  'main',
  '.content',
  '.article-body',
  '.entry-content',
  '.post-content',
  '#content',
];

export interface DiscoveredLink {
  text: string;
  url: string;
}

export interface ScrapeOptions {
  fetchTimeoutMs?: number;
  /** Pause between successive article fetches of one target */
  delayMs?: number;
  concurrency?: number;
}

export interface SourceBatch {
  articles: Article[];
  failures: SourceFetchError[];
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch a page with browser-like headers
 * Throws an error with details if fetch fails
 */
export async function fetchPage(url: string, timeoutMs = FETCH_TIMEOUT): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error('Request timed out');
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isSkippableHref(href: string): boolean {
  return !href || href.startsWith('#') || href.toLowerCase().startsWith('javascript');
}

/**
 * Extract candidate article links from an index page
 *
 * Selectors are tried independently and their matches unioned in order.
 * Only same-host links with more than five characters of text survive,
 * capped to the first 30.
 */
export function discoverArticleLinks(
  html: string,
  indexUrl: string,
  selector: string
): DiscoveredLink[] {
  const $ = cheerio.load(html);
  const index = new URL(indexUrl);
  const selectors = selector
    .split(',')
    .map((sel) => sel.trim())
    .filter(Boolean);

  const candidates: DiscoveredLink[] = [];
  for (const sel of selectors.length > 0 ? selectors : ['a']) {
    let matches;
    try {
      matches = $(sel);
    } catch (error) {
      console.warn(`  Ignoring invalid selector "${sel}": ${errorMessage(error)}`);
      continue;
    }

    matches.each((_, element) => {
      const href = ($(element).attr('href') ?? '').trim();
      if (isSkippableHref(href)) return;

      let resolved: URL;
      try {
        resolved = new URL(href, index.origin);
      } catch {
        return;
      }
      if (resolved.host !== index.host) return;

      candidates.push({ text: collapseWhitespace($(element).text()), url: resolved.href });
    });
  }

  const seen = new Set<string>();
  const unique: DiscoveredLink[] = [];
  for (const link of candidates) {
    if (link.text.length < MIN_LINK_TEXT_LENGTH || seen.has(link.url)) continue;
    seen.add(link.url);
    unique.push(link);
  }

  return unique.slice(0, MAX_LINKS_PER_TARGET);
}

/**
 * Extract readable body text from an article page
 */
export function extractArticleText(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE_SELECTOR).remove();

  // Pad every element so adjacent blocks don't run together once text is joined
  $('body *').each((_, element) => {
    $(element).before(' ').after(' ');
  });

  for (const sel of CONTENT_SELECTORS) {
    const container = $(sel).first();
    if (container.length === 0) continue;
    const text = collapseWhitespace(container.text());
    if (text.length > MIN_CONTAINER_TEXT) {
      return text.slice(0, MAX_ARTICLE_TEXT);
    }
  }

  const paragraphs = $('p')
    .map((_, p) => collapseWhitespace($(p).text()))
    .get()
    .filter(Boolean);
  return paragraphs.join(' ').slice(0, MAX_ARTICLE_TEXT);
}

export async function fetchArticleText(
  url: string,
  timeoutMs = FETCH_TIMEOUT
): Promise<Result<string, ExtractionError>> {
  try {
    const html = await fetchPage(url, timeoutMs);
    return ok(extractArticleText(html));
  } catch (error) {
    return err(new ExtractionError(url, errorMessage(error), { cause: error }));
  }
}

/**
 * Fetch a target's index page and return its article links
 */
export async function fetchTargetLinks(
  target: ScrapeTarget,
  timeoutMs = FETCH_TIMEOUT
): Promise<Result<DiscoveredLink[], SourceFetchError>> {
  try {
    console.log(`  Fetching index: ${target.url}`);
    const html = await fetchPage(target.url, timeoutMs);
    const links = discoverArticleLinks(html, target.url, target.selector);
    console.log(`  [${target.name}] Found ${links.length} links`);
    return ok(links);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`  Failed to get links from ${target.url}: ${message}`);
    return err(new SourceFetchError(target.name, message, { cause: error }));
  }
}

/**
 * Scrape one target: discover links, fetch each article, keep keyword matches
 */
export async function scrapeTarget(
  target: ScrapeTarget,
  keywords: readonly KeywordRule[],
  options: ScrapeOptions = {}
): Promise<Result<Article[], SourceFetchError>> {
  const timeoutMs = options.fetchTimeoutMs ?? FETCH_TIMEOUT;
  const delayMs = options.delayMs ?? 500;

  const links = await fetchTargetLinks(target, timeoutMs);
  if (!links.ok) return links;

  const articles: Article[] = [];
  for (const [i, link] of links.value.entries()) {
    if (i > 0 && delayMs > 0) {
      await sleep(delayMs);
    }

    const quickMatch = matchKeywords(link.text, target.group, keywords);
    const fetched = await fetchArticleText(link.url, timeoutMs);
    let text = '';
    if (fetched.ok) {
      text = fetched.value;
    } else {
      console.warn(`    Could not extract ${fetched.error.message}`);
    }

    if (!text && quickMatch.length === 0) continue;

    const matchedKeywords = matchKeywords(`${link.text} ${text}`, target.group, keywords);
    if (matchedKeywords.length === 0) continue;

    articles.push({
      source: target.name,
      group: target.group,
      originalTitle: link.text || link.url,
      originalSummary: text.slice(0, MAX_SUMMARY_CHARS),
      link: link.url,
      matchedKeywords,
      type: 'scraped',
    });
  }

  console.log(`  [${target.name}] ${articles.length} matching articles`);
  return ok(articles);
}

/**
 * Scrape every target with bounded concurrency; results keep configuration order
 */
export async function fetchAllScrapedArticles(
  targets: readonly ScrapeTarget[],
  keywords: readonly KeywordRule[],
  options: ScrapeOptions = {}
): Promise<SourceBatch> {
  const limit = pLimit(options.concurrency ?? 4);
  const results = await Promise.all(
    targets.map((target) => limit(() => scrapeTarget(target, keywords, options)))
  );

  const batch: SourceBatch = { articles: [], failures: [] };
  for (const result of results) {
    if (result.ok) {
      batch.articles.push(...result.value);
    } else {
      batch.failures.push(result.error);
    }
  }
  console.log(`  Scraping complete: ${batch.articles.length} matching articles found`);
  return batch;
}
