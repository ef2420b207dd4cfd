// Feeds module - fetches RSS / Atom / RDF feeds and keeps recent keyword matches
import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import { matchKeywords } from './keywords';
import { fetchPage, type SourceBatch } from './scraper';
import { SourceFetchError, err, errorMessage, ok, type Result } from './errors';
import { MAX_SUMMARY_CHARS, type Article, type FeedSource, type KeywordRule } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const PRIMARY_DATE_FIELDS = ['pubDate', 'published', 'dc\\:date', 'issued'];
const UPDATED_DATE_FIELDS = ['updated', 'modified', 'atom\\:updated', 'dcterms\\:modified'];

export interface FeedEntry {
  title: string;
  summary: string;
  link: string;
  published?: Date;
}

export interface ParsedFeed {
  title: string;
  entries: FeedEntry[];
}

export interface FeedOptions {
  now?: Date;
  maxAgeDays: number;
  fetchTimeoutMs?: number;
  concurrency?: number;
}

function htmlToText(html: string): string {
  if (!html.includes('<')) return html.replace(/\s+/g, ' ').trim();
  return cheerio.load(html).text().replace(/\s+/g, ' ').trim();
}

export function parseFeedDate(value: string | undefined): Date | undefined {
  if (!value?.trim()) return undefined;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Parse an RSS 2.0, RDF (RSS 1.0) or Atom document
 * Throws if the document is none of them
 */
export function parseFeed(xml: string): ParsedFeed {
  const $ = cheerio.load(xml, { xml: true });

  const isAtom = $('feed').length > 0;
  const isRss = $('rss, rdf\\:RDF, RDF').length > 0;
  if (!isAtom && !isRss) {
    throw new Error('Not an RSS or Atom feed');
  }

  const title = isAtom
    ? $('feed > title').first().text().trim()
    : $('channel > title').first().text().trim();

  const entries: FeedEntry[] = [];
  $(isAtom ? 'entry' : 'item').each((_, element) => {
    const entry = $(element);
    const field = (name: string) => entry.children(name).first().text().trim();

    let link = isAtom
      ? entry.children('link[rel="alternate"]').attr('href') ??
        entry.children('link').first().attr('href') ??
        ''
      : field('link') || (entry.children('atom\\:link').attr('href') ?? '');
    if (!link) {
      const guid = field('guid') || field('id');
      if (isUrl(guid)) link = guid;
    }

    const rawSummary =
      field('description') || field('summary') || field('content\\:encoded') || field('content');

    const published =
      PRIMARY_DATE_FIELDS.map((name) => parseFeedDate(field(name))).find(Boolean) ??
      UPDATED_DATE_FIELDS.map((name) => parseFeedDate(field(name))).find(Boolean);

    entries.push({
      title: htmlToText(field('title')),
      summary: htmlToText(rawSummary),
      link: link.trim(),
      published,
    });
  });

  return { title, entries };
}

/**
 * Keep entries newer than the cutoff (or undated) that match a keyword
 */
export function selectFeedArticles(
  feed: ParsedFeed,
  source: FeedSource,
  keywords: readonly KeywordRule[],
  options: Pick<FeedOptions, 'now' | 'maxAgeDays'>
): Article[] {
  const now = options.now ?? new Date();
  const cutoff = now.getTime() - options.maxAgeDays * DAY_MS;
  const sourceName = feed.title || source.url;

  const articles: Article[] = [];
  for (const entry of feed.entries) {
    if (entry.published && entry.published.getTime() < cutoff) continue;
    if (!entry.link) continue;

    const text = `${entry.title} ${entry.summary}`.toLowerCase();
    const matchedKeywords = matchKeywords(text, source.group, keywords);
    if (matchedKeywords.length === 0) continue;

    articles.push({
      source: sourceName,
      group: source.group,
      originalTitle: entry.title,
      originalSummary: entry.summary.slice(0, MAX_SUMMARY_CHARS),
      link: entry.link,
      published: entry.published,
      matchedKeywords,
      type: 'rss',
    });
  }
  return articles;
}

export async function fetchFeedArticles(
  source: FeedSource,
  keywords: readonly KeywordRule[],
  options: FeedOptions
): Promise<Result<Article[], SourceFetchError>> {
  try {
    console.log(`  Fetching feed: ${source.url}`);
    const xml = await fetchPage(source.url, options.fetchTimeoutMs);
    const feed = parseFeed(xml);
    return ok(selectFeedArticles(feed, source, keywords, options));
  } catch (error) {
    const message = errorMessage(error);
    console.warn(`  RSS failed for ${source.url}: ${message}`);
    return err(new SourceFetchError(source.url, message, { cause: error }));
  }
}

/**
 * Fetch every feed with bounded concurrency; results keep configuration order
 */
export async function fetchAllFeedArticles(
  sources: readonly FeedSource[],
  keywords: readonly KeywordRule[],
  options: FeedOptions
): Promise<SourceBatch> {
  const limit = pLimit(options.concurrency ?? 4);
  const results = await Promise.all(
    sources.map((source) => limit(() => fetchFeedArticles(source, keywords, options)))
  );

  const batch: SourceBatch = { articles: [], failures: [] };
  for (const result of results) {
    if (result.ok) {
      batch.articles.push(...result.value);
    } else {
      batch.failures.push(result.error);
    }
  }
  console.log(`  Found ${batch.articles.length} matching RSS articles`);
  return batch;
}
