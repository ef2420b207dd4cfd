// Pipeline module - sources → seen filter → merge → dedupe → summarize
import { deduplicateArticles } from './dedupe';
import { fetchAllFeedArticles } from './feeds';
import { fetchAllScrapedArticles } from './scraper';
import { filterUnseen } from './state';
import type { SourceFetchError } from './errors';
import type { Summarizer } from './summarizer';
import type { Article, FeedSource, KeywordRule, ScrapeTarget, SummarizedArticle } from './types';

export interface PipelineInput {
  feeds: readonly FeedSource[];
  scrape: readonly ScrapeTarget[];
  keywords: readonly KeywordRule[];
  /** Links delivered in earlier runs */
  seen: ReadonlySet<string>;
  summarizer: Summarizer;
  now?: Date;
  maxAgeDays: number;
  fetchTimeoutMs?: number;
  scrapeDelayMs?: number;
  concurrency?: number;
}

export interface PipelineResult {
  articles: SummarizedArticle[];
  failures: SourceFetchError[];
  counts: {
    rss: number;
    scraped: number;
    alreadySeen: number;
    unique: number;
    fallbacks: number;
  };
}

/**
 * Collect candidates from both source kinds and drop duplicates.
 * Only scraped candidates are checked against the seen links.
 */
export async function collectCandidates(
  input: Omit<PipelineInput, 'summarizer'>
): Promise<{ articles: Article[]; failures: SourceFetchError[]; counts: Omit<PipelineResult['counts'], 'fallbacks'> }> {
  console.log('Fetching RSS feeds...');
  const rss = await fetchAllFeedArticles(input.feeds, input.keywords, {
    now: input.now,
    maxAgeDays: input.maxAgeDays,
    fetchTimeoutMs: input.fetchTimeoutMs,
    concurrency: input.concurrency,
  });

  console.log('Scraping websites...');
  const scraped = await fetchAllScrapedArticles(input.scrape, input.keywords, {
    fetchTimeoutMs: input.fetchTimeoutMs,
    delayMs: input.scrapeDelayMs,
    concurrency: input.concurrency,
  });

  const freshScraped = filterUnseen(scraped.articles, input.seen);
  const alreadySeen = scraped.articles.length - freshScraped.length;
  if (alreadySeen > 0) {
    console.log(`  Skipped ${alreadySeen} scraped articles delivered in earlier runs`);
  }

  const articles = deduplicateArticles([...rss.articles, ...freshScraped]);
  console.log(`  Total after deduplication: ${articles.length} articles`);

  return {
    articles,
    failures: [...rss.failures, ...scraped.failures],
    counts: {
      rss: rss.articles.length,
      scraped: scraped.articles.length,
      alreadySeen,
      unique: articles.length,
    },
  };
}

export async function runPipeline(input: PipelineInput): Promise<PipelineResult> {
  const candidates = await collectCandidates(input);

  let articles: SummarizedArticle[] = [];
  let fallbacks = 0;
  if (candidates.articles.length > 0) {
    console.log('Generating summaries...');
    const summarized = await input.summarizer.summarize(candidates.articles);
    articles = summarized.articles;
    fallbacks = summarized.fallbacks;
  }

  return {
    articles,
    failures: candidates.failures,
    counts: { ...candidates.counts, fallbacks },
  };
}
