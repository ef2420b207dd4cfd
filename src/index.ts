// News Digest - Main orchestration
// Collects matching articles from feeds and websites, summarizes them, emails the digest

import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, isSlackEnabled, resolveMaxAgeDays, type Config } from './config';
import { loadSourceConfig } from './sources';
import { FileSeenStore, commitDelivered, loadSeenLinks, type SeenStore } from './state';
import { fetchTargetLinks } from './scraper';
import { runPipeline, type PipelineResult } from './pipeline';
import { createSummarizer } from './summarizer';
import { createOpenAIGenerator, getOpenAI } from './openai';
import { digestSubject, formatDigestDate, renderDigestHtml } from './digest';
import { createMailTransport, sendDigestEmail } from './email';
import { postDigestSummary, sendMessage } from './slack';
import { SeenStoreError, errorMessage } from './errors';
import type { ScrapeTarget } from './types';

export interface RunOptions {
  /** Build the digest but send nothing and record nothing */
  dryRun?: boolean;
  /** Mark every currently listed scraped link as seen; no model calls, no email */
  seedMode?: boolean;
  now?: Date;
}

export interface RunSummary {
  articles: number;
  failedSources: number;
  emailed: boolean;
  recorded: number;
}

async function seedTargets(
  targets: readonly ScrapeTarget[],
  store: SeenStore,
  config: Config
): Promise<RunSummary> {
  const links: string[] = [];
  let failedSources = 0;

  for (const target of targets) {
    console.log(`\nSeeding ${target.name}...`);
    const result = await fetchTargetLinks(target, config.fetchTimeoutMs);
    if (!result.ok) {
      failedSources++;
      continue;
    }
    links.push(...result.value.map((link) => link.url));
  }

  const recorded = await commitDelivered(store, links);
  console.log(`  Marked ${links.length} links as seen (${recorded.length} stored)`);
  return { articles: 0, failedSources, emailed: false, recorded: links.length };
}

async function notifySlack(config: Config, result: PipelineResult, heading: string): Promise<void> {
  if (!isSlackEnabled(config)) return;

  await postDigestSummary(result.articles, heading);
  if (result.failures.length > 0) {
    const lines = result.failures.map((failure) => `• ${failure.message}`).join('\n');
    await sendMessage(`⚠️ *Source failures* (${result.failures.length})\n${lines}`);
  }
  if (result.articles.length > 0 && result.counts.fallbacks === result.articles.length) {
    await sendMessage('🚨 *Summarization unavailable*: every article fell back to its original title.');
  }
}

/**
 * Run one digest cycle
 */
export async function runDigest(options: RunOptions = {}): Promise<RunSummary> {
  const now = options.now ?? new Date();
  const dateLabel = formatDigestDate(now);

  if (options.seedMode) {
    console.log('=== News Digest SEED MODE ===');
    console.log('Marking all listed article links as seen (no LLM calls, no email)');
  } else {
    console.log(`=== News Digest Starting${options.dryRun ? ' (dry run)' : ''} ===`);
  }
  console.log(`Time: ${now.toISOString()}`);

  const config = loadConfig({ requireModel: !options.seedMode });

  console.log('Loading sources from spreadsheet...');
  const sources = await loadSourceConfig(config.sheetUrls);
  console.log(
    `  ${sources.feeds.length} RSS feeds | ${sources.scrape.length} scrape sites | ` +
      `${sources.keywords.length} keywords | ${sources.recipients.length} recipients`
  );

  const store = new FileSeenStore(config.stateFilePath);
  if (options.seedMode) {
    const summary = await seedTargets(sources.scrape, store, config);
    console.log('\n=== Seed Complete ===');
    return summary;
  }

  const seen = await loadSeenLinks(store);
  console.log(`Loaded state: ${seen.size} links seen`);

  const summarizer = createSummarizer(
    createOpenAIGenerator(getOpenAI(config), config.openaiModel, config.llmTimeoutMs)
  );

  const result = await runPipeline({
    feeds: sources.feeds,
    scrape: sources.scrape,
    keywords: sources.keywords,
    seen,
    summarizer,
    now,
    maxAgeDays: resolveMaxAgeDays(config, now),
    fetchTimeoutMs: config.fetchTimeoutMs,
    scrapeDelayMs: config.scrapeDelayMs,
    concurrency: config.sourceConcurrency,
  });

  if (result.articles.length > 0 && result.counts.fallbacks === result.articles.length) {
    console.error('Summarization failed for every article; sending original titles');
  }

  const subject = digestSubject(config.digestTitle, dateLabel);
  const html = renderDigestHtml(result.articles, {
    title: config.digestTitle,
    dateLabel,
    groupOrder: config.groupOrder,
    keywords: sources.keywords.map((rule) => rule.keyword),
  });

  const summary: RunSummary = {
    articles: result.articles.length,
    failedSources: result.failures.length,
    emailed: false,
    recorded: 0,
  };

  if (options.dryRun) {
    console.log(`\nDry run - would send "${subject}" (${html.length} bytes of HTML)`);
    for (const article of result.articles) {
      console.log(`  • [${article.group}] ${article.title} - ${article.link}`);
    }
    return summary;
  }

  console.log('Sending email...');
  summary.emailed = await sendDigestEmail(
    { recipients: sources.recipients, subject, html },
    config.emailFrom,
    createMailTransport(config)
  );

  await notifySlack(config, result, subject);

  // Only what actually went out is remembered
  if (summary.emailed && result.articles.length > 0) {
    try {
      const stored = await commitDelivered(
        store,
        result.articles.map((article) => article.link)
      );
      summary.recorded = result.articles.length;
      console.log(`Saved state: ${stored.length} links seen`);
    } catch (error) {
      if (!(error instanceof SeenStoreError)) throw error;
      // The email already went out; tomorrow's digest may repeat these links
      console.error(`Failed to record delivered links: ${error.message}`);
      if (isSlackEnabled(config)) {
        await sendMessage(`⚠️ *Seen links not saved*: ${error.message}`);
      }
    }
  }

  console.log('\n=== News Digest Complete ===');
  console.log(`Delivered: ${summary.articles} articles`);
  console.log(`Failed sources: ${summary.failedSources}`);
  return summary;
}

// CLI mode - run directly if not imported
const isMainModule =
  process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);
if (isMainModule) {
  const seedMode = process.argv.includes('--seed');
  const dryRun = process.argv.includes('--dry-run');
  runDigest({ seedMode, dryRun }).catch((error) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
}
