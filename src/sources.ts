// Sources module - reads feeds, keywords, scrape targets and recipients
// from spreadsheet tabs published as CSV

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { parseRestrictedGroups } from './keywords';
import { fetchPage } from './scraper';
import { ConfigError, errorMessage } from './errors';
import type { Config } from './config';
import type { FeedSource, KeywordRule, ScrapeTarget, SourceConfig } from './types';

const SHEET_TIMEOUT = 15000;
export const DEFAULT_GROUP = 'General';

type Row = Record<string, string>;

const rowsSchema = z.array(z.record(z.string()));

/**
 * Parse a CSV export into rows keyed by lower-cased header, keeping only active ones
 */
export function parseActiveRows(csv: string): Row[] {
  const records: unknown = parse(csv, {
    bom: true,
    columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  return rowsSchema.parse(records).filter((row) => (row.active ?? '').toLowerCase() === 'yes');
}

export function parseFeedRows(rows: readonly Row[]): FeedSource[] {
  return rows
    .filter((row) => row.url)
    .map((row) => ({ url: row.url, group: row.group || DEFAULT_GROUP }));
}

export function parseKeywordRows(rows: readonly Row[]): KeywordRule[] {
  return rows
    .filter((row) => row.keyword)
    .map((row) => ({
      keyword: row.keyword,
      restrictedGroups: parseRestrictedGroups(row.groups),
    }));
}

export function parseScrapeRows(rows: readonly Row[]): ScrapeTarget[] {
  return rows
    .filter((row) => row.url)
    .map((row) => ({
      name: row.name || row.url,
      url: row.url,
      selector: row.selector || 'a',
      group: row.group || DEFAULT_GROUP,
    }));
}

export function parseRecipientRows(rows: readonly Row[]): string[] {
  return rows.map((row) => row.email).filter(Boolean);
}

async function fetchTab(
  name: string,
  url: string,
  fetchText: (url: string) => Promise<string>
): Promise<Row[]> {
  try {
    return parseActiveRows(await fetchText(url));
  } catch (error) {
    throw new ConfigError(`Could not load ${name} sheet: ${errorMessage(error)}`, { cause: error });
  }
}

export async function loadSourceConfig(
  sheetUrls: Config['sheetUrls'],
  fetchText: (url: string) => Promise<string> = (url) => fetchPage(url, SHEET_TIMEOUT)
): Promise<SourceConfig> {
  const [feeds, keywords, scrape, recipients] = await Promise.all([
    fetchTab('feeds', sheetUrls.feeds, fetchText),
    fetchTab('keywords', sheetUrls.keywords, fetchText),
    fetchTab('scrape', sheetUrls.scrape, fetchText),
    fetchTab('recipients', sheetUrls.recipients, fetchText),
  ]);

  return {
    feeds: parseFeedRows(feeds),
    keywords: parseKeywordRows(keywords),
    scrape: parseScrapeRows(scrape),
    recipients: parseRecipientRows(recipients),
  };
}
