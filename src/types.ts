// Types module - records shared by the adapters, pipeline and renderer

export type ArticleType = 'rss' | 'scraped';

export interface Article {
  source: string;
  group: string;
  originalTitle: string;
  /** Capped at 1000 characters when the article is ingested */
  originalSummary: string;
  link: string;
  /** Absent when neither the source nor the entry carried a usable date */
  published?: Date;
  matchedKeywords: string[];
  type: ArticleType;
}

export interface SummarizedArticle extends Article {
  title: string;
  summary: string;
}

export interface KeywordRule {
  keyword: string;
  /** Empty set means the keyword applies in every group */
  restrictedGroups: ReadonlySet<string>;
}

export interface FeedSource {
  url: string;
  group: string;
}

export interface ScrapeTarget {
  name: string;
  url: string;
  /** Comma-separated CSS selectors, each tried independently */
  selector: string;
  group: string;
}

export interface SourceConfig {
  feeds: FeedSource[];
  keywords: KeywordRule[];
  scrape: ScrapeTarget[];
  recipients: string[];
}

export const MAX_SUMMARY_CHARS = 1000;
export const UNKNOWN_DATE = 'unknown';

export function formatPublished(published: Date | undefined): string {
  return published ? published.toISOString().slice(0, 10) : UNKNOWN_DATE;
}
