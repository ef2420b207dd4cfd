// Dedupe module - collapses duplicates within one run
import type { Article } from './types';

const TITLE_KEY_LENGTH = 60;

export function titleKey(title: string): string {
  return title.toLowerCase().trim().slice(0, TITLE_KEY_LENGTH);
}

/**
 * Drop articles whose link or normalized title was already seen.
 * First occurrence wins, so input order decides which duplicate survives.
 */
export function deduplicateArticles<T extends Article>(articles: readonly T[]): T[] {
  const seenLinks = new Set<string>();
  const seenTitles = new Set<string>();
  const unique: T[] = [];

  for (const article of articles) {
    const key = titleKey(article.originalTitle);
    if (seenLinks.has(article.link) || seenTitles.has(key)) continue;

    seenLinks.add(article.link);
    seenTitles.add(key);
    unique.push(article);
  }

  return unique;
}
