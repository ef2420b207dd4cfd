// Keywords module - group-restricted substring matching
import type { KeywordRule } from './types';

/**
 * Return the keywords found in `text` that apply to `group`.
 *
 * Matching is plain case-insensitive substring containment, so "AI" also
 * matches inside "domain". Result keeps configuration order without repeats.
 */
export function matchKeywords(
  text: string,
  group: string,
  keywords: readonly KeywordRule[]
): string[] {
  const haystack = text.toLowerCase();
  const matched: string[] = [];

  for (const rule of keywords) {
    const needle = rule.keyword.trim().toLowerCase();
    if (!needle || matched.includes(rule.keyword)) continue;
    if (rule.restrictedGroups.size > 0 && !rule.restrictedGroups.has(group)) continue;
    if (haystack.includes(needle)) {
      matched.push(rule.keyword);
    }
  }

  return matched;
}

/**
 * Parse a restricted-groups cell ("Regulation; Europe") into a set
 */
export function parseRestrictedGroups(cell: string | undefined): Set<string> {
  if (!cell) return new Set();
  return new Set(
    cell
      .split(/[,;|]/)
      .map((group) => group.trim())
      .filter(Boolean)
  );
}

export function keywordRule(keyword: string, groups: Iterable<string> = []): KeywordRule {
  return { keyword, restrictedGroups: new Set(groups) };
}
