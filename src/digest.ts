// Digest module - renders the HTML email body
import { formatPublished, type SummarizedArticle } from './types';

export interface DigestOptions {
  title: string;
  /** Human-readable date shown in the header */
  dateLabel: string;
  /** Groups listed first, in this order; the rest follow alphabetically */
  groupOrder?: readonly string[];
  /** Keywords listed in the footer */
  keywords?: readonly string[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * "Monday 19 October 2026"
 */
export function formatDigestDate(date: Date): string {
  return new Intl.DateTimeFormat('en-GB', {
    weekday: 'long',
    day: '2-digit',
    month: 'long',
    year: 'numeric',
  })
    .format(date)
    .replace(',', '');
}

export function digestSubject(title: string, dateLabel: string): string {
  return `${title} – ${dateLabel}`;
}

/**
 * Group articles by source group, keeping article order within each group
 */
export function groupArticles(
  articles: readonly SummarizedArticle[],
  groupOrder: readonly string[] = []
): [string, SummarizedArticle[]][] {
  const groups = new Map<string, SummarizedArticle[]>();
  for (const article of articles) {
    const list = groups.get(article.group) ?? [];
    list.push(article);
    groups.set(article.group, list);
  }

  const rank = (group: string) => {
    const index = groupOrder.indexOf(group);
    return index === -1 ? groupOrder.length : index;
  };
  return [...groups.entries()].sort(
    ([a], [b]) => rank(a) - rank(b) || a.localeCompare(b)
  );
}

function renderArticle(article: SummarizedArticle): string {
  const link = escapeHtml(article.link);
  const tags = article.matchedKeywords
    .map(
      (keyword) =>
        `<span style="background:#e8f4fd;color:#1a73e8;padding:2px 8px;border-radius:12px;font-size:11px;margin-right:4px;">${escapeHtml(keyword)}</span>`
    )
    .join(' ');
  const webBadge =
    article.type === 'scraped'
      ? '<span style="background:#fff3e0;color:#e65100;padding:2px 6px;border-radius:4px;font-size:10px;margin-left:6px;">WEB</span>'
      : '';

  return `
    <div style="border-left:3px solid #1a73e8;padding:12px 16px;margin-bottom:24px;background:#fafafa;border-radius:0 6px 6px 0;">
      <p style="margin:0 0 4px 0;font-size:11px;color:#888;text-transform:uppercase;letter-spacing:0.5px;">
        ${escapeHtml(article.source)}${webBadge} &nbsp;·&nbsp; ${formatPublished(article.published)}
      </p>
      <h3 style="margin:4px 0 8px 0;font-size:16px;color:#1a1a1a;">
        <a href="${link}" style="color:#1a1a1a;text-decoration:none;">${escapeHtml(article.title)}</a>
      </h3>
      <p style="margin:0 0 10px 0;font-size:14px;color:#444;line-height:1.6;">${escapeHtml(article.summary)}</p>
      <div style="margin-bottom:6px;">${tags}</div>
      <a href="${link}" style="font-size:12px;color:#1a73e8;">Read full article →</a>
    </div>`;
}

export function renderDigestHtml(
  articles: readonly SummarizedArticle[],
  options: DigestOptions
): string {
  let body: string;
  if (articles.length === 0) {
    body = `<p style="color:#666;">No relevant articles were found today matching your keywords.</p>`;
  } else {
    body = groupArticles(articles, options.groupOrder)
      .map(
        ([group, items]) => `
  <h2 style="font-size:14px;color:#0d47a1;text-transform:uppercase;letter-spacing:1px;border-bottom:1px solid #e0e0e0;padding-bottom:4px;">${escapeHtml(group)}</h2>
  ${items.map(renderArticle).join('')}`
      )
      .join('');
  }

  const rssCount = articles.filter((article) => article.type === 'rss').length;
  const webCount = articles.filter((article) => article.type === 'scraped').length;
  const countLabel = `${articles.length} article${articles.length === 1 ? '' : 's'}`;
  const keywordLine = options.keywords?.length
    ? `<br>Keywords monitored: ${options.keywords.map(escapeHtml).join(' · ')}`
    : '';

  return `<!DOCTYPE html>
<html>
<head><meta charset="UTF-8"></head>
<body style="font-family:Arial,sans-serif;max-width:700px;margin:0 auto;padding:20px;color:#1a1a1a;">

  <div style="background:linear-gradient(135deg,#1a73e8,#0d47a1);padding:24px 28px;border-radius:8px;margin-bottom:28px;">
    <h1 style="margin:0;color:white;font-size:22px;font-weight:700;">${escapeHtml(options.title)}</h1>
    <p style="margin:6px 0 0 0;color:#b3d4ff;font-size:13px;">${escapeHtml(options.dateLabel)} &nbsp;·&nbsp; ${countLabel} &nbsp;·&nbsp; ${rssCount} RSS · ${webCount} Web</p>
  </div>

  ${body}

  <div style="border-top:1px solid #eee;margin-top:32px;padding-top:16px;font-size:11px;color:#999;">
    <p>This digest is generated automatically.${keywordLine}</p>
  </div>

</body>
</html>`;
}
