// Slack module - posts digest headlines and source alerts
import { WebClient } from '@slack/web-api';
import { getConfig } from './config';
import type { SummarizedArticle } from './types';

let _client: WebClient | null = null;

function getClient(): WebClient {
  if (!_client) {
    const config = getConfig();
    _client = new WebClient(config.slackBotToken);
  }
  return _client;
}

/**
 * Escape the three characters Slack treats as control sequences in mrkdwn
 */
export function escapeSlack(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Truncate text to fit Slack's 3000 char block limit
 */
export function truncateForSlack(text: string, maxLen = 2900): string {
  if (text.length <= maxLen) return text;
  // Cut at the last complete line so a link is never split
  const truncated = text.slice(0, maxLen);
  const lastBreak = truncated.lastIndexOf('\n');
  return (lastBreak > 0 ? truncated.slice(0, lastBreak) : truncated) + '\n_(truncated)_';
}

export function formatHeadlines(articles: readonly SummarizedArticle[]): string {
  return articles
    .map((article) => {
      const title = escapeSlack(article.title).replace(/\|/g, '¦');
      const web = article.type === 'scraped' ? ' · web' : '';
      return `• <${article.link}|${title}> _(${escapeSlack(article.source)}${web})_`;
    })
    .join('\n');
}

/**
 * Post the day's headlines as one message
 */
export async function postDigestSummary(
  articles: readonly SummarizedArticle[],
  heading: string
): Promise<string | null> {
  const client = getClient();
  const config = getConfig();
  const text = articles.length > 0 ? formatHeadlines(articles) : '_No matching articles today._';

  try {
    const result = await client.chat.postMessage({
      channel: config.slackChannelId,
      text: `${heading}\n\n${text}`,
      unfurl_links: false,
      blocks: [
        {
          type: 'header',
          text: {
            type: 'plain_text',
            text: heading.slice(0, 150),
            emoji: true,
          },
        },
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text: truncateForSlack(text),
          },
        },
      ],
    });
    return result.ts || null;
  } catch (error) {
    console.error('Failed to post digest to Slack:', error);
    return null;
  }
}

/**
 * Send a simple text message (for status updates)
 */
export async function sendMessage(text: string): Promise<void> {
  const client = getClient();
  const config = getConfig();

  try {
    await client.chat.postMessage({
      channel: config.slackChannelId,
      text,
    });
  } catch (error) {
    console.error('Failed to send Slack message:', error);
  }
}
