// Summarizer module - batched title + summary generation with per-article fallbacks
import { z } from 'zod';
import {
  SummarizationBatchError,
  SummarizationItemError,
  err,
  errorMessage,
  ok,
  type Result,
} from './errors';
import type { Article, SummarizedArticle } from './types';

export const BATCH_SIZE = 10;
export const MIN_SUMMARY_LENGTH = 20;
export const SUMMARY_UNAVAILABLE = 'summary unavailable';

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface SummarizerOptions {
  batchSize?: number;
  minSummaryLength?: number;
  /** Who the digest is written for; shapes the editor prompt */
  audience?: string;
}

export interface SummarizeResult {
  articles: SummarizedArticle[];
  /** Articles that kept their original title and the sentinel summary */
  fallbacks: number;
}

interface GeneratedSummary {
  title: string;
  summary: string;
}

const summaryItemSchema = z.object({
  title: z.string().nullish(),
  summary: z.string().nullish(),
});

const DEFAULT_AUDIENCE = 'a professional industry newsletter read by subject-matter experts';

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`Chunk size must be positive, got ${size}`);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Remove a surrounding ``` or ```json fence, if any
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) return text;
  return text
    .replace(/^```[\w-]*[^\S\n]*\n?/, '')
    .replace(/\n?```\s*$/, '')
    .trim();
}

/**
 * Parse a model response into exactly `expectedLength` summaries.
 * Throws on invalid JSON, a non-array, a wrong length or a malformed element.
 */
export function parseBatchResponse(raw: string, expectedLength: number): GeneratedSummary[] {
  const parsed: unknown = JSON.parse(stripCodeFence(raw));
  const items = z.array(summaryItemSchema).parse(parsed);
  if (items.length !== expectedLength) {
    throw new Error(`Expected ${expectedLength} summaries, got ${items.length}`);
  }
  return items.map((item) => ({
    title: item.title?.trim() ?? '',
    summary: item.summary?.trim() ?? '',
  }));
}

function describeArticles(articles: readonly Article[]): string {
  return articles
    .map(
      (article, j) => `
ARTICLE ${j + 1}:
Source: ${article.source}
Original Title: ${article.originalTitle}
Content: ${article.originalSummary}
---`
    )
    .join('');
}

export function buildBatchPrompt(articles: readonly Article[], audience = DEFAULT_AUDIENCE): string {
  return `You are an editor for ${audience}.

For each article below, produce:
1. A clear, professional TITLE (max 12 words)
2. A SUMMARY of about 100 words that captures the key facts, their implications, and why they matter to the reader.

Return your response as a JSON array with exactly ${articles.length} object${articles.length === 1 ? '' : 's'}, one per article and in the same order, with keys "title" and "summary".
Return ONLY the JSON array, no other text.
${describeArticles(articles)}`;
}

function fallbackSummary(article: Article): SummarizedArticle {
  return {
    ...article,
    title: article.originalTitle || article.link,
    summary: SUMMARY_UNAVAILABLE,
  };
}

export class Summarizer {
  private readonly batchSize: number;
  private readonly minSummaryLength: number;
  private readonly audience: string;

  constructor(
    private readonly generator: TextGenerator,
    options: SummarizerOptions = {}
  ) {
    this.batchSize = options.batchSize ?? BATCH_SIZE;
    this.minSummaryLength = options.minSummaryLength ?? MIN_SUMMARY_LENGTH;
    this.audience = options.audience ?? DEFAULT_AUDIENCE;
  }

  /**
   * Every input article comes back, in order, with a non-empty title and summary
   */
  async summarize(articles: readonly Article[]): Promise<SummarizeResult> {
    const result: SummarizeResult = { articles: [], fallbacks: 0 };

    for (const [batchIndex, batch] of chunk(articles, this.batchSize).entries()) {
      console.log(`  Summarizing batch ${batchIndex + 1} (${batch.length} articles)...`);
      const generated = await this.generateBatch(batch, batchIndex);

      for (const [j, article] of batch.entries()) {
        const summarized = generated.ok
          ? await this.completeArticle(article, generated.value[j])
          : await this.regenerateArticle(article);
        if (summarized.summary === SUMMARY_UNAVAILABLE) result.fallbacks++;
        result.articles.push(summarized);
      }
    }

    return result;
  }

  private async generateBatch(
    batch: readonly Article[],
    batchIndex: number
  ): Promise<Result<GeneratedSummary[], SummarizationBatchError>> {
    try {
      const raw = await this.generator.generate(buildBatchPrompt(batch, this.audience));
      return ok(parseBatchResponse(raw, batch.length));
    } catch (error) {
      const failure = new SummarizationBatchError(batchIndex, errorMessage(error), { cause: error });
      console.warn(`  Summarization failed for ${failure.message}; retrying articles one by one`);
      return err(failure);
    }
  }

  private async completeArticle(
    article: Article,
    generated: GeneratedSummary | undefined
  ): Promise<SummarizedArticle> {
    if (!generated || generated.summary.length < this.minSummaryLength) {
      return this.regenerateArticle(article);
    }
    return {
      ...article,
      title: generated.title || article.originalTitle || article.link,
      summary: generated.summary,
    };
  }

  private async requestSingle(
    article: Article
  ): Promise<Result<GeneratedSummary, SummarizationItemError>> {
    try {
      const raw = await this.generator.generate(buildBatchPrompt([article], this.audience));
      const [generated] = parseBatchResponse(raw, 1);
      if (!generated?.summary) {
        return err(new SummarizationItemError(article.link, 'Model returned an empty summary'));
      }
      return ok(generated);
    } catch (error) {
      return err(new SummarizationItemError(article.link, errorMessage(error), { cause: error }));
    }
  }

  private async regenerateArticle(article: Article): Promise<SummarizedArticle> {
    const generated = await this.requestSingle(article);
    if (!generated.ok) {
      console.warn(`    Could not summarize ${generated.error.message}`);
      return fallbackSummary(article);
    }
    return {
      ...article,
      title: generated.value.title || article.originalTitle || article.link,
      summary: generated.value.summary,
    };
  }
}

export function createSummarizer(generator: TextGenerator, options?: SummarizerOptions): Summarizer {
  return new Summarizer(generator, options);
}
