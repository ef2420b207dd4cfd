// Shared OpenAI client with Braintrust tracing
// When BRAINTRUST_API_KEY is set, all LLM calls are auto-traced

import OpenAI from 'openai';
import { wrapOpenAI, initLogger } from 'braintrust';
import type { Config } from './config';
import type { TextGenerator } from './summarizer';

let _client: OpenAI | null = null;
let _clientKey = '';
let _tracingStarted = false;

/**
 * Shared client, rebuilt when the key or base URL changes between runs
 */
export function getOpenAI(config: Pick<Config, 'openaiApiKey' | 'openaiBaseUrl'>): OpenAI {
  const key = `${config.openaiApiKey}\n${config.openaiBaseUrl ?? ''}`;
  if (_client && _clientKey === key) return _client;

  // asyncFlush: false sends logs before a short-lived run exits
  if (process.env.BRAINTRUST_API_KEY && !_tracingStarted) {
    _tracingStarted = true;
    initLogger({
      projectName: process.env.BRAINTRUST_PROJECT || 'news-digest',
      apiKey: process.env.BRAINTRUST_API_KEY,
      asyncFlush: false,
    });
  }

  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
  });

  // Wrap with Braintrust tracing if configured, otherwise use raw client
  _client = process.env.BRAINTRUST_API_KEY ? wrapOpenAI(client) : client;
  _clientKey = key;
  return _client;
}

/**
 * Chat-completions backed generator; each call is bounded by its own timeout
 */
export function createOpenAIGenerator(
  client: OpenAI,
  model: string,
  timeoutMs: number
): TextGenerator {
  return {
    async generate(prompt: string): Promise<string> {
      const completion = await client.chat.completions.create(
        {
          model,
          max_tokens: 4000,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: timeoutMs, maxRetries: 1 }
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Model returned an empty response');
      }
      return content;
    },
  };
}
