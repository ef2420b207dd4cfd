// Config module - loads environment variables
// Run through tsx with `--env-file=.env` (or export them) to load a local .env

import { ConfigError } from './errors';

export interface Config {
  // Language model (OpenAI-compatible chat completions)
  openaiApiKey: string;
  openaiBaseUrl?: string;
  openaiModel: string;

  // Spreadsheet tabs published as CSV
  sheetUrls: {
    feeds: string;
    keywords: string;
    scrape: string;
    recipients: string;
  };

  // Email delivery
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPass: string;
  emailFrom: string;

  // Digest presentation
  digestTitle: string;
  groupOrder: readonly string[];

  // Optional Slack notifications
  slackBotToken: string;
  slackChannelId: string;

  // Server
  webhookSecret: string;
  port: number;

  stateFilePath: string;

  // Undefined means "3 days on Mondays, 1 otherwise"
  maxAgeDays?: number;
  fetchTimeoutMs: number;
  scrapeDelayMs: number;
  llmTimeoutMs: number;
  sourceConcurrency: number;
}

export interface LoadConfigOptions {
  /** Seed runs never call the model, so the API key may be absent */
  requireModel?: boolean;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function numberEnv(name: string, defaultValue: number, min = 0): number {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid ${name}: ${raw}. Must be an integer >= ${min}`);
  }
  return value;
}

function listEnv(name: string): string[] {
  return optionalEnv(name, '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const requireModel = options.requireModel ?? true;
  const smtpUser = optionalEnv('SMTP_USER', '').trim();
  const maxAgeDays = process.env.MAX_AGE_DAYS ? numberEnv('MAX_AGE_DAYS', 1, 1) : undefined;

  _config = {
    openaiApiKey: requireModel ? requireEnv('OPENAI_API_KEY') : optionalEnv('OPENAI_API_KEY', ''),
    openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
    openaiModel: optionalEnv('OPENAI_MODEL', 'gpt-4o-mini'),
    sheetUrls: {
      feeds: requireEnv('SHEET_URL_FEEDS'),
      keywords: requireEnv('SHEET_URL_KEYWORDS'),
      scrape: requireEnv('SHEET_URL_SCRAPE'),
      recipients: requireEnv('SHEET_URL_RECIPIENTS'),
    },
    smtpHost: optionalEnv('SMTP_HOST', 'smtp.gmail.com'),
    smtpPort: numberEnv('SMTP_PORT', 465, 1),
    smtpUser,
    // App passwords are often pasted with spaces between groups
    smtpPass: optionalEnv('SMTP_PASS', '').replace(/\s+/g, ''),
    emailFrom: optionalEnv('EMAIL_FROM', `News Digest <${smtpUser}>`),
    digestTitle: optionalEnv('DIGEST_TITLE', 'News Digest'),
    groupOrder: Object.freeze(listEnv('GROUP_ORDER')),
    slackBotToken: optionalEnv('SLACK_BOT_TOKEN', ''),
    slackChannelId: optionalEnv('SLACK_CHANNEL_ID', ''),
    webhookSecret: optionalEnv('WEBHOOK_SECRET', ''),
    port: numberEnv('PORT', 3000, 1),
    stateFilePath: optionalEnv('STATE_FILE_PATH', './seen_links.txt'),
    maxAgeDays,
    fetchTimeoutMs: numberEnv('FETCH_TIMEOUT_MS', 20000, 1),
    scrapeDelayMs: numberEnv('SCRAPE_DELAY_MS', 500),
    llmTimeoutMs: numberEnv('LLM_TIMEOUT_MS', 60000, 1),
    sourceConcurrency: numberEnv('SOURCE_CONCURRENCY', 4, 1),
  };
  return _config;
}

/**
 * Lookback window in days: explicit setting, else 3 on Mondays to cover the weekend
 */
export function resolveMaxAgeDays(config: Pick<Config, 'maxAgeDays'>, now: Date): number {
  if (config.maxAgeDays !== undefined) return config.maxAgeDays;
  return now.getDay() === 1 ? 3 : 1;
}

export function isSlackEnabled(config: Config): boolean {
  return Boolean(config.slackBotToken && config.slackChannelId);
}

// Singleton config instance
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
