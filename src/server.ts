// News Digest - HTTP Server
// Provides /cron and /health endpoints for scheduled deployments

import { createServer, type Server } from 'http';
import { timingSafeEqual } from 'crypto';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { getConfig } from './config';
import { runDigest, type RunOptions, type RunSummary } from './index';

export interface ServerOptions {
  webhookSecret: string;
  run?: (options: RunOptions) => Promise<RunSummary>;
}

function isAuthorized(header: string | undefined, secret: string): boolean {
  if (!secret) return true; // Skip verification if no secret configured
  const expected = Buffer.from(`Bearer ${secret}`);
  const actual = Buffer.from(header ?? '');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export function createDigestServer(options: ServerOptions): Server {
  const run = options.run ?? runDigest;
  let running = false;

  return createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    const send = (status: number, body: string, contentType = 'text/plain') => {
      res.writeHead(status, { 'Content-Type': contentType });
      res.end(body);
    };

    // Health check
    if (url.pathname === '/' || url.pathname === '/health') {
      send(200, 'OK');
      return;
    }

    // Cron endpoint - triggers a digest run
    if (url.pathname === '/cron') {
      if (!isAuthorized(req.headers.authorization, options.webhookSecret)) {
        send(401, 'Unauthorized');
        return;
      }
      if (running) {
        send(409, JSON.stringify({ status: 'already-running' }), 'application/json');
        return;
      }

      const seedMode = url.searchParams.get('seed') === 'true';
      const dryRun = url.searchParams.get('dryRun') === 'true';
      running = true;

      // Don't await - let it run in background
      run({ seedMode, dryRun })
        .then(({ articles, failedSources }) => {
          console.log(`Cron complete: ${articles} articles, ${failedSources} failed sources`);
        })
        .catch((error) => {
          console.error('Cron error:', error);
        })
        .finally(() => {
          running = false;
        });

      send(200, JSON.stringify({ status: 'started', seedMode, dryRun }), 'application/json');
      return;
    }

    send(404, 'Not Found');
  });
}

const isMainModule =
  process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);
if (isMainModule) {
  // Initialize config on startup
  const config = getConfig();
  const server = createDigestServer({ webhookSecret: config.webhookSecret });
  server.listen(config.port, () => {
    console.log(`🚀 News Digest server running on port ${config.port}`);
    console.log(`   GET  /cron  - Trigger a digest run (?seed=true, ?dryRun=true)`);
    console.log(`   GET  /      - Health check`);
  });
}
