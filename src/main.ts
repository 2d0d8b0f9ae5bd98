#!/usr/bin/env node
import readline from 'node:readline/promises';
import type { Server } from 'node:http';
import { collectDefaultMetrics } from 'prom-client';
import { createTickerApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { registry } from './metrics/metrics.js';
import { createTerminalPrompter } from './prompt/terminal.js';
import { startOpsServer } from './server/ops.js';
import { createFileStore } from './storage/file-store.js';
import { openBrowserStore } from './storage/key-value-store.js';
import { symbolCards } from './view/cards.js';

async function main() {
  const cfg = loadConfig(process.env);
  const logger = createLogger({ level: cfg.logLevel, pretty: cfg.logPretty });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const app = createTickerApp({
    endpoint: cfg.feed.url,
    tokenParam: cfg.feed.tokenParam,
    storageKey: cfg.storageKey,
    store: openBrowserStore() ?? (cfg.storageDir ? createFileStore(cfg.storageDir) : null),
    prompter: createTerminalPrompter(rl),
    log: logger,
  });
  const { controller, feed, session } = app;

  if (cfg.feed.apiKey) await controller.updateApiKey(cfg.feed.apiKey);
  for (const symbol of cfg.symbols) {
    if (session.tracked.includes(symbol)) continue;
    controller.updatePendingSymbol(symbol);
    await controller.trackSymbol();
  }

  // log the newest trade per card whenever history changes
  const lastSeen = new Map<string, number>();
  feed.onChange((status) => {
    for (const card of symbolCards(session, status.state.status === 'connected')) {
      const newest = card.rows[0];
      if (!newest || lastSeen.get(card.symbol) === newest.timestamp) continue;
      lastSeen.set(card.symbol, newest.timestamp);
      logger.info(
        { symbol: card.symbol, price: newest.price, volume: newest.volume, t: newest.timestamp, trend: card.health },
        'trade',
      );
    }
  });

  let opsServer: Server | undefined;
  if (cfg.metricsPort > 0) {
    collectDefaultMetrics({ register: registry });
    opsServer = startOpsServer(cfg.metricsPort, feed);
  }

  logger.info(
    {
      env: cfg.env,
      endpoint: cfg.feed.url,
      tracked: session.tracked.entries(),
      persistent: app.repo.persistent,
      storageDir: cfg.storageDir,
      metricsPort: cfg.metricsPort || undefined,
    },
    'ticker client starting',
  );

  if (session.apiKey) {
    await controller.connect();
  } else {
    logger.warn('no API key configured (FEED_API_KEY); staying disconnected');
  }

  let stopping = false;
  const shutdown = async (sig: string) => {
    if (stopping) return;
    stopping = true;
    logger.warn({ sig }, 'shutting down');
    controller.disconnect();
    await app.loop.idle();
    rl.close();
    if (opsServer) {
      const server = opsServer;
      await new Promise<void>((res) => server.close(() => res()));
    }
    process.exit(0);
  };
  // readline swallows Ctrl+C while a question is open
  rl.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((e) => {
  if (e instanceof ConfigError) {
    console.error('Invalid environment:', e.issues);
  } else {
    console.error('fatal:', e);
  }
  process.exit(1);
});
