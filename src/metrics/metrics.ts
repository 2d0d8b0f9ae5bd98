import { Counter, Gauge, Registry } from 'prom-client';

export const registry = new Registry();

export const framesReceived = new Counter({
  name: 'ticker_client_frames_received_total',
  help: 'Inbound feed frames decoded, by type',
  labelNames: ['type'] as const,
  registers: [registry],
});

export const framesMalformed = new Counter({
  name: 'ticker_client_frames_malformed_total',
  help: 'Inbound feed frames that failed to decode',
  registers: [registry],
});

export const requestsSent = new Counter({
  name: 'ticker_client_requests_sent_total',
  help: 'Outbound subscribe/unsubscribe requests',
  labelNames: ['type'] as const,
  registers: [registry],
});

export const connectAttempts = new Counter({
  name: 'ticker_client_connect_attempts_total',
  help: 'Connect attempts by outcome (opened, failed)',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const retryDecisions = new Counter({
  name: 'ticker_client_retry_decisions_total',
  help: 'Answers to the reconnect prompt',
  labelNames: ['answer'] as const,
  registers: [registry],
});

export const feedConnected = new Gauge({
  name: 'ticker_client_feed_connected',
  help: '1 while the feed transport is open',
  registers: [registry],
});

export const trackedEntries = new Gauge({
  name: 'ticker_client_tracked_entries',
  help: 'Tracked symbol entries, duplicates included',
  registers: [registry],
});
