import http from 'node:http';
import type { FeedConnection, FeedStatus } from '../feed/connection.js';
import { registry } from '../metrics/metrics.js';

export type OpsReply = { code: number; contentType: string; body: string };

const json = (code: number, payload: unknown): OpsReply => ({
  code,
  contentType: 'application/json',
  body: JSON.stringify(payload),
});

/**
 * Health replies for the feed. Liveness stays 200 whatever the feed does;
 * readiness is 200 only while the feed is connected.
 */
export function healthReply(path: string, status: FeedStatus): OpsReply | null {
  const feed = status.state.status;
  switch (path) {
    case '/ops/health/liveness':
      return json(200, { ok: true, feed, reconnects: status.reconnects });
    case '/ops/health/readiness': {
      const ready = feed === 'connected';
      return json(ready ? 200 : 503, {
        status: ready ? 'ready' : 'not_ready',
        checks: { feed },
        lastMessageAt: status.lastMessageAt,
        lastPingAt: status.lastPingAt,
      });
    }
    default:
      return null;
  }
}

export function startOpsServer(port: number, feed: FeedConnection) {
  const server = http.createServer(async (req, res) => {
    const path = (req.url || '/').split('?')[0];
    let reply = healthReply(path, feed.status());
    if (!reply && path === '/ops/metrics') {
      reply = { code: 200, contentType: registry.contentType, body: await registry.metrics() };
    }
    reply ??= json(404, { error: { code: 'NOT_FOUND' } });
    res.writeHead(reply.code, { 'content-type': reply.contentType });
    res.end(reply.body);
  });
  server.listen(port);
  return server;
}
