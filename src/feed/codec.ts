import { FeedMessageSchema } from '../domain/schemas.js';
import type { FeedMessage, FeedRequest, TickerRecord, WireTrade } from '../domain/types.js';
import { tickerRecord } from '../domain/types.js';

export type DecodeResult =
  | { ok: true; message: FeedMessage }
  | { ok: false; error: string };

export function encodeRequest(req: FeedRequest): string {
  return JSON.stringify({ type: req.type, symbol: req.symbol });
}

export function decodeMessage(raw: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const parsed = FeedMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `${where}${issue?.message ?? 'invalid frame'}` };
  }
  return { ok: true, message: parsed.data };
}

export function toTickerRecord(t: WireTrade): TickerRecord {
  return tickerRecord(t.s, t.p, t.v, t.t);
}

export function isInvalidSymbolError(msg: string): boolean {
  return /invalid symbol/i.test(msg);
}
