import type { TickerRecord, TickerSymbol } from '../domain/types.js';
import { tickerRecord } from '../domain/types.js';

export const MAX_HISTORY = 25;

/**
 * Recent trades per symbol, newest first.
 * Order is arrival order; timestamps are never used to re-sort.
 */
export class HistoryCache {
  private readonly bySymbol = new Map<TickerSymbol, TickerRecord[]>();

  get(symbol: TickerSymbol): readonly TickerRecord[] | undefined {
    return this.bySymbol.get(symbol);
  }

  insert(record: TickerRecord): void {
    const queue = this.bySymbol.get(record.symbol);
    if (!queue) {
      this.bySymbol.set(record.symbol, [record]);
      return;
    }
    queue.unshift(record);
    if (queue.length > MAX_HISTORY) queue.length = MAX_HISTORY;
  }

  remove(symbol: TickerSymbol): void {
    this.bySymbol.delete(symbol);
  }

  symbols(): TickerSymbol[] {
    return [...this.bySymbol.keys()];
  }

  toJSON(): Record<TickerSymbol, TickerRecord[]> {
    const out: Record<TickerSymbol, TickerRecord[]> = {};
    for (const [symbol, queue] of this.bySymbol) out[symbol] = queue.slice();
    return out;
  }

  static fromJSON(snapshot: Record<TickerSymbol, readonly TickerRecord[]>): HistoryCache {
    const cache = new HistoryCache();
    for (const [symbol, records] of Object.entries(snapshot)) {
      // a record filed under another symbol's key is dropped
      const own = records.filter(r => r.symbol === symbol);
      if (!own.length) continue;
      // keep the newest MAX_HISTORY, still newest first
      cache.bySymbol.set(
        symbol,
        own
          .slice(0, MAX_HISTORY)
          .map(r => tickerRecord(r.symbol, r.price, r.volume, r.timestamp)),
      );
    }
    return cache;
  }
}
