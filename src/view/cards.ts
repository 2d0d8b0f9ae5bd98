import type { TickerRecord, TickerSymbol } from '../domain/types.js';
import type { SessionState } from '../state/session-state.js';

export type TickerHealth = 'good' | 'normal' | 'bad';

export type SymbolCard = {
  index: number;
  symbol: TickerSymbol;
  rows: readonly TickerRecord[];
  // 'offline' while the feed is not connected
  health: TickerHealth | 'offline';
};

/** Compares the two newest trades; fewer than two trades reads as 'normal'. */
export function tickerHealth(history: readonly TickerRecord[] | undefined): TickerHealth {
  if (!history || history.length < 2) return 'normal';
  const [last, previous] = history;
  if (last.price > previous.price) return 'good';
  if (last.price < previous.price) return 'bad';
  return 'normal';
}

// One card per tracked entry, duplicates included, in tracked order.
export function symbolCards(session: SessionState, connected: boolean): SymbolCard[] {
  return session.tracked.entries().map((symbol, index) => {
    const rows = session.history.get(symbol) ?? [];
    return {
      index,
      symbol,
      rows,
      health: connected ? tickerHealth(rows) : 'offline',
    };
  });
}
