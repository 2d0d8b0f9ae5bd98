export type TickerSymbol = string;
export type Price = number;
export type Volume = number;

/** One reported trade. Frozen once built; timestamp is epoch millis as sent by the feed. */
export type TickerRecord = Readonly<{
  symbol: TickerSymbol;
  price: Price;
  volume: Volume;
  timestamp: number;
}>;

export function tickerRecord(symbol: TickerSymbol, price: Price, volume: Volume, timestamp: number): TickerRecord {
  return Object.freeze({ symbol, price, volume, timestamp });
}

// outbound frames
export type FeedRequest =
  | { type: 'subscribe'; symbol: TickerSymbol }
  | { type: 'unsubscribe'; symbol: TickerSymbol };

// inbound trade payload as it appears on the wire
export type WireTrade = { s: string; p: number; v: number; t: number };

export type FeedMessage =
  | { type: 'error'; msg: string }
  | { type: 'ping' }
  | { type: 'trade'; data: WireTrade[] };

export type PersistedSession = {
  apiKey: string;
  tracked: TickerSymbol[];
  history: Record<TickerSymbol, TickerRecord[]>;
};
