import type { PersistedSession, TickerRecord, TickerSymbol } from '../domain/types.js';
import { HistoryCache } from './history-cache.js';
import { TrackedSymbolSet, type UntrackResult } from './tracked-symbols.js';

/**
 * The persisted aggregate: API key, tracked symbols and their recent trades.
 * A symbol with no tracked entry left keeps no history.
 */
export class SessionState {
  apiKey: string;
  readonly tracked: TrackedSymbolSet;
  readonly history: HistoryCache;

  constructor(apiKey: string, tracked: TrackedSymbolSet, history: HistoryCache) {
    this.apiKey = apiKey;
    this.tracked = tracked;
    this.history = history;
  }

  static empty(): SessionState {
    return new SessionState('', new TrackedSymbolSet(), new HistoryCache());
  }

  static fromSnapshot(snapshot: PersistedSession): SessionState {
    return new SessionState(
      snapshot.apiKey,
      new TrackedSymbolSet(snapshot.tracked),
      HistoryCache.fromJSON(snapshot.history),
    );
  }

  toSnapshot(): PersistedSession {
    return {
      apiKey: this.apiKey,
      tracked: [...this.tracked.entries()],
      history: this.history.toJSON(),
    };
  }

  addSymbol(symbol: TickerSymbol): void {
    this.tracked.add(symbol);
  }

  untrackAt(index: number): UntrackResult {
    const result = this.tracked.removeAt(index);
    if (result.wasLastOccurrence) this.history.remove(result.removedSymbol);
    return result;
  }

  /** Pops the most recently tracked entry, purging its history if it was the last one. */
  removeLastAdded(): TickerSymbol | undefined {
    const symbol = this.tracked.removeLastAdded();
    if (symbol !== undefined && !this.tracked.includes(symbol)) this.history.remove(symbol);
    return symbol;
  }

  addHistory(record: TickerRecord): void {
    this.history.insert(record);
  }
}
