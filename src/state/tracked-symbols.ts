import type { TickerSymbol } from '../domain/types.js';

export type UntrackResult = {
  removedSymbol: TickerSymbol;
  /** true when no entry equal to `removedSymbol` is left */
  wasLastOccurrence: boolean;
};

// Duplicates are allowed; removal is by position only.
export class TrackedSymbolSet {
  private readonly order: TickerSymbol[];

  constructor(initial: readonly TickerSymbol[] = []) {
    this.order = initial.slice();
  }

  get size(): number {
    return this.order.length;
  }

  entries(): readonly TickerSymbol[] {
    return this.order.slice();
  }

  includes(symbol: TickerSymbol): boolean {
    return this.order.includes(symbol);
  }

  add(symbol: TickerSymbol): void {
    this.order.push(symbol);
  }

  lastAdded(): TickerSymbol | undefined {
    return this.order[this.order.length - 1];
  }

  removeLastAdded(): TickerSymbol | undefined {
    return this.order.pop();
  }

  removeAt(index: number): UntrackResult {
    if (!Number.isInteger(index) || index < 0 || index >= this.order.length) {
      throw new RangeError(`tracked index ${index} out of range [0, ${this.order.length})`);
    }
    const [removedSymbol] = this.order.splice(index, 1);
    return { removedSymbol, wasLastOccurrence: !this.order.includes(removedSymbol) };
  }
}
