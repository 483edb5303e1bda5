/**
 * Market data collaborator consumed by the engine and the live loop
 */

import { Bar } from '../models/MarketData';

export interface PriceFeed {
  /**
   * Latest traded price, or null when the provider has no quote
   */
  currentPrice(symbol: string): Promise<number | null>;

  /**
   * Chronologically ordered bars for a lookback period (e.g. "1mo") at an interval (e.g. "1h"),
   * or null when the provider returns nothing
   */
  historicalBars(symbol: string, period: string, interval: string): Promise<Bar[] | null>;
}

/**
 * Price feed backed by bars held in memory; the current price is the last close
 * unless a quote has been set explicitly
 */
export class InMemoryPriceFeed implements PriceFeed {
  private bars: Map<string, Bar[]> = new Map();
  private quotes: Map<string, number> = new Map();

  setBars(symbol: string, bars: Bar[]): void {
    const ordered = [...bars].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.bars.set(symbol, ordered);
  }

  appendBar(symbol: string, bar: Bar): void {
    const existing = this.bars.get(symbol) ?? [];
    this.setBars(symbol, [...existing, bar]);
  }

  setPrice(symbol: string, price: number): void {
    this.quotes.set(symbol, price);
  }

  async currentPrice(symbol: string): Promise<number | null> {
    const quote = this.quotes.get(symbol);
    if (quote !== undefined) {
      return quote;
    }
    const series = this.bars.get(symbol);
    return series && series.length > 0 ? series[series.length - 1].close : null;
  }

  async historicalBars(symbol: string, _period: string, _interval: string): Promise<Bar[] | null> {
    const series = this.bars.get(symbol);
    return series ? series.map(bar => ({ ...bar })) : null;
  }
}
