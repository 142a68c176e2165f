/**
 * Quote sources
 *
 * The engine only needs two capabilities from market data: the quotes of a
 * timestep and, for tick runs, the ordered tick timestamps of a day.
 * Sources are read-only once built so parallel runs can share one.
 */

import type { Quote } from '@stocksim/shared';

/**
 * Timestep key: a trading date for bars, a millisecond timestamp for ticks
 */
export type QuoteTimestep = string | number;

export interface QuoteSource {
  /**
   * Quotes for a timestep, restricted to `universe` when given.
   * Returns an empty array (never throws) when nothing exists.
   */
  getQuotes(asOf: QuoteTimestep, universe?: readonly string[]): Quote[];

  /**
   * Ascending, de-duplicated tick timestamps of a trading date
   */
  getTickTimestamps(date: string, universe?: readonly string[]): number[];
}

function inUniverse(quote: Quote, universe?: readonly string[]): boolean {
  return universe === undefined || universe.includes(quote.instrumentId);
}

/**
 * Quote source over an in-memory list of bar and tick quotes
 */
export class InMemoryQuoteSource implements QuoteSource {
  private readonly barsByDate = new Map<string, readonly Quote[]>();
  private readonly ticksByTimestamp = new Map<number, readonly Quote[]>();
  private readonly ticksByDate = new Map<string, readonly Quote[]>();

  constructor(quotes: readonly Quote[]) {
    const seen = new Set<string>();
    const bars = new Map<string, Quote[]>();
    const ticks = new Map<number, Quote[]>();
    const ticksByDate = new Map<string, Quote[]>();

    for (const quote of quotes) {
      const key = `${quote.granularity}|${quote.instrumentId}|${quote.granularity === 'bar' ? quote.date : quote.timestamp}`;
      if (seen.has(key)) {
        throw new Error(`Duplicate ${quote.granularity} quote for ${quote.instrumentId} at ${quote.date} (${quote.timestamp})`);
      }
      seen.add(key);

      const frozen = Object.freeze({ ...quote });
      if (quote.granularity === 'bar') {
        push(bars, quote.date, frozen);
      } else {
        push(ticks, quote.timestamp, frozen);
        push(ticksByDate, quote.date, frozen);
      }
    }

    for (const [date, list] of bars) {
      this.barsByDate.set(
        date,
        Object.freeze([...list].sort((a, b) => a.instrumentId.localeCompare(b.instrumentId)))
      );
    }
    for (const [timestamp, list] of ticks) {
      this.ticksByTimestamp.set(timestamp, Object.freeze(list));
    }
    for (const [date, list] of ticksByDate) {
      this.ticksByDate.set(date, Object.freeze(list));
    }
  }

  getQuotes(asOf: QuoteTimestep, universe?: readonly string[]): Quote[] {
    const quotes = typeof asOf === 'string' ? this.barsByDate.get(asOf) : this.ticksByTimestamp.get(asOf);
    return (quotes ?? []).filter((q) => inUniverse(q, universe));
  }

  getTickTimestamps(date: string, universe?: readonly string[]): number[] {
    const ticks = (this.ticksByDate.get(date) ?? []).filter((q) => inUniverse(q, universe));
    return [...new Set(ticks.map((q) => q.timestamp))].sort((a, b) => a - b);
  }

  /**
   * Trading dates with bar data, ascending
   */
  getBarDates(): string[] {
    return [...this.barsByDate.keys()].sort();
  }
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

export function createQuoteSource(quotes: readonly Quote[]): InMemoryQuoteSource {
  return new InMemoryQuoteSource(quotes);
}
