import { describe, it, expect } from 'vitest';
import type { Quote } from '@stocksim/shared';
import { InMemoryQuoteSource } from './quote-source.js';

function bar(instrumentId: string, date: string, close: number): Quote {
  return {
    instrumentId,
    timestamp: Date.parse(`${date}T00:00:00Z`),
    date,
    granularity: 'bar',
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
    currentPrice: close,
  };
}

function tick(instrumentId: string, iso: string, price: number): Quote {
  return {
    instrumentId,
    timestamp: Date.parse(iso),
    date: iso.slice(0, 10),
    granularity: 'tick',
    open: price,
    high: price,
    low: price,
    close: price,
    volume: 5,
    currentPrice: price,
  };
}

describe('InMemoryQuoteSource', () => {
  const source = new InMemoryQuoteSource([
    bar('B', '2024-01-02', 50),
    bar('A', '2024-01-02', 100),
    bar('A', '2024-01-03', 101),
    tick('A', '2024-01-02T01:00:05Z', 100.5),
    tick('B', '2024-01-02T01:00:05Z', 50.5),
    tick('A', '2024-01-02T01:00:01Z', 100),
  ]);

  it('should return bars of a date ordered by instrument', () => {
    expect(source.getQuotes('2024-01-02').map((q) => q.instrumentId)).toEqual(['A', 'B']);
  });

  it('should restrict quotes to the universe', () => {
    const quotes = source.getQuotes('2024-01-02', ['B']);

    expect(quotes).toHaveLength(1);
    expect(quotes[0]?.close).toBe(50);
  });

  it('should return an empty array for a date without data', () => {
    expect(source.getQuotes('2024-01-06')).toEqual([]);
  });

  it('should look up ticks by timestamp', () => {
    const quotes = source.getQuotes(Date.parse('2024-01-02T01:00:05Z'));

    expect(quotes.map((q) => q.currentPrice).sort()).toEqual([100.5, 50.5].sort());
  });

  it('should list unique tick timestamps in ascending order', () => {
    expect(source.getTickTimestamps('2024-01-02')).toEqual([
      Date.parse('2024-01-02T01:00:01Z'),
      Date.parse('2024-01-02T01:00:05Z'),
    ]);
    expect(source.getTickTimestamps('2024-01-02', ['B'])).toEqual([Date.parse('2024-01-02T01:00:05Z')]);
    expect(source.getTickTimestamps('2024-01-03')).toEqual([]);
  });

  it('should list bar dates', () => {
    expect(source.getBarDates()).toEqual(['2024-01-02', '2024-01-03']);
  });

  it('should reject duplicate quotes for the same instrument and timestep', () => {
    expect(() => new InMemoryQuoteSource([bar('A', '2024-01-02', 1), bar('A', '2024-01-02', 2)])).toThrow(
      'Duplicate bar quote for A'
    );
  });

  it('should not expose its stored quotes to mutation', () => {
    const [first] = source.getQuotes('2024-01-03');

    expect(Object.isFrozen(first)).toBe(true);
  });
});
