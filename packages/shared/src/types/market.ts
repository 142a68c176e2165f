/**
 * Market data types
 */

/**
 * Timestep granularity of a backtest.
 *
 * `mixed` (daily bars and ticks both live) is declared so configuration can
 * name it, but the engine rejects it until an interleaving policy exists.
 */
export type Granularity = 'bar' | 'tick' | 'mixed';

/**
 * Granularity of a single observation
 */
export type QuoteGranularity = Exclude<Granularity, 'mixed'>;

/**
 * Tick side classification: 1 = outside (hit the ask), 2 = inside (hit the bid), 0 = unknown
 */
export type TickType = 0 | 1 | 2;

/**
 * Order book top and trade classification for a tick observation
 */
export interface TickDetail {
  /** Best bid price */
  bidPrice: number;
  /** Best bid volume */
  bidVolume: number;
  /** Best ask price */
  askPrice: number;
  /** Best ask volume */
  askVolume: number;
  /** Outside/inside classification */
  tickType: TickType;
}

/**
 * One market observation for one instrument
 */
export interface Quote {
  /** Instrument identifier (e.g., "2330") */
  instrumentId: string;
  /** Observation time (Unix timestamp in milliseconds, UTC) */
  timestamp: number;
  /** Trading date (YYYY-MM-DD) */
  date: string;
  /** Bar or tick observation */
  granularity: QuoteGranularity;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price (last traded price for ticks) */
  close: number;
  /** Traded volume in shares */
  volume: number;
  /** Price used for fills; the close for bars, the traded price for ticks */
  currentPrice: number;
  /** Tick-only detail */
  tick?: TickDetail;
}
