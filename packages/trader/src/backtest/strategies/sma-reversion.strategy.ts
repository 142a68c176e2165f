/**
 * SMA Reversion Strategy
 *
 * Mean reversion against a simple moving average of daily closes:
 * buys a close that sits entryDiscountPct below its SMA, sells once the
 * price is back at or above the SMA, and stops out at stopLossPct.
 */

import { SMA } from 'technicalindicators';
import type { Order, Quote } from '@stocksim/shared';
import { BaseStockStrategy, type BaseStrategyOptions, type SignalCandidate } from '../../strategy/base-strategy.js';

export interface SmaReversionParams {
  smaPeriod: number;
  /** Required distance below the SMA to open, in % */
  entryDiscountPct: number;
  stopLossPct: number;
  /** Calendar days searched for smaPeriod earlier bars */
  lookbackDays: number;
}

export const DEFAULT_SMA_REVERSION_PARAMS: SmaReversionParams = {
  smaPeriod: 20,
  entryDiscountPct: 5,
  stopLossPct: 8,
  lookbackDays: 60,
};

export class SmaReversionStrategy extends BaseStockStrategy {
  readonly name = 'SmaReversion';

  readonly params: SmaReversionParams;

  constructor(params: Partial<SmaReversionParams> = {}, options: BaseStrategyOptions = {}) {
    super(options);
    this.params = { ...DEFAULT_SMA_REVERSION_PARAMS, ...params };
    if (!Number.isInteger(this.params.smaPeriod) || this.params.smaPeriod < 2) {
      throw new Error(`smaPeriod must be an integer >= 2, got ${this.params.smaPeriod}`);
    }
  }

  /**
   * SMA over the previous smaPeriod - 1 closes plus today's price,
   * or null without enough history
   */
  movingAverage(quote: Quote): number | null {
    const { smaPeriod, lookbackDays } = this.params;
    const history = this.closeHistory(quote.instrumentId, quote.date, smaPeriod - 1, lookbackDays);
    if (history.length < smaPeriod - 1) return null;

    const [value] = SMA.calculate({ period: smaPeriod, values: [...history, quote.currentPrice] });
    return value ?? null;
  }

  checkOpenSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];

    for (const quote of quotes) {
      if (this.account.hasPosition(quote.instrumentId)) continue;

      const sma = this.movingAverage(quote);
      if (sma === null) continue;

      const discountPct = (1 - quote.currentPrice / sma) * 100;
      if (discountPct >= this.params.entryDiscountPct) {
        candidates.push({ quote, reason: `${discountPct.toFixed(2)}% below SMA${this.params.smaPeriod}` });
      }
    }

    return this.calculatePositionSize(candidates, this.openAction());
  }

  checkCloseSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];

    for (const quote of quotes) {
      if (!this.account.firstOpenPosition(quote.instrumentId, this.side)) continue;

      const sma = this.movingAverage(quote);
      if (sma !== null && quote.currentPrice >= sma) {
        candidates.push({ quote, reason: `back above SMA${this.params.smaPeriod}` });
      }
    }

    return this.calculatePositionSize(candidates, this.closeAction());
  }

  checkStopLossSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];

    for (const quote of quotes) {
      const position = this.account.firstOpenPosition(quote.instrumentId, this.side);
      if (!position) continue;

      const lossPct = (1 - quote.currentPrice / position.entryPrice) * 100;
      if (lossPct >= this.params.stopLossPct) {
        candidates.push({ quote, reason: `stop loss ${lossPct.toFixed(2)}%` });
      }
    }

    return this.calculatePositionSize(candidates, this.closeAction());
  }
}

export function createSmaReversionStrategy(
  params?: Partial<SmaReversionParams>,
  options?: BaseStrategyOptions
): SmaReversionStrategy {
  return new SmaReversionStrategy(params, options);
}
