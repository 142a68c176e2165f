/**
 * Momentum Strategy
 *
 * Buys instruments that closed at least 9% above the previous trading day on
 * at least 5000 lots of volume, and exits on the next trading day.
 */

import type { Order, Quote } from '@stocksim/shared';
import { BaseStockStrategy, type BaseStrategyOptions, type SignalCandidate } from '../../strategy/base-strategy.js';

export interface MomentumParams {
  /** Day-over-day gain threshold, in % */
  minPriceChangePct: number;
  /** Volume threshold, in lots */
  minVolumeLots: number;
}

export const DEFAULT_MOMENTUM_PARAMS: MomentumParams = {
  minPriceChangePct: 9,
  minVolumeLots: 5000,
};

export class MomentumStrategy extends BaseStockStrategy {
  readonly name = 'Momentum';

  readonly params: MomentumParams;

  constructor(params: Partial<MomentumParams> = {}, options: BaseStrategyOptions = {}) {
    super(options);
    this.params = { ...DEFAULT_MOMENTUM_PARAMS, ...params };
  }

  checkOpenSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];

    for (const quote of quotes) {
      if (this.account.hasPosition(quote.instrumentId)) continue;

      const previousClose = this.previousClose(quote.instrumentId, quote.date);
      if (!previousClose) continue;

      const changePct = (quote.currentPrice / previousClose - 1) * 100;
      if (changePct < this.params.minPriceChangePct) continue;
      if (quote.volume < this.params.minVolumeLots * this.config.lotSize) continue;

      candidates.push({ quote, reason: `momentum ${changePct.toFixed(2)}%` });
    }

    return this.calculatePositionSize(candidates, this.openAction());
  }

  checkCloseSignal(quotes: readonly Quote[]): Order[] {
    const candidates = quotes
      .filter((quote) => {
        const position = this.account.firstOpenPosition(quote.instrumentId, this.side);
        return position !== null && quote.date > position.entryDate;
      })
      .map((quote) => ({ quote, reason: 'next-day exit' }));

    return this.calculatePositionSize(candidates, this.closeAction());
  }

  checkStopLossSignal(): Order[] {
    return [];
  }
}

export function createMomentumStrategy(
  params?: Partial<MomentumParams>,
  options?: BaseStrategyOptions
): MomentumStrategy {
  return new MomentumStrategy(params, options);
}
