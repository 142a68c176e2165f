/**
 * Simple Long Strategy
 *
 * - Open: day-over-day gain >= minPriceChangePct and volume >= minVolumeLots
 * - Close: held for maxHoldingDays calendar days, or profit >= profitTargetPct
 * - Stop loss: loss >= stopLossPct
 */

import { daysBetween, type Order, type Quote } from '@stocksim/shared';
import { BaseStockStrategy, type BaseStrategyOptions, type SignalCandidate } from '../../strategy/base-strategy.js';

/**
 * Simple Long specific parameters (percentages as whole numbers, 8 = 8%)
 */
export interface SimpleLongParams {
  minPriceChangePct: number;
  /** Minimum traded volume, in lots */
  minVolumeLots: number;
  maxHoldingDays: number;
  profitTargetPct: number;
  stopLossPct: number;
}

export const DEFAULT_SIMPLE_LONG_PARAMS: SimpleLongParams = {
  minPriceChangePct: 8,
  minVolumeLots: 1000,
  maxHoldingDays: 5,
  profitTargetPct: 10,
  stopLossPct: 5,
};

export class SimpleLongStrategy extends BaseStockStrategy {
  readonly name = 'SimpleLong';

  readonly params: SimpleLongParams;

  constructor(params: Partial<SimpleLongParams> = {}, options: BaseStrategyOptions = {}) {
    super(options);
    this.params = { ...DEFAULT_SIMPLE_LONG_PARAMS, ...params };
  }

  checkOpenSignal(quotes: readonly Quote[]): Order[] {
    const { maxHoldings, lotSize } = this.config;
    if (maxHoldings !== undefined && this.account.positionCount() >= maxHoldings) {
      return [];
    }

    const candidates: SignalCandidate[] = [];
    for (const quote of quotes) {
      if (this.account.hasPosition(quote.instrumentId)) continue;

      const previousClose = this.previousClose(quote.instrumentId, quote.date);
      if (!previousClose) continue;

      const changePct = (quote.close / previousClose - 1) * 100;
      if (changePct >= this.params.minPriceChangePct && quote.volume >= this.params.minVolumeLots * lotSize) {
        candidates.push({ quote, reason: `gain ${changePct.toFixed(2)}%` });
      }
    }

    return this.calculatePositionSize(candidates, this.openAction());
  }

  checkCloseSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];
    for (const quote of quotes) {
      const position = this.account.firstOpenPosition(quote.instrumentId, this.side);
      if (!position) continue;

      const holdingDays = daysBetween(position.entryDate, quote.date);
      const profitPct = this.returnPct(position.entryPrice, quote.currentPrice);

      if (holdingDays >= this.params.maxHoldingDays) {
        candidates.push({ quote, reason: `held ${holdingDays} days` });
      } else if (profitPct >= this.params.profitTargetPct) {
        candidates.push({ quote, reason: `profit ${profitPct.toFixed(2)}%` });
      }
    }

    return this.calculatePositionSize(candidates, this.closeAction());
  }

  checkStopLossSignal(quotes: readonly Quote[]): Order[] {
    const candidates: SignalCandidate[] = [];
    for (const quote of quotes) {
      const position = this.account.firstOpenPosition(quote.instrumentId, this.side);
      if (!position) continue;

      const returnPct = this.returnPct(position.entryPrice, quote.currentPrice);
      if (returnPct <= -this.params.stopLossPct) {
        candidates.push({ quote, reason: `stop loss ${returnPct.toFixed(2)}%` });
      }
    }

    return this.calculatePositionSize(candidates, this.closeAction());
  }

  private returnPct(entryPrice: number, price: number): number {
    const change = (price / entryPrice - 1) * 100;
    return this.side === 'long' ? change : -change;
  }
}

export function createSimpleLongStrategy(
  params?: Partial<SimpleLongParams>,
  options?: BaseStrategyOptions
): SimpleLongStrategy {
  return new SimpleLongStrategy(params, options);
}
