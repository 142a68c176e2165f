/**
 * Base Strategy Class
 *
 * Strategies plug into the backtest driver through the StockStrategy
 * capability set. BaseStockStrategy supplies the shared plumbing: holding
 * the account view and quote source, price-history lookups, and the default
 * position sizing.
 *
 * @example
 * ```typescript
 * class GapUp extends BaseStockStrategy {
 *   readonly name = 'GapUp';
 *
 *   checkOpenSignal(quotes: readonly Quote[]): Order[] {
 *     const candidates = quotes
 *       .filter((q) => q.open > (this.previousClose(q.instrumentId, q.date) ?? Infinity))
 *       .map((quote) => ({ quote, reason: 'gap up' }));
 *     return this.calculatePositionSize(candidates, this.openAction());
 *   }
 *
 *   checkCloseSignal(): Order[] { return []; }
 *   checkStopLossSignal(): Order[] { return []; }
 * }
 * ```
 */

import { addDays, type Order, type OrderAction, type PositionSide, type Quote } from '@stocksim/shared';
import { isOpeningOrder, type AccountView } from '../accounting/account.js';
import { calculateCommission } from '../accounting/commission.js';
import { resolveFillPrice } from '../backtest/engine/order-executor.js';
import type { QuoteSource } from '../backtest/data/quote-source.js';
import type { BacktestConfig } from '../backtest/types.js';

/** Calendar days searched backwards for a previous trading day */
const DEFAULT_LOOKBACK_DAYS = 14;

/**
 * Quote selected by a signal check, with the reason it was selected
 */
export interface SignalCandidate {
  quote: Quote;
  reason: string;
}

/**
 * Capability set the backtest driver depends on
 */
export interface StockStrategy {
  readonly name: string;

  /** Receive the run's read-only account view and configuration */
  setupAccount(account: AccountView, config: Readonly<BacktestConfig>): void;

  /** Receive the quote source for history lookups */
  setupDataSources(source: QuoteSource): void;

  checkOpenSignal(quotes: readonly Quote[]): Order[];

  checkCloseSignal(quotes: readonly Quote[]): Order[];

  checkStopLossSignal(quotes: readonly Quote[]): Order[];

  /** Turn candidates into sized orders */
  calculatePositionSize(candidates: readonly SignalCandidate[], action: OrderAction): Order[];
}

export interface BaseStrategyOptions {
  /**
   * Fraction of the FIFO head lot to close, rounded down to whole lots.
   * Absent, or rounding to zero lots, closes the whole lot.
   */
  closeFraction?: number;
}

export abstract class BaseStockStrategy implements StockStrategy {
  abstract readonly name: string;

  private accountView: AccountView | null = null;
  private runConfig: Readonly<BacktestConfig> | null = null;
  private quoteSource: QuoteSource | null = null;

  constructor(protected readonly baseOptions: BaseStrategyOptions = {}) {
    const fraction = baseOptions.closeFraction;
    if (fraction !== undefined && !(fraction > 0 && fraction <= 1)) {
      throw new Error(`closeFraction must be in (0, 1], got ${fraction}`);
    }
  }

  abstract checkOpenSignal(quotes: readonly Quote[]): Order[];
  abstract checkCloseSignal(quotes: readonly Quote[]): Order[];
  abstract checkStopLossSignal(quotes: readonly Quote[]): Order[];

  setupAccount(account: AccountView, config: Readonly<BacktestConfig>): void {
    this.accountView = account;
    this.runConfig = config;
  }

  setupDataSources(source: QuoteSource): void {
    this.quoteSource = source;
  }

  // ===========================================================================
  // CONTEXT
  // ===========================================================================

  protected get account(): AccountView {
    if (!this.accountView) {
      throw new Error(`${this.name}: setupAccount() has not been called`);
    }
    return this.accountView;
  }

  protected get config(): Readonly<BacktestConfig> {
    if (!this.runConfig) {
      throw new Error(`${this.name}: setupAccount() has not been called`);
    }
    return this.runConfig;
  }

  protected get source(): QuoteSource {
    if (!this.quoteSource) {
      throw new Error(`${this.name}: setupDataSources() has not been called`);
    }
    return this.quoteSource;
  }

  protected get side(): PositionSide {
    return this.config.positionSideDefault;
  }

  /** Action that opens a lot on the configured side */
  protected openAction(): OrderAction {
    return this.side === 'long' ? 'buy' : 'sell';
  }

  /** Action that closes a lot on the configured side */
  protected closeAction(): OrderAction {
    return this.side === 'long' ? 'sell' : 'buy';
  }

  // ===========================================================================
  // PRICE HISTORY
  // ===========================================================================

  /**
   * Daily bar of the closest earlier trading day, or null when none is found
   * within the lookback window
   */
  protected previousBar(instrumentId: string, date: string, lookbackDays = DEFAULT_LOOKBACK_DAYS): Quote | null {
    for (let k = 1; k <= lookbackDays; k++) {
      const [bar] = this.source.getQuotes(addDays(date, -k), [instrumentId]);
      if (bar) return bar;
    }
    return null;
  }

  protected previousClose(instrumentId: string, date: string): number | null {
    return this.previousBar(instrumentId, date)?.close ?? null;
  }

  /**
   * Closes of up to `count` earlier daily bars, oldest first
   */
  protected closeHistory(instrumentId: string, date: string, count: number, lookbackDays: number): number[] {
    const closes: number[] = [];
    for (let k = 1; k <= lookbackDays && closes.length < count; k++) {
      const [bar] = this.source.getQuotes(addDays(date, -k), [instrumentId]);
      if (bar) closes.push(bar.close);
    }
    return closes.reverse();
  }

  // ===========================================================================
  // POSITION SIZING
  // ===========================================================================

  /**
   * Default sizing.
   *
   * Opening: capital is split evenly over the free holding slots
   * (maxHoldings − held instruments, or one slot per candidate when
   * unlimited). Each slot buys the whole lots whose fill cost, commission
   * included, fits its share. Candidates that cannot afford a single lot
   * are dropped and do not use a slot.
   *
   * Closing: the FIFO head lot of each candidate, scaled by closeFraction.
   */
  calculatePositionSize(candidates: readonly SignalCandidate[], action: OrderAction): Order[] {
    return isOpeningOrder({ action, side: this.side })
      ? this.sizeOpenOrders(candidates, action)
      : this.sizeCloseOrders(candidates, action);
  }

  private sizeOpenOrders(candidates: readonly SignalCandidate[], action: OrderAction): Order[] {
    const { maxHoldings } = this.config;
    const slots =
      maxHoldings === undefined ? candidates.length : Math.max(0, maxHoldings - this.account.positionCount());
    if (slots === 0) return [];

    const perSlot = this.account.balance / slots;
    const orders: Order[] = [];

    for (const { quote, reason } of candidates) {
      if (orders.length >= slots) break;
      const order = this.createOrder(quote, action, 1, reason);
      const lots = this.affordableLots(order, quote, perSlot);
      if (lots <= 0) continue;
      orders.push({ ...order, lots });
    }

    return orders;
  }

  private affordableLots(order: Order, quote: Quote, budget: number): number {
    const { lotSize, fillPrice, slippagePct, commission } = this.config;
    const price = resolveFillPrice(fillPrice, order, quote, slippagePct);
    const cost = (lots: number): number =>
      price * lots * lotSize + calculateCommission(commission, order.action, price, lots * lotSize);

    let lots = Math.floor(budget / (price * lotSize));
    while (lots > 0 && cost(lots) > budget) lots--;
    return lots;
  }

  private sizeCloseOrders(candidates: readonly SignalCandidate[], action: OrderAction): Order[] {
    const orders: Order[] = [];

    for (const { quote, reason } of candidates) {
      const position = this.account.firstOpenPosition(quote.instrumentId, this.side);
      if (!position) continue;

      const heldLots = Math.floor(position.quantity / this.config.lotSize);
      const fraction = this.baseOptions.closeFraction;
      const partial = fraction === undefined ? 0 : Math.floor(heldLots * fraction);
      const lots = partial > 0 ? partial : heldLots;
      if (lots <= 0) continue;

      orders.push(this.createOrder(quote, action, lots, reason));
    }

    return orders;
  }

  protected createOrder(quote: Quote, action: OrderAction, lots: number, reason: string): Order {
    return {
      instrumentId: quote.instrumentId,
      timestamp: quote.timestamp,
      date: quote.date,
      action,
      side: this.side,
      price: quote.currentPrice,
      lots,
      reason,
    };
  }
}
