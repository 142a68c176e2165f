/**
 * Order Executor for Backtest Engine
 *
 * Turns strategy orders into account fills against the quotes of the current
 * timestep. Fill price and commission come from the run's execution models.
 * Order-level failures are collected as rejections; the batch always runs to
 * the end.
 */

import { OrderSchema, type Fill, type Logger, type Order, type Quote } from '@stocksim/shared';
import { calculateCommission } from '../../accounting/commission.js';
import { isOpeningOrder, type Account } from '../../accounting/account.js';
import { OrderError, OrderRejectedError } from '../errors.js';
import type { CommissionModel, FillPriceModel, OrderRejection, SignalPhase } from '../types.js';

export interface OrderExecutorOptions {
  fillPrice: FillPriceModel;
  /** Used by the slippage model only */
  slippagePct: number;
  commission: CommissionModel;
  /** Allow a lot to be closed on the trading date it was opened */
  enableIntraday: boolean;
  logger: Logger;
}

export interface ExecutionReport {
  fills: Fill[];
  rejections: OrderRejection[];
}

/**
 * Price an order fills at under the given model.
 * Slippage always moves the price against the trader.
 */
export function resolveFillPrice(
  model: FillPriceModel,
  order: Order,
  quote: Quote,
  slippagePct: number
): number {
  switch (model) {
    case 'order':
      return order.price;
    case 'quote':
      return quote.currentPrice;
    case 'slippage':
      return order.action === 'buy'
        ? quote.currentPrice * (1 + slippagePct)
        : quote.currentPrice * (1 - slippagePct);
  }
}

export class OrderExecutor {
  constructor(
    private readonly account: Account,
    private readonly options: OrderExecutorOptions
  ) {}

  /**
   * Execute a batch of orders in sequence. Later orders see the account as
   * left by earlier ones.
   */
  execute(orders: readonly Order[], quotes: readonly Quote[], phase: SignalPhase): ExecutionReport {
    const quoteById = new Map(quotes.map((q) => [q.instrumentId, q]));
    const report: ExecutionReport = { fills: [], rejections: [] };

    for (const order of orders) {
      try {
        report.fills.push(this.executeOne(order, quoteById.get(order.instrumentId)));
      } catch (error) {
        if (!(error instanceof OrderError)) {
          throw error;
        }
        report.rejections.push({ order, phase, code: error.code, reason: error.message });
        this.options.logger.warn('Order rejected', {
          phase,
          code: error.code,
          instrumentId: order.instrumentId,
          action: order.action,
          side: order.side,
          lots: order.lots,
          reason: error.message,
        });
      }
    }

    return report;
  }

  private executeOne(order: Order, quote: Quote | undefined): Fill {
    const parsed = OrderSchema.safeParse(order);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new OrderRejectedError(order, `Malformed order: ${issues.join('; ')}`);
    }

    if (!quote) {
      throw new OrderRejectedError(order, `No quote for ${order.instrumentId} at ${order.date}`, 'NO_QUOTE');
    }

    if (!this.options.enableIntraday && !isOpeningOrder(order)) {
      this.assertNotSameDay(order);
    }

    const price = resolveFillPrice(this.options.fillPrice, order, quote, this.options.slippagePct);
    const commission = calculateCommission(
      this.options.commission,
      order.action,
      price,
      order.lots * this.account.lotSize
    );

    const fill = this.account.applyFill(order, price, order.lots, commission);

    this.options.logger.debug('Order filled', {
      instrumentId: order.instrumentId,
      action: order.action,
      side: order.side,
      lots: order.lots,
      price,
      commission,
      cash: fill.cashAfter,
    });

    return fill;
  }

  /**
   * Reject a close that would reach a lot opened on the order's trading date
   */
  private assertNotSameDay(order: Order): void {
    const heldBefore = this.account
      .getOpenPositions(order.instrumentId)
      .filter((p) => p.side === order.side && p.entryDate !== order.date)
      .reduce((sum, p) => sum + p.quantity, 0);
    const sameDay = this.account
      .getOpenPositions(order.instrumentId)
      .some((p) => p.side === order.side && p.entryDate === order.date);

    if (sameDay && order.lots * this.account.lotSize > heldBefore) {
      throw new OrderRejectedError(
        order,
        `Intraday trading disabled: ${order.instrumentId} lot opened on ${order.date} cannot close the same day`
      );
    }
  }
}

export function createOrderExecutor(account: Account, options: OrderExecutorOptions): OrderExecutor {
  return new OrderExecutor(account, options);
}
