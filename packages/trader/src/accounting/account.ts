/**
 * Virtual Account
 *
 * Owns cash, open lots and the realized trade history of a single backtest
 * run. It is the only place where cash or positions change, and every change
 * goes through applyFill.
 *
 * Accounting rules:
 * - Opening a lot (buy long / sell short) debits notional + commission.
 *   Short lots are fully collateralized: the entry notional is set aside.
 * - Closing consumes lots FIFO (earliest entry first) for the instrument and
 *   side, writing one TradeRecord per consumed lot.
 * - Cash never goes below zero; fills that would do so are refused.
 */

import { EventEmitter } from 'events';
import type { Fill, Order, Position, PositionSide, TradeRecord } from '@stocksim/shared';
import {
  InsufficientFundsError,
  OrderRejectedError,
  PositionNotFoundError,
} from '../backtest/errors.js';
import { DEFAULT_LOT_SIZE, type AccountSnapshot } from '../backtest/types.js';

// Float tolerance for affordability checks
const CASH_EPSILON = 1e-9;

// =============================================================================
// TYPES
// =============================================================================

export interface AccountOptions {
  initialCapital: number;
  /** Shares per lot (default 1000) */
  lotSize?: number;
}

/**
 * Read-only view handed to strategies
 */
export interface AccountView {
  readonly initialCapital: number;
  readonly lotSize: number;
  readonly balance: number;
  readonly realizedPnl: number;
  readonly totalCommission: number;
  positionCount(): number;
  hasPosition(instrumentId: string): boolean;
  getOpenPositions(instrumentId?: string): readonly Position[];
  firstOpenPosition(instrumentId: string, side?: PositionSide): Position | null;
  lastOpenPosition(instrumentId: string, side?: PositionSide): Position | null;
  getTradeRecords(): readonly TradeRecord[];
}

/**
 * Account events
 */
export interface AccountEvents {
  'fill:applied': (fill: Fill) => void;
  'position:opened': (position: Position) => void;
  'position:closed': (position: Position) => void;
  'trade:recorded': (record: TradeRecord) => void;
}

/**
 * Whether an order opens a lot (as opposed to closing one)
 */
export function isOpeningOrder(order: Pick<Order, 'action' | 'side'>): boolean {
  return (order.action === 'buy') === (order.side === 'long');
}

/**
 * Value of a lot at `price`; short lots are worth collateral plus unrealized P&L
 */
export function lotValue(position: Position, price: number): number {
  return position.side === 'long'
    ? price * position.quantity
    : (2 * position.entryPrice - price) * position.quantity;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class Account extends EventEmitter implements AccountView {
  readonly initialCapital: number;
  readonly lotSize: number;

  private cash: number;
  /** Frozen lots, oldest first; a partial close replaces the lot */
  private positions: Position[] = [];
  private records: TradeRecord[] = [];
  private realized = 0;
  private commissionPaid = 0;
  private nextPositionId = 1;
  private nextRecordId = 1;

  constructor(options: AccountOptions) {
    super();
    if (!(options.initialCapital > 0)) {
      throw new Error('Initial capital must be positive');
    }
    const lotSize = options.lotSize ?? DEFAULT_LOT_SIZE;
    if (!Number.isInteger(lotSize) || lotSize <= 0) {
      throw new Error('Lot size must be a positive integer');
    }
    this.initialCapital = options.initialCapital;
    this.lotSize = lotSize;
    this.cash = options.initialCapital;
  }

  // ===========================================================================
  // BALANCE QUERIES
  // ===========================================================================

  get balance(): number {
    return this.cash;
  }

  /** Cumulative gross realized P&L */
  get realizedPnl(): number {
    return this.realized;
  }

  /** Every commission and tax charged so far, open lots included */
  get totalCommission(): number {
    return this.commissionPaid;
  }

  /** Realized net return on initial capital, in % */
  get realizedRoi(): number {
    return ((this.realized - this.closedCommission()) / this.initialCapital) * 100;
  }

  // ===========================================================================
  // POSITION QUERIES
  // ===========================================================================

  getOpenPositions(instrumentId?: string): readonly Position[] {
    return instrumentId === undefined
      ? [...this.positions]
      : this.positions.filter((p) => p.instrumentId === instrumentId);
  }

  /**
   * Earliest open lot for the instrument (FIFO head)
   */
  firstOpenPosition(instrumentId: string, side?: PositionSide): Position | null {
    return (
      this.positions.find(
        (p) => p.instrumentId === instrumentId && (side === undefined || p.side === side)
      ) ?? null
    );
  }

  /**
   * Most recently opened lot for the instrument (LIFO head)
   */
  lastOpenPosition(instrumentId: string, side?: PositionSide): Position | null {
    for (let i = this.positions.length - 1; i >= 0; i--) {
      const position = this.positions[i];
      if (position && position.instrumentId === instrumentId && (side === undefined || position.side === side)) {
        return position;
      }
    }
    return null;
  }

  hasPosition(instrumentId: string): boolean {
    return this.positions.some((p) => p.instrumentId === instrumentId);
  }

  /**
   * Number of distinct instruments with at least one open lot
   */
  positionCount(): number {
    return new Set(this.positions.map((p) => p.instrumentId)).size;
  }

  getTradeRecords(): readonly TradeRecord[] {
    return [...this.records];
  }

  // ===========================================================================
  // VALUATION
  // ===========================================================================

  /**
   * Mark-to-market value of open lots. Instruments missing from `prices`
   * are valued at their entry price.
   */
  marketValue(prices: ReadonlyMap<string, number> = new Map()): number {
    return this.positions.reduce(
      (sum, p) => sum + lotValue(p, prices.get(p.instrumentId) ?? p.entryPrice),
      0
    );
  }

  /**
   * Unrealized gross P&L of open lots at `prices`
   */
  unrealizedPnl(prices: ReadonlyMap<string, number> = new Map()): number {
    return this.positions.reduce((sum, p) => {
      const price = prices.get(p.instrumentId) ?? p.entryPrice;
      const direction = p.side === 'long' ? 1 : -1;
      return sum + (price - p.entryPrice) * p.quantity * direction;
    }, 0);
  }

  equity(prices: ReadonlyMap<string, number> = new Map()): number {
    return this.cash + this.marketValue(prices);
  }

  snapshot(timestamp: number, date: string, prices: ReadonlyMap<string, number>): AccountSnapshot {
    const positionValue = this.marketValue(prices);
    return {
      timestamp,
      date,
      cash: this.cash,
      positionValue,
      equity: this.cash + positionValue,
      openPositions: this.positionCount(),
      realizedPnl: this.realized,
      unrealizedPnl: this.unrealizedPnl(prices),
      totalCommission: this.commissionPaid,
    };
  }

  // ===========================================================================
  // FILLS
  // ===========================================================================

  /**
   * Apply an executed fill.
   *
   * @throws InsufficientFundsError when an opening fill costs more than cash
   * @throws PositionNotFoundError when a closing fill has nothing to close
   * @throws OrderRejectedError on a non-positive or fractional lot count, or
   *   a closing quantity above the open quantity
   */
  applyFill(order: Order, fillPrice: number, fillLots: number, commission: number): Fill {
    if (!Number.isInteger(fillLots) || fillLots <= 0) {
      throw new OrderRejectedError(order, `Fill quantity must be a positive whole number of lots, got ${fillLots}`);
    }
    if (!(fillPrice > 0)) {
      throw new OrderRejectedError(order, `Fill price must be positive, got ${fillPrice}`);
    }
    if (commission < 0) {
      throw new OrderRejectedError(order, `Commission cannot be negative, got ${commission}`);
    }

    const fill = isOpeningOrder(order)
      ? this.openLot(order, fillPrice, fillLots, commission)
      : this.closeLots(order, fillPrice, fillLots, commission);

    this.emit('fill:applied', fill);
    return fill;
  }

  private openLot(order: Order, price: number, lots: number, commission: number): Fill {
    const quantity = lots * this.lotSize;
    const cost = price * quantity + commission;

    if (cost > this.cash + CASH_EPSILON) {
      throw new InsufficientFundsError(order, cost, this.cash);
    }

    this.cash = Math.max(0, this.cash - cost);
    this.commissionPaid += commission;

    const position: Position = Object.freeze({
      id: this.nextPositionId++,
      instrumentId: order.instrumentId,
      side: order.side,
      entryPrice: price,
      entryTimestamp: order.timestamp,
      entryDate: order.date,
      quantity,
      openCommission: commission,
    });
    this.positions.push(position);
    this.emit('position:opened', position);

    return {
      order,
      price,
      lots,
      quantity,
      commission,
      opening: true,
      position,
      records: [],
      cashAfter: this.cash,
    };
  }

  private closeLots(order: Order, price: number, lots: number, commission: number): Fill {
    const matching = this.positions.filter(
      (p) => p.instrumentId === order.instrumentId && p.side === order.side
    );
    if (matching.length === 0) {
      throw new PositionNotFoundError(order);
    }

    const quantity = lots * this.lotSize;
    const openQuantity = matching.reduce((sum, p) => sum + p.quantity, 0);
    if (quantity > openQuantity) {
      throw new OrderRejectedError(
        order,
        `Close quantity ${quantity} exceeds open quantity ${openQuantity} for ${order.instrumentId}`
      );
    }

    // Proceeds are computed up front so a refused fill leaves no trace
    let remaining = quantity;
    let proceeds = 0;
    for (const lot of matching) {
      if (remaining === 0) break;
      const take = Math.min(remaining, lot.quantity);
      proceeds += lotValue({ ...lot, quantity: take }, price);
      remaining -= take;
    }
    if (this.cash + proceeds - commission < -CASH_EPSILON) {
      throw new InsufficientFundsError(order, commission - proceeds, this.cash);
    }

    const records: TradeRecord[] = [];
    remaining = quantity;
    for (const lot of matching) {
      if (remaining === 0) break;
      const take = Math.min(remaining, lot.quantity);
      records.push(this.recordClose(lot, order, price, take, (commission * take) / quantity));
      remaining -= take;
    }

    this.cash = Math.max(0, this.cash + proceeds - commission);
    this.commissionPaid += commission;

    return {
      order,
      price,
      lots,
      quantity,
      commission,
      opening: false,
      records,
      cashAfter: this.cash,
    };
  }

  /**
   * Close `take` shares of `lot`, replacing or removing it, and append the record
   */
  private recordClose(
    lot: Position,
    order: Order,
    price: number,
    take: number,
    closeCommission: number
  ): TradeRecord {
    const openCommission = (lot.openCommission * take) / lot.quantity;
    const direction = lot.side === 'long' ? 1 : -1;
    const realizedPnl = (price - lot.entryPrice) * take * direction;
    const commission = openCommission + closeCommission;
    const netPnl = realizedPnl - commission;
    const costBasis = lot.entryPrice * take + openCommission;

    const record: TradeRecord = {
      id: this.nextRecordId++,
      positionId: lot.id,
      instrumentId: lot.instrumentId,
      side: lot.side,
      openTimestamp: lot.entryTimestamp,
      openDate: lot.entryDate,
      closeTimestamp: order.timestamp,
      closeDate: order.date,
      openPrice: lot.entryPrice,
      closePrice: price,
      quantity: take,
      realizedPnl,
      commission,
      netPnl,
      roi: costBasis > 0 ? (netPnl / costBasis) * 100 : 0,
    };

    const index = this.positions.findIndex((p) => p.id === lot.id);
    if (take === lot.quantity) {
      this.positions.splice(index, 1);
      this.emit('position:closed', lot);
    } else {
      this.positions[index] = Object.freeze({
        ...lot,
        quantity: lot.quantity - take,
        openCommission: lot.openCommission - openCommission,
      });
    }

    this.realized += realizedPnl;
    this.records.push(record);
    this.emit('trade:recorded', record);
    return record;
  }

  private closedCommission(): number {
    return this.records.reduce((sum, r) => sum + r.commission, 0);
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof AccountEvents>(event: K, listener: AccountEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof AccountEvents>(
    event: K,
    ...args: Parameters<AccountEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createAccount(options: AccountOptions): Account {
  return new Account(options);
}
