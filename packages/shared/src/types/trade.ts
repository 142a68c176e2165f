/**
 * Trading types
 */

/**
 * Order action
 */
export type OrderAction = 'buy' | 'sell';

/**
 * Position side
 */
export type PositionSide = 'long' | 'short';

/**
 * Intent to trade, produced by a strategy's position sizing
 */
export interface Order {
  /** Instrument identifier */
  instrumentId: string;
  /** Timestep the order was produced on (ms) */
  timestamp: number;
  /** Trading date (YYYY-MM-DD) */
  date: string;
  /** Buy or sell */
  action: OrderAction;
  /** Side of the position being opened or closed */
  side: PositionSide;
  /** Requested price per share */
  price: number;
  /** Requested quantity in lots */
  lots: number;
  /** Signal that produced the order */
  reason?: string;
}

/**
 * Held lot
 */
export interface Position {
  /** Sequential position id (unique within a run) */
  readonly id: number;
  /** Instrument identifier */
  readonly instrumentId: string;
  /** Long or short */
  readonly side: PositionSide;
  /** Entry price per share */
  readonly entryPrice: number;
  /** Entry time (ms) */
  readonly entryTimestamp: number;
  /** Entry trading date (YYYY-MM-DD) */
  readonly entryDate: string;
  /** Remaining quantity in shares */
  readonly quantity: number;
  /** Open-leg commission not yet attributed to a trade record */
  readonly openCommission: number;
}

/**
 * Completed (fully or partially) round trip
 */
export interface TradeRecord {
  /** Sequential record id (unique within a run) */
  id: number;
  /** Position the record was closed from */
  positionId: number;
  /** Instrument identifier */
  instrumentId: string;
  /** Long or short */
  side: PositionSide;
  /** Entry time (ms) */
  openTimestamp: number;
  /** Entry trading date */
  openDate: string;
  /** Exit time (ms) */
  closeTimestamp: number;
  /** Exit trading date */
  closeDate: string;
  /** Entry price per share */
  openPrice: number;
  /** Exit price per share */
  closePrice: number;
  /** Closed quantity in shares */
  quantity: number;
  /** Gross realized P&L, before commissions */
  realizedPnl: number;
  /** Open-leg share plus close-leg share of commissions */
  commission: number;
  /** realizedPnl - commission */
  netPnl: number;
  /** netPnl over cost basis (entry notional + open commission), in % */
  roi: number;
}

/**
 * Applied fill, as reported by the account
 */
export interface Fill {
  /** Order the fill executed */
  order: Order;
  /** Executed price per share */
  price: number;
  /** Executed quantity in lots */
  lots: number;
  /** Executed quantity in shares */
  quantity: number;
  /** Commission charged on this fill */
  commission: number;
  /** Whether the fill opened a new lot */
  opening: boolean;
  /** Position opened by the fill (opening fills only) */
  position?: Position;
  /** Trade records written by the fill (closing fills only) */
  records: TradeRecord[];
  /** Cash after the fill */
  cashAfter: number;
}
