/**
 * Unified Types for Backtest Engine
 *
 * This file contains all types shared across the backtest system:
 * run configuration, execution models, snapshots, metrics and results.
 */

import type {
  Granularity,
  Order,
  PositionSide,
  Quote,
  TradeRecord,
} from '@stocksim/shared';

// Re-export shared types for convenience
export type { Granularity, Order, PositionSide, Quote, TradeRecord };

// =============================================================================
// EXECUTION MODELS
// =============================================================================

/**
 * How the executor picks a fill price
 * - order: the order's requested price
 * - quote: the quote's currentPrice
 * - slippage: currentPrice moved against the trader by slippagePct
 */
export type FillPriceModel = 'order' | 'quote' | 'slippage';

export type CommissionModel =
  | { type: 'none' }
  | { type: 'fixed'; fee: number }
  | {
      type: 'percentage';
      /** Commission rate on notional (e.g., 0.001425) */
      rate: number;
      /** Broker discount multiplier applied to the rate (1 = none) */
      discount: number;
      /** Minimum commission per fill */
      minFee: number;
      /** Transaction tax on sell notional (e.g., 0.003) */
      sellTaxRate: number;
    };

// =============================================================================
// BACKTEST CONFIGURATION
// =============================================================================

export interface BacktestConfig {
  strategyName: string;
  initialCapital: number;
  /** Max distinct instruments held at once; undefined = unlimited */
  maxHoldings?: number;
  granularity: Granularity;
  /** First trading date (YYYY-MM-DD), inclusive */
  startDate: string;
  /** Last trading date (YYYY-MM-DD), inclusive */
  endDate: string;
  /** Allow closing a lot on the date it was opened */
  enableIntraday: boolean;
  positionSideDefault: PositionSide;
  /** Shares per lot */
  lotSize: number;
  /** Instruments to trade; undefined = everything the source returns */
  universe?: string[];
  fillPrice: FillPriceModel;
  /** Fraction of price, used by the slippage fill model (0.001 = 0.1%) */
  slippagePct: number;
  commission: CommissionModel;
  /** Annual risk-free rate for the Sharpe ratio */
  riskFreeRate: number;
  /** Annualization factor for period returns (252 for daily bars) */
  periodsPerYear: number;
}

/**
 * Taiwan-stock broker defaults: 0.1425% commission at a 30% discount with a
 * 20 minimum fee, plus 0.3% transaction tax on sells.
 */
export const DEFAULT_COMMISSION: CommissionModel = {
  type: 'percentage',
  rate: 0.001425,
  discount: 0.3,
  minFee: 20,
  sellTaxRate: 0.003,
};

export const DEFAULT_LOT_SIZE = 1000;

export const DEFAULT_PERIODS_PER_YEAR = 252;

// =============================================================================
// DRIVER STATE
// =============================================================================

export type BacktestState = 'INITIALIZING' | 'RUNNING' | 'FINALIZING' | 'DONE' | 'ABORTED';

/**
 * The three strategy signal phases, in the order they run every timestep
 */
export type SignalPhase = 'stopLoss' | 'close' | 'open';

export const SIGNAL_PHASES: readonly SignalPhase[] = ['stopLoss', 'close', 'open'];

// =============================================================================
// SNAPSHOTS & EXECUTION RECORDS
// =============================================================================

export interface AccountSnapshot {
  /** Timestep (ms) */
  timestamp: number;
  /** Trading date */
  date: string;
  /** Cash balance */
  cash: number;
  /** Mark-to-market value of open positions */
  positionValue: number;
  /** cash + positionValue */
  equity: number;
  /** Distinct instruments held */
  openPositions: number;
  /** Cumulative gross realized P&L */
  realizedPnl: number;
  /** Mark-to-market P&L of open lots against their entry prices */
  unrealizedPnl: number;
  /** Cumulative commissions */
  totalCommission: number;
}

export interface OrderRejection {
  order: Order;
  phase: SignalPhase;
  /** Error code of the rejection (INSUFFICIENT_FUNDS, NO_QUOTE, ...) */
  code: string;
  reason: string;
}

export interface DataGap {
  timestamp: number;
  date: string;
}

// =============================================================================
// PERFORMANCE METRICS
// =============================================================================

export interface PerformanceOptions {
  /** Annual risk-free rate (default 0) */
  riskFreeRate?: number;
  /** Periods per year used to annualize (default 252) */
  periodsPerYear?: number;
}

export interface PerformanceMetrics {
  initialCapital: number;
  finalEquity: number;
  /** (finalEquity - initialCapital) / initialCapital */
  totalReturn: number;
  /** Time-weighted over the calendar span of the snapshots */
  annualizedReturn: number;
  /** Largest peak-to-trough decline of equity, absolute */
  maxDrawdown: number;
  /** Largest peak-to-trough decline of equity, in % of the peak */
  maxDrawdownPct: number;
  totalTrades: number;
  wins: number;
  /** Trades with negative realized P&L; break-even trades are in neither count */
  losses: number;
  /** Fraction of trades with positive realized P&L (0-1) */
  winRate: number;
  /** Mean realized P&L of winning trades */
  avgWin: number;
  /** Mean magnitude of realized P&L of losing trades */
  avgLoss: number;
  profitFactor: number;
  realizedPnl: number;
  totalCommission: number;
  /** Annualized population std of period returns */
  volatility: number;
  sharpeRatio: number;
  /** Number of period returns behind volatility and Sharpe */
  periods: number;
}

// =============================================================================
// BACKTEST RESULT
// =============================================================================

export interface BacktestResult {
  runId: string;
  strategyName: string;
  config: BacktestConfig;
  state: BacktestState;
  snapshots: AccountSnapshot[];
  trades: TradeRecord[];
  orders: Order[];
  rejections: OrderRejection[];
  dataGaps: DataGap[];
  /** Present once the run reached DONE */
  metrics?: PerformanceMetrics;
  /** Cash at the end of the run (or at the failure point) */
  finalCash: number;
  /** Number of timesteps processed (skipped gaps excluded) */
  timesteps: number;
  executedAt: Date;
  executionTimeMs: number;
}
