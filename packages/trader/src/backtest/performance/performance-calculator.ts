/**
 * Performance Calculator
 *
 * Aggregate statistics of a finished run, derived from the snapshot series
 * and the trade records. All dispersion measures use population definitions.
 */

import { daysBetween, type TradeRecord } from '@stocksim/shared';
import {
  DEFAULT_PERIODS_PER_YEAR,
  type AccountSnapshot,
  type PerformanceMetrics,
  type PerformanceOptions,
} from '../types.js';

/**
 * One point of the realized balance curve
 */
export interface DailyPnlPoint {
  date: string;
  /** Net P&L of trades closed on this date */
  pnl: number;
  cumulativePnl: number;
  /** initialCapital + cumulativePnl */
  balance: number;
  trades: number;
}

// =============================================================================
// HELPERS
// =============================================================================

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function populationStd(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

/**
 * Keep the last snapshot of every trading date
 */
export function collapseToDaily(snapshots: readonly AccountSnapshot[]): AccountSnapshot[] {
  const byDate = new Map<string, AccountSnapshot>();
  for (const snapshot of snapshots) {
    byDate.set(snapshot.date, snapshot);
  }
  return [...byDate.values()];
}

/**
 * Largest peak-to-trough decline, starting from the initial capital
 */
export function calculateMaxDrawdown(
  equityCurve: readonly number[],
  initialCapital: number
): { maxDrawdown: number; maxDrawdownPct: number } {
  let peak = initialCapital;
  let maxDrawdown = 0;
  let maxDrawdownPct = 0;

  for (const equity of equityCurve) {
    if (equity > peak) {
      peak = equity;
      continue;
    }
    const drawdown = peak - equity;
    if (drawdown > maxDrawdown) {
      maxDrawdown = drawdown;
      maxDrawdownPct = peak > 0 ? (drawdown / peak) * 100 : 0;
    }
  }

  return { maxDrawdown, maxDrawdownPct };
}

// =============================================================================
// METRICS
// =============================================================================

export function calculatePerformance(
  snapshots: readonly AccountSnapshot[],
  trades: readonly TradeRecord[],
  initialCapital: number,
  options: PerformanceOptions = {}
): PerformanceMetrics {
  const periodsPerYear = options.periodsPerYear ?? DEFAULT_PERIODS_PER_YEAR;
  const riskFreeRate = options.riskFreeRate ?? 0;

  const last = snapshots[snapshots.length - 1];
  const finalEquity = last?.equity ?? initialCapital;
  const totalReturn = (finalEquity - initialCapital) / initialCapital;

  // Equity curve and period returns on end-of-day values
  const daily = collapseToDaily(snapshots);
  const first = daily[0];
  const lastDay = daily[daily.length - 1];
  const elapsedDays = first && lastDay ? daysBetween(first.date, lastDay.date) : 0;

  let annualizedReturn = 0;
  if (elapsedDays > 0) {
    annualizedReturn = 1 + totalReturn > 0 ? (1 + totalReturn) ** (365 / elapsedDays) - 1 : -1;
  }

  const returns: number[] = [];
  let previous = initialCapital;
  for (const { equity } of daily) {
    returns.push(previous > 0 ? equity / previous - 1 : 0);
    previous = equity;
  }

  const std = populationStd(returns);
  const volatility = std * Math.sqrt(periodsPerYear);
  const excess = mean(returns) - riskFreeRate / periodsPerYear;
  const sharpeRatio = std > 0 ? (excess / std) * Math.sqrt(periodsPerYear) : 0;

  const { maxDrawdown, maxDrawdownPct } = calculateMaxDrawdown(
    snapshots.map((s) => s.equity),
    initialCapital
  );

  // Trade statistics
  const winning = trades.filter((t) => t.realizedPnl > 0);
  const losing = trades.filter((t) => t.realizedPnl < 0);
  const grossProfit = winning.reduce((sum, t) => sum + t.realizedPnl, 0);
  const grossLoss = Math.abs(losing.reduce((sum, t) => sum + t.realizedPnl, 0));

  let profitFactor = 0;
  if (grossLoss > 0) {
    profitFactor = grossProfit / grossLoss;
  } else if (grossProfit > 0) {
    profitFactor = Infinity;
  }

  return {
    initialCapital,
    finalEquity,
    totalReturn,
    annualizedReturn,
    maxDrawdown,
    maxDrawdownPct,
    totalTrades: trades.length,
    wins: winning.length,
    losses: losing.length,
    winRate: trades.length > 0 ? winning.length / trades.length : 0,
    avgWin: winning.length > 0 ? grossProfit / winning.length : 0,
    avgLoss: losing.length > 0 ? grossLoss / losing.length : 0,
    profitFactor,
    realizedPnl: trades.reduce((sum, t) => sum + t.realizedPnl, 0),
    totalCommission: last?.totalCommission ?? trades.reduce((sum, t) => sum + t.commission, 0),
    volatility,
    sharpeRatio,
    periods: returns.length,
  };
}

/**
 * Realized balance curve: net P&L per close date, accumulated
 */
export function buildDailyPnlSeries(trades: readonly TradeRecord[], initialCapital: number): DailyPnlPoint[] {
  const byDate = new Map<string, { pnl: number; trades: number }>();
  for (const trade of trades) {
    const entry = byDate.get(trade.closeDate) ?? { pnl: 0, trades: 0 };
    entry.pnl += trade.netPnl;
    entry.trades += 1;
    byDate.set(trade.closeDate, entry);
  }

  let cumulativePnl = 0;
  return [...byDate.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, { pnl, trades: count }]) => {
      cumulativePnl += pnl;
      return { date, pnl, cumulativePnl, balance: initialCapital + cumulativePnl, trades: count };
    });
}
