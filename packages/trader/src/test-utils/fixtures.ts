/**
 * Test fixtures shared by the engine and strategy tests
 */

import type { Order, Quote, TradeRecord } from '@stocksim/shared';
import { Account } from '../accounting/account.js';
import { validateBacktestConfig, type BacktestConfigInput } from '../config/backtest-config.js';
import { InMemoryQuoteSource } from '../backtest/data/quote-source.js';
import type { StockStrategy } from '../strategy/base-strategy.js';
import type { BacktestConfig, BacktestResult, PerformanceMetrics } from '../backtest/types.js';

/**
 * Daily bar with every price at `close`
 */
export function bar(instrumentId: string, date: string, close: number, volume = 1_000_000): Quote {
  return {
    instrumentId,
    timestamp: Date.parse(`${date}T00:00:00Z`),
    date,
    granularity: 'bar',
    open: close,
    high: close,
    low: close,
    close,
    volume,
    currentPrice: close,
  };
}

export function tick(instrumentId: string, iso: string, price: number, volume = 1000): Quote {
  return {
    instrumentId,
    timestamp: Date.parse(iso),
    date: iso.slice(0, 10),
    granularity: 'tick',
    open: price,
    high: price,
    low: price,
    close: price,
    volume,
    currentPrice: price,
  };
}

/**
 * Config with no commission over January 2024 unless overridden
 */
export function testConfig(overrides: Partial<BacktestConfigInput> = {}): BacktestConfig {
  return validateBacktestConfig({
    strategyName: 'Test',
    initialCapital: 1_000_000,
    startDate: '2024-01-01',
    endDate: '2024-01-31',
    commission: { type: 'none' },
    ...overrides,
  });
}

/**
 * Wire a strategy to a fresh account and an in-memory source
 */
export function setupStrategy<S extends StockStrategy>(
  strategy: S,
  quotes: Quote[] = [],
  overrides: Partial<BacktestConfigInput> = {}
): { strategy: S; account: Account; config: BacktestConfig } {
  const config = testConfig(overrides);
  const account = new Account({ initialCapital: config.initialCapital, lotSize: config.lotSize });
  strategy.setupAccount(account, config);
  strategy.setupDataSources(new InMemoryQuoteSource(quotes));
  return { strategy, account, config };
}

/**
 * Opening long order for seeding an account directly
 */
export function buyOrder(instrumentId: string, date: string, price: number, lots: number): Order {
  return {
    instrumentId,
    timestamp: Date.parse(`${date}T00:00:00Z`),
    date,
    action: 'buy',
    side: 'long',
    price,
    lots,
  };
}

/**
 * Closed long round trip of 1000 shares opened on 2024-01-02
 */
export function tradeRecord(id: number, closeDate: string, netPnl: number): TradeRecord {
  return {
    id,
    positionId: id,
    instrumentId: `S${id}`,
    side: 'long',
    openTimestamp: Date.parse('2024-01-02T00:00:00Z'),
    openDate: '2024-01-02',
    closeTimestamp: Date.parse(`${closeDate}T00:00:00Z`),
    closeDate,
    openPrice: 100,
    closePrice: 101,
    quantity: 1000,
    realizedPnl: netPnl + 10,
    commission: 10,
    netPnl,
    roi: 1.25,
  };
}

export function performanceMetrics(overrides: Partial<PerformanceMetrics> = {}): PerformanceMetrics {
  return {
    initialCapital: 1_000_000,
    finalEquity: 1_012_300,
    totalReturn: 0.0123,
    annualizedReturn: 0.2,
    maxDrawdown: 25_000,
    maxDrawdownPct: 2.5,
    totalTrades: 3,
    wins: 2,
    losses: 1,
    winRate: 0.5,
    avgWin: 600,
    avgLoss: 500.5,
    profitFactor: 2.4,
    realizedPnl: 779.5,
    totalCommission: 30,
    volatility: 0.15,
    sharpeRatio: 1.1,
    periods: 20,
    ...overrides,
  };
}

/**
 * Finished run over testConfig() with the given trades
 */
export function backtestResult(overrides: Partial<BacktestResult> = {}): BacktestResult {
  return {
    runId: 'run-1',
    strategyName: 'Test',
    config: testConfig(),
    state: 'DONE',
    snapshots: [],
    trades: [],
    orders: [],
    rejections: [],
    dataGaps: [],
    metrics: performanceMetrics(),
    finalCash: 1_000_000,
    timesteps: 22,
    executedAt: new Date('2024-02-01T09:30:15.123Z'),
    executionTimeMs: 5,
    ...overrides,
  };
}
