/**
 * Backtest Engine
 *
 * Deterministic day-by-day (or tick-by-tick) simulation of a stock strategy
 * against a virtual brokerage account.
 *
 * @example
 * ```typescript
 * import {
 *   runBacktest,
 *   loadQuotesFromCSV,
 *   createQuoteSource,
 *   printBacktestResult,
 *   exportTradeReportCSV,
 * } from './backtest';
 *
 * // Load data
 * const { quotes } = loadQuotesFromCSV('daily-quotes.csv', { granularity: 'bar' });
 *
 * // Run backtest
 * const result = runBacktest({
 *   config: {
 *     strategyName: 'SimpleLong',
 *     initialCapital: 1_000_000,
 *     maxHoldings: 5,
 *     startDate: '2024-01-02',
 *     endDate: '2024-06-28',
 *   },
 *   source: createQuoteSource(quotes),
 * });
 *
 * // Print and export
 * printBacktestResult(result);
 * exportTradeReportCSV(result, 'trades.csv');
 * ```
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Engine
export {
  BacktestDriver,
  createBacktestDriver,
  validateStrategy,
  OrderExecutor,
  createOrderExecutor,
  resolveFillPrice,
  type BacktestDriverOptions,
  type BacktestDriverEvents,
  type OrderExecutorOptions,
  type ExecutionReport,
} from './engine/index.js';

// Data
export {
  parseQuotesCSV,
  loadQuotesFromCSV,
  loadQuotesFromMultipleCSV,
  InMemoryQuoteSource,
  createQuoteSource,
  type CSVLoadOptions,
  type CSVLoadResult,
  type QuoteSource,
  type QuoteTimestep,
} from './data/index.js';

// Performance
export * from './performance/index.js';

// Strategies
export * from './strategies/index.js';

// Runners
export {
  runBacktest,
  runBacktestSuite,
  type RunBacktestOptions,
  type SuiteRunOptions,
  type SuiteEntry,
} from './runners/index.js';

// Reporters
export {
  printBacktestResult,
  printMetrics,
  printTradeReport,
  printCompactSummary,
  toJSON,
  exportToJSON,
  generateFilename,
  quickExport,
  buildTradeReport,
  tradeReportToCSV,
  exportTradeReportCSV,
  type JSONExportOptions,
  type TradeReportRow,
} from './reporters/index.js';
