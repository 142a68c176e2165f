/**
 * Backtest Runners
 */

export {
  runBacktest,
  runBacktestSuite,
  type RunBacktestOptions,
  type SuiteRunOptions,
  type SuiteEntry,
} from './backtest-runner.js';
