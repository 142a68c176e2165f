/**
 * Backtest Engine - Core Components
 */

export {
  BacktestDriver,
  createBacktestDriver,
  validateStrategy,
  type BacktestDriverOptions,
  type BacktestDriverEvents,
} from './backtest-driver.js';

export {
  OrderExecutor,
  createOrderExecutor,
  resolveFillPrice,
  type OrderExecutorOptions,
  type ExecutionReport,
} from './order-executor.js';
