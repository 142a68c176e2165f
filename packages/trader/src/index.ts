/**
 * @stocksim/trader - Backtest driver, virtual account and strategies
 */

// Accounting
export * from './accounting/index.js';

// Strategy interface and registry
export {
  BaseStockStrategy,
  type BaseStrategyOptions,
  type SignalCandidate,
  type StockStrategy,
} from './strategy/base-strategy.js';
export { StrategyRegistry, createDefaultRegistry, type StrategyFactory } from './strategy/strategy-registry.js';

// Configuration
export {
  BacktestConfigSchema,
  CommissionModelSchema,
  validateBacktestConfig,
  loadBacktestConfig,
  type BacktestConfigInput,
} from './config/backtest-config.js';

// Backtesting
export * from './backtest/index.js';
