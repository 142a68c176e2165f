/**
 * Backtest Strategies
 *
 * Pre-built strategies implementing the StockStrategy capability set.
 */

export {
  SimpleLongStrategy,
  createSimpleLongStrategy,
  DEFAULT_SIMPLE_LONG_PARAMS,
  type SimpleLongParams,
} from './simple-long.strategy.js';

export {
  MomentumStrategy,
  createMomentumStrategy,
  DEFAULT_MOMENTUM_PARAMS,
  type MomentumParams,
} from './momentum.strategy.js';

export {
  SmaReversionStrategy,
  createSmaReversionStrategy,
  DEFAULT_SMA_REVERSION_PARAMS,
  type SmaReversionParams,
} from './sma-reversion.strategy.js';
