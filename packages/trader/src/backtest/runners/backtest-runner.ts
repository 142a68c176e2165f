/**
 * Backtest Runner
 *
 * Resolves the configured strategy by name and runs it to completion on its
 * own driver and account. Suites run configurations one after another.
 */

import { createSilentLogger, type Logger } from '@stocksim/shared';
import { validateBacktestConfig, type BacktestConfigInput } from '../../config/backtest-config.js';
import type { BaseStrategyOptions } from '../../strategy/base-strategy.js';
import { createDefaultRegistry, type StrategyRegistry } from '../../strategy/strategy-registry.js';
import type { QuoteSource } from '../data/quote-source.js';
import { BacktestDriver } from '../engine/backtest-driver.js';
import { isBacktestError, StrategyCallbackError, type BacktestError } from '../errors.js';
import type { AccountSnapshot, BacktestResult } from '../types.js';

/**
 * Options for running a backtest
 */
export interface RunBacktestOptions {
  config: BacktestConfigInput;
  source: QuoteSource;
  /** Strategy lookup (default: the built-in strategies) */
  registry?: StrategyRegistry;
  /** Passed to the strategy factory */
  strategyOptions?: BaseStrategyOptions;
  logger?: Logger;
  /** Called after every processed timestep */
  onProgress?: (snapshot: AccountSnapshot) => void;
}

export type SuiteRunOptions = Omit<RunBacktestOptions, 'config'>;

/**
 * Outcome of one suite entry. A failed entry keeps the partial result when
 * the strategy aborted mid-run.
 */
export type SuiteEntry =
  | { ok: true; config: BacktestConfigInput; result: BacktestResult }
  | { ok: false; config: BacktestConfigInput; error: BacktestError; partialResult?: BacktestResult };

/**
 * Run a backtest with the strategy named by config.strategyName
 *
 * @throws InvalidConfigurationError for a bad configuration or unknown strategy
 * @throws StrategyCallbackError when the strategy throws during the run
 */
export function runBacktest(options: RunBacktestOptions): BacktestResult {
  const config = validateBacktestConfig(options.config);
  const registry = options.registry ?? createDefaultRegistry();
  const strategy = registry.create(config.strategyName, options.strategyOptions);

  const driver = new BacktestDriver({
    config,
    strategy,
    source: options.source,
    logger: options.logger,
  });

  if (options.onProgress) {
    driver.on('snapshot', options.onProgress);
  }

  return driver.run();
}

/**
 * Run each configuration in order; a failing entry does not stop the suite.
 * Errors outside the backtest taxonomy propagate.
 */
export function runBacktestSuite(configs: readonly BacktestConfigInput[], options: SuiteRunOptions): SuiteEntry[] {
  const logger = options.logger ?? createSilentLogger('runner');
  const entries: SuiteEntry[] = [];

  configs.forEach((config, index) => {
    try {
      const result = runBacktest({ ...options, config });
      entries.push({ ok: true, config, result });
    } catch (error) {
      if (!isBacktestError(error)) throw error;

      logger.error('Suite entry failed', { index, code: error.code, error: error.message });
      entries.push({
        ok: false,
        config,
        error,
        partialResult: error instanceof StrategyCallbackError ? error.partialResult : undefined,
      });
    }
  });

  return entries;
}
