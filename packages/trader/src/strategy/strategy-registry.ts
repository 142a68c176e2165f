/**
 * Strategy Registry
 *
 * Maps strategy names to factories. Every create() call returns a new
 * instance, so concurrent runs never share strategy state.
 */

import { InvalidConfigurationError } from '../backtest/errors.js';
import { createMomentumStrategy } from '../backtest/strategies/momentum.strategy.js';
import { createSimpleLongStrategy } from '../backtest/strategies/simple-long.strategy.js';
import { createSmaReversionStrategy } from '../backtest/strategies/sma-reversion.strategy.js';
import type { BaseStrategyOptions, StockStrategy } from './base-strategy.js';

export type StrategyFactory = (options: BaseStrategyOptions) => StockStrategy;

export class StrategyRegistry {
  private readonly factories = new Map<string, StrategyFactory>();

  register(name: string, factory: StrategyFactory): this {
    if (this.factories.has(name)) {
      throw new Error(`Strategy "${name}" is already registered`);
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  list(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * @throws InvalidConfigurationError for an unknown name
   */
  create(name: string, options: BaseStrategyOptions = {}): StockStrategy {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new InvalidConfigurationError([
        `strategyName: unknown strategy "${name}" (available: ${this.list().join(', ')})`,
      ]);
    }
    return factory(options);
  }
}

/**
 * Registry holding the built-in strategies
 */
export function createDefaultRegistry(): StrategyRegistry {
  return new StrategyRegistry()
    .register('SimpleLong', (options) => createSimpleLongStrategy({}, options))
    .register('Momentum', (options) => createMomentumStrategy({}, options))
    .register('SmaReversion', (options) => createSmaReversionStrategy({}, options));
}
