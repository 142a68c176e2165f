import { describe, it, expect, vi } from 'vitest';
import type { Order, Quote } from '@stocksim/shared';
import { bar } from '../../test-utils/fixtures.js';
import type { BacktestConfigInput } from '../../config/backtest-config.js';
import { BaseStockStrategy } from '../../strategy/base-strategy.js';
import { createDefaultRegistry, StrategyRegistry } from '../../strategy/strategy-registry.js';
import { InMemoryQuoteSource } from '../data/quote-source.js';
import { InvalidConfigurationError, StrategyCallbackError } from '../errors.js';
import type { AccountSnapshot } from '../types.js';
import { runBacktest, runBacktestSuite } from './backtest-runner.js';

class ExplodingStrategy extends BaseStockStrategy {
  readonly name = 'Exploding';

  checkOpenSignal(): Order[] {
    return [];
  }

  checkCloseSignal(quotes: readonly Quote[]): Order[] {
    if (quotes.some((quote) => quote.date === '2024-01-03')) throw new Error('boom');
    return [];
  }

  checkStopLossSignal(): Order[] {
    return [];
  }
}

// 10% gain on 6000 lots on 01-03, next-day exit on 01-04
const source = new InMemoryQuoteSource([
  bar('A', '2024-01-02', 100, 6_000_000),
  bar('A', '2024-01-03', 110, 6_000_000),
  bar('A', '2024-01-04', 111, 6_000_000),
]);

function config(strategyName: string, overrides: Partial<BacktestConfigInput> = {}): BacktestConfigInput {
  return {
    strategyName,
    initialCapital: 1_000_000,
    startDate: '2024-01-02',
    endDate: '2024-01-04',
    commission: { type: 'none' },
    ...overrides,
  };
}

describe('runBacktest', () => {
  it('should run a built-in strategy by name', () => {
    const result = runBacktest({ config: config('Momentum'), source });

    expect(result.state).toBe('DONE');
    expect(result.strategyName).toBe('Momentum');
    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ openDate: '2024-01-03', closeDate: '2024-01-04', quantity: 9000, realizedPnl: 9000 });
    expect(result.finalCash).toBe(1_009_000);
    expect(result.metrics?.totalReturn).toBeCloseTo(0.009);
  });

  it('should report progress once per timestep', () => {
    const onProgress = vi.fn<(snapshot: AccountSnapshot) => void>();

    runBacktest({ config: config('Momentum'), source, onProgress });

    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress.mock.calls.map(([snapshot]) => snapshot.date)).toEqual(['2024-01-02', '2024-01-03', '2024-01-04']);
  });

  it('should reject an unknown strategy name', () => {
    expect(() => runBacktest({ config: config('Nope'), source })).toThrow(/unknown strategy "Nope"/);
  });

  it('should validate the configuration before creating the strategy', () => {
    const factory = vi.fn(() => new ExplodingStrategy());
    const registry = new StrategyRegistry().register('Exploding', factory);

    expect(() => runBacktest({ config: config('Exploding', { initialCapital: -1 }), source, registry })).toThrow(
      InvalidConfigurationError
    );
    expect(factory).not.toHaveBeenCalled();
  });
});

describe('runBacktestSuite', () => {
  it('should keep running after a failed entry', () => {
    const registry = createDefaultRegistry().register('Exploding', () => new ExplodingStrategy());

    const entries = runBacktestSuite([config('Momentum'), config('Nope'), config('Exploding')], { source, registry });

    expect(entries.map((entry) => entry.ok)).toEqual([true, false, false]);

    const [first, second, third] = entries;
    if (first?.ok !== true || second?.ok !== false || third?.ok !== false) throw new Error('unexpected outcomes');

    expect(first.result.trades).toHaveLength(1);
    expect(second.error).toBeInstanceOf(InvalidConfigurationError);
    expect(second.partialResult).toBeUndefined();
    expect(third.error).toBeInstanceOf(StrategyCallbackError);
    expect(third.partialResult?.state).toBe('ABORTED');
    expect(third.partialResult?.timesteps).toBe(1);
  });

  it('should give every entry its own account', () => {
    const entries = runBacktestSuite([config('Momentum'), config('Momentum')], { source });

    const cash = entries.map((entry) => (entry.ok ? entry.result.finalCash : null));
    expect(cash).toEqual([1_009_000, 1_009_000]);
  });

  it('should propagate errors outside the backtest taxonomy', () => {
    const registry = new StrategyRegistry().register('Broken', () => {
      throw new TypeError('factory bug');
    });

    expect(() => runBacktestSuite([config('Broken')], { source, registry })).toThrow(TypeError);
  });
});
