import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError } from '../backtest/errors.js';
import { MomentumStrategy } from '../backtest/strategies/momentum.strategy.js';
import { StrategyRegistry, createDefaultRegistry } from './strategy-registry.js';

describe('StrategyRegistry', () => {
  it('should list the built-in strategies', () => {
    expect(createDefaultRegistry().list()).toEqual(['Momentum', 'SimpleLong', 'SmaReversion']);
  });

  it('should create a fresh instance on every call', () => {
    const registry = createDefaultRegistry();

    const first = registry.create('SimpleLong');
    const second = registry.create('SimpleLong');

    expect(first.name).toBe('SimpleLong');
    expect(first).not.toBe(second);
  });

  it('should pass base options to the factory', () => {
    expect(() => createDefaultRegistry().create('Momentum', { closeFraction: 2 })).toThrow(
      'closeFraction must be in (0, 1]'
    );
  });

  it('should reject unknown names as a configuration error', () => {
    const registry = createDefaultRegistry();

    expect(() => registry.create('Nope')).toThrow(InvalidConfigurationError);
    expect(() => registry.create('Nope')).toThrow('unknown strategy "Nope"');
  });

  it('should refuse duplicate registrations', () => {
    const registry = new StrategyRegistry().register('M', (options) => new MomentumStrategy({}, options));

    expect(registry.has('M')).toBe(true);
    expect(() => registry.register('M', (options) => new MomentumStrategy({}, options))).toThrow(
      'Strategy "M" is already registered'
    );
  });
});
