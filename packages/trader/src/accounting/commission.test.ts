import { describe, it, expect } from 'vitest';
import { calculateCommission } from './commission.js';
import { DEFAULT_COMMISSION } from '../backtest/types.js';

describe('calculateCommission', () => {
  it('should charge nothing under the none model', () => {
    expect(calculateCommission({ type: 'none' }, 'buy', 100, 1000)).toBe(0);
  });

  it('should charge a flat fee under the fixed model', () => {
    expect(calculateCommission({ type: 'fixed', fee: 15 }, 'sell', 100, 5000)).toBe(15);
  });

  it('should apply the discounted rate on buys', () => {
    // 100 * 1000 * 0.001425 * 0.3 = 42.75
    expect(calculateCommission(DEFAULT_COMMISSION, 'buy', 100, 1000)).toBeCloseTo(42.75, 10);
  });

  it('should floor the fee at minFee', () => {
    // 10 * 1000 * 0.001425 * 0.3 = 4.275 -> 20
    expect(calculateCommission(DEFAULT_COMMISSION, 'buy', 10, 1000)).toBe(20);
  });

  it('should add transaction tax on sells', () => {
    // fee 42.75 + tax 100 * 1000 * 0.003 = 300
    expect(calculateCommission(DEFAULT_COMMISSION, 'sell', 100, 1000)).toBeCloseTo(342.75, 10);
  });
});
