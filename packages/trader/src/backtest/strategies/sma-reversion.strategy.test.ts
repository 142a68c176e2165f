import { describe, it, expect } from 'vitest';
import { bar, buyOrder, setupStrategy } from '../../test-utils/fixtures.js';
import { SmaReversionStrategy } from './sma-reversion.strategy.js';

const PARAMS = { smaPeriod: 3, entryDiscountPct: 5, stopLossPct: 8, lookbackDays: 10 };
const HISTORY = [bar('A', '2024-01-02', 100), bar('A', '2024-01-03', 100), bar('A', '2024-01-04', 85)];

describe('SmaReversionStrategy', () => {
  it('should average earlier closes with the current price', () => {
    const { strategy } = setupStrategy(new SmaReversionStrategy(PARAMS), HISTORY);

    expect(strategy.movingAverage(bar('A', '2024-01-04', 85))).toBeCloseTo(95, 10);
    expect(strategy.movingAverage(bar('A', '2024-01-03', 100))).toBeNull();
  });

  it('should open when price sits far enough below the SMA', () => {
    const { strategy } = setupStrategy(new SmaReversionStrategy(PARAMS), HISTORY, { maxHoldings: 1 });

    const orders = strategy.checkOpenSignal([bar('A', '2024-01-04', 85)]);

    expect(orders).toHaveLength(1);
    // 1,000,000 / 85,000 per lot
    expect(orders[0]).toMatchObject({ instrumentId: 'A', action: 'buy', lots: 11, reason: '10.53% below SMA3' });
  });

  it('should close once price is back above the SMA', () => {
    const { strategy, account } = setupStrategy(new SmaReversionStrategy(PARAMS), HISTORY);
    account.applyFill(buyOrder('A', '2024-01-04', 85, 11), 85, 11, 0);

    // SMA of 100, 85 and 100 is 95
    const orders = strategy.checkCloseSignal([bar('A', '2024-01-05', 100)]);

    expect(orders[0]).toMatchObject({ action: 'sell', lots: 11, reason: 'back above SMA3' });
    expect(strategy.checkCloseSignal([bar('A', '2024-01-05', 90)])).toEqual([]);
  });

  it('should stop out below the loss limit', () => {
    const { strategy, account } = setupStrategy(new SmaReversionStrategy(PARAMS), HISTORY);
    account.applyFill(buyOrder('A', '2024-01-04', 85, 11), 85, 11, 0);

    expect(strategy.checkStopLossSignal([bar('A', '2024-01-05', 78)])).toHaveLength(1);
    expect(strategy.checkStopLossSignal([bar('A', '2024-01-05', 80)])).toEqual([]);
  });

  it('should reject a period shorter than two', () => {
    expect(() => new SmaReversionStrategy({ smaPeriod: 1 })).toThrow('smaPeriod must be an integer >= 2');
  });
});
