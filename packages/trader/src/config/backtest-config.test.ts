import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError } from '../backtest/errors.js';
import { DEFAULT_COMMISSION } from '../backtest/types.js';
import { loadBacktestConfig, validateBacktestConfig } from './backtest-config.js';

const MINIMAL = {
  strategyName: 'SimpleLong',
  initialCapital: 1_000_000,
  startDate: '2024-01-02',
  endDate: '2024-03-29',
};

function issuesOf(input: unknown): string[] {
  try {
    validateBacktestConfig(input);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe('validateBacktestConfig', () => {
  it('should fill defaults', () => {
    const config = validateBacktestConfig(MINIMAL);

    expect(config).toEqual({
      ...MINIMAL,
      granularity: 'bar',
      enableIntraday: true,
      positionSideDefault: 'long',
      lotSize: 1000,
      fillPrice: 'quote',
      slippagePct: 0,
      commission: DEFAULT_COMMISSION,
      riskFreeRate: 0,
      periodsPerYear: 252,
    });
    expect(config.maxHoldings).toBeUndefined();
  });

  it('should default optional percentage commission fields', () => {
    const config = validateBacktestConfig({ ...MINIMAL, commission: { type: 'percentage', rate: 0.001 } });

    expect(config.commission).toEqual({ type: 'percentage', rate: 0.001, discount: 1, minFee: 0, sellTaxRate: 0 });
  });

  it('should reject non-positive capital and bad maxHoldings', () => {
    const issues = issuesOf({ ...MINIMAL, initialCapital: 0, maxHoldings: 1.5 });

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^initialCapital: /);
    expect(issues[1]).toMatch(/^maxHoldings: /);
  });

  it('should reject malformed and reversed dates', () => {
    expect(issuesOf({ ...MINIMAL, startDate: '2024/01/02' })).toContain('startDate: Expected a YYYY-MM-DD date');
    expect(issuesOf({ ...MINIMAL, startDate: '2024-03-01', endDate: '2024-02-01' })).toEqual([
      'endDate: endDate 2024-02-01 is before startDate 2024-03-01',
    ]);
  });

  it('should reject mixed granularity', () => {
    expect(issuesOf({ ...MINIMAL, granularity: 'mixed' })).toEqual([
      'granularity: mixed granularity is not supported; use bar or tick',
    ]);
  });

  it('should throw InvalidConfigurationError with every issue in the message', () => {
    expect(() => validateBacktestConfig({})).toThrow(InvalidConfigurationError);
    expect(() => validateBacktestConfig({ ...MINIMAL, strategyName: '' })).toThrow(/^Invalid backtest configuration: strategyName: /);
  });
});

describe('loadBacktestConfig', () => {
  it('should read BACKTEST_* variables', () => {
    const config = loadBacktestConfig({
      BACKTEST_STRATEGY: 'Momentum',
      BACKTEST_INITIAL_CAPITAL: '500000',
      BACKTEST_MAX_HOLDINGS: '5',
      BACKTEST_GRANULARITY: 'tick',
      BACKTEST_START_DATE: '2024-01-02',
      BACKTEST_END_DATE: '2024-01-31',
      BACKTEST_ENABLE_INTRADAY: 'false',
      BACKTEST_UNIVERSE: '2330, 2317,',
      BACKTEST_COMMISSION: 'fixed',
      BACKTEST_COMMISSION_FEE: '25',
      BACKTEST_SLIPPAGE_PCT: '',
    });

    expect(config).toMatchObject({
      strategyName: 'Momentum',
      initialCapital: 500_000,
      maxHoldings: 5,
      granularity: 'tick',
      enableIntraday: false,
      universe: ['2330', '2317'],
      commission: { type: 'fixed', fee: 25 },
      slippagePct: 0,
      lotSize: 1000,
    });
  });

  it('should report unparseable numbers and unknown commission models', () => {
    expect(() =>
      loadBacktestConfig({
        BACKTEST_STRATEGY: 'Momentum',
        BACKTEST_INITIAL_CAPITAL: 'lots',
        BACKTEST_START_DATE: '2024-01-02',
        BACKTEST_END_DATE: '2024-01-31',
      })
    ).toThrow(/initialCapital/);

    expect(() =>
      loadBacktestConfig({
        BACKTEST_STRATEGY: 'Momentum',
        BACKTEST_INITIAL_CAPITAL: '1',
        BACKTEST_START_DATE: '2024-01-02',
        BACKTEST_END_DATE: '2024-01-31',
        BACKTEST_COMMISSION: 'bogus',
      })
    ).toThrow(/commission/);
  });
});
