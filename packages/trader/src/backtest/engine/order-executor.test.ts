import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger, type Order, type Quote } from '@stocksim/shared';
import { Account } from '../../accounting/account.js';
import { DEFAULT_COMMISSION } from '../types.js';
import { OrderExecutor, resolveFillPrice, type OrderExecutorOptions } from './order-executor.js';

function quote(instrumentId: string, currentPrice: number, date = '2024-01-02'): Quote {
  return {
    instrumentId,
    timestamp: Date.parse(`${date}T00:00:00Z`),
    date,
    granularity: 'bar',
    open: currentPrice,
    high: currentPrice,
    low: currentPrice,
    close: currentPrice,
    volume: 10_000,
    currentPrice,
  };
}

function order(overrides: Partial<Order> = {}): Order {
  return {
    instrumentId: 'A',
    timestamp: Date.UTC(2024, 0, 2),
    date: '2024-01-02',
    action: 'buy',
    side: 'long',
    price: 100,
    lots: 1,
    ...overrides,
  };
}

function executor(account: Account, overrides: Partial<OrderExecutorOptions> = {}): OrderExecutor {
  return new OrderExecutor(account, {
    fillPrice: 'quote',
    slippagePct: 0,
    commission: { type: 'none' },
    enableIntraday: true,
    logger: createSilentLogger(),
    ...overrides,
  });
}

describe('resolveFillPrice', () => {
  const q = quote('A', 100);

  it('should use the requested price under the order model', () => {
    expect(resolveFillPrice('order', order({ price: 99 }), q, 0)).toBe(99);
  });

  it('should use the quote price under the quote model', () => {
    expect(resolveFillPrice('quote', order({ price: 99 }), q, 0)).toBe(100);
  });

  it('should move the price against the trader under the slippage model', () => {
    expect(resolveFillPrice('slippage', order({ action: 'buy' }), q, 0.01)).toBeCloseTo(101, 10);
    expect(resolveFillPrice('slippage', order({ action: 'sell' }), q, 0.01)).toBeCloseTo(99, 10);
  });
});

describe('OrderExecutor', () => {
  let account: Account;

  beforeEach(() => {
    account = new Account({ initialCapital: 1_000_000 });
  });

  it('should fill at the quote price by default', () => {
    const report = executor(account).execute([order({ price: 99 })], [quote('A', 100)], 'open');

    expect(report.fills).toHaveLength(1);
    expect(report.fills[0]?.price).toBe(100);
    expect(account.balance).toBe(900_000);
  });

  it('should charge commission on the filled notional', () => {
    const report = executor(account, { commission: DEFAULT_COMMISSION }).execute(
      [order()],
      [quote('A', 100)],
      'open'
    );

    expect(report.fills[0]?.commission).toBeCloseTo(42.75, 10);
    expect(account.balance).toBeCloseTo(899_957.25, 6);
  });

  it('should skip orders without a quote and keep going', () => {
    const report = executor(account).execute(
      [order({ instrumentId: 'X' }), order()],
      [quote('A', 100)],
      'open'
    );

    expect(report.fills).toHaveLength(1);
    expect(report.rejections).toHaveLength(1);
    expect(report.rejections[0]).toMatchObject({ phase: 'open', code: 'NO_QUOTE' });
    expect(report.rejections[0]?.order.instrumentId).toBe('X');
  });

  it('should reject unaffordable buys and continue with the batch', () => {
    const small = new Account({ initialCapital: 150_000 });
    const report = executor(small).execute(
      [order(), order({ instrumentId: 'B' }), order({ instrumentId: 'C', lots: 0 })],
      [quote('A', 100), quote('B', 100), quote('C', 10)],
      'open'
    );

    expect(report.fills).toHaveLength(1);
    expect(report.rejections.map((r) => r.code)).toEqual(['INSUFFICIENT_FUNDS', 'ORDER_REJECTED']);
    expect(small.balance).toBe(50_000);
  });

  it('should reject malformed orders before touching the account', () => {
    const report = executor(account).execute([order({ lots: 2.5 })], [quote('A', 100)], 'open');

    expect(report.fills).toEqual([]);
    expect(report.rejections[0]?.reason).toBe('Malformed order: lots: Expected integer, received float');
    expect(account.balance).toBe(1_000_000);
  });

  it('should reject same-day closes when intraday trading is disabled', () => {
    const exec = executor(account, { enableIntraday: false });
    exec.execute([order()], [quote('A', 100)], 'open');

    const sameDay = exec.execute([order({ action: 'sell' })], [quote('A', 105)], 'close');

    expect(sameDay.fills).toHaveLength(0);
    expect(sameDay.rejections[0]?.code).toBe('ORDER_REJECTED');
    expect(sameDay.rejections[0]?.reason).toContain('Intraday trading disabled');
    expect(account.hasPosition('A')).toBe(true);

    const nextDay = exec.execute(
      [order({ action: 'sell', date: '2024-01-03', timestamp: Date.UTC(2024, 0, 3) })],
      [quote('A', 105, '2024-01-03')],
      'close'
    );
    expect(nextDay.fills).toHaveLength(1);
    expect(account.hasPosition('A')).toBe(false);
  });

  it('should allow same-day closes when intraday trading is enabled', () => {
    const exec = executor(account);
    exec.execute([order()], [quote('A', 100)], 'open');

    const report = exec.execute([order({ action: 'sell' })], [quote('A', 105)], 'close');

    expect(report.fills[0]?.records[0]?.realizedPnl).toBe(5_000);
  });

  it('should report closes against missing positions as rejections', () => {
    const report = executor(account).execute([order({ action: 'sell' })], [quote('A', 100)], 'stopLoss');

    expect(report.rejections[0]).toMatchObject({ phase: 'stopLoss', code: 'POSITION_NOT_FOUND' });
  });
});
