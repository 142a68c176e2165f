import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { backtestResult, tradeRecord } from '../../test-utils/fixtures.js';
import { buildTradeReport, exportTradeReportCSV, tradeReportToCSV } from './trade-report.js';

describe('buildTradeReport', () => {
  it('should order by close date with ties by id and accumulate P&L', () => {
    const rows = buildTradeReport(
      [tradeRecord(3, '2024-01-05', 250), tradeRecord(1, '2024-01-05', 1000), tradeRecord(2, '2024-01-03', -500.5)],
      1_000_000
    );

    expect(rows.map((row) => row.id)).toEqual([2, 1, 3]);
    expect(rows.map((row) => row.cumulativePnl)).toEqual([-500.5, 499.5, 749.5]);
    expect(rows.map((row) => row.cumulativeBalance)).toEqual([999_499.5, 1_000_499.5, 1_000_749.5]);
  });

  it('should return no rows without trades', () => {
    expect(buildTradeReport([], 1_000_000)).toEqual([]);
  });
});

describe('tradeReportToCSV', () => {
  it('should write a header and fixed-decimal rows', () => {
    const csv = tradeReportToCSV(buildTradeReport([tradeRecord(2, '2024-01-03', -500.5)], 1_000_000));

    expect(csv.split('\n')).toEqual([
      'id,instrumentId,openDate,closeDate,side,quantity,openPrice,closePrice,realizedPnl,commission,netPnl,roi,cumulativePnl,cumulativeBalance',
      '2,S2,2024-01-02,2024-01-03,long,1000,100,101,-490.50,10,-500.50,1.25,-500.50,999499.50',
    ]);
  });
});

describe('exportTradeReportCSV', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trade-report-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create missing directories and write the report', () => {
    const target = path.join(dir, 'nested', 'trades.csv');

    const written = exportTradeReportCSV(backtestResult({ trades: [tradeRecord(1, '2024-01-05', 1000)] }), target);

    expect(written).toBe(target);
    const lines = fs.readFileSync(target, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe('1,S1,2024-01-02,2024-01-05,long,1000,100,101,1010,10,1000,1.25,1000,1001000');
    expect(lines[2]).toBe('');
  });
});
