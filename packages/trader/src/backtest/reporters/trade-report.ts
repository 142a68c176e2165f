/**
 * Trade Report
 *
 * One row per trade record, in close order, with running P&L and balance.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { PositionSide, TradeRecord } from '@stocksim/shared';
import type { BacktestResult } from '../types.js';

export interface TradeReportRow {
  id: number;
  instrumentId: string;
  openDate: string;
  closeDate: string;
  side: PositionSide;
  /** Shares */
  quantity: number;
  openPrice: number;
  closePrice: number;
  realizedPnl: number;
  commission: number;
  netPnl: number;
  /** In % of cost basis */
  roi: number;
  /** Running sum of netPnl */
  cumulativePnl: number;
  /** initialCapital + cumulativePnl */
  cumulativeBalance: number;
}

const COLUMNS: readonly (keyof TradeReportRow)[] = [
  'id',
  'instrumentId',
  'openDate',
  'closeDate',
  'side',
  'quantity',
  'openPrice',
  'closePrice',
  'realizedPnl',
  'commission',
  'netPnl',
  'roi',
  'cumulativePnl',
  'cumulativeBalance',
];

/**
 * Rows ordered by close date, ties by record id
 */
export function buildTradeReport(trades: readonly TradeRecord[], initialCapital: number): TradeReportRow[] {
  const ordered = [...trades].sort((a, b) =>
    a.closeDate === b.closeDate ? a.id - b.id : a.closeDate < b.closeDate ? -1 : 1
  );

  let cumulativePnl = 0;
  return ordered.map((trade) => {
    cumulativePnl += trade.netPnl;
    return {
      id: trade.id,
      instrumentId: trade.instrumentId,
      openDate: trade.openDate,
      closeDate: trade.closeDate,
      side: trade.side,
      quantity: trade.quantity,
      openPrice: trade.openPrice,
      closePrice: trade.closePrice,
      realizedPnl: trade.realizedPnl,
      commission: trade.commission,
      netPnl: trade.netPnl,
      roi: trade.roi,
      cumulativePnl,
      cumulativeBalance: initialCapital + cumulativePnl,
    };
  });
}

function formatCell(value: string | number): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value.toString() : value.toFixed(2);
  }
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Header line plus one line per row; non-integer numbers get two decimals
 */
export function tradeReportToCSV(rows: readonly TradeReportRow[]): string {
  const lines = [COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(COLUMNS.map((column) => formatCell(row[column])).join(','));
  }
  return lines.join('\n');
}

/**
 * Write the trade report of a run; returns the written path
 */
export function exportTradeReportCSV(result: BacktestResult, outputPath: string): string {
  const rows = buildTradeReport(result.trades, result.config.initialCapital);

  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, tradeReportToCSV(rows) + '\n', 'utf-8');
  return outputPath;
}
