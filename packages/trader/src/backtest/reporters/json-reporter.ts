/**
 * JSON Reporter for Backtest Results
 *
 * Exports backtest results to JSON files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildDailyPnlSeries } from '../performance/performance-calculator.js';
import { exportTradeReportCSV } from './trade-report.js';
import type { BacktestResult } from '../types.js';

/**
 * Options for JSON export
 */
export interface JSONExportOptions {
  /** Pretty print with indentation */
  pretty?: boolean;
  /** Include individual trades */
  includeTrades?: boolean;
  /** Include the account snapshot series */
  includeSnapshots?: boolean;
  /** Include every order the strategy produced */
  includeOrders?: boolean;
}

const DEFAULT_OPTIONS: JSONExportOptions = {
  pretty: true,
  includeTrades: true,
  includeSnapshots: true,
  includeOrders: false,
};

/**
 * Convert BacktestResult to a JSON-serializable object.
 *
 * A profit factor without losses is written as the string "Infinity".
 */
export function toJSON(
  result: BacktestResult,
  options?: JSONExportOptions
): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const json: Record<string, unknown> = {
    metadata: {
      runId: result.runId,
      strategyName: result.strategyName,
      state: result.state,
      executedAt: result.executedAt.toISOString(),
      executionTimeMs: result.executionTimeMs,
    },
    config: result.config,
    period: {
      startDate: result.config.startDate,
      endDate: result.config.endDate,
      timesteps: result.timesteps,
    },
    metrics: result.metrics && {
      ...result.metrics,
      profitFactor: Number.isFinite(result.metrics.profitFactor) ? result.metrics.profitFactor : 'Infinity',
    },
    finalCash: result.finalCash,
    dailyPnl: buildDailyPnlSeries(result.trades, result.config.initialCapital),
    rejections: result.rejections,
    dataGaps: result.dataGaps,
  };

  if (opts.includeTrades) {
    json.trades = result.trades;
  } else {
    json.tradeCount = result.trades.length;
  }

  if (opts.includeSnapshots) {
    json.snapshots = result.snapshots;
  } else {
    json.snapshotCount = result.snapshots.length;
  }

  if (opts.includeOrders) {
    json.orders = result.orders;
  }

  return json;
}

/**
 * Export backtest result to JSON file
 */
export function exportToJSON(
  result: BacktestResult,
  outputPath: string,
  options?: JSONExportOptions
): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const json = toJSON(result, opts);

  const content = opts.pretty
    ? JSON.stringify(json, null, 2)
    : JSON.stringify(json);

  // Ensure directory exists
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, content, 'utf-8');

  return outputPath;
}

/**
 * Generate default filename for result (without extension)
 */
export function generateFilename(result: BacktestResult): string {
  const [date, clock] = result.executedAt.toISOString().split('T');
  const time = clock?.split('.')[0]?.replace(/:/g, '');
  return `backtest_${result.strategyName}_${result.config.startDate}_${result.config.endDate}_${date}_${time}`;
}

/**
 * Export the JSON result and the trade report CSV side by side
 */
export function quickExport(
  result: BacktestResult,
  baseDir?: string
): { json: string; trades: string } {
  const dir = baseDir ?? path.join(process.cwd(), 'backtest-results');
  const filename = generateFilename(result);
  return {
    json: exportToJSON(result, path.join(dir, `${filename}.json`)),
    trades: exportTradeReportCSV(result, path.join(dir, `${filename}_trades.csv`)),
  };
}
