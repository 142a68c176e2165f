/**
 * Backtest entry point
 *
 * Reads the run configuration from BACKTEST_* variables, loads quotes from
 * BACKTEST_QUOTES_CSV (comma-separated paths allowed), runs the configured
 * strategy and writes the JSON result and trade report to
 * BACKTEST_OUTPUT_DIR.
 *
 * Usage: npm run backtest
 */

import { createLogger, parseLogLevel } from '@stocksim/shared';
import { loadBacktestConfig } from '../config/backtest-config.js';
import { loadQuotesFromMultipleCSV } from './data/csv-loader.js';
import { createQuoteSource } from './data/quote-source.js';
import { isBacktestError, StrategyCallbackError } from './errors.js';
import { buildTradeReport, printBacktestResult, printTradeReport, quickExport } from './reporters/index.js';
import { runBacktest } from './runners/index.js';

async function main(): Promise<void> {
  const config = loadBacktestConfig();
  const logger = createLogger({
    service: 'backtest',
    level: parseLogLevel(process.env.LOG_LEVEL),
    file: true,
  });

  const csvPaths = (process.env.BACKTEST_QUOTES_CSV ?? './backtest-data/daily-quotes.csv')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p !== '');

  const { quotes, skipped } = loadQuotesFromMultipleCSV(csvPaths, {
    granularity: config.granularity === 'tick' ? 'tick' : 'bar',
    onInvalidRow: (line, reason) => logger.warn('Invalid quote row skipped', { line, reason }),
  });
  logger.info('Quotes loaded', { files: csvPaths, quotes: quotes.length, skipped });

  try {
    const result = runBacktest({ config, source: createQuoteSource(quotes), logger });

    printBacktestResult(result);
    printTradeReport(buildTradeReport(result.trades, config.initialCapital));

    const written = quickExport(result, process.env.BACKTEST_OUTPUT_DIR);
    console.log(`💾 Result: ${written.json}`);
    console.log(`💾 Trades: ${written.trades}`);
  } catch (error) {
    if (error instanceof StrategyCallbackError) {
      const written = quickExport(error.partialResult, process.env.BACKTEST_OUTPUT_DIR);
      console.error(`💾 Partial result: ${written.json}`);
    }
    throw error;
  } finally {
    await logger.close();
  }
}

main().catch((error: unknown) => {
  if (isBacktestError(error)) {
    console.error(`❌ ${error.code}: ${error.message}`);
  } else {
    console.error('❌ Error:', error);
  }
  process.exitCode = 1;
});
