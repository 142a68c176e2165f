/**
 * Backtest Reporters
 */

export {
  printBacktestResult,
  printMetrics,
  printTradeReport,
  printCompactSummary,
} from './console-reporter.js';

export {
  toJSON,
  exportToJSON,
  generateFilename,
  quickExport,
  type JSONExportOptions,
} from './json-reporter.js';

export {
  buildTradeReport,
  tradeReportToCSV,
  exportTradeReportCSV,
  type TradeReportRow,
} from './trade-report.js';
