/**
 * Console Reporter for Backtest Results
 *
 * Pretty-prints backtest results to the console.
 */

import type { BacktestResult, PerformanceMetrics } from '../types.js';
import type { TradeReportRow } from './trade-report.js';

/**
 * Format a number with fixed decimals
 */
function fmt(n: number, decimals: number = 2): string {
  return n.toFixed(decimals);
}

/**
 * Format currency
 */
function fmtCurrency(n: number): string {
  return `$${fmt(n)}`;
}

/**
 * Format percentage from a fraction (0.125 → 12.5%)
 */
function fmtPct(fraction: number): string {
  return `${fmt(fraction * 100, 1)}%`;
}

function fmtRatio(n: number): string {
  return n === Infinity ? '∞' : fmt(n);
}

/**
 * Create a horizontal line
 */
function line(char: string = '─', length: number = 60): string {
  return char.repeat(length);
}

/**
 * Print backtest result summary to console
 */
export function printBacktestResult(result: BacktestResult): void {
  const { config, metrics, strategyName } = result;

  console.log('\n' + line('═'));
  console.log(`  BACKTEST RESULT: ${strategyName} (${result.state})`);
  console.log(line('═'));

  // Configuration
  console.log('\n📊 CONFIGURATION');
  console.log(line());
  console.log(`  Period:       ${config.startDate} → ${config.endDate}`);
  console.log(`  Granularity:  ${config.granularity} (${result.timesteps} timesteps)`);
  console.log(`  Initial:      ${fmtCurrency(config.initialCapital)}`);
  console.log(`  Max Holdings: ${config.maxHoldings ?? 'unlimited'}`);
  console.log(`  Side:         ${config.positionSideDefault}`);
  console.log(`  Lot Size:     ${config.lotSize} shares`);
  console.log(`  Fill Price:   ${config.fillPrice}${config.fillPrice === 'slippage' ? ` (${fmtPct(config.slippagePct)})` : ''}`);
  console.log(`  Commission:   ${config.commission.type}`);
  console.log(`  Intraday:     ${config.enableIntraday ? 'enabled' : 'disabled'}`);

  if (metrics) {
    printMetrics(metrics);
  }

  if (result.rejections.length > 0 || result.dataGaps.length > 0) {
    console.log('\n⚠️  SKIPPED');
    console.log(line());
    console.log(`  Rejected Orders: ${result.rejections.length}`);
    console.log(`  Data Gaps:       ${result.dataGaps.length}`);
  }

  // Execution info
  console.log('\n⏱️  EXECUTION');
  console.log(line());
  console.log(`  Run:          ${result.runId}`);
  console.log(`  Started:      ${result.executedAt.toISOString()}`);
  console.log(`  Duration:     ${result.executionTimeMs}ms`);

  console.log('\n' + line('═') + '\n');
}

/**
 * Print metrics
 */
export function printMetrics(metrics: PerformanceMetrics): void {
  console.log('\n📈 PERFORMANCE');
  console.log(line());
  console.log(`  Final Equity: ${fmtCurrency(metrics.finalEquity)}`);
  console.log(`  Total Return: ${fmtPct(metrics.totalReturn)}`);
  console.log(`  Annualized:   ${fmtPct(metrics.annualizedReturn)}`);
  console.log(`  Trades:       ${metrics.totalTrades} (${metrics.wins}W / ${metrics.losses}L)`);
  console.log(`  Win Rate:     ${fmtPct(metrics.winRate)}`);
  console.log(`  Profit Factor: ${fmtRatio(metrics.profitFactor)}`);

  console.log('\n💰 P&L BREAKDOWN');
  console.log(line());
  console.log(`  Realized:     ${fmtCurrency(metrics.realizedPnl)}`);
  console.log(`  Commission:   ${fmtCurrency(metrics.totalCommission)}`);
  console.log(`  Avg Win:      ${fmtCurrency(metrics.avgWin)}`);
  console.log(`  Avg Loss:     ${fmtCurrency(metrics.avgLoss)}`);

  console.log('\n⚠️  RISK METRICS');
  console.log(line());
  console.log(`  Max Drawdown: ${fmtCurrency(metrics.maxDrawdown)} (${fmt(metrics.maxDrawdownPct, 1)}%)`);
  console.log(`  Volatility:   ${fmtPct(metrics.volatility)}`);
  console.log(`  Sharpe:       ${fmt(metrics.sharpeRatio)} (${metrics.periods} periods)`);
}

/**
 * Print the first `limit` trade report rows
 */
export function printTradeReport(rows: readonly TradeReportRow[], limit: number = 20): void {
  console.log('\n🧾 TRADES');
  console.log(line());
  for (const row of rows.slice(0, limit)) {
    console.log(
      `  #${row.id} ${row.instrumentId} ${row.side} ${row.openDate} → ${row.closeDate} ` +
      `${row.quantity} @ ${fmt(row.openPrice)} → ${fmt(row.closePrice)} | ` +
      `net ${fmtCurrency(row.netPnl)} | balance ${fmtCurrency(row.cumulativeBalance)}`
    );
  }
  if (rows.length > limit) {
    console.log(`  ... ${rows.length - limit} more`);
  }
}

/**
 * Print a compact one-line summary
 */
export function printCompactSummary(result: BacktestResult): void {
  const { metrics } = result;
  if (!metrics) {
    console.log(`${result.strategyName} | ${result.state} | ${result.trades.length} trades`);
    return;
  }
  console.log(
    `${result.strategyName} | ` +
    `${metrics.totalTrades} trades | ` +
    `${fmtPct(metrics.winRate)} WR | ` +
    `${fmtPct(metrics.totalReturn)} return | ` +
    `PF ${fmtRatio(metrics.profitFactor)} | ` +
    `DD ${fmt(metrics.maxDrawdownPct, 1)}%`
  );
}
