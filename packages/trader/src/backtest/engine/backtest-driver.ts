/**
 * Backtest Driver
 *
 * Walks the configured calendar one timestep at a time and runs the strategy
 * against a fresh account:
 *
 *   quotes → stopLoss → close → open → snapshot
 *
 * Each signal phase is executed before the next callback runs, so open
 * sizing sees the cash and slots freed by closes on the same timestep.
 *
 * State machine: INITIALIZING → RUNNING → FINALIZING → DONE, or ABORTED when
 * a strategy callback throws.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  createSilentLogger,
  dateRange,
  parseTradingDate,
  type Fill,
  type Logger,
  type Order,
  type Quote,
  type TradeRecord,
} from '@stocksim/shared';
import { Account } from '../../accounting/account.js';
import type { StockStrategy } from '../../strategy/base-strategy.js';
import { validateBacktestConfig, type BacktestConfigInput } from '../../config/backtest-config.js';
import type { QuoteSource } from '../data/quote-source.js';
import { calculatePerformance } from '../performance/performance-calculator.js';
import {
  DataGapError,
  InvalidConfigurationError,
  OrderRejectedError,
  StrategyCallbackError,
} from '../errors.js';
import {
  SIGNAL_PHASES,
  type AccountSnapshot,
  type BacktestConfig,
  type BacktestResult,
  type BacktestState,
  type DataGap,
  type OrderRejection,
  type SignalPhase,
} from '../types.js';
import { OrderExecutor } from './order-executor.js';

const STRATEGY_CALLBACKS = [
  'setupAccount',
  'setupDataSources',
  'checkOpenSignal',
  'checkCloseSignal',
  'checkStopLossSignal',
  'calculatePositionSize',
] as const;

const PHASE_CALLBACK = {
  stopLoss: 'checkStopLossSignal',
  close: 'checkCloseSignal',
  open: 'checkOpenSignal',
} as const satisfies Record<SignalPhase, (typeof STRATEGY_CALLBACKS)[number]>;

// =============================================================================
// TYPES
// =============================================================================

export interface BacktestDriverOptions {
  config: BacktestConfigInput;
  strategy: StockStrategy;
  source: QuoteSource;
  logger?: Logger;
}

/**
 * Driver events
 */
export interface BacktestDriverEvents {
  'state:changed': (state: BacktestState) => void;
  'fill': (fill: Fill) => void;
  'order:rejected': (rejection: OrderRejection) => void;
  'data:gap': (gap: DataGap) => void;
  'snapshot': (snapshot: AccountSnapshot) => void;
}

interface Timestep {
  /** Key handed to the quote source */
  asOf: string | number;
  timestamp: number;
  date: string;
}

// =============================================================================
// DRIVER
// =============================================================================

export class BacktestDriver extends EventEmitter {
  readonly runId = uuidv4();
  readonly config: Readonly<BacktestConfig>;

  private readonly strategy: StockStrategy;
  private readonly source: QuoteSource;
  private readonly logger: Logger;
  private readonly account: Account;
  private readonly executor: OrderExecutor;

  private currentState: BacktestState = 'INITIALIZING';
  private readonly snapshots: AccountSnapshot[] = [];
  private readonly orders: Order[] = [];
  private readonly rejections: OrderRejection[] = [];
  private readonly dataGaps: DataGap[] = [];
  private readonly lastPrices = new Map<string, number>();
  private timesteps = 0;
  private startedAt = 0;

  /**
   * @throws InvalidConfigurationError for a bad configuration or an
   *   incomplete strategy
   */
  constructor(options: BacktestDriverOptions) {
    super();
    this.config = Object.freeze(validateBacktestConfig(options.config));
    validateStrategy(options.strategy);

    this.strategy = options.strategy;
    this.source = options.source;
    this.logger = (options.logger ?? createSilentLogger('backtest')).child({
      runId: this.runId,
      strategy: this.config.strategyName,
    });

    this.account = new Account({
      initialCapital: this.config.initialCapital,
      lotSize: this.config.lotSize,
    });
    this.account.on('fill:applied', (fill) => this.emit('fill', fill));

    this.executor = new OrderExecutor(this.account, {
      fillPrice: this.config.fillPrice,
      slippagePct: this.config.slippagePct,
      commission: this.config.commission,
      enableIntraday: this.config.enableIntraday,
      logger: this.logger,
    });
  }

  get state(): BacktestState {
    return this.currentState;
  }

  /**
   * Run to completion. A driver runs once.
   *
   * @throws StrategyCallbackError when a strategy callback throws
   */
  run(): BacktestResult {
    if (this.currentState !== 'INITIALIZING') {
      throw new Error(`Backtest ${this.runId} has already run (state ${this.currentState})`);
    }
    this.startedAt = Date.now();

    this.invoke('setupAccount', null, () => this.strategy.setupAccount(this.account, this.config));
    this.invoke('setupDataSources', null, () => this.strategy.setupDataSources(this.source));

    this.logger.info('Backtest started', {
      granularity: this.config.granularity,
      startDate: this.config.startDate,
      endDate: this.config.endDate,
      initialCapital: this.config.initialCapital,
    });
    this.transition('RUNNING');

    for (const date of dateRange(this.config.startDate, this.config.endDate)) {
      for (const step of this.timestepsOf(date)) {
        this.processTimestep(step);
      }
    }

    this.transition('FINALIZING');
    const result = this.buildResult();
    result.metrics = calculatePerformance(this.snapshots, result.trades, this.config.initialCapital, {
      riskFreeRate: this.config.riskFreeRate,
      periodsPerYear: this.config.periodsPerYear,
    });
    this.transition('DONE');
    result.state = 'DONE';

    this.logger.info('Backtest finished', {
      timesteps: this.timesteps,
      trades: result.trades.length,
      rejections: this.rejections.length,
      dataGaps: this.dataGaps.length,
      finalEquity: result.metrics.finalEquity,
      totalReturn: result.metrics.totalReturn,
    });

    return result;
  }

  // ===========================================================================
  // TIMESTEPS
  // ===========================================================================

  private timestepsOf(date: string): Timestep[] {
    const dayStart = parseTradingDate(date);
    if (this.config.granularity === 'bar') {
      return [{ asOf: date, timestamp: dayStart, date }];
    }

    const timestamps = this.source.getTickTimestamps(date, this.config.universe);
    if (timestamps.length === 0) {
      // A day without ticks is one gap
      return [{ asOf: dayStart, timestamp: dayStart, date }];
    }
    return timestamps.map((timestamp) => ({ asOf: timestamp, timestamp, date }));
  }

  private processTimestep(step: Timestep): void {
    const quotes = this.source.getQuotes(step.asOf, this.config.universe);
    if (quotes.length === 0) {
      this.recordGap(new DataGapError(step.timestamp, step.date));
      return;
    }

    for (const quote of quotes) {
      this.lastPrices.set(quote.instrumentId, quote.currentPrice);
    }

    for (const phase of SIGNAL_PHASES) {
      const callback = PHASE_CALLBACK[phase];
      const orders = this.invoke(phase, step.timestamp, () => this.strategy[callback](quotes));
      this.route(orders, quotes, phase);
    }

    this.timesteps++;
    const snapshot = this.account.snapshot(step.timestamp, step.date, this.lastPrices);
    this.snapshots.push(snapshot);
    this.emit('snapshot', snapshot);
  }

  private recordGap(error: DataGapError): void {
    const gap: DataGap = { timestamp: error.timestamp, date: error.date };
    this.dataGaps.push(gap);
    this.emit('data:gap', gap);
    this.logger.warn('Timestep skipped', { code: error.code, date: error.date, timestamp: error.timestamp });
  }

  // ===========================================================================
  // ORDER ROUTING
  // ===========================================================================

  private route(orders: readonly Order[], quotes: readonly Quote[], phase: SignalPhase): void {
    this.orders.push(...orders);

    if (phase !== 'open' || this.config.maxHoldings === undefined) {
      this.collect(this.executor.execute(orders, quotes, phase).rejections);
      return;
    }

    // Holdings are re-checked after every fill
    for (const order of orders) {
      if (!this.account.hasPosition(order.instrumentId) && this.account.positionCount() >= this.config.maxHoldings) {
        const error = new OrderRejectedError(
          order,
          `maxHoldings ${this.config.maxHoldings} reached; ${order.instrumentId} not opened`,
          'MAX_HOLDINGS'
        );
        this.collect([{ order, phase, code: error.code, reason: error.message }]);
        this.logger.warn('Order dropped', { code: error.code, instrumentId: order.instrumentId, reason: error.message });
        continue;
      }
      this.collect(this.executor.execute([order], quotes, phase).rejections);
    }
  }

  private collect(rejections: readonly OrderRejection[]): void {
    for (const rejection of rejections) {
      this.rejections.push(rejection);
      this.emit('order:rejected', rejection);
    }
  }

  // ===========================================================================
  // STRATEGY CALLS
  // ===========================================================================

  /**
   * Call into the strategy; any throw aborts the run
   */
  private invoke<T>(
    callback: SignalPhase | 'setupAccount' | 'setupDataSources',
    timestamp: number | null,
    fn: () => T
  ): T {
    try {
      return fn();
    } catch (cause) {
      this.transition('ABORTED');
      const error = new StrategyCallbackError(callback, timestamp, this.buildResult(), cause);
      this.logger.error('Backtest aborted', { callback, timestamp, error: error.message });
      throw error;
    }
  }

  private transition(state: BacktestState): void {
    this.currentState = state;
    this.emit('state:changed', state);
  }

  private buildResult(): BacktestResult {
    const trades: TradeRecord[] = [...this.account.getTradeRecords()];
    return {
      runId: this.runId,
      strategyName: this.config.strategyName,
      config: this.config,
      state: this.currentState,
      snapshots: [...this.snapshots],
      trades,
      orders: [...this.orders],
      rejections: [...this.rejections],
      dataGaps: [...this.dataGaps],
      finalCash: this.account.balance,
      timesteps: this.timesteps,
      executedAt: new Date(this.startedAt),
      executionTimeMs: Date.now() - this.startedAt,
    };
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof BacktestDriverEvents>(event: K, listener: BacktestDriverEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof BacktestDriverEvents>(
    event: K,
    ...args: Parameters<BacktestDriverEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Reject objects missing part of the strategy capability set
 */
export function validateStrategy(strategy: StockStrategy): void {
  const missing = STRATEGY_CALLBACKS.filter((name) => typeof strategy[name] !== 'function');
  const issues = missing.map((name) => `strategy: missing callback ${name}()`);
  if (typeof strategy.name !== 'string' || strategy.name === '') {
    issues.push('strategy: missing name');
  }
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
}

export function createBacktestDriver(options: BacktestDriverOptions): BacktestDriver {
  return new BacktestDriver(options);
}
