/**
 * Backtest error taxonomy
 *
 * Recoverable errors are handled at the order or timestep level and recorded
 * on the result; fatal errors stop the run and reach the caller.
 */

import type { Order } from '@stocksim/shared';
import type { BacktestResult, SignalPhase } from './types.js';

export type BacktestErrorCode =
  | 'DATA_GAP'
  | 'INSUFFICIENT_FUNDS'
  | 'ORDER_REJECTED'
  | 'POSITION_NOT_FOUND'
  | 'NO_QUOTE'
  | 'MAX_HOLDINGS'
  | 'INVALID_CONFIGURATION'
  | 'STRATEGY_CALLBACK';

export abstract class BacktestError extends Error {
  abstract readonly code: BacktestErrorCode;
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No quotes for a scheduled timestep
 */
export class DataGapError extends BacktestError {
  readonly code = 'DATA_GAP';
  readonly recoverable = true;

  constructor(
    readonly timestamp: number,
    readonly date: string
  ) {
    super(`No quotes for timestep ${date} (${timestamp})`);
  }
}

/**
 * Base for errors that drop a single order
 */
export abstract class OrderError extends BacktestError {
  readonly recoverable = true;

  constructor(
    message: string,
    readonly order: Order
  ) {
    super(message);
  }
}

export class InsufficientFundsError extends OrderError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    order: Order,
    readonly required: number,
    readonly available: number
  ) {
    super(
      `Insufficient funds for ${order.action} ${order.lots} lot(s) of ${order.instrumentId}: ` +
        `required ${required.toFixed(2)}, available ${available.toFixed(2)}`,
      order
    );
  }
}

export class PositionNotFoundError extends OrderError {
  readonly code = 'POSITION_NOT_FOUND';

  constructor(order: Order) {
    super(`No open ${order.side} position for ${order.instrumentId}`, order);
  }
}

/**
 * Order refused for a reason other than funds or a missing position
 */
export class OrderRejectedError extends OrderError {
  readonly code: 'ORDER_REJECTED' | 'NO_QUOTE' | 'MAX_HOLDINGS';

  constructor(
    order: Order,
    reason: string,
    code: 'ORDER_REJECTED' | 'NO_QUOTE' | 'MAX_HOLDINGS' = 'ORDER_REJECTED'
  ) {
    super(reason, order);
    this.code = code;
  }
}

/**
 * Malformed run configuration or strategy; raised before the run starts
 */
export class InvalidConfigurationError extends BacktestError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly recoverable = false;

  constructor(readonly issues: string[]) {
    super(`Invalid backtest configuration: ${issues.join('; ')}`);
  }
}

/**
 * A strategy callback threw; carries everything recorded up to the failure
 */
export class StrategyCallbackError extends BacktestError {
  readonly code = 'STRATEGY_CALLBACK';
  readonly recoverable = false;

  constructor(
    readonly callback: SignalPhase | 'setupAccount' | 'setupDataSources',
    readonly timestamp: number | null,
    readonly partialResult: BacktestResult,
    cause: unknown
  ) {
    super(
      `Strategy callback "${callback}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export function isBacktestError(error: unknown): error is BacktestError {
  return error instanceof BacktestError;
}
