/**
 * Transaction cost models
 */

import type { OrderAction } from '@stocksim/shared';
import type { CommissionModel } from '../backtest/types.js';

/**
 * Commission charged for one fill.
 *
 * The percentage model follows broker practice: the discounted rate is
 * floored at `minFee`, and sells additionally pay the transaction tax.
 */
export function calculateCommission(
  model: CommissionModel,
  action: OrderAction,
  price: number,
  shares: number
): number {
  switch (model.type) {
    case 'none':
      return 0;
    case 'fixed':
      return model.fee;
    case 'percentage': {
      const notional = price * shares;
      const fee = Math.max(notional * model.rate * model.discount, model.minFee);
      const tax = action === 'sell' ? notional * model.sellTaxRate : 0;
      return fee + tax;
    }
  }
}
