/**
 * Accounting Module
 *
 * Virtual account and transaction cost models.
 */

export {
  Account,
  createAccount,
  isOpeningOrder,
  lotValue,
  type AccountOptions,
  type AccountView,
  type AccountEvents,
} from './account.js';

export { calculateCommission } from './commission.js';
