/**
 * Backtest run configuration
 *
 * Validated with zod; defaults follow a Taiwan-stock broker account
 * (1000-share lots, discounted percentage commission, sell tax).
 */

import { z } from 'zod';
import { TradingDateSchema, loadEnvFromRoot } from '@stocksim/shared';
import { InvalidConfigurationError } from '../backtest/errors.js';
import {
  DEFAULT_COMMISSION,
  DEFAULT_LOT_SIZE,
  DEFAULT_PERIODS_PER_YEAR,
  type BacktestConfig,
} from '../backtest/types.js';

// =============================================================================
// SCHEMA
// =============================================================================

export const CommissionModelSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('fixed'), fee: z.number().nonnegative() }),
  z.object({
    type: z.literal('percentage'),
    rate: z.number().nonnegative(),
    discount: z.number().positive().default(1),
    minFee: z.number().nonnegative().default(0),
    sellTaxRate: z.number().nonnegative().default(0),
  }),
]);

export const BacktestConfigSchema = z
  .object({
    strategyName: z.string().min(1),
    initialCapital: z.number().positive(),
    maxHoldings: z.number().int().positive().optional(),
    granularity: z.enum(['bar', 'tick', 'mixed']).default('bar'),
    startDate: TradingDateSchema,
    endDate: TradingDateSchema,
    enableIntraday: z.boolean().default(true),
    positionSideDefault: z.enum(['long', 'short']).default('long'),
    lotSize: z.number().int().positive().default(DEFAULT_LOT_SIZE),
    universe: z.array(z.string().min(1)).optional(),
    fillPrice: z.enum(['order', 'quote', 'slippage']).default('quote'),
    slippagePct: z.number().min(0).max(1).default(0),
    commission: CommissionModelSchema.default(DEFAULT_COMMISSION),
    riskFreeRate: z.number().default(0),
    periodsPerYear: z.number().positive().default(DEFAULT_PERIODS_PER_YEAR),
  })
  .superRefine((config, ctx) => {
    if (config.endDate < config.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: `endDate ${config.endDate} is before startDate ${config.startDate}`,
      });
    }
    if (config.granularity === 'mixed') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['granularity'],
        message: 'mixed granularity is not supported; use bar or tick',
      });
    }
  });

/**
 * Configuration as callers write it: everything with a default is optional
 */
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate and fill defaults.
 *
 * @throws InvalidConfigurationError listing every issue found
 */
export function validateBacktestConfig(input: unknown): BacktestConfig {
  const parsed = BacktestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

type Env = Record<string, string | undefined>;

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function envNumber(env: Env, key: string): number | undefined {
  const value = envValue(env, key);
  return value === undefined ? undefined : Number(value);
}

function envBoolean(env: Env, key: string): boolean | undefined {
  const value = envValue(env, key);
  return value === undefined ? undefined : ['true', '1', 'yes'].includes(value.toLowerCase());
}

function envCommission(env: Env): unknown {
  const type = envValue(env, 'BACKTEST_COMMISSION');
  switch (type) {
    case undefined:
    case 'percentage':
      return undefined;
    case 'fixed':
      return { type, fee: envNumber(env, 'BACKTEST_COMMISSION_FEE') };
    default:
      return { type };
  }
}

/**
 * Build the configuration from BACKTEST_* variables, after loading the
 * project-root .env into process.env.
 *
 * Only variables that are set reach the schema, so unset ones take defaults.
 */
export function loadBacktestConfig(env: Env = process.env, options: { loadDotEnv?: boolean } = {}): BacktestConfig {
  if (options.loadDotEnv ?? env === process.env) {
    loadEnvFromRoot();
  }

  const universe = envValue(env, 'BACKTEST_UNIVERSE');

  return validateBacktestConfig({
    strategyName: envValue(env, 'BACKTEST_STRATEGY'),
    initialCapital: envNumber(env, 'BACKTEST_INITIAL_CAPITAL'),
    maxHoldings: envNumber(env, 'BACKTEST_MAX_HOLDINGS'),
    granularity: envValue(env, 'BACKTEST_GRANULARITY'),
    startDate: envValue(env, 'BACKTEST_START_DATE'),
    endDate: envValue(env, 'BACKTEST_END_DATE'),
    enableIntraday: envBoolean(env, 'BACKTEST_ENABLE_INTRADAY'),
    positionSideDefault: envValue(env, 'BACKTEST_POSITION_SIDE'),
    lotSize: envNumber(env, 'BACKTEST_LOT_SIZE'),
    universe: universe?.split(',').map((id) => id.trim()).filter((id) => id !== ''),
    fillPrice: envValue(env, 'BACKTEST_FILL_PRICE'),
    slippagePct: envNumber(env, 'BACKTEST_SLIPPAGE_PCT'),
    commission: envCommission(env),
    riskFreeRate: envNumber(env, 'BACKTEST_RISK_FREE_RATE'),
    periodsPerYear: envNumber(env, 'BACKTEST_PERIODS_PER_YEAR'),
  });
}
