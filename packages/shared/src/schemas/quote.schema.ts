import { z } from 'zod';

/**
 * Trading date in YYYY-MM-DD form
 */
export const TradingDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), 'Invalid calendar date');

/**
 * Zod schema for tick detail validation
 */
export const TickDetailSchema = z.object({
  bidPrice: z.number().nonnegative(),
  bidVolume: z.number().nonnegative(),
  askPrice: z.number().nonnegative(),
  askVolume: z.number().nonnegative(),
  tickType: z.union([z.literal(0), z.literal(1), z.literal(2)]),
});

/**
 * Zod schema for Quote validation
 */
export const QuoteSchema = z
  .object({
    instrumentId: z.string().min(1),
    timestamp: z.number().int().nonnegative(),
    date: TradingDateSchema,
    granularity: z.enum(['bar', 'tick']),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    volume: z.number().nonnegative(),
    currentPrice: z.number().positive(),
    tick: TickDetailSchema.optional(),
  })
  .refine((quote) => quote.high >= quote.low, {
    message: 'high must be >= low',
    path: ['high'],
  });

/**
 * Type inferred from schema
 */
export type QuoteSchemaType = z.infer<typeof QuoteSchema>;
