import { z } from 'zod';
import { TradingDateSchema } from './quote.schema.js';

/**
 * Order action schema
 */
export const OrderActionSchema = z.enum(['buy', 'sell']);

/**
 * Position side schema
 */
export const PositionSideSchema = z.enum(['long', 'short']);

/**
 * Order schema
 */
export const OrderSchema = z.object({
  instrumentId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  date: TradingDateSchema,
  action: OrderActionSchema,
  side: PositionSideSchema,
  price: z.number().positive(),
  lots: z.number().int().positive(),
  reason: z.string().optional(),
});

export type OrderSchemaType = z.infer<typeof OrderSchema>;
