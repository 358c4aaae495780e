import { z } from 'zod';
import { ITEM_CONDITION, RETURN_REASON, RETURN_STATUS } from '../../constants';
import { idSchema, moneySchema, positiveQuantitySchema } from '../../utils/validation';

export const returnParamsSchema = z.object({
  id: idSchema,
});

export const listReturnsQuerySchema = z.object({
  order_id: idSchema,
});

const returnItemSchema = z.object({
  order_item_id: idSchema,
  quantity: positiveQuantitySchema,
  reason: z.nativeEnum(RETURN_REASON).nullable().optional(),
  condition: z.nativeEnum(ITEM_CONDITION).nullable().optional(),
});

export const createReturnSchema = z.object({
  order_id: idSchema,
  reason: z.nativeEnum(RETURN_REASON).nullable().optional(),
  customer_comments: z.string().max(5000).nullable().optional(),
  items: z.array(returnItemSchema).min(1, 'At least one item is required'),
});

export const updateReturnStatusSchema = z.object({
  status: z.nativeEnum(RETURN_STATUS),
  notes: z.string().max(5000).optional(),
});

export const refundSchema = z.object({
  amount: moneySchema,
  method: z.string().max(50).nullable().optional(),
  transaction_id: z.string().max(100).nullable().optional(),
});
