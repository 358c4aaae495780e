import { z } from 'zod';
import { INVENTORY_TRANSACTION_TYPE } from '../../constants';
import { dateSchema, idSchema, metadataSchema, positiveQuantitySchema, stockLevelSchema } from '../../utils/validation';

export const productParamsSchema = z.object({
  productId: idSchema,
});

export const skuParamsSchema = z.object({
  sku: z.string().min(1),
});

export const setInventorySchema = z.object({
  quantity: stockLevelSchema,
  location: z.string().max(255).nullable().optional(),
  sku: z.string().max(100).nullable().optional(),
  reorder_point: stockLevelSchema.optional(),
  reorder_quantity: stockLevelSchema.optional(),
  metadata: metadataSchema.optional(),
});

export const inventoryMovementSchema = z.object({
  quantity: positiveQuantitySchema,
  reference_id: z.string().min(1, 'reference_id is required').max(100),
  reference_type: z.string().min(1).max(50).optional(),
});

export const inventoryReturnSchema = inventoryMovementSchema.extend({
  notes: z.string().max(1000).optional(),
});

export const transactionQuerySchema = z.object({
  transaction_type: z.nativeEnum(INVENTORY_TRANSACTION_TYPE).optional(),
  start_date: dateSchema.optional(),
  end_date: dateSchema.optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});
