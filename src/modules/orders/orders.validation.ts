import { z } from 'zod';
import { ORDER_STATUS } from '../../constants';
import { addressSchema, dateSchema, idSchema, moneySchema, positiveQuantitySchema } from '../../utils/validation';

export const orderParamsSchema = z.object({
  id: idSchema,
});

export const noteParamsSchema = z.object({
  id: idSchema,
  noteId: idSchema,
});

export const createOrderSchema = z.object({
  email: z.string().email('Invalid email address'),
  user_id: z.string().min(1).max(100).nullable().optional(),
  customer_name: z.string().max(255).nullable().optional(),
  shipping_address: addressSchema.nullable().optional(),
  billing_address: addressSchema.nullable().optional(),
  payment_method: z.string().max(50).nullable().optional(),
  shipping_method: z.string().max(50).nullable().optional(),
});

export const updateOrderSchema = createOrderSchema
  .omit({ user_id: true })
  .partial()
  .extend({
    status: z.nativeEnum(ORDER_STATUS).optional(),
    notes: z.string().max(1000).optional(),
  });

export const updateOrderStatusSchema = z.object({
  status: z.nativeEnum(ORDER_STATUS),
  notes: z.string().max(1000).optional(),
});

export const addOrderItemSchema = z.object({
  product_id: idSchema,
  quantity: positiveQuantitySchema,
  price: moneySchema,
  cost: moneySchema.nullable().optional(),
  name: z.string().max(255).nullable().optional(),
  sku: z.string().max(100).nullable().optional(),
});

export const orderNoteSchema = z.object({
  content: z.string().trim().min(1, 'Note content is required').max(5000),
  is_customer_note: z.boolean().optional(),
});

export const notesQuerySchema = z.object({
  customer_only: z.enum(['true', 'false']).optional().transform(value => value === 'true'),
});

export const listOrdersQuerySchema = z.object({
  status: z.nativeEnum(ORDER_STATUS).optional(),
  email: z.string().optional(),
  user_id: z.string().optional(),
  min_total: z.coerce.number().nonnegative().optional(),
  max_total: z.coerce.number().nonnegative().optional(),
  date_from: dateSchema.optional(),
  date_to: dateSchema.optional(),
  limit: z.coerce.number().int().positive().max(200).optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});
