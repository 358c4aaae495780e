import { z } from 'zod';
import { SHIPMENT_STATUS } from '../../constants';
import { addressSchema, dateSchema, idSchema, metadataSchema, positiveQuantitySchema } from '../../utils/validation';

export const shipmentParamsSchema = z.object({
  id: idSchema,
});

export const createShipmentSchema = z.object({
  order_id: idSchema,
  shipping_method: z.string().min(1, 'shipping_method is required').max(50),
  carrier: z.string().max(100).nullable().optional(),
  tracking_number: z.string().max(100).nullable().optional(),
  tracking_url: z.string().url().nullable().optional(),
  label_url: z.string().url().nullable().optional(),
  shipping_address: addressSchema.nullable().optional(),
  metadata: metadataSchema.optional(),
});

export const updateShipmentStatusSchema = z.object({
  status: z.nativeEnum(SHIPMENT_STATUS),
  tracking_number: z.string().max(100).optional(),
  tracking_url: z.string().url().optional(),
  estimated_delivery: dateSchema.optional(),
  metadata: metadataSchema.optional(),
});

const shipmentLineSchema = z.object({
  order_item_id: idSchema,
  product_id: idSchema,
  quantity: positiveQuantitySchema,
});

export const addShipmentItemsSchema = z.object({
  items: z.array(shipmentLineSchema).min(1, 'At least one item is required'),
});
