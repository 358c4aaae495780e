import { z } from 'zod';
import { ValidationError } from './errors';

// Shared building blocks for the per-module request schemas
export const idSchema = z.string().uuid('Must be a valid UUID');

export const positiveQuantitySchema = z.number().int('Quantity must be an integer').positive('Quantity must be greater than 0');

export const stockLevelSchema = z.number().int('Quantity must be an integer').nonnegative('Quantity cannot be negative');

export const moneySchema = z.number().finite().nonnegative('Amount cannot be negative');

export const metadataSchema = z.record(z.string(), z.unknown());

export const addressSchema = z.object({
  name: z.string().optional(),
  line1: z.string().min(1, 'Address line is required'),
  line2: z.string().optional(),
  city: z.string().min(1, 'City is required'),
  state: z.string().optional(),
  postal_code: z.string().min(1, 'Postal code is required'),
  country: z.string().min(2, 'Country is required'),
  phone: z.string().optional(),
});

export const dateSchema = z.coerce.date();

export const idParamsSchema = z.object({ id: idSchema });

/**
 * Guard used by managers, which are also called in-process without a schema in front of them.
 */
export const assertPositiveQuantity = (quantity: number, field: string = 'quantity'): void => {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, { field, value: quantity });
  }
};

export const assertStockLevel = (quantity: number, field: string = 'quantity'): void => {
  if (!Number.isInteger(quantity) || quantity < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, { field, value: quantity });
  }
};

export const assertAmount = (amount: number, field: string = 'amount'): void => {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError(`${field} must be a non-negative number`, { field, value: amount });
  }
};
