// Order Model

import type { OrderStatus } from '../../../constants';

export interface Address {
  name?: string;
  line1: string;
  line2?: string;
  city: string;
  state?: string;
  postal_code: string;
  country: string;
  phone?: string;
}

export interface Order {
  id: string; // UUID
  tenant_id: string;
  user_id: string | null; // null for guest checkout
  order_number: string; // unique, ORD-YYMMDD-XXXXXXXX
  email: string;
  customer_name: string | null;
  status: OrderStatus;
  total: number; // DECIMAL(12, 2)
  shipping_address: Address | null; // JSONB
  billing_address: Address | null; // JSONB
  payment_method: string | null;
  shipping_method: string | null;
  paid_at: Date | null;
  shipped_at: Date | null;
  delivered_at: Date | null;
  cancelled_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateOrderInput {
  tenant_id: string;
  order_number: string; // REQUIRED - unique
  email: string; // REQUIRED
  user_id?: string | null;
  customer_name?: string | null;
  shipping_address?: Address | null;
  billing_address?: Address | null;
  payment_method?: string | null;
  shipping_method?: string | null;
}

// Fields a generic update may touch; status goes through the state machine
export interface UpdateOrderInput {
  email?: string;
  customer_name?: string | null;
  shipping_address?: Address | null;
  billing_address?: Address | null;
  payment_method?: string | null;
  shipping_method?: string | null;
}

export interface OrderFilter {
  status?: OrderStatus;
  email?: string;
  user_id?: string;
  min_total?: number;
  max_total?: number;
  date_from?: Date;
  date_to?: Date;
  limit?: number;
  offset?: number;
}

// Timestamp columns stamped the first time an order enters a status
export type OrderTimestampField = 'paid_at' | 'shipped_at' | 'delivered_at' | 'cancelled_at';
