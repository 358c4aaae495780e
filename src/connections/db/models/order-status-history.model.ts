// OrderStatusHistory Model

import type { OrderStatus } from '../../../constants';

export interface OrderStatusHistory {
  id: string;
  order_id: string;
  previous_status: OrderStatus | null; // null on the creation row
  status: OrderStatus;
  notes: string | null;
  created_at: Date;
}

export interface CreateOrderStatusHistoryInput {
  order_id: string;
  previous_status: OrderStatus | null;
  status: OrderStatus;
  notes?: string | null;
}
