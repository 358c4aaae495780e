// OrderItem Model

export interface OrderItem {
  id: string; // UUID
  order_id: string;
  product_id: string;
  quantity: number; // > 0
  price: number; // snapshot at time of purchase
  cost: number | null;
  name: string | null; // snapshot
  sku: string | null; // snapshot
  created_at: Date;
}

export interface CreateOrderItemInput {
  order_id: string;
  product_id: string;
  quantity: number; // REQUIRED
  price: number; // REQUIRED
  cost?: number | null;
  name?: string | null;
  sku?: string | null;
}
