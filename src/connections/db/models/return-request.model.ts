// ReturnRequest Model

import type { ItemCondition, ReturnReason, ReturnStatus } from '../../../constants';

export interface ReturnRequest {
  id: string; // UUID
  order_id: string;
  return_number: string; // unique, RET-YYMMDD-XXXXXXXX
  status: ReturnStatus;
  reason: ReturnReason | null;
  customer_comments: string | null;
  admin_notes: string | null;
  refund_amount: number | null;
  refund_method: string | null;
  refund_transaction_id: string | null;
  requested_at: Date;
  approved_at: Date | null;
  received_at: Date | null;
  completed_at: Date | null;
  refunded_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateReturnRequestInput {
  order_id: string;
  return_number: string;
  reason?: ReturnReason | null;
  customer_comments?: string | null;
}

export interface UpdateReturnRequestInput {
  status?: ReturnStatus;
  admin_notes?: string | null;
  refund_amount?: number | null;
  refund_method?: string | null;
  refund_transaction_id?: string | null;
}

export type ReturnTimestampField = 'approved_at' | 'received_at' | 'completed_at' | 'refunded_at';

export interface ReturnItem {
  id: string;
  return_id: string;
  order_item_id: string;
  product_id: string;
  quantity: number;
  reason: ReturnReason | null;
  condition: ItemCondition | null;
  restocked: boolean;
  created_at: Date;
}

export interface CreateReturnItemInput {
  return_id: string;
  order_item_id: string;
  product_id: string;
  quantity: number;
  reason?: ReturnReason | null;
  condition?: ItemCondition | null;
}

export interface ReturnRequestWithItems extends ReturnRequest {
  items: ReturnItem[];
}
