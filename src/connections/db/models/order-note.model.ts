// OrderNote Model

export interface OrderNote {
  id: string;
  order_id: string;
  content: string;
  is_customer_note: boolean; // visible to the customer
  created_at: Date;
}

export interface CreateOrderNoteInput {
  order_id: string;
  content: string;
  is_customer_note?: boolean; // default: false
}
