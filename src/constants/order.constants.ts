/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  PAID: 'paid',
  PROCESSING: 'processing',
  SHIPPED: 'shipped',
  DELIVERED: 'delivered',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
  RETURNED: 'returned',
  REFUNDED: 'refunded',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(ORDER_STATUS);

/**
 * Events that move an order between statuses
 */
export const ORDER_EVENT = {
  PAY: 'pay',
  START_PROCESSING: 'start_processing',
  SHIP: 'ship',
  DELIVER: 'deliver',
  COMPLETE: 'complete',
  CANCEL: 'cancel',
  RETURN: 'return',
  REFUND: 'refund',
} as const;

export type OrderEvent = typeof ORDER_EVENT[keyof typeof ORDER_EVENT];

/**
 * Order Number Prefix
 */
export const ORDER_NUMBER_PREFIX = 'ORD';
