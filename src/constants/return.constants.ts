export const RETURN_STATUS = {
  REQUESTED: 'requested',
  APPROVED: 'approved',
  DENIED: 'denied',
  AWAITING_RECEIPT: 'awaiting_receipt',
  RECEIVED: 'received',
  INSPECTING: 'inspecting',
  COMPLETED: 'completed',
  REFUNDED: 'refunded',
} as const;

export type ReturnStatus = typeof RETURN_STATUS[keyof typeof RETURN_STATUS];

export const RETURN_STATUSES: readonly ReturnStatus[] = Object.values(RETURN_STATUS);

export const RETURN_REASON = {
  DAMAGED: 'damaged',
  DEFECTIVE: 'defective',
  NOT_AS_DESCRIBED: 'not_as_described',
  WRONG_ITEM: 'wrong_item',
  WRONG_SIZE: 'wrong_size',
  NO_LONGER_NEEDED: 'no_longer_needed',
  ARRIVED_LATE: 'arrived_late',
  OTHER: 'other',
} as const;

export type ReturnReason = typeof RETURN_REASON[keyof typeof RETURN_REASON];

export const RETURN_REASONS: readonly ReturnReason[] = Object.values(RETURN_REASON);

/**
 * Item condition on receipt; damaged goods are not put back on the shelf
 */
export const ITEM_CONDITION = {
  NEW: 'new',
  USED: 'used',
  DAMAGED: 'damaged',
} as const;

export type ItemCondition = typeof ITEM_CONDITION[keyof typeof ITEM_CONDITION];

export const ITEM_CONDITIONS: readonly ItemCondition[] = Object.values(ITEM_CONDITION);

export const RETURN_NUMBER_PREFIX = 'RET';
