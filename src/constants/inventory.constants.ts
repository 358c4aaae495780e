export const INVENTORY_TRANSACTION_TYPE = {
  INITIAL: 'initial',
  PURCHASE: 'purchase',
  SALE: 'sale',
  ADJUSTMENT: 'adjustment',
  RETURN: 'return',
  DAMAGED: 'damaged',
  TRANSFER: 'transfer',
} as const;

export type InventoryTransactionType = typeof INVENTORY_TRANSACTION_TYPE[keyof typeof INVENTORY_TRANSACTION_TYPE];

export const INVENTORY_TRANSACTION_TYPES: readonly InventoryTransactionType[] = Object.values(INVENTORY_TRANSACTION_TYPE);

export const DEFAULT_TRANSACTION_PAGE_SIZE = 100;
