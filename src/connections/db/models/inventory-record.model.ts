// InventoryRecord Model - one row per (tenant, product)

export type Metadata = Record<string, unknown>;

export interface InventoryRecord {
  id: string; // UUID
  tenant_id: string;
  product_id: string;
  sku: string | null;
  location: string | null;
  quantity: number; // >= 0
  reserved_quantity: number; // >= 0
  available_quantity: number; // quantity - reserved_quantity
  reorder_point: number;
  reorder_quantity: number;
  metadata: Metadata; // JSONB
  created_at: Date;
  updated_at: Date;
}

export interface CreateInventoryRecordInput {
  tenant_id: string;
  product_id: string;
  quantity: number;
  sku?: string | null;
  location?: string | null;
  reorder_point?: number; // default: 0
  reorder_quantity?: number; // default: 0
  metadata?: Metadata;
}

export interface UpdateInventoryRecordInput {
  quantity: number; // REQUIRED - available is recomputed from it
  sku?: string | null;
  location?: string | null;
  reorder_point?: number;
  reorder_quantity?: number;
  metadata?: Metadata; // merged into the stored object
}

export interface LowStockItem extends InventoryRecord {
  product_name: string;
  product_sku: string | null;
}
