// Product Model - only the columns the inventory and order core reads

export interface Product {
  id: string; // UUID
  tenant_id: string; // UUID
  name: string;
  sku: string | null;
  price: number; // DECIMAL(12, 2)
  stock: number; // mirror of inventory_records.quantity
  created_at: Date;
  updated_at: Date;
}
