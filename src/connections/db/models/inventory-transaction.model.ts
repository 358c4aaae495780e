// InventoryTransaction Model - append-only ledger

import type { InventoryTransactionType } from '../../../constants';
import type { Metadata } from './inventory-record.model';

export interface InventoryTransaction {
  id: string; // UUID
  inventory_record_id: string;
  transaction_type: InventoryTransactionType;
  quantity: number; // signed delta
  reference_id: string | null;
  reference_type: string | null;
  notes: string | null;
  created_by: string | null;
  metadata: Metadata;
  created_at: Date;
}

export interface CreateInventoryTransactionInput {
  inventory_record_id: string;
  transaction_type: InventoryTransactionType; // REQUIRED
  quantity: number; // REQUIRED
  reference_id?: string | null;
  reference_type?: string | null;
  notes?: string | null;
  created_by?: string | null;
  metadata?: Metadata;
}

export interface InventoryTransactionFilter {
  transaction_type?: InventoryTransactionType;
  start_date?: Date;
  end_date?: Date;
  limit?: number;
}
