import { DEFAULT_TRANSACTION_PAGE_SIZE } from '../../../constants';
import type {
  CreateInventoryRecordInput,
  CreateInventoryTransactionInput,
  InventoryRecord,
  InventoryTransaction,
  InventoryTransactionFilter,
  LowStockItem,
  UpdateInventoryRecordInput,
} from '../models';
import { lockClause, SqlParams, toJson } from './sql';
import type { InventoryRepository, LockOptions, Queryable, ReleaseResult } from './types';

type ReleasedRow = InventoryRecord & { released: number };

export class PgInventoryRepository implements InventoryRepository {
  constructor(private readonly db: Queryable) {}

  async findByProduct(tenantId: string, productId: string, options: LockOptions = {}): Promise<InventoryRecord | null> {
    const result = await this.db.query<InventoryRecord>(
      `SELECT * FROM inventory_records WHERE tenant_id = $1 AND product_id = $2${lockClause(options.forUpdate)}`,
      [tenantId, productId]
    );
    return result.rows[0] ?? null;
  }

  async findBySku(tenantId: string, sku: string): Promise<InventoryRecord | null> {
    const result = await this.db.query<InventoryRecord>(
      'SELECT * FROM inventory_records WHERE tenant_id = $1 AND sku = $2 ORDER BY created_at LIMIT 1',
      [tenantId, sku]
    );
    return result.rows[0] ?? null;
  }

  async createIfAbsent(input: CreateInventoryRecordInput): Promise<InventoryRecord | null> {
    const result = await this.db.query<InventoryRecord>(
      `INSERT INTO inventory_records (
        tenant_id, product_id, sku, location, quantity, reserved_quantity, available_quantity,
        reorder_point, reorder_quantity, metadata
      ) VALUES ($1, $2, $3, $4, $5, 0, $5, $6, $7, $8)
      ON CONFLICT (tenant_id, product_id) DO NOTHING
      RETURNING *`,
      [
        input.tenant_id,
        input.product_id,
        input.sku ?? null,
        input.location ?? null,
        input.quantity,
        input.reorder_point ?? 0,
        input.reorder_quantity ?? 0,
        toJson(input.metadata ?? {}),
      ]
    );
    return result.rows[0] ?? null;
  }

  async update(id: string, input: UpdateInventoryRecordInput): Promise<InventoryRecord> {
    const result = await this.db.query<InventoryRecord>(
      `UPDATE inventory_records SET
        quantity = $2,
        available_quantity = $2 - reserved_quantity,
        sku = COALESCE($3, sku),
        location = COALESCE($4, location),
        reorder_point = COALESCE($5, reorder_point),
        reorder_quantity = COALESCE($6, reorder_quantity),
        metadata = metadata || COALESCE($7::jsonb, '{}'::jsonb),
        updated_at = CURRENT_TIMESTAMP
      WHERE id = $1
      RETURNING *`,
      [
        id,
        input.quantity,
        input.sku ?? null,
        input.location ?? null,
        input.reorder_point ?? null,
        input.reorder_quantity ?? null,
        toJson(input.metadata),
      ]
    );
    return result.rows[0];
  }

  async reserve(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null> {
    // The WHERE guard makes check-and-decrement a single atomic statement
    const result = await this.db.query<InventoryRecord>(
      `UPDATE inventory_records SET
        reserved_quantity = reserved_quantity + $3,
        available_quantity = available_quantity - $3,
        updated_at = CURRENT_TIMESTAMP
      WHERE tenant_id = $1 AND product_id = $2 AND available_quantity >= $3
      RETURNING *`,
      [tenantId, productId, quantity]
    );
    return result.rowCount === 1 ? result.rows[0] : null;
  }

  async release(tenantId: string, productId: string, quantity: number): Promise<ReleaseResult | null> {
    const result = await this.db.query<ReleasedRow>(
      `WITH target AS (
        SELECT id, LEAST(reserved_quantity, $3) AS released
        FROM inventory_records
        WHERE tenant_id = $1 AND product_id = $2
        FOR UPDATE
      )
      UPDATE inventory_records r SET
        reserved_quantity = r.reserved_quantity - t.released,
        available_quantity = r.available_quantity + t.released,
        updated_at = CURRENT_TIMESTAMP
      FROM target t
      WHERE r.id = t.id
      RETURNING r.*, t.released`,
      [tenantId, productId, quantity]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    const { released, ...record } = row;
    return { record, released };
  }

  async consumeReservation(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null> {
    const result = await this.db.query<InventoryRecord>(
      `UPDATE inventory_records SET
        reserved_quantity = GREATEST(0, reserved_quantity - $3),
        updated_at = CURRENT_TIMESTAMP
      WHERE tenant_id = $1 AND product_id = $2
      RETURNING *`,
      [tenantId, productId, quantity]
    );
    return result.rows[0] ?? null;
  }

  async restock(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null> {
    const result = await this.db.query<InventoryRecord>(
      `UPDATE inventory_records SET
        quantity = quantity + $3,
        available_quantity = available_quantity + $3,
        updated_at = CURRENT_TIMESTAMP
      WHERE tenant_id = $1 AND product_id = $2
      RETURNING *`,
      [tenantId, productId, quantity]
    );
    return result.rows[0] ?? null;
  }

  async findLowStock(tenantId: string): Promise<LowStockItem[]> {
    const result = await this.db.query<LowStockItem>(
      `SELECT r.*, p.name AS product_name, p.sku AS product_sku
      FROM inventory_records r
      JOIN products p ON p.id = r.product_id
      WHERE r.tenant_id = $1
        AND r.reorder_point > 0
        AND r.quantity <= r.reorder_point
      ORDER BY r.quantity ASC, p.name ASC`,
      [tenantId]
    );
    return result.rows;
  }

  async addTransaction(input: CreateInventoryTransactionInput): Promise<InventoryTransaction> {
    const result = await this.db.query<InventoryTransaction>(
      `INSERT INTO inventory_transactions (
        inventory_record_id, transaction_type, quantity, reference_id, reference_type, notes, created_by, metadata
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING *`,
      [
        input.inventory_record_id,
        input.transaction_type,
        input.quantity,
        input.reference_id ?? null,
        input.reference_type ?? null,
        input.notes ?? null,
        input.created_by ?? null,
        toJson(input.metadata ?? {}),
      ]
    );
    return result.rows[0];
  }

  async listTransactions(inventoryRecordId: string, filter: InventoryTransactionFilter): Promise<InventoryTransaction[]> {
    const params = new SqlParams();
    const conditions = [`inventory_record_id = ${params.add(inventoryRecordId)}`];

    if (filter.transaction_type) {
      conditions.push(`transaction_type = ${params.add(filter.transaction_type)}`);
    }
    if (filter.start_date) {
      conditions.push(`created_at >= ${params.add(filter.start_date)}`);
    }
    if (filter.end_date) {
      conditions.push(`created_at <= ${params.add(filter.end_date)}`);
    }

    const limit = params.add(filter.limit ?? DEFAULT_TRANSACTION_PAGE_SIZE);
    const result = await this.db.query<InventoryTransaction>(
      `SELECT * FROM inventory_transactions
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      LIMIT ${limit}`,
      params.values
    );
    return result.rows;
  }
}
