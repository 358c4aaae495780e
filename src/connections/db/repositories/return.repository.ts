import { RETURN_STATUS } from '../../../constants';
import type {
  CreateReturnItemInput,
  CreateReturnRequestInput,
  ReturnItem,
  ReturnRequest,
  ReturnTimestampField,
  UpdateReturnRequestInput,
} from '../models';
import { lockClause, SqlParams } from './sql';
import type { LockOptions, Queryable, ReturnRepository } from './types';

const UPDATABLE_COLUMNS: ReadonlyArray<keyof UpdateReturnRequestInput> = [
  'status',
  'admin_notes',
  'refund_amount',
  'refund_method',
  'refund_transaction_id',
];

export class PgReturnRepository implements ReturnRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateReturnRequestInput): Promise<ReturnRequest> {
    const result = await this.db.query<ReturnRequest>(
      `INSERT INTO return_requests (order_id, return_number, status, reason, customer_comments)
      VALUES ($1, $2, 'requested', $3, $4)
      RETURNING *`,
      [input.order_id, input.return_number, input.reason ?? null, input.customer_comments ?? null]
    );
    return result.rows[0];
  }

  async findById(tenantId: string, returnId: string, options: LockOptions = {}): Promise<ReturnRequest | null> {
    const result = await this.db.query<ReturnRequest>(
      `SELECT r.* FROM return_requests r
      JOIN orders o ON o.id = r.order_id
      WHERE o.tenant_id = $1 AND r.id = $2${lockClause(options.forUpdate, 'r')}`,
      [tenantId, returnId]
    );
    return result.rows[0] ?? null;
  }

  async findByOrder(orderId: string): Promise<ReturnRequest[]> {
    const result = await this.db.query<ReturnRequest>(
      'SELECT * FROM return_requests WHERE order_id = $1 ORDER BY requested_at DESC',
      [orderId]
    );
    return result.rows;
  }

  async update(
    returnId: string,
    input: UpdateReturnRequestInput,
    stamp?: ReturnTimestampField
  ): Promise<ReturnRequest | null> {
    const params = new SqlParams();
    const updates: string[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = input[column];
      if (value !== undefined) {
        updates.push(`${column} = ${params.add(value)}`);
      }
    }
    if (stamp) {
      updates.push(`${stamp} = COALESCE(${stamp}, CURRENT_TIMESTAMP)`);
    }
    updates.push('updated_at = CURRENT_TIMESTAMP');

    const idParam = params.add(returnId);
    const result = await this.db.query<ReturnRequest>(
      `UPDATE return_requests SET ${updates.join(', ')} WHERE id = ${idParam} RETURNING *`,
      params.values
    );
    return result.rows[0] ?? null;
  }

  async addItem(input: CreateReturnItemInput): Promise<ReturnItem> {
    const result = await this.db.query<ReturnItem>(
      `INSERT INTO return_items (return_id, order_item_id, product_id, quantity, reason, condition)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING *`,
      [
        input.return_id,
        input.order_item_id,
        input.product_id,
        input.quantity,
        input.reason ?? null,
        input.condition ?? null,
      ]
    );
    return result.rows[0];
  }

  async findItems(returnId: string): Promise<ReturnItem[]> {
    const result = await this.db.query<ReturnItem>(
      'SELECT * FROM return_items WHERE return_id = $1 ORDER BY created_at ASC',
      [returnId]
    );
    return result.rows;
  }

  async markRestocked(returnItemId: string): Promise<void> {
    await this.db.query('UPDATE return_items SET restocked = TRUE WHERE id = $1', [returnItemId]);
  }

  async sumReturnedQuantity(orderItemId: string): Promise<number> {
    const result = await this.db.query<{ total: number }>(
      `SELECT COALESCE(SUM(ri.quantity), 0)::int AS total
      FROM return_items ri
      JOIN return_requests r ON r.id = ri.return_id
      WHERE ri.order_item_id = $1 AND r.status <> $2`,
      [orderItemId, RETURN_STATUS.DENIED]
    );
    return result.rows[0]?.total ?? 0;
  }
}
