import type { OrderStatus } from '../../../constants';
import type {
  CreateOrderInput,
  CreateOrderItemInput,
  CreateOrderNoteInput,
  CreateOrderStatusHistoryInput,
  Order,
  OrderFilter,
  OrderItem,
  OrderNote,
  OrderStatusHistory,
  OrderTimestampField,
  UpdateOrderInput,
} from '../models';
import { lockClause, SqlParams, toJson } from './sql';
import type { LockOptions, OrderRepository, Queryable } from './types';

const DEFAULT_PAGE_SIZE = 50;

const UPDATABLE_COLUMNS: ReadonlyArray<keyof UpdateOrderInput> = [
  'email',
  'customer_name',
  'shipping_address',
  'billing_address',
  'payment_method',
  'shipping_method',
];

const JSON_COLUMNS: ReadonlySet<keyof UpdateOrderInput> = new Set<keyof UpdateOrderInput>(['shipping_address', 'billing_address']);

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateOrderInput): Promise<Order> {
    const result = await this.db.query<Order>(
      `INSERT INTO orders (
        tenant_id, user_id, order_number, email, customer_name, status, total,
        shipping_address, billing_address, payment_method, shipping_method
      ) VALUES ($1, $2, $3, $4, $5, 'pending', 0, $6, $7, $8, $9)
      RETURNING *`,
      [
        input.tenant_id,
        input.user_id ?? null,
        input.order_number,
        input.email,
        input.customer_name ?? null,
        toJson(input.shipping_address),
        toJson(input.billing_address),
        input.payment_method ?? null,
        input.shipping_method ?? null,
      ]
    );
    return result.rows[0];
  }

  async findById(tenantId: string, orderId: string, options: LockOptions = {}): Promise<Order | null> {
    const result = await this.db.query<Order>(
      `SELECT * FROM orders WHERE tenant_id = $1 AND id = $2${lockClause(options.forUpdate)}`,
      [tenantId, orderId]
    );
    return result.rows[0] ?? null;
  }

  async list(tenantId: string, filter: OrderFilter): Promise<Order[]> {
    const params = new SqlParams();
    const conditions = [`tenant_id = ${params.add(tenantId)}`];

    if (filter.status) {
      conditions.push(`status = ${params.add(filter.status)}`);
    }
    if (filter.email) {
      conditions.push(`LOWER(email) = LOWER(${params.add(filter.email)})`);
    }
    if (filter.user_id) {
      conditions.push(`user_id = ${params.add(filter.user_id)}`);
    }
    if (filter.min_total !== undefined) {
      conditions.push(`total >= ${params.add(filter.min_total)}`);
    }
    if (filter.max_total !== undefined) {
      conditions.push(`total <= ${params.add(filter.max_total)}`);
    }
    if (filter.date_from) {
      conditions.push(`created_at >= ${params.add(filter.date_from)}`);
    }
    if (filter.date_to) {
      conditions.push(`created_at <= ${params.add(filter.date_to)}`);
    }

    const limit = params.add(filter.limit ?? DEFAULT_PAGE_SIZE);
    const offset = params.add(filter.offset ?? 0);
    const result = await this.db.query<Order>(
      `SELECT * FROM orders
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      LIMIT ${limit} OFFSET ${offset}`,
      params.values
    );
    return result.rows;
  }

  async update(tenantId: string, orderId: string, input: UpdateOrderInput): Promise<Order | null> {
    const params = new SqlParams();
    const updates: string[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = input[column];
      if (value !== undefined) {
        updates.push(`${column} = ${params.add(JSON_COLUMNS.has(column) ? toJson(value) : value)}`);
      }
    }
    updates.push('updated_at = CURRENT_TIMESTAMP');

    const tenantParam = params.add(tenantId);
    const idParam = params.add(orderId);
    const result = await this.db.query<Order>(
      `UPDATE orders SET ${updates.join(', ')} WHERE tenant_id = ${tenantParam} AND id = ${idParam} RETURNING *`,
      params.values
    );
    return result.rows[0] ?? null;
  }

  async setStatus(
    tenantId: string,
    orderId: string,
    status: OrderStatus,
    stamp?: OrderTimestampField
  ): Promise<Order | null> {
    const stampClause = stamp ? `, ${stamp} = COALESCE(${stamp}, CURRENT_TIMESTAMP)` : '';
    const result = await this.db.query<Order>(
      `UPDATE orders SET status = $3, updated_at = CURRENT_TIMESTAMP${stampClause}
      WHERE tenant_id = $1 AND id = $2
      RETURNING *`,
      [tenantId, orderId, status]
    );
    return result.rows[0] ?? null;
  }

  async incrementTotal(tenantId: string, orderId: string, amount: number): Promise<Order | null> {
    const result = await this.db.query<Order>(
      `UPDATE orders SET total = total + $3, updated_at = CURRENT_TIMESTAMP
      WHERE tenant_id = $1 AND id = $2
      RETURNING *`,
      [tenantId, orderId, amount]
    );
    return result.rows[0] ?? null;
  }

  async delete(tenantId: string, orderId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM orders WHERE tenant_id = $1 AND id = $2', [tenantId, orderId]);
    return (result.rowCount ?? 0) > 0;
  }

  async addItem(input: CreateOrderItemInput): Promise<OrderItem> {
    const result = await this.db.query<OrderItem>(
      `INSERT INTO order_items (order_id, product_id, quantity, price, cost, name, sku)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING *`,
      [
        input.order_id,
        input.product_id,
        input.quantity,
        input.price,
        input.cost ?? null,
        input.name ?? null,
        input.sku ?? null,
      ]
    );
    return result.rows[0];
  }

  async findItems(orderId: string): Promise<OrderItem[]> {
    const result = await this.db.query<OrderItem>(
      'SELECT * FROM order_items WHERE order_id = $1 ORDER BY created_at ASC, id ASC',
      [orderId]
    );
    return result.rows;
  }

  async findItemById(orderId: string, orderItemId: string): Promise<OrderItem | null> {
    const result = await this.db.query<OrderItem>(
      'SELECT * FROM order_items WHERE order_id = $1 AND id = $2',
      [orderId, orderItemId]
    );
    return result.rows[0] ?? null;
  }

  async addStatusHistory(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory> {
    const result = await this.db.query<OrderStatusHistory>(
      `INSERT INTO order_status_history (order_id, previous_status, status, notes)
      VALUES ($1, $2, $3, $4)
      RETURNING *`,
      [input.order_id, input.previous_status, input.status, input.notes ?? null]
    );
    return result.rows[0];
  }

  async listStatusHistory(orderId: string): Promise<OrderStatusHistory[]> {
    const result = await this.db.query<OrderStatusHistory>(
      'SELECT * FROM order_status_history WHERE order_id = $1 ORDER BY created_at ASC',
      [orderId]
    );
    return result.rows;
  }

  async addNote(input: CreateOrderNoteInput): Promise<OrderNote> {
    const result = await this.db.query<OrderNote>(
      `INSERT INTO order_notes (order_id, content, is_customer_note)
      VALUES ($1, $2, $3)
      RETURNING *`,
      [input.order_id, input.content, input.is_customer_note ?? false]
    );
    return result.rows[0];
  }

  async listNotes(orderId: string): Promise<OrderNote[]> {
    const result = await this.db.query<OrderNote>(
      'SELECT * FROM order_notes WHERE order_id = $1 ORDER BY created_at DESC',
      [orderId]
    );
    return result.rows;
  }

  async deleteNote(orderId: string, noteId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM order_notes WHERE order_id = $1 AND id = $2', [orderId, noteId]);
    return (result.rowCount ?? 0) > 0;
  }
}
