import type {
  CreateShipmentInput,
  CreateShipmentItemInput,
  Shipment,
  ShipmentItem,
  UpdateShipmentInput,
} from '../models';
import { lockClause, toJson } from './sql';
import type { LockOptions, Queryable, ShipmentRepository } from './types';

export class PgShipmentRepository implements ShipmentRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateShipmentInput): Promise<Shipment> {
    const result = await this.db.query<Shipment>(
      `INSERT INTO shipments (
        order_id, status, shipping_method, carrier, tracking_number, tracking_url, label_url,
        shipping_address, metadata
      ) VALUES ($1, 'pending', $2, $3, $4, $5, $6, $7, $8)
      RETURNING *`,
      [
        input.order_id,
        input.shipping_method,
        input.carrier ?? null,
        input.tracking_number ?? null,
        input.tracking_url ?? null,
        input.label_url ?? null,
        toJson(input.shipping_address),
        toJson(input.metadata ?? {}),
      ]
    );
    return result.rows[0];
  }

  // Shipments carry no tenant column; scope through the owning order
  async findById(tenantId: string, shipmentId: string, options: LockOptions = {}): Promise<Shipment | null> {
    const result = await this.db.query<Shipment>(
      `SELECT s.* FROM shipments s
      JOIN orders o ON o.id = s.order_id
      WHERE o.tenant_id = $1 AND s.id = $2${lockClause(options.forUpdate, 's')}`,
      [tenantId, shipmentId]
    );
    return result.rows[0] ?? null;
  }

  async findByOrder(orderId: string): Promise<Shipment[]> {
    const result = await this.db.query<Shipment>(
      'SELECT * FROM shipments WHERE order_id = $1 ORDER BY created_at ASC',
      [orderId]
    );
    return result.rows;
  }

  async update(shipmentId: string, input: UpdateShipmentInput): Promise<Shipment | null> {
    const result = await this.db.query<Shipment>(
      `UPDATE shipments SET
        status = $2::varchar,
        tracking_number = COALESCE($3, tracking_number),
        tracking_url = COALESCE($4, tracking_url),
        estimated_delivery = COALESCE($5, estimated_delivery),
        metadata = metadata || COALESCE($6::jsonb, '{}'::jsonb),
        shipped_at = CASE WHEN $2::varchar = 'shipped' THEN COALESCE(shipped_at, CURRENT_TIMESTAMP) ELSE shipped_at END,
        delivered_at = CASE WHEN $2::varchar = 'delivered' THEN COALESCE(delivered_at, CURRENT_TIMESTAMP) ELSE delivered_at END,
        updated_at = CURRENT_TIMESTAMP
      WHERE id = $1
      RETURNING *`,
      [
        shipmentId,
        input.status,
        input.tracking_number ?? null,
        input.tracking_url ?? null,
        input.estimated_delivery ?? null,
        toJson(input.metadata),
      ]
    );
    return result.rows[0] ?? null;
  }

  async addItem(input: CreateShipmentItemInput): Promise<ShipmentItem> {
    const result = await this.db.query<ShipmentItem>(
      `INSERT INTO shipment_items (shipment_id, order_item_id, product_id, quantity)
      VALUES ($1, $2, $3, $4)
      RETURNING *`,
      [input.shipment_id, input.order_item_id, input.product_id, input.quantity]
    );
    return result.rows[0];
  }

  async findItems(shipmentId: string): Promise<ShipmentItem[]> {
    const result = await this.db.query<ShipmentItem>(
      'SELECT * FROM shipment_items WHERE shipment_id = $1 ORDER BY created_at ASC',
      [shipmentId]
    );
    return result.rows;
  }

  async sumShippedQuantity(orderItemId: string): Promise<number> {
    const result = await this.db.query<{ total: number }>(
      'SELECT COALESCE(SUM(quantity), 0)::int AS total FROM shipment_items WHERE order_item_id = $1',
      [orderItemId]
    );
    return result.rows[0]?.total ?? 0;
  }
}
