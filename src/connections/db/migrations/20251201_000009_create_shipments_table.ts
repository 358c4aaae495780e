import { PoolClient } from 'pg';
import { Migration } from './types';
import { SHIPMENT_STATUSES } from '../../../constants';

const statusList = SHIPMENT_STATUSES.map(status => `'${status}'`).join(', ');

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS shipments (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        order_id UUID NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        status VARCHAR(20) NOT NULL DEFAULT 'pending' CHECK (status IN (${statusList})),
        shipping_method VARCHAR(50) NOT NULL,
        carrier VARCHAR(100),
        tracking_number VARCHAR(100),
        tracking_url TEXT,
        label_url TEXT,
        shipping_address JSONB,
        estimated_delivery TIMESTAMPTZ,
        shipped_at TIMESTAMPTZ,
        delivered_at TIMESTAMPTZ,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_shipments_order ON shipments(order_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_shipments_tracking ON shipments(tracking_number)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_shipments_tracking');
    await client.query('DROP INDEX IF EXISTS idx_shipments_order');
    await client.query('DROP TABLE IF EXISTS shipments CASCADE');
  },
};
