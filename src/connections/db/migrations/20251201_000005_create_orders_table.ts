import { PoolClient } from 'pg';
import { Migration } from './types';
import { ORDER_STATUSES } from '../../../constants';

const statusList = ORDER_STATUSES.map(status => `'${status}'`).join(', ');

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        tenant_id UUID NOT NULL REFERENCES tenants(id) ON DELETE CASCADE,
        -- Null for guest checkout
        user_id VARCHAR(100),
        order_number VARCHAR(50) UNIQUE NOT NULL,
        email VARCHAR(255) NOT NULL,
        customer_name VARCHAR(255),
        status VARCHAR(20) NOT NULL DEFAULT 'pending' CHECK (status IN (${statusList})),
        total DECIMAL(12, 2) NOT NULL DEFAULT 0,
        shipping_address JSONB,
        billing_address JSONB,
        payment_method VARCHAR(50),
        shipping_method VARCHAR(50),
        paid_at TIMESTAMPTZ,
        shipped_at TIMESTAMPTZ,
        delivered_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_tenant_status ON orders(tenant_id, status)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_tenant_user ON orders(tenant_id, user_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_tenant_user');
    await client.query('DROP INDEX IF EXISTS idx_orders_tenant_status');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
