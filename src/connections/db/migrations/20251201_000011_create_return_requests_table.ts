import { PoolClient } from 'pg';
import { Migration } from './types';
import { RETURN_STATUSES } from '../../../constants';

const statusList = RETURN_STATUSES.map(status => `'${status}'`).join(', ');

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS return_requests (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        order_id UUID NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        return_number VARCHAR(50) UNIQUE NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'requested' CHECK (status IN (${statusList})),
        reason VARCHAR(50),
        customer_comments TEXT,
        admin_notes TEXT,
        refund_amount DECIMAL(12, 2),
        refund_method VARCHAR(50),
        refund_transaction_id VARCHAR(100),
        requested_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        approved_at TIMESTAMPTZ,
        received_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ,
        refunded_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_return_requests_order ON return_requests(order_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_return_requests_status ON return_requests(status)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_return_requests_status');
    await client.query('DROP INDEX IF EXISTS idx_return_requests_order');
    await client.query('DROP TABLE IF EXISTS return_requests CASCADE');
  },
};
