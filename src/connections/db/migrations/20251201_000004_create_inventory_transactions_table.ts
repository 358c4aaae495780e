import { PoolClient } from 'pg';
import { Migration } from './types';
import { INVENTORY_TRANSACTION_TYPES } from '../../../constants';

const typeList = INVENTORY_TRANSACTION_TYPES.map(type => `'${type}'`).join(', ');

export const migration: Migration = {
  async up(client: PoolClient) {
    // Append-only ledger; rows are never updated or deleted by the application
    await client.query(`
      CREATE TABLE IF NOT EXISTS inventory_transactions (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        inventory_record_id UUID NOT NULL REFERENCES inventory_records(id) ON DELETE CASCADE,
        transaction_type VARCHAR(20) NOT NULL CHECK (transaction_type IN (${typeList})),
        quantity INTEGER NOT NULL,
        reference_id VARCHAR(100),
        reference_type VARCHAR(50),
        notes TEXT,
        created_by VARCHAR(100),
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_inventory_transactions_record ON inventory_transactions(inventory_record_id, created_at DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_inventory_transactions_reference ON inventory_transactions(reference_type, reference_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_inventory_transactions_reference');
    await client.query('DROP INDEX IF EXISTS idx_inventory_transactions_record');
    await client.query('DROP TABLE IF EXISTS inventory_transactions CASCADE');
  },
};
