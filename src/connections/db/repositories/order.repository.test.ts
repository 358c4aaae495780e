import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PgOrderRepository } from './order.repository';

describe('PgOrderRepository', () => {
  let query: ReturnType<typeof vi.fn>;
  let repository: PgOrderRepository;

  beforeEach(() => {
    query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    repository = new PgOrderRepository({ query });
  });

  const lastCall = () => {
    const [sql, params] = query.mock.calls[query.mock.calls.length - 1];
    return { sql: String(sql).replace(/\s+/g, ' ').trim(), params };
  };

  it('updates only the given columns', async () => {
    await repository.update('tenant-1', 'order-1', {
      customer_name: 'Ada',
      shipping_address: { line1: '2 Side Rd', city: 'Oxford', postal_code: 'OX1', country: 'GB' },
    });

    expect(lastCall()).toEqual({
      sql: 'UPDATE orders SET customer_name = $1, shipping_address = $2, updated_at = CURRENT_TIMESTAMP WHERE tenant_id = $3 AND id = $4 RETURNING *',
      params: [
        'Ada',
        '{"line1":"2 Side Rd","city":"Oxford","postal_code":"OX1","country":"GB"}',
        'tenant-1',
        'order-1',
      ],
    });
  });

  it('stamps the status timestamp only when unset', async () => {
    await repository.setStatus('tenant-1', 'order-1', 'shipped', 'shipped_at');

    expect(lastCall().sql).toBe(
      'UPDATE orders SET status = $3, updated_at = CURRENT_TIMESTAMP, shipped_at = COALESCE(shipped_at, CURRENT_TIMESTAMP) WHERE tenant_id = $1 AND id = $2 RETURNING *'
    );
  });

  it('pages the order list', async () => {
    await repository.list('tenant-1', { status: 'paid', email: 'A@Example.com', limit: 10, offset: 20 });

    expect(lastCall()).toEqual({
      sql: 'SELECT * FROM orders WHERE tenant_id = $1 AND status = $2 AND LOWER(email) = LOWER($3) ORDER BY created_at DESC LIMIT $4 OFFSET $5',
      params: ['tenant-1', 'paid', 'A@Example.com', 10, 20],
    });
  });

  it('reports whether a row was deleted', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    await expect(repository.delete('tenant-1', 'order-1')).resolves.toBe(true);
    await expect(repository.delete('tenant-1', 'order-1')).resolves.toBe(false);
  });
});
