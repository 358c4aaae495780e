import type { Product } from '../models';
import type { ProductRepository, Queryable } from './types';

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async findById(tenantId: string, productId: string): Promise<Product | null> {
    const result = await this.db.query<Product>(
      'SELECT * FROM products WHERE tenant_id = $1 AND id = $2',
      [tenantId, productId]
    );
    return result.rows[0] ?? null;
  }

  async updateStock(tenantId: string, productId: string, stock: number): Promise<void> {
    await this.db.query(
      'UPDATE products SET stock = $3, updated_at = CURRENT_TIMESTAMP WHERE tenant_id = $1 AND id = $2',
      [tenantId, productId, stock]
    );
  }
}
