import { PgInventoryRepository } from './inventory.repository';
import { PgOrderRepository } from './order.repository';
import { PgProductRepository } from './product.repository';
import { PgReturnRepository } from './return.repository';
import { PgShipmentRepository } from './shipment.repository';
import type { Queryable, Repositories } from './types';

export const createPgRepositories = (db: Queryable): Repositories => ({
  products: new PgProductRepository(db),
  inventory: new PgInventoryRepository(db),
  orders: new PgOrderRepository(db),
  shipments: new PgShipmentRepository(db),
  returns: new PgReturnRepository(db),
});

export { PgInventoryRepository, PgOrderRepository, PgProductRepository, PgReturnRepository, PgShipmentRepository };
export type * from './types';
