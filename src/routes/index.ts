import express from 'express';
import type { Services } from '../container';
import { requireTenant } from '../middlewares/tenant.middleware';
import { createInventoryController } from '../modules/inventory/inventory.controller';
import { createInventoryRoutes } from '../modules/inventory/inventory.routes';
import { createOrdersController } from '../modules/orders/orders.controller';
import { createOrdersRoutes } from '../modules/orders/orders.routes';
import { createReturnsController } from '../modules/returns/returns.controller';
import { createReturnsRoutes } from '../modules/returns/returns.routes';
import { createShippingController } from '../modules/shipping/shipping.controller';
import { createShippingRoutes } from '../modules/shipping/shipping.routes';

export const createApiRouter = (services: Services) => {
  const router = express.Router();

  // Every API route is tenant scoped
  router.use(requireTenant);

  router.use('/inventory', createInventoryRoutes(createInventoryController(services.inventory)));
  router.use('/orders', createOrdersRoutes(createOrdersController(services)));
  router.use('/shipments', createShippingRoutes(createShippingController(services.shipments)));
  router.use('/returns', createReturnsRoutes(createReturnsController(services.returns)));

  return router;
};
