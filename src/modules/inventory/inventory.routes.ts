import express from 'express';
import { InventoryController } from './inventory.controller';

export const createInventoryRoutes = (controller: InventoryController) => {
  const router = express.Router();

  router.get('/low-stock', controller.getLowStock);
  router.get('/sku/:sku', controller.getInventoryBySku);

  router.get('/products/:productId', controller.getInventory);
  router.put('/products/:productId', controller.setInventory);
  router.get('/products/:productId/transactions', controller.getTransactions);

  // Stock movements
  router.post('/products/:productId/reserve', controller.reserve);
  router.post('/products/:productId/release', controller.release);
  router.post('/products/:productId/complete-sale', controller.completeSale);
  router.post('/products/:productId/returns', controller.processReturn);

  return router;
};
