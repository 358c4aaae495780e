import express from 'express';
import { OrdersController } from './orders.controller';

export const createOrdersRoutes = (controller: OrdersController) => {
  const router = express.Router();

  router.post('/', controller.createOrder);
  router.get('/', controller.listOrders);
  router.get('/:id', controller.getOrder);
  router.patch('/:id', controller.updateOrder);
  router.delete('/:id', controller.deleteOrder);

  router.put('/:id/status', controller.updateStatus);
  router.get('/:id/history', controller.getHistory);
  router.post('/:id/items', controller.addItem);

  router.get('/:id/notes', controller.getNotes);
  router.post('/:id/notes', controller.addNote);
  router.delete('/:id/notes/:noteId', controller.deleteNote);

  router.get('/:id/shipments', controller.getShipments);
  router.post('/:id/inventory/complete', controller.completeInventory);

  return router;
};
