import express from 'express';
import { ShippingController } from './shipping.controller';

export const createShippingRoutes = (controller: ShippingController) => {
  const router = express.Router();

  router.post('/', controller.createShipment);
  router.get('/:id', controller.getShipment);
  router.put('/:id/status', controller.updateStatus);
  router.post('/:id/items', controller.addItems);

  return router;
};
