import express from 'express';
import { ReturnsController } from './returns.controller';

export const createReturnsRoutes = (controller: ReturnsController) => {
  const router = express.Router();

  router.post('/', controller.createReturn);
  router.get('/', controller.listReturns);
  router.get('/:id', controller.getReturn);
  router.put('/:id/status', controller.updateStatus);
  router.post('/:id/refund', controller.refund);

  return router;
};
