import { NextFunction, Response } from 'express';
import { getTenantId } from '../../middlewares/tenant.middleware';
import { TenantRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { ReturnManager } from './return.manager';
import {
  createReturnSchema,
  listReturnsQuerySchema,
  refundSchema,
  returnParamsSchema,
  updateReturnStatusSchema,
} from './returns.validation';

export const createReturnsController = (returns: ReturnManager) => ({
  createReturn: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { order_id, ...input } = createReturnSchema.parse(req.body);

      const request = await returns.createReturn(tenantId, order_id, input);
      return ResponseHandler.created(res, request, 'Return requested');
    } catch (error) {
      next(error);
    }
  },

  listReturns: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { order_id } = listReturnsQuerySchema.parse(req.query);

      const list = await returns.getReturnsForOrder(tenantId, order_id);
      return ResponseHandler.success(res, list);
    } catch (error) {
      next(error);
    }
  },

  getReturn: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = returnParamsSchema.parse(req.params);

      const request = await returns.getReturn(tenantId, id);
      if (!request) {
        return ResponseHandler.notFound(res, 'Return not found');
      }
      return ResponseHandler.success(res, request);
    } catch (error) {
      next(error);
    }
  },

  updateStatus: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = returnParamsSchema.parse(req.params);
      const { status, notes } = updateReturnStatusSchema.parse(req.body);

      const request = await returns.updateReturnStatus(tenantId, id, status, notes);
      return ResponseHandler.success(res, request, 'Return status updated');
    } catch (error) {
      next(error);
    }
  },

  refund: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = returnParamsSchema.parse(req.params);
      const refund = refundSchema.parse(req.body);

      const request = await returns.processRefund(tenantId, id, refund);
      return ResponseHandler.success(res, request, 'Refund recorded');
    } catch (error) {
      next(error);
    }
  },
});

export type ReturnsController = ReturnType<typeof createReturnsController>;
