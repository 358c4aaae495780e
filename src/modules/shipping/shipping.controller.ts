import { NextFunction, Response } from 'express';
import { getTenantId } from '../../middlewares/tenant.middleware';
import { TenantRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { ShipmentManager } from './shipment.manager';
import {
  addShipmentItemsSchema,
  createShipmentSchema,
  shipmentParamsSchema,
  updateShipmentStatusSchema,
} from './shipping.validation';

export const createShippingController = (shipments: ShipmentManager) => ({
  createShipment: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { order_id, ...input } = createShipmentSchema.parse(req.body);

      const shipment = await shipments.createShipment(tenantId, order_id, input);
      return ResponseHandler.created(res, shipment, 'Shipment created');
    } catch (error) {
      next(error);
    }
  },

  getShipment: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = shipmentParamsSchema.parse(req.params);

      const shipment = await shipments.getShipment(tenantId, id);
      if (!shipment) {
        return ResponseHandler.notFound(res, 'Shipment not found');
      }
      return ResponseHandler.success(res, shipment);
    } catch (error) {
      next(error);
    }
  },

  updateStatus: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = shipmentParamsSchema.parse(req.params);
      const input = updateShipmentStatusSchema.parse(req.body);

      const shipment = await shipments.updateShipmentStatus(tenantId, id, input);
      return ResponseHandler.success(res, shipment, 'Shipment status updated');
    } catch (error) {
      next(error);
    }
  },

  addItems: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = shipmentParamsSchema.parse(req.params);
      const { items } = addShipmentItemsSchema.parse(req.body);

      const added = await shipments.addItemsToShipment(tenantId, id, items);
      return ResponseHandler.created(res, added, 'Items added to shipment');
    } catch (error) {
      next(error);
    }
  },
});

export type ShippingController = ReturnType<typeof createShippingController>;
