import { NextFunction, Response } from 'express';
import { getTenantId } from '../../middlewares/tenant.middleware';
import { TenantRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { InventoryManager } from './inventory.manager';
import {
  inventoryMovementSchema,
  inventoryReturnSchema,
  productParamsSchema,
  setInventorySchema,
  skuParamsSchema,
  transactionQuerySchema,
} from './inventory.validation';

export const createInventoryController = (inventory: InventoryManager) => ({
  // PUT /inventory/products/:productId
  setInventory: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const { quantity, ...options } = setInventorySchema.parse(req.body);

      const record = await inventory.createOrUpdateInventory(tenantId, productId, quantity, options);
      return ResponseHandler.success(res, record, 'Inventory saved');
    } catch (error) {
      next(error);
    }
  },

  getInventory: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);

      const record = await inventory.getInventory(tenantId, productId);
      if (!record) {
        return ResponseHandler.notFound(res, 'No inventory record for product');
      }
      return ResponseHandler.success(res, record);
    } catch (error) {
      next(error);
    }
  },

  getInventoryBySku: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { sku } = skuParamsSchema.parse(req.params);

      const record = await inventory.getInventoryBySku(tenantId, sku);
      if (!record) {
        return ResponseHandler.notFound(res, 'No inventory record for SKU');
      }
      return ResponseHandler.success(res, record);
    } catch (error) {
      next(error);
    }
  },

  reserve: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const body = inventoryMovementSchema.parse(req.body);

      const reserved = await inventory.reserveInventory(tenantId, productId, body.quantity, body.reference_id, body.reference_type);
      if (!reserved) {
        return ResponseHandler.conflict(res, 'Insufficient stock', { quantity: body.quantity }, 'INSUFFICIENT_STOCK');
      }
      return ResponseHandler.success(res, await inventory.getInventory(tenantId, productId), 'Inventory reserved');
    } catch (error) {
      next(error);
    }
  },

  release: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const body = inventoryMovementSchema.parse(req.body);

      const released = await inventory.releaseInventory(tenantId, productId, body.quantity, body.reference_id, body.reference_type);
      if (!released) {
        return ResponseHandler.notFound(res, 'No inventory record for product');
      }
      return ResponseHandler.success(res, await inventory.getInventory(tenantId, productId), 'Reservation released');
    } catch (error) {
      next(error);
    }
  },

  completeSale: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const body = inventoryMovementSchema.parse(req.body);

      const completed = await inventory.completeInventorySale(tenantId, productId, body.quantity, body.reference_id, body.reference_type);
      if (!completed) {
        return ResponseHandler.notFound(res, 'No inventory record for product');
      }
      return ResponseHandler.success(res, await inventory.getInventory(tenantId, productId), 'Sale completed');
    } catch (error) {
      next(error);
    }
  },

  processReturn: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const body = inventoryReturnSchema.parse(req.body);

      const returned = await inventory.processReturn(
        tenantId,
        productId,
        body.quantity,
        body.reference_id,
        body.reference_type,
        body.notes
      );
      if (!returned) {
        return ResponseHandler.notFound(res, 'No inventory record for product');
      }
      return ResponseHandler.success(res, await inventory.getInventory(tenantId, productId), 'Return recorded');
    } catch (error) {
      next(error);
    }
  },

  getTransactions: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { productId } = productParamsSchema.parse(req.params);
      const filter = transactionQuerySchema.parse(req.query);

      const transactions = await inventory.getInventoryTransactions(tenantId, productId, filter);
      return ResponseHandler.success(res, transactions);
    } catch (error) {
      next(error);
    }
  },

  getLowStock: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const items = await inventory.getLowStockItems(tenantId);
      return ResponseHandler.success(res, items);
    } catch (error) {
      next(error);
    }
  },
});

export type InventoryController = ReturnType<typeof createInventoryController>;
