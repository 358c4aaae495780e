import { NextFunction, Response } from 'express';
import { getTenantId } from '../../middlewares/tenant.middleware';
import { TenantRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { InventoryManager } from '../inventory/inventory.manager';
import { ShipmentManager } from '../shipping/shipment.manager';
import { OrderManager } from './order.manager';
import {
  addOrderItemSchema,
  createOrderSchema,
  listOrdersQuerySchema,
  noteParamsSchema,
  notesQuerySchema,
  orderNoteSchema,
  orderParamsSchema,
  updateOrderSchema,
  updateOrderStatusSchema,
} from './orders.validation';

export interface OrdersControllerDeps {
  orders: OrderManager;
  shipments: ShipmentManager;
  inventory: InventoryManager;
}

export const createOrdersController = ({ orders, shipments, inventory }: OrdersControllerDeps) => ({
  createOrder: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const input = createOrderSchema.parse(req.body);

      const order = await orders.createOrder(tenantId, input);
      return ResponseHandler.created(res, order, 'Order created');
    } catch (error) {
      next(error);
    }
  },

  listOrders: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const filter = listOrdersQuerySchema.parse(req.query);

      const list = await orders.listOrders(tenantId, filter);
      return ResponseHandler.success(res, list, 'Success', 200, { count: list.length });
    } catch (error) {
      next(error);
    }
  },

  getOrder: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);

      const details = await orders.getOrderDetails(tenantId, id);
      if (!details) {
        return ResponseHandler.notFound(res, 'Order not found');
      }
      return ResponseHandler.success(res, details);
    } catch (error) {
      next(error);
    }
  },

  updateOrder: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);
      const changes = updateOrderSchema.parse(req.body);

      const order = await orders.updateOrder(tenantId, id, changes);
      return ResponseHandler.success(res, order, 'Order updated');
    } catch (error) {
      next(error);
    }
  },

  updateStatus: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);
      const { status, notes } = updateOrderStatusSchema.parse(req.body);

      const order = await orders.updateStatus(tenantId, id, status, notes);
      return ResponseHandler.success(res, order, 'Order status updated');
    } catch (error) {
      next(error);
    }
  },

  addItem: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);
      const item = addOrderItemSchema.parse(req.body);

      const orderItem = await orders.addItemToOrder(tenantId, id, item);
      return ResponseHandler.created(res, orderItem, 'Item added');
    } catch (error) {
      next(error);
    }
  },

  deleteOrder: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);

      const deleted = await orders.deleteOrder(tenantId, id);
      if (!deleted) {
        return ResponseHandler.notFound(res, 'Order not found');
      }
      return ResponseHandler.success(res, { id }, 'Order deleted');
    } catch (error) {
      next(error);
    }
  },

  getHistory: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);

      const history = await orders.getStatusHistory(tenantId, id);
      return ResponseHandler.success(res, history);
    } catch (error) {
      next(error);
    }
  },

  getNotes: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);
      const { customer_only } = notesQuerySchema.parse(req.query);

      const notes = await orders.getNotes(tenantId, id, customer_only);
      return ResponseHandler.success(res, notes);
    } catch (error) {
      next(error);
    }
  },

  addNote: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);
      const { content, is_customer_note } = orderNoteSchema.parse(req.body);

      const note = await orders.addNote(tenantId, id, content, is_customer_note);
      return ResponseHandler.created(res, note, 'Note added');
    } catch (error) {
      next(error);
    }
  },

  deleteNote: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id, noteId } = noteParamsSchema.parse(req.params);

      const deleted = await orders.deleteNote(tenantId, id, noteId);
      if (!deleted) {
        return ResponseHandler.notFound(res, 'Note not found');
      }
      return ResponseHandler.success(res, { id: noteId }, 'Note deleted');
    } catch (error) {
      next(error);
    }
  },

  getShipments: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);

      const list = await shipments.getShipmentsForOrder(tenantId, id);
      return ResponseHandler.success(res, list);
    } catch (error) {
      next(error);
    }
  },

  // Converts every line's reservation into a sale
  completeInventory: async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = getTenantId(req);
      const { id } = orderParamsSchema.parse(req.params);

      const items = await orders.getOrderItems(tenantId, id);
      const results = await inventory.completeOrderInventory(
        tenantId,
        id,
        items.map(item => ({ product_id: item.product_id, quantity: item.quantity }))
      );
      return ResponseHandler.success(res, results, 'Order inventory completed');
    } catch (error) {
      next(error);
    }
  },
});

export type OrdersController = ReturnType<typeof createOrdersController>;
