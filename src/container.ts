import type { UnitOfWork } from './connections/db/unit-of-work';
import { InventoryManager } from './modules/inventory/inventory.manager';
import { OrderManager, OrderStatusListener } from './modules/orders/order.manager';
import { ReturnManager } from './modules/returns/return.manager';
import { ShipmentManager } from './modules/shipping/shipment.manager';
import { getLogger } from './utils/logging';

export interface Services {
  inventory: InventoryManager;
  orders: OrderManager;
  shipments: ShipmentManager;
  returns: ReturnManager;
}

export const createServices = (uow: UnitOfWork, listener?: OrderStatusListener): Services => {
  const inventory = new InventoryManager(uow, getLogger('inventory'));
  const orders = new OrderManager(uow, getLogger('orders'), listener);
  const shipments = new ShipmentManager(uow, orders, getLogger('shipments'));
  const returns = new ReturnManager(uow, inventory, orders, getLogger('returns'));

  return { inventory, orders, shipments, returns };
};
