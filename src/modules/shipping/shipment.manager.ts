import { ORDER_STATUS, OrderStatus, SHIPMENT_STATUS } from '../../constants';
import type {
  Address,
  Metadata,
  Shipment,
  ShipmentItem,
  ShipmentWithItems,
  UpdateShipmentInput,
} from '../../connections/db/models';
import type { TransactionContext, UnitOfWork } from '../../connections/db/unit-of-work';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import type { Logger } from '../../utils/logging';
import { assertPositiveQuantity } from '../../utils/validation';
import type { OrderManager } from '../orders/order.manager';

export interface NewShipment {
  shipping_method: string;
  carrier?: string | null;
  tracking_number?: string | null;
  tracking_url?: string | null;
  label_url?: string | null;
  shipping_address?: Address | null;
  metadata?: Metadata;
}

export interface ShipmentLine {
  order_item_id: string;
  product_id: string;
  quantity: number;
}

// Orders in these statuses can no longer be fulfilled
const UNSHIPPABLE_ORDER_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.CANCELLED,
  ORDER_STATUS.RETURNED,
  ORDER_STATUS.REFUNDED,
];

export class ShipmentManager {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly orders: OrderManager,
    private readonly logger: Logger
  ) {}

  /**
   * A shipment on a paid order moves the order into processing.
   */
  async createShipment(tenantId: string, orderId: string, input: NewShipment): Promise<Shipment> {
    if (!input.shipping_method) {
      throw new ValidationError('shipping_method is required');
    }

    return this.uow.run(async (tx) => {
      const order = await tx.orders.findById(tenantId, orderId, { forUpdate: true });
      if (!order) {
        throw new NotFoundError('Order', orderId);
      }
      if (UNSHIPPABLE_ORDER_STATUSES.includes(order.status)) {
        throw new ConflictError(`Order ${order.order_number} is ${order.status} and cannot be shipped`, 'ORDER_NOT_SHIPPABLE', {
          status: order.status,
        });
      }

      const shipment = await tx.shipments.create({
        order_id: orderId,
        shipping_method: input.shipping_method,
        carrier: input.carrier,
        tracking_number: input.tracking_number,
        tracking_url: input.tracking_url,
        label_url: input.label_url,
        shipping_address: input.shipping_address ?? order.shipping_address,
        metadata: input.metadata,
      });

      if (order.status === ORDER_STATUS.PAID) {
        await this.orders.updateStatus(tenantId, orderId, ORDER_STATUS.PROCESSING, 'Shipment created');
      }

      this.logger.info('Shipment created', { tenantId, orderId, shipmentId: shipment.id });
      return shipment;
    });
  }

  /**
   * Shipped and delivered shipments pull the order forward; an order already
   * at or past that point is left alone.
   */
  async updateShipmentStatus(tenantId: string, shipmentId: string, input: UpdateShipmentInput): Promise<Shipment> {
    return this.uow.run(async (tx) => {
      const shipment = await this.requireShipment(tx, tenantId, shipmentId, true);

      const updated = await tx.shipments.update(shipmentId, input);
      if (!updated) {
        throw new NotFoundError('Shipment', shipmentId);
      }

      if (input.status === SHIPMENT_STATUS.SHIPPED) {
        await this.orders.advanceTo(tenantId, shipment.order_id, ORDER_STATUS.SHIPPED, `Shipment ${shipmentId} shipped`);
      } else if (input.status === SHIPMENT_STATUS.DELIVERED) {
        await this.orders.advanceTo(tenantId, shipment.order_id, ORDER_STATUS.DELIVERED, `Shipment ${shipmentId} delivered`);
      }

      this.logger.info('Shipment status updated', {
        tenantId,
        shipmentId,
        from: shipment.status,
        to: updated.status,
      });
      return updated;
    });
  }

  async addItemToShipment(tenantId: string, shipmentId: string, line: ShipmentLine): Promise<ShipmentItem> {
    assertPositiveQuantity(line.quantity);

    return this.uow.run(async (tx) => {
      const shipment = await this.requireShipment(tx, tenantId, shipmentId, true);

      const orderItem = await tx.orders.findItemById(shipment.order_id, line.order_item_id);
      if (!orderItem) {
        throw new NotFoundError('Order item', line.order_item_id);
      }
      if (orderItem.product_id !== line.product_id) {
        throw new ValidationError('product_id does not match the order item', {
          order_item_id: line.order_item_id,
          product_id: line.product_id,
        });
      }

      const alreadyShipped = await tx.shipments.sumShippedQuantity(orderItem.id);
      if (alreadyShipped + line.quantity > orderItem.quantity) {
        throw new ConflictError(
          `Cannot ship ${line.quantity} more of order item ${orderItem.id}: ${alreadyShipped} of ${orderItem.quantity} already shipped`,
          'SHIPMENT_QUANTITY_EXCEEDED',
          { ordered: orderItem.quantity, shipped: alreadyShipped, requested: line.quantity }
        );
      }

      return tx.shipments.addItem({
        shipment_id: shipmentId,
        order_item_id: orderItem.id,
        product_id: orderItem.product_id,
        quantity: line.quantity,
      });
    });
  }

  async addItemsToShipment(tenantId: string, shipmentId: string, lines: ShipmentLine[]): Promise<ShipmentItem[]> {
    if (lines.length === 0) {
      throw new ValidationError('At least one item is required');
    }

    return this.uow.run(async () => {
      const items: ShipmentItem[] = [];
      for (const line of lines) {
        items.push(await this.addItemToShipment(tenantId, shipmentId, line));
      }
      return items;
    });
  }

  async getShipment(tenantId: string, shipmentId: string): Promise<ShipmentWithItems | null> {
    return this.uow.run(async (tx) => {
      const shipment = await tx.shipments.findById(tenantId, shipmentId);
      if (!shipment) {
        return null;
      }
      const items = await tx.shipments.findItems(shipmentId);
      return { ...shipment, items };
    });
  }

  async getShipmentsForOrder(tenantId: string, orderId: string): Promise<Shipment[]> {
    return this.uow.run(async (tx) => {
      const order = await tx.orders.findById(tenantId, orderId);
      if (!order) {
        throw new NotFoundError('Order', orderId);
      }
      return tx.shipments.findByOrder(orderId);
    });
  }

  private async requireShipment(
    tx: TransactionContext,
    tenantId: string,
    shipmentId: string,
    forUpdate = false
  ): Promise<Shipment> {
    const shipment = await tx.shipments.findById(tenantId, shipmentId, { forUpdate });
    if (!shipment) {
      throw new NotFoundError('Shipment', shipmentId);
    }
    return shipment;
  }
}
