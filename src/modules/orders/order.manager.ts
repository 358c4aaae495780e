import type { OrderStatus } from '../../constants';
import type {
  Address,
  Order,
  OrderFilter,
  OrderItem,
  OrderNote,
  OrderStatusHistory,
  Shipment,
  UpdateOrderInput,
} from '../../connections/db/models';
import type { TransactionContext, UnitOfWork } from '../../connections/db/unit-of-work';
import { NotFoundError } from '../../utils/errors';
import { generateOrderNumber } from '../../utils/identifiers';
import type { Logger } from '../../utils/logging';
import { assertAmount, assertPositiveQuantity } from '../../utils/validation';
import { assertTransition, planPromotion, STATUS_TIMESTAMPS } from './order-status.machine';

export interface NewOrder {
  email: string;
  user_id?: string | null;
  customer_name?: string | null;
  shipping_address?: Address | null;
  billing_address?: Address | null;
  payment_method?: string | null;
  shipping_method?: string | null;
}

export interface NewOrderItem {
  product_id: string;
  quantity: number;
  price: number;
  cost?: number | null;
  name?: string | null;
  sku?: string | null;
}

export interface OrderChanges extends UpdateOrderInput {
  status?: OrderStatus;
  notes?: string;
}

export interface OrderDetails {
  order: Order;
  items: OrderItem[];
  history: OrderStatusHistory[];
  notes: OrderNote[];
  shipments: Shipment[];
}

export interface OrderStatusChange {
  tenantId: string;
  order: Order;
  previousStatus: OrderStatus;
  status: OrderStatus;
  notes?: string;
}

/**
 * Told about every committed status transition. Failures are logged by the
 * unit of work and never undo the transition.
 */
export interface OrderStatusListener {
  onOrderStatusChanged(change: OrderStatusChange): Promise<void>;
}

const roundMoney = (value: number): number => Math.round(value * 100) / 100;

export class OrderManager {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly logger: Logger,
    private readonly listener?: OrderStatusListener
  ) {}

  async createOrder(tenantId: string, input: NewOrder): Promise<Order> {
    return this.uow.run(async (tx) => {
      const order = await tx.orders.create({
        tenant_id: tenantId,
        order_number: generateOrderNumber(),
        email: input.email,
        user_id: input.user_id,
        customer_name: input.customer_name,
        shipping_address: input.shipping_address,
        billing_address: input.billing_address,
        payment_method: input.payment_method,
        shipping_method: input.shipping_method,
      });

      await tx.orders.addStatusHistory({
        order_id: order.id,
        previous_status: null,
        status: order.status,
        notes: 'Order created',
      });

      this.logger.info('Order created', { tenantId, orderId: order.id, orderNumber: order.order_number });
      return order;
    });
  }

  /**
   * Snapshots name and SKU from the product when not given and adds the line
   * to the order total in the same statement.
   */
  async addItemToOrder(tenantId: string, orderId: string, item: NewOrderItem): Promise<OrderItem> {
    assertPositiveQuantity(item.quantity);
    assertAmount(item.price, 'price');
    if (item.cost !== undefined && item.cost !== null) {
      assertAmount(item.cost, 'cost');
    }

    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId, true);

      const product = await tx.products.findById(tenantId, item.product_id);
      if (!product) {
        throw new NotFoundError('Product', item.product_id);
      }

      const orderItem = await tx.orders.addItem({
        order_id: orderId,
        product_id: item.product_id,
        quantity: item.quantity,
        price: item.price,
        cost: item.cost,
        name: item.name ?? product.name,
        sku: item.sku ?? product.sku,
      });

      await tx.orders.incrementTotal(tenantId, orderId, roundMoney(item.price * item.quantity));

      this.logger.info('Order item added', {
        tenantId,
        orderId,
        productId: item.product_id,
        quantity: item.quantity,
      });
      return orderItem;
    });
  }

  async updateOrder(tenantId: string, orderId: string, changes: OrderChanges): Promise<Order> {
    const { status, notes, ...fields } = changes;

    return this.uow.run(async (tx) => {
      const current = await this.requireOrder(tx, tenantId, orderId, true);

      let order = await tx.orders.update(tenantId, orderId, fields);
      if (!order) {
        throw new NotFoundError('Order', orderId);
      }

      if (status && status !== current.status) {
        order = await this.applyTransition(tx, tenantId, order, status, notes);
      }
      return order;
    });
  }

  /**
   * Moves the order along one legal edge. Same-status updates are no-ops.
   */
  async updateStatus(tenantId: string, orderId: string, status: OrderStatus, notes?: string): Promise<Order> {
    return this.uow.run(async (tx) => {
      const order = await this.requireOrder(tx, tenantId, orderId, true);
      if (order.status === status) {
        return order;
      }
      return this.applyTransition(tx, tenantId, order, status, notes);
    });
  }

  /**
   * Walks the order forward to `target`, one recorded step per edge. Never
   * moves an order backwards.
   */
  async advanceTo(tenantId: string, orderId: string, target: OrderStatus, notes?: string): Promise<Order> {
    return this.uow.run(async (tx) => {
      let order = await this.requireOrder(tx, tenantId, orderId, true);
      for (const step of planPromotion(order.status, target)) {
        order = await this.applyTransition(tx, tenantId, order, step, notes);
      }
      return order;
    });
  }

  async getOrder(tenantId: string, orderId: string): Promise<Order | null> {
    return this.uow.run((tx) => tx.orders.findById(tenantId, orderId));
  }

  async getOrderDetails(tenantId: string, orderId: string): Promise<OrderDetails | null> {
    return this.uow.run(async (tx) => {
      const order = await tx.orders.findById(tenantId, orderId);
      if (!order) {
        return null;
      }

      const [items, history, notes, shipments] = await Promise.all([
        tx.orders.findItems(orderId),
        tx.orders.listStatusHistory(orderId),
        tx.orders.listNotes(orderId),
        tx.shipments.findByOrder(orderId),
      ]);
      return { order, items, history, notes, shipments };
    });
  }

  async getOrderItems(tenantId: string, orderId: string): Promise<OrderItem[]> {
    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId);
      return tx.orders.findItems(orderId);
    });
  }

  async listOrders(tenantId: string, filter: OrderFilter = {}): Promise<Order[]> {
    return this.uow.run((tx) => tx.orders.list(tenantId, filter));
  }

  async getOrdersByUser(tenantId: string, userId: string, limit?: number): Promise<Order[]> {
    return this.listOrders(tenantId, { user_id: userId, limit });
  }

  async deleteOrder(tenantId: string, orderId: string): Promise<boolean> {
    return this.uow.run(async (tx) => {
      const deleted = await tx.orders.delete(tenantId, orderId);
      if (deleted) {
        this.logger.info('Order deleted', { tenantId, orderId });
      }
      return deleted;
    });
  }

  async getStatusHistory(tenantId: string, orderId: string): Promise<OrderStatusHistory[]> {
    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId);
      return tx.orders.listStatusHistory(orderId);
    });
  }

  async addNote(tenantId: string, orderId: string, content: string, isCustomerNote: boolean = false): Promise<OrderNote> {
    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId);
      return tx.orders.addNote({ order_id: orderId, content, is_customer_note: isCustomerNote });
    });
  }

  async getNotes(tenantId: string, orderId: string, customerOnly: boolean = false): Promise<OrderNote[]> {
    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId);
      const notes = await tx.orders.listNotes(orderId);
      return customerOnly ? notes.filter(note => note.is_customer_note) : notes;
    });
  }

  async deleteNote(tenantId: string, orderId: string, noteId: string): Promise<boolean> {
    return this.uow.run(async (tx) => {
      await this.requireOrder(tx, tenantId, orderId);
      return tx.orders.deleteNote(orderId, noteId);
    });
  }

  private async requireOrder(tx: TransactionContext, tenantId: string, orderId: string, forUpdate = false): Promise<Order> {
    const order = await tx.orders.findById(tenantId, orderId, { forUpdate });
    if (!order) {
      throw new NotFoundError('Order', orderId);
    }
    return order;
  }

  private async applyTransition(
    tx: TransactionContext,
    tenantId: string,
    order: Order,
    status: OrderStatus,
    notes?: string
  ): Promise<Order> {
    const previousStatus = order.status;
    const event = assertTransition(previousStatus, status);

    const updated = await tx.orders.setStatus(tenantId, order.id, status, STATUS_TIMESTAMPS[status]);
    if (!updated) {
      throw new NotFoundError('Order', order.id);
    }

    await tx.orders.addStatusHistory({
      order_id: order.id,
      previous_status: previousStatus,
      status,
      notes: notes ?? null,
    });

    this.logger.info('Order status changed', { tenantId, orderId: order.id, event, from: previousStatus, to: status });

    const listener = this.listener;
    if (listener) {
      tx.onCommit(() => listener.onOrderStatusChanged({ tenantId, order: updated, previousStatus, status, notes }));
    }
    return updated;
  }
}
