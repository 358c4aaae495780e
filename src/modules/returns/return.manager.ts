import {
  ITEM_CONDITION,
  ItemCondition,
  ORDER_STATUS,
  OrderStatus,
  RETURN_STATUS,
  ReturnReason,
  ReturnStatus,
} from '../../constants';
import type {
  ReturnItem,
  ReturnRequest,
  ReturnRequestWithItems,
  ReturnTimestampField,
  UpdateReturnRequestInput,
} from '../../connections/db/models';
import type { TransactionContext, UnitOfWork } from '../../connections/db/unit-of-work';
import { ConflictError, InvalidTransitionError, NotFoundError, ValidationError } from '../../utils/errors';
import { generateReturnNumber } from '../../utils/identifiers';
import type { Logger } from '../../utils/logging';
import { assertAmount, assertPositiveQuantity } from '../../utils/validation';
import type { InventoryManager } from '../inventory/inventory.manager';
import type { OrderManager } from '../orders/order.manager';

export interface NewReturnItem {
  order_item_id: string;
  quantity: number;
  reason?: ReturnReason | null;
  condition?: ItemCondition | null;
}

export interface NewReturn {
  reason?: ReturnReason | null;
  customer_comments?: string | null;
  items: NewReturnItem[];
}

export interface RefundDetails {
  amount: number;
  method?: string | null;
  transaction_id?: string | null;
}

export const RETURN_TRANSITIONS: Record<ReturnStatus, readonly ReturnStatus[]> = {
  [RETURN_STATUS.REQUESTED]: [RETURN_STATUS.APPROVED, RETURN_STATUS.DENIED],
  [RETURN_STATUS.APPROVED]: [RETURN_STATUS.AWAITING_RECEIPT, RETURN_STATUS.RECEIVED],
  [RETURN_STATUS.AWAITING_RECEIPT]: [RETURN_STATUS.RECEIVED],
  [RETURN_STATUS.RECEIVED]: [RETURN_STATUS.INSPECTING, RETURN_STATUS.COMPLETED],
  [RETURN_STATUS.INSPECTING]: [RETURN_STATUS.COMPLETED],
  [RETURN_STATUS.COMPLETED]: [RETURN_STATUS.REFUNDED],
  [RETURN_STATUS.DENIED]: [],
  [RETURN_STATUS.REFUNDED]: [],
};

const RETURN_TIMESTAMPS: Partial<Record<ReturnStatus, ReturnTimestampField>> = {
  [RETURN_STATUS.APPROVED]: 'approved_at',
  [RETURN_STATUS.RECEIVED]: 'received_at',
  [RETURN_STATUS.COMPLETED]: 'completed_at',
  [RETURN_STATUS.REFUNDED]: 'refunded_at',
};

const RETURNABLE_ORDER_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.SHIPPED,
  ORDER_STATUS.DELIVERED,
  ORDER_STATUS.COMPLETED,
];

const appendNote = (existing: string | null, note: string, now: Date): string => {
  const line = `[${now.toISOString()}] ${note}`;
  return existing ? `${existing}\n${line}` : line;
};

export class ReturnManager {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly inventory: InventoryManager,
    private readonly orders: OrderManager,
    private readonly logger: Logger
  ) {}

  async createReturn(tenantId: string, orderId: string, input: NewReturn): Promise<ReturnRequestWithItems> {
    if (input.items.length === 0) {
      throw new ValidationError('At least one item is required');
    }
    for (const item of input.items) {
      assertPositiveQuantity(item.quantity);
    }

    return this.uow.run(async (tx) => {
      const order = await tx.orders.findById(tenantId, orderId, { forUpdate: true });
      if (!order) {
        throw new NotFoundError('Order', orderId);
      }
      if (!RETURNABLE_ORDER_STATUSES.includes(order.status)) {
        throw new ConflictError(`Order ${order.order_number} is ${order.status} and cannot be returned`, 'ORDER_NOT_RETURNABLE', {
          status: order.status,
        });
      }

      const request = await tx.returns.create({
        order_id: orderId,
        return_number: generateReturnNumber(),
        reason: input.reason,
        customer_comments: input.customer_comments,
      });

      const items: ReturnItem[] = [];
      for (const line of input.items) {
        const orderItem = await tx.orders.findItemById(orderId, line.order_item_id);
        if (!orderItem) {
          throw new NotFoundError('Order item', line.order_item_id);
        }

        // Counts this request's earlier lines too
        const alreadyReturned = await tx.returns.sumReturnedQuantity(orderItem.id);
        if (alreadyReturned + line.quantity > orderItem.quantity) {
          throw new ConflictError(
            `Cannot return ${line.quantity} of order item ${orderItem.id}: ${alreadyReturned} of ${orderItem.quantity} already returned`,
            'RETURN_QUANTITY_EXCEEDED',
            { ordered: orderItem.quantity, returned: alreadyReturned, requested: line.quantity }
          );
        }

        items.push(await tx.returns.addItem({
          return_id: request.id,
          order_item_id: orderItem.id,
          product_id: orderItem.product_id,
          quantity: line.quantity,
          reason: line.reason ?? input.reason,
          condition: line.condition,
        }));
      }

      this.logger.info('Return requested', { tenantId, orderId, returnId: request.id, returnNumber: request.return_number });
      return { ...request, items };
    });
  }

  /**
   * Receiving a return restocks every item not marked damaged and moves a
   * shipped, delivered or completed order to returned, all in one transaction.
   */
  async updateReturnStatus(
    tenantId: string,
    returnId: string,
    status: ReturnStatus,
    notes?: string
  ): Promise<ReturnRequestWithItems> {
    return this.uow.run(async (tx) => {
      const request = await this.requireReturn(tx, tenantId, returnId);
      this.assertReturnTransition(request.status, status);

      const updated = await this.writeStatus(tx, request, status, {
        admin_notes: notes ? appendNote(request.admin_notes, notes, new Date()) : undefined,
      });

      if (status === RETURN_STATUS.RECEIVED) {
        await this.restockItems(tx, tenantId, updated);
        // An order already returned or refunded through an earlier return stays put
        const order = await tx.orders.findById(tenantId, updated.order_id);
        if (order && RETURNABLE_ORDER_STATUSES.includes(order.status)) {
          await this.orders.updateStatus(tenantId, order.id, ORDER_STATUS.RETURNED, `Return ${updated.return_number} received`);
        }
      }

      this.logger.info('Return status changed', { tenantId, returnId, from: request.status, to: status });
      const items = await tx.returns.findItems(returnId);
      return { ...updated, items };
    });
  }

  async processRefund(tenantId: string, returnId: string, refund: RefundDetails): Promise<ReturnRequest> {
    assertAmount(refund.amount, 'amount');

    return this.uow.run(async (tx) => {
      const request = await this.requireReturn(tx, tenantId, returnId);
      this.assertReturnTransition(request.status, RETURN_STATUS.REFUNDED);

      const updated = await this.writeStatus(tx, request, RETURN_STATUS.REFUNDED, {
        refund_amount: refund.amount,
        refund_method: refund.method ?? null,
        refund_transaction_id: refund.transaction_id ?? null,
      });

      const order = await tx.orders.findById(tenantId, request.order_id);
      if (order && order.status === ORDER_STATUS.RETURNED) {
        await this.orders.updateStatus(
          tenantId,
          order.id,
          ORDER_STATUS.REFUNDED,
          `Refunded ${refund.amount} for return ${request.return_number}`
        );
      }

      this.logger.info('Return refunded', { tenantId, returnId, amount: refund.amount });
      return updated;
    });
  }

  async getReturn(tenantId: string, returnId: string): Promise<ReturnRequestWithItems | null> {
    return this.uow.run(async (tx) => {
      const request = await tx.returns.findById(tenantId, returnId);
      if (!request) {
        return null;
      }
      const items = await tx.returns.findItems(returnId);
      return { ...request, items };
    });
  }

  async getReturnsForOrder(tenantId: string, orderId: string): Promise<ReturnRequest[]> {
    return this.uow.run(async (tx) => {
      const order = await tx.orders.findById(tenantId, orderId);
      if (!order) {
        throw new NotFoundError('Order', orderId);
      }
      return tx.returns.findByOrder(orderId);
    });
  }

  private assertReturnTransition(from: ReturnStatus, to: ReturnStatus): void {
    if (!RETURN_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError('return', from, to);
    }
  }

  private async requireReturn(tx: TransactionContext, tenantId: string, returnId: string): Promise<ReturnRequest> {
    const request = await tx.returns.findById(tenantId, returnId, { forUpdate: true });
    if (!request) {
      throw new NotFoundError('Return', returnId);
    }
    return request;
  }

  private async writeStatus(
    tx: TransactionContext,
    request: ReturnRequest,
    status: ReturnStatus,
    fields: Omit<UpdateReturnRequestInput, 'status'>
  ): Promise<ReturnRequest> {
    const updated = await tx.returns.update(request.id, { status, ...fields }, RETURN_TIMESTAMPS[status]);
    if (!updated) {
      throw new NotFoundError('Return', request.id);
    }
    return updated;
  }

  private async restockItems(tx: TransactionContext, tenantId: string, request: ReturnRequest): Promise<void> {
    const items = await tx.returns.findItems(request.id);
    for (const item of items) {
      if (item.restocked || item.condition === ITEM_CONDITION.DAMAGED) {
        continue;
      }

      const restocked = await this.inventory.processReturn(
        tenantId,
        item.product_id,
        item.quantity,
        request.id,
        'return',
        `Return ${request.return_number}`
      );
      if (restocked) {
        await tx.returns.markRestocked(item.id);
      } else {
        this.logger.warn('Returned item not restocked: no inventory record', {
          tenantId,
          returnId: request.id,
          productId: item.product_id,
        });
      }
    }
  }
}
