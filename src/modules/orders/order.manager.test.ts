import { beforeEach, describe, expect, it, Mock, vi } from 'vitest';
import { createTestContext, OTHER_TENANT_ID, TENANT_ID, TestContext } from '../../__tests__/helpers/test-context';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../utils/errors';
import type { OrderStatusChange } from './order.manager';

describe('OrderManager', () => {
  let ctx: TestContext;
  let onOrderStatusChanged: Mock<(change: OrderStatusChange) => Promise<void>>;
  let productId: string;

  beforeEach(() => {
    onOrderStatusChanged = vi.fn<(change: OrderStatusChange) => Promise<void>>().mockResolvedValue(undefined);
    ctx = createTestContext({ onOrderStatusChanged });
    productId = ctx.db.seedProduct(TENANT_ID, { name: 'Notebook', sku: 'NB-A5', price: 10 }).id;
  });

  const newOrder = () => ctx.orders.createOrder(TENANT_ID, { email: 'buyer@example.com', customer_name: 'Sam Buyer' });

  describe('createOrder', () => {
    it('starts pending with a creation history row', async () => {
      const order = await newOrder();

      expect(order.status).toBe('pending');
      expect(order.total).toBe(0);
      expect(order.order_number).toMatch(/^ORD-\d{6}-[0-9A-F]{8}$/);

      const history = await ctx.orders.getStatusHistory(TENANT_ID, order.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ previous_status: null, status: 'pending', notes: 'Order created' });
    });
  });

  describe('addItemToOrder', () => {
    it('adds each line to the order total', async () => {
      const order = await newOrder();
      const second = ctx.db.seedProduct(TENANT_ID, { name: 'Pen', price: 5 });

      await ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 2, price: 10 });
      await ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: second.id, quantity: 1, price: 5 });

      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ total: 25 });
      const items = await ctx.orders.getOrderItems(TENANT_ID, order.id);
      expect(items.map(i => [i.name, i.quantity, i.price])).toEqual([['Notebook', 2, 10], ['Pen', 1, 5]]);
      expect(items[0].sku).toBe('NB-A5');
    });

    it('keeps cent totals exact', async () => {
      const order = await newOrder();

      await ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 3, price: 0.1 });
      await ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 1, price: 0.2 });

      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ total: 0.5 });
    });

    it('rejects unknown products and bad quantities', async () => {
      const order = await newOrder();

      await expect(
        ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: 'missing', quantity: 1, price: 1 })
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 0, price: 1 })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 1, price: -1 })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(ctx.orders.getOrderItems(TENANT_ID, order.id)).resolves.toEqual([]);
    });

    it('does not add to orders of another tenant', async () => {
      const order = await newOrder();
      await expect(
        ctx.orders.addItemToOrder(OTHER_TENANT_ID, order.id, { product_id: productId, quantity: 1, price: 1 })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateStatus', () => {
    it('records the transition and stamps the timestamp', async () => {
      const order = await newOrder();

      const paid = await ctx.orders.updateStatus(TENANT_ID, order.id, 'paid', 'Card captured');

      expect(paid.status).toBe('paid');
      expect(paid.paid_at).toBeInstanceOf(Date);
      const history = await ctx.orders.getStatusHistory(TENANT_ID, order.id);
      expect(history.map(h => [h.previous_status, h.status, h.notes])).toEqual([
        [null, 'pending', 'Order created'],
        ['pending', 'paid', 'Card captured'],
      ]);
    });

    it('rejects moves that skip steps', async () => {
      const order = await newOrder();

      await expect(ctx.orders.updateStatus(TENANT_ID, order.id, 'delivered')).rejects.toBeInstanceOf(InvalidTransitionError);

      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ status: 'pending', delivered_at: null });
      await expect(ctx.orders.getStatusHistory(TENANT_ID, order.id)).resolves.toHaveLength(1);
    });

    it('keeps cancelled orders cancelled', async () => {
      const order = await newOrder();
      await ctx.orders.updateStatus(TENANT_ID, order.id, 'cancelled');

      await expect(ctx.orders.updateStatus(TENANT_ID, order.id, 'paid')).rejects.toMatchObject({
        code: 'INVALID_STATUS_TRANSITION',
      });
      await expect(ctx.orders.updateStatus(TENANT_ID, order.id, 'refunded')).resolves.toMatchObject({ status: 'refunded' });
    });

    it('treats the current status as a no-op', async () => {
      const order = await newOrder();

      await ctx.orders.updateStatus(TENANT_ID, order.id, 'pending');

      await expect(ctx.orders.getStatusHistory(TENANT_ID, order.id)).resolves.toHaveLength(1);
      expect(onOrderStatusChanged).not.toHaveBeenCalled();
    });

    it('throws for unknown orders', async () => {
      await expect(ctx.orders.updateStatus(TENANT_ID, 'missing', 'paid')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('status listener', () => {
    it('hears about committed transitions', async () => {
      const order = await newOrder();

      await ctx.orders.updateStatus(TENANT_ID, order.id, 'paid', 'Card captured');

      expect(onOrderStatusChanged).toHaveBeenCalledTimes(1);
      const [change] = onOrderStatusChanged.mock.calls[0];
      expect(change).toMatchObject({
        tenantId: TENANT_ID,
        previousStatus: 'pending',
        status: 'paid',
        notes: 'Card captured',
      });
      expect(change.order.id).toBe(order.id);
    });

    it('hears nothing when the surrounding transaction rolls back', async () => {
      const order = await newOrder();

      await expect(
        ctx.uow.run(async () => {
          await ctx.orders.updateStatus(TENANT_ID, order.id, 'paid');
          throw new Error('payment capture failed');
        })
      ).rejects.toThrow('payment capture failed');

      expect(onOrderStatusChanged).not.toHaveBeenCalled();
      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ status: 'pending', paid_at: null });
    });

    it('does not undo the transition when the listener fails', async () => {
      onOrderStatusChanged.mockRejectedValue(new Error('smtp down'));
      const order = await newOrder();

      await expect(ctx.orders.updateStatus(TENANT_ID, order.id, 'paid')).resolves.toMatchObject({ status: 'paid' });
      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ status: 'paid' });
    });
  });

  describe('advanceTo', () => {
    it('steps through each intermediate status', async () => {
      const order = await newOrder();

      const shipped = await ctx.orders.advanceTo(TENANT_ID, order.id, 'shipped', 'Left the warehouse');

      expect(shipped.status).toBe('shipped');
      expect(shipped.shipped_at).toBeInstanceOf(Date);
      expect(shipped.paid_at).toBeNull();
      const history = await ctx.orders.getStatusHistory(TENANT_ID, order.id);
      expect(history.map(h => h.status)).toEqual(['pending', 'processing', 'shipped']);
      expect(onOrderStatusChanged).toHaveBeenCalledTimes(2);
    });

    it('never moves an order backwards', async () => {
      const order = await newOrder();
      await ctx.orders.advanceTo(TENANT_ID, order.id, 'delivered');

      const again = await ctx.orders.advanceTo(TENANT_ID, order.id, 'shipped');

      expect(again.status).toBe('delivered');
    });
  });

  describe('updateOrder', () => {
    it('updates fields and status together', async () => {
      const order = await newOrder();

      const updated = await ctx.orders.updateOrder(TENANT_ID, order.id, {
        customer_name: 'Sam B.',
        shipping_method: 'express',
        status: 'paid',
        notes: 'Paid by phone',
      });

      expect(updated).toMatchObject({ customer_name: 'Sam B.', shipping_method: 'express', status: 'paid' });
      expect(updated.email).toBe('buyer@example.com');
    });

    it('rolls field changes back with an illegal status', async () => {
      const order = await newOrder();

      await expect(
        ctx.orders.updateOrder(TENANT_ID, order.id, { customer_name: 'Changed', status: 'completed' })
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toMatchObject({ customer_name: 'Sam Buyer' });
    });
  });

  describe('notes', () => {
    it('adds, filters and deletes notes', async () => {
      const order = await newOrder();
      await ctx.orders.addNote(TENANT_ID, order.id, 'Gift wrap requested', true);
      const internal = await ctx.orders.addNote(TENANT_ID, order.id, 'Check address');

      await expect(ctx.orders.getNotes(TENANT_ID, order.id)).resolves.toHaveLength(2);
      const visible = await ctx.orders.getNotes(TENANT_ID, order.id, true);
      expect(visible.map(n => n.content)).toEqual(['Gift wrap requested']);

      await expect(ctx.orders.deleteNote(TENANT_ID, order.id, internal.id)).resolves.toBe(true);
      await expect(ctx.orders.deleteNote(TENANT_ID, order.id, internal.id)).resolves.toBe(false);
    });

    it('requires the order to exist', async () => {
      await expect(ctx.orders.addNote(TENANT_ID, 'missing', 'hello')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('queries', () => {
    it('lists by status and by user, newest first', async () => {
      const first = await ctx.orders.createOrder(TENANT_ID, { email: 'a@example.com', user_id: 'user-1' });
      const second = await ctx.orders.createOrder(TENANT_ID, { email: 'b@example.com', user_id: 'user-1' });
      await ctx.orders.createOrder(OTHER_TENANT_ID, { email: 'c@example.com', user_id: 'user-1' });
      await ctx.orders.updateStatus(TENANT_ID, first.id, 'paid');

      const paid = await ctx.orders.listOrders(TENANT_ID, { status: 'paid' });
      expect(paid.map(o => o.id)).toEqual([first.id]);

      const byUser = await ctx.orders.getOrdersByUser(TENANT_ID, 'user-1');
      expect(byUser.map(o => o.id)).toEqual([second.id, first.id]);
    });

    it('returns the full order view', async () => {
      const order = await newOrder();
      await ctx.orders.addItemToOrder(TENANT_ID, order.id, { product_id: productId, quantity: 1, price: 10 });
      await ctx.orders.addNote(TENANT_ID, order.id, 'Leave at door', true);

      const details = await ctx.orders.getOrderDetails(TENANT_ID, order.id);

      expect(details?.order.total).toBe(10);
      expect(details?.items).toHaveLength(1);
      expect(details?.history).toHaveLength(1);
      expect(details?.notes).toHaveLength(1);
      expect(details?.shipments).toEqual([]);
      await expect(ctx.orders.getOrderDetails(OTHER_TENANT_ID, order.id)).resolves.toBeNull();
    });

    it('deletes an order once', async () => {
      const order = await newOrder();

      await expect(ctx.orders.deleteOrder(TENANT_ID, order.id)).resolves.toBe(true);
      await expect(ctx.orders.getOrder(TENANT_ID, order.id)).resolves.toBeNull();
      await expect(ctx.orders.deleteOrder(TENANT_ID, order.id)).resolves.toBe(false);
    });
  });
});
