import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_TRANSACTION_PAGE_SIZE, RETURN_STATUS } from '../../constants';
import type {
  InventoryRecord,
  InventoryTransaction,
  Order,
  OrderItem,
  OrderNote,
  OrderStatusHistory,
  Product,
  ReturnItem,
  ReturnRequest,
  Shipment,
  ShipmentItem,
  UpdateOrderInput,
} from '../../connections/db/models';
import type {
  InventoryRepository,
  LockOptions,
  OrderRepository,
  ProductRepository,
  Repositories,
  ReturnRepository,
  ShipmentRepository,
} from '../../connections/db/repositories/types';
import { BaseUnitOfWork } from '../../connections/db/unit-of-work';
import type { Logger } from '../../utils/logging';

interface State {
  products: Map<string, Product>;
  inventory: Map<string, InventoryRecord>;
  transactions: InventoryTransaction[];
  orders: Map<string, Order>;
  orderItems: Map<string, OrderItem>;
  history: OrderStatusHistory[];
  notes: Map<string, OrderNote>;
  shipments: Map<string, Shipment>;
  shipmentItems: Map<string, ShipmentItem>;
  returns: Map<string, ReturnRequest>;
  returnItems: Map<string, ReturnItem>;
}

const emptyState = (): State => ({
  products: new Map(),
  inventory: new Map(),
  transactions: [],
  orders: new Map(),
  orderItems: new Map(),
  history: [],
  notes: new Map(),
  shipments: new Map(),
  shipmentItems: new Map(),
  returns: new Map(),
  returnItems: new Map(),
});

const byCreatedAsc = <T extends { created_at: Date }>(a: T, b: T) => a.created_at.getTime() - b.created_at.getTime();
const byCreatedDesc = <T extends { created_at: Date }>(a: T, b: T) => b.created_at.getTime() - a.created_at.getTime();
const roundMoney = (value: number) => Math.round(value * 100) / 100;

// Lets other pending operations run, so interleavings show up
const yieldTurn = () => new Promise<void>(resolve => setImmediate(resolve));

/** Row locks taken by one transaction, released when it ends. */
export interface MemorySession {
  readonly held: Set<string>;
  readonly releases: Array<() => void>;
}

export const openSession = (): MemorySession => ({ held: new Set(), releases: [] });

/**
 * In-process stand-in for the Postgres schema. Rows are copied in and out.
 * Locking reads and inventory writes take row locks that are held until the
 * transaction ends, as Postgres row locks are.
 */
export class MemoryDatabase {
  state: State = emptyState();
  private clock = Date.UTC(2025, 0, 1);
  private readonly failures = new Map<string, Error>();
  private readonly rowLocks = new Map<string, Promise<void>>();

  now(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  /** The next call to `operation` (e.g. "inventory.addTransaction") throws `error`. */
  failNext(operation: string, error: Error = new Error(`${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  async enter(operation: string): Promise<void> {
    await yieldTurn();
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      throw failure;
    }
  }

  async lockRow(session: MemorySession, key: string): Promise<void> {
    if (session.held.has(key)) {
      return;
    }
    for (let holder = this.rowLocks.get(key); holder; holder = this.rowLocks.get(key)) {
      await holder;
    }
    let release: () => void = () => undefined;
    this.rowLocks.set(key, new Promise<void>(resolve => {
      release = resolve;
    }));
    session.held.add(key);
    session.releases.push(() => {
      this.rowLocks.delete(key);
      release();
    });
  }

  releaseLocks(session: MemorySession): void {
    for (const release of session.releases.splice(0)) {
      release();
    }
    session.held.clear();
  }

  snapshot(): State {
    return structuredClone(this.state);
  }

  restore(state: State): void {
    this.state = state;
  }

  seedProduct(tenantId: string, fields: Partial<Product> = {}): Product {
    const now = this.now();
    const product: Product = {
      id: uuidv4(),
      tenant_id: tenantId,
      name: 'Test product',
      sku: null,
      price: 10,
      stock: 0,
      created_at: now,
      updated_at: now,
      ...fields,
    };
    this.state.products.set(product.id, product);
    return { ...product };
  }

  inventoryFor(tenantId: string, productId: string): InventoryRecord | undefined {
    const record = [...this.state.inventory.values()].find(r => r.tenant_id === tenantId && r.product_id === productId);
    return record ? { ...record } : undefined;
  }

  ledgerFor(recordId: string): InventoryTransaction[] {
    return this.state.transactions.filter(t => t.inventory_record_id === recordId).map(t => ({ ...t }));
  }

  repositories(session: MemorySession = openSession()): Repositories {
    return {
      products: new MemoryProductRepository(this),
      inventory: new MemoryInventoryRepository(this, session),
      orders: new MemoryOrderRepository(this, session),
      shipments: new MemoryShipmentRepository(this, session),
      returns: new MemoryReturnRepository(this, session),
    };
  }
}

class MemoryProductRepository implements ProductRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async findById(tenantId: string, productId: string) {
    await this.db.enter('products.findById');
    const product = this.db.state.products.get(productId);
    return product && product.tenant_id === tenantId ? { ...product } : null;
  }

  async updateStock(tenantId: string, productId: string, stock: number) {
    await this.db.enter('products.updateStock');
    const product = this.db.state.products.get(productId);
    if (product && product.tenant_id === tenantId) {
      product.stock = stock;
      product.updated_at = this.db.now();
    }
  }
}

class MemoryInventoryRepository implements InventoryRepository {
  constructor(private readonly db: MemoryDatabase, private readonly session: MemorySession) {}

  private find(tenantId: string, productId: string): InventoryRecord | undefined {
    return [...this.db.state.inventory.values()].find(r => r.tenant_id === tenantId && r.product_id === productId);
  }

  // Waits for the row lock, then reads the row as its previous holder left it
  private async lock(tenantId: string, productId: string): Promise<InventoryRecord | undefined> {
    const record = this.find(tenantId, productId);
    if (!record) {
      return undefined;
    }
    await this.db.lockRow(this.session, `inventory:${record.id}`);
    return this.db.state.inventory.get(record.id);
  }

  async findByProduct(tenantId: string, productId: string, options: LockOptions = {}) {
    await this.db.enter('inventory.findByProduct');
    const record = options.forUpdate ? await this.lock(tenantId, productId) : this.find(tenantId, productId);
    return record ? { ...record } : null;
  }

  async findBySku(tenantId: string, sku: string) {
    await this.db.enter('inventory.findBySku');
    const record = [...this.db.state.inventory.values()]
      .sort(byCreatedAsc)
      .find(r => r.tenant_id === tenantId && r.sku === sku);
    return record ? { ...record } : null;
  }

  async createIfAbsent(input: Parameters<InventoryRepository['createIfAbsent']>[0]) {
    await this.db.enter('inventory.createIfAbsent');
    if (this.find(input.tenant_id, input.product_id)) {
      return null;
    }
    const now = this.db.now();
    const record: InventoryRecord = {
      id: uuidv4(),
      tenant_id: input.tenant_id,
      product_id: input.product_id,
      sku: input.sku ?? null,
      location: input.location ?? null,
      quantity: input.quantity,
      reserved_quantity: 0,
      available_quantity: input.quantity,
      reorder_point: input.reorder_point ?? 0,
      reorder_quantity: input.reorder_quantity ?? 0,
      metadata: { ...(input.metadata ?? {}) },
      created_at: now,
      updated_at: now,
    };
    this.db.state.inventory.set(record.id, record);
    await this.db.lockRow(this.session, `inventory:${record.id}`);
    return { ...record };
  }

  async update(id: string, input: Parameters<InventoryRepository['update']>[1]) {
    await this.db.enter('inventory.update');
    await this.db.lockRow(this.session, `inventory:${id}`);
    const record = this.db.state.inventory.get(id);
    if (!record) {
      throw new Error(`inventory record ${id} missing`);
    }
    record.quantity = input.quantity;
    record.available_quantity = input.quantity - record.reserved_quantity;
    record.sku = input.sku ?? record.sku;
    record.location = input.location ?? record.location;
    record.reorder_point = input.reorder_point ?? record.reorder_point;
    record.reorder_quantity = input.reorder_quantity ?? record.reorder_quantity;
    record.metadata = { ...record.metadata, ...(input.metadata ?? {}) };
    record.updated_at = this.db.now();
    return { ...record };
  }

  async reserve(tenantId: string, productId: string, quantity: number) {
    await this.db.enter('inventory.reserve');
    const record = await this.lock(tenantId, productId);
    if (!record || record.available_quantity < quantity) {
      return null;
    }
    record.reserved_quantity += quantity;
    record.available_quantity -= quantity;
    record.updated_at = this.db.now();
    return { ...record };
  }

  async release(tenantId: string, productId: string, quantity: number) {
    await this.db.enter('inventory.release');
    const record = await this.lock(tenantId, productId);
    if (!record) {
      return null;
    }
    const released = Math.min(record.reserved_quantity, quantity);
    record.reserved_quantity -= released;
    record.available_quantity += released;
    record.updated_at = this.db.now();
    return { record: { ...record }, released };
  }

  async consumeReservation(tenantId: string, productId: string, quantity: number) {
    await this.db.enter('inventory.consumeReservation');
    const record = await this.lock(tenantId, productId);
    if (!record) {
      return null;
    }
    record.reserved_quantity = Math.max(0, record.reserved_quantity - quantity);
    record.updated_at = this.db.now();
    return { ...record };
  }

  async restock(tenantId: string, productId: string, quantity: number) {
    await this.db.enter('inventory.restock');
    const record = await this.lock(tenantId, productId);
    if (!record) {
      return null;
    }
    record.quantity += quantity;
    record.available_quantity += quantity;
    record.updated_at = this.db.now();
    return { ...record };
  }

  async findLowStock(tenantId: string) {
    await this.db.enter('inventory.findLowStock');
    return [...this.db.state.inventory.values()]
      .filter(r => r.tenant_id === tenantId && r.reorder_point > 0 && r.quantity <= r.reorder_point)
      .flatMap(r => {
        const product = this.db.state.products.get(r.product_id);
        return product ? [{ ...r, product_name: product.name, product_sku: product.sku }] : [];
      })
      .sort((a, b) => a.quantity - b.quantity || a.product_name.localeCompare(b.product_name));
  }

  async addTransaction(input: Parameters<InventoryRepository['addTransaction']>[0]) {
    await this.db.enter('inventory.addTransaction');
    const transaction: InventoryTransaction = {
      id: uuidv4(),
      inventory_record_id: input.inventory_record_id,
      transaction_type: input.transaction_type,
      quantity: input.quantity,
      reference_id: input.reference_id ?? null,
      reference_type: input.reference_type ?? null,
      notes: input.notes ?? null,
      created_by: input.created_by ?? null,
      metadata: { ...(input.metadata ?? {}) },
      created_at: this.db.now(),
    };
    this.db.state.transactions.push(transaction);
    return { ...transaction };
  }

  async listTransactions(inventoryRecordId: string, filter: Parameters<InventoryRepository['listTransactions']>[1]) {
    await this.db.enter('inventory.listTransactions');
    return this.db.state.transactions
      .filter(t => t.inventory_record_id === inventoryRecordId)
      .filter(t => !filter.transaction_type || t.transaction_type === filter.transaction_type)
      .filter(t => !filter.start_date || t.created_at >= filter.start_date)
      .filter(t => !filter.end_date || t.created_at <= filter.end_date)
      .sort(byCreatedDesc)
      .slice(0, filter.limit ?? DEFAULT_TRANSACTION_PAGE_SIZE)
      .map(t => ({ ...t }));
  }
}

const ORDER_UPDATABLE: ReadonlyArray<keyof UpdateOrderInput> = [
  'email',
  'customer_name',
  'shipping_address',
  'billing_address',
  'payment_method',
  'shipping_method',
];

class MemoryOrderRepository implements OrderRepository {
  constructor(private readonly db: MemoryDatabase, private readonly session: MemorySession) {}

  private find(tenantId: string, orderId: string): Order | undefined {
    const order = this.db.state.orders.get(orderId);
    return order && order.tenant_id === tenantId ? order : undefined;
  }

  async create(input: Parameters<OrderRepository['create']>[0]) {
    await this.db.enter('orders.create');
    const now = this.db.now();
    const order: Order = {
      id: uuidv4(),
      tenant_id: input.tenant_id,
      user_id: input.user_id ?? null,
      order_number: input.order_number,
      email: input.email,
      customer_name: input.customer_name ?? null,
      status: 'pending',
      total: 0,
      shipping_address: input.shipping_address ?? null,
      billing_address: input.billing_address ?? null,
      payment_method: input.payment_method ?? null,
      shipping_method: input.shipping_method ?? null,
      paid_at: null,
      shipped_at: null,
      delivered_at: null,
      cancelled_at: null,
      created_at: now,
      updated_at: now,
    };
    this.db.state.orders.set(order.id, order);
    return { ...order };
  }

  async findById(tenantId: string, orderId: string, options: LockOptions = {}) {
    await this.db.enter('orders.findById');
    if (options.forUpdate && this.find(tenantId, orderId)) {
      await this.db.lockRow(this.session, `orders:${orderId}`);
    }
    const order = this.find(tenantId, orderId);
    return order ? { ...order } : null;
  }

  async list(tenantId: string, filter: Parameters<OrderRepository['list']>[1]) {
    await this.db.enter('orders.list');
    const offset = filter.offset ?? 0;
    return [...this.db.state.orders.values()]
      .filter(o => o.tenant_id === tenantId)
      .filter(o => !filter.status || o.status === filter.status)
      .filter(o => !filter.email || o.email.toLowerCase() === filter.email.toLowerCase())
      .filter(o => !filter.user_id || o.user_id === filter.user_id)
      .filter(o => filter.min_total === undefined || o.total >= filter.min_total)
      .filter(o => filter.max_total === undefined || o.total <= filter.max_total)
      .filter(o => !filter.date_from || o.created_at >= filter.date_from)
      .filter(o => !filter.date_to || o.created_at <= filter.date_to)
      .sort(byCreatedDesc)
      .slice(offset, offset + (filter.limit ?? 50))
      .map(o => ({ ...o }));
  }

  async update(tenantId: string, orderId: string, input: UpdateOrderInput) {
    await this.db.enter('orders.update');
    const order = this.find(tenantId, orderId);
    if (!order) {
      return null;
    }
    const changes: UpdateOrderInput = {};
    for (const column of ORDER_UPDATABLE) {
      if (input[column] !== undefined) {
        Object.assign(changes, { [column]: input[column] });
      }
    }
    Object.assign(order, changes, { updated_at: this.db.now() });
    return { ...order };
  }

  async setStatus(tenantId: string, orderId: string, status: Order['status'], stamp?: Parameters<OrderRepository['setStatus']>[3]) {
    await this.db.enter('orders.setStatus');
    const order = this.find(tenantId, orderId);
    if (!order) {
      return null;
    }
    const now = this.db.now();
    order.status = status;
    order.updated_at = now;
    if (stamp && order[stamp] === null) {
      order[stamp] = now;
    }
    return { ...order };
  }

  async incrementTotal(tenantId: string, orderId: string, amount: number) {
    await this.db.enter('orders.incrementTotal');
    const order = this.find(tenantId, orderId);
    if (!order) {
      return null;
    }
    order.total = roundMoney(order.total + amount);
    order.updated_at = this.db.now();
    return { ...order };
  }

  async delete(tenantId: string, orderId: string) {
    await this.db.enter('orders.delete');
    if (!this.find(tenantId, orderId)) {
      return false;
    }
    const { state } = this.db;
    state.orders.delete(orderId);
    state.history = state.history.filter(h => h.order_id !== orderId);
    for (const [id, item] of state.orderItems) if (item.order_id === orderId) state.orderItems.delete(id);
    for (const [id, note] of state.notes) if (note.order_id === orderId) state.notes.delete(id);
    for (const [id, shipment] of state.shipments) {
      if (shipment.order_id !== orderId) continue;
      state.shipments.delete(id);
      for (const [itemId, item] of state.shipmentItems) if (item.shipment_id === id) state.shipmentItems.delete(itemId);
    }
    for (const [id, request] of state.returns) {
      if (request.order_id !== orderId) continue;
      state.returns.delete(id);
      for (const [itemId, item] of state.returnItems) if (item.return_id === id) state.returnItems.delete(itemId);
    }
    return true;
  }

  async addItem(input: Parameters<OrderRepository['addItem']>[0]) {
    await this.db.enter('orders.addItem');
    const item: OrderItem = {
      id: uuidv4(),
      order_id: input.order_id,
      product_id: input.product_id,
      quantity: input.quantity,
      price: input.price,
      cost: input.cost ?? null,
      name: input.name ?? null,
      sku: input.sku ?? null,
      created_at: this.db.now(),
    };
    this.db.state.orderItems.set(item.id, item);
    return { ...item };
  }

  async findItems(orderId: string) {
    await this.db.enter('orders.findItems');
    return [...this.db.state.orderItems.values()]
      .filter(i => i.order_id === orderId)
      .sort(byCreatedAsc)
      .map(i => ({ ...i }));
  }

  async findItemById(orderId: string, orderItemId: string) {
    await this.db.enter('orders.findItemById');
    const item = this.db.state.orderItems.get(orderItemId);
    return item && item.order_id === orderId ? { ...item } : null;
  }

  async addStatusHistory(input: Parameters<OrderRepository['addStatusHistory']>[0]) {
    await this.db.enter('orders.addStatusHistory');
    const row: OrderStatusHistory = {
      id: uuidv4(),
      order_id: input.order_id,
      previous_status: input.previous_status,
      status: input.status,
      notes: input.notes ?? null,
      created_at: this.db.now(),
    };
    this.db.state.history.push(row);
    return { ...row };
  }

  async listStatusHistory(orderId: string) {
    await this.db.enter('orders.listStatusHistory');
    return this.db.state.history
      .filter(h => h.order_id === orderId)
      .sort(byCreatedAsc)
      .map(h => ({ ...h }));
  }

  async addNote(input: Parameters<OrderRepository['addNote']>[0]) {
    await this.db.enter('orders.addNote');
    const note: OrderNote = {
      id: uuidv4(),
      order_id: input.order_id,
      content: input.content,
      is_customer_note: input.is_customer_note ?? false,
      created_at: this.db.now(),
    };
    this.db.state.notes.set(note.id, note);
    return { ...note };
  }

  async listNotes(orderId: string) {
    await this.db.enter('orders.listNotes');
    return [...this.db.state.notes.values()]
      .filter(n => n.order_id === orderId)
      .sort(byCreatedDesc)
      .map(n => ({ ...n }));
  }

  async deleteNote(orderId: string, noteId: string) {
    await this.db.enter('orders.deleteNote');
    const note = this.db.state.notes.get(noteId);
    if (!note || note.order_id !== orderId) {
      return false;
    }
    return this.db.state.notes.delete(noteId);
  }
}

class MemoryShipmentRepository implements ShipmentRepository {
  constructor(private readonly db: MemoryDatabase, private readonly session: MemorySession) {}

  async create(input: Parameters<ShipmentRepository['create']>[0]) {
    await this.db.enter('shipments.create');
    const now = this.db.now();
    const shipment: Shipment = {
      id: uuidv4(),
      order_id: input.order_id,
      status: 'pending',
      shipping_method: input.shipping_method,
      carrier: input.carrier ?? null,
      tracking_number: input.tracking_number ?? null,
      tracking_url: input.tracking_url ?? null,
      label_url: input.label_url ?? null,
      shipping_address: input.shipping_address ?? null,
      estimated_delivery: null,
      shipped_at: null,
      delivered_at: null,
      metadata: { ...(input.metadata ?? {}) },
      created_at: now,
      updated_at: now,
    };
    this.db.state.shipments.set(shipment.id, shipment);
    return { ...shipment };
  }

  async findById(tenantId: string, shipmentId: string, options: LockOptions = {}) {
    await this.db.enter('shipments.findById');
    if (options.forUpdate && this.db.state.shipments.has(shipmentId)) {
      await this.db.lockRow(this.session, `shipments:${shipmentId}`);
    }
    const shipment = this.db.state.shipments.get(shipmentId);
    const order = shipment ? this.db.state.orders.get(shipment.order_id) : undefined;
    return shipment && order && order.tenant_id === tenantId ? { ...shipment } : null;
  }

  async findByOrder(orderId: string) {
    await this.db.enter('shipments.findByOrder');
    return [...this.db.state.shipments.values()]
      .filter(s => s.order_id === orderId)
      .sort(byCreatedAsc)
      .map(s => ({ ...s }));
  }

  async update(shipmentId: string, input: Parameters<ShipmentRepository['update']>[1]) {
    await this.db.enter('shipments.update');
    const shipment = this.db.state.shipments.get(shipmentId);
    if (!shipment) {
      return null;
    }
    const now = this.db.now();
    shipment.status = input.status;
    shipment.tracking_number = input.tracking_number ?? shipment.tracking_number;
    shipment.tracking_url = input.tracking_url ?? shipment.tracking_url;
    shipment.estimated_delivery = input.estimated_delivery ?? shipment.estimated_delivery;
    shipment.metadata = { ...shipment.metadata, ...(input.metadata ?? {}) };
    if (input.status === 'shipped' && shipment.shipped_at === null) {
      shipment.shipped_at = now;
    }
    if (input.status === 'delivered' && shipment.delivered_at === null) {
      shipment.delivered_at = now;
    }
    shipment.updated_at = now;
    return { ...shipment };
  }

  async addItem(input: Parameters<ShipmentRepository['addItem']>[0]) {
    await this.db.enter('shipments.addItem');
    const item: ShipmentItem = { id: uuidv4(), ...input, created_at: this.db.now() };
    this.db.state.shipmentItems.set(item.id, item);
    return { ...item };
  }

  async findItems(shipmentId: string) {
    await this.db.enter('shipments.findItems');
    return [...this.db.state.shipmentItems.values()]
      .filter(i => i.shipment_id === shipmentId)
      .sort(byCreatedAsc)
      .map(i => ({ ...i }));
  }

  async sumShippedQuantity(orderItemId: string) {
    await this.db.enter('shipments.sumShippedQuantity');
    return [...this.db.state.shipmentItems.values()]
      .filter(i => i.order_item_id === orderItemId)
      .reduce((sum, i) => sum + i.quantity, 0);
  }
}

class MemoryReturnRepository implements ReturnRepository {
  constructor(private readonly db: MemoryDatabase, private readonly session: MemorySession) {}

  async create(input: Parameters<ReturnRepository['create']>[0]) {
    await this.db.enter('returns.create');
    const now = this.db.now();
    const request: ReturnRequest = {
      id: uuidv4(),
      order_id: input.order_id,
      return_number: input.return_number,
      status: 'requested',
      reason: input.reason ?? null,
      customer_comments: input.customer_comments ?? null,
      admin_notes: null,
      refund_amount: null,
      refund_method: null,
      refund_transaction_id: null,
      requested_at: now,
      approved_at: null,
      received_at: null,
      completed_at: null,
      refunded_at: null,
      created_at: now,
      updated_at: now,
    };
    this.db.state.returns.set(request.id, request);
    return { ...request };
  }

  async findById(tenantId: string, returnId: string, options: LockOptions = {}) {
    await this.db.enter('returns.findById');
    if (options.forUpdate && this.db.state.returns.has(returnId)) {
      await this.db.lockRow(this.session, `returns:${returnId}`);
    }
    const request = this.db.state.returns.get(returnId);
    const order = request ? this.db.state.orders.get(request.order_id) : undefined;
    return request && order && order.tenant_id === tenantId ? { ...request } : null;
  }

  async findByOrder(orderId: string) {
    await this.db.enter('returns.findByOrder');
    return [...this.db.state.returns.values()]
      .filter(r => r.order_id === orderId)
      .sort((a, b) => b.requested_at.getTime() - a.requested_at.getTime())
      .map(r => ({ ...r }));
  }

  async update(
    returnId: string,
    input: Parameters<ReturnRepository['update']>[1],
    stamp?: Parameters<ReturnRepository['update']>[2]
  ) {
    await this.db.enter('returns.update');
    const request = this.db.state.returns.get(returnId);
    if (!request) {
      return null;
    }
    const now = this.db.now();
    if (input.status !== undefined) request.status = input.status;
    if (input.admin_notes !== undefined) request.admin_notes = input.admin_notes;
    if (input.refund_amount !== undefined) request.refund_amount = input.refund_amount;
    if (input.refund_method !== undefined) request.refund_method = input.refund_method;
    if (input.refund_transaction_id !== undefined) request.refund_transaction_id = input.refund_transaction_id;
    if (stamp && request[stamp] === null) {
      request[stamp] = now;
    }
    request.updated_at = now;
    return { ...request };
  }

  async addItem(input: Parameters<ReturnRepository['addItem']>[0]) {
    await this.db.enter('returns.addItem');
    const item: ReturnItem = {
      id: uuidv4(),
      return_id: input.return_id,
      order_item_id: input.order_item_id,
      product_id: input.product_id,
      quantity: input.quantity,
      reason: input.reason ?? null,
      condition: input.condition ?? null,
      restocked: false,
      created_at: this.db.now(),
    };
    this.db.state.returnItems.set(item.id, item);
    return { ...item };
  }

  async findItems(returnId: string) {
    await this.db.enter('returns.findItems');
    return [...this.db.state.returnItems.values()]
      .filter(i => i.return_id === returnId)
      .sort(byCreatedAsc)
      .map(i => ({ ...i }));
  }

  async markRestocked(returnItemId: string) {
    await this.db.enter('returns.markRestocked');
    const item = this.db.state.returnItems.get(returnItemId);
    if (item) {
      item.restocked = true;
    }
  }

  async sumReturnedQuantity(orderItemId: string) {
    await this.db.enter('returns.sumReturnedQuantity');
    return [...this.db.state.returnItems.values()]
      .filter(i => i.order_item_id === orderItemId)
      .filter(i => this.db.state.returns.get(i.return_id)?.status !== RETURN_STATUS.DENIED)
      .reduce((sum, i) => sum + i.quantity, 0);
  }
}

export interface MemoryUnitOfWorkOptions {
  /**
   * Let transactions overlap at every repository call instead of queueing
   * them. Row locks still apply. A failed interleaved transaction keeps its
   * writes, since undoing them would also undo its neighbours' work.
   */
  interleaved?: boolean;
}

/**
 * Unit of work over a MemoryDatabase. By default transactions run one at a
 * time and a failed one leaves no trace.
 */
export class MemoryUnitOfWork extends BaseUnitOfWork {
  private queue: Promise<void> = Promise.resolve();
  private active = 0;
  commits = 0;
  rollbacks = 0;
  /** Most transactions seen open at once. */
  maxConcurrent = 0;

  constructor(
    private readonly db: MemoryDatabase,
    logger: Logger,
    private readonly options: MemoryUnitOfWorkOptions = {}
  ) {
    super(logger);
  }

  protected async transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    const releaseTurn = this.options.interleaved ? () => undefined : await this.takeTurn();
    const before = this.options.interleaved ? null : this.db.snapshot();
    const session = openSession();
    this.active += 1;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);

    try {
      const result = await work(this.db.repositories(session));
      this.commits += 1;
      return result;
    } catch (error) {
      if (before) {
        this.db.restore(before);
      }
      this.rollbacks += 1;
      throw error;
    } finally {
      this.active -= 1;
      this.db.releaseLocks(session);
      releaseTurn();
    }
  }

  private async takeTurn(): Promise<() => void> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>(resolve => {
      release = resolve;
    });
    await previous;
    return release;
  }
}
