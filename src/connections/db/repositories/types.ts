import type { PoolClient } from 'pg';
import type { OrderStatus } from '../../../constants';
import type {
  CreateInventoryRecordInput,
  CreateInventoryTransactionInput,
  CreateOrderInput,
  CreateOrderItemInput,
  CreateOrderNoteInput,
  CreateOrderStatusHistoryInput,
  CreateReturnItemInput,
  CreateReturnRequestInput,
  CreateShipmentInput,
  CreateShipmentItemInput,
  InventoryRecord,
  InventoryTransaction,
  InventoryTransactionFilter,
  LowStockItem,
  Order,
  OrderFilter,
  OrderItem,
  OrderNote,
  OrderStatusHistory,
  OrderTimestampField,
  Product,
  ReturnItem,
  ReturnRequest,
  ReturnTimestampField,
  Shipment,
  ShipmentItem,
  UpdateInventoryRecordInput,
  UpdateOrderInput,
  UpdateReturnRequestInput,
  UpdateShipmentInput,
} from '../models';

/**
 * The slice of a pg client the repositories use; a pool client inside a
 * transaction in production, a mock in tests.
 */
export type Queryable = Pick<PoolClient, 'query'>;

export interface LockOptions {
  forUpdate?: boolean;
}

export interface ProductRepository {
  findById(tenantId: string, productId: string): Promise<Product | null>;
  updateStock(tenantId: string, productId: string, stock: number): Promise<void>;
}

export interface ReleaseResult {
  record: InventoryRecord;
  released: number;
}

export interface InventoryRepository {
  findByProduct(tenantId: string, productId: string, options?: LockOptions): Promise<InventoryRecord | null>;
  findBySku(tenantId: string, sku: string): Promise<InventoryRecord | null>;
  /** Inserts the record; null when one already exists for the product. */
  createIfAbsent(input: CreateInventoryRecordInput): Promise<InventoryRecord | null>;
  /** Sets quantity and recomputes available from the stored reservation. */
  update(id: string, input: UpdateInventoryRecordInput): Promise<InventoryRecord>;
  /** Conditional reservation; null when the record is missing or short of stock. */
  reserve(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null>;
  release(tenantId: string, productId: string, quantity: number): Promise<ReleaseResult | null>;
  /** Drops the reservation for sold units, floored at zero. Available is left alone. */
  consumeReservation(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null>;
  restock(tenantId: string, productId: string, quantity: number): Promise<InventoryRecord | null>;
  findLowStock(tenantId: string): Promise<LowStockItem[]>;
  addTransaction(input: CreateInventoryTransactionInput): Promise<InventoryTransaction>;
  listTransactions(inventoryRecordId: string, filter: InventoryTransactionFilter): Promise<InventoryTransaction[]>;
}

export interface OrderRepository {
  create(input: CreateOrderInput): Promise<Order>;
  findById(tenantId: string, orderId: string, options?: LockOptions): Promise<Order | null>;
  list(tenantId: string, filter: OrderFilter): Promise<Order[]>;
  update(tenantId: string, orderId: string, input: UpdateOrderInput): Promise<Order | null>;
  /** Writes the status and stamps the given timestamp column unless it is already set. */
  setStatus(tenantId: string, orderId: string, status: OrderStatus, stamp?: OrderTimestampField): Promise<Order | null>;
  incrementTotal(tenantId: string, orderId: string, amount: number): Promise<Order | null>;
  delete(tenantId: string, orderId: string): Promise<boolean>;

  addItem(input: CreateOrderItemInput): Promise<OrderItem>;
  findItems(orderId: string): Promise<OrderItem[]>;
  findItemById(orderId: string, orderItemId: string): Promise<OrderItem | null>;

  addStatusHistory(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory>;
  listStatusHistory(orderId: string): Promise<OrderStatusHistory[]>;

  addNote(input: CreateOrderNoteInput): Promise<OrderNote>;
  listNotes(orderId: string): Promise<OrderNote[]>;
  deleteNote(orderId: string, noteId: string): Promise<boolean>;
}

export interface ShipmentRepository {
  create(input: CreateShipmentInput): Promise<Shipment>;
  findById(tenantId: string, shipmentId: string, options?: LockOptions): Promise<Shipment | null>;
  findByOrder(orderId: string): Promise<Shipment[]>;
  /** Stamps shipped_at / delivered_at the first time those statuses are reached. */
  update(shipmentId: string, input: UpdateShipmentInput): Promise<Shipment | null>;
  addItem(input: CreateShipmentItemInput): Promise<ShipmentItem>;
  findItems(shipmentId: string): Promise<ShipmentItem[]>;
  sumShippedQuantity(orderItemId: string): Promise<number>;
}

export interface ReturnRepository {
  create(input: CreateReturnRequestInput): Promise<ReturnRequest>;
  findById(tenantId: string, returnId: string, options?: LockOptions): Promise<ReturnRequest | null>;
  findByOrder(orderId: string): Promise<ReturnRequest[]>;
  update(returnId: string, input: UpdateReturnRequestInput, stamp?: ReturnTimestampField): Promise<ReturnRequest | null>;
  addItem(input: CreateReturnItemInput): Promise<ReturnItem>;
  findItems(returnId: string): Promise<ReturnItem[]>;
  markRestocked(returnItemId: string): Promise<void>;
  /** Units already claimed by returns that were not denied. */
  sumReturnedQuantity(orderItemId: string): Promise<number>;
}

export interface Repositories {
  products: ProductRepository;
  inventory: InventoryRepository;
  orders: OrderRepository;
  shipments: ShipmentRepository;
  returns: ReturnRepository;
}
