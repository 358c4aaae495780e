import { INVENTORY_TRANSACTION_TYPE } from '../../constants';
import type {
  InventoryRecord,
  InventoryTransaction,
  InventoryTransactionFilter,
  LowStockItem,
  Metadata,
} from '../../connections/db/models';
import type { UnitOfWork } from '../../connections/db/unit-of-work';
import { ConflictError, NotFoundError } from '../../utils/errors';
import type { Logger } from '../../utils/logging';
import { assertPositiveQuantity, assertStockLevel } from '../../utils/validation';

export interface InventoryOptions {
  location?: string | null;
  sku?: string | null;
  reorder_point?: number;
  reorder_quantity?: number;
  metadata?: Metadata;
  created_by?: string | null;
}

export interface InventoryLine {
  product_id: string;
  quantity: number;
}

export interface InventoryLineResult {
  product_id: string;
  success: boolean;
  message: string;
}

/**
 * Sole writer of inventory state. Every mutation and its ledger row commit
 * together; expected shortfalls come back as `false` rather than errors.
 */
export class InventoryManager {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly logger: Logger
  ) {}

  async createOrUpdateInventory(
    tenantId: string,
    productId: string,
    quantity: number,
    options: InventoryOptions = {}
  ): Promise<InventoryRecord> {
    assertStockLevel(quantity);

    return this.uow.run(async (tx) => {
      const product = await tx.products.findById(tenantId, productId);
      if (!product) {
        throw new NotFoundError('Product', productId);
      }

      let existing = await tx.inventory.findByProduct(tenantId, productId, { forUpdate: true });

      if (!existing) {
        const created = await tx.inventory.createIfAbsent({
          tenant_id: tenantId,
          product_id: productId,
          quantity,
          sku: options.sku ?? product.sku,
          location: options.location,
          reorder_point: options.reorder_point,
          reorder_quantity: options.reorder_quantity,
          metadata: options.metadata,
        });

        if (created) {
          await tx.inventory.addTransaction({
            inventory_record_id: created.id,
            transaction_type: INVENTORY_TRANSACTION_TYPE.INITIAL,
            quantity,
            reference_id: productId,
            reference_type: 'product',
            notes: 'Initial inventory',
            created_by: options.created_by,
          });
          await tx.products.updateStock(tenantId, productId, created.quantity);

          this.logger.info('Inventory created', { tenantId, productId, quantity: created.quantity });
          return created;
        }

        // A concurrent call inserted the record first; update it instead
        existing = await tx.inventory.findByProduct(tenantId, productId, { forUpdate: true });
        if (!existing) {
          throw new Error(`Inventory record for product ${productId} missing after insert conflict`);
        }
      }

      if (quantity < existing.reserved_quantity) {
        throw new ConflictError(
          `Cannot set quantity to ${quantity}: ${existing.reserved_quantity} units are reserved`,
          'QUANTITY_BELOW_RESERVED',
          { quantity, reserved_quantity: existing.reserved_quantity }
        );
      }

      const record = await tx.inventory.update(existing.id, {
        quantity,
        sku: options.sku,
        location: options.location,
        reorder_point: options.reorder_point,
        reorder_quantity: options.reorder_quantity,
        metadata: options.metadata,
      });

      const delta = quantity - existing.quantity;
      if (delta !== 0) {
        await tx.inventory.addTransaction({
          inventory_record_id: record.id,
          transaction_type: INVENTORY_TRANSACTION_TYPE.ADJUSTMENT,
          quantity: delta,
          reference_id: productId,
          reference_type: 'product',
          notes: `Quantity set from ${existing.quantity} to ${quantity}`,
          created_by: options.created_by,
        });
      }

      await tx.products.updateStock(tenantId, productId, record.quantity);

      this.logger.info('Inventory updated', {
        tenantId,
        productId,
        quantity: record.quantity,
        reserved: record.reserved_quantity,
      });
      return record;
    });
  }

  async reserveInventory(
    tenantId: string,
    productId: string,
    quantity: number,
    referenceId: string,
    referenceType: string = 'order'
  ): Promise<boolean> {
    assertPositiveQuantity(quantity);

    return this.uow.run(async (tx) => {
      const record = await tx.inventory.reserve(tenantId, productId, quantity);
      if (!record) {
        this.logger.warn('Reservation refused: record missing or insufficient stock', {
          tenantId,
          productId,
          quantity,
          referenceId,
        });
        return false;
      }

      await tx.inventory.addTransaction({
        inventory_record_id: record.id,
        transaction_type: INVENTORY_TRANSACTION_TYPE.SALE,
        quantity: -quantity,
        reference_id: referenceId,
        reference_type: referenceType,
        notes: `Reserved ${quantity} units`,
      });

      this.logger.info('Inventory reserved', {
        tenantId,
        productId,
        quantity,
        available: record.available_quantity,
        reserved: record.reserved_quantity,
      });
      return true;
    });
  }

  async releaseInventory(
    tenantId: string,
    productId: string,
    quantity: number,
    referenceId: string,
    referenceType: string = 'order'
  ): Promise<boolean> {
    assertPositiveQuantity(quantity);

    return this.uow.run(async (tx) => {
      const result = await tx.inventory.release(tenantId, productId, quantity);
      if (!result) {
        this.logger.warn('Release skipped: no inventory record', { tenantId, productId, referenceId });
        return false;
      }

      if (result.released > 0) {
        await tx.inventory.addTransaction({
          inventory_record_id: result.record.id,
          transaction_type: INVENTORY_TRANSACTION_TYPE.ADJUSTMENT,
          quantity: result.released,
          reference_id: referenceId,
          reference_type: referenceType,
          notes: `Released ${result.released} reserved units`,
        });
      }

      this.logger.info('Inventory released', {
        tenantId,
        productId,
        requested: quantity,
        released: result.released,
      });
      return true;
    });
  }

  /**
   * Turns a reservation into a sale. Quantity and available are left as they
   * are; only the reservation shrinks.
   */
  async completeInventorySale(
    tenantId: string,
    productId: string,
    quantity: number,
    referenceId: string,
    referenceType: string = 'order_completion'
  ): Promise<boolean> {
    assertPositiveQuantity(quantity);

    return this.uow.run(async (tx) => {
      const record = await tx.inventory.consumeReservation(tenantId, productId, quantity);
      if (!record) {
        this.logger.warn('Sale completion skipped: no inventory record', { tenantId, productId, referenceId });
        return false;
      }

      await tx.inventory.addTransaction({
        inventory_record_id: record.id,
        transaction_type: INVENTORY_TRANSACTION_TYPE.SALE,
        quantity: 0,
        reference_id: referenceId,
        reference_type: referenceType,
        notes: `Completed sale of ${quantity} units`,
        metadata: { units: quantity },
      });
      await tx.products.updateStock(tenantId, productId, record.quantity);

      this.logger.info('Inventory sale completed', {
        tenantId,
        productId,
        quantity,
        reserved: record.reserved_quantity,
      });
      return true;
    });
  }

  async completeOrderInventory(
    tenantId: string,
    orderId: string,
    items: InventoryLine[]
  ): Promise<InventoryLineResult[]> {
    for (const item of items) {
      assertPositiveQuantity(item.quantity);
    }

    return this.uow.run(async () => {
      const results: InventoryLineResult[] = [];
      for (const item of items) {
        const success = await this.completeInventorySale(tenantId, item.product_id, item.quantity, orderId);
        results.push({
          product_id: item.product_id,
          success,
          message: success
            ? `Completed sale of ${item.quantity} units`
            : 'No inventory record for product',
        });
      }
      return results;
    });
  }

  async processReturn(
    tenantId: string,
    productId: string,
    quantity: number,
    referenceId: string,
    referenceType: string = 'return',
    notes?: string
  ): Promise<boolean> {
    assertPositiveQuantity(quantity);

    return this.uow.run(async (tx) => {
      const record = await tx.inventory.restock(tenantId, productId, quantity);
      if (!record) {
        this.logger.warn('Return skipped: no inventory record', { tenantId, productId, referenceId });
        return false;
      }

      await tx.inventory.addTransaction({
        inventory_record_id: record.id,
        transaction_type: INVENTORY_TRANSACTION_TYPE.RETURN,
        quantity,
        reference_id: referenceId,
        reference_type: referenceType,
        notes: notes ?? `Returned ${quantity} units`,
      });
      await tx.products.updateStock(tenantId, productId, record.quantity);

      this.logger.info('Inventory returned', {
        tenantId,
        productId,
        quantity,
        available: record.available_quantity,
      });
      return true;
    });
  }

  async getInventory(tenantId: string, productId: string): Promise<InventoryRecord | null> {
    return this.uow.run((tx) => tx.inventory.findByProduct(tenantId, productId));
  }

  async getInventoryBySku(tenantId: string, sku: string): Promise<InventoryRecord | null> {
    return this.uow.run((tx) => tx.inventory.findBySku(tenantId, sku));
  }

  async getLowStockItems(tenantId: string): Promise<LowStockItem[]> {
    return this.uow.run((tx) => tx.inventory.findLowStock(tenantId));
  }

  async getInventoryTransactions(
    tenantId: string,
    productId: string,
    filter: InventoryTransactionFilter = {}
  ): Promise<InventoryTransaction[]> {
    return this.uow.run(async (tx) => {
      const record = await tx.inventory.findByProduct(tenantId, productId);
      if (!record) {
        return [];
      }
      return tx.inventory.listTransactions(record.id, filter);
    });
  }
}
