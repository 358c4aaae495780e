export type * from './product.model';
export type * from './inventory-record.model';
export type * from './inventory-transaction.model';
export type * from './order.model';
export type * from './order-item.model';
export type * from './order-status-history.model';
export type * from './order-note.model';
export type * from './shipment.model';
export type * from './return-request.model';
