export * from './order.constants';
export * from './shipment.constants';
export * from './return.constants';
export * from './inventory.constants';
