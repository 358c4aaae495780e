import { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20251201_000001_create_tenants_table';
import * as migration002 from './20251201_000002_create_products_table';
import * as migration003 from './20251201_000003_create_inventory_records_table';
import * as migration004 from './20251201_000004_create_inventory_transactions_table';
import * as migration005 from './20251201_000005_create_orders_table';
import * as migration006 from './20251201_000006_create_order_items_table';
import * as migration007 from './20251201_000007_create_order_status_history_table';
import * as migration008 from './20251201_000008_create_order_notes_table';
import * as migration009 from './20251201_000009_create_shipments_table';
import * as migration010 from './20251201_000010_create_shipment_items_table';
import * as migration011 from './20251201_000011_create_return_requests_table';
import * as migration012 from './20251201_000012_create_return_items_table';

export const migrations: MigrationInfo[] = [
  { name: '20251201_000001_create_tenants_table', migration: migration001.migration },
  { name: '20251201_000002_create_products_table', migration: migration002.migration },
  { name: '20251201_000003_create_inventory_records_table', migration: migration003.migration },
  { name: '20251201_000004_create_inventory_transactions_table', migration: migration004.migration },
  { name: '20251201_000005_create_orders_table', migration: migration005.migration },
  { name: '20251201_000006_create_order_items_table', migration: migration006.migration },
  { name: '20251201_000007_create_order_status_history_table', migration: migration007.migration },
  { name: '20251201_000008_create_order_notes_table', migration: migration008.migration },
  { name: '20251201_000009_create_shipments_table', migration: migration009.migration },
  { name: '20251201_000010_create_shipment_items_table', migration: migration010.migration },
  { name: '20251201_000011_create_return_requests_table', migration: migration011.migration },
  { name: '20251201_000012_create_return_items_table', migration: migration012.migration },
];
