// Shipment Model

import type { ShipmentStatus } from '../../../constants';
import type { Metadata } from './inventory-record.model';
import type { Address } from './order.model';

export interface Shipment {
  id: string; // UUID
  order_id: string;
  status: ShipmentStatus;
  shipping_method: string;
  carrier: string | null;
  tracking_number: string | null;
  tracking_url: string | null;
  label_url: string | null;
  shipping_address: Address | null;
  estimated_delivery: Date | null;
  shipped_at: Date | null; // set on first 'shipped'
  delivered_at: Date | null; // set on first 'delivered'
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export interface CreateShipmentInput {
  order_id: string;
  shipping_method: string; // REQUIRED
  carrier?: string | null;
  tracking_number?: string | null;
  tracking_url?: string | null;
  label_url?: string | null;
  shipping_address?: Address | null;
  metadata?: Metadata;
}

export interface UpdateShipmentInput {
  status: ShipmentStatus;
  tracking_number?: string | null;
  tracking_url?: string | null;
  estimated_delivery?: Date | null;
  metadata?: Metadata; // merged
}

export interface ShipmentItem {
  id: string;
  shipment_id: string;
  order_item_id: string;
  product_id: string;
  quantity: number;
  created_at: Date;
}

export interface CreateShipmentItemInput {
  shipment_id: string;
  order_item_id: string;
  product_id: string;
  quantity: number;
}

export interface ShipmentWithItems extends Shipment {
  items: ShipmentItem[];
}
