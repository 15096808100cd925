import { OrderStatusLog } from '@app/common/entities/order-status-log.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';

export interface LocationInput {
  latitude: number;
  longitude: number;
  address?: string;
}

export interface CreateOrderInput {
  pickup: LocationInput;
  dropoff: LocationInput;
  recipientName?: string;
  recipientPhone?: string;
  itemDescription?: string;
  itemPriceMinor?: number;
}

export interface StatusHistoryEntry {
  sequence: number;
  oldStatus: OrderStatus | null;
  newStatus: OrderStatus;
  changedBy: string;
  notes: string | null;
  timestamp: Date;
}

export function toStatusHistoryEntry(entry: OrderStatusLog): StatusHistoryEntry {
  return {
    sequence: entry.sequence,
    oldStatus: entry.oldStatus,
    newStatus: entry.newStatus,
    changedBy: entry.actorId,
    notes: entry.notes,
    timestamp: entry.createdAt,
  };
}
