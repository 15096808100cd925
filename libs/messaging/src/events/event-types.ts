import { OrderStatus } from '@app/common/enums/order-status.enum';
import { OrderType } from '@app/common/enums/order-type.enum';

export enum OrderEvents {
  CREATED = 'order.created',
  STATUS_CHANGED = 'order.status_changed',
  RECIPIENT_LOCATION_SUBMITTED = 'order.recipient_location_submitted',
}

export enum DriverEvents {
  LOCATION_UPDATED = 'driver.location_updated',
}

export interface EventPayloadMap {
  [OrderEvents.CREATED]: {
    orderId: string;
    orderType: OrderType;
    customerId: string;
    createdAt: string;
  };

  [OrderEvents.STATUS_CHANGED]: {
    orderId: string;
    customerId: string;
    driverId: string | null;
    oldStatus: OrderStatus | null;
    status: OrderStatus;
    actorId: string;
    notes?: string | null;
    occurredAt: string;
  };

  [OrderEvents.RECIPIENT_LOCATION_SUBMITTED]: {
    orderId: string;
    customerId: string;
    driverId: string | null;
    status: OrderStatus;
    latitude: number;
    longitude: number;
    occurredAt: string;
  };

  [DriverEvents.LOCATION_UPDATED]: {
    driverId: string;
    latitude: number;
    longitude: number;
    timestamp: string;
  };
}

export type MessagingEvent = keyof EventPayloadMap;

export const ALL_MESSAGING_EVENTS: readonly MessagingEvent[] = [
  ...Object.values(OrderEvents),
  ...Object.values(DriverEvents),
];
