import { OrderStatus } from '../enums/order-status.enum';
import { OrderType } from '../enums/order-type.enum';

export interface Order {
  id: string;
  type: OrderType;
  status: OrderStatus;
  customerId: string;
  // null exactly while the order is PENDING
  driverId: string | null;

  pickupLatitude: number;
  pickupLongitude: number;
  pickupAddress: string | null;
  dropoffLatitude: number;
  dropoffLongitude: number;
  dropoffAddress: string | null;

  // Minor currency units
  estimatedPriceMinor: number;
  finalPriceMinor: number | null;
  commissionMinor: number;

  // Delivery only
  recipientName: string | null;
  recipientPhone: string | null;
  itemDescription: string | null;
  itemPriceMinor: number | null;
  recipientLocationToken: string | null;
  recipientLocationSubmittedAt: Date | null;

  createdAt: Date;
  acceptedAt: Date | null;
  pickedUpAt: Date | null;
  inTransitAt: Date | null;
  deliveredAt: Date | null;
  completedAt: Date | null;
  cancelledAt: Date | null;
  cancellationReason: string | null;
  cancelledBy: string | null;
}
