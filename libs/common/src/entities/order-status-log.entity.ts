import { OrderStatus } from '../enums/order-status.enum';

export interface OrderStatusLog {
  id: string;
  orderId: string;
  sequence: number;
  oldStatus: OrderStatus | null;
  newStatus: OrderStatus;
  actorId: string;
  notes: string | null;
  createdAt: Date;
  previousHash: string | null;
  hash: string;
}
