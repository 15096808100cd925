import { OrderStatus } from '@app/common/enums/order-status.enum';

/**
 * Legal next states for each status. CANCELLED is reachable from every
 * non-terminal state; PICKED_UP may skip IN_TRANSIT on short trips.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  [OrderStatus.PENDING]: [OrderStatus.ACCEPTED, OrderStatus.CANCELLED],
  [OrderStatus.ACCEPTED]: [OrderStatus.PICKED_UP, OrderStatus.CANCELLED],
  [OrderStatus.PICKED_UP]: [OrderStatus.IN_TRANSIT, OrderStatus.DELIVERED, OrderStatus.CANCELLED],
  [OrderStatus.IN_TRANSIT]: [OrderStatus.DELIVERED, OrderStatus.CANCELLED],
  [OrderStatus.DELIVERED]: [OrderStatus.COMPLETED, OrderStatus.CANCELLED],
  [OrderStatus.COMPLETED]: [],
  [OrderStatus.CANCELLED]: [],
};

// Statuses a driver reaches through AdvanceStatus
export const DRIVER_ADVANCE_STATUSES = [
  OrderStatus.PICKED_UP,
  OrderStatus.IN_TRANSIT,
  OrderStatus.DELIVERED,
  OrderStatus.COMPLETED,
] as const;

export type DriverAdvanceStatus = (typeof DRIVER_ADVANCE_STATUSES)[number];

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/** True when `path` starts at PENDING and every step is a legal transition. */
export function isValidStatusPath(path: readonly OrderStatus[]): boolean {
  if (path.length === 0 || path[0] !== OrderStatus.PENDING) {
    return false;
  }
  return path.every((status, index) => index === 0 || canTransition(path[index - 1], status));
}
