import { OrderStatus } from '@orderdesk/shared';

/** Every legal status move. Statuses mapping to an empty list are terminal. */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = Object.freeze({
  [OrderStatus.PENDING]: [OrderStatus.CONFIRMED, OrderStatus.CANCELLED],
  [OrderStatus.CONFIRMED]: [OrderStatus.PROCESSING, OrderStatus.CANCELLED],
  [OrderStatus.PROCESSING]: [OrderStatus.SHIPPED, OrderStatus.CANCELLED],
  [OrderStatus.SHIPPED]: [OrderStatus.DELIVERED],
  [OrderStatus.DELIVERED]: [],
  [OrderStatus.CANCELLED]: [],
});

// Item and adjustment edits are only accepted before fulfilment starts.
export const EDITABLE_STATUSES: readonly OrderStatus[] = [OrderStatus.PENDING, OrderStatus.CONFIRMED];

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}

export function isEditable(status: OrderStatus): boolean {
  return EDITABLE_STATUSES.includes(status);
}

const STATUS_VALUES = new Set<string>(Object.values(OrderStatus));

export function isOrderStatus(value: string): value is OrderStatus {
  return STATUS_VALUES.has(value);
}
