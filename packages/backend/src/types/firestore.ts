import type { Order } from '@orderdesk/shared';

// Firestore hands timestamps back as Timestamp; anything with toDate() will do.
export type TimestampLike = Date | { toDate(): Date };

// Type aliases rather than interfaces so they satisfy Firestore's DocumentData.
export type OrderDoc = Omit<Order, 'id' | 'createdAt' | 'updatedAt'> & {
  createdAt: TimestampLike;
  updatedAt: TimestampLike | null;
};

export type OrderNumberDoc = {
  orderId: string;
  createdAt: TimestampLike;
};

export function toDate(value: TimestampLike): Date {
  return value instanceof Date ? value : value.toDate();
}

export function toOrderDoc(order: Order): OrderDoc {
  const { id: _id, ...doc } = order;
  return doc;
}

export function fromOrderDoc(id: string, doc: OrderDoc): Order {
  return {
    ...doc,
    id,
    createdAt: toDate(doc.createdAt),
    updatedAt: doc.updatedAt ? toDate(doc.updatedAt) : null,
  };
}
