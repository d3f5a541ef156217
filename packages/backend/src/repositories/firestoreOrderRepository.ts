import type { Order } from '@orderdesk/shared';
import { type DocumentSnapshot, type Firestore, type Query, FieldPath } from 'firebase-admin/firestore';
import { ConcurrencyConflictError, DuplicateOrderNumberError } from '../domain/errors';
import { type OrderDoc, type OrderNumberDoc, fromOrderDoc, toOrderDoc } from '../types/firestore';
import {
  type OrderFilter,
  type OrderRepository,
  type Page,
  type PageRequest,
  type ScanBatch,
  type ScanRequest,
  assertPageRequest,
  assertScanLimit,
  nextCursorOf,
} from './orderRepository';

export const ORDERS_COLLECTION = 'orders';
export const ORDER_NUMBERS_COLLECTION = 'orderNumbers';

function snapshotToOrder(snap: DocumentSnapshot): Order | null {
  if (!snap.exists) return null;
  return fromOrderDoc(snap.id, snap.data() as OrderDoc);
}

/**
 * Orders live in `orders/{id}`; `orderNumbers/{orderNumber}` reserves each
 * number so uniqueness can be checked inside the save transaction.
 * Range queries need a composite index on the filtered fields + createdAt.
 */
export class FirestoreOrderRepository implements OrderRepository {
  constructor(private readonly db: Firestore) {}

  async getById(id: string): Promise<Order | null> {
    const snap = await this.db.collection(ORDERS_COLLECTION).doc(id).get();
    return snapshotToOrder(snap);
  }

  async getByOrderNumber(orderNumber: string): Promise<Order | null> {
    const snap = await this.db.collection(ORDERS_COLLECTION).where('orderNumber', '==', orderNumber).limit(1).get();
    const doc = snap.docs[0];
    return doc ? fromOrderDoc(doc.id, doc.data() as OrderDoc) : null;
  }

  async query(filter: OrderFilter, request: PageRequest): Promise<Page<Order>> {
    assertPageRequest(request);

    const query = this.filtered(filter);
    const [countSnap, pageSnap] = await Promise.all([
      query.count().get(),
      query
        .orderBy('createdAt', request.direction ?? 'asc')
        .offset((request.page - 1) * request.pageSize)
        .limit(request.pageSize)
        .get(),
    ]);

    return {
      items: pageSnap.docs.map((doc) => fromOrderDoc(doc.id, doc.data() as OrderDoc)),
      totalCount: countSnap.data().count,
      page: request.page,
      pageSize: request.pageSize,
    };
  }

  async scan(filter: OrderFilter, request: ScanRequest): Promise<ScanBatch> {
    assertScanLimit(request.limit);

    let query = this.filtered(filter).orderBy('createdAt', 'asc').orderBy(FieldPath.documentId(), 'asc');
    if (request.after) query = query.startAfter(request.after.createdAt, request.after.id);
    const snap = await query.limit(request.limit).get();

    const items = snap.docs.map((doc) => fromOrderDoc(doc.id, doc.data() as OrderDoc));
    return { items, nextCursor: nextCursorOf(items, request.limit) };
  }

  async save(order: Order): Promise<Order> {
    const orderRef = this.db.collection(ORDERS_COLLECTION).doc(order.id);
    const numberRef = this.db.collection(ORDER_NUMBERS_COLLECTION).doc(order.orderNumber);

    return this.db.runTransaction(async (tx) => {
      const [current, reserved] = await tx.getAll(orderRef, numberRef);
      const currentVersion = current.exists ? Number(current.get('version') ?? 0) : 0;
      if (order.version !== currentVersion) {
        throw new ConcurrencyConflictError(order.id, order.version, current.exists ? currentVersion : null);
      }

      const owner = reserved.exists ? (reserved.data() as OrderNumberDoc).orderId : undefined;
      if (owner !== undefined && owner !== order.id) {
        throw new DuplicateOrderNumberError(order.orderNumber);
      }

      const saved: Order = { ...order, version: currentVersion + 1 };
      tx.set(orderRef, toOrderDoc(saved));
      if (owner === undefined) {
        const reservation: OrderNumberDoc = { orderId: order.id, createdAt: order.createdAt };
        tx.create(numberRef, reservation);
      }
      return saved;
    });
  }

  async delete(id: string): Promise<boolean> {
    const orderRef = this.db.collection(ORDERS_COLLECTION).doc(id);

    return this.db.runTransaction(async (tx) => {
      const current = await tx.get(orderRef);
      const order = snapshotToOrder(current);
      if (!order) return false;
      tx.delete(orderRef);
      tx.delete(this.db.collection(ORDER_NUMBERS_COLLECTION).doc(order.orderNumber));
      return true;
    });
  }

  private filtered(filter: OrderFilter): Query {
    let query: Query = this.db.collection(ORDERS_COLLECTION);
    if (filter.customerId !== undefined) query = query.where('customerId', '==', filter.customerId);
    if (filter.status !== undefined) query = query.where('status', '==', filter.status);
    if (filter.currency !== undefined) query = query.where('currency', '==', filter.currency);
    if (filter.createdAt?.from) query = query.where('createdAt', '>=', filter.createdAt.from);
    if (filter.createdAt?.to) query = query.where('createdAt', '<=', filter.createdAt.to);
    return query;
  }
}
