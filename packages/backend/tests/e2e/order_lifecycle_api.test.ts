/**
 * Scenario: an order travels through the HTTP API
 * - Create an order and read it back by id and by number
 * - Edit it while pending, confirm it, then cancel it
 * - Check the error envelope for bad input, illegal moves and unknown ids
 * - Delete it
 */
import { describe, it, beforeAll, afterAll, expect, vi } from 'vitest';
import type { Order } from '@orderdesk/shared';
import { InMemoryOrderRepository } from '../../src/repositories/inMemoryOrderRepository';
import { FixedClock } from '../helpers/clock';
import { buildOrderInput, twoItemOrderInput } from '../helpers/fixtures';
import { type TestServer, startTestServer } from '../helpers/http';

describe('Workflow: order lifecycle over HTTP', () => {
  const clock = new FixedClock('2026-01-15T10:00:00.000Z');
  let server: TestServer;
  let orderId: string;
  let orderNumber: string;

  beforeAll(async () => {
    server = await startTestServer(clock);
  });

  afterAll(async () => {
    await server.close();
  });

  it('reports health', async () => {
    const res = await server.api.get('/health');
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: 'OK', message: 'Backend API is running', timestamp: '2026-01-15T10:00:00.000Z' });
  });

  it('creates an order', async () => {
    const res = await server.api.post('/orders', twoItemOrderInput({ notes: 'Leave at door' }));
    expect(res.status).toBe(201);
    expect(res.data.success).toBe(true);
    expect(res.data.order).toMatchObject({
      status: 'pending',
      subtotal: 69.98,
      tax: 5.99,
      shipping: 9.99,
      discount: 0,
      total: 85.96,
      currency: 'USD',
      notes: 'Leave at door',
      createdAt: '2026-01-15T10:00:00.000Z',
      updatedAt: null,
      version: 1,
    });
    orderId = res.data.order.id;
    orderNumber = res.data.order.orderNumber;
  });

  it('reads the order by id and by number', async () => {
    const byId = await server.api.get(`/orders/${orderId}`);
    expect(byId.status).toBe(200);
    expect(byId.data.order.orderNumber).toBe(orderNumber);

    const byNumber = await server.api.get(`/orders/number/${orderNumber}`);
    expect(byNumber.status).toBe(200);
    expect(byNumber.data.order.id).toBe(orderId);
  });

  it('edits a pending order', async () => {
    clock.advance(60 * 60 * 1000);
    const res = await server.api.patch(`/orders/${orderId}`, { discount: '5.96' });
    expect(res.status).toBe(200);
    expect(res.data.order).toMatchObject({ total: 80, updatedAt: '2026-01-15T11:00:00.000Z', version: 2 });
  });

  it('rejects unknown fields on edit', async () => {
    const res = await server.api.patch(`/orders/${orderId}`, { status: 'shipped' });
    expect(res.status).toBe(400);
    expect(res.data.code).toBe('INVALID_REQUEST');
  });

  it('refuses to skip ahead to shipped', async () => {
    const res = await server.api.post(`/orders/${orderId}/status`, { status: 'shipped' });
    expect(res.status).toBe(409);
    expect(res.data).toEqual({
      success: false,
      error: `Cannot move order ${orderId} from pending to shipped`,
      code: 'INVALID_TRANSITION',
      details: { orderId, from: 'pending', to: 'shipped' },
    });
  });

  it('rejects an unknown status', async () => {
    const res = await server.api.post(`/orders/${orderId}/status`, { status: 'lost' });
    expect(res.status).toBe(400);
    expect(res.data.code).toBe('INVALID_REQUEST');
  });

  it('confirms and then cancels', async () => {
    const confirmed = await server.api.post(`/orders/${orderId}/status`, { status: 'confirmed' });
    expect(confirmed.status).toBe(200);
    expect(confirmed.data.order.status).toBe('confirmed');

    const cancelled = await server.api.post(`/orders/${orderId}/cancel`);
    expect(cancelled.status).toBe(200);
    expect(cancelled.data.order.status).toBe('cancelled');

    const again = await server.api.post(`/orders/${orderId}/cancel`);
    expect(again.status).toBe(409);
    expect(again.data.code).toBe('INVALID_TRANSITION');
  });

  it('lists with filters', async () => {
    clock.set('2026-01-16T09:00:00.000Z');
    const second = await server.api.post('/orders', buildOrderInput({ customerId: 'cust-2', customerEmail: 'cust-2@example.com' }));
    expect(second.status).toBe(201);

    const all = await server.api.get('/orders', { params: { pageSize: 10 } });
    expect(all.status).toBe(200);
    expect(all.data.orders.map((order: Order) => order.customerId)).toEqual(['cust-2', 'cust-1']);
    expect(all.data).toMatchObject({ count: 2, totalCount: 2, page: 1, pageSize: 10 });

    const cancelled = await server.api.get('/orders', { params: { status: 'cancelled' } });
    expect(cancelled.data.orders.map((order: Order) => order.id)).toEqual([orderId]);

    const window = await server.api.get('/orders', { params: { startDate: '2026-01-16', endDate: '2026-01-16' } });
    expect(window.data.totalCount).toBe(1);
  });

  it('rejects bad list parameters', async () => {
    const tooBig = await server.api.get('/orders', { params: { pageSize: 500 } });
    expect(tooBig.status).toBe(400);
    expect(tooBig.data.code).toBe('INVALID_REQUEST');

    const inverted = await server.api.get('/orders', { params: { startDate: '2026-01-16', endDate: '2026-01-15' } });
    expect(inverted.status).toBe(400);
    expect(inverted.data).toMatchObject({ code: 'INVALID_ARGUMENT', details: { field: 'endDate' } });
  });

  it('reports validation failures with the offending field', async () => {
    const empty = await server.api.post('/orders', buildOrderInput({ items: [] }));
    expect(empty.status).toBe(400);
    expect(empty.data).toEqual({
      success: false,
      error: 'Order must contain at least one item',
      code: 'VALIDATION_ERROR',
      details: { field: 'items', reason: 'EMPTY_ITEMS' },
    });

    const badPayment = await server.api.post('/orders', { ...buildOrderInput(), payment: { method: 'cash' } });
    expect(badPayment.status).toBe(400);
    expect(badPayment.data.code).toBe('INVALID_REQUEST');
  });

  it('deletes the order once', async () => {
    const first = await server.api.delete(`/orders/${orderId}`);
    expect(first.status).toBe(200);
    expect(first.data).toEqual({ success: true });

    const missing = await server.api.get(`/orders/${orderId}`);
    expect(missing.status).toBe(404);
    expect(missing.data.code).toBe('ORDER_NOT_FOUND');

    const second = await server.api.delete(`/orders/${orderId}`);
    expect(second.status).toBe(404);
  });
});

class OfflineRepository extends InMemoryOrderRepository {
  async getById(): Promise<Order | null> {
    throw new Error('store offline');
  }
}

describe('Unexpected failures', () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startTestServer(new FixedClock('2026-01-15T10:00:00.000Z'), new OfflineRepository());
  });

  afterAll(async () => {
    await server.close();
  });

  it('become a logged 500 with a route code', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const res = await server.api.get('/orders/any');
      expect(res.status).toBe(500);
      expect(res.data).toEqual({ success: false, error: 'Failed to get order', code: 'ORDER_GET_ERROR' });
      expect(logged).toHaveBeenCalledWith('ORDER_GET_ERROR', new Error('store offline'));
    } finally {
      logged.mockRestore();
    }
  });
});
